import chalk from 'chalk';
import type { ConfigDocument, Section } from '../../config/types.js';

export interface SectionListing {
  name: string;
  group: string[];
  description: string | null;
  steps: number;
}

export function describeSections(doc: ConfigDocument): SectionListing[] {
  return doc.sections.map((s: Section) => ({
    name: s.name,
    group: s.group,
    description: s.description ?? null,
    steps: s.steps.length,
  }));
}

/** Human-readable section list, one line per section */
export function formatSectionList(doc: ConfigDocument): string[] {
  if (doc.sections.length === 0) {
    return [chalk.dim('No sections found.'), chalk.dim('  A section is a mapping with a non-empty "command".')];
  }

  const lines = [`Sections${doc.source ? ` in ${doc.source}` : ''}:`];
  const nameWidth = Math.max(4, ...doc.sections.map((s) => s.name.length));
  for (const entry of describeSections(doc)) {
    const count = chalk.dim(`(${entry.steps} step${entry.steps === 1 ? '' : 's'})`);
    const group = entry.group.length > 0 ? chalk.dim(` [${entry.group.join('.')}]`) : '';
    const description = entry.description ? `${entry.description} ` : '';
    lines.push(`  ${entry.name.padEnd(nameWidth)}  ${description}${count}${group}`);
  }
  return lines;
}
