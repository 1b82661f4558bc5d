import chalk from 'chalk';
import type { RunnerHooks, RunSummary, StepResult } from '../../runner/types.js';
import { formatDuration, truncateLine } from '../utils/format.js';

export interface ConsoleReporterOptions {
  log?: (line: string) => void;
}

/** One line per finished step */
export function formatStepResult(result: StepResult): string {
  switch (result.status) {
    case 'passed':
      return `  ${chalk.green('✓')} ${result.label} ${chalk.dim(`(${formatDuration(result.duration_ms)})`)}`;
    case 'skipped':
      return `  ${chalk.dim('⏭')} ${result.label} ${chalk.dim('(skipped)')}`;
    case 'failed':
      return `  ${chalk.red('✗')} ${result.label}: ${truncateLine(result.error?.message ?? 'failed', 80)}`;
  }
}

export function formatSummaryLine(summary: RunSummary): string {
  const executed = summary.results.filter((r) => r.status !== 'skipped').length;
  const failed = summary.results.filter((r) => r.status === 'failed').length;
  const duration = formatDuration(summary.duration_ms);

  switch (summary.status) {
    case 'passed':
      return chalk.green(`✓ ${executed} step${executed === 1 ? '' : 's'} passed (${duration})`);
    case 'failed':
      return chalk.red(`✗ ${failed} of ${executed} step${executed === 1 ? '' : 's'} failed (${duration})`);
    case 'interrupted':
      return chalk.yellow(`⚠ Run interrupted: ${summary.not_run.length} step${summary.not_run.length === 1 ? '' : 's'} not run`);
  }
}

/** Runner hooks that print progress to the console */
export function createConsoleReporter(options: ConsoleReporterOptions = {}): RunnerHooks {
  const log = options.log ?? ((line: string) => console.log(line));
  return {
    onSectionStart(section) {
      const description = section.description ? chalk.dim(` - ${section.description}`) : '';
      log(`\n▶ ${chalk.bold(section.name)}${description}`);
    },
    beforeStep(step) {
      log(`  → ${truncateLine(step.label, 80)}`);
    },
    afterStep(result) {
      log(formatStepResult(result));
    },
    onRunEnd(summary) {
      log('');
      log(formatSummaryLine(summary));
      for (const ref of summary.not_run) {
        log(chalk.dim(`  ○ ${ref.section}: ${ref.label}`));
      }
    },
  };
}
