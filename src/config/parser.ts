import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import YAML from 'yaml';
import type { ZodIssue } from 'zod';
import { YamlRunnerError, ErrorCode, errorMessage } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';
import {
  SECTION_KEY,
  callStepSchema,
  normalizeStep,
  sectionSchema,
  shellStepSchema,
  type ConfigDocument,
  type Section,
  type StepDefinition,
} from './types.js';

const EXAMPLE_CONFIG =
  '  Example:\n    build:\n      description: "Compile the project"\n      command:\n        - npm run build';

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

// ── Section discovery ──

interface SectionCandidate {
  name: string;
  group: string[];
  value: Record<string, unknown>;
}

/** A mapping is a section when its `command` holds something (not null, empty or false) */
function isSection(value: Record<string, unknown>): boolean {
  const command = value[SECTION_KEY];
  if (Array.isArray(command)) return command.length > 0;
  if (isMapping(command)) return Object.keys(command).length > 0;
  return Boolean(command);
}

/**
 * Walk the document depth-first. A mapping with a non-empty `command` is a
 * section, any other mapping is a group searched recursively. Other values
 * are ignored.
 */
export function collectSections(
  raw: Record<string, unknown>,
  group: string[] = [],
): SectionCandidate[] {
  const found: SectionCandidate[] = [];
  for (const [key, value] of Object.entries(raw)) {
    if (!isMapping(value)) continue;
    if (isSection(value)) {
      found.push({ name: key, group, value });
    } else {
      found.push(...collectSections(value, [...group, key]));
    }
  }
  return found;
}

// ── Error formatting ──

function formatPath(path: (string | number)[]): string {
  return path
    .map((part, i) => (typeof part === 'number' ? `[${part}]` : i === 0 ? part : `.${part}`))
    .join('');
}

function formatIssue(prefix: string, path: (string | number)[], issue: ZodIssue): string {
  const full = formatPath([...path, ...issue.path]);
  if (issue.code === 'unrecognized_keys') {
    const keys = issue.keys.map((k) => `"${k}"`).join(', ');
    return full ? `✗ ${prefix}: ${full}: unknown field ${keys}` : `✗ ${prefix}: unknown field ${keys}`;
  }
  return full ? `✗ ${prefix}: ${full}: ${issue.message}` : `✗ ${prefix}: ${issue.message}`;
}

// ── Step / section building ──

function buildStep(
  entry: unknown,
  index: number,
  prefix: string,
  issues: string[],
): StepDefinition | null {
  const path = [SECTION_KEY, index];
  const normalized = normalizeStep(entry);

  if (!isMapping(normalized) || ('run' in normalized) === ('call' in normalized)) {
    issues.push(
      `✗ ${prefix}: ${formatPath(path)}: step must be a string or a mapping with exactly one of "run" or "call"`,
    );
    return null;
  }

  if ('run' in normalized) {
    const result = shellStepSchema.safeParse(normalized);
    if (!result.success) {
      for (const issue of result.error.issues) issues.push(formatIssue(prefix, path, issue));
      return null;
    }
    const { run, description, skip, env, cwd } = result.data;
    return { kind: 'shell', index, label: description ?? run, run, description, skip, env, cwd };
  }

  const result = callStepSchema.safeParse(normalized);
  if (!result.success) {
    for (const issue of result.error.issues) issues.push(formatIssue(prefix, path, issue));
    return null;
  }
  const { call, description, skip, env, cwd } = result.data;
  return {
    kind: 'call',
    index,
    label: description ?? `call ${call}`,
    call,
    with: result.data.with,
    description,
    skip,
    env,
    cwd,
  };
}

function buildSection(candidate: SectionCandidate, issues: string[]): Section | null {
  const prefix = `section "${candidate.name}"`;
  const result = sectionSchema.safeParse(candidate.value);
  if (!result.success) {
    for (const issue of result.error.issues) issues.push(formatIssue(prefix, [], issue));
    return null;
  }

  const entries: unknown[] =
    typeof result.data.command === 'string' ? [result.data.command] : result.data.command;
  const steps: StepDefinition[] = [];
  for (const [index, entry] of entries.entries()) {
    const step = buildStep(entry, index, prefix, issues);
    if (step) steps.push(step);
  }
  if (steps.length !== entries.length) return null;

  return {
    name: candidate.name,
    group: candidate.group,
    description: result.data.description,
    continue_on_failure: result.data.continue_on_failure,
    env: result.data.env,
    cwd: result.data.cwd,
    steps,
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

// ── Public API ──

/** Validate an already-parsed value. Throws YamlRunnerError on failure. */
export function parseConfigObject(raw: unknown, source: string | null = null): ConfigDocument {
  if (!isMapping(raw)) {
    throw new YamlRunnerError(
      ErrorCode.CONFIG_SCHEMA_ERROR,
      `config must contain a YAML mapping of sections\n${EXAMPLE_CONFIG}`,
    );
  }

  const issues: string[] = [];
  const sections: Section[] = [];
  const seen = new Set<string>();

  for (const candidate of collectSections(raw)) {
    if (seen.has(candidate.name)) {
      issues.push(`✗ duplicate section name: "${candidate.name}"`);
      continue;
    }
    seen.add(candidate.name);
    const section = buildSection(candidate, issues);
    if (section) sections.push(section);
  }

  if (issues.length > 0) {
    throw new YamlRunnerError(
      ErrorCode.CONFIG_SCHEMA_ERROR,
      issues.join('\n'),
      'Fix the issues above and try again',
    );
  }

  debug('config', `parsed ${sections.length} sections`, source ?? '<inline>');
  return deepFreeze({ source, sections });
}

/** Parse a YAML string into a validated, read-only document. Throws YamlRunnerError on failure. */
export function parseConfigYaml(content: string, source: string | null = null): ConfigDocument {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new YamlRunnerError(
      ErrorCode.CONFIG_PARSE_ERROR,
      `Invalid YAML: ${errorMessage(err)}`,
      'Check the config for syntax errors (indentation, colons, etc.)',
    );
  }
  return parseConfigObject(raw, source);
}

/** Load and parse a config file. Throws YamlRunnerError on failure. */
export function loadConfigFile(filePath: string): ConfigDocument {
  const source = resolve(filePath);
  let content: string;
  try {
    content = readFileSync(source, 'utf-8');
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      throw new YamlRunnerError(
        ErrorCode.CONFIG_NOT_FOUND,
        `config not found: ${filePath}`,
        'Pass an existing YAML file with --config <path>',
      );
    }
    throw new YamlRunnerError(
      ErrorCode.CONFIG_READ_ERROR,
      `cannot read config ${filePath}: ${errorMessage(err)}`,
      'Check that --config points to a readable file',
    );
  }
  return parseConfigYaml(content, source);
}

export function findSection(doc: ConfigDocument, name: string): Section | undefined {
  return doc.sections.find((s) => s.name === name);
}
