import { z } from 'zod';

// ── Step schemas ──

// YAML scalars in env maps are commonly unquoted numbers or booleans
const envSchema = z
  .record(z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v)))
  .default({});

const stepCommon = {
  description: z.string().optional(),
  skip: z.boolean().default(false),
  env: envSchema,
  cwd: z.string().min(1).optional(),
};

export const shellStepSchema = z
  .object({
    run: z.string().min(1),
    ...stepCommon,
  })
  .strict();

export const callStepSchema = z
  .object({
    call: z.string().min(1),
    with: z.record(z.unknown()).default({}),
    ...stepCommon,
  })
  .strict();

/**
 * Normalize a short-format step entry into object format.
 *
 * Short format: a plain string is a shell command.
 *   - `npm test`           → `{ run: 'npm test' }`
 */
export function normalizeStep(raw: unknown): unknown {
  if (typeof raw === 'string') return { run: raw };
  return raw;
}

// ── Section schema ──

export const sectionSchema = z
  .object({
    command: z.union([z.string().min(1), z.array(z.unknown())]),
    description: z.string().optional(),
    continue_on_failure: z.boolean().default(false),
    env: envSchema,
    cwd: z.string().min(1).optional(),
  })
  .passthrough();

// ── Derived TypeScript types ──

export type ShellStepEntry = z.infer<typeof shellStepSchema>;
export type CallStepEntry = z.infer<typeof callStepSchema>;
export type SectionEntry = z.infer<typeof sectionSchema>;

interface StepBase {
  /** Position within the section, starting at 0 */
  index: number;
  /** Display label: description, or the command itself */
  label: string;
  description?: string;
  skip: boolean;
  env: Record<string, string>;
  cwd?: string;
}

export interface ShellStep extends StepBase {
  kind: 'shell';
  run: string;
}

export interface CallStep extends StepBase {
  kind: 'call';
  call: string;
  with: Record<string, unknown>;
}

export type StepDefinition = ShellStep | CallStep;

export interface Section {
  name: string;
  /** Keys of the mappings enclosing the section, outermost first */
  group: string[];
  description?: string;
  continue_on_failure: boolean;
  env: Record<string, string>;
  cwd?: string;
  steps: StepDefinition[];
}

export interface ConfigDocument {
  /** Absolute path of the file the document was loaded from */
  source: string | null;
  sections: Section[];
}

/** Key that marks a mapping as a section rather than a group */
export const SECTION_KEY = 'command';
