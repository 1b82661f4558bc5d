import type { ConfigDocument, Section, StepDefinition } from '../config/types.js';
import type { ErrorCode } from '../lib/errors.js';

/** Where a step's live output goes while it is captured */
export interface OutputSink {
  stdout(chunk: string): void;
  stderr(chunk: string): void;
}

/** Everything an action needs to run one step */
export interface StepContext {
  section: Section;
  step: StepDefinition;
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** CLI arguments after `--`, substituted for `$@` */
  passthrough: readonly string[];
  output: OutputSink;
  /** Aborted to terminate the step */
  signal: AbortSignal;
  /** Delay before a terminated step is killed outright */
  killGraceMs?: number;
}

/** Raw outcome of an action */
export interface ActionOutcome {
  exit_code: number;
  stdout: string;
  stderr: string;
}

export type StepAction = (ctx: StepContext) => Promise<ActionOutcome>;

/** Maps a step definition to an executable action; null when it cannot */
export interface CommandResolver {
  resolve(step: StepDefinition, section: Section): StepAction | null;
}

/** A registered function callable from a `call:` step */
export type Callable = (
  args: Readonly<Record<string, unknown>>,
  ctx: StepContext,
) => ActionOutcome | number | void | Promise<ActionOutcome | number | void>;

export type StepStatus = 'passed' | 'failed' | 'skipped';

export type RunStatus = 'passed' | 'failed' | 'interrupted';

export interface ErrorInfo {
  code: ErrorCode;
  message: string;
}

/** Recorded outcome of one step */
export interface StepResult {
  section: string;
  index: number;
  label: string;
  status: StepStatus;
  exit_code: number | null;
  stdout: string;
  stderr: string;
  duration_ms: number;
  error: ErrorInfo | null;
}

export interface StepRef {
  section: string;
  index: number;
  label: string;
}

export interface RunSummary {
  run_id: string;
  status: RunStatus;
  /** Selected sections, in run order */
  sections: string[];
  results: StepResult[];
  /** Steps never reached because the run halted */
  not_run: StepRef[];
  duration_ms: number;
}

/** Lifecycle hooks. Errors thrown by a hook propagate to the caller of runConfig. */
export interface RunnerHooks {
  onRunStart?(doc: ConfigDocument, sections: readonly Section[]): void | Promise<void>;
  onSectionStart?(section: Section): void | Promise<void>;
  beforeStep?(step: StepDefinition, section: Section): void | Promise<void>;
  afterStep?(result: StepResult, section: Section): void | Promise<void>;
  onRunEnd?(summary: RunSummary): void | Promise<void>;
}
