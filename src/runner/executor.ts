import type { Section, StepDefinition } from '../config/types.js';
import { ErrorCode, errorMessage } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';
import type { OutputSink, StepAction, StepResult } from './types.js';

export interface ExecuteStepOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
  passthrough: readonly string[];
  output: OutputSink;
  signal: AbortSignal;
  killGraceMs?: number;
}

function baseResult(step: StepDefinition, section: Section): Pick<StepResult, 'section' | 'index' | 'label'> {
  return { section: section.name, index: step.index, label: step.label };
}

/**
 * Run one step through its resolved action and record the outcome.
 * A non-zero exit code, a thrown error or a missing action yields a `failed`
 * result; nothing is rethrown.
 */
export async function executeStep(
  step: StepDefinition,
  section: Section,
  action: StepAction | null,
  options: ExecuteStepOptions,
): Promise<StepResult> {
  const empty = { exit_code: null, stdout: '', stderr: '', duration_ms: 0 };

  if (step.skip) {
    debug('executor', `skip ${section.name}[${step.index}]`);
    return { ...baseResult(step, section), ...empty, status: 'skipped', error: null };
  }

  if (!action) {
    return {
      ...baseResult(step, section),
      ...empty,
      status: 'failed',
      error: { code: ErrorCode.COMMAND_NOT_FOUND, message: `no action for step "${step.label}"` },
    };
  }

  const start = Date.now();
  try {
    const outcome = await action({ section, step, ...options });
    const duration_ms = Date.now() - start;
    const passed = outcome.exit_code === 0;
    return {
      ...baseResult(step, section),
      status: passed ? 'passed' : 'failed',
      exit_code: outcome.exit_code,
      stdout: outcome.stdout,
      stderr: outcome.stderr,
      duration_ms,
      error: passed
        ? null
        : { code: ErrorCode.STEP_FAILED, message: `exited with code ${outcome.exit_code}` },
    };
  } catch (err) {
    debug('executor', `${section.name}[${step.index}] threw:`, err);
    return {
      ...baseResult(step, section),
      status: 'failed',
      exit_code: null,
      stdout: '',
      stderr: '',
      duration_ms: Date.now() - start,
      error: { code: ErrorCode.STEP_CRASHED, message: errorMessage(err) },
    };
  }
}
