import type { CallStep, Section, ShellStep, StepDefinition } from '../../src/config/types.js';
import type { ActionOutcome, StepContext } from '../../src/runner/types.js';
import { silentOutput } from '../../src/runner/output.js';

export function shellStep(run: string, overrides: Partial<Omit<ShellStep, 'kind'>> = {}): ShellStep {
  return { kind: 'shell', index: 0, label: run, run, skip: false, env: {}, ...overrides };
}

export function callStep(call: string, overrides: Partial<Omit<CallStep, 'kind'>> = {}): CallStep {
  return { kind: 'call', index: 0, label: `call ${call}`, call, with: {}, skip: false, env: {}, ...overrides };
}

export function section(name: string, steps: StepDefinition[], overrides: Partial<Section> = {}): Section {
  return { name, group: [], continue_on_failure: false, env: {}, steps, ...overrides };
}

export function outcome(exit_code: number, stdout = '', stderr = ''): ActionOutcome {
  return { exit_code, stdout, stderr };
}

export function stepContext(step: StepDefinition, overrides: Partial<StepContext> = {}): StepContext {
  return {
    section: section('test', [step]),
    step,
    cwd: process.cwd(),
    env: process.env,
    passthrough: [],
    output: silentOutput,
    signal: new AbortController().signal,
    ...overrides,
  };
}
