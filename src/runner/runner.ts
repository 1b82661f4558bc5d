import { dirname, resolve } from 'node:path';
import type { ConfigDocument, Section, StepDefinition } from '../config/types.js';
import { findSection } from '../config/parser.js';
import { YamlRunnerError, ErrorCode } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';
import { createRunId } from '../lib/utils/run-id.js';
import { executeStep } from './executor.js';
import { processOutput } from './output.js';
import { createDefaultResolver } from './resolver.js';
import type {
  CommandResolver,
  OutputSink,
  RunnerHooks,
  RunSummary,
  StepAction,
  StepRef,
  StepResult,
} from './types.js';

export interface RunOptions {
  /** Sections to run, in order. Undefined runs every section; an empty list runs nothing. */
  sections?: readonly string[];
  resolver?: CommandResolver;
  hooks?: RunnerHooks;
  /** Keep going after a failed step (sections may also opt in with `continue_on_failure`) */
  continueOnFailure?: boolean;
  /** Base working directory. Defaults to the config file's directory, else process.cwd() */
  cwd?: string;
  env?: Readonly<Record<string, string>>;
  passthrough?: readonly string[];
  output?: OutputSink;
  /** When aborted, the run stops before the next step */
  stopSignal?: AbortSignal;
  /** When aborted, the running step is terminated */
  killSignal?: AbortSignal;
  /** Grace period between SIGTERM and SIGKILL for a terminated shell step */
  killGraceMs?: number;
}

interface PlannedStep {
  step: StepDefinition;
  action: StepAction | null;
}

interface PlannedSection {
  section: Section;
  steps: PlannedStep[];
}

/**
 * Resolve a section filter against the document.
 * Duplicates are dropped; unknown names throw before anything runs.
 */
export function selectSections(doc: ConfigDocument, names?: readonly string[]): Section[] {
  if (names === undefined) return [...doc.sections];

  const unique = [...new Set(names)];
  const missing = unique.filter((name) => !findSection(doc, name));
  if (missing.length > 0) {
    const available = doc.sections.map((s) => s.name).join(', ') || '(none)';
    throw new YamlRunnerError(
      ErrorCode.SECTION_NOT_FOUND,
      `unknown section${missing.length > 1 ? 's' : ''}: ${missing.map((n) => `"${n}"`).join(', ')}`,
      `Available sections: ${available}`,
    );
  }
  return doc.sections.filter((s) => unique.includes(s.name)).sort(
    (a, b) => unique.indexOf(a.name) - unique.indexOf(b.name),
  );
}

/** Resolve every step up front so an unknown command fails before any step runs */
export function planRun(sections: readonly Section[], resolver: CommandResolver): PlannedSection[] {
  const problems: string[] = [];
  const plan = sections.map((section) => ({
    section,
    steps: section.steps.map((step) => {
      const action = resolver.resolve(step, section);
      if (!action && !step.skip) {
        const what = step.kind === 'call' ? `no callable registered for "${step.call}"` : 'no action resolved';
        problems.push(`✗ section "${section.name}": step ${step.index + 1}: ${what}`);
      }
      return { step, action };
    }),
  }));

  if (problems.length > 0) {
    throw new YamlRunnerError(
      ErrorCode.COMMAND_NOT_FOUND,
      problems.join('\n'),
      'Register the callable with the resolver or fix the step',
    );
  }
  return plan;
}

function stepRef(section: Section, step: StepDefinition): StepRef {
  return { section: section.name, index: step.index, label: step.label };
}

function stepCwd(base: string, section: Section, step: StepDefinition): string {
  return resolve(base, section.cwd ?? '.', step.cwd ?? '.');
}

/**
 * Main runner loop. Runs the selected sections' steps one at a time in
 * declaration order and aggregates their results.
 */
export async function runConfig(doc: ConfigDocument, options: RunOptions = {}): Promise<RunSummary> {
  const runStart = Date.now();
  const runId = createRunId();
  const resolver = options.resolver ?? createDefaultResolver();
  const hooks = options.hooks ?? {};
  const output = options.output ?? processOutput;
  const killSignal = options.killSignal ?? new AbortController().signal;
  const baseCwd = options.cwd ?? (doc.source ? dirname(doc.source) : process.cwd());

  // 1. Select and resolve; both throw before any side effect
  const selected = selectSections(doc, options.sections);
  const plan = planRun(selected, resolver);
  debug('runner', `run ${runId}: ${selected.map((s) => s.name).join(', ') || '(nothing)'}`);

  const results: StepResult[] = [];
  const notRun: StepRef[] = [];
  let halted = false;
  let interrupted = false;

  await hooks.onRunStart?.(doc, selected);

  // 2. Sequential execution
  for (const { section, steps } of plan) {
    if (halted) {
      notRun.push(...steps.map(({ step }) => stepRef(section, step)));
      continue;
    }

    await hooks.onSectionStart?.(section);
    const continueOnFailure = options.continueOnFailure === true || section.continue_on_failure;

    for (const { step, action } of steps) {
      if (!halted && options.stopSignal?.aborted) {
        debug('runner', 'stop requested');
        halted = true;
        interrupted = true;
      }
      if (halted) {
        notRun.push(stepRef(section, step));
        continue;
      }

      await hooks.beforeStep?.(step, section);
      const result = await executeStep(step, section, action, {
        cwd: stepCwd(baseCwd, section, step),
        env: { ...process.env, ...options.env, ...section.env, ...step.env },
        passthrough: options.passthrough ?? [],
        output,
        signal: killSignal,
        killGraceMs: options.killGraceMs,
      });
      results.push(result);
      await hooks.afterStep?.(result, section);

      if (result.status === 'failed' && !continueOnFailure) {
        debug('runner', `halt after ${section.name}[${step.index}]`);
        halted = true;
      }
      // A stop request during the step wins over its own outcome
      if (options.stopSignal?.aborted) {
        debug('runner', 'stop requested');
        halted = true;
        interrupted = true;
      }
    }
  }

  // 3. Summary
  const summary: RunSummary = {
    run_id: runId,
    status: interrupted
      ? 'interrupted'
      : results.some((r) => r.status === 'failed')
        ? 'failed'
        : 'passed',
    sections: selected.map((s) => s.name),
    results,
    not_run: notRun,
    duration_ms: Date.now() - runStart,
  };

  await hooks.onRunEnd?.(summary);
  return summary;
}
