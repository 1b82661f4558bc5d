export { runConfig, selectSections, planRun, type RunOptions } from './runner.js';
export { executeStep, type ExecuteStepOptions } from './executor.js';
export {
  createDefaultResolver,
  chainResolvers,
  shellAction,
  callableAction,
  type DefaultResolverOptions,
} from './resolver.js';
export {
  runShellCommand,
  expandVariables,
  substitutePassthrough,
  quoteShellArg,
  signalExitCode,
  DEFAULT_KILL_GRACE_MS,
  type ShellOptions,
} from './shell.js';
export { processOutput, silentOutput } from './output.js';
export { installShutdownHandlers, FORCE_EXIT_MS, type ShutdownSignals, type ShutdownOptions } from './shutdown.js';
export type {
  ActionOutcome,
  Callable,
  CommandResolver,
  ErrorInfo,
  OutputSink,
  RunnerHooks,
  RunStatus,
  RunSummary,
  StepAction,
  StepContext,
  StepRef,
  StepResult,
  StepStatus,
} from './types.js';
