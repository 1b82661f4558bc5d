export * from './config/index.js';
export * from './runner/index.js';
export { YamlRunnerError, ErrorCode, isConfigError } from './lib/errors.js';
export { createConsoleReporter, formatStepResult, formatSummaryLine } from './lib/ui/step-reporter.js';
export { createProgram, main, splitPassthrough, VERSION } from './program.js';
export { createRunCommand, exitCodeFor, type RunCommandContext } from './commands/run/index.js';
