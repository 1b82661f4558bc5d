/** Error categories for the runner */
export const ErrorCode = {
  // Config errors
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_READ_ERROR: 'CONFIG_READ_ERROR',
  CONFIG_PARSE_ERROR: 'CONFIG_PARSE_ERROR',
  CONFIG_SCHEMA_ERROR: 'CONFIG_SCHEMA_ERROR',

  // Selection errors
  SECTION_NOT_FOUND: 'SECTION_NOT_FOUND',
  COMMAND_NOT_FOUND: 'COMMAND_NOT_FOUND',

  // Execution errors
  STEP_FAILED: 'STEP_FAILED',
  STEP_CRASHED: 'STEP_CRASHED',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Runner error with code and optional remediation hint */
export class YamlRunnerError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = 'YamlRunnerError';
  }
}

const CONFIG_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  ErrorCode.CONFIG_NOT_FOUND,
  ErrorCode.CONFIG_READ_ERROR,
  ErrorCode.CONFIG_PARSE_ERROR,
  ErrorCode.CONFIG_SCHEMA_ERROR,
  ErrorCode.SECTION_NOT_FOUND,
  ErrorCode.COMMAND_NOT_FOUND,
]);

/** True for errors raised before any step runs (load, selection, resolution) */
export function isConfigError(err: unknown): err is YamlRunnerError {
  return err instanceof YamlRunnerError && CONFIG_CODES.has(err.code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
