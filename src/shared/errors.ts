export enum GeminiMcpErrorCode {
  MISSING_ARGUMENT = 'MISSING_ARGUMENT',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  UNKNOWN_PROMPT = 'UNKNOWN_PROMPT',
  SPAWN_FAILED = 'SPAWN_FAILED',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

export class GeminiMcpError extends Error {
  readonly code: GeminiMcpErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: GeminiMcpErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'GeminiMcpError';
    this.code = code;
    this.context = context;
  }
}

/** Raised when a tool or prompt call omits an argument its schema requires. */
export function missingArgument(owner: string, argument: string): GeminiMcpError {
  return new GeminiMcpError(
    GeminiMcpErrorCode.MISSING_ARGUMENT,
    `Missing required argument '${argument}' for ${owner}`,
    { owner, argument },
  );
}
