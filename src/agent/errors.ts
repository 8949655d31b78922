// ============================================================
// Doc Analyzer - Agent Errors
// ============================================================

/** Failure classes surfaced to the retry loop */
export type AgentErrorCode =
  | 'TIMEOUT'
  | 'RATE_LIMIT'
  | 'TOOL_ERROR'
  | 'MALFORMED_RESPONSE'
  | 'UNKNOWN';

/**
 * Error raised while invoking the CLI.
 * Carries a machine-readable code and whether the loop may retry it.
 */
export class AgentCliError extends Error {
  /** Machine-readable error code */
  readonly code: AgentErrorCode;
  /** Whether the retry loop should try again */
  readonly retryable: boolean;

  constructor(message: string, code: AgentErrorCode, retryable: boolean) {
    super(message);
    this.name = 'AgentCliError';
    this.code = code;
    this.retryable = retryable;
  }
}

/** Extracts a message from an unknown thrown value */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
