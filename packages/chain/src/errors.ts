import { BaseError } from 'viem';

/**
 * Raised when the RPC endpoint is unreachable, times out or answers with an error.
 *
 * Distinct from a missing transaction, which is a definitive answer from the chain.
 */
export class ConnectionError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`RPC ${operation} failed: ${describeCause(cause)}`, { cause });
    this.name = 'ConnectionError';
    this.operation = operation;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof BaseError) return cause.shortMessage;
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
