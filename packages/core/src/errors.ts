import { ConnectionError } from '@tx-fee-guard/chain';

/**
 * Malformed user input (transaction hash, threshold, sampling window).
 * Raised before anything is sent to the RPC endpoint.
 */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * An included transaction whose receipt and body carry no usable gas price
 */
export class IncompleteFeeDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IncompleteFeeDataError';
  }
}

export type ErrorKind = 'invalid_input' | 'connection' | 'incomplete_fee_data' | 'unexpected';

/**
 * Classify a thrown value so callers can map it without inspecting RPC data
 */
export function describeError(error: unknown): { kind: ErrorKind; message: string } {
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof InvalidInputError) return { kind: 'invalid_input', message };
  if (error instanceof ConnectionError) return { kind: 'connection', message };
  if (error instanceof IncompleteFeeDataError) return { kind: 'incomplete_fee_data', message };
  return { kind: 'unexpected', message };
}
