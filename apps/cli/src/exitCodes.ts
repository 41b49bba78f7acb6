import type { GasContextResult, Verdict } from '@tx-fee-guard/core';

export const ExitCode = {
  OK: 0,
  INVALID_INPUT_OR_CONNECTION: 1,
  NOT_FOUND: 2,
  HIGH_FEE: 3,
} as const;
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Pending transactions are not a failure
 */
export function exitCodeForVerdict(verdict: Verdict): ExitCode {
  switch (verdict) {
    case 'ok':
    case 'pending':
      return ExitCode.OK;
    case 'not_found':
      return ExitCode.NOT_FOUND;
    case 'high_fee':
      return ExitCode.HIGH_FEE;
  }
}

export function exitCodeForContext(result: GasContextResult): ExitCode {
  if (!result.found) return ExitCode.NOT_FOUND;
  return result.classification === 'ok' ? ExitCode.OK : ExitCode.HIGH_FEE;
}
