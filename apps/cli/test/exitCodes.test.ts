import { describe, it, expect } from 'vitest';
import type { GasContextResult } from '@tx-fee-guard/core';
import { ExitCode, exitCodeForContext, exitCodeForVerdict } from '../src/exitCodes.js';
import { TX_HASH } from '@tx-fee-guard/chain/testing';

describe('exitCodeForVerdict', () => {
  it('maps each verdict', () => {
    expect(exitCodeForVerdict('ok')).toBe(0);
    expect(exitCodeForVerdict('pending')).toBe(0);
    expect(exitCodeForVerdict('not_found')).toBe(2);
    expect(exitCodeForVerdict('high_fee')).toBe(3);
  });
});

describe('exitCodeForContext', () => {
  const chain = { chainId: 1, label: 'Ethereum Mainnet' };

  function found(classification: 'ok' | 'high_vs_median' | 'high_vs_p95'): GasContextResult {
    return {
      found: true,
      txHash: TX_HASH,
      chain,
      txBlockNumber: 100n,
      txGasPriceGwei: 20,
      context: {
        head: 112n,
        sampledBlocks: 1,
        gasPriceGwei: { p50: 20, p95: 20, min: 20, max: 20, count: 1 },
      },
      blocks: 300,
      step: 3,
      windowClamped: false,
      multMedian: 2,
      multP95: 1.2,
      classification,
      elapsedSeconds: 0.01,
    };
  }

  it('returns NOT_FOUND for a missing transaction', () => {
    expect(exitCodeForContext({ found: false, txHash: TX_HASH, chain })).toBe(ExitCode.NOT_FOUND);
  });

  it('returns OK within bounds', () => {
    expect(exitCodeForContext(found('ok'))).toBe(ExitCode.OK);
  });

  it('returns HIGH_FEE for either high classification', () => {
    expect(exitCodeForContext(found('high_vs_median'))).toBe(ExitCode.HIGH_FEE);
    expect(exitCodeForContext(found('high_vs_p95'))).toBe(ExitCode.HIGH_FEE);
  });
});
