import { describe, it, expect } from 'vitest';
import { computeFeeMetrics, resolveGasPrice } from '../src/fees.js';
import { IncompleteFeeDataError } from '../src/errors.js';
import { createTx, createReceipt, createBlock } from '@tx-fee-guard/chain/testing';

describe('resolveGasPrice', () => {
  it('prefers the receipt effective price over the declared price', () => {
    const price = resolveGasPrice(
      createTx({ gasPriceWei: 30000000000n }),
      createReceipt({ effectiveGasPriceWei: 25000000000n })
    );

    expect(price).toEqual({ wei: 25000000000n, source: 'receipt' });
  });

  it('falls back to the declared gas price', () => {
    const price = resolveGasPrice(createTx({ gasPriceWei: 30000000000n }), createReceipt());

    expect(price).toEqual({ wei: 30000000000n, source: 'transaction' });
  });

  it('rebuilds fee-market prices from base fee and priority fee', () => {
    const tx = createTx({
      gasPriceWei: null,
      maxFeePerGasWei: 50000000000n,
      maxPriorityFeePerGasWei: 2000000000n,
    });

    const price = resolveGasPrice(
      tx,
      createReceipt(),
      createBlock({ baseFeePerGasWei: 10000000000n })
    );

    expect(price).toEqual({ wei: 12000000000n, source: 'base-plus-priority' });
  });

  it('caps the rebuilt price at the max fee', () => {
    const tx = createTx({
      gasPriceWei: null,
      maxFeePerGasWei: 11000000000n,
      maxPriorityFeePerGasWei: 2000000000n,
    });

    const price = resolveGasPrice(
      tx,
      createReceipt(),
      createBlock({ baseFeePerGasWei: 10000000000n })
    );

    expect(price?.wei).toBe(11000000000n);
  });

  it('returns null without any price data', () => {
    const tx = createTx({ gasPriceWei: null, maxPriorityFeePerGasWei: 2000000000n });

    expect(resolveGasPrice(tx, createReceipt(), createBlock({ baseFeePerGasWei: null }))).toBeNull();
    expect(resolveGasPrice(tx, createReceipt())).toBeNull();
  });
});

describe('computeFeeMetrics', () => {
  it('computes a simple transfer fee', () => {
    const metrics = computeFeeMetrics(
      createTx({ gasPriceWei: 20000000000n }),
      createReceipt({ gasUsed: 21000n })
    );

    expect(metrics).toEqual({
      gasUsed: 21000n,
      gasPriceWei: 20000000000n,
      gasPriceSource: 'transaction',
      totalFeeWei: 420000000000000n,
      totalFeeEth: 0.00042,
    });
  });

  it('computes a heavy contract call fee', () => {
    const metrics = computeFeeMetrics(
      createTx({ gasPriceWei: 100000000000n }),
      createReceipt({ gasUsed: 500000n })
    );

    expect(metrics.totalFeeWei).toBe(50000000000000000n);
    expect(metrics.totalFeeEth).toBe(0.05);
  });

  it('multiplies beyond 64-bit range without truncation', () => {
    const gasUsed = 2n ** 63n;
    const gasPrice = 2n ** 63n + 1n;

    const metrics = computeFeeMetrics(
      createTx({ gasPriceWei: gasPrice }),
      createReceipt({ gasUsed })
    );

    expect(metrics.totalFeeWei).toBe(2n ** 126n + 2n ** 63n);
  });

  it('handles zero gas price', () => {
    const metrics = computeFeeMetrics(createTx({ gasPriceWei: 0n }), createReceipt());

    expect(metrics.totalFeeWei).toBe(0n);
    expect(metrics.totalFeeEth).toBe(0);
  });

  it('throws when no gas price can be resolved', () => {
    const tx = createTx({ gasPriceWei: null });

    expect(() => computeFeeMetrics(tx, createReceipt())).toThrow(IncompleteFeeDataError);
  });
});
