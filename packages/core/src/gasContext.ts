import type { Hex } from 'viem';
import type { TransactionSource } from '@tx-fee-guard/chain';
import { InvalidInputError } from './errors.js';
import { normalizeTxHash } from './hash.js';
import {
  DEFAULT_NETWORK_LABELS,
  resolveChainInfo,
  type ChainInfo,
  type NetworkLabels,
} from './networks.js';
import { weiToGwei } from './units.js';

/** Upper bound on the sampling window, in blocks */
export const MAX_CONTEXT_BLOCKS = 10_000;

/**
 * Gas price statistics in gwei, rounded to 3 decimals
 */
export interface GasPriceStats {
  p50: number;
  p95: number;
  min: number;
  max: number;
  count: number;
}

/**
 * Recent gas prices observed ending at `head`
 */
export interface GasPriceSample {
  head: bigint;
  sampledBlocks: number;
  gasPriceGwei: GasPriceStats;
}

export interface SampleOptions {
  /** Window size in blocks */
  blocks: number;

  /** Sample every Nth block */
  step: number;

  /** Last block of the window (default: latest) */
  head?: bigint;
}

export type ContextClassification = 'ok' | 'high_vs_median' | 'high_vs_p95';

export interface GasContextOptions {
  blocks: number;
  step: number;

  /** Flag when tx price > median * multMedian */
  multMedian: number;

  /** Flag when tx price > p95 * multP95 */
  multP95: number;

  networks?: NetworkLabels;
  now?: () => number;
}

export type GasContextResult =
  | { found: false; txHash: Hex; chain: ChainInfo }
  | {
      found: true;
      txHash: Hex;
      chain: ChainInfo;
      txBlockNumber: bigint | null;
      txGasPriceGwei: number;
      context: GasPriceSample;
      blocks: number;
      step: number;
      /** The requested window exceeded MAX_CONTEXT_BLOCKS and was reduced */
      windowClamped: boolean;
      multMedian: number;
      multP95: number;
      classification: ContextClassification;
      elapsedSeconds: number;
    };

/**
 * Round to 3 decimals from the exact binary value, ties to even
 */
function round3(value: number): number {
  // A tie at the third decimal is only representable as an odd multiple of 1/16
  const sixteenths = value * 16;
  if (Number.isInteger(sixteenths) && sixteenths % 2 !== 0) {
    const lower = Math.floor(value * 1000);
    return (lower + (lower % 2 === 0 ? 0 : 1)) / 1000;
  }
  return Number(value.toFixed(3));
}

/**
 * Nearest-rank percentile, q in [0, 1]; 0 for no values
 *
 * A rank exactly halfway between two values resolves to the even index.
 */
export function percentile(values: readonly number[], q: number): number {
  if (values.length === 0) return 0;
  const bounded = Math.max(0, Math.min(1, q));
  const sorted = [...values].sort((a, b) => a - b);
  const rank = bounded * (sorted.length - 1);
  const lower = Math.floor(rank);
  const index = rank - lower === 0.5 ? lower + (lower % 2) : Math.round(rank);
  return sorted[index];
}

/**
 * Median, averaging the two middle values for an even count; 0 for no values
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

function assertWindow(blocks: number, step: number): void {
  if (!Number.isInteger(blocks) || blocks <= 0 || !Number.isInteger(step) || step <= 0) {
    throw new InvalidInputError('blocks and step must be positive integers');
  }
}

/**
 * Collect gas prices from every `step`-th block of the window ending at head
 */
export async function sampleGasPrices(
  source: TransactionSource,
  options: SampleOptions
): Promise<GasPriceSample> {
  assertWindow(options.blocks, options.step);

  const head = options.head ?? (await source.getBlockNumber());
  const first = head - BigInt(options.blocks) + 1n;
  const start = first > 0n ? first : 0n;
  const step = BigInt(options.step);

  const prices: number[] = [];
  let sampledBlocks = 0;

  for (let n = head; n >= start; n -= step) {
    for (const wei of await source.getBlockGasPrices(n)) {
      prices.push(weiToGwei(wei));
    }
    sampledBlocks++;
  }

  if (prices.length === 0) {
    return {
      head,
      sampledBlocks: 0,
      gasPriceGwei: { p50: 0, p95: 0, min: 0, max: 0, count: 0 },
    };
  }

  return {
    head,
    sampledBlocks,
    gasPriceGwei: {
      p50: round3(median(prices)),
      p95: round3(percentile(prices, 0.95)),
      min: round3(prices.reduce((a, b) => Math.min(a, b))),
      max: round3(prices.reduce((a, b) => Math.max(a, b))),
      count: prices.length,
    },
  };
}

/**
 * Compare a gas price against recent network conditions
 *
 * Without usable reference prices the transaction is considered ok.
 */
export function classifyAgainstContext(
  txGasPriceGwei: number,
  medianGwei: number,
  p95Gwei: number,
  multMedian: number,
  multP95: number
): ContextClassification {
  if (medianGwei <= 0 || p95Gwei <= 0) return 'ok';
  if (txGasPriceGwei > medianGwei * multMedian) return 'high_vs_median';
  if (txGasPriceGwei > p95Gwei * multP95) return 'high_vs_p95';
  return 'ok';
}

/**
 * Judge a transaction's gas price against the gas prices of recent blocks
 */
export async function inspectGasContext(
  source: TransactionSource,
  rawTxHash: string,
  options: GasContextOptions
): Promise<GasContextResult> {
  const txHash = normalizeTxHash(rawTxHash);
  assertWindow(options.blocks, options.step);
  const blocks = Math.min(options.blocks, MAX_CONTEXT_BLOCKS);
  const now = options.now ?? (() => performance.now());
  const startedAt = now();

  const [chainId, tx] = await Promise.all([source.getChainId(), source.getTransaction(txHash)]);
  const chain = resolveChainInfo(options.networks ?? DEFAULT_NETWORK_LABELS, chainId);

  if (!tx) {
    return { found: false, txHash, chain };
  }

  const elapsedSeconds = Math.round(now() - startedAt) / 1000;
  const txGasPriceGwei = weiToGwei(tx.gasPriceWei ?? 0n);
  const context = await sampleGasPrices(source, { blocks, step: options.step });

  return {
    found: true,
    txHash,
    chain,
    txBlockNumber: tx.blockNumber,
    txGasPriceGwei: round3(txGasPriceGwei),
    context,
    blocks,
    step: options.step,
    windowClamped: blocks !== options.blocks,
    multMedian: options.multMedian,
    multP95: options.multP95,
    classification: classifyAgainstContext(
      txGasPriceGwei,
      context.gasPriceGwei.p50,
      context.gasPriceGwei.p95,
      options.multMedian,
      options.multP95
    ),
    elapsedSeconds,
  };
}

/**
 * Flat record of a gas-context inspection, keyed like the JSON output
 */
export type GasContextRecord =
  | { txHash: string; error: 'not_found'; chainId: number; network: string }
  | {
      txHash: string;
      chainId: number;
      network: string;
      txBlockNumber: bigint | null;
      txGasPriceGwei: number;
      contextHead: bigint;
      contextSampledBlocks: number;
      contextGasPriceGwei: GasPriceStats;
      warnMultMedian: number;
      warnMultP95: number;
      classification: ContextClassification;
      elapsedSeconds: number;
    };

export function toContextRecord(result: GasContextResult): GasContextRecord {
  if (!result.found) {
    return {
      txHash: result.txHash,
      error: 'not_found',
      chainId: result.chain.chainId,
      network: result.chain.label,
    };
  }

  return {
    txHash: result.txHash,
    chainId: result.chain.chainId,
    network: result.chain.label,
    txBlockNumber: result.txBlockNumber,
    txGasPriceGwei: result.txGasPriceGwei,
    contextHead: result.context.head,
    contextSampledBlocks: result.context.sampledBlocks,
    contextGasPriceGwei: result.context.gasPriceGwei,
    warnMultMedian: result.multMedian,
    warnMultP95: result.multP95,
    classification: result.classification,
    elapsedSeconds: result.elapsedSeconds,
  };
}
