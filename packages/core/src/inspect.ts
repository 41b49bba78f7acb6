import type { TransactionSource, BlockRecord } from '@tx-fee-guard/chain';
import { classify, type ClassificationResult } from './classifier.js';
import { computeFeeMetrics, type FeeMetrics } from './fees.js';
import { normalizeTxHash } from './hash.js';
import { DEFAULT_NETWORK_LABELS, resolveChainInfo, type NetworkLabels } from './networks.js';
import { detectState } from './state.js';
import { createFeeThreshold } from './units.js';

/**
 * Options for a single inspection
 */
export interface InspectOptions {
  /** Fee threshold in native-token units */
  thresholdEth: number;

  /** Chain label table (default: DEFAULT_NETWORK_LABELS) */
  networks?: NetworkLabels;

  /** Millisecond clock used for elapsed time (default: performance.now) */
  now?: () => number;
}

/**
 * Inspect one transaction and classify its fee
 *
 * The hash and threshold are validated before any request is made. Chain ID,
 * transaction, receipt and head are fetched concurrently; the including block
 * only once the receipt is known. Any error aborts without a partial result.
 */
export async function inspectTransaction(
  source: TransactionSource,
  rawTxHash: string,
  options: InspectOptions
): Promise<ClassificationResult> {
  const txHash = normalizeTxHash(rawTxHash);
  const threshold = createFeeThreshold(options.thresholdEth);
  const now = options.now ?? (() => performance.now());
  const startedAt = now();

  const [chainId, tx, receipt, latestBlock] = await Promise.all([
    source.getChainId(),
    source.getTransaction(txHash),
    source.getReceipt(txHash),
    source.getBlockNumber(),
  ]);

  const state = detectState(tx, receipt);

  let block: BlockRecord | null = null;
  let fees: FeeMetrics | null = null;
  let confirmations: bigint | null = null;

  if (state.kind === 'included' && tx && receipt) {
    block = await source.getBlock(receipt.blockNumber);
    fees = computeFeeMetrics(tx, receipt, block);
    confirmations = latestBlock > receipt.blockNumber ? latestBlock - receipt.blockNumber : 0n;
  }

  return classify({
    txHash,
    chain: resolveChainInfo(options.networks ?? DEFAULT_NETWORK_LABELS, chainId),
    tx,
    state,
    fees,
    block,
    confirmations,
    threshold,
    elapsedSeconds: Math.round(now() - startedAt) / 1000,
  });
}
