import type { Address, Hex } from 'viem';
import type { TransactionRecord, BlockRecord } from '@tx-fee-guard/chain';
import { IncompleteFeeDataError } from './errors.js';
import type { FeeMetrics } from './fees.js';
import type { ChainInfo } from './networks.js';
import type { TxState } from './state.js';
import type { FeeThreshold } from './units.js';

/**
 * Final verdict of a classification
 */
export type Verdict = 'ok' | 'high_fee' | 'not_found' | 'pending';

/**
 * Everything the classifier needs, already fetched and derived
 */
export interface ClassificationInput {
  txHash: Hex;
  chain: ChainInfo;
  tx: TransactionRecord | null;
  state: TxState;

  /** Required when the state is included */
  fees: FeeMetrics | null;

  /** Including block, when included */
  block: BlockRecord | null;

  confirmations: bigint | null;
  threshold: FeeThreshold;
  elapsedSeconds: number;
}

/**
 * Outcome of inspecting one transaction
 */
export interface ClassificationResult {
  txHash: Hex;
  chain: ChainInfo;
  from: Address | null;
  to: Address | null;
  state: TxState;
  verdict: Verdict;
  blockNumber: bigint | null;
  timestamp: Date | null;
  confirmations: bigint | null;

  /** Present if and only if the state is included */
  fees: FeeMetrics | null;

  threshold: FeeThreshold;
  highFee: boolean;
  error: string | null;
  elapsedSeconds: number;
}

/**
 * Decision table, first match wins. Fees are compared in wei only; a fee
 * equal to the threshold is not high.
 */
export function decideVerdict(state: TxState, fees: FeeMetrics | null, thresholdWei: bigint): Verdict {
  switch (state.kind) {
    case 'not_found':
      return 'not_found';
    case 'pending':
      return 'pending';
    case 'included':
      if (!fees) {
        throw new IncompleteFeeDataError('Included transaction classified without fee metrics');
      }
      return fees.totalFeeWei > thresholdWei ? 'high_fee' : 'ok';
  }
}

function errorDetail(state: TxState): string | null {
  if (state.kind === 'not_found') return 'transaction not found';
  if (state.kind === 'pending' && state.awaitingReceipt) return 'receipt not yet available';
  return null;
}

/**
 * Combine state, fee metrics and threshold into the classification result
 */
export function classify(input: ClassificationInput): ClassificationResult {
  const { state, tx, threshold } = input;
  const verdict = decideVerdict(state, input.fees, threshold.wei);
  const included = state.kind === 'included';

  let blockNumber: bigint | null = null;
  if (included) {
    blockNumber = input.block?.number ?? tx?.blockNumber ?? null;
  } else if (state.kind === 'pending') {
    blockNumber = tx?.blockNumber ?? null;
  }

  return {
    txHash: input.txHash,
    chain: input.chain,
    from: tx?.from ?? null,
    to: tx?.to ?? null,
    state,
    verdict,
    blockNumber,
    timestamp: included && input.block ? new Date(Number(input.block.timestamp) * 1000) : null,
    confirmations: included ? input.confirmations : null,
    fees: included ? input.fees : null,
    threshold,
    highFee: verdict === 'high_fee',
    error: errorDetail(state),
    elapsedSeconds: input.elapsedSeconds,
  };
}
