import type { TransactionRecord, ReceiptRecord } from '@tx-fee-guard/chain';

/**
 * Lifecycle state of a transaction
 */
export type TxState =
  | { kind: 'not_found' }
  | {
      kind: 'pending';
      /** The transaction names a block but the node has no receipt for it yet */
      awaitingReceipt: boolean;
    }
  | { kind: 'included'; success: boolean };

/**
 * Determine the lifecycle state from the fetched records
 */
export function detectState(tx: TransactionRecord | null, receipt: ReceiptRecord | null): TxState {
  if (!tx) {
    return { kind: 'not_found' };
  }

  if (!receipt) {
    return { kind: 'pending', awaitingReceipt: tx.blockNumber !== null };
  }

  return { kind: 'included', success: receipt.success };
}
