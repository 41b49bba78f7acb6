import type { TransactionRecord, ReceiptRecord, BlockRecord } from '@tx-fee-guard/chain';
import { IncompleteFeeDataError } from './errors.js';
import { weiToEth } from './units.js';

/**
 * Where the effective gas price was taken from
 */
export type GasPriceSource = 'receipt' | 'transaction' | 'base-plus-priority';

/**
 * Fee metrics of an included transaction
 */
export interface FeeMetrics {
  gasUsed: bigint;
  gasPriceWei: bigint;
  gasPriceSource: GasPriceSource;

  /** gasUsed * gasPriceWei, exact */
  totalFeeWei: bigint;

  /** Display only, never compared */
  totalFeeEth: number;
}

/**
 * Resolve the price paid per gas unit
 *
 * Receipt-reported effective price wins over the declared price. Fee-market
 * transactions without either are rebuilt as base fee + priority fee, capped
 * at the sender's max fee.
 */
export function resolveGasPrice(
  tx: TransactionRecord,
  receipt: ReceiptRecord,
  block: BlockRecord | null = null
): { wei: bigint; source: GasPriceSource } | null {
  if (receipt.effectiveGasPriceWei !== null) {
    return { wei: receipt.effectiveGasPriceWei, source: 'receipt' };
  }

  if (tx.gasPriceWei !== null) {
    return { wei: tx.gasPriceWei, source: 'transaction' };
  }

  const baseFee = block?.baseFeePerGasWei ?? null;
  if (baseFee !== null && tx.maxPriorityFeePerGasWei !== null) {
    const rebuilt = baseFee + tx.maxPriorityFeePerGasWei;
    const capped =
      tx.maxFeePerGasWei !== null && tx.maxFeePerGasWei < rebuilt ? tx.maxFeePerGasWei : rebuilt;
    return { wei: capped, source: 'base-plus-priority' };
  }

  return null;
}

/**
 * Compute gas and fee metrics for an included transaction
 *
 * @param block - The including block, used only to rebuild fee-market prices
 * @throws IncompleteFeeDataError if no gas price can be resolved
 */
export function computeFeeMetrics(
  tx: TransactionRecord,
  receipt: ReceiptRecord,
  block: BlockRecord | null = null
): FeeMetrics {
  const price = resolveGasPrice(tx, receipt, block);
  if (!price) {
    throw new IncompleteFeeDataError(
      `Transaction ${tx.hash} has no gas price in its receipt or body, cannot compute fee`
    );
  }

  const totalFeeWei = receipt.gasUsed * price.wei;

  return {
    gasUsed: receipt.gasUsed,
    gasPriceWei: price.wei,
    gasPriceSource: price.source,
    totalFeeWei,
    totalFeeEth: weiToEth(totalFeeWei),
  };
}
