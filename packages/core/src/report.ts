import type { ClassificationResult } from './classifier.js';

/**
 * Transaction status as reported
 */
export type ReportStatus = 'not_found' | 'pending' | 'success' | 'failed';

/**
 * Flat report record consumed by renderers and scripts
 */
export interface ReportRecord {
  tx_hash: string;
  chain_id: number;
  network_label: string;
  from_addr: string | null;
  to_addr: string | null;
  status: ReportStatus;
  block_number: bigint | null;
  timestamp_utc: string | null;
  confirmations: bigint | null;
  gas_used: bigint | null;
  gas_price_wei: bigint | null;
  total_fee_wei: bigint | null;
  total_fee_eth: number | null;
  fee_threshold_eth: number;
  high_fee: boolean;
  pending: boolean;
  error: string | null;
  elapsed_seconds: number;
}

/**
 * Format a date as `YYYY-MM-DD HH:MM:SS UTC`
 */
export function formatUtc(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function reportStatus(result: ClassificationResult): ReportStatus {
  switch (result.state.kind) {
    case 'not_found':
      return 'not_found';
    case 'pending':
      return 'pending';
    case 'included':
      return result.state.success ? 'success' : 'failed';
  }
}

export function toReportRecord(result: ClassificationResult): ReportRecord {
  const status = reportStatus(result);

  return {
    tx_hash: result.txHash,
    chain_id: result.chain.chainId,
    network_label: result.chain.label,
    from_addr: result.from,
    to_addr: result.to,
    status,
    block_number: result.blockNumber,
    timestamp_utc: result.timestamp ? formatUtc(result.timestamp) : null,
    confirmations: result.confirmations,
    gas_used: result.fees?.gasUsed ?? null,
    gas_price_wei: result.fees?.gasPriceWei ?? null,
    total_fee_wei: result.fees?.totalFeeWei ?? null,
    total_fee_eth: result.fees?.totalFeeEth ?? null,
    fee_threshold_eth: result.threshold.eth,
    high_fee: result.highFee,
    pending: status === 'pending',
    error: result.error,
    elapsed_seconds: result.elapsedSeconds,
  };
}
