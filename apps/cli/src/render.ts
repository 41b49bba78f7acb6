import pc from 'picocolors';
import {
  weiToGwei,
  type ReportRecord,
  type GasContextRecord,
} from '@tx-fee-guard/core';

export type Palette = ReturnType<typeof pc.createColors>;

function byKey([a]: [string, unknown], [b]: [string, unknown]): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function writeJson(value: unknown, indent: string): string {
  if (typeof value === 'bigint') return value.toString();
  if (value === undefined) return 'null';

  const inner = `${indent}  `;

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    const items = value.map((item: unknown) => `${inner}${writeJson(item, inner)}`);
    return `[\n${items.join(',\n')}\n${indent}]`;
  }

  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(byKey);
    if (entries.length === 0) return '{}';
    const members = entries.map(
      ([key, entry]) => `${inner}${JSON.stringify(key)}: ${writeJson(entry, inner)}`
    );
    return `{\n${members.join(',\n')}\n${indent}}`;
  }

  return JSON.stringify(value);
}

/**
 * Pretty JSON with sorted keys; bigints are written as plain integer literals
 */
export function toJson(value: unknown): string {
  return writeJson(value, '');
}

function show(value: bigint | number | string | null): string {
  return value === null ? 'unknown' : String(value);
}

/**
 * Human-readable inspection report
 */
export function renderReport(record: ReportRecord, colors: Palette = pc): string[] {
  if (record.status === 'not_found') {
    return [colors.red(`✗ Transaction not found on ${record.network_label}: ${record.tx_hash}`)];
  }

  if (record.status === 'pending') {
    const lines = [colors.yellow(`… Transaction is pending on ${record.network_label}: ${record.tx_hash}`)];
    if (record.from_addr) lines.push(`From: ${record.from_addr}`);
    if (record.to_addr) lines.push(`To:   ${record.to_addr}`);
    if (record.error) lines.push(colors.gray(`Note: ${record.error}`));
    lines.push(`Elapsed: ${record.elapsed_seconds.toFixed(2)}s`);
    return lines;
  }

  const status =
    record.status === 'success' ? colors.green(record.status) : colors.red(record.status);
  const risk = record.high_fee
    ? colors.red('high (exceeds threshold)')
    : colors.green('within threshold');

  return [
    colors.bold('tx-fee-guard'),
    `Network      : ${record.network_label}`,
    `Chain ID     : ${record.chain_id}`,
    `Tx Hash      : ${record.tx_hash}`,
    `From         : ${show(record.from_addr)}`,
    `To           : ${record.to_addr ?? '(contract creation)'}`,
    `Status       : ${status}`,
    `Block        : ${show(record.block_number)}`,
    `Timestamp    : ${show(record.timestamp_utc)}`,
    `Confirmations: ${show(record.confirmations)}`,
    '',
    'Gas / Fee',
    `  Gas used        : ${show(record.gas_used)}`,
    `  Gas price (gwei): ${
      record.gas_price_wei === null ? 'unknown' : weiToGwei(record.gas_price_wei).toFixed(2)
    }`,
    `  Total fee (ETH) : ${record.total_fee_eth === null ? 'unknown' : record.total_fee_eth.toFixed(6)}`,
    `  Threshold (ETH) : ${record.fee_threshold_eth.toFixed(6)}`,
    `  Fee risk        : ${risk}`,
    '',
    `Elapsed      : ${record.elapsed_seconds.toFixed(2)}s`,
  ];
}

const CONTEXT_VERDICTS = {
  ok: 'ok (within contextual bounds)',
  high_vs_median: 'high_vs_median (well above the recent median gas price)',
  high_vs_p95: 'high_vs_p95 (above the recent p95 gas price)',
} as const;

/**
 * Human-readable gas-context report
 */
export function renderContextReport(
  record: GasContextRecord,
  step: number,
  colors: Palette = pc
): string[] {
  if ('error' in record) {
    return [colors.red(`✗ Transaction not found on ${record.network}: ${record.txHash}`)];
  }

  const stats = record.contextGasPriceGwei;
  const verdict = CONTEXT_VERDICTS[record.classification];

  return [
    `${record.network} (chainId ${record.chainId})  tx=${record.txHash}  block=${show(record.txBlockNumber)}`,
    `Tx gas price: ${record.txGasPriceGwei} gwei (median=${stats.p50} gwei, p95=${stats.p95} gwei)`,
    `Context window: ${record.contextSampledBlocks} sampled blocks ending at head=${record.contextHead} (step=${step})`,
    `Multipliers: median×${record.warnMultMedian}, p95×${record.warnMultP95}`,
    record.classification === 'ok'
      ? colors.green(`✓ Fee classification: ${verdict}`)
      : colors.yellow(`⚠ Fee classification: ${verdict}`),
    `Tx fetch time: ${record.elapsedSeconds}s`,
  ];
}
