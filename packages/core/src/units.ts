import { formatEther, formatGwei } from 'viem';
import { InvalidInputError } from './errors.js';

const WEI_DECIMALS = 18;
const WEI_PER_UNIT = 10n ** BigInt(WEI_DECIMALS);

const PLAIN_DECIMAL = /^(\d*)(?:\.(\d*))?$/;
const EXPONENTIAL = /^(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * A fee threshold in both denominations
 */
export interface FeeThreshold {
  /** As supplied, in native-token units */
  eth: number;

  /** Integer wei value used for every comparison */
  wei: bigint;
}

/**
 * Write a non-negative finite number as a plain decimal string (no exponent)
 */
function toPlainDecimal(amount: number): string {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new InvalidInputError(`Fee amount must be a non-negative number, got ${amount}`);
  }

  const text = String(amount);
  const match = EXPONENTIAL.exec(text);
  if (!match) return text;

  const digits = match[1] + (match[2] ?? '');
  const point = 1 + Number(match[3]);

  if (point <= 0) return `0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return digits + '0'.repeat(point - digits.length);
  return `${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Convert a native-token amount to wei, truncating past the 18th decimal
 *
 * Numbers are converted through their shortest decimal representation, so
 * `0.01` becomes exactly 10^16 wei rather than the nearest binary fraction.
 *
 * @throws InvalidInputError on negative, non-finite or non-decimal input
 */
export function feeUnitsToWei(amount: number | string): bigint {
  const text = typeof amount === 'number' ? toPlainDecimal(amount) : amount.trim();
  const match = PLAIN_DECIMAL.exec(text);

  if (!match || text === '' || text === '.') {
    throw new InvalidInputError(`Invalid fee amount ${JSON.stringify(String(amount))}`);
  }

  const whole = match[1] || '0';
  const fraction = (match[2] ?? '').slice(0, WEI_DECIMALS).padEnd(WEI_DECIMALS, '0');

  return BigInt(whole) * WEI_PER_UNIT + BigInt(fraction);
}

/**
 * Build a threshold from a native-token amount
 */
export function createFeeThreshold(eth: number): FeeThreshold {
  return { eth, wei: feeUnitsToWei(eth) };
}

/**
 * Wei to native-token units, for display only
 */
export function weiToEth(wei: bigint): number {
  return Number(formatEther(wei));
}

/**
 * Wei to gwei, for display only
 */
export function weiToGwei(wei: bigint): number {
  return Number(formatGwei(wei));
}
