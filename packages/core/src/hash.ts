import type { Hex } from 'viem';
import { InvalidInputError } from './errors.js';

const HASH_BODY = /^[0-9a-fA-F]{64}$/;

/**
 * Canonicalize a transaction hash to lowercase `0x` + 64 hex digits
 *
 * Surrounding whitespace and a `0x`/`0X` prefix are optional on input.
 *
 * @throws InvalidInputError if the remainder is not exactly 64 hex digits
 */
export function normalizeTxHash(input: string): Hex {
  const trimmed = input.trim();
  const body = trimmed.startsWith('0x') || trimmed.startsWith('0X') ? trimmed.slice(2) : trimmed;

  if (!HASH_BODY.test(body)) {
    throw new InvalidInputError(
      `Invalid transaction hash ${JSON.stringify(input)}: expected 0x + 64 hex characters`
    );
  }

  return `0x${body.toLowerCase()}`;
}

/**
 * Check whether a string normalizes to a transaction hash
 */
export function isTxHash(input: string): boolean {
  try {
    normalizeTxHash(input);
    return true;
  } catch {
    return false;
  }
}
