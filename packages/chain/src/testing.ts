/**
 * Fixtures and an in-memory TransactionSource for tests of code built on this package
 */
import type { Address, Hex } from 'viem';
import type {
  TransactionSource,
  TransactionRecord,
  ReceiptRecord,
  BlockRecord,
} from './provider.js';

export const TX_HASH: Hex = `0x${'ab'.repeat(32)}`;
export const FROM: Address = '0x1111111111111111111111111111111111111111';
export const TO: Address = '0x2222222222222222222222222222222222222222';
export const GWEI = 1_000_000_000n;

export function createTx(overrides: Partial<TransactionRecord> = {}): TransactionRecord {
  return {
    hash: TX_HASH,
    from: FROM,
    to: TO,
    gasLimit: 21000n,
    gasPriceWei: 20000000000n,
    maxFeePerGasWei: null,
    maxPriorityFeePerGasWei: null,
    blockNumber: 100n,
    ...overrides,
  };
}

export function createReceipt(overrides: Partial<ReceiptRecord> = {}): ReceiptRecord {
  return {
    gasUsed: 21000n,
    success: true,
    blockNumber: 100n,
    effectiveGasPriceWei: null,
    ...overrides,
  };
}

export function createBlock(overrides: Partial<BlockRecord> = {}): BlockRecord {
  return {
    number: 100n,
    timestamp: 1704110400n,
    baseFeePerGasWei: 10000000000n,
    ...overrides,
  };
}

type Method = keyof TransactionSource;

/**
 * In-memory transaction source with call recording and injectable failures
 */
export class FakeTransactionSource implements TransactionSource {
  chainId = 1;
  latestBlock = 112n;
  transaction: TransactionRecord | null = null;
  receipt: ReceiptRecord | null = null;
  blocks = new Map<bigint, BlockRecord>();
  gasPrices = new Map<bigint, bigint[]>();
  failures = new Map<Method, Error>();
  calls: Array<{ method: Method; arg?: unknown }> = [];

  async getChainId(): Promise<number> {
    this.record('getChainId');
    return this.chainId;
  }

  async getBlockNumber(): Promise<bigint> {
    this.record('getBlockNumber');
    return this.latestBlock;
  }

  async getTransaction(hash: Hex): Promise<TransactionRecord | null> {
    this.record('getTransaction', hash);
    return this.transaction;
  }

  async getReceipt(hash: Hex): Promise<ReceiptRecord | null> {
    this.record('getReceipt', hash);
    return this.receipt;
  }

  async getBlock(blockNumber: bigint): Promise<BlockRecord> {
    this.record('getBlock', blockNumber);
    const block = this.blocks.get(blockNumber);
    if (!block) {
      throw new Error(`unknown block ${blockNumber}`);
    }
    return block;
  }

  async getBlockGasPrices(blockNumber: bigint): Promise<bigint[]> {
    this.record('getBlockGasPrices', blockNumber);
    return this.gasPrices.get(blockNumber) ?? [];
  }

  called(method: Method): boolean {
    return this.calls.some((call) => call.method === method);
  }

  private record(method: Method, arg?: unknown): void {
    this.calls.push({ method, arg });
    const failure = this.failures.get(method);
    if (failure) {
      throw failure;
    }
  }
}

/**
 * Clock returning the given readings in order
 */
export function sequenceClock(...readings: number[]): () => number {
  let index = 0;
  return () => readings[Math.min(index++, readings.length - 1)];
}
