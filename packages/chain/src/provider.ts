import type { Address, Hex } from 'viem';

/**
 * Transaction as seen by the inspector
 */
export interface TransactionRecord {
  hash: Hex;

  from: Address;

  /** Null for contract creation */
  to: Address | null;

  /** Gas limit declared by the sender */
  gasLimit: bigint;

  /** Flat gas price (legacy and access-list transactions) */
  gasPriceWei: bigint | null;

  /** Fee-market caps (EIP-1559 and later) */
  maxFeePerGasWei: bigint | null;
  maxPriorityFeePerGasWei: bigint | null;

  /** Null while the transaction is pending */
  blockNumber: bigint | null;
}

/**
 * Receipt of an included transaction
 */
export interface ReceiptRecord {
  gasUsed: bigint;
  success: boolean;
  blockNumber: bigint;

  /** Price actually paid per gas unit, when the node reports it */
  effectiveGasPriceWei: bigint | null;
}

/**
 * Block information
 */
export interface BlockRecord {
  number: bigint;

  /** Unix seconds */
  timestamp: bigint;

  /** Null before the London fork */
  baseFeePerGasWei: bigint | null;
}

/**
 * Transaction source interface
 *
 * Narrow read-only view of a chain. `null` means the chain has no record;
 * transport failures reject with a ConnectionError.
 */
export interface TransactionSource {
  /**
   * Get the chain ID
   */
  getChainId(): Promise<number>;

  /**
   * Get the current block number
   */
  getBlockNumber(): Promise<bigint>;

  /**
   * Get a transaction by hash
   */
  getTransaction(hash: Hex): Promise<TransactionRecord | null>;

  /**
   * Get a transaction receipt by hash
   */
  getReceipt(hash: Hex): Promise<ReceiptRecord | null>;

  /**
   * Get block information. The block is assumed to exist.
   */
  getBlock(blockNumber: bigint): Promise<BlockRecord>;

  /**
   * Get the gas price of every transaction in a block
   */
  getBlockGasPrices(blockNumber: bigint): Promise<bigint[]>;
}
