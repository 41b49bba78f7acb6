import {
  createPublicClient,
  http,
  type Hex,
  type PublicClient,
  type Transport,
  TransactionNotFoundError,
  TransactionReceiptNotFoundError,
} from 'viem';
import { ConnectionError } from './errors.js';
import type {
  TransactionSource,
  TransactionRecord,
  ReceiptRecord,
  BlockRecord,
} from './provider.js';

/**
 * Configuration for RPC provider
 */
export interface RpcProviderConfig {
  /** RPC URL */
  rpcUrl: string;

  /** Per-request timeout (default: 15000) */
  timeoutMs?: number;

  /** Transport-level retries on failed requests (default: 0) */
  retryCount?: number;
}

/**
 * RPC-based transaction source using viem
 */
export class RpcProvider implements TransactionSource {
  private client: PublicClient<Transport, undefined>;

  /**
   * @param transport - Overrides the HTTP transport built from `config` (tests use viem's `custom`)
   */
  constructor(config: RpcProviderConfig, transport?: Transport) {
    this.client = createPublicClient({
      transport:
        transport ??
        http(config.rpcUrl, {
          timeout: config.timeoutMs ?? 15_000,
          retryCount: config.retryCount ?? 0,
        }),
    });
  }

  async getChainId(): Promise<number> {
    return this.call('eth_chainId', () => this.client.getChainId());
  }

  async getBlockNumber(): Promise<bigint> {
    return this.call('eth_blockNumber', () => this.client.getBlockNumber({ cacheTime: 0 }));
  }

  async getTransaction(hash: Hex): Promise<TransactionRecord | null> {
    return this.call('eth_getTransactionByHash', async () => {
      try {
        const tx = await this.client.getTransaction({ hash });
        return {
          hash: tx.hash,
          from: tx.from,
          to: tx.to ?? null,
          gasLimit: tx.gas,
          gasPriceWei: tx.gasPrice ?? null,
          maxFeePerGasWei: tx.maxFeePerGas ?? null,
          maxPriorityFeePerGasWei: tx.maxPriorityFeePerGas ?? null,
          // Pending transactions come back with a null block number
          blockNumber: tx.blockNumber ?? null,
        };
      } catch (error) {
        if (error instanceof TransactionNotFoundError) return null;
        throw error;
      }
    });
  }

  async getReceipt(hash: Hex): Promise<ReceiptRecord | null> {
    return this.call('eth_getTransactionReceipt', async () => {
      try {
        const receipt = await this.client.getTransactionReceipt({ hash });
        return {
          gasUsed: receipt.gasUsed,
          success: receipt.status === 'success',
          blockNumber: receipt.blockNumber,
          effectiveGasPriceWei: receipt.effectiveGasPrice ?? null,
        };
      } catch (error) {
        if (error instanceof TransactionReceiptNotFoundError) return null;
        throw error;
      }
    });
  }

  async getBlock(blockNumber: bigint): Promise<BlockRecord> {
    return this.call('eth_getBlockByNumber', async () => {
      const block = await this.client.getBlock({ blockNumber });
      return {
        number: block.number,
        timestamp: block.timestamp,
        baseFeePerGasWei: block.baseFeePerGas ?? null,
      };
    });
  }

  async getBlockGasPrices(blockNumber: bigint): Promise<bigint[]> {
    return this.call('eth_getBlockByNumber', async () => {
      const block = await this.client.getBlock({ blockNumber, includeTransactions: true });
      return block.transactions.map((tx) => tx.gasPrice ?? 0n);
    });
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new ConnectionError(operation, error);
    }
  }
}
