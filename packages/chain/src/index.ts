export type {
  TransactionSource,
  TransactionRecord,
  ReceiptRecord,
  BlockRecord,
} from './provider.js';
export { RpcProvider, type RpcProviderConfig } from './rpcProvider.js';
export { ConnectionError } from './errors.js';
