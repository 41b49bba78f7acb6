export {
  InvalidInputError,
  IncompleteFeeDataError,
  describeError,
  type ErrorKind,
} from './errors.js';
export { normalizeTxHash, isTxHash } from './hash.js';
export { detectState, type TxState } from './state.js';
export {
  feeUnitsToWei,
  createFeeThreshold,
  weiToEth,
  weiToGwei,
  type FeeThreshold,
} from './units.js';
export {
  computeFeeMetrics,
  resolveGasPrice,
  type FeeMetrics,
  type GasPriceSource,
} from './fees.js';
export {
  DEFAULT_NETWORK_LABELS,
  createNetworkLabels,
  resolveChainInfo,
  type ChainInfo,
  type NetworkLabels,
} from './networks.js';
export {
  classify,
  decideVerdict,
  type Verdict,
  type ClassificationInput,
  type ClassificationResult,
} from './classifier.js';
export { inspectTransaction, type InspectOptions } from './inspect.js';
export {
  toReportRecord,
  reportStatus,
  formatUtc,
  type ReportRecord,
  type ReportStatus,
} from './report.js';
export {
  MAX_CONTEXT_BLOCKS,
  percentile,
  median,
  sampleGasPrices,
  classifyAgainstContext,
  inspectGasContext,
  toContextRecord,
  type GasContextRecord,
  type GasPriceStats,
  type GasPriceSample,
  type SampleOptions,
  type ContextClassification,
  type GasContextOptions,
  type GasContextResult,
} from './gasContext.js';
