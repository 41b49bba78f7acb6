/**
 * Network identity
 */
export interface ChainInfo {
  chainId: number;
  label: string;
}

/**
 * Immutable chain ID → label lookup
 */
export type NetworkLabels = ReadonlyMap<number, string>;

/**
 * Labels for well-known chains
 */
export const DEFAULT_NETWORK_LABELS: NetworkLabels = new Map([
  [1, 'Ethereum Mainnet'],
  [5, 'Goerli Testnet'],
  [10, 'Optimism'],
  [56, 'BNB Chain'],
  [137, 'Polygon'],
  [8453, 'Base'],
  [42161, 'Arbitrum One'],
  [43114, 'Avalanche C-Chain'],
  [11155111, 'Sepolia Testnet'],
]);

/**
 * Build a label table from the defaults plus overrides for custom or private chains
 */
export function createNetworkLabels(
  overrides: Readonly<Record<number, string>> = {},
  base: NetworkLabels = DEFAULT_NETWORK_LABELS
): NetworkLabels {
  const labels = new Map(base);
  for (const [chainId, label] of Object.entries(overrides)) {
    labels.set(Number(chainId), label);
  }
  return labels;
}

/**
 * Resolve the label of a chain, `chain-<id>` when unknown
 */
export function resolveChainInfo(labels: NetworkLabels, chainId: number): ChainInfo {
  return { chainId, label: labels.get(chainId) ?? `chain-${chainId}` };
}
