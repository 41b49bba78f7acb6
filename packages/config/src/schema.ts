import { z } from 'zod';

/**
 * Log level enumeration
 */
export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);
export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Log format enumeration
 */
export const logFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof logFormatSchema>;

/**
 * RPC endpoint configuration
 */
export const rpcConfigSchema = z.object({
  /** Endpoint URL; may also be given per command */
  url: z.string().url('RPC_URL must be a valid URL').optional(),

  /** Per-request timeout in seconds */
  timeoutSeconds: z.coerce.number().positive().max(600).default(15),

  /** Transport-level retries on failed requests */
  retryCount: z.coerce.number().int().min(0).max(10).default(0),
});
export type RpcConfig = z.infer<typeof rpcConfigSchema>;

/**
 * Fee guard configuration
 */
export const feeConfigSchema = z.object({
  /** Fee above which a transaction is flagged, in native-token units */
  thresholdEth: z.coerce
    .number()
    .finite()
    .nonnegative('FEE_THRESHOLD_ETH must be non-negative')
    .default(0.05),
});
export type FeeConfig = z.infer<typeof feeConfigSchema>;

/**
 * Extra chain labels keyed by decimal chain ID
 */
export const networkLabelsSchema = z
  .record(z.string().regex(/^[1-9]\d*$/, 'chain ID keys must be positive integers'), z.string().min(1))
  .default({});
export type NetworkLabelOverrides = z.infer<typeof networkLabelsSchema>;

/**
 * Gas-context guard configuration
 */
export const contextConfigSchema = z.object({
  /** Window of recent blocks to sample */
  blocks: z.coerce.number().int().positive().default(300),

  /** Sample every Nth block */
  step: z.coerce.number().int().positive().default(3),

  /** Flag when tx gas price > median * this */
  warnMultMedian: z.coerce.number().positive().default(2.0),

  /** Flag when tx gas price > p95 * this */
  warnMultP95: z.coerce.number().positive().default(1.2),
});
export type ContextConfig = z.infer<typeof contextConfigSchema>;

/**
 * Logging configuration
 */
export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('warn'),
  format: logFormatSchema.default('pretty'),
});
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;

/**
 * Complete fee guard configuration
 */
export const guardConfigSchema = z.object({
  rpc: rpcConfigSchema,
  fees: feeConfigSchema,
  networks: networkLabelsSchema,
  context: contextConfigSchema,
  logging: loggingConfigSchema,
});
export type GuardConfig = z.infer<typeof guardConfigSchema>;

const URL_PARTS = /^([a-z][\w+.-]*:\/\/)(?:([^/?#]*)@)?([^/?#]*)([^?#]*)(\?[^#]*)?(#.*)?$/i;

/**
 * Hide credentials embedded in an RPC URL
 *
 * Masks userinfo, the last path segment (where `/v3/<key>` style endpoints
 * carry the API key) and the whole query string.
 */
export function redactRpcUrl(url: string): string {
  const match = URL_PARTS.exec(url);
  if (!match) {
    return url.replace(/\/\/.*@/, '//***@');
  }

  const [, scheme, auth, host, path, query] = match;
  return [
    scheme,
    auth === undefined ? '' : '***@',
    host,
    path.replace(/\/[^/]+(\/?)$/, '/***$1'),
    query === undefined ? '' : '?***',
  ].join('');
}
