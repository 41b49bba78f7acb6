import { type GuardConfig, guardConfigSchema } from './schema.js';

/**
 * Parse NETWORK_LABELS env var (JSON object of chain ID → label)
 */
function parseNetworkLabels(env: NodeJS.ProcessEnv): unknown {
  const labelsJson = env.NETWORK_LABELS;
  if (!labelsJson) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(labelsJson);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error('NETWORK_LABELS must be a JSON object');
    }
    return parsed;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error('NETWORK_LABELS is not valid JSON');
    }
    throw error;
  }
}

/**
 * Load and validate configuration from environment variables
 *
 * @param env - Environment variables (defaults to process.env)
 * @returns Validated configuration
 * @throws Error listing every invalid setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GuardConfig {
  const rawConfig = {
    rpc: {
      url: env.RPC_URL || undefined,
      timeoutSeconds: env.RPC_TIMEOUT_SECONDS,
      retryCount: env.RPC_RETRY_COUNT,
    },
    fees: {
      thresholdEth: env.FEE_THRESHOLD_ETH,
    },
    networks: parseNetworkLabels(env),
    context: {
      blocks: env.CTX_GUARD_BLOCKS,
      step: env.CTX_GUARD_STEP,
      warnMultMedian: env.CTX_GUARD_WARN_MULT_MEDIAN,
      warnMultP95: env.CTX_GUARD_WARN_MULT_P95,
    },
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
    },
  };

  const result = guardConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  return result.data;
}
