import { Command, InvalidArgumentError } from 'commander';
import pc from 'picocolors';
import { z } from 'zod';
import type { Logger } from 'pino';
import { RpcProvider, type RpcProviderConfig, type TransactionSource } from '@tx-fee-guard/chain';
import { loadConfig, redactRpcUrl, type GuardConfig } from '@tx-fee-guard/config';
import {
  InvalidInputError,
  MAX_CONTEXT_BLOCKS,
  createNetworkLabels,
  describeError,
  inspectGasContext,
  inspectTransaction,
  toContextRecord,
  toReportRecord,
} from '@tx-fee-guard/core';
import { ExitCode, exitCodeForContext, exitCodeForVerdict } from './exitCodes.js';
import { createLogger } from './lib/logger.js';
import { renderContextReport, renderReport, toJson, type Palette } from './render.js';

/**
 * Everything the commands touch outside their own arguments
 */
export interface ProgramDeps {
  createSource: (config: RpcProviderConfig) => TransactionSource;
  loadConfig: () => GuardConfig;
  createLogger: (config: GuardConfig) => Logger;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  colors: Palette;
  setExitCode: (code: ExitCode) => void;
}

const defaultDeps: ProgramDeps = {
  createSource: (config) => new RpcProvider(config),
  loadConfig: () => loadConfig(),
  createLogger: (config) => createLogger(config.logging.level, config.logging.format),
  stdout: (text) => {
    process.stdout.write(`${text}\n`);
  },
  stderr: (text) => {
    process.stderr.write(`${text}\n`);
  },
  colors: pc,
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

interface ConnectionFlags {
  rpc?: string;
  timeout?: number;
}

interface InspectFlags extends ConnectionFlags {
  warnFeeEth?: number;
  json?: boolean;
}

interface ContextFlags extends ConnectionFlags {
  blocks?: number;
  step?: number;
  warnMultMedian?: number;
  warnMultP95?: number;
  json?: boolean;
}

interface CommandContext {
  config: GuardConfig;
  logger: Logger;
}

const urlSchema = z.string().url();

function parseRpcUrl(value: string): string {
  if (!urlSchema.safeParse(value).success) {
    throw new InvalidArgumentError('Must be a valid URL.');
  }
  return value;
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseNonNegativeNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative number.');
  }
  return parsed;
}

/**
 * Build the tx-fee-guard command tree
 */
export function buildProgram(overrides: Partial<ProgramDeps> = {}): Command {
  const deps: ProgramDeps = { ...defaultDeps, ...overrides };
  const { colors } = deps;

  const write = (lines: string[]): void => {
    for (const line of lines) deps.stdout(line);
  };

  /**
   * Load configuration, run the command and record its exit code.
   * Every failure is reported on stderr with exit code 1.
   */
  const run = async (task: (context: CommandContext) => Promise<ExitCode>): Promise<void> => {
    let logger: Logger | null = null;
    try {
      const config = deps.loadConfig();
      logger = deps.createLogger(config);
      deps.setExitCode(await task({ config, logger }));
    } catch (error) {
      const { kind, message } = describeError(error);
      logger?.debug({ kind, err: error }, 'Command failed');
      deps.stderr(colors.red(`✗ ${message}`));
      deps.setExitCode(ExitCode.INVALID_INPUT_OR_CONNECTION);
    }
  };

  const connect = (
    { config, logger }: CommandContext,
    flags: ConnectionFlags
  ): TransactionSource => {
    const rpcUrl = flags.rpc ?? config.rpc.url;
    if (!rpcUrl) {
      throw new InvalidInputError('No RPC endpoint: pass --rpc <url> or set RPC_URL');
    }

    const timeoutSeconds = flags.timeout ?? config.rpc.timeoutSeconds;
    logger.debug({ rpcUrl: redactRpcUrl(rpcUrl), timeoutSeconds }, 'Connecting to RPC');

    return deps.createSource({
      rpcUrl,
      timeoutMs: Math.round(timeoutSeconds * 1000),
      retryCount: config.rpc.retryCount,
    });
  };

  const program = new Command();

  program
    .name('tx-fee-guard')
    .description('Inspect EVM transactions and flag unusually high fees')
    .version('0.1.0')
    .configureOutput({
      writeOut: (text) => deps.stdout(text.trimEnd()),
      writeErr: (text) => deps.stderr(text.trimEnd()),
    });

  /**
   * Inspect command - classify a transaction's fee against a threshold
   */
  program
    .command('inspect')
    .description('Inspect a transaction and compare its fee to a threshold')
    .argument('<txHash>', 'Transaction hash (0x + 64 hex characters)')
    .option('--rpc <url>', 'RPC endpoint (default: RPC_URL)', parseRpcUrl)
    .option('--timeout <seconds>', 'Per-request timeout (default: RPC_TIMEOUT_SECONDS)', parsePositiveNumber)
    .option('--warn-fee-eth <eth>', 'Fee threshold (default: FEE_THRESHOLD_ETH)', parseNonNegativeNumber)
    .option('--json', 'Print the report as JSON')
    .action(async (txHash: string, flags: InspectFlags) =>
      run(async (context) => {
        const source = connect(context, flags);
        const result = await inspectTransaction(source, txHash, {
          thresholdEth: flags.warnFeeEth ?? context.config.fees.thresholdEth,
          networks: createNetworkLabels(context.config.networks),
        });

        context.logger.debug(
          { verdict: result.verdict, elapsedSeconds: result.elapsedSeconds },
          'Inspection complete'
        );

        const record = toReportRecord(result);
        write(flags.json ? [toJson(record)] : renderReport(record, colors));
        return exitCodeForVerdict(result.verdict);
      })
    );

  /**
   * Context command - compare a transaction's gas price with recent blocks
   */
  program
    .command('context')
    .description('Compare a transaction gas price with recent network conditions')
    .argument('<txHash>', 'Transaction hash (0x + 64 hex characters)')
    .option('--rpc <url>', 'RPC endpoint (default: RPC_URL)', parseRpcUrl)
    .option('--timeout <seconds>', 'Per-request timeout (default: RPC_TIMEOUT_SECONDS)', parsePositiveNumber)
    .option('--blocks <n>', 'Recent blocks to sample (default: CTX_GUARD_BLOCKS)', parsePositiveInteger)
    .option('--step <n>', 'Sample every Nth block (default: CTX_GUARD_STEP)', parsePositiveInteger)
    .option('--warn-mult-median <x>', 'Flag above median × x (default: CTX_GUARD_WARN_MULT_MEDIAN)', parsePositiveNumber)
    .option('--warn-mult-p95 <x>', 'Flag above p95 × x (default: CTX_GUARD_WARN_MULT_P95)', parsePositiveNumber)
    .option('--json', 'Print the report as JSON')
    .action(async (txHash: string, flags: ContextFlags) =>
      run(async (context) => {
        const { config, logger } = context;
        const source = connect(context, flags);
        const step = flags.step ?? config.context.step;

        const result = await inspectGasContext(source, txHash, {
          blocks: flags.blocks ?? config.context.blocks,
          step,
          multMedian: flags.warnMultMedian ?? config.context.warnMultMedian,
          multP95: flags.warnMultP95 ?? config.context.warnMultP95,
          networks: createNetworkLabels(config.networks),
        });

        if (result.found && result.windowClamped) {
          logger.warn({ blocks: result.blocks }, `Context window capped at ${MAX_CONTEXT_BLOCKS} blocks`);
        }

        const record = toContextRecord(result);
        write(flags.json ? [toJson(record)] : renderContextReport(record, step, colors));
        return exitCodeForContext(result);
      })
    );

  /**
   * Check config command - validates environment configuration
   */
  program
    .command('check-config')
    .description('Validate environment configuration')
    .action(async () =>
      run(async ({ config }) => {
        const items = [
          { key: 'RPC_URL', value: config.rpc.url ? redactRpcUrl(config.rpc.url) : '(not set)' },
          { key: 'RPC_TIMEOUT_SECONDS', value: String(config.rpc.timeoutSeconds) },
          { key: 'RPC_RETRY_COUNT', value: String(config.rpc.retryCount) },
          { key: 'FEE_THRESHOLD_ETH', value: String(config.fees.thresholdEth) },
          { key: 'NETWORK_LABELS', value: JSON.stringify(config.networks) },
          { key: 'CTX_GUARD_BLOCKS', value: String(config.context.blocks) },
          { key: 'CTX_GUARD_STEP', value: String(config.context.step) },
          { key: 'CTX_GUARD_WARN_MULT_MEDIAN', value: String(config.context.warnMultMedian) },
          { key: 'CTX_GUARD_WARN_MULT_P95', value: String(config.context.warnMultP95) },
          { key: 'LOG_LEVEL', value: config.logging.level },
          { key: 'LOG_FORMAT', value: config.logging.format },
        ];

        write([
          colors.bold('Configuration'),
          ...items.map((item) => `  ${colors.cyan(item.key)}: ${item.value}`),
          colors.green('✓ Configuration is valid'),
        ]);
        return ExitCode.OK;
      })
    );

  return program;
}
