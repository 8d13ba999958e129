import { z } from 'zod';
import { loadConfig, networkConfigSchema } from '@ledgerlift/config';
import type { LedgerliftConfig, NetworkId, ResolvedConfig } from '@ledgerlift/config';
import { ChainClient, NearRpcClient, createLogger, toError, verbosityToLogLevel } from '@ledgerlift/core';
import type { ILogger } from '@ledgerlift/core';
import type { StartPosition } from '@ledgerlift/indexer';

/**
 * Options shared by every command
 */
export interface GlobalOptions {
  config?: string;
  verbose: number;
  network?: NetworkId;
  rpc?: string;
}

export interface CommandContext {
  config: ResolvedConfig;
  logger: ILogger;
}

function jsonLogs(): boolean {
  return process.env.LOG_JSON === 'true';
}

/**
 * Parse a non-negative integer flag
 */
export function parseHeight(value: string): number {
  return z.coerce.number().int().nonnegative().parse(value);
}

/**
 * Parse a --network flag
 */
export function parseNetwork(value: string): NetworkId {
  return networkConfigSchema.shape.id.parse(value);
}

/**
 * Load the configuration, build the logger and run a command body.
 * Any error is logged and ends the process with exit code 1.
 */
export async function runCommand(
  label: string,
  options: GlobalOptions,
  overrides: LedgerliftConfig,
  body: (context: CommandContext) => Promise<void>
): Promise<void> {
  let logger = createLogger({
    verbosity: options.verbose > 0 ? options.verbose : 3,
    json: jsonLogs(),
    progress: false,
  });

  try {
    const config = await loadConfig({
      configPath: options.config,
      overrides: options.network ? { ...overrides, network: { id: options.network } } : overrides,
    });
    if (options.rpc) {
      config.network.rpcUrl = z.string().url().parse(options.rpc);
    }

    logger = createLogger({
      level: options.verbose > 0 ? verbosityToLogLevel(options.verbose) : config.logging.level,
      timestamps: config.logging.timestamps,
      json: jsonLogs() || config.logging.json,
      progress: config.logging.progress,
      context: { network: config.network.id },
    });

    await body({ config, logger });
  } catch (error) {
    logger.clearProgress();
    logger.error(`${label} failed`, { error: toError(error) });
    process.exit(1);
  }
}

/**
 * Chain client for the configured node
 */
export function createChainClient(
  config: ResolvedConfig,
  logger: ILogger,
  unresolvedBlocks?: Iterable<number>
): ChainClient {
  const rpc = new NearRpcClient({ url: config.network.rpcUrl, timeout: config.network.timeout });
  logger.debug('Using RPC endpoint', { url: rpc.url });

  return new ChainClient({
    rpc,
    logger,
    requestDelayMs: config.indexer.requestDelayMs,
    commitRetries: config.migration.commitRetries,
    commitRetryDelayMs: config.migration.commitRetryDelayMs,
    gasTera: config.migration.gasTera,
    unresolvedBlocks,
  });
}

/**
 * Where the indexer starts. Only --block moves a stored checkpoint;
 * indexer.startBlock seeds a new one, which otherwise starts at the tip.
 */
export function indexStartPosition(
  block: number | undefined,
  config: ResolvedConfig,
  latestHeight: () => Promise<number>
): StartPosition {
  return { override: block, initial: config.indexer.startBlock, latestHeight };
}
