import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { createJiti } from 'jiti';
import { ledgerliftConfigSchema } from './schema.ts';
import { defaultConfig } from './defaults.ts';
import type { LedgerliftConfig, ResolvedConfig } from './types.ts';

/**
 * Configuration file names to search for (in order)
 */
const CONFIG_FILE_NAMES = [
  'ledgerlift.config.ts',
  'ledgerlift.config.js',
  'ledgerlift.config.mts',
  'ledgerlift.config.mjs',
];

/**
 * Find configuration file in the given directory
 */
export function findConfigFile(cwd: string): string | undefined {
  for (const fileName of CONFIG_FILE_NAMES) {
    const filePath = join(cwd, fileName);
    if (existsSync(filePath)) {
      return filePath;
    }
  }

  return undefined;
}

/**
 * Load configuration from a file path
 * Uses jiti to support TypeScript config files
 */
async function loadConfigFile(filePath: string): Promise<unknown> {
  const jiti = createJiti(import.meta.url, {
    interopDefault: true,
  });

  const module: unknown = await jiti.import(filePath);

  // Support both default export and named export
  if (typeof module === 'object' && module !== null) {
    if ('default' in module && module.default !== undefined) return module.default;
    if ('config' in module && module.config !== undefined) return module.config;
  }
  return module;
}

function mergeSection<T extends object>(base: T | undefined, override: T | undefined): T | undefined {
  if (!base) return override;
  if (!override) return base;
  // Unset override keys keep the base value
  const defined = Object.fromEntries(Object.entries(override).filter(([, value]) => value !== undefined));
  return { ...base, ...defined };
}

/**
 * Merge two partial configurations section by section, override wins
 */
export function mergeConfig(base: LedgerliftConfig, override: LedgerliftConfig): LedgerliftConfig {
  return {
    network: mergeSection(base.network, override.network),
    contract: mergeSection(base.contract, override.contract),
    indexer: mergeSection(base.indexer, override.indexer),
    migration: mergeSection(base.migration, override.migration),
    logging: mergeSection(base.logging, override.logging),
  };
}

/**
 * Validate a configuration and fill in every default
 */
export function resolveConfig(raw: unknown): ResolvedConfig {
  const parseResult = ledgerliftConfigSchema.safeParse(raw);
  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  const input = parseResult.data;
  const base = defaultConfig(input.network?.id);

  return {
    network: {
      id: base.network.id,
      rpcUrl: input.network?.rpcUrl ?? base.network.rpcUrl,
      timeout: input.network?.timeout ?? base.network.timeout,
    },
    contract: {
      source: input.contract?.source ?? base.contract.source,
      target: input.contract?.target,
    },
    indexer: {
      dataFile: input.indexer?.dataFile ?? base.indexer.dataFile,
      requestDelayMs: input.indexer?.requestDelayMs ?? base.indexer.requestDelayMs,
      tipRefreshIntervalMs: input.indexer?.tipRefreshIntervalMs ?? base.indexer.tipRefreshIntervalMs,
      tipBackoffMs: input.indexer?.tipBackoffMs ?? base.indexer.tipBackoffMs,
      saveIntervalMs: input.indexer?.saveIntervalMs ?? base.indexer.saveIntervalMs,
      startBlock: input.indexer?.startBlock,
    },
    migration: {
      batchSize: input.migration?.batchSize ?? base.migration.batchSize,
      commitRetries: input.migration?.commitRetries ?? base.migration.commitRetries,
      commitRetryDelayMs: input.migration?.commitRetryDelayMs ?? base.migration.commitRetryDelayMs,
      gasTera: input.migration?.gasTera ?? base.migration.gasTera,
    },
    logging: {
      level: input.logging?.level ?? base.logging.level,
      timestamps: input.logging?.timestamps ?? base.logging.timestamps,
      json: input.logging?.json ?? base.logging.json,
      progress: input.logging?.progress ?? base.logging.progress,
    },
  };
}

/**
 * Load and validate Ledgerlift configuration.
 * Without a config file every setting falls back to its default.
 */
export async function loadConfig(options?: {
  /** Custom config file path */
  configPath?: string;
  /** Working directory to search for config (default: process.cwd()) */
  cwd?: string;
  /** Values that take precedence over the file, typically CLI flags */
  overrides?: LedgerliftConfig;
}): Promise<ResolvedConfig> {
  const cwd = options?.cwd ?? process.cwd();
  const configPath = options?.configPath ?? findConfigFile(cwd);

  let rawConfig: unknown = {};
  if (configPath) {
    try {
      rawConfig = await loadConfigFile(configPath);
    } catch (error) {
      throw new Error(
        `Failed to load configuration from ${configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  if (!options?.overrides) {
    return resolveConfig(rawConfig);
  }

  // Validate the file on its own first so its errors are not blamed on the flags
  const fileConfig = ledgerliftConfigSchema.safeParse(rawConfig);
  if (!fileConfig.success) {
    return resolveConfig(rawConfig);
  }
  return resolveConfig(mergeConfig(fileConfig.data, options.overrides));
}

/**
 * Create a type-safe configuration helper
 */
export function defineConfig<T extends LedgerliftConfig>(config: T): T {
  return config;
}

type Environment = 'development' | 'production' | 'test';

function currentEnvironment(): Environment {
  const env = process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

/**
 * Environment-aware configuration with overrides
 */
export function defineConfigWithEnv(
  config: LedgerliftConfig,
  envOverrides?: Partial<Record<Environment, LedgerliftConfig>>
): LedgerliftConfig {
  const override = envOverrides?.[currentEnvironment()];

  if (override) {
    return mergeConfig(config, override);
  }

  return config;
}
