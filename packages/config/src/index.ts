// Types
export type {
  NetworkId,
  NetworkConfig,
  ContractConfig,
  IndexerConfig,
  MigrationConfig,
  LoggingConfig,
  LogLevel,
  LedgerliftConfig,
  ResolvedConfig,
} from './types.ts';

// Schema exports
export {
  ledgerliftConfigSchema,
  accountIdSchema,
  networkConfigSchema,
  contractConfigSchema,
  indexerConfigSchema,
  migrationConfigSchema,
  loggingConfigSchema,
  ACCOUNT_ID_PATTERN,
} from './schema.ts';
export type { LedgerliftConfigInput, LedgerliftConfigOutput } from './schema.ts';

// Loader exports
export {
  loadConfig,
  resolveConfig,
  mergeConfig,
  findConfigFile,
  defineConfig,
  defineConfigWithEnv,
} from './loader.ts';

// Default exports
export {
  DEFAULT_RPC_URLS,
  DEFAULT_NETWORK_ID,
  DEFAULT_RPC_TIMEOUT,
  DEFAULT_CONTRACT_CONFIG,
  DEFAULT_INDEXER_CONFIG,
  DEFAULT_MIGRATION_CONFIG,
  DEFAULT_LOGGING_CONFIG,
  defaultConfig,
} from './defaults.ts';
