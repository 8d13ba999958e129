import type {
  ContractConfig,
  IndexerConfig,
  LoggingConfig,
  MigrationConfig,
  NetworkId,
  ResolvedConfig,
} from './types.ts';

// ============================================================================
// Default Network Configuration
// ============================================================================

/**
 * Archival endpoints are needed to read historical blocks
 */
export const DEFAULT_RPC_URLS: Record<NetworkId, string> = {
  mainnet: 'https://archival-rpc.mainnet.near.org',
  testnet: 'https://archival-rpc.testnet.near.org',
  localnet: 'http://127.0.0.1:3030',
};

export const DEFAULT_NETWORK_ID: NetworkId = 'mainnet';

export const DEFAULT_RPC_TIMEOUT = 30_000;

// ============================================================================
// Default Contract Configuration
// ============================================================================

export const DEFAULT_CONTRACT_CONFIG: ContractConfig = {
  source: 'aurora',
};

// ============================================================================
// Default Indexer Configuration
// ============================================================================

export const DEFAULT_INDEXER_CONFIG: Required<Omit<IndexerConfig, 'startBlock'>> = {
  dataFile: 'data.borsh',
  requestDelayMs: 60,
  tipRefreshIntervalMs: 10_000,
  tipBackoffMs: 1_000,
  saveIntervalMs: 60_000,
};

// ============================================================================
// Default Migration Configuration
// ============================================================================

export const DEFAULT_MIGRATION_CONFIG: Required<MigrationConfig> = {
  batchSize: 750,
  commitRetries: 10,
  // Slightly above one block time, so a retry sees the previous nonce
  commitRetryDelayMs: 1_500,
  gasTera: 300,
};

// ============================================================================
// Default Logging Configuration
// ============================================================================

export const DEFAULT_LOGGING_CONFIG: Required<LoggingConfig> = {
  level: 'info',
  timestamps: true,
  json: false,
  progress: true,
};

/**
 * Fully defaulted configuration for the given network
 */
export function defaultConfig(networkId: NetworkId = DEFAULT_NETWORK_ID): ResolvedConfig {
  return {
    network: {
      id: networkId,
      rpcUrl: DEFAULT_RPC_URLS[networkId],
      timeout: DEFAULT_RPC_TIMEOUT,
    },
    contract: { ...DEFAULT_CONTRACT_CONFIG },
    indexer: { ...DEFAULT_INDEXER_CONFIG },
    migration: { ...DEFAULT_MIGRATION_CONFIG },
    logging: { ...DEFAULT_LOGGING_CONFIG },
  };
}
