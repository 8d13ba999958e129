// ============================================================================
// Network Configuration Types
// ============================================================================

/**
 * NEAR network the tool talks to
 */
export type NetworkId = 'mainnet' | 'testnet' | 'localnet';

/**
 * JSON-RPC endpoint configuration
 */
export interface NetworkConfig {
  id: NetworkId;
  /** RPC endpoint (defaults to the archival node of the selected network) */
  rpcUrl?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
}

// ============================================================================
// Contract Configuration Types
// ============================================================================

/**
 * Contract accounts involved in the migration
 */
export interface ContractConfig {
  /** Account hosting the ledger being migrated */
  source: string;
  /** Successor contract receiving the ledger */
  target?: string;
}

// ============================================================================
// Indexer Configuration Types
// ============================================================================

export interface IndexerConfig {
  /** Checkpoint file path */
  dataFile?: string;
  /** Minimum delay between two RPC requests (ms) */
  requestDelayMs?: number;
  /** How long an observed chain tip stays fresh (ms) */
  tipRefreshIntervalMs?: number;
  /** Sleep when the next height is above the tip (ms) */
  tipBackoffMs?: number;
  /** Interval between background checkpoint saves (ms) */
  saveIntervalMs?: number;
  /** Height to resume from, overriding the checkpoint */
  startBlock?: number;
}

// ============================================================================
// Migration Configuration Types
// ============================================================================

export interface MigrationConfig {
  /** Maximum accounts or proofs per migrate transaction */
  batchSize?: number;
  /** Commit attempts before a transaction is considered failed */
  commitRetries?: number;
  /** Pause between two commit attempts (ms) */
  commitRetryDelayMs?: number;
  /** Gas attached to each migrate call, in TGas */
  gasTera?: number;
}

// ============================================================================
// Logging Configuration Types
// ============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface LoggingConfig {
  level: LogLevel;
  timestamps?: boolean;
  json?: boolean;
  progress?: boolean;
}

// ============================================================================
// Main Configuration Type
// ============================================================================

/**
 * Ledgerlift configuration as written by the user
 */
export interface LedgerliftConfig {
  network?: NetworkConfig;
  contract?: ContractConfig;
  indexer?: IndexerConfig;
  migration?: MigrationConfig;
  logging?: LoggingConfig;
}

/**
 * Configuration after defaults are applied
 */
export interface ResolvedConfig {
  network: Required<NetworkConfig>;
  contract: ContractConfig;
  indexer: Required<Omit<IndexerConfig, 'startBlock'>> & Pick<IndexerConfig, 'startBlock'>;
  migration: Required<MigrationConfig>;
  logging: Required<LoggingConfig>;
}
