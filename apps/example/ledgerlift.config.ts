import { defineConfigWithEnv } from '@ledgerlift/config';

/**
 * Testnet migration of the eth-connector ledger.
 * Run from this directory: `ledgerlift index`, `ledgerlift prepare`, `ledgerlift migrate <file>`.
 */
export default defineConfigWithEnv(
  {
    network: { id: 'testnet', timeout: 30_000 },
    contract: {
      source: 'aurora',
      target: 'eth-connector.testnet',
    },
    indexer: {
      dataFile: 'data.borsh',
      requestDelayMs: 60,
      saveIntervalMs: 60_000,
    },
    migration: {
      batchSize: 750,
      commitRetries: 10,
      commitRetryDelayMs: 1_500,
    },
    logging: { level: 'info', progress: true },
  },
  {
    production: {
      network: { id: 'mainnet' },
      contract: { source: 'aurora', target: 'eth-connector.near' },
    },
  }
);
