import type { BorshSchema } from '../../application/services/borsh.ts';

const stringVec: BorshSchema = { array: { type: 'string' } };

// ============================================================================
// Ledger Schemas
// ============================================================================

/**
 * Contract totals record as stored by the eth-connector
 */
export const contractTotalsSchema: BorshSchema = {
  struct: {
    total_eth_supply_on_near: 'u128',
    total_eth_supply_on_aurora: 'u128',
    account_storage_usage: 'u64',
  },
};

/**
 * Migration-ready file
 */
export const stateDataSchema: BorshSchema = {
  struct: {
    contract_data: contractTotalsSchema,
    accounts: { map: { key: 'string', value: 'u128' } },
    accounts_counter: 'u64',
    proofs: stringVec,
  },
};

// ============================================================================
// Target Contract Schemas
// ============================================================================

/**
 * Argument of migrate and check_migration_correctness
 */
export const migrationInputSchema: BorshSchema = {
  struct: {
    accounts: { map: { key: 'string', value: 'u128' } },
    total_supply: { option: 'u128' },
    account_storage_usage: { option: 'u64' },
    used_proofs: stringVec,
  },
};

/**
 * Result of check_migration_correctness, variants in declaration order
 */
export const migrationCheckResultSchema: BorshSchema = {
  enum: [
    { struct: { Success: { struct: {} } } },
    { struct: { AccountNotExist: stringVec } },
    { struct: { AccountAmount: { map: { key: 'string', value: 'u128' } } } },
    { struct: { TotalSupply: 'u128' } },
    { struct: { StorageUsage: 'u64' } },
    { struct: { Proof: stringVec } },
  ],
};

// ============================================================================
// Checkpoint Schema
// ============================================================================

const actionRecordSchema: BorshSchema = {
  struct: {
    method: 'string',
    accounts: stringVec,
    proof: { option: 'string' },
    hash: 'string',
    /** 0 = transaction, 1 = receipt */
    source: 'u8',
  },
};

export const checkpointSchema: BorshSchema = {
  struct: {
    version: 'u8',
    first_block: { option: 'u64' },
    last_block: 'u64',
    last_handled_block: 'u64',
    current_block: 'u64',
    last_block_hash: { option: 'string' },
    missed_blocks: { set: 'u64' },
    accounts: { set: 'string' },
    proofs: { set: 'string' },
    logs: {
      array: {
        type: {
          struct: {
            height: 'u64',
            actions: { array: { type: actionRecordSchema } },
          },
        },
      },
    },
    prepared_balances: { map: { key: 'string', value: 'u128' } },
  },
};
