import { serialize } from 'borsh';
import { z } from 'zod';
import { deserializeExact } from '../../application/services/borsh.ts';
import type { ContractTotals, StateData } from '../../domain/entities/index.ts';
import { createStateData } from '../../domain/entities/index.ts';
import { contractTotalsSchema, stateDataSchema } from './schemas.ts';

const decodedTotals = z.object({
  total_eth_supply_on_near: z.bigint(),
  total_eth_supply_on_aurora: z.bigint(),
  account_storage_usage: z.bigint(),
});

const decodedStateData = z.object({
  contract_data: decodedTotals,
  accounts: z.map(z.string(), z.bigint()),
  accounts_counter: z.bigint(),
  proofs: z.array(z.string()),
});

function toTotals(raw: z.infer<typeof decodedTotals>): ContractTotals {
  return {
    totalEthSupplyOnNear: raw.total_eth_supply_on_near,
    totalEthSupplyOnAurora: raw.total_eth_supply_on_aurora,
    accountStorageUsage: raw.account_storage_usage,
  };
}

/**
 * Accounts sorted by id, the order the contract side serializes maps in
 */
export function sortedAccounts(accounts: ReadonlyMap<string, bigint>): Map<string, bigint> {
  return new Map([...accounts].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export function encodeContractTotals(totals: ContractTotals): Uint8Array {
  return serialize(contractTotalsSchema, {
    total_eth_supply_on_near: totals.totalEthSupplyOnNear,
    total_eth_supply_on_aurora: totals.totalEthSupplyOnAurora,
    account_storage_usage: totals.accountStorageUsage,
  });
}

export function decodeContractTotals(bytes: Uint8Array): ContractTotals {
  return toTotals(decodedTotals.parse(deserializeExact(contractTotalsSchema, bytes)));
}

/**
 * Encode a migration-ready file
 */
export function encodeStateData(state: StateData): Uint8Array {
  return serialize(stateDataSchema, {
    contract_data: {
      total_eth_supply_on_near: state.contractData.totalEthSupplyOnNear,
      total_eth_supply_on_aurora: state.contractData.totalEthSupplyOnAurora,
      account_storage_usage: state.contractData.accountStorageUsage,
    },
    accounts: sortedAccounts(state.accounts),
    accounts_counter: state.accountsCounter,
    proofs: [...state.proofs],
  });
}

/**
 * Decode a migration-ready file, enforcing the account counter
 */
export function decodeStateData(bytes: Uint8Array): StateData {
  const raw = decodedStateData.parse(deserializeExact(stateDataSchema, bytes));

  return createStateData({
    contractData: toTotals(raw.contract_data),
    accounts: raw.accounts,
    accountsCounter: raw.accounts_counter,
    proofs: raw.proofs,
  });
}
