import { AccountCountMismatchError } from '../errors.ts';

/**
 * Aggregate totals of the fungible-token contract
 */
export interface ContractTotals {
  readonly totalEthSupplyOnNear: bigint;
  readonly totalEthSupplyOnAurora: bigint;
  readonly accountStorageUsage: bigint;
}

/**
 * Migration input: the whole ledger at one point in time
 */
export interface StateData {
  readonly contractData: ContractTotals;
  readonly accounts: ReadonlyMap<string, bigint>;
  readonly accountsCounter: bigint;
  readonly proofs: readonly string[];
}

export const EMPTY_TOTALS: ContractTotals = {
  totalEthSupplyOnNear: 0n,
  totalEthSupplyOnAurora: 0n,
  accountStorageUsage: 0n,
};

/**
 * Build a StateData, refusing one whose account count disagrees with its counter
 */
export function createStateData(data: {
  contractData: ContractTotals;
  accounts: ReadonlyMap<string, bigint>;
  accountsCounter: bigint;
  proofs: readonly string[];
}): StateData {
  if (BigInt(data.accounts.size) !== data.accountsCounter) {
    throw new AccountCountMismatchError(data.accounts.size, data.accountsCounter);
  }
  return {
    contractData: data.contractData,
    accounts: data.accounts,
    accountsCounter: data.accountsCounter,
    proofs: data.proofs,
  };
}

/**
 * Merge two ledgers. Accounts and totals of `newer` win, proofs are unioned
 * and the counter follows the merged map.
 */
export function mergeStateData(older: StateData, newer: StateData): StateData {
  const accounts = new Map(older.accounts);
  for (const [account, balance] of newer.accounts) {
    accounts.set(account, balance);
  }

  const proofs = [...new Set([...older.proofs, ...newer.proofs])];

  return createStateData({
    contractData: newer.contractData,
    accounts,
    accountsCounter: BigInt(accounts.size),
    proofs,
  });
}

/**
 * Sum of all balances
 */
export function totalBalance(state: StateData): bigint {
  let total = 0n;
  for (const balance of state.accounts.values()) total += balance;
  return total;
}
