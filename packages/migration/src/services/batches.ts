import type { MigrationBatch, MigrationBatchKind, MigrationInput, StateData } from '@ledgerlift/core';
import { encodeMigrationInput, sortedAccounts } from '@ledgerlift/core';

function batch(
  index: number,
  kind: MigrationBatchKind,
  input: MigrationInput,
  records: number,
  progress: number
): MigrationBatch {
  return { kind, index, input, payload: encodeMigrationInput(input), records, progress };
}

/**
 * Split a ledger into migrate transactions: proofs first, then accounts,
 * each in chunks of at most `limit`, then one batch with the totals.
 */
export function createBatches(state: StateData, limit: number): MigrationBatch[] {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${limit}`);
  }

  const batches: MigrationBatch[] = [];

  const proofs = [...state.proofs].sort();
  for (let offset = 0; offset < proofs.length; offset += limit) {
    const usedProofs = proofs.slice(offset, offset + limit);
    batches.push(
      batch(
        batches.length + 1,
        'proofs',
        { accounts: new Map(), totalSupply: null, accountStorageUsage: null, usedProofs },
        usedProofs.length,
        offset + usedProofs.length
      )
    );
  }

  const accounts = [...sortedAccounts(state.accounts)];
  for (let offset = 0; offset < accounts.length; offset += limit) {
    const chunk = new Map(accounts.slice(offset, offset + limit));
    batches.push(
      batch(
        batches.length + 1,
        'accounts',
        { accounts: chunk, totalSupply: null, accountStorageUsage: null, usedProofs: [] },
        chunk.size,
        offset + chunk.size
      )
    );
  }

  // Storage usage is unknown for ledgers built from views
  const { totalEthSupplyOnNear, accountStorageUsage } = state.contractData;
  batches.push(
    batch(
      batches.length + 1,
      'totals',
      {
        accounts: new Map(),
        totalSupply: totalEthSupplyOnNear,
        accountStorageUsage: accountStorageUsage === 0n ? null : accountStorageUsage,
        usedProofs: [],
      },
      1,
      1
    )
  );

  return batches;
}
