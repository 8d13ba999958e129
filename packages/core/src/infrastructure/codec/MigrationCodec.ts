import { serialize } from 'borsh';
import { z } from 'zod';
import { deserializeExact } from '../../application/services/borsh.ts';
import type { MigrationCheckResult, MigrationInput } from '../../domain/entities/index.ts';
import { migrationCheckResultSchema, migrationInputSchema } from './schemas.ts';
import { sortedAccounts } from './StateDataCodec.ts';

const decodedInput = z.object({
  accounts: z.map(z.string(), z.bigint()),
  total_supply: z.bigint().nullable(),
  account_storage_usage: z.bigint().nullable(),
  used_proofs: z.array(z.string()),
});

const decodedCheckResult = z.union([
  z.object({ Success: z.object({}) }),
  z.object({ AccountNotExist: z.array(z.string()) }),
  z.object({ AccountAmount: z.map(z.string(), z.bigint()) }),
  z.object({ TotalSupply: z.bigint() }),
  z.object({ StorageUsage: z.bigint() }),
  z.object({ Proof: z.array(z.string()) }),
]);

export function encodeMigrationInput(input: MigrationInput): Uint8Array {
  return serialize(migrationInputSchema, {
    accounts: sortedAccounts(input.accounts),
    total_supply: input.totalSupply,
    account_storage_usage: input.accountStorageUsage,
    used_proofs: [...input.usedProofs],
  });
}

export function decodeMigrationInput(bytes: Uint8Array): MigrationInput {
  const raw = decodedInput.parse(deserializeExact(migrationInputSchema, bytes));
  return {
    accounts: raw.accounts,
    totalSupply: raw.total_supply,
    accountStorageUsage: raw.account_storage_usage,
    usedProofs: raw.used_proofs,
  };
}

export function encodeCheckResult(result: MigrationCheckResult): Uint8Array {
  switch (result.kind) {
    case 'success':
      return serialize(migrationCheckResultSchema, { Success: {} });
    case 'account-not-exist':
      return serialize(migrationCheckResultSchema, { AccountNotExist: [...result.accounts] });
    case 'account-amount':
      return serialize(migrationCheckResultSchema, { AccountAmount: sortedAccounts(result.amounts) });
    case 'total-supply':
      return serialize(migrationCheckResultSchema, { TotalSupply: result.value });
    case 'storage-usage':
      return serialize(migrationCheckResultSchema, { StorageUsage: result.value });
    case 'proof':
      return serialize(migrationCheckResultSchema, { Proof: [...result.proofs] });
  }
}

/**
 * Decode the borsh result of check_migration_correctness
 */
export function decodeCheckResult(bytes: Uint8Array): MigrationCheckResult {
  const raw = decodedCheckResult.parse(deserializeExact(migrationCheckResultSchema, bytes));

  if ('Success' in raw) return { kind: 'success' };
  if ('AccountNotExist' in raw) return { kind: 'account-not-exist', accounts: raw.AccountNotExist };
  if ('AccountAmount' in raw) return { kind: 'account-amount', amounts: raw.AccountAmount };
  if ('TotalSupply' in raw) return { kind: 'total-supply', value: raw.TotalSupply };
  if ('StorageUsage' in raw) return { kind: 'storage-usage', value: raw.StorageUsage };
  return { kind: 'proof', proofs: raw.Proof };
}
