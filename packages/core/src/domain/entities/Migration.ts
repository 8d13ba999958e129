/**
 * Argument of the target contract's migrate and check entry points
 */
export interface MigrationInput {
  readonly accounts: ReadonlyMap<string, bigint>;
  readonly totalSupply: bigint | null;
  readonly accountStorageUsage: bigint | null;
  readonly usedProofs: readonly string[];
}

export type MigrationBatchKind = 'proofs' | 'accounts' | 'totals';

/**
 * One size-bounded migrate transaction
 */
export interface MigrationBatch {
  readonly kind: MigrationBatchKind;
  /** Position of the batch in the run, starting at 1 */
  readonly index: number;
  readonly input: MigrationInput;
  /** Borsh encoding of input */
  readonly payload: Uint8Array;
  /** Number of records carried by this batch */
  readonly records: number;
  /** Records of the same kind sent so far, this batch included */
  readonly progress: number;
}

/**
 * Outcome of check_migration_correctness
 */
export type MigrationCheckResult =
  | { readonly kind: 'success' }
  | { readonly kind: 'account-not-exist'; readonly accounts: readonly string[] }
  | { readonly kind: 'account-amount'; readonly amounts: ReadonlyMap<string, bigint> }
  | { readonly kind: 'total-supply'; readonly value: bigint }
  | { readonly kind: 'storage-usage'; readonly value: bigint }
  | { readonly kind: 'proof'; readonly proofs: readonly string[] };

/**
 * Number of mismatched items carried by a check result
 */
export function mismatchCount(result: MigrationCheckResult): number {
  switch (result.kind) {
    case 'success':
      return 0;
    case 'account-not-exist':
      return result.accounts.length;
    case 'account-amount':
      return result.amounts.size;
    case 'proof':
      return result.proofs.length;
    case 'total-supply':
    case 'storage-usage':
      return 1;
  }
}
