import type { MigrationCheckResult, MigrationInput } from '@ledgerlift/core';

/**
 * In-memory successor contract: applies `migrate` payloads and answers
 * `check_migration_correctness` the way the deployed contract does.
 */
export class TargetContractEmulator {
  readonly balances = new Map<string, bigint>();
  readonly usedProofs = new Set<string>();
  totalSupply = 0n;
  storageUsage = 0n;
  /** Number of applied migrate calls */
  migrations = 0;

  constructor(readonly accountId: string) {}

  migrate(input: MigrationInput): void {
    for (const [account, balance] of input.accounts) {
      this.balances.set(account, balance);
    }
    for (const proof of input.usedProofs) {
      this.usedProofs.add(proof);
    }
    if (input.totalSupply !== null) {
      this.totalSupply = input.totalSupply;
    }
    if (input.accountStorageUsage !== null) {
      this.storageUsage = input.accountStorageUsage;
    }
    this.migrations++;
  }

  check(input: MigrationInput): MigrationCheckResult {
    const missing = [...input.accounts.keys()].filter((account) => !this.balances.has(account));
    if (missing.length > 0) {
      return { kind: 'account-not-exist', accounts: missing };
    }

    // Balance the contract holds, for each account that differs
    const amounts = new Map<string, bigint>();
    for (const [account, balance] of input.accounts) {
      const stored = this.balances.get(account);
      if (stored !== undefined && stored !== balance) {
        amounts.set(account, stored);
      }
    }
    if (amounts.size > 0) {
      return { kind: 'account-amount', amounts };
    }

    if (input.totalSupply !== null && input.totalSupply !== this.totalSupply) {
      return { kind: 'total-supply', value: this.totalSupply };
    }
    if (input.accountStorageUsage !== null && input.accountStorageUsage !== this.storageUsage) {
      return { kind: 'storage-usage', value: this.storageUsage };
    }

    const proofs = input.usedProofs.filter((proof) => !this.usedProofs.has(proof));
    if (proofs.length > 0) {
      return { kind: 'proof', proofs };
    }

    return { kind: 'success' };
  }
}
