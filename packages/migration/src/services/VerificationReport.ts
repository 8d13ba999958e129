import type { MigrationBatch, MigrationCheckResult } from '@ledgerlift/core';
import { mismatchCount } from '@ledgerlift/core';

export type BatchCheck =
  | { status: 'checked'; result: MigrationCheckResult }
  | { status: 'unavailable'; error: Error };

export interface BatchVerification {
  batch: MigrationBatch;
  check: BatchCheck;
}

/**
 * Outcome of re-checking every batch against the target contract
 */
export interface VerificationReport {
  batches: BatchVerification[];
  /** Batches the contract confirmed */
  passed: number;
  /** Batches with at least one mismatch */
  failed: number;
  /** Batches whose check call did not answer */
  unavailable: number;
  /** Mismatched items over all batches */
  mismatches: number;
}

export function createReport(batches: BatchVerification[]): VerificationReport {
  let passed = 0;
  let failed = 0;
  let unavailable = 0;
  let mismatches = 0;

  for (const { check } of batches) {
    if (check.status === 'unavailable') {
      unavailable++;
    } else if (check.result.kind === 'success') {
      passed++;
    } else {
      failed++;
      mismatches += mismatchCount(check.result);
    }
  }

  return { batches, passed, failed, unavailable, mismatches };
}

export function isFullyVerified(report: VerificationReport): boolean {
  return report.failed === 0 && report.unavailable === 0;
}

/**
 * Headline and item lines of one check result
 */
export function describeCheck(batch: MigrationBatch, check: BatchCheck): string[] {
  const head = `Batch ${batch.index} (${batch.kind}, ${batch.records} records)`;

  if (check.status === 'unavailable') {
    return [`${head}: check failed: ${check.error.message}`];
  }

  const { result } = check;
  switch (result.kind) {
    case 'success':
      return [`${head}: ok`];
    case 'account-not-exist':
      return [`${head}: ${result.accounts.length} accounts missing`, ...result.accounts.map((account) => `  ${account}`)];
    case 'account-amount':
      return [
        `${head}: ${result.amounts.size} balances differ`,
        ...[...result.amounts].map(
          ([account, found]) => `  ${account}: expected ${batch.input.accounts.get(account) ?? '-'}, found ${found}`
        ),
      ];
    case 'total-supply':
      return [`${head}: total supply differs: expected ${batch.input.totalSupply ?? '-'}, found ${result.value}`];
    case 'storage-usage':
      return [
        `${head}: storage usage differs: expected ${batch.input.accountStorageUsage ?? '-'}, found ${result.value}`,
      ];
    case 'proof':
      return [`${head}: ${result.proofs.length} proofs missing`, ...result.proofs.map((proof) => `  ${proof}`)];
  }
}

/**
 * Printable form of a whole report
 */
export function formatReport(report: VerificationReport): string[] {
  const lines = report.batches.flatMap(({ batch, check }) => describeCheck(batch, check));
  lines.push(
    `Verified ${report.batches.length} batches: ${report.passed} ok, ${report.failed} with ${report.mismatches} mismatches, ${report.unavailable} unchecked`
  );
  return lines;
}
