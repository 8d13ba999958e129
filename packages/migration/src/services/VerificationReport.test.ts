import { describe, it, expect } from 'vitest';
import type { MigrationBatch } from '@ledgerlift/core';
import { createReport, describeCheck, formatReport, isFullyVerified } from './VerificationReport.ts';

const accountBatch: MigrationBatch = {
  kind: 'accounts',
  index: 2,
  input: {
    accounts: new Map([
      ['alice.near', 10n],
      ['bob.near', 20n],
    ]),
    totalSupply: null,
    accountStorageUsage: null,
    usedProofs: [],
  },
  payload: new Uint8Array(),
  records: 2,
  progress: 2,
};

const totalsBatch: MigrationBatch = {
  kind: 'totals',
  index: 3,
  input: { accounts: new Map(), totalSupply: 30n, accountStorageUsage: null, usedProofs: [] },
  payload: new Uint8Array(),
  records: 1,
  progress: 1,
};

describe('VerificationReport', () => {
  it('should describe balance mismatches with both amounts', () => {
    const lines = describeCheck(accountBatch, {
      status: 'checked',
      result: { kind: 'account-amount', amounts: new Map([['bob.near', 7n]]) },
    });

    expect(lines).toEqual(['Batch 2 (accounts, 2 records): 1 balances differ', '  bob.near: expected 20, found 7']);
  });

  it('should describe a failed check call', () => {
    const lines = describeCheck(totalsBatch, { status: 'unavailable', error: new Error('timeout') });

    expect(lines).toEqual(['Batch 3 (totals, 1 records): check failed: timeout']);
  });

  it('should count passed, failed and unchecked batches', () => {
    const report = createReport([
      { batch: accountBatch, check: { status: 'checked', result: { kind: 'account-not-exist', accounts: ['alice.near', 'bob.near'] } } },
      { batch: totalsBatch, check: { status: 'checked', result: { kind: 'success' } } },
      { batch: totalsBatch, check: { status: 'unavailable', error: new Error('timeout') } },
    ]);

    expect(report).toMatchObject({ passed: 1, failed: 1, unavailable: 1, mismatches: 2 });
    expect(isFullyVerified(report)).toBe(false);
    expect(formatReport(report)).toEqual([
      'Batch 2 (accounts, 2 records): 2 accounts missing',
      '  alice.near',
      '  bob.near',
      'Batch 3 (totals, 1 records): ok',
      'Batch 3 (totals, 1 records): check failed: timeout',
      'Verified 3 batches: 1 ok, 1 with 2 mismatches, 1 unchecked',
    ]);
  });

  it('should accept a report where every batch passed', () => {
    const report = createReport([{ batch: totalsBatch, check: { status: 'checked', result: { kind: 'success' } } }]);

    expect(isFullyVerified(report)).toBe(true);
  });
});
