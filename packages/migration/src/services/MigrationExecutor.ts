import type { IChainClient, ILogger, ITransactionSigner, MigrationBatch, StateData } from '@ledgerlift/core';
import { CommitFailedError, TransactionFailedError, decodeCheckResult, toError, totalBalance } from '@ledgerlift/core';
import { createBatches } from './batches.ts';
import type { BatchCheck, BatchVerification, VerificationReport } from './VerificationReport.ts';
import { createReport, describeCheck } from './VerificationReport.ts';

export const MIGRATE_METHOD = 'migrate';
export const CHECK_METHOD = 'check_migration_correctness';

/**
 * Migration executor options
 */
export interface MigrationExecutorOptions {
  client: IChainClient;
  /** Needed by migrate() only */
  signer?: ITransactionSigner;
  /** Account of the successor contract */
  contractId: string;
  /** Maximum accounts or proofs per transaction */
  batchSize: number;
  logger: ILogger;
}

/**
 * Replays a ledger into the successor contract batch by batch, then asks the
 * contract to check every batch it was sent.
 */
export class MigrationExecutor {
  private readonly client: IChainClient;
  private readonly signer: ITransactionSigner | null;
  private readonly contractId: string;
  private readonly batchSize: number;
  private readonly logger: ILogger;

  constructor(options: MigrationExecutorOptions) {
    this.client = options.client;
    this.signer = options.signer ?? null;
    this.contractId = options.contractId;
    this.batchSize = options.batchSize;
    this.logger = options.logger.child({ module: 'migration', contract: options.contractId });
  }

  /**
   * Commit every batch, stopping at the first commit failure, then verify
   * the committed batches
   */
  async migrate(state: StateData): Promise<VerificationReport> {
    const { signer } = this;
    if (!signer) {
      throw new Error('A signer is required to migrate');
    }

    const batches = createBatches(state, this.batchSize);
    this.logger.info('Migration started', {
      batches: batches.length,
      accounts: state.accounts.size,
      proofs: state.proofs.length,
      balance: totalBalance(state),
      signer: signer.accountId,
    });

    const committed: MigrationBatch[] = [];
    const startTime = Date.now();

    for (const batch of batches) {
      await this.commit(signer, batch);
      committed.push(batch);

      const elapsedSeconds = (Date.now() - startTime) / 1000;
      this.logger.progress({
        phase: 'committing',
        current: committed.length,
        total: batches.length,
        percentage: (committed.length / batches.length) * 100,
        rate: elapsedSeconds > 0 ? committed.length / elapsedSeconds : undefined,
        detail: `${batch.kind} ${batch.progress}`,
      });
    }

    this.logger.clearProgress();
    this.logger.info('All batches committed', { batches: committed.length });

    return this.verifyBatches(committed);
  }

  /**
   * Check a ledger against the contract without sending any transaction
   */
  async verify(state: StateData): Promise<VerificationReport> {
    return this.verifyBatches(createBatches(state, this.batchSize));
  }

  private async commit(signer: ITransactionSigner, batch: MigrationBatch): Promise<void> {
    try {
      const outcome = await this.client.commitTransaction(signer, this.contractId, MIGRATE_METHOD, batch.payload);
      if (outcome.status === 'failure') {
        throw new TransactionFailedError(outcome.hash, outcome.reason);
      }

      this.logger.info('Batch committed', {
        index: batch.index,
        kind: batch.kind,
        records: batch.records,
        progress: batch.progress,
        txHash: outcome.hash,
      });
    } catch (error) {
      const failure =
        error instanceof CommitFailedError
          ? error
          : new CommitFailedError(this.contractId, MIGRATE_METHOD, 1, toError(error));
      this.logger.error('Batch commit failed', { index: batch.index, kind: batch.kind, error: failure });
      throw failure;
    }
  }

  private async verifyBatches(batches: MigrationBatch[]): Promise<VerificationReport> {
    const verified: BatchVerification[] = [];

    for (const batch of batches) {
      const check = await this.check(batch);
      verified.push({ batch, check });

      if (check.status === 'unavailable') {
        this.logger.error('Batch check failed', { index: batch.index, error: check.error });
      } else if (check.result.kind === 'success') {
        this.logger.info('Batch verified', { index: batch.index });
      } else {
        const [headline, ...items] = describeCheck(batch, check);
        this.logger.warn(headline ?? 'Batch mismatch', { index: batch.index, kind: check.result.kind });
        for (const item of items) this.logger.warn(item.trim(), { index: batch.index });
      }

      this.logger.progress({
        phase: 'verifying',
        current: verified.length,
        total: batches.length,
        percentage: (verified.length / batches.length) * 100,
      });
    }

    this.logger.clearProgress();
    const report = createReport(verified);
    this.logger.info('Verification finished', {
      passed: report.passed,
      failed: report.failed,
      unavailable: report.unavailable,
      mismatches: report.mismatches,
    });
    return report;
  }

  private async check(batch: MigrationBatch): Promise<BatchCheck> {
    try {
      const bytes = await this.client.requestView(this.contractId, CHECK_METHOD, batch.payload);
      return { status: 'checked', result: decodeCheckResult(bytes) };
    } catch (error) {
      return { status: 'unavailable', error: toError(error) };
    }
  }
}
