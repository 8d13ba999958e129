export { MigrationExecutor, MIGRATE_METHOD, CHECK_METHOD } from './services/MigrationExecutor.ts';
export type { MigrationExecutorOptions } from './services/MigrationExecutor.ts';

export { MigrationPreparer } from './services/MigrationPreparer.ts';
export type { MigrationPreparerOptions } from './services/MigrationPreparer.ts';

export { createBatches } from './services/batches.ts';
export { combineStateFiles } from './services/StateCombiner.ts';

export { createReport, describeCheck, formatReport, isFullyVerified } from './services/VerificationReport.ts';
export type { BatchCheck, BatchVerification, VerificationReport } from './services/VerificationReport.ts';
