// Chain entities
export type {
  ChainBlock,
  ChunkHeader,
  ChunkContent,
  ChainTransaction,
  ChainReceipt,
  FunctionCallAction,
  TransactionOutcome,
} from './Chain.ts';
export { createChainBlock } from './Chain.ts';

// Checkpoint entities
export type {
  Checkpoint,
  Dataset,
  ActionRecord,
  ActionSource,
  ActionLogGroup,
  BlockScanResult,
} from './Checkpoint.ts';
export {
  CHECKPOINT_VERSION,
  createCheckpoint,
  createDataset,
  snapshotCheckpoint,
  overrideStartHeight,
  mergeBlockResult,
} from './Checkpoint.ts';

// Ledger entities
export type { ContractTotals, StateData } from './StateData.ts';
export { EMPTY_TOTALS, createStateData, mergeStateData, totalBalance } from './StateData.ts';

// Migration entities
export type {
  MigrationInput,
  MigrationBatch,
  MigrationBatchKind,
  MigrationCheckResult,
} from './Migration.ts';
export { mismatchCount } from './Migration.ts';
