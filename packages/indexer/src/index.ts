export { Indexer } from './services/Indexer.ts';
export type { IndexerOptions, StepOutcome } from './services/Indexer.ts';
export { CheckpointStore } from './services/CheckpointStore.ts';
export type { CheckpointStoreOptions, StartPosition } from './services/CheckpointStore.ts';
export { summarizeCheckpoint, describeCheckpoint } from './services/IndexStats.ts';
export type { IndexSummary } from './services/IndexStats.ts';
