export { Logger, createLogger } from './logging/Logger.ts';

export * from './codec/index.ts';

export { NearRpcClient } from './near/NearRpcClient.ts';
export { NearTransactionSigner } from './near/NearTransactionSigner.ts';
export { ChainClient, TGAS } from './near/ChainClient.ts';
export type { ChainClientOptions } from './near/ChainClient.ts';
export { RateLimiter } from './near/RateLimiter.ts';
export { RetriesExhaustedError, sleep, withRetry } from './near/retry.ts';
export type { RetryOptions } from './near/retry.ts';

export { FileCheckpointRepository } from './storage/FileCheckpointRepository.ts';
export { FileStateRepository } from './storage/FileStateRepository.ts';
export { atomicWrite } from './storage/atomicWrite.ts';

export { ShutdownSignal, SHUTDOWN_SIGNALS } from './process/ShutdownSignal.ts';

export { SnapshotAccumulator, SnapshotDecoder, classifyStorageKey, stateFileName } from './snapshot/SnapshotDecoder.ts';
export type { DecodedSnapshot, SnapshotEntry, StorageKey } from './snapshot/SnapshotDecoder.ts';
export { readSnapshotFile } from './snapshot/readSnapshotFile.ts';
