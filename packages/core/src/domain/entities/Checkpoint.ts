/**
 * Persisted checkpoint format version
 */
export const CHECKPOINT_VERSION = 1;

/**
 * Origin of a recognized contract call
 */
export type ActionSource = 'transaction' | 'receipt';

/**
 * Audit record for one recognized contract call
 */
export interface ActionRecord {
  readonly method: string;
  /** Affected account ids, signer and contract included */
  readonly accounts: readonly string[];
  readonly proof?: string;
  /** Hash of the transaction or id of the receipt */
  readonly hash: string;
  readonly source: ActionSource;
}

/**
 * Recognized calls of one block
 */
export interface ActionLogGroup {
  readonly height: number;
  readonly actions: readonly ActionRecord[];
}

/**
 * Accumulated indexing output
 */
export interface Dataset {
  accounts: Set<string>;
  proofs: Set<string>;
  /** Ordered by height, at most one group per height */
  logs: ActionLogGroup[];
}

/**
 * Resume state of the indexer
 */
export interface Checkpoint {
  version: number;
  /** First height ever merged, absent until the first merge */
  firstBlock: number | null;
  /** Next height to attempt */
  lastBlock: number;
  /** Last height successfully merged */
  lastHandledBlock: number;
  /** Last observed chain tip */
  currentBlock: number;
  /** Hash of the block at lastHandledBlock */
  lastBlockHash: string | null;
  missedBlocks: Set<number>;
  dataset: Dataset;
  /** Balances already fetched while preparing an indexed migration */
  preparedBalances: Map<string, bigint>;
}

/**
 * Output of scanning one block
 */
export interface BlockScanResult {
  readonly height: number;
  readonly hash: string;
  readonly accounts: readonly string[];
  readonly proofs: readonly string[];
  readonly actions: readonly ActionRecord[];
}

export function createDataset(): Dataset {
  return { accounts: new Set(), proofs: new Set(), logs: [] };
}

/**
 * Default-initialized checkpoint, starting at the given height
 */
export function createCheckpoint(startBlock = 0): Checkpoint {
  return {
    version: CHECKPOINT_VERSION,
    firstBlock: null,
    lastBlock: startBlock,
    lastHandledBlock: startBlock > 0 ? startBlock - 1 : 0,
    currentBlock: 0,
    lastBlockHash: null,
    missedBlocks: new Set(),
    dataset: createDataset(),
    preparedBalances: new Map(),
  };
}

/**
 * Deep copy of a checkpoint, safe to hand to a background writer
 */
export function snapshotCheckpoint(checkpoint: Checkpoint): Checkpoint {
  return structuredClone(checkpoint);
}

/**
 * Restart scanning at an explicit height. The continuity anchor is dropped
 * and firstBlock may move down to the new height.
 */
export function overrideStartHeight(checkpoint: Checkpoint, height: number): void {
  checkpoint.lastBlock = height;
  checkpoint.lastHandledBlock = Math.max(0, height - 1);
  checkpoint.lastBlockHash = null;
  if (checkpoint.firstBlock !== null && height < checkpoint.firstBlock) {
    checkpoint.firstBlock = height;
  }
}

/**
 * Merge the scan result of one block into the checkpoint.
 * Re-merging a height replaces its log group instead of duplicating it.
 */
export function mergeBlockResult(checkpoint: Checkpoint, result: BlockScanResult): void {
  const { dataset } = checkpoint;

  for (const account of result.accounts) dataset.accounts.add(account);
  for (const proof of result.proofs) dataset.proofs.add(proof);

  const existing = dataset.logs.findIndex((group) => group.height === result.height);
  if (existing !== -1) {
    if (result.actions.length > 0) {
      dataset.logs[existing] = { height: result.height, actions: result.actions };
    } else {
      dataset.logs.splice(existing, 1);
    }
  } else if (result.actions.length > 0) {
    const insertAt = dataset.logs.findIndex((group) => group.height > result.height);
    const group = { height: result.height, actions: result.actions };
    if (insertAt === -1) {
      dataset.logs.push(group);
    } else {
      dataset.logs.splice(insertAt, 0, group);
    }
  }

  if (checkpoint.firstBlock === null) {
    checkpoint.firstBlock = result.height;
  }
  checkpoint.lastBlock = result.height + 1;
  checkpoint.lastHandledBlock = result.height;
  checkpoint.lastBlockHash = result.hash;
}
