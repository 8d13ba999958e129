import type {
  ActionRecord,
  ActionSource,
  BlockScanResult,
  ChainBlock,
  Checkpoint,
  FunctionCallAction,
  IChainClient,
  ILogger,
} from '@ledgerlift/core';
import {
  BlockUnavailableError,
  ChunkUnavailableError,
  mergeBlockResult,
  sleep,
  toError,
} from '@ledgerlift/core';
import type { CheckpointStore } from './CheckpointStore.ts';

/**
 * Indexer options
 */
export interface IndexerOptions {
  client: IChainClient;
  store: CheckpointStore;
  /** Account of the tracked contract */
  contractId: string;
  logger: ILogger;
  /** How long an observed tip stays fresh */
  tipRefreshIntervalMs: number;
  /** Sleep while the next height is above the tip */
  tipBackoffMs: number;
  now?: () => number;
}

/**
 * Result of one scan iteration
 */
export type StepOutcome =
  | { kind: 'merged'; height: number; accounts: number; proofs: number; actions: number }
  | { kind: 'confirmed'; height: number }
  | { kind: 'missed'; height: number; error: Error }
  | { kind: 'reorg'; height: number; anchor: number }
  | { kind: 'paused'; height: number; tip: number }
  | { kind: 'tip-unavailable'; error: Error }
  | { kind: 'abandoned' };

interface ScanSink {
  accounts: Set<string>;
  proofs: Set<string>;
  actions: ActionRecord[];
}

const ABORTED = Symbol('aborted');

/**
 * Block-by-block scanner of the tracked contract. Every merged block leaves
 * the checkpoint consistent, so a crash resumes from the last save.
 */
export class Indexer {
  private readonly client: IChainClient;
  private readonly store: CheckpointStore;
  private readonly contractId: string;
  private readonly logger: ILogger;
  private readonly tipRefreshIntervalMs: number;
  private readonly tipBackoffMs: number;
  private readonly now: () => number;

  private tipObservedAt: number | null = null;
  // Heights whose block loaded but a chunk did not
  private readonly chunkMisses = new Set<number>();
  // Anchor re-fetched with an unchanged hash after a rollback
  private confirmedAnchor: number | null = null;

  private startTime = 0;
  private startHeight = 0;
  private blocksThisSession = 0;

  constructor(options: IndexerOptions) {
    this.client = options.client;
    this.store = options.store;
    this.contractId = options.contractId;
    this.logger = options.logger.child({ module: 'indexer', contract: options.contractId });
    this.tipRefreshIntervalMs = options.tipRefreshIntervalMs;
    this.tipBackoffMs = options.tipBackoffMs;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Scan until the signal aborts, then flush the checkpoint
   */
  async run(signal: AbortSignal): Promise<void> {
    const aborted = new Promise<typeof ABORTED>((resolve) => {
      if (signal.aborted) resolve(ABORTED);
      else signal.addEventListener('abort', () => resolve(ABORTED), { once: true });
    });

    this.startTime = this.now();
    this.startHeight = this.store.checkpoint.lastBlock;
    this.blocksThisSession = 0;

    this.logger.info('Indexing started', {
      from: this.startHeight,
      missedBlocks: this.store.checkpoint.missedBlocks.size,
    });

    try {
      while (!signal.aborted) {
        const iteration = this.step(signal);
        const outcome = await Promise.race([iteration, aborted]);

        if (outcome === ABORTED) {
          // Abandoned iterations check the signal before touching the checkpoint
          iteration.then(
            () => undefined,
            (error: unknown) => this.logger.debug('Abandoned iteration failed', { error: toError(error) })
          );
          break;
        }

        await this.settle(outcome, signal);
      }
    } finally {
      this.logger.clearProgress();
      await this.store.flush();
    }

    const { checkpoint } = this.store;
    this.logger.info('Indexing stopped', {
      lastHandledBlock: checkpoint.lastHandledBlock,
      accounts: checkpoint.dataset.accounts.size,
      proofs: checkpoint.dataset.proofs.size,
      blocks: this.blocksThisSession,
    });
  }

  /**
   * Run one iteration of the scan loop
   */
  async step(signal?: AbortSignal): Promise<StepOutcome> {
    // 1. Tip, only when unknown or stale
    if (this.tipObservedAt === null || this.now() - this.tipObservedAt >= this.tipRefreshIntervalMs) {
      let tip: number;
      try {
        tip = await this.client.latestHeight();
      } catch (error) {
        if (signal?.aborted) return { kind: 'abandoned' };
        return { kind: 'tip-unavailable', error: toError(error) };
      }
      if (signal?.aborted) return { kind: 'abandoned' };

      this.tipObservedAt = this.now();
      this.store.update((checkpoint) => {
        checkpoint.currentBlock = tip;
      });
    }

    // 2. Paused at the tip
    const height = this.store.checkpoint.lastBlock;
    if (height > this.store.checkpoint.currentBlock) {
      return { kind: 'paused', height, tip: this.store.checkpoint.currentBlock };
    }

    // 3. Block
    let block: ChainBlock;
    try {
      block = await this.client.blockAt(height);
    } catch (error) {
      if (signal?.aborted) return { kind: 'abandoned' };
      if (error instanceof BlockUnavailableError) return this.skip(height, error);
      throw error;
    }
    if (signal?.aborted) return { kind: 'abandoned' };

    // 4. Continuity
    const { checkpoint } = this.store;
    if (checkpoint.lastBlockHash !== null) {
      if (height === checkpoint.lastHandledBlock) {
        if (block.hash === checkpoint.lastBlockHash) {
          this.confirmedAnchor = height;
          this.store.update((state) => {
            state.lastBlock = height + 1;
          });
          this.logger.info('Anchor block confirmed', { height, hash: block.hash });
          return { kind: 'confirmed', height };
        }
        this.logger.warn('Anchor block replaced', {
          height,
          previous: checkpoint.lastBlockHash,
          hash: block.hash,
        });
      } else if (block.parentHash !== checkpoint.lastBlockHash) {
        if (this.hasMissedGap(checkpoint, height)) {
          this.logger.warn('Parent hash differs across missed heights, continuing', {
            height,
            anchor: checkpoint.lastHandledBlock,
          });
        } else if (this.confirmedAnchor === checkpoint.lastHandledBlock) {
          this.logger.warn('Parent hash still differs from the confirmed anchor, continuing', {
            height,
            anchor: checkpoint.lastHandledBlock,
          });
        } else {
          const anchor = checkpoint.lastHandledBlock;
          this.store.update((state) => {
            state.lastBlock = state.lastHandledBlock;
          });
          this.logger.warn('Chain reorganization detected, rolling back', {
            height,
            anchor,
            expected: checkpoint.lastBlockHash,
            parentHash: block.parentHash,
          });
          return { kind: 'reorg', height, anchor };
        }
      }
    }

    // 5. Chunks
    let result: BlockScanResult;
    try {
      result = await this.scan(block);
    } catch (error) {
      if (signal?.aborted) return { kind: 'abandoned' };
      if (error instanceof ChunkUnavailableError) {
        this.chunkMisses.add(height);
        return this.skip(height, error);
      }
      throw error;
    }
    if (signal?.aborted) return { kind: 'abandoned' };

    // 6-7. Merge and advance
    this.chunkMisses.delete(height);
    this.confirmedAnchor = null;
    this.store.update((state) => {
      mergeBlockResult(state, result);
      state.missedBlocks = this.unresolvedHeights();
    });

    // 8. Detached save
    this.store.scheduleSave();

    this.blocksThisSession++;
    return {
      kind: 'merged',
      height,
      accounts: result.accounts.length,
      proofs: result.proofs.length,
      actions: result.actions.length,
    };
  }

  private skip(height: number, error: Error): StepOutcome {
    this.store.update((checkpoint) => {
      checkpoint.missedBlocks = this.unresolvedHeights();
      checkpoint.lastBlock = height + 1;
    });
    this.store.scheduleSave();
    return { kind: 'missed', height, error };
  }

  private unresolvedHeights(): Set<number> {
    const heights = new Set(this.client.unresolvedBlocks());
    for (const height of this.chunkMisses) heights.add(height);
    return heights;
  }

  private hasMissedGap(checkpoint: Readonly<Checkpoint>, height: number): boolean {
    for (const missed of checkpoint.missedBlocks) {
      if (missed > checkpoint.lastHandledBlock && missed < height) return true;
    }
    return false;
  }

  private async scan(block: ChainBlock): Promise<BlockScanResult> {
    const sink: ScanSink = { accounts: new Set(), proofs: new Set(), actions: [] };

    for (const header of block.chunks) {
      const chunk = await this.client.chunk(header.chunkHash);

      for (const transaction of chunk.transactions) {
        if (transaction.receiverId !== this.contractId) continue;
        this.collect(sink, transaction.actions, [transaction.signerId], transaction.hash, 'transaction');
      }

      for (const receipt of chunk.receipts) {
        if (receipt.receiverId !== this.contractId) continue;
        // A receipt sent by its own signer is the conversion of a transaction already collected
        if (receipt.predecessorId === receipt.signerId) continue;
        this.collect(
          sink,
          receipt.actions,
          [receipt.signerId, receipt.predecessorId],
          receipt.receiptId,
          'receipt'
        );
      }
    }

    return {
      height: block.height,
      hash: block.hash,
      accounts: [...sink.accounts],
      proofs: [...sink.proofs],
      actions: sink.actions,
    };
  }

  private collect(
    sink: ScanSink,
    actions: readonly FunctionCallAction[],
    origin: readonly string[],
    hash: string,
    source: ActionSource
  ): void {
    for (const action of actions) {
      const parsed = this.client.parseCall(action.methodName, action.args);
      if (parsed.kind !== 'recognized') continue;

      const accounts = [...new Set([...parsed.accounts, ...origin, this.contractId])];
      for (const account of accounts) sink.accounts.add(account);
      if (parsed.proof !== null) sink.proofs.add(parsed.proof);

      sink.actions.push({
        method: parsed.call.method,
        accounts,
        proof: parsed.proof ?? undefined,
        hash,
        source,
      });
    }
  }

  /**
   * Log an outcome and wait where the loop has to back off
   */
  private async settle(outcome: StepOutcome, signal: AbortSignal): Promise<void> {
    switch (outcome.kind) {
      case 'merged':
        if (outcome.actions > 0) {
          this.logger.debug('Block merged', {
            height: outcome.height,
            actions: outcome.actions,
            accounts: outcome.accounts,
            proofs: outcome.proofs,
          });
        } else {
          this.logger.trace('Block merged', { height: outcome.height });
        }
        this.reportProgress();
        break;
      case 'missed':
        this.logger.warn('Block unavailable, skipping', { height: outcome.height, error: outcome.error });
        break;
      case 'paused':
        this.logger.trace('Waiting for the chain tip', { height: outcome.height, tip: outcome.tip });
        await this.pause(this.tipBackoffMs, signal);
        break;
      case 'tip-unavailable':
        this.logger.warn('Failed to fetch the chain tip', { error: outcome.error });
        await this.pause(this.tipBackoffMs, signal);
        break;
      case 'confirmed':
      case 'reorg':
      case 'abandoned':
        break;
    }
  }

  private reportProgress(): void {
    const { lastHandledBlock, currentBlock } = this.store.checkpoint;
    const total = Math.max(1, currentBlock - this.startHeight + 1);
    const current = Math.min(total, lastHandledBlock - this.startHeight + 1);
    const elapsedSeconds = (this.now() - this.startTime) / 1000;

    this.logger.progress({
      phase: 'indexing',
      current,
      total,
      percentage: (current / total) * 100,
      rate: elapsedSeconds > 0 ? this.blocksThisSession / elapsedSeconds : undefined,
      detail: `#${lastHandledBlock}`,
    });
  }

  private async pause(ms: number, signal: AbortSignal): Promise<void> {
    try {
      await sleep(ms, signal);
    } catch (error) {
      if (!signal.aborted) throw error;
    }
  }
}
