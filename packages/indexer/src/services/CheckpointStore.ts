import type { Checkpoint, ICheckpointRepository, ILogger } from '@ledgerlift/core';
import { createCheckpoint, overrideStartHeight, snapshotCheckpoint, toError } from '@ledgerlift/core';

export interface CheckpointStoreOptions {
  repository: ICheckpointRepository;
  logger: ILogger;
  /** Minimum time between two background saves */
  saveIntervalMs: number;
  now?: () => number;
}

/**
 * Where scanning starts. Only an override moves a stored checkpoint; the
 * other two apply to a new one, in that order.
 */
export interface StartPosition {
  /** Height that replaces where a stored checkpoint resumes */
  override?: number;
  /** Height of a new checkpoint */
  initial?: number;
  /** Chain tip, where a new checkpoint without a height starts */
  latestHeight?: () => Promise<number>;
}

/**
 * Owner of the live checkpoint. Mutations happen synchronously through
 * update(); saves get a deep copy and run one at a time in the background.
 */
export class CheckpointStore {
  private readonly repository: ICheckpointRepository;
  private readonly logger: ILogger;
  private readonly saveIntervalMs: number;
  private readonly now: () => number;
  private readonly current: Checkpoint;

  private dirty = false;
  private lastSaveAt: number;
  private writing: Promise<void> | null = null;
  // Newest snapshot requested while a write was in flight
  private pending: Checkpoint | null = null;
  private lastError: Error | null = null;

  private constructor(options: CheckpointStoreOptions, checkpoint: Checkpoint) {
    this.repository = options.repository;
    this.logger = options.logger.child({ module: 'checkpoint' });
    this.saveIntervalMs = options.saveIntervalMs;
    this.now = options.now ?? (() => Date.now());
    this.current = checkpoint;
    this.lastSaveAt = this.now();
  }

  /**
   * Load the stored checkpoint or start a new one
   */
  static async open(options: CheckpointStoreOptions, start: StartPosition = {}): Promise<CheckpointStore> {
    const stored = await options.repository.load();
    const checkpoint = stored ?? createCheckpoint(await CheckpointStore.firstHeight(start));

    let overridden = false;
    if (stored && start.override !== undefined) {
      overrideStartHeight(checkpoint, start.override);
      overridden = true;
    }

    const store = new CheckpointStore(options, checkpoint);
    store.logger.info(stored ? 'Checkpoint loaded' : 'Checkpoint created', {
      location: options.repository.location,
      lastBlock: checkpoint.lastBlock,
      accounts: checkpoint.dataset.accounts.size,
    });
    // An override must survive a crash before the first merge
    if (overridden) store.dirty = true;
    return store;
  }

  private static async firstHeight(start: StartPosition): Promise<number> {
    const height = start.override ?? start.initial;
    if (height !== undefined) return height;
    if (start.latestHeight) return start.latestHeight();
    throw new Error('A new checkpoint needs a start height');
  }

  /** Live checkpoint; mutate it through update() only */
  get checkpoint(): Readonly<Checkpoint> {
    return this.current;
  }

  /**
   * Apply a synchronous mutation
   */
  update(mutator: (checkpoint: Checkpoint) => void): void {
    mutator(this.current);
    this.dirty = true;
  }

  /**
   * Start a background save when there are changes and the save interval
   * has elapsed. Returns whether a save was requested.
   */
  scheduleSave(): boolean {
    if (!this.dirty || this.now() - this.lastSaveAt < this.saveIntervalMs) {
      return false;
    }
    this.requestSave();
    return true;
  }

  /**
   * Snapshot the checkpoint now and write it behind any save in flight
   */
  requestSave(): void {
    const snapshot = snapshotCheckpoint(this.current);
    this.dirty = false;
    this.lastSaveAt = this.now();

    if (this.writing) {
      this.pending = snapshot;
      return;
    }
    this.writing = this.drain(snapshot);
  }

  /**
   * Write any unsaved change and wait for every save. Rethrows the error
   * of the last failed save.
   */
  async flush(): Promise<void> {
    if (this.dirty) this.requestSave();

    while (this.writing) {
      await this.writing;
    }

    if (this.lastError) {
      const error = this.lastError;
      this.lastError = null;
      throw error;
    }
  }

  private async drain(first: Checkpoint): Promise<void> {
    let next: Checkpoint | null = first;

    while (next) {
      const snapshot: Checkpoint = next;
      try {
        await this.repository.save(snapshot);
        this.lastError = null;
        this.logger.debug('Checkpoint saved', {
          lastHandledBlock: snapshot.lastHandledBlock,
          accounts: snapshot.dataset.accounts.size,
        });
      } catch (error) {
        this.lastError = toError(error);
        this.logger.error('Checkpoint save failed', { error: this.lastError });
      }

      next = this.pending;
      this.pending = null;
    }

    this.writing = null;
  }
}
