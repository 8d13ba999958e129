import type { Checkpoint } from '../../domain/entities/index.ts';

/**
 * Persistence of the indexer checkpoint
 */
export interface ICheckpointRepository {
  /** Where the checkpoint lives, for logs */
  readonly location: string;

  /**
   * Load the checkpoint, or null when none was ever written.
   * A present but unreadable checkpoint is an error.
   */
  load(): Promise<Checkpoint | null>;

  /**
   * Replace the stored checkpoint with a complete snapshot
   */
  save(checkpoint: Checkpoint): Promise<void>;
}
