import { readFile } from 'node:fs/promises';
import type { ICheckpointRepository } from '../../application/ports/ICheckpointRepository.ts';
import type { Checkpoint } from '../../domain/entities/index.ts';
import { CheckpointFormatError, toError } from '../../domain/errors.ts';
import { decodeCheckpoint, encodeCheckpoint } from '../codec/CheckpointCodec.ts';
import { atomicWrite, errorCode } from './atomicWrite.ts';

/**
 * Checkpoint kept in one borsh file
 */
export class FileCheckpointRepository implements ICheckpointRepository {
  constructor(readonly location: string) {}

  async load(): Promise<Checkpoint | null> {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(this.location);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return null;
      throw error;
    }

    try {
      return decodeCheckpoint(bytes);
    } catch (error) {
      throw new CheckpointFormatError(this.location, toError(error).message);
    }
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    await atomicWrite(this.location, encodeCheckpoint(checkpoint));
  }
}
