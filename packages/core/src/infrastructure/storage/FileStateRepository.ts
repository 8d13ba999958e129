import { readFile } from 'node:fs/promises';
import type { IStateRepository } from '../../application/ports/IStateRepository.ts';
import type { StateData } from '../../domain/entities/index.ts';
import { AccountCountMismatchError, CheckpointFormatError, toError } from '../../domain/errors.ts';
import { decodeStateData, encodeStateData } from '../codec/StateDataCodec.ts';
import { atomicWrite } from './atomicWrite.ts';

/**
 * Migration-ready ledgers as borsh StateData files
 */
export class FileStateRepository implements IStateRepository {
  async load(path: string): Promise<StateData> {
    const bytes = await readFile(path);
    try {
      return decodeStateData(bytes);
    } catch (error) {
      if (error instanceof AccountCountMismatchError) throw error;
      throw new CheckpointFormatError(path, toError(error).message);
    }
  }

  async save(path: string, state: StateData): Promise<void> {
    await atomicWrite(path, encodeStateData(state));
  }
}
