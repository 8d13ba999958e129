import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createCheckpoint, mergeBlockResult } from '../../domain/entities/index.ts';
import { CheckpointFormatError } from '../../domain/errors.ts';
import { FileCheckpointRepository } from './FileCheckpointRepository.ts';

describe('FileCheckpointRepository', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ledgerlift-checkpoint-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should return null when no checkpoint was written', async () => {
    const repository = new FileCheckpointRepository(join(dir, 'data.borsh'));

    await expect(repository.load()).resolves.toBeNull();
  });

  it('should read back what it saved', async () => {
    const repository = new FileCheckpointRepository(join(dir, 'nested', 'data.borsh'));
    const checkpoint = createCheckpoint(100);
    mergeBlockResult(checkpoint, {
      height: 100,
      hash: 'h100',
      accounts: ['alice.near', 'aurora'],
      proofs: ['123'],
      actions: [{ method: 'finish_deposit', accounts: ['alice.near'], proof: '123', hash: 'tx1', source: 'receipt' }],
    });
    checkpoint.missedBlocks.add(99);
    checkpoint.preparedBalances.set('alice.near', 5n);

    await repository.save(checkpoint);

    await expect(repository.load()).resolves.toEqual(checkpoint);
    expect(await readdir(join(dir, 'nested'))).toEqual(['data.borsh']);
  });

  it('should replace the previous checkpoint', async () => {
    const repository = new FileCheckpointRepository(join(dir, 'data.borsh'));
    await repository.save(createCheckpoint(1));
    await repository.save(createCheckpoint(2));

    const loaded = await repository.load();
    expect(loaded?.lastBlock).toBe(2);
  });

  it('should refuse a corrupt file', async () => {
    const path = join(dir, 'data.borsh');
    await writeFile(path, Uint8Array.from([9, 9, 9]));

    const repository = new FileCheckpointRepository(path);

    await expect(repository.load()).rejects.toBeInstanceOf(CheckpointFormatError);
  });
});
