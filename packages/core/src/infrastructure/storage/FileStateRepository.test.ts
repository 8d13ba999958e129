import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createStateData } from '../../domain/entities/index.ts';
import { CheckpointFormatError } from '../../domain/errors.ts';
import { FileStateRepository } from './FileStateRepository.ts';

describe('FileStateRepository', () => {
  let dir: string;
  const repository = new FileStateRepository();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ledgerlift-state-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read back what it saved', async () => {
    const path = join(dir, 'contract_state7.borsh');
    const state = createStateData({
      contractData: { totalEthSupplyOnNear: 30n, totalEthSupplyOnAurora: 4n, accountStorageUsage: 128n },
      accounts: new Map([
        ['bob.near', 20n],
        ['alice.near', 10n],
      ]),
      accountsCounter: 2n,
      proofs: ['p1'],
    });

    await repository.save(path, state);
    const loaded = await repository.load(path);

    expect([...loaded.accounts]).toEqual([
      ['alice.near', 10n],
      ['bob.near', 20n],
    ]);
    expect(loaded.contractData).toEqual(state.contractData);
    expect(loaded.proofs).toEqual(['p1']);
  });

  it('should refuse bytes that are not a ledger', async () => {
    const path = join(dir, 'broken.borsh');
    await writeFile(path, Uint8Array.from([1, 2, 3]));

    await expect(repository.load(path)).rejects.toBeInstanceOf(CheckpointFormatError);
  });

  it('should fail when the file is missing', async () => {
    await expect(repository.load(join(dir, 'missing.borsh'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
