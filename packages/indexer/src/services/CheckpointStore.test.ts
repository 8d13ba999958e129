import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createCheckpoint } from '@ledgerlift/core';
import type { Checkpoint } from '@ledgerlift/core';
import { MemoryCheckpointRepository, MemoryLogger } from '@ledgerlift/testing';
import { CheckpointStore } from './CheckpointStore.ts';
import type { StartPosition } from './CheckpointStore.ts';

function storedCheckpoint(): Checkpoint {
  const checkpoint = createCheckpoint(10);
  checkpoint.firstBlock = 10;
  checkpoint.lastBlock = 50;
  checkpoint.lastHandledBlock = 49;
  checkpoint.lastBlockHash = 'h49';
  return checkpoint;
}

describe('CheckpointStore', () => {
  let repository: MemoryCheckpointRepository;
  let logger: MemoryLogger;
  let clock: number;

  const open = (start?: StartPosition) =>
    CheckpointStore.open({ repository, logger, saveIntervalMs: 1_000, now: () => clock }, start);

  beforeEach(() => {
    repository = new MemoryCheckpointRepository();
    logger = new MemoryLogger();
    clock = 0;
  });

  describe('open', () => {
    it('should start a new checkpoint at the requested height', async () => {
      const store = await open({ initial: 100 });

      expect(store.checkpoint.lastBlock).toBe(100);
      expect(store.checkpoint.lastHandledBlock).toBe(99);
      expect(store.checkpoint.firstBlock).toBeNull();
      expect(logger.messages('info')).toEqual(['Checkpoint created']);
    });

    it('should resume a stored checkpoint', async () => {
      repository = new MemoryCheckpointRepository(storedCheckpoint());

      const store = await open();

      expect(store.checkpoint.lastBlock).toBe(50);
      expect(store.checkpoint.lastBlockHash).toBe('h49');
      expect(logger.messages('info')).toEqual(['Checkpoint loaded']);
    });

    it('should apply a start override to a stored checkpoint and persist it', async () => {
      repository = new MemoryCheckpointRepository(storedCheckpoint());

      const store = await open({ override: 5 });
      await store.flush();

      expect(store.checkpoint).toMatchObject({
        firstBlock: 5,
        lastBlock: 5,
        lastHandledBlock: 4,
        lastBlockHash: null,
      });
      expect(repository.saved).toHaveLength(1);
    });
  });

  describe('start position', () => {
    it('should keep the stored position when only an initial height is given', async () => {
      repository = new MemoryCheckpointRepository(storedCheckpoint());

      const store = await open({ initial: 5 });
      await store.flush();

      expect(store.checkpoint.lastBlock).toBe(50);
      expect(store.checkpoint.lastBlockHash).toBe('h49');
      expect(repository.saved).toHaveLength(0);
    });

    it('should start a new checkpoint at the chain tip', async () => {
      const store = await open({ latestHeight: async () => 700 });

      expect(store.checkpoint.lastBlock).toBe(700);
      expect(store.checkpoint.lastHandledBlock).toBe(699);
    });

    it('should prefer the initial height over the chain tip', async () => {
      const latestHeight = vi.fn(async () => 700);

      const store = await open({ initial: 20, latestHeight });

      expect(store.checkpoint.lastBlock).toBe(20);
      expect(latestHeight).not.toHaveBeenCalled();
    });

    it('should not ask for the tip when resuming', async () => {
      repository = new MemoryCheckpointRepository(storedCheckpoint());
      const latestHeight = vi.fn(async () => 700);

      await open({ latestHeight });

      expect(latestHeight).not.toHaveBeenCalled();
    });

    it('should refuse a new checkpoint without a start height', async () => {
      await expect(open()).rejects.toThrow('A new checkpoint needs a start height');
      expect(repository.saved).toHaveLength(0);
    });
  });

  describe('scheduleSave', () => {
    it('should wait for the save interval', async () => {
      const store = await open({ initial: 1 });
      store.update((checkpoint) => {
        checkpoint.dataset.accounts.add('a.near');
      });

      expect(store.scheduleSave()).toBe(false);
      clock = 1_000;
      expect(store.scheduleSave()).toBe(true);
      await store.flush();

      expect(repository.saved).toHaveLength(1);
      expect([...(repository.latest?.dataset.accounts ?? [])]).toEqual(['a.near']);
    });

    it('should not save an unchanged checkpoint', async () => {
      const store = await open({ initial: 1 });
      clock = 5_000;

      expect(store.scheduleSave()).toBe(false);
      await store.flush();

      expect(repository.saved).toHaveLength(0);
    });
  });

  describe('requestSave', () => {
    it('should write one save at a time and keep the newest pending snapshot', async () => {
      const store = await open({ initial: 1 });
      const release = repository.hold();

      for (const height of [2, 3, 4]) {
        store.update((checkpoint) => {
          checkpoint.lastBlock = height;
        });
        store.requestSave();
      }
      release();
      await store.flush();

      expect(repository.saved.map((checkpoint) => checkpoint.lastBlock)).toEqual([2, 4]);
    });

    it('should save a copy taken at request time', async () => {
      const store = await open({ initial: 1 });

      store.update((checkpoint) => {
        checkpoint.dataset.accounts.add('a.near');
      });
      store.requestSave();
      store.update((checkpoint) => {
        checkpoint.dataset.accounts.add('b.near');
      });
      await store.flush();

      expect(repository.saved.map((checkpoint) => [...checkpoint.dataset.accounts])).toEqual([
        ['a.near'],
        ['a.near', 'b.near'],
      ]);
    });
  });

  describe('flush', () => {
    it('should rethrow the last failed save', async () => {
      const store = await open({ initial: 1 });
      repository.failNextSaves(1);

      store.update((checkpoint) => {
        checkpoint.lastBlock = 2;
      });
      await expect(store.flush()).rejects.toThrow('Disk full');
      expect(logger.messages('error')).toEqual(['Checkpoint save failed']);

      store.update((checkpoint) => {
        checkpoint.lastBlock = 3;
      });
      await expect(store.flush()).resolves.toBeUndefined();
      expect(repository.latest?.lastBlock).toBe(3);
    });
  });
});
