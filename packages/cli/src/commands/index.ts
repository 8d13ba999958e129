import { FileCheckpointRepository, ShutdownSignal } from '@ledgerlift/core';
import { CheckpointStore, Indexer, describeCheckpoint } from '@ledgerlift/indexer';
import type { GlobalOptions } from '../context.ts';
import { createChainClient, indexStartPosition, runCommand } from '../context.ts';

/**
 * Index command options
 */
interface IndexOptions extends GlobalOptions {
  block?: number;
  dataFile?: string;
  contract?: string;
  stat?: boolean;
  fullstat?: boolean;
}

/**
 * Scan the chain for accounts and proofs of the source contract,
 * or print statistics of the checkpoint
 */
export async function indexCommand(options: IndexOptions): Promise<void> {
  await runCommand(
    'Indexing',
    options,
    {
      indexer: { dataFile: options.dataFile },
      contract: options.contract ? { source: options.contract } : undefined,
    },
    async ({ config, logger }) => {
      const repository = new FileCheckpointRepository(config.indexer.dataFile);

      if (options.stat || options.fullstat) {
        const checkpoint = await repository.load();
        if (!checkpoint) {
          throw new Error(`No checkpoint at ${repository.location}`);
        }
        for (const line of describeCheckpoint(checkpoint, { full: options.fullstat })) {
          console.log(line);
        }
        return;
      }

      const shutdown = new ShutdownSignal(logger).install();
      try {
        const tip = createChainClient(config, logger);
        const store = await CheckpointStore.open(
          { repository, logger, saveIntervalMs: config.indexer.saveIntervalMs },
          indexStartPosition(options.block, config, () => tip.latestHeight())
        );
        const indexer = new Indexer({
          client: createChainClient(config, logger, store.checkpoint.missedBlocks),
          store,
          contractId: config.contract.source,
          logger,
          tipRefreshIntervalMs: config.indexer.tipRefreshIntervalMs,
          tipBackoffMs: config.indexer.tipBackoffMs,
        });

        await indexer.run(shutdown.signal);
      } finally {
        shutdown.dispose();
      }
    }
  );
}
