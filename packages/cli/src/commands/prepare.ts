import { FileCheckpointRepository, FileStateRepository, ShutdownSignal, stateFileName } from '@ledgerlift/core';
import { CheckpointStore } from '@ledgerlift/indexer';
import { MigrationPreparer } from '@ledgerlift/migration';
import type { GlobalOptions } from '../context.ts';
import { createChainClient, runCommand } from '../context.ts';

interface PrepareOptions extends GlobalOptions {
  dataFile?: string;
  contract?: string;
  output?: string;
}

/**
 * Query balances of every indexed account and write a migration-ready file
 */
export async function prepareCommand(options: PrepareOptions): Promise<void> {
  await runCommand(
    'Preparing',
    options,
    {
      indexer: options.dataFile ? { dataFile: options.dataFile } : undefined,
      contract: options.contract ? { source: options.contract } : undefined,
    },
    async ({ config, logger }) => {
      const repository = new FileCheckpointRepository(config.indexer.dataFile);
      if (!(await repository.load())) {
        throw new Error(`No checkpoint at ${repository.location}, run the indexer first`);
      }

      const shutdown = new ShutdownSignal(logger).install();
      try {
        const store = await CheckpointStore.open({
          repository,
          logger,
          saveIntervalMs: config.indexer.saveIntervalMs,
        });
        const preparer = new MigrationPreparer({
          client: createChainClient(config, logger),
          store,
          contractId: config.contract.source,
          logger,
        });

        const state = await preparer.prepare(shutdown.signal);
        const output = options.output ?? stateFileName(store.checkpoint.lastHandledBlock);
        await new FileStateRepository().save(output, state);
        logger.info('Migration file written', { output });
      } finally {
        shutdown.dispose();
      }
    }
  );
}
