import { FileStateRepository, NearTransactionSigner } from '@ledgerlift/core';
import type { ITransactionSigner } from '@ledgerlift/core';
import { MigrationExecutor, formatReport, isFullyVerified } from '@ledgerlift/migration';
import type { GlobalOptions } from '../context.ts';
import { createChainClient, runCommand } from '../context.ts';

/**
 * Migrate command options
 */
interface MigrateOptions extends GlobalOptions {
  checkOnly?: boolean;
  target?: string;
  account?: string;
  key?: string;
  keyFile?: string;
}

async function loadSigner(options: MigrateOptions, networkId: string): Promise<ITransactionSigner> {
  if (options.keyFile) {
    return NearTransactionSigner.fromKeyFile(options.keyFile, networkId);
  }
  if (options.account && options.key) {
    return new NearTransactionSigner(options.account, options.key, networkId);
  }
  throw new Error('Provide --key-file, or --account with --key');
}

/**
 * Replay a migration-ready file into the target contract and verify it,
 * or only verify with --check-only
 */
export async function migrateCommand(file: string, options: MigrateOptions): Promise<void> {
  await runCommand(
    'Migration',
    options,
    {},
    async ({ config, logger }) => {
      const target = options.target ?? config.contract.target;
      if (!target) {
        throw new Error('No target contract, set contract.target or pass --target');
      }

      const state = await new FileStateRepository().load(file);
      const executor = new MigrationExecutor({
        client: createChainClient(config, logger),
        signer: options.checkOnly ? undefined : await loadSigner(options, config.network.id),
        contractId: target,
        batchSize: config.migration.batchSize,
        logger,
      });

      const report = options.checkOnly ? await executor.verify(state) : await executor.migrate(state);

      for (const line of formatReport(report)) {
        console.log(line);
      }
      if (!isFullyVerified(report)) {
        logger.warn('Verification found problems');
        process.exitCode = 1;
      }
    }
  );
}
