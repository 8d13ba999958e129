import { FileStateRepository, readSnapshotFile, stateFileName } from '@ledgerlift/core';
import type { GlobalOptions } from '../context.ts';
import { runCommand } from '../context.ts';

interface ParseOptions extends GlobalOptions {
  output?: string;
}

/**
 * Decode a storage export into a migration-ready file
 */
export async function parseCommand(snapshot: string, options: ParseOptions): Promise<void> {
  await runCommand('Parsing', options, {}, async ({ logger }) => {
    const decoded = await readSnapshotFile(snapshot);
    const output = options.output ?? stateFileName(decoded.blockHeight);

    await new FileStateRepository().save(output, decoded.state);

    logger.info('Snapshot decoded', {
      height: decoded.blockHeight,
      accounts: decoded.state.accounts.size,
      proofs: decoded.state.proofs.length,
      ignoredKeys: decoded.ignoredKeys,
      output,
    });
  });
}
