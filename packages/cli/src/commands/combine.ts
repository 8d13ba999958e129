import { FileStateRepository } from '@ledgerlift/core';
import { combineStateFiles } from '@ledgerlift/migration';
import type { GlobalOptions } from '../context.ts';
import { runCommand } from '../context.ts';

interface CombineOptions extends GlobalOptions {
  output: string;
}

/**
 * Merge two migration-ready files, the second one winning on conflicts
 */
export async function combineCommand(first: string, second: string, options: CombineOptions): Promise<void> {
  await runCommand('Combining', options, {}, async ({ logger }) => {
    await combineStateFiles(new FileStateRepository(), { first, second, output: options.output }, logger);
  });
}
