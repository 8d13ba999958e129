import type { ILogger, IStateRepository, StateData } from '@ledgerlift/core';
import { mergeStateData } from '@ledgerlift/core';

/**
 * Merge two migration-ready files into a third. The second file wins on
 * account conflicts and for the totals; proofs are unioned.
 */
export async function combineStateFiles(
  repository: IStateRepository,
  files: { first: string; second: string; output: string },
  logger: ILogger
): Promise<StateData> {
  const older = await repository.load(files.first);
  const newer = await repository.load(files.second);
  const combined = mergeStateData(older, newer);

  await repository.save(files.output, combined);
  logger.info('State files combined', {
    module: 'combine',
    first: older.accounts.size,
    second: newer.accounts.size,
    accounts: combined.accounts.size,
    proofs: combined.proofs.length,
    output: files.output,
  });
  return combined;
}
