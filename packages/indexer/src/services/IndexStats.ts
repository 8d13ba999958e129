import type { Checkpoint } from '@ledgerlift/core';

/**
 * Counters of a checkpoint
 */
export interface IndexSummary {
  firstBlock: number | null;
  lastHandledBlock: number;
  nextBlock: number;
  currentBlock: number;
  /** Heights between the last merge and the observed tip */
  behind: number;
  accounts: number;
  proofs: number;
  actions: number;
  /** Blocks carrying at least one recognized call */
  actionBlocks: number;
  missedBlocks: number;
  preparedBalances: number;
}

export function summarizeCheckpoint(checkpoint: Readonly<Checkpoint>): IndexSummary {
  const { dataset } = checkpoint;

  return {
    firstBlock: checkpoint.firstBlock,
    lastHandledBlock: checkpoint.lastHandledBlock,
    nextBlock: checkpoint.lastBlock,
    currentBlock: checkpoint.currentBlock,
    behind: Math.max(0, checkpoint.currentBlock - checkpoint.lastHandledBlock),
    accounts: dataset.accounts.size,
    proofs: dataset.proofs.size,
    actions: dataset.logs.reduce((total, group) => total + group.actions.length, 0),
    actionBlocks: dataset.logs.length,
    missedBlocks: checkpoint.missedBlocks.size,
    preparedBalances: checkpoint.preparedBalances.size,
  };
}

/**
 * Printable report of a checkpoint. The full report adds the missed
 * heights, the accounts and the proofs.
 */
export function describeCheckpoint(checkpoint: Readonly<Checkpoint>, options: { full?: boolean } = {}): string[] {
  const summary = summarizeCheckpoint(checkpoint);

  const lines = [
    `First block: ${summary.firstBlock ?? '-'}`,
    `Last handled block: ${summary.lastHandledBlock}`,
    `Next block: ${summary.nextBlock}`,
    `Chain tip: ${summary.currentBlock} (${summary.behind} behind)`,
    `Accounts: ${summary.accounts}`,
    `Proofs: ${summary.proofs}`,
    `Actions: ${summary.actions} in ${summary.actionBlocks} blocks`,
    `Missed blocks: ${summary.missedBlocks}`,
    `Prepared balances: ${summary.preparedBalances}`,
  ];

  if (!options.full) return lines;

  const missed = [...checkpoint.missedBlocks].sort((a, b) => a - b);
  lines.push(`Missed heights: ${missed.length > 0 ? missed.join(', ') : '-'}`);

  lines.push('Account list:');
  for (const account of [...checkpoint.dataset.accounts].sort()) {
    lines.push(`  ${account}`);
  }

  lines.push('Proof list:');
  for (const proof of [...checkpoint.dataset.proofs].sort()) {
    lines.push(`  ${proof}`);
  }

  return lines;
}
