import { serialize } from 'borsh';
import { z } from 'zod';
import { deserializeExact } from '../../application/services/borsh.ts';
import type { ActionRecord, Checkpoint } from '../../domain/entities/index.ts';
import { CHECKPOINT_VERSION } from '../../domain/entities/index.ts';
import { checkpointSchema } from './schemas.ts';

const height = z.bigint().transform((value) => Number(value));

const decodedCheckpoint = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  first_block: height.nullable(),
  last_block: height,
  last_handled_block: height,
  current_block: height,
  last_block_hash: z.string().nullable(),
  missed_blocks: z.set(height),
  accounts: z.set(z.string()),
  proofs: z.set(z.string()),
  logs: z.array(
    z.object({
      height,
      actions: z.array(
        z.object({
          method: z.string(),
          accounts: z.array(z.string()),
          proof: z.string().nullable(),
          hash: z.string(),
          source: z.union([z.literal(0), z.literal(1)]),
        })
      ),
    })
  ),
  prepared_balances: z.map(z.string(), z.bigint()),
});

/**
 * Encode a checkpoint into its private binary format
 */
export function encodeCheckpoint(checkpoint: Checkpoint): Uint8Array {
  return serialize(checkpointSchema, {
    version: checkpoint.version,
    first_block: checkpoint.firstBlock,
    last_block: checkpoint.lastBlock,
    last_handled_block: checkpoint.lastHandledBlock,
    current_block: checkpoint.currentBlock,
    last_block_hash: checkpoint.lastBlockHash,
    missed_blocks: checkpoint.missedBlocks,
    accounts: checkpoint.dataset.accounts,
    proofs: checkpoint.dataset.proofs,
    logs: checkpoint.dataset.logs.map((group) => ({
      height: group.height,
      actions: group.actions.map((action) => ({
        method: action.method,
        accounts: [...action.accounts],
        proof: action.proof ?? null,
        hash: action.hash,
        source: action.source === 'transaction' ? 0 : 1,
      })),
    })),
    prepared_balances: checkpoint.preparedBalances,
  });
}

/**
 * Decode a checkpoint. Throws when the bytes are not a checkpoint of the
 * current version.
 */
export function decodeCheckpoint(bytes: Uint8Array): Checkpoint {
  const raw = decodedCheckpoint.parse(deserializeExact(checkpointSchema, bytes));

  return {
    version: raw.version,
    firstBlock: raw.first_block,
    lastBlock: raw.last_block,
    lastHandledBlock: raw.last_handled_block,
    currentBlock: raw.current_block,
    lastBlockHash: raw.last_block_hash,
    missedBlocks: raw.missed_blocks,
    dataset: {
      accounts: raw.accounts,
      proofs: raw.proofs,
      logs: raw.logs.map((group) => ({
        height: group.height,
        actions: group.actions.map((action): ActionRecord => ({
          method: action.method,
          accounts: action.accounts,
          ...(action.proof !== null ? { proof: action.proof } : {}),
          hash: action.hash,
          source: action.source === 0 ? 'transaction' : 'receipt',
        })),
      })),
    },
    preparedBalances: raw.prepared_balances,
  };
}
