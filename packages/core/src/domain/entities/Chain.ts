/**
 * Chunk header as listed in a block
 */
export interface ChunkHeader {
  /** Base58 chunk hash */
  readonly chunkHash: string;
  readonly shardId: number;
}

/**
 * Block entity, reduced to what the scan loop needs
 */
export interface ChainBlock {
  readonly height: number;
  /** Base58 block hash */
  readonly hash: string;
  /** Base58 hash of the previous block */
  readonly parentHash: string;
  readonly chunks: readonly ChunkHeader[];
}

/**
 * Function call action carried by a transaction or an action receipt.
 * Other action kinds are dropped when the chunk is decoded.
 */
export interface FunctionCallAction {
  readonly methodName: string;
  /** Raw call arguments */
  readonly args: Uint8Array;
}

/**
 * Signed transaction included in a chunk
 */
export interface ChainTransaction {
  readonly hash: string;
  readonly signerId: string;
  readonly receiverId: string;
  readonly actions: readonly FunctionCallAction[];
}

/**
 * Action receipt included in a chunk
 */
export interface ChainReceipt {
  readonly receiptId: string;
  readonly predecessorId: string;
  readonly receiverId: string;
  /** Signer of the originating transaction */
  readonly signerId: string;
  readonly actions: readonly FunctionCallAction[];
}

/**
 * Content of one shard chunk
 */
export interface ChunkContent {
  readonly chunkHash: string;
  readonly transactions: readonly ChainTransaction[];
  readonly receipts: readonly ChainReceipt[];
}

/**
 * Execution outcome of a committed transaction
 */
export type TransactionOutcome =
  | { readonly status: 'success'; readonly hash: string; readonly value: Uint8Array }
  | { readonly status: 'failure'; readonly hash: string; readonly reason: string };

/**
 * Create a block, ordering chunks by shard id
 */
export function createChainBlock(data: {
  height: number;
  hash: string;
  parentHash: string;
  chunks: readonly ChunkHeader[];
}): ChainBlock {
  return {
    height: data.height,
    hash: data.hash,
    parentHash: data.parentHash,
    chunks: [...data.chunks].sort((a, b) => a.shardId - b.shardId),
  };
}
