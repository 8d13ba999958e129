import type {
  ChainBlock,
  ChunkContent,
  TransactionOutcome,
} from '../../domain/entities/index.ts';

/**
 * Block reference accepted by the node
 */
export type BlockReference = { height: number } | { finality: 'final' | 'optimistic' };

/**
 * Access key state needed to sign a transaction
 */
export interface AccessKeyView {
  nonce: bigint;
  /** Base58 hash of the block the key was read at */
  blockHash: string;
}

/**
 * Result of a read-only contract call. Anything other than a call result
 * (an error string returned in place of the bytes) is reported as 'error'.
 */
export type CallFunctionResult =
  | { kind: 'call-result'; result: Uint8Array; blockHeight: number }
  | { kind: 'error'; error: string };

/**
 * The request shapes the tool needs from a NEAR node.
 * Any endpoint exposing them can stand in for the live node.
 */
export interface IChainRpc {
  /** Endpoint description, for logs */
  readonly url: string;

  /** Block by height or finality */
  block(reference: BlockReference): Promise<ChainBlock>;

  /** Chunk by hash */
  chunk(chunkHash: string): Promise<ChunkContent>;

  /** Status of a transaction already sent */
  txStatus(txHash: string, senderId: string): Promise<TransactionOutcome>;

  /** Current nonce of an access key */
  viewAccessKey(accountId: string, publicKey: string): Promise<AccessKeyView>;

  /** Broadcast a signed transaction and wait for its final outcome */
  broadcastTxCommit(signedTransaction: Uint8Array): Promise<TransactionOutcome>;

  /** Read-only contract call at final finality */
  callFunction(contractId: string, method: string, args: Uint8Array): Promise<CallFunctionResult>;
}
