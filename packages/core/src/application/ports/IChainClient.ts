import type {
  ChainBlock,
  ChunkContent,
  TransactionOutcome,
} from '../../domain/entities/index.ts';
import type { ParsedCall } from '../services/ActionParser.ts';

/**
 * Function call to be signed
 */
export interface UnsignedCall {
  receiverId: string;
  method: string;
  args: Uint8Array;
  gas: bigint;
  nonce: bigint;
  /** Base58 hash of a recent block */
  blockHash: string;
}

/**
 * Signed transaction ready to broadcast
 */
export interface SignedCall {
  /** Base58 transaction hash */
  hash: string;
  encoded: Uint8Array;
}

/**
 * Holder of the single signing credential
 */
export interface ITransactionSigner {
  readonly accountId: string;
  /** Public key in "ed25519:<base58>" form */
  readonly publicKey: string;
  sign(call: UnsignedCall): Promise<SignedCall>;
}

/**
 * Sole point of contact with the chain. Calls are rate limited and issued
 * one at a time.
 */
export interface IChainClient {
  /** Final block height */
  latestHeight(): Promise<number>;

  /**
   * Block at a height. Fails with BlockUnavailableError, never retries.
   */
  blockAt(height: number): Promise<ChainBlock>;

  /**
   * Chunk content. Fails with ChunkUnavailableError.
   */
  chunk(chunkHash: string): Promise<ChunkContent>;

  /**
   * Recognize a contract call. Never throws.
   */
  parseCall(method: string, args: Uint8Array): ParsedCall;

  /**
   * Sign, broadcast and wait for a successful outcome, retrying transient
   * failures. Fails with CommitFailedError once the retry budget is spent.
   */
  commitTransaction(
    signer: ITransactionSigner,
    contractId: string,
    method: string,
    payload: Uint8Array
  ): Promise<TransactionOutcome>;

  /**
   * Read-only call. Fails with ViewCallError unless a call result comes back.
   */
  requestView(contractId: string, method: string, args: Uint8Array): Promise<Uint8Array>;

  /** Heights whose fetch failed and has not succeeded since */
  unresolvedBlocks(): ReadonlySet<number>;
}
