import type { IChainClient, ITransactionSigner } from '../../application/ports/IChainClient.ts';
import type { CallFunctionResult, IChainRpc } from '../../application/ports/IChainRpc.ts';
import type { ILogger } from '../../application/ports/ILogger.ts';
import type { ParsedCall } from '../../application/services/ActionParser.ts';
import { parseCall } from '../../application/services/ActionParser.ts';
import type { ChainBlock, ChunkContent, TransactionOutcome } from '../../domain/entities/index.ts';
import {
  BlockUnavailableError,
  ChunkUnavailableError,
  CommitFailedError,
  TransactionFailedError,
  ViewCallError,
  toError,
} from '../../domain/errors.ts';
import { RateLimiter } from './RateLimiter.ts';
import { RetriesExhaustedError, withRetry } from './retry.ts';

/** One TGas in gas units */
export const TGAS = 1_000_000_000_000n;

export interface ChainClientOptions {
  rpc: IChainRpc;
  logger: ILogger;
  /** Minimum gap between two remote calls */
  requestDelayMs: number;
  /** Retries of a commit after the first attempt */
  commitRetries: number;
  /** Pause between two commit attempts */
  commitRetryDelayMs: number;
  /** Gas attached to every committed call, in TGas */
  gasTera: number;
  /** Heights that failed in an earlier run */
  unresolvedBlocks?: Iterable<number>;
}

/**
 * Rate-limited access to the chain for both the indexer and the migration
 */
export class ChainClient implements IChainClient {
  private readonly rpc: IChainRpc;
  private readonly logger: ILogger;
  private readonly limiter: RateLimiter;
  private readonly commitRetries: number;
  private readonly commitRetryDelayMs: number;
  private readonly gas: bigint;
  private readonly missedBlocks: Set<number>;
  // Last nonce signed per access key; the node's view can lag behind it
  private readonly lastNonces = new Map<string, bigint>();

  constructor(options: ChainClientOptions) {
    this.rpc = options.rpc;
    this.logger = options.logger.child({ module: 'chain' });
    this.limiter = new RateLimiter(options.requestDelayMs);
    this.commitRetries = options.commitRetries;
    this.commitRetryDelayMs = options.commitRetryDelayMs;
    this.gas = BigInt(options.gasTera) * TGAS;
    this.missedBlocks = new Set(options.unresolvedBlocks ?? []);
  }

  async latestHeight(): Promise<number> {
    const block = await this.limiter.schedule(() => this.rpc.block({ finality: 'final' }));
    return block.height;
  }

  async blockAt(height: number): Promise<ChainBlock> {
    try {
      const block = await this.limiter.schedule(() => this.rpc.block({ height }));
      this.missedBlocks.delete(height);
      return block;
    } catch (error) {
      this.missedBlocks.add(height);
      throw new BlockUnavailableError(height, toError(error));
    }
  }

  async chunk(chunkHash: string): Promise<ChunkContent> {
    try {
      return await this.limiter.schedule(() => this.rpc.chunk(chunkHash));
    } catch (error) {
      throw new ChunkUnavailableError(chunkHash, toError(error));
    }
  }

  parseCall(method: string, args: Uint8Array): ParsedCall {
    const parsed = parseCall(method, args);
    if (parsed.kind === 'malformed') {
      this.logger.warn('Failed to parse call arguments', { method: parsed.method, reason: parsed.reason });
    }
    return parsed;
  }

  async commitTransaction(
    signer: ITransactionSigner,
    contractId: string,
    method: string,
    payload: Uint8Array
  ): Promise<TransactionOutcome> {
    // Hash of a transaction whose broadcast errored; it may still have landed
    let pendingHash: string | null = null;

    const attempt = async (): Promise<TransactionOutcome> => {
      if (pendingHash !== null) {
        const landed = await this.lookupTransaction(pendingHash, signer.accountId);
        pendingHash = null;
        if (landed?.status === 'success') return landed;
      }

      const accessKey = await this.limiter.schedule(() =>
        this.rpc.viewAccessKey(signer.accountId, signer.publicKey)
      );
      const keyId = `${signer.accountId}:${signer.publicKey}`;
      const lastNonce = this.lastNonces.get(keyId) ?? 0n;
      const nonce = (accessKey.nonce > lastNonce ? accessKey.nonce : lastNonce) + 1n;
      const signed = await signer.sign({
        receiverId: contractId,
        method,
        args: payload,
        gas: this.gas,
        nonce,
        blockHash: accessKey.blockHash,
      });
      this.lastNonces.set(keyId, nonce);

      let outcome: TransactionOutcome;
      try {
        outcome = await this.limiter.schedule(() => this.rpc.broadcastTxCommit(signed.encoded));
      } catch (error) {
        pendingHash = signed.hash;
        throw error;
      }

      if (outcome.status === 'failure') {
        throw new TransactionFailedError(outcome.hash, outcome.reason);
      }
      return outcome;
    };

    try {
      const outcome = await withRetry(attempt, {
        retries: this.commitRetries,
        delayMs: this.commitRetryDelayMs,
        onRetry: (error, attemptNumber) =>
          this.logger.warn('Commit attempt failed, retrying', {
            contract: contractId,
            method,
            attempt: attemptNumber,
            error: toError(error),
          }),
      });
      this.logger.debug('Transaction committed', { contract: contractId, method, txHash: outcome.hash });
      return outcome;
    } catch (error) {
      if (error instanceof RetriesExhaustedError) {
        throw new CommitFailedError(contractId, method, error.attempts, toError(error.lastError));
      }
      throw error;
    }
  }

  async requestView(contractId: string, method: string, args: Uint8Array): Promise<Uint8Array> {
    let result: CallFunctionResult;
    try {
      result = await this.limiter.schedule(() => this.rpc.callFunction(contractId, method, args));
    } catch (error) {
      throw new ViewCallError(contractId, method, toError(error).message);
    }

    if (result.kind !== 'call-result') {
      throw new ViewCallError(contractId, method, result.error);
    }
    return result.result;
  }

  unresolvedBlocks(): ReadonlySet<number> {
    return this.missedBlocks;
  }

  /**
   * Status of an earlier broadcast, or null when the node does not know it
   */
  private async lookupTransaction(txHash: string, senderId: string): Promise<TransactionOutcome | null> {
    try {
      return await this.limiter.schedule(() => this.rpc.txStatus(txHash, senderId));
    } catch (error) {
      this.logger.debug('Earlier broadcast not found', { txHash, error: toError(error) });
      return null;
    }
  }
}
