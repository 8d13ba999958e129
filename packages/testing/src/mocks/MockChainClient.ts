import {
  BlockUnavailableError,
  ChunkUnavailableError,
  CommitFailedError,
  ViewCallError,
  createChainBlock,
  decodeMigrationInput,
  encodeCheckResult,
  parseCall,
} from '@ledgerlift/core';
import type {
  ChainBlock,
  ChainReceipt,
  ChainTransaction,
  ChunkContent,
  IChainClient,
  ITransactionSigner,
  ParsedCall,
  SignedCall,
  TransactionOutcome,
  UnsignedCall,
} from '@ledgerlift/core';
import type { TargetContractEmulator } from './TargetContractEmulator.ts';

export interface MockBlockOptions {
  height: number;
  /** Defaults to `h<height>` */
  hash?: string;
  /** Defaults to the hash of the closest block below */
  parentHash?: string;
  transactions?: ChainTransaction[];
  receipts?: ChainReceipt[];
}

export interface CommittedCall {
  signerId: string;
  contractId: string;
  method: string;
  payload: Uint8Array;
}

type ViewHandler = (args: Uint8Array) => Uint8Array;

/**
 * In-memory chain for indexer and migration tests. Every block carries one
 * chunk; heights never added behave as skipped heights.
 */
export class MockChainClient implements IChainClient {
  /** Method name and clock time of every call */
  readonly calls: { method: string; at: number }[] = [];
  readonly committed: CommittedCall[] = [];

  private tip = 0;
  private readonly blocks = new Map<number, ChainBlock>();
  private readonly chunks = new Map<string, ChunkContent>();
  private readonly failingBlocks = new Set<number>();
  private readonly failingChunks = new Set<string>();
  private readonly missedBlocks: Set<number>;
  private readonly views = new Map<string, ViewHandler>();
  private readonly target: TargetContractEmulator | null;
  private tipFailures = 0;
  private commitFailures = 0;

  constructor(options: { target?: TargetContractEmulator; unresolvedBlocks?: Iterable<number> } = {}) {
    this.target = options.target ?? null;
    this.missedBlocks = new Set(options.unresolvedBlocks ?? []);
  }

  /**
   * Add or replace the block at a height
   */
  addBlock(options: MockBlockOptions): ChainBlock {
    const hash = options.hash ?? `h${options.height}`;
    const chunkHash = `c${options.height}-${hash}`;
    const block = createChainBlock({
      height: options.height,
      hash,
      parentHash: options.parentHash ?? this.previousHash(options.height),
      chunks: [{ chunkHash, shardId: 0 }],
    });

    this.blocks.set(options.height, block);
    this.chunks.set(chunkHash, {
      chunkHash,
      transactions: options.transactions ?? [],
      receipts: options.receipts ?? [],
    });
    this.tip = Math.max(this.tip, options.height);
    return block;
  }

  /**
   * Add empty blocks over an inclusive range
   */
  addBlocks(from: number, to: number): void {
    for (let height = from; height <= to; height++) {
      this.addBlock({ height });
    }
  }

  setTip(height: number): void {
    this.tip = height;
  }

  failBlock(height: number): void {
    this.failingBlocks.add(height);
  }

  healBlock(height: number): void {
    this.failingBlocks.delete(height);
  }

  failChunkOf(height: number): void {
    const block = this.blocks.get(height);
    for (const chunk of block?.chunks ?? []) {
      this.failingChunks.add(chunk.chunkHash);
    }
  }

  failNextTipRequests(count: number): void {
    this.tipFailures = count;
  }

  failNextCommits(count: number): void {
    this.commitFailures = count;
  }

  setView(contractId: string, method: string, handler: ViewHandler): void {
    this.views.set(`${contractId}.${method}`, handler);
  }

  async latestHeight(): Promise<number> {
    this.record('latestHeight');
    if (this.tipFailures > 0) {
      this.tipFailures--;
      throw new Error('Tip request failed');
    }
    return this.tip;
  }

  async blockAt(height: number): Promise<ChainBlock> {
    this.record('blockAt');
    const block = this.blocks.get(height);
    if (!block || this.failingBlocks.has(height)) {
      this.missedBlocks.add(height);
      throw new BlockUnavailableError(height);
    }
    this.missedBlocks.delete(height);
    return block;
  }

  async chunk(chunkHash: string): Promise<ChunkContent> {
    this.record('chunk');
    const chunk = this.chunks.get(chunkHash);
    if (!chunk || this.failingChunks.has(chunkHash)) {
      throw new ChunkUnavailableError(chunkHash);
    }
    return chunk;
  }

  parseCall(method: string, args: Uint8Array): ParsedCall {
    return parseCall(method, args);
  }

  async commitTransaction(
    signer: ITransactionSigner,
    contractId: string,
    method: string,
    payload: Uint8Array
  ): Promise<TransactionOutcome> {
    this.record('commitTransaction');
    if (this.commitFailures > 0) {
      this.commitFailures--;
      throw new CommitFailedError(contractId, method, 11);
    }

    if (this.target && contractId === this.target.accountId && method === 'migrate') {
      this.target.migrate(decodeMigrationInput(payload));
    }
    this.committed.push({ signerId: signer.accountId, contractId, method, payload });

    return { status: 'success', hash: `tx${this.committed.length}`, value: new Uint8Array() };
  }

  async requestView(contractId: string, method: string, args: Uint8Array): Promise<Uint8Array> {
    this.record('requestView');
    if (this.target && contractId === this.target.accountId && method === 'check_migration_correctness') {
      return encodeCheckResult(this.target.check(decodeMigrationInput(args)));
    }

    const handler = this.views.get(`${contractId}.${method}`);
    if (!handler) {
      throw new ViewCallError(contractId, method, 'MethodNotFound');
    }
    return handler(args);
  }

  unresolvedBlocks(): ReadonlySet<number> {
    return this.missedBlocks;
  }

  private previousHash(height: number): string {
    for (let below = height - 1; below >= 0; below--) {
      const block = this.blocks.get(below);
      if (block) return block.hash;
    }
    return `h${height - 1}`;
  }

  private record(method: string): void {
    this.calls.push({ method, at: Date.now() });
  }
}

/**
 * Signer that produces deterministic fake signatures
 */
export function createTestSigner(accountId = 'relayer.testnet'): ITransactionSigner {
  return {
    accountId,
    publicKey: 'ed25519:placeholder',
    async sign(call: UnsignedCall): Promise<SignedCall> {
      return { hash: `signed-${call.method}-${call.nonce}`, encoded: call.args };
    },
  };
}
