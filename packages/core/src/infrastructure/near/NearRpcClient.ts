import { getHttpRpcClient } from 'viem/utils';
import { z } from 'zod';
import type {
  AccessKeyView,
  BlockReference,
  CallFunctionResult,
  IChainRpc,
} from '../../application/ports/IChainRpc.ts';
import type {
  ChainBlock,
  ChainReceipt,
  ChainTransaction,
  ChunkContent,
  FunctionCallAction,
  TransactionOutcome,
} from '../../domain/entities/index.ts';
import { createChainBlock } from '../../domain/entities/index.ts';
import { RpcRequestError } from '../../domain/errors.ts';

// ============================================================================
// Response Schemas
// ============================================================================

const rpcErrorSchema = z.object({
  name: z.string().optional(),
  cause: z.object({ name: z.string() }).passthrough().optional(),
  message: z.string().optional(),
  data: z.unknown().optional(),
});

const rpcResponseSchema = z.union([
  z.object({ error: rpcErrorSchema }),
  z.object({ result: z.unknown() }),
]);

const blockSchema = z.object({
  header: z.object({
    height: z.number().int().nonnegative(),
    hash: z.string(),
    prev_hash: z.string(),
  }),
  chunks: z.array(z.object({ chunk_hash: z.string(), shard_id: z.number().int().nonnegative() })),
});

const functionCallSchema = z.object({
  FunctionCall: z.object({ method_name: z.string(), args: z.string() }),
});

/**
 * Actions come as a bare string ("CreateAccount") or a single-key object.
 * Only function calls are kept.
 */
const actionsSchema = z.array(z.unknown()).transform((actions) =>
  actions.flatMap((action): FunctionCallAction[] => {
    const parsed = functionCallSchema.safeParse(action);
    if (!parsed.success) return [];
    return [
      {
        methodName: parsed.data.FunctionCall.method_name,
        args: Uint8Array.from(Buffer.from(parsed.data.FunctionCall.args, 'base64')),
      },
    ];
  })
);

const chunkSchema = z.object({
  header: z.object({ chunk_hash: z.string() }),
  transactions: z.array(
    z.object({
      hash: z.string(),
      signer_id: z.string(),
      receiver_id: z.string(),
      actions: actionsSchema,
    })
  ),
  receipts: z.array(
    z.object({
      receipt_id: z.string(),
      predecessor_id: z.string(),
      receiver_id: z.string(),
      // Data and newer variants are kept opaque
      receipt: z.unknown(),
    })
  ),
});

const actionReceiptSchema = z.object({
  Action: z.object({ signer_id: z.string(), actions: actionsSchema }),
});

const outcomeSchema = z.object({
  status: z.unknown(),
  transaction: z.object({ hash: z.string() }),
});

const successValueSchema = z.object({ SuccessValue: z.string() });

const accessKeySchema = z.object({
  nonce: z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)]).transform((value) => BigInt(value)),
  block_hash: z.string(),
});

const callFunctionSchema = z.union([
  z.object({ result: z.array(z.number().int().min(0).max(255)), block_height: z.number().int() }),
  z.object({ error: z.string() }),
]);

// ============================================================================
// Client
// ============================================================================

function toOutcome(raw: z.infer<typeof outcomeSchema>): TransactionOutcome {
  const success = successValueSchema.safeParse(raw.status);
  if (success.success) {
    return {
      status: 'success',
      hash: raw.transaction.hash,
      value: Uint8Array.from(Buffer.from(success.data.SuccessValue, 'base64')),
    };
  }
  return { status: 'failure', hash: raw.transaction.hash, reason: JSON.stringify(raw.status) };
}

/**
 * NEAR JSON-RPC over viem's HTTP client. Each method issues exactly one
 * request; retries belong to the caller.
 */
export class NearRpcClient implements IChainRpc {
  readonly url: string;
  private readonly client: ReturnType<typeof getHttpRpcClient>;
  private readonly timeout: number;

  constructor(params: { url: string; timeout?: number }) {
    this.url = params.url;
    this.timeout = params.timeout ?? 30_000;
    this.client = getHttpRpcClient(params.url, { timeout: this.timeout });
  }

  async block(reference: BlockReference): Promise<ChainBlock> {
    const params = 'height' in reference ? { block_id: reference.height } : { finality: reference.finality };
    const raw = blockSchema.parse(await this.call('block', params));

    return createChainBlock({
      height: raw.header.height,
      hash: raw.header.hash,
      parentHash: raw.header.prev_hash,
      chunks: raw.chunks.map((chunk) => ({ chunkHash: chunk.chunk_hash, shardId: chunk.shard_id })),
    });
  }

  async chunk(chunkHash: string): Promise<ChunkContent> {
    const raw = chunkSchema.parse(await this.call('chunk', { chunk_id: chunkHash }));

    const transactions = raw.transactions.map(
      (tx): ChainTransaction => ({
        hash: tx.hash,
        signerId: tx.signer_id,
        receiverId: tx.receiver_id,
        actions: tx.actions,
      })
    );

    const receipts = raw.receipts.flatMap((receipt): ChainReceipt[] => {
      const action = actionReceiptSchema.safeParse(receipt.receipt);
      if (!action.success) return [];
      return [
        {
          receiptId: receipt.receipt_id,
          predecessorId: receipt.predecessor_id,
          receiverId: receipt.receiver_id,
          signerId: action.data.Action.signer_id,
          actions: action.data.Action.actions,
        },
      ];
    });

    return { chunkHash: raw.header.chunk_hash, transactions, receipts };
  }

  async txStatus(txHash: string, senderId: string): Promise<TransactionOutcome> {
    return toOutcome(outcomeSchema.parse(await this.call('tx', [txHash, senderId])));
  }

  async viewAccessKey(accountId: string, publicKey: string): Promise<AccessKeyView> {
    const raw = accessKeySchema.parse(
      await this.call('query', {
        request_type: 'view_access_key',
        finality: 'optimistic',
        account_id: accountId,
        public_key: publicKey,
      })
    );
    return { nonce: raw.nonce, blockHash: raw.block_hash };
  }

  async broadcastTxCommit(signedTransaction: Uint8Array): Promise<TransactionOutcome> {
    const raw = await this.call('broadcast_tx_commit', [Buffer.from(signedTransaction).toString('base64')]);
    return toOutcome(outcomeSchema.parse(raw));
  }

  async callFunction(contractId: string, method: string, args: Uint8Array): Promise<CallFunctionResult> {
    const raw = callFunctionSchema.parse(
      await this.call('query', {
        request_type: 'call_function',
        finality: 'final',
        account_id: contractId,
        method_name: method,
        args_base64: Buffer.from(args).toString('base64'),
      })
    );

    if ('error' in raw) {
      return { kind: 'error', error: raw.error };
    }
    return { kind: 'call-result', result: Uint8Array.from(raw.result), blockHeight: raw.block_height };
  }

  /**
   * Issue one request and unwrap the result, turning a JSON-RPC error into
   * RpcRequestError
   */
  private async call(method: string, params: unknown): Promise<unknown> {
    const response = rpcResponseSchema.parse(
      await this.client.request({ body: { method, params }, timeout: this.timeout })
    );

    if ('error' in response) {
      const { error } = response;
      const causeName = error.cause?.name ?? error.name ?? 'UNKNOWN';
      const detail = typeof error.data === 'string' ? error.data : (error.message ?? 'Unknown error');
      throw new RpcRequestError(method, causeName, detail);
    }

    return response.result;
  }
}
