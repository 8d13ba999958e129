import { serialize } from 'borsh';
import { sha256 } from 'viem';
import { z } from 'zod';
import { accountIdSchema } from '@ledgerlift/config';
import type { BorshSchema } from './borsh.ts';
import { deserializeExact } from './borsh.ts';

// ============================================================================
// Recognized Methods
// ============================================================================

export const RECOGNIZED_METHODS = [
  'ft_transfer',
  'ft_transfer_call',
  'withdraw',
  'finish_deposit',
  'deposit',
] as const;

export type RecognizedMethod = (typeof RECOGNIZED_METHODS)[number];

export interface FtTransferArgs {
  receiverId: string;
  amount: bigint;
  memo: string | null;
}

export interface FtTransferCallArgs extends FtTransferArgs {
  msg: string;
}

export interface WithdrawArgs {
  /** 20-byte address on the other side of the bridge */
  recipientAddress: Uint8Array;
  amount: bigint;
}

export interface FinishDepositArgs {
  newOwnerId: string;
  amount: bigint;
  proofKey: string;
  relayerId: string;
  fee: bigint;
  msg: Uint8Array | null;
}

export interface DepositProof {
  logIndex: bigint;
  logEntryData: Uint8Array;
  receiptIndex: bigint;
  receiptData: Uint8Array;
  headerData: Uint8Array;
  proof: Uint8Array[];
}

/**
 * Decoded arguments, one variant per recognized method
 */
export type ContractCall =
  | { method: 'ft_transfer'; args: FtTransferArgs }
  | { method: 'ft_transfer_call'; args: FtTransferCallArgs }
  | { method: 'withdraw'; args: WithdrawArgs }
  | { method: 'finish_deposit'; args: FinishDepositArgs }
  | { method: 'deposit'; args: DepositProof };

export type ParsedCall =
  | { kind: 'recognized'; call: ContractCall; accounts: string[]; proof: string | null }
  | { kind: 'ignored'; method: string }
  | { kind: 'malformed'; method: RecognizedMethod; reason: string };

// ============================================================================
// Argument Schemas
// ============================================================================

const u128Json = z
  .union([z.string().regex(/^\d+$/, 'Expected a decimal integer'), z.number().int().nonnegative()])
  .transform((value) => BigInt(value));

const ftTransferJson = z.object({
  receiver_id: accountIdSchema,
  amount: u128Json,
  memo: z.string().nullish(),
});

const ftTransferCallJson = ftTransferJson.extend({
  msg: z.string(),
});

const bytes: BorshSchema = { array: { type: 'u8' } };
const byteArray = z.array(z.number().int().min(0).max(255)).transform((value) => Uint8Array.from(value));

const withdrawBorsh: BorshSchema = {
  struct: {
    recipient_address: { array: { type: 'u8', len: 20 } },
    amount: 'u128',
  },
};

const withdrawDecoded = z.object({
  recipient_address: byteArray,
  amount: z.bigint(),
});

const finishDepositBorsh: BorshSchema = {
  struct: {
    new_owner_id: 'string',
    amount: 'u128',
    proof_key: 'string',
    relayer_id: 'string',
    fee: 'u128',
    msg: { option: bytes },
  },
};

const finishDepositDecoded = z.object({
  new_owner_id: accountIdSchema,
  amount: z.bigint(),
  proof_key: z.string(),
  relayer_id: accountIdSchema,
  fee: z.bigint(),
  msg: byteArray.nullable(),
});

const depositBorsh: BorshSchema = {
  struct: {
    log_index: 'u64',
    log_entry_data: bytes,
    receipt_index: 'u64',
    receipt_data: bytes,
    header_data: bytes,
    proof: { array: { type: bytes } },
  },
};

const depositDecoded = z.object({
  log_index: z.bigint(),
  log_entry_data: byteArray,
  receipt_index: z.bigint(),
  receipt_data: byteArray,
  header_data: byteArray,
  proof: z.array(byteArray),
});

// ============================================================================
// Decoders
// ============================================================================

function decodeJson(raw: Uint8Array): unknown {
  return JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(raw));
}

function decodeCall(method: RecognizedMethod, raw: Uint8Array): ContractCall {
  switch (method) {
    case 'ft_transfer': {
      const args = ftTransferJson.parse(decodeJson(raw));
      return {
        method,
        args: { receiverId: args.receiver_id, amount: args.amount, memo: args.memo ?? null },
      };
    }
    case 'ft_transfer_call': {
      const args = ftTransferCallJson.parse(decodeJson(raw));
      return {
        method,
        args: { receiverId: args.receiver_id, amount: args.amount, memo: args.memo ?? null, msg: args.msg },
      };
    }
    case 'withdraw': {
      const args = withdrawDecoded.parse(deserializeExact(withdrawBorsh, raw));
      return { method, args: { recipientAddress: args.recipient_address, amount: args.amount } };
    }
    case 'finish_deposit': {
      const args = finishDepositDecoded.parse(deserializeExact(finishDepositBorsh, raw));
      return {
        method,
        args: {
          newOwnerId: args.new_owner_id,
          amount: args.amount,
          proofKey: args.proof_key,
          relayerId: args.relayer_id,
          fee: args.fee,
          msg: args.msg,
        },
      };
    }
    case 'deposit': {
      const args = depositDecoded.parse(deserializeExact(depositBorsh, raw));
      return {
        method,
        args: {
          logIndex: args.log_index,
          logEntryData: args.log_entry_data,
          receiptIndex: args.receipt_index,
          receiptData: args.receipt_data,
          headerData: args.header_data,
          proof: args.proof,
        },
      };
    }
  }
}

/**
 * Key under which the connector marks a deposit proof as used:
 * sha256 over the borsh log index, the borsh receipt index and the raw
 * header, rendered as the decimal values of its bytes.
 */
export function depositProofKey(proof: Pick<DepositProof, 'logIndex' | 'receiptIndex' | 'headerData'>): string {
  const logIndex = serialize('u64', proof.logIndex);
  const receiptIndex = serialize('u64', proof.receiptIndex);

  const data = new Uint8Array(logIndex.length + receiptIndex.length + proof.headerData.length);
  data.set(logIndex, 0);
  data.set(receiptIndex, logIndex.length);
  data.set(proof.headerData, logIndex.length + receiptIndex.length);

  return Array.from(sha256(data, 'bytes'), (byte) => byte.toString()).join('');
}

function effectsOf(call: ContractCall): { accounts: string[]; proof: string | null } {
  switch (call.method) {
    case 'ft_transfer':
    case 'ft_transfer_call':
      return { accounts: [call.args.receiverId], proof: null };
    case 'withdraw':
      return { accounts: [], proof: null };
    case 'finish_deposit':
      return { accounts: [call.args.newOwnerId, call.args.relayerId], proof: call.args.proofKey };
    case 'deposit':
      return { accounts: [], proof: depositProofKey(call.args) };
  }
}

export function isRecognizedMethod(method: string): method is RecognizedMethod {
  return RECOGNIZED_METHODS.some((recognized) => recognized === method);
}

function describeError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse the arguments of a call to the tracked contract.
 * Unknown methods are ignored; undecodable arguments are reported as malformed.
 */
export function parseCall(method: string, raw: Uint8Array): ParsedCall {
  if (!isRecognizedMethod(method)) {
    return { kind: 'ignored', method };
  }

  try {
    const call = decodeCall(method, raw);
    return { kind: 'recognized', call, ...effectsOf(call) };
  } catch (error) {
    return { kind: 'malformed', method, reason: describeError(error) };
  }
}
