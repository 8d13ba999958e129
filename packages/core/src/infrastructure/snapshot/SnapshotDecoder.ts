import { z } from 'zod';
import type { ContractTotals, StateData } from '../../domain/entities/index.ts';
import { EMPTY_TOTALS, createStateData } from '../../domain/entities/index.ts';
import { AccountId } from '../../domain/value-objects/AccountId.ts';
import { SnapshotFormatError } from '../../domain/errors.ts';
import { deserializeExact } from '../../application/services/borsh.ts';
import { decodeContractTotals } from '../codec/StateDataCodec.ts';

// ============================================================================
// Storage Key Layout
// ============================================================================

/** Storage format version byte */
const VERSION_V1 = 0x07;
/** Subsystem byte of the eth-connector */
const ETH_CONNECTOR = 0x06;

/** Field discriminators of the eth-connector storage */
const StorageId = {
  FungibleToken: 1,
  UsedEvent: 2,
  StatisticsAuroraAccountsCounter: 4,
} as const;

const ACCOUNT_BALANCE_WIDTH = 16;
const CONTRACT_TOTALS_WIDTH = 40;
const ACCOUNT_COUNTER_WIDTH = 8;

export type StorageKey =
  | { kind: 'account-balance'; accountId: string }
  | { kind: 'contract-totals' }
  | { kind: 'used-proof'; proof: string }
  | { kind: 'account-counter' }
  | { kind: 'unrecognized' };

function prefix(id: number): Uint8Array {
  return Uint8Array.from([VERSION_V1, ETH_CONNECTOR, id]);
}

function startsWith(key: Uint8Array, head: Uint8Array): boolean {
  if (key.length < head.length) return false;
  return head.every((byte, index) => key[index] === byte);
}

function equalBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && startsWith(a, b);
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeUtf8(bytes: Uint8Array, what: string): string {
  try {
    return utf8.decode(bytes);
  } catch {
    throw new SnapshotFormatError(`Failed to parse ${what}: invalid UTF-8`);
  }
}

/**
 * Classify a raw storage key of the tracked contract
 */
export function classifyStorageKey(key: Uint8Array): StorageKey {
  const proofPrefix = prefix(StorageId.UsedEvent);
  if (key.length > proofPrefix.length && startsWith(key, proofPrefix)) {
    return { kind: 'used-proof', proof: decodeUtf8(key.subarray(proofPrefix.length), 'proof') };
  }

  const accountPrefix = prefix(StorageId.FungibleToken);
  if (key.length > accountPrefix.length && startsWith(key, accountPrefix)) {
    const accountId = decodeUtf8(key.subarray(accountPrefix.length), 'account');
    if (!AccountId.isValid(accountId)) {
      throw new SnapshotFormatError(`Failed to parse account: ${JSON.stringify(accountId)}`);
    }
    return { kind: 'account-balance', accountId };
  }

  if (equalBytes(key, prefix(StorageId.StatisticsAuroraAccountsCounter))) {
    return { kind: 'account-counter' };
  }

  if (equalBytes(key, accountPrefix)) {
    return { kind: 'contract-totals' };
  }

  return { kind: 'unrecognized' };
}

// ============================================================================
// Export Document
// ============================================================================

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const blockHeightSchema = z
  .union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)])
  .transform(Number);

const snapshotEntrySchema = z.object({ key: z.string(), value: z.string() });

export type SnapshotEntry = z.infer<typeof snapshotEntrySchema>;

const snapshotDocumentSchema = z.object({
  result: z.object({
    block_height: blockHeightSchema,
    values: z.array(snapshotEntrySchema),
  }),
});

/**
 * Decoded storage export
 */
export interface DecodedSnapshot {
  blockHeight: number;
  state: StateData;
  /** Keys that belong to nothing the migration needs */
  ignoredKeys: number;
}

function decodeBase64(text: string, what: string, index: number): Uint8Array {
  if (!BASE64_PATTERN.test(text)) {
    throw new SnapshotFormatError(`Malformed base64 ${what} at entry ${index}`);
  }
  return Uint8Array.from(Buffer.from(text, 'base64'));
}

function decodeFixedWidth(value: Uint8Array, width: number, what: string): bigint {
  if (value.length !== width) {
    throw new SnapshotFormatError(`${what} must be ${width} bytes, got ${value.length}`);
  }
  return z.bigint().parse(deserializeExact(width === ACCOUNT_COUNTER_WIDTH ? 'u64' : 'u128', value));
}

/**
 * Classifies export entries one at a time
 */
export class SnapshotAccumulator {
  private readonly accounts = new Map<string, bigint>();
  private readonly proofs: string[] = [];
  private accountsCounter = 0n;
  private contractData: ContractTotals = EMPTY_TOTALS;
  private ignoredKeys = 0;
  private entries = 0;

  add(entry: SnapshotEntry): void {
    const index = this.entries++;
    const key = classifyStorageKey(decodeBase64(entry.key, 'key', index));

    switch (key.kind) {
      case 'used-proof':
        this.proofs.push(key.proof);
        break;
      case 'account-balance':
        this.accounts.set(
          key.accountId,
          decodeFixedWidth(decodeBase64(entry.value, 'value', index), ACCOUNT_BALANCE_WIDTH, `Balance of ${key.accountId}`)
        );
        break;
      case 'account-counter':
        this.accountsCounter = decodeFixedWidth(
          decodeBase64(entry.value, 'value', index),
          ACCOUNT_COUNTER_WIDTH,
          'Accounts counter'
        );
        break;
      case 'contract-totals': {
        const value = decodeBase64(entry.value, 'value', index);
        if (value.length !== CONTRACT_TOTALS_WIDTH) {
          throw new SnapshotFormatError(`Contract totals must be ${CONTRACT_TOTALS_WIDTH} bytes, got ${value.length}`);
        }
        this.contractData = decodeContractTotals(value);
        break;
      }
      case 'unrecognized':
        this.ignoredKeys++;
        break;
    }
  }

  /**
   * Check the account counter and build the ledger
   */
  finish(blockHeight: number): DecodedSnapshot {
    return {
      blockHeight,
      state: createStateData({
        contractData: this.contractData,
        accounts: this.accounts,
        accountsCounter: this.accountsCounter,
        proofs: this.proofs,
      }),
      ignoredKeys: this.ignoredKeys,
    };
  }
}

/**
 * Decodes a full key-space export of the tracked contract into a StateData.
 * Any malformed entry fails the whole decode.
 */
export class SnapshotDecoder {
  /**
   * Decode the export text (JSON)
   */
  decodeText(text: string): DecodedSnapshot {
    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw new SnapshotFormatError(
        `Snapshot is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return this.decode(document);
  }

  /**
   * Decode an already parsed export document
   */
  decode(document: unknown): DecodedSnapshot {
    const parsed = snapshotDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new SnapshotFormatError(
        `Unexpected snapshot layout: ${parsed.error.issues.map((issue) => issue.path.join('.')).join(', ')}`
      );
    }

    const accumulator = new SnapshotAccumulator();
    for (const entry of parsed.data.result.values) {
      accumulator.add(entry);
    }
    return accumulator.finish(parsed.data.result.block_height);
  }

  /**
   * Decode the values of result.block_height and result.values[*] as a
   * streaming parser picks them, in document order
   */
  async decodeValues(values: AsyncIterable<unknown>): Promise<DecodedSnapshot> {
    const accumulator = new SnapshotAccumulator();
    let blockHeight: number | null = null;

    for await (const value of values) {
      const entry = snapshotEntrySchema.safeParse(value);
      if (entry.success) {
        accumulator.add(entry.data);
        continue;
      }
      const height = blockHeightSchema.safeParse(value);
      if (!height.success) {
        throw new SnapshotFormatError(`Unexpected snapshot value: ${JSON.stringify(value)}`);
      }
      blockHeight = height.data;
    }

    if (blockHeight === null) {
      throw new SnapshotFormatError('Unexpected snapshot layout: result.block_height');
    }
    return accumulator.finish(blockHeight);
  }
}

/**
 * Default name of the migration-ready file for an export height
 */
export function stateFileName(blockHeight: number): string {
  return `contract_state${blockHeight}.borsh`;
}
