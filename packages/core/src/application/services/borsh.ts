import { deserialize, serialize } from 'borsh';

export type BorshSchema = Parameters<typeof serialize>[0];

/**
 * Deserialize and require the schema to consume every byte
 */
export function deserializeExact(schema: BorshSchema, bytes: Uint8Array): unknown {
  const value: unknown = deserialize(schema, bytes);
  const consumed = serialize(schema, value).length;
  if (consumed !== bytes.length) {
    throw new Error(`Unexpected ${bytes.length - consumed} trailing bytes`);
  }
  return value;
}
