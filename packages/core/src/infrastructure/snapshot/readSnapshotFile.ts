import { createReadStream } from 'node:fs';
import { pipeline } from 'node:stream/promises';
import StreamJson from 'stream-json';
import Pick from 'stream-json/filters/Pick.js';
import StreamValues from 'stream-json/streamers/StreamValues.js';
import { z } from 'zod';
import { SnapshotFormatError, toError } from '../../domain/errors.ts';
import type { DecodedSnapshot } from './SnapshotDecoder.ts';
import { SnapshotDecoder } from './SnapshotDecoder.ts';

/** Paths of the height and of each storage entry */
const SNAPSHOT_PATHS = /^result\.(block_height|values\.\d+)$/;

const streamedValueSchema = z.object({ key: z.number(), value: z.unknown() });

async function* pickedValues(source: AsyncIterable<unknown>): AsyncGenerator<unknown> {
  for await (const item of source) {
    yield streamedValueSchema.parse(item).value;
  }
}

/**
 * Decode an export file entry by entry, without holding the document in memory
 */
export async function readSnapshotFile(
  path: string,
  decoder: SnapshotDecoder = new SnapshotDecoder()
): Promise<DecodedSnapshot> {
  const result: { decoded?: DecodedSnapshot } = {};

  try {
    await pipeline(
      createReadStream(path),
      StreamJson.parser(),
      Pick.pick({ filter: SNAPSHOT_PATHS }),
      StreamValues.streamValues(),
      async (source: AsyncIterable<unknown>) => {
        result.decoded = await decoder.decodeValues(pickedValues(source));
      }
    );
  } catch (error) {
    // Read failures carry an fs code; anything else is the document
    if (error instanceof SnapshotFormatError || (error instanceof Error && 'code' in error)) throw error;
    throw new SnapshotFormatError(`Snapshot is not valid JSON: ${toError(error).message}`);
  }

  if (result.decoded === undefined) {
    throw new SnapshotFormatError('Snapshot stream ended before decoding');
  }
  return result.decoded;
}
