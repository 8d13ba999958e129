/**
 * A block could not be fetched at the requested height
 */
export class BlockUnavailableError extends Error {
  constructor(
    public readonly height: number,
    public readonly originalError?: Error
  ) {
    super(`Block ${height} is unavailable${originalError ? `: ${originalError.message}` : ''}`);
    this.name = 'BlockUnavailableError';
  }
}

/**
 * A chunk could not be fetched
 */
export class ChunkUnavailableError extends Error {
  constructor(
    public readonly chunkHash: string,
    public readonly originalError?: Error
  ) {
    super(`Chunk ${chunkHash} is unavailable${originalError ? `: ${originalError.message}` : ''}`);
    this.name = 'ChunkUnavailableError';
  }
}

/**
 * A transaction could not be committed within its retry budget
 */
export class CommitFailedError extends Error {
  constructor(
    public readonly contractId: string,
    public readonly method: string,
    public readonly attempts: number,
    public readonly originalError?: Error
  ) {
    super(
      `Failed to commit ${method} on ${contractId} after ${attempts} attempts` +
        (originalError ? `: ${originalError.message}` : '')
    );
    this.name = 'CommitFailedError';
  }
}

/**
 * A read-only call did not return a call result
 */
export class ViewCallError extends Error {
  constructor(
    public readonly contractId: string,
    public readonly method: string,
    reason: string
  ) {
    super(`View call ${contractId}.${method} failed: ${reason}`);
    this.name = 'ViewCallError';
  }
}

/**
 * The remote node answered with a JSON-RPC error
 */
export class RpcRequestError extends Error {
  constructor(
    public readonly method: string,
    public readonly causeName: string,
    message: string
  ) {
    super(`${method}: ${message}`);
    this.name = 'RpcRequestError';
  }
}

/**
 * A storage export could not be decoded
 */
export class SnapshotFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SnapshotFormatError';
  }
}

/**
 * The number of accounts disagrees with the stored counter
 */
export class AccountCountMismatchError extends Error {
  constructor(
    public readonly accounts: number,
    public readonly counter: bigint
  ) {
    super(`Wrong accounts count: found ${accounts} accounts, counter says ${counter}`);
    this.name = 'AccountCountMismatchError';
  }
}

/**
 * A persisted file exists but cannot be read back
 */
export class CheckpointFormatError extends Error {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(`Unreadable file ${path}: ${reason}`);
    this.name = 'CheckpointFormatError';
  }
}

/**
 * A transaction reached the chain but did not end in a success value
 */
export class TransactionFailedError extends Error {
  constructor(
    public readonly txHash: string,
    public readonly reason: string
  ) {
    super(`Transaction ${txHash} failed: ${reason}`);
    this.name = 'TransactionFailedError';
  }
}

/**
 * Normalize a thrown value to an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
