import { describe, it, expect } from 'vitest';
import { deserializeExact } from './borsh.ts';

describe('deserializeExact', () => {
  it('should decode a value that uses every byte', () => {
    expect(deserializeExact('u32', Uint8Array.from([7, 0, 0, 0]))).toBe(7);
  });

  it('should reject trailing bytes', () => {
    expect(() => deserializeExact('u32', Uint8Array.from([7, 0, 0, 0, 1, 2]))).toThrow(
      'Unexpected 2 trailing bytes'
    );
  });
});
