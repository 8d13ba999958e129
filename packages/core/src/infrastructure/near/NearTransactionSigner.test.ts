import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import bs58 from 'bs58';
import { KeyPair, transactions } from 'near-api-js';
import { sha256 } from 'viem';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { NearTransactionSigner } from './NearTransactionSigner.ts';

describe('NearTransactionSigner', () => {
  const keyPair = KeyPair.fromRandom('ed25519');
  const secretKey = keyPair.toString();
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ledgerlift-signer-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should expose the public key', () => {
    const signer = new NearTransactionSigner('relayer.testnet', secretKey, 'testnet');

    expect(signer.publicKey).toBe(keyPair.getPublicKey().toString());
  });

  it('should reject a key that is not ed25519', () => {
    expect(() => new NearTransactionSigner('relayer.testnet', 'secp256k1:abc', 'testnet')).toThrow(
      'Expected an ed25519 key'
    );
  });

  it('should sign a function call', async () => {
    const signer = new NearTransactionSigner('relayer.testnet', secretKey, 'testnet');
    const blockHash = bs58.encode(new Uint8Array(32).fill(1));

    const signed = await signer.sign({
      receiverId: 'eth-connector.testnet',
      method: 'migrate',
      args: Uint8Array.from([1, 2, 3]),
      gas: 300_000_000_000_000n,
      nonce: 5n,
      blockHash,
    });

    const decoded = transactions.SignedTransaction.decode(Buffer.from(signed.encoded));
    expect(decoded.transaction.signerId).toBe('relayer.testnet');
    expect(decoded.transaction.receiverId).toBe('eth-connector.testnet');
    expect(String(decoded.transaction.nonce)).toBe('5');
    expect(decoded.transaction.actions[0]?.functionCall?.methodName).toBe('migrate');

    // Borsh layout: the transaction, then a 1-byte key type and 64 signature bytes
    const transactionBytes = signed.encoded.subarray(0, signed.encoded.length - 65);
    const digest = sha256(transactionBytes, 'bytes');
    expect(signed.hash).toBe(bs58.encode(digest));
    expect(keyPair.verify(digest, signed.encoded.subarray(signed.encoded.length - 64))).toBe(true);
  });

  it('should load a key file', async () => {
    const path = join(dir, 'relayer.json');
    await writeFile(
      path,
      JSON.stringify({
        account_id: 'relayer.testnet',
        public_key: keyPair.getPublicKey().toString(),
        private_key: secretKey,
      })
    );

    const signer = await NearTransactionSigner.fromKeyFile(path, 'testnet');

    expect(signer.accountId).toBe('relayer.testnet');
    expect(signer.publicKey).toBe(keyPair.getPublicKey().toString());
  });

  it('should reject a key file without a private key', async () => {
    const path = join(dir, 'public-only.json');
    await writeFile(path, JSON.stringify({ account_id: 'relayer.testnet' }));

    await expect(NearTransactionSigner.fromKeyFile(path, 'testnet')).rejects.toThrow('Key file holds no private key');
  });
});
