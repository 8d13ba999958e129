import { readFile } from 'node:fs/promises';
import bs58 from 'bs58';
import { InMemorySigner, KeyPair, transactions } from 'near-api-js';
import type { Signer } from 'near-api-js';
import { z } from 'zod';
import { accountIdSchema } from '@ledgerlift/config';
import type { ITransactionSigner, SignedCall, UnsignedCall } from '../../application/ports/IChainClient.ts';

type KeyString = `ed25519:${string}`;

const keyStringSchema = z
  .string()
  .refine((value): value is KeyString => value.startsWith('ed25519:'), 'Expected an ed25519 key');

/**
 * Key file as written by the NEAR CLI
 */
const keyFileSchema = z
  .object({
    account_id: accountIdSchema,
    private_key: keyStringSchema.optional(),
    secret_key: keyStringSchema.optional(),
  })
  .refine((file) => file.private_key ?? file.secret_key, 'Key file holds no private key');

/**
 * Signs function calls with one ed25519 key
 */
export class NearTransactionSigner implements ITransactionSigner {
  readonly publicKey: string;
  private readonly keyPair: KeyPair;
  private signer: Signer | null = null;

  constructor(
    readonly accountId: string,
    secretKey: string,
    private readonly networkId: string
  ) {
    this.keyPair = KeyPair.fromString(keyStringSchema.parse(secretKey));
    this.publicKey = this.keyPair.getPublicKey().toString();
  }

  /**
   * Load the credential from a key file
   */
  static async fromKeyFile(path: string, networkId: string): Promise<NearTransactionSigner> {
    const file = keyFileSchema.parse(JSON.parse(await readFile(path, 'utf8')));
    const secret = file.private_key ?? file.secret_key ?? '';
    return new NearTransactionSigner(file.account_id, secret, networkId);
  }

  async sign(call: UnsignedCall): Promise<SignedCall> {
    const transaction = transactions.createTransaction(
      this.accountId,
      this.keyPair.getPublicKey(),
      call.receiverId,
      call.nonce,
      [transactions.functionCall(call.method, call.args, call.gas, 0n)],
      bs58.decode(call.blockHash)
    );

    const [hash, signed] = await transactions.signTransaction(
      transaction,
      await this.inMemorySigner(),
      this.accountId,
      this.networkId
    );

    return { hash: bs58.encode(hash), encoded: signed.encode() };
  }

  private async inMemorySigner(): Promise<Signer> {
    this.signer ??= await InMemorySigner.fromKeyPair(this.networkId, this.accountId, this.keyPair);
    return this.signer;
  }
}
