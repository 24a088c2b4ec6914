import { sha3_256 } from 'js-sha3';
import { slh_dsa_shake_128f } from '@noble/post-quantum/slh-dsa';
import { randomBytes } from '@noble/post-quantum/utils';
import { ProofOfWorkParams } from '../config';
import { Argon2Worker } from './Argon2Worker';

export interface KeyPair {
  publicKey: string;
  secretKey: string;
}

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

const argon2 = new Argon2Worker();

/**
 * Quantum-safe primitives: SHA3-256 content hashing, SLH-DSA (SPHINCS+, SHAKE-128f)
 * signatures and the Argon2id memory-hard step used by mining.
 */
export class CryptoUtils {
  /**
   * SHA3-256 of the input, hex encoded.
   */
  public static calculateHash(data: string | Uint8Array): string {
    return sha3_256(data);
  }

  public static generateKeyPair(): KeyPair {
    const keys = slh_dsa_shake_128f.keygen(randomBytes(slh_dsa_shake_128f.seedLen));
    return {
      publicKey: this.toHex(keys.publicKey),
      secretKey: this.toHex(keys.secretKey)
    };
  }

  /**
   * Signs a UTF-8 message with a hex encoded SLH-DSA secret key.
   * @returns Hex encoded signature
   */
  public static sign(message: string, secretKey: string): string {
    const keyBytes = this.fromHex(secretKey);
    if (!keyBytes) {
      throw new Error('Secret key is not valid hex');
    }

    const signature = slh_dsa_shake_128f.sign(keyBytes, Buffer.from(message, 'utf8'));
    return this.toHex(signature);
  }

  /**
   * Verifies a hex encoded SLH-DSA signature. Malformed keys or signatures yield false.
   */
  public static verify(message: string, signature: string, publicKey: string): boolean {
    const signatureBytes = this.fromHex(signature);
    const keyBytes = this.fromHex(publicKey);
    if (!signatureBytes || !keyBytes) {
      return false;
    }

    try {
      return slh_dsa_shake_128f.verify(keyBytes, Buffer.from(message, 'utf8'), signatureBytes);
    } catch (error) {
      console.error('Signature verification error:', error);
      return false;
    }
  }

  /**
   * Memory-hard proof-of-work step. Runs Argon2id on the worker thread over the input
   * with a salt derived from the input itself, so identical input always yields the
   * identical digest.
   * @returns The textual (base64) hash segment of the encoded Argon2 output
   */
  public static async powHash(data: string, params: ProofOfWorkParams): Promise<string> {
    const encoded = await argon2.hash(data, this.calculateHash(data), params);

    const segments = encoded.split('$');
    return segments[segments.length - 1];
  }

  public static toHex(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('hex');
  }

  public static fromHex(hex: string): Uint8Array | null {
    if (!HEX_PATTERN.test(hex)) {
      return null;
    }
    return new Uint8Array(Buffer.from(hex, 'hex'));
  }
}
