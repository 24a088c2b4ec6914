import { describe, it, expect } from 'vitest';
import { sha3_256 } from 'js-sha3';
import { argon2id } from 'hash-wasm';
import { CryptoUtils } from '../src/crypto/CryptoUtils';
import { TEST_CHAIN_PARAMS, testKeys } from './helpers';

describe('CryptoUtils', () => {
  it('hashes with SHA3-256', () => {
    expect(CryptoUtils.calculateHash('')).toBe('a7ffc6f8bf1ed76651c14756a061d662f580ff4de43b49fa82d80a4b80f8434a');
    expect(CryptoUtils.calculateHash('abc')).toBe(sha3_256('abc'));
  });

  it('signs and verifies with SLH-DSA', () => {
    const keys = testKeys();
    const signature = CryptoUtils.sign('hello', keys.secretKey);

    expect(CryptoUtils.verify('hello', signature, keys.publicKey)).toBe(true);
    expect(CryptoUtils.verify('hello!', signature, keys.publicKey)).toBe(false);
  });

  it('treats malformed hex as an invalid signature', () => {
    const keys = testKeys();

    expect(CryptoUtils.verify('hello', 'not-hex', keys.publicKey)).toBe(false);
    expect(CryptoUtils.verify('hello', 'abcd', 'zz')).toBe(false);
    expect(CryptoUtils.verify('hello', 'abcd', keys.publicKey)).toBe(false);
  });

  it('rejects a secret key that is not hex', () => {
    expect(() => CryptoUtils.sign('hello', 'xyz')).toThrow('Secret key is not valid hex');
  });

  it('produces a deterministic memory-hard digest', async () => {
    const first = await CryptoUtils.powHash('block-header', TEST_CHAIN_PARAMS.pow);
    const second = await CryptoUtils.powHash('block-header', TEST_CHAIN_PARAMS.pow);
    const other = await CryptoUtils.powHash('block-header2', TEST_CHAIN_PARAMS.pow);

    expect(first).toBe(second);
    expect(first).not.toBe(other);
    expect(first).not.toContain('$');
    expect(first.length).toBeGreaterThan(0);
  });

  it('returns the last segment of the encoded Argon2id output', async () => {
    const encoded = await argon2id({
      password: 'block-header',
      salt: CryptoUtils.calculateHash('block-header'),
      iterations: 1,
      memorySize: 16,
      parallelism: 1,
      hashLength: 32,
      outputType: 'encoded'
    });

    expect(await CryptoUtils.powHash('block-header', TEST_CHAIN_PARAMS.pow)).toBe(encoded.split('$').pop());
  });

  it('keeps the event loop free while hashing', async () => {
    const heavy = { timeCost: 3, memoryCost: 65536, parallelism: 1, hashLength: 32 };
    let maxLag = 0;
    let last = Date.now();
    const timer = setInterval(() => {
      const now = Date.now();
      maxLag = Math.max(maxLag, now - last);
      last = now;
    }, 5);

    try {
      for (let nonce = 0; nonce < 3; nonce++) {
        await CryptoUtils.powHash(`block-header${nonce}`, heavy);
      }
    } finally {
      clearInterval(timer);
    }

    expect(maxLag).toBeLessThan(150);
  });

  it('round-trips hex', () => {
    expect(CryptoUtils.toHex(new Uint8Array([0, 15, 255]))).toBe('000fff');
    expect(CryptoUtils.fromHex('000fff')).toEqual(new Uint8Array([0, 15, 255]));
    expect(CryptoUtils.fromHex('abc')).toBeNull();
    expect(CryptoUtils.fromHex('')).toBeNull();
  });
});
