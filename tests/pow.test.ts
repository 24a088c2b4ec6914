import { describe, it, expect } from 'vitest';
import {
  blockReward,
  meetsDifficulty,
  proofOfWorkDigest,
  retargetDifficulty,
  searchNonce,
  verifyProofOfWork
} from '../src/consensus/pow';
import { CryptoUtils } from '../src/crypto/CryptoUtils';
import { TEST_CHAIN_PARAMS } from './helpers';

const pow = TEST_CHAIN_PARAMS.pow;

describe('proof of work', () => {
  it('hashes the Argon2 output with SHA3-256', async () => {
    const digest = await proofOfWorkDigest('base', 7, pow);
    expect(digest).toBe(CryptoUtils.calculateHash(await CryptoUtils.powHash('base7', pow)));
  });

  it('checks leading zero hex digits', () => {
    expect(meetsDifficulty('00ab', 2)).toBe(true);
    expect(meetsDifficulty('0ab0', 2)).toBe(false);
    expect(meetsDifficulty('abcd', 0)).toBe(true);
  });

  it('finds a nonce that verifies', async () => {
    const result = await searchNonce('header', 1, pow);
    expect(result).not.toBeNull();
    if (!result) return;

    expect(result.digest.startsWith('0')).toBe(true);
    expect(await verifyProofOfWork('header', result.nonce, 1, pow)).toBe(true);
  });

  it('returns the first satisfying nonce', async () => {
    const result = await searchNonce('header-first', 1, pow);
    if (!result) throw new Error('search was not expected to stop');

    for (let nonce = 0; nonce < result.nonce; nonce++) {
      expect(await verifyProofOfWork('header-first', nonce, 1, pow)).toBe(false);
    }
  });

  it('stops when asked', async () => {
    let calls = 0;
    const result = await searchNonce('header', 64, pow, () => ++calls <= 3);

    expect(result).toBeNull();
    expect(calls).toBe(4);
  });
});

describe('retargetDifficulty', () => {
  it('raises difficulty when blocks came more than twice as fast', () => {
    expect(retargetDifficulty(3, 2999, 10, 600)).toBe(4);
  });

  it('lowers difficulty when blocks came more than twice as slow', () => {
    expect(retargetDifficulty(3, 12001, 10, 600)).toBe(2);
  });

  it('keeps difficulty inside the band', () => {
    expect(retargetDifficulty(3, 3000, 10, 600)).toBe(3);
    expect(retargetDifficulty(3, 12000, 10, 600)).toBe(3);
  });

  it('never goes below 1', () => {
    expect(retargetDifficulty(1, 1e9, 10, 600)).toBe(1);
  });
});

describe('blockReward', () => {
  const params = { blockReward: 50, halvingInterval: 210000 };

  it('halves every interval', () => {
    expect(blockReward(0, params)).toBe(50);
    expect(blockReward(209999, params)).toBe(50);
    expect(blockReward(210000, params)).toBe(25);
    expect(blockReward(420000, params)).toBe(12.5);
  });
});
