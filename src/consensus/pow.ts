import { CryptoUtils } from '../crypto/CryptoUtils';
import { ChainParams, ProofOfWorkParams } from '../config';

export interface ProofOfWorkResult {
  nonce: number;
  digest: string;
}

/**
 * Two-stage digest: Argon2id over `base + nonce`, then SHA3-256 of its textual output.
 */
export async function proofOfWorkDigest(
  base: string,
  nonce: number,
  params: ProofOfWorkParams
): Promise<string> {
  const memoryHard = await CryptoUtils.powHash(`${base}${nonce}`, params);
  return CryptoUtils.calculateHash(memoryHard);
}

export function meetsDifficulty(digest: string, difficulty: number): boolean {
  return digest.startsWith('0'.repeat(difficulty));
}

/**
 * Sequential nonce search from 0. `shouldContinue` is polled before every attempt;
 * the search resolves `null` as soon as it returns false.
 */
export async function searchNonce(
  base: string,
  difficulty: number,
  params: ProofOfWorkParams,
  shouldContinue: () => boolean = () => true
): Promise<ProofOfWorkResult | null> {
  for (let nonce = 0; ; nonce++) {
    if (!shouldContinue()) {
      return null;
    }

    const digest = await proofOfWorkDigest(base, nonce, params);
    if (meetsDifficulty(digest, difficulty)) {
      return { nonce, digest };
    }
  }
}

export async function verifyProofOfWork(
  base: string,
  nonce: number,
  difficulty: number,
  params: ProofOfWorkParams
): Promise<boolean> {
  const digest = await proofOfWorkDigest(base, nonce, params);
  return meetsDifficulty(digest, difficulty);
}

/**
 * Single-step integer retarget. Faster than half the expected interval time raises the
 * difficulty by one; slower than double lowers it by one, never below 1.
 */
export function retargetDifficulty(
  current: number,
  elapsedSeconds: number,
  interval: number,
  targetBlockTime: number
): number {
  const expected = interval * targetBlockTime;

  if (elapsedSeconds < expected / 2) {
    return current + 1;
  }
  if (elapsedSeconds > expected * 2) {
    return Math.max(1, current - 1);
  }
  return current;
}

export function blockReward(
  height: number,
  params: Pick<ChainParams, 'blockReward' | 'halvingInterval'>
): number {
  const halvings = Math.floor(height / params.halvingInterval);
  return params.blockReward / Math.pow(2, halvings);
}
