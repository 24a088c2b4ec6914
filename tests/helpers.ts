import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ChainParams, DEFAULT_CHAIN_PARAMS, NetworkParams, NodeConfig } from '../src/config';
import { CryptoUtils, KeyPair } from '../src/crypto/CryptoUtils';
import { Transaction } from '../src/core/Transaction';

/** Cheap Argon2 and difficulty 1 so a block seals in a few dozen milliseconds. */
export const TEST_CHAIN_PARAMS: ChainParams = {
  ...DEFAULT_CHAIN_PARAMS,
  initialDifficulty: 1,
  pow: { timeCost: 1, memoryCost: 16, parallelism: 1, hashLength: 32 }
};

export const TEST_NETWORK_PARAMS: NetworkParams = {
  maxPeers: 8,
  pingInterval: 3600,
  syncInterval: 3600,
  requestTimeoutMs: 2000,
  downloadTimeoutMs: 5000,
  miningCooldownMs: 50
};

export function testNodeConfig(overrides: Partial<NodeConfig> = {}): NodeConfig {
  return {
    host: '127.0.0.1',
    port: 0,
    apiPort: 0,
    dataDir: null,
    seedPeers: [],
    minerWallet: 'miner',
    mine: false,
    ...overrides
  };
}

let sharedKeys: KeyPair | undefined;

/** One key pair per test file; SLH-DSA key generation and signing are slow. */
export function testKeys(): KeyPair {
  if (!sharedKeys) {
    sharedKeys = CryptoUtils.generateKeyPair();
  }
  return sharedKeys;
}

export function signedTransaction(
  keys: KeyPair,
  recipient: string,
  amount: number,
  fee: number,
  timestamp?: number
): Transaction {
  const tx = new Transaction({ sender: keys.publicKey, recipient, amount, fee, timestamp });
  tx.sign(keys.secretKey);
  return tx;
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'pqchain-test-'));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}
