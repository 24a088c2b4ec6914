import { config as loadDotenv } from 'dotenv';

export const DEFAULT_PORT = 9333;
export const DEFAULT_API_PORT = 9334;

export interface PeerAddress {
  host: string;
  port: number;
}

export interface NodeConfig {
  host: string;
  port: number;
  apiPort: number;
  /** Directory for blockchain.json, peers.json and wallets/. `null` disables persistence. */
  dataDir: string | null;
  seedPeers: PeerAddress[];
  minerWallet: string;
  mine: boolean;
}

/**
 * Argon2id settings for the memory-hard proof-of-work stage.
 * memoryCost is in KiB.
 */
export interface ProofOfWorkParams {
  timeCost: number;
  memoryCost: number;
  parallelism: number;
  hashLength: number;
}

export interface ChainParams {
  initialDifficulty: number;
  blockReward: number;
  halvingInterval: number;
  /** Informational only; nothing in minting or validation enforces it. */
  maxSupply: number;
  difficultyAdjustmentInterval: number;
  /** Seconds. */
  targetBlockTime: number;
  maxTransactionsPerBlock: number;
  pow: ProofOfWorkParams;
}

export interface NetworkParams {
  maxPeers: number;
  /** Seconds between liveness pings. */
  pingInterval: number;
  /** Seconds between chain sync passes. */
  syncInterval: number;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  miningCooldownMs: number;
}

export const DEFAULT_POW_PARAMS: ProofOfWorkParams = {
  timeCost: 2,
  memoryCost: 102400,
  parallelism: 8,
  hashLength: 32
};

export const DEFAULT_CHAIN_PARAMS: ChainParams = {
  initialDifficulty: 3,
  blockReward: 50,
  halvingInterval: 210000,
  maxSupply: 21000000,
  difficultyAdjustmentInterval: 2016,
  targetBlockTime: 600,
  maxTransactionsPerBlock: 999,
  pow: DEFAULT_POW_PARAMS
};

export const DEFAULT_NETWORK_PARAMS: NetworkParams = {
  maxPeers: 8,
  pingInterval: 30,
  syncInterval: 60,
  requestTimeoutMs: 5000,
  downloadTimeoutMs: 30000,
  miningCooldownMs: 5000
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

function readFloat(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseFloat(raw);
  return Number.isNaN(value) ? fallback : value;
}

/**
 * Parses a `host:port,host:port` list. Entries without a valid port are skipped.
 */
export function parsePeerList(raw: string | undefined): PeerAddress[] {
  if (!raw) return [];

  const peers: PeerAddress[] = [];
  for (const entry of raw.split(',')) {
    const trimmed = entry.trim();
    const separator = trimmed.lastIndexOf(':');
    if (separator <= 0) continue;

    const port = parseInt(trimmed.slice(separator + 1), 10);
    if (Number.isNaN(port) || port <= 0 || port > 65535) continue;

    peers.push({ host: trimmed.slice(0, separator), port });
  }
  return peers;
}

export function loadEnvironment(): void {
  loadDotenv();
}

export function loadConfig(env: Env = process.env): NodeConfig {
  return {
    host: env.NODE_HOST || '0.0.0.0',
    port: readInt(env, 'NODE_PORT', DEFAULT_PORT),
    apiPort: readInt(env, 'API_PORT', DEFAULT_API_PORT),
    dataDir: env.DATA_DIR || 'data',
    seedPeers: parsePeerList(env.SEED_PEERS),
    minerWallet: env.MINER_WALLET || 'miner',
    mine: env.MINE === 'true'
  };
}

export function loadChainParams(env: Env = process.env): ChainParams {
  return {
    initialDifficulty: readInt(env, 'DIFFICULTY', DEFAULT_CHAIN_PARAMS.initialDifficulty),
    blockReward: readFloat(env, 'BLOCK_REWARD', DEFAULT_CHAIN_PARAMS.blockReward),
    halvingInterval: readInt(env, 'HALVING_INTERVAL', DEFAULT_CHAIN_PARAMS.halvingInterval),
    maxSupply: readFloat(env, 'MAX_SUPPLY', DEFAULT_CHAIN_PARAMS.maxSupply),
    difficultyAdjustmentInterval: readInt(
      env,
      'DIFFICULTY_ADJUSTMENT_INTERVAL',
      DEFAULT_CHAIN_PARAMS.difficultyAdjustmentInterval
    ),
    targetBlockTime: readFloat(env, 'TARGET_BLOCK_TIME', DEFAULT_CHAIN_PARAMS.targetBlockTime),
    maxTransactionsPerBlock: readInt(
      env,
      'MAX_TRANSACTIONS_PER_BLOCK',
      DEFAULT_CHAIN_PARAMS.maxTransactionsPerBlock
    ),
    pow: {
      timeCost: readInt(env, 'ARGON2_TIME_COST', DEFAULT_POW_PARAMS.timeCost),
      memoryCost: readInt(env, 'ARGON2_MEMORY_COST', DEFAULT_POW_PARAMS.memoryCost),
      parallelism: readInt(env, 'ARGON2_PARALLELISM', DEFAULT_POW_PARAMS.parallelism),
      hashLength: readInt(env, 'ARGON2_HASH_LENGTH', DEFAULT_POW_PARAMS.hashLength)
    }
  };
}

export function loadNetworkParams(env: Env = process.env): NetworkParams {
  return {
    maxPeers: readInt(env, 'MAX_PEERS', DEFAULT_NETWORK_PARAMS.maxPeers),
    pingInterval: readFloat(env, 'PING_INTERVAL', DEFAULT_NETWORK_PARAMS.pingInterval),
    syncInterval: readFloat(env, 'SYNC_INTERVAL', DEFAULT_NETWORK_PARAMS.syncInterval),
    requestTimeoutMs: readInt(env, 'REQUEST_TIMEOUT_MS', DEFAULT_NETWORK_PARAMS.requestTimeoutMs),
    downloadTimeoutMs: readInt(env, 'DOWNLOAD_TIMEOUT_MS', DEFAULT_NETWORK_PARAMS.downloadTimeoutMs),
    miningCooldownMs: readInt(env, 'MINING_COOLDOWN_MS', DEFAULT_NETWORK_PARAMS.miningCooldownMs)
  };
}
