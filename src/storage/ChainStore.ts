import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { Blockchain } from '../core/blockchain/Blockchain';
import { PeerRecord } from '../core/types/block.types';
import { Validator } from '../core/Validator';
import { ChainParams } from '../config';

export const BLOCKCHAIN_FILE = 'blockchain.json';
export const PEERS_FILE = 'peers.json';

/**
 * Whole-file JSON snapshots of the ledger and the peer list under one data directory.
 * Writes are queued so two saves never interleave on disk.
 */
export class ChainStore {
  private readonly dataDir: string;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(dataDir: string) {
    this.dataDir = dataDir;
  }

  public get blockchainPath(): string {
    return join(this.dataDir, BLOCKCHAIN_FILE);
  }

  public get peersPath(): string {
    return join(this.dataDir, PEERS_FILE);
  }

  /**
   * @returns null when there is no snapshot or it cannot be read
   */
  public async loadBlockchain(params: ChainParams): Promise<Blockchain | null> {
    const parsed = await this.readJson(this.blockchainPath);
    if (parsed === undefined) {
      return null;
    }

    if (!Validator.isChainSnapshot(parsed)) {
      console.error(`Error loading blockchain: ${this.blockchainPath} is not a ledger snapshot`);
      return null;
    }

    console.log(`📂 Loaded blockchain from ${this.blockchainPath}`);
    return Blockchain.fromJSON(parsed, params);
  }

  public async loadPeers(): Promise<PeerRecord[]> {
    const parsed = await this.readJson(this.peersPath);
    if (!Array.isArray(parsed)) {
      return [];
    }

    const peers = parsed.filter((entry) => Validator.isPeerRecord(entry));
    console.log(`📂 Loaded ${peers.length} peers from ${this.peersPath}`);
    return peers;
  }

  /**
   * Snapshots the chain immediately and queues the write.
   * @returns false if the file could not be written
   */
  public saveBlockchain(blockchain: Blockchain): Promise<boolean> {
    return this.enqueue(this.blockchainPath, JSON.stringify(blockchain.toJSON()));
  }

  public savePeers(peers: PeerRecord[]): Promise<boolean> {
    return this.enqueue(this.peersPath, JSON.stringify(peers));
  }

  private async readJson(path: string): Promise<unknown> {
    if (!existsSync(path)) {
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(await readFile(path, 'utf8'));
      return parsed;
    } catch (error) {
      console.error(`Error reading ${path}:`, error);
      return undefined;
    }
  }

  private enqueue(path: string, contents: string): Promise<boolean> {
    const write = this.writeQueue
      .then(async () => {
        await mkdir(this.dataDir, { recursive: true });
        await writeFile(path, contents);
        return true;
      })
      .catch((error) => {
        console.error(`❌ Error saving ${path}:`, error);
        return false;
      });

    this.writeQueue = write.then(() => undefined);
    return write;
  }
}
