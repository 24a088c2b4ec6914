import { PeerRecord } from '../core/types/block.types';

export interface Peer {
  host: string;
  port: number;
  /** Seconds since epoch of the last successful contact, 0 if never reached. */
  lastSeen: number;
}

export function peerKey(host: string, port: number): string {
  return `${host}:${port}`;
}

/**
 * Known remote endpoints, keyed by host and port, capped at `maxPeers`.
 * Enumeration order carries no meaning.
 */
export class PeerRegistry {
  private peers: Map<string, Peer> = new Map();
  private readonly maxPeers: number;

  constructor(maxPeers: number) {
    this.maxPeers = maxPeers;
  }

  /**
   * @returns false when the peer is already known or the registry is full
   */
  public add(host: string, port: number): boolean {
    const key = peerKey(host, port);
    if (this.peers.has(key) || this.isFull()) {
      return false;
    }

    this.peers.set(key, { host, port, lastSeen: 0 });
    return true;
  }

  public remove(host: string, port: number): boolean {
    return this.peers.delete(peerKey(host, port));
  }

  public has(host: string, port: number): boolean {
    return this.peers.has(peerKey(host, port));
  }

  public get(host: string, port: number): Peer | undefined {
    return this.peers.get(peerKey(host, port));
  }

  public markSeen(host: string, port: number, at: number = Date.now() / 1000): void {
    const peer = this.peers.get(peerKey(host, port));
    if (peer) {
      peer.lastSeen = at;
    }
  }

  public list(): Peer[] {
    return Array.from(this.peers.values());
  }

  public size(): number {
    return this.peers.size;
  }

  public capacity(): number {
    return this.maxPeers;
  }

  public isFull(): boolean {
    return this.peers.size >= this.maxPeers;
  }

  public random(): Peer | undefined {
    const peers = this.list();
    if (peers.length === 0) {
      return undefined;
    }
    return peers[Math.floor(Math.random() * peers.length)];
  }

  /**
   * Merges records into the registry until it is full.
   * @returns Number of peers that were new
   */
  public load(records: PeerRecord[]): number {
    let added = 0;
    for (const record of records) {
      if (this.add(record.host, record.port)) {
        added++;
      }
    }
    return added;
  }

  public toJSON(): PeerRecord[] {
    return this.list().map((peer) => ({ host: peer.host, port: peer.port }));
  }
}
