import { EventEmitter } from 'events';
import { Block } from './Block';
import { Transaction } from './Transaction';
import { Blockchain } from './blockchain/Blockchain';
import { ConsensusEngine } from '../consensus/ConsensusEngine';
import { NetworkManager, RemoteInfo } from '../network/NetworkManager';
import { Peer, PeerRegistry, peerKey } from '../network/PeerRegistry';
import { Message, MessageType, ResponseMessage } from '../network/protocol';
import { ChainStore } from '../storage/ChainStore';
import {
  ChainParams,
  DEFAULT_CHAIN_PARAMS,
  DEFAULT_NETWORK_PARAMS,
  NetworkParams,
  NodeConfig,
  PeerAddress
} from '../config';

export type NodeState = 'stopped' | 'listening';

export interface ChainNodeOptions {
  blockchain?: Blockchain;
  chainParams?: ChainParams;
  networkParams?: NetworkParams;
  /** Defaults to a store under `config.dataDir`, or none when that is null. */
  store?: ChainStore | null;
  peers?: PeerAddress[];
}

const MAINTENANCE_TICK_MS = 1000;

function assertNever(value: never): never {
  throw new Error(`Unhandled message: ${JSON.stringify(value)}`);
}

/**
 * A full node: owns the shared Blockchain, the PeerRegistry, the TCP transport and the
 * mining loop, and bridges inbound messages into the ledger.
 *
 * Lifecycle is `stopped -> listening -> stopped`. While listening, a maintenance timer
 * pings peers every `pingInterval` seconds and syncs every `syncInterval` seconds.
 *
 * Events: `node:started`, `node:stopped`, `block:received`, `transaction:received`,
 * `peer:added`, `peer:removed`, `sync:completed`.
 */
export class ChainNode extends EventEmitter {
  public readonly blockchain: Blockchain;
  public readonly peers: PeerRegistry;
  private config: NodeConfig;
  private networkParams: NetworkParams;
  private networkManager: NetworkManager;
  private consensusEngine: ConsensusEngine;
  private store: ChainStore | null;
  private state: NodeState = 'stopped';
  private port: number;
  private maintenanceTimer?: NodeJS.Timeout;
  private lastPingAt: number = 0;
  private lastSyncAt: number = 0;
  private pinging: boolean = false;
  private syncing: boolean = false;

  constructor(config: NodeConfig, options: ChainNodeOptions = {}) {
    super();
    this.config = config;
    this.port = config.port;
    this.networkParams = options.networkParams ?? DEFAULT_NETWORK_PARAMS;
    this.blockchain = options.blockchain ?? new Blockchain(options.chainParams ?? DEFAULT_CHAIN_PARAMS);
    this.peers = new PeerRegistry(this.networkParams.maxPeers);
    this.store = options.store !== undefined ? options.store : config.dataDir ? new ChainStore(config.dataDir) : null;

    this.networkManager = new NetworkManager((message, remote) => this.handleMessage(message, remote));
    this.consensusEngine = new ConsensusEngine(this.blockchain, this.networkParams.miningCooldownMs);
    this.consensusEngine.on('block:mined', (block: Block) => {
      this.onBlockMined(block).catch((error) => console.error('Error propagating mined block:', error));
    });

    const knownPeers = [...(options.peers ?? []), ...config.seedPeers];
    this.peers.load(knownPeers.filter((peer) => !this.isSelf(peer.host, peer.port)));
  }

  /**
   * Builds a node from the snapshot and peer list under `config.dataDir`, falling back
   * to a fresh chain.
   */
  public static async load(
    config: NodeConfig,
    chainParams: ChainParams = DEFAULT_CHAIN_PARAMS,
    networkParams: NetworkParams = DEFAULT_NETWORK_PARAMS
  ): Promise<ChainNode> {
    const store = config.dataDir ? new ChainStore(config.dataDir) : null;
    const blockchain = (store ? await store.loadBlockchain(chainParams) : null) ?? new Blockchain(chainParams);
    if (blockchain.getLength() === 1) {
      console.log('🌱 Starting from the genesis block');
    }
    const peers = store ? await store.loadPeers() : [];

    return new ChainNode(config, { blockchain, chainParams, networkParams, store, peers });
  }

  public getState(): NodeState {
    return this.state;
  }

  public getPort(): number {
    return this.port;
  }

  public getHost(): string {
    return this.config.host;
  }

  public getConfig(): NodeConfig {
    return { ...this.config };
  }

  public isMining(): boolean {
    return this.consensusEngine.isMining();
  }

  public getMiningStatus(): ReturnType<ConsensusEngine['getStatus']> {
    return this.consensusEngine.getStatus();
  }

  /**
   * Binds the listener, schedules peer maintenance and runs one sync pass.
   * @returns false if the socket could not be bound
   */
  public async start(): Promise<boolean> {
    if (this.state === 'listening') {
      console.log('Node already running');
      return true;
    }

    try {
      this.port = await this.networkManager.listen(this.config.host, this.config.port);
    } catch (error) {
      console.error(`❌ Error binding socket: ${error}`);
      return false;
    }

    this.state = 'listening';
    console.log(`🌐 Node listening on ${this.config.host}:${this.port}`);

    const now = Date.now();
    this.lastPingAt = now;
    this.lastSyncAt = now;
    this.maintenanceTimer = setInterval(() => {
      this.runMaintenance().catch((error) => console.error('Maintenance error:', error));
    }, MAINTENANCE_TICK_MS);
    this.maintenanceTimer.unref();

    this.emit('node:started', this.port);
    await this.syncBlockchain();
    return true;
  }

  public async stop(): Promise<void> {
    if (this.state === 'stopped') {
      return;
    }

    this.state = 'stopped';
    if (this.maintenanceTimer) {
      clearInterval(this.maintenanceTimer);
      this.maintenanceTimer = undefined;
    }

    await this.consensusEngine.stopMining();
    await this.networkManager.close();
    await this.persistBlockchain();
    await this.persistPeers();

    console.log('🛑 Node stopped');
    this.emit('node:stopped');
  }

  public startMining(minerAddress: string): boolean {
    return this.consensusEngine.startMining(minerAddress);
  }

  public stopMining(): Promise<void> {
    return this.consensusEngine.stopMining();
  }

  private isSelf(host: string, port: number): boolean {
    return host === this.config.host && port === this.port;
  }

  public addPeer(host: string, port: number): boolean {
    if (this.isSelf(host, port) || !this.peers.add(host, port)) {
      return false;
    }
    this.emit('peer:added', { host, port });
    return true;
  }

  private async runMaintenance(): Promise<void> {
    const now = Date.now();

    if (now - this.lastPingAt >= this.networkParams.pingInterval * 1000) {
      this.lastPingAt = now;
      await this.pingPeers();
    }

    if (now - this.lastSyncAt >= this.networkParams.syncInterval * 1000) {
      this.lastSyncAt = now;
      await this.syncBlockchain();
    }
  }

  // ---- Inbound ----

  public async handleMessage(message: Message, remote: RemoteInfo): Promise<ResponseMessage | null> {
    switch (message.type) {
      case MessageType.PING:
        if (!this.peers.has(message.host, message.port) && this.addPeer(message.host, message.port)) {
          console.log(`🤝 Added new peer: ${peerKey(message.host, message.port)}`);
        }
        this.peers.markSeen(message.host, message.port);
        return { type: MessageType.PONG, timestamp: Date.now() / 1000 };

      case MessageType.GET_PEERS:
        return { type: MessageType.PEERS, peers: this.peers.toJSON() };

      case MessageType.GET_BLOCKS:
        return {
          type: MessageType.BLOCKS,
          blocks: this.blockchain.getBlocks(message.start_index, message.end_index).map((block) => block.toJSON())
        };

      case MessageType.NEW_BLOCK:
        await this.handleNewBlock(Block.fromJSON(message.block));
        return null;

      case MessageType.NEW_TRANSACTION:
        await this.handleNewTransaction(Transaction.fromJSON(message.transaction));
        return null;

      case MessageType.PONG:
      case MessageType.PEERS:
      case MessageType.BLOCKS:
        console.warn(`Ignoring unsolicited ${message.type} from ${remote.address}:${remote.port}`);
        return null;

      default:
        return assertNever(message);
    }
  }

  /**
   * Accepts a block only if it extends the local tip; anything else is dropped silently.
   */
  public async handleNewBlock(block: Block): Promise<boolean> {
    if (!this.blockchain.appendBlock(block)) {
      return false;
    }

    console.log(`📥 Added new block ${block.index} from peer`);
    this.emit('block:received', block);

    await this.persistBlockchain();
    await this.broadcastNewBlock(block);
    return true;
  }

  public async handleNewTransaction(transaction: Transaction): Promise<boolean> {
    if (!this.blockchain.addTransaction(transaction)) {
      return false;
    }

    console.log(`📥 Added new transaction ${transaction.txid} from peer`);
    this.emit('transaction:received', transaction);

    await this.broadcastNewTransaction(transaction);
    return true;
  }

  // ---- Peer maintenance ----

  public async sendPing(peer: Peer): Promise<boolean> {
    const response = await this.networkManager.request(
      peer,
      { type: MessageType.PING, host: this.config.host, port: this.port, timestamp: Date.now() / 1000 },
      this.networkParams.requestTimeoutMs
    );

    if (response?.type !== MessageType.PONG) {
      return false;
    }
    this.peers.markSeen(peer.host, peer.port);
    return true;
  }

  /**
   * Pings every peer, evicts the ones that do not answer, and asks a random survivor
   * for more peers when fewer than half the slots are filled.
   * @returns Number of evicted peers
   */
  public async pingPeers(): Promise<number> {
    if (this.pinging) {
      return 0;
    }

    this.pinging = true;
    try {
      const results = await Promise.all(
        this.peers.list().map(async (peer) => ({ peer, alive: await this.sendPing(peer) }))
      );

      let evicted = 0;
      for (const { peer, alive } of results) {
        if (!alive) {
          console.log(`💀 Peer ${peerKey(peer.host, peer.port)} is dead`);
          this.peers.remove(peer.host, peer.port);
          this.emit('peer:removed', { host: peer.host, port: peer.port });
          evicted++;
        }
      }

      if (this.peers.size() < this.peers.capacity() / 2) {
        await this.discoverPeers();
      }
      return evicted;
    } finally {
      this.pinging = false;
    }
  }

  /**
   * @returns Number of newly learned peers
   */
  public async discoverPeers(): Promise<number> {
    const peer = this.peers.random();
    if (!peer) {
      return 0;
    }

    const response = await this.networkManager.request(
      peer,
      { type: MessageType.GET_PEERS },
      this.networkParams.requestTimeoutMs
    );
    if (response?.type !== MessageType.PEERS) {
      return 0;
    }

    let added = 0;
    for (const record of response.peers) {
      if (this.addPeer(record.host, record.port)) {
        console.log(`🔍 Discovered new peer: ${peerKey(record.host, record.port)}`);
        added++;
      }
    }
    return added;
  }

  // ---- Chain sync ----

  /**
   * @returns The height of the peer's tip, or -1 if it did not answer
   */
  public async getPeerHeight(peer: PeerAddress): Promise<number> {
    const response = await this.networkManager.request(
      peer,
      { type: MessageType.GET_BLOCKS, start_index: -1, end_index: -1 },
      this.networkParams.requestTimeoutMs
    );

    if (response?.type !== MessageType.BLOCKS || response.blocks.length === 0) {
      return -1;
    }
    return response.blocks[0].index;
  }

  /**
   * Longest-chain sync: downloads the missing range from the single peer reporting the
   * greatest height above ours. Downloaded blocks only pass the index and previous-hash
   * check; neither signatures nor proof of work are re-validated.
   * @returns true if at least one block was appended
   */
  public async syncBlockchain(): Promise<boolean> {
    if (this.syncing || this.peers.size() === 0) {
      return false;
    }

    this.syncing = true;
    try {
      const localHeight = this.blockchain.getHeight();
      const heights = await Promise.all(
        this.peers.list().map(async (peer) => ({ peer, height: await this.getPeerHeight(peer) }))
      );

      let best: { peer: Peer; height: number } | null = null;
      for (const candidate of heights) {
        if (candidate.height > (best ? best.height : localHeight)) {
          best = candidate;
        }
      }
      if (!best) {
        return false;
      }

      console.log(
        `🔄 Found peer with longer blockchain: ${peerKey(best.peer.host, best.peer.port)} (height: ${best.height})`
      );
      const synced = await this.downloadBlocks(best.peer, localHeight + 1, best.height);
      this.emit('sync:completed', { peer: best.peer, height: this.blockchain.getHeight() });
      return synced;
    } catch (error) {
      console.error('Error syncing blockchain:', error);
      return false;
    } finally {
      this.syncing = false;
    }
  }

  public async downloadBlocks(peer: PeerAddress, startIndex: number, endIndex: number): Promise<boolean> {
    const response = await this.networkManager.request(
      peer,
      { type: MessageType.GET_BLOCKS, start_index: startIndex, end_index: endIndex },
      this.networkParams.downloadTimeoutMs
    );
    if (response?.type !== MessageType.BLOCKS || response.blocks.length === 0) {
      return false;
    }

    let appended = 0;
    for (const record of response.blocks) {
      const block = Block.fromJSON(record);
      if (block.index < this.blockchain.getLength()) {
        continue;
      }
      if (!this.blockchain.appendBlock(block)) {
        break;
      }
      console.log(`📥 Added block ${block.index} from peer`);
      appended++;
    }

    if (appended > 0) {
      await this.persistBlockchain();
    }
    return appended > 0;
  }

  // ---- Propagation ----

  public async broadcastNewBlock(block: Block): Promise<void> {
    await this.broadcast({ type: MessageType.NEW_BLOCK, block: block.toJSON() });
  }

  public async broadcastNewTransaction(transaction: Transaction): Promise<void> {
    await this.broadcast({ type: MessageType.NEW_TRANSACTION, transaction: transaction.toJSON() });
  }

  private async broadcast(message: Message): Promise<void> {
    await Promise.all(
      this.peers.list().map((peer) => this.networkManager.send(peer, message, this.networkParams.requestTimeoutMs))
    );
  }

  /**
   * Admits a local transaction and floods it to every peer.
   */
  public async addTransaction(transaction: Transaction): Promise<boolean> {
    if (!this.blockchain.addTransaction(transaction)) {
      return false;
    }
    await this.broadcastNewTransaction(transaction);
    return true;
  }

  private async onBlockMined(block: Block): Promise<void> {
    await this.persistBlockchain();
    await this.broadcastNewBlock(block);
  }

  // ---- Persistence ----

  public async persistBlockchain(): Promise<boolean> {
    return this.store ? this.store.saveBlockchain(this.blockchain) : true;
  }

  public async persistPeers(): Promise<boolean> {
    return this.store ? this.store.savePeers(this.peers.toJSON()) : true;
  }
}
