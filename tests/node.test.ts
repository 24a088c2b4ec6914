import { afterEach, describe, it, expect } from 'vitest';
import { ChainNode, ChainNodeOptions } from '../src/core/Node';
import { Blockchain } from '../src/core/blockchain/Blockchain';
import { MessageType } from '../src/network/protocol';
import { PeerAddress } from '../src/config';
import {
  TEST_CHAIN_PARAMS,
  TEST_NETWORK_PARAMS,
  makeTempDir,
  removeDir,
  signedTransaction,
  testKeys,
  testNodeConfig
} from './helpers';

const HOST = '127.0.0.1';
const running: ChainNode[] = [];

async function startNode(options: ChainNodeOptions = {}): Promise<ChainNode> {
  const node = new ChainNode(testNodeConfig(), {
    chainParams: TEST_CHAIN_PARAMS,
    networkParams: TEST_NETWORK_PARAMS,
    ...options
  });
  running.push(node);
  expect(await node.start()).toBe(true);
  return node;
}

function address(node: ChainNode): PeerAddress {
  return { host: HOST, port: node.getPort() };
}

async function mineBlocks(chain: Blockchain, count: number, miner: string): Promise<void> {
  for (let i = 0; i < count; i++) {
    expect(await chain.minePendingTransactions(miner)).not.toBeNull();
  }
}

afterEach(async () => {
  await Promise.all(running.splice(0).map((node) => node.stop()));
});

describe('ChainNode', () => {
  it('moves between stopped and listening', async () => {
    const node = await startNode();
    expect(node.getState()).toBe('listening');
    expect(node.getPort()).toBeGreaterThan(0);

    await node.stop();
    expect(node.getState()).toBe('stopped');
  });

  it('fails to start on a port already in use', async () => {
    const first = await startNode();
    const second = new ChainNode(testNodeConfig({ port: first.getPort() }), { networkParams: TEST_NETWORK_PARAMS });

    expect(await second.start()).toBe(false);
    expect(second.getState()).toBe('stopped');
  });

  it('serves block ranges and the tip', async () => {
    const chain = new Blockchain(TEST_CHAIN_PARAMS);
    await mineBlocks(chain, 2, 'miner');
    const node = await startNode({ blockchain: chain });
    const remote = { address: HOST, port: 1 };

    const tip = await node.handleMessage({ type: MessageType.GET_BLOCKS, start_index: -1, end_index: -1 }, remote);
    expect(tip).toEqual({ type: MessageType.BLOCKS, blocks: [chain.getLatestBlock().toJSON()] });

    const all = await node.handleMessage({ type: MessageType.GET_BLOCKS }, remote);
    if (all?.type !== MessageType.BLOCKS) throw new Error('expected a blocks reply');
    expect(all.blocks.map((block) => block.index)).toEqual([0, 1, 2]);
  });

  it('ignores unsolicited responses', async () => {
    const node = await startNode();
    expect(await node.handleMessage({ type: MessageType.PONG, timestamp: 1 }, { address: HOST, port: 1 })).toBeNull();
  });

  it('does not add itself from the seed list', () => {
    const node = new ChainNode(testNodeConfig({ port: 9555, seedPeers: [{ host: HOST, port: 9555 }, { host: HOST, port: 9556 }] }), {
      networkParams: TEST_NETWORK_PARAMS
    });

    expect(node.peers.toJSON()).toEqual([{ host: HOST, port: 9556 }]);
  });

  it('restores its ledger and peers from the data directory', async () => {
    const dir = makeTempDir();
    try {
      const config = testNodeConfig({ dataDir: dir });
      const first = await ChainNode.load(config, TEST_CHAIN_PARAMS, TEST_NETWORK_PARAMS);
      await mineBlocks(first.blockchain, 1, 'miner');
      first.addPeer('10.0.0.7', 9333);
      expect(await first.persistBlockchain()).toBe(true);
      expect(await first.persistPeers()).toBe(true);

      const second = await ChainNode.load(config, TEST_CHAIN_PARAMS, TEST_NETWORK_PARAMS);
      expect(second.blockchain.toJSON()).toEqual(first.blockchain.toJSON());
      expect(second.peers.toJSON()).toEqual([{ host: '10.0.0.7', port: 9333 }]);
    } finally {
      removeDir(dir);
    }
  });

  describe('peers', () => {
    it('registers the sender of a ping', async () => {
      const a = await startNode();
      const b = await startNode();
      a.addPeer(HOST, b.getPort());

      expect(await a.pingPeers()).toBe(0);
      expect(b.peers.has(HOST, a.getPort())).toBe(true);
      expect(a.peers.get(HOST, b.getPort())?.lastSeen).toBeGreaterThan(0);
      expect(a.peers.size()).toBe(1);
    });

    it('learns peers from a peer', async () => {
      const a = await startNode();
      const b = await startNode();
      const c = await startNode();
      a.addPeer(HOST, b.getPort());
      b.addPeer(HOST, c.getPort());

      expect(await a.discoverPeers()).toBe(1);
      expect(a.peers.has(HOST, c.getPort())).toBe(true);
    });

    it('evicts a peer that does not answer', async () => {
      const gone = await startNode();
      const port = gone.getPort();
      await gone.stop();

      const a = await startNode();
      a.addPeer(HOST, port);

      expect(await a.pingPeers()).toBe(1);
      expect(a.peers.size()).toBe(0);
      expect(await a.getPeerHeight({ host: HOST, port })).toBe(-1);
    });
  });

  describe('sync', () => {
    it('catches up with the longest peer chain', async () => {
      const longer = new Blockchain(TEST_CHAIN_PARAMS);
      await mineBlocks(longer, 3, 'miner-b');
      const b = await startNode({ blockchain: longer });
      const a = await startNode({ peers: [address(b)] });

      expect(a.blockchain.getHeight()).toBe(3);
      expect(a.blockchain.getHeight()).toBe(b.blockchain.getHeight());
      expect(a.blockchain.getLatestBlock().hash).toBe(b.blockchain.getLatestBlock().hash);
      expect(a.blockchain.isChainValid()).toBe(true);
    });

    it('picks the highest of several peers', async () => {
      const short = new Blockchain(TEST_CHAIN_PARAMS);
      await mineBlocks(short, 1, 'miner-b');
      const long = new Blockchain(TEST_CHAIN_PARAMS);
      await mineBlocks(long, 2, 'miner-c');
      const b = await startNode({ blockchain: short });
      const c = await startNode({ blockchain: long });

      const a = await startNode({ peers: [address(b), address(c)] });
      expect(a.blockchain.getHeight()).toBe(2);
      expect(a.blockchain.getLatestBlock().hash).toBe(c.blockchain.getLatestBlock().hash);
    });

    it('leaves the chain alone when no peer is ahead', async () => {
      const b = await startNode();
      const local = new Blockchain(TEST_CHAIN_PARAMS);
      await mineBlocks(local, 1, 'miner-a');
      const a = await startNode({ blockchain: local, peers: [address(b)] });
      const tip = a.blockchain.getLatestBlock().hash;

      expect(await a.syncBlockchain()).toBe(false);
      expect(a.blockchain.getLatestBlock().hash).toBe(tip);
    });

    it('stops at the first block that does not link', async () => {
      const other = new Blockchain(TEST_CHAIN_PARAMS);
      await mineBlocks(other, 2, 'miner-b');
      const b = await startNode({ blockchain: other });

      const local = new Blockchain(TEST_CHAIN_PARAMS);
      await mineBlocks(local, 1, 'miner-a');
      const a = await startNode({ blockchain: local });

      expect(await a.downloadBlocks(address(b), 2, 2)).toBe(false);
      expect(a.blockchain.getHeight()).toBe(1);
    });
  });

  describe('propagation', () => {
    it('extends only the peers whose tip the new block builds on', async () => {
      const matching = await startNode();
      const divergedChain = new Blockchain(TEST_CHAIN_PARAMS);
      await mineBlocks(divergedChain, 1, 'miner-c');
      const diverged = await startNode({ blockchain: divergedChain });
      const divergedTip = diverged.blockchain.getLatestBlock().hash;

      const a = await startNode();
      a.addPeer(HOST, matching.getPort());
      a.addPeer(HOST, diverged.getPort());
      const block = await a.blockchain.minePendingTransactions('miner-a');
      expect(block).not.toBeNull();
      if (!block) return;

      await a.broadcastNewBlock(block);

      expect(matching.blockchain.getHeight()).toBe(1);
      expect(matching.blockchain.getLatestBlock().hash).toBe(block.hash);
      expect(diverged.blockchain.getHeight()).toBe(1);
      expect(diverged.blockchain.getLatestBlock().hash).toBe(divergedTip);
    });

    it('relays transactions to peers', async () => {
      const b = await startNode();
      const a = await startNode({ peers: [address(b)] });
      const tx = signedTransaction(testKeys(), 'bob', 1, 0.01);

      expect(await a.addTransaction(tx)).toBe(true);
      expect(b.blockchain.hasTransaction(tx.txid)).toBe(true);
      expect(await a.addTransaction(tx)).toBe(false);
    });

    it('propagates blocks mined by the mining loop', async () => {
      const b = await startNode();
      const a = await startNode({ peers: [address(b)] });

      const received = new Promise<void>((resolve) => b.once('block:received', () => resolve()));
      expect(a.startMining('miner-a')).toBe(true);
      await received;
      await a.stopMining();

      expect(b.blockchain.getHeight()).toBeGreaterThanOrEqual(1);
      expect(b.blockchain.getBlock(1)?.hash).toBe(a.blockchain.getBlock(1)?.hash);
    });
  });
});
