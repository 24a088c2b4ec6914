import { EventEmitter } from 'events';
import { performance } from 'perf_hooks';
import { Block } from '../Block';
import { Transaction, currentTimestamp } from '../Transaction';
import { ChainSnapshot } from '../types/block.types';
import { ChainParams, DEFAULT_CHAIN_PARAMS } from '../../config';
import { blockReward, retargetDifficulty } from '../../consensus/pow';

export const ZERO_HASH = '0'.repeat(64);
export const GENESIS_TIMESTAMP = 1735689600;
export const GENESIS_RECIPIENT = 'PQChain Genesis Address';

export interface TransactionLookup {
  transaction: Transaction;
  /** `null` while the transaction is still pending. */
  blockIndex: number | null;
}

/**
 * The chain aggregate: block sequence, pending pool and current difficulty.
 *
 * Every mutation (`addTransaction`, `appendBlock`, `adjustDifficulty`) is synchronous, so
 * a mutation always runs to completion before any other handler or the mining loop
 * observes the state. The only long-running step, the nonce search, runs outside that
 * boundary and commits through `appendBlock`, which rejects the block if the tip moved.
 *
 * Events: `transaction:added`, `block:added`, `difficulty:adjusted`.
 */
export class Blockchain extends EventEmitter {
  public readonly params: ChainParams;
  private chain: Block[] = [];
  private pendingTransactions: Transaction[] = [];
  private includedTxids: Set<string> = new Set();
  private difficulty: number;

  constructor(params: ChainParams = DEFAULT_CHAIN_PARAMS) {
    super();
    this.params = params;
    this.difficulty = params.initialDifficulty;
    this.pushBlock(Blockchain.createGenesisBlock(params));
  }

  public static createGenesisBlock(params: ChainParams = DEFAULT_CHAIN_PARAMS): Block {
    const coinbase = Transaction.createCoinbase(GENESIS_RECIPIENT, params.blockReward, GENESIS_TIMESTAMP);
    return new Block(0, ZERO_HASH, GENESIS_TIMESTAMP, [coinbase]);
  }

  public getLatestBlock(): Block {
    return this.chain[this.chain.length - 1];
  }

  public getLength(): number {
    return this.chain.length;
  }

  public getHeight(): number {
    return this.chain.length - 1;
  }

  public getBlock(index: number): Block | undefined {
    return this.chain[index];
  }

  public getChain(): Block[] {
    return [...this.chain];
  }

  public getPendingTransactions(): Transaction[] {
    return [...this.pendingTransactions];
  }

  public getDifficulty(): number {
    return this.difficulty;
  }

  public getBlockReward(height: number): number {
    return blockReward(height, this.params);
  }

  public hasTransaction(txid: string): boolean {
    return this.includedTxids.has(txid) || this.pendingTransactions.some((tx) => tx.txid === txid);
  }

  /**
   * Admits a signed transaction into the pending pool. Balances are not checked here;
   * the only balance check is the advisory one a wallet makes when building a transaction.
   */
  public addTransaction(transaction: Transaction): boolean {
    if (!transaction.verify()) {
      console.warn(`⚠️  Invalid signature for transaction ${transaction.txid}`);
      return false;
    }

    if (this.hasTransaction(transaction.txid)) {
      return false;
    }

    this.pendingTransactions.push(transaction);
    this.emit('transaction:added', transaction);
    return true;
  }

  public createCoinbaseTransaction(minerAddress: string): Transaction {
    return Transaction.createCoinbase(minerAddress, this.getBlockReward(this.chain.length));
  }

  /**
   * Highest fee first; equal fees keep their admission order.
   */
  public selectTransactionsForBlock(): Transaction[] {
    return [...this.pendingTransactions]
      .sort((a, b) => b.fee - a.fee)
      .slice(0, this.params.maxTransactionsPerBlock);
  }

  /**
   * Assembles a block on the current tip, mines it and appends it.
   * Resolves `null` when mining was cancelled or another block took the tip first.
   */
  public async minePendingTransactions(
    minerAddress: string,
    shouldContinue: () => boolean = () => true
  ): Promise<Block | null> {
    const tip = this.getLatestBlock();
    const transactions = [this.createCoinbaseTransaction(minerAddress), ...this.selectTransactionsForBlock()];
    const block = new Block(tip.index + 1, tip.hash, currentTimestamp(), transactions);
    const difficulty = this.difficulty;

    console.log(`⛏️  Mining block ${block.index} with difficulty ${difficulty}...`);
    const startedAt = performance.now();

    const sealed = await block.mine(
      difficulty,
      this.params.pow,
      () => shouldContinue() && this.getLatestBlock().hash === tip.hash
    );
    if (!sealed || !this.appendBlock(block)) {
      return null;
    }

    const seconds = (performance.now() - startedAt) / 1000;
    console.log(`📦 Block ${block.index} mined in ${seconds.toFixed(2)} seconds`);
    return block;
  }

  /**
   * Appends a block that extends the current tip. Rejects (returns false) on an index
   * or previous-hash mismatch; no signature or proof-of-work check is made here.
   */
  public appendBlock(block: Block): boolean {
    if (block.index !== this.chain.length) {
      return false;
    }
    if (block.previousHash !== this.getLatestBlock().hash) {
      return false;
    }

    this.pushBlock(block);

    const included = new Set(block.transactions.map((tx) => tx.txid));
    this.pendingTransactions = this.pendingTransactions.filter((tx) => !included.has(tx.txid));

    if (block.index % this.params.difficultyAdjustmentInterval === 0) {
      this.adjustDifficulty();
    }

    this.emit('block:added', block);
    return true;
  }

  public adjustDifficulty(): void {
    const interval = this.params.difficultyAdjustmentInterval;
    if (this.chain.length <= interval) {
      return;
    }

    const latest = this.getLatestBlock();
    const intervalStart = this.chain[this.chain.length - interval];
    const previous = this.difficulty;

    this.difficulty = retargetDifficulty(
      previous,
      latest.timestamp - intervalStart.timestamp,
      interval,
      this.params.targetBlockTime
    );

    if (this.difficulty !== previous) {
      console.log(`🎯 Difficulty adjusted to ${this.difficulty}`);
      this.emit('difficulty:adjusted', this.difficulty);
    }
  }

  /**
   * Full rescan: hashes, links and non-coinbase signatures of every block after genesis.
   */
  public isChainValid(): boolean {
    for (let i = 1; i < this.chain.length; i++) {
      const current = this.chain[i];
      const previous = this.chain[i - 1];

      if (current.hash !== current.computeHash()) {
        console.warn(`⚠️  Invalid hash for block ${current.index}`);
        return false;
      }

      if (current.previousHash !== previous.hash) {
        console.warn(`⚠️  Invalid previous hash for block ${current.index}`);
        return false;
      }

      for (const tx of current.transactions.slice(1)) {
        if (!tx.verify()) {
          console.warn(`⚠️  Invalid transaction ${tx.txid} in block ${current.index}`);
          return false;
        }
      }
    }

    return true;
  }

  public getBalance(address: string): number {
    let balance = 0;

    for (const block of this.chain) {
      for (const tx of block.transactions) {
        if (tx.recipient === address) {
          balance += tx.amount;
        }
        if (tx.sender === address) {
          balance -= tx.amount + tx.fee;
        }
      }
    }

    return balance;
  }

  /**
   * Inclusive height range. A missing start means genesis and a missing end the tip;
   * negative values count back from the tip (-1 is the tip). The end is clamped to the
   * tip and a start past the end collapses onto it.
   */
  public getBlocks(startIndex?: number, endIndex?: number): Block[] {
    const length = this.chain.length;
    const resolve = (value: number): number => (value < 0 ? value + length : value);

    let start = resolve(startIndex ?? 0);
    let end = Math.min(resolve(endIndex ?? length - 1), length - 1);
    if (start > end) {
      start = end;
    }
    start = Math.max(0, start);
    end = Math.max(0, end);

    return this.chain.slice(start, end + 1);
  }

  public getTransaction(txid: string): TransactionLookup | null {
    for (const block of this.chain) {
      const transaction = block.transactions.find((tx) => tx.txid === txid);
      if (transaction) {
        return { transaction, blockIndex: block.index };
      }
    }

    const pending = this.pendingTransactions.find((tx) => tx.txid === txid);
    return pending ? { transaction: pending, blockIndex: null } : null;
  }

  public toJSON(): ChainSnapshot {
    return {
      chain: this.chain.map((block) => block.toJSON()),
      pending_transactions: this.pendingTransactions.map((tx) => tx.toJSON()),
      difficulty: this.difficulty
    };
  }

  public static fromJSON(snapshot: ChainSnapshot, params: ChainParams = DEFAULT_CHAIN_PARAMS): Blockchain {
    const blockchain = new Blockchain(params);
    blockchain.chain = [];
    blockchain.includedTxids.clear();

    for (const record of snapshot.chain) {
      blockchain.pushBlock(Block.fromJSON(record));
    }
    blockchain.pendingTransactions = snapshot.pending_transactions.map((tx) => Transaction.fromJSON(tx));
    blockchain.difficulty = snapshot.difficulty;
    return blockchain;
  }

  private pushBlock(block: Block): void {
    this.chain.push(block);
    for (const tx of block.transactions) {
      this.includedTxids.add(tx.txid);
    }
  }
}
