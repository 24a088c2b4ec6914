import { Transaction } from './Transaction';
import { CryptoUtils } from '../crypto/CryptoUtils';
import { canonicalize } from './serialization';
import { BlockRecord } from './types/block.types';
import { ProofOfWorkParams } from '../config';
import { searchNonce, verifyProofOfWork } from '../consensus/pow';

export class Block {
  public readonly index: number;
  public readonly previousHash: string;
  public readonly timestamp: number;
  public readonly transactions: Transaction[];
  public nonce: number;
  public hash: string;

  constructor(
    index: number,
    previousHash: string,
    timestamp: number,
    transactions: Transaction[],
    nonce: number = 0,
    hash?: string
  ) {
    this.index = index;
    this.previousHash = previousHash;
    this.timestamp = timestamp;
    this.transactions = transactions;
    this.nonce = nonce;
    this.hash = hash ?? this.computeHash();
  }

  public transactionsRoot(): string {
    return CryptoUtils.calculateHash(canonicalize(this.transactions.map((tx) => tx.toJSON())));
  }

  public headerString(nonce: number = this.nonce): string {
    return canonicalize({
      index: this.index,
      previous_hash: this.previousHash,
      timestamp: this.timestamp,
      transactions_root: this.transactionsRoot(),
      nonce
    });
  }

  public computeHash(): string {
    return CryptoUtils.calculateHash(this.headerString());
  }

  /**
   * Input to the proof-of-work search: the header as it reads before any nonce is tried.
   */
  public proofOfWorkBase(): string {
    return this.headerString(0);
  }

  /**
   * Searches nonces from 0 until the two-stage digest has `difficulty` leading zeros.
   * Resolves false, leaving the block unsealed, when `shouldContinue` turns false.
   */
  public async mine(
    difficulty: number,
    params: ProofOfWorkParams,
    shouldContinue?: () => boolean
  ): Promise<boolean> {
    const result = await searchNonce(this.proofOfWorkBase(), difficulty, params, shouldContinue);
    if (!result) {
      return false;
    }

    this.nonce = result.nonce;
    this.hash = this.computeHash();
    return true;
  }

  public hasValidProof(difficulty: number, params: ProofOfWorkParams): Promise<boolean> {
    return verifyProofOfWork(this.proofOfWorkBase(), this.nonce, difficulty, params);
  }

  public getTransactionCount(): number {
    return this.transactions.length;
  }

  public toJSON(): BlockRecord {
    return {
      index: this.index,
      previous_hash: this.previousHash,
      timestamp: this.timestamp,
      transactions: this.transactions.map((tx) => tx.toJSON()),
      nonce: this.nonce,
      hash: this.hash
    };
  }

  public static fromJSON(record: BlockRecord): Block {
    return new Block(
      record.index,
      record.previous_hash,
      record.timestamp,
      record.transactions.map((tx) => Transaction.fromJSON(tx)),
      record.nonce,
      record.hash
    );
  }
}
