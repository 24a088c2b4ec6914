import { CryptoUtils } from '../crypto/CryptoUtils';
import { canonicalize } from './serialization';
import { TransactionRecord } from './types/block.types';

/** Sender of coinbase transactions. */
export const COINBASE_SENDER = '0'.repeat(64);

export interface TransactionData {
  sender: string;
  recipient: string;
  amount: number;
  fee: number;
  timestamp?: number;
  signature?: string | null;
}

export function currentTimestamp(): number {
  return Date.now() / 1000;
}

export class Transaction {
  public readonly sender: string;
  public readonly recipient: string;
  public readonly amount: number;
  public readonly fee: number;
  public readonly timestamp: number;
  public readonly txid: string;
  public signature: string | null;

  constructor(data: TransactionData, txid?: string) {
    this.sender = data.sender;
    this.recipient = data.recipient;
    this.amount = data.amount;
    this.fee = data.fee;
    this.timestamp = data.timestamp ?? currentTimestamp();
    this.signature = data.signature ?? null;
    // Computed once; signing never changes it.
    this.txid = txid ?? this.computeId();
  }

  public computeId(): string {
    return CryptoUtils.calculateHash(
      canonicalize({
        sender: this.sender,
        recipient: this.recipient,
        amount: this.amount,
        fee: this.fee,
        timestamp: this.timestamp
      })
    );
  }

  public signingPayload(): string {
    return canonicalize({
      txid: this.txid,
      sender: this.sender,
      recipient: this.recipient,
      amount: this.amount,
      fee: this.fee,
      timestamp: this.timestamp
    });
  }

  public sign(secretKey: string): void {
    if (this.signature) {
      return;
    }
    this.signature = CryptoUtils.sign(this.signingPayload(), secretKey);
  }

  public verify(): boolean {
    if (!this.signature) {
      return false;
    }
    return CryptoUtils.verify(this.signingPayload(), this.signature, this.sender);
  }

  public isCoinbase(): boolean {
    return this.sender === COINBASE_SENDER;
  }

  public toJSON(): TransactionRecord {
    return {
      txid: this.txid,
      sender: this.sender,
      recipient: this.recipient,
      amount: this.amount,
      fee: this.fee,
      timestamp: this.timestamp,
      signature: this.signature
    };
  }

  public static fromJSON(record: TransactionRecord): Transaction {
    return new Transaction(
      {
        sender: record.sender,
        recipient: record.recipient,
        amount: record.amount,
        fee: record.fee,
        timestamp: record.timestamp,
        signature: record.signature
      },
      record.txid
    );
  }

  public static createCoinbase(recipient: string, amount: number, timestamp?: number): Transaction {
    return new Transaction({
      sender: COINBASE_SENDER,
      recipient,
      amount,
      fee: 0,
      timestamp
    });
  }
}
