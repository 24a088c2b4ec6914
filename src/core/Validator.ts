import { BlockRecord, ChainSnapshot, PeerRecord, TransactionRecord } from './types/block.types';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return isFiniteNumber(value) && Number.isInteger(value) && value >= 0;
}

/**
 * Structural checks for records arriving from peers or from disk. Only shape is checked
 * here; signatures and chain links are the Blockchain's concern.
 */
export class Validator {
  public static isTransactionRecord(value: unknown): value is TransactionRecord {
    if (!isRecord(value)) return false;

    return (
      typeof value.txid === 'string' &&
      typeof value.sender === 'string' &&
      typeof value.recipient === 'string' &&
      isFiniteNumber(value.amount) &&
      value.amount >= 0 &&
      isFiniteNumber(value.fee) &&
      value.fee >= 0 &&
      isFiniteNumber(value.timestamp) &&
      (value.signature === null || typeof value.signature === 'string')
    );
  }

  public static isBlockRecord(value: unknown): value is BlockRecord {
    if (!isRecord(value)) return false;

    return (
      isNonNegativeInteger(value.index) &&
      typeof value.previous_hash === 'string' &&
      isFiniteNumber(value.timestamp) &&
      Array.isArray(value.transactions) &&
      value.transactions.every((tx) => Validator.isTransactionRecord(tx)) &&
      isNonNegativeInteger(value.nonce) &&
      typeof value.hash === 'string'
    );
  }

  public static isPeerRecord(value: unknown): value is PeerRecord {
    if (!isRecord(value)) return false;

    return (
      typeof value.host === 'string' &&
      value.host.length > 0 &&
      Number.isInteger(value.port) &&
      isFiniteNumber(value.port) &&
      value.port > 0 &&
      value.port <= 65535
    );
  }

  public static isChainSnapshot(value: unknown): value is ChainSnapshot {
    if (!isRecord(value)) return false;

    return (
      Array.isArray(value.chain) &&
      value.chain.length > 0 &&
      value.chain.every((block) => Validator.isBlockRecord(block)) &&
      Array.isArray(value.pending_transactions) &&
      value.pending_transactions.every((tx) => Validator.isTransactionRecord(tx)) &&
      isNonNegativeInteger(value.difficulty) &&
      value.difficulty >= 1
    );
  }
}
