import { describe, it, expect } from 'vitest';
import { COINBASE_SENDER, Transaction } from '../src/core/Transaction';
import { CryptoUtils } from '../src/crypto/CryptoUtils';
import { canonicalize } from '../src/core/serialization';
import { signedTransaction, testKeys } from './helpers';

describe('Transaction', () => {
  it('derives the txid from the canonical content', () => {
    const tx = new Transaction({ sender: 'alice', recipient: 'bob', amount: 10, fee: 0.5, timestamp: 1700000000 });

    const expected = CryptoUtils.calculateHash(
      '{"amount": 10, "fee": 0.5, "recipient": "bob", "sender": "alice", "timestamp": 1700000000}'
    );
    expect(tx.txid).toBe(expected);
    expect(tx.computeId()).toBe(expected);
  });

  it('gives different txids to different content', () => {
    const a = new Transaction({ sender: 'alice', recipient: 'bob', amount: 10, fee: 0, timestamp: 1 });
    const b = new Transaction({ sender: 'alice', recipient: 'bob', amount: 11, fee: 0, timestamp: 1 });

    expect(a.txid).not.toBe(b.txid);
  });

  it('signs over the content plus txid and verifies', () => {
    const keys = testKeys();
    const tx = signedTransaction(keys, 'bob', 3, 0.1, 1700000001);

    expect(tx.signature).not.toBeNull();
    expect(tx.signingPayload()).toBe(
      canonicalize({ amount: 3, fee: 0.1, recipient: 'bob', sender: keys.publicKey, timestamp: 1700000001, txid: tx.txid })
    );
    expect(tx.verify()).toBe(true);
  });

  it('does not re-sign a signed transaction', () => {
    const keys = testKeys();
    const tx = signedTransaction(keys, 'bob', 4, 0, 1700000002);
    const signature = tx.signature;

    tx.sign(keys.secretKey);
    expect(tx.signature).toBe(signature);
  });

  it('fails verification when unsigned or tampered', () => {
    const keys = testKeys();
    const unsigned = new Transaction({ sender: keys.publicKey, recipient: 'bob', amount: 1, fee: 0 });
    expect(unsigned.verify()).toBe(false);

    const tx = signedTransaction(keys, 'bob', 5, 0, 1700000003);
    const tampered = Transaction.fromJSON({ ...tx.toJSON(), amount: 500 });
    expect(tampered.txid).toBe(tx.txid);
    expect(tampered.verify()).toBe(false);
  });

  it('marks coinbase transactions', () => {
    const coinbase = Transaction.createCoinbase('miner', 50, 1700000004);

    expect(coinbase.sender).toBe(COINBASE_SENDER);
    expect(coinbase.isCoinbase()).toBe(true);
    expect(coinbase.fee).toBe(0);
    expect(coinbase.signature).toBeNull();
    expect(coinbase.verify()).toBe(false);
  });

  it('keeps the txid verbatim through its record', () => {
    const record = { ...Transaction.createCoinbase('miner', 50, 1).toJSON(), txid: 'f'.repeat(64) };
    const restored = Transaction.fromJSON(record);

    expect(restored.txid).toBe('f'.repeat(64));
    expect(restored.toJSON()).toEqual(record);
  });
});
