/** Wire and snapshot form of a transaction. Field names are part of the protocol. */
export type TransactionRecord = {
  txid: string;
  sender: string;
  recipient: string;
  amount: number;
  fee: number;
  timestamp: number;
  signature: string | null;
};

/** Wire and snapshot form of a block. */
export interface BlockRecord {
  index: number;
  previous_hash: string;
  timestamp: number;
  transactions: TransactionRecord[];
  nonce: number;
  hash: string;
}

export interface ChainSnapshot {
  chain: BlockRecord[];
  pending_transactions: TransactionRecord[];
  difficulty: number;
}

export interface PeerRecord {
  host: string;
  port: number;
}
