import { BlockRecord, PeerRecord, TransactionRecord } from '../core/types/block.types';
import { Validator, isRecord } from '../core/Validator';

export enum MessageType {
  PING = 'ping',
  PONG = 'pong',
  GET_PEERS = 'get_peers',
  PEERS = 'peers',
  GET_BLOCKS = 'get_blocks',
  BLOCKS = 'blocks',
  NEW_BLOCK = 'new_block',
  NEW_TRANSACTION = 'new_transaction'
}

export interface PingMessage {
  type: MessageType.PING;
  host: string;
  port: number;
  timestamp: number;
}

export interface PongMessage {
  type: MessageType.PONG;
  timestamp: number;
}

export interface GetPeersMessage {
  type: MessageType.GET_PEERS;
}

export interface PeersMessage {
  type: MessageType.PEERS;
  peers: PeerRecord[];
}

export interface GetBlocksMessage {
  type: MessageType.GET_BLOCKS;
  start_index?: number;
  end_index?: number;
}

export interface BlocksMessage {
  type: MessageType.BLOCKS;
  blocks: BlockRecord[];
}

export interface NewBlockMessage {
  type: MessageType.NEW_BLOCK;
  block: BlockRecord;
}

export interface NewTransactionMessage {
  type: MessageType.NEW_TRANSACTION;
  transaction: TransactionRecord;
}

export type RequestMessage =
  | PingMessage
  | GetPeersMessage
  | GetBlocksMessage
  | NewBlockMessage
  | NewTransactionMessage;

export type ResponseMessage = PongMessage | PeersMessage | BlocksMessage;

export type Message = RequestMessage | ResponseMessage;

function isOptionalInteger(value: unknown): value is number | undefined {
  return value === undefined || (typeof value === 'number' && Number.isInteger(value));
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Narrows a parsed JSON value to one of the protocol messages, or null if the type is
 * unknown or any field has the wrong shape.
 */
export function toMessage(value: unknown): Message | null {
  if (!isRecord(value)) {
    return null;
  }

  switch (value.type) {
    case MessageType.PING:
      if (!Validator.isPeerRecord(value) || !isFiniteNumber(value.timestamp)) {
        return null;
      }
      return { type: MessageType.PING, host: value.host, port: value.port, timestamp: value.timestamp };

    case MessageType.PONG:
      return isFiniteNumber(value.timestamp) ? { type: MessageType.PONG, timestamp: value.timestamp } : null;

    case MessageType.GET_PEERS:
      return { type: MessageType.GET_PEERS };

    case MessageType.PEERS: {
      const peers = value.peers;
      if (!Array.isArray(peers)) return null;
      return {
        type: MessageType.PEERS,
        peers: peers
          .filter((peer) => Validator.isPeerRecord(peer))
          .map((peer: PeerRecord) => ({ host: peer.host, port: peer.port }))
      };
    }

    case MessageType.GET_BLOCKS: {
      const start = value.start_index;
      const end = value.end_index;
      if (!isOptionalInteger(start) || !isOptionalInteger(end)) return null;
      const message: GetBlocksMessage = { type: MessageType.GET_BLOCKS };
      if (start !== undefined) message.start_index = start;
      if (end !== undefined) message.end_index = end;
      return message;
    }

    case MessageType.BLOCKS: {
      const blocks = value.blocks;
      if (!Array.isArray(blocks) || !blocks.every((block) => Validator.isBlockRecord(block))) return null;
      return { type: MessageType.BLOCKS, blocks };
    }

    case MessageType.NEW_BLOCK:
      return Validator.isBlockRecord(value.block) ? { type: MessageType.NEW_BLOCK, block: value.block } : null;

    case MessageType.NEW_TRANSACTION:
      return Validator.isTransactionRecord(value.transaction)
        ? { type: MessageType.NEW_TRANSACTION, transaction: value.transaction }
        : null;

    default:
      return null;
  }
}

export function decodeMessage(raw: string): Message | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  return toMessage(parsed);
}

export function encodeMessage(message: Message): string {
  return JSON.stringify(message);
}
