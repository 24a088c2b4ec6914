import { EventEmitter } from 'events';
import { Server, Socket, createConnection, createServer } from 'net';
import { PeerAddress } from '../config';
import { Message, ResponseMessage, decodeMessage, encodeMessage } from './protocol';

/** Upper bound for a single message in either direction. */
export const MAX_MESSAGE_BYTES = 64 * 1024 * 1024;
const INBOUND_IDLE_TIMEOUT_MS = 30000;

export interface RemoteInfo {
  address: string;
  port: number;
}

export type MessageHandler = (message: Message, remote: RemoteInfo) => Promise<ResponseMessage | null>;

function looksComplete(data: string): boolean {
  return data.trimEnd().endsWith('}');
}

function parses(data: string): boolean {
  try {
    JSON.parse(data);
    return true;
  } catch {
    return false;
  }
}

/**
 * Plain TCP transport: every message travels over its own connection, which carries one
 * request and at most one response and is then closed.
 *
 * Events: `listening` (port), `closed`, `message:malformed` (remote).
 */
export class NetworkManager extends EventEmitter {
  private server?: Server;
  private connections: Set<Socket> = new Set();
  private isRunning: boolean = false;
  private readonly handler: MessageHandler;

  constructor(handler: MessageHandler) {
    super();
    this.handler = handler;
  }

  /**
   * Binds the listener. Resolves with the bound port (useful with port 0), rejects if
   * the socket cannot be bound.
   */
  public listen(host: string, port: number): Promise<number> {
    if (this.server) {
      return Promise.reject(new Error('Network manager is already listening'));
    }

    return new Promise((resolve, reject) => {
      const server = createServer({ allowHalfOpen: true }, (socket) => this.handleConnection(socket));

      const onError = (error: Error): void => {
        server.close();
        reject(error);
      };

      server.once('error', onError);
      server.listen(port, host, () => {
        server.off('error', onError);
        server.on('error', (error) => console.error('Server error:', error));

        this.server = server;
        this.isRunning = true;

        const address = server.address();
        const boundPort = typeof address === 'object' && address !== null ? address.port : port;
        this.emit('listening', boundPort);
        resolve(boundPort);
      });
    });
  }

  public async close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    this.isRunning = false;
    this.server = undefined;

    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();

    await new Promise<void>((resolve) => server.close(() => resolve()));
    this.emit('closed');
  }

  public isListening(): boolean {
    return this.isRunning;
  }

  private handleConnection(socket: Socket): void {
    this.connections.add(socket);
    socket.on('close', () => this.connections.delete(socket));
    socket.on('error', (error) => console.error('Connection error:', error.message));
    socket.setEncoding('utf8');
    socket.setTimeout(INBOUND_IDLE_TIMEOUT_MS, () => socket.destroy());

    const remote: RemoteInfo = {
      address: socket.remoteAddress ?? 'unknown',
      port: socket.remotePort ?? 0
    };

    let data = '';
    let handled = false;

    const dispatch = (): void => {
      if (handled) return;
      handled = true;

      const message = decodeMessage(data);
      if (!message) {
        this.emit('message:malformed', remote);
        socket.end();
        return;
      }

      this.handler(message, remote)
        .then((response) => {
          if (response) {
            socket.end(encodeMessage(response));
          } else {
            socket.end();
          }
        })
        .catch((error) => {
          console.error('Error handling client:', error);
          socket.destroy();
        });
    };

    socket.on('data', (chunk: string) => {
      if (handled) return;

      data += chunk;
      if (data.length > MAX_MESSAGE_BYTES) {
        handled = true;
        socket.destroy();
        return;
      }
      if (looksComplete(data) && parses(data)) {
        dispatch();
      }
    });

    socket.on('end', () => {
      if (!handled && data.length > 0) {
        dispatch();
      } else if (!handled) {
        socket.end();
      }
    });
  }

  /**
   * Sends a request and waits for the single response.
   * @returns The decoded response, or null if the peer was unreachable, timed out or
   * answered with something that does not decode
   */
  public async request(peer: PeerAddress, message: Message, timeoutMs: number): Promise<Message | null> {
    const raw = await this.exchange(peer, message, timeoutMs, true);
    return raw ? decodeMessage(raw) : null;
  }

  /**
   * Sends a message that expects no response and waits for the peer to close.
   * @returns false if the peer could not be reached
   */
  public async send(peer: PeerAddress, message: Message, timeoutMs: number): Promise<boolean> {
    const raw = await this.exchange(peer, message, timeoutMs, false);
    return raw !== null;
  }

  private exchange(
    peer: PeerAddress,
    message: Message,
    timeoutMs: number,
    expectResponse: boolean
  ): Promise<string | null> {
    return new Promise((resolve) => {
      const socket = createConnection({ host: peer.host, port: peer.port });
      let data = '';
      let settled = false;

      const finish = (result: string | null): void => {
        if (settled) return;
        settled = true;
        socket.destroy();
        resolve(result);
      };

      socket.setEncoding('utf8');
      socket.setTimeout(timeoutMs, () => finish(null));

      socket.on('connect', () => {
        socket.end(encodeMessage(message));
      });

      socket.on('data', (chunk: string) => {
        data += chunk;
        if (data.length > MAX_MESSAGE_BYTES) {
          finish(null);
        } else if (expectResponse && looksComplete(data) && parses(data)) {
          finish(data);
        }
      });

      const onClosed = (): void => {
        if (expectResponse) {
          finish(data.length > 0 ? data : null);
        } else {
          finish(data);
        }
      };

      socket.on('end', onClosed);
      socket.on('close', onClosed);
      socket.on('error', () => finish(null));
    });
  }
}
