import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { Server } from 'http';
import { ChainNode } from '../core/Node';
import { Block } from '../core/Block';
import { Transaction } from '../core/Transaction';
import { WalletManager } from '../core/Wallet';
import { isRecord } from '../core/Validator';

function parseIndex(raw: unknown): number | null {
  if (typeof raw !== 'string' || !/^\d+$/.test(raw)) {
    return null;
  }
  return parseInt(raw, 10);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Operator HTTP API over a running node: chain inspection, wallet-backed transfers,
 * peer management and mining control.
 */
export class APIServer {
  private app: express.Application;
  private node: ChainNode;
  private wallets: WalletManager;
  private port: number;
  private server?: Server;

  constructor(node: ChainNode, wallets: WalletManager, port: number) {
    this.app = express();
    this.node = node;
    this.wallets = wallets;
    this.port = port;
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(helmet());
    this.app.use(cors());
    this.app.use(express.json({ limit: '1mb' }));
  }

  private setupRoutes(): void {
    const blockchain = this.node.blockchain;

    this.app.get('/health', (req, res) => {
      res.json({
        status: 'healthy',
        state: this.node.getState(),
        timestamp: Date.now(),
        blockchain: {
          height: blockchain.getHeight(),
          latestHash: blockchain.getLatestBlock().hash
        },
        pendingTransactions: blockchain.getPendingTransactions().length
      });
    });

    this.app.get('/node/info', (req, res) => {
      const config = this.node.getConfig();

      res.json({
        host: config.host,
        port: this.node.getPort(),
        state: this.node.getState(),
        peers: this.node.peers.size(),
        maxPeers: this.node.peers.capacity(),
        mining: this.node.getMiningStatus(),
        blockchain: {
          length: blockchain.getLength(),
          difficulty: blockchain.getDifficulty(),
          latestBlock: blockchain.getLatestBlock().toJSON()
        }
      });
    });

    this.app.get('/blockchain', (req, res) => {
      const chain = blockchain.getChain();
      const offset = parseIndex(req.query.offset) ?? 0;
      const limit = parseIndex(req.query.limit);

      const result = limit === null ? chain.slice(offset) : chain.slice(offset, offset + limit);

      res.json({
        blockchain: result.map((block) => block.toJSON()),
        totalLength: chain.length,
        returnedLength: result.length
      });
    });

    this.app.get('/blocks/:id', (req, res) => {
      let block: Block | undefined;
      if (req.params.id === 'latest') {
        block = blockchain.getLatestBlock();
      } else {
        const index = parseIndex(req.params.id);
        block = index === null ? undefined : blockchain.getBlock(index);
      }

      if (!block) {
        res.status(404).json({ error: 'Block not found' });
        return;
      }

      res.json({
        block: block.toJSON(),
        transactionCount: block.getTransactionCount()
      });
    });

    this.app.get('/transactions/pending', (req, res) => {
      const pending = blockchain.getPendingTransactions();

      res.json({
        pendingTransactions: pending.map((tx) => tx.toJSON()),
        count: pending.length
      });
    });

    this.app.get('/transactions/:id', (req, res) => {
      const found = blockchain.getTransaction(req.params.id);
      if (!found) {
        res.status(404).json({ error: 'Transaction not found' });
        return;
      }

      res.json({
        transaction: found.transaction.toJSON(),
        status: found.blockIndex === null ? 'pending' : 'confirmed',
        blockIndex: found.blockIndex
      });
    });

    this.app.post('/transactions', async (req, res, next) => {
      try {
        const body: unknown = req.body;
        if (
          !isRecord(body) ||
          typeof body.recipient !== 'string' ||
          body.recipient === '' ||
          typeof body.amount !== 'number' ||
          !(body.amount > 0) ||
          (body.fee !== undefined && (typeof body.fee !== 'number' || body.fee < 0)) ||
          (body.wallet !== undefined && typeof body.wallet !== 'string')
        ) {
          res.status(400).json({
            error: 'Invalid transaction data',
            required: ['recipient', 'amount']
          });
          return;
        }

        if (body.wallet !== undefined && !WalletManager.isValidName(body.wallet)) {
          res.status(400).json({ error: 'Invalid wallet name' });
          return;
        }

        const wallet = this.wallets.getWallet(body.wallet);
        if (!wallet) {
          res.status(404).json({ error: 'Wallet not found' });
          return;
        }

        let transaction: Transaction;
        try {
          transaction = wallet.createTransaction(blockchain, body.recipient, body.amount, body.fee);
        } catch (error) {
          res.status(400).json({ error: errorMessage(error) });
          return;
        }

        if (!(await this.node.addTransaction(transaction))) {
          res.status(409).json({ error: 'Transaction rejected' });
          return;
        }

        res.status(201).json({
          success: true,
          transactionId: transaction.txid,
          message: 'Transaction submitted successfully'
        });
      } catch (error) {
        next(error);
      }
    });

    this.app.get('/balance/:address', (req, res) => {
      res.json({
        address: req.params.address,
        balance: blockchain.getBalance(req.params.address)
      });
    });

    this.app.get('/peers', (req, res) => {
      res.json({
        peers: this.node.peers.list(),
        count: this.node.peers.size()
      });
    });

    this.app.post('/peers', (req, res) => {
      const body: unknown = req.body;
      if (
        !isRecord(body) ||
        typeof body.host !== 'string' ||
        body.host === '' ||
        typeof body.port !== 'number' ||
        !Number.isInteger(body.port) ||
        body.port < 1 ||
        body.port > 65535
      ) {
        res.status(400).json({ error: 'Invalid peer', required: ['host', 'port'] });
        return;
      }

      const added = this.node.addPeer(body.host, body.port);
      res.status(added ? 201 : 409).json({ added, count: this.node.peers.size() });
    });

    this.app.post('/mining/start', (req, res) => {
      const body: unknown = req.body;
      const name = isRecord(body) && typeof body.wallet === 'string' ? body.wallet : undefined;

      if (name !== undefined && !WalletManager.isValidName(name)) {
        res.status(400).json({ error: 'Invalid wallet name' });
        return;
      }

      const wallet = this.wallets.getWallet(name);
      if (!wallet) {
        res.status(404).json({ error: 'Wallet not found' });
        return;
      }

      const started = this.node.startMining(wallet.getPublicKey());
      res.status(started ? 202 : 409).json({ mining: this.node.isMining(), started });
    });

    this.app.post('/mining/stop', async (req, res, next) => {
      try {
        await this.node.stopMining();
        res.json({ mining: this.node.isMining() });
      } catch (error) {
        next(error);
      }
    });

    this.app.get('/validate', (req, res) => {
      res.json({ valid: blockchain.isChainValid(), length: blockchain.getLength() });
    });

    this.app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
      console.error('API Error:', err);
      res.status(500).json({
        error: 'Internal server error',
        message: err.message
      });
    });

    this.app.use((req, res) => {
      res.status(404).json({
        error: 'Endpoint not found',
        path: req.path,
        method: req.method
      });
    });
  }

  /**
   * @returns The bound port (useful when constructed with port 0)
   */
  public start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port);

      server.once('error', reject);
      server.once('listening', () => {
        server.off('error', reject);
        this.server = server;

        const address = server.address();
        if (typeof address === 'object' && address !== null) {
          this.port = address.port;
        }
        console.log(`🌐 API Server listening on port ${this.port}`);
        resolve(this.port);
      });
    });
  }

  public async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
    console.log('🛑 API Server stopped');
  }
}
