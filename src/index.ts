import { join } from 'path';
import { ChainNode } from './core/Node';
import { Wallet, WalletManager } from './core/Wallet';
import { APIServer } from './api/Server';
import { loadChainParams, loadConfig, loadEnvironment, loadNetworkParams, NodeConfig } from './config';

export { ChainNode } from './core/Node';
export { APIServer } from './api/Server';
export { Blockchain } from './core/blockchain/Blockchain';
export { Block } from './core/Block';
export { Transaction } from './core/Transaction';
export { Wallet, WalletManager } from './core/Wallet';
export { CryptoUtils } from './crypto/CryptoUtils';
export * from './config';

class PQChain {
  private config: NodeConfig;
  private node?: ChainNode;
  private apiServer?: APIServer;

  constructor(config: NodeConfig) {
    this.config = config;
  }

  private openMinerWallet(wallets: WalletManager): Wallet {
    const name = this.config.minerWallet;
    const existing = wallets.listWallets().includes(name) ? wallets.loadWallet(name) : null;
    if (existing) {
      wallets.setDefaultWallet(name);
      return existing;
    }

    console.log(`🔑 Creating wallet ${name}`);
    const created = wallets.createWallet(name);
    wallets.setDefaultWallet(name);
    return created;
  }

  public async start(): Promise<void> {
    const node = await ChainNode.load(this.config, loadChainParams(), loadNetworkParams());
    this.node = node;

    if (!(await node.start())) {
      throw new Error(`Failed to bind ${this.config.host}:${this.config.port}`);
    }

    const wallets = new WalletManager(join(this.config.dataDir ?? 'data', 'wallets'));
    const minerWallet = this.openMinerWallet(wallets);

    this.apiServer = new APIServer(node, wallets, this.config.apiPort);
    await this.apiServer.start();

    console.log('🚀 PQChain node started successfully');
    console.log(`📡 P2P port: ${node.getPort()}`);
    console.log(`🧱 Chain height: ${node.blockchain.getHeight()}`);
    console.log(`👛 Default wallet: ${minerWallet.getPublicKey().slice(0, 16)}...`);

    if (this.config.mine) {
      node.startMining(minerWallet.getPublicKey());
    }
  }

  public async stop(): Promise<void> {
    try {
      await this.apiServer?.stop();
      await this.node?.stop();
      console.log('🛑 PQChain node stopped successfully');
    } catch (error) {
      console.error('❌ Error stopping PQChain node:', error);
    }
  }
}

if (require.main === module) {
  loadEnvironment();
  const app = new PQChain(loadConfig());

  const shutdown = (signal: string): void => {
    console.log(`\n🔄 Received ${signal}, shutting down gracefully...`);
    app.stop().then(
      () => process.exit(0),
      () => process.exit(1)
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  app.start().catch((error) => {
    console.error('❌ Failed to start PQChain node:', error);
    process.exit(1);
  });
}
