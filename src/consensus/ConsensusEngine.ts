import { EventEmitter } from 'events';
import { performance } from 'perf_hooks';
import { setTimeout as sleep } from 'timers/promises';
import { Blockchain } from '../core/blockchain/Blockchain';

export const DEFAULT_STOP_TIMEOUT_MS = 1000;

/**
 * Continuous mining loop over a shared Blockchain.
 *
 * The mining flag is polled before every nonce attempt, so `stopMining` takes effect
 * within one Argon2 evaluation. A failed iteration is logged and followed by a
 * cooldown; the loop only ends when mining is stopped.
 *
 * Events: `mining:started` (minerAddress), `block:mined` (Block), `mining:error` (error),
 * `mining:stopped`.
 */
export class ConsensusEngine extends EventEmitter {
  private readonly blockchain: Blockchain;
  private readonly cooldownMs: number;
  private mining: boolean = false;
  private loop: Promise<void> | null = null;
  private minerAddress: string | null = null;
  private blocksMined: number = 0;

  constructor(blockchain: Blockchain, cooldownMs: number) {
    super();
    this.blockchain = blockchain;
    this.cooldownMs = cooldownMs;
  }

  public startMining(minerAddress: string): boolean {
    if (this.mining) {
      console.log('Mining already in progress');
      return false;
    }

    this.mining = true;
    this.minerAddress = minerAddress;
    this.loop = this.mineContinuously(minerAddress);
    console.log(`⛏️  Started mining, rewards to ${minerAddress.slice(0, 16)}...`);
    this.emit('mining:started', minerAddress);
    return true;
  }

  /**
   * Clears the mining flag and waits up to `timeoutMs` for the loop to notice.
   */
  public async stopMining(timeoutMs: number = DEFAULT_STOP_TIMEOUT_MS): Promise<void> {
    const loop = this.loop;
    if (!loop) {
      return;
    }

    this.mining = false;
    this.loop = null;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });
    await Promise.race([loop, timeout]);
    clearTimeout(timer);

    console.log('🛑 Mining stopped');
    this.emit('mining:stopped');
  }

  public isMining(): boolean {
    return this.mining;
  }

  public getStatus(): { mining: boolean; minerAddress: string | null; blocksMined: number; difficulty: number } {
    return {
      mining: this.mining,
      minerAddress: this.minerAddress,
      blocksMined: this.blocksMined,
      difficulty: this.blockchain.getDifficulty()
    };
  }

  private async mineContinuously(minerAddress: string): Promise<void> {
    while (this.mining) {
      try {
        const difficulty = this.blockchain.getDifficulty();
        const startedAt = performance.now();
        const block = await this.blockchain.minePendingTransactions(minerAddress, () => this.mining);
        if (!block) {
          continue;
        }

        const seconds = Math.max((performance.now() - startedAt) / 1000, 0.001);
        const hashrate = Math.pow(16, difficulty) / seconds;
        this.blocksMined++;

        console.log(`✅ Mined block ${block.index} with ${block.getTransactionCount()} transactions`);
        console.log(`   Block hash: ${block.hash}`);
        console.log(`   Approximate hashrate: ${hashrate.toFixed(2)} H/s`);

        this.emit('block:mined', block);
      } catch (error) {
        console.error('Mining error:', error);
        this.emit('mining:error', error);
        await sleep(this.cooldownMs);
      }
    }
  }
}
