import { Worker } from 'worker_threads';
import { ProofOfWorkParams } from '../config';
import { isRecord } from '../core/Validator';

/**
 * Runs inside the worker. Plain CommonJS so the same source loads from `dist/` and
 * under the test runner; hash-wasm is resolved by the parent and passed in.
 */
const WORKER_SOURCE = `
const { parentPort, workerData } = require('worker_threads');
const { argon2id } = require(workerData.hashWasmPath);

parentPort.on('message', (request) => {
  argon2id({
    password: request.password,
    salt: request.salt,
    iterations: request.params.timeCost,
    memorySize: request.params.memoryCost,
    parallelism: request.params.parallelism,
    hashLength: request.params.hashLength,
    outputType: 'encoded'
  }).then(
    (encoded) => parentPort.postMessage({ id: request.id, encoded }),
    (error) => parentPort.postMessage({ id: request.id, error: String(error && error.message ? error.message : error) })
  );
});
`;

interface PendingHash {
  resolve: (encoded: string) => void;
  reject: (error: Error) => void;
}

/**
 * Argon2id on a worker thread, so a mining attempt never holds up socket handlers on
 * the main event loop. The thread starts on first use and is only referenced while a
 * hash is outstanding; an idle worker never keeps the process alive.
 */
export class Argon2Worker {
  private worker: Worker | null = null;
  private pending: Map<number, PendingHash> = new Map();
  private nextId: number = 0;

  /**
   * @returns The PHC-encoded Argon2id output
   */
  public hash(password: string, salt: string, params: ProofOfWorkParams): Promise<string> {
    const worker = this.ensureWorker();
    const id = this.nextId++;

    return new Promise((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      worker.ref();
      worker.postMessage({ id, password, salt, params });
    });
  }

  private ensureWorker(): Worker {
    if (this.worker) {
      return this.worker;
    }

    const worker = new Worker(WORKER_SOURCE, {
      eval: true,
      workerData: { hashWasmPath: require.resolve('hash-wasm') }
    });
    worker.on('message', (message: unknown) => this.handleMessage(worker, message));
    worker.on('error', (error) => this.fail(worker, error));
    worker.on('exit', (code) => this.fail(worker, new Error(`Argon2 worker exited with code ${code}`)));
    worker.unref();

    this.worker = worker;
    return worker;
  }

  private handleMessage(worker: Worker, message: unknown): void {
    if (!isRecord(message) || typeof message.id !== 'number') {
      return;
    }

    const pending = this.pending.get(message.id);
    if (!pending) {
      return;
    }
    this.pending.delete(message.id);

    if (typeof message.encoded === 'string') {
      pending.resolve(message.encoded);
    } else {
      pending.reject(new Error(`Argon2 failed: ${String(message.error)}`));
    }

    if (this.pending.size === 0) {
      worker.unref();
    }
  }

  /**
   * A crashed worker fails everything it was computing; the next hash starts a fresh one.
   */
  private fail(worker: Worker, error: Error): void {
    if (this.worker !== worker) {
      return;
    }

    this.worker = null;
    const pending = Array.from(this.pending.values());
    this.pending.clear();
    for (const request of pending) {
      request.reject(error);
    }
  }
}
