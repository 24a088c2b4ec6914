import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { CryptoUtils, KeyPair } from '../crypto/CryptoUtils';
import { Transaction } from './Transaction';
import { Blockchain } from './blockchain/Blockchain';
import { isRecord } from './Validator';

export const DEFAULT_FEE = 0.0001;

interface KeyFile {
  public_key: string;
  secret_key: string;
}

function isKeyFile(value: unknown): value is KeyFile {
  return isRecord(value) && typeof value.public_key === 'string' && typeof value.secret_key === 'string';
}

/**
 * SLH-DSA key pair, optionally backed by a JSON key file.
 */
export class Wallet {
  private readonly keys: KeyPair;
  private readonly keyfilePath: string | null;

  constructor(keyfilePath: string | null = null, keys?: KeyPair) {
    this.keyfilePath = keyfilePath;
    this.keys = keys ?? this.loadOrGenerateKeys();
  }

  /**
   * Reads the key file when it exists, otherwise generates and saves a new pair.
   * An existing file that is not a key file is never overwritten.
   */
  private loadOrGenerateKeys(): KeyPair {
    if (this.keyfilePath && existsSync(this.keyfilePath)) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(readFileSync(this.keyfilePath, 'utf8'));
      } catch (error) {
        throw new Error(`Failed to load wallet ${this.keyfilePath}: ${error}`);
      }

      if (!isKeyFile(parsed)) {
        throw new Error(`Failed to load wallet ${this.keyfilePath}: not a key file`);
      }
      console.log(`🔑 Loaded wallet from ${this.keyfilePath}`);
      return { publicKey: parsed.public_key, secretKey: parsed.secret_key };
    }

    const keys = CryptoUtils.generateKeyPair();
    console.log('🔑 Generated new SPHINCS+ keypair');

    if (this.keyfilePath) {
      this.saveKeys(keys, this.keyfilePath);
    }
    return keys;
  }

  private saveKeys(keys: KeyPair, path: string): void {
    mkdirSync(dirname(resolve(path)), { recursive: true });
    const file: KeyFile = { public_key: keys.publicKey, secret_key: keys.secretKey };
    writeFileSync(path, JSON.stringify(file));
    console.log(`💾 Saved wallet to ${path}`);
  }

  public getPublicKey(): string {
    return this.keys.publicKey;
  }

  public signTransaction(transaction: Transaction): void {
    if (transaction.sender !== this.getPublicKey()) {
      throw new Error("Transaction sender doesn't match wallet public key");
    }
    transaction.sign(this.keys.secretKey);
  }

  /**
   * Builds and signs a transfer. The balance check is advisory: nothing downstream
   * enforces it, so two transfers built against the same balance can both be admitted.
   */
  public createTransaction(
    blockchain: Blockchain,
    recipient: string,
    amount: number,
    fee: number = DEFAULT_FEE
  ): Transaction {
    const balance = blockchain.getBalance(this.getPublicKey());
    if (balance < amount + fee) {
      throw new Error(`Insufficient balance: ${balance} < ${amount + fee}`);
    }

    const transaction = new Transaction({
      sender: this.getPublicKey(),
      recipient,
      amount,
      fee
    });
    this.signTransaction(transaction);
    return transaction;
  }

  public getBalance(blockchain: Blockchain): number {
    return blockchain.getBalance(this.getPublicKey());
  }
}

/** Wallet names become file names, so nothing that can leave the wallet directory. */
const WALLET_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export class WalletManager {
  private readonly walletDir: string;
  private wallets: Map<string, Wallet> = new Map();
  private defaultWalletName: string | null = null;

  constructor(walletDir: string) {
    this.walletDir = walletDir;
    mkdirSync(walletDir, { recursive: true });
  }

  public static isValidName(name: string): boolean {
    return WALLET_NAME_PATTERN.test(name);
  }

  private pathFor(name: string): string {
    if (!WalletManager.isValidName(name)) {
      throw new Error(`Invalid wallet name: ${JSON.stringify(name)}`);
    }
    return join(this.walletDir, `${name}.json`);
  }

  public createWallet(name: string): Wallet {
    const wallet = new Wallet(this.pathFor(name));
    this.wallets.set(name, wallet);

    if (this.defaultWalletName === null) {
      this.defaultWalletName = name;
    }
    return wallet;
  }

  public loadWallet(name: string): Wallet | null {
    if (!WalletManager.isValidName(name)) {
      console.warn(`Invalid wallet name: ${JSON.stringify(name)}`);
      return null;
    }

    const path = this.pathFor(name);
    if (!existsSync(path)) {
      console.warn(`Wallet ${name} not found`);
      return null;
    }

    const wallet = new Wallet(path);
    this.wallets.set(name, wallet);

    if (this.defaultWalletName === null) {
      this.defaultWalletName = name;
    }
    return wallet;
  }

  public getWallet(name?: string): Wallet | null {
    const walletName = name ?? this.defaultWalletName;
    if (walletName === null) {
      console.warn('No default wallet set');
      return null;
    }

    return this.wallets.get(walletName) ?? this.loadWallet(walletName);
  }

  public setDefaultWallet(name: string): boolean {
    if (!this.wallets.has(name) && !this.loadWallet(name)) {
      return false;
    }
    this.defaultWalletName = name;
    return true;
  }

  public getDefaultWalletName(): string | null {
    return this.defaultWalletName;
  }

  public listWallets(): string[] {
    return readdirSync(this.walletDir)
      .filter((file) => file.endsWith('.json'))
      .map((file) => file.slice(0, -'.json'.length))
      .filter((name) => WalletManager.isValidName(name))
      .sort();
  }
}
