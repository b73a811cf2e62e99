/**
 * Wallet Store
 *
 * Persists wallet records as a single JSON document. Records hold only
 * public material: the account xpub, scanned addresses and UTXOs. Keys are
 * re-derived from the passphrase on every load.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { NETWORK_NAMES, toError } from '../utils/types.js';
import { createLogger } from '../utils/logger.js';
import { WalletAlreadyExistsError, WalletNotFoundError } from '../wallet/errors.js';

const logger = createLogger('STORE');

const BASE_UNITS = /^\d+$/;

const StoredAddressSchema = z.object({
  address: z.string(),
  index: z.number().int().nonnegative(),
  used: z.boolean(),
});

const StoredUtxoSchema = z.object({
  txid: z.string(),
  vout: z.number().int().nonnegative(),
  value: z.string().regex(BASE_UNITS),
  address: z.string(),
  confirmed: z.boolean(),
});

const StoredWalletSchema = z.object({
  walletId: z.number().int().positive(),
  name: z.string().min(1),
  owner: z.string(),
  network: z.enum(NETWORK_NAMES),
  masterFingerprint: z.number().int().nonnegative(),
  accountPublicKey: z.string(),
  addresses: z.array(StoredAddressSchema),
  utxos: z.array(StoredUtxoSchema),
  /** Base units, as a decimal string */
  balance: z.string().regex(BASE_UNITS),
  createdAt: z.string(),
  lastScannedAt: z.string().nullable(),
});

const StoreFileSchema = z.object({
  nextWalletId: z.number().int().positive(),
  wallets: z.array(StoredWalletSchema),
});

export type StoredAddress = z.infer<typeof StoredAddressSchema>;
export type StoredUtxo = z.infer<typeof StoredUtxoSchema>;
export type StoredWallet = z.infer<typeof StoredWalletSchema>;
type StoreFile = z.infer<typeof StoreFileSchema>;

export type NewStoredWallet = Omit<StoredWallet, 'walletId'>;

export interface WalletStore {
  findByName(name: string): Promise<StoredWallet | null>;
  /** Assigns the wallet id. Throws WalletAlreadyExistsError on a taken name. */
  insert(wallet: NewStoredWallet): Promise<StoredWallet>;
  /** Throws WalletNotFoundError when the name is unknown */
  update(wallet: StoredWallet): Promise<StoredWallet>;
  /** Returns false when the name is unknown */
  remove(name: string): Promise<boolean>;
}

const EMPTY_STORE: StoreFile = { nextWalletId: 1, wallets: [] };

/**
 * FileWalletStore - wallets.json in a data directory
 *
 * Mutations are serialized through a promise chain and written to a temp
 * file before being renamed over the document.
 */
export class FileWalletStore implements WalletStore {
  private readonly filePath: string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(private readonly dataDir: string) {
    this.filePath = join(dataDir, 'wallets.json');
  }

  async findByName(name: string): Promise<StoredWallet | null> {
    const store = await this.read();
    return store.wallets.find((w) => w.name === name) ?? null;
  }

  async insert(wallet: NewStoredWallet): Promise<StoredWallet> {
    return this.mutate((store) => {
      if (store.wallets.some((w) => w.name === wallet.name)) {
        throw new WalletAlreadyExistsError(wallet.name);
      }
      const stored: StoredWallet = { ...wallet, walletId: store.nextWalletId };
      store.wallets.push(stored);
      store.nextWalletId += 1;
      logger.info('Wallet stored', { name: stored.name, walletId: stored.walletId });
      return stored;
    });
  }

  async update(wallet: StoredWallet): Promise<StoredWallet> {
    return this.mutate((store) => {
      const index = store.wallets.findIndex((w) => w.name === wallet.name);
      if (index === -1) {
        throw new WalletNotFoundError(wallet.name);
      }
      store.wallets[index] = wallet;
      return wallet;
    });
  }

  async remove(name: string): Promise<boolean> {
    return this.mutate((store) => {
      const before = store.wallets.length;
      store.wallets = store.wallets.filter((w) => w.name !== name);
      const removed = store.wallets.length < before;
      if (removed) {
        logger.info('Wallet removed', { name });
      }
      return removed;
    });
  }

  private async mutate<T>(change: (store: StoreFile) => T): Promise<T> {
    const run = this.queue.then(async () => {
      const store = await this.read();
      const result = change(store);
      await this.write(store);
      return result;
    });
    // Keep the chain alive after a failed mutation
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async read(): Promise<StoreFile> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isFileNotFound(error)) {
        return { ...EMPTY_STORE, wallets: [] };
      }
      throw error;
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Corrupt wallet store ${this.filePath}: ${toError(error).message}`, {
        cause: error,
      });
    }

    const parsed = StoreFileSchema.safeParse(document);
    if (!parsed.success) {
      throw new Error(`Corrupt wallet store ${this.filePath}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async write(store: StoreFile): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, JSON.stringify(store, null, 2), 'utf-8');
    await rename(tempPath, this.filePath);
  }
}

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
