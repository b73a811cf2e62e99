/**
 * CryptoWallet
 *
 * Asynchronous facade over one backend wallet. The backend handle is loaded
 * lazily on the first operation that needs it; concurrent first calls share
 * the same in-flight load.
 *
 * Failure policy:
 * - an empty passphrase on the load path throws PassphraseError
 * - backend load errors are logged and rethrown
 * - send and deleteWallet report wallet failures as `false`
 */

import { Amount, formatValueString, parseValueString } from '../utils/amount.js';
import { NETWORK_NAMES, type NetworkName, type WalletInfo } from '../utils/types.js';
import { createLogger } from '../utils/logger.js';
import type { EventBus } from '../events/index.js';
import type { MnemonicGenerator, WalletBackend, WalletHandle } from './backend.js';
import {
  PassphraseError,
  WalletAlreadyExistsError,
  WalletError,
  WalletNotFoundError,
} from './errors.js';
import { FeeSchedule } from './fee-schedule.js';
import { Bip39MnemonicGenerator } from './mnemonic.js';

const logger = createLogger('WALLET');

export interface CryptoWalletOptions {
  readonly backend: WalletBackend;
  readonly passphrase?: string;
  /** Sweep destination used by send() when no address is given */
  readonly mainWallet?: string;
  readonly network?: NetworkName;
  readonly owner?: string;
  readonly fees?: FeeSchedule;
  /** Replaces the schedule's fee on every fee-bearing network */
  readonly fee?: string;
  readonly mnemonic?: MnemonicGenerator;
  readonly events?: EventBus;
}

type HandleState =
  | { readonly status: 'unloaded' }
  | { readonly status: 'loading'; readonly promise: Promise<WalletHandle> }
  | { readonly status: 'loaded'; readonly handle: WalletHandle };

export class CryptoWallet {
  private readonly walletName: string;
  private readonly walletNetwork: NetworkName;
  private readonly walletOwner: string;
  private readonly backend: WalletBackend;
  private readonly fees: FeeSchedule;
  private readonly mnemonic: MnemonicGenerator;
  private readonly events?: EventBus;

  private currentPassphrase: string;
  private sweepAddress: string;
  private currentWalletId: number = 0;
  private state: HandleState = { status: 'unloaded' };

  constructor(name: string, options: CryptoWalletOptions) {
    if (!name) {
      throw new TypeError('Wallet name is required');
    }
    this.walletName = name;
    this.backend = options.backend;
    this.currentPassphrase = options.passphrase ?? '';
    this.sweepAddress = options.mainWallet ?? '';
    this.walletNetwork = options.network ?? 'litecoin';
    this.walletOwner = options.owner ?? '';
    this.mnemonic = options.mnemonic ?? new Bip39MnemonicGenerator();
    this.events = options.events;

    let fees = options.fees ?? new FeeSchedule();
    if (options.fee !== undefined) {
      for (const network of NETWORK_NAMES) {
        if (fees.isFeeBearing(network)) {
          fees = fees.withFee(network, options.fee);
        }
      }
    }
    this.fees = fees;
  }

  // ============================================
  // LIFECYCLE
  // ============================================

  /**
   * Create the wallet in the backend, or load it from the passphrase when the
   * name is already taken. Without a passphrase a fresh mnemonic is generated
   * and becomes this wallet's passphrase.
   */
  async createOrLoad(): Promise<this> {
    const passphrase = this.currentPassphrase || this.mnemonic.generate();

    try {
      const handle = await this.backend.create({
        name: this.walletName,
        passphrase,
        network: this.walletNetwork,
        owner: this.walletOwner,
      });
      this.currentPassphrase = passphrase;
      this.setLoaded(handle);
      logger.debug('Wallet created', { name: this.walletName, walletId: handle.walletId });
      this.events?.emit({
        type: 'wallet_created',
        walletName: this.walletName,
        walletId: handle.walletId,
        network: handle.network,
      });
      return this;
    } catch (error) {
      if (!(error instanceof WalletAlreadyExistsError)) {
        throw error;
      }
      logger.debug('Wallet already exists, loading from passphrase', { name: this.walletName });
    }

    return this.loadFromPassphrase();
  }

  /** Alias of createOrLoad() */
  async getWallet(): Promise<this> {
    return this.createOrLoad();
  }

  /**
   * Load (never create) the wallet with the key derived from the passphrase
   */
  async loadFromPassphrase(): Promise<this> {
    const handle = await this.loadHandle();
    this.setLoaded(handle);
    logger.debug('Wallet loaded', { name: this.walletName, walletId: handle.walletId });
    this.events?.emit({
      type: 'wallet_loaded',
      walletName: this.walletName,
      walletId: handle.walletId,
      network: handle.network,
    });
    return this;
  }

  /** Alias of loadFromPassphrase() */
  async loadData(): Promise<this> {
    return this.loadFromPassphrase();
  }

  /**
   * Remove the wallet from backend storage. Returns false when there was
   * nothing to delete.
   */
  async deleteWallet(): Promise<boolean> {
    try {
      const deleted = await this.backend.delete(this.walletName);
      if (!deleted) {
        return false;
      }
    } catch (error) {
      if (error instanceof WalletNotFoundError) {
        logger.debug('Wallet delete skipped', { name: this.walletName, error: error.message });
        return false;
      }
      throw error;
    }

    this.state = { status: 'unloaded' };
    this.currentWalletId = 0;
    logger.debug('Wallet deleted', { name: this.walletName });
    this.events?.emit({ type: 'wallet_deleted', walletName: this.walletName });
    return true;
  }

  // ============================================
  // QUERIES
  // ============================================

  async address(): Promise<string> {
    const handle = await this.ensureLoaded();
    const address = await handle.address();
    logger.debug('Wallet address', { name: this.walletName, address });
    return address;
  }

  /**
   * Scan the chain and return the total balance in coin units
   */
  async balance(): Promise<Amount> {
    const handle = await this.ensureLoaded();
    await this.scan(handle);
    const balance = handle.balance();
    logger.debug('Wallet balance', { name: this.walletName, balance: balance.toString() });
    return balance;
  }

  /**
   * Scan the chain and return "<amount> <currency>" with the network fee held
   * back, never below zero. The result keeps the balance's decimal places.
   * The fee follows the network the wallet is stored under.
   */
  async balanceWithFeeDeducted(): Promise<string> {
    const handle = await this.ensureLoaded();
    await this.scan(handle);

    const { amount, currency } = parseValueString(handle.balanceString());
    const remaining = amount.minus(this.fees.feeFor(handle.network)).clampToZero();
    const result = formatValueString({ amount: remaining, currency });

    logger.debug('Wallet balance with fee', { name: this.walletName, balance: result });
    return result;
  }

  /**
   * Normalized wallet record. Balance figures are from the last scan.
   */
  async info(): Promise<WalletInfo> {
    const handle = await this.ensureLoaded();
    const address = await this.address();
    return {
      walletId: handle.walletId,
      name: handle.name,
      owner: handle.owner,
      passphrase: this.currentPassphrase,
      address,
      network: handle.network,
      balance: handle.balance().toString(),
      balanceString: handle.balanceString(),
    };
  }

  // ============================================
  // TRANSFERS
  // ============================================

  /**
   * Send `amount` (e.g. "0.0015544 LTC") to `address`. By default the whole
   * fee-adjusted balance goes to the main wallet.
   */
  async send(amount?: string, address?: string): Promise<boolean> {
    const handle = await this.ensureLoaded();
    const target = address || this.sweepAddress;
    let value = amount ?? '';

    try {
      if (!value) {
        value = await this.balanceWithFeeDeducted();
      }
      logger.debug('Sending', { name: this.walletName, amount: value, address: target });

      const transaction = await handle.sendTo(target, value);
      logger.info('Transaction sent', { name: this.walletName, ...transaction });
      this.events?.emit({
        type: 'transaction_sent',
        walletName: this.walletName,
        txid: transaction.txid,
        address: transaction.address,
        amount: transaction.amount,
      });
      return true;
    } catch (error) {
      if (!(error instanceof WalletError)) {
        throw error;
      }
      logger.error('Send failed', {
        name: this.walletName,
        amount: value,
        address: target,
        code: error.code,
        error: error.message,
      });
      this.events?.emit({
        type: 'transaction_failed',
        walletName: this.walletName,
        address: target,
        amount: value,
        error: error.message,
      });
      return false;
    }
  }

  // ============================================
  // ACCESSORS
  // ============================================

  get name(): string {
    return this.walletName;
  }

  /** Network of the loaded wallet; the requested network until then */
  get network(): NetworkName {
    return this.state.status === 'loaded' ? this.state.handle.network : this.walletNetwork;
  }

  get owner(): string {
    return this.walletOwner;
  }

  get passphrase(): string {
    return this.currentPassphrase;
  }

  get walletId(): number {
    return this.currentWalletId;
  }

  get fee(): Amount {
    return this.fees.feeFor(this.network);
  }

  get isLoaded(): boolean {
    return this.state.status === 'loaded';
  }

  get handle(): WalletHandle | null {
    return this.state.status === 'loaded' ? this.state.handle : null;
  }

  get mainWallet(): string {
    return this.sweepAddress;
  }

  set mainWallet(value: string) {
    if (typeof value !== 'string') {
      throw new TypeError(`Main wallet must be a string, got ${typeof value}`);
    }
    this.sweepAddress = value;
  }

  // ============================================
  // INTERNALS
  // ============================================

  /**
   * Loaded handle, joining an in-flight load or starting one.
   * A failed load leaves the wallet unloaded so the next call retries.
   */
  private async ensureLoaded(): Promise<WalletHandle> {
    const state = this.state;
    switch (state.status) {
      case 'loaded':
        return state.handle;
      case 'loading':
        return state.promise;
      case 'unloaded': {
        const promise = this.loadHandle();
        this.state = { status: 'loading', promise };
        try {
          const handle = await promise;
          this.setLoaded(handle);
          return handle;
        } catch (error) {
          this.state = { status: 'unloaded' };
          throw error;
        }
      }
    }
  }

  private async loadHandle(): Promise<WalletHandle> {
    if (!this.currentPassphrase) {
      throw new PassphraseError(this.walletName);
    }

    try {
      const key = this.backend.keyFromPassphrase(this.currentPassphrase, this.walletNetwork);
      return await this.backend.load(this.walletName, key);
    } catch (error) {
      logger.error('Wallet load failed', {
        name: this.walletName,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private setLoaded(handle: WalletHandle): void {
    this.state = { status: 'loaded', handle };
    this.currentWalletId = handle.walletId;
  }

  private async scan(handle: WalletHandle): Promise<void> {
    logger.debug('Scanning', { name: this.walletName });
    await handle.scan();
    this.events?.emit({
      type: 'balance_scanned',
      walletName: this.walletName,
      balance: handle.balanceString(),
    });
  }
}
