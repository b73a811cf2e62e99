/**
 * In-memory WalletBackend for facade and API tests
 */

import { parseValueString, type Amount } from '../utils/amount.js';
import type { NetworkName, SentTransaction } from '../utils/types.js';
import type { CreateWalletParams, WalletBackend, WalletHandle } from '../wallet/backend.js';
import {
  InvalidPassphraseError,
  KeyMismatchError,
  WalletAlreadyExistsError,
  WalletNotFoundError,
} from '../wallet/errors.js';

export interface FakeWalletRecord {
  walletId: number;
  name: string;
  owner: string;
  network: NetworkName;
  passphrase: string;
  /** "<amount> <currency>" reported after a scan */
  balance: string;
  scans: number;
  sendError?: Error;
  sent: { address: string; amount: string }[];
}

export class FakeHandle implements WalletHandle {
  constructor(private readonly record: FakeWalletRecord) {}

  get walletId(): number {
    return this.record.walletId;
  }

  get name(): string {
    return this.record.name;
  }

  get owner(): string {
    return this.record.owner;
  }

  get network(): NetworkName {
    return this.record.network;
  }

  async address(): Promise<string> {
    return `addr-${this.record.name}`;
  }

  async scan(): Promise<void> {
    this.record.scans++;
  }

  balance(): Amount {
    return parseValueString(this.record.balance).amount;
  }

  balanceString(): string {
    return this.record.balance;
  }

  async sendTo(address: string, amount: string): Promise<SentTransaction> {
    if (this.record.sendError) {
      throw this.record.sendError;
    }
    this.record.sent.push({ address, amount });
    return { txid: 'ab'.repeat(32), address, amount, fee: '0.00000141' };
  }
}

export const FAKE_INVALID_PASSPHRASE = 'not a mnemonic';

export class FakeBackend implements WalletBackend {
  readonly wallets = new Map<string, FakeWalletRecord>();
  readonly calls = { create: 0, load: 0, keyFromPassphrase: 0, delete: 0 };
  createError?: Error;
  private nextWalletId = 1;

  /** Balance string given to wallets created from now on */
  defaultBalance = '0.00000000 LTC';

  async create(params: CreateWalletParams): Promise<WalletHandle> {
    this.calls.create++;
    if (this.createError) {
      throw this.createError;
    }
    if (this.wallets.has(params.name)) {
      throw new WalletAlreadyExistsError(params.name);
    }
    const record: FakeWalletRecord = {
      walletId: this.nextWalletId++,
      name: params.name,
      owner: params.owner,
      network: params.network,
      passphrase: params.passphrase,
      balance: this.defaultBalance,
      scans: 0,
      sent: [],
    };
    this.wallets.set(params.name, record);
    return new FakeHandle(record);
  }

  async load(name: string, key: string): Promise<WalletHandle> {
    this.calls.load++;
    await Promise.resolve();
    const record = this.wallets.get(name);
    if (!record) {
      throw new WalletNotFoundError(name);
    }
    if (key !== this.keyFor(record.passphrase)) {
      throw new KeyMismatchError(name);
    }
    return new FakeHandle(record);
  }

  keyFromPassphrase(passphrase: string, _network: NetworkName): string {
    this.calls.keyFromPassphrase++;
    if (passphrase === FAKE_INVALID_PASSPHRASE) {
      throw new InvalidPassphraseError();
    }
    return this.keyFor(passphrase);
  }

  async delete(name: string): Promise<boolean> {
    this.calls.delete++;
    if (!this.wallets.delete(name)) {
      throw new WalletNotFoundError(name);
    }
    return true;
  }

  /** Record of an existing wallet; throws when the name is unknown */
  wallet(name: string): FakeWalletRecord {
    const record = this.wallets.get(name);
    if (!record) {
      throw new Error(`No fake wallet ${name}`);
    }
    return record;
  }

  private keyFor(passphrase: string): string {
    return `xprv-of(${passphrase})`;
  }
}
