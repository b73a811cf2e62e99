/**
 * HD Wallet Backend
 *
 * Implements the WalletBackend contract on BIP84 keys, a JSON wallet store
 * and Esplora chain access.
 *
 * SECURITY: private keys exist only inside a loaded handle. Nothing secret is
 * persisted; every load re-derives the master key and checks it against the
 * stored account xpub.
 */

import type { HDKey } from '@scure/bip32';
import { Amount, parseValueString, type ValueString } from '../utils/amount.js';
import type { NetworkName, Result, SentTransaction } from '../utils/types.js';
import { createLogger } from '../utils/logger.js';
import type { CreateWalletParams, WalletBackend, WalletHandle } from '../wallet/backend.js';
import {
  ChainApiError,
  EncodingError,
  KeyMismatchError,
  TransactionError,
  WalletNotFoundError,
} from '../wallet/errors.js';
import type { EsploraClient } from './esplora-client.js';
import {
  accountPublicKey,
  deriveAccountKey,
  deriveReceiveKey,
  masterKeyFromExtended,
  masterKeyFromMnemonic,
  receiveAddress,
} from './keys.js';
import { getNetwork, type NetworkParams } from './networks.js';
import { buildTransaction, type SpendableUtxo } from './transaction.js';
import type { StoredAddress, StoredUtxo, StoredWallet, WalletStore } from './wallet-store.js';

const logger = createLogger('BACKEND');

export interface HdWalletBackendOptions {
  readonly store: WalletStore;
  /** Chain client for a network */
  readonly clientFor: (network: NetworkName) => EsploraClient;
  /** Consecutive unused receive addresses that end a scan */
  readonly gapLimit?: number;
}

function unwrap<T>(result: Result<T, Error>): T {
  if (!result.ok) {
    throw result.error instanceof ChainApiError
      ? result.error
      : new ChainApiError(result.error.message, undefined, { cause: result.error });
  }
  return result.value;
}

/**
 * HdWalletBackend - creates, loads and deletes stored HD wallets
 */
export class HdWalletBackend implements WalletBackend {
  private readonly store: WalletStore;
  private readonly clientFor: (network: NetworkName) => EsploraClient;
  private readonly gapLimit: number;

  constructor(options: HdWalletBackendOptions) {
    this.store = options.store;
    this.clientFor = options.clientFor;
    this.gapLimit = options.gapLimit ?? 5;
  }

  async create(params: CreateWalletParams): Promise<WalletHandle> {
    const network = getNetwork(params.network);
    const master = masterKeyFromMnemonic(params.passphrase);
    const account = deriveAccountKey(master, network);

    const stored = await this.store.insert({
      name: params.name,
      owner: params.owner,
      network: params.network,
      masterFingerprint: master.fingerprint,
      accountPublicKey: account.publicExtendedKey,
      addresses: [{ address: receiveAddress(account, 0, network), index: 0, used: false }],
      utxos: [],
      balance: '0',
      createdAt: new Date().toISOString(),
      lastScannedAt: null,
    });

    logger.info('Wallet created', {
      walletId: stored.walletId,
      name: stored.name,
      network: stored.network,
    });
    return new HdWalletHandle(stored, account, this.store, this.clientFor(params.network), this.gapLimit);
  }

  async load(name: string, key: string): Promise<WalletHandle> {
    const stored = await this.store.findByName(name);
    if (!stored) {
      throw new WalletNotFoundError(name);
    }

    const network = getNetwork(stored.network);
    const master = masterKeyFromExtended(key);
    if (accountPublicKey(master, network) !== stored.accountPublicKey) {
      throw new KeyMismatchError(name);
    }

    logger.debug('Wallet loaded', { walletId: stored.walletId, name });
    return new HdWalletHandle(
      stored,
      deriveAccountKey(master, network),
      this.store,
      this.clientFor(stored.network),
      this.gapLimit
    );
  }

  keyFromPassphrase(passphrase: string, _network: NetworkName): string {
    return masterKeyFromMnemonic(passphrase).privateExtendedKey;
  }

  async delete(name: string): Promise<boolean> {
    const removed = await this.store.remove(name);
    if (!removed) {
      throw new WalletNotFoundError(name);
    }
    return true;
  }
}

/**
 * HdWalletHandle - one loaded wallet with its account key in memory
 */
export class HdWalletHandle implements WalletHandle {
  private record: StoredWallet;
  private readonly params: NetworkParams;

  constructor(
    record: StoredWallet,
    private readonly account: HDKey,
    private readonly store: WalletStore,
    private readonly client: EsploraClient,
    private readonly gapLimit: number
  ) {
    this.record = record;
    this.params = getNetwork(record.network);
  }

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
    return receiveAddress(this.account, 0, this.params);
  }

  /**
   * Walk the receive chain until `gapLimit` consecutive unused addresses,
   * collecting UTXOs on every used one.
   */
  async scan(): Promise<void> {
    const addresses: StoredAddress[] = [];
    const utxos: StoredUtxo[] = [];
    let unused = 0;

    for (let index = 0; unused < this.gapLimit; index++) {
      const address = receiveAddress(this.account, index, this.params);
      const activity = unwrap(await this.client.getAddressActivity(address));
      const used = activity.txCount > 0;
      addresses.push({ address, index, used });

      if (!used) {
        unused++;
        continue;
      }
      unused = 0;

      for (const utxo of unwrap(await this.client.getUtxos(address))) {
        utxos.push({
          txid: utxo.txid,
          vout: utxo.vout,
          value: utxo.value.toString(),
          address,
          confirmed: utxo.confirmed,
        });
      }
    }

    const balance = utxos.reduce((sum, utxo) => sum + BigInt(utxo.value), 0n);
    await this.persist({
      ...this.record,
      addresses,
      utxos,
      balance: balance.toString(),
      lastScannedAt: new Date().toISOString(),
    });

    logger.debug('Scan complete', {
      walletId: this.walletId,
      addresses: addresses.length,
      utxos: utxos.length,
      balance,
    });
  }

  balance(): Amount {
    return Amount.fromBaseUnits(BigInt(this.record.balance), this.params.decimals);
  }

  balanceString(): string {
    return `${this.balance().toString()} ${this.params.currency}`;
  }

  async sendTo(address: string, amount: string): Promise<SentTransaction> {
    const value = this.parseAmount(amount);
    const changeAddress = await this.address();
    const feeRate = await this.client.getFeeRate();

    const signed = buildTransaction({
      utxos: this.spendableUtxos(),
      destination: address,
      amount: value,
      changeAddress,
      feeRate,
      network: this.params,
    });

    const broadcast = await this.client.broadcast(signed.hex);
    if (!broadcast.ok) {
      throw new TransactionError(`Broadcast rejected: ${broadcast.error.message}`, {
        cause: broadcast.error,
      });
    }
    const txid = broadcast.value;

    const spent = new Set(signed.inputs.map((input) => `${input.txid}:${input.vout}`));
    const remaining = this.record.utxos.filter((utxo) => !spent.has(`${utxo.txid}:${utxo.vout}`));
    if (signed.change > 0n) {
      remaining.push({
        txid,
        vout: 1,
        value: signed.change.toString(),
        address: changeAddress,
        confirmed: false,
      });
    }
    await this.persist({
      ...this.record,
      utxos: remaining,
      balance: remaining.reduce((sum, utxo) => sum + BigInt(utxo.value), 0n).toString(),
    });

    const decimals = this.params.decimals;
    return {
      txid,
      address,
      amount: Amount.fromBaseUnits(value, decimals).toString(),
      fee: Amount.fromBaseUnits(signed.fee, decimals).toString(),
    };
  }

  private parseAmount(text: string): bigint {
    let value: ValueString;
    try {
      value = parseValueString(text);
    } catch (error) {
      throw new EncodingError(`Invalid amount: "${text}"`, { cause: error });
    }

    if (value.currency && value.currency !== this.params.currency) {
      throw new EncodingError(
        `Amount currency ${value.currency} does not match ${this.params.currency}`
      );
    }

    try {
      return value.amount.toBaseUnits(this.params.decimals);
    } catch (error) {
      throw new EncodingError(`Invalid amount: "${text}"`, { cause: error });
    }
  }

  private spendableUtxos(): SpendableUtxo[] {
    const byAddress = new Map(
      this.record.addresses.map((a): [string, number] => [a.address, a.index])
    );

    return this.record.utxos.flatMap((utxo) => {
      const index = byAddress.get(utxo.address);
      if (index === undefined) {
        return [];
      }
      const key = deriveReceiveKey(this.account, index);
      if (!key.publicKey || !key.privateKey) {
        return [];
      }
      return [
        {
          txid: utxo.txid,
          vout: utxo.vout,
          value: BigInt(utxo.value),
          publicKey: key.publicKey,
          privateKey: key.privateKey,
        },
      ];
    });
  }

  private async persist(record: StoredWallet): Promise<void> {
    this.record = await this.store.update(record);
  }
}
