/**
 * Wallet backend contract
 *
 * The facade never derives keys, signs or talks to a chain itself; it drives
 * an implementation of these interfaces. See chain/hd-backend.ts for the
 * HD wallet implementation.
 */

import type { Amount } from '../utils/amount.js';
import type { NetworkName, SentTransaction } from '../utils/types.js';

/**
 * A loaded wallet
 */
export interface WalletHandle {
  readonly walletId: number;
  readonly name: string;
  readonly owner: string;
  readonly network: NetworkName;

  /** Primary receive address */
  address(): Promise<string>;

  /** Refresh addresses, UTXOs and balance from the chain */
  scan(): Promise<void>;

  /** Balance in coin units as of the last scan */
  balance(): Amount;

  /** Balance as "<amount> <currency>", e.g. "0.00200000 LTC" */
  balanceString(): string;

  /**
   * Send an amount ("0.0005 LTC" or "0.0005") to an address.
   * Throws EncodingError, TransactionError or ChainApiError.
   */
  sendTo(address: string, amount: string): Promise<SentTransaction>;
}

export interface CreateWalletParams {
  readonly name: string;
  readonly passphrase: string;
  readonly network: NetworkName;
  readonly owner: string;
}

export interface WalletBackend {
  /** Throws WalletAlreadyExistsError when the name is taken */
  create(params: CreateWalletParams): Promise<WalletHandle>;

  /** Throws WalletNotFoundError, KeyMismatchError or EncodingError */
  load(name: string, key: string): Promise<WalletHandle>;

  /**
   * Deterministic extended private key for a passphrase.
   * Throws InvalidPassphraseError on a non-BIP39 phrase.
   */
  keyFromPassphrase(passphrase: string, network: NetworkName): string;

  /** Throws WalletNotFoundError when there is nothing to delete */
  delete(name: string): Promise<boolean>;
}

export interface MnemonicGenerator {
  generate(): string;
}
