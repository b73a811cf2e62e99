/**
 * Core Type Definitions
 *
 * Shared shapes between the wallet facade, the chain backend and the API layer.
 * Passphrases only ever appear in WalletInfo, which is returned to the wallet's owner.
 */

// ============================================
// NETWORK TYPES
// ============================================

export const NETWORK_NAMES = ['bitcoin', 'litecoin', 'testnet', 'litecoin_testnet'] as const;

export type NetworkName = (typeof NETWORK_NAMES)[number];

export function isNetworkName(value: string): value is NetworkName {
  return (NETWORK_NAMES as readonly string[]).includes(value);
}

// ============================================
// WALLET TYPES
// ============================================

/**
 * Normalized wallet record returned by CryptoWallet.info()
 */
export interface WalletInfo {
  readonly walletId: number;
  readonly name: string;
  readonly owner: string;
  readonly passphrase: string;
  readonly address: string;
  readonly network: NetworkName;
  /** Total balance in coin units, e.g. "0.00200000" */
  readonly balance: string;
  /** Total balance with currency, e.g. "0.00200000 LTC" */
  readonly balanceString: string;
}

export interface SentTransaction {
  readonly txid: string;
  readonly address: string;
  /** Coin units, without currency */
  readonly amount: string;
  /** Network fee paid, coin units */
  readonly fee: string;
}

// ============================================
// API RESPONSE TYPES
// ============================================

export interface ApiResponse<T> {
  readonly success: boolean;
  readonly data?: T;
  readonly error?: string;
  readonly timestamp: Date;
}

// ============================================
// RESULT TYPES
// ============================================

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function success<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function failure<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
