/**
 * Wallet error hierarchy
 *
 * Every failure the backend can raise is a WalletError subclass, so callers
 * can separate wallet failures from programming errors with one instanceof.
 */

export type WalletErrorCode =
  | 'WALLET_ERROR'
  | 'PASSPHRASE_REQUIRED'
  | 'INVALID_PASSPHRASE'
  | 'WALLET_EXISTS'
  | 'WALLET_NOT_FOUND'
  | 'KEY_MISMATCH'
  | 'ENCODING_ERROR'
  | 'TRANSACTION_ERROR'
  | 'CHAIN_API_ERROR';

export class WalletError extends Error {
  readonly code: WalletErrorCode;

  constructor(message: string, code: WalletErrorCode = 'WALLET_ERROR', options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised when a load-only path is attempted without a passphrase
 */
export class PassphraseError extends WalletError {
  constructor(walletName: string) {
    super(`Passphrase required to load wallet "${walletName}"`, 'PASSPHRASE_REQUIRED');
  }
}

export class InvalidPassphraseError extends WalletError {
  constructor(message: string = 'Passphrase is not a valid BIP39 mnemonic') {
    super(message, 'INVALID_PASSPHRASE');
  }
}

export class WalletAlreadyExistsError extends WalletError {
  constructor(walletName: string) {
    super(`Wallet "${walletName}" already exists`, 'WALLET_EXISTS');
  }
}

export class WalletNotFoundError extends WalletError {
  constructor(walletName: string) {
    super(`Wallet "${walletName}" not found`, 'WALLET_NOT_FOUND');
  }
}

export class KeyMismatchError extends WalletError {
  constructor(walletName: string) {
    super(`Key does not match wallet "${walletName}"`, 'KEY_MISMATCH');
  }
}

export class EncodingError extends WalletError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'ENCODING_ERROR', options);
  }
}

export class TransactionError extends WalletError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'TRANSACTION_ERROR', options);
  }
}

export class ChainApiError extends WalletError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super(message, 'CHAIN_API_ERROR', options);
    this.status = status;
  }
}
