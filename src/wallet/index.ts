/**
 * Wallet Module Exports
 *
 * The CryptoWallet facade and the backend contract it drives.
 */

export { CryptoWallet } from './crypto-wallet.js';
export type { CryptoWalletOptions } from './crypto-wallet.js';
export type {
  WalletBackend,
  WalletHandle,
  CreateWalletParams,
  MnemonicGenerator,
} from './backend.js';
export { FeeSchedule, DEFAULT_NETWORK_FEES } from './fee-schedule.js';
export { Bip39MnemonicGenerator, normalizeMnemonic } from './mnemonic.js';
export {
  WalletError,
  PassphraseError,
  InvalidPassphraseError,
  WalletAlreadyExistsError,
  WalletNotFoundError,
  KeyMismatchError,
  EncodingError,
  TransactionError,
  ChainApiError,
} from './errors.js';
export type { WalletErrorCode } from './errors.js';
