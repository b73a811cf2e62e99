/**
 * Key derivation
 *
 * Mnemonic -> BIP39 seed -> BIP32 master key. Receive keys follow BIP84
 * (m/84'/coin'/0'/0/i) and are encoded as P2WPKH addresses.
 */

import { mnemonicToSeedSync, validateMnemonic } from 'bip39';
import { HDKey } from '@scure/bip32';
import { p2wpkh } from '@scure/btc-signer';
import { EncodingError, InvalidPassphraseError } from '../wallet/errors.js';
import { normalizeMnemonic } from '../wallet/mnemonic.js';
import type { NetworkParams } from './networks.js';

export function accountPath(network: NetworkParams, account: number = 0): string {
  return `m/84'/${network.coinType}'/${account}'`;
}

/**
 * Master key for a mnemonic. Throws InvalidPassphraseError on a non-BIP39 phrase.
 */
export function masterKeyFromMnemonic(passphrase: string): HDKey {
  const mnemonic = normalizeMnemonic(passphrase);
  if (!validateMnemonic(mnemonic)) {
    throw new InvalidPassphraseError();
  }
  return HDKey.fromMasterSeed(mnemonicToSeedSync(mnemonic));
}

/**
 * Master key from its extended private key string. Throws EncodingError when
 * the string is malformed or carries no private key.
 */
export function masterKeyFromExtended(extendedKey: string): HDKey {
  let key: HDKey;
  try {
    key = HDKey.fromExtendedKey(extendedKey);
  } catch (error) {
    throw new EncodingError('Malformed extended key', { cause: error });
  }
  if (!key.privateKey) {
    throw new EncodingError('Extended key has no private key');
  }
  return key;
}

export function deriveAccountKey(master: HDKey, network: NetworkParams): HDKey {
  return master.derive(accountPath(network));
}

/** Account-level xpub stored with the wallet to verify load keys */
export function accountPublicKey(master: HDKey, network: NetworkParams): string {
  return deriveAccountKey(master, network).publicExtendedKey;
}

/** External (receive) chain key at an index, derived from the account key */
export function deriveReceiveKey(account: HDKey, index: number): HDKey {
  return account.deriveChild(0).deriveChild(index);
}

export function p2wpkhAddress(publicKey: Uint8Array, network: NetworkParams): string {
  const { address } = p2wpkh(publicKey, network.versions);
  if (!address) {
    throw new EncodingError('Could not encode P2WPKH address');
  }
  return address;
}

export function receiveAddress(account: HDKey, index: number, network: NetworkParams): string {
  const key = deriveReceiveKey(account, index);
  if (!key.publicKey) {
    throw new EncodingError(`No public key at receive index ${index}`);
  }
  return p2wpkhAddress(key.publicKey, network);
}
