/**
 * Supported networks
 *
 * Address version bytes follow each chain's chainparams. All four use 8
 * decimals (satoshi / litoshi).
 */

import type { NetworkName } from '../utils/types.js';

/** Address encoding parameters, in the shape @scure/btc-signer expects */
export interface AddressVersions {
  readonly bech32: string;
  readonly pubKeyHash: number;
  readonly scriptHash: number;
  readonly wif: number;
}

export interface NetworkParams {
  readonly name: NetworkName;
  readonly currency: string;
  readonly decimals: number;
  /** BIP44 coin type used in the derivation path */
  readonly coinType: number;
  readonly versions: AddressVersions;
  readonly esploraUrl: string;
}

/** Outputs below this many base units are not relayed */
export const DUST_LIMIT = 546n;

export const NETWORKS: Readonly<Record<NetworkName, NetworkParams>> = {
  bitcoin: {
    name: 'bitcoin',
    currency: 'BTC',
    decimals: 8,
    coinType: 0,
    versions: { bech32: 'bc', pubKeyHash: 0x00, scriptHash: 0x05, wif: 0x80 },
    esploraUrl: 'https://blockstream.info/api',
  },
  litecoin: {
    name: 'litecoin',
    currency: 'LTC',
    decimals: 8,
    coinType: 2,
    versions: { bech32: 'ltc', pubKeyHash: 0x30, scriptHash: 0x32, wif: 0xb0 },
    esploraUrl: 'https://litecoinspace.org/api',
  },
  testnet: {
    name: 'testnet',
    currency: 'TBTC',
    decimals: 8,
    coinType: 1,
    versions: { bech32: 'tb', pubKeyHash: 0x6f, scriptHash: 0xc4, wif: 0xef },
    esploraUrl: 'https://blockstream.info/testnet/api',
  },
  litecoin_testnet: {
    name: 'litecoin_testnet',
    currency: 'TLTC',
    decimals: 8,
    coinType: 1,
    versions: { bech32: 'tltc', pubKeyHash: 0x6f, scriptHash: 0x3a, wif: 0xef },
    esploraUrl: 'https://litecoinspace.org/testnet/api',
  },
};

export function getNetwork(name: NetworkName): NetworkParams {
  return NETWORKS[name];
}
