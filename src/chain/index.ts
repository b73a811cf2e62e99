/**
 * Chain Module Exports
 *
 * The HD wallet backend and the pieces it is built from.
 */

import type { Config } from '../utils/config.js';
import { getConfig, getEsploraUrlOverride } from '../utils/config.js';
import type { NetworkName } from '../utils/types.js';
import { EsploraClient } from './esplora-client.js';
import { HdWalletBackend } from './hd-backend.js';
import { getNetwork } from './networks.js';
import { FileWalletStore } from './wallet-store.js';

export { HdWalletBackend, HdWalletHandle } from './hd-backend.js';
export type { HdWalletBackendOptions } from './hd-backend.js';
export { EsploraClient } from './esplora-client.js';
export type { AddressActivity, Utxo, EsploraClientOptions } from './esplora-client.js';
export { FileWalletStore } from './wallet-store.js';
export type { WalletStore, StoredWallet, NewStoredWallet } from './wallet-store.js';
export { NETWORKS, DUST_LIMIT, getNetwork } from './networks.js';
export type { NetworkParams, AddressVersions } from './networks.js';
export {
  accountPath,
  masterKeyFromMnemonic,
  masterKeyFromExtended,
  receiveAddress,
} from './keys.js';
export { buildTransaction, selectCoins, estimateVsize, assertAddress } from './transaction.js';

/**
 * Chain client factory with one cached client per network
 */
export function createChainClients(cfg: Config): (network: NetworkName) => EsploraClient {
  const clients = new Map<NetworkName, EsploraClient>();

  return (network: NetworkName): EsploraClient => {
    let client = clients.get(network);
    if (!client) {
      client = new EsploraClient(getNetwork(network), {
        baseUrl: getEsploraUrlOverride(cfg, network),
        timeoutMs: cfg.HTTP_TIMEOUT_MS,
        defaultFeeRate: cfg.DEFAULT_FEE_RATE,
      });
      clients.set(network, client);
    }
    return client;
  };
}

export function createWalletBackend(
  cfg: Config,
  clientFor: (network: NetworkName) => EsploraClient = createChainClients(cfg)
): HdWalletBackend {
  return new HdWalletBackend({
    store: new FileWalletStore(cfg.WALLET_DATA_DIR),
    clientFor,
    gapLimit: cfg.SCAN_GAP_LIMIT,
  });
}

// Singleton instance
let walletBackendInstance: HdWalletBackend | null = null;

export function getWalletBackend(): HdWalletBackend {
  if (!walletBackendInstance) {
    walletBackendInstance = createWalletBackend(getConfig());
  }
  return walletBackendInstance;
}
