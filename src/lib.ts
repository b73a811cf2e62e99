/**
 * Library entry point
 *
 * Import from here to embed the wallet facade without starting the server.
 */

export * from './wallet/index.js';
export * from './chain/index.js';
export * from './events/index.js';
export { Amount, parseValueString, formatValueString } from './utils/amount.js';
export type { ValueString } from './utils/amount.js';
export { getConfig, loadConfig, resetConfig } from './utils/config.js';
export type { Config } from './utils/config.js';
export { createLogger } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';
export { NETWORK_NAMES, isNetworkName } from './utils/types.js';
export type { NetworkName, WalletInfo, SentTransaction, Result } from './utils/types.js';
export { createApp, startServer } from './server.js';
export type { AppDependencies } from './server.js';
