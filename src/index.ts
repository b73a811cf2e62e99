/**
 * Coin Wallet Service - Main Entry Point
 *
 * Starts the API server and the wallet event stream.
 */

import { startServer } from './server.js';
import { createLogger } from './utils/logger.js';
import { getConfig } from './utils/config.js';

const logger = createLogger('MAIN');

function main(): void {
  try {
    const config = getConfig();

    logger.info('Starting Coin Wallet Service', {
      network: config.WALLET_NETWORK,
      dataDir: config.WALLET_DATA_DIR,
      fees: config.NETWORK_FEES,
    });

    startServer();

    logger.info(`API available at http://localhost:${config.PORT}`);
    logger.info(`WebSocket available at ws://localhost:${config.WS_PORT}`);
  } catch (error) {
    logger.error('Failed to start service', { error: String(error) });
    process.exit(1);
  }
}

main();
