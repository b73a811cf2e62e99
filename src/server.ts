/**
 * API Server
 *
 * REST surface over the CryptoWallet facade, plus a WebSocket stream of
 * wallet events. Passphrases travel in the X-Wallet-Passphrase header or the
 * JSON body, never in the URL.
 */

import type { Server } from 'node:http';
import express, { Request, Response, NextFunction, Express } from 'express';
import cors from 'cors';
import { WebSocketServer, WebSocket } from 'ws';
import { z } from 'zod';
import { EventBus, eventBus, WalletEvent } from './events/index.js';
import { createChainClients, createWalletBackend, EsploraClient } from './chain/index.js';
import {
  CryptoWallet,
  FeeSchedule,
  InvalidPassphraseError,
  KeyMismatchError,
  PassphraseError,
  WalletBackend,
  WalletError,
  WalletNotFoundError,
} from './wallet/index.js';
import { getConfig } from './utils/config.js';
import { createLogger } from './utils/logger.js';
import { ApiResponse, NETWORK_NAMES, NetworkName } from './utils/types.js';

const logger = createLogger('API');

export const PASSPHRASE_HEADER = 'x-wallet-passphrase';

export interface AppDependencies {
  readonly backend: WalletBackend;
  readonly fees: FeeSchedule;
  readonly events: EventBus;
  readonly defaultNetwork: NetworkName;
  readonly mainWallet: string;
  /** Chain client used by the health endpoint */
  readonly healthClient?: EsploraClient;
  readonly corsOrigins?: string[];
}

// Validation schemas
const CreateWalletSchema = z.object({
  name: z.string().min(1).max(100),
  passphrase: z.string().optional(),
  owner: z.string().max(200).optional(),
  network: z.enum(NETWORK_NAMES).optional(),
  mainWallet: z.string().optional(),
});

const SendSchema = z.object({
  passphrase: z.string().optional(),
  amount: z.string().optional(),
  address: z.string().optional(),
  network: z.enum(NETWORK_NAMES).optional(),
});

const NetworkQuerySchema = z.object({
  network: z.enum(NETWORK_NAMES).optional(),
});

class BadRequestError extends Error {}

function respond<T>(res: Response, status: number, data: T): void {
  const response: ApiResponse<T> = { success: true, data, timestamp: new Date() };
  res.status(status).json(response);
}

/**
 * HTTP status for an error raised while serving a wallet request
 */
export function statusForError(error: unknown): number {
  if (error instanceof BadRequestError) return 400;
  if (error instanceof PassphraseError || error instanceof InvalidPassphraseError) return 400;
  if (error instanceof KeyMismatchError) return 403;
  if (error instanceof WalletNotFoundError) return 404;
  if (error instanceof WalletError) return 502;
  return 500;
}

function sendError(res: Response, error: unknown): void {
  const status = statusForError(error);
  const message = error instanceof Error ? error.message : String(error);
  if (status >= 500) {
    logger.error('Request failed', { status, error: message });
  }
  const response: ApiResponse<never> = { success: false, error: message, timestamp: new Date() };
  res.status(status).json(response);
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
  return (req: Request, res: Response): void => {
    handler(req, res).catch((error: unknown) => sendError(res, error));
  };
}

function parse<T>(schema: z.ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    throw new BadRequestError(result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  return result.data;
}

function headerPassphrase(req: Request): string | undefined {
  const value = req.headers[PASSPHRASE_HEADER];
  return typeof value === 'string' && value ? value : undefined;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(cors({
    origin: deps.corsOrigins ?? ['http://localhost:3000', 'http://127.0.0.1:3000'],
    methods: ['GET', 'POST', 'DELETE'],
    allowedHeaders: ['Content-Type', 'X-Wallet-Passphrase'],
  }));
  app.use(express.json({ limit: '64kb' }));

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug('API request', { method: req.method, path: req.path });
    next();
  });

  function walletFor(
    name: string,
    options: { passphrase?: string; network?: NetworkName; owner?: string; mainWallet?: string }
  ): CryptoWallet {
    return new CryptoWallet(name, {
      backend: deps.backend,
      passphrase: options.passphrase,
      network: options.network ?? deps.defaultNetwork,
      owner: options.owner,
      mainWallet: options.mainWallet ?? deps.mainWallet,
      fees: deps.fees,
      events: deps.events,
    });
  }

  function walletFromRequest(req: Request): CryptoWallet {
    const { network } = parse(NetworkQuerySchema, req.query);
    return walletFor(req.params['name'] ?? '', { passphrase: headerPassphrase(req), network });
  }

  // ============================================
  // HEALTH
  // ============================================

  app.get('/api/health', route(async (_req, res) => {
    if (!deps.healthClient) {
      respond(res, 200, { status: 'healthy', network: deps.defaultNetwork });
      return;
    }
    const health = await deps.healthClient.checkHealth();
    respond(res, 200, {
      status: health.ok ? 'healthy' : 'degraded',
      network: deps.defaultNetwork,
      tipHeight: health.ok ? health.value : undefined,
    });
  }));

  // ============================================
  // WALLET ENDPOINTS
  // ============================================

  app.post('/api/wallets', route(async (req, res) => {
    const body = parse(CreateWalletSchema, req.body);
    const wallet = walletFor(body.name, {
      passphrase: headerPassphrase(req) ?? body.passphrase,
      network: body.network,
      owner: body.owner,
      mainWallet: body.mainWallet,
    });
    await wallet.createOrLoad();
    respond(res, 201, await wallet.info());
  }));

  app.get('/api/wallets/:name', route(async (req, res) => {
    respond(res, 200, await walletFromRequest(req).info());
  }));

  app.get('/api/wallets/:name/address', route(async (req, res) => {
    respond(res, 200, { address: await walletFromRequest(req).address() });
  }));

  app.get('/api/wallets/:name/balance', route(async (req, res) => {
    const wallet = walletFromRequest(req);
    const spendable = await wallet.balanceWithFeeDeducted();
    const handle = wallet.handle;
    respond(res, 200, {
      balance: handle ? handle.balanceString() : null,
      spendable,
    });
  }));

  app.post('/api/wallets/:name/send', route(async (req, res) => {
    const body = parse(SendSchema, req.body);
    const wallet = walletFor(req.params['name'] ?? '', {
      passphrase: headerPassphrase(req) ?? body.passphrase,
      network: body.network,
    });
    respond(res, 200, { sent: await wallet.send(body.amount, body.address) });
  }));

  app.delete('/api/wallets/:name', route(async (req, res) => {
    const wallet = walletFromRequest(req);
    respond(res, 200, { deleted: await wallet.deleteWallet() });
  }));

  app.get('/api/events', (req: Request, res: Response) => {
    const count = Math.min(Number(req.query['count']) || 100, 1000);
    respond(res, 200, deps.events.getRecentEvents(count));
  });

  return app;
}

// ============================================
// WEBSOCKET SERVER
// ============================================

function setupWebSocket(port: number, events: EventBus): WebSocketServer {
  const wss = new WebSocketServer({ port });

  wss.on('connection', (ws: WebSocket) => {
    logger.info('WebSocket client connected');

    ws.send(JSON.stringify({ type: 'recent_events', data: events.getRecentEvents(50) }));

    const unsubscribe = events.subscribe((event: WalletEvent) => {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(JSON.stringify(event));
      }
    });

    ws.on('close', () => {
      logger.info('WebSocket client disconnected');
      unsubscribe();
    });

    ws.on('error', (error) => {
      logger.error('WebSocket error', { error: String(error) });
    });
  });

  logger.info('WebSocket server started', { port });
  return wss;
}

// ============================================
// SERVER STARTUP
// ============================================

export function startServer(): void {
  const config = getConfig();
  const clientFor = createChainClients(config);

  const app = createApp({
    backend: createWalletBackend(config, clientFor),
    fees: new FeeSchedule(config.NETWORK_FEES),
    events: eventBus,
    defaultNetwork: config.WALLET_NETWORK,
    mainWallet: config.MAIN_WALLET_ADDRESS,
    healthClient: clientFor(config.WALLET_NETWORK),
  });

  const server: Server = app.listen(config.PORT, () => {
    logger.info('API server started', { port: config.PORT });
  });
  const wss = setupWebSocket(config.WS_PORT, eventBus);

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down...`);
    wss.close();
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}
