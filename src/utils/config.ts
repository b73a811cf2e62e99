/**
 * Configuration management
 * Loads and validates environment configuration
 */

import { config } from 'dotenv';
import { z } from 'zod';
import { NETWORK_NAMES, NetworkName } from './types.js';

// Load environment variables
config();

const DECIMAL_STRING = /^\d+(\.\d+)?$/;

const NetworkFeesSchema = z
  .string()
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a JSON object' });
      return z.NEVER;
    }
  })
  .pipe(
    z
      .record(
        z.enum(NETWORK_NAMES),
        z.string().regex(DECIMAL_STRING, 'fee must be a non-negative decimal string')
      )
  );

const ConfigSchema = z.object({
  // Wallet
  WALLET_NETWORK: z.enum(NETWORK_NAMES).default('litecoin'),
  MAIN_WALLET_ADDRESS: z.string().default(''),
  NETWORK_FEES: NetworkFeesSchema.default('{"litecoin":"0.0015"}'),
  WALLET_DATA_DIR: z.string().min(1).default('./data'),

  // Chain API
  ESPLORA_URL_BITCOIN: z.string().url().optional(),
  ESPLORA_URL_LITECOIN: z.string().url().optional(),
  ESPLORA_URL_TESTNET: z.string().url().optional(),
  ESPLORA_URL_LITECOIN_TESTNET: z.string().url().optional(),
  SCAN_GAP_LIMIT: z.coerce.number().int().positive().default(5),
  DEFAULT_FEE_RATE: z.coerce.number().positive().default(2),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  // Server
  PORT: z.coerce.number().int().positive().default(3001),
  WS_PORT: z.coerce.number().int().positive().default(3002),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

/**
 * Parse configuration from an environment map.
 * Throws if configuration is invalid
 */
export function loadConfig(env: Record<string, string | undefined>): Config {
  const result = ConfigSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new Error(`Invalid configuration:\n${errors.join('\n')}`);
  }

  return result.data;
}

/**
 * Get validated configuration from process.env, cached after the first call
 */
export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

/**
 * Drop the cached configuration so the next getConfig() re-reads the environment
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Esplora base URL override for a network, if one is configured
 */
export function getEsploraUrlOverride(cfg: Config, network: NetworkName): string | undefined {
  switch (network) {
    case 'bitcoin':
      return cfg.ESPLORA_URL_BITCOIN;
    case 'litecoin':
      return cfg.ESPLORA_URL_LITECOIN;
    case 'testnet':
      return cfg.ESPLORA_URL_TESTNET;
    case 'litecoin_testnet':
      return cfg.ESPLORA_URL_LITECOIN_TESTNET;
  }
}
