/**
 * Esplora REST client
 *
 * Handles all chain access for one network:
 * - Tip height health check
 * - Address statistics and UTXO lists
 * - Fee estimates
 * - Transaction broadcast
 */

import { z } from 'zod';
import { Result, success, failure, toError } from '../utils/types.js';
import { createLogger } from '../utils/logger.js';
import { ChainApiError } from '../wallet/errors.js';
import type { NetworkParams } from './networks.js';

const logger = createLogger('CHAIN');

const TxoStatsSchema = z.object({
  tx_count: z.number().int().nonnegative(),
});

const AddressStatsSchema = z.object({
  address: z.string(),
  chain_stats: TxoStatsSchema,
  mempool_stats: TxoStatsSchema,
});

const UtxoSchema = z.object({
  txid: z.string().regex(/^[0-9a-f]{64}$/),
  vout: z.number().int().nonnegative(),
  value: z.number().int().nonnegative(),
  status: z.object({
    confirmed: z.boolean(),
    block_height: z.number().int().optional(),
  }),
});

const FeeEstimatesSchema = z.record(z.string(), z.number().nonnegative());

export interface AddressActivity {
  readonly address: string;
  /** Transactions touching the address, confirmed and unconfirmed */
  readonly txCount: number;
}

export interface Utxo {
  readonly txid: string;
  readonly vout: number;
  readonly value: bigint;
  readonly confirmed: boolean;
}

export interface EsploraClientOptions {
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  /** sat/vB used when the node has no estimate for the target */
  readonly defaultFeeRate?: number;
  readonly fetchFn?: typeof fetch;
}

/**
 * EsploraClient - chain queries for a single network
 */
export class EsploraClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly defaultFeeRate: number;
  private readonly fetchFn: typeof fetch;

  constructor(
    private readonly network: NetworkParams,
    options: EsploraClientOptions = {}
  ) {
    this.baseUrl = (options.baseUrl ?? network.esploraUrl).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.defaultFeeRate = options.defaultFeeRate ?? 2;
    this.fetchFn = options.fetchFn ?? fetch;

    logger.debug('Esplora client initialized', {
      network: network.name,
      baseUrl: this.baseUrl,
    });
  }

  /**
   * Check if the API is reachable; yields the tip height
   */
  async checkHealth(): Promise<Result<number, Error>> {
    const result = await this.request('/blocks/tip/height');
    if (!result.ok) {
      logger.error('Network health check failed', {
        network: this.network.name,
        error: result.error.message,
      });
      return result;
    }
    const height = Number.parseInt(result.value, 10);
    if (!Number.isSafeInteger(height)) {
      return failure(new ChainApiError(`Unexpected tip height: ${result.value}`));
    }
    return success(height);
  }

  async getAddressActivity(address: string): Promise<Result<AddressActivity, Error>> {
    const result = await this.requestJson(`/address/${address}`, AddressStatsSchema);
    if (!result.ok) {
      return result;
    }
    const { chain_stats: chain, mempool_stats: mempool } = result.value;
    return success({ address, txCount: chain.tx_count + mempool.tx_count });
  }

  async getUtxos(address: string): Promise<Result<Utxo[], Error>> {
    const result = await this.requestJson(`/address/${address}/utxo`, z.array(UtxoSchema));
    if (!result.ok) {
      return result;
    }
    return success(
      result.value.map((utxo) => ({
        txid: utxo.txid,
        vout: utxo.vout,
        value: BigInt(utxo.value),
        confirmed: utxo.status.confirmed,
      }))
    );
  }

  /**
   * Fee rate in sat/vB for confirmation within `targetBlocks`. Falls back to
   * the nearest slower target, then to the configured default.
   */
  async getFeeRate(targetBlocks: number = 6): Promise<number> {
    const result = await this.requestJson('/fee-estimates', FeeEstimatesSchema);
    if (!result.ok) {
      logger.warn('Fee estimates unavailable, using default rate', {
        network: this.network.name,
        feeRate: this.defaultFeeRate,
        error: result.error.message,
      });
      return this.defaultFeeRate;
    }

    const candidates = Object.entries(result.value)
      .map(([target, rate]) => ({ target: Number(target), rate }))
      .filter((entry) => Number.isInteger(entry.target) && entry.target >= targetBlocks)
      .sort((a, b) => a.target - b.target);

    const estimate = candidates[0];
    return estimate && estimate.rate > 0 ? estimate.rate : this.defaultFeeRate;
  }

  /**
   * Broadcast a signed transaction; yields the txid reported by the node
   */
  async broadcast(txHex: string): Promise<Result<string, Error>> {
    const result = await this.request('/tx', { method: 'POST', body: txHex });
    if (!result.ok) {
      logger.error('Broadcast failed', { network: this.network.name, error: result.error.message });
      return result;
    }
    const txid = result.value.trim();
    logger.info('Transaction broadcast', { network: this.network.name, txid });
    return success(txid);
  }

  private async requestJson<T>(path: string, schema: z.ZodType<T>): Promise<Result<T, Error>> {
    const result = await this.request(path);
    if (!result.ok) {
      return result;
    }

    let body: unknown;
    try {
      body = JSON.parse(result.value);
    } catch (error) {
      return failure(new ChainApiError(`Invalid JSON from ${path}`, undefined, { cause: error }));
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return failure(
        new ChainApiError(`Unexpected response from ${path}: ${parsed.error.issues[0]?.message}`)
      );
    }
    return success(parsed.data);
  }

  private async request(path: string, init: RequestInit = {}): Promise<Result<string, Error>> {
    const url = `${this.baseUrl}${path}`;
    try {
      const response = await this.fetchFn(url, {
        ...init,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      const text = await response.text();

      if (!response.ok) {
        return failure(
          new ChainApiError(`HTTP ${response.status} from ${path}: ${text.trim()}`, response.status)
        );
      }

      logger.debug('Chain request', { method: init.method ?? 'GET', path });
      return success(text);
    } catch (error) {
      const cause = toError(error);
      return failure(new ChainApiError(`Request to ${path} failed: ${cause.message}`, undefined, { cause }));
    }
  }
}
