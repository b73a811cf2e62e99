import { describe, it, expect } from 'vitest';
import { EsploraClient } from './esplora-client.js';
import { getNetwork } from './networks.js';
import { ChainApiError } from '../wallet/errors.js';

const BASE = 'http://esplora.test/api';

type Route = (init?: RequestInit) => Response;

function stubFetch(routes: Record<string, Route>) {
  const calls: { url: string; init?: RequestInit }[] = [];
  const fetchFn: typeof fetch = async (input, init) => {
    const url = String(input);
    calls.push({ url, init });
    const route = routes[url.slice(BASE.length)];
    return route ? route(init) : new Response('Not Found', { status: 404 });
  };
  return { fetchFn, calls };
}

function json(body: unknown): Route {
  return () => new Response(JSON.stringify(body), { status: 200 });
}

function client(routes: Record<string, Route>, baseUrl: string = BASE) {
  const stub = stubFetch(routes);
  return {
    client: new EsploraClient(getNetwork('litecoin'), { baseUrl, fetchFn: stub.fetchFn, defaultFeeRate: 3 }),
    calls: stub.calls,
  };
}

const stats = (funded: number, spent: number, txCount: number) => ({
  funded_txo_count: txCount,
  funded_txo_sum: funded,
  spent_txo_count: 0,
  spent_txo_sum: spent,
  tx_count: txCount,
});

describe('EsploraClient', () => {
  describe('checkHealth', () => {
    it('yields the tip height', async () => {
      const { client: c, calls } = client({ '/blocks/tip/height': () => new Response('2750000') }, `${BASE}//`);

      const result = await c.checkHealth();

      expect(result).toEqual({ ok: true, value: 2750000 });
      expect(calls[0]?.url).toBe(`${BASE}/blocks/tip/height`);
    });

    it('fails on a non-numeric body', async () => {
      const { client: c } = client({ '/blocks/tip/height': () => new Response('<html>') });

      const result = await c.checkHealth();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Unexpected tip height: <html>');
      }
    });

    it('reports HTTP errors with their status', async () => {
      const { client: c } = client({
        '/blocks/tip/height': () => new Response('overloaded\n', { status: 503 }),
      });

      const result = await c.checkHealth();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ChainApiError);
        expect(result.error.message).toBe('HTTP 503 from /blocks/tip/height: overloaded');
        expect(result.error instanceof ChainApiError && result.error.status).toBe(503);
      }
    });

    it('reports transport failures', async () => {
      const fetchFn: typeof fetch = async () => {
        throw new Error('connection refused');
      };
      const c = new EsploraClient(getNetwork('litecoin'), { baseUrl: BASE, fetchFn });

      const result = await c.checkHealth();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Request to /blocks/tip/height failed: connection refused');
      }
    });
  });

  describe('getAddressActivity', () => {
    it('counts confirmed and mempool transactions', async () => {
      const { client: c } = client({
        '/address/ltc1qtest': json({
          address: 'ltc1qtest',
          chain_stats: stats(150_000, 50_000, 3),
          mempool_stats: stats(10_000, 0, 1),
        }),
      });

      const result = await c.getAddressActivity('ltc1qtest');

      expect(result).toEqual({
        ok: true,
        value: { address: 'ltc1qtest', txCount: 4 },
      });
    });

    it('rejects malformed responses', async () => {
      const { client: c } = client({ '/address/ltc1qtest': () => new Response('not json') });

      const result = await c.getAddressActivity('ltc1qtest');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Invalid JSON from /address/ltc1qtest');
      }
    });
  });

  describe('getUtxos', () => {
    it('maps outputs to base-unit values', async () => {
      const { client: c } = client({
        '/address/ltc1qtest/utxo': json([
          { txid: 'ab'.repeat(32), vout: 1, value: 25_000, status: { confirmed: true, block_height: 100 } },
          { txid: 'cd'.repeat(32), vout: 0, value: 5_000, status: { confirmed: false } },
        ]),
      });

      const result = await c.getUtxos('ltc1qtest');

      expect(result).toEqual({
        ok: true,
        value: [
          { txid: 'ab'.repeat(32), vout: 1, value: 25_000n, confirmed: true },
          { txid: 'cd'.repeat(32), vout: 0, value: 5_000n, confirmed: false },
        ],
      });
    });

    it('rejects outputs of the wrong shape', async () => {
      const { client: c } = client({
        '/address/ltc1qtest/utxo': json([{ txid: 'xyz', vout: 0, value: 1, status: { confirmed: true } }]),
      });

      const result = await c.getUtxos('ltc1qtest');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message.startsWith('Unexpected response from /address/ltc1qtest/utxo')).toBe(true);
      }
    });
  });

  describe('getFeeRate', () => {
    const estimates = json({ '1': 20, '3': 10, '6': 5, '144': 1 });

    it('uses the nearest target at or beyond the requested one', async () => {
      const { client: c } = client({ '/fee-estimates': estimates });

      expect(await c.getFeeRate()).toBe(5);
      expect(await c.getFeeRate(2)).toBe(10);
      expect(await c.getFeeRate(7)).toBe(1);
    });

    it('falls back to the default rate', async () => {
      const { client: c } = client({ '/fee-estimates': estimates });
      const { client: down } = client({});
      const { client: zero } = client({ '/fee-estimates': json({ '6': 0 }) });

      expect(await c.getFeeRate(200)).toBe(3);
      expect(await down.getFeeRate()).toBe(3);
      expect(await zero.getFeeRate()).toBe(3);
    });
  });

  describe('broadcast', () => {
    it('posts the raw transaction and yields the txid', async () => {
      const { client: c, calls } = client({ '/tx': () => new Response(`${'ef'.repeat(32)}\n`) });

      const result = await c.broadcast('0200beef');

      expect(result).toEqual({ ok: true, value: 'ef'.repeat(32) });
      expect(calls[0]?.init?.method).toBe('POST');
      expect(calls[0]?.init?.body).toBe('0200beef');
    });

    it('surfaces node rejections', async () => {
      const { client: c } = client({
        '/tx': () => new Response('sendrawtransaction RPC error: bad-txns-inputs-missingorspent', { status: 400 }),
      });

      const result = await c.broadcast('0200beef');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(
          'HTTP 400 from /tx: sendrawtransaction RPC error: bad-txns-inputs-missingorspent'
        );
      }
    });
  });
});
