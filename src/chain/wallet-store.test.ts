import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileWalletStore, type NewStoredWallet } from './wallet-store.js';
import { WalletAlreadyExistsError, WalletNotFoundError } from '../wallet/errors.js';

function record(name: string): NewStoredWallet {
  return {
    name,
    owner: 'user-1',
    network: 'litecoin',
    masterFingerprint: 1234,
    accountPublicKey: `xpub-${name}`,
    addresses: [{ address: `ltc1q${name}`, index: 0, used: false }],
    utxos: [],
    balance: '0',
    createdAt: '2026-01-01T00:00:00.000Z',
    lastScannedAt: null,
  };
}

describe('FileWalletStore', () => {
  let dataDir: string;
  let store: FileWalletStore;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'wallet-store-'));
    store = new FileWalletStore(join(dataDir, 'nested'));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('starts empty without a file', async () => {
    expect(await store.findByName('w_1')).toBeNull();
  });

  it('assigns sequential ids and persists records', async () => {
    const first = await store.insert(record('w_1'));
    const second = await store.insert(record('w_2'));

    expect(first.walletId).toBe(1);
    expect(second.walletId).toBe(2);

    const reopened = new FileWalletStore(join(dataDir, 'nested'));
    expect(await reopened.findByName('w_2')).toEqual({ ...record('w_2'), walletId: 2 });

    const raw: unknown = JSON.parse(await readFile(join(dataDir, 'nested', 'wallets.json'), 'utf-8'));
    expect(raw).toMatchObject({ nextWalletId: 3 });
  });

  it('rejects a taken name and keeps working afterwards', async () => {
    await store.insert(record('w_1'));

    await expect(store.insert(record('w_1'))).rejects.toBeInstanceOf(WalletAlreadyExistsError);
    expect((await store.insert(record('w_2'))).walletId).toBe(2);
  });

  it('serializes concurrent inserts', async () => {
    const names = ['a', 'b', 'c', 'd', 'e'];

    const stored = await Promise.all(names.map((name) => store.insert(record(name))));

    expect(stored.map((w) => w.walletId).sort()).toEqual([1, 2, 3, 4, 5]);
    for (const name of names) {
      expect(await store.findByName(name)).not.toBeNull();
    }
  });

  it('updates existing records only', async () => {
    const stored = await store.insert(record('w_1'));

    await store.update({ ...stored, balance: '150000' });
    expect((await store.findByName('w_1'))?.balance).toBe('150000');

    await expect(store.update({ ...stored, name: 'missing' })).rejects.toBeInstanceOf(WalletNotFoundError);
  });

  it('removes records without reusing their ids', async () => {
    await store.insert(record('w_1'));
    await store.insert(record('w_2'));

    expect(await store.remove('w_2')).toBe(true);
    expect(await store.remove('w_2')).toBe(false);
    expect(await store.findByName('w_2')).toBeNull();
    expect((await store.insert(record('w_3'))).walletId).toBe(3);
  });

  it('refuses a corrupt document', async () => {
    const path = join(dataDir, 'wallets.json');
    await writeFile(path, JSON.stringify({ nextWalletId: 0, wallets: [] }), 'utf-8');

    const corrupt = new FileWalletStore(dataDir);

    await expect(corrupt.findByName('w_1')).rejects.toThrow(`Corrupt wallet store ${path}`);
  });

  it('refuses a truncated document', async () => {
    const path = join(dataDir, 'wallets.json');
    await writeFile(path, '{"nextWalletId": 2, "wallets": [', 'utf-8');

    const truncated = new FileWalletStore(dataDir);

    await expect(truncated.findByName('w_1')).rejects.toThrow(`Corrupt wallet store ${path}`);
    await expect(truncated.insert(record('w_1'))).rejects.toThrow(`Corrupt wallet store ${path}`);
  });
});
