import { describe, it, expect } from 'vitest';
import { Transaction } from '@scure/btc-signer';
import { hex } from '@scure/base';
import {
  assertAddress,
  buildTransaction,
  estimateVsize,
  feeForSize,
  selectCoins,
  type SpendableUtxo,
} from './transaction.js';
import { deriveAccountKey, deriveReceiveKey, masterKeyFromMnemonic, receiveAddress } from './keys.js';
import { getNetwork } from './networks.js';
import { EncodingError, TransactionError } from '../wallet/errors.js';

const bitcoin = getNetwork('bitcoin');
const litecoin = getNetwork('litecoin');
const master = masterKeyFromMnemonic(`${'abandon '.repeat(11)}about`);
const account = deriveAccountKey(master, bitcoin);
const receive0 = receiveAddress(account, 0, bitcoin);
const receive1 = receiveAddress(account, 1, bitcoin);

function utxo(value: bigint, txidByte: string = 'aa', vout: number = 0): SpendableUtxo {
  const key = deriveReceiveKey(account, 0);
  if (!key.publicKey || !key.privateKey) {
    throw new Error('test key has no key material');
  }
  return {
    txid: txidByte.repeat(32),
    vout,
    value,
    publicKey: key.publicKey,
    privateKey: key.privateKey,
  };
}

describe('fee sizing', () => {
  it('estimates P2WPKH virtual size', () => {
    expect(estimateVsize(1, 2)).toBe(141);
    expect(estimateVsize(2, 1)).toBe(178);
  });

  it('rounds the fee up', () => {
    expect(feeForSize(141, 1.5)).toBe(212n);
    expect(feeForSize(141, 2)).toBe(282n);
  });
});

describe('selectCoins', () => {
  it('returns change when the remainder is above dust', () => {
    const selection = selectCoins([utxo(100_000n)], 50_000n, 2);

    expect(selection.fee).toBe(282n);
    expect(selection.change).toBe(49_718n);
    expect(selection.inputs).toHaveLength(1);
  });

  it('gives a dust remainder to the fee', () => {
    const selection = selectCoins([utxo(100_000n)], 99_218n, 2);

    expect(selection.change).toBe(0n);
    expect(selection.fee).toBe(782n);
  });

  it('drops the change output when only a single-output spend fits', () => {
    const selection = selectCoins([utxo(100_000n)], 99_750n, 2);

    expect(selection.change).toBe(0n);
    expect(selection.fee).toBe(250n);
  });

  it('picks the largest coins first', () => {
    const selection = selectCoins(
      [utxo(10_000n, 'aa'), utxo(60_000n, 'bb'), utxo(30_000n, 'cc')],
      65_000n,
      1
    );

    expect(selection.inputs.map((input) => input.value)).toEqual([60_000n, 30_000n]);
    expect(selection.fee).toBe(209n);
    expect(selection.change).toBe(24_791n);
  });

  it('rejects amounts it cannot cover', () => {
    expect(() => selectCoins([utxo(1_000n)], 5_000n, 1)).toThrow(
      'Insufficient funds: have 1000, need 5000 plus fee'
    );
    expect(() => selectCoins([], 5_000n, 1)).toThrow(TransactionError);
  });

  it('rejects zero and dust amounts', () => {
    expect(() => selectCoins([utxo(100_000n)], 0n, 1)).toThrow('Amount must be positive');
    expect(() => selectCoins([utxo(100_000n)], 545n, 1)).toThrow(
      'Amount 545 is below the dust limit of 546'
    );
  });
});

describe('assertAddress', () => {
  it('accepts addresses of the network', () => {
    expect(() => assertAddress(receive0, bitcoin)).not.toThrow();
  });

  it('rejects empty, foreign and malformed addresses', () => {
    const ltc = receiveAddress(deriveAccountKey(master, litecoin), 0, litecoin);

    expect(() => assertAddress('', bitcoin)).toThrow('Destination address is empty');
    expect(() => assertAddress(ltc, bitcoin)).toThrow(EncodingError);
    expect(() => assertAddress('not-an-address', bitcoin)).toThrow(
      'Invalid bitcoin address: not-an-address'
    );
  });
});

describe('buildTransaction', () => {
  it('signs a spend with a change output', () => {
    const signed = buildTransaction({
      utxos: [utxo(100_000n)],
      destination: receive1,
      amount: 50_000n,
      changeAddress: receive0,
      feeRate: 2,
      network: bitcoin,
    });

    expect(signed.fee).toBe(282n);
    expect(signed.change).toBe(49_718n);
    expect(signed.txid).toMatch(/^[0-9a-f]{64}$/);

    const decoded = Transaction.fromRaw(hex.decode(signed.hex));
    expect(decoded.id).toBe(signed.txid);
    expect(decoded.inputsLength).toBe(1);
    expect(decoded.outputsLength).toBe(2);
    expect(decoded.getOutput(0).amount).toBe(50_000n);
    expect(decoded.getOutput(1).amount).toBe(49_718n);
  });

  it('refuses an invalid destination before selecting coins', () => {
    expect(() =>
      buildTransaction({
        utxos: [],
        destination: 'not-an-address',
        amount: 50_000n,
        changeAddress: receive0,
        feeRate: 2,
        network: bitcoin,
      })
    ).toThrow(EncodingError);
  });
});
