/**
 * Transaction Builder
 *
 * Selects coins, sizes the fee and signs a P2WPKH spend. Broadcasting is the
 * chain client's job.
 */

import { Transaction, Address, OutScript, p2wpkh } from '@scure/btc-signer';
import { hex } from '@scure/base';
import { EncodingError, TransactionError } from '../wallet/errors.js';
import { createLogger } from '../utils/logger.js';
import { DUST_LIMIT, type NetworkParams } from './networks.js';

const logger = createLogger('TX_BUILDER');

// P2WPKH virtual sizes
export const TX_OVERHEAD_VBYTES = 11;
export const P2WPKH_INPUT_VBYTES = 68;
export const P2WPKH_OUTPUT_VBYTES = 31;

export interface SpendableUtxo {
  readonly txid: string;
  readonly vout: number;
  readonly value: bigint;
  /** Key that controls the output; its P2WPKH script is the previous output script */
  readonly publicKey: Uint8Array;
  readonly privateKey: Uint8Array;
}

export interface CoinSelection {
  readonly inputs: SpendableUtxo[];
  readonly fee: bigint;
  /** Zero when the remainder is dust and goes to the fee instead */
  readonly change: bigint;
}

export interface BuildTransactionParams {
  readonly utxos: readonly SpendableUtxo[];
  readonly destination: string;
  readonly amount: bigint;
  readonly changeAddress: string;
  /** sat/vB */
  readonly feeRate: number;
  readonly network: NetworkParams;
}

export interface SignedTransaction {
  readonly txid: string;
  readonly hex: string;
  readonly fee: bigint;
  readonly change: bigint;
  readonly inputs: readonly SpendableUtxo[];
}

export function estimateVsize(inputCount: number, outputCount: number): number {
  return TX_OVERHEAD_VBYTES + P2WPKH_INPUT_VBYTES * inputCount + P2WPKH_OUTPUT_VBYTES * outputCount;
}

export function feeForSize(vbytes: number, feeRate: number): bigint {
  return BigInt(Math.ceil(vbytes * feeRate));
}

/**
 * Largest-first selection. Adds inputs until they cover the amount plus the
 * fee for a two-output spend; a dust remainder is left to the miner.
 */
export function selectCoins(
  utxos: readonly SpendableUtxo[],
  amount: bigint,
  feeRate: number
): CoinSelection {
  if (amount <= 0n) {
    throw new TransactionError('Amount must be positive');
  }
  if (amount < DUST_LIMIT) {
    throw new TransactionError(`Amount ${amount} is below the dust limit of ${DUST_LIMIT}`);
  }

  const sorted = [...utxos].sort((a, b) => (a.value === b.value ? 0 : a.value > b.value ? -1 : 1));
  const inputs: SpendableUtxo[] = [];
  let total = 0n;

  for (const utxo of sorted) {
    inputs.push(utxo);
    total += utxo.value;

    const feeWithChange = feeForSize(estimateVsize(inputs.length, 2), feeRate);
    if (total >= amount + feeWithChange) {
      const change = total - amount - feeWithChange;
      if (change >= DUST_LIMIT) {
        return { inputs, fee: feeWithChange, change };
      }
      return { inputs, fee: total - amount, change: 0n };
    }

    const feeNoChange = feeForSize(estimateVsize(inputs.length, 1), feeRate);
    if (total >= amount + feeNoChange) {
      return { inputs, fee: total - amount, change: 0n };
    }
  }

  throw new TransactionError(
    `Insufficient funds: have ${total}, need ${amount} plus fee`
  );
}

/**
 * Throw EncodingError unless the address is valid on the network
 */
export function assertAddress(address: string, network: NetworkParams): void {
  if (!address) {
    throw new EncodingError('Destination address is empty');
  }
  try {
    Address(network.versions).decode(address);
  } catch (error) {
    throw new EncodingError(`Invalid ${network.name} address: ${address}`, { cause: error });
  }
}

export function buildTransaction(params: BuildTransactionParams): SignedTransaction {
  const { utxos, destination, amount, changeAddress, feeRate, network } = params;

  assertAddress(destination, network);
  assertAddress(changeAddress, network);

  const selection = selectCoins(utxos, amount, feeRate);
  const tx = new Transaction();

  for (const input of selection.inputs) {
    tx.addInput({
      txid: hex.decode(input.txid),
      index: input.vout,
      witnessUtxo: {
        script: p2wpkh(input.publicKey, network.versions).script,
        amount: input.value,
      },
    });
  }

  tx.addOutput({
    script: OutScript.encode(Address(network.versions).decode(destination)),
    amount,
  });
  if (selection.change > 0n) {
    tx.addOutput({
      script: OutScript.encode(Address(network.versions).decode(changeAddress)),
      amount: selection.change,
    });
  }

  try {
    for (let i = 0; i < selection.inputs.length; i++) {
      const input = selection.inputs[i];
      if (input) {
        tx.signIdx(input.privateKey, i);
      }
    }
    tx.finalize();
  } catch (error) {
    throw new TransactionError('Failed to sign transaction', { cause: error });
  }

  logger.debug('Transaction built', {
    network: network.name,
    txid: tx.id,
    inputs: selection.inputs.length,
    fee: selection.fee,
    change: selection.change,
  });

  return {
    txid: tx.id,
    hex: tx.hex,
    fee: selection.fee,
    change: selection.change,
    inputs: selection.inputs,
  };
}
