/**
 * Per-network sweep fee
 *
 * A fixed amount held back from the spendable balance when sweeping, so the
 * backend has room for the miner fee. Networks without an entry pay nothing.
 */

import { Amount } from '../utils/amount.js';
import { NETWORK_NAMES, type NetworkName } from '../utils/types.js';

export const DEFAULT_NETWORK_FEES: Readonly<Partial<Record<NetworkName, string>>> = {
  litecoin: '0.0015',
};

export class FeeSchedule {
  private readonly fees: Map<NetworkName, Amount>;

  constructor(fees: Partial<Record<NetworkName, string>> = DEFAULT_NETWORK_FEES) {
    this.fees = new Map();
    for (const network of NETWORK_NAMES) {
      const fee = fees[network];
      if (fee === undefined) {
        continue;
      }
      const amount = Amount.parse(fee);
      if (amount.isNegative()) {
        throw new RangeError(`Fee for ${network} must not be negative`);
      }
      this.fees.set(network, amount);
    }
  }

  feeFor(network: NetworkName): Amount {
    return this.fees.get(network) ?? Amount.zero();
  }

  isFeeBearing(network: NetworkName): boolean {
    return this.fees.has(network);
  }

  /** A copy with one network's fee replaced */
  withFee(network: NetworkName, fee: string): FeeSchedule {
    const entries: Partial<Record<NetworkName, string>> = {};
    for (const [name, amount] of this.fees) {
      entries[name] = amount.toString();
    }
    entries[network] = fee;
    return new FeeSchedule(entries);
  }
}
