/**
 * Exact decimal amounts
 *
 * Coin values are never routed through floating point. An Amount is an integer
 * number of units at a fixed decimal scale, so "0.0020000" keeps its seven
 * decimals through arithmetic and back to text.
 */

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d+))?$/;

export class Amount {
  readonly units: bigint;
  readonly scale: number;

  private constructor(units: bigint, scale: number) {
    this.units = units;
    this.scale = scale;
  }

  static zero(scale: number = 0): Amount {
    return new Amount(0n, scale);
  }

  /**
   * Parse a plain decimal string such as "0.0015" or "-12.5".
   * Throws RangeError on anything else, including exponent notation.
   */
  static parse(text: string): Amount {
    const match = DECIMAL_PATTERN.exec(text.trim());
    if (!match) {
      throw new RangeError(`Not a decimal amount: "${text}"`);
    }
    const [, sign, whole = '0', fraction = ''] = match;
    const units = BigInt(whole + fraction);
    return new Amount(sign ? -units : units, fraction.length);
  }

  /**
   * Interpret an integer count of base units (satoshi, litoshi) at the given decimals
   */
  static fromBaseUnits(units: bigint, decimals: number): Amount {
    return new Amount(units, decimals);
  }

  /**
   * Convert to base units at the given decimals.
   * Throws RangeError when the amount carries more precision than the unit allows.
   */
  toBaseUnits(decimals: number): bigint {
    if (this.scale <= decimals) {
      return this.units * 10n ** BigInt(decimals - this.scale);
    }
    const divisor = 10n ** BigInt(this.scale - decimals);
    if (this.units % divisor !== 0n) {
      throw new RangeError(`${this.toString()} has more than ${decimals} decimals`);
    }
    return this.units / divisor;
  }

  /** Same value expressed at a larger scale */
  rescale(scale: number): Amount {
    if (scale < this.scale) {
      throw new RangeError(`Cannot rescale ${this.toString()} down to ${scale} decimals`);
    }
    return new Amount(this.units * 10n ** BigInt(scale - this.scale), scale);
  }

  /** Difference at the larger of the two scales */
  minus(other: Amount): Amount {
    const scale = Math.max(this.scale, other.scale);
    return new Amount(this.rescale(scale).units - other.rescale(scale).units, scale);
  }

  plus(other: Amount): Amount {
    const scale = Math.max(this.scale, other.scale);
    return new Amount(this.rescale(scale).units + other.rescale(scale).units, scale);
  }

  isNegative(): boolean {
    return this.units < 0n;
  }

  isZero(): boolean {
    return this.units === 0n;
  }

  /** Zero at this amount's scale when negative, otherwise unchanged */
  clampToZero(): Amount {
    return this.isNegative() ? Amount.zero(this.scale) : this;
  }

  compare(other: Amount): -1 | 0 | 1 {
    const scale = Math.max(this.scale, other.scale);
    const a = this.rescale(scale).units;
    const b = other.rescale(scale).units;
    return a < b ? -1 : a > b ? 1 : 0;
  }

  equals(other: Amount): boolean {
    return this.compare(other) === 0;
  }

  toString(): string {
    const negative = this.units < 0n;
    const digits = (negative ? -this.units : this.units).toString();
    const sign = negative ? '-' : '';

    if (this.scale === 0) {
      return sign + digits;
    }

    const padded = digits.padStart(this.scale + 1, '0');
    const whole = padded.slice(0, padded.length - this.scale);
    const fraction = padded.slice(padded.length - this.scale);
    return `${sign}${whole}.${fraction}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

export interface ValueString {
  readonly amount: Amount;
  readonly currency: string;
}

/**
 * Split a "<amount> <currency>" string such as "0.0020000 LTC".
 * The currency part is optional; a bare number yields an empty currency.
 */
export function parseValueString(text: string): ValueString {
  const parts = text.trim().split(/\s+/);
  if (parts.length === 0 || parts.length > 2 || parts[0] === undefined || parts[0] === '') {
    throw new RangeError(`Not a value string: "${text}"`);
  }
  return {
    amount: Amount.parse(parts[0]),
    currency: parts[1] ?? '',
  };
}

export function formatValueString(value: ValueString): string {
  return value.currency ? `${value.amount.toString()} ${value.currency}` : value.amount.toString();
}
