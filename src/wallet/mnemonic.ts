import { generateMnemonic, validateMnemonic } from 'bip39';
import type { MnemonicGenerator } from './backend.js';

/**
 * BIP39 English mnemonics.
 * 128 bits of entropy gives 12 words, 256 gives 24.
 */
export class Bip39MnemonicGenerator implements MnemonicGenerator {
  constructor(private readonly strength: number = 128) {}

  generate(): string {
    return generateMnemonic(this.strength);
  }

  static validate(phrase: string): boolean {
    return validateMnemonic(normalizeMnemonic(phrase));
  }
}

/**
 * Lowercase and collapse whitespace so pasted phrases derive the same seed
 */
export function normalizeMnemonic(phrase: string): string {
  return phrase.trim().toLowerCase().split(/\s+/).join(' ');
}
