import { describe, it, expect } from 'vitest';
import { Bip39MnemonicGenerator, normalizeMnemonic } from './mnemonic.js';

describe('Bip39MnemonicGenerator', () => {
  it('generates valid 12-word phrases by default', () => {
    const phrase = new Bip39MnemonicGenerator().generate();

    expect(phrase.split(' ')).toHaveLength(12);
    expect(Bip39MnemonicGenerator.validate(phrase)).toBe(true);
  });

  it('generates 24 words at 256 bits', () => {
    expect(new Bip39MnemonicGenerator(256).generate().split(' ')).toHaveLength(24);
  });

  it('does not repeat itself', () => {
    const generator = new Bip39MnemonicGenerator();
    expect(generator.generate()).not.toBe(generator.generate());
  });

  it('rejects phrases with a bad checksum', () => {
    expect(Bip39MnemonicGenerator.validate(Array(12).fill('abandon').join(' '))).toBe(false);
    expect(Bip39MnemonicGenerator.validate('test-secret')).toBe(false);
  });
});

describe('normalizeMnemonic', () => {
  it('lowercases and collapses whitespace', () => {
    expect(normalizeMnemonic('  Abandon\tABANDON \n about ')).toBe('abandon abandon about');
  });
});
