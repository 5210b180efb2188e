import { CryptoCodeGenerator } from './code-generator';

describe('CryptoCodeGenerator', () => {
  const generator = new CryptoCodeGenerator();

  it('returns exactly the requested number of decimal digits', () => {
    for (let i = 0; i < 50; i++) {
      expect(generator.randomDigits(5)).toMatch(/^\d{5}$/);
    }
  });

  it('returns an empty string for a zero length', () => {
    expect(generator.randomDigits(0)).toBe('');
  });
});
