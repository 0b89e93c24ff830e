import { normalize, sameLabel } from '../textNormalizer';

describe('normalize', () => {
  it('drops the emoji variation selector so both spellings of a label compare equal', () => {
    expect(normalize('✅️ Confirm')).toBe('✅ confirm');
    expect(sameLabel('✅ Confirm', '✅️ Confirm')).toBe(true);
  });

  it('collapses inner whitespace, trims and lowercases', () => {
    expect(normalize('  Shift \t  MENU \n')).toBe('shift menu');
  });

  it('applies compatibility normalization', () => {
    expect(normalize('ＡＢＣ')).toBe('abc');
  });

  it('is idempotent', () => {
    const samples = ['  ⬅️ Back ', 'ＡＢＣ', 'Ivanov  I. I.', '🏁 Finish shift'];
    for (const sample of samples) {
      expect(normalize(normalize(sample))).toBe(normalize(sample));
    }
  });

  it('returns an empty string for missing text', () => {
    expect(normalize('')).toBe('');
    expect(normalize(null)).toBe('');
    expect(normalize(undefined)).toBe('');
  });
});
