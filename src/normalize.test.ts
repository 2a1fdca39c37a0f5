import { describe, expect, it } from 'vitest';
import { normalizeAnswer, stripAsides } from './normalize.ts';

describe('normalizeAnswer', () => {
  it('lowercases and strips asides, quotes and punctuation', () => {
    expect(normalizeAnswer('  Париж (столица Франции)!  ')).toBe('париж');
    expect(normalizeAnswer('«Война и мир»')).toBe('война и мир');
    expect(normalizeAnswer('[sic] Hello,   World.')).toBe('hello world');
    expect(normalizeAnswer('"Quoted"; text: yes?')).toBe('quoted text yes');
  });

  it('removes nested asides completely', () => {
    expect(normalizeAnswer('(a (b) c) d')).toBe('d');
    expect(stripAsides('x [y [z] w] v')).toBe('x  v');
  });

  it('keeps apostrophes and hyphens', () => {
    expect(normalizeAnswer("O'Neil Jean-Luc")).toBe("o'neil jean-luc");
  });

  it('returns an empty string for empty input', () => {
    expect(normalizeAnswer('')).toBe('');
    expect(normalizeAnswer(null)).toBe('');
    expect(normalizeAnswer(undefined)).toBe('');
    expect(normalizeAnswer(' ?! ')).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      'Париж',
      '(\n)',
      '((x)',
      'a ( b',
      ')(',
      '“Curly” „quotes”',
      '[(]x)',
      '1. Иван 2. Петров',
      '  spaced\t\tout \n text ',
      'ΣΑΣ',
      '(a)[b](c) end.',
    ];
    for (const s of samples) {
      const once = normalizeAnswer(s);
      expect(normalizeAnswer(once)).toBe(once);
    }
  });
});
