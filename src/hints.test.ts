import { describe, expect, it } from 'vitest';
import { DEFAULT_TIMING } from './config.ts';
import { formatHint, readingTimeMs, renderMasked } from './hints.ts';

const words = (n: number) => Array.from({ length: n }, (_, i) => `w${i}`).join(' ');

describe('formatHint', () => {
  it('describes multi-word answers by word and letter count', () => {
    expect(formatHint('Эйфелева башня')).toBe('Răspunsul are 2 cuvinte (13 litere).');
  });

  it('gives only the length of short words', () => {
    expect(formatHint('Кот')).toBe('Răspunsul este un cuvânt scurt, de 3 litere.');
  });

  it('masks every letter but the first', () => {
    expect(formatHint('Париж')).toBe('Răspunsul are 5 litere: П • • • •');
    expect(renderMasked('жан-поль')).toBe('Ж • • - • • • •');
  });

  it('ignores quotes and bracketed asides', () => {
    expect(formatHint('«Париж» (столица)')).toBe(formatHint('Париж'));
  });

  it('handles an empty answer', () => {
    expect(formatHint('')).toBe('Indiciu indisponibil.');
    expect(formatHint('   ')).toBe('Indiciu indisponibil.');
  });
});

describe('readingTimeMs', () => {
  const t = DEFAULT_TIMING;

  it('never goes below the minimum', () => {
    expect(readingTimeMs({ prompt: words(4), imageUrls: [] }, t)).toBe(5_000);
  });

  it('grows by 5s per 15 words', () => {
    expect(readingTimeMs({ prompt: words(30), imageUrls: [] }, t)).toBe(10_000);
    expect(readingTimeMs({ prompt: words(31), imageUrls: ['a', 'b'] }, t)).toBe(20_000);
  });

  it('caps the text part and adds time per image', () => {
    expect(readingTimeMs({ prompt: words(400), imageUrls: ['a'] }, t)).toBe(25_000);
  });
});
