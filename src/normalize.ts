// src/normalize.ts

const PARENS = /\([^()]*\)/g;
const BRACKETS = /\[[^[\]]*\]/g;
const QUOTES = /["«»„“”]/g;
const PUNCTUATION = /[.,;:!?]/g;

/** Scoate (...) și [...] până nu mai rămâne nicio pereche, inclusiv cele imbricate. */
export function stripAsides(text: string): string {
  let prev: string;
  let out = text;
  do {
    prev = out;
    out = out.replace(PARENS, '').replace(BRACKETS, '');
  } while (out !== prev);
  return out;
}

export function collapseSpaces(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Forma canonică a unui răspuns: litere mici, fără paranteze explicative,
 * ghilimele sau punctuație, spații comprimate.
 * normalizeAnswer(normalizeAnswer(x)) === normalizeAnswer(x).
 */
export function normalizeAnswer(text: string | null | undefined): string {
  if (!text) return '';
  let s = text.toLowerCase();
  s = stripAsides(s);
  s = s.replace(QUOTES, '');
  s = s.replace(PUNCTUATION, '');
  return collapseSpaces(s);
}
