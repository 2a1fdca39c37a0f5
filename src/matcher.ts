// src/matcher.ts
import { normalizeAnswer } from './normalize.ts';

export type MatchStrategy =
  | 'duplex'
  | 'exact'
  | 'containment'
  | 'raw'
  | 'keywords'
  | 'comment';

export const KEYWORD_RATIO = 0.7;
export const COMMENT_ASSIST_MAX_LENGTH = 15;

// formulări din comentariile întrebărilor care semnalează răspunsuri alternative acceptate
export const ACCEPTANCE_MARKERS = [
  'также принимается',
  'засчитывать',
  'принимать',
  'зачет',
  'зачёт',
  'зачитывать',
  'эквивалент',
];

const PART_MARKER = /\d\./;

export function isDuplex(text: string): boolean {
  return text.includes('1.') && text.includes('2.');
}

/** "1. Ivan 2. Petrov" -> ["ivan", "petrov"] (normalizate) */
export function splitParts(text: string): string[] {
  const parts = text.toLowerCase().split(PART_MARKER);
  if (parts.length && !parts[0].trim()) parts.shift();
  return parts.map((p) => normalizeAnswer(p));
}

function contains(a: string, b: string): boolean {
  if (!a || !b) return false;
  return a.includes(b) || b.includes(a);
}

function partsMatch(user: string, correct: string): boolean {
  if (!user || !correct) return false;
  return user === correct || contains(user, correct);
}

function words(text: string): Set<string> {
  return new Set(text.split(' ').filter(Boolean));
}

/** Proporția cuvintelor din răspunsul corect regăsite la utilizator (asimetric). */
export function keywordRatio(userNorm: string, correctNorm: string): number {
  const correctWords = words(correctNorm);
  const userWords = words(userNorm);
  if (correctWords.size === 0 || userWords.size === 0) return 0;
  let common = 0;
  for (const w of correctWords) if (userWords.has(w)) common += 1;
  return common / correctWords.size;
}

type DuplexVerdict = 'match' | 'mismatch' | 'not_applicable';

/**
 * Ambele texte marcate cu "1." / "2." și același număr de părți: verdictul e
 * final, fiecare parte trebuie să se potrivească. Altfel strategia nu se aplică
 * și se trece la următoarele (cu cifrele marcajelor rămase în text).
 */
function duplexVerdict(userText: string, correctText: string): DuplexVerdict {
  if (!isDuplex(correctText) || !isDuplex(userText)) return 'not_applicable';
  const correctParts = splitParts(correctText);
  const userParts = splitParts(userText);
  if (correctParts.length === 0 || correctParts.length !== userParts.length) return 'not_applicable';
  return correctParts.every((part, i) => partsMatch(userParts[i], part)) ? 'match' : 'mismatch';
}

function commentAccepts(userNorm: string, correctNorm: string, comment: string | undefined): boolean {
  if (!comment || correctNorm.length >= COMMENT_ASSIST_MAX_LENGTH) return false;
  const lower = comment.toLowerCase();
  if (!lower.includes(userNorm)) return false;
  return ACCEPTANCE_MARKERS.some((m) => lower.includes(m));
}

/**
 * Întoarce strategia care a acceptat răspunsul, sau null.
 * Strategiile se încearcă în ordine; prima care reușește câștigă.
 * Nu aruncă; texte goale -> null.
 */
export function explainMatch(userText: string, correctText: string, comment?: string): MatchStrategy | null {
  const rawUser = userText.trim();
  const rawCorrect = correctText.trim();
  if (!rawUser || !rawCorrect) return null;

  const duplex = duplexVerdict(rawUser, rawCorrect);
  if (duplex === 'match') return 'duplex';
  if (duplex === 'mismatch') return null;

  const userNorm = normalizeAnswer(rawUser);
  const correctNorm = normalizeAnswer(rawCorrect);

  if (userNorm && userNorm === correctNorm) return 'exact';
  if (contains(userNorm, correctNorm)) return 'containment';
  if (rawUser.toLowerCase() === rawCorrect.toLowerCase()) return 'raw';
  if (words(correctNorm).size > 1 && keywordRatio(userNorm, correctNorm) >= KEYWORD_RATIO) return 'keywords';
  if (userNorm && commentAccepts(userNorm, correctNorm, comment)) return 'comment';

  return null;
}

export function isCorrect(userText: string, correctText: string, comment?: string): boolean {
  return explainMatch(userText, correctText, comment) !== null;
}
