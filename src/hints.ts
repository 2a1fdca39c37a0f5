// src/hints.ts
import type { TimingConfig } from './config.ts';
import { collapseSpaces, stripAsides } from './normalize.ts';
import type { QuestionRecord } from './types.ts';

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/** Timpul de citire: 5..20s după lungimea textului, +5s pentru fiecare imagine. */
export function readingTimeMs(question: Pick<QuestionRecord, 'prompt' | 'imageUrls'>, timing: TimingConfig): number {
  const steps = Math.floor(countWords(question.prompt) / timing.wordsPerReadingStep);
  const base = Math.min(timing.readingMaxMs, Math.max(timing.readingMinMs, steps * timing.readingStepMs));
  return base + question.imageUrls.length * timing.readingPerImageMs;
}

/** Prima literă vizibilă, restul mascat: "П • • • •" */
export function renderMasked(word: string): string {
  return word
    .split('')
    .map((ch, i) => (i === 0 ? ch.toUpperCase() : ch === '-' ? '-' : '•'))
    .join(' ');
}

/** Indiciu derivat din răspuns; nu conține niciodată răspunsul întreg. */
export function formatHint(answer: string): string {
  if (!answer.trim()) return 'Indiciu indisponibil.';

  let clean = collapseSpaces(stripAsides(answer).replace(/["«»„“”]/g, ''));
  if (!clean) clean = answer.trim();

  const words = clean.split(' ');
  if (words.length > 1) {
    const letters = words.join('').length;
    return `Răspunsul are ${words.length} cuvinte (${letters} litere).`;
  }

  const word = words[0];
  if (word.length <= 3) return `Răspunsul este un cuvânt scurt, de ${word.length} litere.`;
  return `Răspunsul are ${word.length} litere: ${renderMasked(word)}`;
}
