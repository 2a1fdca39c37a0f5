// src/messages.ts
import { encodeAction } from './commands.ts';
import { GAME_MODES, MODES } from './config.ts';
import type { ChatButton, GameMode, QuestionRecord, ScoreEntry } from './types.ts';

/** ===== Butoane ===== */
export const revealButton = (userId: string): ChatButton => ({
  label: '👀 Arată răspunsul',
  action: encodeAction({ kind: 'reveal', userId }),
});
export const newQuestionButton: ChatButton = { label: '🎲 Întrebare nouă', action: encodeAction({ kind: 'new' }) };
export const ratingButton: ChatButton = { label: '🏆 Clasament', action: encodeAction({ kind: 'rating' }) };

export const modeButtons = (): ChatButton[] =>
  GAME_MODES.map((mode) => ({ label: MODES[mode].label, action: encodeAction({ kind: 'mode', mode }) }));

/** Întrebare nouă, clasament și cele trei moduri: un singur rând de butoane. */
export const menuButtons = (): ChatButton[] => [newQuestionButton, ratingButton, ...modeButtons()];

const NO_COMMENT = 'Fără comentariu.';

function answerBlock(answer: string, comment: string): string {
  return `📝 Răspuns: ${answer}\n💬 ${comment || NO_COMMENT}`;
}

export function metadataLines(q: QuestionRecord): string[] {
  const m = q.metadata;
  const lines: string[] = [];
  if (m.tournament) lines.push(`🏆 Turneu: ${m.tournament}`);
  if (m.tour) lines.push(`📋 Tur: ${m.tour}`);
  if (m.author) lines.push(`✍️ Autor: ${m.author}`);
  if (m.date) lines.push(`📅 Data: ${m.date}`);
  if (m.source) lines.push(`📚 Sursa: ${m.source}`);
  if (m.difficulty) lines.push(`🔥 Dificultate: ${m.difficulty}`);
  if (m.type) lines.push(`📝 Tip: ${m.type}`);
  if (m.teamsStats) lines.push(`📊 Statistică: ${m.teamsStats}`);
  return lines;
}

export const messages = {
  question(q: QuestionRecord): string {
    let text = `❓ Întrebare:\n${q.prompt}`;
    const meta = metadataLines(q);
    if (meta.length) text += `\n\n${meta.join('\n')}`;
    if (q.url) text += `\n\n🔗 [Întrebarea în baza de date](<${q.url}>)`;
    return text;
  },
  questionPlain: (q: QuestionRecord) => `❓ Întrebare:\n${q.prompt}`,
  imageCaption: '📷 Imagine la întrebare',
  imageFailed: (url: string) => `⚠️ Nu am putut încărca imaginea: ${url}`,
  questionUnavailable: '⚠️ Eroare la încărcarea întrebării. Încearcă din nou mai târziu.',

  readingTime: (seconds: number) => `⏳ Ai ${seconds} secunde pentru citirea întrebării.`,
  countdownStarted: (seconds: number) => `⏱️ Cronometrul a pornit! (${seconds} secunde)`,
  hint: (hint: string) => `💡 Indiciu: ${hint}`,
  timeUp: '⏰ Timpul a expirat!',

  correct: (answer: string, comment: string) => `✅ Corect! Ai răspuns bine.\n\n${answerBlock(answer, comment)}`,
  correctPlain: '✅ Corect!',
  lateCorrect: (answer: string, comment: string) =>
    `✅ Corect, deși timpul expirase. Punctul se acordă.\n\n${answerBlock(answer, comment)}`,
  lateCorrectPlain: '✅ Corect (după expirarea timpului)!',
  incorrect: '❌ Greșit, mai încearcă!',
  lateIncorrect: '❌ Greșit, iar timpul a expirat deja.',
  alreadyAnswered: '✅ Ai răspuns deja corect la această întrebare.',
  noActiveRound: '🤔 Nu ai nicio întrebare activă. Folosește /trivia question pentru a începe.',

  reveal: (answer: string, comment: string) => answerBlock(answer, comment),
  revealNotTerminal: '⏳ Runda este încă în desfășurare, răspunsul se poate vedea după ce se încheie.',

  menu: (mode: GameMode) => `🎯 Trivia contra cronometru. Modul tău: ${MODES[mode].label}\nAlege o acțiune:`,
  modeSet: (mode: GameMode) => `✅ Mod setat: ${MODES[mode].label}`,
  stopped: '🛑 Runda a fost oprită.',
  nothingToStop: 'Nu ai nicio rundă activă.',

  rating(rows: ScoreEntry[]): string {
    if (!rows.length) return 'Clasamentul este gol deocamdată.';
    return '🏆 Top jucători:\n' + rows.map((r, i) => `${i + 1}. ${r.name} — ${r.score}`).join('\n');
  },
};
