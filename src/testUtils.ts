// src/testUtils.ts — colaboratori în proces pentru teste
import type {
  ChatButton,
  ChatTransport,
  QuestionProvider,
  QuestionRecord,
  ScoreEntry,
  ScoreLedger,
  TimerHandle,
} from './types.ts';

export interface SentMessage {
  chatId: string;
  text: string;
  buttons: ChatButton[];
}

export class RecordingTransport implements ChatTransport {
  readonly sent: SentMessage[] = [];
  readonly photos: { chatId: string; url: string; caption?: string }[] = [];
  /** câte din următoarele sendMessage eșuează */
  failNext = 0;
  failAll = false;
  failPhotos = false;
  /** dacă e setat, sendPhoto așteaptă această promisiune */
  photoGate: Promise<void> | null = null;

  async sendMessage(chatId: string, text: string, buttons: ChatButton[] = []): Promise<void> {
    if (this.failAll) throw new Error('transport down');
    if (this.failNext > 0) {
      this.failNext -= 1;
      throw new Error('send failed');
    }
    this.sent.push({ chatId, text, buttons });
  }

  async sendPhoto(chatId: string, url: string, caption?: string): Promise<void> {
    if (this.photoGate) await this.photoGate;
    if (this.failAll || this.failPhotos) throw new Error('photo failed');
    this.photos.push({ chatId, url, caption });
  }

  texts(): string[] {
    return this.sent.map((m) => m.text);
  }

  count(text: string): number {
    return this.sent.filter((m) => m.text === text).length;
  }
}

export class MemoryLedger implements ScoreLedger {
  readonly scores = new Map<string, ScoreEntry>();
  calls = 0;
  fail = false;
  /** dacă e setat, increment așteaptă această promisiune */
  gate: Promise<void> | null = null;

  async increment(userId: string, displayName: string): Promise<number> {
    this.calls += 1;
    if (this.gate) await this.gate;
    if (this.fail) throw new Error('ledger unavailable');
    const entry = this.scores.get(userId) ?? { name: displayName, score: 0 };
    entry.score += 1;
    this.scores.set(userId, entry);
    return entry.score;
  }

  async topN(limit: number): Promise<ScoreEntry[]> {
    return [...this.scores.values()].sort((a, b) => b.score - a.score).slice(0, limit);
  }

  scoreOf(userId: string): number {
    return this.scores.get(userId)?.score ?? 0;
  }
}

export class ScriptedProvider implements QuestionProvider {
  calls = 0;
  constructor(private readonly script: Array<QuestionRecord | Error>) {}

  async fetchRandomQuestion(): Promise<QuestionRecord> {
    this.calls += 1;
    const next = this.script.shift();
    if (!next) throw new Error('script exhausted');
    if (next instanceof Error) throw next;
    return next;
  }
}

export class FakeTimerHandle implements TimerHandle {
  finished = false;
  cancelled = false;
  readonly done = Promise.resolve();
  cancel(): void {
    this.cancelled = true;
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function makeQuestion(overrides: Partial<QuestionRecord> = {}): QuestionRecord {
  return {
    id: 'q-1',
    prompt: 'Care este capitala Franței?',
    answer: 'Париж',
    comment: 'Oraș pe Sena.',
    imageUrls: [],
    metadata: {
      tournament: '',
      tour: '',
      author: '',
      date: '',
      source: '',
      difficulty: '',
      type: '',
      teamsStats: '',
    },
    url: null,
    ...overrides,
  };
}
