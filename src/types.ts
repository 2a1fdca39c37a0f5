export type GameMode = 'normal' | 'speed' | 'no_hints';

export interface QuestionMetadata {
  tournament: string;
  tour: string;
  author: string;
  date: string;         // DD.MM.YYYY sau textul brut
  source: string;
  difficulty: string;
  type: string;
  teamsStats: string;   // "corecte/total"
}

export interface QuestionRecord {
  id: string;
  prompt: string;
  answer: string;
  comment: string;
  imageUrls: string[];
  metadata: QuestionMetadata;
  url: string | null;
}

export type TimerPhase = 'reading' | 'counting' | 'grace' | 'expired' | 'cancelled' | 'done';

export interface TimerHandle {
  readonly finished: boolean;
  readonly done: Promise<void>;
  cancel(): void;
}

export interface RoundState {
  userId: string;
  chatId: string;
  displayName: string;

  question: QuestionRecord;
  mode: GameMode;

  answered: boolean;
  correctAnswerGiven: boolean;
  timerExpired: boolean;
  timerExpiredAt: number | null;

  inputProcessing: boolean;
  pendingInputs: number;       // apeluri AnswerIntake în zbor

  timerTask: TimerHandle | null;
  timerPhase: TimerPhase;
  startedAt: number;
}

export type AnswerOutcome =
  | 'correct'
  | 'incorrect'
  | 'no_active_round'
  | 'already_answered'
  | 'late_correct'
  | 'late_incorrect';

export type RevealResult =
  | { status: 'revealed'; answer: string; comment: string }
  | { status: 'not_terminal' }
  | { status: 'no_round' };

export interface ChatButton {
  label: string;
  action: string;
}

export interface ChatTransport {
  sendMessage(chatId: string, text: string, buttons?: ChatButton[]): Promise<void>;
  sendPhoto(chatId: string, url: string, caption?: string): Promise<void>;
}

export interface QuestionProvider {
  fetchRandomQuestion(): Promise<QuestionRecord>;
}

export interface ScoreEntry {
  name: string;
  score: number;
}

export interface ScoreLedger {
  increment(userId: string, displayName: string): Promise<number>;
  topN(limit: number): Promise<ScoreEntry[]>;
}
