// src/roundEngine.ts
import { AnswerIntake } from './answerIntake.ts';
import type { TimingConfig } from './config.ts';
import { startCountdown } from './countdown.ts';
import { QuestionUnavailableError } from './errors.ts';
import { createLogger } from './logger.ts';
import { messages } from './messages.ts';
import { isPlayableQuestion } from './questionProvider.ts';
import { SessionStore, createRoundState } from './sessionStore.ts';
import { deliver, deliverPhoto } from './transport.ts';
import type {
  AnswerOutcome,
  ChatTransport,
  GameMode,
  QuestionProvider,
  QuestionRecord,
  RevealResult,
  RoundState,
  ScoreEntry,
  ScoreLedger,
} from './types.ts';

const log = createLogger('engine');

export const LEADERBOARD_SIZE = 5;

export interface RoundEngineDeps {
  provider: QuestionProvider;
  ledger: ScoreLedger;
  transport: ChatTransport;
  timing: TimingConfig;
  hintsEnabled: boolean;
  store?: SessionStore;
}

export interface Player {
  userId: string;
  chatId: string;
  displayName: string;
}

/** Interfața jocului către stratul de chat. */
export class RoundEngine {
  readonly store: SessionStore;
  private readonly intake: AnswerIntake;
  private readonly modes = new Map<string, GameMode>();

  constructor(private readonly deps: RoundEngineDeps) {
    this.store = deps.store ?? new SessionStore();
    this.intake = new AnswerIntake({ store: this.store, ledger: deps.ledger, transport: deps.transport });
  }

  /** ===== Moduri ===== */
  modeFor(userId: string): GameMode {
    return this.modes.get(userId) ?? 'normal';
  }

  setMode(userId: string, mode: GameMode): void {
    this.modes.set(userId, mode);
  }

  hasRound(userId: string): boolean {
    return this.store.has(userId);
  }

  roundFor(userId: string): RoundState | undefined {
    return this.store.get(userId);
  }

  private installRound(player: Player, question: QuestionRecord, mode: GameMode): RoundState {
    if (!isPlayableQuestion(question)) {
      throw new QuestionUnavailableError('Întrebare fără text sau fără răspuns', { questionId: question.id });
    }
    const state = createRoundState({ ...player, question, mode });
    this.store.replace(state);
    return state;
  }

  private launchCountdown(state: RoundState): void {
    startCountdown(state, {
      transport: this.deps.transport,
      timing: this.deps.timing,
      hintsEnabled: this.deps.hintsEnabled,
    });
    log.info('round.started', { userId: state.userId, mode: state.mode, questionId: state.question.id });
  }

  /**
   * Instalează o rundă nouă și pornește countdown-ul. Runda precedentă a
   * utilizatorului (dacă există) este anulată înainte de înlocuire.
   */
  startRound(player: Player, question: QuestionRecord, mode: GameMode): RoundState {
    const state = this.installRound(player, question, mode);
    this.launchCountdown(state);
    return state;
  }

  /**
   * Aduce o întrebare, o afișează și pornește runda. Runda există din momentul
   * în care întrebarea e trimisă; countdown-ul pornește după ce s-au trimis imaginile.
   */
  async serveQuestion(player: Player): Promise<RoundState> {
    const question = await this.deps.provider.fetchRandomQuestion();
    const state = this.installRound(player, question, this.modeFor(player.userId));

    const { transport } = this.deps;
    await deliver(transport, player.chatId, messages.question(question), {
      kind: 'question',
      fallback: messages.questionPlain(question),
    });
    for (const url of question.imageUrls) {
      const ok = await deliverPhoto(transport, player.chatId, url, messages.imageCaption);
      if (!ok) await deliver(transport, player.chatId, messages.imageFailed(url), { kind: 'image_fallback' });
    }

    // între timp runda poate fi oprită sau înlocuită
    if (this.store.get(player.userId) !== state) {
      log.info('round.superseded', { userId: player.userId, questionId: question.id });
      return state;
    }
    this.launchCountdown(state);
    return state;
  }

  submitAnswer(userId: string, text: string): Promise<AnswerOutcome> {
    return this.intake.handle(userId, text);
  }

  /** Idempotent; nu modifică starea rundei. */
  revealAnswer(userId: string): RevealResult {
    const round = this.store.get(userId);
    if (!round) return { status: 'no_round' };
    if (!round.correctAnswerGiven && !round.timerExpired) return { status: 'not_terminal' };
    return { status: 'revealed', answer: round.question.answer, comment: round.question.comment };
  }

  stopRound(userId: string): boolean {
    const stopped = this.store.evict(userId);
    if (stopped) log.info('round.stopped', { userId });
    return stopped;
  }

  leaderboard(limit = LEADERBOARD_SIZE): Promise<ScoreEntry[]> {
    return this.deps.ledger.topN(limit);
  }

  shutdown(): void {
    log.info('engine.shutdown', { rounds: this.store.size });
    this.store.clear();
  }
}
