// src/sessionStore.ts
import { createLogger } from './logger.ts';
import type { GameMode, QuestionRecord, RoundState } from './types.ts';

const log = createLogger('sessions');

export function createRoundState(init: {
  userId: string;
  chatId: string;
  displayName: string;
  question: QuestionRecord;
  mode: GameMode;
}): RoundState {
  return {
    ...init,
    answered: false,
    correctAnswerGiven: false,
    timerExpired: false,
    timerExpiredAt: null,
    inputProcessing: false,
    pendingInputs: 0,
    timerTask: null,
    timerPhase: 'reading',
    startedAt: Date.now(),
  };
}

function stopTimer(state: RoundState) {
  if (state.timerTask && !state.timerTask.finished) state.timerTask.cancel();
  state.timerTask = null;
}

/**
 * Runda activă a fiecărui utilizator. O rundă nouă înlocuiește complet
 * runda veche, după ce countdown-ul ei a fost anulat.
 */
export class SessionStore {
  private readonly rounds = new Map<string, RoundState>();

  get(userId: string): RoundState | undefined {
    return this.rounds.get(userId);
  }

  has(userId: string): boolean {
    return this.rounds.has(userId);
  }

  get size(): number {
    return this.rounds.size;
  }

  replace(state: RoundState): RoundState | undefined {
    const previous = this.rounds.get(state.userId);
    if (previous) {
      stopTimer(previous);
      log.debug('round.replaced', { userId: state.userId, startedAt: previous.startedAt });
    }
    this.rounds.set(state.userId, state);
    return previous;
  }

  evict(userId: string): boolean {
    const state = this.rounds.get(userId);
    if (!state) return false;
    stopTimer(state);
    this.rounds.delete(userId);
    return true;
  }

  clear(): void {
    for (const state of this.rounds.values()) stopTimer(state);
    this.rounds.clear();
  }
}
