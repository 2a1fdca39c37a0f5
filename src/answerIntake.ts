// src/answerIntake.ts
import { createLogger } from './logger.ts';
import { explainMatch } from './matcher.ts';
import { messages, newQuestionButton, revealButton } from './messages.ts';
import type { SessionStore } from './sessionStore.ts';
import { deliver } from './transport.ts';
import type { AnswerOutcome, ChatTransport, RoundState, ScoreLedger } from './types.ts';

const log = createLogger('intake');

export interface AnswerIntakeDeps {
  store: SessionStore;
  ledger: ScoreLedger;
  transport: ChatTransport;
}

/**
 * Procesează un mesaj-răspuns pentru runda activă a utilizatorului.
 *
 * Decizia (corect/greșit, întârziat sau nu) și flag-urile rundei se scriu
 * sincron, înainte de orice I/O; punctajul se acordă cel mult o dată pe rundă.
 */
export class AnswerIntake {
  constructor(private readonly deps: AnswerIntakeDeps) {}

  async handle(userId: string, rawText: string): Promise<AnswerOutcome> {
    const round = this.deps.store.get(userId);
    if (!round) return 'no_active_round';

    if (round.correctAnswerGiven) {
      await deliver(this.deps.transport, round.chatId, messages.alreadyAnswered, { kind: 'already_answered' });
      return 'already_answered';
    }

    round.pendingInputs += 1;
    round.inputProcessing = true;
    try {
      // un mesaj al utilizatorului oprește mereu countdown-ul
      if (round.timerTask && !round.timerTask.finished) {
        round.timerTask.cancel();
        round.timerTask = null;
      }

      const strategy = explainMatch(rawText, round.question.answer, round.question.comment);
      const correct = strategy !== null;
      const late = round.timerExpired;

      if (correct) {
        round.answered = true;
        round.correctAnswerGiven = true;
      } else if (!late) {
        round.answered = false;
      }

      const outcome: AnswerOutcome = late
        ? correct ? 'late_correct' : 'late_incorrect'
        : correct ? 'correct' : 'incorrect';
      log.info('answer.evaluated', { userId, outcome, strategy, questionId: round.question.id });

      if (correct) await this.recordScore(round);
      await this.reply(round, outcome);
      return outcome;
    } finally {
      round.pendingInputs = Math.max(0, round.pendingInputs - 1);
      round.inputProcessing = round.pendingInputs > 0;
    }
  }

  private async recordScore(round: RoundState): Promise<void> {
    try {
      const score = await this.deps.ledger.increment(round.userId, round.displayName);
      log.info('score.incremented', { userId: round.userId, score });
    } catch (err) {
      log.error('score.increment_failed', { userId: round.userId, err });
    }
  }

  private async reply(round: RoundState, outcome: AnswerOutcome): Promise<void> {
    const { transport } = this.deps;
    const { answer, comment } = round.question;

    switch (outcome) {
      case 'correct':
        await deliver(transport, round.chatId, messages.correct(answer, comment), {
          kind: outcome,
          buttons: [newQuestionButton],
          fallback: messages.correctPlain,
        });
        return;
      case 'late_correct':
        await deliver(transport, round.chatId, messages.lateCorrect(answer, comment), {
          kind: outcome,
          buttons: [newQuestionButton],
          fallback: messages.lateCorrectPlain,
        });
        return;
      case 'late_incorrect':
        await deliver(transport, round.chatId, messages.lateIncorrect, {
          kind: outcome,
          buttons: [revealButton(round.userId), newQuestionButton],
          fallback: messages.lateIncorrect,
        });
        return;
      case 'incorrect':
        await deliver(transport, round.chatId, messages.incorrect, { kind: outcome });
        return;
      default:
        return;
    }
  }
}
