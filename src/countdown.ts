// src/countdown.ts
import { MODES, type TimingConfig } from './config.ts';
import { RoundCancelledError } from './errors.ts';
import { formatHint, readingTimeMs } from './hints.ts';
import { createLogger } from './logger.ts';
import { messages, revealButton } from './messages.ts';
import { deliver } from './transport.ts';
import type { ChatButton, ChatTransport, RoundState, TimerHandle } from './types.ts';

const log = createLogger('countdown');

export interface CountdownDeps {
  transport: ChatTransport;
  timing: TimingConfig;
  hintsEnabled: boolean;
}

/** setTimeout ca promisiune; respinge cu RoundCancelledError la abort. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RoundCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new RoundCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Countdown-ul unei runde: citire -> numărătoare -> grace -> expirat.
 *
 * Singurele puncte de suspendare sunt sleep-urile și trimiterea notificărilor.
 * Orice decizie pe flag-urile rundei se ia imediat după reluare, fără alt
 * await între verificare și scriere. După cancel() nu mai are loc nicio
 * tranziție de stare.
 */
export class CountdownTimer implements TimerHandle {
  readonly done: Promise<void>;
  private readonly controller = new AbortController();
  private settled = false;

  constructor(
    private readonly round: RoundState,
    private readonly deps: CountdownDeps,
  ) {
    this.done = this.run().finally(() => {
      this.settled = true;
      if (this.round.timerTask === this) this.round.timerTask = null;
    });
  }

  get finished(): boolean {
    return this.settled;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(): void {
    if (this.settled || this.cancelled) return;
    this.controller.abort();
    log.debug('countdown.cancel', { userId: this.round.userId, phase: this.round.timerPhase });
  }

  private pause(ms: number): Promise<void> {
    return sleep(ms, this.controller.signal);
  }

  private async notify(text: string, kind: string, buttons?: ChatButton[]): Promise<void> {
    // cu butoane, la eșec retrimitem textul simplu
    const fallback = buttons?.length ? text : undefined;
    await deliver(this.deps.transport, this.round.chatId, text, { kind, buttons, fallback });
  }

  private stop(reason: string): void {
    this.round.timerPhase = 'done';
    log.debug('countdown.stop', { userId: this.round.userId, reason });
  }

  private async run(): Promise<void> {
    const { round } = this;
    const { timing } = this.deps;
    const mode = MODES[round.mode];

    try {
      /** ===== Citire ===== */
      round.timerPhase = 'reading';
      if (round.answered || round.inputProcessing) return this.stop('answered_before_start');

      const readingMs = readingTimeMs(round.question, timing);
      if (readingMs > timing.readingMinMs) {
        await this.notify(messages.readingTime(Math.round(readingMs / 1000)), 'reading');
      }
      for (let waited = 0; waited < readingMs; waited += timing.pollMs) {
        await this.pause(Math.min(timing.pollMs, readingMs - waited));
        if (round.answered || round.inputProcessing) return this.stop('answered_during_reading');
      }

      /** ===== Numărătoare ===== */
      round.timerPhase = 'counting';
      await this.notify(messages.countdownStarted(Math.round(mode.durationMs / 1000)), 'countdown');

      const hintAt = mode.durationMs * timing.hintFraction;
      let hintPending = mode.hints && this.deps.hintsEnabled;
      let elapsed = 0;
      while (elapsed < mode.durationMs) {
        await this.pause(timing.tickMs);
        if (round.answered) return this.stop('answered');
        // un răspuns e în procesare: tick-ul nu se contorizează
        if (round.inputProcessing) continue;
        elapsed += timing.tickMs;

        if (hintPending && elapsed >= hintAt) {
          hintPending = false;
          await this.notify(messages.hint(formatHint(round.question.answer)), 'hint');
        }
      }

      /** ===== Grace ===== */
      round.timerPhase = 'grace';
      let graceLeft = timing.graceMs;
      let inputWait = 0;
      while (graceLeft > 0) {
        await this.pause(timing.pollMs);
        if (round.answered) return this.stop('answered_in_grace');
        if (round.inputProcessing && inputWait < timing.maxInputWaitMs) {
          inputWait += timing.pollMs;
          continue;
        }
        graceLeft -= timing.pollMs;
      }

      // fără await între verificare și scriere
      if (this.cancelled || round.answered) return this.stop('answered_at_deadline');
      round.timerExpired = true;
      round.timerExpiredAt = Date.now();
      round.answered = true;
      round.timerPhase = 'expired';
      log.info('round.expired', { userId: round.userId, questionId: round.question.id, inputWaitMs: inputWait });

      await this.notify(messages.timeUp, 'timeout', [revealButton(round.userId)]);
    } catch (err) {
      if (err instanceof RoundCancelledError) {
        if (!round.timerExpired) round.timerPhase = 'cancelled';
        return;
      }
      log.error('countdown.crashed', { userId: round.userId, err });
    }
  }
}

export function startCountdown(round: RoundState, deps: CountdownDeps): CountdownTimer {
  const timer = new CountdownTimer(round, deps);
  round.timerTask = timer;
  return timer;
}
