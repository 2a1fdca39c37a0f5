// src/errors.ts

export class TriviaError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, opts: { code: string; context?: Record<string, unknown>; cause?: unknown }) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = new.target.name;
    this.code = opts.code;
    if (opts.context) this.context = opts.context;
  }
}

/** Sursa de întrebări nu a putut produce o întrebare jucabilă. */
export class QuestionUnavailableError extends TriviaError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: 'QUESTION_UNAVAILABLE', context, cause });
  }
}

export class DeliveryError extends TriviaError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: 'DELIVERY_FAILED', context, cause });
  }
}

export class ConfigError extends TriviaError {
  readonly issues: string[];
  constructor(issues: string[]) {
    super(`Configurație invalidă: ${issues.join('; ')}`, { code: 'CONFIG_INVALID' });
    this.issues = issues;
  }
}

/** Aruncată de un sleep întrerupt; marchează ieșirea curată a unui countdown anulat. */
export class RoundCancelledError extends TriviaError {
  constructor() {
    super('Countdown anulat', { code: 'ROUND_CANCELLED' });
  }
}

export function describeError(err: unknown): string {
  let text: string;
  if (err instanceof TriviaError) text = `${err.name}[${err.code}]: ${err.message}`;
  else if (err instanceof Error) text = `${err.name}: ${err.message}`;
  else return String(err);
  return err.cause === undefined ? text : `${text} <- ${describeError(err.cause)}`;
}
