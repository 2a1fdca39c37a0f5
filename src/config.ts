// src/config.ts
import { z } from 'zod';
import { ConfigError } from './errors.ts';
import type { GameMode } from './types.ts';

/** ===== Moduri de joc ===== */
export interface ModeConfig {
  durationMs: number;
  hints: boolean;
  label: string;
}

export const MODES: Record<GameMode, ModeConfig> = {
  normal: { durationMs: 60_000, hints: true, label: '🧠 Normal (60s)' },
  speed: { durationMs: 30_000, hints: false, label: '⚡ Pe viteză (30s)' },
  no_hints: { durationMs: 50_000, hints: false, label: '🔕 Fără indicii (50s)' },
};

export const GAME_MODES = ['normal', 'speed', 'no_hints'] as const satisfies readonly GameMode[];

export function isGameMode(value: string): value is GameMode {
  return Object.hasOwn(MODES, value);
}

/** ===== Timpi countdown ===== */
export interface TimingConfig {
  tickMs: number;              // pasul de numărătoare
  pollMs: number;              // verificarea flag-urilor în citire/grace
  graceMs: number;             // fereastra de toleranță după expirare
  maxInputWaitMs: number;      // cât amânăm expirarea cât timp un răspuns e în procesare
  readingMinMs: number;
  readingMaxMs: number;
  readingStepMs: number;
  wordsPerReadingStep: number;
  readingPerImageMs: number;
  hintFraction: number;        // hint la 50% din timp
}

export const DEFAULT_TIMING: TimingConfig = {
  tickMs: 1_000,
  pollMs: 250,
  graceMs: 2_000,
  maxInputWaitMs: 10_000,
  readingMinMs: 5_000,
  readingMaxMs: 20_000,
  readingStepMs: 5_000,
  wordsPerReadingStep: 15,
  readingPerImageMs: 5_000,
  hintFraction: 0.5,
};

export interface AppConfig {
  discordToken: string;
  guildId?: string;
  playChannelId?: string;
  dataDir: string;
  hintsEnabled: boolean;
  questionUrl: string;
  questionSiteUrl: string;
  questionTimeoutMs: number;
  timing: TimingConfig;
}

const optionalText = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
  z.string().trim().optional(),
);

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? fallback : v.trim().toLowerCase() === 'true'));

const millis = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  DISCORD_TOKEN: z.string({ required_error: 'lipsește' }).trim().min(1, 'lipsește'),
  GUILD_ID: optionalText,
  PLAY_CHANNEL_ID: optionalText,
  DATA_DIR: z.string().trim().min(1).default('data'),
  ENABLE_HINTS: flag(true),
  QUESTION_URL: z.string().url().default('https://db.chgk.info/xml/random/questions'),
  QUESTION_SITE_URL: z.string().url().default('https://db.chgk.info'),
  QUESTION_TIMEOUT_MS: millis(10_000),
  TICK_MS: millis(DEFAULT_TIMING.tickMs),
  POLL_MS: millis(DEFAULT_TIMING.pollMs),
  GRACE_MS: millis(DEFAULT_TIMING.graceMs),
  MAX_INPUT_WAIT_MS: millis(DEFAULT_TIMING.maxInputWaitMs),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    discordToken: e.DISCORD_TOKEN,
    guildId: e.GUILD_ID,
    playChannelId: e.PLAY_CHANNEL_ID,
    dataDir: e.DATA_DIR,
    hintsEnabled: e.ENABLE_HINTS,
    questionUrl: e.QUESTION_URL,
    questionSiteUrl: e.QUESTION_SITE_URL.replace(/\/+$/, ''),
    questionTimeoutMs: e.QUESTION_TIMEOUT_MS,
    timing: {
      ...DEFAULT_TIMING,
      tickMs: e.TICK_MS,
      pollMs: e.POLL_MS,
      graceMs: e.GRACE_MS,
      maxInputWaitMs: e.MAX_INPUT_WAIT_MS,
    },
  };
}
