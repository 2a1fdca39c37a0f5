import { describe, expect, it } from 'vitest';
import { DEFAULT_TIMING, isGameMode, loadConfig } from './config.ts';
import { ConfigError } from './errors.ts';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ DISCORD_TOKEN: 'test-token' });
    expect(config).toEqual({
      discordToken: 'test-token',
      guildId: undefined,
      playChannelId: undefined,
      dataDir: 'data',
      hintsEnabled: true,
      questionUrl: 'https://db.chgk.info/xml/random/questions',
      questionSiteUrl: 'https://db.chgk.info',
      questionTimeoutMs: 10_000,
      timing: DEFAULT_TIMING,
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      DISCORD_TOKEN: 'test-token',
      GUILD_ID: '123',
      PLAY_CHANNEL_ID: ' ',
      DATA_DIR: '/tmp/trivia',
      ENABLE_HINTS: 'false',
      QUESTION_SITE_URL: 'https://questions.test/',
      GRACE_MS: '500',
      MAX_INPUT_WAIT_MS: '3000',
    });
    expect(config.guildId).toBe('123');
    expect(config.playChannelId).toBeUndefined();
    expect(config.dataDir).toBe('/tmp/trivia');
    expect(config.hintsEnabled).toBe(false);
    expect(config.questionSiteUrl).toBe('https://questions.test');
    expect(config.timing.graceMs).toBe(500);
    expect(config.timing.maxInputWaitMs).toBe(3_000);
    expect(config.timing.tickMs).toBe(1_000);
  });

  it('reports every invalid key', () => {
    try {
      loadConfig({ GRACE_MS: '-1' });
      expect.unreachable('loadConfig should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.code).toBe('CONFIG_INVALID');
      expect(err.issues.map((i) => i.split(':')[0])).toEqual(['DISCORD_TOKEN', 'GRACE_MS']);
      expect(err.issues[0]).toBe('DISCORD_TOKEN: lipsește');
    }
  });
});

describe('isGameMode', () => {
  it('accepts only known modes', () => {
    expect(isGameMode('speed')).toBe(true);
    expect(isGameMode('turbo')).toBe(false);
    expect(isGameMode('toString')).toBe(false);
    expect(isGameMode('constructor')).toBe(false);
  });
});
