import { afterEach, describe, expect, it, vi } from 'vitest';
import { QuestionUnavailableError } from './errors.ts';
import {
  XmlQuestionProvider,
  formatPlayedAt,
  formatTeamsStats,
  isPlayableQuestion,
  parseQuestionXml,
} from './questionProvider.ts';

const SITE = 'https://db.chgk.info';

function questionXml(fields: Record<string, string>): string {
  const body = Object.entries(fields)
    .map(([tag, value]) => `<${tag}>${value}</${tag}>`)
    .join('\n    ');
  return `<?xml version="1.0" encoding="UTF-8"?>\n<search>\n  <question>\n    ${body}\n  </question>\n</search>`;
}

const SAMPLE = questionXml({
  QuestionId: '12345',
  Question: 'Look at the picture (pic: 20240105.jpg) and name the city.',
  Answer: 'Paris',
  Comments: 'Capital of France.',
  tournamentTitle: 'Test Cup 2024',
  tour: 'Tour 1',
  Authors: 'Jane Doe',
  Difficulty: '3',
  tourPlayedAt: '2024-01-05',
  teamsNum: '40',
  teamsGotPoints: '10',
  tourFileName: 'testcup24.1',
  Number: '7',
});

describe('parseQuestionXml', () => {
  it('builds a question record', () => {
    const q = parseQuestionXml(SAMPLE, SITE);
    expect(q).toEqual({
      id: '12345',
      prompt: 'Look at the picture and name the city.',
      answer: 'Paris',
      comment: 'Capital of France.',
      imageUrls: ['https://db.chgk.info/images/db/20240105.jpg'],
      metadata: {
        tournament: 'Test Cup 2024',
        tour: 'Tour 1',
        author: 'Jane Doe',
        date: '05.01.2024',
        source: '',
        difficulty: '3',
        type: '',
        teamsStats: '10 din 40 echipe (25%)',
      },
      url: 'https://db.chgk.info/question/testcup24.1/7',
    });
  });

  it('takes the first of several questions', () => {
    const xml =
      '<search><question><QuestionId>1</QuestionId><Question>First?</Question><Answer>A</Answer></question>' +
      '<question><QuestionId>2</QuestionId><Question>Second?</Question><Answer>B</Answer></question></search>';
    const q = parseQuestionXml(xml, SITE);
    expect(q.id).toBe('1');
    expect(q.url).toBeNull();
    expect(q.imageUrls).toEqual([]);
  });

  it('rejects malformed XML', () => {
    expect(() => parseQuestionXml('<search><question>', SITE)).toThrow(QuestionUnavailableError);
  });

  it('rejects a document without a question', () => {
    expect(() => parseQuestionXml('<search><other>x</other></search>', SITE)).toThrow(QuestionUnavailableError);
  });

  it('rejects a question with an empty answer', () => {
    const xml = questionXml({ QuestionId: '9', Question: 'Why?', Answer: '' });
    expect(() => parseQuestionXml(xml, SITE)).toThrow(QuestionUnavailableError);
  });
});

describe('helpers', () => {
  it('formats the played-at date', () => {
    expect(formatPlayedAt('2019-03-07')).toBe('07.03.2019');
    expect(formatPlayedAt('March 2019')).toBe('March 2019');
  });

  it('formats team statistics', () => {
    expect(formatTeamsStats('3', '7')).toBe('3 din 7 echipe (43%)');
    expect(formatTeamsStats('', '7')).toBe('');
    expect(formatTeamsStats('x', '7')).toBe('');
  });

  it('requires both prompt and answer', () => {
    expect(isPlayableQuestion({ prompt: 'Q', answer: 'A' })).toBe(true);
    expect(isPlayableQuestion({ prompt: ' ', answer: 'A' })).toBe(false);
  });
});

describe('XmlQuestionProvider', () => {
  const provider = new XmlQuestionProvider({ url: 'https://questions.test/random', siteUrl: SITE, timeoutMs: 1_000 });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches and parses a random question', async () => {
    const fetchMock = vi.fn(async () => new Response(SAMPLE, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const q = await provider.fetchRandomQuestion();
    expect(q.answer).toBe('Paris');
    expect(fetchMock).toHaveBeenCalledWith(
      'https://questions.test/random',
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
    );
  });

  it('maps HTTP errors to QuestionUnavailableError', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('down', { status: 500 })));
    await expect(provider.fetchRandomQuestion()).rejects.toMatchObject({
      code: 'QUESTION_UNAVAILABLE',
      message: 'HTTP 500',
    });
  });

  it('maps network errors to QuestionUnavailableError', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      }),
    );
    const err = await provider.fetchRandomQuestion().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(QuestionUnavailableError);
    expect(err).toHaveProperty('cause', expect.any(TypeError));
  });

  it('rejects an unplayable response body', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<search><question>', { status: 200 })));
    await expect(provider.fetchRandomQuestion()).rejects.toBeInstanceOf(QuestionUnavailableError);
  });
});
