// src/questionProvider.ts
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { QuestionUnavailableError } from './errors.ts';
import { createLogger } from './logger.ts';
import type { QuestionProvider, QuestionRecord } from './types.ts';

const log = createLogger('questions');

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true,
});

const field = z
  .string()
  .optional()
  .transform((v) => (v ?? '').trim());

const QuestionNodeSchema = z.object({
  QuestionId: field,
  Question: field,
  Answer: field,
  Comments: field,
  tournamentTitle: field,
  tour: field,
  Authors: field,
  Source: field,
  Type: field,
  Difficulty: field,
  teamsNum: field,
  teamsGotPoints: field,
  tourPlayedAt: field,
  tourFileName: field,
  Number: field,
});
type QuestionNode = z.infer<typeof QuestionNodeSchema>;

// <search><question>…</question>…</search>; numele rădăcinii nu contează
const DocumentSchema = z.record(
  z.string(),
  z.object({ question: z.union([QuestionNodeSchema, z.array(QuestionNodeSchema).nonempty()]) }),
);

const PIC = /\(pic:\s*(.*?)\s*\)/g;
const PIC_WITH_SPACE = /\s*\(pic:\s*.*?\s*\)/g;

export function isPlayableQuestion(q: Pick<QuestionRecord, 'prompt' | 'answer'>): boolean {
  return q.prompt.trim() !== '' && q.answer.trim() !== '';
}

/** 2019-03-07 -> 07.03.2019; orice alt format rămâne neschimbat */
export function formatPlayedAt(raw: string): string {
  const m = /^(\d{4})-(\d{2})-(\d{2})/.exec(raw);
  return m ? `${m[3]}.${m[2]}.${m[1]}` : raw;
}

export function formatTeamsStats(gotPoints: string, total: string): string {
  if (!gotPoints || !total) return '';
  const got = Number.parseInt(gotPoints, 10);
  const all = Number.parseInt(total, 10);
  if (Number.isNaN(got) || Number.isNaN(all)) return '';
  const pct = all > 0 ? Math.round((got / all) * 100) : 0;
  return `${got} din ${all} echipe (${pct}%)`;
}

function toRecord(node: QuestionNode, siteUrl: string): QuestionRecord {
  const imageUrls = [...node.Question.matchAll(PIC)].map((m) => `${siteUrl}/images/db/${m[1]}`);
  const prompt = node.Question.replace(PIC_WITH_SPACE, '').trim();

  return {
    id: node.QuestionId,
    prompt,
    answer: node.Answer,
    comment: node.Comments,
    imageUrls,
    metadata: {
      tournament: node.tournamentTitle,
      tour: node.tour,
      author: node.Authors,
      date: node.tourPlayedAt ? formatPlayedAt(node.tourPlayedAt) : '',
      source: node.Source,
      difficulty: node.Difficulty,
      type: node.Type,
      teamsStats: formatTeamsStats(node.teamsGotPoints, node.teamsNum),
    },
    url: node.tourFileName && node.Number ? `${siteUrl}/question/${node.tourFileName}/${node.Number}` : null,
  };
}

/** Primul <question> din răspunsul XML. Aruncă QuestionUnavailableError dacă nu e jucabil. */
export function parseQuestionXml(xml: string, siteUrl: string): QuestionRecord {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new QuestionUnavailableError('XML invalid', { reason: valid.err.msg, line: valid.err.line });
  }

  const doc = DocumentSchema.safeParse(parser.parse(xml));
  if (!doc.success) {
    throw new QuestionUnavailableError('Elementul <question> lipsește', { issues: doc.error.issues.length });
  }
  const feed = Object.values(doc.data)[0];
  if (!feed) throw new QuestionUnavailableError('Document XML gol');

  const node = Array.isArray(feed.question) ? feed.question[0] : feed.question;
  const record = toRecord(node, siteUrl);
  if (!isPlayableQuestion(record)) {
    throw new QuestionUnavailableError('Întrebare sau răspuns gol', { questionId: record.id });
  }
  return record;
}

export interface XmlQuestionProviderOptions {
  url: string;
  siteUrl: string;
  timeoutMs: number;
}

export class XmlQuestionProvider implements QuestionProvider {
  constructor(private readonly opts: XmlQuestionProviderOptions) {}

  async fetchRandomQuestion(): Promise<QuestionRecord> {
    const { url, siteUrl, timeoutMs } = this.opts;

    let res: Response;
    try {
      res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    } catch (err) {
      throw new QuestionUnavailableError('Sursa de întrebări nu răspunde', { url }, err);
    }
    if (!res.ok) {
      throw new QuestionUnavailableError(`HTTP ${res.status}`, { url, status: res.status });
    }

    const question = parseQuestionXml(await res.text(), siteUrl);
    log.info('question.fetched', { questionId: question.id, images: question.imageUrls.length });
    return question;
  }
}
