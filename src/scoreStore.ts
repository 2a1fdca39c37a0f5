// src/scoreStore.ts
import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { ScoreEntry, ScoreLedger } from './types.ts';

const StoreSchema = z.record(
  z.string(),
  z.object({ name: z.string(), score: z.number().int().nonnegative() }),
);
type Store = z.infer<typeof StoreSchema>;

/**
 * Clasamentul persistent: data/scores.json, cheie = id-ul utilizatorului.
 * Scrierile sunt serializate, ca două incrementări simultane să nu se piardă.
 */
export class JsonScoreLedger implements ScoreLedger {
  readonly file: string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(dataDir: string) {
    this.file = path.resolve(dataDir, 'scores.json');
  }

  private async ensureDataFile() {
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    try {
      await fs.access(this.file);
    } catch {
      await fs.writeFile(this.file, '{}', 'utf8');
    }
  }

  private async loadStore(): Promise<Store> {
    await this.ensureDataFile();
    const raw = await fs.readFile(this.file, 'utf8');
    return StoreSchema.parse(JSON.parse(raw));
  }

  private async saveStore(store: Store) {
    const tmp = `${this.file}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(store, null, 2), 'utf8');
    await fs.rename(tmp, this.file);
  }

  private serialized<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  increment(userId: string, displayName: string): Promise<number> {
    return this.serialized(async () => {
      const store = await this.loadStore();
      const entry = store[userId] ?? { name: displayName, score: 0 };
      entry.name = displayName || entry.name;
      entry.score += 1;
      store[userId] = entry;
      await this.saveStore(store);
      return entry.score;
    });
  }

  topN(limit: number): Promise<ScoreEntry[]> {
    return this.serialized(async () => {
      const store = await this.loadStore();
      return Object.values(store)
        .sort((a, b) => b.score - a.score || a.name.localeCompare(b.name))
        .slice(0, Math.max(0, limit));
    });
  }
}
