import type { Db } from '../db.js';
import { StoreIOError } from '../errors.js';

/**
 * Append-only log of published post texts, fed back to the generator as
 * context. Entries are never edited or deleted by the service.
 */
export class HistoryStore {
  constructor(private readonly db: Db) {}

  append(text: string): void {
    try {
      this.db
        .prepare('INSERT INTO history (text, published_at) VALUES (?, ?)')
        .run(text, new Date().toISOString());
    } catch (error) {
      throw new StoreIOError('History append failed', { cause: error });
    }
  }

  /** The `limit` most recent entries, oldest first. */
  recent(limit: number): string[] {
    if (limit <= 0) return [];
    const rows = this.db
      .prepare<[number], { text: string }>(`
        SELECT text FROM (
          SELECT seq, text FROM history ORDER BY seq DESC LIMIT ?
        ) ORDER BY seq ASC
      `)
      .all(limit);
    return rows.map(row => row.text);
  }

  all(): string[] {
    return this.db
      .prepare<[], { text: string }>('SELECT text FROM history ORDER BY seq ASC')
      .all()
      .map(row => row.text);
  }

  count(): number {
    const row = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM history')
      .get();
    return row?.count ?? 0;
  }
}
