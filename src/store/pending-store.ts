import type { Db } from '../db.js';
import { StoreIOError } from '../errors.js';
import type { Draft } from '../types.js';

interface DraftRow {
  id: string;
  text: string;
  image_path: string;
  created_at: string;
}

function toDraft(row: DraftRow): Draft {
  return {
    id: row.id,
    text: row.text,
    imagePath: row.image_path,
    createdAt: row.created_at,
  };
}

// Durable record of drafts awaiting a decision. Each method is one SQLite
// statement, so a failure never leaves a half-written draft behind.
export class PendingStore {
  constructor(private readonly db: Db) {}

  put(draft: Draft): void {
    this.guard('put', () => {
      this.db.prepare(`
        INSERT INTO pending_drafts (id, text, image_path, created_at)
        VALUES (@id, @text, @imagePath, @createdAt)
        ON CONFLICT(id) DO UPDATE SET
          text = excluded.text,
          image_path = excluded.image_path,
          created_at = excluded.created_at
      `).run(draft);
    });
  }

  get(id: string): Draft | null {
    return this.guard('get', () => {
      const row = this.db
        .prepare<[string], DraftRow>('SELECT * FROM pending_drafts WHERE id = ?')
        .get(id);
      return row ? toDraft(row) : null;
    });
  }

  remove(id: string): void {
    this.guard('remove', () => {
      this.db.prepare('DELETE FROM pending_drafts WHERE id = ?').run(id);
    });
  }

  // Presence check and removal in a single write statement: of two callers
  // racing on the same id, exactly one gets the draft back.
  take(id: string): Draft | null {
    return this.guard('take', () => {
      const row = this.db
        .prepare<[string], DraftRow>('DELETE FROM pending_drafts WHERE id = ? RETURNING *')
        .get(id);
      return row ? toDraft(row) : null;
    });
  }

  loadAll(): Map<string, Draft> {
    return this.guard('loadAll', () => {
      const rows = this.db
        .prepare<[], DraftRow>('SELECT * FROM pending_drafts ORDER BY created_at ASC')
        .all();
      return new Map(rows.map(row => [row.id, toDraft(row)]));
    });
  }

  count(): number {
    return this.guard('count', () => {
      const row = this.db
        .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM pending_drafts')
        .get();
      return row?.count ?? 0;
    });
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new StoreIOError(`Pending store ${operation} failed`, { cause: error });
    }
  }
}
