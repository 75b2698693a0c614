import { BaseRepository } from './BaseRepository.js';
import {
  CreateKnowledgeInput,
  KnowledgeCategory,
  KnowledgeEntry,
} from '../types/entities.js';

interface KnowledgeRow {
  id: string;
  category: KnowledgeCategory;
  title: string;
  description: string;
  context: string | null;
  frequency: number;
  last_used: string | null;
  source_sessions: string;
  created_at: string;
  updated_at: string;
}

export class KnowledgeRepository extends BaseRepository {
  private static readonly SQLITE_ESCAPE_CHAR = '\\';

  getById(id: string): KnowledgeEntry | null {
    const row = this.db
      .prepare<[string], KnowledgeRow>('SELECT * FROM knowledge_base WHERE id = ?')
      .get(id);
    return row ? this.toEntry(row) : null;
  }

  getByKey(category: KnowledgeCategory, title: string): KnowledgeEntry | null {
    const row = this.db
      .prepare<[string, string], KnowledgeRow>(
        'SELECT * FROM knowledge_base WHERE category = ? AND title = ?'
      )
      .get(category, title);
    return row ? this.toEntry(row) : null;
  }

  /**
   * Inserts a new entry, or merges into the entry sharing (category, title):
   * the source session is appended, frequency bumped, and description and
   * context replaced only when new values are given.
   */
  upsert(input: CreateKnowledgeInput): KnowledgeEntry {
    const timestamp = this.getCurrentTimestamp();
    const existing = this.getByKey(input.category, input.title);

    if (existing) {
      const sources = [...existing.source_sessions];
      if (input.source_session_id && !sources.includes(input.source_session_id)) {
        sources.push(input.source_session_id);
      }

      const description = input.description.trim() ? input.description : existing.description;
      const context =
        input.context === undefined || input.context === null
          ? this.toJson(existing.context)
          : this.toJson(input.context);

      this.db
        .prepare(
          `
        UPDATE knowledge_base
        SET description = ?, context = ?, frequency = frequency + 1,
            last_used = ?, source_sessions = ?, updated_at = ?
        WHERE id = ?
      `
        )
        .run(description, context, timestamp, JSON.stringify(sources), timestamp, existing.id);

      return this.requireById(existing.id);
    }

    const id = this.generateId();
    this.db
      .prepare(
        `
      INSERT INTO knowledge_base
      (id, category, title, description, context, frequency, last_used, source_sessions, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, 1, ?, ?, ?, ?)
    `
      )
      .run(
        id,
        input.category,
        input.title,
        input.description,
        this.toJson(input.context),
        timestamp,
        JSON.stringify(input.source_session_id ? [input.source_session_id] : []),
        timestamp,
        timestamp
      );

    return this.requireById(id);
  }

  /**
   * Entries whose context mentions any of the terms (case-insensitive
   * substring), hottest first.
   */
  findByTerms(terms: string[], limit = 20): KnowledgeEntry[] {
    const cleaned = terms.map(term => term.trim().toLowerCase()).filter(term => term.length > 0);
    if (cleaned.length === 0) return [];

    const escape = KnowledgeRepository.SQLITE_ESCAPE_CHAR;
    const clauses = cleaned.map(() => `LOWER(context) LIKE ? ESCAPE '${escape}'`).join(' OR ');
    const params: Array<string | number> = cleaned.map(
      term => `%${term.replace(/[\\%_]/g, match => escape + match)}%`
    );
    params.push(limit);

    return this.db
      .prepare<Array<string | number>, KnowledgeRow>(
        `
      SELECT * FROM knowledge_base
      WHERE context IS NOT NULL AND (${clauses})
      ORDER BY frequency DESC, last_used DESC, title ASC
      LIMIT ?
    `
      )
      .all(...params)
      .map(row => this.toEntry(row));
  }

  /**
   * Retrieval reinforcement: every returned entry gets hotter.
   */
  recordUse(ids: string[]): void {
    if (ids.length === 0) return;
    const stmt = this.db.prepare(`
      UPDATE knowledge_base
      SET frequency = frequency + 1, last_used = ?
      WHERE id = ?
    `);
    const timestamp = this.getCurrentTimestamp();
    for (const id of ids) {
      stmt.run(timestamp, id);
    }
  }

  list(category?: KnowledgeCategory, limit = 50): KnowledgeEntry[] {
    if (category) {
      return this.db
        .prepare<[string, number], KnowledgeRow>(
          `SELECT * FROM knowledge_base WHERE category = ?
           ORDER BY frequency DESC, last_used DESC, title ASC LIMIT ?`
        )
        .all(category, limit)
        .map(row => this.toEntry(row));
    }
    return this.db
      .prepare<[number], KnowledgeRow>(
        'SELECT * FROM knowledge_base ORDER BY frequency DESC, last_used DESC, title ASC LIMIT ?'
      )
      .all(limit)
      .map(row => this.toEntry(row));
  }

  /**
   * Titles of entries used or updated in [from, to).
   */
  getTouchedTitlesBetween(from: string, to: string): string[] {
    const stmt = this.db.prepare<[string, string, string, string], { title: string }>(`
      SELECT title FROM knowledge_base
      WHERE (last_used >= ? AND last_used < ?) OR (updated_at >= ? AND updated_at < ?)
      ORDER BY frequency DESC, title ASC
    `);
    return stmt.all(from, to, from, to).map(row => row.title);
  }

  private requireById(id: string): KnowledgeEntry {
    const entry = this.getById(id);
    if (!entry) {
      throw new Error(`Knowledge entry ${id} was not persisted`);
    }
    return entry;
  }

  private toEntry(row: KnowledgeRow): KnowledgeEntry {
    const sources = this.parseJson(row.source_sessions);
    return {
      ...row,
      context: this.parseJson(row.context),
      source_sessions: Array.isArray(sources)
        ? sources.filter((source): source is string => typeof source === 'string')
        : [],
    };
  }
}
