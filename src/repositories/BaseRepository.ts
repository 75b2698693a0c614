import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseManager } from '../utils/database.js';
import type { JsonValue } from '../types/entities.js';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export abstract class BaseRepository {
  protected db: Database.Database;
  protected dbManager: DatabaseManager;
  protected clock: Clock;

  constructor(dbManager: DatabaseManager, clock: Clock = systemClock) {
    this.dbManager = dbManager;
    this.db = dbManager.getDatabase();
    this.clock = clock;
  }

  protected generateId(): string {
    return uuidv4();
  }

  protected getCurrentTimestamp(): string {
    return this.clock().toISOString();
  }

  protected toJson(value: JsonValue | null | undefined): string | null {
    return value === undefined || value === null ? null : JSON.stringify(value);
  }

  /**
   * JSON columns are written by collaborators too; text that does not parse
   * is handed back as-is rather than failing the read.
   */
  protected parseJson(text: string | null): JsonValue | null {
    if (text === null) return null;
    try {
      const parsed: JsonValue = JSON.parse(text);
      return parsed;
    } catch {
      return text;
    }
  }
}
