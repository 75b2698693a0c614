import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { NotFoundError, StorageError } from './errors.js';
import { ValidationError } from './validation.js';

export interface DatabaseConfig {
  filename: string;
  maxSize?: number; // Maximum database size in bytes
  walMode?: boolean; // Enable WAL mode for better concurrency
  busyTimeout?: number; // Milliseconds to wait for another writer's lock
}

export class DatabaseManager {
  private db: Database.Database;
  private config: Required<DatabaseConfig>;

  constructor(config: DatabaseConfig) {
    this.config = {
      filename: config.filename,
      maxSize: config.maxSize || 100 * 1024 * 1024, // 100MB default
      walMode: config.walMode !== false, // WAL mode enabled by default
      busyTimeout: config.busyTimeout ?? 5000,
    };

    this.db = this.open();
  }

  private open(): Database.Database {
    try {
      if (this.config.filename !== ':memory:') {
        fs.mkdirSync(path.dirname(path.resolve(this.config.filename)), { recursive: true });
      }
      const db = new Database(this.config.filename);
      this.initialize(db);
      return db;
    } catch (error) {
      throw new StorageError(
        `Failed to open database at ${this.config.filename}: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }

  private initialize(db: Database.Database): void {
    // Enable WAL mode for better concurrency
    if (this.config.walMode) {
      db.pragma('journal_mode = WAL');
    }

    // Several tool processes may write at once
    db.pragma(`busy_timeout = ${this.config.busyTimeout}`);

    db.pragma('foreign_keys = ON');

    this.createTables(db);
  }

  private createTables(db: Database.Database): void {
    db.exec(`
      -- One row per AI CLI tool invocation
      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        tool TEXT NOT NULL,
        start_time TEXT NOT NULL,
        end_time TEXT,
        working_dir TEXT NOT NULL,
        project_path TEXT NOT NULL,
        git_repo TEXT,
        git_branch TEXT,
        git_commit TEXT,
        exit_code INTEGER,
        duration_seconds INTEGER,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      -- Session events carry no foreign key: late events for unknown
      -- sessions are kept and flagged as orphaned
      CREATE TABLE IF NOT EXISTS session_files (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        file_path TEXT NOT NULL,
        action TEXT NOT NULL,
        language TEXT,
        lines_added INTEGER DEFAULT 0,
        lines_removed INTEGER DEFAULT 0,
        orphaned INTEGER DEFAULT 0,
        timestamp TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS session_commands (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        command TEXT NOT NULL,
        exit_code INTEGER,
        output_summary TEXT,
        orphaned INTEGER DEFAULT 0,
        timestamp TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS session_context (
        id TEXT PRIMARY KEY,
        session_id TEXT NOT NULL,
        context_type TEXT NOT NULL,
        context_data TEXT NOT NULL, -- JSON
        orphaned INTEGER DEFAULT 0,
        timestamp TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS knowledge_base (
        id TEXT PRIMARY KEY,
        category TEXT NOT NULL,
        title TEXT NOT NULL,
        description TEXT NOT NULL,
        context TEXT, -- JSON
        frequency INTEGER DEFAULT 1,
        last_used TEXT,
        source_sessions TEXT NOT NULL DEFAULT '[]', -- JSON array of session ids
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        UNIQUE(category, title)
      );

      CREATE TABLE IF NOT EXISTS projects (
        id TEXT PRIMARY KEY,
        project_path TEXT NOT NULL UNIQUE,
        project_name TEXT,
        primary_language TEXT,
        framework TEXT,
        last_session_id TEXT,
        session_count INTEGER DEFAULT 0,
        total_time_seconds INTEGER DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS project_patterns (
        id TEXT PRIMARY KEY,
        project_id TEXT NOT NULL,
        pattern_type TEXT NOT NULL,
        pattern_data TEXT NOT NULL, -- JSON
        confidence REAL DEFAULT 0.5,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        FOREIGN KEY (project_id) REFERENCES projects(id) ON DELETE CASCADE,
        UNIQUE(project_id, pattern_type)
      );

      -- project_path is '' for an all-projects rollup so the key stays unique
      CREATE TABLE IF NOT EXISTS weekly_summaries (
        id TEXT PRIMARY KEY,
        year INTEGER NOT NULL,
        week_number INTEGER NOT NULL,
        cli_tool TEXT NOT NULL,
        project_path TEXT NOT NULL DEFAULT '',
        summary_data TEXT NOT NULL, -- JSON
        session_count INTEGER DEFAULT 0,
        total_time_seconds INTEGER DEFAULT 0,
        created_at TEXT NOT NULL,
        UNIQUE(year, week_number, cli_tool, project_path)
      );

      CREATE TABLE IF NOT EXISTS entities (
        id TEXT PRIMARY KEY,
        entity_name TEXT NOT NULL UNIQUE,
        entity_type TEXT NOT NULL,
        description TEXT,
        metadata TEXT, -- JSON
        reference_count INTEGER DEFAULT 0,
        last_referenced TEXT,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS entity_relations (
        id TEXT PRIMARY KEY,
        from_entity_id TEXT NOT NULL,
        to_entity_id TEXT NOT NULL,
        relation_type TEXT NOT NULL,
        strength REAL DEFAULT 0.5,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        FOREIGN KEY (from_entity_id) REFERENCES entities(id) ON DELETE CASCADE,
        FOREIGN KEY (to_entity_id) REFERENCES entities(id) ON DELETE CASCADE,
        UNIQUE(from_entity_id, to_entity_id, relation_type)
      );

      CREATE TABLE IF NOT EXISTS cli_versions (
        id TEXT PRIMARY KEY,
        tool_name TEXT NOT NULL UNIQUE,
        version TEXT NOT NULL,
        previous_version TEXT,
        last_check TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_tool ON sessions(tool);
      CREATE INDEX IF NOT EXISTS idx_sessions_dir ON sessions(working_dir);
      CREATE INDEX IF NOT EXISTS idx_sessions_project ON sessions(project_path);
      CREATE INDEX IF NOT EXISTS idx_sessions_start ON sessions(start_time);
      CREATE INDEX IF NOT EXISTS idx_files_session ON session_files(session_id);
      CREATE INDEX IF NOT EXISTS idx_files_path ON session_files(file_path);
      CREATE INDEX IF NOT EXISTS idx_commands_session ON session_commands(session_id);
      CREATE INDEX IF NOT EXISTS idx_context_session ON session_context(session_id);
      CREATE INDEX IF NOT EXISTS idx_context_type ON session_context(context_type);
      CREATE INDEX IF NOT EXISTS idx_knowledge_category ON knowledge_base(category);
      CREATE INDEX IF NOT EXISTS idx_knowledge_frequency ON knowledge_base(frequency DESC);
      CREATE INDEX IF NOT EXISTS idx_patterns_project ON project_patterns(project_id);
      CREATE INDEX IF NOT EXISTS idx_weekly_year_week ON weekly_summaries(year, week_number);
      CREATE INDEX IF NOT EXISTS idx_entities_type ON entities(entity_type);
      CREATE INDEX IF NOT EXISTS idx_relations_from ON entity_relations(from_entity_id);
      CREATE INDEX IF NOT EXISTS idx_relations_to ON entity_relations(to_entity_id);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getFilename(): string {
    return this.config.filename;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getDatabaseSize(): number {
    const result = this.db
      .prepare<[], { size: number }>(
        'SELECT page_count * page_size as size FROM pragma_page_count(), pragma_page_size()'
      )
      .get();
    return result?.size ?? 0;
  }

  isDatabaseFull(): boolean {
    return this.getDatabaseSize() >= this.config.maxSize;
  }

  /**
   * Online backup of the live database; safe while other connections write.
   */
  async backup(destination: string): Promise<void> {
    try {
      fs.mkdirSync(path.dirname(destination), { recursive: true });
      await this.db.backup(destination);
    } catch (error) {
      throw new StorageError(
        `Backup to ${destination} failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }

  /**
   * Runs `fn` in one short IMMEDIATE transaction: the write lock is taken
   * before `fn` reads, so a writer in another process makes this call wait
   * up to `busyTimeout` instead of failing mid-way. SQLite failures surface
   * as StorageError; validation and lookup errors pass through unchanged.
   */
  runInTransaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn).immediate();
    } catch (error) {
      if (
        error instanceof ValidationError ||
        error instanceof NotFoundError ||
        error instanceof StorageError
      ) {
        throw error;
      }
      throw new StorageError(
        `Database operation failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }
}
