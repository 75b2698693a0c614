import { BaseRepository } from './BaseRepository.js';
import {
  CreateCommandInput,
  CreateFileActionInput,
  JsonValue,
  SessionCommand,
  SessionContextEvent,
  SessionFile,
} from '../types/entities.js';

interface ContextEventRow {
  id: string;
  session_id: string;
  context_type: string;
  context_data: string;
  orphaned: number;
  timestamp: string;
}

/**
 * Append-only session events: file actions, commands and free-form context
 * notes. Nothing here checks that the session exists; callers flag
 * `orphaned` when it does not.
 */
export class EventRepository extends BaseRepository {
  addFileAction(sessionId: string, input: CreateFileActionInput, orphaned = false): SessionFile {
    const event: SessionFile = {
      id: this.generateId(),
      session_id: sessionId,
      file_path: input.file_path,
      action: input.action,
      language: input.language || null,
      lines_added: input.lines_added,
      lines_removed: input.lines_removed,
      orphaned: orphaned ? 1 : 0,
      timestamp: this.getCurrentTimestamp(),
    };

    this.db
      .prepare(
        `
      INSERT INTO session_files
      (id, session_id, file_path, action, language, lines_added, lines_removed, orphaned, timestamp)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `
      )
      .run(
        event.id,
        event.session_id,
        event.file_path,
        event.action,
        event.language,
        event.lines_added,
        event.lines_removed,
        event.orphaned,
        event.timestamp
      );

    return event;
  }

  addCommand(sessionId: string, input: CreateCommandInput, orphaned = false): SessionCommand {
    const event: SessionCommand = {
      id: this.generateId(),
      session_id: sessionId,
      command: input.command,
      exit_code: input.exit_code,
      output_summary: input.output_summary || null,
      orphaned: orphaned ? 1 : 0,
      timestamp: this.getCurrentTimestamp(),
    };

    this.db
      .prepare(
        `
      INSERT INTO session_commands
      (id, session_id, command, exit_code, output_summary, orphaned, timestamp)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `
      )
      .run(
        event.id,
        event.session_id,
        event.command,
        event.exit_code,
        event.output_summary,
        event.orphaned,
        event.timestamp
      );

    return event;
  }

  addContext(
    sessionId: string,
    contextType: string,
    data: JsonValue,
    orphaned = false
  ): SessionContextEvent {
    const event: SessionContextEvent = {
      id: this.generateId(),
      session_id: sessionId,
      context_type: contextType,
      context_data: data,
      orphaned: orphaned ? 1 : 0,
      timestamp: this.getCurrentTimestamp(),
    };

    this.db
      .prepare(
        `
      INSERT INTO session_context (id, session_id, context_type, context_data, orphaned, timestamp)
      VALUES (?, ?, ?, ?, ?, ?)
    `
      )
      .run(
        event.id,
        event.session_id,
        event.context_type,
        JSON.stringify(data),
        event.orphaned,
        event.timestamp
      );

    return event;
  }

  getFilesBySession(sessionId: string): SessionFile[] {
    const stmt = this.db.prepare<[string], SessionFile>(`
      SELECT * FROM session_files
      WHERE session_id = ?
      ORDER BY timestamp ASC
    `);
    return stmt.all(sessionId);
  }

  getCommandsBySession(sessionId: string): SessionCommand[] {
    const stmt = this.db.prepare<[string], SessionCommand>(`
      SELECT * FROM session_commands
      WHERE session_id = ?
      ORDER BY timestamp ASC
    `);
    return stmt.all(sessionId);
  }

  getContextBySession(sessionId: string, contextTypes?: string[]): SessionContextEvent[] {
    return this.getContextForSessions([sessionId], contextTypes);
  }

  getContextForSessions(sessionIds: string[], contextTypes?: string[]): SessionContextEvent[] {
    if (sessionIds.length === 0) return [];

    let sql = `SELECT * FROM session_context WHERE session_id IN (${sessionIds.map(() => '?').join(',')})`;
    const params: string[] = [...sessionIds];

    if (contextTypes && contextTypes.length > 0) {
      sql += ` AND context_type IN (${contextTypes.map(() => '?').join(',')})`;
      params.push(...contextTypes);
    }
    sql += ' ORDER BY timestamp ASC';

    return this.db
      .prepare<string[], ContextEventRow>(sql)
      .all(...params)
      .map(row => ({
        ...row,
        context_data: this.parseJson(row.context_data),
      }));
  }

  countFilesForSessions(sessionIds: string[]): number {
    if (sessionIds.length === 0) return 0;
    const row = this.db
      .prepare<string[], { count: number }>(
        `SELECT COUNT(DISTINCT file_path) as count FROM session_files WHERE session_id IN (${sessionIds.map(() => '?').join(',')})`
      )
      .get(...sessionIds);
    return row?.count ?? 0;
  }

  countCommandsForSessions(sessionIds: string[]): number {
    if (sessionIds.length === 0) return 0;
    const row = this.db
      .prepare<string[], { count: number }>(
        `SELECT COUNT(*) as count FROM session_commands WHERE session_id IN (${sessionIds.map(() => '?').join(',')})`
      )
      .get(...sessionIds);
    return row?.count ?? 0;
  }

  /**
   * Most frequently logged language across a project's sessions.
   */
  getDominantLanguage(projectPath: string): string | null {
    const row = this.db
      .prepare<[string], { language: string; uses: number }>(
        `
      SELECT f.language as language, COUNT(*) as uses
      FROM session_files f
      JOIN sessions s ON s.id = f.session_id
      WHERE s.project_path = ? AND f.language IS NOT NULL AND f.language != ''
      GROUP BY f.language
      ORDER BY uses DESC, MAX(f.timestamp) DESC
      LIMIT 1
    `
      )
      .get(projectPath);
    return row?.language ?? null;
  }
}
