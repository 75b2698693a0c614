import { BaseRepository } from './BaseRepository.js';
import { Session, CreateSessionInput, RecentSession } from '../types/entities.js';

export class SessionRepository extends BaseRepository {
  create(input: CreateSessionInput): Session {
    const id = this.generateId();
    const timestamp = this.getCurrentTimestamp();

    const stmt = this.db.prepare(`
      INSERT INTO sessions (
        id, tool, start_time, working_dir, project_path,
        git_repo, git_branch, git_commit, created_at, updated_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      id,
      input.tool,
      input.start_time,
      input.working_dir,
      input.project_path,
      input.git?.repo || null,
      input.git?.branch || null,
      input.git?.commit || null,
      timestamp,
      timestamp
    );

    const session = this.getById(id);
    if (!session) {
      throw new Error(`Session ${id} was not persisted`);
    }
    return session;
  }

  getById(id: string): Session | null {
    const stmt = this.db.prepare<[string], Session>('SELECT * FROM sessions WHERE id = ?');
    return stmt.get(id) ?? null;
  }

  /**
   * Closes an open session. Returns false when the session was already
   * closed, so callers can keep end-of-session side effects single-shot.
   */
  close(id: string, endTime: string, exitCode: number | null, durationSeconds: number): boolean {
    const stmt = this.db.prepare(`
      UPDATE sessions
      SET end_time = ?, exit_code = ?, duration_seconds = ?, updated_at = ?
      WHERE id = ? AND end_time IS NULL
    `);

    const result = stmt.run(endTime, exitCode, durationSeconds, this.getCurrentTimestamp(), id);
    return result.changes === 1;
  }

  findRecentByDirectory(workingDir: string, tool: string | null, limit = 10): RecentSession[] {
    const params: Array<string | number> = [workingDir];
    let toolClause = '';
    if (tool) {
      toolClause = 'AND s.tool = ?';
      params.push(tool);
    }
    params.push(limit);

    const stmt = this.db.prepare<Array<string | number>, RecentSession>(`
      SELECT s.*,
             (SELECT COUNT(DISTINCT f.file_path) FROM session_files f WHERE f.session_id = s.id) as files_modified,
             (SELECT COUNT(*) FROM session_commands c WHERE c.session_id = s.id) as commands_run
      FROM sessions s
      WHERE s.working_dir = ? ${toolClause}
      ORDER BY s.start_time DESC, s.created_at DESC
      LIMIT ?
    `);
    return stmt.all(...params);
  }

  getLatestInDirectory(workingDir: string): Session | null {
    const stmt = this.db.prepare<[string], Session>(`
      SELECT * FROM sessions
      WHERE working_dir = ?
      ORDER BY start_time DESC
      LIMIT 1
    `);
    return stmt.get(workingDir) ?? null;
  }

  /**
   * Sessions of a tool whose start falls in [from, to).
   */
  findStartedBetween(tool: string, from: string, to: string, projectPath?: string): Session[] {
    const params: string[] = [tool, from, to];
    let projectClause = '';
    if (projectPath) {
      projectClause = 'AND project_path = ?';
      params.push(projectPath);
    }

    const stmt = this.db.prepare<string[], Session>(`
      SELECT * FROM sessions
      WHERE tool = ? AND start_time >= ? AND start_time < ? ${projectClause}
      ORDER BY start_time ASC
    `);
    return stmt.all(...params);
  }

  getProjectPathsBetween(tool: string, from: string, to: string): string[] {
    const stmt = this.db.prepare<[string, string, string], { project_path: string }>(`
      SELECT DISTINCT project_path FROM sessions
      WHERE tool = ? AND start_time >= ? AND start_time < ?
      ORDER BY project_path
    `);
    return stmt.all(tool, from, to).map(row => row.project_path);
  }

  getToolTotals(): Array<{ tool: string; sessions: number; total_time: number }> {
    const stmt = this.db.prepare<[], { tool: string; sessions: number; total_time: number }>(`
      SELECT tool, COUNT(*) as sessions, COALESCE(SUM(duration_seconds), 0) as total_time
      FROM sessions
      GROUP BY tool
      ORDER BY tool
    `);
    return stmt.all();
  }

  getStartTimesSince(cutoff: string): string[] {
    const stmt = this.db.prepare<[string], { start_time: string }>(`
      SELECT start_time FROM sessions
      WHERE start_time >= ?
      ORDER BY start_time ASC
    `);
    return stmt.all(cutoff).map(row => row.start_time);
  }
}
