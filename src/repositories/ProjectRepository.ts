import * as path from 'path';
import { BaseRepository } from './BaseRepository.js';
import { JsonValue, Project, ProjectPattern, ProjectProfileInput } from '../types/entities.js';

interface PatternRow {
  id: string;
  project_id: string;
  pattern_type: string;
  pattern_data: string;
  confidence: number;
  created_at: string;
  updated_at: string;
}

// Weight kept from the stored confidence when a new observation arrives
export const PATTERN_CONFIDENCE_RETENTION = 0.7;

export class ProjectRepository extends BaseRepository {
  getByPath(projectPath: string): Project | null {
    const stmt = this.db.prepare<[string], Project>('SELECT * FROM projects WHERE project_path = ?');
    return stmt.get(projectPath) ?? null;
  }

  /**
   * Creates the project row when absent; returns it either way.
   */
  ensure(projectPath: string): Project {
    const timestamp = this.getCurrentTimestamp();
    this.db
      .prepare(
        `
      INSERT INTO projects (id, project_path, project_name, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(project_path) DO NOTHING
    `
      )
      .run(this.generateId(), projectPath, path.basename(projectPath) || projectPath, timestamp, timestamp);

    const project = this.getByPath(projectPath);
    if (!project) {
      throw new Error(`Project ${projectPath} was not persisted`);
    }
    return project;
  }

  recordSessionStart(projectPath: string, sessionId: string): Project {
    this.ensure(projectPath);
    this.db
      .prepare(
        `
      UPDATE projects
      SET session_count = session_count + 1, last_session_id = ?, updated_at = ?
      WHERE project_path = ?
    `
      )
      .run(sessionId, this.getCurrentTimestamp(), projectPath);

    return this.ensure(projectPath);
  }

  addTime(projectPath: string, seconds: number): void {
    this.db
      .prepare(
        `
      UPDATE projects
      SET total_time_seconds = total_time_seconds + ?, updated_at = ?
      WHERE project_path = ?
    `
      )
      .run(seconds, this.getCurrentTimestamp(), projectPath);
  }

  setPrimaryLanguage(projectPath: string, language: string): void {
    this.db
      .prepare('UPDATE projects SET primary_language = ?, updated_at = ? WHERE project_path = ?')
      .run(language, this.getCurrentTimestamp(), projectPath);
  }

  updateProfile(projectPath: string, profile: ProjectProfileInput): Project {
    const current = this.ensure(projectPath);

    this.db
      .prepare(
        `
      UPDATE projects
      SET project_name = ?, primary_language = ?, framework = ?, updated_at = ?
      WHERE id = ?
    `
      )
      .run(
        profile.name ?? current.project_name,
        profile.language ?? current.primary_language,
        profile.framework ?? current.framework,
        this.getCurrentTimestamp(),
        current.id
      );

    return this.ensure(projectPath);
  }

  getTopBySessions(limit = 10): Project[] {
    const stmt = this.db.prepare<[number], Project>(`
      SELECT * FROM projects
      ORDER BY session_count DESC, total_time_seconds DESC
      LIMIT ?
    `);
    return stmt.all(limit);
  }

  // Pattern operations

  getPatterns(projectId: string): ProjectPattern[] {
    const stmt = this.db.prepare<[string], PatternRow>(`
      SELECT * FROM project_patterns
      WHERE project_id = ?
      ORDER BY confidence DESC, updated_at DESC
    `);
    return stmt.all(projectId).map(row => this.toPattern(row));
  }

  getPattern(projectId: string, patternType: string): ProjectPattern | null {
    const row = this.db
      .prepare<[string, string], PatternRow>(
        'SELECT * FROM project_patterns WHERE project_id = ? AND pattern_type = ?'
      )
      .get(projectId, patternType);
    return row ? this.toPattern(row) : null;
  }

  /**
   * A repeated observation blends into the stored confidence as a running
   * weighted average instead of replacing it.
   */
  upsertPattern(
    projectId: string,
    patternType: string,
    patternData: JsonValue,
    observedConfidence: number
  ): ProjectPattern {
    const timestamp = this.getCurrentTimestamp();
    const existing = this.getPattern(projectId, patternType);

    if (existing) {
      const confidence =
        existing.confidence * PATTERN_CONFIDENCE_RETENTION +
        observedConfidence * (1 - PATTERN_CONFIDENCE_RETENTION);

      this.db
        .prepare(
          `
        UPDATE project_patterns
        SET pattern_data = ?, confidence = ?, updated_at = ?
        WHERE id = ?
      `
        )
        .run(JSON.stringify(patternData), confidence, timestamp, existing.id);
    } else {
      this.db
        .prepare(
          `
        INSERT INTO project_patterns
        (id, project_id, pattern_type, pattern_data, confidence, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `
        )
        .run(
          this.generateId(),
          projectId,
          patternType,
          JSON.stringify(patternData),
          observedConfidence,
          timestamp,
          timestamp
        );
    }

    const pattern = this.getPattern(projectId, patternType);
    if (!pattern) {
      throw new Error(`Pattern ${patternType} was not persisted`);
    }
    return pattern;
  }

  private toPattern(row: PatternRow): ProjectPattern {
    return {
      ...row,
      pattern_data: this.parseJson(row.pattern_data),
    };
  }
}
