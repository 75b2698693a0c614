import { BaseRepository } from './BaseRepository.js';
import { ToolVersion } from '../types/entities.js';

export class VersionRepository extends BaseRepository {
  get(toolName: string): ToolVersion | null {
    const stmt = this.db.prepare<[string], ToolVersion>(
      'SELECT * FROM cli_versions WHERE tool_name = ?'
    );
    return stmt.get(toolName) ?? null;
  }

  /**
   * Records the installed version; the prior version is kept when it changed.
   */
  record(toolName: string, version: string): ToolVersion {
    const timestamp = this.getCurrentTimestamp();
    const existing = this.get(toolName);

    if (existing) {
      const previous = existing.version !== version ? existing.version : existing.previous_version;
      this.db
        .prepare(
          `
        UPDATE cli_versions
        SET version = ?, previous_version = ?, last_check = ?, updated_at = ?
        WHERE id = ?
      `
        )
        .run(version, previous, timestamp, timestamp, existing.id);
    } else {
      this.db
        .prepare(
          `
        INSERT INTO cli_versions (id, tool_name, version, previous_version, last_check, updated_at)
        VALUES (?, ?, ?, NULL, ?, ?)
      `
        )
        .run(this.generateId(), toolName, version, timestamp, timestamp);
    }

    const recorded = this.get(toolName);
    if (!recorded) {
      throw new Error(`Version for ${toolName} was not persisted`);
    }
    return recorded;
  }

  getAll(): ToolVersion[] {
    return this.db.prepare<[], ToolVersion>('SELECT * FROM cli_versions ORDER BY tool_name').all();
  }
}
