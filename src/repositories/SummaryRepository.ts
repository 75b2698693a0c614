import { BaseRepository } from './BaseRepository.js';
import { WeeklySummary, WeeklySummaryData } from '../types/entities.js';

interface SummaryRow {
  id: string;
  year: number;
  week_number: number;
  cli_tool: string;
  project_path: string;
  summary_data: string;
  session_count: number;
  total_time_seconds: number;
  created_at: string;
}

export interface SummaryInput {
  year: number;
  week: number;
  tool: string;
  projectPath: string | null;
  data: WeeklySummaryData;
  sessionCount: number;
  totalTimeSeconds: number;
}

const EMPTY_SUMMARY: WeeklySummaryData = {
  branches_worked_on: [],
  projects: [],
  average_session_time: 0,
  files_touched: 0,
  commands_run: 0,
  decisions: [],
  solutions: [],
  knowledge_touched: [],
};

export class SummaryRepository extends BaseRepository {
  /**
   * Insert or replace the rollup for (year, week, tool, project).
   */
  upsert(input: SummaryInput): WeeklySummary {
    const projectKey = input.projectPath ?? '';

    this.db
      .prepare(
        `
      INSERT INTO weekly_summaries
      (id, year, week_number, cli_tool, project_path, summary_data, session_count, total_time_seconds, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(year, week_number, cli_tool, project_path) DO UPDATE SET
        summary_data = excluded.summary_data,
        session_count = excluded.session_count,
        total_time_seconds = excluded.total_time_seconds,
        created_at = excluded.created_at
    `
      )
      .run(
        this.generateId(),
        input.year,
        input.week,
        input.tool,
        projectKey,
        JSON.stringify(input.data),
        input.sessionCount,
        input.totalTimeSeconds,
        this.getCurrentTimestamp()
      );

    const summary = this.get(input.year, input.week, input.tool, input.projectPath);
    if (!summary) {
      throw new Error(`Weekly summary ${input.year}-W${input.week} was not persisted`);
    }
    return summary;
  }

  get(year: number, week: number, tool: string, projectPath: string | null): WeeklySummary | null {
    const row = this.db
      .prepare<[number, number, string, string], SummaryRow>(
        `
      SELECT * FROM weekly_summaries
      WHERE year = ? AND week_number = ? AND cli_tool = ? AND project_path = ?
    `
      )
      .get(year, week, tool, projectPath ?? '');
    return row ? this.toSummary(row) : null;
  }

  listForWeek(year: number, week: number): WeeklySummary[] {
    return this.db
      .prepare<[number, number], SummaryRow>(
        `
      SELECT * FROM weekly_summaries
      WHERE year = ? AND week_number = ?
      ORDER BY cli_tool, project_path
    `
      )
      .all(year, week)
      .map(row => this.toSummary(row));
  }

  private toSummary(row: SummaryRow): WeeklySummary {
    const parsed = this.parseJson(row.summary_data);
    const data =
      parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)
        ? { ...EMPTY_SUMMARY, ...parsed }
        : EMPTY_SUMMARY;

    return {
      ...row,
      project_path: row.project_path === '' ? null : row.project_path,
      summary_data: data,
    };
  }
}
