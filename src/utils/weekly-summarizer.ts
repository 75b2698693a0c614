import { Clock, systemClock } from '../repositories/BaseRepository.js';
import { RepositoryManager } from '../repositories/RepositoryManager.js';
import { JsonValue, WeeklySummary, WeeklySummaryData } from '../types/entities.js';
import { validateDirectory, validateToolName } from './validation.js';
import { isoWeekRange, previousIsoWeek } from './weeks.js';

export class WeeklySummarizer {
  constructor(
    private repositories: RepositoryManager,
    private clock: Clock = systemClock
  ) {}

  /**
   * Rolls up one ISO week of a tool's sessions, optionally limited to one
   * project, and stores it under (year, week, tool, project). Re-running
   * replaces the stored row.
   */
  summarize(year: number, week: number, tool: unknown, projectPath?: string | null): WeeklySummary {
    const validTool = validateToolName(tool);
    const project = projectPath ? validateDirectory(projectPath) : null;
    const range = isoWeekRange(year, week);
    const from = range.start.toISOString();
    const to = range.end.toISOString();

    const sessions = this.repositories.sessions.findStartedBetween(
      validTool,
      from,
      to,
      project ?? undefined
    );
    const sessionIds = sessions.map(session => session.id);

    const totalTime = sessions.reduce((sum, session) => sum + (session.duration_seconds ?? 0), 0);
    const branches = new Set<string>();
    const projects = new Set<string>();
    for (const session of sessions) {
      if (session.git_branch) branches.add(session.git_branch);
      projects.add(session.project_path);
    }

    const notes = this.repositories.events.getContextForSessions(sessionIds, [
      'decision',
      'solution',
    ]);
    const decisions: JsonValue[] = [];
    const solutions: JsonValue[] = [];
    for (const note of notes) {
      (note.context_type === 'decision' ? decisions : solutions).push(note.context_data);
    }

    const data: WeeklySummaryData = {
      branches_worked_on: [...branches].sort(),
      projects: [...projects].sort(),
      average_session_time: sessions.length > 0 ? Math.round(totalTime / sessions.length) : 0,
      files_touched: this.repositories.events.countFilesForSessions(sessionIds),
      commands_run: this.repositories.events.countCommandsForSessions(sessionIds),
      decisions,
      solutions,
      knowledge_touched: this.repositories.knowledge.getTouchedTitlesBetween(from, to),
    };

    return this.repositories.summaries.upsert({
      year,
      week,
      tool: validTool,
      projectPath: project,
      data,
      sessionCount: sessions.length,
      totalTimeSeconds: totalTime,
    });
  }

  /**
   * One summary per project the tool was used in that week.
   */
  summarizeAllProjects(year: number, week: number, tool: unknown): WeeklySummary[] {
    const validTool = validateToolName(tool);
    const range = isoWeekRange(year, week);
    const projectPaths = this.repositories.sessions.getProjectPathsBetween(
      validTool,
      range.start.toISOString(),
      range.end.toISOString()
    );

    return projectPaths.map(projectPath => this.summarize(year, week, validTool, projectPath));
  }

  summarizePreviousWeek(tool: unknown): WeeklySummary {
    const { year, week } = previousIsoWeek(this.clock());
    return this.summarize(year, week, tool);
  }
}
