import { format, parseISO, subDays } from 'date-fns';
import { Clock, systemClock } from '../repositories/BaseRepository.js';
import { RepositoryManager } from '../repositories/RepositoryManager.js';
import { MemoryStats } from '../types/entities.js';

export const RECENT_ACTIVITY_DAYS = 7;
export const TOP_PROJECTS_LIMIT = 10;

export function computeStats(repositories: RepositoryManager, clock: Clock = systemClock): MemoryStats {
  const byTool: MemoryStats['by_tool'] = {};
  for (const row of repositories.sessions.getToolTotals()) {
    byTool[row.tool] = { sessions: row.sessions, total_time: row.total_time };
  }

  // Days are bucketed in local time, like the weekly rollups
  const cutoff = subDays(clock(), RECENT_ACTIVITY_DAYS).toISOString();
  const perDay = new Map<string, number>();
  for (const startTime of repositories.sessions.getStartTimesSince(cutoff)) {
    const day = format(parseISO(startTime), 'yyyy-MM-dd');
    perDay.set(day, (perDay.get(day) ?? 0) + 1);
  }
  const recentActivity = [...perDay.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, sessions]) => ({ date, sessions }));

  const topProjects = repositories.projects.getTopBySessions(TOP_PROJECTS_LIMIT).map(project => ({
    path: project.project_path,
    name: project.project_name,
    sessions: project.session_count,
    time: project.total_time_seconds,
  }));

  return { by_tool: byTool, recent_activity: recentActivity, top_projects: topProjects };
}
