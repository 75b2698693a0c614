import { RepositoryManager } from '../repositories/RepositoryManager.js';
import { ContextPayload, JsonValue, KnowledgeEntry, Project } from '../types/entities.js';
import { validateDirectory, validatePositiveInteger, validateToolName } from './validation.js';

export interface ContextRetrieverOptions {
  defaultLimit?: number;
  knowledgeLimit?: number;
}

export class ContextRetriever {
  private defaultLimit: number;
  private knowledgeLimit: number;

  constructor(
    private repositories: RepositoryManager,
    options: ContextRetrieverOptions = {}
  ) {
    this.defaultLimit = options.defaultLimit ?? 10;
    this.knowledgeLimit = options.knowledgeLimit ?? 20;
  }

  /**
   * Recent sessions in the directory plus what is known about its project.
   * Knowledge entries returned here count as used.
   */
  getContext(workingDir: unknown, toolName?: string | null, limit?: number): ContextPayload {
    const dir = validateDirectory(workingDir);
    const tool = toolName ? validateToolName(toolName) : null;
    const sessionLimit =
      limit === undefined ? this.defaultLimit : validatePositiveInteger(limit, 'Limit');

    const recentSessions = this.repositories.sessions.findRecentByDirectory(dir, tool, sessionLimit);
    const project = this.findProject(dir);
    const patterns = project ? this.repositories.projects.getPatterns(project.id) : [];

    return {
      working_dir: dir,
      tool,
      project,
      recent_sessions: recentSessions,
      project_patterns: patterns,
      relevant_knowledge: project ? this.retrieveKnowledge(project) : [],
    };
  }

  private findProject(dir: string): Project | null {
    const latest = this.repositories.sessions.getLatestInDirectory(dir);
    if (latest) {
      const project = this.repositories.projects.getByPath(latest.project_path);
      if (project) return project;
    }
    return this.repositories.projects.getByPath(dir);
  }

  private retrieveKnowledge(project: Project): KnowledgeEntry[] {
    const terms = [project.primary_language, project.framework].filter(
      (term): term is string => typeof term === 'string' && term.trim().length > 0
    );
    const matches = this.repositories.knowledge.findByTerms(terms, this.knowledgeLimit);

    const ids = matches.map(entry => entry.id);
    this.repositories.knowledge.recordUse(ids);

    return ids
      .map(id => this.repositories.knowledge.getById(id))
      .filter((entry): entry is KnowledgeEntry => entry !== null);
  }
}

function formatDuration(seconds: number | null): string {
  if (seconds === null) return 'open';
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.round(seconds / 60);
  if (minutes < 60) return `${minutes}m`;
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

function formatJson(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Markdown block suitable for prepending to a new session's prompt.
 */
export function formatContext(payload: ContextPayload): string {
  const parts: string[] = [];
  const project = payload.project;

  parts.push(`# Context for ${payload.working_dir}`);

  if (project) {
    parts.push('\n## Project');
    parts.push(`- **Name**: ${project.project_name ?? project.project_path}`);
    if (project.primary_language) parts.push(`- **Language**: ${project.primary_language}`);
    if (project.framework) parts.push(`- **Framework**: ${project.framework}`);
    parts.push(
      `- **Sessions**: ${project.session_count} (${formatDuration(project.total_time_seconds)} total)`
    );
  }

  if (payload.recent_sessions.length > 0) {
    parts.push('\n## Recent Sessions');
    for (const session of payload.recent_sessions) {
      const branch = session.git_branch ? ` on ${session.git_branch}` : '';
      parts.push(
        `- ${session.start_time} ${session.tool}${branch}: ${session.files_modified} files, ` +
          `${session.commands_run} commands, ${formatDuration(session.duration_seconds)}`
      );
    }
  }

  if (payload.project_patterns.length > 0) {
    parts.push('\n## Project Patterns');
    for (const pattern of payload.project_patterns) {
      parts.push(
        `- **${pattern.pattern_type}** (${Math.round(pattern.confidence * 100)}%): ${formatJson(pattern.pattern_data)}`
      );
    }
  }

  if (payload.relevant_knowledge.length > 0) {
    parts.push('\n## Relevant Knowledge');
    for (const entry of payload.relevant_knowledge) {
      parts.push(`- [${entry.category}] **${entry.title}**: ${entry.description}`);
    }
  }

  if (parts.length === 1) {
    parts.push('\nNo previous activity recorded for this directory.');
  }

  return parts.join('\n') + '\n';
}
