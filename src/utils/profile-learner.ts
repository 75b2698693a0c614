import * as path from 'path';
import { RepositoryManager } from '../repositories/RepositoryManager.js';
import { Session } from '../types/entities.js';
import { NotFoundError } from './errors.js';
import { KnowledgeStore } from './knowledge-store.js';
import { validateSessionId } from './validation.js';

const HOUR = 3600;
const TEN_MINUTES = 600;
const MINUTE = 60;

function workLocation(session: Session): string | null {
  const parent = path.dirname(session.project_path);
  if (!parent || parent === session.project_path) return null;
  return `Works on projects under ${parent}`;
}

function branchHabit(session: Session): string | null {
  const branch = session.git_branch;
  if (!branch) return null;
  if (branch === 'main' || branch === 'master') {
    return 'Works directly on the main branch';
  }
  if (branch.includes('feature')) {
    return 'Uses feature branches for structured development';
  }
  return `Uses git branch: ${branch}`;
}

function toolPreference(session: Session): string {
  return `Uses ${session.tool} for development tasks`;
}

function sessionLength(session: Session): string | null {
  const duration = session.duration_seconds ?? 0;
  if (duration > HOUR) return 'Has extended work sessions (focus-intensive tasks)';
  if (duration > TEN_MINUTES) return 'Typical session length: 10-60 minutes';
  if (duration > MINUTE) return 'Quick sessions for rapid iteration';
  return null;
}

/**
 * Short preference statements derived from one session.
 */
export function extractLearnings(session: Session): string[] {
  return [workLocation(session), branchHabit(session), toolPreference(session), sessionLength(session)].filter(
    (learning): learning is string => learning !== null
  );
}

export class ProfileLearner {
  constructor(
    private repositories: RepositoryManager,
    private knowledge: KnowledgeStore
  ) {}

  /**
   * Stores each learning as a `preference` entry; repeated learnings raise
   * the entry's frequency instead of duplicating it.
   */
  learnFromSession(sessionId: unknown): string[] {
    const id = validateSessionId(sessionId);
    const session = this.repositories.sessions.getById(id);
    if (!session) {
      throw new NotFoundError('Session', id);
    }

    const learnings = extractLearnings(session);
    for (const learning of learnings) {
      this.knowledge.addKnowledge({
        category: 'preference',
        title: learning,
        description: learning,
        context: { tool: session.tool, project: session.project_path },
        sourceSessionId: session.id,
      });
    }
    return learnings;
  }
}
