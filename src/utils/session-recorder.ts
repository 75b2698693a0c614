import { Clock, systemClock } from '../repositories/BaseRepository.js';
import { RepositoryManager } from '../repositories/RepositoryManager.js';
import {
  GitInfo,
  JsonValue,
  Session,
  SessionCommand,
  SessionContextEvent,
  SessionFile,
} from '../types/entities.js';
import {
  validateDirectory,
  validateExitCode,
  validateFileAction,
  validateLineCount,
  validateRequired,
  validateSessionId,
  validateToolName,
} from './validation.js';

export interface FileActionInput {
  path: string;
  action: string;
  language?: string | null;
  linesAdded?: number;
  linesRemoved?: number;
}

export interface CommandInput {
  command: string;
  exitCode?: number | null;
  outputSummary?: string | null;
}

/**
 * Start, event logging and end of one AI CLI session.
 *
 * Events never fail on an unknown session id: hooks fire out of order, so the
 * event is kept with `orphaned = 1` and a warning goes to stderr.
 */
export class SessionRecorder {
  constructor(
    private repositories: RepositoryManager,
    private clock: Clock = systemClock
  ) {}

  startSession(tool: unknown, workingDir: unknown, git: GitInfo = {}): Session {
    const validTool = validateToolName(tool);
    const dir = validateDirectory(workingDir);
    const repoRoot = git.repo ? validateDirectory(git.repo) : null;
    const projectPath = repoRoot ?? dir;

    const session = this.repositories.sessions.create({
      tool: validTool,
      working_dir: dir,
      project_path: projectPath,
      git: { repo: repoRoot, branch: git.branch ?? null, commit: git.commit ?? null },
      start_time: this.clock().toISOString(),
    });

    this.repositories.projects.recordSessionStart(projectPath, session.id);
    return session;
  }

  logFileAction(sessionId: unknown, input: FileActionInput): SessionFile {
    const id = validateSessionId(sessionId);
    const filePath = validateRequired(input.path, 'File path', 4096);
    const action = validateFileAction(input.action);
    const linesAdded = validateLineCount(input.linesAdded, 'Lines added');
    const linesRemoved = validateLineCount(input.linesRemoved, 'Lines removed');
    const language = input.language?.trim() || null;

    return this.repositories.events.addFileAction(
      id,
      {
        file_path: filePath,
        action,
        language,
        lines_added: linesAdded,
        lines_removed: linesRemoved,
      },
      this.isOrphan(id, 'file action')
    );
  }

  logCommand(sessionId: unknown, input: CommandInput): SessionCommand {
    const id = validateSessionId(sessionId);
    const command = validateRequired(input.command, 'Command', 10000);
    const exitCode = validateExitCode(input.exitCode);
    const outputSummary = input.outputSummary?.trim() || null;

    return this.repositories.events.addCommand(
      id,
      { command, exit_code: exitCode, output_summary: outputSummary },
      this.isOrphan(id, 'command')
    );
  }

  logContext(sessionId: unknown, contextType: unknown, data: JsonValue): SessionContextEvent {
    const id = validateSessionId(sessionId);
    const type = validateRequired(contextType, 'Context type', 100);

    return this.repositories.events.addContext(id, type, data, this.isOrphan(id, type));
  }

  /**
   * Closes the session and rolls its duration into the project. Ending an
   * already closed session returns it untouched; ending an unknown one
   * leaves an orphaned `session_end` note and returns null.
   */
  endSession(sessionId: unknown, exitCode?: number | null): Session | null {
    const id = validateSessionId(sessionId);
    const code = validateExitCode(exitCode);

    const session = this.repositories.sessions.getById(id);
    if (!session) {
      console.warn(`Ending unknown session ${id}; recording orphaned session_end`);
      this.repositories.events.addContext(id, 'session_end', { exit_code: code }, true);
      return null;
    }

    if (session.end_time !== null) {
      return session;
    }

    const end = this.clock();
    const elapsed = (end.getTime() - Date.parse(session.start_time)) / 1000;
    // A clock that moved backwards must not subtract project time
    const duration = Math.max(0, Math.round(elapsed));

    const closed = this.repositories.sessions.close(id, end.toISOString(), code, duration);
    if (closed) {
      const projects = this.repositories.projects;
      projects.addTime(session.project_path, duration);

      const project = projects.getByPath(session.project_path);
      if (project && !project.primary_language) {
        const language = this.repositories.events.getDominantLanguage(session.project_path);
        if (language) {
          projects.setPrimaryLanguage(session.project_path, language);
        }
      }
    }

    return this.repositories.sessions.getById(id);
  }

  private isOrphan(sessionId: string, what: string): boolean {
    if (this.repositories.sessions.getById(sessionId)) {
      return false;
    }
    console.warn(`Session ${sessionId} not found; storing ${what} as orphaned`);
    return true;
  }
}
