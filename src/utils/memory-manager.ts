import { Clock, systemClock } from '../repositories/BaseRepository.js';
import { RepositoryManager } from '../repositories/RepositoryManager.js';
import {
  ContextPayload,
  Entity,
  EntityRelation,
  GitInfo,
  JsonValue,
  KnowledgeEntry,
  MemoryStats,
  Project,
  ProjectPattern,
  ProjectProfileInput,
  Session,
  SessionCommand,
  SessionContextEvent,
  SessionFile,
  WeeklySummary,
} from '../types/entities.js';
import { DEFAULT_CONFIG, MemoryConfig } from './config.js';
import { ContextRetriever, formatContext } from './context-retriever.js';
import { DatabaseManager } from './database.js';
import { detectGitInfo } from './git.js';
import { AddKnowledgeInput, KnowledgeStore } from './knowledge-store.js';
import { GraphExport, KnowledgeGraphManager, RelatedEntity } from './knowledge-graph.js';
import { ProfileLearner } from './profile-learner.js';
import { CommandInput, FileActionInput, SessionRecorder } from './session-recorder.js';
import { computeStats } from './stats.js';
import { SyncManager, SyncManifest } from './sync.js';
import { UpdateChecker, VersionCheckResult, VersionProbe } from './update-checker.js';
import { validateDirectory } from './validation.js';
import { WeeklySummarizer } from './weekly-summarizer.js';

export interface MemoryManagerOptions {
  config?: Partial<MemoryConfig>;
  clock?: Clock;
  versionProbe?: VersionProbe;
}

/**
 * Entry point for hooks, the CLI and the MCP server. Every call runs in one
 * short transaction against the shared database file.
 */
export class MemoryManager {
  readonly config: MemoryConfig;
  readonly dbManager: DatabaseManager;
  readonly repositories: RepositoryManager;

  private clock: Clock;
  private recorder: SessionRecorder;
  private retriever: ContextRetriever;
  private knowledgeStore: KnowledgeStore;
  private summarizer: WeeklySummarizer;
  private graph: KnowledgeGraphManager;
  private learner: ProfileLearner;
  private updates: UpdateChecker;
  private syncManager: SyncManager;

  constructor(options: MemoryManagerOptions = {}) {
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.clock = options.clock ?? systemClock;

    this.dbManager = new DatabaseManager({
      filename: this.config.databasePath,
      maxSize: this.config.maxDatabaseSize,
    });
    this.repositories = new RepositoryManager(this.dbManager, this.clock);

    this.recorder = new SessionRecorder(this.repositories, this.clock);
    this.retriever = new ContextRetriever(this.repositories, {
      defaultLimit: this.config.contextLimit,
      knowledgeLimit: this.config.knowledgeLimit,
    });
    this.knowledgeStore = new KnowledgeStore(this.repositories);
    this.summarizer = new WeeklySummarizer(this.repositories, this.clock);
    this.graph = new KnowledgeGraphManager(this.repositories);
    this.learner = new ProfileLearner(this.repositories, this.knowledgeStore);
    this.updates = new UpdateChecker(this.repositories, options.versionProbe, this.clock);
    this.syncManager = new SyncManager(this.dbManager, {
      syncDir: this.config.syncDir,
      backupDir: this.config.backupDir,
      clock: this.clock,
    });
  }

  // Session Management

  start(tool: unknown, workingDir: unknown, git: GitInfo = {}): Session {
    return this.write(() => {
      if (this.dbManager.isDatabaseFull()) {
        console.warn(
          `Database ${this.dbManager.getFilename()} is over ${this.config.maxDatabaseSize} bytes; consider archiving old sessions`
        );
      }
      return this.recorder.startSession(tool, workingDir, git);
    });
  }

  /**
   * Starts a session with git details detected from the directory. Explicit
   * values in `overrides` win over detected ones.
   */
  async startInDirectory(tool: unknown, workingDir: unknown, overrides: GitInfo = {}): Promise<Session> {
    const dir = validateDirectory(workingDir);
    const detected = await detectGitInfo(dir);
    return this.start(tool, dir, {
      repo: overrides.repo ?? detected.repo,
      branch: overrides.branch ?? detected.branch,
      commit: overrides.commit ?? detected.commit,
    });
  }

  end(sessionId: unknown, exitCode?: number | null): Session | null {
    return this.write(() => this.recorder.endSession(sessionId, exitCode));
  }

  logFile(sessionId: unknown, input: FileActionInput): SessionFile {
    return this.write(() => this.recorder.logFileAction(sessionId, input));
  }

  logCommand(sessionId: unknown, input: CommandInput): SessionCommand {
    return this.write(() => this.recorder.logCommand(sessionId, input));
  }

  logContext(sessionId: unknown, contextType: unknown, data: JsonValue): SessionContextEvent {
    return this.write(() => this.recorder.logContext(sessionId, contextType, data));
  }

  // Context retrieval

  context(workingDir: unknown, tool?: string | null, limit?: number): ContextPayload {
    return this.write(() => this.retriever.getContext(workingDir, tool, limit));
  }

  formattedContext(workingDir: unknown, tool?: string | null, limit?: number): string {
    return formatContext(this.context(workingDir, tool, limit));
  }

  // Knowledge and patterns

  addKnowledge(input: AddKnowledgeInput): KnowledgeEntry {
    return this.write(() => this.knowledgeStore.addKnowledge(input));
  }

  listKnowledge(category?: string, limit?: number): KnowledgeEntry[] {
    return this.write(() => this.knowledgeStore.listKnowledge(category, limit));
  }

  addPattern(
    projectPath: unknown,
    patternType: unknown,
    patternData: JsonValue,
    confidence: unknown
  ): ProjectPattern {
    return this.write(() =>
      this.knowledgeStore.addOrUpdatePattern(projectPath, patternType, patternData, confidence)
    );
  }

  setProjectProfile(projectPath: unknown, profile: ProjectProfileInput): Project {
    return this.write(() => this.knowledgeStore.setProjectProfile(projectPath, profile));
  }

  // Weekly summaries

  weekly(year: number, week: number, tool: unknown, projectPath?: string | null): WeeklySummary {
    return this.write(() => this.summarizer.summarize(year, week, tool, projectPath));
  }

  weeklyAll(year: number, week: number, tool: unknown): WeeklySummary[] {
    return this.write(() => this.summarizer.summarizeAllProjects(year, week, tool));
  }

  weeklyPrevious(tool: unknown): WeeklySummary {
    return this.write(() => this.summarizer.summarizePreviousWeek(tool));
  }

  stats(): MemoryStats {
    return this.write(() => computeStats(this.repositories, this.clock));
  }

  // Entity graph

  addEntity(
    name: unknown,
    type: unknown,
    description?: string | null,
    metadata?: JsonValue | null
  ): Entity {
    return this.write(() => this.graph.addEntity(name, type, description, metadata));
  }

  relate(from: unknown, to: unknown, relationType: unknown, strength?: unknown): EntityRelation {
    return this.write(() => this.graph.relate(from, to, relationType, strength));
  }

  related(name: string, maxDepth?: number): RelatedEntity[] {
    return this.write(() => this.graph.getRelated(name, maxDepth));
  }

  exportGraph(): GraphExport {
    return this.write(() => this.graph.exportGraph());
  }

  // Profile learning

  learn(sessionId: unknown): string[] {
    return this.write(() => this.learner.learnFromSession(sessionId));
  }

  // Tool versions

  checkUpdates(tool: unknown): Promise<VersionCheckResult> {
    return this.updates.checkTool(tool);
  }

  checkUpdatesIfDue(tool: unknown): Promise<VersionCheckResult | null> {
    return this.updates.checkIfDue(tool);
  }

  /**
   * Fire-and-forget version check, skipped when the tool was checked within
   * the last day. Only for long-lived processes: closing the manager before
   * the probe settles turns the check into a logged StorageError.
   */
  checkUpdatesInBackground(tool: string): void {
    this.updates.checkInBackground(tool);
  }

  // Backup and sync

  backup(): Promise<string> {
    return this.syncManager.backup();
  }

  push(): Promise<SyncManifest> {
    return this.syncManager.push();
  }

  syncStatus(): SyncManifest | null {
    return this.syncManager.status();
  }

  close(): void {
    this.repositories.close();
  }

  private write<T>(fn: () => T): T {
    return this.dbManager.runInTransaction(fn);
  }
}
