import { DatabaseManager } from '../utils/database.js';
import { Clock, systemClock } from './BaseRepository.js';
import { SessionRepository } from './SessionRepository.js';
import { EventRepository } from './EventRepository.js';
import { ProjectRepository } from './ProjectRepository.js';
import { KnowledgeRepository } from './KnowledgeRepository.js';
import { SummaryRepository } from './SummaryRepository.js';
import { EntityRepository } from './EntityRepository.js';
import { VersionRepository } from './VersionRepository.js';

export class RepositoryManager {
  private dbManager: DatabaseManager;

  public readonly sessions: SessionRepository;
  public readonly events: EventRepository;
  public readonly projects: ProjectRepository;
  public readonly knowledge: KnowledgeRepository;
  public readonly summaries: SummaryRepository;
  public readonly entities: EntityRepository;
  public readonly versions: VersionRepository;

  constructor(dbManager: DatabaseManager, clock: Clock = systemClock) {
    this.dbManager = dbManager;

    // Initialize all repositories
    this.sessions = new SessionRepository(dbManager, clock);
    this.events = new EventRepository(dbManager, clock);
    this.projects = new ProjectRepository(dbManager, clock);
    this.knowledge = new KnowledgeRepository(dbManager, clock);
    this.summaries = new SummaryRepository(dbManager, clock);
    this.entities = new EntityRepository(dbManager, clock);
    this.versions = new VersionRepository(dbManager, clock);
  }

  /**
   * Get the underlying database manager
   */
  getDatabaseManager(): DatabaseManager {
    return this.dbManager;
  }

  /**
   * Close all database connections
   */
  close(): void {
    this.dbManager.close();
  }
}
