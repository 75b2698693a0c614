export { BaseRepository, systemClock } from './BaseRepository.js';
export type { Clock } from './BaseRepository.js';
export { SessionRepository } from './SessionRepository.js';
export { EventRepository } from './EventRepository.js';
export { ProjectRepository, PATTERN_CONFIDENCE_RETENTION } from './ProjectRepository.js';
export { KnowledgeRepository } from './KnowledgeRepository.js';
export { SummaryRepository } from './SummaryRepository.js';
export { EntityRepository } from './EntityRepository.js';
export { VersionRepository } from './VersionRepository.js';
export { RepositoryManager } from './RepositoryManager.js';
