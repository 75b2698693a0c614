import { RepositoryManager } from '../repositories/RepositoryManager.js';
import {
  JsonValue,
  KnowledgeCategory,
  KnowledgeEntry,
  Project,
  ProjectPattern,
  ProjectProfileInput,
} from '../types/entities.js';
import {
  ValidationError,
  validateDirectory,
  validateKnowledgeCategory,
  validatePositiveInteger,
  validateRequired,
  validateUnitInterval,
} from './validation.js';

export interface AddKnowledgeInput {
  category: unknown;
  title: unknown;
  description?: unknown;
  context?: JsonValue | null;
  sourceSessionId?: string | null;
}

export class KnowledgeStore {
  constructor(private repositories: RepositoryManager) {}

  /**
   * Deduplicates on (category, title). A description is only required the
   * first time a title is seen.
   */
  addKnowledge(input: AddKnowledgeInput): KnowledgeEntry {
    const category = validateKnowledgeCategory(input.category);
    const title = validateRequired(input.title, 'Title', 500);

    if (input.description !== undefined && input.description !== null && typeof input.description !== 'string') {
      throw new ValidationError('Description must be a string');
    }
    const description = typeof input.description === 'string' ? input.description.trim() : '';

    const existing = this.repositories.knowledge.getByKey(category, title);
    if (!existing && description.length === 0) {
      throw new ValidationError('Description cannot be empty');
    }

    return this.repositories.knowledge.upsert({
      category,
      title,
      description,
      context: input.context ?? null,
      source_session_id: input.sourceSessionId?.trim() || null,
    });
  }

  listKnowledge(category?: string, limit = 50): KnowledgeEntry[] {
    const validCategory: KnowledgeCategory | undefined = category
      ? validateKnowledgeCategory(category)
      : undefined;
    return this.repositories.knowledge.list(validCategory, validatePositiveInteger(limit, 'Limit'));
  }

  addOrUpdatePattern(
    projectPath: unknown,
    patternType: unknown,
    patternData: JsonValue,
    confidence: unknown
  ): ProjectPattern {
    const dir = validateDirectory(projectPath);
    const type = validateRequired(patternType, 'Pattern type', 200);
    const observed = validateUnitInterval(confidence, 'Confidence');

    const project = this.repositories.projects.ensure(dir);
    return this.repositories.projects.upsertPattern(project.id, type, patternData, observed);
  }

  setProjectProfile(projectPath: unknown, profile: ProjectProfileInput): Project {
    const dir = validateDirectory(projectPath);
    const clean = (value: string | undefined, field: string): string | undefined =>
      value === undefined ? undefined : validateRequired(value, field, 200);

    return this.repositories.projects.updateProfile(dir, {
      name: clean(profile.name, 'Project name'),
      language: clean(profile.language, 'Language'),
      framework: clean(profile.framework, 'Framework'),
    });
  }
}
