import { RepositoryManager } from '../repositories/RepositoryManager.js';
import { Entity, EntityRelation, JsonValue } from '../types/entities.js';
import { NotFoundError } from './errors.js';
import {
  validateEntityType,
  validatePositiveInteger,
  validateRequired,
  validateUnitInterval,
} from './validation.js';

export interface GraphRelation {
  from: string;
  relation_type: string;
  to: string;
  strength: number;
}

export interface GraphExport {
  entities: Entity[];
  relations: GraphRelation[];
}

export interface RelatedEntity {
  entity: Entity;
  depth: number;
}

export class KnowledgeGraphManager {
  constructor(private repositories: RepositoryManager) {}

  // Entity operations
  addEntity(
    name: unknown,
    type: unknown,
    description?: string | null,
    metadata?: JsonValue | null
  ): Entity {
    return this.repositories.entities.upsert({
      name: validateRequired(name, 'Entity name', 500),
      type: validateEntityType(type),
      description: description?.trim() || null,
      metadata: metadata ?? null,
    });
  }

  getEntity(name: string): Entity | null {
    return this.repositories.entities.getByName(name);
  }

  // Relation operations
  relate(from: unknown, to: unknown, relationType: unknown, strength: unknown = 0.5): EntityRelation {
    const fromName = validateRequired(from, 'From entity', 500);
    const toName = validateRequired(to, 'To entity', 500);
    const type = validateRequired(relationType, 'Relation type', 200);
    const validStrength = validateUnitInterval(strength, 'Strength');

    const source = this.requireEntity(fromName);
    const target = this.requireEntity(toName);

    return this.repositories.entities.upsertRelation(source.id, target.id, type, validStrength);
  }

  // Graph traversal
  getRelated(name: string, maxDepth: number = 2): RelatedEntity[] {
    const start = this.requireEntity(name);
    const depthLimit = validatePositiveInteger(maxDepth, 'Max depth');

    const visited = new Set<string>([start.id]);
    const queue: Array<{ id: string; depth: number }> = [{ id: start.id, depth: 0 }];
    const related: RelatedEntity[] = [];

    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      if (next.depth >= depthLimit) continue;

      for (const rel of this.repositories.entities.getRelationsOf(next.id)) {
        const neighbourId = rel.from_entity_id === next.id ? rel.to_entity_id : rel.from_entity_id;
        if (visited.has(neighbourId)) continue;
        visited.add(neighbourId);

        const entity = this.repositories.entities.getById(neighbourId);
        if (entity) {
          related.push({ entity, depth: next.depth + 1 });
          queue.push({ id: neighbourId, depth: next.depth + 1 });
        }
      }
    }

    return related;
  }

  exportGraph(): GraphExport {
    const entities = this.repositories.entities.getAll();
    const names = new Map(entities.map(entity => [entity.id, entity.entity_name]));

    const relations: GraphRelation[] = [];
    for (const rel of this.repositories.entities.getAllRelations()) {
      const from = names.get(rel.from_entity_id);
      const to = names.get(rel.to_entity_id);
      if (from !== undefined && to !== undefined) {
        relations.push({ from, relation_type: rel.relation_type, to, strength: rel.strength });
      }
    }

    relations.sort(
      (a, b) =>
        a.from.localeCompare(b.from) ||
        a.to.localeCompare(b.to) ||
        a.relation_type.localeCompare(b.relation_type)
    );
    return { entities, relations };
  }

  private requireEntity(name: string): Entity {
    const entity = this.repositories.entities.getByName(name);
    if (!entity) {
      throw new NotFoundError('Entity', name);
    }
    return entity;
  }
}
