import { BaseRepository } from './BaseRepository.js';
import { Entity, EntityRelation, EntityType, JsonValue } from '../types/entities.js';

interface EntityRow {
  id: string;
  entity_name: string;
  entity_type: EntityType;
  description: string | null;
  metadata: string | null;
  reference_count: number;
  last_referenced: string | null;
  created_at: string;
}

export interface CreateEntityInput {
  name: string;
  type: EntityType;
  description?: string | null;
  metadata?: JsonValue | null;
}

export class EntityRepository extends BaseRepository {
  getByName(name: string): Entity | null {
    const row = this.db
      .prepare<[string], EntityRow>('SELECT * FROM entities WHERE entity_name = ?')
      .get(name);
    return row ? this.toEntity(row) : null;
  }

  getById(id: string): Entity | null {
    const row = this.db.prepare<[string], EntityRow>('SELECT * FROM entities WHERE id = ?').get(id);
    return row ? this.toEntity(row) : null;
  }

  /**
   * Upsert by name. Each call counts as a reference; description, type and
   * metadata are only overwritten when given.
   */
  upsert(input: CreateEntityInput): Entity {
    const timestamp = this.getCurrentTimestamp();
    const existing = this.getByName(input.name);

    if (existing) {
      this.db
        .prepare(
          `
        UPDATE entities
        SET entity_type = ?, description = ?, metadata = ?,
            reference_count = reference_count + 1, last_referenced = ?
        WHERE id = ?
      `
        )
        .run(
          input.type,
          input.description ?? existing.description,
          input.metadata === undefined || input.metadata === null
            ? this.toJson(existing.metadata)
            : this.toJson(input.metadata),
          timestamp,
          existing.id
        );
      return this.requireById(existing.id);
    }

    const id = this.generateId();
    this.db
      .prepare(
        `
      INSERT INTO entities
      (id, entity_name, entity_type, description, metadata, reference_count, last_referenced, created_at)
      VALUES (?, ?, ?, ?, ?, 1, ?, ?)
    `
      )
      .run(
        id,
        input.name,
        input.type,
        input.description ?? null,
        this.toJson(input.metadata),
        timestamp,
        timestamp
      );
    return this.requireById(id);
  }

  getAll(): Entity[] {
    return this.db
      .prepare<[], EntityRow>('SELECT * FROM entities ORDER BY entity_name')
      .all()
      .map(row => this.toEntity(row));
  }

  // Relation operations

  getRelation(fromId: string, toId: string, relationType: string): EntityRelation | null {
    const stmt = this.db.prepare<[string, string, string], EntityRelation>(`
      SELECT * FROM entity_relations
      WHERE from_entity_id = ? AND to_entity_id = ? AND relation_type = ?
    `);
    return stmt.get(fromId, toId, relationType) ?? null;
  }

  /**
   * One edge per (from, to, type); a repeated edge takes the new strength.
   */
  upsertRelation(
    fromId: string,
    toId: string,
    relationType: string,
    strength: number
  ): EntityRelation {
    const timestamp = this.getCurrentTimestamp();
    this.db
      .prepare(
        `
      INSERT INTO entity_relations
      (id, from_entity_id, to_entity_id, relation_type, strength, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(from_entity_id, to_entity_id, relation_type) DO UPDATE SET
        strength = excluded.strength,
        updated_at = excluded.updated_at
    `
      )
      .run(this.generateId(), fromId, toId, relationType, strength, timestamp, timestamp);

    const relation = this.getRelation(fromId, toId, relationType);
    if (!relation) {
      throw new Error(`Relation ${relationType} was not persisted`);
    }
    return relation;
  }

  /**
   * Edges touching the entity in either direction.
   */
  getRelationsOf(entityId: string): EntityRelation[] {
    const stmt = this.db.prepare<[string, string], EntityRelation>(`
      SELECT * FROM entity_relations
      WHERE from_entity_id = ? OR to_entity_id = ?
      ORDER BY strength DESC, relation_type
    `);
    return stmt.all(entityId, entityId);
  }

  getAllRelations(): EntityRelation[] {
    return this.db
      .prepare<[], EntityRelation>(
        'SELECT * FROM entity_relations ORDER BY from_entity_id, relation_type, to_entity_id'
      )
      .all();
  }

  private requireById(id: string): Entity {
    const entity = this.getById(id);
    if (!entity) {
      throw new Error(`Entity ${id} was not persisted`);
    }
    return entity;
  }

  private toEntity(row: EntityRow): Entity {
    return {
      ...row,
      metadata: this.parseJson(row.metadata),
    };
  }
}
