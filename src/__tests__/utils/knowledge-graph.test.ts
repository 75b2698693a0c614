import { KnowledgeGraphManager } from '../../utils/knowledge-graph';
import { NotFoundError } from '../../utils/errors';
import { ValidationError } from '../../utils/validation';
import { createTestMemory, TestMemory } from '../helpers/test-memory';

describe('KnowledgeGraphManager', () => {
  let ctx: TestMemory;
  let graph: KnowledgeGraphManager;

  beforeEach(() => {
    ctx = createTestMemory();
    graph = new KnowledgeGraphManager(ctx.memory.repositories);
  });

  afterEach(() => {
    ctx.cleanup();
  });

  describe('entities', () => {
    it('should create an entity with one reference', () => {
      const entity = graph.addEntity('TypeScript', 'technology', 'Typed JavaScript', {
        site: 'typescriptlang.org',
      });

      expect(entity.entity_name).toBe('TypeScript');
      expect(entity.entity_type).toBe('technology');
      expect(entity.reference_count).toBe(1);
      expect(entity.metadata).toEqual({ site: 'typescriptlang.org' });
      expect(entity.last_referenced).toBe('2024-03-06T10:00:00.000Z');
    });

    it('should count references when the same name is added again', () => {
      graph.addEntity('TypeScript', 'technology', 'Typed JavaScript');
      ctx.clock.advance(30);
      const again = graph.addEntity('TypeScript', 'technology');

      expect(again.reference_count).toBe(2);
      expect(again.description).toBe('Typed JavaScript');
      expect(again.last_referenced).toBe('2024-03-06T10:00:30.000Z');
      expect(graph.exportGraph().entities).toHaveLength(1);
    });

    it('should reject unknown entity types', () => {
      expect(() => graph.addEntity('Mars', 'planet')).toThrow(ValidationError);
    });
  });

  describe('relations', () => {
    beforeEach(() => {
      for (const name of ['A', 'B', 'C', 'D', 'E']) {
        graph.addEntity(name, 'concept');
      }
    });

    it('should require both entities to exist', () => {
      expect(() => graph.relate('A', 'Ghost', 'uses')).toThrow(NotFoundError);
      expect(() => graph.relate('A', 'Ghost', 'uses')).toThrow('Entity not found: Ghost');
    });

    it('should default the strength to 0.5', () => {
      expect(graph.relate('A', 'B', 'uses').strength).toBe(0.5);
    });

    it('should update the strength of a repeated edge in place', () => {
      const first = graph.relate('A', 'B', 'uses', 0.3);
      const second = graph.relate('A', 'B', 'uses', 0.9);

      expect(second.id).toBe(first.id);
      expect(second.strength).toBe(0.9);
      expect(graph.exportGraph().relations).toEqual([
        { from: 'A', relation_type: 'uses', to: 'B', strength: 0.9 },
      ]);
    });

    it('should keep edges of different types apart', () => {
      graph.relate('A', 'B', 'uses');
      graph.relate('A', 'B', 'extends');

      expect(graph.exportGraph().relations.map(r => r.relation_type)).toEqual(['extends', 'uses']);
    });

    it('should reject strengths outside [0, 1]', () => {
      expect(() => graph.relate('A', 'B', 'uses', 2)).toThrow('Strength must be between 0 and 1');
    });

    it('should walk the neighbourhood breadth first in both directions', () => {
      graph.relate('A', 'B', 'uses', 0.9);
      graph.relate('B', 'C', 'uses', 0.8);
      graph.relate('C', 'D', 'uses', 0.7);
      graph.relate('E', 'A', 'mentions', 0.4);

      const related = graph.getRelated('A');
      expect(related.map(r => [r.entity.entity_name, r.depth])).toEqual([
        ['B', 1],
        ['E', 1],
        ['C', 2],
      ]);
      expect(graph.getRelated('A', 1).map(r => r.entity.entity_name)).toEqual(['B', 'E']);
    });

    it('should fail for an unknown start entity', () => {
      expect(() => graph.getRelated('Ghost')).toThrow(NotFoundError);
    });
  });
});
