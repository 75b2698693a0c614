import { ValidationError } from '../../utils/validation';
import { createTestMemory, TestMemory } from '../helpers/test-memory';

describe('Knowledge and Pattern Store Integration Tests', () => {
  let ctx: TestMemory;

  beforeEach(() => {
    ctx = createTestMemory();
  });

  afterEach(() => {
    ctx.cleanup();
  });

  describe('addKnowledge', () => {
    it('should merge a repeated (category, title) into one entry', () => {
      const { memory } = ctx;
      memory.addKnowledge({ category: 'pattern', title: 'T', description: 'D1' });
      memory.addKnowledge({ category: 'pattern', title: 'T', description: 'D2' });

      const entries = memory.listKnowledge();
      expect(entries).toHaveLength(1);
      expect(entries[0].title).toBe('T');
      expect(entries[0].frequency).toBe(2);
      expect(entries[0].description).toBe('D2');
    });

    it('should count every insert in the frequency', () => {
      for (let i = 0; i < 5; i++) {
        ctx.memory.addKnowledge({ category: 'gotcha', title: 'Locks', description: `take ${i}` });
      }

      const entry = ctx.memory.repositories.knowledge.getByKey('gotcha', 'Locks');
      expect(entry?.frequency).toBe(5);
      expect(entry?.description).toBe('take 4');
      expect(ctx.memory.listKnowledge()).toHaveLength(1);
    });

    it('should keep the old description when the new one is empty', () => {
      const { memory } = ctx;
      memory.addKnowledge({ category: 'pattern', title: 'T', description: 'D1' });
      const merged = memory.addKnowledge({ category: 'pattern', title: 'T', description: '' });

      expect(merged.description).toBe('D1');
      expect(merged.frequency).toBe(2);
    });

    it('should require a description for a new entry', () => {
      expect(() => ctx.memory.addKnowledge({ category: 'pattern', title: 'New' })).toThrow(
        'Description cannot be empty'
      );
      expect(ctx.memory.listKnowledge()).toEqual([]);
    });

    it('should append source sessions once each', () => {
      const { memory } = ctx;
      for (const source of ['s1', 's2', 's1']) {
        memory.addKnowledge({
          category: 'solution',
          title: 'Retry',
          description: 'Retry on SQLITE_BUSY',
          sourceSessionId: source,
        });
      }

      expect(memory.repositories.knowledge.getByKey('solution', 'Retry')?.source_sessions).toEqual([
        's1',
        's2',
      ]);
    });

    it('should replace context only when one is given', () => {
      const { memory } = ctx;
      memory.addKnowledge({
        category: 'pattern',
        title: 'T',
        description: 'D',
        context: { language: 'go' },
      });
      const kept = memory.addKnowledge({ category: 'pattern', title: 'T', description: 'D' });
      expect(kept.context).toEqual({ language: 'go' });

      const replaced = memory.addKnowledge({
        category: 'pattern',
        title: 'T',
        description: 'D',
        context: { language: 'rust' },
      });
      expect(replaced.context).toEqual({ language: 'rust' });
    });

    it('should keep titles in different categories apart', () => {
      const { memory } = ctx;
      memory.addKnowledge({ category: 'pattern', title: 'T', description: 'D' });
      memory.addKnowledge({ category: 'gotcha', title: 'T', description: 'D' });

      expect(memory.listKnowledge()).toHaveLength(2);
      expect(memory.listKnowledge('gotcha').map(k => k.category)).toEqual(['gotcha']);
    });

    it('should reject unknown categories', () => {
      expect(() =>
        ctx.memory.addKnowledge({ category: 'tip', title: 'T', description: 'D' })
      ).toThrow(ValidationError);
      expect(() => ctx.memory.listKnowledge('tip')).toThrow(ValidationError);
    });
  });

  describe('addPattern', () => {
    it('should create the project and start at the observed confidence', () => {
      const pattern = ctx.memory.addPattern('/p', 'testing', { runner: 'jest' }, 0.5);

      expect(pattern.confidence).toBe(0.5);
      expect(ctx.memory.repositories.projects.getByPath('/p')?.id).toBe(pattern.project_id);
    });

    it('should blend repeated observations into the stored confidence', () => {
      const { memory } = ctx;
      memory.addPattern('/p', 'testing', { runner: 'jest' }, 0.5);
      const blended = memory.addPattern('/p', 'testing', { runner: 'vitest' }, 1);

      expect(blended.confidence).toBeCloseTo(0.65);
      expect(blended.pattern_data).toEqual({ runner: 'vitest' });

      const again = memory.addPattern('/p', 'testing', { runner: 'vitest' }, 0);
      expect(again.confidence).toBeCloseTo(0.455);
      expect(memory.context('/p').project_patterns).toHaveLength(1);
    });

    it('should reject confidence outside [0, 1]', () => {
      expect(() => ctx.memory.addPattern('/p', 'testing', {}, 1.5)).toThrow(
        'Confidence must be between 0 and 1'
      );
      expect(ctx.memory.repositories.projects.getByPath('/p')).toBeNull();
    });
  });

  describe('setProjectProfile', () => {
    it('should update only the given fields', () => {
      const { memory } = ctx;
      memory.setProjectProfile('/p', { language: 'go', framework: 'gin' });
      const project = memory.setProjectProfile('/p', { framework: 'echo' });

      expect(project.primary_language).toBe('go');
      expect(project.framework).toBe('echo');
      expect(project.project_name).toBe('p');
    });
  });
});
