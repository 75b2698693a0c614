import { addDays, addHours, subSeconds } from 'date-fns';
import { isoWeekRange } from '../../utils/weeks';
import { ValidationError } from '../../utils/validation';
import { createTestMemory, TestMemory } from '../helpers/test-memory';

describe('Weekly Summary Integration Tests', () => {
  let ctx: TestMemory;
  const week = isoWeekRange(2024, 10);

  beforeEach(() => {
    ctx = createTestMemory();
    const { memory, clock } = ctx;

    // Just before the week
    clock.set(subSeconds(week.start, 1));
    memory.start('toolA', '/p');

    // Monday noon
    clock.set(addHours(week.start, 12));
    const monday = memory.start('toolA', '/p', { branch: 'main' });
    memory.logFile(monday.id, { path: 'a.ts', action: 'modified' });
    memory.logFile(monday.id, { path: 'b.ts', action: 'created' });
    memory.logFile(monday.id, { path: 'a.ts', action: 'modified' });
    memory.logCommand(monday.id, { command: 'npm test', exitCode: 0 });
    memory.logContext(monday.id, 'decision', { choice: 'sqlite' });
    memory.logContext(monday.id, 'note', 'not part of the rollup');
    memory.addKnowledge({ category: 'gotcha', title: 'Use WAL', description: 'Readers never block' });
    clock.advance(600);
    memory.end(monday.id, 0);

    // Wednesday
    clock.set(addDays(week.start, 2));
    const wednesday = memory.start('toolA', '/q', { branch: 'feature/x' });
    memory.logFile(wednesday.id, { path: 'c.ts', action: 'modified' });
    memory.logContext(wednesday.id, 'solution', 'restart the daemon');
    clock.advance(300);
    memory.end(wednesday.id, 0);

    // Thursday, still open; another tool the same day
    clock.set(addDays(week.start, 3));
    memory.start('toolA', '/p');
    memory.start('toolB', '/p');

    // Start of the next week is outside the range
    clock.set(week.end);
    memory.start('toolA', '/p');
    memory.addKnowledge({ category: 'pattern', title: 'Later', description: 'Next week' });
  });

  afterEach(() => {
    ctx.cleanup();
  });

  it('should roll up every project of a tool for the week', () => {
    const summary = ctx.memory.weekly(2024, 10, 'toolA');

    expect(summary.year).toBe(2024);
    expect(summary.week_number).toBe(10);
    expect(summary.cli_tool).toBe('toolA');
    expect(summary.project_path).toBeNull();
    expect(summary.session_count).toBe(3);
    expect(summary.total_time_seconds).toBe(900);
    expect(summary.summary_data).toEqual({
      branches_worked_on: ['feature/x', 'main'],
      projects: ['/p', '/q'],
      average_session_time: 300,
      files_touched: 3,
      commands_run: 1,
      decisions: [{ choice: 'sqlite' }],
      solutions: ['restart the daemon'],
      knowledge_touched: ['Use WAL'],
    });
  });

  it('should limit the rollup to one project', () => {
    const summary = ctx.memory.weekly(2024, 10, 'toolA', '/p');

    expect(summary.project_path).toBe('/p');
    expect(summary.session_count).toBe(2);
    expect(summary.total_time_seconds).toBe(600);
    expect(summary.summary_data.projects).toEqual(['/p']);
    expect(summary.summary_data.files_touched).toBe(2);
    expect(summary.summary_data.solutions).toEqual([]);
  });

  it('should replace the stored row when run again', () => {
    const { memory, clock } = ctx;
    const first = memory.weekly(2024, 10, 'toolA');

    clock.set(addDays(week.start, 4));
    memory.start('toolA', '/p');
    const second = memory.weekly(2024, 10, 'toolA');

    expect(second.id).toBe(first.id);
    expect(second.session_count).toBe(4);
    expect(memory.repositories.summaries.listForWeek(2024, 10)).toHaveLength(1);
  });

  it('should produce one summary per project', () => {
    const summaries = ctx.memory.weeklyAll(2024, 10, 'toolA');

    expect(summaries.map(s => [s.project_path, s.session_count])).toEqual([
      ['/p', 2],
      ['/q', 1],
    ]);
    expect(ctx.memory.repositories.summaries.listForWeek(2024, 10)).toHaveLength(2);
  });

  it('should store an empty rollup for a quiet week', () => {
    const summary = ctx.memory.weekly(2024, 20, 'toolA');

    expect(summary.session_count).toBe(0);
    expect(summary.summary_data.average_session_time).toBe(0);
    expect(summary.summary_data.projects).toEqual([]);
  });

  it('should summarize the previous week', () => {
    ctx.clock.set(new Date(2024, 2, 13, 12));
    const summary = ctx.memory.weeklyPrevious('toolA');

    expect(summary.week_number).toBe(10);
    expect(summary.session_count).toBe(3);
  });

  it('should reject weeks the year does not have', () => {
    expect(() => ctx.memory.weekly(2024, 53, 'toolA')).toThrow(ValidationError);
    expect(() => ctx.memory.weekly(2024, 53, 'toolA')).toThrow(
      'Week must be between 1 and 52 for 2024'
    );
  });
});
