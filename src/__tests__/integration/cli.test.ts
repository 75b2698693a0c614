import * as fs from 'fs';
import { runCli } from '../../cli';
import { MemoryConfig } from '../../utils/config';
import { MemoryManager } from '../../utils/memory-manager';
import { tempDir, testConfig, TestClock } from '../helpers/test-memory';

describe('CLI', () => {
  let root: string;
  let config: MemoryConfig;
  let clock: TestClock;
  let out: string[];
  let err: string[];
  let versionProbe: jest.Mock<Promise<string>, [string]>;

  const run = (...args: string[]) =>
    runCli(['node', 'context-memory', ...args], {
      config,
      openMemory: cfg => new MemoryManager({ config: cfg, clock: clock.now, versionProbe }),
      stdout: text => out.push(text),
      stderr: text => err.push(text),
    });

  const output = () => out.join('');

  beforeEach(() => {
    root = tempDir('context-memory-cli');
    config = testConfig(root);
    clock = new TestClock();
    out = [];
    err = [];
    versionProbe = jest.fn<Promise<string>, [string]>().mockResolvedValue('claude 1.2.3\n');
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  async function startSession(): Promise<string> {
    const code = await run(
      'start',
      'claude',
      '--cwd',
      '/work/app',
      '--repo',
      '/work/app',
      '--branch',
      'main'
    );
    expect(code).toBe(0);
    const id = output().trim();
    out = [];
    return id;
  }

  it('should print the new session id', async () => {
    const id = await startSession();

    expect(id).toMatch(/^[0-9a-f-]{36}$/);
    const memory = new MemoryManager({ config });
    try {
      expect(memory.repositories.sessions.getById(id)).toEqual(
        expect.objectContaining({ tool: 'claude', working_dir: '/work/app', git_branch: 'main' })
      );
    } finally {
      memory.close();
    }
  });

  it('should record a session and render it as markdown context', async () => {
    const id = await startSession();

    expect(
      await run('log-file', id, 'src/a.ts', 'modified', '--language', 'typescript', '--added', '3')
    ).toBe(0);
    clock.advance(90);
    expect(await run('end', id, '0')).toBe(0);
    out = [];

    expect(await run('context', '/work/app', '--format', 'markdown')).toBe(0);
    expect(output()).toBe(
      [
        '# Context for /work/app',
        '\n## Project',
        '- **Name**: app',
        '- **Language**: typescript',
        '- **Sessions**: 1 (2m total)',
        '\n## Recent Sessions',
        '- 2024-03-06T10:00:00.000Z claude on main: 1 files, 0 commands, 2m',
      ].join('\n') + '\n'
    );
  });

  it('should store notes as JSON when they parse and as text otherwise', async () => {
    const id = await startSession();

    await run('note', id, 'decision', '{"choice":"sqlite"}');
    expect(JSON.parse(output())).toEqual(expect.objectContaining({ context_data: { choice: 'sqlite' } }));
    out = [];

    await run('note', id, 'note', 'remember the WAL files');
    expect(JSON.parse(output())).toEqual(
      expect.objectContaining({ context_data: 'remember the WAL files' })
    );
  });

  it('should report validation errors with exit code 1', async () => {
    const code = await run('add-knowledge', 'gotcha', 'No body');

    expect(code).toBe(1);
    expect(err).toEqual(['Error: Description cannot be empty\n']);
    expect(out).toEqual([]);
  });

  it('should reject non-integer arguments', async () => {
    const code = await run('end', 'some-id', 'xyz');

    expect(code).toBe(1);
    expect(err).toEqual(['Error: Exit code must be an integer, got "xyz"\n']);
  });

  it('should reject an unknown context format', async () => {
    const code = await run('context', '/work/app', '--format', 'yaml');

    expect(code).toBe(1);
    expect(err).toEqual(['Error: Format must be json or markdown\n']);
  });

  it('should validate the ISO week', async () => {
    const code = await run('weekly', '2024', '53', 'claude');

    expect(code).toBe(1);
    expect(err).toEqual(['Error: Week must be between 1 and 52 for 2024\n']);
  });

  it('should add knowledge and list it', async () => {
    expect(
      await run('add-knowledge', 'solution', 'Restart daemon', 'Kill and restart', '--context', '{"language":"go"}')
    ).toBe(0);
    out = [];

    expect(await run('knowledge', '--category', 'solution')).toBe(0);
    expect(JSON.parse(output())).toEqual([
      expect.objectContaining({
        category: 'solution',
        title: 'Restart daemon',
        description: 'Kill and restart',
        context: { language: 'go' },
      }),
    ]);
  });

  it('should relate entities and walk them', async () => {
    await run('entity', 'app', 'project');
    await run('entity', 'TypeScript', 'technology', '--description', 'Typed JavaScript');
    expect(await run('relate', 'app', 'TypeScript', 'uses', '0.8')).toBe(0);
    out = [];

    expect(await run('related', 'app', '--depth', '1')).toBe(0);
    expect(JSON.parse(output())).toEqual([
      {
        entity: expect.objectContaining({ entity_name: 'TypeScript', description: 'Typed JavaScript' }),
        depth: 1,
      },
    ]);
  });

  it('should skip a version check made within the last day when asked', async () => {
    expect(await run('check-updates', 'claude')).toBe(0);
    expect(JSON.parse(output())).toEqual(expect.objectContaining({ tool: 'claude', version: '1.2.3' }));
    out = [];

    clock.advance(3600);
    expect(await run('check-updates', 'claude', '--if-due')).toBe(0);
    expect(output()).toBe('claude was checked in the last 24 hours\n');
    expect(versionProbe).toHaveBeenCalledTimes(1);

    clock.advance(23 * 3600);
    out = [];
    expect(await run('check-updates', 'claude', '--if-due')).toBe(0);
    expect(JSON.parse(output())).toEqual(expect.objectContaining({ version: '1.2.3', changed: false }));
    expect(versionProbe).toHaveBeenCalledTimes(2);
  });

  it('should push and report sync status', async () => {
    await startSession();

    expect(await run('sync', 'push')).toBe(0);
    const pushed = JSON.parse(output());
    out = [];

    expect(await run('sync', 'status')).toBe(0);
    expect(JSON.parse(output())).toEqual(pushed);
  });

  it('should reject an unknown sync direction', async () => {
    const code = await run('sync', 'sideways');

    expect(code).toBe(1);
    expect(err).toEqual(['Error: Sync direction must be push, pull or status\n']);
  });

  it('should print the version', async () => {
    const code = await run('--version');

    expect(code).toBe(0);
    expect(output()).toBe('0.3.0\n');
  });

  it('should fail on an unknown command', async () => {
    const code = await run('frobnicate');

    expect(code).toBe(1);
    expect(err.join('')).toContain("unknown command 'frobnicate'");
  });
});
