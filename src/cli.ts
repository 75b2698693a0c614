#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { MemoryConfig, loadConfig } from './utils/config.js';
import { errorMessage } from './utils/errors.js';
import { MemoryManager } from './utils/memory-manager.js';
import { pullDatabase } from './utils/sync.js';
import { ValidationError, validateJson } from './utils/validation.js';
import { JsonValue } from './types/entities.js';

export interface CliContext {
  config: MemoryConfig;
  openMemory: (config: MemoryConfig) => MemoryManager;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

function parseInteger(value: string, name: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new ValidationError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function parseOptionalInteger(value: string | undefined, name: string): number | undefined {
  return value === undefined ? undefined : parseInteger(value, name);
}

function parseNumber(value: string, name: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new ValidationError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

/**
 * JSON when it parses, otherwise the text itself.
 */
function parseData(text: string, name: string): JsonValue {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text;
  }
  return validateJson(parsed, name);
}

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function createCLI(ctx: CliContext): Command {
  const program = new Command();

  // Opens the database for one command and always closes it again
  const withMemory =
    <A extends unknown[]>(fn: (memory: MemoryManager, ...args: A) => Promise<unknown> | unknown) =>
    async (...args: A): Promise<void> => {
      const memory = ctx.openMemory(ctx.config);
      try {
        const result = await fn(memory, ...args);
        if (typeof result === 'string') {
          ctx.stdout(result.endsWith('\n') ? result : `${result}\n`);
        } else if (result !== undefined) {
          ctx.stdout(`${toJson(result)}\n`);
        }
      } finally {
        memory.close();
      }
    };

  program
    .name('context-memory')
    .description('Record AI CLI sessions and retrieve context for new ones')
    .version('0.3.0')
    .exitOverride()
    .configureOutput({
      writeOut: text => ctx.stdout(text),
      writeErr: text => ctx.stderr(text),
    });

  // Session Management
  program
    .command('start <tool>')
    .description('Start a session and print its id')
    .option('--cwd <dir>', 'Working directory', process.cwd())
    .option('--repo <path>', 'Git repository root (detected when omitted)')
    .option('--branch <name>', 'Git branch (detected when omitted)')
    .option('--commit <sha>', 'Git commit (detected when omitted)')
    .action(
      withMemory(
        async (
          memory,
          tool: string,
          options: { cwd: string; repo?: string; branch?: string; commit?: string }
        ) => {
          const session = await memory.startInDirectory(tool, options.cwd, {
            repo: options.repo,
            branch: options.branch,
            commit: options.commit,
          });
          return session.id;
        }
      )
    );

  program
    .command('end <sessionId> [exitCode]')
    .description('End a session')
    .action(
      withMemory((memory, sessionId: string, exitCode: string | undefined) =>
        memory.end(sessionId, parseOptionalInteger(exitCode, 'Exit code'))
      )
    );

  program
    .command('log-file <sessionId> <path> <action>')
    .description('Record a file action (created, modified, deleted, read)')
    .option('--language <lang>', 'Language of the file')
    .option('--added <n>', 'Lines added')
    .option('--removed <n>', 'Lines removed')
    .action(
      withMemory(
        (
          memory,
          sessionId: string,
          filePath: string,
          action: string,
          options: { language?: string; added?: string; removed?: string }
        ) =>
          memory.logFile(sessionId, {
            path: filePath,
            action,
            language: options.language,
            linesAdded: parseOptionalInteger(options.added, 'Lines added'),
            linesRemoved: parseOptionalInteger(options.removed, 'Lines removed'),
          })
      )
    );

  program
    .command('log-command <sessionId> <command> [exitCode]')
    .description('Record a shell command')
    .option('--summary <text>', 'Short summary of the output')
    .action(
      withMemory(
        (
          memory,
          sessionId: string,
          command: string,
          exitCode: string | undefined,
          options: { summary?: string }
        ) =>
          memory.logCommand(sessionId, {
            command,
            exitCode: parseOptionalInteger(exitCode, 'Exit code'),
            outputSummary: options.summary,
          })
      )
    );

  program
    .command('note <sessionId> <type> <data>')
    .description('Record a decision, error, solution or note (JSON or text)')
    .action(
      withMemory((memory, sessionId: string, type: string, data: string) =>
        memory.logContext(sessionId, type, parseData(data, 'data'))
      )
    );

  // Context retrieval
  program
    .command('context [dir]')
    .description('Show recent sessions, patterns and knowledge for a directory')
    .option('--tool <name>', 'Only sessions of this tool')
    .option('--limit <n>', 'Maximum recent sessions')
    .option('--format <format>', 'json or markdown', 'json')
    .action(
      withMemory(
        (
          memory,
          dir: string | undefined,
          options: { tool?: string; limit?: string; format: string }
        ) => {
          const workingDir = dir ?? process.cwd();
          const limit = parseOptionalInteger(options.limit, 'Limit');
          if (options.format === 'markdown') {
            return memory.formattedContext(workingDir, options.tool, limit);
          }
          if (options.format !== 'json') {
            throw new ValidationError('Format must be json or markdown');
          }
          return memory.context(workingDir, options.tool, limit);
        }
      )
    );

  // Knowledge and patterns
  program
    .command('add-knowledge <category> <title> [description]')
    .description('Add a knowledge entry (pattern, solution, gotcha, preference)')
    .option('--context <json>', 'Context matched against project language and framework')
    .option('--session <id>', 'Source session id')
    .action(
      withMemory(
        (
          memory,
          category: string,
          title: string,
          description: string | undefined,
          options: { context?: string; session?: string }
        ) =>
          memory.addKnowledge({
            category,
            title,
            description,
            context: options.context === undefined ? null : parseData(options.context, 'context'),
            sourceSessionId: options.session,
          })
      )
    );

  program
    .command('knowledge')
    .description('List knowledge entries, most used first')
    .option('--category <category>', 'Only this category')
    .option('--limit <n>', 'Maximum entries')
    .action(
      withMemory((memory, options: { category?: string; limit?: string }) =>
        memory.listKnowledge(options.category, parseOptionalInteger(options.limit, 'Limit'))
      )
    );

  program
    .command('pattern <projectPath> <type> <data> <confidence>')
    .description('Record an observed project pattern')
    .action(
      withMemory((memory, projectPath: string, type: string, data: string, confidence: string) =>
        memory.addPattern(
          projectPath,
          type,
          parseData(data, 'data'),
          parseNumber(confidence, 'Confidence')
        )
      )
    );

  program
    .command('profile <projectPath>')
    .description('Set project name, language and framework')
    .option('--name <name>', 'Project name')
    .option('--language <lang>', 'Primary language')
    .option('--framework <name>', 'Framework')
    .action(
      withMemory(
        (
          memory,
          projectPath: string,
          options: { name?: string; language?: string; framework?: string }
        ) => memory.setProjectProfile(projectPath, options)
      )
    );

  // Summaries and stats
  program
    .command('weekly <year> <week> <tool> [projectPath]')
    .description('Build the rollup for an ISO week')
    .option('--all', 'One summary per project')
    .action(
      withMemory(
        (
          memory,
          year: string,
          week: string,
          tool: string,
          projectPath: string | undefined,
          options: { all?: boolean }
        ) => {
          const y = parseInteger(year, 'Year');
          const w = parseInteger(week, 'Week');
          return options.all ? memory.weeklyAll(y, w, tool) : memory.weekly(y, w, tool, projectPath);
        }
      )
    );

  program
    .command('weekly-last <tool>')
    .description('Build the rollup for the previous ISO week')
    .action(withMemory((memory, tool: string) => memory.weeklyPrevious(tool)));

  program
    .command('stats')
    .description('Show totals per tool, recent activity and top projects')
    .action(withMemory(memory => memory.stats()));

  program
    .command('learn <sessionId>')
    .description('Store preference learnings derived from a session')
    .action(withMemory((memory, sessionId: string) => memory.learn(sessionId)));

  // Entity graph
  program
    .command('entity <name> <type>')
    .description('Add or reference an entity (person, project, technology, file, concept)')
    .option('--description <text>', 'Description')
    .action(
      withMemory((memory, name: string, type: string, options: { description?: string }) =>
        memory.addEntity(name, type, options.description)
      )
    );

  program
    .command('relate <from> <to> <type> [strength]')
    .description('Relate two entities')
    .action(
      withMemory((memory, from: string, to: string, type: string, strength: string | undefined) =>
        memory.relate(from, to, type, strength === undefined ? 0.5 : parseNumber(strength, 'Strength'))
      )
    );

  program
    .command('related <name>')
    .description('Entities reachable from an entity')
    .option('--depth <n>', 'Maximum hops', '2')
    .action(
      withMemory((memory, name: string, options: { depth: string }) =>
        memory.related(name, parseInteger(options.depth, 'Depth'))
      )
    );

  program
    .command('graph')
    .description('Export all entities and relations')
    .action(withMemory(memory => memory.exportGraph()));

  // Maintenance
  program
    .command('check-updates <tool>')
    .description('Record the installed version of a CLI tool')
    .option('--if-due', 'Skip when the tool was checked in the last 24 hours')
    .action(
      withMemory(async (memory, tool: string, options: { ifDue?: boolean }) => {
        if (!options.ifDue) {
          return memory.checkUpdates(tool);
        }
        const result = await memory.checkUpdatesIfDue(tool);
        return result ?? `${tool} was checked in the last 24 hours`;
      })
    );

  program
    .command('backup')
    .description('Write a timestamped backup of the database')
    .action(withMemory(memory => memory.backup()));

  program
    .command('sync <direction>')
    .description('push, pull or status against the sync directory')
    .action(async (direction: string) => {
      if (direction === 'pull') {
        // The database must be closed while it is replaced
        const result = pullDatabase(ctx.config.databasePath, {
          syncDir: ctx.config.syncDir,
          backupDir: ctx.config.backupDir,
        });
        ctx.stdout(`${toJson(result)}\n`);
        return;
      }
      if (direction !== 'push' && direction !== 'status') {
        throw new ValidationError('Sync direction must be push, pull or status');
      }
      await withMemory(memory => (direction === 'push' ? memory.push() : memory.syncStatus()))();
    });

  return program;
}

/**
 * Runs one command and resolves to the process exit code.
 */
export async function runCli(argv: string[], overrides: Partial<CliContext> = {}): Promise<number> {
  const stdout = overrides.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = overrides.stderr ?? ((text: string) => process.stderr.write(text));

  try {
    const ctx: CliContext = {
      config: overrides.config ?? loadConfig(),
      openMemory: overrides.openMemory ?? (config => new MemoryManager({ config })),
      stdout,
      stderr,
    };
    await createCLI(ctx).parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed help, version or usage errors
      return error.exitCode;
    }
    stderr(`Error: ${errorMessage(error)}\n`);
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv)
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error(`Error: ${errorMessage(error)}`);
      process.exitCode = 1;
    });
}
