import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { FileActionInput } from '../utils/session-recorder.js';
import { MemoryManager } from '../utils/memory-manager.js';
import { NotFoundError, StorageError } from '../utils/errors.js';
import { ValidationError, validateJson } from '../utils/validation.js';

type ToolArgs = Record<string, unknown>;

function optionalString(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${key} must be a string`);
  }
  return value;
}

function optionalNumber(args: ToolArgs, key: string): number | undefined {
  const value = args[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number') {
    throw new ValidationError(`${key} must be a number`);
  }
  return value;
}

function requireNumber(args: ToolArgs, key: string): number {
  const value = optionalNumber(args, key);
  if (value === undefined) {
    throw new ValidationError(`${key} is required`);
  }
  return value;
}

function textResult(value: unknown): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: typeof value === 'string' ? value : JSON.stringify(value, null, 2),
      },
    ],
  };
}

/**
 * Dispatches one MCP tool call onto the memory manager. Input, lookup and
 * storage failures come back as error results; an unknown tool name throws.
 */
export async function handleToolCall(
  name: string,
  args: ToolArgs,
  memory: MemoryManager
): Promise<CallToolResult> {
  try {
    switch (name) {
      // Session Management
      case 'memory_session_start': {
        const workingDir = optionalString(args, 'workingDir') ?? process.cwd();
        const session = await memory.startInDirectory(args.tool, workingDir, {
          repo: optionalString(args, 'gitRepo'),
          branch: optionalString(args, 'gitBranch'),
          commit: optionalString(args, 'gitCommit'),
        });
        memory.checkUpdatesInBackground(session.tool);
        return textResult({ sessionId: session.id, projectPath: session.project_path, session });
      }

      case 'memory_session_end': {
        const session = memory.end(args.sessionId, optionalNumber(args, 'exitCode'));
        if (!session) {
          return textResult(`Session ${String(args.sessionId)} not found; end recorded as orphaned`);
        }
        return textResult(session);
      }

      case 'memory_log_file': {
        const input: FileActionInput = {
          path: optionalString(args, 'filePath') ?? '',
          action: optionalString(args, 'action') ?? '',
          language: optionalString(args, 'language'),
          linesAdded: optionalNumber(args, 'linesAdded'),
          linesRemoved: optionalNumber(args, 'linesRemoved'),
        };
        return textResult(memory.logFile(args.sessionId, input));
      }

      case 'memory_log_command': {
        return textResult(
          memory.logCommand(args.sessionId, {
            command: optionalString(args, 'command') ?? '',
            exitCode: optionalNumber(args, 'exitCode'),
            outputSummary: optionalString(args, 'outputSummary'),
          })
        );
      }

      case 'memory_log_context': {
        const data = validateJson(args.data ?? null, 'data');
        return textResult(memory.logContext(args.sessionId, args.contextType, data));
      }

      // Context retrieval
      case 'memory_context': {
        const workingDir = optionalString(args, 'workingDir') ?? process.cwd();
        const tool = optionalString(args, 'tool');
        const limit = optionalNumber(args, 'limit');
        if (optionalString(args, 'format') === 'markdown') {
          return textResult(memory.formattedContext(workingDir, tool, limit));
        }
        return textResult(memory.context(workingDir, tool, limit));
      }

      // Knowledge and patterns
      case 'memory_add_knowledge': {
        const entry = memory.addKnowledge({
          category: args.category,
          title: args.title,
          description: args.description,
          context: args.context === undefined ? null : validateJson(args.context, 'context'),
          sourceSessionId: optionalString(args, 'sourceSessionId'),
        });
        return textResult(entry);
      }

      case 'memory_add_pattern': {
        const pattern = memory.addPattern(
          args.projectPath,
          args.patternType,
          validateJson(args.patternData ?? null, 'patternData'),
          args.confidence
        );
        return textResult(pattern);
      }

      case 'memory_set_project_profile': {
        const project = memory.setProjectProfile(args.projectPath, {
          name: optionalString(args, 'name'),
          language: optionalString(args, 'language'),
          framework: optionalString(args, 'framework'),
        });
        return textResult(project);
      }

      // Summaries and stats
      case 'memory_weekly_summary': {
        const year = requireNumber(args, 'year');
        const week = requireNumber(args, 'week');
        if (args.allProjects === true) {
          return textResult(memory.weeklyAll(year, week, args.tool));
        }
        return textResult(memory.weekly(year, week, args.tool, optionalString(args, 'projectPath')));
      }

      case 'memory_stats':
        return textResult(memory.stats());

      // Entity graph
      case 'memory_entity_add': {
        const metadata = args.metadata === undefined ? null : validateJson(args.metadata, 'metadata');
        return textResult(
          memory.addEntity(args.name, args.type, optionalString(args, 'description'), metadata)
        );
      }

      case 'memory_relation_add':
        return textResult(memory.relate(args.from, args.to, args.relationType, args.strength ?? 0.5));

      case 'memory_graph_export':
        return textResult(memory.exportGraph());

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    if (
      error instanceof ValidationError ||
      error instanceof NotFoundError ||
      error instanceof StorageError
    ) {
      return {
        content: [
          {
            type: 'text',
            text: `Error: ${error.message}`,
          },
        ],
        isError: true,
      };
    }
    throw error;
  }
}
