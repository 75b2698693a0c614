import type { Tool } from '@modelcontextprotocol/sdk/types.js';

const sessionId = { type: 'string', description: 'Session ID returned by memory_session_start' };

export const MEMORY_TOOLS: Tool[] = [
  // Session Management
  {
    name: 'memory_session_start',
    description:
      'Start recording an AI CLI session; git details are detected from the directory and the tool version is checked in the background once a day',
    inputSchema: {
      type: 'object',
      properties: {
        tool: { type: 'string', description: 'CLI tool name (e.g. "claude", "aider")' },
        workingDir: { type: 'string', description: 'Working directory (defaults to server cwd)' },
        gitRepo: { type: 'string', description: 'Repository root, overrides detection' },
        gitBranch: { type: 'string', description: 'Branch name, overrides detection' },
        gitCommit: { type: 'string', description: 'HEAD commit, overrides detection' },
      },
      required: ['tool'],
    },
  },
  {
    name: 'memory_session_end',
    description: 'End a session and add its duration to the project',
    inputSchema: {
      type: 'object',
      properties: {
        sessionId,
        exitCode: { type: 'number', description: 'Exit code of the tool' },
      },
      required: ['sessionId'],
    },
  },
  {
    name: 'memory_log_file',
    description: 'Record a file action in a session',
    inputSchema: {
      type: 'object',
      properties: {
        sessionId,
        filePath: { type: 'string', description: 'Path of the file' },
        action: {
          type: 'string',
          enum: ['created', 'modified', 'deleted', 'read'],
          description: 'What happened to the file',
        },
        language: { type: 'string', description: 'Language of the file' },
        linesAdded: { type: 'number', description: 'Lines added', default: 0 },
        linesRemoved: { type: 'number', description: 'Lines removed', default: 0 },
      },
      required: ['sessionId', 'filePath', 'action'],
    },
  },
  {
    name: 'memory_log_command',
    description: 'Record a shell command run in a session',
    inputSchema: {
      type: 'object',
      properties: {
        sessionId,
        command: { type: 'string', description: 'Command line' },
        exitCode: { type: 'number', description: 'Exit code of the command' },
        outputSummary: { type: 'string', description: 'Short summary of the output' },
      },
      required: ['sessionId', 'command'],
    },
  },
  {
    name: 'memory_log_context',
    description: 'Record a decision, error, solution or note in a session',
    inputSchema: {
      type: 'object',
      properties: {
        sessionId,
        contextType: {
          type: 'string',
          description: 'Kind of note (decision, error, solution, note, ...)',
        },
        data: { description: 'Any JSON value' },
      },
      required: ['sessionId', 'contextType', 'data'],
    },
  },

  // Context retrieval
  {
    name: 'memory_context',
    description: 'Recent sessions, project patterns and relevant knowledge for a directory',
    inputSchema: {
      type: 'object',
      properties: {
        workingDir: { type: 'string', description: 'Directory (defaults to server cwd)' },
        tool: { type: 'string', description: 'Only sessions of this tool' },
        limit: { type: 'number', description: 'Maximum recent sessions', default: 10 },
        format: { type: 'string', enum: ['json', 'markdown'], default: 'json' },
      },
    },
  },

  // Knowledge and patterns
  {
    name: 'memory_add_knowledge',
    description: 'Add a reusable fact; repeats of (category, title) raise its frequency',
    inputSchema: {
      type: 'object',
      properties: {
        category: { type: 'string', enum: ['pattern', 'solution', 'gotcha', 'preference'] },
        title: { type: 'string' },
        description: { type: 'string', description: 'Required for a new title' },
        context: { description: 'JSON matched against project language and framework' },
        sourceSessionId: { type: 'string' },
      },
      required: ['category', 'title'],
    },
  },
  {
    name: 'memory_add_pattern',
    description: 'Record an observed project pattern with a confidence between 0 and 1',
    inputSchema: {
      type: 'object',
      properties: {
        projectPath: { type: 'string' },
        patternType: { type: 'string' },
        patternData: { description: 'Any JSON value' },
        confidence: { type: 'number', minimum: 0, maximum: 1 },
      },
      required: ['projectPath', 'patternType', 'patternData', 'confidence'],
    },
  },
  {
    name: 'memory_set_project_profile',
    description: 'Set the name, language and framework of a project',
    inputSchema: {
      type: 'object',
      properties: {
        projectPath: { type: 'string' },
        name: { type: 'string' },
        language: { type: 'string' },
        framework: { type: 'string' },
      },
      required: ['projectPath'],
    },
  },

  // Summaries and stats
  {
    name: 'memory_weekly_summary',
    description: 'Build (or rebuild) the rollup for one ISO week',
    inputSchema: {
      type: 'object',
      properties: {
        year: { type: 'number' },
        week: { type: 'number', description: 'ISO week number' },
        tool: { type: 'string' },
        projectPath: { type: 'string', description: 'Limit to one project' },
        allProjects: {
          type: 'boolean',
          description: 'One summary per project instead of one overall',
          default: false,
        },
      },
      required: ['year', 'week', 'tool'],
    },
  },
  {
    name: 'memory_stats',
    description: 'Totals per tool, activity over the last 7 days and the most active projects',
    inputSchema: { type: 'object', properties: {} },
  },

  // Entity graph
  {
    name: 'memory_entity_add',
    description: 'Add or reference a named entity',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string' },
        type: { type: 'string', enum: ['person', 'project', 'technology', 'file', 'concept'] },
        description: { type: 'string' },
        metadata: { description: 'Any JSON value' },
      },
      required: ['name', 'type'],
    },
  },
  {
    name: 'memory_relation_add',
    description: 'Relate two existing entities; repeating an edge updates its strength',
    inputSchema: {
      type: 'object',
      properties: {
        from: { type: 'string' },
        to: { type: 'string' },
        relationType: { type: 'string' },
        strength: { type: 'number', minimum: 0, maximum: 1, default: 0.5 },
      },
      required: ['from', 'to', 'relationType'],
    },
  },
  {
    name: 'memory_graph_export',
    description: 'Export all entities and relations',
    inputSchema: { type: 'object', properties: {} },
  },
];
