import * as os from 'os';
import * as path from 'path';
import { ValidationError } from './validation.js';

export interface MemoryConfig {
  databasePath: string;
  maxDatabaseSize: number;
  contextLimit: number;
  knowledgeLimit: number;
  syncDir: string;
  backupDir: string;
}

const DEFAULT_HOME = path.join(os.homedir(), '.context-memory');

export const DEFAULT_CONFIG: MemoryConfig = {
  databasePath: path.join(DEFAULT_HOME, 'context.db'),
  maxDatabaseSize: 100 * 1024 * 1024, // 100MB
  contextLimit: 10,
  knowledgeLimit: 20,
  syncDir: path.join(DEFAULT_HOME, 'sync'),
  backupDir: path.join(DEFAULT_HOME, 'backups'),
};

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0 || String(value) !== raw.trim()) {
    throw new ValidationError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readPath(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const trimmed = raw.trim();
  // ~ is not expanded by every hook runner
  if (trimmed === '~' || trimmed.startsWith('~/')) {
    return path.join(os.homedir(), trimmed.slice(1));
  }
  return trimmed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MemoryConfig {
  return {
    databasePath: readPath(env, 'CONTEXT_MEMORY_DB', DEFAULT_CONFIG.databasePath),
    maxDatabaseSize: readPositiveInt(env, 'CONTEXT_MEMORY_MAX_SIZE', DEFAULT_CONFIG.maxDatabaseSize),
    contextLimit: readPositiveInt(env, 'CONTEXT_MEMORY_CONTEXT_LIMIT', DEFAULT_CONFIG.contextLimit),
    knowledgeLimit: readPositiveInt(
      env,
      'CONTEXT_MEMORY_KNOWLEDGE_LIMIT',
      DEFAULT_CONFIG.knowledgeLimit
    ),
    syncDir: readPath(env, 'CONTEXT_MEMORY_SYNC_DIR', DEFAULT_CONFIG.syncDir),
    backupDir: readPath(env, 'CONTEXT_MEMORY_BACKUP_DIR', DEFAULT_CONFIG.backupDir),
  };
}
