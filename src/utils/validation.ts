import type { EntityType, FileAction, JsonValue, KnowledgeCategory } from '../types/entities.js';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export const FILE_ACTIONS: readonly FileAction[] = ['created', 'modified', 'deleted', 'read'];

export const KNOWLEDGE_CATEGORIES: readonly KnowledgeCategory[] = [
  'pattern',
  'solution',
  'gotcha',
  'preference',
];

export const ENTITY_TYPES: readonly EntityType[] = [
  'person',
  'project',
  'technology',
  'file',
  'concept',
];

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some(candidate => candidate === value);
}

export function validateRequired(value: unknown, field: string, maxLength = 1000): string {
  if (value === null || value === undefined || typeof value !== 'string') {
    throw new ValidationError(`${field} must be a non-empty string`);
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError(`${field} cannot be empty`);
  }

  if (trimmed.length > maxLength) {
    throw new ValidationError(`${field} too long (max ${maxLength} characters)`);
  }

  // Check for null bytes
  if (trimmed.includes('\0')) {
    throw new ValidationError(`${field} contains invalid characters`);
  }

  return trimmed;
}

export function validateToolName(tool: unknown): string {
  const name = validateRequired(tool, 'Tool name', 64);

  if (!/^[a-zA-Z0-9_\-.]+$/.test(name)) {
    throw new ValidationError('Tool name may only contain letters, digits, dot, dash and underscore');
  }

  return name;
}

export function validateDirectory(dir: unknown): string {
  const trimmed = validateRequired(dir, 'Working directory', 4096);
  // Trailing separators would make "/p" and "/p/" two projects
  return trimmed.length > 1 ? trimmed.replace(/[/\\]+$/, '') : trimmed;
}

export function validateSessionId(sessionId: unknown): string {
  return validateRequired(sessionId, 'Session id', 128);
}

export function validateFileAction(action: unknown): FileAction {
  if (typeof action !== 'string' || !isOneOf(FILE_ACTIONS, action)) {
    throw new ValidationError(`Invalid file action. Must be one of: ${FILE_ACTIONS.join(', ')}`);
  }
  return action;
}

export function validateLineCount(value: unknown, field: string): number {
  if (value === undefined || value === null) return 0;

  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(`${field} must be an integer`);
  }

  if (value < 0) {
    throw new ValidationError(`${field} cannot be negative`);
  }

  return value;
}

export function validateExitCode(value: unknown): number | null {
  if (value === undefined || value === null) return null;

  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError('Exit code must be an integer');
  }

  return value;
}

export function validateKnowledgeCategory(category: unknown): KnowledgeCategory {
  if (typeof category !== 'string' || !isOneOf(KNOWLEDGE_CATEGORIES, category)) {
    throw new ValidationError(
      `Invalid category. Must be one of: ${KNOWLEDGE_CATEGORIES.join(', ')}`
    );
  }
  return category;
}

export function validateEntityType(type: unknown): EntityType {
  if (typeof type !== 'string' || !isOneOf(ENTITY_TYPES, type)) {
    throw new ValidationError(`Invalid entity type. Must be one of: ${ENTITY_TYPES.join(', ')}`);
  }
  return type;
}

/**
 * Confidence and relation strength share the same [0, 1] range.
 */
export function validateUnitInterval(value: unknown, field: string): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ValidationError(`${field} must be a number`);
  }

  if (value < 0 || value > 1) {
    throw new ValidationError(`${field} must be between 0 and 1`);
  }

  return value;
}

export function validatePositiveInteger(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer`);
  }
  return value;
}

/**
 * Narrows caller-supplied data (MCP arguments, parsed CLI JSON) to a value
 * that survives a JSON round trip.
 */
export function validateJson(value: unknown, field: string): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`${field} must be finite`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => validateJson(item, `${field}[${index}]`));
  }
  if (typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = validateJson(item, `${field}.${key}`);
    }
    return result;
  }
  throw new ValidationError(`${field} must be JSON data`);
}
