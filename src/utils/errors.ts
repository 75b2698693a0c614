export { ValidationError } from './validation.js';

/**
 * The database file could not be opened, read or written (corrupt, locked,
 * constraint failure). The SQLite error is kept as `cause`.
 */
export class StorageError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageError';
  }
}

export class NotFoundError extends Error {
  constructor(
    public readonly resource: string,
    public readonly identifier: string
  ) {
    super(`${resource} not found: ${identifier}`);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
