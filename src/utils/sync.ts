import * as crypto from 'crypto';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { format } from 'date-fns';
import { Clock, systemClock } from '../repositories/BaseRepository.js';
import { DatabaseManager } from './database.js';
import { StorageError, errorMessage } from './errors.js';

export const SYNC_DB_FILE = 'context.db';
export const SYNC_MANIFEST_FILE = 'manifest.json';

export interface SyncManifest {
  machine_id: string;
  sync_time: string;
  checksum: string;
}

export interface SyncOptions {
  syncDir: string;
  backupDir: string;
  machineId?: string;
  clock?: Clock;
}

export interface PullResult {
  manifest: SyncManifest;
  backupPath: string | null;
}

// Helper to calculate file hash
export function calculateFileHash(filePath: string): string {
  return crypto.createHash('sha256').update(fs.readFileSync(filePath)).digest('hex');
}

export function defaultMachineId(): string {
  const hostname = os.hostname();
  const digest = crypto.createHash('sha256').update(hostname).digest('hex').slice(0, 8);
  return `${hostname}_${digest}`;
}

function isManifest(value: unknown): value is SyncManifest {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'machine_id' in value &&
    typeof value.machine_id === 'string' &&
    'sync_time' in value &&
    typeof value.sync_time === 'string' &&
    'checksum' in value &&
    typeof value.checksum === 'string'
  );
}

export function readManifest(syncDir: string): SyncManifest | null {
  const manifestPath = path.join(syncDir, SYNC_MANIFEST_FILE);
  if (!fs.existsSync(manifestPath)) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(manifestPath, 'utf8'));
  } catch (error) {
    throw new StorageError(`Unreadable sync manifest ${manifestPath}: ${errorMessage(error)}`, error);
  }
  if (!isManifest(parsed)) {
    throw new StorageError(`Malformed sync manifest ${manifestPath}`);
  }
  return parsed;
}

function backupFileName(clock: Clock): string {
  return `context_${format(clock(), 'yyyyMMdd_HHmmss')}.db`;
}

/**
 * Manual file-level sync of the database through a shared directory
 * (a mounted drive, a synced folder, a git checkout).
 */
export class SyncManager {
  private machineId: string;
  private clock: Clock;

  constructor(
    private dbManager: DatabaseManager,
    private options: SyncOptions
  ) {
    this.machineId = options.machineId ?? defaultMachineId();
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Timestamped copy of the live database in the backup directory.
   */
  async backup(): Promise<string> {
    const destination = path.join(this.options.backupDir, backupFileName(this.clock));
    await this.dbManager.backup(destination);
    return destination;
  }

  async push(): Promise<SyncManifest> {
    const destination = path.join(this.options.syncDir, SYNC_DB_FILE);
    await this.dbManager.backup(destination);

    const manifest: SyncManifest = {
      machine_id: this.machineId,
      sync_time: this.clock().toISOString(),
      checksum: calculateFileHash(destination),
    };

    try {
      fs.writeFileSync(
        path.join(this.options.syncDir, SYNC_MANIFEST_FILE),
        JSON.stringify(manifest, null, 2)
      );
    } catch (error) {
      throw new StorageError(`Failed to write sync manifest: ${errorMessage(error)}`, error);
    }
    return manifest;
  }

  status(): SyncManifest | null {
    return readManifest(this.options.syncDir);
  }
}

/**
 * Replaces the local database with the synced copy. The database must not
 * be open in this process; the local file is backed up first.
 */
export function pullDatabase(databasePath: string, options: SyncOptions): PullResult {
  const clock = options.clock ?? systemClock;
  const manifest = readManifest(options.syncDir);
  if (!manifest) {
    throw new StorageError(`Nothing to pull: no manifest in ${options.syncDir}`);
  }

  const source = path.join(options.syncDir, SYNC_DB_FILE);
  if (!fs.existsSync(source)) {
    throw new StorageError(`Nothing to pull: ${source} is missing`);
  }

  const checksum = calculateFileHash(source);
  if (checksum !== manifest.checksum) {
    throw new StorageError(
      `Checksum mismatch for ${source}: manifest has ${manifest.checksum}, file has ${checksum}`
    );
  }

  try {
    let backupPath: string | null = null;
    if (fs.existsSync(databasePath)) {
      fs.mkdirSync(options.backupDir, { recursive: true });
      backupPath = path.join(options.backupDir, backupFileName(clock));
      fs.copyFileSync(databasePath, backupPath);
    }

    fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
    // Stale WAL files would be replayed onto the pulled copy
    for (const suffix of ['-wal', '-shm']) {
      fs.rmSync(`${databasePath}${suffix}`, { force: true });
    }
    fs.copyFileSync(source, databasePath);

    return { manifest, backupPath };
  } catch (error) {
    throw new StorageError(`Failed to pull ${source}: ${errorMessage(error)}`, error);
  }
}
