import { execFile } from 'child_process';
import { promisify } from 'util';
import { differenceInHours, parseISO } from 'date-fns';
import { Clock, systemClock } from '../repositories/BaseRepository.js';
import { RepositoryManager } from '../repositories/RepositoryManager.js';
import { errorMessage } from './errors.js';
import { validateToolName } from './validation.js';

const execFileAsync = promisify(execFile);

export const VERSION_TIMEOUT_MS = 5000;
// At most one probe per tool per day
export const VERSION_CHECK_INTERVAL_HOURS = 24;

/**
 * Returns the raw `--version` output of an installed CLI tool.
 */
export type VersionProbe = (tool: string) => Promise<string>;

export const execVersionProbe: VersionProbe = async tool => {
  const { stdout } = await execFileAsync(tool, ['--version'], {
    encoding: 'utf8',
    timeout: VERSION_TIMEOUT_MS,
  });
  return stdout;
};

export interface VersionCheckResult {
  tool: string;
  installed: boolean;
  version: string | null;
  previous_version: string | null;
  changed: boolean;
}

const VERSION_PATTERN = /\d+\.\d+(?:\.\d+)?(?:-[0-9A-Za-z.-]+)?/;

export function parseVersion(output: string): string | null {
  const match = VERSION_PATTERN.exec(output);
  return match ? match[0] : null;
}

export class UpdateChecker {
  constructor(
    private repositories: RepositoryManager,
    private probe: VersionProbe = execVersionProbe,
    private clock: Clock = systemClock
  ) {}

  /**
   * True when the tool was never checked or its last check is older than
   * VERSION_CHECK_INTERVAL_HOURS.
   */
  isCheckDue(tool: unknown): boolean {
    const name = validateToolName(tool);
    const stored = this.repositories
      .getDatabaseManager()
      .runInTransaction(() => this.repositories.versions.get(name));
    if (!stored) return true;
    return differenceInHours(this.clock(), parseISO(stored.last_check)) >= VERSION_CHECK_INTERVAL_HOURS;
  }

  /**
   * Runs the check only when it is due; resolves to null when skipped.
   */
  async checkIfDue(tool: unknown): Promise<VersionCheckResult | null> {
    if (!this.isCheckDue(tool)) return null;
    return this.checkTool(tool);
  }

  async checkTool(tool: unknown): Promise<VersionCheckResult> {
    const name = validateToolName(tool);

    let output: string;
    try {
      output = await this.probe(name);
    } catch (error) {
      console.warn(`Version check for ${name} failed: ${errorMessage(error)}`);
      return { tool: name, installed: false, version: null, previous_version: null, changed: false };
    }

    const version = parseVersion(output);
    if (!version) {
      return { tool: name, installed: true, version: null, previous_version: null, changed: false };
    }

    const dbManager = this.repositories.getDatabaseManager();
    return dbManager.runInTransaction(() => {
      const before = this.repositories.versions.get(name);
      const recorded = this.repositories.versions.record(name, version);
      return {
        tool: name,
        installed: true,
        version: recorded.version,
        previous_version: recorded.previous_version,
        changed: before !== null && before.version !== version,
      };
    });
  }

  /**
   * Runs a due check without blocking the caller; failures are only logged.
   * The database must stay open until the probe settles.
   */
  checkInBackground(tool: string): void {
    this.checkIfDue(tool)
      .then(result => {
        if (result?.changed) {
          console.error(
            `${result.tool} updated from ${result.previous_version ?? 'unknown'} to ${result.version ?? 'unknown'}`
          );
        }
      })
      .catch(error => {
        console.error(`Background version check for ${tool} failed: ${errorMessage(error)}`);
      });
  }
}
