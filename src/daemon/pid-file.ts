import { existsSync, readFileSync, unlinkSync, writeFileSync } from 'node:fs';

export type IsProcessAlive = (pid: number) => boolean;

export class DaemonAlreadyRunningError extends Error {
  readonly pid: number;

  constructor(pid: number) {
    super(`daemon already running with pid ${String(pid)}`);
    this.name = 'DaemonAlreadyRunningError';
    this.pid = pid;
  }
}

function errnoCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error: unknown) {
    // EPERM means the process exists under another user.
    return errnoCode(error) !== 'ESRCH';
  }
}

export function parsePidText(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  const pid = Number.parseInt(trimmed, 10);
  return pid > 0 ? pid : null;
}

export function readPidFile(pidPath: string): number | null {
  try {
    return parsePidText(readFileSync(pidPath, 'utf8'));
  } catch (error: unknown) {
    if (errnoCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export function removeFileIfPresent(filePath: string): void {
  try {
    unlinkSync(filePath);
  } catch (error: unknown) {
    if (errnoCode(error) !== 'ENOENT') {
      throw error;
    }
  }
}

/**
 * Takes ownership of the pid file. A file held by a live process raises
 * `DaemonAlreadyRunningError`; a stale or unreadable one is replaced.
 */
export function claimPidFile(
  pidPath: string,
  pid: number,
  isAlive: IsProcessAlive = isProcessAlive,
): void {
  if (existsSync(pidPath)) {
    const existingPid = readPidFile(pidPath);
    if (existingPid !== null && existingPid !== pid && isAlive(existingPid)) {
      throw new DaemonAlreadyRunningError(existingPid);
    }
    removeFileIfPresent(pidPath);
  }
  writeFileSync(pidPath, String(pid), 'utf8');
}
