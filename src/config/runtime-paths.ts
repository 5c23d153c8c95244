import { tmpdir } from 'node:os';
import { resolve } from 'node:path';

export const DEFAULT_SESSION_ID = 'default';

export interface DaemonRuntimePaths {
  readonly sessionId: string;
  readonly socketPath: string;
  readonly pidPath: string;
}

export function sanitizeSessionToken(value: string | undefined): string {
  const sanitized = (value ?? '').trim().replace(/[^A-Za-z0-9._-]+/g, '-');
  if (sanitized.length === 0) {
    return DEFAULT_SESSION_ID;
  }
  return sanitized;
}

export function resolveRuntimeDirectory(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env.MUXRAIL_RUNTIME_DIR?.trim() ?? '';
  if (explicit.length > 0) {
    return resolve(explicit);
  }
  return tmpdir();
}

export function resolveDaemonRuntimePaths(
  sessionId: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): DaemonRuntimePaths {
  const token = sanitizeSessionToken(sessionId);
  const directory = resolveRuntimeDirectory(env);
  return {
    sessionId: token,
    socketPath: resolve(directory, `muxrail-daemon-${token}.sock`),
    pidPath: resolve(directory, `muxrail-daemon-${token}.pid`),
  };
}
