import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { resolve } from 'node:path';

export const MUXRAIL_CONFIG_FILE_NAME = 'muxrail.config.jsonc';

export interface MuxrailGestureConfig {
  readonly longPressMs: number;
  readonly doubleTapWindowMs: number;
  readonly doubleTapDistance: number;
  readonly movementTolerance: number;
  readonly dragToleranceCols: number;
  readonly dragToleranceRows: number;
  readonly edgeZoneCols: number;
  readonly edgeZoneActions: readonly string[];
}

export interface MuxrailRendererConfig {
  readonly connectAttempts: number;
  readonly connectRetryDelayMs: number;
  readonly reconnectDelayMs: number;
  readonly pingIntervalMs: number;
  readonly writeTimeoutMs: number;
}

export interface MuxrailServerConfig {
  readonly maxLineBytes: number;
  readonly writeTimeoutMs: number;
  readonly maxConnectionBufferedBytes: number;
}

interface MuxrailPerfConfig {
  readonly enabled: boolean;
  readonly filePath: string;
}

interface MuxrailDebugConfig {
  readonly perf: MuxrailPerfConfig;
}

export interface MuxrailConfig {
  readonly gesture: MuxrailGestureConfig;
  readonly renderer: MuxrailRendererConfig;
  readonly server: MuxrailServerConfig;
  readonly debug: MuxrailDebugConfig;
}

interface LoadedMuxrailConfig {
  readonly filePath: string;
  readonly config: MuxrailConfig;
  readonly error: string | null;
}

export const DEFAULT_MUXRAIL_CONFIG: MuxrailConfig = {
  gesture: {
    longPressMs: 500,
    doubleTapWindowMs: 300,
    doubleTapDistance: 3,
    movementTolerance: 5,
    dragToleranceCols: 5,
    dragToleranceRows: 2,
    edgeZoneCols: 3,
    edgeZoneActions: ['select_window', 'toggle_or_select_window', 'select_pane', 'toggle_group'],
  },
  renderer: {
    connectAttempts: 10,
    connectRetryDelayMs: 100,
    reconnectDelayMs: 1000,
    pingIntervalMs: 1000,
    writeTimeoutMs: 1000,
  },
  server: {
    maxLineBytes: 1024 * 1024,
    writeTimeoutMs: 1000,
    maxConnectionBufferedBytes: 4 * 1024 * 1024,
  },
  debug: {
    perf: {
      enabled: false,
      filePath: 'muxrail-perf.jsonl',
    },
  },
};

function stripJsoncComments(text: string): string {
  let output = '';
  let inString = false;
  let inLineComment = false;
  let inBlockComment = false;
  let escaped = false;

  for (let idx = 0; idx < text.length; idx += 1) {
    const char = text.charAt(idx);
    const next = text.charAt(idx + 1);

    if (inLineComment) {
      if (char === '\n') {
        inLineComment = false;
        output += char;
      }
      continue;
    }

    if (inBlockComment) {
      if (char === '*' && next === '/') {
        inBlockComment = false;
        idx += 1;
      }
      continue;
    }

    if (inString) {
      output += char;
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      output += char;
      continue;
    }

    if (char === '/' && next === '/') {
      inLineComment = true;
      idx += 1;
      continue;
    }

    if (char === '/' && next === '*') {
      inBlockComment = true;
      idx += 1;
      continue;
    }

    output += char;
  }

  return output;
}

function stripTrailingCommas(text: string): string {
  let output = '';
  let inString = false;
  let escaped = false;

  for (let idx = 0; idx < text.length; idx += 1) {
    const char = text.charAt(idx);
    if (inString) {
      output += char;
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      output += char;
      continue;
    }

    if (char === ',') {
      let lookahead = idx + 1;
      while (lookahead < text.length && /\s/.test(text.charAt(lookahead))) {
        lookahead += 1;
      }
      const closing = text.charAt(lookahead);
      if (closing === '}' || closing === ']') {
        continue;
      }
    }

    output += char;
  }

  return output;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function normalizeNonNegativeInt(value: unknown, fallback: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  const normalized = Math.floor(value);
  return normalized < 0 ? fallback : normalized;
}

function normalizePositiveInt(value: unknown, fallback: number): number {
  const normalized = normalizeNonNegativeInt(value, fallback);
  return normalized === 0 ? fallback : normalized;
}

function normalizeStringList(value: unknown, fallback: readonly string[]): readonly string[] {
  if (!Array.isArray(value)) {
    return fallback;
  }
  return value
    .flatMap((entry) => (typeof entry === 'string' ? [entry.trim()] : []))
    .filter((entry) => entry.length > 0);
}

function normalizeGestureConfig(input: unknown): MuxrailGestureConfig {
  const defaults = DEFAULT_MUXRAIL_CONFIG.gesture;
  if (!isRecord(input)) {
    return defaults;
  }
  return {
    longPressMs: normalizePositiveInt(input['longPressMs'], defaults.longPressMs),
    doubleTapWindowMs: normalizeNonNegativeInt(input['doubleTapWindowMs'], defaults.doubleTapWindowMs),
    doubleTapDistance: normalizeNonNegativeInt(input['doubleTapDistance'], defaults.doubleTapDistance),
    movementTolerance: normalizeNonNegativeInt(input['movementTolerance'], defaults.movementTolerance),
    dragToleranceCols: normalizeNonNegativeInt(input['dragToleranceCols'], defaults.dragToleranceCols),
    dragToleranceRows: normalizeNonNegativeInt(input['dragToleranceRows'], defaults.dragToleranceRows),
    edgeZoneCols: normalizeNonNegativeInt(input['edgeZoneCols'], defaults.edgeZoneCols),
    edgeZoneActions: normalizeStringList(input['edgeZoneActions'], defaults.edgeZoneActions),
  };
}

function normalizeRendererConfig(input: unknown): MuxrailRendererConfig {
  const defaults = DEFAULT_MUXRAIL_CONFIG.renderer;
  if (!isRecord(input)) {
    return defaults;
  }
  return {
    connectAttempts: normalizePositiveInt(input['connectAttempts'], defaults.connectAttempts),
    connectRetryDelayMs: normalizePositiveInt(input['connectRetryDelayMs'], defaults.connectRetryDelayMs),
    reconnectDelayMs: normalizePositiveInt(input['reconnectDelayMs'], defaults.reconnectDelayMs),
    pingIntervalMs: normalizePositiveInt(input['pingIntervalMs'], defaults.pingIntervalMs),
    writeTimeoutMs: normalizePositiveInt(input['writeTimeoutMs'], defaults.writeTimeoutMs),
  };
}

function normalizeServerConfig(input: unknown): MuxrailServerConfig {
  const defaults = DEFAULT_MUXRAIL_CONFIG.server;
  if (!isRecord(input)) {
    return defaults;
  }
  return {
    maxLineBytes: normalizePositiveInt(input['maxLineBytes'], defaults.maxLineBytes),
    writeTimeoutMs: normalizePositiveInt(input['writeTimeoutMs'], defaults.writeTimeoutMs),
    maxConnectionBufferedBytes: normalizePositiveInt(
      input['maxConnectionBufferedBytes'],
      defaults.maxConnectionBufferedBytes,
    ),
  };
}

function normalizePerfConfig(input: unknown): MuxrailPerfConfig {
  const defaults = DEFAULT_MUXRAIL_CONFIG.debug.perf;
  if (!isRecord(input)) {
    return defaults;
  }
  const enabled = typeof input['enabled'] === 'boolean' ? input['enabled'] : defaults.enabled;
  const filePathRaw = input['filePath'];
  const filePath =
    typeof filePathRaw === 'string' && filePathRaw.trim().length > 0
      ? filePathRaw.trim()
      : defaults.filePath;
  return {
    enabled,
    filePath,
  };
}

export function parseMuxrailConfigText(text: string): MuxrailConfig {
  const parsed: unknown = JSON.parse(stripTrailingCommas(stripJsoncComments(text)));
  if (!isRecord(parsed)) {
    return DEFAULT_MUXRAIL_CONFIG;
  }
  const debug = isRecord(parsed['debug']) ? parsed['debug'] : null;
  return {
    gesture: normalizeGestureConfig(parsed['gesture']),
    renderer: normalizeRendererConfig(parsed['renderer']),
    server: normalizeServerConfig(parsed['server']),
    debug: {
      perf: debug === null ? DEFAULT_MUXRAIL_CONFIG.debug.perf : normalizePerfConfig(debug['perf']),
    },
  };
}

function readNonEmptyEnv(value: string | undefined): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? null : trimmed;
}

export function resolveMuxrailConfigDirectory(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = readNonEmptyEnv(env.MUXRAIL_CONFIG_DIR);
  if (explicit !== null) {
    return resolve(explicit);
  }
  const xdgConfigHome = readNonEmptyEnv(env.XDG_CONFIG_HOME);
  if (xdgConfigHome !== null) {
    return resolve(xdgConfigHome, 'muxrail');
  }
  return resolve(readNonEmptyEnv(env.HOME) ?? homedir(), '.config', 'muxrail');
}

export function resolveMuxrailConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return resolve(resolveMuxrailConfigDirectory(env), MUXRAIL_CONFIG_FILE_NAME);
}

export function loadMuxrailConfig(options?: {
  filePath?: string;
  env?: NodeJS.ProcessEnv;
}): LoadedMuxrailConfig {
  const filePath = options?.filePath ?? resolveMuxrailConfigPath(options?.env);
  if (!existsSync(filePath)) {
    return {
      filePath,
      config: DEFAULT_MUXRAIL_CONFIG,
      error: null,
    };
  }
  try {
    return {
      filePath,
      config: parseMuxrailConfigText(readFileSync(filePath, 'utf8')),
      error: null,
    };
  } catch (error: unknown) {
    return {
      filePath,
      config: DEFAULT_MUXRAIL_CONFIG,
      error: String(error),
    };
  }
}
