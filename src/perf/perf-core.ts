import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname, resolve } from 'node:path';

type PerfAttrValue = boolean | number | string;
export type PerfAttrs = Readonly<Record<string, PerfAttrValue>>;

interface PerfCoreConfig {
  enabled: boolean;
  filePath?: string;
  sampleRates?: Readonly<Record<string, number>>;
}

interface PerfEventRecord {
  type: 'event';
  name: string;
  'ts-ms': number;
  pid: number;
  attrs?: PerfAttrs;
}

interface PerfSpanRecord {
  type: 'span';
  name: string;
  'span-id': string;
  'duration-ms': number;
  'end-ms': number;
  pid: number;
  attrs?: PerfAttrs;
}

type PerfRecord = PerfEventRecord | PerfSpanRecord;

const DEFAULT_FILE_PATH = 'muxrail-perf.jsonl';
const DEFAULT_MAX_PENDING_RECORDS = 2048;

// Fraction of records kept per event name.
const DEFAULT_EVENT_SAMPLE_RATES: Readonly<Record<string, number>> = {
  'renderer.pointer.motion': 0.05,
  'daemon.render.dedup-skip': 0.1,
};

const state: {
  enabled: boolean;
  filePath: string;
  fd: number | null;
  nextSpanId: number;
  flushTimer: NodeJS.Timeout | null;
  pendingRecords: string[];
  sampleRates: Readonly<Record<string, number>>;
  sampleCounters: Map<string, number>;
} = {
  enabled: false,
  filePath: DEFAULT_FILE_PATH,
  fd: null,
  nextSpanId: 1,
  flushTimer: null,
  pendingRecords: [],
  sampleRates: DEFAULT_EVENT_SAMPLE_RATES,
  sampleCounters: new Map(),
};

function ensureWriter(): void {
  if (!state.enabled || state.fd !== null) {
    return;
  }
  const resolvedPath = resolve(state.filePath);
  mkdirSync(dirname(resolvedPath), { recursive: true });
  state.fd = openSync(resolvedPath, 'a');
}

function flushPendingRecords(): void {
  if (state.fd === null || state.pendingRecords.length === 0) {
    return;
  }
  const chunk = state.pendingRecords.join('');
  state.pendingRecords.length = 0;
  writeSync(state.fd, chunk);
}

function closeWriter(): void {
  flushPendingRecords();
  if (state.flushTimer !== null) {
    clearTimeout(state.flushTimer);
    state.flushTimer = null;
  }
  if (state.fd === null) {
    return;
  }
  closeSync(state.fd);
  state.fd = null;
}

function scheduleFlush(): void {
  if (state.fd === null || state.flushTimer !== null) {
    return;
  }
  state.flushTimer = setTimeout(() => {
    state.flushTimer = null;
    flushPendingRecords();
  }, 0);
  state.flushTimer.unref();
}

function writeRecord(record: PerfRecord): void {
  ensureWriter();
  if (state.fd === null) {
    return;
  }
  if (state.pendingRecords.length >= DEFAULT_MAX_PENDING_RECORDS) {
    state.pendingRecords.shift();
  }
  state.pendingRecords.push(`${JSON.stringify(record)}\n`);
  scheduleFlush();
}

function shouldRecordEvent(name: string): boolean {
  const sampleRate = state.sampleRates[name];
  if (sampleRate === undefined || sampleRate >= 1) {
    return true;
  }
  if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
    return false;
  }
  const sampleEvery = Math.max(1, Math.floor(1 / sampleRate));
  const next = (state.sampleCounters.get(name) ?? 0) + 1;
  state.sampleCounters.set(name, next);
  return next % sampleEvery === 0;
}

export interface PerfSpan {
  end(extraAttrs?: PerfAttrs): void;
}

const NOOP_PERF_SPAN: PerfSpan = {
  end(): void {
    return;
  },
};

class ActivePerfSpan implements PerfSpan {
  private ended = false;
  private readonly startedAtNs = process.hrtime.bigint();
  private readonly spanId = `span-${String(state.nextSpanId++)}`;

  constructor(
    private readonly name: string,
    private readonly attrs: PerfAttrs | undefined,
  ) {}

  end(extraAttrs?: PerfAttrs): void {
    if (this.ended || !state.enabled) {
      return;
    }
    this.ended = true;
    const durationNs = process.hrtime.bigint() - this.startedAtNs;
    const record: PerfSpanRecord = {
      type: 'span',
      name: this.name,
      'span-id': this.spanId,
      'duration-ms': Number(durationNs) / 1_000_000,
      'end-ms': Date.now(),
      pid: process.pid,
    };
    const attrs =
      extraAttrs === undefined ? this.attrs : { ...(this.attrs ?? {}), ...extraAttrs };
    if (attrs !== undefined) {
      record.attrs = attrs;
    }
    writeRecord(record);
  }
}

export function configurePerfCore(config: PerfCoreConfig): void {
  const nextFilePath = config.filePath ?? state.filePath;
  if (resolve(nextFilePath) !== resolve(state.filePath) || !config.enabled) {
    closeWriter();
  }
  state.enabled = config.enabled;
  state.filePath = nextFilePath;
  state.sampleRates = config.sampleRates ?? DEFAULT_EVENT_SAMPLE_RATES;
  state.sampleCounters.clear();
  if (state.enabled) {
    ensureWriter();
  }
}

export function isPerfCoreEnabled(): boolean {
  return state.enabled;
}

export function startPerfSpan(name: string, attrs?: PerfAttrs): PerfSpan {
  if (!state.enabled) {
    return NOOP_PERF_SPAN;
  }
  return new ActivePerfSpan(name, attrs);
}

export function recordPerfEvent(name: string, attrs?: PerfAttrs): void {
  if (!state.enabled || !shouldRecordEvent(name)) {
    return;
  }
  const record: PerfEventRecord = {
    type: 'event',
    name,
    'ts-ms': Date.now(),
    pid: process.pid,
  };
  if (attrs !== undefined) {
    record.attrs = attrs;
  }
  writeRecord(record);
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function recordPerfError(name: string, error: unknown, attrs?: PerfAttrs): void {
  recordPerfEvent(name, {
    ...(attrs ?? {}),
    message: errorMessage(error),
  });
}

export function shutdownPerfCore(): void {
  closeWriter();
}
