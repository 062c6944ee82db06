import { redactJsonSecrets } from '@/lib/redaction/redact-json';

export type LogLevel = 'debug' | 'info' | 'error';
export type ServiceName = 'vsphere-file';
export type DeployEnv = 'development' | 'test' | 'production';

export type LogEventInput = {
  event_type: string;
  level: LogLevel;
  service: ServiceName;
  message?: string;
} & Record<string, unknown>;

export type LogEvent = { event_type: string; message?: string } & Record<string, unknown>;

export type Logger = {
  debug: (event: LogEvent) => void;
  info: (event: LogEvent) => void;
  error: (event: LogEvent) => void;
};

const EXCERPT_LIMIT = 2000;

function getEnv(): DeployEnv {
  const env = process.env.NODE_ENV;
  if (env === 'production' || env === 'test' || env === 'development') return env;
  return 'development';
}

function getVersion() {
  return process.env.GIT_SHA ?? process.env.npm_package_version ?? 'unknown';
}

function levelRank(level: LogLevel): number {
  if (level === 'debug') return 10;
  if (level === 'info') return 20;
  return 30;
}

function truncateExcerptsDeep(input: unknown): unknown {
  if (Array.isArray(input)) return input.map((v) => truncateExcerptsDeep(v));
  if (!input || typeof input !== 'object') return input;

  const out: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(input)) {
    if (key.endsWith('_excerpt') && typeof value === 'string') {
      out[key] = value.length > EXCERPT_LIMIT ? value.slice(0, EXCERPT_LIMIT) : value;
      continue;
    }

    out[key] = truncateExcerptsDeep(value);
  }

  return out;
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return JSON.stringify({ ts: new Date().toISOString(), level: 'error', message: 'log serialization failed' });
  }
}

// stdout carries the plugin response, so log lines go to stderr.
function writeStderr(line: string) {
  console.error(line);
}

export function logEvent(input: LogEventInput, write: (line: string) => void = writeStderr) {
  const base = {
    ts: new Date().toISOString(),
    env: getEnv(),
    version: getVersion(),
    ...input,
  };

  const event = truncateExcerptsDeep(redactJsonSecrets(base));
  write(safeJson(event));
}

export function createLogger(args: {
  level: LogLevel;
  service?: ServiceName;
  /** Overrides the `env` field, which otherwise comes from `process.env.NODE_ENV`. */
  env?: DeployEnv;
  write?: (line: string) => void;
}): Logger {
  const service = args.service ?? 'vsphere-file';
  const minRank = levelRank(args.level);

  function emit(level: LogLevel, event: LogEvent) {
    if (levelRank(level) < minRank) return;
    logEvent({ ...event, ...(args.env ? { env: args.env } : {}), level, service }, args.write);
  }

  return {
    debug: (e) => emit('debug', e),
    info: (e) => emit('info', e),
    error: (e) => emit('error', e),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  error: () => {},
};
