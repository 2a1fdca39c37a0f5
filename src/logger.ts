// src/logger.ts
import { describeError } from './errors.ts';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogData = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLevel(value: string): value is keyof typeof LEVEL_ORDER {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/** Citit la fiecare apel, ca testele să poată schimba nivelul din env. */
function minLevel(): number {
  const env = process.env.LOG_LEVEL?.toLowerCase();
  return env && isLevel(env) ? LEVEL_ORDER[env] : LEVEL_ORDER.info;
}

/** format compact k=v k=v … */
export function fmtKV(data?: LogData): string {
  if (!data) return '';
  return Object.entries(data)
    .map(([k, v]) => {
      if (v === null || v === undefined) return `${k}=null`;
      if (v instanceof Error) return `${k}=${JSON.stringify(describeError(v))}`;
      return `${k}=${JSON.stringify(v)}`;
    })
    .join(' ');
}

export function formatLine(level: LogLevel, module: string, event: string, data?: LogData): string {
  const ts = new Date().toISOString();
  const kv = fmtKV(data);
  return `[${ts}] ${level.toUpperCase().padEnd(5)} ${module} ${event}` + (kv ? '  ' + kv : '');
}

export interface Logger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
}

export function createLogger(module: string): Logger {
  const write = (level: LogLevel, event: string, data?: LogData) => {
    if (LEVEL_ORDER[level] < minLevel()) return;
    const line = formatLine(level, module, event, data);
    if (level === 'warn' || level === 'error') console.error(line);
    else console.log(line);
  };
  return {
    debug: (event, data) => write('debug', event, data),
    info: (event, data) => write('info', event, data),
    warn: (event, data) => write('warn', event, data),
    error: (event, data) => write('error', event, data),
  };
}
