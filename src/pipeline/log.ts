/* Lightweight structured logger with step timing; one instance is handed to each component */
import { performance } from 'perf_hooks';
import fs from 'fs';
import path from 'path';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'critical'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogFormat = 'json' | 'pretty';
export type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  critical: 50,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function levelOrder(level: LogLevel): number {
  return LEVEL_ORDER[level];
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  filePath?: string;
  // Console sink; defaults to console.log
  write?: (line: string) => void;
}

export interface LogRecord extends LogMeta {
  t: string;
  level: LogLevel;
  msg: string;
}

export interface StepTimer {
  end: (meta?: LogMeta) => number;
}

function ts() { return new Date().toISOString(); }

function color(level: LogLevel, s: string) {
  const map: Record<LogLevel, string> = {
    debug: '\u001b[90m',
    info: '\u001b[36m',
    warn: '\u001b[33m',
    error: '\u001b[31m',
    critical: '\u001b[35m',
  };
  const reset = '\u001b[0m';
  return map[level] + s + reset;
}

export class Logger {
  private level: LogLevel;
  private readonly format: LogFormat;
  private readonly write: (line: string) => void;
  private logFileFd: number | null = null;
  private logFilePath: string | null = null;

  constructor(opts: LoggerOptions = {}) {
    this.level = opts.level ?? 'info';
    this.format = opts.format ?? 'json';
    // eslint-disable-next-line no-console
    this.write = opts.write ?? ((line) => console.log(line));
    if (opts.filePath) this.setLogFile(opts.filePath);
  }

  setLevel(l: LogLevel) {
    this.level = l;
  }

  get file(): string | null {
    return this.logFilePath;
  }

  setLogFile(filePath: string) {
    try {
      this.close();
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      this.logFileFd = fs.openSync(filePath, 'a');
      this.logFilePath = filePath;
    } catch (e) {
      // eslint-disable-next-line no-console
      console.error('Failed to open log file', filePath, e);
    }
  }

  close() {
    if (this.logFileFd !== null) {
      fs.closeSync(this.logFileFd);
      this.logFileFd = null;
      this.logFilePath = null;
    }
  }

  log(level: LogLevel, msg: string, meta?: LogMeta) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    const payload: LogRecord = { t: ts(), level, msg, ...(meta || {}) };
    const json = JSON.stringify(payload);
    if (this.format === 'json') {
      this.write(json);
    } else {
      const base = `${payload.t} ${level.toUpperCase()} ${msg}`;
      const metaStr = meta && Object.keys(meta).length ? ' ' + JSON.stringify(meta) : '';
      this.write(color(level, base) + metaStr);
    }
    if (this.logFileFd !== null) {
      fs.writeSync(this.logFileFd, json + '\n');
    }
  }

  debug(msg: string, meta?: LogMeta) {
    this.log('debug', msg, meta);
  }
  info(msg: string, meta?: LogMeta) {
    this.log('info', msg, meta);
  }
  warn(msg: string, meta?: LogMeta) {
    this.log('warn', msg, meta);
  }
  error(msg: string, meta?: LogMeta) {
    this.log('error', msg, meta);
  }
  critical(msg: string, meta?: LogMeta) {
    this.log('critical', msg, meta);
  }

  startStep(name: string, meta?: LogMeta): StepTimer {
    const start = performance.now();
    this.info(`start:${name}`, meta);
    return {
      end: (extra?: LogMeta) => {
        const ms = Math.round(performance.now() - start);
        this.info(`end:${name}`, { ms, ...meta, ...extra });
        return ms;
      },
    };
  }
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  return new Logger(opts);
}

/** `workflow_<YYYYMMDD_HHMMSS>.log` inside logDir */
export function runLogPath(logDir: string, now: Date = new Date()): string {
  const p = (n: number) => String(n).padStart(2, '0');
  const stamp =
    `${now.getFullYear()}${p(now.getMonth() + 1)}${p(now.getDate())}_` +
    `${p(now.getHours())}${p(now.getMinutes())}${p(now.getSeconds())}`;
  return path.join(logDir, `workflow_${stamp}.log`);
}
