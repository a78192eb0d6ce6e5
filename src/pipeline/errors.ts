/**
 * Error classes for the scanner-digest pipeline
 */

import type { LogMeta } from './log';
import type { RunOutcome } from './types';

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  details?: LogMeta;

  constructor(message: string, details?: LogMeta, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    const parts = [`${this.name}: ${this.message}`];
    if (this.details && Object.keys(this.details).length) {
      parts.push(JSON.stringify(this.details));
    }
    return parts.join(' ');
  }
}

/**
 * Missing or invalid configuration
 */
export class ConfigError extends PipelineError {
  constructor(message: string, details?: LogMeta) {
    super(message, details);
    this.name = 'ConfigError';
  }
}

/**
 * SSH private key absent or unreadable
 */
export class KeyFileError extends PipelineError {
  keyPath: string;

  constructor(message: string, keyPath: string, options?: { cause?: unknown }) {
    super(message, { keyPath }, options);
    this.name = 'KeyFileError';
    this.keyPath = keyPath;
  }
}

/**
 * SSH/SFTP session could not be established
 */
export class ConnectionError extends PipelineError {
  host: string;

  constructor(message: string, host: string, options?: { cause?: unknown }) {
    super(message, { host }, options);
    this.name = 'ConnectionError';
    this.host = host;
  }
}

/**
 * Local artifact directories could not be created
 */
export class StorageError extends PipelineError {
  constructor(message: string, dir: string, options?: { cause?: unknown }) {
    super(message, { dir }, options);
    this.name = 'StorageError';
  }
}

/**
 * Transcription engine cannot be loaded
 */
export class EngineUnavailableError extends PipelineError {
  constructor(message: string, details?: LogMeta, options?: { cause?: unknown }) {
    super(message, details, options);
    this.name = 'EngineUnavailableError';
  }
}

/**
 * Transcription engine produced no usable output
 */
export class TranscriptionError extends PipelineError {
  constructor(message: string, details?: LogMeta, options?: { cause?: unknown }) {
    super(message, details, options);
    this.name = 'TranscriptionError';
  }
}

export const EXIT_CODES = {
  ok: 0,
  error: 1,
  connectFailed: 2,
  transcriptionFailed: 3,
  summaryFailed: 4,
  startupFailed: 5,
} as const;

export function exitCodeForOutcome(outcome: RunOutcome): number {
  switch (outcome) {
    case 'completed':
    case 'no-recording':
      return EXIT_CODES.ok;
    case 'connect-failed':
      return EXIT_CODES.connectFailed;
    case 'transcription-failed':
      return EXIT_CODES.transcriptionFailed;
    case 'summary-failed':
      return EXIT_CODES.summaryFailed;
    case 'error':
      return EXIT_CODES.error;
  }
}

/**
 * Exit code for an error thrown before a run could start
 */
export function exitCodeForError(e: unknown): number {
  if (
    e instanceof ConfigError ||
    e instanceof KeyFileError ||
    e instanceof StorageError ||
    e instanceof EngineUnavailableError
  ) {
    return EXIT_CODES.startupFailed;
  }
  if (e instanceof ConnectionError) return EXIT_CODES.connectFailed;
  return EXIT_CODES.error;
}

function readString(obj: object, key: string): string | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === 'string' && value ? value : undefined;
}

/**
 * Flatten any thrown value into log metadata. Child-process failures (execa) keep
 * their exit code and the tail of their output.
 */
export function describeError(e: unknown): LogMeta {
  if (!(e instanceof Error)) return { error: String(e) };
  const meta: LogMeta = {
    error: readString(e, 'shortMessage') ?? e.message,
    errorName: e.name,
  };
  const exitCode: unknown = Reflect.get(e, 'exitCode');
  if (typeof exitCode === 'number') meta.exitCode = exitCode;
  const stderr = readString(e, 'stderr');
  if (stderr) meta.stderrSnippet = stderr.slice(-800);
  const stdout = readString(e, 'stdout');
  if (stdout) meta.stdoutSnippet = stdout.slice(-400);
  if (e instanceof PipelineError && e.details) Object.assign(meta, e.details);
  if (e.cause !== undefined) meta.cause = e.cause instanceof Error ? e.cause.message : String(e.cause);
  return meta;
}

/**
 * describeError plus the stack, for debug-level diagnostics
 */
export function diagnose(e: unknown): LogMeta {
  return e instanceof Error && e.stack ? { ...describeError(e), stack: e.stack } : describeError(e);
}
