/**
 * In-process stand-ins for the SFTP server, the transcription engine and the HTTP API
 */

import fs from 'fs-extra';
import ky, { type KyInstance } from 'ky';
import os from 'os';
import path from 'path';
import { loadConfig, type Config } from '../src/pipeline/config';
import { readEnv } from '../src/pipeline/env';
import { Logger, type LogRecord } from '../src/pipeline/log';
import type { RemoteSession } from '../src/pipeline/remote';
import type { TranscriptionBackend } from '../src/pipeline/transcribe';
import type { RemoteEntry } from '../src/pipeline/types';

export interface MemoryLogger {
  logger: Logger;
  records: LogRecord[];
  messages: (level?: string) => string[];
}

export function memoryLogger(): MemoryLogger {
  const records: LogRecord[] = [];
  const logger = new Logger({
    level: 'debug',
    format: 'json',
    write: (line) => records.push(JSON.parse(line)),
  });
  return {
    logger,
    records,
    messages: (level) => records.filter((r) => !level || r.level === level).map((r) => r.msg),
  };
}

export async function tempDir(prefix = 'scanner-digest-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export interface FakeFile {
  name: string;
  modifyTime: number;
  content?: string;
  isFile?: boolean;
}

/**
 * Remote filesystem kept in a Map of absolute POSIX path -> file.
 */
export class FakeSession implements RemoteSession {
  readonly host = 'scanner.test';
  readonly files = new Map<string, FakeFile>();
  readonly dirs = new Set<string>();
  closeCount = 0;
  failOn: Partial<Record<'list' | 'download' | 'exists' | 'mkdir' | 'rename' | 'close', Error>> = {};
  // Bytes written locally before a failing download gives up
  partialBytes = 0;
  // Remote paths whose rename fails
  readonly renameFails = new Set<string>();

  constructor(dir: string, files: FakeFile[] = []) {
    this.dirs.add(dir);
    for (const f of files) this.files.set(path.posix.join(dir, f.name), f);
  }

  async list(dir: string): Promise<RemoteEntry[]> {
    if (this.failOn.list) throw this.failOn.list;
    const out: RemoteEntry[] = [];
    for (const [p, f] of this.files) {
      if (path.posix.dirname(p) === dir) {
        out.push({
          name: f.name,
          size: (f.content ?? '').length,
          modifyTime: f.modifyTime,
          isFile: f.isFile ?? true,
        });
      }
    }
    return out;
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    if (this.failOn.download) {
      if (this.partialBytes > 0) {
        const f = this.files.get(remotePath);
        await fs.writeFile(localPath, (f?.content ?? '').slice(0, this.partialBytes));
      }
      throw this.failOn.download;
    }
    const f = this.files.get(remotePath);
    if (!f) throw new Error(`No such file: ${remotePath}`);
    await fs.writeFile(localPath, f.content ?? '');
  }

  async exists(remotePath: string): Promise<boolean> {
    if (this.failOn.exists) throw this.failOn.exists;
    return this.dirs.has(remotePath) || this.files.has(remotePath);
  }

  async mkdir(remotePath: string): Promise<void> {
    if (this.failOn.mkdir) throw this.failOn.mkdir;
    this.dirs.add(remotePath);
  }

  async rename(from: string, to: string): Promise<void> {
    if (this.failOn.rename) throw this.failOn.rename;
    if (this.renameFails.has(from)) throw new Error(`Permission denied: ${from}`);
    const f = this.files.get(from);
    if (!f) throw new Error(`No such file: ${from}`);
    this.files.delete(from);
    this.files.set(to, f);
  }

  async close(): Promise<void> {
    this.closeCount += 1;
    if (this.failOn.close) throw this.failOn.close;
  }
}

export function fakeBackend(
  run: () => unknown,
  calls: Array<{ audioPath: string; language: string }> = []
): TranscriptionBackend {
  return {
    name: 'fake@test',
    check: async () => {},
    transcribe: async (audioPath, language) => {
      calls.push({ audioPath, language });
      return run();
    },
  };
}

export interface CapturedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

/**
 * ky instance whose transport is a local function instead of the network.
 */
export function fakeHttp(
  respond: (req: CapturedRequest) => Response | Promise<Response>,
  captured: CapturedRequest[] = []
): KyInstance {
  return ky.create({
    retry: 0,
    fetch: async (input: string | URL | Request, init?: RequestInit) => {
      const request = input instanceof Request ? input : new Request(input, init);
      const text = await request.text();
      const req: CapturedRequest = {
        url: request.url,
        method: request.method,
        headers: request.headers,
        body: text ? JSON.parse(text) : undefined,
      };
      captured.push(req);
      return respond(req);
    },
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function testConfig(overrides: Parameters<typeof loadConfig>[0] = {}): Config {
  return loadConfig(
    {
      host: 'scanner.test',
      username: 'pi',
      keyPath: '/nonexistent/id_test',
      remoteDir: '/data/recordings',
      apiKey: 'sk-ant-test-secret',
      ...overrides,
    },
    readEnv({})
  );
}
