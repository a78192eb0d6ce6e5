import fs from 'fs-extra';
import path from 'path';
import SftpClient from 'ssh2-sftp-client';
import { ConnectionError, KeyFileError, describeError, diagnose } from './errors';
import type { Logger } from './log';
import type { RemoteEntry } from './types';

export interface ConnectOptions {
  host: string;
  port: number;
  username: string;
  privateKey: Buffer;
  readyTimeoutMs: number;
}

/**
 * One authenticated SFTP session. Paths are POSIX paths on the remote host.
 */
export interface RemoteSession {
  readonly host: string;
  list(dir: string): Promise<RemoteEntry[]>;
  download(remotePath: string, localPath: string): Promise<void>;
  exists(remotePath: string): Promise<boolean>;
  mkdir(remotePath: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  close(): Promise<void>;
}

export type SessionOpener = (opts: ConnectOptions) => Promise<RemoteSession>;

class SftpSession implements RemoteSession {
  constructor(
    private readonly client: SftpClient,
    readonly host: string
  ) {}

  async list(dir: string): Promise<RemoteEntry[]> {
    const entries = await this.client.list(dir);
    return entries.map((e) => ({
      name: e.name,
      size: e.size,
      modifyTime: e.modifyTime,
      isFile: e.type === '-',
    }));
  }

  async download(remotePath: string, localPath: string): Promise<void> {
    await this.client.fastGet(remotePath, localPath);
  }

  async exists(remotePath: string): Promise<boolean> {
    // false only for "no such file"; other failures reject
    return (await this.client.exists(remotePath)) !== false;
  }

  async mkdir(remotePath: string): Promise<void> {
    await this.client.mkdir(remotePath, true);
  }

  async rename(from: string, to: string): Promise<void> {
    await this.client.rename(from, to);
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

/**
 * No hostVerifier is installed, so ssh2 accepts whatever host key the server
 * presents (trust on first use, no pinning).
 */
export const openSftpSession: SessionOpener = async (opts) => {
  const client = new SftpClient();
  await client.connect({
    host: opts.host,
    port: opts.port,
    username: opts.username,
    privateKey: opts.privateKey,
    readyTimeout: opts.readyTimeoutMs,
  });
  return new SftpSession(client, opts.host);
};

export interface RemoteFileSourceOptions {
  logger: Logger;
  extensions: readonly string[];
  cleanup: boolean;
  archiveDirName?: string;
  port?: number;
  connectTimeoutMs?: number;
  open?: SessionOpener;
}

export function matchesExtension(name: string, extensions: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext.toLowerCase()));
}

/**
 * Newest entry by modification time. Entries sharing the newest time are ordered by
 * name and the greatest wins, so the result does not depend on listing order.
 */
export function selectNewest(entries: readonly RemoteEntry[]): RemoteEntry | null {
  let best: RemoteEntry | null = null;
  for (const e of entries) {
    if (
      !best ||
      e.modifyTime > best.modifyTime ||
      (e.modifyTime === best.modifyTime && e.name > best.name)
    ) {
      best = e;
    }
  }
  return best;
}

/** Archive directory is a sibling of remoteDir: /data/recordings -> /data/archive */
export function archiveDirFor(remoteDir: string, archiveDirName: string): string {
  const trimmed = remoteDir.replace(/\/+$/, '') || '/';
  return path.posix.join(path.posix.dirname(trimmed), archiveDirName);
}

export class RemoteFileSource {
  private readonly logger: Logger;
  private readonly extensions: readonly string[];
  private readonly cleanup: boolean;
  private readonly archiveDirName: string;
  private readonly port: number;
  private readonly connectTimeoutMs: number;
  private readonly open: SessionOpener;

  constructor(opts: RemoteFileSourceOptions) {
    this.logger = opts.logger;
    this.extensions = opts.extensions;
    this.cleanup = opts.cleanup;
    this.archiveDirName = opts.archiveDirName ?? 'archive';
    this.port = opts.port ?? 22;
    this.connectTimeoutMs = opts.connectTimeoutMs ?? 20_000;
    this.open = opts.open ?? openSftpSession;
  }

  async connect(host: string, username: string, keyPath: string): Promise<RemoteSession> {
    let privateKey: Buffer;
    try {
      privateKey = await fs.readFile(keyPath);
    } catch (e) {
      this.logger.critical('remote.key.fail', { keyPath, ...describeError(e) });
      throw new KeyFileError(`SSH key not readable at ${keyPath}`, keyPath, { cause: e });
    }
    const timer = this.logger.startStep('remote.connect', { host, username, port: this.port });
    try {
      const session = await this.open({
        host,
        port: this.port,
        username,
        privateKey,
        readyTimeoutMs: this.connectTimeoutMs,
      });
      timer.end();
      return session;
    } catch (e) {
      this.logger.error('remote.connect.fail', { host, ...describeError(e) });
      this.logger.debug('remote.connect.fail.detail', diagnose(e));
      throw new ConnectionError(`SSH connection to ${host} failed`, host, { cause: e });
    }
  }

  private async listMatching(session: RemoteSession, remoteDir: string): Promise<RemoteEntry[]> {
    const entries = await session.list(remoteDir);
    return entries.filter((e) => e.isFile && matchesExtension(e.name, this.extensions));
  }

  async fetchNewest(
    session: RemoteSession,
    remoteDir: string,
    destDir: string
  ): Promise<string | null> {
    let localPath: string | null = null;
    try {
      const files = await this.listMatching(session, remoteDir);
      const newest = selectNewest(files);
      if (!newest) {
        this.logger.warn('remote.fetch.none', { remoteDir, extensions: this.extensions });
        return null;
      }
      localPath = path.join(destDir, newest.name);
      const timer = this.logger.startStep('remote.fetch', {
        file: newest.name,
        size: newest.size,
        candidates: files.length,
      });
      await fs.ensureDir(destDir);
      await session.download(path.posix.join(remoteDir, newest.name), localPath);
      timer.end({ localPath });
      return localPath;
    } catch (e) {
      this.logger.error('remote.fetch.fail', { remoteDir, ...describeError(e) });
      this.logger.debug('remote.fetch.fail.detail', diagnose(e));
      // an interrupted transfer must not leave a truncated recording behind
      if (localPath) await this.discardPartial(localPath);
      return null;
    }
  }

  /**
   * Moves every matching recording out of remoteDir. Does nothing unless cleanup is on;
   * never throws. Returns the number of files moved, including those moved before a failure.
   */
  async archive(session: RemoteSession, remoteDir: string): Promise<number> {
    if (!this.cleanup) return 0;
    const archiveDir = archiveDirFor(remoteDir, this.archiveDirName);
    let moved = 0;
    try {
      if (!(await session.exists(archiveDir))) {
        await session.mkdir(archiveDir);
        this.logger.info('remote.archive.mkdir', { archiveDir });
      }
      const files = await this.listMatching(session, remoteDir);
      for (const f of files) {
        await session.rename(
          path.posix.join(remoteDir, f.name),
          path.posix.join(archiveDir, f.name)
        );
        moved += 1;
      }
      this.logger.info('remote.archive.done', { archiveDir, moved });
      return moved;
    } catch (e) {
      this.logger.error('remote.archive.fail', { archiveDir, moved, ...describeError(e) });
      this.logger.debug('remote.archive.fail.detail', diagnose(e));
      return moved;
    }
  }

  private async discardPartial(localPath: string): Promise<void> {
    try {
      await fs.remove(localPath);
    } catch (e) {
      this.logger.warn('remote.fetch.cleanup.fail', { localPath, ...describeError(e) });
    }
  }

  /** Ends the session; a failure to close is logged, not thrown. */
  async close(session: RemoteSession): Promise<void> {
    try {
      await session.close();
      this.logger.info('remote.closed', { host: session.host });
    } catch (e) {
      this.logger.error('remote.close.fail', { host: session.host, ...describeError(e) });
    }
  }
}
