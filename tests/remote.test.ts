import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import {
  RemoteFileSource,
  archiveDirFor,
  matchesExtension,
  selectNewest,
  type ConnectOptions,
} from '../src/pipeline/remote';
import { ConnectionError, KeyFileError } from '../src/pipeline/errors';
import { FakeSession, memoryLogger, tempDir, type MemoryLogger } from './helpers';

const REMOTE_DIR = '/data/recordings';

function entry(name: string, modifyTime: number) {
  return { name, modifyTime, size: 1, isFile: true };
}

describe('selectNewest', () => {
  it('picks the newest file regardless of listing order', () => {
    const orders = [
      [entry('A.wav', 10), entry('B.wav', 30), entry('C.wav', 20)],
      [entry('C.wav', 20), entry('A.wav', 10), entry('B.wav', 30)],
      [entry('B.wav', 30), entry('C.wav', 20), entry('A.wav', 10)],
    ];
    for (const list of orders) {
      expect(selectNewest(list)?.name).toBe('B.wav');
    }
  });

  it('breaks ties by the greatest name', () => {
    expect(selectNewest([entry('b.wav', 50), entry('c.wav', 50), entry('a.wav', 50)])?.name).toBe('c.wav');
    expect(selectNewest([entry('c.wav', 50), entry('a.wav', 50)])?.name).toBe('c.wav');
  });

  it('returns null for an empty list', () => {
    expect(selectNewest([])).toBeNull();
  });
});

describe('matchesExtension', () => {
  it('compares extensions case-insensitively', () => {
    expect(matchesExtension('R1.WAV', ['.wav'])).toBe(true);
    expect(matchesExtension('r1.mp3', ['.wav'])).toBe(false);
    expect(matchesExtension('r1.mp3', ['.wav', '.mp3'])).toBe(true);
  });
});

describe('archiveDirFor', () => {
  it('places the archive beside the recordings directory', () => {
    expect(archiveDirFor('/data/recordings', 'archive')).toBe('/data/archive');
    expect(archiveDirFor('/data/recordings/', 'archive')).toBe('/data/archive');
    expect(archiveDirFor('recordings', 'old')).toBe('old');
  });
});

describe('RemoteFileSource', () => {
  let local: string;
  let log: MemoryLogger;

  beforeEach(async () => {
    local = await tempDir();
    log = memoryLogger();
  });

  afterEach(async () => {
    await fs.remove(local);
  });

  function source(opts: { cleanup?: boolean; open?: (o: ConnectOptions) => Promise<FakeSession> } = {}) {
    return new RemoteFileSource({
      logger: log.logger,
      extensions: ['.wav'],
      cleanup: opts.cleanup ?? false,
      open: opts.open,
    });
  }

  describe('connect', () => {
    it('reads the key file and opens a session', async () => {
      const keyPath = path.join(local, 'id_test');
      await fs.writeFile(keyPath, 'test-key-material');
      const session = new FakeSession(REMOTE_DIR);
      const open = vi.fn(async (_o: ConnectOptions) => session);

      const result = await source({ open }).connect('scanner.test', 'pi', keyPath);

      expect(result).toBe(session);
      expect(open).toHaveBeenCalledTimes(1);
      const opts = open.mock.calls[0][0];
      expect(opts.host).toBe('scanner.test');
      expect(opts.username).toBe('pi');
      expect(opts.port).toBe(22);
      expect(opts.privateKey.toString()).toBe('test-key-material');
    });

    it('fails with KeyFileError when the key is missing', async () => {
      const open = vi.fn(async (_o: ConnectOptions) => new FakeSession(REMOTE_DIR));
      await expect(
        source({ open }).connect('scanner.test', 'pi', path.join(local, 'missing'))
      ).rejects.toBeInstanceOf(KeyFileError);
      expect(open).not.toHaveBeenCalled();
    });

    it('wraps connection failures in ConnectionError', async () => {
      const keyPath = path.join(local, 'id_test');
      await fs.writeFile(keyPath, 'test-key-material');
      const open = vi.fn(async (_o: ConnectOptions): Promise<FakeSession> => {
        throw new Error('Timed out while waiting for handshake');
      });
      const err = await source({ open })
        .connect('scanner.test', 'pi', keyPath)
        .catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ConnectionError);
      expect(log.messages('error')).toContain('remote.connect.fail');
    });
  });

  describe('fetchNewest', () => {
    it('downloads the newest matching file under its own name', async () => {
      const session = new FakeSession(REMOTE_DIR, [
        { name: 'A.wav', modifyTime: 10, content: 'aaa' },
        { name: 'B.wav', modifyTime: 30, content: 'bbb' },
        { name: 'C.wav', modifyTime: 20, content: 'ccc' },
        { name: 'notes.txt', modifyTime: 99, content: 'skip' },
      ]);
      const localPath = await source().fetchNewest(session, REMOTE_DIR, local);
      expect(localPath).toBe(path.join(local, 'B.wav'));
      expect(await fs.readFile(path.join(local, 'B.wav'), 'utf8')).toBe('bbb');
    });

    it('ignores directories that look like recordings', async () => {
      const session = new FakeSession(REMOTE_DIR, [
        { name: 'old.wav', modifyTime: 10, content: 'old' },
        { name: 'folder.wav', modifyTime: 50, isFile: false },
      ]);
      expect(await source().fetchNewest(session, REMOTE_DIR, local)).toBe(path.join(local, 'old.wav'));
    });

    it('returns null and warns when nothing matches', async () => {
      const session = new FakeSession(REMOTE_DIR, [{ name: 'notes.txt', modifyTime: 1 }]);
      expect(await source().fetchNewest(session, REMOTE_DIR, local)).toBeNull();
      expect(log.messages('warn')).toEqual(['remote.fetch.none']);
    });

    it('returns null when the transfer fails', async () => {
      const session = new FakeSession(REMOTE_DIR, [{ name: 'r1.wav', modifyTime: 1 }]);
      session.failOn.download = new Error('Permission denied');
      expect(await source().fetchNewest(session, REMOTE_DIR, local)).toBeNull();
      expect(log.messages('error')).toEqual(['remote.fetch.fail']);
    });

    it('removes a partially downloaded recording', async () => {
      const session = new FakeSession(REMOTE_DIR, [{ name: 'r1.wav', modifyTime: 1, content: 'RIFF0000data' }]);
      session.failOn.download = new Error('Connection reset');
      session.partialBytes = 4;
      expect(await source().fetchNewest(session, REMOTE_DIR, local)).toBeNull();
      expect(await fs.pathExists(path.join(local, 'r1.wav'))).toBe(false);
    });
  });

  describe('archive', () => {
    it('does nothing unless cleanup is enabled', async () => {
      const session = new FakeSession(REMOTE_DIR, [{ name: 'r1.wav', modifyTime: 1 }]);
      expect(await source().archive(session, REMOTE_DIR)).toBe(0);
      expect(session.files.has('/data/recordings/r1.wav')).toBe(true);
      expect(session.dirs.has('/data/archive')).toBe(false);
    });

    it('creates the archive directory and moves every recording into it', async () => {
      const session = new FakeSession(REMOTE_DIR, [
        { name: 'r1.wav', modifyTime: 1 },
        { name: 'r2.wav', modifyTime: 2 },
        { name: 'notes.txt', modifyTime: 3 },
      ]);
      expect(await source({ cleanup: true }).archive(session, REMOTE_DIR)).toBe(2);
      expect(session.dirs.has('/data/archive')).toBe(true);
      expect([...session.files.keys()].sort()).toEqual([
        '/data/archive/r1.wav',
        '/data/archive/r2.wav',
        '/data/recordings/notes.txt',
      ]);
    });

    it('reuses an existing archive directory', async () => {
      const session = new FakeSession(REMOTE_DIR, [{ name: 'r1.wav', modifyTime: 1 }]);
      session.dirs.add('/data/archive');
      session.failOn.mkdir = new Error('already exists');
      expect(await source({ cleanup: true }).archive(session, REMOTE_DIR)).toBe(1);
      expect(session.files.has('/data/archive/r1.wav')).toBe(true);
    });

    it('logs and swallows failures', async () => {
      const session = new FakeSession(REMOTE_DIR, [{ name: 'r1.wav', modifyTime: 1 }]);
      session.failOn.rename = new Error('Permission denied');
      expect(await source({ cleanup: true }).archive(session, REMOTE_DIR)).toBe(0);
      expect(log.messages('error')).toEqual(['remote.archive.fail']);
    });

    it('reports the files moved before a rename fails', async () => {
      const session = new FakeSession(REMOTE_DIR, [
        { name: 'r1.wav', modifyTime: 1 },
        { name: 'r2.wav', modifyTime: 2 },
        { name: 'r3.wav', modifyTime: 3 },
      ]);
      session.renameFails.add('/data/recordings/r3.wav');
      expect(await source({ cleanup: true }).archive(session, REMOTE_DIR)).toBe(2);
      const failure = log.records.find((r) => r.msg === 'remote.archive.fail');
      expect(failure?.moved).toBe(2);
      expect(session.files.has('/data/recordings/r3.wav')).toBe(true);
    });

    it('does not create the directory when the existence check fails for another reason', async () => {
      const session = new FakeSession(REMOTE_DIR, [{ name: 'r1.wav', modifyTime: 1 }]);
      session.failOn.exists = new Error('Connection lost');
      expect(await source({ cleanup: true }).archive(session, REMOTE_DIR)).toBe(0);
      expect(session.dirs.has('/data/archive')).toBe(false);
    });
  });

  describe('close', () => {
    it('logs instead of throwing when the session fails to close', async () => {
      const session = new FakeSession(REMOTE_DIR);
      session.failOn.close = new Error('socket hang up');
      await source().close(session);
      expect(session.closeCount).toBe(1);
      expect(log.messages('error')).toEqual(['remote.close.fail']);
    });
  });
});
