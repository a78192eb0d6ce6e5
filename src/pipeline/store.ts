import fs from 'fs-extra';
import path from 'path';
import { StorageError } from './errors';
import type { Logger } from './log';

export const STORE_DIRS = {
  recordings: 'recordings',
  transcripts: 'transcripts',
  summaries: 'daily_summaries',
} as const;

/** Local calendar date as YYYYMMDD */
export function dateStamp(date: Date): string {
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}${m}${d}`;
}

/** "r1.wav" -> "r1" */
export function recordingStem(recordingPath: string): string {
  return path.parse(recordingPath).name;
}

export class ArtifactStore {
  readonly recordingsDir: string;
  readonly transcriptsDir: string;
  readonly summariesDir: string;

  constructor(
    readonly baseDir: string,
    private readonly logger: Logger
  ) {
    // Absolute so log lines and returned paths do not depend on cwd
    const root = path.resolve(baseDir);
    this.recordingsDir = path.join(root, STORE_DIRS.recordings);
    this.transcriptsDir = path.join(root, STORE_DIRS.transcripts);
    this.summariesDir = path.join(root, STORE_DIRS.summaries);
  }

  async init(): Promise<void> {
    for (const dir of [this.recordingsDir, this.transcriptsDir, this.summariesDir]) {
      try {
        await fs.ensureDir(dir);
        this.logger.debug('store.dir.ready', { dir });
      } catch (e) {
        this.logger.error('store.dir.fail', { dir, error: e instanceof Error ? e.message : String(e) });
        throw new StorageError(`Failed to create directory ${dir}`, dir, { cause: e });
      }
    }
  }

  recordingPath(fileName: string): string {
    return path.join(this.recordingsDir, fileName);
  }

  transcriptJsonPath(stem: string): string {
    return path.join(this.transcriptsDir, `${stem}_transcript.json`);
  }

  transcriptTextPath(stem: string): string {
    return path.join(this.transcriptsDir, `${stem}_transcript.txt`);
  }

  summaryPath(date: Date): string {
    return path.join(this.summariesDir, `summary_${dateStamp(date)}.md`);
  }

  async writeTranscript(
    stem: string,
    raw: unknown,
    text: string
  ): Promise<{ jsonPath: string; textPath: string }> {
    const jsonPath = this.transcriptJsonPath(stem);
    const textPath = this.transcriptTextPath(stem);
    await fs.writeJson(jsonPath, raw, { spaces: 4 });
    await fs.writeFile(textPath, text, 'utf8');
    return { jsonPath, textPath };
  }

  /** One file per day; a later run on the same day replaces it. */
  async writeSummary(summary: string, date: Date): Promise<string> {
    const outPath = this.summaryPath(date);
    await fs.writeFile(outPath, summary, 'utf8');
    this.logger.info('store.summary.saved', { path: outPath, chars: summary.length });
    return outPath;
  }
}
