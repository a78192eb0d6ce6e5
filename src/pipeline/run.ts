import fs from 'fs-extra';
import { assertRemoteConfig, type Config } from './config';
import { ConnectionError, KeyFileError, describeError, diagnose } from './errors';
import type { Logger } from './log';
import { RemoteFileSource, type RemoteSession, type SessionOpener } from './remote';
import { ArtifactStore } from './store';
import { SummarizationClient } from './summarize';
import { TranscriptionEngine, WhisperCliBackend, type TranscriptionBackend } from './transcribe';
import type { RunResult, RunState } from './types';

export interface PipelineDeps {
  store: ArtifactStore;
  source: RemoteFileSource;
  engine: TranscriptionEngine;
  summarizer: SummarizationClient;
  // Date used to name the summary file
  clock?: () => Date;
}

/**
 * One end-to-end run: fetch the newest recording, transcribe it, summarize the
 * transcript and save the summary. The remote session, once opened, is closed
 * exactly once before run() resolves.
 */
export class PipelineOrchestrator {
  private readonly clock: () => Date;
  private state: RunState = 'INIT';

  constructor(
    private readonly config: Config,
    private readonly logger: Logger,
    private readonly deps: PipelineDeps
  ) {
    this.clock = deps.clock ?? (() => new Date());
  }

  private enter(state: RunState, meta?: Record<string, unknown>) {
    this.state = state;
    this.logger.debug('run.state', { state, ...meta });
  }

  private finish(result: Omit<RunResult, 'state'>): RunResult {
    return { ...result, state: this.state };
  }

  async run(): Promise<RunResult> {
    const { config, logger } = this;
    const { store, source, engine, summarizer } = this.deps;
    this.state = 'INIT';
    let session: RemoteSession | null = null;
    const timer = logger.startStep('run', { host: config.host, remoteDir: config.remoteDir, cleanup: config.cleanup });

    try {
      try {
        session = await source.connect(config.host, config.username, config.keyPath);
      } catch (e) {
        if (e instanceof ConnectionError || e instanceof KeyFileError) {
          logger.critical('run.connect.fail', describeError(e));
          return this.finish({ outcome: 'connect-failed' });
        }
        throw e;
      }
      this.enter('CONNECTED', { host: session.host });

      const recordingPath = await source.fetchNewest(session, config.remoteDir, store.recordingsDir);
      if (!recordingPath) {
        logger.warn('run.exit.no_recording', { remoteDir: config.remoteDir });
        return this.finish({ outcome: 'no-recording' });
      }
      this.enter('FETCHED', { recordingPath });

      if (config.cleanup) {
        await source.archive(session, config.remoteDir);
        this.enter('ARCHIVED');
      }

      const transcript = await engine.transcribe(recordingPath, config.language);
      if (!transcript) {
        logger.warn('run.exit.transcription_failed', { recordingPath });
        return this.finish({ outcome: 'transcription-failed', recordingPath });
      }
      if (!transcript.text) {
        // no speech; transcript files are kept but there is nothing to summarize
        logger.warn('run.exit.transcription_failed', { recordingPath, reason: 'empty', textPath: transcript.textPath });
        return this.finish({ outcome: 'transcription-failed', recordingPath, transcript });
      }
      this.enter('TRANSCRIBED', { textPath: transcript.textPath, segments: transcript.segments.length });

      const summary = await summarizer.summarize(transcript.text, {
        model: config.model,
        maxTokens: config.maxTokens,
        temperature: config.temperature,
      });
      if (!summary) {
        logger.warn('run.exit.summary_failed', { recordingPath });
        return this.finish({ outcome: 'summary-failed', recordingPath, transcript });
      }
      this.enter('SUMMARIZED');

      const summaryPath = await store.writeSummary(summary, this.clock());
      this.enter('SAVED', { summaryPath });
      return this.finish({ outcome: 'completed', recordingPath, transcript, summaryPath });
    } catch (e) {
      logger.critical('run.error', { state: this.state, ...diagnose(e) });
      return this.finish({ outcome: 'error' });
    } finally {
      if (session) {
        await source.close(session);
      }
      const from = this.state;
      this.state = 'CLOSED';
      timer.end({ from });
    }
  }
}

export interface CreatePipelineOptions {
  // Test seams; production uses SFTP, the whisper CLI and the live API
  open?: SessionOpener;
  backend?: TranscriptionBackend;
  summarizer?: SummarizationClient;
  clock?: () => Date;
}

/**
 * Builds a ready-to-run pipeline. Everything that would make a run pointless is checked
 * here and thrown: missing remote settings, missing SSH key, storage directories that
 * cannot be created, an engine that cannot be started.
 */
export async function createPipeline(
  config: Config,
  logger: Logger,
  opts: CreatePipelineOptions = {}
): Promise<PipelineOrchestrator> {
  logger.info('pipeline.init', { baseDir: config.baseDir, cleanup: config.cleanup });
  assertRemoteConfig(config);

  if (!(await fs.pathExists(config.keyPath))) {
    logger.critical('pipeline.key.missing', { keyPath: config.keyPath });
    throw new KeyFileError(`SSH key not found at ${config.keyPath}`, config.keyPath);
  }

  const store = new ArtifactStore(config.baseDir, logger);
  await store.init();

  const backend =
    opts.backend ??
    new WhisperCliBackend({
      bin: config.whisperBin,
      model: config.whisperModel,
      logger,
      timeoutMs: config.transcribeTimeoutSec * 1000,
    });
  const engine = new TranscriptionEngine({ backend, store, logger });
  try {
    await engine.ensureAvailable();
  } catch (e) {
    logger.critical('pipeline.engine.unavailable', describeError(e));
    throw e;
  }

  const source = new RemoteFileSource({
    logger,
    extensions: config.extensions,
    cleanup: config.cleanup,
    archiveDirName: config.archiveDirName,
    port: config.port,
    connectTimeoutMs: config.connectTimeoutSec * 1000,
    open: opts.open,
  });

  const summarizer = opts.summarizer ?? createSummarizer(config, logger);
  return new PipelineOrchestrator(config, logger, {
    store,
    source,
    engine,
    summarizer,
    clock: opts.clock,
  });
}

export function createSummarizer(config: Config, logger: Logger): SummarizationClient {
  return new SummarizationClient({
    apiKey: config.apiKey,
    logger,
    apiUrl: config.apiUrl,
    model: config.model,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    timeoutMs: config.requestTimeoutSec * 1000,
  });
}
