import { execa } from 'execa';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { EngineUnavailableError, TranscriptionError, describeError, diagnose } from './errors';
import { renderTranscript } from './format';
import type { Logger } from './log';
import { recordingStem, type ArtifactStore } from './store';
import type { RawTranscription, Transcript } from './types';

/**
 * The speech-to-text engine, treated as a black box: audio file + language hint in,
 * raw structured output (with a `segments` array) out.
 */
export interface TranscriptionBackend {
    readonly name: string;
    // Rejects with EngineUnavailableError when the engine cannot be loaded
    check(): Promise<void>;
    transcribe(audioPath: string, language: string): Promise<unknown>;
}

const RawSegmentSchema = z
    .object({ start: z.number(), end: z.number(), text: z.string() })
    .passthrough();

export const RawTranscriptionSchema = z
    .object({ segments: z.array(RawSegmentSchema) })
    .passthrough();

export interface WhisperCliOptions {
    bin: string;
    model: string;
    logger: Logger;
    // Watchdog for the whisper process. 0 disables.
    timeoutMs?: number;
}

/**
 * Runs the `whisper` CLI once per file with JSON output into a scratch directory.
 */
export class WhisperCliBackend implements TranscriptionBackend {
    readonly name: string;

    constructor(private readonly opts: WhisperCliOptions) {
        this.name = `whisper@${opts.model}`;
    }

    async check(): Promise<void> {
        try {
            await execa(this.opts.bin, ['--help']);
            this.opts.logger.info('transcribe.engine.ready', { bin: this.opts.bin, model: this.opts.model });
        } catch (e) {
            throw new EngineUnavailableError(
                `Transcription engine "${this.opts.bin}" could not be started. Install openai-whisper or set WHISPER_BIN.`,
                { bin: this.opts.bin, ...describeError(e) },
                { cause: e }
            );
        }
    }

    async transcribe(audioPath: string, language: string): Promise<unknown> {
        const outDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scanner-digest-'));
        try {
            const args = [
                audioPath,
                '--model', this.opts.model,
                '--language', language,
                '--output_format', 'json',
                '--output_dir', outDir,
                '--verbose', 'False',
            ];
            const timeout = this.opts.timeoutMs && this.opts.timeoutMs > 0 ? this.opts.timeoutMs : undefined;
            const proc = execa(this.opts.bin, args, { all: true, timeout });
            proc.all?.on('data', (d: Buffer) => {
                const line = d.toString().trim();
                if (!line) return;
                this.opts.logger.debug('transcribe.engine.log', { line });
            });
            await proc;
            const produced = path.join(outDir, `${path.parse(audioPath).name}.json`);
            if (!(await fs.pathExists(produced))) {
                throw new TranscriptionError(`Expected engine output ${produced} was not created`, {
                    audioPath,
                });
            }
            const raw: unknown = await fs.readJson(produced);
            return raw;
        } finally {
            await fs.remove(outDir);
        }
    }
}

export interface TranscriptionEngineOptions {
    backend: TranscriptionBackend;
    store: ArtifactStore;
    logger: Logger;
}

export class TranscriptionEngine {
    private readonly backend: TranscriptionBackend;
    private readonly store: ArtifactStore;
    private readonly logger: Logger;

    constructor(opts: TranscriptionEngineOptions) {
        this.backend = opts.backend;
        this.store = opts.store;
        this.logger = opts.logger;
    }

    async ensureAvailable(): Promise<void> {
        await this.backend.check();
    }

    /**
     * Transcribes one recording and writes both transcript forms. Returns null on any
     * engine failure; details go to the debug log.
     */
    async transcribe(audioPath: string, language: string): Promise<Transcript | null> {
        const stem = recordingStem(audioPath);
        const timer = this.logger.startStep('transcribe', { audioPath, engine: this.backend.name, language });
        let raw: RawTranscription;
        try {
            const output = await this.backend.transcribe(audioPath, language);
            const parsed = RawTranscriptionSchema.safeParse(output);
            if (!parsed.success) {
                throw new TranscriptionError('Engine output has no usable segments', {
                    issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join('.')}: ${i.message}`),
                });
            }
            raw = parsed.data;
        } catch (e) {
            this.logger.error('transcribe.fail', { audioPath, ...describeError(e) });
            this.logger.debug('transcribe.fail.detail', diagnose(e));
            return null;
        }

        const segments = raw.segments.map((s) => ({ start: s.start, end: s.end, text: s.text.trim() }));
        const text = renderTranscript(segments);
        const { jsonPath, textPath } = await this.store.writeTranscript(stem, raw, text);
        timer.end({ segments: segments.length, path: textPath });
        return { recordingStem: stem, segments, text, jsonPath, textPath };
    }
}
