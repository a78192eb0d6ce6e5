import * as dotenv from 'dotenv';
import os from 'os';
import path from 'path';
dotenv.config();

export type EnvSource = Record<string, string | undefined>;

export function readEnv(env: EnvSource = process.env) {
    const baseDir = env.BASE_DIR || path.join(os.homedir(), 'scanner-digest');
    return {
        host: env.REMOTE_HOST || '',
        username: env.REMOTE_USER || '',
        port: Number(env.REMOTE_PORT || 22),
        keyPath: env.KEY_PATH || '',
        remoteDir: env.REMOTE_DIR || '',
        // Comma-separated, e.g. ".wav,.mp3"
        extensions: (env.REMOTE_EXTENSIONS || '.wav')
            .split(',')
            .map((s) => s.trim())
            .filter(Boolean),
        archiveDirName: env.ARCHIVE_DIR_NAME || 'archive',
        cleanup: (env.CLEANUP || 'false').toLowerCase() === 'true',
        baseDir,
        // Empty means <baseDir>/logs, resolved after CLI overrides are applied
        logDir: env.LOG_DIR || '',
        whisperBin: env.WHISPER_BIN || 'whisper',
        whisperModel: env.WHISPER_MODEL || 'medium.en',
        language: env.TRANSCRIBE_LANGUAGE || 'en',
        // Watchdog for the transcription process (seconds). 0 disables.
        transcribeTimeoutSec: Number(env.TRANSCRIBE_TIMEOUT_SEC || 0),
        apiKey: env.CLAUDE_API_KEY || '',
        model: env.CLAUDE_MODEL || 'claude-3-7-sonnet-20250219',
        apiUrl: env.CLAUDE_API_URL || 'https://api.anthropic.com/v1/messages',
        maxTokens: Number(env.MAX_TOKENS || 5000),
        temperature: Number(env.TEMPERATURE || 0.7),
        requestTimeoutSec: Number(env.REQUEST_TIMEOUT_SEC || 120),
        connectTimeoutSec: Number(env.CONNECT_TIMEOUT_SEC || 20),
        logLevel: env.LOG_LEVEL || 'info',
        logFormat: env.LOG_FORMAT || 'json',
    };
}

export type EnvValues = ReturnType<typeof readEnv>;

export const ENV = readEnv();
