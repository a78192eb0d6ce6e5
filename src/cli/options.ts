import { loadConfig, type Config } from '../pipeline/config';
import { createLogger, runLogPath, type Logger } from '../pipeline/log';

// Flags shared by every command; each overrides the matching environment variable
export const configOptions = {
    host: { type: 'string', describe: 'Remote host (REMOTE_HOST)' },
    username: { type: 'string', describe: 'Remote user (REMOTE_USER)' },
    port: { type: 'number', describe: 'SSH port (REMOTE_PORT)' },
    'key-path': { type: 'string', describe: 'Private key for the remote host (KEY_PATH)' },
    'remote-dir': { type: 'string', describe: 'Directory holding recordings on the remote host (REMOTE_DIR)' },
    extensions: { type: 'string', describe: 'Comma-separated recording extensions (REMOTE_EXTENSIONS)' },
    'archive-dir': { type: 'string', describe: 'Archive directory name, created beside remote-dir (ARCHIVE_DIR_NAME)' },
    cleanup: { type: 'boolean', describe: 'Move remote recordings to the archive directory after download (CLEANUP)' },
    'base-dir': { type: 'string', describe: 'Local artifact root (BASE_DIR)' },
    'log-dir': { type: 'string', describe: 'Directory for run logs (LOG_DIR)' },
    'whisper-bin': { type: 'string', describe: 'whisper executable (WHISPER_BIN)' },
    'whisper-model': { type: 'string', describe: 'Whisper model id (WHISPER_MODEL)' },
    language: { type: 'string', describe: 'Language hint for transcription (TRANSCRIBE_LANGUAGE)' },
    'transcribe-timeout': { type: 'number', describe: 'Seconds before the transcription process is killed, 0 disables' },
    'claude-api-key': { type: 'string', describe: 'Anthropic API key (CLAUDE_API_KEY)' },
    'claude-model': { type: 'string', describe: 'Summarization model (CLAUDE_MODEL)' },
    'max-tokens': { type: 'number', describe: 'Maximum tokens for the summary (MAX_TOKENS)' },
    temperature: { type: 'number', describe: 'Sampling temperature (TEMPERATURE)' },
    'request-timeout': { type: 'number', describe: 'Summarization request timeout in seconds' },
    'connect-timeout': { type: 'number', describe: 'SSH connect timeout in seconds' },
    'log-level': {
        type: 'string',
        choices: ['debug', 'info', 'warn', 'error', 'critical'],
        describe: 'Minimum log level (LOG_LEVEL)',
    },
    'log-format': { type: 'string', choices: ['json', 'pretty'], describe: 'Console log format (LOG_FORMAT)' },
} as const;

export interface ConfigArgs {
    host?: string;
    username?: string;
    port?: number;
    'key-path'?: string;
    'remote-dir'?: string;
    extensions?: string;
    'archive-dir'?: string;
    cleanup?: boolean;
    'base-dir'?: string;
    'log-dir'?: string;
    'whisper-bin'?: string;
    'whisper-model'?: string;
    language?: string;
    'transcribe-timeout'?: number;
    'claude-api-key'?: string;
    'claude-model'?: string;
    'max-tokens'?: number;
    temperature?: number;
    'request-timeout'?: number;
    'connect-timeout'?: number;
    'log-level'?: string;
    'log-format'?: string;
}

export function configFromArgs(argv: ConfigArgs): Config {
    return loadConfig({
        host: argv.host,
        username: argv.username,
        port: argv.port,
        keyPath: argv['key-path'],
        remoteDir: argv['remote-dir'],
        extensions: argv.extensions
            ?.split(',')
            .map((s) => s.trim())
            .filter(Boolean),
        archiveDirName: argv['archive-dir'],
        cleanup: argv.cleanup,
        baseDir: argv['base-dir'],
        logDir: argv['log-dir'],
        whisperBin: argv['whisper-bin'],
        whisperModel: argv['whisper-model'],
        language: argv.language,
        transcribeTimeoutSec: argv['transcribe-timeout'],
        apiKey: argv['claude-api-key'],
        model: argv['claude-model'],
        maxTokens: argv['max-tokens'],
        temperature: argv.temperature,
        requestTimeoutSec: argv['request-timeout'],
        connectTimeoutSec: argv['connect-timeout'],
        logLevel: argv['log-level'],
        logFormat: argv['log-format'],
    });
}

/** Console logger plus a workflow_<timestamp>.log file under the configured log dir */
export function loggerFor(config: Config): Logger {
    return createLogger({
        level: config.logLevel,
        format: config.logFormat,
        filePath: runLogPath(config.logDir),
    });
}
