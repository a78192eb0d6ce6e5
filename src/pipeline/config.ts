import path from 'path';
import { z } from 'zod';
import { ENV, type EnvValues } from './env';
import { ConfigError } from './errors';
import { LOG_LEVELS } from './log';

const extension = z
  .string()
  .min(1)
  .transform((s) => (s.startsWith('.') ? s : `.${s}`).toLowerCase());

export const ConfigSchema = z.object({
  host: z.string(),
  username: z.string(),
  port: z.number().int().min(1).max(65535),
  keyPath: z.string(),
  remoteDir: z.string(),
  extensions: z.array(extension).min(1).readonly(),
  archiveDirName: z.string().min(1),
  cleanup: z.boolean(),
  baseDir: z.string().min(1),
  logDir: z.string().min(1),
  whisperBin: z.string().min(1),
  whisperModel: z.string().min(1),
  language: z.string().min(1),
  transcribeTimeoutSec: z.number().min(0),
  apiKey: z.string(),
  model: z.string().min(1),
  apiUrl: z.string().url(),
  maxTokens: z.number().int().positive(),
  temperature: z.number().min(0).max(1),
  requestTimeoutSec: z.number().positive(),
  connectTimeoutSec: z.number().positive(),
  logLevel: z.enum(LOG_LEVELS),
  logFormat: z.enum(['json', 'pretty']),
});

export type Config = Readonly<z.infer<typeof ConfigSchema>>;

export type ConfigOverrides = Partial<{
  [K in keyof EnvValues]: EnvValues[K] | undefined;
}>;

/**
 * Environment (and .env) values with CLI overrides on top. The result is frozen for the
 * lifetime of the run.
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: EnvValues = ENV): Config {
  const merged: Record<string, unknown> = { ...env };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  if (!merged.logDir && typeof merged.baseDir === 'string') {
    merged.logDir = path.join(merged.baseDir, 'logs');
  }
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return Object.freeze(parsed.data);
}

const REMOTE_FIELDS = ['host', 'username', 'keyPath', 'remoteDir'] as const;

/** Remote settings are optional for single-stage commands but required for a pipeline run */
export function assertRemoteConfig(config: Config): void {
  const missing = REMOTE_FIELDS.filter((k) => !config[k]);
  if (missing.length) {
    throw new ConfigError(`Missing remote settings: ${missing.join(', ')}`, { missing });
  }
}
