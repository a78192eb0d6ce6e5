/**
 * Incident summaries from a dispatch transcript via the Anthropic Messages API
 */

import ky, { TimeoutError, type KyInstance } from 'ky';
import { z } from 'zod';
import { describeError, diagnose } from './errors';
import type { Logger, LogMeta } from './log';

export const DEFAULT_API_URL = 'https://api.anthropic.com/v1/messages';
export const API_VERSION = '2023-06-01';
export const MAX_TRANSCRIPT_CHARS = 100_000;
export const DEFAULT_TEMPERATURE = 0.7;
const API_KEY_PREFIX = 'sk-ant-';

export const INCIDENT_PROMPT = `
Analyze this police dispatch transcript. Identify and detail all incidents.
Format each incident with:
- Time range
- Units involved
- Nature of call
- Details
- Resolution (if any)
Department terminology:
- RP = Reporting Party
- Victor units = patrol units
Include ALL communications and preserve all technical details.`;

export interface SummarizeOptions {
  model: string;
  maxTokens: number;
  temperature: number;
}

export interface SummaryRequestBody {
  model: string;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
  max_tokens: number;
  temperature?: number;
}

export interface SummaryRequest {
  body: SummaryRequestBody;
  truncated: boolean;
  originalLength: number;
}

/**
 * Temperature is sent only when it differs from the service default (0.7), so passing
 * 0.7 explicitly looks the same on the wire as not passing it.
 */
export function buildSummaryRequest(transcript: string, opts: SummarizeOptions): SummaryRequest {
  const truncated = transcript.length > MAX_TRANSCRIPT_CHARS;
  const content = truncated ? transcript.slice(0, MAX_TRANSCRIPT_CHARS) : transcript;
  const body: SummaryRequestBody = {
    model: opts.model,
    system: INCIDENT_PROMPT,
    messages: [{ role: 'user', content }],
    max_tokens: opts.maxTokens,
  };
  if (opts.temperature !== DEFAULT_TEMPERATURE) {
    body.temperature = opts.temperature;
  }
  return { body, truncated, originalLength: transcript.length };
}

const MessageResponseSchema = z
  .object({
    content: z.tuple([z.object({ text: z.string() }).passthrough()]).rest(z.unknown()),
  })
  .passthrough();

export interface SummarizationClientOptions extends Partial<SummarizeOptions> {
  apiKey: string;
  logger: Logger;
  apiUrl?: string;
  timeoutMs?: number;
  http?: KyInstance;
}

export class SummarizationClient {
  private readonly apiKey: string;
  private readonly logger: Logger;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly http: KyInstance;
  private readonly defaults: SummarizeOptions;

  constructor(opts: SummarizationClientOptions) {
    this.apiKey = opts.apiKey;
    this.logger = opts.logger;
    this.apiUrl = opts.apiUrl ?? DEFAULT_API_URL;
    this.timeoutMs = opts.timeoutMs ?? 120_000;
    this.http = opts.http ?? ky.create({ retry: 0 });
    this.defaults = {
      model: opts.model ?? 'claude-3-7-sonnet-20250219',
      maxTokens: opts.maxTokens ?? 300,
      temperature: opts.temperature ?? DEFAULT_TEMPERATURE,
    };

    if (!this.apiKey || !this.apiKey.startsWith(API_KEY_PREFIX)) {
      this.logger.warn('summarize.key.suspicious', {
        reason: `API key should start with '${API_KEY_PREFIX}'`,
      });
    } else {
      this.logger.info('summarize.ready', { model: this.defaults.model });
    }
  }

  private headers(): Record<string, string> {
    return {
      'anthropic-version': API_VERSION,
      'content-type': 'application/json',
      'x-api-key': this.apiKey,
    };
  }

  /**
   * Returns the text of the first content block, or null on any failure. Failures are
   * logged, never thrown.
   */
  async summarize(transcript: string, overrides: Partial<SummarizeOptions> = {}): Promise<string | null> {
    const opts: SummarizeOptions = { ...this.defaults, ...overrides };
    const timer = this.logger.startStep('summarize', { model: opts.model, maxTokens: opts.maxTokens });
    const { body, truncated, originalLength } = buildSummaryRequest(transcript, opts);
    if (truncated) {
      this.logger.warn('summarize.truncate', { from: originalLength, to: MAX_TRANSCRIPT_CHARS });
    }
    this.logger.debug('summarize.request', {
      url: this.apiUrl,
      chars: body.messages[0].content.length,
      payload: JSON.stringify(body).slice(0, 1000),
    });

    try {
      const res = await this.http.post(this.apiUrl, {
        json: body,
        headers: this.headers(),
        timeout: this.timeoutMs,
        throwHttpErrors: false,
      });
      if (!res.ok) {
        this.logger.error('summarize.http.fail', { status: res.status, body: await res.text() });
        return null;
      }
      const data: unknown = await res.json();
      const parsed = MessageResponseSchema.safeParse(data);
      if (!parsed.success) {
        this.logger.error('summarize.response.unexpected', {
          body: JSON.stringify(data).slice(0, 500),
        });
        return null;
      }
      const summary = parsed.data.content[0].text;
      timer.end({ chars: summary.length });
      return summary;
    } catch (e) {
      const meta: LogMeta = { url: this.apiUrl, ...describeError(e) };
      // Non-2xx responses are handled above; only transport failures and timeouts land here
      if (e instanceof TimeoutError) {
        meta.timeoutMs = this.timeoutMs;
        meta.method = e.request.method;
      }
      this.logger.error('summarize.request.fail', meta);
      this.logger.debug('summarize.request.fail.detail', diagnose(e));
      return null;
    }
  }
}
