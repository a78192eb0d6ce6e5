export interface RemoteEntry {
  name: string;
  size: number;
  // milliseconds since epoch, as reported by the server
  modifyTime: number;
  isFile: boolean;
}

export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
}

/**
 * Raw engine output. Only `segments` is interpreted; everything else is written
 * to the structured transcript file untouched.
 */
export interface RawTranscription {
  segments: TranscriptSegment[];
  [key: string]: unknown;
}

export interface Transcript {
  recordingStem: string;
  segments: TranscriptSegment[];
  text: string;
  jsonPath: string;
  textPath: string;
}

export type RunState =
  | 'INIT'
  | 'CONNECTED'
  | 'FETCHED'
  | 'ARCHIVED'
  | 'TRANSCRIBED'
  | 'SUMMARIZED'
  | 'SAVED'
  | 'CLOSED';

export type RunOutcome =
  | 'completed'
  | 'no-recording'
  | 'transcription-failed'
  | 'summary-failed'
  | 'connect-failed'
  | 'error';

export interface RunResult {
  outcome: RunOutcome;
  // last state reached before finalization
  state: RunState;
  recordingPath?: string;
  transcript?: Transcript;
  summaryPath?: string;
}
