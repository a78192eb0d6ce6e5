import type { TranscriptSegment } from './types';

/**
 * Whole milliseconds in `seconds`, rounding half to even. toFixed breaks exact ties
 * upward; a double sits exactly halfway between two milliseconds only when it is an
 * odd multiple of 1/16, which the check below detects without rounding error.
 */
function toMillis(seconds: number): number {
  const sixteenths = seconds * 16;
  if (Number.isInteger(sixteenths) && sixteenths % 2 !== 0) {
    const floor = Math.floor(seconds * 1000);
    return floor % 2 === 0 ? floor : floor + 1;
  }
  return Number(seconds.toFixed(3).replace('.', ''));
}

/** 63.25 -> "01:03.250" */
export function formatOffset(seconds: number): string {
  const minutes = Math.trunc(seconds / 60);
  const ms = toMillis(seconds % 60);
  const secs = `${Math.trunc(ms / 1000)}.${String(ms % 1000).padStart(3, '0')}`;
  return `${String(minutes).padStart(2, '0')}:${secs.padStart(6, '0')}`;
}

export function formatSegment(seg: TranscriptSegment): string {
  return `[${formatOffset(seg.start)} --> ${formatOffset(seg.end)}]  ${seg.text.trim()}\n`;
}

export function renderTranscript(segments: readonly TranscriptSegment[]): string {
  return segments.map(formatSegment).join('');
}
