/**
 * Video-relative timestamps
 *
 * Providers speak in offsets from the start of the stitched batch video
 * ("05:10", "1:02:03"). Offsets before the batch start (prior cards in the
 * synthesis window) carry a leading minus: "-12:30".
 */

/** What providers must answer with; anything else is a malformed response */
export const VIDEO_TIMESTAMP_PATTERN = /^-?\d+:\d{2}(:\d{2})?$/;

const MM_SS = /^(-?)(\d+):(\d+)$/;
const HH_MM_SS = /^(-?)(\d+):(\d+):(\d+)$/;

/**
 * Parse "mm:ss" or "h:mm:ss" into seconds. Invalid input yields 0.
 */
export function parseVideoTimestamp(timestamp: string): number {
  const value = timestamp.trim();

  const long = HH_MM_SS.exec(value);
  if (long) {
    const [, sign, h, m, s] = long;
    const seconds = Number(h) * 3600 + Number(m) * 60 + Number(s);
    return sign ? -seconds : seconds;
  }

  const short = MM_SS.exec(value);
  if (short) {
    const [, sign, m, s] = short;
    const seconds = Number(m) * 60 + Number(s);
    return sign ? -seconds : seconds;
  }

  return 0;
}

/**
 * Format seconds as "mm:ss". Minutes are not wrapped into hours.
 */
export function formatVideoTimestamp(seconds: number): string {
  const rounded = Math.round(seconds);
  const abs = Math.abs(rounded);
  const mins = Math.floor(abs / 60);
  const secs = abs % 60;
  const body = `${mins.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
  return rounded < 0 ? `-${body}` : body;
}

export function toAbsolute(timestamp: string, batchStartTs: number): number {
  return batchStartTs + parseVideoTimestamp(timestamp);
}

export function toRelative(absoluteTs: number, batchStartTs: number): string {
  return formatVideoTimestamp(absoluteTs - batchStartTs);
}
