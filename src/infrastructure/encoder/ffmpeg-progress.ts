import { parseTimestamp } from '../../shared/media/frameTiming.js';
import { percentOf } from '../../shared/media/numberUtils.js';

const TIME_MARKER = 'time=';

/**
 * Elapsed seconds from an ffmpeg status line such as
 * `frame=  3 fps=0.0 q=-1.0 size= 0kB time=00:00:04.00 bitrate=...`.
 */
export function parseElapsedSeconds(line: string): number | null {
  const markerIndex = line.indexOf(TIME_MARKER);
  if (markerIndex === -1) {
    return null;
  }

  const token = line.slice(markerIndex + TIME_MARKER.length).trim().split(/\s+/)[0] ?? '';
  return parseTimestamp(token);
}

export class EncodeProgressTracker {
  private lastPercent = 0;

  public constructor(private readonly totalSeconds: number) {}

  public get percent(): number {
    return this.lastPercent;
  }

  /** Returns the new percentage when the line moved progress forward. */
  public update(line: string): number | null {
    const elapsed = parseElapsedSeconds(line);
    if (elapsed === null) {
      return null;
    }

    const percent = percentOf(elapsed, this.totalSeconds);
    if (percent <= this.lastPercent) {
      return null;
    }

    this.lastPercent = percent;
    return percent;
  }
}

/**
 * Splits a text stream on `\n` and `\r`; ffmpeg redraws its status line
 * with carriage returns.
 */
export async function* splitLines(chunks: AsyncIterable<string>): AsyncGenerator<string> {
  let pending = '';

  for await (const chunk of chunks) {
    pending += chunk;
    const parts = pending.split(/\r\n|\r|\n/);
    pending = parts.pop() ?? '';
    for (const part of parts) {
      if (part.length > 0) {
        yield part;
      }
    }
  }

  if (pending.length > 0) {
    yield pending;
  }
}
