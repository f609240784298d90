import { roundToPrecision } from './numberUtils.js';

/** Frame rate used whenever stills are expressed as repeated frames. */
export const FALLBACK_FRAME_RATE = 30;

export interface TimelapseTiming {
  imageCount: number;
  secondsPerImage: number;
  totalDurationSeconds: number;
}

export function calculateTimelapseTiming(
  imageCount: number,
  secondsPerImage: number,
): TimelapseTiming {
  return {
    imageCount,
    secondsPerImage,
    totalDurationSeconds: Math.max(0, imageCount) * secondsPerImage,
  };
}

/**
 * Input frame rate that makes each still occupy exactly one encoded frame
 * for `secondsPerImage` seconds.
 */
export function stillInputFrameRate(secondsPerImage: number): number {
  if (!Number.isFinite(secondsPerImage) || secondsPerImage <= 0) {
    throw new RangeError(`Seconds per image must be positive, received ${secondsPerImage}`);
  }

  return 1 / secondsPerImage;
}

export function framesPerImage(secondsPerImage: number, frameRate = FALLBACK_FRAME_RATE): number {
  return Math.max(1, Math.round(secondsPerImage * frameRate));
}

export function formatSeconds(seconds: number): string {
  return roundToPrecision(seconds, 1).toFixed(1);
}

export function parseTimestamp(value: string): number | null {
  const match = /^(\d+):(\d{1,2}):(\d{1,2}(?:\.\d+)?)$/.exec(value);
  if (!match) {
    return null;
  }

  const [, hours = '', minutes = '', seconds = ''] = match;
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
}
