import type { TimelapseJob } from '../entities/timelapse-job.js';

export type EncoderPath = 'primary' | 'fallback';

export type EncodeStage = 'preparing' | 'encoding';

export interface EncodeProgress {
  readonly encoder: EncoderPath;
  readonly stage: EncodeStage;
  readonly percent: number;
}

export type ProgressListener = (progress: EncodeProgress) => void;

export interface TimelapseEncoder {
  readonly path: EncoderPath;
  /** Resolves with the path of the written video. */
  encode(job: TimelapseJob, onProgress?: ProgressListener): Promise<string>;
}
