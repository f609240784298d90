import type { EncodeProgress, EncoderPath, EncodeStage } from '../domain/timelapse/index.js';

export interface OutputStream {
  write(chunk: string): unknown;
}

const BAR_WIDTH = 30;

const LABELS: Record<EncoderPath, Record<EncodeStage, string>> = {
  primary: { preparing: 'Preparing frames', encoding: 'Encoding video' },
  fallback: { preparing: 'Preparing frames', encoding: 'Creating video' },
};

export function renderProgressLine(progress: EncodeProgress): string {
  const filled = Math.round((progress.percent / 100) * BAR_WIDTH);
  const bar = `${'#'.repeat(filled)}${'-'.repeat(BAR_WIDTH - filled)}`;
  const label = LABELS[progress.encoder][progress.stage];
  return `${label}: ${progress.percent.toString().padStart(3, ' ')}% [${bar}]`;
}

/**
 * Redraws a single console line per stage and only when the percentage
 * moves.
 */
export class ProgressDisplay {
  private current?: { encoder: EncoderPath; stage: EncodeStage; percent: number };

  public constructor(private readonly out: OutputStream) {}

  public readonly update = (progress: EncodeProgress): void => {
    const { current } = this;
    const sameStage =
      current !== undefined &&
      current.encoder === progress.encoder &&
      current.stage === progress.stage;

    if (sameStage && progress.percent <= current.percent) {
      return;
    }

    if (current && !sameStage) {
      this.out.write('\n');
    }

    this.current = { encoder: progress.encoder, stage: progress.stage, percent: progress.percent };
    this.out.write(`\r${renderProgressLine(progress)}`);
  };

  public finish(): void {
    if (this.current) {
      this.out.write('\n');
      this.current = undefined;
    }
  }
}
