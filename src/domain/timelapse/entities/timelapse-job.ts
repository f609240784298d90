import path from 'node:path';

import { AppError } from '../../../shared/errors/app-error.js';
import { calculateTimelapseTiming } from '../../../shared/media/frameTiming.js';
import { type Dimensions, isValidDimensions } from '../value-objects/dimensions.js';
import type { SourceImage } from '../value-objects/source-image.js';

export interface TimelapseJobProps {
  readonly id: string;
  readonly frames: readonly SourceImage[];
  readonly secondsPerImage: number;
  readonly resize?: Dimensions;
  readonly outputPath: string;
  readonly createdAt: Date;
}

export class TimelapseJob {
  public readonly id: string;

  public readonly frames: readonly SourceImage[];

  public readonly secondsPerImage: number;

  public readonly resize?: Dimensions;

  public readonly outputPath: string;

  public readonly createdAt: Date;

  private constructor(props: TimelapseJobProps) {
    this.id = props.id;
    this.frames = [...props.frames];
    this.secondsPerImage = props.secondsPerImage;
    this.resize = props.resize;
    this.outputPath = props.outputPath;
    this.createdAt = props.createdAt;
  }

  public static create(props: TimelapseJobProps): TimelapseJob {
    if (props.frames.length === 0) {
      throw AppError.validation('timelapse.empty-sequence', 'No image files found in the folder.', {
        jobId: props.id,
      });
    }

    if (!Number.isFinite(props.secondsPerImage) || props.secondsPerImage <= 0) {
      throw AppError.validation(
        'timelapse.invalid-duration',
        'Seconds per image must be a positive number.',
        { secondsPerImage: props.secondsPerImage },
      );
    }

    if (props.resize && !isValidDimensions(props.resize)) {
      throw AppError.validation(
        'timelapse.invalid-resolution',
        'Target resolution must use positive whole numbers.',
        { resize: props.resize },
      );
    }

    return new TimelapseJob(props);
  }

  public get frameCount(): number {
    return this.frames.length;
  }

  public get totalDurationSeconds(): number {
    return calculateTimelapseTiming(this.frames.length, this.secondsPerImage).totalDurationSeconds;
  }

  public get outputDirectory(): string {
    return path.dirname(this.outputPath);
  }
}
