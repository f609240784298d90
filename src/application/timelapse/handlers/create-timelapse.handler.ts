import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import type {
  EncoderPath,
  ImageSource,
  ProgressListener,
} from '../../../domain/timelapse/index.js';
import { TimelapseJob } from '../../../domain/timelapse/index.js';
import { AppError } from '../../../shared/errors/app-error.js';
import { createChildLogger } from '../../../shared/logger/pino.js';
import type { CreateTimelapseCommand } from '../commands/create-timelapse.command.js';
import {
  createTimelapseCommandSchema,
  type CreateTimelapsePayload,
  type ValidCreateTimelapsePayload,
} from '../dto/create-timelapse.dto.js';
import type { EncodeOrchestrator } from '../services/encode-orchestrator.js';

export interface TimelapseSummary {
  readonly totalImages: number;
  readonly secondsPerImage: number;
  readonly totalDurationSeconds: number;
  readonly outputPath: string;
}

export interface TimelapsePlan {
  readonly job: TimelapseJob;
  readonly summary: TimelapseSummary;
}

export interface TimelapseResult {
  readonly outputPath: string;
  readonly totalImages: number;
  readonly totalDurationSeconds: number;
  readonly fileSizeBytes: number;
  readonly encoder: EncoderPath;
  readonly primaryFailure?: AppError;
}

export interface TimelapseListeners {
  readonly onProgress?: ProgressListener;
  /** Fires as the in-process writer takes over, before it starts. */
  readonly onFallback?: (primaryFailure: AppError) => void;
}

export class CreateTimelapseHandler {
  private readonly logger = createChildLogger({ module: 'CreateTimelapseHandler' });

  public constructor(
    private readonly images: ImageSource,
    private readonly orchestrator: EncodeOrchestrator,
  ) {}

  public async prepare(command: CreateTimelapseCommand): Promise<TimelapsePlan> {
    const payload = this.validate(command.payload);

    if (!(await this.images.directoryExists(payload.sourceDir))) {
      throw AppError.inputNotFound('timelapse.source-not-found', payload.sourceDir, 'source');
    }

    if (!(await this.images.directoryExists(payload.outputDir))) {
      throw AppError.inputNotFound('timelapse.output-not-found', payload.outputDir, 'output');
    }

    const frames = await this.images.collect(payload.sourceDir, payload.sortMode);
    const job = TimelapseJob.create({
      id: randomUUID(),
      frames,
      secondsPerImage: payload.secondsPerImage,
      resize: payload.resolution,
      outputPath: path.join(payload.outputDir, `${payload.fileName}.mp4`),
      createdAt: new Date(),
    });

    this.logger.info(
      { jobId: job.id, frames: job.frameCount, sortMode: payload.sortMode },
      'Timelapse job prepared',
    );

    return {
      job,
      summary: {
        totalImages: job.frameCount,
        secondsPerImage: job.secondsPerImage,
        totalDurationSeconds: job.totalDurationSeconds,
        outputPath: job.outputPath,
      },
    };
  }

  public async execute(
    plan: TimelapsePlan,
    listeners: TimelapseListeners = {},
  ): Promise<TimelapseResult> {
    const { job } = plan;
    const { onProgress, onFallback } = listeners;
    this.logger.info({ jobId: job.id, outputPath: job.outputPath }, 'Starting timelapse encode');

    const outcome = await this.orchestrator.run(job, {
      onProgress,
      onTransition: ({ to, error }) => {
        if (to === 'encoding-fallback' && error) {
          onFallback?.(error);
        }
      },
    });

    if (outcome.status === 'failed') {
      throw outcome.fallbackFailure;
    }

    const stats = await fs.stat(outcome.outputPath);

    this.logger.info(
      {
        jobId: job.id,
        encoder: outcome.encoder,
        outputSizeBytes: stats.size,
        durationSeconds: job.totalDurationSeconds,
      },
      'Timelapse encode completed',
    );

    return {
      outputPath: outcome.outputPath,
      totalImages: job.frameCount,
      totalDurationSeconds: job.totalDurationSeconds,
      fileSizeBytes: stats.size,
      encoder: outcome.encoder,
      primaryFailure: outcome.primaryFailure,
    };
  }

  private validate(payload: CreateTimelapsePayload): ValidCreateTimelapsePayload {
    const parsed = createTimelapseCommandSchema.safeParse(payload);

    if (!parsed.success) {
      const [first] = parsed.error.issues;
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid timelapse payload received');
      throw AppError.validation(
        'timelapse.invalid-payload',
        first?.message ?? 'Validation failed for the provided payload.',
        { issues: parsed.error.issues },
      );
    }

    return parsed.data;
  }
}
