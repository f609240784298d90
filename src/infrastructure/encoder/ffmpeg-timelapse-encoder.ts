import { constants, promises as fs } from 'node:fs';
import path from 'node:path';
import { performance } from 'node:perf_hooks';

import type {
  FrameNormalizer,
  ProgressListener,
  TimelapseEncoder,
  TimelapseJob,
} from '../../domain/timelapse/index.js';
import type { X264Preset } from '../../shared/config/env.js';
import { AppError } from '../../shared/errors/app-error.js';
import { createChildLogger } from '../../shared/logger/pino.js';
import { percentOf } from '../../shared/media/numberUtils.js';
import { buildStillSequenceArgs, frameFileName } from '../../shared/media/videoToolkit.js';

import { type EncoderExit, type EncoderProcessRunner, spawnEncoderProcess } from './encoder-process.js';
import { EncodeProgressTracker } from './ffmpeg-progress.js';

export const WORK_DIR_NAME = 'temp_frames';

const DIAGNOSTIC_TAIL_LINES = 25;

export interface FfmpegTimelapseEncoderOptions {
  readonly binaryPath: string;
  readonly normalizer: FrameNormalizer;
  readonly crf?: number;
  readonly preset?: X264Preset;
  readonly runProcess?: EncoderProcessRunner;
}

export class FfmpegTimelapseEncoder implements TimelapseEncoder {
  public readonly path = 'primary';

  private readonly logger = createChildLogger({ module: 'FfmpegTimelapseEncoder' });

  private readonly binaryPath: string;

  private readonly normalizer: FrameNormalizer;

  private readonly crf: number;

  private readonly preset: X264Preset;

  private readonly runProcess: EncoderProcessRunner;

  public constructor(options: FfmpegTimelapseEncoderOptions) {
    this.binaryPath = options.binaryPath;
    this.normalizer = options.normalizer;
    this.crf = options.crf ?? 23;
    this.preset = options.preset ?? 'medium';
    this.runProcess = options.runProcess ?? spawnEncoderProcess;
  }

  public async encode(job: TimelapseJob, onProgress?: ProgressListener): Promise<string> {
    await this.ensureBinary();

    const workDir = path.join(job.outputDirectory, WORK_DIR_NAME);
    const startedAt = performance.now();

    // A leftover frame from an earlier run would join the numeric pattern.
    await fs.rm(workDir, { recursive: true, force: true });
    await fs.mkdir(workDir, { recursive: true });

    let failed = false;
    try {
      await this.stageFrames(job, workDir, onProgress);

      const args = buildStillSequenceArgs({
        framesDir: workDir,
        outputPath: job.outputPath,
        secondsPerImage: job.secondsPerImage,
        crf: this.crf,
        preset: this.preset,
      });

      try {
        await this.runEncoder(job, args, onProgress);
      } catch (error) {
        await fs.rm(job.outputPath, { force: true });
        throw error;
      }

      this.logger.info(
        { jobId: job.id, frames: job.frameCount, elapsedMs: performance.now() - startedAt },
        'ffmpeg encode finished',
      );

      return job.outputPath;
    } catch (error) {
      failed = true;
      throw error;
    } finally {
      await this.removeWorkDir(job, workDir, failed);
    }
  }

  private async ensureBinary(): Promise<void> {
    try {
      await fs.access(this.binaryPath, constants.F_OK);
    } catch (error) {
      throw AppError.encoderUnavailable(this.binaryPath, error);
    }
  }

  private async stageFrames(
    job: TimelapseJob,
    workDir: string,
    onProgress?: ProgressListener,
  ): Promise<void> {
    for (const [index, image] of job.frames.entries()) {
      const frame = await this.normalizer.prepare(image.path, job.resize);
      await fs.writeFile(path.join(workDir, frameFileName(index)), frame.toPng());

      onProgress?.({
        encoder: this.path,
        stage: 'preparing',
        percent: percentOf(index + 1, job.frameCount),
      });
    }

    this.logger.debug({ jobId: job.id, workDir, frames: job.frameCount }, 'Staged frames');
  }

  private async runEncoder(
    job: TimelapseJob,
    args: string[],
    onProgress?: ProgressListener,
  ): Promise<void> {
    this.logger.debug({ jobId: job.id, binary: this.binaryPath, args }, 'Spawning ffmpeg');

    const child = this.runProcess(this.binaryPath, args);
    const tracker = new EncodeProgressTracker(job.totalDurationSeconds);
    const tail: string[] = [];

    for await (const line of child.diagnostics) {
      tail.push(line);
      if (tail.length > DIAGNOSTIC_TAIL_LINES) {
        tail.shift();
      }

      const percent = tracker.update(line);
      if (percent !== null) {
        onProgress?.({ encoder: this.path, stage: 'encoding', percent });
      }
    }

    const exit = await child.exit;
    this.assertSuccessfulExit(job, exit, tail.join('\n'));

    if (tracker.percent < 100) {
      onProgress?.({ encoder: this.path, stage: 'encoding', percent: 100 });
    }
  }

  private assertSuccessfulExit(job: TimelapseJob, exit: EncoderExit, diagnostics: string): void {
    if (exit.kind === 'spawn-failed') {
      if (exit.error.code === 'ENOENT') {
        throw AppError.encoderUnavailable(this.binaryPath, exit.error);
      }

      throw AppError.encoderProcess(
        `Failed to start ffmpeg: ${exit.error.message}`,
        { exitCode: null, signal: null, diagnostics },
        exit.error,
      );
    }

    this.logger.debug({ jobId: job.id, code: exit.code, signal: exit.signal }, 'ffmpeg exited');

    if (exit.code !== 0) {
      const reason = exit.signal ? `signal ${exit.signal}` : `code ${exit.code}`;
      throw AppError.encoderProcess(`ffmpeg exited with ${reason}`, {
        exitCode: exit.code,
        signal: exit.signal,
        diagnostics,
      });
    }
  }

  /** Cleanup errors never replace an error that is already propagating. */
  private async removeWorkDir(job: TimelapseJob, workDir: string, failing: boolean): Promise<void> {
    try {
      await fs.rm(workDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.error({ jobId: job.id, workDir, error }, 'Failed to remove frame directory');
      if (!failing) {
        throw AppError.fromUnknown(error, 'encoder.cleanup-failed');
      }
    }
  }
}
