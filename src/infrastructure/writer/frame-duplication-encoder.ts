import { performance } from 'node:perf_hooks';

import type {
  Dimensions,
  FrameNormalizer,
  ProgressListener,
  TimelapseEncoder,
  TimelapseJob,
  VideoWriterFactory,
} from '../../domain/timelapse/index.js';
import { AppError } from '../../shared/errors/app-error.js';
import { createChildLogger } from '../../shared/logger/pino.js';
import { FALLBACK_FRAME_RATE, framesPerImage } from '../../shared/media/frameTiming.js';
import { percentOf } from '../../shared/media/numberUtils.js';

export interface FrameDuplicationEncoderOptions {
  readonly normalizer: FrameNormalizer;
  readonly createWriter: VideoWriterFactory;
}

/**
 * Expresses each still's duration at a fixed frame rate by writing the same
 * frame repeatedly.
 */
export class FrameDuplicationEncoder implements TimelapseEncoder {
  public readonly path = 'fallback';

  private readonly logger = createChildLogger({ module: 'FrameDuplicationEncoder' });

  private readonly normalizer: FrameNormalizer;

  private readonly createWriter: VideoWriterFactory;

  public constructor(options: FrameDuplicationEncoderOptions) {
    this.normalizer = options.normalizer;
    this.createWriter = options.createWriter;
  }

  public async encode(job: TimelapseJob, onProgress?: ProgressListener): Promise<string> {
    const [firstImage] = job.frames;
    if (!firstImage) {
      throw AppError.validation('writer.no-images', 'No images provided.', { jobId: job.id });
    }

    const startedAt = performance.now();
    const first = await this.normalizer.prepare(firstImage.path, job.resize);
    const geometry: Dimensions = { width: first.width, height: first.height };
    const repeats = framesPerImage(job.secondsPerImage, FALLBACK_FRAME_RATE);
    const totalFrames = repeats * job.frameCount;

    const writer = this.createWriter();
    try {
      await writer.open({
        outputPath: job.outputPath,
        frameRate: FALLBACK_FRAME_RATE,
        codec: 'mjpeg',
        width: geometry.width,
        height: geometry.height,
      });

      let written = 0;
      for (const [index, image] of job.frames.entries()) {
        const frame = index === 0 ? first : await this.normalizer.prepare(image.path, geometry);
        const data = frame.toBgr();

        for (let copy = 0; copy < repeats; copy += 1) {
          await writer.write({ width: frame.width, height: frame.height, data });
          written += 1;
          onProgress?.({
            encoder: this.path,
            stage: 'encoding',
            percent: percentOf(written, totalFrames),
          });
        }
      }

      await writer.finalize();
    } finally {
      await writer.release();
    }

    this.logger.info(
      {
        jobId: job.id,
        framesPerImage: repeats,
        totalFrames,
        elapsedMs: performance.now() - startedAt,
      },
      'Fallback encode finished',
    );

    return job.outputPath;
  }
}
