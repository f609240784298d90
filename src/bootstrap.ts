import { CreateTimelapseHandler, EncodeOrchestrator } from './application/timelapse/index.js';
import {
  CanvasFrameNormalizer,
  FfmpegTimelapseEncoder,
  FfmpegWasmVideoWriter,
  FrameDuplicationEncoder,
  ImageCollector,
} from './infrastructure/index.js';
import type { AppConfig } from './shared/config/env.js';

export interface TimelapseApp {
  readonly images: ImageCollector;
  readonly handler: CreateTimelapseHandler;
}

export function createTimelapseApp(config: AppConfig): TimelapseApp {
  const normalizer = new CanvasFrameNormalizer();
  const images = new ImageCollector();

  const primary = new FfmpegTimelapseEncoder({
    binaryPath: config.ffmpegPath,
    normalizer,
    crf: config.crf,
    preset: config.preset,
  });

  const fallback = new FrameDuplicationEncoder({
    normalizer,
    createWriter: () => new FfmpegWasmVideoWriter({ corePath: config.ffmpegCorePath }),
  });

  const handler = new CreateTimelapseHandler(images, new EncodeOrchestrator(primary, fallback));

  return { images, handler };
}
