import { promises as fs } from 'node:fs';
import path from 'node:path';

import { createFFmpeg, type FFmpeg } from '@ffmpeg/ffmpeg';

import type {
  BgrFrame,
  VideoWriter,
  VideoWriterSettings,
} from '../../domain/timelapse/index.js';
import { isValidDimensions, sameDimensions } from '../../domain/timelapse/index.js';
import { AppError } from '../../shared/errors/app-error.js';
import { createChildLogger } from '../../shared/logger/pino.js';
import { buildBgrToJpegArgs, buildMjpegMuxArgs } from '../../shared/media/videoToolkit.js';

const MAX_DIMENSION = 8192;
const RAW_FRAME_NAME = 'frame.bgr';
const JPEG_FRAME_NAME = 'frame.jpg';
const STREAM_NAME = 'stream.mjpeg';
const OUTPUT_NAME = 'output.mp4';

export interface FfmpegWasmVideoWriterOptions {
  readonly corePath?: string;
  /** mjpeg `-q:v`, 2 (best) to 31. */
  readonly jpegQuality?: number;
}

interface EncodedFrame {
  readonly source: Buffer;
  readonly jpeg: Uint8Array;
}

/**
 * In-process MJPEG writer on top of the WebAssembly build of ffmpeg. Each
 * distinct frame is JPEG-encoded once; repeated writes of the same buffer
 * reuse that JPEG. `finalize` muxes the stream into an MP4.
 */
export class FfmpegWasmVideoWriter implements VideoWriter {
  private readonly logger = createChildLogger({ module: 'FfmpegWasmVideoWriter' });

  private ffmpeg?: FFmpeg;

  private settings?: VideoWriterSettings;

  private chunks: Uint8Array[] = [];

  private lastFrame?: EncodedFrame;

  private readonly corePath?: string;

  private readonly jpegQuality: number;

  public constructor(options: FfmpegWasmVideoWriterOptions = {}) {
    this.corePath = options.corePath;
    this.jpegQuality = options.jpegQuality ?? 3;
  }

  public async open(settings: VideoWriterSettings): Promise<void> {
    if (settings.codec !== 'mjpeg') {
      throw AppError.writerInit(`Unsupported writer codec ${settings.codec}.`, { codec: settings.codec });
    }

    if (
      !isValidDimensions(settings) ||
      settings.width > MAX_DIMENSION ||
      settings.height > MAX_DIMENSION
    ) {
      throw AppError.writerInit(
        'Failed to initialize video writer. Try a different resolution.',
        { width: settings.width, height: settings.height },
      );
    }

    if (!Number.isFinite(settings.frameRate) || settings.frameRate <= 0) {
      throw AppError.writerInit('Writer frame rate must be positive.', {
        frameRate: settings.frameRate,
      });
    }

    const ffmpeg = createFFmpeg(
      this.corePath === undefined ? { log: false } : { corePath: this.corePath, log: false },
    );
    try {
      await loadWithoutFetch(ffmpeg);
    } catch (error) {
      throw AppError.writerInit('Failed to load the in-process ffmpeg core.', {}, error);
    }

    this.ffmpeg = ffmpeg;
    this.settings = settings;
    this.chunks = [];
    this.lastFrame = undefined;
    this.logger.debug({ settings }, 'Video writer opened');
  }

  public async write(frame: BgrFrame): Promise<void> {
    const { ffmpeg, settings } = this.requireOpen();

    if (!sameDimensions(frame, settings)) {
      throw AppError.fromError(
        new Error(
          `Frame is ${frame.width}x${frame.height}, writer expects ${settings.width}x${settings.height}`,
        ),
        'writer.frame-geometry-mismatch',
      );
    }

    if (this.lastFrame?.source === frame.data) {
      this.chunks.push(this.lastFrame.jpeg);
      return;
    }

    ffmpeg.FS('writeFile', RAW_FRAME_NAME, frame.data);
    try {
      await ffmpeg.run(
        ...buildBgrToJpegArgs({
          width: frame.width,
          height: frame.height,
          inputName: RAW_FRAME_NAME,
          outputName: JPEG_FRAME_NAME,
          quality: this.jpegQuality,
        }),
      );
      const jpeg = ffmpeg.FS('readFile', JPEG_FRAME_NAME);
      this.lastFrame = { source: frame.data, jpeg };
      this.chunks.push(jpeg);
    } finally {
      this.safeUnlink(RAW_FRAME_NAME);
      this.safeUnlink(JPEG_FRAME_NAME);
    }
  }

  public async finalize(): Promise<void> {
    const { ffmpeg, settings } = this.requireOpen();

    if (this.chunks.length === 0) {
      throw AppError.fromError(new Error('No frames were written'), 'writer.empty-stream');
    }

    ffmpeg.FS('writeFile', STREAM_NAME, Buffer.concat(this.chunks));
    try {
      await ffmpeg.run(...buildMjpegMuxArgs(STREAM_NAME, settings.frameRate, OUTPUT_NAME));
      const video = ffmpeg.FS('readFile', OUTPUT_NAME);
      await fs.mkdir(path.dirname(settings.outputPath), { recursive: true });
      await fs.writeFile(settings.outputPath, video);
    } finally {
      this.safeUnlink(STREAM_NAME);
      this.safeUnlink(OUTPUT_NAME);
    }

    this.logger.debug(
      { outputPath: settings.outputPath, frames: this.chunks.length },
      'Video writer finalized',
    );
  }

  public async release(): Promise<void> {
    this.chunks = [];
    this.lastFrame = undefined;
    this.settings = undefined;
    this.ffmpeg = undefined;
  }

  private requireOpen(): { ffmpeg: FFmpeg; settings: VideoWriterSettings } {
    if (!this.ffmpeg || !this.settings) {
      throw new Error('Video writer has not been opened');
    }
    return { ffmpeg: this.ffmpeg, settings: this.settings };
  }

  private safeUnlink(name: string): void {
    if (!this.ffmpeg) {
      return;
    }

    try {
      this.ffmpeg.FS('unlink', name);
    } catch (error) {
      this.logger.debug({ error, name }, 'Failed to unlink file from FFmpeg FS');
    }
  }
}

/**
 * The 0.11 core switches to URL loading whenever a global `fetch` exists,
 * which breaks its file-path lookup of `ffmpeg-core.wasm` on Node 18+.
 */
async function loadWithoutFetch(ffmpeg: FFmpeg): Promise<void> {
  const descriptor = Object.getOwnPropertyDescriptor(globalThis, 'fetch');
  if (descriptor) {
    Reflect.deleteProperty(globalThis, 'fetch');
  }

  try {
    await ffmpeg.load();
  } finally {
    if (descriptor) {
      Object.defineProperty(globalThis, 'fetch', descriptor);
    }
  }
}
