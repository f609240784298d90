import type { Dimensions } from '../value-objects/dimensions.js';

export type WriterCodec = 'mjpeg';

export interface VideoWriterSettings extends Dimensions {
  readonly outputPath: string;
  readonly frameRate: number;
  readonly codec: WriterCodec;
}

/** Packed BGR24 pixels, `width * height * 3` bytes. */
export interface BgrFrame extends Dimensions {
  readonly data: Buffer;
}

export interface VideoWriter {
  open(settings: VideoWriterSettings): Promise<void>;
  write(frame: BgrFrame): Promise<void>;
  /** Writes the output file. Only called after every frame was written. */
  finalize(): Promise<void>;
  /** Frees the writer. Safe to call on every exit path, more than once. */
  release(): Promise<void>;
}

export type VideoWriterFactory = () => VideoWriter;
