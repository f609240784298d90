import { promises as fs } from 'node:fs';

import { type Canvas, createCanvas, loadImage } from '@napi-rs/canvas';

import type { Dimensions, FrameNormalizer, PreparedFrame } from '../../domain/timelapse/index.js';
import { rgbaToBgr } from '../../shared/media/pixelFormat.js';

const BACKGROUND = '#000000';

class CanvasFrame implements PreparedFrame {
  public readonly width: number;

  public readonly height: number;

  public constructor(private readonly canvas: Canvas) {
    this.width = canvas.width;
    this.height = canvas.height;
  }

  public toPng(): Buffer {
    return this.canvas.toBuffer('image/png');
  }

  public toBgr(): Buffer {
    const ctx = this.canvas.getContext('2d');
    const imageData = ctx.getImageData(0, 0, this.width, this.height);
    return rgbaToBgr(imageData.data, this.width, this.height);
  }
}

/**
 * Decodes PNG and JPEG stills onto an opaque canvas so every frame ends up
 * with the same three channels. A requested size is always forced; aspect
 * ratio is not kept.
 */
export class CanvasFrameNormalizer implements FrameNormalizer {
  public async prepare(sourcePath: string, resize?: Dimensions): Promise<PreparedFrame> {
    const image = await loadImage(await fs.readFile(sourcePath));
    const width = resize?.width ?? image.width;
    const height = resize?.height ?? image.height;

    const canvas = createCanvas(width, height);
    const ctx = canvas.getContext('2d');
    ctx.fillStyle = BACKGROUND;
    ctx.fillRect(0, 0, width, height);
    ctx.imageSmoothingEnabled = true;
    ctx.imageSmoothingQuality = 'high';
    ctx.drawImage(image, 0, 0, width, height);

    return new CanvasFrame(canvas);
  }
}
