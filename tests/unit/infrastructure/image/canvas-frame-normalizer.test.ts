import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { createCanvas } from '@napi-rs/canvas';
import { PNG } from 'pngjs';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { CanvasFrameNormalizer } from '@/infrastructure/image/canvas-frame-normalizer.js';

describe('CanvasFrameNormalizer', () => {
  let dir: string;
  let redPng: string;
  let translucentPng: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stillmotion-normalize-'));

    const red = createCanvas(40, 20);
    const redCtx = red.getContext('2d');
    redCtx.fillStyle = '#ff0000';
    redCtx.fillRect(0, 0, 40, 20);
    redPng = path.join(dir, 'red.png');
    await fs.writeFile(redPng, red.toBuffer('image/png'));

    // Fully transparent canvas.
    const clear = createCanvas(4, 4);
    translucentPng = path.join(dir, 'clear.png');
    await fs.writeFile(translucentPng, clear.toBuffer('image/png'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('keeps the natural size when no resize is requested', async () => {
    const frame = await new CanvasFrameNormalizer().prepare(redPng);
    expect(frame.width).toBe(40);
    expect(frame.height).toBe(20);
  });

  it('forces the requested size without keeping the aspect ratio', async () => {
    const frame = await new CanvasFrameNormalizer().prepare(redPng, { width: 16, height: 16 });
    expect(frame.width).toBe(16);
    expect(frame.height).toBe(16);

    const decoded = PNG.sync.read(frame.toPng());
    expect(decoded.width).toBe(16);
    expect(decoded.height).toBe(16);
    expect(frame.toBgr()).toHaveLength(16 * 16 * 3);
  });

  it('emits BGR channel order', async () => {
    const frame = await new CanvasFrameNormalizer().prepare(redPng);
    const bgr = frame.toBgr();
    expect([...bgr.subarray(0, 3)]).toEqual([0, 0, 255]);
  });

  it('flattens transparency onto an opaque black background', async () => {
    const frame = await new CanvasFrameNormalizer().prepare(translucentPng);
    const decoded = PNG.sync.read(frame.toPng());
    expect([...decoded.data.subarray(0, 4)]).toEqual([0, 0, 0, 255]);
    expect([...frame.toBgr().subarray(0, 3)]).toEqual([0, 0, 0]);
  });
});
