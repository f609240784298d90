import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { createCanvas } from '@napi-rs/canvas';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { TimelapseJob } from '@domain/timelapse/index.js';

import { CanvasFrameNormalizer } from '@/infrastructure/image/canvas-frame-normalizer.js';
import { FfmpegWasmVideoWriter } from '@/infrastructure/writer/ffmpeg-wasm-video-writer.js';
import { FrameDuplicationEncoder } from '@/infrastructure/writer/frame-duplication-encoder.js';

describe('FrameDuplicationEncoder with the in-process ffmpeg core', () => {
  let dir: string;
  const colours = ['#c0392b', '#27ae60', '#2980b9'];

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'stillmotion-wasm-'));

    for (const [index, colour] of colours.entries()) {
      const canvas = createCanvas(64, 48);
      const ctx = canvas.getContext('2d');
      ctx.fillStyle = colour;
      ctx.fillRect(0, 0, 64, 48);
      await fs.writeFile(path.join(dir, `still-${index}.png`), canvas.toBuffer('image/png'));
    }
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes a playable MP4 from three stills', { timeout: 120_000 }, async () => {
    const fetchBefore = globalThis.fetch;
    const job = TimelapseJob.create({
      id: 'job-wasm',
      frames: colours.map((_, index) => ({
        path: path.join(dir, `still-${index}.png`),
        name: `still-${index}.png`,
        modifiedAtMs: index,
      })),
      secondsPerImage: 0.1,
      outputPath: path.join(dir, 'fallback.mp4'),
      createdAt: new Date(0),
    });

    const encoder = new FrameDuplicationEncoder({
      normalizer: new CanvasFrameNormalizer(),
      createWriter: () => new FfmpegWasmVideoWriter(),
    });

    await expect(encoder.encode(job)).resolves.toBe(job.outputPath);

    const video = await fs.readFile(job.outputPath);
    expect(video.length).toBeGreaterThan(0);
    expect(video.subarray(4, 8).toString('latin1')).toBe('ftyp');
    expect(globalThis.fetch).toBe(fetchBefore);
  });
});
