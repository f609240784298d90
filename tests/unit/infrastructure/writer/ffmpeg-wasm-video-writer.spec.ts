import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const wasm = vi.hoisted(() => {
  const files = new Map<string, Uint8Array>();
  const runs: string[][] = [];
  const state = {
    loadError: undefined as Error | undefined,
    jpegCounter: 0,
    fetchDuringLoad: 'unset',
  };

  const instance = {
    load: vi.fn(async () => {
      state.fetchDuringLoad = typeof globalThis.fetch;
      if (state.loadError) {
        throw state.loadError;
      }
    }),
    run: vi.fn(async (...args: string[]) => {
      runs.push(args);
      const output = args.at(-1) ?? '';
      if (output === 'frame.jpg') {
        state.jpegCounter += 1;
        files.set(output, Uint8Array.from([0xff, 0xd8, state.jpegCounter]));
      } else if (output === 'output.mp4') {
        const stream = files.get('stream.mjpeg') ?? new Uint8Array();
        files.set(output, Uint8Array.from([...Buffer.from('mp4:'), ...stream]));
      }
    }),
    FS: vi.fn((operation: string, name: string, data?: Uint8Array) => {
      if (operation === 'writeFile' && data) {
        files.set(name, Uint8Array.from(data));
        return undefined;
      }
      if (operation === 'readFile') {
        const content = files.get(name);
        if (!content) {
          throw new Error(`ENOENT ${name}`);
        }
        return content;
      }
      if (operation === 'unlink') {
        if (!files.delete(name)) {
          throw new Error(`ENOENT ${name}`);
        }
      }
      return undefined;
    }),
  };

  return { files, runs, state, instance };
});

vi.mock('@ffmpeg/ffmpeg', () => ({
  createFFmpeg: vi.fn(() => wasm.instance),
}));

import { createFFmpeg } from '@ffmpeg/ffmpeg';

import { FfmpegWasmVideoWriter } from '@/infrastructure/writer/ffmpeg-wasm-video-writer.js';

describe('FfmpegWasmVideoWriter', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'stillmotion-writer-'));
    vi.clearAllMocks();
    wasm.files.clear();
    wasm.runs.length = 0;
    wasm.state.loadError = undefined;
    wasm.state.jpegCounter = 0;
    wasm.state.fetchDuringLoad = 'unset';
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  const settings = (overrides: Partial<{ width: number; height: number }> = {}) => ({
    outputPath: path.join(outputDir, 'movie.mp4'),
    frameRate: 30,
    codec: 'mjpeg' as const,
    width: overrides.width ?? 2,
    height: overrides.height ?? 1,
  });

  it('encodes each distinct frame once and muxes the stream into the output file', async () => {
    const writer = new FfmpegWasmVideoWriter();
    await writer.open(settings());

    const first = Buffer.from([1, 2, 3, 4, 5, 6]);
    const second = Buffer.from([6, 5, 4, 3, 2, 1]);
    await writer.write({ width: 2, height: 1, data: first });
    await writer.write({ width: 2, height: 1, data: first });
    await writer.write({ width: 2, height: 1, data: first });
    await writer.write({ width: 2, height: 1, data: second });
    await writer.finalize();
    await writer.release();

    const jpegRuns = wasm.runs.filter((args) => args.at(-1) === 'frame.jpg');
    expect(jpegRuns).toHaveLength(2);
    expect(jpegRuns[0]?.slice(0, 6)).toEqual(['-f', 'rawvideo', '-pix_fmt', 'bgr24', '-s', '2x1']);

    const written = await fs.readFile(path.join(outputDir, 'movie.mp4'));
    expect([...written]).toEqual([
      ...Buffer.from('mp4:'),
      0xff, 0xd8, 1,
      0xff, 0xd8, 1,
      0xff, 0xd8, 1,
      0xff, 0xd8, 2,
    ]);
    expect(wasm.files.size).toBe(0);
  });

  it('rejects geometry it cannot open with a WriterInitError', async () => {
    const writer = new FfmpegWasmVideoWriter();

    await expect(writer.open(settings({ width: 0 }))).rejects.toMatchObject({ kind: 'writer-init' });
    await expect(writer.open(settings({ width: 10_000 }))).rejects.toMatchObject({
      kind: 'writer-init',
    });
    expect(wasm.instance.load).not.toHaveBeenCalled();
  });

  it('wraps a core load failure in a WriterInitError', async () => {
    wasm.state.loadError = new Error('wasm unavailable');
    const writer = new FfmpegWasmVideoWriter();

    await expect(writer.open(settings())).rejects.toMatchObject({
      kind: 'writer-init',
      message: 'Failed to load the in-process ffmpeg core.',
    });
  });

  it('leaves the core path to the library unless one is configured', async () => {
    await new FfmpegWasmVideoWriter().open(settings());
    await new FfmpegWasmVideoWriter({ corePath: '/opt/ffmpeg-core.js' }).open(settings());

    expect(vi.mocked(createFFmpeg).mock.calls).toEqual([
      [{ log: false }],
      [{ corePath: '/opt/ffmpeg-core.js', log: false }],
    ]);
  });

  it('hides the global fetch while the core loads and restores it afterwards', async () => {
    const fetchBefore = globalThis.fetch;
    await new FfmpegWasmVideoWriter().open(settings());

    expect(wasm.state.fetchDuringLoad).toBe('undefined');
    expect(globalThis.fetch).toBe(fetchBefore);

    wasm.state.loadError = new Error('wasm unavailable');
    await expect(new FfmpegWasmVideoWriter().open(settings())).rejects.toMatchObject({ kind: 'writer-init' });
    expect(globalThis.fetch).toBe(fetchBefore);
  });

  it('refuses frames that do not match the opened geometry', async () => {
    const writer = new FfmpegWasmVideoWriter();
    await writer.open(settings());

    await expect(
      writer.write({ width: 1, height: 1, data: Buffer.from([1, 2, 3]) }),
    ).rejects.toMatchObject({ code: 'writer.frame-geometry-mismatch' });
  });

  it('leaves no output file when released without finalizing', async () => {
    const writer = new FfmpegWasmVideoWriter();
    await writer.open(settings());
    await writer.write({ width: 2, height: 1, data: Buffer.alloc(6) });
    await writer.release();

    await expect(fs.access(path.join(outputDir, 'movie.mp4'))).rejects.toThrow();
  });
});
