import path from 'node:path';

import type { X264Preset } from '../config/env.js';
import { stillInputFrameRate } from './frameTiming.js';

export const FRAME_FILE_PATTERN = 'frame_%06d.png';

export interface StillSequenceEncodeOptions {
  framesDir: string;
  outputPath: string;
  secondsPerImage: number;
  crf: number;
  preset: X264Preset;
}

export function frameFileName(index: number): string {
  return `frame_${index.toString().padStart(6, '0')}.png`;
}

/**
 * Arguments for an H.264 MP4 built from numbered stills, one encoded frame
 * per still.
 */
export function buildStillSequenceArgs(options: StillSequenceEncodeOptions): string[] {
  return [
    '-y',
    '-framerate',
    `${stillInputFrameRate(options.secondsPerImage)}`,
    '-i',
    path.join(options.framesDir, FRAME_FILE_PATTERN),
    '-c:v',
    'libx264',
    '-pix_fmt',
    'yuv420p',
    '-crf',
    `${options.crf}`,
    '-preset',
    options.preset,
    options.outputPath,
  ];
}

export interface MjpegFrameEncodeOptions {
  width: number;
  height: number;
  inputName: string;
  outputName: string;
  quality: number;
}

export function buildBgrToJpegArgs(options: MjpegFrameEncodeOptions): string[] {
  return [
    '-f',
    'rawvideo',
    '-pix_fmt',
    'bgr24',
    '-s',
    `${options.width}x${options.height}`,
    '-i',
    options.inputName,
    '-frames:v',
    '1',
    '-c:v',
    'mjpeg',
    '-q:v',
    `${options.quality}`,
    '-f',
    'mjpeg',
    options.outputName,
  ];
}

export function buildMjpegMuxArgs(streamName: string, frameRate: number, outputName: string): string[] {
  return [
    '-y',
    '-f',
    'mjpeg',
    '-framerate',
    `${frameRate}`,
    '-i',
    streamName,
    '-c:v',
    'copy',
    '-movflags',
    '+faststart',
    '-f',
    'mp4',
    outputName,
  ];
}
