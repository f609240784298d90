import path from 'node:path';

import { z } from 'zod';

import { AppError } from '../errors/app-error.js';

export const X264_PRESETS = [
  'ultrafast',
  'superfast',
  'veryfast',
  'faster',
  'fast',
  'medium',
  'slow',
  'slower',
  'veryslow',
] as const;

export type X264Preset = (typeof X264_PRESETS)[number];

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('warn'),
  FFMPEG_PATH: z.string().trim().min(1).optional(),
  FFMPEG_CORE_PATH: z.string().trim().min(1).optional(),
  TIMELAPSE_CRF: z.coerce.number().int().min(0).max(51).default(23),
  TIMELAPSE_PRESET: z.enum(X264_PRESETS).default('medium'),
});

export interface AppConfig {
  readonly logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  readonly ffmpegPath: string;
  readonly ffmpegCorePath?: string;
  readonly crf: number;
  readonly preset: X264Preset;
}

export function defaultFfmpegPath(
  cwd = process.cwd(),
  platform: NodeJS.Platform = process.platform,
): string {
  const binary = platform === 'win32' ? 'ffmpeg.exe' : 'ffmpeg';
  return path.join(cwd, 'bin', 'ffmpeg', binary);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw AppError.validation('config.invalid-environment', 'Invalid environment configuration.', {
      issues: parsed.error.issues,
    });
  }

  const values = parsed.data;

  return {
    logLevel: values.LOG_LEVEL,
    ffmpegPath: values.FFMPEG_PATH ?? defaultFfmpegPath(),
    ffmpegCorePath: values.FFMPEG_CORE_PATH,
    crf: values.TIMELAPSE_CRF,
    preset: values.TIMELAPSE_PRESET,
  };
}
