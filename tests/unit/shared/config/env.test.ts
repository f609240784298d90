import path from 'node:path';

import { describe, expect, test } from 'vitest';

import { defaultFfmpegPath, loadConfig } from '../../../../src/shared/config/env.js';
import { AppError } from '../../../../src/shared/errors/app-error.js';

describe('loadConfig', () => {
  test('falls back to defaults', () => {
    const config = loadConfig({});
    expect(config.crf).toBe(23);
    expect(config.preset).toBe('medium');
    expect(config.logLevel).toBe('warn');
    expect(config.ffmpegPath).toBe(defaultFfmpegPath());
    expect(config.ffmpegCorePath).toBeUndefined();
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      FFMPEG_PATH: '/opt/ffmpeg/bin/ffmpeg',
      TIMELAPSE_CRF: '18',
      TIMELAPSE_PRESET: 'slow',
      LOG_LEVEL: 'debug',
    });
    expect(config.ffmpegPath).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(config.crf).toBe(18);
    expect(config.preset).toBe('slow');
    expect(config.logLevel).toBe('debug');
  });

  test('rejects an out of range CRF', () => {
    expect(() => loadConfig({ TIMELAPSE_CRF: '60' })).toThrow(AppError);
  });

  test('resolves the bundled binary per platform', () => {
    expect(defaultFfmpegPath('/srv/app', 'linux')).toBe(path.join('/srv/app', 'bin', 'ffmpeg', 'ffmpeg'));
    expect(defaultFfmpegPath('/srv/app', 'win32')).toBe(
      path.join('/srv/app', 'bin', 'ffmpeg', 'ffmpeg.exe'),
    );
  });
});
