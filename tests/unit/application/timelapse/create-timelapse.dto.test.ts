import { describe, expect, test } from 'vitest';

import {
  createTimelapseCommandSchema,
  resolutionSchema,
  secondsPerImageSchema,
} from '@/application/timelapse/index.js';

describe('resolutionSchema', () => {
  test('parses WIDTHxHEIGHT', () => {
    expect(resolutionSchema.parse('1280x720')).toEqual({ width: 1280, height: 720 });
    expect(resolutionSchema.parse(' 1920 x 1080 ')).toEqual({ width: 1920, height: 1080 });
  });

  test.each(['abcx720', '1280', '1280x', 'x720', '0x720', '1280X720', '-5x10', '12.5x10'])(
    'rejects %s',
    (value) => {
      const parsed = resolutionSchema.safeParse(value);
      expect(parsed.success).toBe(false);
      expect(parsed.error?.issues[0]?.message).toBe(
        "Invalid size format. Use 'widthxheight' (e.g., 1280x720).",
      );
    },
  );
});

describe('secondsPerImageSchema', () => {
  test('accepts positive numbers only', () => {
    expect(secondsPerImageSchema.safeParse(0.5).success).toBe(true);
    expect(secondsPerImageSchema.safeParse(0).success).toBe(false);
    expect(secondsPerImageSchema.safeParse(-2).success).toBe(false);
    expect(secondsPerImageSchema.safeParse(Number.NaN).success).toBe(false);
  });
});

describe('createTimelapseCommandSchema', () => {
  test('defaults the sort mode to name and trims text fields', () => {
    const parsed = createTimelapseCommandSchema.parse({
      sourceDir: ' /photos ',
      secondsPerImage: 2,
      fileName: ' trip ',
      outputDir: '/videos',
    });

    expect(parsed).toEqual({
      sourceDir: '/photos',
      sortMode: 'name',
      secondsPerImage: 2,
      fileName: 'trip',
      outputDir: '/videos',
    });
  });

  test('rejects an empty file name', () => {
    const parsed = createTimelapseCommandSchema.safeParse({
      sourceDir: '/photos',
      secondsPerImage: 2,
      fileName: '   ',
      outputDir: '/videos',
    });
    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues[0]?.message).toBe('File name cannot be empty!');
  });
});
