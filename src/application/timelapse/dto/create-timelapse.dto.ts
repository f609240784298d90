import { z } from 'zod';

import type { Dimensions } from '../../../domain/timelapse/index.js';

const RESOLUTION_PATTERN = /^\s*(\d+)\s*x\s*(\d+)\s*$/;

export const sortModeSchema = z.enum(['name', 'mtime']);

export const secondsPerImageSchema = z
  .number({ invalid_type_error: 'Please enter a valid positive number!' })
  .finite('Please enter a valid positive number!')
  .positive('Please enter a valid positive number!');

export const resolutionSchema = z
  .string()
  .transform((value, ctx): Dimensions => {
    const match = RESOLUTION_PATTERN.exec(value);
    const width = Number(match?.[1]);
    const height = Number(match?.[2]);

    if (!match || width <= 0 || height <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Invalid size format. Use 'widthxheight' (e.g., 1280x720).",
      });
      return z.NEVER;
    }

    return { width, height };
  });

export const createTimelapseCommandSchema = z.object({
  sourceDir: z.string().trim().min(1, 'Please enter the folder with your images.'),
  sortMode: sortModeSchema.default('name'),
  secondsPerImage: secondsPerImageSchema,
  resolution: resolutionSchema.optional(),
  fileName: z.string().trim().min(1, 'File name cannot be empty!'),
  outputDir: z.string().trim().min(1, 'Please enter the folder where the video should be saved.'),
});

export type CreateTimelapsePayload = z.input<typeof createTimelapseCommandSchema>;

export type ValidCreateTimelapsePayload = z.output<typeof createTimelapseCommandSchema>;
