import { promises as fs } from 'node:fs';
import path from 'node:path';

import {
  type ImageSource,
  isSupportedImageName,
  type SortMode,
  type SourceImage,
} from '../../domain/timelapse/index.js';
import { createChildLogger } from '../../shared/logger/pino.js';

export class ImageCollector implements ImageSource {
  private readonly logger = createChildLogger({ module: 'ImageCollector' });

  public async directoryExists(directory: string): Promise<boolean> {
    try {
      const stats = await fs.stat(directory);
      return stats.isDirectory();
    } catch (error) {
      if (isMissingPathError(error)) {
        return false;
      }
      throw error;
    }
  }

  public async collect(directory: string, sortMode: SortMode): Promise<SourceImage[]> {
    const entries = await fs.readdir(directory, { withFileTypes: true });

    const images = await Promise.all(
      entries
        .filter((entry) => entry.isFile() && isSupportedImageName(entry.name))
        .map(async (entry) => {
          const fullPath = path.join(directory, entry.name);
          const stats = await fs.stat(fullPath);
          return {
            path: fullPath,
            name: entry.name,
            modifiedAtMs: stats.mtimeMs,
          } satisfies SourceImage;
        }),
    );

    const sorted = sortImages(images, sortMode);
    this.logger.debug({ directory, sortMode, count: sorted.length }, 'Collected source images');
    return sorted;
  }
}

export function sortImages(images: readonly SourceImage[], sortMode: SortMode): SourceImage[] {
  const byPath = [...images].sort((a, b) => compareCodeUnits(a.path, b.path));

  if (sortMode === 'name') {
    return byPath;
  }

  // Array#sort is stable, so equal timestamps keep path order.
  return byPath.sort((a, b) => a.modifiedAtMs - b.modifiedAtMs);
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function isMissingPathError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}
