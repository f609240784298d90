/**
 * A still picked up from the source folder. Never modified in place.
 */
export interface SourceImage {
  readonly path: string;
  readonly name: string;
  readonly modifiedAtMs: number;
}

export type SortMode = 'name' | 'mtime';

export const SUPPORTED_IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg'] as const;

export function isSupportedImageName(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return SUPPORTED_IMAGE_EXTENSIONS.some((extension) => lower.endsWith(extension));
}
