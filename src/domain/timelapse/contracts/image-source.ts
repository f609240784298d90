import type { SortMode, SourceImage } from '../value-objects/source-image.js';

export interface ImageSource {
  directoryExists(directory: string): Promise<boolean>;
  collect(directory: string, sortMode: SortMode): Promise<SourceImage[]>;
}
