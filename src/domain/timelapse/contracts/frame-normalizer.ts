import type { Dimensions } from '../value-objects/dimensions.js';

/**
 * A decoded still with three opaque colour channels, already at its final
 * geometry.
 */
export interface PreparedFrame extends Dimensions {
  toPng(): Buffer;
  toBgr(): Buffer;
}

export interface FrameNormalizer {
  prepare(sourcePath: string, resize?: Dimensions): Promise<PreparedFrame>;
}
