/**
 * Library entry point. The MCP server lives in `index.ts`; everything here is
 * usable without it.
 */

export { type Scalar, scalar, px, zero, add, sub, abs, max, min, compareScalars, isZero } from './types/scalar.js';
export { type Length, finite, unbounded, isUnbounded, shrink, fits, isPositive } from './types/length.js';
export { type Box, type PlacedBox, type PackedBoxes, type RectLike } from './types/box.js';
export { type PackConfig, type ResolvedPackConfig, resolvePackConfig } from './types/config.js';

export { FreeRegionTracker, splitRegion, type Region, type SplitResult } from './algorithms/free-regions.js';
export {
  pack,
  packBoxes,
  compareBoxes,
  nextPowerOfTwo,
  packingEfficiency,
  UnplaceableBoxError,
  type PackResult,
  type UnplaceableBox,
} from './algorithms/packer.js';
export { boxIntersections, type IndexPair } from './algorithms/intersections.js';
export { composeAtlas, type RgbaImage } from './algorithms/composite.js';

export {
  LAYOUT_FILE_VERSION,
  serializeLayout,
  parseLayout,
  loadLayoutFile,
  saveLayoutFile,
  spriteNameCodec,
  type JsonValue,
  type LayoutFile,
  type PayloadCodec,
} from './io/layout-io.js';
export { loadPngFile, savePngFile } from './io/image-io.js';
