/**
 * Thumbnailer - library entry point
 *
 * Batch resize-to-fill for a directory, optionally fetched from and published back to an
 * S3-compatible bucket. Run as: thumbnailer --path ./gallery -s 200x200 -s 400x400
 *
 * Output naming (shared with existing buckets):
 *   {stem}_{width}x{height}px_{width}w.{ext}
 */

export { runThumbnailer, type RunDeps, type RunSummary } from './run';

export {
  buildConfig,
  parseCropSize,
  formatCropSize,
  explainConfig,
  prefixSegments,
  DEFAULT_SIZES,
  OUTPUT_FORMATS,
  type CropSpec,
  type OutputFormat,
  type ThumbnailerArgs,
  type ThumbnailerConfig,
} from './shared/config/config';

export { loadEnv, type ThumbnailerEnv } from './shared/env/loadEnv';

export {
  ThumbnailerError,
  IOError,
  RemoteError,
  TransformError,
  ConfigError,
  type Result,
} from './shared/errors';

export {
  deriveThumbPath,
  isDerivative,
  underscorePolicy,
  markerPolicy,
  type DerivativePolicy,
} from './shared/logic/derivatives';

export { reportProgress, progressThreshold } from './shared/logic/progress';

export {
  createS3Client,
  createS3ObjectStore,
  type ObjectStore,
} from './shared/persistence/objectStore';

export { resolveSourceFiles } from './stages/resolve/fileSet';
export { sharpTransformer, type ImageTransformer, type RasterImage } from './stages/images/transformer';
export { transformAll, type TransformAllResult, type UnitOutcome } from './stages/images/engine';
export { fetchSources, publishOutputs } from './stages/remote/reconciler';
