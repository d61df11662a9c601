import path from 'node:path';
import { ConfigError } from '../errors';
import type { ThumbnailerEnv } from '../env/loadEnv';

// ============================================================================
// Types
// ============================================================================

export interface CropSpec {
  readonly width: number;
  readonly height: number;
}

export type OutputFormat = 'jpeg' | 'png' | 'webp';

export const OUTPUT_FORMATS: Readonly<Record<OutputFormat, { extension: string; contentType: string }>> = {
  jpeg: { extension: 'jpg', contentType: 'image/jpeg' },
  png: { extension: 'png', contentType: 'image/png' },
  webp: { extension: 'webp', contentType: 'image/webp' },
};

export const DEFAULT_SIZES = ['200x200', '400x400', '800x800', '1920x1080'] as const;

export interface RemoteConfig {
  readonly bucket: string;
  readonly region: string;
  /** Prefix listed when fetching. */
  readonly prefix: string;
  /** Prefix used for published keys: the first segment of `prefix`. */
  readonly publishPrefix: string;
  readonly fetch: boolean;
}

export interface ThumbnailerConfig {
  readonly sourceRoot: string;
  readonly outputDir: string;
  readonly workDir: string;
  readonly sizes: readonly CropSpec[];
  readonly format: OutputFormat;
  readonly quality: number;
  readonly overwrite: boolean;
  readonly clean: boolean;
  readonly verbose: boolean;
  readonly concurrency: number;
  readonly transferConcurrency: number;
  readonly remote?: RemoteConfig;
}

/** Raw, unvalidated options as the CLI or a function event hands them over. */
export interface ThumbnailerArgs {
  path?: string;
  out?: string;
  s3Bucket?: string;
  s3Prefix?: string;
  fetchRemote?: boolean;
  overwrite?: boolean;
  clean?: boolean;
  verbose?: boolean;
  size?: readonly string[];
  format?: string;
  quality?: number;
  concurrency?: number;
}

// ============================================================================
// Parsing
// ============================================================================

const SIZE_RE = /^(\d+)x(\d+)$/;

/** Parses `WIDTHxHEIGHT`, e.g. `1920x1080`. */
export function parseCropSize(raw: string): CropSpec {
  const match = SIZE_RE.exec(raw.trim());
  if (!match) {
    throw new ConfigError(
      `Invalid size "${raw}". Use the expected format: WIDTHxHEIGHT, e.g.: 1920x1080`,
      { size: raw },
    );
  }
  const width = Number(match[1]);
  const height = Number(match[2]);
  if (!Number.isSafeInteger(width) || !Number.isSafeInteger(height) || width <= 0 || height <= 0) {
    throw new ConfigError(`Invalid size "${raw}": width and height must be positive integers`, { size: raw });
  }
  return { width, height };
}

export function formatCropSize(spec: CropSpec): string {
  return `${spec.width}x${spec.height}`;
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'jpeg' || value === 'png' || value === 'webp';
}

function parseFormat(raw: string | undefined): OutputFormat {
  const value = (raw || 'jpeg').trim().toLowerCase();
  if (value === 'jpg') return 'jpeg';
  if (!isOutputFormat(value)) {
    throw new ConfigError(`Unsupported format "${raw}" (expected jpeg, png or webp)`, { format: raw });
  }
  return value;
}

function positiveInt(name: string, value: number | undefined, fallback: number, max = Infinity): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value <= 0 || value > max) {
    const range = Number.isFinite(max) ? `an integer between 1 and ${max}` : 'a positive integer';
    throw new ConfigError(`--${name} must be ${range}`, { [name]: value });
  }
  return value;
}

/** Segments of an object-key prefix, ignoring a trailing slash (`gallery/2020/` → 2). */
export function prefixSegments(prefix: string): string[] {
  const trimmed = prefix.replace(/\/+$/, '');
  return trimmed ? trimmed.split('/') : [];
}

/** First segment of an object-key prefix (`gallery/2020` → `gallery`). */
export function topSegment(prefix: string): string {
  return prefixSegments(prefix)[0] ?? '';
}

// Prefix segments become local directory names under the working directory
function checkPrefix(prefix: string): void {
  const bad = prefixSegments(prefix).find((s) => s === '' || s === '.' || s === '..');
  if (bad !== undefined) {
    throw new ConfigError(
      `Invalid --s3-prefix "${prefix}": segments cannot be empty, "." or ".."`,
      { prefix },
    );
  }
}

// ============================================================================
// Build
// ============================================================================

/**
 * Validates raw options against the environment and returns the frozen configuration
 * every phase receives. Throws ConfigError before anything touches disk or network.
 */
export function buildConfig(args: ThumbnailerArgs, env: ThumbnailerEnv): ThumbnailerConfig {
  const bucket = args.s3Bucket?.trim() || '';
  const prefix = (args.s3Prefix?.trim() || '').replace(/^\/+/, '');
  const fetchRemote = args.fetchRemote === true;
  const localPath = args.path?.trim() || '';

  if (fetchRemote && !bucket) {
    throw new ConfigError('--fetch-remote requires --s3-bucket');
  }
  if (fetchRemote && localPath) {
    throw new ConfigError('--path conflicts with --fetch-remote');
  }
  if (prefix && !bucket) {
    throw new ConfigError('--s3-prefix requires --s3-bucket');
  }
  if (!fetchRemote && !localPath) {
    throw new ConfigError('Missing required arguments to run: pass --path, or --fetch-remote with --s3-bucket');
  }
  checkPrefix(prefix);

  const rawSizes: readonly string[] = args.size && args.size.length > 0 ? args.size : DEFAULT_SIZES;
  const sizes = Object.freeze(rawSizes.map(parseCropSize));

  const workDir = path.resolve(env.tmpDir);
  const sourceRoot = fetchRemote
    ? path.join(workDir, ...prefixSegments(prefix))
    : path.resolve(localPath);

  const remote: RemoteConfig | undefined = bucket
    ? Object.freeze({
      bucket,
      region: env.region,
      prefix,
      publishPrefix: topSegment(prefix),
      fetch: fetchRemote,
    })
    : undefined;

  return Object.freeze({
    sourceRoot,
    outputDir: args.out?.trim() ? path.resolve(args.out.trim()) : sourceRoot,
    workDir,
    sizes,
    format: parseFormat(args.format),
    quality: positiveInt('quality', args.quality, env.quality, 100),
    overwrite: args.overwrite === true,
    clean: args.clean !== false,
    verbose: args.verbose === true,
    concurrency: positiveInt('concurrency', args.concurrency, env.concurrency),
    transferConcurrency: env.transferConcurrency,
    remote,
  });
}

/** Human-readable summary printed in verbose mode. */
export function explainConfig(config: ThumbnailerConfig): string[] {
  const lines: string[] = ['*************** CONFIGURATION ***************'];
  const { remote } = config;

  if (remote) {
    lines.push(`Will publish files to bucket '${remote.bucket}' under '${remote.publishPrefix || '/'}' after completion`);
    lines.push(`Will overwrite files on remote: ${config.overwrite}`);
  }
  if (remote?.fetch) {
    lines.push(`Fetching files from remote: ${remote.bucket}/${remote.prefix}`);
  } else {
    lines.push(`Path to source files locally on this host: ${config.sourceRoot}`);
  }
  lines.push(`Output directory: ${config.outputDir}`);
  lines.push(`Working/temporary directory: ${config.workDir}`);
  if (remote?.fetch && config.clean) {
    lines.push('Will clean working directory before starting');
  }
  lines.push(`Will crop to the following ${config.sizes.length} size(s) as ${config.format}:`);
  for (const size of config.sizes) {
    lines.push(`\t${formatCropSize(size)}`);
  }
  lines.push('*************** END CONFIGURATION ***************');
  return lines;
}
