/**
 * Remote reconciliation
 *
 * fetch: list a bucket prefix, keep only keys that look like originals, download them into
 *   the working directory (dropping the prefix's segments from each key).
 * publish: upload a run's outputs as {prefix}/{basename}.
 *
 * Known limitation: publish keys are built from the basename alone, so the
 * working-directory part of each local path and any directory structure below it are
 * discarded. Two remote prefixes that share a first segment (`gallery/a/...`,
 * `gallery/b/...`) publish into the same `gallery/` namespace and can overwrite each other.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import PQueue from 'p-queue';
import { OUTPUT_FORMATS, prefixSegments, type OutputFormat } from '../../shared/config/config';
import { IOError, RemoteError, errorMessage } from '../../shared/errors';
import { log } from '../../shared/logging/logger';
import {
  hasLegacySizeToken,
  legacySizeTokens,
  markerPolicy,
  underscorePolicy,
  type DerivativePolicy,
} from '../../shared/logic/derivatives';
import { createProgressTracker, type ProgressEmitter } from '../../shared/logic/progress';
import type { ObjectStore } from '../../shared/persistence/objectStore';

// ============================================================================
// Key selection
// ============================================================================

export type SkipReason = 'marker' | 'legacy-size' | 'derivative' | 'folder-marker';

export interface KeySelection {
  accepted: string[];
  skipped: Array<{ key: string; reason: SkipReason }>;
}

export interface SelectKeysOptions {
  /** Listed prefix; legacy size tokens are only looked for below it. */
  prefix?: string;
  overwrite: boolean;
  widths: readonly number[];
  /** Predicate applied when not overwriting. */
  policy?: DerivativePolicy;
}

/**
 * Decides which listed keys are genuine sources.
 * - always skipped: empty and folder-marker keys (`{prefix}/`), exact thumbnail markers,
 *   legacy size tokens (`_{width}` for every configured width, `_thumb`) in the part of the
 *   key below the prefix, so a prefix like `photos_2001/` does not hide its own keys
 * - skipped unless overwriting: anything the derivative policy matches (by default any
 *   underscore in the name)
 */
export function selectSourceKeys(keys: readonly string[], opts: SelectKeysOptions): KeySelection {
  const policy = opts.policy ?? underscorePolicy;
  const prefix = opts.prefix ?? '';
  const tokens = legacySizeTokens(opts.widths);
  const accepted: string[] = [];
  const skipped: KeySelection['skipped'] = [];

  for (const key of keys) {
    if (key === '' || key.endsWith('/')) {
      skipped.push({ key, reason: 'folder-marker' });
    } else if (markerPolicy.isDerivative(key)) {
      skipped.push({ key, reason: 'marker' });
    } else if (hasLegacySizeToken(keyBelowPrefix(key, prefix), tokens)) {
      skipped.push({ key, reason: 'legacy-size' });
    } else if (!opts.overwrite && policy.isDerivative(key)) {
      skipped.push({ key, reason: 'derivative' });
    } else {
      accepted.push(key);
    }
  }

  return { accepted, skipped };
}

function keyBelowPrefix(key: string, prefix: string): string {
  return prefix && key.startsWith(prefix) ? key.slice(prefix.length) : key;
}

/**
 * Local path for a key: the prefix's segments are dropped and the rest joined under
 * `destinationDir` (prefix `gallery/2020`: `gallery/2020/img1.jpg` → `{dest}/img1.jpg`).
 * A key no deeper than the prefix keeps its last segment. Dot segments are discarded.
 */
export function localPathForKey(key: string, prefix: string, destinationDir: string): string {
  const depth = prefixSegments(prefix).length;
  const segments = key.split('/').filter((s) => s !== '' && s !== '.' && s !== '..');
  const rest = segments.length > depth ? segments.slice(depth) : segments.slice(-1);
  return path.join(destinationDir, ...rest);
}

// ============================================================================
// Fetch
// ============================================================================

export interface FetchOptions {
  bucket: string;
  prefix: string;
  destinationDir: string;
  overwrite: boolean;
  widths: readonly number[];
  policy?: DerivativePolicy;
  concurrency?: number;
  verbose?: boolean;
  emit?: ProgressEmitter;
}

export interface FetchStats {
  listed: number;
  skipped: number;
  downloaded: number;
  failed: number;
}

export interface FetchResult {
  /** Local paths of downloaded originals, in listing order. */
  sources: string[];
  stats: FetchStats;
}

export async function fetchSources(store: ObjectStore, opts: FetchOptions): Promise<FetchResult> {
  const { bucket, prefix, destinationDir, concurrency = 8, verbose = false } = opts;

  log.fetch.info(`Downloading files from bucket '${bucket}' (${prefix || '/'})...`);
  const keys = await store.list(bucket, prefix);
  const { accepted, skipped } = selectSourceKeys(keys, opts);
  for (const s of skipped) log.fetch.debug('skip key', { key: s.key, reason: s.reason });

  log.fetch.info(`Downloading ${accepted.length} files to ${destinationDir} (skipped ${skipped.length})`);

  const progress = createProgressTracker('Downloaded', accepted.length, verbose, opts.emit);
  const queue = new PQueue({ concurrency });

  const results = await Promise.all(accepted.map((key) => queue.add(async (): Promise<string | null> => {
    const target = localPathForKey(key, prefix, destinationDir);
    try {
      const body = await store.get(bucket, key);
      try {
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, body);
      } catch (err) {
        throw new IOError(`write failed: ${errorMessage(err)}`, { target }, err);
      }
      return target;
    } catch (err) {
      log.fetch.warn('download failed', { key, error: errorMessage(err) });
      return null;
    } finally {
      progress.complete();
    }
  })));

  const sources = results.filter((r): r is string => r !== null);
  const stats: FetchStats = {
    listed: keys.length,
    skipped: skipped.length,
    downloaded: sources.length,
    failed: accepted.length - sources.length,
  };
  log.fetch.info('fetch complete', { ...stats });

  if (accepted.length > 0 && sources.length === 0) {
    throw new RemoteError(`all ${accepted.length} downloads failed`, { bucket, prefix });
  }

  return { sources, stats };
}

// ============================================================================
// Publish
// ============================================================================

/** `{prefix}/{basename}`; just the basename when there is no prefix. */
export function publishKey(filePath: string, prefix: string): string {
  const base = path.basename(filePath);
  const trimmed = prefix.replace(/^\/+|\/+$/g, '');
  return trimmed ? `${trimmed}/${base}` : base;
}

export interface PublishOptions {
  bucket: string;
  prefix: string;
  files: readonly string[];
  format: OutputFormat;
  concurrency?: number;
  verbose?: boolean;
  emit?: ProgressEmitter;
}

export interface PublishStats {
  total: number;
  uploaded: number;
  failed: number;
}

/**
 * Uploads every file. Failures are isolated per file while the phase runs; once all have
 * settled, any failure fails the phase with a RemoteError listing the keys.
 */
export async function publishOutputs(store: ObjectStore, opts: PublishOptions): Promise<PublishStats> {
  const { bucket, prefix, files, format, concurrency = 8, verbose = false } = opts;
  const contentType = OUTPUT_FORMATS[format].contentType;

  log.publish.info(`Uploading ${files.length} files to bucket '${bucket}'`, { prefix: prefix || '/' });

  const progress = createProgressTracker('Uploaded', files.length, verbose, opts.emit);
  const queue = new PQueue({ concurrency });

  const failedKeys = await Promise.all(files.map((file) => queue.add(async (): Promise<string | null> => {
    const key = publishKey(file, prefix);
    try {
      const body = await fs.readFile(file);
      await store.put(bucket, key, body, contentType);
      return null;
    } catch (err) {
      log.publish.warn('upload failed', { file, key, error: errorMessage(err) });
      return key;
    } finally {
      progress.complete();
    }
  })));

  const failed = failedKeys.filter((k): k is string => k !== null);
  const stats: PublishStats = { total: files.length, uploaded: files.length - failed.length, failed: failed.length };
  log.publish.info('publish complete', { ...stats });

  if (failed.length > 0) {
    throw new RemoteError(`${failed.length} of ${files.length} uploads failed: ${failed.join(', ')}`, {
      bucket,
      failed: failed.length,
    });
  }

  return stats;
}
