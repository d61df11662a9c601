/**
 * Pipeline: fetch (optional) → resolve → transform → publish (optional).
 *
 * Phases run strictly one after another; each receives the same frozen config. Any
 * phase-fatal error (IOError, RemoteError) propagates to the caller.
 */

import { explainConfig, type ThumbnailerConfig } from './shared/config/config';
import type { ThumbnailerEnv } from './shared/env/loadEnv';
import { log } from './shared/logging/logger';
import { defaultPolicy, type DerivativePolicy } from './shared/logic/derivatives';
import type { ProgressEmitter } from './shared/logic/progress';
import { createS3Client, createS3ObjectStore, type ObjectStore } from './shared/persistence/objectStore';
import { ensureDir, prepareWorkDir } from './shared/persistence/workDir';
import { since } from './shared/timing';
import { transformAll, type TransformStats } from './stages/images/engine';
import type { ImageTransformer } from './stages/images/transformer';
import { fetchSources, publishOutputs, type FetchStats, type PublishStats } from './stages/remote/reconciler';
import { resolveSourceFiles } from './stages/resolve/fileSet';

export interface RunDeps {
  /** Object store to use instead of an S3 client built from env. */
  store?: ObjectStore;
  transformer?: ImageTransformer;
  policy?: DerivativePolicy;
  emit?: ProgressEmitter;
}

export interface RunSummary {
  fetch?: FetchStats;
  resolve: { sources: number; skippedDerivatives: number };
  transform: TransformStats;
  publish?: PublishStats;
  outputs: string[];
  seconds: number;
}

export async function runThumbnailer(
  config: ThumbnailerConfig,
  env: ThumbnailerEnv,
  deps: RunDeps = {},
): Promise<RunSummary> {
  const started = Date.now();
  const policy = deps.policy ?? defaultPolicy;
  const { remote } = config;

  if (config.verbose) {
    for (const line of explainConfig(config)) log.config.info(line);
  }

  let store: ObjectStore | undefined = deps.store;
  const getStore = (): ObjectStore => {
    if (!store) store = createS3ObjectStore(createS3Client(env, remote?.region));
    return store;
  };

  let fetchStats: FetchStats | undefined;
  if (remote?.fetch) {
    await prepareWorkDir(config.sourceRoot, {
      clean: config.clean || config.overwrite,
      root: config.workDir,
    });
    const fetched = await fetchSources(getStore(), {
      bucket: remote.bucket,
      prefix: remote.prefix,
      destinationDir: config.sourceRoot,
      overwrite: config.overwrite,
      widths: config.sizes.map((s) => s.width),
      policy,
      concurrency: config.transferConcurrency,
      verbose: config.verbose,
      emit: deps.emit,
    });
    fetchStats = fetched.stats;
  }

  log.resolve.info(`Finding files in ${config.sourceRoot}`);
  const resolved = await resolveSourceFiles(config.sourceRoot, { policy });

  await ensureDir(config.outputDir);
  const transformed = await transformAll(resolved.sources, config.sizes, config.outputDir, {
    format: config.format,
    quality: config.quality,
    concurrency: config.concurrency,
    verbose: config.verbose,
    transformer: deps.transformer,
    emit: deps.emit,
  });

  let publishStats: PublishStats | undefined;
  if (remote) {
    publishStats = await publishOutputs(getStore(), {
      bucket: remote.bucket,
      prefix: remote.publishPrefix,
      files: transformed.outputs,
      format: config.format,
      concurrency: config.transferConcurrency,
      verbose: config.verbose,
      emit: deps.emit,
    });
  }

  const summary: RunSummary = {
    fetch: fetchStats,
    resolve: { sources: resolved.sources.length, skippedDerivatives: resolved.skippedDerivatives },
    transform: transformed.stats,
    publish: publishStats,
    outputs: transformed.outputs,
    seconds: since(started),
  };

  log.cli.info('Done!', {
    sources: summary.resolve.sources,
    produced: transformed.stats.succeeded,
    failed: transformed.stats.failed,
    uploaded: publishStats?.uploaded ?? 0,
    seconds: summary.seconds,
  });

  return summary;
}
