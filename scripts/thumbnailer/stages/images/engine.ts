/**
 * Transform engine
 *
 * Fans sources x sizes out into independent units on a bounded queue:
 *   transform (decode + resize-to-fill) → encode → write {stem}_{w}x{h}px_{w}w.{ext}
 *
 * A unit that fails is logged and dropped; its siblings keep running. Outcomes are only
 * gathered once every queued unit has settled, and the successful paths become the
 * manifest handed to the publish phase.
 */

import fs from 'node:fs/promises';
import PQueue from 'p-queue';
import {
  OUTPUT_FORMATS,
  formatCropSize,
  type CropSpec,
  type OutputFormat,
} from '../../shared/config/config';
import { errorMessage, type ErrorCode } from '../../shared/errors';
import { log } from '../../shared/logging/logger';
import { deriveThumbPath } from '../../shared/logic/derivatives';
import { createProgressTracker, type ProgressEmitter } from '../../shared/logic/progress';
import { sharpTransformer, type ImageTransformer } from './transformer';

// ============================================================================
// Types
// ============================================================================

export interface WorkUnit {
  source: string;
  spec: CropSpec;
  output: string;
}

export type UnitOutcome =
  | { status: 'succeeded'; unit: WorkUnit; path: string }
  | { status: 'failed'; unit: WorkUnit; code: ErrorCode; reason: string };

export interface TransformAllOptions {
  format?: OutputFormat;
  quality?: number;
  concurrency?: number;
  verbose?: boolean;
  transformer?: ImageTransformer;
  emit?: ProgressEmitter;
}

export interface TransformStats {
  total: number;
  succeeded: number;
  failed: number;
  /** Units dropped before scheduling because an earlier unit owns the same output path. */
  skipped: number;
}

export interface TransformAllResult {
  /** Successful output paths in work-set order. */
  outputs: string[];
  outcomes: UnitOutcome[];
  stats: TransformStats;
}

const DEFAULT_QUALITY = 82;

// ============================================================================
// Planning
// ============================================================================

/**
 * Cross-product of sources and specs, source-major. Units whose output path was already
 * claimed (duplicate spec, or two sources sharing a stem) are returned as collisions.
 */
export function planUnits(
  sources: readonly string[],
  specs: readonly CropSpec[],
  outputDir: string,
  extension: string,
): { units: WorkUnit[]; collisions: WorkUnit[] } {
  const units: WorkUnit[] = [];
  const collisions: WorkUnit[] = [];
  const claimed = new Set<string>();

  for (const source of sources) {
    for (const spec of specs) {
      const output = deriveThumbPath(source, spec.width, spec.height, outputDir, extension);
      const unit = { source, spec, output };
      if (claimed.has(output)) {
        collisions.push(unit);
        continue;
      }
      claimed.add(output);
      units.push(unit);
    }
  }

  return { units, collisions };
}

// ============================================================================
// Unit
// ============================================================================

async function runUnit(
  unit: WorkUnit,
  transformer: ImageTransformer,
  format: OutputFormat,
  quality: number,
): Promise<UnitOutcome> {
  const transformed = await transformer.transform(unit.source, unit.spec);
  if (!transformed.ok) {
    return { status: 'failed', unit, code: transformed.error.code, reason: transformed.error.message };
  }

  const encoded = await transformer.encode(transformed.value, format, quality);
  if (!encoded.ok) {
    return { status: 'failed', unit, code: encoded.error.code, reason: encoded.error.message };
  }

  try {
    await fs.writeFile(unit.output, encoded.value);
  } catch (err) {
    return { status: 'failed', unit, code: 'IO_ERROR', reason: `write failed: ${errorMessage(err)}` };
  }

  return { status: 'succeeded', unit, path: unit.output };
}

// ============================================================================
// Batch
// ============================================================================

export async function transformAll(
  sources: readonly string[],
  specs: readonly CropSpec[],
  outputDir: string,
  options: TransformAllOptions = {},
): Promise<TransformAllResult> {
  const {
    format = 'jpeg',
    quality = DEFAULT_QUALITY,
    concurrency = 4,
    verbose = false,
    transformer = sharpTransformer,
    emit,
  } = options;

  const { units, collisions } = planUnits(sources, specs, outputDir, OUTPUT_FORMATS[format].extension);
  for (const unit of collisions) {
    log.image.warn('skipping unit, output path already claimed', {
      source: unit.source,
      size: formatCropSize(unit.spec),
      output: unit.output,
    });
  }

  log.image.info(`Processing ${sources.length} files`, {
    sizes: specs.length,
    units: units.length,
    concurrency,
    format,
  });

  const progress = createProgressTracker('Processed', units.length, verbose, emit);
  const queue = new PQueue({ concurrency });

  const outcomes = await Promise.all(units.map((unit) => queue.add(async (): Promise<UnitOutcome> => {
    let outcome: UnitOutcome;
    try {
      outcome = await runUnit(unit, transformer, format, quality);
    } catch (err) {
      outcome = { status: 'failed', unit, code: 'IO_ERROR', reason: errorMessage(err) };
    }
    if (outcome.status === 'failed') {
      log.image.warn('unit failed', {
        source: unit.source,
        size: formatCropSize(unit.spec),
        code: outcome.code,
        reason: outcome.reason,
      });
    }
    progress.complete();
    return outcome;
  })));

  const outputs: string[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'succeeded') outputs.push(outcome.path);
  }

  const stats: TransformStats = {
    total: units.length,
    succeeded: outputs.length,
    failed: units.length - outputs.length,
    skipped: collisions.length,
  };
  log.image.info('transform complete', { ...stats });

  return { outputs, outcomes, stats };
}
