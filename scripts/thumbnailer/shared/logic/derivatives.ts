/**
 * Derivative naming and recognition.
 *
 * Thumbnails are written next to (or apart from) their sources as
 *   {stem}_{width}x{height}px_{width}w.{ext}
 * e.g. `a.jpg` at 200x200 → `a_200x200px_200w.jpg`. This layout is shared with existing
 * remote buckets and must stay bit-exact.
 *
 * Whether a path is a derivative is decided by a single DerivativePolicy so the heuristic
 * lives in one place and callers can swap it.
 */

import path from 'node:path';

// ============================================================================
// Naming
// ============================================================================

/** File name without directories and without its last extension. */
export function fileStem(filePath: string): string {
  const base = path.basename(filePath);
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

export function thumbFileName(stem: string, width: number, height: number, extension: string): string {
  return `${stem}_${width}x${height}px_${width}w.${extension}`;
}

/**
 * Output path of one (source, size) unit. Pure: depends only on its arguments.
 * Sources sharing a stem (`a.jpg`, `a.png`) map to the same path; the engine skips the
 * later unit when that happens.
 */
export function deriveThumbPath(
  sourceBasename: string,
  width: number,
  height: number,
  outputDir: string,
  extension: string,
): string {
  return path.join(outputDir, thumbFileName(fileStem(sourceBasename), width, height, extension));
}

// ============================================================================
// Recognition
// ============================================================================

export interface DerivativePolicy {
  readonly name: string;
  isDerivative(filePath: string): boolean;
}

/**
 * Any underscore in the file name stem marks a derivative.
 *
 * This is deliberately coarse: a source file that happens to contain an underscore in its
 * own name is indistinguishable from a derivative and will be excluded from re-processing.
 * (Camera defaults such as `IMG_0042.jpg` fall into this.) Use markerPolicy for such sources.
 */
export const underscorePolicy: DerivativePolicy = {
  name: 'underscore',
  isDerivative: (filePath) => fileStem(filePath).includes('_'),
};

const MARKER_RE = /_(\d+)x(\d+)px_(\d+)w$/;

/** Only stems ending in the exact `_{w}x{h}px_{w}w` marker are derivatives. */
export const markerPolicy: DerivativePolicy = {
  name: 'marker',
  isDerivative: (filePath) => {
    const match = MARKER_RE.exec(fileStem(filePath));
    return match !== null && match[1] === match[3];
  },
};

export const defaultPolicy = underscorePolicy;

export function isDerivative(filePath: string, policy: DerivativePolicy = defaultPolicy): boolean {
  return policy.isDerivative(filePath);
}

/**
 * Substrings that older runs left in remote keys (`_200`, `_thumb`, ...). Keys carrying one
 * are never downloaded, whatever the overwrite setting.
 */
export function legacySizeTokens(widths: readonly number[]): string[] {
  const tokens = new Set<string>();
  for (const w of widths) tokens.add(`_${w}`);
  tokens.add('_thumb');
  return [...tokens];
}

export function hasLegacySizeToken(key: string, tokens: readonly string[]): boolean {
  return tokens.some((t) => key.includes(t));
}
