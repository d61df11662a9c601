/**
 * Source discovery.
 *
 * Lists the direct entries of one directory and drops everything the derivative policy
 * recognises, so a run over a directory that already holds thumbnails only picks up the
 * originals. Not recursive.
 */

import fs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { IOError, errorMessage } from '../../shared/errors';
import { log } from '../../shared/logging/logger';
import { defaultPolicy, type DerivativePolicy } from '../../shared/logic/derivatives';

export interface ResolveOptions {
  policy?: DerivativePolicy;
}

export interface ResolveResult {
  sources: string[];
  skippedDerivatives: number;
  skippedOther: number;
}

/**
 * Candidate sources under `root`, in directory-iteration order. A missing or unreadable
 * root is an IOError; the caller owns creating it.
 */
export async function resolveSourceFiles(root: string, options: ResolveOptions = {}): Promise<ResolveResult> {
  const policy = options.policy ?? defaultPolicy;

  let entries: Dirent[];
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (err) {
    throw new IOError(`cannot read source directory: ${errorMessage(err)}`, { root }, err);
  }

  const sources: string[] = [];
  let skippedDerivatives = 0;
  let skippedOther = 0;

  for (const entry of entries) {
    if (!(entry.isFile() || entry.isSymbolicLink()) || entry.name.startsWith('.')) {
      skippedOther++;
      continue;
    }
    const full = path.join(root, entry.name);
    if (policy.isDerivative(full)) {
      skippedDerivatives++;
      continue;
    }
    sources.push(full);
  }

  log.resolve.info('sources resolved', {
    root,
    sources: sources.length,
    skippedDerivatives,
    skippedOther,
    policy: policy.name,
  });

  return { sources, skippedDerivatives, skippedOther };
}
