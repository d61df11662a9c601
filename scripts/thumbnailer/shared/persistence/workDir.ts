import fs from 'node:fs/promises';
import path from 'node:path';
import { IOError, errorMessage } from '../errors';
import { log } from '../logging/logger';

/** Creates `dir` (and parents) if missing. */
export async function ensureDir(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (err) {
    throw new IOError(`cannot create directory: ${errorMessage(err)}`, { dir }, err);
  }
}

/** True when `dir` is `root` itself or lies below it. */
export function isWithin(root: string, dir: string): boolean {
  const rel = path.relative(path.resolve(root), path.resolve(dir));
  return rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/**
 * Gets the remote working directory ready for a fetch: wiped first when `clean` is set,
 * then recreated. `dir` must lie inside `root`; anything else is refused before touching
 * the disk.
 */
export async function prepareWorkDir(dir: string, opts: { clean: boolean; root: string }): Promise<void> {
  if (!isWithin(opts.root, dir)) {
    throw new IOError('refusing to prepare a directory outside the working directory', { dir, root: opts.root });
  }
  if (opts.clean) {
    log.fetch.info('removing existing working directory', { dir });
    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (err) {
      throw new IOError(`cannot clean directory: ${errorMessage(err)}`, { dir }, err);
    }
  }
  await ensureDir(dir);
}
