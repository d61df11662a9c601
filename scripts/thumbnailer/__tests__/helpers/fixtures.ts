import { mkdtemp, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import sharp from 'sharp';
import type { ThumbnailerEnv } from '../../shared/env/loadEnv';

export type Rgb = { r: number; g: number; b: number };

/** Solid-colour test image. */
export async function makeImage(
  width: number,
  height: number,
  format: 'jpeg' | 'png' = 'jpeg',
  background: Rgb = { r: 200, g: 40, b: 40 },
): Promise<Buffer> {
  const img = sharp({ create: { width, height, channels: 3, background } });
  return format === 'png' ? img.png().toBuffer() : img.jpeg().toBuffer();
}

export async function makeTempDir(label: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `thumbnailer-${label}-`));
}

export async function removeDir(dir: string | undefined): Promise<void> {
  if (dir) await rm(dir, { recursive: true, force: true });
}

export function testEnv(tmpDir: string): ThumbnailerEnv {
  return {
    tmpDir,
    concurrency: 2,
    transferConcurrency: 2,
    quality: 80,
    region: 'eu-central-1',
  };
}
