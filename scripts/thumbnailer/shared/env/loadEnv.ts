// Unified env loader for the thumbnailer CLI and background function.
// Centralizes access and prevents leaking secrets in logs.
import os from 'node:os';
import path from 'node:path';

export const DEFAULT_REGION = 'eu-central-1';

export interface R2Credentials {
  accountId: string;
  accessKeyId: string;
  secretAccessKey: string;
}

export interface ThumbnailerEnv {
  tmpDir: string;
  concurrency: number;
  transferConcurrency: number;
  quality: number;
  region: string;
  r2?: R2Credentials;
}

function envInt(value: string | undefined, fallback: number): number {
  const n = parseInt(value || '', 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function loadEnv(env: NodeJS.ProcessEnv = process.env): ThumbnailerEnv {
  const accountId = env.R2_ACCOUNT_ID?.trim();
  const accessKeyId = env.R2_ACCESS_KEY_ID?.trim();
  const secretAccessKey = env.R2_SECRET_ACCESS_KEY?.trim();

  return {
    tmpDir: env.THUMBNAILER_TMP_DIR?.trim() || path.join(os.tmpdir(), 'thumbnailer'),
    concurrency: envInt(env.THUMBNAILER_CONCURRENCY, Math.max(1, os.cpus().length)),
    transferConcurrency: envInt(env.THUMBNAILER_TRANSFER_CONCURRENCY, 8),
    quality: Math.min(100, envInt(env.THUMBNAILER_QUALITY, 82)),
    region: env.S3_REGION?.trim() || DEFAULT_REGION,
    r2: accountId && accessKeyId && secretAccessKey
      ? { accountId, accessKeyId, secretAccessKey }
      : undefined,
  };
}

/** Env summary safe for logs (no secrets). */
export function describeEnv(env: ThumbnailerEnv) {
  return {
    tmpDir: env.tmpDir,
    concurrency: env.concurrency,
    transferConcurrency: env.transferConcurrency,
    quality: env.quality,
    region: env.region,
    target: env.r2 ? 'r2' : 's3',
  };
}
