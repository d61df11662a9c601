/**
 * Object-store access (AWS S3 or Cloudflare R2 through the S3 API).
 *
 * The pipeline only needs list/get/put; everything else about the transport (credentials,
 * region, SDK retries) stays here.
 */

import {
  S3Client,
  GetObjectCommand,
  PutObjectCommand,
  ListObjectsV2Command,
} from '@aws-sdk/client-s3';
import { RemoteError, errorMessage } from '../errors';
import type { ThumbnailerEnv } from '../env/loadEnv';

export interface ObjectStore {
  /** Every key under `prefix`, across all listing pages. */
  list(bucket: string, prefix: string): Promise<string[]>;
  get(bucket: string, key: string): Promise<Buffer>;
  put(bucket: string, key: string, body: Buffer, contentType: string): Promise<void>;
}

// ============================================================================
// S3 Client
// ============================================================================

export function createS3Client(env: Pick<ThumbnailerEnv, 'region' | 'r2'>, region = env.region): S3Client {
  if (env.r2) {
    return new S3Client({
      region: 'auto',
      endpoint: `https://${env.r2.accountId}.r2.cloudflarestorage.com`,
      credentials: {
        accessKeyId: env.r2.accessKeyId,
        secretAccessKey: env.r2.secretAccessKey,
      },
    });
  }
  // Credentials come from the SDK's default provider chain (env vars, profile, role).
  return new S3Client({ region });
}

export function createS3ObjectStore(client: S3Client): ObjectStore {
  return {
    async list(bucket, prefix) {
      const keys: string[] = [];
      let continuationToken: string | undefined;
      try {
        do {
          const res = await client.send(new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix || undefined,
            ContinuationToken: continuationToken,
            MaxKeys: 1000,
          }));
          for (const obj of res.Contents || []) {
            if (obj.Key !== undefined) keys.push(obj.Key);
          }
          continuationToken = res.NextContinuationToken;
        } while (continuationToken);
      } catch (err) {
        throw new RemoteError(`list failed: ${errorMessage(err)}`, { bucket, prefix }, err);
      }
      return keys;
    },

    async get(bucket, key) {
      try {
        const res = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
        if (!res.Body) {
          throw new RemoteError('GetObject returned empty body', { bucket, key });
        }
        return Buffer.from(await res.Body.transformToByteArray());
      } catch (err) {
        if (err instanceof RemoteError) throw err;
        throw new RemoteError(`get failed: ${errorMessage(err)}`, { bucket, key }, err);
      }
    },

    async put(bucket, key, body, contentType) {
      try {
        await client.send(new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
        }));
      } catch (err) {
        throw new RemoteError(`put failed: ${errorMessage(err)}`, { bucket, key }, err);
      }
    },
  };
}
