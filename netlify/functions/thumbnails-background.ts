/**
 * Netlify Background Function: Thumbnails for one bucket prefix
 *
 * Fetches every original under the prefix, crops the requested sizes (default set when
 * `sizes` is omitted) and publishes the results back. Always runs with overwrite + clean.
 *
 * Trigger:
 *   curl -X POST https://<site>/.netlify/functions/thumbnails-background \
 *     -d '{"bucket":"photos","prefix":"gallery","sizes":["200x200"]}'
 */

import type { Handler, HandlerEvent, HandlerResponse } from "@netlify/functions";
import { buildConfig } from "../../scripts/thumbnailer/shared/config/config";
import { loadEnv, type ThumbnailerEnv } from "../../scripts/thumbnailer/shared/env/loadEnv";
import { errorMessage, isThumbnailerError } from "../../scripts/thumbnailer/shared/errors";
import { since } from "../../scripts/thumbnailer/shared/timing";
import { runThumbnailer, type RunDeps } from "../../scripts/thumbnailer/run";
import { createFnLogger } from "../../scripts/thumbnailer/shared/fnLogger";
const { log, warn, error } = createFnLogger("thumbnails");

export interface ThumbnailsEvent {
  bucket: string;
  prefix: string;
  sizes?: string[];
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/** Reads `{ bucket, prefix, sizes? }` from the JSON body, falling back to query params. */
export function parseEvent(event: Pick<HandlerEvent, "body" | "queryStringParameters">): ThumbnailsEvent {
  let body: Record<string, unknown> = {};
  if (event.body) {
    try {
      const parsed: unknown = JSON.parse(event.body);
      if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
        body = Object.fromEntries(Object.entries(parsed));
      }
    } catch (e) {
      warn(`ignoring unparseable body: ${errorMessage(e)}`);
    }
  }
  const query = event.queryStringParameters || {};
  const str = (v: unknown) => (typeof v === "string" ? v.trim() : "");

  return {
    bucket: str(body.bucket) || str(query.bucket),
    prefix: str(body.prefix) || str(query.prefix),
    sizes: isStringArray(body.sizes) ? body.sizes : undefined,
  };
}

export type ThumbnailsHandler = (
  event: Pick<HandlerEvent, "body" | "queryStringParameters">,
) => Promise<HandlerResponse>;

export function createThumbnailsHandler(
  deps: RunDeps & { env?: () => ThumbnailerEnv } = {},
): ThumbnailsHandler {
  return async (event) => {
    const started = Date.now();
    const { bucket, prefix, sizes } = parseEvent(event);

    if (!bucket) {
      log("error: missing bucket name");
      return { statusCode: 400, body: JSON.stringify({ ok: false, error: "Missing bucket name" }) };
    }

    try {
      log(`start bucket=${bucket} prefix=${prefix || "/"}`);

      const env = (deps.env ?? loadEnv)();
      const config = buildConfig({
        s3Bucket: bucket,
        s3Prefix: prefix,
        fetchRemote: true,
        overwrite: true,
        clean: true,
        size: sizes,
      }, env);

      const summary = await runThumbnailer(config, env, deps);
      log(`complete produced=${summary.transform.succeeded} failed=${summary.transform.failed} uploaded=${summary.publish?.uploaded ?? 0} elapsed=${since(started)}s`);

      return {
        statusCode: 200,
        body: JSON.stringify({
          ok: true,
          stats: {
            fetch: summary.fetch,
            transform: summary.transform,
            publish: summary.publish,
          },
          seconds: since(started),
        }),
      };
    } catch (e) {
      const code = isThumbnailerError(e) ? e.code : "UNKNOWN";
      error(`fatal ${code}: ${errorMessage(e)}`);
      const statusCode = code === "CONFIG_ERROR" ? 400 : 500;
      return { statusCode, body: JSON.stringify({ ok: false, code, error: errorMessage(e) }) };
    }
  };
}

export const handler: Handler = createThumbnailsHandler();

export default handler;
