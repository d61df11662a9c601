/**
 * Single-image transform: decode one source, resize-to-fill one CropSpec, encode.
 *
 * Resize-to-fill scales the source until it covers the target box, then centre-crops the
 * overflow, so the raster is always exactly width x height (no letter-boxing). Failures come
 * back as TransformError values, never as exceptions.
 */

import fs from 'node:fs/promises';
import sharp from 'sharp';
import type { CropSpec, OutputFormat } from '../../shared/config/config';
import { TransformError, errorMessage, type Result } from '../../shared/errors';

export type Channels = 1 | 2 | 3 | 4;

/** Decoded pixels, interleaved, 8 bits per channel. */
export interface RasterImage {
  data: Buffer;
  width: number;
  height: number;
  channels: Channels;
}

export interface ImageTransformer {
  transform(source: string, spec: CropSpec): Promise<Result<RasterImage, TransformError>>;
  encode(raster: RasterImage, format: OutputFormat, quality: number): Promise<Result<Buffer, TransformError>>;
}

const JPEG_BACKGROUND = '#ffffff';

export async function resizeToFill(input: Buffer, spec: CropSpec): Promise<RasterImage> {
  const { data, info } = await sharp(input)
    .rotate()
    .resize(spec.width, spec.height, {
      fit: 'cover',
      position: 'centre',
      kernel: 'cubic',
    })
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height, channels: info.channels };
}

export async function encodeRaster(raster: RasterImage, format: OutputFormat, quality: number): Promise<Buffer> {
  let pipeline = sharp(raster.data, {
    raw: { width: raster.width, height: raster.height, channels: raster.channels },
  });

  switch (format) {
    case 'jpeg':
      // JPEG has no alpha: flatten onto white
      if (raster.channels === 2 || raster.channels === 4) {
        pipeline = pipeline.flatten({ background: JPEG_BACKGROUND });
      }
      pipeline = pipeline.jpeg({ quality });
      break;
    case 'png':
      pipeline = pipeline.png({ compressionLevel: 6 });
      break;
    case 'webp':
      pipeline = pipeline.webp({ quality });
      break;
  }

  return pipeline.toBuffer();
}

export const sharpTransformer: ImageTransformer = {
  async transform(source, spec) {
    let input: Buffer;
    try {
      input = await fs.readFile(source);
    } catch (err) {
      return {
        ok: false,
        error: new TransformError('DecodeFailed', `cannot read source: ${errorMessage(err)}`, { source }, err),
      };
    }

    try {
      return { ok: true, value: await resizeToFill(input, spec) };
    } catch (err) {
      return {
        ok: false,
        error: new TransformError('DecodeFailed', errorMessage(err), { source }, err),
      };
    }
  },

  async encode(raster, format, quality) {
    try {
      return { ok: true, value: await encodeRaster(raster, format, quality) };
    } catch (err) {
      return {
        ok: false,
        error: new TransformError('EncodeFailed', errorMessage(err), { format }, err),
      };
    }
  },
};
