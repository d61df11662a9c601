import fs from 'node:fs/promises';
import path from 'node:path';
import sharp from 'sharp';
import { encodeRaster, sharpTransformer, type RasterImage } from '../transformer';
import { makeImage, makeTempDir, removeDir } from '../../../__tests__/helpers/fixtures';

/** 400x200: left half red, right half blue. */
async function makeSplitImage(): Promise<Buffer> {
  return sharp({ create: { width: 400, height: 200, channels: 3, background: { r: 0, g: 0, b: 255 } } })
    .composite([{
      input: { create: { width: 200, height: 200, channels: 3, background: { r: 255, g: 0, b: 0 } } },
      left: 0,
      top: 0,
    }])
    .png()
    .toBuffer();
}

function pixel(raster: RasterImage, x: number, y: number): number[] {
  const offset = (y * raster.width + x) * raster.channels;
  return [...raster.data.subarray(offset, offset + raster.channels)];
}

describe('sharpTransformer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('transform');
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  async function writeSource(name: string, data: Buffer | string): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, data);
    return file;
  }

  it('should produce exactly the requested dimensions', async () => {
    const source = await writeSource('wide.png', await makeImage(300, 200, 'png'));

    const result = await sharpTransformer.transform(source, { width: 100, height: 100 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.width).toBe(100);
    expect(result.value.height).toBe(100);
    expect(result.value.channels).toBe(3);
    expect(result.value.data.length).toBe(100 * 100 * 3);
  });

  it('should upscale small sources and handle a 1x1 target', async () => {
    const source = await writeSource('tiny.jpg', await makeImage(8, 6));

    const big = await sharpTransformer.transform(source, { width: 64, height: 48 });
    const dot = await sharpTransformer.transform(source, { width: 1, height: 1 });

    expect(big.ok && [big.value.width, big.value.height]).toEqual([64, 48]);
    expect(dot.ok && [dot.value.width, dot.value.height]).toEqual([1, 1]);
  });

  it('should scale to cover and crop the centre', async () => {
    const source = await writeSource('split.png', await makeSplitImage());

    const result = await sharpTransformer.transform(source, { width: 100, height: 100 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    // 400x200 scales to 200x100; the centre 100 columns keep a red left and a blue right half
    const [lr, , lb] = pixel(result.value, 10, 50);
    const [rr, , rb] = pixel(result.value, 90, 50);
    expect(lr).toBeGreaterThan(200);
    expect(lb).toBeLessThan(50);
    expect(rr).toBeLessThan(50);
    expect(rb).toBeGreaterThan(200);
  });

  it('should report DecodeFailed for data that is not an image', async () => {
    const source = await writeSource('notes.jpg', 'definitely not a jpeg');

    const result = await sharpTransformer.transform(source, { width: 10, height: 10 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('DecodeFailed');
    expect(result.error.code).toBe('DECODE_FAILED');
    expect(result.error.details).toEqual({ source });
  });

  it('should report DecodeFailed for a missing file', async () => {
    const result = await sharpTransformer.transform(path.join(dir, 'gone.jpg'), { width: 10, height: 10 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('DecodeFailed');
    expect(result.error.message).toMatch(/^cannot read source: /);
  });

  describe('encode', () => {
    const raster = (channels: 3 | 4): RasterImage => ({
      data: Buffer.alloc(20 * 10 * channels, 128),
      width: 20,
      height: 10,
      channels,
    });

    it.each(['jpeg', 'png', 'webp'] as const)('should encode %s at the raster size', async (format) => {
      const result = await sharpTransformer.encode(raster(3), format, 80);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const meta = await sharp(result.value).metadata();
      expect(meta.format).toBe(format);
      expect([meta.width, meta.height]).toEqual([20, 10]);
    });

    it('should flatten alpha when writing jpeg', async () => {
      const buf = await encodeRaster(raster(4), 'jpeg', 80);
      const meta = await sharp(buf).metadata();
      expect(meta.channels).toBe(3);
      expect(meta.hasAlpha).toBe(false);
    });

    it('should report EncodeFailed for a raster that does not match its buffer', async () => {
      const bad: RasterImage = { data: Buffer.alloc(4), width: 20, height: 10, channels: 3 };

      const result = await sharpTransformer.encode(bad, 'png', 80);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('EncodeFailed');
      expect(result.error.details).toEqual({ format: 'png' });
    });
  });
});
