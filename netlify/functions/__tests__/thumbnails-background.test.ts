import fs from 'node:fs/promises';
import path from 'node:path';
import { createThumbnailsHandler, parseEvent } from '../thumbnails-background';
import { createMemoryObjectStore, type MemoryObjectStore } from '../../../scripts/thumbnailer/shared/persistence/memoryObjectStore';
import { makeImage, makeTempDir, removeDir, testEnv } from '../../../scripts/thumbnailer/__tests__/helpers/fixtures';

describe('thumbnails-background', () => {
  describe('parseEvent', () => {
    it('should read the JSON body', () => {
      expect(parseEvent({ body: '{"bucket":"photos","prefix":" gallery ","sizes":["64x64"]}', queryStringParameters: null }))
        .toEqual({ bucket: 'photos', prefix: 'gallery', sizes: ['64x64'] });
    });

    it('should fall back to query parameters', () => {
      expect(parseEvent({ body: 'not json', queryStringParameters: { bucket: 'photos', prefix: 'gallery' } }))
        .toEqual({ bucket: 'photos', prefix: 'gallery', sizes: undefined });
    });

    it('should ignore sizes that are not a string list', () => {
      expect(parseEvent({ body: '{"bucket":"b","sizes":[1,2]}', queryStringParameters: null }).sizes).toBeUndefined();
    });
  });

  describe('handler', () => {
    let tmp: string;
    let store: MemoryObjectStore;

    beforeEach(async () => {
      tmp = await makeTempDir('fn');
      store = createMemoryObjectStore();
      store.seed('photos', 'gallery/img1.jpg', await makeImage(48, 48), 'image/jpeg');
    });

    afterEach(async () => {
      await removeDir(tmp);
    });

    const invoke = (body: object) =>
      createThumbnailsHandler({ store, env: () => testEnv(tmp) })({ body: JSON.stringify(body), queryStringParameters: null });

    it('should reject a request without a bucket', async () => {
      const res = await invoke({ prefix: 'gallery' });

      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.body ?? '')).toEqual({ ok: false, error: 'Missing bucket name' });
    });

    it('should crop and publish the prefix', async () => {
      const res = await invoke({ bucket: 'photos', prefix: 'gallery', sizes: ['32x32'] });

      expect(res.statusCode).toBe(200);
      const body = JSON.parse(res.body ?? '');
      expect(body.ok).toBe(true);
      expect(body.stats.transform).toEqual({ total: 1, succeeded: 1, failed: 0, skipped: 0 });
      expect(store.keys('photos')).toEqual(['gallery/img1.jpg', 'gallery/img1_32x32px_32w.jpg']);
    });

    it('should answer 400 for an invalid size', async () => {
      const res = await invoke({ bucket: 'photos', prefix: 'gallery', sizes: ['big'] });

      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.body ?? '').code).toBe('CONFIG_ERROR');
    });

    it('should reject a prefix that leaves the working directory', async () => {
      const work = path.join(tmp, 'work');
      await fs.mkdir(work);
      await fs.writeFile(path.join(tmp, 'precious.txt'), 'x');
      const handler = createThumbnailsHandler({ store, env: () => testEnv(work) });

      const res = await handler({ body: JSON.stringify({ bucket: 'photos', prefix: '..' }), queryStringParameters: null });

      expect(res.statusCode).toBe(400);
      expect(JSON.parse(res.body ?? '').code).toBe('CONFIG_ERROR');
      expect((await fs.readdir(tmp)).sort()).toEqual(['precious.txt', 'work']);
    });

    it('should answer 500 when the bucket cannot be listed', async () => {
      store.failing.list = true;

      const res = await invoke({ bucket: 'photos', prefix: 'gallery' });

      expect(res.statusCode).toBe(500);
      expect(JSON.parse(res.body ?? '')).toEqual({ ok: false, code: 'REMOTE_ERROR', error: 'list failed: access denied' });
    });
  });
});
