/**
 * Detection Cache Tests
 */

import fs from 'fs';
import path from 'path';
import { createGrayImage, DetectionCache, DocumentInput } from '@layoutid/shared';
import { FakePdfSource, makePage, makeTempDir, removeDir } from './helpers';

describe('DetectionCache', () => {
  let dir: string;
  let pdfPath: string;

  beforeEach(() => {
    dir = makeTempDir('cache');
    pdfPath = path.join(dir, 'bill.pdf');
    fs.writeFileSync(pdfPath, 'placeholder');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('keys on path, modification time and purpose', async () => {
    const cache = new DetectionCache();

    const render = await cache.cacheKey(pdfPath, 'render');
    const preprocessed = await cache.cacheKey(pdfPath, 'preprocessed');
    expect(render).toMatch(/^[0-9a-f]{32}$/);
    expect(preprocessed).not.toBe(render);
    expect(await cache.cacheKey(pdfPath, 'render')).toBe(render);

    fs.utimesSync(pdfPath, new Date('2020-01-01T00:00:00Z'), new Date('2020-01-01T00:00:00Z'));
    expect(await cache.cacheKey(pdfPath, 'render')).not.toBe(render);
  });

  it('still produces a stable key for a file that cannot be stat-ed', async () => {
    const cache = new DetectionCache();
    const missing = path.join(dir, 'missing.pdf');

    expect(await cache.cacheKey(missing, 'regions')).toBe(await cache.cacheKey(missing, 'regions'));
  });

  it('stores images per purpose and empties everything on clear', async () => {
    const cache = new DetectionCache();
    const image = createGrayImage(4, 4);

    await cache.setImage(pdfPath, 'render', image);
    cache.setTemplateDatabase(new Map());

    expect(await cache.getImage(pdfPath, 'render')).toBe(image);
    expect(await cache.getImage(pdfPath, 'preprocessed')).toBeUndefined();
    expect(cache.stats()).toEqual({ images: 1, regions: 0, hasTemplateDatabase: true });

    cache.clear();

    expect(await cache.getImage(pdfPath, 'render')).toBeUndefined();
    expect(cache.getTemplateDatabase()).toBeNull();
    expect(cache.stats()).toEqual({ images: 0, regions: 0, hasTemplateDatabase: false });
  });

  it('renders a file version once across inputs sharing a cache', async () => {
    const pdf = new FakePdfSource({ [pdfPath]: { raster: makePage('beta') } });
    const cache = new DetectionCache();

    const first = await new DocumentInput(pdfPath, pdf, cache, 300).raster();
    const second = await new DocumentInput(pdfPath, pdf, cache, 300).raster();

    expect(second).toBe(first);
    expect(pdf.renderCalls).toBe(1);

    fs.utimesSync(pdfPath, new Date('2021-06-01T00:00:00Z'), new Date('2021-06-01T00:00:00Z'));
    await new DocumentInput(pdfPath, pdf, cache, 300).raster();
    expect(pdf.renderCalls).toBe(2);
  });

  it('renders once per input even without a cache', async () => {
    const pdf = new FakePdfSource({ [pdfPath]: { raster: makePage('beta') } });
    const input = new DocumentInput(pdfPath, pdf, undefined, 300);

    await Promise.all([input.raster(), input.raster(), input.raster()]);

    expect(pdf.renderCalls).toBe(1);
  });

  it('reports why rendering failed', async () => {
    const input = new DocumentInput(path.join(dir, 'absent.pdf'), new FakePdfSource(), undefined, 300);

    expect(await input.raster()).toBeNull();
    expect(input.renderError).toMatch(/^ENOENT/);
  });
});
