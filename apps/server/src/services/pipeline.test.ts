import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { InferenceError, InputError } from '../errors';
import { FakeSegmenter, MemorySink, MemorySource, RectTracer, labelMapFrom } from '../testing/fakes';
import type { BinaryMask, Polygon } from '../types/coco';
import { PolygonExtractor } from './extractor';
import { annotateSingle, runShard } from './pipeline';

const fourByFour = labelMapFrom([
  [0, 0, 1, 1],
  [0, 0, 1, 1],
  [2, 2, 2, 2],
  [2, 2, 2, 2],
]);

/** Fails on masks of width 3. */
class FlakyTracer extends RectTracer {
  trace(mask: BinaryMask): Polygon[] | null {
    if (mask.width === 3) throw new Error('contour overflow');
    return super.trace(mask);
  }
}

function setup(maps: ConstructorParameters<typeof FakeSegmenter>[0], failFor: string[] = []) {
  const segmenter = new FakeSegmenter(maps);
  const sink = new MemorySink(failFor);
  const deps = {
    segmenter,
    extractor: new PolygonExtractor(new RectTracer()),
    source: new MemorySource(Object.keys(maps)),
    sink,
  };
  return { segmenter, sink, deps };
}

describe('runShard', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds one annotation per category region', async () => {
    const { sink, deps } = setup({ '/data/val/a.png': fourByFour });
    const result = await runShard(['/data/val/a.png'], { imageDir: '/data/val' }, deps);

    expect(result.processed).toBe(1);
    expect(result.failures).toEqual([]);
    expect(result.documentPath).toBe('annotations.json');
    expect(result.document.images).toHaveLength(1);
    expect(result.document.images[0].id).toBe(1);
    expect(result.document.images[0].file_name).toBe('a.png');
    expect(result.document.images[0].width).toBe(4);
    expect(result.document.annotations.map(a => [a.id, a.image_id, a.category_id, a.segmentation])).toEqual([
      [1, 1, 0, [[0, 0, 1, 0, 1, 1, 0, 1]]],
      [2, 1, 1, [[2, 0, 3, 0, 3, 1, 2, 1]]],
      [3, 1, 2, [[0, 2, 3, 2, 3, 3, 0, 3]]],
    ]);
    expect(result.document.categories).toHaveLength(19);
    expect(sink.written).toEqual(['a.png']);
    expect(sink.documents).toHaveLength(1);
  });

  it('keeps counting annotation ids across images', async () => {
    const { deps } = setup({
      '/data/val/a.png': fourByFour,
      '/data/val/city/b.png': labelMapFrom([[5, 5], [5, 5]]),
    });
    const { document } = await runShard(['/data/val/a.png', '/data/val/city/b.png'], { imageDir: '/data/val' }, deps);

    expect(document.images.map(i => [i.id, i.file_name])).toEqual([[1, 'a.png'], [2, 'city/b.png']]);
    const last = document.annotations[3];
    expect([last.id, last.image_id, last.category_id]).toEqual([4, 2, 5]);
  });

  it('keeps only the base name without an image root', async () => {
    const { deps } = setup({ '/data/val/a.png': fourByFour });
    const { document } = await runShard(['/data/val/a.png'], { imageDir: null }, deps);
    expect(document.images[0].file_name).toBe('a.png');
  });

  it('writes a document with categories only for an empty shard', async () => {
    const { sink, deps } = setup({});
    const { document } = await runShard([], { imageDir: null }, deps);

    expect(document.images).toEqual([]);
    expect(document.annotations).toEqual([]);
    expect(document.categories).toHaveLength(19);
    expect(sink.documents).toHaveLength(1);
  });

  it('skips an image whose extraction fails and keeps ids gapless', async () => {
    const { deps } = setup({
      '/data/a.png': labelMapFrom([[0, 0, 1]]),
      '/data/b.png': fourByFour,
    });
    deps.extractor = new PolygonExtractor(new FlakyTracer());
    const result = await runShard(['/data/a.png', '/data/b.png'], { imageDir: '/data' }, deps);

    expect(result.failures).toEqual([
      { path: '/data/a.png', reason: 'Polygon extraction failed for category 0: contour overflow' },
    ]);
    expect(result.document.images.map(i => [i.id, i.file_name])).toEqual([[1, 'b.png']]);
    expect(result.document.annotations.map(a => a.id)).toEqual([1, 2, 3]);
  });

  it('skips an image whose artifacts cannot be written', async () => {
    const { sink, deps } = setup({ '/data/a.png': fourByFour, '/data/b.png': fourByFour }, ['a.png']);
    const result = await runShard(['/data/a.png', '/data/b.png'], { imageDir: '/data' }, deps);

    expect(result.failures).toEqual([
      { path: '/data/a.png', reason: 'Failed to write added_prediction/a.png: disk full' },
    ]);
    expect(result.document.images.map(i => i.file_name)).toEqual(['b.png']);
    expect(sink.written).toEqual(['b.png']);
  });

  it('aborts without a document when inference fails', async () => {
    const { sink, deps } = setup({ '/data/a.png': new Error('CUDA out of memory') });
    const run = runShard(['/data/a.png'], { imageDir: '/data' }, deps);

    await expect(run).rejects.toBeInstanceOf(InferenceError);
    await expect(run).rejects.toThrow('Inference failed for /data/a.png: CUDA out of memory');
    expect(sink.documents).toEqual([]);
  });

  it('checks every image before running inference', async () => {
    const { segmenter, sink, deps } = setup({ '/data/a.png': fourByFour });
    await expect(runShard(['/data/a.png', '/data/missing.png'], { imageDir: '/data' }, deps))
      .rejects.toBeInstanceOf(InputError);
    expect(segmenter.calls).toBe(0);
    expect(sink.documents).toEqual([]);
  });

  it('fails before reading images when the model is not ready', async () => {
    const { segmenter, deps } = setup({ '/data/a.png': fourByFour });
    segmenter.ready = false;
    await expect(runShard(['/data/a.png'], { imageDir: '/data' }, deps))
      .rejects.toThrow('Model weights not found: weights/missing.pdparams');
    expect(segmenter.calls).toBe(0);
  });
});

describe('annotateSingle', () => {
  it('annotates one image with fresh ids', async () => {
    const { deps } = setup({ upload: labelMapFrom([[13, 13], [13, 13]]) });
    const { document, labelMap } = await annotateSingle(Buffer.from('upload'), 'street.jpg', deps);

    expect(labelMap.width).toBe(2);
    expect(document.images.map(i => [i.id, i.file_name])).toEqual([[1, 'street.jpg']]);
    expect(document.annotations.map(a => [a.id, a.category_id, a.segmentation])).toEqual([
      [1, 13, [[0, 0, 1, 0, 1, 1, 0, 1]]],
    ]);
  });
});
