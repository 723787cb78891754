import { describe, expect, it } from 'vitest';
import { labelMapFrom } from '../testing/fakes';
import type { BinaryMask, Polygon } from '../types/coco';
import { area } from '../utils/geometry';
import { PolygonExtractor, extractAll } from './extractor';
import { MarchingSquaresTracer } from './tracer';

function maskWithBlock(size: number, from: number, to: number): BinaryMask {
  const data = new Uint8Array(size * size);
  for (let y = from; y <= to; y++) {
    for (let x = from; x <= to; x++) data[y * size + x] = 255;
  }
  return { width: size, height: size, data };
}

function maskWhere(width: number, height: number, inside: (x: number, y: number) => boolean): BinaryMask {
  const data = new Uint8Array(width * height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) data[y * width + x] = inside(x, y) ? 255 : 0;
  }
  return { width, height, data };
}

function bounds(polygon: Polygon) {
  const xs = polygon.map(p => Number(p[0]));
  const ys = polygon.map(p => Number(p[1]));
  return { minX: Math.min(...xs), maxX: Math.max(...xs), minY: Math.min(...ys), maxY: Math.max(...ys) };
}

const areaOf = (polygon: Polygon) => area(polygon.map((p): [number, number] => [Number(p[0]), Number(p[1])]));

describe('MarchingSquaresTracer', () => {
  const tracer = new MarchingSquaresTracer();

  it('returns null for an all-background mask', () => {
    const empty: BinaryMask = { width: 4, height: 4, data: new Uint8Array(16) };
    expect(tracer.trace(empty, { width: 4, height: 4 })).toBeNull();
  });

  it('traces one open ring inside the image for a single block', () => {
    const polygons = tracer.trace(maskWithBlock(8, 2, 5), { width: 8, height: 8 });
    expect(polygons).not.toBeNull();
    expect(polygons).toHaveLength(1);

    const ring = polygons?.[0] ?? [];
    expect(ring.length).toBeGreaterThanOrEqual(3);
    for (const point of ring) {
      expect(Number(point[0])).toBeGreaterThanOrEqual(0);
      expect(Number(point[0])).toBeLessThanOrEqual(7);
      expect(Number(point[1])).toBeGreaterThanOrEqual(0);
      expect(Number(point[1])).toBeLessThanOrEqual(7);
    }
  });

  it('drops rings below the minimum area', () => {
    const strict = new MarchingSquaresTracer({ minArea: 1000 });
    expect(strict.trace(maskWithBlock(8, 2, 5), { width: 8, height: 8 })).toBeNull();
  });

  it('traces a region on the image border as that region', () => {
    const exact = new MarchingSquaresTracer({ simplifyTolerance: 0 });
    const right = exact.trace(maskWhere(10, 10, x => x >= 5), { width: 10, height: 10 }) ?? [];
    const left = exact.trace(maskWhere(10, 10, x => x < 5), { width: 10, height: 10 }) ?? [];

    expect(right).toHaveLength(1);
    expect(bounds(right[0])).toEqual({ minX: 4.5, maxX: 9, minY: 0, maxY: 9 });
    expect(areaOf(right[0])).toBe(40.5);
    expect(left).toHaveLength(1);
    expect(bounds(left[0])).toEqual({ minX: 0, maxX: 4.5, minY: 0, maxY: 9 });
    expect(areaOf(left[0])).toBe(40.5);
  });

  it('traces a region covering the whole image', () => {
    const polygons = tracer.trace(maskWhere(6, 6, () => true), { width: 6, height: 6 }) ?? [];
    expect(polygons).toHaveLength(1);
    expect(bounds(polygons[0])).toEqual({ minX: 0, maxX: 5, minY: 0, maxY: 5 });
    expect(areaOf(polygons[0])).toBe(25);
  });

  it('traces each category of a label map to its own region', () => {
    const labelMap = labelMapFrom([
      [0, 0, 1, 1],
      [0, 0, 1, 1],
      [2, 2, 2, 2],
      [2, 2, 2, 2],
    ]);
    const all = extractAll(labelMap, new PolygonExtractor(new MarchingSquaresTracer({ simplifyTolerance: 0 })));

    expect([...all.keys()]).toEqual([0, 1, 2]);
    const [topLeft, topRight, bottom] = [0, 1, 2].map(id => all.get(id) ?? []);
    expect(topLeft).toHaveLength(1);
    expect(bounds(topLeft[0])).toEqual({ minX: 0, maxX: 1.5, minY: 0, maxY: 1.5 });
    // 1.5 x 1.5 less the corner cut between (1.5, 1) and (1, 1.5)
    expect(areaOf(topLeft[0])).toBe(2.125);
    expect(topRight).toHaveLength(1);
    expect(bounds(topRight[0])).toEqual({ minX: 1.5, maxX: 3, minY: 0, maxY: 1.5 });
    expect(areaOf(topRight[0])).toBe(2.125);
    expect(bottom).toHaveLength(1);
    expect(bounds(bottom[0])).toEqual({ minX: 0, maxX: 3, minY: 1.5, maxY: 3 });
    expect(areaOf(bottom[0])).toBe(4.5);
  });
});
