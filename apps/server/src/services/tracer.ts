import { isoLines } from 'marchingsquares';
import type { BinaryMask, ImageSize, Polygon } from '../types/coco';
import { area, clampRing, closeRing, dropRepeats, openRing, simplify, type Position, type Ring } from '../utils/geometry';

/** Contour tracing port: binary mask in, closed boundaries out (null when nothing was found). */
export interface Tracer {
  trace(mask: BinaryMask, imageSize: ImageSize): Polygon[] | null;
}

export interface MarchingSquaresOptions {
  /** RDP tolerance in pixels; 0 disables simplification. */
  simplifyTolerance?: number;
  /** Rings with a smaller area (px²) are dropped. */
  minArea?: number;
}

export class MarchingSquaresTracer implements Tracer {
  private readonly simplifyTolerance: number;
  private readonly minArea: number;

  constructor(options: MarchingSquaresOptions = {}) {
    this.simplifyTolerance = options.simplifyTolerance ?? 0.5;
    this.minArea = options.minArea ?? 0;
  }

  trace(mask: BinaryMask, imageSize: ImageSize): Polygon[] | null {
    const { width, height, data } = mask;
    // 0/1 grid framed by one background cell on every side; coordinates shift back by 1 below
    const grid: number[][] = [];
    for (let y = 0; y < height + 2; y++) grid.push(new Array<number>(width + 2).fill(0));
    let foreground = false;
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        if (!data[y * width + x]) continue;
        grid[y + 1][x + 1] = 1;
        foreground = true;
      }
    }
    if (!foreground) return null;

    const paths = isoLines(grid, 0.5, { linearRing: true });
    const out: Polygon[] = [];
    for (const path of paths) {
      if (!Array.isArray(path) || path.length < 3) continue;
      const ring: Ring = path.map(([x, y]): Position => [x - 1, y - 1]);
      const clamped = dropRepeats(clampRing(ring, imageSize.width, imageSize.height));
      const simplified = simplify(closeRing(clamped), this.simplifyTolerance);
      const polygon = openRing(simplified);
      if (polygon.length < 3) continue;
      if (this.minArea > 0 && area(polygon) < this.minArea) continue;
      out.push(polygon);
    }
    return out.length > 0 ? out : null;
  }
}
