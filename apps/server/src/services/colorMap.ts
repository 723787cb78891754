import type { LabelMap, RGB } from '../types/coco';
import { categoryRegistry } from './categories';

/** Flat [r,g,b, r,g,b, ...] palette indexed by label. */
export type ColorMap = readonly number[];

/**
 * Bit-interleaved palette (label k takes entry k + 1, so label 0 is not black).
 * `customColor` is a flat RGB list overriding the leading entries.
 */
export function colorMapList(numClasses = 256, customColor?: readonly number[]): ColorMap {
  const n = numClasses + 1;
  const map: number[] = new Array(n * 3).fill(0);
  for (let i = 0; i < n; i++) {
    let j = 0;
    let lab = i;
    while (lab) {
      map[i * 3] |= ((lab >> 0) & 1) << (7 - j);
      map[i * 3 + 1] |= ((lab >> 1) & 1) << (7 - j);
      map[i * 3 + 2] |= ((lab >> 2) & 1) << (7 - j);
      j++;
      lab >>= 3;
    }
  }
  const palette = map.slice(3);
  if (customColor && customColor.length > 0) {
    palette.splice(0, customColor.length, ...customColor);
  }
  return palette;
}

export function registryColorMap(numClasses = 256): ColorMap {
  return colorMapList(numClasses, categoryRegistry.list().flatMap(c => [...c.color]));
}

export function paletteColor(colorMap: ColorMap, label: number): RGB {
  const i = label * 3;
  if (i + 2 >= colorMap.length) return [0, 0, 0];
  return [colorMap[i], colorMap[i + 1], colorMap[i + 2]];
}

/** RGB pixels (3 channels, row-major) with the palette applied to every label. */
export function pseudoColorPixels(labelMap: LabelMap, colorMap: ColorMap): Buffer {
  const { width, height, data } = labelMap;
  const out = Buffer.alloc(width * height * 3);
  for (let p = 0; p < width * height; p++) {
    const [r, g, b] = paletteColor(colorMap, data[p]);
    out[p * 3] = r;
    out[p * 3 + 1] = g;
    out[p * 3 + 2] = b;
  }
  return out;
}
