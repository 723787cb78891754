import type { BinaryMask, LabelMap } from '../types/coco';
import { CATEGORY_ID_RANGE, type IdRange } from './categories';

export interface CategoryMask {
  categoryId: number;
  mask: BinaryMask;
}

export function binarize(labelMap: LabelMap, categoryId: number): BinaryMask {
  const { width, height, data } = labelMap;
  const out = new Uint8Array(width * height);
  for (let i = 0; i < out.length; i++) {
    if (data[i] === categoryId) out[i] = 255;
  }
  return { width, height, data: out };
}

/**
 * Yields one mask per id in `range`, present in the label map or not.
 * Masks are only alive for the duration of one iteration.
 */
export function* decompose(labelMap: LabelMap, range: IdRange = CATEGORY_ID_RANGE): Generator<CategoryMask> {
  for (let categoryId = range.start; categoryId < range.end; categoryId++) {
    yield { categoryId, mask: binarize(labelMap, categoryId) };
  }
}
