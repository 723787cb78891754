import { ExtractionError } from '../errors';
import type { BinaryMask, CategoryPolygons, ImageSize, LabelMap, Polygon } from '../types/coco';
import { CATEGORY_ID_RANGE, type IdRange } from './categories';
import { decompose } from './decomposer';
import type { Tracer } from './tracer';

export class PolygonExtractor {
  constructor(private readonly tracer: Tracer) {}

  extract(mask: BinaryMask, imageSize: ImageSize, categoryId: number): Polygon[] {
    let polygons: Polygon[] | null | undefined;
    try {
      polygons = this.tracer.trace(mask, imageSize);
    } catch (err) {
      throw new ExtractionError(categoryId, { cause: err });
    }
    return polygons ?? [];
  }
}

/**
 * Polygons for every category of the range that traced to at least one boundary.
 * Throws ExtractionError on the first failing category.
 */
export function extractAll(labelMap: LabelMap, extractor: PolygonExtractor, range: IdRange = CATEGORY_ID_RANGE): CategoryPolygons {
  const size = { width: labelMap.width, height: labelMap.height };
  const all: CategoryPolygons = new Map();
  for (const { categoryId, mask } of decompose(labelMap, range)) {
    const polygons = extractor.extract(mask, size, categoryId);
    if (polygons.length > 0) all.set(categoryId, polygons);
  }
  return all;
}
