import path from 'node:path';
import type { AnnotationRecord, CategoryPolygons, ImageRecord, Numeric, Point, Polygon } from '../types/coco';

export interface AssembledImage {
  path: string;
  width: number;
  height: number;
  polygons: CategoryPolygons;
}

/**
 * File name relative to the image root. Without a root only the base name is kept.
 * One leading path separator is stripped.
 */
export function relativeFileName(imagePath: string, imageRoot?: string | null): string {
  let name: string;
  if (imageRoot) {
    name = imagePath.startsWith(imageRoot) ? imagePath.slice(imageRoot.length) : imagePath;
  } else {
    name = path.basename(imagePath);
  }
  if (name.startsWith('/') || name.startsWith('\\')) name = name.slice(1);
  return name;
}

// [[x1,y1],[x2,y2],...] -> [x1,y1,x2,y2,...]
export function flattenPolygon(polygon: Polygon): Numeric[] {
  return polygon.flatMap((point: Point) => [point[0], point[1]]);
}

/**
 * Owns the image / annotation id counters of one shard. Ids start at 1 and
 * increase by one per record, with no gaps.
 */
export class AnnotationAssembler {
  private nextImageId = 1;
  private nextAnnotationId = 1;
  private readonly imageRecords: ImageRecord[] = [];
  private readonly annotationRecords: AnnotationRecord[] = [];

  constructor(private readonly imageRoot: string | null = null) {}

  get images(): readonly ImageRecord[] {
    return this.imageRecords;
  }

  get annotations(): readonly AnnotationRecord[] {
    return this.annotationRecords;
  }

  get imageCount(): number {
    return this.imageRecords.length;
  }

  get annotationCount(): number {
    return this.annotationRecords.length;
  }

  addImage(input: AssembledImage): { image: ImageRecord; annotations: AnnotationRecord[] } {
    const imageId = this.nextImageId++;
    const image: ImageRecord = {
      id: imageId,
      width: input.width,
      height: input.height,
      file_name: relativeFileName(input.path, this.imageRoot),
      license: '',
      flickr_url: '',
      coco_url: '',
      date_captured: '',
    };
    this.imageRecords.push(image);

    const added: AnnotationRecord[] = [];
    const categoryIds = [...input.polygons.keys()].sort((a, b) => a - b);
    for (const categoryId of categoryIds) {
      for (const polygon of input.polygons.get(categoryId) ?? []) {
        added.push({
          id: this.nextAnnotationId++,
          iscrowd: 0,
          image_id: imageId,
          category_id: categoryId,
          segmentation: [flattenPolygon(polygon)],
          area: 0,
          bbox: [],
        });
      }
    }
    this.annotationRecords.push(...added);
    return { image, annotations: added };
  }
}
