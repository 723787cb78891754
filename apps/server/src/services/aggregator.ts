import { z } from 'zod';
import type {
  AnnotationRecord,
  Category,
  Document,
  EncodedAnnotation,
  EncodedCategory,
  EncodedDocument,
  EncodedImage,
  ImageRecord,
  Numeric,
  NumericBuffer,
} from '../types/coco';

export function aggregate(
  categories: readonly Category[],
  images: readonly ImageRecord[],
  annotations: readonly AnnotationRecord[],
): Document {
  return { categories, images: [...images], annotations: [...annotations], info: '', licenses: [] };
}

// -------- Normalization --------
// Wide integers and typed buffers have no JSON form; convert them before encoding.

export function toPlainNumber(value: Numeric): number {
  if (typeof value === 'number') return value;
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new RangeError(`Integer ${value} cannot be represented exactly in JSON`);
  }
  return Number(value);
}

export function toPlainList(values: readonly Numeric[] | NumericBuffer): number[] {
  return Array.from(values, toPlainNumber);
}

const pad = (n: number) => String(n).padStart(2, '0');

export function formatDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`
    + `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

export function normalizeDocument(document: Document): EncodedDocument {
  return {
    categories: document.categories.map((c): EncodedCategory => ({
      id: c.id,
      name: c.name,
      color: [c.color[0], c.color[1], c.color[2]],
      supercategory: c.supercategory,
    })),
    images: document.images.map((img): EncodedImage => ({
      id: toPlainNumber(img.id),
      width: toPlainNumber(img.width),
      height: toPlainNumber(img.height),
      file_name: img.file_name,
      license: img.license,
      flickr_url: img.flickr_url,
      coco_url: img.coco_url,
      date_captured: img.date_captured instanceof Date ? formatDate(img.date_captured) : img.date_captured,
    })),
    annotations: document.annotations.map((ann): EncodedAnnotation => ({
      id: toPlainNumber(ann.id),
      iscrowd: 0,
      image_id: toPlainNumber(ann.image_id),
      category_id: toPlainNumber(ann.category_id),
      segmentation: ann.segmentation.map(toPlainList),
      area: 0,
      bbox: [],
    })),
    info: document.info,
    licenses: [],
  };
}

export function serializeDocument(document: Document, indent = 2): string {
  return JSON.stringify(normalizeDocument(document), null, indent);
}

// -------- Parsing --------
const EncodedDocumentSchema = z.object({
  categories: z.array(z.object({
    id: z.number().int(),
    name: z.string(),
    color: z.tuple([z.number(), z.number(), z.number()]),
    supercategory: z.string(),
  })),
  images: z.array(z.object({
    id: z.number().int(),
    width: z.number().int(),
    height: z.number().int(),
    file_name: z.string(),
    license: z.string(),
    flickr_url: z.string(),
    coco_url: z.string(),
    date_captured: z.string(),
  })),
  annotations: z.array(z.object({
    id: z.number().int(),
    iscrowd: z.literal(0),
    image_id: z.number().int(),
    category_id: z.number().int(),
    segmentation: z.array(z.array(z.number())),
    area: z.literal(0),
    bbox: z.tuple([]),
  })),
  info: z.string(),
  licenses: z.tuple([]),
});

export function parseDocument(text: string): EncodedDocument {
  return EncodedDocumentSchema.parse(JSON.parse(text));
}
