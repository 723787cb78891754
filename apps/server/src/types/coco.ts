// Numeric values coming out of inference / tracing may be wide integers or typed buffers.
export type Numeric = number | bigint;

export type NumericBuffer =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array;

export type Point = readonly [Numeric, Numeric] | NumericBuffer;
export type Polygon = readonly Point[]; // implicitly closed (last point connects to first)

export type RGB = readonly [number, number, number];

export interface ImageSize {
  width: number;
  height: number;
}

/** Per-pixel class ids, row-major. */
export interface LabelMap extends ImageSize {
  readonly data: Uint8Array;
}

/** Single channel, 0 = background, 255 = foreground. */
export interface BinaryMask extends ImageSize {
  readonly data: Uint8Array;
}

export interface Category {
  readonly id: number;
  readonly name: string;
  readonly color: RGB;
  readonly supercategory: string;
}

export interface ImageRecord {
  id: Numeric;
  width: Numeric;
  height: Numeric;
  file_name: string;
  license: string;
  flickr_url: string;
  coco_url: string;
  date_captured: string | Date;
}

export interface AnnotationRecord {
  id: Numeric;
  iscrowd: 0;
  image_id: Numeric;
  category_id: Numeric;
  segmentation: Array<Numeric[] | NumericBuffer>; // [[x1,y1,x2,y2,...]]
  area: 0; // not computed
  bbox: []; // not computed
}

export interface Document {
  categories: readonly Category[];
  images: ImageRecord[];
  annotations: AnnotationRecord[];
  info: string;
  licenses: [];
}

// -------- Encoded (plain JSON) shapes --------
export interface EncodedCategory {
  id: number;
  name: string;
  color: [number, number, number];
  supercategory: string;
}

export interface EncodedImage {
  id: number;
  width: number;
  height: number;
  file_name: string;
  license: string;
  flickr_url: string;
  coco_url: string;
  date_captured: string;
}

export interface EncodedAnnotation {
  id: number;
  iscrowd: 0;
  image_id: number;
  category_id: number;
  segmentation: number[][];
  area: 0;
  bbox: [];
}

export interface EncodedDocument {
  categories: EncodedCategory[];
  images: EncodedImage[];
  annotations: EncodedAnnotation[];
  info: string;
  licenses: [];
}

/** Polygons per category id, in ascending id order. */
export type CategoryPolygons = Map<number, Polygon[]>;
