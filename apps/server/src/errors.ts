export class ExportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unreadable / malformed input, missing model weights. Fatal before any image is processed. */
export class InputError extends ExportError {}

/** The segmenter failed for an image. Aborts the run. */
export class InferenceError extends ExportError {}

/** The tracer failed for one category mask. Fails the image, not the run. */
export class ExtractionError extends ExportError {
  readonly categoryId: number;

  constructor(categoryId: number, options?: { cause?: unknown }) {
    super(`Polygon extraction failed for category ${categoryId}: ${describeError(options?.cause)}`, options);
    this.categoryId = categoryId;
  }
}

export class WriteError extends ExportError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`Failed to write ${path}: ${describeError(options?.cause)}`, options);
    this.path = path;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'Unknown error';
  return String(error);
}
