import type { EncodedDocument } from '../types/coco';

/**
 * Concatenate per-rank documents in rank order. Image and annotation ids of
 * each document are shifted past the ones before it, so the result is again
 * numbered 1..N / 1..K.
 */
export function mergeDocuments(documents: readonly EncodedDocument[]): EncodedDocument {
  if (documents.length === 0) {
    throw new Error('Nothing to merge');
  }
  const categories = documents[0].categories;
  const signature = JSON.stringify(categories);

  const merged: EncodedDocument = {
    categories,
    images: [],
    annotations: [],
    info: documents[0].info,
    licenses: [],
  };

  for (const [rank, doc] of documents.entries()) {
    if (JSON.stringify(doc.categories) !== signature) {
      throw new Error(`Document ${rank} has different categories than document 0`);
    }
    const imageIds = new Map<number, number>();
    for (const image of doc.images) {
      const id = merged.images.length + 1;
      imageIds.set(image.id, id);
      merged.images.push({ ...image, id });
    }
    for (const ann of doc.annotations) {
      const imageId = imageIds.get(ann.image_id);
      if (imageId === undefined) {
        throw new Error(`Annotation ${ann.id} of document ${rank} references missing image ${ann.image_id}`);
      }
      merged.annotations.push({ ...ann, id: merged.annotations.length + 1, image_id: imageId });
    }
  }
  return merged;
}
