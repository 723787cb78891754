import { ExportError, ExtractionError, InferenceError, WriteError, describeError } from '../errors';
import type { Document, LabelMap } from '../types/coco';
import { aggregate } from './aggregator';
import { AnnotationAssembler, relativeFileName } from './assembler';
import type { ArtifactSink } from './artifacts';
import { categoryRegistry } from './categories';
import { extractAll, type PolygonExtractor } from './extractor';
import type { ImageSource } from './images';
import type { Segmenter } from './inference';

async function infer(segmenter: Segmenter, image: Buffer, imagePath: string): Promise<LabelMap> {
  try {
    return await segmenter.infer(image);
  } catch (err) {
    if (err instanceof ExportError) throw err;
    throw new InferenceError(`Inference failed for ${imagePath}: ${describeError(err)}`, { cause: err });
  }
}

export interface PipelineDeps {
  segmenter: Segmenter;
  extractor: PolygonExtractor;
  source: ImageSource;
  sink: ArtifactSink;
}

export interface ShardOptions {
  /** Root stripped from image paths to build file names; null keeps base names. */
  imageDir: string | null;
}

export interface ImageFailure {
  path: string;
  reason: string;
}

export interface ShardResult {
  document: Document;
  documentPath: string;
  processed: number;
  failures: ImageFailure[];
}

/**
 * Predict, trace and annotate every image of one shard, then write the shard
 * document once.
 *
 * - InputError (pre-flight) and InferenceError abort the run; no document is written.
 * - ExtractionError and per-image WriteError fail that image only: it gets no
 *   records, ids stay gapless, and the loop moves on.
 */
export async function runShard(imagePaths: readonly string[], options: ShardOptions, deps: PipelineDeps): Promise<ShardResult> {
  await deps.segmenter.assertReady();
  for (const imagePath of imagePaths) {
    await deps.source.probe(imagePath);
  }

  const assembler = new AnnotationAssembler(options.imageDir);
  const failures: ImageFailure[] = [];
  console.log(`[PREDICT] Start to predict ${imagePaths.length} images...`);

  for (const [index, imagePath] of imagePaths.entries()) {
    const image = await deps.source.read(imagePath);
    const labelMap = await infer(deps.segmenter, image, imagePath);
    const fileName = relativeFileName(imagePath, options.imageDir);

    try {
      const polygons = extractAll(labelMap, deps.extractor);
      await deps.sink.writeImageArtifacts(image, fileName, labelMap);
      assembler.addImage({ path: imagePath, width: labelMap.width, height: labelMap.height, polygons });
    } catch (err) {
      if (!(err instanceof ExtractionError || err instanceof WriteError)) throw err;
      console.warn(`[PREDICT] Skipping ${imagePath}: ${err.message}`);
      failures.push({ path: imagePath, reason: describeError(err) });
    }
    console.log(`[PREDICT] ${index + 1}/${imagePaths.length} ${fileName}`);
  }

  const document = aggregate(categoryRegistry.list(), assembler.images, assembler.annotations);
  const documentPath = await deps.sink.writeDocument(document);
  console.log(
    `[PREDICT] ${assembler.imageCount} images, ${assembler.annotationCount} annotations, ${failures.length} failed`,
  );
  return { document, documentPath, processed: assembler.imageCount, failures };
}

/** One in-memory image through inference and tracing, with fresh ids and no files written. */
export async function annotateSingle(
  image: Buffer,
  fileName: string,
  deps: Pick<PipelineDeps, 'segmenter' | 'extractor'>,
): Promise<{ document: Document; labelMap: LabelMap }> {
  const labelMap = await infer(deps.segmenter, image, fileName);
  const polygons = extractAll(labelMap, deps.extractor);
  const assembler = new AnnotationAssembler(null);
  assembler.addImage({ path: fileName, width: labelMap.width, height: labelMap.height, polygons });
  return { document: aggregate(categoryRegistry.list(), assembler.images, assembler.annotations), labelMap };
}
