import fs from 'node:fs';
import path from 'node:path';
import sharp from 'sharp';
import { ExportError, InferenceError, WriteError } from '../errors';
import type { Document, LabelMap } from '../types/coco';
import { serializeDocument } from './aggregator';
import { colorMapList, pseudoColorPixels, type ColorMap } from './colorMap';

export const ADDED_DIR = 'added_prediction';
export const PSEUDO_DIR = 'pseudo_color_prediction';

export interface ArtifactPaths {
  added: string;
  pseudo: string;
}

/** Where per-image artifacts and the shard document go. */
export interface ArtifactSink {
  writeImageArtifacts(image: Buffer, relativeName: string, labelMap: LabelMap): Promise<ArtifactPaths>;
  writeDocument(document: Document): Promise<string>;
}

export interface ArtifactWriterOptions {
  saveDir: string;
  colorMap?: ColorMap;
  /** Weight of the original image in the overlay; the prediction gets 1 - weight. */
  overlayWeight?: number;
  rank?: number;
  worldSize?: number;
}

const ENCODABLE = new Set(['.jpg', '.jpeg', '.png', '.webp']);

function applyOutputFormat(pipeline: sharp.Sharp, outputPath: string): sharp.Sharp {
  const ext = path.extname(outputPath).toLowerCase();
  if (ext === '.jpg' || ext === '.jpeg') return pipeline.jpeg();
  if (ext === '.webp') return pipeline.webp();
  return pipeline.png();
}

/** annotations.json for a single worker, annotations.rank-<k>.json otherwise. */
export function documentPath(saveDir: string, rank = 0, worldSize = 1): string {
  const name = worldSize > 1 ? `annotations.rank-${rank}.json` : 'annotations.json';
  return path.join(saveDir, name);
}

export class ArtifactWriter implements ArtifactSink {
  readonly saveDir: string;
  private readonly colorMap: ColorMap;
  private readonly overlayWeight: number;
  private readonly rank: number;
  private readonly worldSize: number;

  constructor(options: ArtifactWriterOptions) {
    this.saveDir = options.saveDir;
    this.colorMap = options.colorMap ?? colorMapList(256);
    this.overlayWeight = options.overlayWeight ?? 0.6;
    this.rank = options.rank ?? 0;
    this.worldSize = options.worldSize ?? 1;
  }

  paths(relativeName: string): ArtifactPaths {
    const ext = path.extname(relativeName);
    const stem = relativeName.slice(0, relativeName.length - ext.length);
    // sharp cannot encode every input format (bmp); those overlays are written as png
    const addedName = ENCODABLE.has(ext.toLowerCase()) ? relativeName : `${stem}.png`;
    return {
      added: path.join(this.saveDir, ADDED_DIR, addedName),
      pseudo: path.join(this.saveDir, PSEUDO_DIR, `${stem}.png`),
    };
  }

  get documentPath(): string {
    return documentPath(this.saveDir, this.rank, this.worldSize);
  }

  async renderPseudoColor(labelMap: LabelMap): Promise<Buffer> {
    const { width, height } = labelMap;
    return sharp(pseudoColorPixels(labelMap, this.colorMap), { raw: { width, height, channels: 3 } })
      .png()
      .toBuffer();
  }

  /** round(w * image + (1 - w) * pseudoColor), encoded by the extension of `outputName`. */
  async renderOverlay(image: Buffer, labelMap: LabelMap, outputName = 'overlay.png'): Promise<Buffer> {
    const { data, info } = await sharp(image).removeAlpha().raw().toBuffer({ resolveWithObject: true });
    const { width, height } = labelMap;
    if (info.width !== width || info.height !== height) {
      throw new InferenceError(`Label map is ${width}x${height} but the image is ${info.width}x${info.height}`);
    }
    const pseudo = pseudoColorPixels(labelMap, this.colorMap);
    const channels = info.channels;
    const w = this.overlayWeight;
    const out = Buffer.alloc(width * height * 3);
    for (let p = 0; p < width * height; p++) {
      for (let c = 0; c < 3; c++) {
        const src = data[p * channels + (channels >= 3 ? c : 0)];
        out[p * 3 + c] = Math.min(255, Math.round(w * src + (1 - w) * pseudo[p * 3 + c]));
      }
    }
    return applyOutputFormat(sharp(out, { raw: { width, height, channels: 3 } }), outputName).toBuffer();
  }

  async writeImageArtifacts(image: Buffer, relativeName: string, labelMap: LabelMap): Promise<ArtifactPaths> {
    const paths = this.paths(relativeName);
    const added = await this.render(paths.added, () => this.renderOverlay(image, labelMap, paths.added));
    const pseudo = await this.render(paths.pseudo, () => this.renderPseudoColor(labelMap));
    await writeFile(paths.added, added);
    await writeFile(paths.pseudo, pseudo);
    return paths;
  }

  async writeDocument(document: Document): Promise<string> {
    const target = this.documentPath;
    const tmp = `${target}.${process.pid}.tmp`;
    await writeFile(tmp, serializeDocument(document));
    try {
      await fs.promises.rename(tmp, target);
    } catch (err) {
      throw new WriteError(target, { cause: err });
    }
    console.log(`[WRITER] Document saved to ${target}`);
    return target;
  }

  private async render(target: string, fn: () => Promise<Buffer>): Promise<Buffer> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ExportError) throw err;
      throw new WriteError(target, { cause: err });
    }
  }
}

async function writeFile(target: string, contents: Buffer | string): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, contents);
  } catch (err) {
    throw new WriteError(target, { cause: err });
  }
}
