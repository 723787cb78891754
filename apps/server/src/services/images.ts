import fs from 'node:fs';
import path from 'node:path';
import sharp from 'sharp';
import { InputError, describeError } from '../errors';

const VALID_SUFFIXES = new Set(['.jpeg', '.jpg', '.bmp', '.png']);

export interface ImageList {
  images: string[];
  /** Root the relative output names are computed against; null for a single image. */
  imageDir: string | null;
}

const isImageFile = (file: string) => VALID_SUFFIXES.has(path.extname(file).toLowerCase());

function walk(dir: string, out: string[]) {
  const entries = fs.readdirSync(dir, { withFileTypes: true })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === '.ipynb_checkpoints') continue;
      walk(full, out);
    } else if (!entry.name.startsWith('.') && isImageFile(entry.name)) {
      out.push(full);
    }
  }
}

/**
 * Resolve `imagePath` (an image, a list file with one image per line, or a
 * directory walked recursively) to the list of images to predict.
 */
export function getImageList(imagePath: string): ImageList {
  if (!fs.existsSync(imagePath)) {
    throw new InputError(`Image path not found: ${imagePath}. Expected an image, a file list or a directory of images`);
  }
  const images: string[] = [];
  let imageDir: string | null = null;

  if (fs.statSync(imagePath).isDirectory()) {
    imageDir = path.normalize(imagePath);
    walk(imageDir, images);
  } else if (isImageFile(imagePath)) {
    images.push(imagePath);
  } else {
    imageDir = path.dirname(imagePath);
    const lines = fs.readFileSync(imagePath, 'utf8').split(/\r?\n/);
    for (const raw of lines) {
      const line = raw.trim();
      if (!line) continue;
      images.push(path.join(imageDir, line.split(/\s+/)[0]));
    }
  }

  if (images.length === 0) {
    throw new InputError(`No image files found in ${imagePath}`);
  }
  return { images, imageDir };
}

export interface ImageSource {
  /** Throws InputError when the image cannot be read or decoded. */
  probe(imagePath: string): Promise<void>;
  read(imagePath: string): Promise<Buffer>;
}

export class FileImageSource implements ImageSource {
  async probe(imagePath: string): Promise<void> {
    try {
      await fs.promises.access(imagePath, fs.constants.R_OK);
      const metadata = await sharp(imagePath).metadata();
      if (!metadata.width || !metadata.height) {
        throw new Error('Unable to read image dimensions.');
      }
    } catch (err) {
      throw new InputError(`Unreadable image ${imagePath}: ${describeError(err)}`, { cause: err });
    }
  }

  async read(imagePath: string): Promise<Buffer> {
    try {
      return await fs.promises.readFile(imagePath);
    } catch (err) {
      throw new InputError(`Unreadable image ${imagePath}: ${describeError(err)}`, { cause: err });
    }
  }
}
