import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import { z } from 'zod';
import { InferenceError, InputError } from '../errors';
import type { LabelMap } from '../types/coco';

/** Model inference port: encoded image in, per-pixel class ids out. */
export interface Segmenter {
  /** Throws InputError when weights or the inference program are unavailable. */
  assertReady(): Promise<void>;
  infer(image: Buffer): Promise<LabelMap>;
}

export interface InferenceHeader {
  model_path: string;
  device: string;
  aug_pred: boolean;
  scales?: number[];
  flip_horizontal?: boolean;
  flip_vertical?: boolean;
  is_slide: boolean;
  crop_size?: [number, number];
  stride?: [number, number];
}

export interface SubprocessSegmenterOptions {
  pythonPath: string;
  scriptPath: string;
  cwd?: string;
  header: InferenceHeader;
}

const InferenceOutputSchema = z.union([
  z.object({ error: z.string() }),
  z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    label_map: z.string(), // base64, uint8, row-major
  }),
]);

// [4 bytes: header length][header JSON][image bytes]
export function encodeRequest(header: InferenceHeader, image: Buffer): Buffer {
  const headerBytes = Buffer.from(JSON.stringify(header), 'utf-8');
  const headerLength = Buffer.allocUnsafe(4);
  headerLength.writeUInt32BE(headerBytes.length, 0);
  return Buffer.concat([headerLength, headerBytes, image]);
}

/**
 * The inference program may print progress to stdout; the response is the
 * last JSON object, starting on its own line.
 */
export function parseInferenceOutput(stdout: string): LabelMap {
  const lines = stdout.trim().split('\n');
  let jsonText = '';
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].trim().startsWith('{')) {
      jsonText = lines.slice(i).join('\n');
      break;
    }
  }

  let parsed: z.infer<typeof InferenceOutputSchema>;
  try {
    parsed = InferenceOutputSchema.parse(JSON.parse(jsonText || stdout));
  } catch (err) {
    throw new InferenceError(`Failed to parse inference result: ${stdout.substring(0, 200)}`, { cause: err });
  }
  if ('error' in parsed) throw new InferenceError(parsed.error);

  const data = new Uint8Array(Buffer.from(parsed.label_map, 'base64'));
  if (data.length !== parsed.width * parsed.height) {
    throw new InferenceError(
      `Label map has ${data.length} values, expected ${parsed.width}x${parsed.height}`,
    );
  }
  return { width: parsed.width, height: parsed.height, data };
}

export class SubprocessSegmenter implements Segmenter {
  constructor(private readonly options: SubprocessSegmenterOptions) {
    console.log(`[INFERENCE] Using Python: ${options.pythonPath}`);
    console.log(`[INFERENCE] Using script: ${options.scriptPath}`);
  }

  async assertReady(): Promise<void> {
    if (!this.options.header.model_path || !existsSync(this.options.header.model_path)) {
      throw new InputError(`Model weights not found: ${this.options.header.model_path || '(not set)'}`);
    }
    if (!this.options.scriptPath || !existsSync(this.options.scriptPath)) {
      throw new InputError(`Inference script not found: ${this.options.scriptPath || '(not set)'}`);
    }
  }

  infer(image: Buffer): Promise<LabelMap> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.options.pythonPath, [this.options.scriptPath], {
        cwd: this.options.cwd ?? process.cwd(),
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (err) => {
        reject(new InferenceError(`Failed to start inference: ${err.message}`, { cause: err }));
      });

      child.on('close', (code) => {
        if (code !== 0) {
          console.error(`[INFERENCE] Process exited with code ${code}`);
          reject(new InferenceError(`Inference failed: ${stderr.trim() || `exit code ${code}`}`));
          return;
        }
        try {
          resolve(parseInferenceOutput(stdout));
        } catch (err) {
          reject(err);
        }
      });

      child.stdin.on('error', (err) => {
        reject(new InferenceError(`Failed to send image to inference: ${err.message}`, { cause: err }));
      });
      child.stdin.end(encodeRequest(this.options.header, image));
    });
  }
}
