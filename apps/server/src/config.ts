import path from 'node:path';
import { z } from 'zod';
import { InputError } from './errors';
import { ArtifactWriter } from './services/artifacts';
import { colorMapList, registryColorMap, type ColorMap } from './services/colorMap';
import { PolygonExtractor } from './services/extractor';
import { SubprocessSegmenter, type InferenceHeader } from './services/inference';
import { MarchingSquaresTracer } from './services/tracer';

const pair = z.tuple([z.number().int().positive(), z.number().int().positive()]);

const BaseConfigSchema = z.object({
  saveDir: z.string().min(1).default('./output/result'),
  modelPath: z.string().default(''),
  python: z.string().min(1).default('python3'),
  inferenceScript: z.string().default(''),
  device: z.enum(['cpu', 'gpu', 'xpu', 'npu', 'mlu']).default('gpu'),

  augPred: z.boolean().default(false),
  scales: z.array(z.number().positive()).min(1).default([1.0]),
  flipHorizontal: z.boolean().default(false),
  flipVertical: z.boolean().default(false),
  isSlide: z.boolean().default(false),
  cropSize: pair.optional(),
  stride: pair.optional(),

  customColor: z.array(z.number().int().min(0).max(255)).optional(),
  palette: z.enum(['default', 'registry']).default('default'),
  overlayWeight: z.number().min(0).max(1).default(0.6),
  simplifyTolerance: z.number().min(0).default(0.5),
  minArea: z.number().min(0).default(0),

  rank: z.number().int().min(0).default(0),
  worldSize: z.number().int().min(1).default(1),
});

type BaseConfig = z.infer<typeof BaseConfigSchema>;

function checkConfig(c: BaseConfig, ctx: z.RefinementCtx) {
  if (c.rank >= c.worldSize) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'rank must be smaller than world size', path: ['rank'] });
  }
  if (c.isSlide && (!c.cropSize || !c.stride)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'crop size and stride are required for sliding window prediction',
      path: ['isSlide'],
    });
  }
  if (c.customColor && c.customColor.length % 3 !== 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'custom colors are RGB triples', path: ['customColor'] });
  }
}

export const ExportConfigSchema = BaseConfigSchema.extend({
  imagePath: z.string().min(1),
}).superRefine(checkConfig);

export const ServerConfigSchema = BaseConfigSchema.extend({
  port: z.number().int().positive().default(4000),
}).superRefine(checkConfig);

export type ExportConfig = z.infer<typeof ExportConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

type RawInput<S extends z.ZodTypeAny> = Partial<Record<keyof z.input<S>, unknown>>;

function parseConfig<S extends z.ZodTypeAny>(schema: S, input: RawInput<S>): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || 'config'}: ${i.message}`);
    throw new InputError(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
  return result.data;
}

export const loadExportConfig = (input: RawInput<typeof ExportConfigSchema>): ExportConfig =>
  parseConfig(ExportConfigSchema, input);

export const loadServerConfig = (input: RawInput<typeof ServerConfigSchema>): ServerConfig =>
  parseConfig(ServerConfigSchema, input);

/** Defaults from the environment (.env is loaded by the entry points). */
export function envDefaults(env: NodeJS.ProcessEnv = process.env) {
  return {
    saveDir: env.SAVE_DIR || './output/result',
    modelPath: env.MODEL_PATH || '',
    python: env.PYTHON_PATH || 'python3',
    inferenceScript: env.INFERENCE_SCRIPT || '',
    device: env.DEVICE || 'gpu',
    overlayWeight: Number(env.OVERLAY_WEIGHT || 0.6),
    simplifyTolerance: Number(env.SIMPLIFY_TOLERANCE || 0.5),
    minArea: Number(env.MIN_AREA || 0),
    rank: Number(env.RANK || 0),
    worldSize: Number(env.WORLD_SIZE || 1),
  };
}

/** Augmentation and sliding-window options are only forwarded when enabled. */
export function inferenceHeader(config: BaseConfig): InferenceHeader {
  const header: InferenceHeader = {
    model_path: config.modelPath,
    device: config.device,
    aug_pred: config.augPred,
    is_slide: config.isSlide,
  };
  if (config.augPred) {
    header.scales = config.scales;
    header.flip_horizontal = config.flipHorizontal;
    header.flip_vertical = config.flipVertical;
  }
  if (config.isSlide) {
    header.crop_size = config.cropSize;
    header.stride = config.stride;
  }
  return header;
}

export function buildColorMap(config: BaseConfig): ColorMap {
  return config.palette === 'registry' ? registryColorMap() : colorMapList(256, config.customColor);
}

export function buildComponents(config: BaseConfig) {
  const segmenter = new SubprocessSegmenter({
    pythonPath: config.python,
    scriptPath: config.inferenceScript ? path.resolve(config.inferenceScript) : '',
    header: inferenceHeader(config),
  });
  const extractor = new PolygonExtractor(new MarchingSquaresTracer({
    simplifyTolerance: config.simplifyTolerance,
    minArea: config.minArea,
  }));
  const writer = new ArtifactWriter({
    saveDir: path.resolve(config.saveDir),
    colorMap: buildColorMap(config),
    overlayWeight: config.overlayWeight,
    rank: config.rank,
    worldSize: config.worldSize,
  });
  return { segmenter, extractor, writer };
}
