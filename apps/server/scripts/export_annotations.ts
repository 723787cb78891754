/*
  Predict a list of images and export the results as a COCO polygon document
  plus overlay / pseudo-color images.

  Output (under --save-dir):
    added_prediction/<image>            original blended with the prediction
    pseudo_color_prediction/<image>.png color-mapped prediction
    annotations.json                    (annotations.rank-<k>.json when --world-size > 1)

  Usage:
    npm run predict -- \
      --image-path data/cityscapes/leftImg8bit/val \
      --model-path weights/model.pdparams \
      --inference-script tools/infer_label_map.py \
      --save-dir output/result

  Multiple workers: run one process per rank with --rank / --world-size (or
  RANK / WORLD_SIZE), then combine with scripts/merge_rank_documents.ts.
*/

import 'dotenv/config';
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { buildComponents, envDefaults, loadExportConfig } from '../src/config';
import { describeError } from '../src/errors';
import { ADDED_DIR, PSEUDO_DIR } from '../src/services/artifacts';
import { FileImageSource, getImageList } from '../src/services/images';
import { runShard } from '../src/services/pipeline';
import { shardFor } from '../src/utils/partition';

const env = envDefaults();

const argv = yargs(hideBin(process.argv))
  .option('image-path', { type:'string', demandOption:true, desc:'An image, a file list of images, or a directory of images' })
  .option('save-dir', { type:'string', default: env.saveDir, desc:'Directory for the predicted results' })
  .option('model-path', { type:'string', default: env.modelPath, desc:'Trained weights passed to the inference program' })
  .option('python', { type:'string', default: env.python, desc:'Interpreter running the inference program' })
  .option('inference-script', { type:'string', default: env.inferenceScript, desc:'Inference program (reads the image on stdin, prints the label map)' })
  .option('device', { type:'string', default: env.device, choices: ['cpu', 'gpu', 'xpu', 'npu', 'mlu'], desc:'Device for prediction' })
  .option('aug-pred', { type:'boolean', default: false, desc:'Multi-scale and flip augmented prediction' })
  .option('scales', { type:'array', number: true, default: [1.0], desc:'Scales for augmentation, e.g. --scales 0.75 1.0 1.25' })
  .option('flip-horizontal', { type:'boolean', default: false, desc:'Horizontal flip augmentation' })
  .option('flip-vertical', { type:'boolean', default: false, desc:'Vertical flip augmentation' })
  .option('is-slide', { type:'boolean', default: false, desc:'Sliding window prediction' })
  .option('crop-size', { type:'array', number: true, desc:'Sliding window crop size: width height' })
  .option('stride', { type:'array', number: true, desc:'Sliding window stride: width height' })
  .option('custom-color', { type:'array', number: true, desc:'Custom color map as flat r g b values' })
  .option('palette', { type:'string', default: 'default', choices: ['default', 'registry'], desc:'Visualization palette' })
  .option('overlay-weight', { type:'number', default: env.overlayWeight, desc:'Weight of the original image in the overlay' })
  .option('simplify-tolerance', { type:'number', default: env.simplifyTolerance, desc:'Polygon simplification tolerance (px)' })
  .option('min-area', { type:'number', default: env.minArea, desc:'Minimum polygon area to keep (px²)' })
  .option('rank', { type:'number', default: env.rank, desc:'Worker rank' })
  .option('world-size', { type:'number', default: env.worldSize, desc:'Number of workers' })
  .parseSync();

async function main() {
  const config = loadExportConfig({
    imagePath: argv['image-path'],
    saveDir: argv['save-dir'],
    modelPath: argv['model-path'],
    python: argv.python,
    inferenceScript: argv['inference-script'],
    device: argv.device,
    augPred: argv['aug-pred'],
    scales: argv.scales,
    flipHorizontal: argv['flip-horizontal'],
    flipVertical: argv['flip-vertical'],
    isSlide: argv['is-slide'],
    cropSize: argv['crop-size'],
    stride: argv.stride,
    customColor: argv['custom-color'],
    palette: argv.palette,
    overlayWeight: argv['overlay-weight'],
    simplifyTolerance: argv['simplify-tolerance'],
    minArea: argv['min-area'],
    rank: argv.rank,
    worldSize: argv['world-size'],
  });
  const { images, imageDir } = getImageList(config.imagePath);
  console.log(`The number of images: ${images.length}`);

  const shard = shardFor(images, config.rank, config.worldSize);
  console.log(`Rank ${config.rank}/${config.worldSize}: ${shard.length} images`);

  const { segmenter, extractor, writer } = buildComponents(config);
  const result = await runShard(shard, { imageDir }, {
    segmenter,
    extractor,
    source: new FileImageSource(),
    sink: writer,
  });

  console.log('\n✅ Export complete!');
  console.log('Predicted images saved in:', path.join(writer.saveDir, ADDED_DIR), 'and', path.join(writer.saveDir, PSEUDO_DIR));
  console.log('Annotations saved to:', result.documentPath);
  if (result.failures.length > 0) {
    console.warn(`${result.failures.length} images were skipped:`);
    for (const failure of result.failures) console.warn(`- ${failure.path}: ${failure.reason}`);
  }
}

main().catch((err) => {
  console.error('Error:', describeError(err));
  process.exit(1);
});
