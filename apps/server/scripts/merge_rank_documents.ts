/*
  Merge the per-rank documents of a multi-worker export into one document.
  Image and annotation ids are renumbered so they are unique again.

  Usage:
    npm run merge -- --save-dir output/result [--output output/result/annotations.json]
*/

import fs from 'node:fs';
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { parseDocument } from '../src/services/aggregator';
import { mergeDocuments } from '../src/services/merge';

const argv = yargs(hideBin(process.argv))
  .option('save-dir', { type:'string', demandOption:true, desc:'Directory holding annotations.rank-<k>.json files' })
  .option('output', { type:'string', desc:'Merged document path (default: <save-dir>/annotations.json)' })
  .parseSync();

const SAVE_DIR = path.resolve(argv['save-dir']);
const OUTPUT = path.resolve(argv.output ?? path.join(SAVE_DIR, 'annotations.json'));

const RANK_FILE = /^annotations\.rank-(\d+)\.json$/;

const files = fs.readdirSync(SAVE_DIR)
  .map(name => ({ name, match: RANK_FILE.exec(name) }))
  .filter((f): f is { name: string; match: RegExpExecArray } => f.match !== null)
  .sort((a, b) => Number(a.match[1]) - Number(b.match[1]));

if (files.length === 0) {
  console.error('No rank documents found in', SAVE_DIR);
  process.exit(1);
}

const documents = files.map(({ name }) => {
  const doc = parseDocument(fs.readFileSync(path.join(SAVE_DIR, name), 'utf8'));
  console.log(`- ${name}: ${doc.images.length} images, ${doc.annotations.length} annotations`);
  return doc;
});

const merged = mergeDocuments(documents);
fs.writeFileSync(OUTPUT, JSON.stringify(merged, null, 2));

console.log(`\n✅ Merged ${files.length} documents: ${merged.images.length} images, ${merged.annotations.length} annotations`);
console.log('Saved to:', OUTPUT);
