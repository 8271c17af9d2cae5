#!/usr/bin/env node
/**
 * Add (or replace) the Total and Max sheets of a day-sheet workbook.
 * Run with: npx tsx src/scripts/generate-levels.ts <input.xlsx> [output.xlsx]
 * Without an output path the input file is overwritten.
 */
import 'dotenv/config';
import { writeFile } from 'fs/promises';
import { processWorkbook } from '../pipeline/levels-pipeline.js';

async function generate(): Promise<void> {
  const [input, output = input] = process.argv.slice(2);
  if (!input || !output) {
    console.error('Usage: generate-levels <input.xlsx> [output.xlsx]');
    process.exit(1);
  }

  const bytes = await processWorkbook(input);
  if (!bytes) {
    console.error(`[CLI] Processing failed for ${input}`);
    process.exit(1);
  }

  await writeFile(output, bytes);
  console.log(`[CLI] Successfully processed ${input} → ${output}`);
}

generate().catch(err => { console.error(err); process.exit(1); });
