/**
 * Convert a local PDF or text file to MP3 without starting the server
 * Run with: npx tsx scripts/convert-file.ts <input> [outDir]
 */

// Load environment variables from .env file
import dotenv from 'dotenv';
dotenv.config();

import { randomUUID } from 'crypto';
import { copyFile, mkdtemp, rm } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadConfig } from '../lib/config';
import { ConversionPipeline } from '../lib/processors/conversion-pipeline';
import { createSpeechSynthesizer } from '../lib/processors/speech';
import { targetNameFor } from '../lib/jobs/job-registry';

async function main() {
  const [input, outDir = process.cwd()] = process.argv.slice(2);
  if (!input) {
    console.error('Usage: tsx scripts/convert-file.ts <input.pdf|input.txt> [outDir]');
    process.exit(1);
  }

  const config = loadConfig();
  const pipeline = new ConversionPipeline({
    createSynthesizer: () => createSpeechSynthesizer(config),
    wordBudget: config.wordBudget,
    concurrency: config.synthesisConcurrency,
    synthesisTimeoutMs: config.ttsTimeoutMs,
  });

  const workDir = await mkdtemp(path.join(os.tmpdir(), 'speakdoc-cli-'));
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    // The pipeline picks its extractor from the file name, so keep it
    const sourcePath = path.join(workDir, path.basename(input));
    await copyFile(input, sourcePath);

    const audio = await pipeline.convert({
      jobId: randomUUID().substring(0, 12),
      sourcePath,
      targetPath: path.resolve(outDir, targetNameFor(path.basename(input))),
      jobDir: path.join(workDir, 'job'),
      signal: controller.signal,
      onProgress: ({ state, completedChunks, totalChunks }) => {
        if (state === 'synthesizing') {
          console.log(`  ${completedChunks}/${totalChunks} chunks`);
        }
      },
    });

    console.log(`✓ Wrote ${audio.path} (${audio.size} bytes, ${audio.segmentCount} segments)`);
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}

main().catch((error) => {
  console.error('✗ Conversion failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
