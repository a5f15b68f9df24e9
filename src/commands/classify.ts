import { classifyBatch } from '../batch/classifyBatch.js';
import { CsvStreamWriter } from '../csv/writer.js';
import { readGroundTruth, readPostsJsonl } from '../input/postRecords.js';
import { MoralReasoner } from '../reasoning/moralReasoner.js';
import type { LabelingPolicy } from '../types/index.js';

export interface ClassifyFilesOptions {
  vectorsPath: string;
  groundTruthPath: string;
  outputPath: string;
  labelingPolicy: LabelingPolicy;
  concurrency: number;
  logger?: (message: string) => void;
}

export interface ClassifyFilesResult {
  processed: number;
  skipped: number;
  outputPath: string;
}

/**
 * Reads the vectors and labels, then writes one CSV row per readable post. The CSV,
 * header included, is written even when no line could be read.
 */
export async function classifyFiles(options: ClassifyFilesOptions): Promise<ClassifyFilesResult> {
  const { logger } = options;
  const groundTruth = await readGroundTruth(options.groundTruthPath);
  logger?.(`Loaded ${groundTruth.size} ground truth labels.`);

  const { posts, skipped } = await readPostsJsonl(options.vectorsPath, (entry) =>
    logger?.(`Skipping line ${entry.line}: ${entry.reason}`),
  );
  if (posts.length === 0) {
    logger?.('No readable posts found in the vectors file.');
  }

  const writer = await CsvStreamWriter.create(options.outputPath);
  const reasoner = new MoralReasoner({ labelingPolicy: options.labelingPolicy });
  const result = await classifyBatch(posts, {
    reasoner,
    groundTruth,
    concurrency: options.concurrency,
    onRow: (row) => writer.writeRow(row),
    logger,
  }).finally(() => writer.close());

  return { processed: result.processed, skipped: skipped.length, outputPath: writer.path };
}
