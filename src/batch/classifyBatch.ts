import pLimit from 'p-limit';
import type { VerdictRow } from '../csv/writer.js';
import { lookupGroundTruth } from '../input/postRecords.js';
import type { MoralReasoner } from '../reasoning/moralReasoner.js';
import type { Post } from '../types/index.js';

const PROGRESS_INTERVAL = 20;

export interface ClassifyBatchOptions {
  reasoner: MoralReasoner;
  groundTruth: ReadonlyMap<string, string>;
  concurrency?: number;
  /** Called once per post, in input order, whatever the concurrency. */
  onRow?: (row: VerdictRow) => Promise<void> | void;
  collectRows?: boolean;
  logger?: (message: string) => void;
}

export interface ClassifyBatchResult {
  processed: number;
  rows: VerdictRow[];
}

export async function classifyBatch(posts: readonly Post[], options: ClassifyBatchOptions): Promise<ClassifyBatchResult> {
  const limit = pLimit(options.concurrency ?? 8);
  const shouldCollect = options.collectRows ?? !options.onRow;
  const collected: VerdictRow[] = [];
  const pending = new Map<number, VerdictRow>();
  let nextEmitIndex = 0;
  let processed = 0;

  const emitIfReady = async () => {
    let ready = pending.get(nextEmitIndex);
    while (ready) {
      pending.delete(nextEmitIndex);
      if (shouldCollect) {
        collected.push(ready);
      }
      if (options.onRow) {
        await options.onRow(ready);
      }
      nextEmitIndex += 1;
      processed += 1;
      if (processed % PROGRESS_INTERVAL === 0) {
        options.logger?.(`Processed ${processed} posts...`);
      }
      ready = pending.get(nextEmitIndex);
    }
  };

  const tasks = posts.map((post, index) =>
    limit(async () => {
      pending.set(index, toVerdictRow(post, options.reasoner, options.groundTruth));
      await emitIfReady();
    }),
  );
  await Promise.all(tasks);
  await emitIfReady();

  return { processed, rows: shouldCollect ? collected : [] };
}

export function toVerdictRow(post: Post, reasoner: MoralReasoner, groundTruth: ReadonlyMap<string, string>): VerdictRow {
  return {
    post_id: post.id,
    title: post.title,
    verdict: reasoner.classify(post),
    ground_truth_label: lookupGroundTruth(groundTruth, post.id),
  } satisfies VerdictRow;
}
