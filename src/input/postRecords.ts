import { isPlainObject, jot } from '../jot.js';
import { toCommentVector } from '../reasoning/vectorMapper.js';
import type { Post } from '../types/index.js';
import { readTextFile } from '../utils/files.js';

const UNKNOWN_LABEL = 'Unknown';

const postRecordNode = jot.object({
  post_id: jot.withDefault(jot.string(), 'Unknown'),
  title: jot.withDefault(jot.string(), 'No Title'),
  processed_comments: jot.withDefault(jot.array(jot.unknown()), []),
});

export interface SkippedLine {
  line: number;
  reason: string;
}

export interface JsonlReadResult {
  posts: Post[];
  skipped: SkippedLine[];
}

/** Throws TypeError when the record's top-level shape is wrong; comment contents never throw. */
export function parsePostRecord(value: unknown): Post {
  const record = postRecordNode.parse(value, 'record');
  return {
    id: record.post_id,
    title: record.title,
    comments: record.processed_comments.map((comment) => toCommentVector(comment)),
  };
}

export function parsePostsJsonl(text: string, onSkip?: (skipped: SkippedLine) => void): JsonlReadResult {
  const posts: Post[] = [];
  const skipped: SkippedLine[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    if (!raw.trim()) {
      return;
    }
    try {
      posts.push(parsePostRecord(JSON.parse(raw)));
    } catch (error) {
      const entry = { line: index + 1, reason: error instanceof Error ? error.message : String(error) };
      skipped.push(entry);
      onSkip?.(entry);
    }
  });

  return { posts, skipped };
}

export async function readPostsJsonl(
  filePath: string,
  onSkip?: (skipped: SkippedLine) => void,
): Promise<JsonlReadResult> {
  const raw = await readTextFile(filePath, 'Vectors');
  return parsePostsJsonl(raw, onSkip);
}

export interface SinglePost {
  post: Post;
  groundTruth: string;
}

/** Accepts either one post object or an array whose first element is the post. */
export function parseSinglePost(value: unknown): SinglePost {
  const candidate: unknown = Array.isArray(value) ? value[0] : value;
  const post = parsePostRecord(candidate);
  const record: Record<string, unknown> = isPlainObject(candidate) ? candidate : {};
  const groundTruth = [record.reddit_flair, record.label].find((label): label is string => typeof label === 'string');
  return { post, groundTruth: groundTruth ?? UNKNOWN_LABEL };
}

export async function readSinglePost(filePath: string): Promise<SinglePost> {
  const raw = await readTextFile(filePath, 'Post');
  return parseSinglePost(JSON.parse(raw));
}

export function parseGroundTruth(value: unknown): Map<string, string> {
  if (!Array.isArray(value)) {
    throw new Error('Ground truth JSON must be an array.');
  }

  const labels = new Map<string, string>();
  for (const entry of value) {
    if (!isPlainObject(entry)) {
      continue;
    }
    const postId = entry.post_id;
    if (typeof postId !== 'string' || postId.length === 0) {
      continue;
    }
    const label = entry.ground_truth_label;
    labels.set(postId, typeof label === 'string' ? label : UNKNOWN_LABEL);
  }
  return labels;
}

export async function readGroundTruth(filePath: string): Promise<Map<string, string>> {
  const raw = await readTextFile(filePath, 'Ground truth');
  return parseGroundTruth(JSON.parse(raw));
}

export function lookupGroundTruth(labels: ReadonlyMap<string, string>, postId: string): string {
  return labels.get(postId) ?? UNKNOWN_LABEL;
}
