import type { CommentVector, ContentFlag, ContentVector, QualityVector } from '../types/index.js';
import { isPlainObject } from '../jot.js';

const NEUTRAL_QUALITY = 1;

/**
 * Maps one raw `processed_comments` entry to a typed vector. Malformed or missing parts
 * fall back to defaults (all-absent content, neutral quality) instead of failing.
 */
export function toCommentVector(raw: unknown): CommentVector {
  const record: Record<string, unknown> = isPlainObject(raw) ? raw : {};
  return {
    content: toContentVector(record.comment_content_vector),
    quality: padQuality(Array.isArray(record.comment_quality_vector) ? record.comment_quality_vector : []),
  };
}

export function toContentVector(raw: unknown): ContentVector {
  const values: unknown[] = Array.isArray(raw) ? raw : [];
  // Boolean true counts as present, like 1.
  const flag = (index: number): ContentFlag => (values[index] === 1 || values[index] === true ? 1 : 0);
  return [flag(0), flag(1), flag(2), flag(3)];
}

// Right-pads with the neutral multiplier; entries past the fifth are dropped.
export function padQuality(raw: readonly unknown[]): QualityVector {
  const value = (index: number): number => {
    const entry = raw[index];
    return typeof entry === 'number' && Number.isFinite(entry) ? entry : NEUTRAL_QUALITY;
  };
  return [value(0), value(1), value(2), value(3), value(4)];
}
