import type { CommentVector, ContentVector, Post, QualityVector } from '../../src/types/index.js';

export const NEUTRAL: QualityVector = [1, 1, 1, 1, 1];

export function comment(content: ContentVector, quality: QualityVector = NEUTRAL): CommentVector {
  return { content, quality };
}

export function post(comments: CommentVector[], id: string = 'p1', title: string = 'AITA for testing?'): Post {
  return { id, title, comments };
}
