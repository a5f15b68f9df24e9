import { describe, expect, it } from 'vitest';
import { padQuality, toCommentVector, toContentVector } from '../../src/reasoning/vectorMapper.js';

describe('toCommentVector', () => {
  it('maps a complete record unchanged', () => {
    const vector = toCommentVector({
      comment_content_vector: [1, 0, 1, 0],
      comment_quality_vector: [2, 0.5, 3, 1, 0.8],
    });
    expect(vector).toEqual({ content: [1, 0, 1, 0], quality: [2, 0.5, 3, 1, 0.8] });
  });

  it('defaults missing vectors to absent content and neutral quality', () => {
    expect(toCommentVector({})).toEqual({ content: [0, 0, 0, 0], quality: [1, 1, 1, 1, 1] });
  });

  it('treats a non-object comment as an empty record', () => {
    expect(toCommentVector('not a comment')).toEqual({ content: [0, 0, 0, 0], quality: [1, 1, 1, 1, 1] });
    expect(toCommentVector(null)).toEqual({ content: [0, 0, 0, 0], quality: [1, 1, 1, 1, 1] });
  });

  it('ignores a quality vector that is not an array', () => {
    expect(toCommentVector({ comment_quality_vector: 'high' }).quality).toEqual([1, 1, 1, 1, 1]);
  });
});

describe('toContentVector', () => {
  it('counts the number 1 and boolean true as present', () => {
    expect(toContentVector([1, 2, '1', true])).toEqual([1, 0, 0, 1]);
    expect(toContentVector([true, false, 0, null])).toEqual([1, 0, 0, 0]);
  });

  it('fills missing trailing flags with 0 and drops extras', () => {
    expect(toContentVector([1, 1])).toEqual([1, 1, 0, 0]);
    expect(toContentVector([0, 0, 0, 1, 1, 1])).toEqual([0, 0, 0, 1]);
  });
});

describe('padQuality', () => {
  it.each([
    [[], [1, 1, 1, 1, 1]],
    [[3], [3, 1, 1, 1, 1]],
    [[2, 0], [2, 0, 1, 1, 1]],
    [[0.5, 2, 4], [0.5, 2, 4, 1, 1]],
    [[1, 2, 3, 4], [1, 2, 3, 4, 1]],
  ])('pads %j to five entries', (input, expected) => {
    const padded = padQuality(input);
    expect(padded).toHaveLength(5);
    expect(padded).toEqual(expected);
    expect(padded.slice(0, input.length)).toEqual(input);
  });

  it('keeps only the first five entries of a longer vector', () => {
    expect(padQuality([1, 2, 3, 4, 5, 6, 7])).toEqual([1, 2, 3, 4, 5]);
  });

  it('replaces non-numeric and non-finite entries with the neutral multiplier', () => {
    expect(padQuality(['x', null, Number.NaN, Number.POSITIVE_INFINITY, 2])).toEqual([1, 1, 1, 1, 2]);
  });
});
