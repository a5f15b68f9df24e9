import { describe, expect, it, vi } from 'vitest';
import { MoralReasoner } from '../../src/reasoning/moralReasoner.js';
import { classify, explain } from '../../src/reasoning/index.js';
import { parsePostRecord } from '../../src/input/postRecords.js';
import { comment, post } from '../helpers/posts.js';

describe('MoralReasoner', () => {
  it('classifies a single harmful, intentional comment as YTA', () => {
    const reasoner = new MoralReasoner();
    const explanation = reasoner.explain(post([comment([1, 1, 0, 0])]));
    expect(explanation.assignment).toEqual({ harm: true, intent: true, empathy: false, apology: false });
    expect(explanation.satisfiedWeight).toBe(8);
    expect(explanation.verdict).toBe('YTA');
  });

  it('lets the tie-break decide when every weight is zero', () => {
    const zeroWeights = post([comment([0, 0, 1, 1], [2, 1, 1, 1, 0])]);
    expect(new MoralReasoner({ labelingPolicy: 'v2' }).classify(zeroWeights)).toBe('NTA');
    expect(new MoralReasoner({ labelingPolicy: 'v1' }).classify(zeroWeights)).toBe('NAH');
    expect(new MoralReasoner().explain(zeroWeights).tiedAssignments).toBe(16);
  });

  it('weighs conflicting comments instead of trusting the first one', () => {
    const conflicting = post([
      comment([1, 1, 0, 0], [1, 1, 1, 1, 1]),
      comment([0, 1, 0, 0], [2, 1, 2, 1, 1]),
    ]);
    const explanation = new MoralReasoner().explain(conflicting);
    expect(explanation.assignment?.harm).toBe(false);
    expect(explanation.verdict).toBe('NTA');
  });

  it('returns NoData for a post without comments, whatever its other fields', () => {
    const reasoner = new MoralReasoner();
    expect(reasoner.classify(post([], 'empty', ''))).toBe('NoData');
    expect(reasoner.classify(parsePostRecord({ post_id: 'abc', title: 'No comments key' }))).toBe('NoData');
  });

  it('does not log or optimize when there are no comments', () => {
    const logger = vi.fn();
    const explanation = new MoralReasoner({ logger }).explain(post([]));
    expect(logger).not.toHaveBeenCalled();
    expect(explanation).toEqual({
      postId: 'p1',
      title: 'AITA for testing?',
      commentCount: 0,
      policy: 'v2',
      clauses: [],
      assignment: null,
      satisfiedWeight: 0,
      totalWeight: 0,
      tiedAssignments: 0,
      verdict: 'NoData',
    });
  });

  it('produces the same verdict on repeated runs', () => {
    const reasoner = new MoralReasoner();
    const sample = post([comment([1, 0, 1, 0], [1, 2, 1, 2, 1]), comment([1, 0, 0, 0], [1, 1, 1, 1, 1])]);
    const first = reasoner.explain(sample);
    for (let run = 0; run < 5; run += 1) {
      expect(reasoner.explain(sample)).toEqual(first);
    }
    // harm=T (4), intent=F (4), empathy: T 4 vs F 2, apology=F (6)
    expect(first.assignment).toEqual({ harm: true, intent: false, empathy: true, apology: false });
    expect(first.verdict).toBe('NAH');
  });

  it('logs the comment count and the resolved assignment', () => {
    const logger = vi.fn();
    new MoralReasoner({ logger }).classify(post([comment([1, 1, 0, 0])], 'abc'));
    expect(logger.mock.calls).toEqual([
      ['Analyzing 1 comments for post abc...'],
      ['Resolved post abc: harm=true, intent=true, empathy=false, apology=false'],
    ]);
  });

  it('warns and answers Unclear when the optimizer cannot resolve an assignment', () => {
    const warn = vi.fn();
    const broken = post([
      comment([1, 0, 0, 0], [Number.NaN, 1, 1, 1, 1]),
      comment([0, 0, 0, 0], [Number.NaN, 1, 1, 1, 1]),
    ], 'nan');
    expect(new MoralReasoner({ warn }).classify(broken)).toBe('Unclear');
    expect(warn).toHaveBeenCalledWith('Optimizer could not resolve an assignment for post nan; reporting Unclear.');
  });
});

describe('classify / explain', () => {
  it('accept an explicit labeling policy', () => {
    const noHarm = post([comment([0, 0, 0, 0])]);
    expect(classify(noHarm)).toBe('NTA');
    expect(classify(noHarm, 'v1')).toBe('NAH');
    expect(explain(noHarm, 'v1').policy).toBe('v1');
  });
});
