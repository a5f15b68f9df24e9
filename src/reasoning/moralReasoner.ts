import type { LabelingPolicy, Post, Verdict, VerdictExplanation } from '../types/index.js';
import { aggregateClauses } from './constraintAggregator.js';
import { optimize } from './weightedOptimizer.js';
import { DEFAULT_LABELING_POLICY, decideVerdict } from './verdictClassifier.js';

export interface MoralReasonerOptions {
  labelingPolicy?: LabelingPolicy;
  logger?: (message: string) => void;
  /** Receives invariant violations; defaults to console.warn. */
  warn?: (message: string) => void;
}

/**
 * Entry point for verdict inference. Each call works only from the given post, so one
 * instance can be shared across any number of posts.
 */
export class MoralReasoner {
  private readonly labelingPolicy: LabelingPolicy;
  private readonly logger: ((message: string) => void) | undefined;
  private readonly warn: (message: string) => void;

  constructor(options: MoralReasonerOptions = {}) {
    this.labelingPolicy = options.labelingPolicy ?? DEFAULT_LABELING_POLICY;
    this.logger = options.logger;
    this.warn = options.warn ?? ((message) => console.warn(message));
  }

  classify(post: Post): Verdict {
    return this.explain(post).verdict;
  }

  explain(post: Post): VerdictExplanation {
    const base = {
      postId: post.id,
      title: post.title,
      commentCount: post.comments.length,
      policy: this.labelingPolicy,
    };

    if (post.comments.length === 0) {
      return {
        ...base,
        clauses: [],
        assignment: null,
        satisfiedWeight: 0,
        totalWeight: 0,
        tiedAssignments: 0,
        verdict: 'NoData',
      };
    }

    this.logger?.(`Analyzing ${post.comments.length} comments for post ${post.id}...`);
    const clauses = aggregateClauses(post);
    const result = optimize(clauses);

    if (!result) {
      this.warn(`Optimizer could not resolve an assignment for post ${post.id}; reporting Unclear.`);
      return {
        ...base,
        clauses,
        assignment: null,
        satisfiedWeight: 0,
        totalWeight: 0,
        tiedAssignments: 0,
        verdict: 'Unclear',
      };
    }

    const { assignment } = result;
    this.logger?.(
      `Resolved post ${post.id}: harm=${assignment.harm}, intent=${assignment.intent}, empathy=${assignment.empathy}, apology=${assignment.apology}`,
    );

    return {
      ...base,
      clauses,
      assignment,
      satisfiedWeight: result.satisfiedWeight,
      totalWeight: result.totalWeight,
      tiedAssignments: result.tiedAssignments,
      verdict: decideVerdict(assignment, this.labelingPolicy),
    };
  }
}
