import type { LabelingPolicy, Post, Verdict, VerdictExplanation } from '../types/index.js';
import { MoralReasoner } from './moralReasoner.js';

export { MoralReasoner, type MoralReasonerOptions } from './moralReasoner.js';
export { aggregateClauses, clausesForComment, streamWeights } from './constraintAggregator.js';
export { enumerateAssignments, optimize, PROPOSITIONS, satisfiedWeight, type OptimizationResult } from './weightedOptimizer.js';
export { decideVerdict, DEFAULT_LABELING_POLICY, LABELING_POLICIES } from './verdictClassifier.js';
export { padQuality, toCommentVector } from './vectorMapper.js';
export { parsePostRecord } from '../input/postRecords.js';
export type * from '../types/index.js';

export function classify(post: Post, labelingPolicy?: LabelingPolicy): Verdict {
  return new MoralReasoner({ labelingPolicy }).classify(post);
}

export function explain(post: Post, labelingPolicy?: LabelingPolicy): VerdictExplanation {
  return new MoralReasoner({ labelingPolicy }).explain(post);
}
