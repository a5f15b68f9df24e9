import type { CommentVector, Post, QualityVector, SoftClause } from '../types/index.js';

export interface StreamWeights {
  /** Drives harm and intent. */
  logic: number;
  /** Drives empathy and apology. */
  ethic: number;
}

export function streamWeights(quality: QualityVector): StreamWeights {
  const [justification, ethic, deliberative, fairness, nonBiased] = quality;
  return {
    logic: toWeight((justification + deliberative) * nonBiased),
    ethic: toWeight((ethic + fairness) * nonBiased),
  };
}

export function clausesForComment(comment: CommentVector): SoftClause[] {
  const { logic, ethic } = streamWeights(comment.quality);
  const [harm, intent, empathy, apology] = comment.content;
  return [
    { proposition: 'harm', polarity: harm === 1, weight: logic },
    { proposition: 'intent', polarity: intent === 1, weight: logic },
    { proposition: 'empathy', polarity: empathy === 1, weight: ethic },
    { proposition: 'apology', polarity: apology === 1, weight: ethic },
  ];
}

/**
 * Folds every comment of a post into one flat clause list. Clauses on the same
 * proposition are kept side by side; the optimizer weighs them jointly.
 */
export function aggregateClauses(post: Pick<Post, 'comments'>): SoftClause[] {
  return post.comments.reduce<SoftClause[]>((clauses, comment) => {
    clauses.push(...clausesForComment(comment));
    return clauses;
  }, []);
}

// Truncates toward zero; negative products only come from negative quality inputs.
function toWeight(product: number): number {
  return Math.max(0, Math.trunc(product));
}
