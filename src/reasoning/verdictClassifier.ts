import type { Assignment, LabelingPolicy, Verdict } from '../types/index.js';

export const LABELING_POLICIES: readonly LabelingPolicy[] = ['v1', 'v2'];

export const DEFAULT_LABELING_POLICY: LabelingPolicy = 'v2';

interface PolicyLabels {
  /** Verdict when no harm is inferred. */
  noHarm: Verdict;
  /** Verdict for unintended harm softened by empathy or an apology. */
  mitigatedHarm: Verdict;
}

// The two observed decision trees disagree only on these two branches.
// TODO: drop one variant once the dataset owner confirms which mapping is canonical.
const POLICY_LABELS: Record<LabelingPolicy, PolicyLabels> = {
  v1: { noHarm: 'NAH', mitigatedHarm: 'NTA' },
  v2: { noHarm: 'NTA', mitigatedHarm: 'NAH' },
};

export function isLabelingPolicy(value: string): value is LabelingPolicy {
  return LABELING_POLICIES.some((policy) => policy === value);
}

export function decideVerdict(assignment: Assignment | null, policy: LabelingPolicy = DEFAULT_LABELING_POLICY): Verdict {
  if (!assignment) {
    return 'Unclear';
  }

  const labels = POLICY_LABELS[policy];
  const { harm, intent, empathy, apology } = assignment;
  if (harm && intent) {
    return 'YTA';
  }
  if (!harm) {
    return labels.noHarm;
  }
  return empathy || apology ? labels.mitigatedHarm : 'ESH';
}
