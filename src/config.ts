import { DEFAULT_LABELING_POLICY, isLabelingPolicy, LABELING_POLICIES } from './reasoning/verdictClassifier.js';
import type { LabelingPolicy } from './types/index.js';
import { parsePositiveInteger } from './utils/options.js';

export const DEFAULT_CONCURRENCY = 8;

export interface ReasonerConfig {
  labelingPolicy: LabelingPolicy;
  concurrency: number;
}

export interface ConfigOverrides {
  policy?: string;
  concurrency?: string;
}

/**
 * Resolves settings from CLI overrides first, then VERDICT_* environment variables
 * (populated from .env by the CLI), then defaults.
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): ReasonerConfig {
  return {
    labelingPolicy: parseLabelingPolicy(overrides.policy ?? env.VERDICT_LABELING_POLICY),
    concurrency: parsePositiveInteger(overrides.concurrency ?? env.VERDICT_CONCURRENCY, DEFAULT_CONCURRENCY, 'concurrency'),
  };
}

export function parseLabelingPolicy(value: string | undefined): LabelingPolicy {
  const trimmed = value?.trim().toLowerCase();
  if (!trimmed) {
    return DEFAULT_LABELING_POLICY;
  }
  if (!isLabelingPolicy(trimmed)) {
    throw new Error(`Option --policy must be one of ${LABELING_POLICIES.join(', ')}.`);
  }
  return trimmed;
}
