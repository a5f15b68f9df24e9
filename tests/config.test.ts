import { describe, expect, it } from 'vitest';
import { loadConfig, parseLabelingPolicy } from '../src/config.js';

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadConfig({}, {})).toEqual({ labelingPolicy: 'v2', concurrency: 8 });
  });

  it('reads VERDICT_* environment variables', () => {
    expect(loadConfig({}, { VERDICT_LABELING_POLICY: 'v1', VERDICT_CONCURRENCY: '3' })).toEqual({
      labelingPolicy: 'v1',
      concurrency: 3,
    });
  });

  it('lets explicit options override the environment', () => {
    const env = { VERDICT_LABELING_POLICY: 'v1', VERDICT_CONCURRENCY: '3' };
    expect(loadConfig({ policy: 'v2', concurrency: '12' }, env)).toEqual({ labelingPolicy: 'v2', concurrency: 12 });
  });

  it('rejects a non-positive concurrency', () => {
    expect(() => loadConfig({ concurrency: '0' }, {})).toThrow('Option --concurrency must be a positive number.');
  });
});

describe('parseLabelingPolicy', () => {
  it('normalizes case and whitespace', () => {
    expect(parseLabelingPolicy(' V1 ')).toBe('v1');
  });

  it('rejects unknown policies', () => {
    expect(() => parseLabelingPolicy('latest')).toThrow('Option --policy must be one of v1, v2.');
  });
});
