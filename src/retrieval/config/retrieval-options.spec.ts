import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_RETRIEVAL_OPTIONS,
  RETRIEVAL_POLICIES,
  isRetrievalPolicyName,
  loadRetrievalOptions,
  resolvePolicy,
} from './retrieval-options';

describe('loadRetrievalOptions', () => {
  it('uses the defaults when nothing is configured', () => {
    expect(loadRetrievalOptions(new ConfigService({}))).toEqual(
      DEFAULT_RETRIEVAL_OPTIONS,
    );
  });

  it('selects a named policy', () => {
    const options = loadRetrievalOptions(
      new ConfigService({ RETRIEVAL_POLICY: 'single-expansion' }),
    );

    expect(options.policy).toEqual({
      name: 'single-expansion',
      maxAttempts: 2,
      enableQualityGate: false,
    });
  });

  it('lets explicit settings override the policy preset', () => {
    const options = loadRetrievalOptions(
      new ConfigService({
        RETRIEVAL_POLICY: 'single-expansion',
        RETRIEVAL_MAX_ATTEMPTS: '3',
        RETRIEVAL_QUALITY_GATE: 'true',
      }),
    );

    expect(options.policy).toEqual({
      name: 'single-expansion',
      maxAttempts: 3,
      enableQualityGate: true,
    });
  });

  it('reads numeric and boolean settings', () => {
    const options = loadRetrievalOptions(
      new ConfigService({
        RETRIEVAL_QUALITY_THRESHOLD: '0.7',
        RETRIEVAL_CANDIDATE_POOL: '40',
        RERANK_ENABLED: 'false',
        RERANK_CANDIDATE_CAP: '8',
        RRF_K: '30',
        RERANK_TIMEOUT_MS: 1500,
      }),
    );

    expect(options.qualityThreshold).toBe(0.7);
    expect(options.candidatePoolSize).toBe(40);
    expect(options.rerank).toEqual({
      enabled: false,
      candidateCap: 8,
      previewChars: 500,
    });
    expect(options.rrfK).toBe(30);
    expect(options.timeouts.rerankMs).toBe(1500);
  });

  it('falls back to defaults on invalid values', () => {
    const options = loadRetrievalOptions(
      new ConfigService({
        RETRIEVAL_POLICY: 'aggressive',
        RETRIEVAL_MAX_ATTEMPTS: '0',
        RETRIEVAL_QUALITY_THRESHOLD: '1.5',
        RERANK_ENABLED: 'sometimes',
        RRF_K: 'abc',
      }),
    );

    expect(options.policy).toEqual(RETRIEVAL_POLICIES.reflective);
    expect(options.qualityThreshold).toBe(0.5);
    expect(options.rerank.enabled).toBe(true);
    expect(options.rrfK).toBe(60);
  });

  it('keeps the default topK within the maximum', () => {
    const options = loadRetrievalOptions(
      new ConfigService({ QUERY_DEFAULT_TOP_K: '50', QUERY_MAX_TOP_K: '20' }),
    );

    expect(options.query.defaultTopK).toBe(20);
    expect(options.query.maxTopK).toBe(20);
  });
});

describe('resolvePolicy', () => {
  it('applies overrides on top of a preset', () => {
    expect(resolvePolicy('reflective', { maxAttempts: 4 })).toEqual({
      name: 'reflective',
      maxAttempts: 4,
      enableQualityGate: true,
    });
  });

  it('does not modify the presets', () => {
    resolvePolicy('reflective', { enableQualityGate: false });
    expect(RETRIEVAL_POLICIES.reflective.enableQualityGate).toBe(true);
  });
});

describe('isRetrievalPolicyName', () => {
  it('accepts only known names', () => {
    expect(isRetrievalPolicyName('reflective')).toBe(true);
    expect(isRetrievalPolicyName('single-expansion')).toBe(true);
    expect(isRetrievalPolicyName('Reflective')).toBe(false);
  });
});
