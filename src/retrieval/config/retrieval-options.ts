/**
 * Retrieval Options
 * Read once at startup into an immutable object; the only state shared
 * between requests.
 */

import { Logger } from '@nestjs/common';
import type { ConfigService } from '@nestjs/config';

const logger = new Logger('RetrievalOptions');

export const RETRIEVAL_OPTIONS = 'RETRIEVAL_OPTIONS';

export const RETRIEVAL_POLICY_NAMES = ['reflective', 'single-expansion'] as const;
export type RetrievalPolicyName = (typeof RETRIEVAL_POLICY_NAMES)[number];

export interface RetrievalPolicy {
  name: RetrievalPolicyName;
  maxAttempts: number;
  enableQualityGate: boolean;
}

/**
 * reflective: retrieve, judge quality, reformulate once if the judge asks.
 * single-expansion: accept any non-empty result, expand once on empty.
 */
export const RETRIEVAL_POLICIES: Readonly<
  Record<RetrievalPolicyName, RetrievalPolicy>
> = {
  reflective: { name: 'reflective', maxAttempts: 2, enableQualityGate: true },
  'single-expansion': {
    name: 'single-expansion',
    maxAttempts: 2,
    enableQualityGate: false,
  },
};

export interface StageTimeouts {
  embedMs: number;
  denseMs: number;
  sparseMs: number;
  plannerMs: number;
  expansionMs: number;
  qualityMs: number;
  rerankMs: number;
}

export interface RetrievalOptions {
  policy: RetrievalPolicy;
  qualityThreshold: number;
  candidatePoolSize: number;
  rrfK: number;
  rerank: {
    enabled: boolean;
    candidateCap: number;
    previewChars: number;
  };
  qualityPreviewChars: number;
  query: {
    maxLength: number;
    defaultTopK: number;
    maxTopK: number;
  };
  timeouts: StageTimeouts;
}

export const DEFAULT_RETRIEVAL_OPTIONS: RetrievalOptions = {
  policy: RETRIEVAL_POLICIES.reflective,
  qualityThreshold: 0.5,
  candidatePoolSize: 20,
  rrfK: 60,
  rerank: {
    enabled: true,
    candidateCap: 10,
    previewChars: 500,
  },
  qualityPreviewChars: 300,
  query: {
    maxLength: 2000,
    defaultTopK: 5,
    maxTopK: 20,
  },
  timeouts: {
    embedMs: 10000,
    denseMs: 5000,
    sparseMs: 5000,
    plannerMs: 10000,
    expansionMs: 10000,
    qualityMs: 10000,
    rerankMs: 20000,
  },
};

export function isRetrievalPolicyName(
  value: string,
): value is RetrievalPolicyName {
  return RETRIEVAL_POLICY_NAMES.some((name) => name === value);
}

/**
 * Helper: Read an integer within [min, max], warning and defaulting otherwise
 */
function readInt(
  config: ConfigService,
  key: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === '') return fallback;

  const value = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    logger.warn(
      `Invalid ${key}=${String(raw)} (expected integer ${min}-${max}), using ${fallback}`,
    );
    return fallback;
  }
  return value;
}

function readFloat(
  config: ConfigService,
  key: string,
  fallback: number,
  min: number,
  max: number,
): number {
  const raw = config.get<string | number>(key);
  if (raw === undefined || raw === '') return fallback;

  const value = typeof raw === 'number' ? raw : Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    logger.warn(
      `Invalid ${key}=${String(raw)} (expected number ${min}-${max}), using ${fallback}`,
    );
    return fallback;
  }
  return value;
}

function readBoolean(
  config: ConfigService,
  key: string,
  fallback: boolean,
): boolean {
  const raw = config.get<string | boolean>(key);
  if (raw === undefined || raw === '') return fallback;
  if (typeof raw === 'boolean') return raw;

  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;

  logger.warn(`Invalid ${key}=${raw} (expected true/false), using ${fallback}`);
  return fallback;
}

/**
 * Resolve a policy preset and apply explicit overrides on top of it
 */
export function resolvePolicy(
  name: RetrievalPolicyName,
  overrides: Partial<Omit<RetrievalPolicy, 'name'>> = {},
): RetrievalPolicy {
  return { ...RETRIEVAL_POLICIES[name], ...overrides };
}

export function loadRetrievalOptions(config: ConfigService): RetrievalOptions {
  const defaults = DEFAULT_RETRIEVAL_OPTIONS;

  const policyValue = config.get<string>('RETRIEVAL_POLICY') || 'reflective';
  let policyName: RetrievalPolicyName = 'reflective';
  if (isRetrievalPolicyName(policyValue)) {
    policyName = policyValue;
  } else {
    logger.warn(
      `Invalid RETRIEVAL_POLICY=${policyValue} (expected ${RETRIEVAL_POLICY_NAMES.join('|')}), using reflective`,
    );
  }
  const preset = RETRIEVAL_POLICIES[policyName];

  const defaultTopK = readInt(
    config,
    'QUERY_DEFAULT_TOP_K',
    defaults.query.defaultTopK,
    1,
    100,
  );
  const maxTopK = readInt(
    config,
    'QUERY_MAX_TOP_K',
    defaults.query.maxTopK,
    1,
    100,
  );

  const timeout = (key: string, fallback: number): number =>
    readInt(config, key, fallback, 1, 600000);

  const options: RetrievalOptions = {
    policy: resolvePolicy(policyName, {
      maxAttempts: readInt(
        config,
        'RETRIEVAL_MAX_ATTEMPTS',
        preset.maxAttempts,
        1,
        5,
      ),
      enableQualityGate: readBoolean(
        config,
        'RETRIEVAL_QUALITY_GATE',
        preset.enableQualityGate,
      ),
    }),
    qualityThreshold: readFloat(
      config,
      'RETRIEVAL_QUALITY_THRESHOLD',
      defaults.qualityThreshold,
      0,
      1,
    ),
    candidatePoolSize: readInt(
      config,
      'RETRIEVAL_CANDIDATE_POOL',
      defaults.candidatePoolSize,
      1,
      200,
    ),
    rrfK: readInt(config, 'RRF_K', defaults.rrfK, 1, 1000),
    rerank: {
      enabled: readBoolean(config, 'RERANK_ENABLED', defaults.rerank.enabled),
      candidateCap: readInt(
        config,
        'RERANK_CANDIDATE_CAP',
        defaults.rerank.candidateCap,
        1,
        50,
      ),
      previewChars: readInt(
        config,
        'RERANK_PREVIEW_CHARS',
        defaults.rerank.previewChars,
        50,
        4000,
      ),
    },
    qualityPreviewChars: readInt(
      config,
      'QUALITY_PREVIEW_CHARS',
      defaults.qualityPreviewChars,
      50,
      4000,
    ),
    query: {
      maxLength: readInt(
        config,
        'QUERY_MAX_LENGTH',
        defaults.query.maxLength,
        1,
        100000,
      ),
      defaultTopK: Math.min(defaultTopK, maxTopK),
      maxTopK,
    },
    timeouts: {
      embedMs: timeout('EMBED_TIMEOUT_MS', defaults.timeouts.embedMs),
      denseMs: timeout('DENSE_TIMEOUT_MS', defaults.timeouts.denseMs),
      sparseMs: timeout('SPARSE_TIMEOUT_MS', defaults.timeouts.sparseMs),
      plannerMs: timeout('PLANNER_TIMEOUT_MS', defaults.timeouts.plannerMs),
      expansionMs: timeout('EXPANSION_TIMEOUT_MS', defaults.timeouts.expansionMs),
      qualityMs: timeout('QUALITY_TIMEOUT_MS', defaults.timeouts.qualityMs),
      rerankMs: timeout('RERANK_TIMEOUT_MS', defaults.timeouts.rerankMs),
    },
  };

  logger.log(
    `Retrieval options: policy=${options.policy.name} maxAttempts=${options.policy.maxAttempts} qualityGate=${options.policy.enableQualityGate} threshold=${options.qualityThreshold} pool=${options.candidatePoolSize} rerank=${options.rerank.enabled}/${options.rerank.candidateCap} rrfK=${options.rrfK}`,
  );

  return options;
}
