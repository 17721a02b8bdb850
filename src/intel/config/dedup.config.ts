import { ConfigurationError } from '../errors/intel.errors';

export const DEDUP_CONFIG = 'DEDUP_CONFIG';

/**
 * Thresholds of the dedup engine. The defaults are empirically tuned values;
 * every one can be overridden through the environment.
 */
export interface DedupConfig {
  windowDays: number;
  vectorDuplicateThreshold: number;
  duplicateSearchK: number;
  noveltySearchK: number;
  noveltyRelevanceFloor: number;
  noveltyTopN: number;
  lexicalDuplicateOverlap: number;
  lexicalRelatedOverlap: number;
  sameStoryJaccard: number;
  sameStoryMinShared: number;
  numericTolerance: number;
  maxMergedEntities: number;
  embedConcurrency: number;
}

export const DEFAULT_DEDUP_CONFIG: Readonly<DedupConfig> = Object.freeze({
  windowDays: 30,
  vectorDuplicateThreshold: 0.85,
  duplicateSearchK: 10,
  noveltySearchK: 10,
  noveltyRelevanceFloor: 0.5,
  noveltyTopN: 5,
  lexicalDuplicateOverlap: 0.8,
  lexicalRelatedOverlap: 0.4,
  sameStoryJaccard: 0.7,
  sameStoryMinShared: 0.6,
  numericTolerance: 0.1,
  maxMergedEntities: 10,
  embedConcurrency: 4,
});

type Env = Record<string, string | undefined>;

interface NumberRule {
  min: number;
  max: number;
  integer?: boolean;
}

const RATIO: NumberRule = { min: 0, max: 1 };
const COUNT: NumberRule = { min: 1, max: 1000, integer: true };

const ENV_KEYS: Record<keyof DedupConfig, [string, NumberRule]> = {
  windowDays: ['DEDUP_WINDOW_DAYS', { min: 1, max: 3650, integer: true }],
  vectorDuplicateThreshold: ['DEDUP_SIMILARITY_THRESHOLD', RATIO],
  duplicateSearchK: ['DEDUP_SEARCH_K', COUNT],
  noveltySearchK: ['NOVELTY_SEARCH_K', COUNT],
  noveltyRelevanceFloor: ['NOVELTY_RELEVANCE_FLOOR', RATIO],
  noveltyTopN: ['NOVELTY_TOP_N', COUNT],
  lexicalDuplicateOverlap: ['LEXICAL_DUPLICATE_OVERLAP', RATIO],
  lexicalRelatedOverlap: ['LEXICAL_RELATED_OVERLAP', RATIO],
  sameStoryJaccard: ['SAME_STORY_JACCARD', RATIO],
  sameStoryMinShared: ['SAME_STORY_MIN_SHARED', RATIO],
  numericTolerance: ['SAME_STORY_NUMERIC_TOLERANCE', RATIO],
  maxMergedEntities: ['MERGED_ENTITIES_MAX', COUNT],
  embedConcurrency: ['EMBED_CONCURRENCY', { min: 1, max: 64, integer: true }],
};

function readNumber(
  env: Env,
  key: string,
  fallback: number,
  rule: NumberRule,
): number {
  const raw = env[key];
  if (raw === undefined) {
    return fallback;
  }
  if (raw.trim() === '') {
    throw new ConfigurationError(key, 'is set but empty');
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(key, `"${raw}" is not a number`);
  }
  if (rule.integer && !Number.isInteger(value)) {
    throw new ConfigurationError(key, `"${raw}" must be an integer`);
  }
  if (value < rule.min || value > rule.max) {
    throw new ConfigurationError(
      key,
      `${value} is outside [${rule.min}, ${rule.max}]`,
    );
  }
  return value;
}

export function loadDedupConfig(env: Env = process.env): DedupConfig {
  const read = (field: keyof DedupConfig): number => {
    const [key, rule] = ENV_KEYS[field];
    return readNumber(env, key, DEFAULT_DEDUP_CONFIG[field], rule);
  };

  const config: DedupConfig = {
    windowDays: read('windowDays'),
    vectorDuplicateThreshold: read('vectorDuplicateThreshold'),
    duplicateSearchK: read('duplicateSearchK'),
    noveltySearchK: read('noveltySearchK'),
    noveltyRelevanceFloor: read('noveltyRelevanceFloor'),
    noveltyTopN: read('noveltyTopN'),
    lexicalDuplicateOverlap: read('lexicalDuplicateOverlap'),
    lexicalRelatedOverlap: read('lexicalRelatedOverlap'),
    sameStoryJaccard: read('sameStoryJaccard'),
    sameStoryMinShared: read('sameStoryMinShared'),
    numericTolerance: read('numericTolerance'),
    maxMergedEntities: read('maxMergedEntities'),
    embedConcurrency: read('embedConcurrency'),
  };

  if (config.lexicalRelatedOverlap > config.lexicalDuplicateOverlap) {
    throw new ConfigurationError(
      'LEXICAL_RELATED_OVERLAP',
      'must not exceed LEXICAL_DUPLICATE_OVERLAP',
    );
  }
  return config;
}
