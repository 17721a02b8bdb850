import path from 'node:path';
import { IntelCategory } from '../types/intel.types';

export const SERVICE_NAME = 'intel-radar';
export const SERVICE_VERSION = '1.0.0';

const dataDir = process.env.DATA_DIR ?? path.join(process.cwd(), 'data');
export const INTEL_STORE_PATH =
  process.env.INTEL_STORE_PATH ?? path.join(dataDir, 'intel_store.json');
export const VECTOR_STORE_PATH =
  process.env.VECTOR_STORE_PATH ?? path.join(dataDir, 'intel_vectors.json');

const workersRaw = Number(process.env.CLASSIFIER_WORKERS ?? 4);
export const CLASSIFIER_WORKERS = Number.isFinite(workersRaw)
  ? Math.max(1, Math.floor(workersRaw))
  : 4;
const batchSizeRaw = Number(process.env.CLASSIFIER_BATCH_SIZE ?? 50);
export const CLASSIFIER_BATCH_SIZE = Number.isFinite(batchSizeRaw)
  ? Math.max(1, Math.floor(batchSizeRaw))
  : 50;
export const CLASSIFIER_TITLE_MAX_CHARS = 120;
export const CLASSIFIER_SNIPPET_MAX_CHARS = 400;

const runTimeoutRaw = Number(process.env.RUN_TIMEOUT_SEC ?? 600);
export const RUN_TIMEOUT_SEC = Number.isFinite(runTimeoutRaw)
  ? Math.max(1, runTimeoutRaw)
  : 600;

export const FEED_FETCH_TIMEOUT_SEC = Number(
  process.env.FEED_FETCH_TIMEOUT_SEC ?? 10,
);
export const FEED_SNIPPET_MAX_CHARS = 1000;
export const FEED_USER_AGENT = 'intel-radar/1.0';

export const AI_PROVIDER = (process.env.AI_PROVIDER ?? 'gemini').toLowerCase();
export const AI_EMBED_MAX_CHARS = Number(
  process.env.AI_EMBED_MAX_CHARS ?? 1200,
);

export const QUERY_DEFAULT_LIMIT = 50;
export const QUERY_MAX_LIMIT = 500;

export const INTEL_CATEGORIES: readonly IntelCategory[] = [
  'strategic',
  'product',
  'content',
  'marketing',
  'ai_ads',
  'pricing',
];
export const DEFAULT_INTEL_CATEGORY: IntelCategory = 'strategic';

export const SCORE_MIN = 0;
export const SCORE_MAX = 10;

export const THEME_KEY_WORDS = 10;
export const GROUP_KEY_ENTITIES = 3;

export const STOPWORDS = new Set([
  'the',
  'a',
  'an',
  'and',
  'or',
  'but',
  'in',
  'on',
  'at',
  'to',
  'for',
  'of',
  'with',
  'by',
  'from',
  'is',
  'are',
  'was',
  'were',
  'be',
  'been',
  'being',
  'have',
  'has',
  'had',
  'do',
  'does',
  'did',
  'will',
  'would',
  'could',
  'should',
  'may',
  'might',
  'must',
  'shall',
  'can',
  'this',
  'that',
  'its',
  'their',
  'it',
  'they',
  'new',
  'says',
  'said',
  'reports',
  'according',
]);

export const COMPARISON_WORDS = new Set([
  'prefers',
  'over',
  'vs',
  'versus',
  'compared',
  'instead',
  'rather',
  'chooses',
]);

// [maxRelatedExclusive, novelty]; counts at or above the last bound get LEXICAL_NOVELTY_FLOOR.
export const LEXICAL_NOVELTY_LADDER: ReadonlyArray<[number, number]> = [
  [1, 1.0],
  [3, 0.8],
  [5, 0.5],
];
export const LEXICAL_NOVELTY_FLOOR = 0.3;
export const LEXICAL_DUPLICATE_NOVELTY = 0.1;
