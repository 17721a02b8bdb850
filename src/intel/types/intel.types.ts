export type IntelCategory =
  | 'strategic'
  | 'product'
  | 'content'
  | 'marketing'
  | 'ai_ads'
  | 'pricing';

export interface FeedSource {
  competitorId: string;
  label: string;
  url: string;
  maxItems: number;
  filterKeywords?: string[];
}

export interface ArticleSource {
  competitorId: string;
  sourceLabel: string;
  title: string;
  url: string;
  publishedAt: string;
  rawSnippet: string;
  hash: string;
}

export interface StoredArticle extends ArticleSource {
  id: number;
  runId: number;
  createdAt: string;
}

export interface IntelCandidate {
  articleId: number;
  competitorId: string;
  title: string;
  url: string;
  summary: string;
  category: IntelCategory;
  impact: number;
  relevance: number;
  entities: string[];
}

export interface MergedIntel extends IntelCandidate {
  relatedUrls: string[];
  sourceCount: number;
  articleIds: number[];
}

export interface PersistedIntel extends MergedIntel {
  id: number;
  runId: number;
  noveltyScore: number | null;
  isDuplicateOf: number | null;
  possibleDuplicateOf: number | null;
  createdAt: string;
}

export type ResolutionMethod =
  | 'url'
  | 'vector'
  | 'lexical'
  | 'vector_novelty'
  | 'lexical_novelty'
  | 'failed';

export interface NoveltyUpdate {
  intelId: number;
  noveltyScore: number;
  isDuplicateOf: number | null;
  possibleDuplicateOf: number | null;
}

export interface ResolutionOutcome {
  intelId: number;
  method: ResolutionMethod;
  update: NoveltyUpdate | null;
  degraded: boolean;
  error?: string;
}

export interface ResolutionReport {
  outcomes: ResolutionOutcome[];
  pending: number;
  aborted: boolean;
  /** Vectors of this pass, written to the main index after scores are stored. */
  deferred: VectorRecord[];
}

export interface ResolutionSummary {
  candidates: number;
  resolved: number;
  duplicates: number;
  possibleDuplicates: number;
  degraded: number;
  failed: number;
  pending: number;
  indexed: number;
  aborted: boolean;
}

export type RunStatus = 'running' | 'success' | 'partial' | 'error';

export interface RunMetrics {
  articlesFetched: number;
  fingerprintRejected: number;
  articlesStored: number;
  classified: number;
  skippedClassifications: number;
  failedBatches: number;
  mergedGroups: number;
  intelStored: number;
  resolved: number;
  duplicates: number;
  possibleDuplicates: number;
  degraded: number;
  failedResolutions: number;
  indexed: number;
  timedOut: boolean;
  elapsedMs: number;
}

export interface RunRecord {
  id: number;
  startedAt: string;
  finishedAt: string | null;
  status: RunStatus;
  metrics: RunMetrics | null;
  notes: string | null;
}

export interface RunSummary {
  run: RunRecord;
  intel: PersistedIntel[];
}

export interface ClassificationResult {
  candidates: IntelCandidate[];
  skipped: number;
  failedBatches: number;
}

export interface IntelQuery {
  category?: IntelCategory;
  competitorId?: string;
  minImpact?: number;
  minRelevance?: number;
  minNovelty?: number;
  windowDays?: number;
  includeDuplicates?: boolean;
  limit?: number;
}

export type VectorMetadataValue = string | number | boolean;
export type VectorMetadata = Record<string, VectorMetadataValue>;

export interface VectorRecord {
  id: number;
  embedding: number[];
  metadata: VectorMetadata;
  text: string;
}

export interface VectorMatch {
  id: number;
  similarity: number;
  metadata: VectorMetadata;
}

export interface StoryComparison {
  sameStory: boolean;
  jaccard: number;
  intersection: number;
  overlap: number;
  minSharedRatio: number;
  veto: 'numeric' | 'comparison' | 'empty' | null;
}
