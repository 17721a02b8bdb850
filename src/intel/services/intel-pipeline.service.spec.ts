import { Logger } from '@nestjs/common';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_DEDUP_CONFIG } from '../config/dedup.config';
import { InMemoryVectorStore } from '../stores/in-memory-vector.store';
import {
  ArticleSource,
  ClassificationResult,
  FeedSource,
  IntelCandidate,
  StoredArticle,
} from '../types/intel.types';
import { FingerprintService } from './fingerprint.service';
import { IntelPipelineService } from './intel-pipeline.service';
import { IntelStorageService } from './intel-storage.service';
import { NoveltyResolverService } from './novelty-resolver.service';
import { StoryMatcherService } from './story-matcher.service';
import { ThemeGroupingService } from './theme-grouping.service';
import { VectorMemoryService } from './vector-memory.service';

const FEEDS: FeedSource[] = [
  {
    competitorId: 'roku',
    label: 'Roku',
    url: 'https://news.example.com/rss/roku',
    maxItems: 10,
  },
];

const IMPACT: Record<string, number> = {
  'Roku launches 40 channels': 6,
  'Roku launches 40 new channels in UK': 7,
};

const fingerprint = new FingerprintService();

function source(title: string, url: string): ArticleSource {
  return {
    competitorId: 'roku',
    sourceLabel: 'Roku',
    title,
    url,
    publishedAt: '',
    rawSnippet: '',
    hash: fingerprint.articleFingerprint('roku', title, url),
  };
}

function classify(articles: StoredArticle[]): ClassificationResult {
  const candidates = articles.map(
    (article): IntelCandidate => ({
      articleId: article.id,
      competitorId: article.competitorId,
      title: article.title,
      url: article.url,
      summary: article.title,
      category: 'content',
      impact: IMPACT[article.title] ?? 5,
      relevance: 5,
      entities: ['Roku'],
    }),
  );
  return { candidates, skipped: 0, failedBatches: 0 };
}

describe('IntelPipelineService', () => {
  let dir: string;
  let storage: IntelStorageService;
  let store: InMemoryVectorStore;
  let pipeline: IntelPipelineService;
  const fetchAll = jest.fn<Promise<ArticleSource[]>, [FeedSource[]]>();
  const classifyAll = jest.fn<Promise<ClassificationResult>, [StoredArticle[]]>();

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    fetchAll.mockReset();
    classifyAll.mockReset();
    classifyAll.mockImplementation(async (articles) => classify(articles));

    dir = await mkdtemp(path.join(os.tmpdir(), 'intel-pipeline-'));
    storage = new IntelStorageService(path.join(dir, 'intel_store.json'));
    store = new InMemoryVectorStore();
    const storyMatcher = new StoryMatcherService(DEFAULT_DEDUP_CONFIG);
    const vectorMemory = new VectorMemoryService(
      store,
      { embed: async () => [1, 0] },
      DEFAULT_DEDUP_CONFIG,
    );
    pipeline = new IntelPipelineService(
      { fetchAll } as never,
      { classifyAll } as never,
      new ThemeGroupingService(storyMatcher, fingerprint, DEFAULT_DEDUP_CONFIG),
      new NoveltyResolverService(vectorMemory, storyMatcher, DEFAULT_DEDUP_CONFIG),
      vectorMemory,
      storage,
      DEFAULT_DEDUP_CONFIG,
      FEEDS,
    );
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('merges, scores and indexes the two Roku reports', async () => {
    fetchAll.mockResolvedValue([
      source('Roku launches 40 channels', 'https://news.example.com/roku-1'),
      source('Roku launches 40 new channels in UK', 'https://news.example.com/roku-2'),
      source('Roku launches 40 channels', 'https://news.example.com/roku-1'),
    ]);

    const summary = await pipeline.runPipeline();

    expect(summary.run.status).toBe('success');
    expect(summary.run.metrics).toEqual({
      articlesFetched: 3,
      fingerprintRejected: 1,
      articlesStored: 2,
      classified: 2,
      skippedClassifications: 0,
      failedBatches: 0,
      mergedGroups: 1,
      intelStored: 1,
      resolved: 1,
      duplicates: 0,
      possibleDuplicates: 0,
      degraded: 0,
      failedResolutions: 0,
      indexed: 1,
      timedOut: false,
      elapsedMs: expect.any(Number),
    });
    expect(summary.intel).toHaveLength(1);
    expect(summary.intel[0]).toMatchObject({
      impact: 7,
      sourceCount: 2,
      relatedUrls: ['https://news.example.com/roku-1'],
      noveltyScore: 1,
      isDuplicateOf: null,
    });
    await expect(store.count()).resolves.toBe(1);
  });

  it('rejects known fingerprints and links a re-reported url to the first item', async () => {
    fetchAll.mockResolvedValueOnce([
      source('Roku launches 40 new channels in UK', 'https://news.example.com/roku-2'),
    ]);
    await pipeline.runPipeline();

    fetchAll.mockResolvedValueOnce([
      source('Roku launches 40 new channels in UK', 'https://news.example.com/roku-2'),
      source('Roku UK channel lineup grows', 'https://news.example.com/roku-2'),
    ]);
    const second = await pipeline.runPipeline();

    expect(second.run.metrics).toMatchObject({
      fingerprintRejected: 1,
      articlesStored: 1,
      duplicates: 1,
    });
    expect(second.intel[0]).toMatchObject({
      id: 2,
      noveltyScore: 0,
      isDuplicateOf: 1,
    });
  });

  it('shares one run between concurrent callers', async () => {
    fetchAll.mockResolvedValue([]);

    const [first, second] = await Promise.all([
      pipeline.runPipeline(),
      pipeline.runPipeline(),
    ]);

    expect(first).toBe(second);
    expect(fetchAll).toHaveBeenCalledTimes(1);
    await expect(storage.getLatestRun()).resolves.toMatchObject({ id: 1 });
  });

  it('persists a partial run at the deadline and resolves the rest later', async () => {
    fetchAll.mockResolvedValue([
      source('Roku launches 40 channels', 'https://news.example.com/roku-1'),
    ]);
    classifyAll.mockImplementation(async (articles) => {
      await new Promise((resolve) => setTimeout(resolve, 30));
      return classify(articles);
    });

    const summary = await pipeline.runPipeline({ timeoutSec: 0.001 });

    expect(summary.run.status).toBe('partial');
    expect(summary.run.notes).toBe('run deadline reached with 1 items unscored');
    expect(summary.run.metrics?.timedOut).toBe(true);
    expect(summary.intel[0].noveltyScore).toBeNull();

    const pending = await pipeline.resolvePending();

    expect(pending).toEqual({
      candidates: 1,
      resolved: 1,
      duplicates: 0,
      possibleDuplicates: 0,
      degraded: 0,
      failed: 0,
      pending: 0,
      indexed: 1,
      aborted: false,
    });
    await expect(storage.getIntel(1)).resolves.toMatchObject({ noveltyScore: 1 });
  });

  it('marks the run as failed and rethrows systemic errors', async () => {
    fetchAll.mockResolvedValue([
      source('Roku launches 40 channels', 'https://news.example.com/roku-1'),
    ]);
    classifyAll.mockRejectedValue(new Error('classifier down'));

    await expect(pipeline.runPipeline()).rejects.toThrow('classifier down');
    await expect(storage.getLatestRun()).resolves.toMatchObject({
      status: 'error',
      notes: 'classifier down',
    });
  });

  it('wipes the vector index on request', async () => {
    await store.upsert([{ id: 1, embedding: [1, 0], metadata: {}, text: 'x' }]);

    await pipeline.resetVectorIndex();

    await expect(store.count()).resolves.toBe(0);
  });
});
