import { Logger } from '@nestjs/common';
import { DEFAULT_DEDUP_CONFIG } from '../config/dedup.config';
import { EmbeddingUnavailableError } from '../errors/intel.errors';
import { InMemoryVectorStore } from '../stores/in-memory-vector.store';
import { EmbeddingProvider } from '../stores/vector-store';
import { PersistedIntel } from '../types/intel.types';
import { NoveltyResolverService } from './novelty-resolver.service';
import { StoryMatcherService } from './story-matcher.service';
import { VectorMemoryService } from './vector-memory.service';

function intel(id: number, overrides: Partial<PersistedIntel> = {}): PersistedIntel {
  return {
    id,
    runId: 1,
    articleId: id,
    competitorId: 'roku',
    title: `Item ${id}`,
    url: `https://news.example.com/${id}`,
    summary: `summary ${id}`,
    category: 'product',
    impact: 5,
    relevance: 5,
    entities: [],
    relatedUrls: [],
    sourceCount: 1,
    articleIds: [id],
    noveltyScore: 1,
    isDuplicateOf: null,
    possibleDuplicateOf: null,
    createdAt: '2026-10-01T00:00:00.000Z',
    ...overrides,
  };
}

function candidate(id: number, summary: string, url?: string): PersistedIntel {
  return intel(id, {
    runId: 2,
    summary,
    url: url ?? `https://news.example.com/${id}`,
    noveltyScore: null,
  });
}

describe('NoveltyResolverService', () => {
  let vectors: Map<string, number[]>;
  let store: InMemoryVectorStore;
  let storyMatcher: StoryMatcherService;
  let service: NoveltyResolverService;

  const embedder: EmbeddingProvider = {
    embed: async (text) => {
      const vector = vectors.get(text);
      if (!vector) {
        throw new EmbeddingUnavailableError(`no vector for ${text}`);
      }
      return vector;
    },
  };

  async function indexHistory(
    items: Array<{ item: PersistedIntel; vector: number[] }>,
  ): Promise<void> {
    await store.upsert(
      items.map(({ item, vector }) => ({
        id: item.id,
        embedding: vector,
        metadata: {},
        text: item.summary,
      })),
    );
  }

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    vectors = new Map();
    store = new InMemoryVectorStore();
    storyMatcher = new StoryMatcherService(DEFAULT_DEDUP_CONFIG);
    service = new NoveltyResolverService(
      new VectorMemoryService(store, embedder, DEFAULT_DEDUP_CONFIG),
      storyMatcher,
      DEFAULT_DEDUP_CONFIG,
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('marks an exact url match as a duplicate of the earliest item', async () => {
    const history = [
      intel(1, { url: 'https://news.example.com/roku-uk' }),
      intel(2, { url: 'https://news.example.com/roku-uk' }),
    ];

    const report = await service.resolve(
      [candidate(3, 'unrelated text', 'https://news.example.com/roku-uk')],
      history,
    );

    expect(report.outcomes).toEqual([
      {
        intelId: 3,
        method: 'url',
        update: {
          intelId: 3,
          noveltyScore: 0,
          isDuplicateOf: 1,
          possibleDuplicateOf: null,
        },
        degraded: false,
      },
    ]);
  });

  it('marks a vector neighbour above the threshold as a duplicate', async () => {
    const history = [intel(1, { summary: 'alpha' })];
    await indexHistory([{ item: history[0], vector: [1, 0] }]);
    vectors.set('query', [1, 0]);

    const report = await service.resolve([candidate(2, 'query')], history);

    expect(report.outcomes[0].method).toBe('vector');
    expect(report.outcomes[0].update).toEqual({
      intelId: 2,
      noveltyScore: 0,
      isDuplicateOf: 1,
      possibleDuplicateOf: null,
    });
  });

  it('ignores indexed items outside the window', async () => {
    await store.upsert([{ id: 99, embedding: [1, 0], metadata: {}, text: 'old' }]);
    vectors.set('query', [1, 0]);

    const report = await service.resolve([candidate(2, 'query')], []);

    expect(report.outcomes[0].method).toBe('vector_novelty');
    expect(report.outcomes[0].update?.noveltyScore).toBe(1);
  });

  it('finds a window duplicate behind closer items outside the window', async () => {
    await store.upsert(
      Array.from({ length: 10 }, (_, i) => ({
        id: 101 + i,
        embedding: [1, 0],
        metadata: {},
        text: `old ${i}`,
      })),
    );
    const history = [intel(1, { summary: 'alpha' })];
    await indexHistory([
      { item: history[0], vector: [0.95, Math.sqrt(1 - 0.95 * 0.95)] },
    ]);
    vectors.set('query', [1, 0]);

    const report = await service.resolve([candidate(2, 'query')], history);

    expect(report.outcomes[0].method).toBe('vector');
    expect(report.outcomes[0].update).toEqual({
      intelId: 2,
      noveltyScore: 0,
      isDuplicateOf: 1,
      possibleDuplicateOf: null,
    });
  });

  it('indexes history scored while embeddings were down before the next pass', async () => {
    const first = await service.resolve(
      [candidate(1, 'Roku adds sports channels')],
      [],
    );
    await service.indexDeferred(first);
    await expect(store.count()).resolves.toBe(0);

    vectors.set('Roku adds sports channels', [1, 0]);
    const history = [
      { ...candidate(1, 'Roku adds sports channels'), noveltyScore: 1 },
    ];
    const second = await service.resolve(
      [candidate(2, 'Roku adds sports channels')],
      history,
    );

    await expect(store.count()).resolves.toBe(1);
    expect(second.outcomes[0].method).toBe('vector');
    expect(second.outcomes[0].update?.isDuplicateOf).toBe(1);
  });

  it('averages the relevant similarities over a fixed number of slots', async () => {
    const history = [intel(1), intel(2), intel(3)];
    await indexHistory([
      { item: history[0], vector: [0.8, 0.6] },
      { item: history[1], vector: [0.6, 0.8] },
      { item: history[2], vector: [0.4, Math.sqrt(0.84)] },
    ]);
    vectors.set('query', [1, 0]);

    const report = await service.resolve([candidate(4, 'query')], history);

    expect(report.outcomes[0].method).toBe('vector_novelty');
    expect(report.outcomes[0].update?.noveltyScore).toBeCloseTo(0.72, 10);
  });

  it('never raises novelty when more similar items exist', async () => {
    vectors.set('query', [1, 0]);
    const scores: number[] = [];

    for (let n = 0; n <= 7; n += 1) {
      store = new InMemoryVectorStore();
      service = new NoveltyResolverService(
        new VectorMemoryService(store, embedder, DEFAULT_DEDUP_CONFIG),
        storyMatcher,
        DEFAULT_DEDUP_CONFIG,
      );
      const history = Array.from({ length: n }, (_, i) => intel(i + 1));
      await indexHistory(
        history.map((item) => ({ item, vector: [0.7, Math.sqrt(0.51)] })),
      );

      const report = await service.resolve([candidate(100, 'query')], history);
      scores.push(report.outcomes[0].update?.noveltyScore ?? -1);
    }

    expect(scores[0]).toBe(1);
    for (let i = 1; i < scores.length; i += 1) {
      expect(scores[i]).toBeLessThanOrEqual(scores[i - 1]);
    }
    expect(scores[1]).toBeCloseTo(0.86, 10);
    expect(scores[7]).toBeCloseTo(0.3, 10);
  });

  it('gives full novelty against an empty history', async () => {
    vectors.set('query', [1, 0]);

    const vectorReport = await service.resolve([candidate(1, 'query')], []);
    const lexicalReport = await service.resolve([candidate(1, 'query')], [], {
      useVectorSearch: false,
    });

    expect(vectorReport.outcomes[0].update?.noveltyScore).toBe(1);
    expect(lexicalReport.outcomes[0]).toEqual({
      intelId: 1,
      method: 'lexical_novelty',
      update: {
        intelId: 1,
        noveltyScore: 1,
        isDuplicateOf: null,
        possibleDuplicateOf: null,
      },
      degraded: false,
    });
  });

  it('falls back to lexical matching when the embedding is unavailable', async () => {
    const history = [intel(1, { summary: 'Roku launches free channels in Canada' })];

    const report = await service.resolve(
      [candidate(2, 'Roku launches free channels across Canada')],
      history,
    );

    expect(report.outcomes).toEqual([
      {
        intelId: 2,
        method: 'lexical',
        update: {
          intelId: 2,
          noveltyScore: 0.1,
          isDuplicateOf: null,
          possibleDuplicateOf: 1,
        },
        degraded: true,
      },
    ]);
    expect(report.deferred).toEqual([]);
  });

  it('grades lexical novelty by the number of related items', async () => {
    const history = [
      intel(1, { summary: 'Netflix raises prices' }),
      intel(2, { summary: 'Netflix raises ad prices' }),
      intel(3, { summary: 'Netflix ad tier prices' }),
    ];

    const report = await service.resolve(
      [candidate(4, 'Netflix raises ad tier prices in Europe')],
      history,
      { useVectorSearch: false },
    );

    expect(report.outcomes[0].method).toBe('lexical_novelty');
    expect(report.outcomes[0].update?.noveltyScore).toBe(0.5);
    expect(report.outcomes[0].degraded).toBe(false);
  });

  it('collapses duplicate links to the root item', async () => {
    const history = [
      intel(1, { summary: 'root' }),
      intel(2, { summary: 'copy', noveltyScore: 0, isDuplicateOf: 1 }),
    ];
    await indexHistory([
      { item: history[0], vector: [0, 1] },
      { item: history[1], vector: [1, 0] },
    ]);
    vectors.set('query', [1, 0]);

    const report = await service.resolve([candidate(3, 'query')], history);

    expect(report.outcomes[0].update?.isDuplicateOf).toBe(1);
  });

  it('matches earlier items of the same pass without writing to the index', async () => {
    vectors.set('alpha', [1, 0]);
    vectors.set('query', [1, 0]);

    const report = await service.resolve(
      [candidate(1, 'alpha'), candidate(2, 'query')],
      [],
    );

    expect(report.outcomes.map((o) => o.update?.isDuplicateOf)).toEqual([null, 1]);
    expect(report.deferred.map((record) => record.id)).toEqual([1, 2]);
    await expect(store.count()).resolves.toBe(0);

    await expect(service.indexDeferred(report)).resolves.toBe(2);
    await expect(store.count()).resolves.toBe(2);
  });

  it('isolates an unexpected failure to its own item', async () => {
    jest
      .spyOn(storyMatcher, 'compareStories')
      .mockImplementationOnce(() => {
        throw new Error('matcher exploded');
      });
    const history = [intel(1, { summary: 'Hulu bundles sports' })];

    const report = await service.resolve(
      [candidate(2, 'Peacock adds channels'), candidate(3, 'Tubi expands catalog')],
      history,
      { useVectorSearch: false },
    );

    expect(report.outcomes[0]).toEqual({
      intelId: 2,
      method: 'failed',
      update: null,
      degraded: false,
      error: 'matcher exploded',
    });
    expect(report.outcomes[1].method).toBe('lexical_novelty');
    expect(report.outcomes[1].update?.noveltyScore).toBe(1);
  });

  it('returns the outcomes computed before an abort', async () => {
    const controller = new AbortController();
    const compare = storyMatcher.compareStories.bind(storyMatcher);
    jest
      .spyOn(storyMatcher, 'compareStories')
      .mockImplementationOnce((a, b) => {
        controller.abort();
        return compare(a, b);
      });
    const history = [intel(1, { summary: 'Hulu bundles sports' })];

    const report = await service.resolve(
      [candidate(2, 'Peacock adds channels'), candidate(3, 'Tubi expands catalog')],
      history,
      { useVectorSearch: false, signal: controller.signal },
    );

    expect(report.outcomes.map((o) => o.intelId)).toEqual([2]);
    expect(report.pending).toBe(1);
    expect(report.aborted).toBe(true);
  });

  it('keeps every duplicate at zero novelty across a large pass', async () => {
    let seed = 42;
    const random = (): number => {
      seed = (seed * 16807) % 2147483647;
      return seed / 2147483647;
    };
    const bases = Array.from({ length: 40 }, () => [
      random(),
      random(),
      random(),
      random(),
    ]);
    const candidates = Array.from({ length: 1000 }, (_, i) => {
      const text = `item ${i}`;
      vectors.set(
        text,
        bases[i % 40].map((value) => value + random() * 0.2),
      );
      const url =
        i % 7 === 6
          ? `https://news.example.com/${i - 6}`
          : `https://news.example.com/${i}`;
      return candidate(i + 1, text, url);
    });

    const report = await service.resolve(candidates, []);
    const updates = report.outcomes.map((o) => o.update);

    expect(report.outcomes).toHaveLength(1000);
    expect(report.outcomes.filter((o) => o.method === 'failed')).toEqual([]);
    expect(updates.filter((u) => u?.isDuplicateOf != null).length).toBeGreaterThan(0);
    for (const update of updates) {
      expect(update).not.toBeNull();
      if (!update) {
        continue;
      }
      expect(update.noveltyScore).toBeGreaterThanOrEqual(0);
      expect(update.noveltyScore).toBeLessThanOrEqual(1);
      if (update.isDuplicateOf !== null) {
        expect(update.noveltyScore).toBe(0);
      }
    }
  });
});
