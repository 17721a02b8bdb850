import { Inject, Injectable, Optional } from '@nestjs/common';
import {
  INTEL_STORE_PATH,
  QUERY_DEFAULT_LIMIT,
  QUERY_MAX_LIMIT,
} from '../config/intel.constants';
import {
  ArticleSource,
  IntelQuery,
  MergedIntel,
  NoveltyUpdate,
  PersistedIntel,
  RunMetrics,
  RunRecord,
  RunStatus,
  StoredArticle,
} from '../types/intel.types';
import { isWithinWindow, windowCutoff } from '../utils/date.util';
import {
  isRecord,
  readJsonFile,
  writeJsonFileAtomic,
} from '../utils/json-file.util';

export const INTEL_STORE_FILE = 'INTEL_STORE_FILE';

interface IntelStoreDocument {
  version: 1;
  counters: { run: number; article: number; intel: number };
  runs: RunRecord[];
  articles: StoredArticle[];
  intel: PersistedIntel[];
}

/**
 * Runs, articles and intel in one JSON document. Every operation goes
 * through a single queue, so a read never sees a half-applied mutation.
 */
@Injectable()
export class IntelStorageService {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    @Optional()
    @Inject(INTEL_STORE_FILE)
    private readonly filePath: string = INTEL_STORE_PATH,
  ) {}

  async createRun(now = new Date()): Promise<RunRecord> {
    return this.mutate((doc) => {
      doc.counters.run += 1;
      const run: RunRecord = {
        id: doc.counters.run,
        startedAt: now.toISOString(),
        finishedAt: null,
        status: 'running',
        metrics: null,
        notes: null,
      };
      doc.runs.push(run);
      return run;
    });
  }

  async completeRun(
    runId: number,
    status: RunStatus,
    metrics: RunMetrics | null,
    notes: string | null = null,
    now = new Date(),
  ): Promise<RunRecord | null> {
    return this.mutate((doc) => {
      const run = doc.runs.find((entry) => entry.id === runId);
      if (!run) {
        return null;
      }
      run.status = status;
      run.metrics = metrics;
      run.notes = notes;
      run.finishedAt = now.toISOString();
      return { ...run };
    });
  }

  async getLatestRun(): Promise<RunRecord | null> {
    return this.read((doc) =>
      doc.runs.reduce<RunRecord | null>(
        (latest, run) => (!latest || run.id > latest.id ? run : latest),
        null,
      ),
    );
  }

  async loadArticleHashes(): Promise<Set<string>> {
    return this.read((doc) => new Set(doc.articles.map((article) => article.hash)));
  }

  /** Stores the articles whose fingerprint is not known yet. */
  async saveArticles(
    runId: number,
    articles: ArticleSource[],
    now = new Date(),
  ): Promise<StoredArticle[]> {
    return this.mutate((doc) => {
      const known = new Set(doc.articles.map((article) => article.hash));
      const stored: StoredArticle[] = [];
      for (const article of articles) {
        if (known.has(article.hash)) {
          continue;
        }
        known.add(article.hash);
        doc.counters.article += 1;
        stored.push({
          ...article,
          id: doc.counters.article,
          runId,
          createdAt: now.toISOString(),
        });
      }
      doc.articles.push(...stored);
      return stored;
    });
  }

  async insertIntel(
    runId: number,
    merged: MergedIntel[],
    now = new Date(),
  ): Promise<PersistedIntel[]> {
    return this.mutate((doc) => {
      const inserted = merged.map((item): PersistedIntel => {
        doc.counters.intel += 1;
        return {
          ...item,
          id: doc.counters.intel,
          runId,
          noveltyScore: null,
          isDuplicateOf: null,
          possibleDuplicateOf: null,
          createdAt: now.toISOString(),
        };
      });
      doc.intel.push(...inserted);
      return inserted;
    });
  }

  /** Intel created within the window, oldest first. */
  async getRecentIntel(
    windowDays: number,
    now = new Date(),
  ): Promise<PersistedIntel[]> {
    const cutoff = windowCutoff(now, windowDays);
    return this.read((doc) =>
      doc.intel
        .filter((item) => isWithinWindow(item.createdAt, cutoff))
        .sort(
          (a, b) => a.createdAt.localeCompare(b.createdAt) || a.id - b.id,
        ),
    );
  }

  async applyNoveltyScores(updates: NoveltyUpdate[]): Promise<number> {
    if (updates.length === 0) {
      return 0;
    }
    return this.mutate((doc) => {
      const byId = new Map(doc.intel.map((item) => [item.id, item]));
      let updated = 0;
      for (const update of updates) {
        const item = byId.get(update.intelId);
        if (!item) {
          continue;
        }
        item.isDuplicateOf = update.isDuplicateOf;
        item.possibleDuplicateOf = update.possibleDuplicateOf;
        item.noveltyScore =
          update.isDuplicateOf !== null
            ? 0
            : Math.min(1, Math.max(0, update.noveltyScore));
        updated += 1;
      }
      return updated;
    });
  }

  async queryIntel(
    filter: IntelQuery = {},
    now = new Date(),
  ): Promise<PersistedIntel[]> {
    const cutoff =
      filter.windowDays !== undefined
        ? windowCutoff(now, filter.windowDays)
        : null;
    const limit = Math.min(
      QUERY_MAX_LIMIT,
      Math.max(1, filter.limit ?? QUERY_DEFAULT_LIMIT),
    );

    return this.read((doc) =>
      doc.intel
        .filter((item) => {
          if (!filter.includeDuplicates && item.isDuplicateOf !== null) {
            return false;
          }
          if (filter.category && item.category !== filter.category) {
            return false;
          }
          if (filter.competitorId && item.competitorId !== filter.competitorId) {
            return false;
          }
          if (filter.minImpact !== undefined && item.impact < filter.minImpact) {
            return false;
          }
          if (
            filter.minRelevance !== undefined &&
            item.relevance < filter.minRelevance
          ) {
            return false;
          }
          if (
            filter.minNovelty !== undefined &&
            (item.noveltyScore === null || item.noveltyScore < filter.minNovelty)
          ) {
            return false;
          }
          return !cutoff || isWithinWindow(item.createdAt, cutoff);
        })
        .sort(
          (a, b) =>
            b.impact - a.impact || b.relevance - a.relevance || b.id - a.id,
        )
        .slice(0, limit),
    );
  }

  async getRunIntel(runId: number): Promise<PersistedIntel[]> {
    return this.read((doc) =>
      doc.intel
        .filter((item) => item.runId === runId)
        .sort(
          (a, b) =>
            b.impact - a.impact || b.relevance - a.relevance || a.id - b.id,
        ),
    );
  }

  async getIntel(id: number): Promise<PersistedIntel | null> {
    return this.read((doc) => doc.intel.find((item) => item.id === id) ?? null);
  }

  private read<T>(select: (doc: IntelStoreDocument) => T): Promise<T> {
    return this.enqueue(async () => select(await this.load()));
  }

  private mutate<T>(apply: (doc: IntelStoreDocument) => T): Promise<T> {
    return this.enqueue(async () => {
      const doc = await this.load();
      const result = apply(doc);
      await writeJsonFileAtomic(this.filePath, doc);
      return result;
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.queue.then(task);
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async load(): Promise<IntelStoreDocument> {
    const raw = await readJsonFile(this.filePath);
    const doc: IntelStoreDocument = {
      version: 1,
      counters: { run: 0, article: 0, intel: 0 },
      runs: [],
      articles: [],
      intel: [],
    };
    if (!isRecord(raw)) {
      return doc;
    }
    // The file is only ever written by this service.
    const stored = raw as Partial<IntelStoreDocument>;
    if (stored.counters) {
      doc.counters = { ...doc.counters, ...stored.counters };
    }
    doc.runs = Array.isArray(stored.runs) ? stored.runs : [];
    doc.articles = Array.isArray(stored.articles) ? stored.articles : [];
    doc.intel = Array.isArray(stored.intel) ? stored.intel : [];
    return doc;
  }
}
