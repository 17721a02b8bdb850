import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { DEDUP_CONFIG, DedupConfig } from '../config/dedup.config';
import { FEED_SOURCE_LIST, FEED_SOURCES } from '../config/feed-sources';
import { RUN_TIMEOUT_SEC } from '../config/intel.constants';
import {
  ArticleSource,
  FeedSource,
  ResolutionSummary,
  RunMetrics,
  RunSummary,
} from '../types/intel.types';
import { errorMessage } from '../utils/concurrency.util';
import { FeedSourceService } from './feed-source.service';
import { IntelClassifierService } from './intel-classifier.service';
import { IntelStorageService } from './intel-storage.service';
import { NoveltyResolverService } from './novelty-resolver.service';
import { ThemeGroupingService } from './theme-grouping.service';
import { VectorMemoryService } from './vector-memory.service';

export interface RunOptions {
  timeoutSec?: number;
  useVectorSearch?: boolean;
}

function emptyMetrics(): RunMetrics {
  return {
    articlesFetched: 0,
    fingerprintRejected: 0,
    articlesStored: 0,
    classified: 0,
    skippedClassifications: 0,
    failedBatches: 0,
    mergedGroups: 0,
    intelStored: 0,
    resolved: 0,
    duplicates: 0,
    possibleDuplicates: 0,
    degraded: 0,
    failedResolutions: 0,
    indexed: 0,
    timedOut: false,
    elapsedMs: 0,
  };
}

@Injectable()
export class IntelPipelineService {
  private readonly logger = new Logger(IntelPipelineService.name);
  private inFlightRun: Promise<RunSummary> | null = null;

  constructor(
    private readonly feedSource: FeedSourceService,
    private readonly classifier: IntelClassifierService,
    private readonly grouping: ThemeGroupingService,
    private readonly resolver: NoveltyResolverService,
    private readonly vectorMemory: VectorMemoryService,
    private readonly storage: IntelStorageService,
    @Inject(DEDUP_CONFIG) private readonly config: DedupConfig,
    @Optional()
    @Inject(FEED_SOURCE_LIST)
    private readonly feeds: FeedSource[] = FEED_SOURCES,
  ) {}

  /** Concurrent callers share the run already in flight. */
  async runPipeline(options: RunOptions = {}): Promise<RunSummary> {
    if (this.inFlightRun) {
      return this.inFlightRun;
    }

    const task = this.runPipelineCore(options);
    this.inFlightRun = task;
    try {
      return await task;
    } finally {
      if (this.inFlightRun === task) {
        this.inFlightRun = null;
      }
    }
  }

  /** Scores every unscored item left in the window by an earlier run. */
  async resolvePending(options: RunOptions = {}): Promise<ResolutionSummary> {
    const controller = new AbortController();
    const timer = this.startDeadline(controller, options.timeoutSec);
    try {
      return await this.resolveWindow(controller.signal, options);
    } finally {
      clearTimeout(timer);
    }
  }

  async resetVectorIndex(): Promise<void> {
    await this.vectorMemory.reset();
  }

  private async runPipelineCore(options: RunOptions): Promise<RunSummary> {
    const startedAt = Date.now();
    const metrics = emptyMetrics();
    const run = await this.storage.createRun();
    const controller = new AbortController();
    const timer = this.startDeadline(controller, options.timeoutSec);
    this.logger.log(`run start: runId=${run.id} feeds=${this.feeds.length}`);

    try {
      const fetched = await this.feedSource.fetchAll(this.feeds);
      metrics.articlesFetched = fetched.length;

      const fresh = this.rejectKnownFingerprints(
        fetched,
        await this.storage.loadArticleHashes(),
      );
      metrics.fingerprintRejected = fetched.length - fresh.length;
      this.logger.log(
        `stage prefilter done: kept=${fresh.length} rejected=${metrics.fingerprintRejected}`,
      );

      const stored = await this.storage.saveArticles(run.id, fresh);
      metrics.articlesStored = stored.length;

      const classification = await this.classifier.classifyAll(stored);
      metrics.classified = classification.candidates.length;
      metrics.skippedClassifications = classification.skipped;
      metrics.failedBatches = classification.failedBatches;

      const merged = this.grouping.group(classification.candidates);
      metrics.mergedGroups = merged.filter((item) => item.sourceCount > 1).length;

      const inserted = await this.storage.insertIntel(run.id, merged);
      metrics.intelStored = inserted.length;

      const resolution = await this.resolveWindow(controller.signal, options);
      metrics.resolved = resolution.resolved;
      metrics.duplicates = resolution.duplicates;
      metrics.possibleDuplicates = resolution.possibleDuplicates;
      metrics.degraded = resolution.degraded;
      metrics.failedResolutions = resolution.failed;
      metrics.indexed = resolution.indexed;
      metrics.timedOut = resolution.aborted;
      metrics.elapsedMs = Date.now() - startedAt;

      const status = metrics.timedOut ? 'partial' : 'success';
      const notes = metrics.timedOut
        ? `run deadline reached with ${resolution.pending} items unscored`
        : null;
      const completed = await this.storage.completeRun(
        run.id,
        status,
        metrics,
        notes,
      );
      this.logger.log(
        `run done: runId=${run.id} status=${status} intel=${metrics.intelStored} duplicates=${metrics.duplicates} elapsedMs=${metrics.elapsedMs}`,
      );

      return {
        run: completed ?? run,
        intel: await this.storage.getRunIntel(run.id),
      };
    } catch (error) {
      metrics.elapsedMs = Date.now() - startedAt;
      this.logger.error(
        `run failed: runId=${run.id} reason=${errorMessage(error)}`,
      );
      await this.storage
        .completeRun(run.id, 'error', metrics, errorMessage(error))
        .catch((completeError: unknown) => {
          this.logger.error(
            `run status not saved: runId=${run.id} reason=${errorMessage(completeError)}`,
          );
        });
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  private async resolveWindow(
    signal: AbortSignal,
    options: RunOptions,
  ): Promise<ResolutionSummary> {
    const recent = await this.storage.getRecentIntel(this.config.windowDays);
    const candidates = recent.filter((item) => item.noveltyScore === null);
    const history = recent.filter((item) => item.noveltyScore !== null);

    const report = await this.resolver.resolve(candidates, history, {
      signal,
      useVectorSearch: options.useVectorSearch,
    });
    const updates = report.outcomes.flatMap((outcome) =>
      outcome.update ? [outcome.update] : [],
    );
    const resolved = await this.storage.applyNoveltyScores(updates);
    const indexed = await this.resolver.indexDeferred(report);

    return {
      candidates: candidates.length,
      resolved,
      duplicates: updates.filter((update) => update.isDuplicateOf !== null)
        .length,
      possibleDuplicates: updates.filter(
        (update) => update.possibleDuplicateOf !== null,
      ).length,
      degraded: report.outcomes.filter((outcome) => outcome.degraded).length,
      failed: report.outcomes.filter((outcome) => outcome.method === 'failed')
        .length,
      pending: report.pending,
      indexed,
      aborted: report.aborted,
    };
  }

  private rejectKnownFingerprints(
    articles: ArticleSource[],
    known: Set<string>,
  ): ArticleSource[] {
    const seen = new Set(known);
    return articles.filter((article) => {
      if (seen.has(article.hash)) {
        return false;
      }
      seen.add(article.hash);
      return true;
    });
  }

  private startDeadline(
    controller: AbortController,
    timeoutSec?: number,
  ): NodeJS.Timeout {
    const seconds =
      timeoutSec !== undefined && timeoutSec > 0 ? timeoutSec : RUN_TIMEOUT_SEC;
    return setTimeout(() => {
      this.logger.warn(`run deadline reached after ${seconds}s`);
      controller.abort();
    }, seconds * 1000);
  }
}
