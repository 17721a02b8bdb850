import { Inject, Injectable, Logger } from '@nestjs/common';
import { DEDUP_CONFIG, DedupConfig } from '../config/dedup.config';
import {
  LEXICAL_DUPLICATE_NOVELTY,
  LEXICAL_NOVELTY_FLOOR,
  LEXICAL_NOVELTY_LADDER,
} from '../config/intel.constants';
import { InMemoryVectorStore } from '../stores/in-memory-vector.store';
import {
  PersistedIntel,
  ResolutionMethod,
  ResolutionOutcome,
  ResolutionReport,
  VectorMatch,
  VectorRecord,
} from '../types/intel.types';
import { errorMessage, mapWithConcurrency } from '../utils/concurrency.util';
import { stripSourcePrefix } from '../utils/text.util';
import { StoryMatcherService } from './story-matcher.service';
import { VectorMemoryService, VectorUpsertItem } from './vector-memory.service';

const PROGRESS_EVERY = 100;

export interface ResolveOptions {
  signal?: AbortSignal;
  useVectorSearch?: boolean;
}

/** Items a candidate may be compared with: window history plus this pass's resolved items. */
interface ResolutionWindow {
  items: PersistedIntel[];
  byId: Map<number, PersistedIntel>;
  overlay: InMemoryVectorStore;
}

/**
 * Scores each unscored intel item against the sliding window: exact url
 * first, then vector neighbours, with a lexical path when no vector signal
 * is available. Candidates are processed in order and each resolved one
 * joins the window for the next. The main vector index is only read during
 * a pass; this pass's vectors come back in `deferred`.
 */
@Injectable()
export class NoveltyResolverService {
  private readonly logger = new Logger(NoveltyResolverService.name);

  constructor(
    private readonly vectorMemory: VectorMemoryService,
    private readonly storyMatcher: StoryMatcherService,
    @Inject(DEDUP_CONFIG) private readonly config: DedupConfig,
  ) {}

  async resolve(
    candidates: PersistedIntel[],
    history: PersistedIntel[],
    options: ResolveOptions = {},
  ): Promise<ResolutionReport> {
    const startedAt = Date.now();
    const useVectorSearch = options.useVectorSearch ?? true;
    const window: ResolutionWindow = {
      items: [...history],
      byId: new Map(history.map((item) => [item.id, item])),
      overlay: new InMemoryVectorStore(),
    };
    this.logger.log(
      `resolve start: candidates=${candidates.length} history=${history.length} vector=${useVectorSearch ? 1 : 0}`,
    );

    if (useVectorSearch) {
      await this.backfillIndex(history);
    }
    const embeddings = useVectorSearch
      ? await this.embedAll(candidates, options.signal)
      : [];

    const outcomes: ResolutionOutcome[] = [];
    const deferred: VectorRecord[] = [];
    let aborted = false;

    for (const [index, candidate] of candidates.entries()) {
      if (options.signal?.aborted) {
        aborted = true;
        break;
      }

      const embedding = embeddings[index] ?? null;
      const outcome = await this.resolveOne(
        candidate,
        embedding,
        window,
        useVectorSearch,
      );
      outcomes.push(outcome);

      if (outcome.update) {
        const resolved: PersistedIntel = {
          ...candidate,
          noveltyScore: outcome.update.noveltyScore,
          isDuplicateOf: outcome.update.isDuplicateOf,
          possibleDuplicateOf: outcome.update.possibleDuplicateOf,
        };
        window.items.push(resolved);
        window.byId.set(resolved.id, resolved);
        if (embedding) {
          const record = this.toVectorRecord(resolved, embedding);
          await window.overlay.upsert([record]);
          deferred.push(record);
        }
      }

      if ((index + 1) % PROGRESS_EVERY === 0) {
        this.logger.log(`resolve progress: ${index + 1}/${candidates.length}`);
      }
    }

    const pending = candidates.length - outcomes.length;
    if (aborted) {
      this.logger.warn(
        `resolve aborted: resolved=${outcomes.length} pending=${pending}`,
      );
    }
    this.logger.log(
      `resolve done: resolved=${outcomes.length} duplicates=${outcomes.filter((o) => o.update?.isDuplicateOf != null).length} degraded=${outcomes.filter((o) => o.degraded).length} elapsedMs=${Date.now() - startedAt}`,
    );

    return { outcomes, pending, aborted, deferred };
  }

  /** Writes a finished pass's vectors to the main index. */
  indexDeferred(report: ResolutionReport): Promise<number> {
    return this.vectorMemory.upsertEmbeddings(report.deferred);
  }

  /**
   * Indexes window history that has no vector yet, such as items scored while
   * embeddings were down. Runs before the pass reads the main index.
   */
  private async backfillIndex(history: PersistedIntel[]): Promise<void> {
    try {
      const missing = new Set(
        await this.vectorMemory.missingIds(history.map((item) => item.id)),
      );
      if (missing.size === 0) {
        return;
      }
      const indexed = await this.vectorMemory.upsertBatch(
        history
          .filter((item) => missing.has(item.id))
          .map((item) => this.toUpsertItem(item)),
      );
      this.logger.log(
        `index backfill: missing=${missing.size} indexed=${indexed} indexSize=${await this.vectorMemory.count()}`,
      );
    } catch (error) {
      this.logger.warn(`index backfill failed: reason=${errorMessage(error)}`);
    }
  }

  private async embedAll(
    candidates: PersistedIntel[],
    signal?: AbortSignal,
  ): Promise<Array<number[] | null>> {
    const settled = await mapWithConcurrency(
      candidates,
      this.config.embedConcurrency,
      async (candidate) => {
        if (signal?.aborted) {
          return null;
        }
        return this.vectorMemory.embed(this.matchText(candidate));
      },
    );

    let failed = 0;
    const embeddings = settled.map((result, index) => {
      if (result.ok) {
        return result.value;
      }
      failed += 1;
      this.logger.debug(
        `embedding failed: intelId=${candidates[index].id} reason=${errorMessage(result.error)}`,
      );
      return null;
    });
    if (failed > 0) {
      this.logger.warn(
        `embedding unavailable for ${failed}/${candidates.length} items, using lexical matching`,
      );
    }
    return embeddings;
  }

  private async resolveOne(
    candidate: PersistedIntel,
    embedding: number[] | null,
    window: ResolutionWindow,
    useVectorSearch: boolean,
  ): Promise<ResolutionOutcome> {
    try {
      const urlMatch = this.findUrlDuplicate(candidate, window);
      if (urlMatch !== null) {
        return this.duplicateOutcome(candidate, 'url', urlMatch, window);
      }

      if (useVectorSearch && embedding) {
        try {
          const neighbours = await this.neighbours(candidate, embedding, window);
          return this.resolveFromNeighbours(candidate, neighbours, window);
        } catch (error) {
          this.logger.warn(
            `vector search failed: intelId=${candidate.id} reason=${errorMessage(error)}`,
          );
        }
      }

      return this.resolveLexically(candidate, window, useVectorSearch);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(
        `resolution failed: intelId=${candidate.id} reason=${message}`,
      );
      return {
        intelId: candidate.id,
        method: 'failed',
        update: null,
        degraded: false,
        error: message,
      };
    }
  }

  private findUrlDuplicate(
    candidate: PersistedIntel,
    window: ResolutionWindow,
  ): number | null {
    const url = candidate.url.trim();
    if (!url) {
      return null;
    }
    const match = window.items.find(
      (item) => item.id !== candidate.id && item.url.trim() === url,
    );
    return match ? match.id : null;
  }

  /** Nearest window items from the main index and this pass's overlay, best first. */
  private async neighbours(
    candidate: PersistedIntel,
    embedding: number[],
    window: ResolutionWindow,
  ): Promise<VectorMatch[]> {
    const k = Math.max(this.config.duplicateSearchK, this.config.noveltySearchK);
    const inWindow = (id: number): boolean =>
      id !== candidate.id && window.byId.has(id);
    const [indexed, inRun] = await Promise.all([
      this.vectorMemory.searchByEmbedding(embedding, k, undefined, inWindow),
      window.overlay.query(embedding, k, undefined, inWindow),
    ]);

    const merged = new Map<number, VectorMatch>();
    for (const match of [...indexed, ...inRun]) {
      merged.set(match.id, match);
    }
    return [...merged.values()].sort(
      (a, b) => b.similarity - a.similarity || a.id - b.id,
    );
  }

  private resolveFromNeighbours(
    candidate: PersistedIntel,
    neighbours: VectorMatch[],
    window: ResolutionWindow,
  ): ResolutionOutcome {
    const duplicate = neighbours
      .slice(0, this.config.duplicateSearchK)
      .find((match) => match.similarity >= this.config.vectorDuplicateThreshold);
    if (duplicate) {
      return this.duplicateOutcome(candidate, 'vector', duplicate.id, window);
    }

    const relevant = neighbours
      .slice(0, this.config.noveltySearchK)
      .filter((match) => match.similarity > this.config.noveltyRelevanceFloor)
      .slice(0, this.config.noveltyTopN);
    const total = relevant.reduce((sum, match) => sum + match.similarity, 0);
    const noveltyScore =
      relevant.length === 0
        ? 1
        : Math.max(0, 1 - total / this.config.noveltyTopN);

    return this.scoredOutcome(candidate, 'vector_novelty', noveltyScore, false);
  }

  private resolveLexically(
    candidate: PersistedIntel,
    window: ResolutionWindow,
    degraded: boolean,
  ): ResolutionOutcome {
    const text = this.matchText(candidate);
    let related = 0;

    for (const item of window.items) {
      if (item.id === candidate.id) {
        continue;
      }
      const comparison = this.storyMatcher.compareStories(
        text,
        this.matchText(item),
      );
      if (comparison.veto) {
        continue;
      }
      if (comparison.overlap > this.config.lexicalDuplicateOverlap) {
        return {
          intelId: candidate.id,
          method: 'lexical',
          update: {
            intelId: candidate.id,
            noveltyScore: LEXICAL_DUPLICATE_NOVELTY,
            isDuplicateOf: null,
            possibleDuplicateOf: this.rootOf(item.id, window),
          },
          degraded,
        };
      }
      if (comparison.overlap > this.config.lexicalRelatedOverlap) {
        related += 1;
      }
    }

    return this.scoredOutcome(
      candidate,
      'lexical_novelty',
      this.lexicalNovelty(related),
      degraded,
    );
  }

  private lexicalNovelty(related: number): number {
    for (const [bound, novelty] of LEXICAL_NOVELTY_LADDER) {
      if (related < bound) {
        return novelty;
      }
    }
    return LEXICAL_NOVELTY_FLOOR;
  }

  private duplicateOutcome(
    candidate: PersistedIntel,
    method: ResolutionMethod,
    matchedId: number,
    window: ResolutionWindow,
  ): ResolutionOutcome {
    return {
      intelId: candidate.id,
      method,
      update: {
        intelId: candidate.id,
        noveltyScore: 0,
        isDuplicateOf: this.rootOf(matchedId, window),
        possibleDuplicateOf: null,
      },
      degraded: false,
    };
  }

  private scoredOutcome(
    candidate: PersistedIntel,
    method: ResolutionMethod,
    noveltyScore: number,
    degraded: boolean,
  ): ResolutionOutcome {
    return {
      intelId: candidate.id,
      method,
      update: {
        intelId: candidate.id,
        noveltyScore,
        isDuplicateOf: null,
        possibleDuplicateOf: null,
      },
      degraded,
    };
  }

  /** Follows duplicate links inside the window up to the first non-duplicate item. */
  private rootOf(id: number, window: ResolutionWindow): number {
    const visited = new Set<number>([id]);
    let current = id;
    for (;;) {
      const parent = window.byId.get(current)?.isDuplicateOf ?? null;
      if (parent === null || !window.byId.has(parent) || visited.has(parent)) {
        return current;
      }
      visited.add(parent);
      current = parent;
    }
  }

  private matchText(item: PersistedIntel): string {
    return stripSourcePrefix(item.summary);
  }

  private toVectorRecord(item: PersistedIntel, embedding: number[]): VectorRecord {
    return { ...this.toUpsertItem(item), embedding };
  }

  private toUpsertItem(item: PersistedIntel): VectorUpsertItem {
    return {
      id: item.id,
      text: this.matchText(item),
      metadata: {
        category: item.category,
        competitorId: item.competitorId,
        impact: item.impact,
        relevance: item.relevance,
      },
    };
  }
}
