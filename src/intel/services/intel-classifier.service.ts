import { Injectable, Logger } from '@nestjs/common';
import {
  CLASSIFIER_BATCH_SIZE,
  CLASSIFIER_SNIPPET_MAX_CHARS,
  CLASSIFIER_TITLE_MAX_CHARS,
  CLASSIFIER_WORKERS,
  DEFAULT_INTEL_CATEGORY,
  INTEL_CATEGORIES,
  SCORE_MAX,
  SCORE_MIN,
} from '../config/intel.constants';
import {
  buildClassificationPrompt,
  CLASSIFICATION_SYSTEM_PROMPT,
} from '../prompts/classification.prompt';
import {
  ClassificationResult,
  IntelCandidate,
  IntelCategory,
  StoredArticle,
} from '../types/intel.types';
import { errorMessage, mapWithConcurrency } from '../utils/concurrency.util';
import { cleanText, truncate } from '../utils/text.util';
import { LlmClientService } from './llm-client.service';

interface BatchResult {
  candidates: IntelCandidate[];
  skipped: number;
}

@Injectable()
export class IntelClassifierService {
  private readonly logger = new Logger(IntelClassifierService.name);

  constructor(private readonly llmClient: LlmClientService) {}

  async classifyAll(articles: StoredArticle[]): Promise<ClassificationResult> {
    if (articles.length === 0) {
      return { candidates: [], skipped: 0, failedBatches: 0 };
    }

    const startedAt = Date.now();
    const batches: StoredArticle[][] = [];
    for (let i = 0; i < articles.length; i += CLASSIFIER_BATCH_SIZE) {
      batches.push(articles.slice(i, i + CLASSIFIER_BATCH_SIZE));
    }
    this.logger.log(
      `classify start: articles=${articles.length} batches=${batches.length} workers=${CLASSIFIER_WORKERS}`,
    );

    const settled = await mapWithConcurrency(
      batches,
      CLASSIFIER_WORKERS,
      (batch) => this.classifyBatch(batch),
    );

    let skipped = 0;
    let failedBatches = 0;
    const seenHashes = new Set<string>();
    const byArticleId = new Map(articles.map((article) => [article.id, article]));
    const candidates: IntelCandidate[] = [];

    settled.forEach((result, index) => {
      if (!result.ok) {
        failedBatches += 1;
        this.logger.warn(
          `classify batch failed: batch=${index + 1}/${batches.length} reason=${errorMessage(result.error)}`,
        );
        return;
      }
      skipped += result.value.skipped;
      for (const candidate of result.value.candidates) {
        const hash = byArticleId.get(candidate.articleId)?.hash ?? '';
        if (seenHashes.has(hash)) {
          continue;
        }
        seenHashes.add(hash);
        candidates.push(candidate);
      }
    });

    candidates.sort((a, b) => b.impact - a.impact || b.relevance - a.relevance);
    this.logger.log(
      `classify done: candidates=${candidates.length} skipped=${skipped} failedBatches=${failedBatches} elapsedMs=${Date.now() - startedAt}`,
    );
    return { candidates, skipped, failedBatches };
  }

  private async classifyBatch(batch: StoredArticle[]): Promise<BatchResult> {
    const userPrompt = buildClassificationPrompt(
      batch.map((article, i) => ({
        index: i + 1,
        competitorId: article.competitorId,
        title: truncate(cleanText(article.title), CLASSIFIER_TITLE_MAX_CHARS),
        snippet: truncate(
          cleanText(article.rawSnippet),
          CLASSIFIER_SNIPPET_MAX_CHARS,
        ),
      })),
    );

    const payload = await this.llmClient.generateJson(
      CLASSIFICATION_SYSTEM_PROMPT,
      userPrompt,
    );
    if (!payload) {
      throw new Error('no classification response');
    }
    if (!Array.isArray(payload.items)) {
      throw new Error('classification response has no items array');
    }

    const candidates: IntelCandidate[] = [];
    let skipped = 0;
    for (const raw of payload.items) {
      const candidate = this.parseItem(raw, batch);
      if (candidate) {
        candidates.push(candidate);
      } else {
        skipped += 1;
      }
    }
    return { candidates, skipped };
  }

  private parseItem(raw: unknown, batch: StoredArticle[]): IntelCandidate | null {
    if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
      return null;
    }
    const item = new Map(Object.entries(raw));

    const index = item.get('index');
    if (typeof index !== 'number' || !Number.isInteger(index)) {
      return null;
    }
    const article = batch[index - 1];
    if (!article) {
      return null;
    }

    const summary = cleanText(this.asString(item.get('summary')));
    const impact = this.toScore(item.get('impact'));
    const relevance = this.toScore(item.get('relevance'));
    if (!summary || impact === null || relevance === null) {
      return null;
    }

    return {
      articleId: article.id,
      competitorId: article.competitorId,
      title: article.title,
      url: article.url,
      summary,
      category: this.toCategory(item.get('category')),
      impact,
      relevance,
      entities: this.toEntities(item.get('entities')),
    };
  }

  private toScore(value: unknown): number | null {
    const parsed =
      typeof value === 'number'
        ? value
        : typeof value === 'string' && value.trim()
          ? Number(value)
          : NaN;
    if (!Number.isFinite(parsed)) {
      return null;
    }
    return Math.min(SCORE_MAX, Math.max(SCORE_MIN, parsed));
  }

  private toCategory(value: unknown): IntelCategory {
    const normalized = this.asString(value).trim().toLowerCase();
    return (
      INTEL_CATEGORIES.find((category) => category === normalized) ??
      DEFAULT_INTEL_CATEGORY
    );
  }

  private toEntities(value: unknown): string[] {
    if (!Array.isArray(value)) {
      return [];
    }
    return value
      .filter((entry): entry is string => typeof entry === 'string')
      .map((entry) => cleanText(entry))
      .filter(Boolean);
  }

  private asString(value: unknown): string {
    return typeof value === 'string' ? value : '';
  }
}
