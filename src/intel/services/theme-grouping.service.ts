import { Inject, Injectable, Logger } from '@nestjs/common';
import { DEDUP_CONFIG, DedupConfig } from '../config/dedup.config';
import { GROUP_KEY_ENTITIES } from '../config/intel.constants';
import { IntelCandidate, MergedIntel } from '../types/intel.types';
import { stripSourcePrefix, withSourcePrefix } from '../utils/text.util';
import { UnionFind } from '../utils/union-find';
import { FingerprintService } from './fingerprint.service';
import { StoryMatcherService } from './story-matcher.service';

/**
 * Collapses same-run candidates that report one story into a single record.
 * Candidates are bucketed by category and lead entities so the likely
 * matches are compared first; every remaining cross-bucket pair is still
 * tested, so grouping never depends on the bucket key.
 */
@Injectable()
export class ThemeGroupingService {
  private readonly logger = new Logger(ThemeGroupingService.name);

  constructor(
    private readonly storyMatcher: StoryMatcherService,
    private readonly fingerprint: FingerprintService,
    @Inject(DEDUP_CONFIG) private readonly config: DedupConfig,
  ) {}

  group(candidates: IntelCandidate[]): MergedIntel[] {
    if (candidates.length === 0) {
      return [];
    }

    const texts = candidates.map((candidate) =>
      stripSourcePrefix(candidate.summary),
    );
    const uf = new UnionFind(candidates.length);
    const tryUnion = (a: number, b: number): void => {
      if (!uf.connected(a, b) && this.storyMatcher.sameStory(texts[a], texts[b])) {
        uf.union(a, b);
      }
    };

    for (const members of this.bucket(candidates).values()) {
      for (let i = 0; i < members.length; i += 1) {
        for (let j = i + 1; j < members.length; j += 1) {
          tryUnion(members[i], members[j]);
        }
      }
    }
    for (let a = 0; a < candidates.length; a += 1) {
      for (let b = a + 1; b < candidates.length; b += 1) {
        tryUnion(a, b);
      }
    }

    const merged = uf
      .groups()
      .map((members) => this.merge(members.map((index) => candidates[index])))
      .sort((a, b) => b.impact - a.impact || b.relevance - a.relevance);

    this.logger.log(
      `group done: candidates=${candidates.length} groups=${merged.length} multiSource=${merged.filter((item) => item.sourceCount > 1).length}`,
    );
    return merged;
  }

  bucketKey(candidate: IntelCandidate): string {
    const entities = candidate.entities
      .map((entity) => entity.trim().toLowerCase())
      .filter(Boolean)
      .sort()
      .slice(0, GROUP_KEY_ENTITIES);
    if (entities.length === 0) {
      return `${candidate.category}|theme:${this.fingerprint.themeKey(candidate.title, candidate.url)}`;
    }
    return `${candidate.category}|${entities.join(',')}`;
  }

  /** `group` must be in input order; the earliest wins ties for canonical. */
  merge(group: IntelCandidate[]): MergedIntel {
    let canonical = group[0];
    for (const candidate of group.slice(1)) {
      if (
        candidate.impact > canonical.impact ||
        (candidate.impact === canonical.impact &&
          candidate.relevance > canonical.relevance)
      ) {
        canonical = candidate;
      }
    }

    const relatedUrls: string[] = [];
    for (const candidate of group) {
      const url = candidate.url.trim();
      if (url && url !== canonical.url.trim() && !relatedUrls.includes(url)) {
        relatedUrls.push(url);
      }
    }

    return {
      ...canonical,
      entities: this.mergeEntities([
        canonical,
        ...group.filter((candidate) => candidate !== canonical),
      ]),
      summary: withSourcePrefix(canonical.summary, group.length),
      impact: Math.max(...group.map((candidate) => candidate.impact)),
      relevance: Math.max(...group.map((candidate) => candidate.relevance)),
      relatedUrls,
      sourceCount: group.length,
      articleIds: group.map((candidate) => candidate.articleId),
    };
  }

  private bucket(candidates: IntelCandidate[]): Map<string, number[]> {
    const buckets = new Map<string, number[]>();
    candidates.forEach((candidate, index) => {
      const key = this.bucketKey(candidate);
      const members = buckets.get(key);
      if (members) {
        members.push(index);
      } else {
        buckets.set(key, [index]);
      }
    });
    return buckets;
  }

  private mergeEntities(ordered: IntelCandidate[]): string[] {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const candidate of ordered) {
      for (const entity of candidate.entities) {
        const trimmed = entity.trim();
        const key = trimmed.toLowerCase();
        if (!trimmed || seen.has(key)) {
          continue;
        }
        seen.add(key);
        out.push(trimmed);
      }
    }
    return out.slice(0, this.config.maxMergedEntities);
  }
}
