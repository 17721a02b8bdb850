import { Inject, Injectable } from '@nestjs/common';
import { COMPARISON_WORDS, STOPWORDS } from '../config/intel.constants';
import { DEDUP_CONFIG, DedupConfig } from '../config/dedup.config';
import { StoryComparison } from '../types/intel.types';
import { intersectionSize, relativeDifference } from '../utils/similarity.util';
import { extractNumbers, tokenizeWords } from '../utils/text.util';

const DIGIT_RE = /\d/;

/**
 * Decides whether two summaries describe the same underlying fact pattern.
 *
 * Numbers are a hard veto: "$72B" and "$82B" deals are different stories no
 * matter how similar the wording. A comparative claim ("prefers", "versus")
 * never matches a plain statement of fact. Otherwise the content-word sets
 * must pass both a Jaccard threshold and a minimum absolute overlap, so two
 * short fragments sharing a couple of words do not merge.
 */
@Injectable()
export class StoryMatcherService {
  constructor(@Inject(DEDUP_CONFIG) private readonly config: DedupConfig) {}

  sameStory(summaryA: string, summaryB: string): boolean {
    return this.compareStories(summaryA, summaryB).sameStory;
  }

  compareStories(summaryA: string, summaryB: string): StoryComparison {
    if (this.hasNumericMismatch(summaryA, summaryB)) {
      return this.vetoed('numeric');
    }

    const wordsA = this.contentWords(summaryA);
    const wordsB = this.contentWords(summaryB);
    if (wordsA.size === 0 || wordsB.size === 0) {
      return this.vetoed('empty');
    }

    if (this.hasComparison(wordsA) !== this.hasComparison(wordsB)) {
      return this.vetoed('comparison');
    }

    const intersection = intersectionSize(wordsA, wordsB);
    const union = wordsA.size + wordsB.size - intersection;
    const jaccard = union > 0 ? intersection / union : 0;
    const minShared =
      Math.min(wordsA.size, wordsB.size) * this.config.sameStoryMinShared;

    return {
      sameStory:
        jaccard >= this.config.sameStoryJaccard && intersection >= minShared,
      jaccard,
      intersection,
      overlap: intersection / Math.max(wordsA.size, wordsB.size),
      minSharedRatio: minShared > 0 ? intersection / minShared : 0,
      veto: null,
    };
  }

  contentWords(summary: string): Set<string> {
    return new Set(
      tokenizeWords(summary).filter(
        (word) => !STOPWORDS.has(word) && !DIGIT_RE.test(word),
      ),
    );
  }

  private hasNumericMismatch(summaryA: string, summaryB: string): boolean {
    const numbersA = extractNumbers(summaryA);
    const numbersB = extractNumbers(summaryB);
    if (numbersA.size === 0 || numbersB.size === 0) {
      return false;
    }
    if (
      numbersA.size === numbersB.size &&
      [...numbersA].every((value) => numbersB.has(value))
    ) {
      return false;
    }

    for (const a of numbersA) {
      for (const b of numbersB) {
        if (a <= 0 || b <= 0) {
          continue;
        }
        if (relativeDifference(a, b) > this.config.numericTolerance) {
          return true;
        }
      }
    }
    return false;
  }

  private hasComparison(words: Set<string>): boolean {
    for (const word of words) {
      if (COMPARISON_WORDS.has(word)) {
        return true;
      }
    }
    return false;
  }

  private vetoed(veto: 'numeric' | 'comparison' | 'empty'): StoryComparison {
    return {
      sameStory: false,
      jaccard: 0,
      intersection: 0,
      overlap: 0,
      minSharedRatio: 0,
      veto,
    };
  }
}
