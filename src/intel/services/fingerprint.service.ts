import { Injectable } from '@nestjs/common';
import { createHash } from 'node:crypto';
import { STOPWORDS, THEME_KEY_WORDS } from '../config/intel.constants';
import { normalizeForMatching, tokenizeWords } from '../utils/text.util';

@Injectable()
export class FingerprintService {
  /** Identity of one source article; the cheap exact-duplicate key at ingestion. */
  articleFingerprint(competitorId: string, title: string, url: string): string {
    return this.sha256(`${competitorId}|${title}|${url}`);
  }

  /**
   * Coarse same-run grouping key: the leading significant title words,
   * sorted, so word order does not matter. Falls back to the url when the
   * title has no significant word.
   */
  themeKey(title: string, url: string): string {
    const words = tokenizeWords(title)
      .filter((word) => !STOPWORDS.has(word))
      .slice(0, THEME_KEY_WORDS)
      .sort();
    if (words.length === 0) {
      return this.sha256(`url:${normalizeForMatching(url.trim())}`);
    }
    return this.sha256(words.join(' '));
  }

  private sha256(value: string): string {
    return createHash('sha256').update(value, 'utf8').digest('hex');
  }
}
