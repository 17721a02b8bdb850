import { Injectable, Logger } from '@nestjs/common';
import {
  FEED_FETCH_TIMEOUT_SEC,
  FEED_SNIPPET_MAX_CHARS,
  FEED_USER_AGENT,
} from '../config/intel.constants';
import { ArticleSource, FeedSource } from '../types/intel.types';
import { parseDateToIso } from '../utils/date.util';
import { cleanText, trimTitleNoise, truncate } from '../utils/text.util';
import { FingerprintService } from './fingerprint.service';

interface FeedEntry {
  title: string;
  link: string;
  description: string;
  publishedAt: string;
}

@Injectable()
export class FeedSourceService {
  private readonly logger = new Logger(FeedSourceService.name);

  constructor(private readonly fingerprint: FingerprintService) {}

  async fetchAll(feeds: FeedSource[]): Promise<ArticleSource[]> {
    const startedAt = Date.now();
    const results = await Promise.all(feeds.map((feed) => this.fetchFeed(feed)));
    const articles = results.flat();
    this.logger.log(
      `feeds done: articles=${articles.length} nonEmptyFeeds=${results.filter((r) => r.length > 0).length}/${feeds.length} elapsedMs=${Date.now() - startedAt}`,
    );
    return articles;
  }

  async fetchFeed(feed: FeedSource): Promise<ArticleSource[]> {
    const xml = await this.fetchXml(feed);
    if (!xml) {
      return [];
    }

    const keywords = (feed.filterKeywords ?? [])
      .map((keyword) => keyword.trim().toLowerCase())
      .filter(Boolean);

    return this.parseFeed(xml)
      .filter((entry) => {
        if (keywords.length === 0) {
          return true;
        }
        const text = `${entry.title} ${entry.description}`.toLowerCase();
        return keywords.some((keyword) => text.includes(keyword));
      })
      .slice(0, feed.maxItems)
      .map((entry) => ({
        competitorId: feed.competitorId,
        sourceLabel: feed.label,
        title: entry.title,
        url: entry.link,
        publishedAt: entry.publishedAt,
        rawSnippet: truncate(entry.description, FEED_SNIPPET_MAX_CHARS),
        hash: this.fingerprint.articleFingerprint(
          feed.competitorId,
          entry.title,
          entry.link,
        ),
      }));
  }

  private async fetchXml(feed: FeedSource): Promise<string | null> {
    const controller = new AbortController();
    const timeout = setTimeout(
      () => controller.abort(),
      FEED_FETCH_TIMEOUT_SEC * 1000,
    );
    try {
      const res = await fetch(feed.url, {
        headers: {
          'User-Agent': FEED_USER_AGENT,
          Accept:
            'application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8',
        },
        signal: controller.signal,
      });
      if (!res.ok) {
        this.logger.warn(`feed fetch failed: ${res.status} ${feed.label}`);
        return null;
      }
      return await res.text();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`feed fetch error: ${feed.label} ${message}`);
      return null;
    } finally {
      clearTimeout(timeout);
    }
  }

  private parseFeed(xml: string): FeedEntry[] {
    const blocks: string[] =
      xml.match(/<item\b[\s\S]*?<\/item>|<entry\b[\s\S]*?<\/entry>/gi) ?? [];
    return blocks
      .map((block) => {
        const sourceName = this.extractTag(block, 'source');
        return {
          title: trimTitleNoise(this.extractTag(block, 'title'), sourceName),
          link: this.extractLink(block),
          description: cleanText(
            this.extractTag(block, 'description') ||
              this.extractTag(block, 'summary') ||
              this.extractTag(block, 'content'),
          ),
          publishedAt: this.extractPublishedAt(block),
        };
      })
      .filter((entry) => entry.title && entry.link);
  }

  private extractLink(block: string): string {
    const text = cleanText(this.extractTag(block, 'link'));
    if (text) {
      return text;
    }
    const href = block.match(/<link\b[^>]*\bhref=["']([^"']+)["'][^>]*\/?>/i);
    return href?.[1] ? cleanText(href[1]) : '';
  }

  private extractPublishedAt(block: string): string {
    for (const tag of ['pubDate', 'published', 'updated', 'dc:date']) {
      const iso = parseDateToIso(this.extractTag(block, tag));
      if (iso) {
        return iso;
      }
    }
    return '';
  }

  private extractTag(xml: string, tagName: string): string {
    const escapedTag = tagName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const regex = new RegExp(
      `<${escapedTag}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/${escapedTag}>`,
      'i',
    );
    const match = xml.match(regex);
    if (!match?.[1]) {
      return '';
    }
    return cleanText(match[1]);
  }
}
