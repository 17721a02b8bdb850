import { FeedSource } from '../types/intel.types';

const googleNews = (query: string): string =>
  `https://news.google.com/rss/search?q=${encodeURIComponent(query)}&hl=en-US&gl=US&ceid=US:en`;

export const FEED_SOURCE_LIST = 'FEED_SOURCE_LIST';
export const INDUSTRY_COMPETITOR_ID = 'industry';

export const FEED_SOURCES: FeedSource[] = [
  {
    competitorId: 'netflix',
    label: 'Google News: Netflix',
    url: googleNews('Netflix streaming -review -recap'),
    maxItems: 20,
  },
  {
    competitorId: 'youtube',
    label: 'Google News: YouTube TV',
    url: googleNews('"YouTube TV" OR "YouTube Primetime Channels"'),
    maxItems: 15,
  },
  {
    competitorId: 'roku',
    label: 'Google News: Roku',
    url: googleNews('Roku channel OR "The Roku Channel"'),
    maxItems: 15,
  },
  {
    competitorId: 'pluto',
    label: 'Google News: Pluto TV',
    url: googleNews('"Pluto TV"'),
    maxItems: 15,
  },
  {
    competitorId: 'peacock',
    label: 'Google News: Peacock',
    url: googleNews('Peacock streaming NBCUniversal'),
    maxItems: 15,
  },
  {
    competitorId: 'amazon',
    label: 'Google News: Prime Video',
    url: googleNews('"Prime Video" OR "Amazon Freevee"'),
    maxItems: 15,
  },
  {
    competitorId: INDUSTRY_COMPETITOR_ID,
    label: 'Google News: FAST and CTV',
    url: googleNews('FAST channels OR "connected TV" advertising'),
    maxItems: 25,
    filterKeywords: ['fast', 'ctv', 'connected tv', 'ad-supported', 'avod', 'streaming'],
  },
];
