const WS_RE = /\s+/g;
const TAG_RE = /<[^>]+>/g;
const PUNCT_RE = /[^\p{L}\p{N}\s]/gu;
const NUMBER_RE = /\d+(?:\.\d+)?/g;
const SOURCE_PREFIX_RE = /^\[\d+ sources\]\s*/;

const ENTITY_MAP: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

export function decodeHtmlEntities(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(
    /&(amp|lt|gt|quot|#39|apos|nbsp);/g,
    (match) => ENTITY_MAP[match] ?? match,
  );
}

export function stripCdata(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(/^<!\[CDATA\[([\s\S]*?)\]\]>$/i, '$1');
}

export function cleanText(value: string): string {
  if (!value) {
    return '';
  }
  const decoded = decodeHtmlEntities(stripCdata(value));
  return decoded.replace(TAG_RE, ' ').replace(WS_RE, ' ').trim();
}

/** Drops a trailing " - Outlet" / " | Outlet" suffix that aggregators append. */
export function trimTitleNoise(title: string, sourceName?: string): string {
  if (!title) {
    return '';
  }
  let out = cleanText(title);

  if (sourceName) {
    const escaped = sourceName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    out = out
      .replace(new RegExp(`\\s*[|\\-–—·•:]\\s*${escaped}\\s*$`, 'i'), '')
      .trim();
  }

  return out.replace(/^\s*(?:\[|\()?(?:exclusive|update)(?:\]|\))?[\s:-]+/i, '');
}

export function truncate(value: string, maxChars: number): string {
  if (value.length <= maxChars) {
    return value;
  }
  return value.slice(0, maxChars).trim();
}

/** Lowercases and removes every character that is not a letter, digit or whitespace. */
export function normalizeForMatching(value: string): string {
  return (value || '').toLowerCase().replace(PUNCT_RE, '');
}

export function tokenizeWords(value: string): string[] {
  const normalized = normalizeForMatching(value).replace(WS_RE, ' ').trim();
  return normalized ? normalized.split(' ') : [];
}

export function extractNumbers(value: string): Set<number> {
  const out = new Set<number>();
  for (const match of (value || '').match(NUMBER_RE) ?? []) {
    const parsed = Number(match);
    if (Number.isFinite(parsed)) {
      out.add(parsed);
    }
  }
  return out;
}

export function withSourcePrefix(summary: string, sourceCount: number): string {
  const base = stripSourcePrefix(summary);
  return sourceCount > 1 ? `[${sourceCount} sources] ${base}` : base;
}

export function stripSourcePrefix(summary: string): string {
  return (summary || '').replace(SOURCE_PREFIX_RE, '');
}
