import { STOPWORDS } from '../config/radar.constants';

const WS_RE = /\s+/g;
const TAG_RE = /<[^>]+>/g;

const ENTITY_MAP: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' ',
};

export function decodeHtmlEntities(value: string): string {
  if (!value) {
    return '';
  }
  // Feeds double-encode (&amp;lt;), so decode until nothing changes.
  let current = value;
  for (;;) {
    const next = current.replace(
      /&(amp|lt|gt|quot|#39|nbsp);/g,
      (match) => ENTITY_MAP[match] ?? match,
    );
    if (next === current) {
      return next;
    }
    current = next;
  }
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

export function truncate(value: string, maxChars: number): string {
  return value.length > maxChars ? value.slice(0, maxChars).trimEnd() : value;
}

export function tokenize(value: string): string[] {
  const cleaned = cleanText(value)
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .replace(WS_RE, ' ')
    .trim();

  return cleaned ? cleaned.split(' ') : [];
}

export function contentTokens(value: string): Set<string> {
  return new Set(
    tokenize(value)
      .filter((token) => token.length >= 3)
      .filter((token) => !STOPWORDS.has(token))
      .filter((token) => !/^\d+$/.test(token)),
  );
}

export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, '').toLowerCase();
  } catch {
    return '';
  }
}

export function containsKeyword(text: string, keyword: string): boolean {
  const escaped = keyword
    .toLowerCase()
    .replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(^|[^a-z0-9])${escaped}($|[^a-z0-9])`).test(
    text.toLowerCase(),
  );
}
