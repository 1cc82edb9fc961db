import { XMLParser } from 'fast-xml-parser';
import type { RadarConfig } from '../config/env.js';
import { loadResearchCatalog, type ResearchEntry } from '../config/catalog.js';
import { normalizeSignal } from './normalize.js';
import type { ScraperResult, Signal } from './types.js';

const USER_AGENT = 'narrative-radar/1.0.0';

type XmlNode = Record<string, unknown>;

interface ParsedItem {
  title: string;
  link: string;
  content: string;
  published: string;
}

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asList(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

// Text elements come back as plain values, or as { '#text': ... } when they carry attributes.
function text(value: unknown): string {
  if (isNode(value)) return text(value['#text']);
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

function child(node: unknown, key: string): unknown {
  return isNode(node) ? node[key] : undefined;
}

export function stripHtml(html: string): string {
  return html
    .replace(/<[^>]*>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/\s+/g, ' ')
    .trim();
}

function parseRssItems(feed: XmlNode): ParsedItem[] {
  const channel = child(feed.rss, 'channel');
  if (!isNode(channel)) return [];

  return asList(channel.item).filter(isNode).map((item) => ({
    title: stripHtml(text(item.title)),
    link: text(item.link) || text(item.guid),
    content: stripHtml(text(item.description) || text(item['content:encoded'])),
    published: text(item.pubDate),
  }));
}

function atomLink(link: unknown): string {
  if (Array.isArray(link)) {
    const nodes = link.filter(isNode);
    const alt = nodes.find((l) => l['@_rel'] === 'alternate') ?? nodes[0];
    return alt ? text(alt['@_href']) : '';
  }
  if (isNode(link)) return text(link['@_href']);
  return text(link);
}

function parseAtomEntries(feed: XmlNode): ParsedItem[] {
  if (!isNode(feed.feed)) return [];

  return asList(feed.feed.entry).filter(isNode).map((entry) => ({
    title: stripHtml(text(entry.title)),
    link: atomLink(entry.link),
    content: stripHtml(text(entry.content) || text(entry.summary)),
    published: text(entry.published) || text(entry.updated),
  }));
}

export function parseFeed(xml: string): ParsedItem[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    processEntities: true,
  });
  const parsed: unknown = parser.parse(xml);
  if (!isNode(parsed)) return [];

  const rssItems = parseRssItems(parsed);
  if (rssItems.length > 0) return rssItems;

  return parseAtomEntries(parsed);
}

export function catalogToSignals(entries: ResearchEntry[], now: Date): Signal[] {
  return entries.map((entry) =>
    normalizeSignal({
      source: 'research',
      title: entry.title,
      description: entry.description,
      url: entry.url,
      published_at: entry.published_at ?? now,
      metadata: {
        category: entry.category,
        evidence: entry.evidence,
        why_emerging: entry.why_emerging,
      },
    }),
  );
}

async function scrapeFeed(url: string, now: Date): Promise<Signal[]> {
  const res = await fetch(url, {
    headers: { 'User-Agent': USER_AGENT },
    signal: AbortSignal.timeout(15_000),
  });
  if (!res.ok) {
    throw new Error(`returned ${res.status}`);
  }

  const seen = new Set<string>();
  const signals: Signal[] = [];
  for (const item of parseFeed(await res.text())) {
    if (!item.title || !item.link || seen.has(item.link)) continue;
    seen.add(item.link);
    signals.push(
      normalizeSignal({
        source: 'research',
        title: item.title,
        description: item.content || item.title,
        url: item.link,
        published_at: item.published || now,
      }),
    );
  }
  return signals;
}

/**
 * Curated research notes plus any RSS/Atom feeds listed in RESEARCH_FEEDS.
 * Feed items carry no category and are classified by keyword only.
 */
export async function scrapeResearch(
  config: RadarConfig,
  catalog: ResearchEntry[] = loadResearchCatalog(),
  now: Date = new Date(),
): Promise<ScraperResult> {
  const errors: string[] = [];
  const signals = catalogToSignals(catalog, now);

  for (const url of config.researchFeeds) {
    try {
      signals.push(...(await scrapeFeed(url, now)));
    } catch (err) {
      errors.push(`Research feed ${url} failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return { source: 'research', signals, errors };
}
