import type { Signal } from '../scrapers/types.js';

const MAX_HIGHLIGHTS = 12;

const DOLLAR_AMOUNT = /\$[\d.,]+[BMK]?\+?/g;
const PERCENTAGE = /[\d.,]+%/g;
const SCALE = /[\d.,]+[KM]\+?\s+(?:users|transactions|tokens|daily|active)/gi;

export function extractFigures(text: string): string[] {
  const out: string[] = [];

  for (const amount of text.match(DOLLAR_AMOUNT) ?? []) {
    out.push(`Market signal: ${amount}`);
  }
  for (const pct of text.match(PERCENTAGE) ?? []) {
    const value = Number.parseFloat(pct.replace(/[%,]/g, ''));
    if (value > 20) out.push(`Growth: ${pct}`);
  }
  for (const count of text.match(SCALE) ?? []) {
    out.push(`Scale: ${count}`);
  }

  return out;
}

/** Curated evidence and figures pulled from descriptions, signal by signal; duplicates dropped. */
export function collectHighlights(evidence: readonly Signal[]): string[] {
  const seen = new Set<string>();
  for (const s of evidence) {
    for (const item of s.metadata.evidence ?? []) seen.add(item);
    for (const item of extractFigures(s.description)) seen.add(item);
  }
  return [...seen].slice(0, MAX_HIGHLIGHTS);
}

const MAX_DRIVERS = 3;

/** Distinct per-signal explanations of why the narrative is emerging, first three. */
export function collectDrivers(evidence: readonly Signal[]): string[] {
  const seen = new Set<string>();
  for (const s of evidence) {
    const why = s.metadata.why_emerging?.trim();
    if (why) seen.add(why);
  }
  return [...seen].slice(0, MAX_DRIVERS);
}

/** On-chain metrics merged across evidence; a later signal overwrites an earlier value. */
export function mergeMetrics(evidence: readonly Signal[]): Record<string, number> {
  const merged: Record<string, number> = {};
  for (const s of evidence) {
    if (s.source !== 'onchain' || !s.metadata.metrics) continue;
    Object.assign(merged, s.metadata.metrics);
  }
  return merged;
}
