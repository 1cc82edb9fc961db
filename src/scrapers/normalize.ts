import { createHash } from 'node:crypto';
import type { Signal, SignalMetadata, SignalSource } from './types.js';

export const EPOCH_ISO = new Date(0).toISOString();

export interface SignalInput {
  source: SignalSource;
  source_id?: string;
  title?: string | null;
  description?: string | null;
  url?: string | null;
  published_at?: string | number | Date | null;
  metadata?: SignalMetadata;
}

function hashId(source: string, key: string): string {
  const hash = createHash('sha256').update(key).digest('hex').slice(0, 12);
  return `${source}-${hash}`;
}

/**
 * Missing or unparseable timestamps map to the epoch so they score as the
 * oldest possible evidence instead of aborting the run.
 */
export function toIsoTimestamp(value: SignalInput['published_at']): string {
  if (value === null || value === undefined || value === '') return EPOCH_ISO;
  const date = value instanceof Date ? value : new Date(value);
  return Number.isNaN(date.getTime()) ? EPOCH_ISO : date.toISOString();
}

function stringList(values: unknown): string[] | undefined {
  if (!Array.isArray(values)) return undefined;
  return values.filter((v): v is string => typeof v === 'string' && v.length > 0);
}

function finiteOrZero(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function normalizeMetadata(metadata: SignalMetadata = {}): SignalMetadata {
  const out: SignalMetadata = { ...metadata };

  if ('stars' in metadata) out.stars = finiteOrZero(metadata.stars);
  if ('forks' in metadata) out.forks = finiteOrZero(metadata.forks);

  const topics = stringList(metadata.topics);
  if (topics) out.topics = topics;
  else delete out.topics;

  const evidence = stringList(metadata.evidence);
  if (evidence) out.evidence = evidence;
  else delete out.evidence;

  if (typeof metadata.category !== 'string' || metadata.category === '') delete out.category;

  return out;
}

export function normalizeSignal(input: SignalInput): Signal {
  const title = (input.title ?? '').trim();
  const url = input.url ?? '';
  const metadata = normalizeMetadata(input.metadata);
  if (metadata.topics) Object.freeze(metadata.topics);
  if (metadata.evidence) Object.freeze(metadata.evidence);

  return Object.freeze({
    source: input.source,
    source_id: input.source_id || hashId(input.source, url || title),
    title,
    description: (input.description ?? '').trim(),
    url,
    published_at: toIsoTimestamp(input.published_at),
    metadata: Object.freeze(metadata),
  });
}
