import type { CategoryDefinition } from '../config/catalog.js';
import type { Signal } from '../scrapers/types.js';

/**
 * A signal belongs to a category when its text contains one of the
 * category's keywords, when it carries the category id as a hint, or
 * (GitHub only) when one of its topics equals a keyword.
 */
export function matchesCategory(signal: Signal, category: CategoryDefinition): boolean {
  if (signal.metadata.category === category.id) return true;

  const text = `${signal.title} ${signal.description}`.toLowerCase();
  const keywords = category.keywords.map((k) => k.toLowerCase());
  if (keywords.some((k) => text.includes(k))) return true;

  if (signal.source === 'github' && signal.metadata.topics) {
    const topics = signal.metadata.topics.map((t) => t.toLowerCase());
    return topics.some((t) => keywords.includes(t));
  }

  return false;
}

export function classifySignal(signal: Signal, categories: readonly CategoryDefinition[]): string[] {
  return categories.filter((c) => matchesCategory(signal, c)).map((c) => c.id);
}

/** Groups signals under every category they match, keeping fetch order within each group. */
export function groupByCategory(
  signals: readonly Signal[],
  categories: readonly CategoryDefinition[],
): Map<string, Signal[]> {
  const groups = new Map<string, Signal[]>();
  for (const category of categories) {
    const matched = signals.filter((s) => matchesCategory(s, category));
    if (matched.length > 0) groups.set(category.id, matched);
  }
  return groups;
}
