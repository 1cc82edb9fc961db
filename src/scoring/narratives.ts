import type { CategoryDefinition, NarrativeConfig, ScoringWeights } from '../config/catalog.js';
import type { Signal } from '../scrapers/types.js';
import { classifySignal, groupByCategory } from './classify.js';
import { collectDrivers, collectHighlights, mergeMetrics } from './highlights.js';
import { computeMomentum, type Momentum } from './momentum.js';
import {
  confidenceFor,
  distinctSources,
  engagement,
  scoreComponents,
  totalStrength,
  type StrengthComponents,
} from './strength.js';

const WHY_SIGNALS = 3;

export interface ScoredNarrative {
  readonly category: string;
  readonly name: string;
  readonly emoji: string;
  readonly summary: string;
  readonly strength: number;
  readonly confidence: number;
  readonly momentum: Momentum;
  readonly components: Readonly<StrengthComponents>;
  readonly evidence: readonly Signal[];
  readonly highlights: readonly string[];
  readonly drivers: readonly string[];
  readonly keyMetrics: Readonly<Record<string, number>>;
  readonly why: string;
}

export interface NarrativeScorer {
  classify(signal: Signal): string[];
  score(signals: readonly Signal[], now: Date): ScoredNarrative[];
}

/** Top evidence by engagement, newest first on ties, then fetch order. */
export function topEvidence(evidence: readonly Signal[], w: Readonly<ScoringWeights>, count: number): Signal[] {
  return evidence
    .map((signal, index) => ({ signal, index, weight: engagement(signal, w), ts: Date.parse(signal.published_at) || 0 }))
    .sort((a, b) => b.weight - a.weight || b.ts - a.ts || a.index - b.index)
    .slice(0, count)
    .map((e) => e.signal);
}

function buildWhy(evidence: readonly Signal[], w: Readonly<ScoringWeights>): string {
  const titles = topEvidence(evidence, w, WHY_SIGNALS).map((s) => s.title);
  return `Led by ${titles.join('; ')}`;
}

function scoreCategory(
  category: CategoryDefinition,
  evidence: Signal[],
  now: Date,
  w: Readonly<ScoringWeights>,
): ScoredNarrative {
  const components = scoreComponents(evidence, category.boost, now, w);
  return Object.freeze({
    category: category.id,
    name: category.name,
    emoji: category.emoji,
    summary: category.summary,
    strength: totalStrength(components),
    confidence: confidenceFor(distinctSources(evidence), evidence.length),
    momentum: computeMomentum(evidence, now, w.momentumWindowDays).momentum,
    components: Object.freeze(components),
    evidence: Object.freeze(evidence),
    highlights: Object.freeze(collectHighlights(evidence)),
    drivers: Object.freeze(collectDrivers(evidence)),
    keyMetrics: Object.freeze(mergeMetrics(evidence)),
    why: buildWhy(evidence, w),
  });
}

export function createNarrativeScorer(config: NarrativeConfig): NarrativeScorer {
  const order = new Map(config.categories.map((c, i) => [c.id, i]));

  return {
    classify: (signal) => classifySignal(signal, config.categories),

    score: (signals, now) => {
      const groups = groupByCategory(signals, config.categories);
      const scored: ScoredNarrative[] = [];
      for (const category of config.categories) {
        const evidence = groups.get(category.id);
        if (evidence) scored.push(scoreCategory(category, evidence, now, config.weights));
      }

      return scored.sort(
        (a, b) =>
          b.strength - a.strength ||
          b.evidence.length - a.evidence.length ||
          b.confidence - a.confidence ||
          (order.get(a.category) ?? 0) - (order.get(b.category) ?? 0),
      );
    },
  };
}
