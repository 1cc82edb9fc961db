import type { ScoringWeights } from '../config/catalog.js';
import type { Signal } from '../scrapers/types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface StrengthComponents {
  volume: number;
  diversity: number;
  quality: number;
  recency: number;
  boost: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Age in days; timestamps in the future count as age 0. */
export function ageInDays(signal: Signal, now: Date): number {
  const ts = Date.parse(signal.published_at);
  if (Number.isNaN(ts)) return Number.POSITIVE_INFINITY;
  return Math.max(0, (now.getTime() - ts) / DAY_MS);
}

export function distinctSources(evidence: readonly Signal[]): number {
  return new Set(evidence.map((s) => s.source)).size;
}

/** The quality points a single signal brings on its own, also used to rank evidence. */
export function engagement(signal: Signal, w: Readonly<ScoringWeights>): number {
  const stars = signal.source === 'github' ? (signal.metadata.stars ?? 0) : 0;
  const evidenceItems = signal.metadata.evidence?.length ?? 0;
  const strength = signal.metadata.signal_strength;
  return (
    Math.min(w.starsCap, stars / w.starsPerPoint) +
    Math.min(w.evidenceCap, evidenceItems * w.evidencePoints) +
    (strength ? w.strengthPoints[strength] : 0)
  );
}

export function volumeScore(evidence: readonly Signal[], w: Readonly<ScoringWeights>): number {
  return Math.min(w.volumeCap, evidence.length * w.volumePerSignal);
}

/** Only observed on-chain data earns the bonus; static placeholders do not. */
export function diversityScore(evidence: readonly Signal[], w: Readonly<ScoringWeights>): number {
  const onchain = evidence.some((s) => s.source === 'onchain' && !s.metadata.fallback) ? w.onchainBonus : 0;
  return Math.min(w.diversityCap, distinctSources(evidence) * w.diversityPerSource + onchain);
}

export function qualityScore(evidence: readonly Signal[], w: Readonly<ScoringWeights>): number {
  let stars = 0;
  let evidenceItems = 0;
  let strengthPoints = 0;
  for (const s of evidence) {
    if (s.source === 'github') stars += s.metadata.stars ?? 0;
    evidenceItems += s.metadata.evidence?.length ?? 0;
    const level = s.metadata.signal_strength;
    if (level) strengthPoints += w.strengthPoints[level];
  }

  return Math.min(
    w.qualityCap,
    Math.min(w.starsCap, stars / w.starsPerPoint) +
      Math.min(w.evidenceCap, evidenceItems * w.evidencePoints) +
      strengthPoints,
  );
}

export function recencyScore(evidence: readonly Signal[], now: Date, w: Readonly<ScoringWeights>): number {
  let points = 0;
  for (const s of evidence) {
    const age = ageInDays(s, now);
    if (age < w.recentDays) points += w.recentPoints;
    else if (age < w.agingDays) points += w.agingPoints;
  }
  return Math.min(w.recencyCap, points);
}

export function scoreComponents(
  evidence: readonly Signal[],
  boost: number,
  now: Date,
  w: Readonly<ScoringWeights>,
): StrengthComponents {
  return {
    volume: volumeScore(evidence, w),
    diversity: diversityScore(evidence, w),
    quality: qualityScore(evidence, w),
    recency: recencyScore(evidence, now, w),
    boost: clamp(boost, 0, w.boostCap),
  };
}

export function totalStrength(c: StrengthComponents): number {
  return clamp(Math.round(c.volume + c.diversity + c.quality + c.recency + c.boost), 0, 100);
}

/**
 * More sources and more signals never lower confidence:
 * 3+ sources start at 60% (max 90), 2 at 45% (max 75), 1 at 30% (max 50).
 */
export function confidenceFor(sourceCount: number, signalCount: number): number {
  if (sourceCount >= 3) return Math.min(90, 60 + 3 * signalCount);
  if (sourceCount === 2) return Math.min(75, 45 + 3 * signalCount);
  return Math.min(50, 30 + 3 * signalCount);
}
