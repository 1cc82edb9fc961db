import type { Signal } from '../scrapers/types.js';
import { ageInDays } from './strength.js';

export type Momentum = 'rising' | 'stable' | 'declining';

export interface MomentumReading {
  momentum: Momentum;
  recent: number;
  older: number;
}

/**
 * Compares evidence inside the recent window (younger than `windowDays`
 * relative to `now`) against everything older.
 */
export function computeMomentum(evidence: readonly Signal[], now: Date, windowDays: number): MomentumReading {
  let recent = 0;
  let older = 0;
  for (const s of evidence) {
    if (ageInDays(s, now) < windowDays) recent++;
    else older++;
  }

  if (evidence.length < 2 || recent === older) return { momentum: 'stable', recent, older };
  return { momentum: recent > older ? 'rising' : 'declining', recent, older };
}
