import type { RadarConfig } from '../config/env.js';
import { ConfigurationError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { scrapeGitHub } from './github.js';
import { scrapeOnchain } from './onchain.js';
import { scrapeResearch } from './research.js';
import type { ScraperResult, Signal, SignalSource } from './types.js';

export { scrapeGitHub, rankRepos } from './github.js';
export { scrapeOnchain, staticProgramSignals } from './onchain.js';
export { scrapeResearch, parseFeed } from './research.js';
export { normalizeSignal } from './normalize.js';
export type { Signal, SignalMetadata, SignalSource, SignalStrength, ScraperResult } from './types.js';

export interface SourceScraper {
  name: SignalSource;
  fn: (config: RadarConfig) => Promise<ScraperResult>;
}

export const DEFAULT_SCRAPERS: SourceScraper[] = [
  { name: 'onchain', fn: (config) => scrapeOnchain(config) },
  { name: 'github', fn: (config) => scrapeGitHub(config) },
  { name: 'research', fn: (config) => scrapeResearch(config) },
];

export interface FetchResult {
  signals: Signal[];
  errors: string[];
  counts: Record<SignalSource, number>;
}

export async function fetchAllSignals(
  config: RadarConfig,
  scrapers: SourceScraper[] = DEFAULT_SCRAPERS,
  logger: Logger = silentLogger,
): Promise<FetchResult> {
  const signals: Signal[] = [];
  const errors: string[] = [];
  const counts: Record<SignalSource, number> = { github: 0, onchain: 0, research: 0 };

  for (const scraper of scrapers) {
    logger.info(`  Fetching ${scraper.name}...`);
    try {
      const result = await scraper.fn(config);
      signals.push(...result.signals);
      counts[scraper.name] += result.signals.length;
      for (const err of result.errors) {
        logger.warn(`    WARN (${scraper.name}): ${err}`);
        errors.push(err);
      }
      logger.info(`    ${scraper.name}: ${result.signals.length} signals`);
    } catch (err) {
      // Bad catalog data is fatal, not a source outage.
      if (err instanceof ConfigurationError) throw err;
      const msg = `${scraper.name} unavailable: ${err instanceof Error ? err.message : String(err)}`;
      logger.warn(`    WARN: ${msg}`);
      errors.push(msg);
    }
  }

  return { signals, errors, counts };
}
