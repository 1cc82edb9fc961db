import type { RadarConfig } from './config/env.js';
import type { NarrativeConfig } from './config/catalog.js';
import type { IdeaSource } from './ideas/catalog.js';
import { silentLogger, type Logger } from './logger.js';
import {
  publishReports,
  type NarrativeReport,
  type ReportContext,
  type ReportFormat,
} from './publisher/report-generator.js';
import { DEFAULT_SCRAPERS, fetchAllSignals, type SourceScraper } from './scrapers/index.js';
import type { SignalSource } from './scrapers/types.js';
import { createNarrativeScorer } from './scoring/narratives.js';

export interface PipelineOptions {
  config: RadarConfig;
  narratives: NarrativeConfig;
  ideas: IdeaSource;
  outputDir: string;
  formats: readonly ReportFormat[];
  limit: number;
  scrapers?: SourceScraper[];
  logger?: Logger;
  now?: Date;
}

export interface PipelineResult {
  reports: NarrativeReport[];
  files: string[];
  errors: string[];
  counts: Record<SignalSource, number>;
  signalCount: number;
}

export async function runPipeline(opts: PipelineOptions): Promise<PipelineResult> {
  const logger = opts.logger ?? silentLogger;
  const now = opts.now ?? new Date();

  logger.info('Fetching signals...');
  const { signals, errors, counts } = await fetchAllSignals(opts.config, opts.scrapers ?? DEFAULT_SCRAPERS, logger);

  logger.info(`Scoring ${signals.length} signals...`);
  const scorer = createNarrativeScorer(opts.narratives);
  const reports: NarrativeReport[] = scorer
    .score(signals, now)
    .slice(0, opts.limit)
    .map((narrative) => ({ ...narrative, ideas: opts.ideas.ideasFor(narrative.category) }));

  for (const r of reports) {
    logger.info(`  ${r.emoji} ${r.name}: ${r.strength}/100 (${r.confidence}% confidence, ${r.momentum})`);
  }

  const context: ReportContext = {
    generatedAt: now,
    signalCount: signals.length,
    lookbackDays: opts.config.lookbackDays,
  };
  const files = await publishReports(reports, opts.outputDir, opts.formats, context);

  return { reports, files, errors, counts, signalCount: signals.length };
}
