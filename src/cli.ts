#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { resolve } from 'node:path';
import { loadConfig } from './config/env.js';
import { loadIdeaCatalog, loadNarrativeConfig } from './config/catalog.js';
import { parseFormats, parseLimit } from './config/flags.js';
import { ConfigurationError, OutputWriteError, errorMessage } from './errors.js';
import { createStaticIdeaSource } from './ideas/catalog.js';
import { createLogger } from './logger.js';
import { runPipeline } from './pipeline.js';

interface CliOptions {
  format: string;
  quiet?: boolean;
  output: string;
  limit: string;
}

const program = new Command();

program
  .name('narrative-radar')
  .description('Detect emerging Solana narratives from GitHub, on-chain and research signals')
  .version('1.0.0')
  .option('--format <format>', 'Report format: html, markdown, json, rss or all', 'all')
  .option('--quiet', 'Suppress banner and progress output')
  .option('--output <dir>', 'Output directory', 'output')
  .option('--limit <n>', 'Maximum narratives in the report', '7')
  .action(async (opts: CliOptions) => {
    const logger = createLogger({ quiet: opts.quiet });
    const start = Date.now();

    try {
      const formats = parseFormats(opts.format);
      const limit = parseLimit(opts.limit);
      const config = loadConfig();
      const narratives = loadNarrativeConfig();
      const ideas = createStaticIdeaSource(loadIdeaCatalog());

      logger.info('🔮 Solana Narrative Radar');
      logger.info(`  GitHub: ${config.githubToken ? 'authenticated' : 'unauthenticated'}`);
      logger.info(`  On-chain: ${config.heliusApiKey ? 'Helius RPC' : 'static program list'}`);

      const result = await runPipeline({
        config,
        narratives,
        ideas,
        outputDir: resolve(opts.output),
        formats,
        limit,
        logger,
      });

      const elapsed = ((Date.now() - start) / 1000).toFixed(1);
      logger.info(
        `\nDone in ${elapsed}s: ${result.signalCount} signals, ${result.reports.length} narratives, ${result.errors.length} warnings`,
      );
      for (const f of result.files) {
        logger.info(`  ${f}`);
      }
    } catch (err) {
      if (err instanceof ConfigurationError || err instanceof OutputWriteError) {
        logger.error(`ERROR: ${err.message}`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Unexpected failure: ${errorMessage(err)}`);
  process.exitCode = 1;
});
