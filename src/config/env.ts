import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export const DEFAULT_GITHUB_QUERIES = [
  'solana language:rust pushed:>{date}',
  'solana language:typescript pushed:>{date}',
  'anchor-lang pushed:>{date}',
  'solana-program pushed:>{date}',
  'topic:solana pushed:>{date}',
  'solana ai agent pushed:>{date}',
  'pump.fun solana pushed:>{date}',
];

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const EnvSchema = z.object({
  GITHUB_TOKEN: z.preprocess(blankToUndefined, z.string().optional()),
  HELIUS_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  RESEARCH_FEEDS: z.preprocess(
    blankToUndefined,
    z
      .string()
      .optional()
      .transform((raw) => (raw ?? '').split(',').map((u) => u.trim()).filter(Boolean))
      .pipe(z.array(z.string().url())),
  ),
  GITHUB_LOOKBACK_DAYS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(14)),
  GITHUB_RESULT_LIMIT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().max(100).default(40)),
});

export interface RadarConfig {
  githubToken?: string;
  heliusApiKey?: string;
  researchFeeds: string[];
  lookbackDays: number;
  githubLimit: number;
  githubQueries: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RadarConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }

  const e = parsed.data;
  return {
    githubToken: e.GITHUB_TOKEN,
    heliusApiKey: e.HELIUS_API_KEY,
    researchFeeds: e.RESEARCH_FEEDS,
    lookbackDays: e.GITHUB_LOOKBACK_DAYS,
    githubLimit: e.GITHUB_RESULT_LIMIT,
    githubQueries: DEFAULT_GITHUB_QUERIES,
  };
}
