import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

// Resolves to <package root>/data from both src/config and dist/config.
const DATA_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

const CategorySchema = z.object({
  id: z.string().regex(/^[a-z0-9_]+$/),
  name: z.string().min(1),
  emoji: z.string().default('📊'),
  boost: z.number().min(0).max(10).default(0),
  summary: z.string().default(''),
  keywords: z.array(z.string().min(1)).min(1),
});

const NarrativeFileSchema = z.object({
  categories: z.array(CategorySchema).min(1),
});

const BuildIdeaSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  tech_stack: z.array(z.string()),
  difficulty: z.enum(['beginner', 'intermediate', 'advanced']),
  revenue_model: z.string(),
  timeline_estimate: z.string(),
  why_now: z.string(),
});

const IdeaFileSchema = z.record(z.string(), z.array(BuildIdeaSchema));

const ResearchFileSchema = z.object({
  signals: z.array(
    z.object({
      title: z.string().min(1),
      description: z.string(),
      url: z.string().url(),
      category: z.string(),
      evidence: z.array(z.string()).default([]),
      why_emerging: z.string().default(''),
      published_at: z.string().optional(),
    }),
  ),
});

const OnchainFileSchema = z.object({
  programs: z.array(z.object({ id: z.string(), name: z.string(), category: z.string() })),
  stablecoins: z.array(z.object({ mint: z.string(), symbol: z.string() })),
  marketplaces: z.array(z.object({ id: z.string(), name: z.string() })).default([]),
});

export type NarrativeCategory = z.infer<typeof CategorySchema>;
export type CategoryInput = z.input<typeof CategorySchema>;
export type BuildIdea = z.infer<typeof BuildIdeaSchema>;
export type IdeaCatalog = Readonly<Record<string, readonly BuildIdea[]>>;
export type ResearchEntry = z.infer<typeof ResearchFileSchema>['signals'][number];
export type OnchainCatalog = z.infer<typeof OnchainFileSchema>;
export type KnownProgram = OnchainCatalog['programs'][number];

export interface ScoringWeights {
  volumeCap: number;
  volumePerSignal: number;
  diversityCap: number;
  diversityPerSource: number;
  onchainBonus: number;
  qualityCap: number;
  starsPerPoint: number;
  starsCap: number;
  evidencePoints: number;
  evidenceCap: number;
  strengthPoints: Record<'high' | 'medium' | 'low', number>;
  recencyCap: number;
  recentDays: number;
  recentPoints: number;
  agingDays: number;
  agingPoints: number;
  boostCap: number;
  momentumWindowDays: number;
}

export const DEFAULT_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  volumeCap: 25,
  volumePerSignal: 5,
  diversityCap: 25,
  diversityPerSource: 8,
  onchainBonus: 10,
  qualityCap: 25,
  starsPerPoint: 500,
  starsCap: 10,
  evidencePoints: 1.5,
  evidenceCap: 10,
  strengthPoints: Object.freeze({ high: 3, medium: 1, low: 0 }),
  recencyCap: 15,
  recentDays: 7,
  recentPoints: 2,
  agingDays: 14,
  agingPoints: 1,
  boostCap: 10,
  momentumWindowDays: 7,
});

export type CategoryDefinition = Readonly<Omit<NarrativeCategory, 'keywords'>> & {
  readonly keywords: readonly string[];
};

export interface NarrativeConfig {
  readonly categories: readonly CategoryDefinition[];
  readonly weights: Readonly<ScoringWeights>;
}

function readJson(file: string): unknown {
  const path = `${DATA_DIR}${file}`;
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid ${label}: ${first?.path.join('.') ?? ''} ${first?.message ?? ''}`.trim());
  }
  return parsed.data;
}

export function buildNarrativeConfig(
  input: CategoryInput[],
  weights: Partial<ScoringWeights> = {},
): NarrativeConfig {
  const categories = parseWith(z.array(CategorySchema), input, 'narrative categories');
  const ids = new Set<string>();
  for (const c of categories) {
    if (ids.has(c.id)) throw new ConfigurationError(`Duplicate narrative category: ${c.id}`);
    ids.add(c.id);
  }

  return Object.freeze({
    categories: Object.freeze(
      categories.map((c): CategoryDefinition => Object.freeze({ ...c, keywords: Object.freeze([...c.keywords]) })),
    ),
    weights: Object.freeze({ ...DEFAULT_WEIGHTS, ...weights }),
  });
}

export function loadNarrativeConfig(weights: Partial<ScoringWeights> = {}): NarrativeConfig {
  const file = parseWith(NarrativeFileSchema, readJson('narratives.json'), 'narratives.json');
  return buildNarrativeConfig(file.categories, weights);
}

export function loadIdeaCatalog(): IdeaCatalog {
  const file = parseWith(IdeaFileSchema, readJson('ideas.json'), 'ideas.json');
  return Object.freeze(file);
}

export function loadResearchCatalog(): ResearchEntry[] {
  return parseWith(ResearchFileSchema, readJson('research-signals.json'), 'research-signals.json').signals;
}

export function loadOnchainCatalog(): OnchainCatalog {
  return parseWith(OnchainFileSchema, readJson('onchain-programs.json'), 'onchain-programs.json');
}
