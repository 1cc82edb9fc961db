import { z } from 'zod';
import type { RadarConfig } from '../config/env.js';
import { normalizeSignal } from './normalize.js';
import type { ScraperResult, Signal } from './types.js';

const GITHUB_API = 'https://api.github.com';
const USER_AGENT = 'narrative-radar/1.0.0';

// Fields GitHub omits or nulls fall back to neutral values; only full_name is required.
const RepoSchema = z.object({
  full_name: z.string().min(1),
  description: z.string().nullable().catch(null),
  html_url: z.string().catch(''),
  pushed_at: z.string().catch(''),
  created_at: z.string().catch(''),
  stargazers_count: z.number().catch(0),
  forks_count: z.number().catch(0),
  language: z.string().nullable().catch(null),
  topics: z.array(z.string()).catch([]),
  archived: z.boolean().catch(false),
  fork: z.boolean().catch(false),
});

const SearchResponseSchema = z.object({
  items: z.array(z.unknown()).catch([]),
});

type GitHubRepo = z.infer<typeof RepoSchema>;

function formatDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

export function buildSearchUrl(query: string, perPage: number): string {
  const q = encodeURIComponent(query);
  return `${GITHUB_API}/search/repositories?q=${q}&sort=updated&order=desc&per_page=${perPage}`;
}

function repoToSignal(repo: GitHubRepo): Signal {
  return normalizeSignal({
    source: 'github',
    source_id: `github-${repo.full_name.toLowerCase()}`,
    title: repo.full_name,
    description: repo.description || 'No description',
    url: repo.html_url,
    published_at: repo.pushed_at,
    metadata: {
      stars: repo.stargazers_count,
      forks: repo.forks_count,
      language: repo.language ?? '',
      topics: repo.topics,
      created_at: repo.created_at,
    },
  });
}

export async function scrapeGitHub(config: RadarConfig, now: Date = new Date()): Promise<ScraperResult> {
  const errors: string[] = [];
  const collected: Signal[] = [];

  const since = formatDate(new Date(now.getTime() - config.lookbackDays * 24 * 60 * 60 * 1000));
  const headers: Record<string, string> = {
    Accept: 'application/vnd.github.v3+json',
    'User-Agent': USER_AGENT,
  };
  if (config.githubToken) {
    headers['Authorization'] = `Bearer ${config.githubToken}`;
  }

  for (const template of config.githubQueries) {
    const query = template.replace('{date}', since);
    try {
      const res = await fetch(buildSearchUrl(query, config.githubLimit), {
        headers,
        signal: AbortSignal.timeout(15_000),
      });

      if (res.status === 403) {
        errors.push(`GitHub rate limit hit on "${query}", skipping remaining queries`);
        break;
      }
      if (!res.ok) {
        errors.push(`GitHub search "${query}" returned ${res.status}`);
        continue;
      }

      const body = SearchResponseSchema.safeParse(await res.json());
      if (!body.success) {
        errors.push(`GitHub search "${query}" returned an unexpected payload`);
        continue;
      }

      for (const item of body.data.items) {
        const repo = RepoSchema.safeParse(item);
        if (!repo.success || repo.data.archived || repo.data.fork) continue;
        collected.push(repoToSignal(repo.data));
      }
    } catch (err) {
      errors.push(`GitHub search "${query}" failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return { source: 'github', signals: rankRepos(collected, config.githubLimit), errors };
}

/**
 * Drops repositories already seen under another query (names compared
 * case-insensitively, first occurrence kept), then orders by stars.
 */
export function rankRepos(signals: Signal[], limit: number): Signal[] {
  const seen = new Set<string>();
  const unique: Signal[] = [];
  for (const s of signals) {
    const key = s.title.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(s);
  }

  return unique
    .sort((a, b) => (b.metadata.stars ?? 0) - (a.metadata.stars ?? 0))
    .slice(0, limit);
}
