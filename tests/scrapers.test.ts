import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { RadarConfig } from '../src/config/env.js';
import type { OnchainCatalog, ResearchEntry } from '../src/config/catalog.js';
import { buildSearchUrl, rankRepos, scrapeGitHub } from '../src/scrapers/github.js';
import { activityLevel, scrapeOnchain } from '../src/scrapers/onchain.js';
import { catalogToSignals, parseFeed, scrapeResearch } from '../src/scrapers/research.js';
import { fetchAllSignals, type SourceScraper } from '../src/scrapers/index.js';
import { normalizeSignal } from '../src/scrapers/normalize.js';
import type { Logger } from '../src/logger.js';
import { ConfigurationError } from '../src/errors.js';

// Mock fetch globally
const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

beforeEach(() => {
  mockFetch.mockReset();
});

const now = new Date('2026-03-01T00:00:00Z');

const baseConfig: RadarConfig = {
  researchFeeds: [],
  lookbackDays: 14,
  githubLimit: 40,
  githubQueries: ['solana pushed:>{date}', 'anchor-lang'],
};

function repo(full_name: string, extra: Record<string, unknown> = {}) {
  return {
    full_name,
    description: `${full_name} description`,
    html_url: `https://github.com/${full_name}`,
    pushed_at: '2026-02-27T10:00:00Z',
    created_at: '2025-01-01T00:00:00Z',
    stargazers_count: 0,
    forks_count: 0,
    language: 'Rust',
    topics: ['solana'],
    archived: false,
    fork: false,
    ...extra,
  };
}

function jsonResponse(body: unknown) {
  return { ok: true, status: 200, json: () => Promise.resolve(body) };
}

describe('GitHub scraper', () => {
  it('builds a sorted, paged search URL', () => {
    expect(buildSearchUrl('solana language:rust', 30)).toBe(
      'https://api.github.com/search/repositories?q=solana%20language%3Arust&sort=updated&order=desc&per_page=30',
    );
  });

  it('templates the lookback date and only authenticates with a token', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ items: [] }));

    await scrapeGitHub({ ...baseConfig, githubQueries: ['solana pushed:>{date}'] }, now);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe(buildSearchUrl('solana pushed:>2026-02-15', 40));
    expect(init.headers).not.toHaveProperty('Authorization');

    await scrapeGitHub({ ...baseConfig, githubToken: 'test-token', githubQueries: ['q'] }, now);
    expect(mockFetch.mock.calls[1][1].headers.Authorization).toBe('Bearer test-token');
  });

  it('dedupes repositories across queries and skips forks and archives', async () => {
    mockFetch
      .mockResolvedValueOnce(
        jsonResponse({ items: [repo('Org/Repo', { stargazers_count: 10 }), repo('other/x', { stargazers_count: 50 })] }),
      )
      .mockResolvedValueOnce(
        jsonResponse({
          items: [
            repo('org/repo', { stargazers_count: 999 }),
            repo('a/fork', { fork: true }),
            repo('a/old', { archived: true }),
          ],
        }),
      );

    const result = await scrapeGitHub(baseConfig, now);

    expect(result.errors).toHaveLength(0);
    expect(result.signals.map((s) => s.title)).toEqual(['other/x', 'Org/Repo']);
    expect(result.signals[1]).toMatchObject({
      source: 'github',
      source_id: 'github-org/repo',
      url: 'https://github.com/Org/Repo',
      published_at: '2026-02-27T10:00:00.000Z',
      metadata: { stars: 10, language: 'Rust', topics: ['solana'] },
    });
  });

  it('stops querying after a rate limit response', async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 403 });

    const result = await scrapeGitHub(baseConfig, now);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(result.signals).toHaveLength(0);
    expect(result.errors).toEqual(['GitHub rate limit hit on "solana pushed:>2026-02-15", skipping remaining queries']);
  });

  it('records failures per query and keeps going', async () => {
    mockFetch
      .mockRejectedValueOnce(new Error('Network timeout'))
      .mockResolvedValueOnce(jsonResponse({ items: [repo('org/ok', { description: null })] }));

    const result = await scrapeGitHub(baseConfig, now);

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toContain('Network timeout');
    expect(result.signals).toHaveLength(1);
    expect(result.signals[0].description).toBe('No description');
  });

  it('ranks by stars and truncates to the limit', () => {
    const signals = [5, 50, 20].map((stars, i) =>
      normalizeSignal({ source: 'github', title: `org/r${i}`, metadata: { stars } }),
    );
    expect(rankRepos(signals, 2).map((s) => s.title)).toEqual(['org/r1', 'org/r2']);
  });
});

describe('on-chain scraper', () => {
  const catalog: OnchainCatalog = {
    programs: [
      { id: 'Prog1111', name: 'Jupiter', category: 'defi_evolution' },
      { id: 'Prog2222', name: 'Quiet Program', category: 'depin' },
    ],
    stablecoins: [{ mint: 'MintUsdc', symbol: 'USDC' }],
    marketplaces: [
      { id: 'MarketA', name: 'Market A' },
      { id: 'MarketB', name: 'Market B' },
    ],
  };

  const SIGNATURE_COUNTS: Record<string, number> = { Prog1111: 100, Prog2222: 10, MarketA: 40, MarketB: 20 };

  function stubRpc(overrides: Record<string, (params: unknown[]) => unknown> = {}) {
    const rpcResults: Record<string, (params: unknown[]) => unknown> = {
      getRecentPerformanceSamples: () => [{ numTransactions: 240_000, samplePeriodSecs: 60 }],
      getEpochInfo: () => ({ epoch: 700, absoluteSlot: 300_000_000, blockHeight: 280_000_000 }),
      getVoteAccounts: () => ({ current: [{}, {}, {}], delinquent: [] }),
      getSignaturesForAddress: (params) => new Array(SIGNATURE_COUNTS[String(params[0])] ?? 0).fill({}),
      getTokenSupply: () => ({ value: { uiAmountString: '6000000000.5' } }),
      ...overrides,
    };
    mockFetch.mockImplementation((_url: string, init: { body: string }) => {
      const { method, params } = JSON.parse(init.body);
      return Promise.resolve(jsonResponse({ jsonrpc: '2.0', id: 1, result: rpcResults[method](params) }));
    });
  }

  it('classifies activity levels', () => {
    expect(activityLevel(81)).toBe('high');
    expect(activityLevel(80)).toBe('medium');
    expect(activityLevel(41)).toBe('medium');
    expect(activityLevel(40)).toBe('low');
  });

  it('returns metadata-only signals without an API key', async () => {
    const result = await scrapeOnchain(baseConfig, catalog, now);

    expect(mockFetch).not.toHaveBeenCalled();
    expect(result.errors).toHaveLength(0);
    expect(result.signals).toHaveLength(2);
    expect(result.signals[0]).toMatchObject({
      source: 'onchain',
      url: 'https://solscan.io/account/Prog1111',
      published_at: '1970-01-01T00:00:00.000Z',
      metadata: { category: 'defi_evolution', program_id: 'Prog1111', signal_strength: 'low', fallback: true },
    });
  });

  it('turns RPC results into network, program, stablecoin and NFT signals', async () => {
    stubRpc();

    const result = await scrapeOnchain({ ...baseConfig, heliusApiKey: 'test-secret' }, catalog, now);

    expect(mockFetch.mock.calls[0][0]).toBe('https://mainnet.helius-rpc.com/?api-key=test-secret');
    expect(result.errors).toHaveLength(0);
    expect(result.signals.map((s) => s.title)).toEqual([
      'Solana Network: 4,000 TPS, 3 Validators',
      'Jupiter: 100 recent transactions',
      '$6.00B Stablecoins on Solana',
      'NFT Trading: 60 recent trades',
    ]);
    expect(result.signals[0].metadata).toMatchObject({ category: 'infrastructure', signal_strength: 'high' });
    expect(result.signals[1].metadata).toMatchObject({ category: 'defi_evolution', signal_strength: 'high' });
    expect(result.signals[2].metadata).toMatchObject({ category: 'stablecoins_payfi', signal_strength: 'high' });
    expect(result.signals.every((s) => s.published_at === now.toISOString())).toBe(true);
    expect(result.signals.some((s) => s.metadata.fallback)).toBe(false);
  });

  it('samples the last 50 marketplace signatures for the NFT signal', async () => {
    stubRpc();

    const result = await scrapeOnchain({ ...baseConfig, heliusApiKey: 'test-secret' }, catalog, now);

    const marketCalls = mockFetch.mock.calls
      .map(([, init]) => JSON.parse(init.body))
      .filter((body) => body.method === 'getSignaturesForAddress' && String(body.params[0]).startsWith('Market'));
    expect(marketCalls.map((body) => body.params)).toEqual([
      ['MarketA', { limit: 50 }],
      ['MarketB', { limit: 50 }],
    ]);

    const nft = result.signals[3];
    expect(nft).toMatchObject({
      source_id: 'onchain-nft-marketplaces',
      description:
        'Market A leading with 40 recent trades. NFT and compressed NFT activity remains active, pointing at zk compression adoption.',
      metadata: { category: 'zk_compression', signal_strength: 'medium', metrics: { total_recent_trades: 60 } },
    });
  });

  it('rates light marketplace trading low and drops idle marketplaces', async () => {
    stubRpc({
      getSignaturesForAddress: (params) => new Array(params[0] === 'MarketB' ? 50 : 0).fill({}),
    });

    const result = await scrapeOnchain({ ...baseConfig, heliusApiKey: 'test-secret' }, catalog, now);

    const nft = result.signals.find((s) => s.source_id === 'onchain-nft-marketplaces');
    expect(nft?.title).toBe('NFT Trading: 50 recent trades');
    expect(nft?.metadata.signal_strength).toBe('low');
    expect(nft?.description.startsWith('Market B leading with 50 recent trades.')).toBe(true);
  });

  it('gives every live signal its description as an evidence line', async () => {
    stubRpc();

    const result = await scrapeOnchain({ ...baseConfig, heliusApiKey: 'test-secret' }, catalog, now);

    for (const s of result.signals) {
      expect(s.metadata.evidence).toEqual([s.description.slice(0, 100)]);
    }
    expect(result.signals[0].metadata.evidence).toEqual([
      'Real-time network performance: 4,000 transactions per second across 3 active validators. Epoch 700, ',
    ]);
  });

  it('falls back to the static list when every RPC call fails', async () => {
    mockFetch.mockRejectedValue(new Error('connect ECONNREFUSED'));

    const result = await scrapeOnchain({ ...baseConfig, heliusApiKey: 'test-secret' }, catalog, now);

    expect(result.signals.map((s) => s.metadata.signal_strength)).toEqual(['low', 'low']);
    expect(result.signals.every((s) => s.metadata.fallback === true)).toBe(true);
    expect(result.signals.every((s) => s.published_at === '1970-01-01T00:00:00.000Z')).toBe(true);
    // network, two programs, one stablecoin, two marketplaces
    expect(result.errors).toHaveLength(6);
    expect(result.errors[0]).toBe('Network stats failed: connect ECONNREFUSED');
    expect(result.errors[5]).toBe('Marketplace activity for Market B failed: connect ECONNREFUSED');
  });

  it('reports RPC error envelopes', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ jsonrpc: '2.0', id: 1, error: { message: 'invalid api key' } }));

    const result = await scrapeOnchain({ ...baseConfig, heliusApiKey: 'test-secret' }, catalog, now);

    expect(result.errors[0]).toBe('Network stats failed: Helius getRecentPerformanceSamples: invalid api key');
  });
});

describe('research scraper', () => {
  const entries: ResearchEntry[] = [
    {
      title: 'Agent payments',
      description: 'Agents settle in USDC',
      url: 'https://example.com/agents',
      category: 'ai_agents',
      evidence: ['$10M in agent volume'],
      why_emerging: 'Agents need rails',
    },
  ];

  it('stamps curated notes with the fetch time', () => {
    const [signal] = catalogToSignals(entries, now);
    expect(signal).toMatchObject({
      source: 'research',
      title: 'Agent payments',
      published_at: now.toISOString(),
      metadata: { category: 'ai_agents', evidence: ['$10M in agent volume'], why_emerging: 'Agents need rails' },
    });
  });

  it('parses RSS 2.0 items', () => {
    const xml = `<?xml version="1.0"?>
<rss version="2.0"><channel>
  <item>
    <title>Payments &amp; stablecoins</title>
    <link>https://example.com/a</link>
    <description>&lt;b&gt;USDC&lt;/b&gt; volume up</description>
    <pubDate>Fri, 20 Feb 2026 00:00:00 +0000</pubDate>
  </item>
  <item>
    <title>Second</title>
    <link>https://example.com/b</link>
  </item>
</channel></rss>`;

    const items = parseFeed(xml);
    expect(items).toHaveLength(2);
    expect(items[0]).toEqual({
      title: 'Payments & stablecoins',
      link: 'https://example.com/a',
      content: 'USDC volume up',
      published: 'Fri, 20 Feb 2026 00:00:00 +0000',
    });
  });

  it('parses Atom entries with alternate links', () => {
    const xml = `<?xml version="1.0"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <entry>
    <title>Validator client update</title>
    <link rel="alternate" href="https://example.com/fd"/>
    <updated>2026-02-20T00:00:00Z</updated>
    <summary>Faster block production</summary>
  </entry>
</feed>`;

    expect(parseFeed(xml)).toEqual([
      {
        title: 'Validator client update',
        link: 'https://example.com/fd',
        content: 'Faster block production',
        published: '2026-02-20T00:00:00Z',
      },
    ]);
  });

  it('keeps the catalog when a feed fails', async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 500 });

    const result = await scrapeResearch(
      { ...baseConfig, researchFeeds: ['https://example.com/feed.xml'] },
      entries,
      now,
    );

    expect(result.signals).toHaveLength(1);
    expect(result.errors).toEqual(['Research feed https://example.com/feed.xml failed: returned 500']);
  });

  it('adds feed items without a category hint', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      text: () =>
        Promise.resolve(
          '<rss><channel><item><title>Compressed NFTs</title><link>https://example.com/c</link></item></channel></rss>',
        ),
    });

    const result = await scrapeResearch({ ...baseConfig, researchFeeds: ['https://example.com/feed.xml'] }, entries, now);

    expect(result.signals).toHaveLength(2);
    expect(result.signals[1]).toMatchObject({
      title: 'Compressed NFTs',
      description: 'Compressed NFTs',
      url: 'https://example.com/c',
      published_at: now.toISOString(),
      metadata: {},
    });
  });
});

describe('fetchAllSignals', () => {
  const signal = (source: 'github' | 'research', title: string) => normalizeSignal({ source, title });

  it('runs sources in order and replaces a throwing source with nothing', async () => {
    const calls: string[] = [];
    const scrapers: SourceScraper[] = [
      {
        name: 'onchain',
        fn: async () => {
          calls.push('onchain');
          throw new Error('RPC exploded');
        },
      },
      {
        name: 'github',
        fn: async () => {
          calls.push('github');
          return { source: 'github', signals: [signal('github', 'org/repo')], errors: [] };
        },
      },
      {
        name: 'research',
        fn: async () => {
          calls.push('research');
          return { source: 'research', signals: [signal('research', 'note')], errors: ['feed down'] };
        },
      },
    ];
    const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    const result = await fetchAllSignals(baseConfig, scrapers, logger);

    expect(calls).toEqual(['onchain', 'github', 'research']);
    expect(result.signals.map((s) => s.title)).toEqual(['org/repo', 'note']);
    expect(result.counts).toEqual({ onchain: 0, github: 1, research: 1 });
    expect(result.errors).toEqual(['onchain unavailable: RPC exploded', 'feed down']);
    expect(logger.warn).toHaveBeenCalledWith('    WARN: onchain unavailable: RPC exploded');
  });

  it('stops on a configuration error instead of recording it', async () => {
    const later = vi.fn();
    const scrapers: SourceScraper[] = [
      {
        name: 'research',
        fn: async () => {
          throw new ConfigurationError('data/research-signals.json: entries must be an array');
        },
      },
      { name: 'github', fn: later },
    ];

    await expect(fetchAllSignals(baseConfig, scrapers)).rejects.toBeInstanceOf(ConfigurationError);
    expect(later).not.toHaveBeenCalled();
  });
});
