import { Feed } from 'feed';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { BuildIdea } from '../config/catalog.js';
import { OutputWriteError } from '../errors.js';
import type { Signal, SignalSource } from '../scrapers/types.js';
import type { Momentum } from '../scoring/momentum.js';
import type { ScoredNarrative } from '../scoring/narratives.js';

const REPORT_TITLE = 'Solana Narrative Radar';
const REPORT_DESCRIPTION = 'Emerging Solana narratives ranked by signal strength, source diversity and on-chain validation.';
const SITE_URL = 'https://narrative-radar.local'; // placeholder, reports are written to disk

export type ReportFormat = 'html' | 'markdown' | 'json' | 'rss';

export const REPORT_FORMATS: readonly ReportFormat[] = ['html', 'markdown', 'json', 'rss'];

export const REPORT_FILES: Readonly<Record<ReportFormat, string>> = {
  html: 'narrative_report.html',
  markdown: 'narrative_report.md',
  json: 'narrative_data.json',
  rss: 'narrative_feed.xml',
};

export type NarrativeReport = ScoredNarrative & { readonly ideas: readonly BuildIdea[] };

export interface ReportContext {
  generatedAt: Date;
  signalCount: number;
  lookbackDays: number;
}

const MOMENTUM_ICON: Record<Momentum, string> = {
  rising: '📈',
  stable: '➡️',
  declining: '📉',
};

const SOURCE_ICON: Record<SignalSource, string> = {
  github: '🐙',
  onchain: '⛓️',
  research: '📰',
};

function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function strengthBar(strength: number): string {
  const filled = Math.min(10, Math.max(0, Math.floor(strength / 10)));
  return '█'.repeat(filled) + '░'.repeat(10 - filled);
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** One line of on-chain figures behind a narrative, or '' when it has none. */
export function onchainValidation(metrics: Readonly<Record<string, number>>): string {
  const parts: string[] = [];
  if (metrics.tps !== undefined) parts.push(`${metrics.tps.toLocaleString('en-US')} TPS network activity`);
  if (metrics.total_supply_usd !== undefined) {
    parts.push(`$${(metrics.total_supply_usd / 1e9).toFixed(2)}B stablecoin supply`);
  }
  if (metrics.recent_tx_count !== undefined) parts.push(`${metrics.recent_tx_count} recent transactions`);
  if (metrics.total_recent_trades !== undefined) parts.push(`${metrics.total_recent_trades} recent NFT trades`);
  return parts.join(', ');
}

interface JsonNarrative {
  category: string;
  name: string;
  strength: number;
  confidence: number;
  momentum: Momentum;
  why: string;
  summary: string;
  highlights: readonly string[];
  evidence: readonly Signal[];
  ideas: readonly BuildIdea[];
}

export function renderJson(reports: readonly NarrativeReport[]): string {
  const payload: JsonNarrative[] = reports.map((r) => ({
    category: r.category,
    name: r.name,
    strength: r.strength,
    confidence: r.confidence,
    momentum: r.momentum,
    why: r.why,
    summary: r.summary,
    highlights: r.highlights,
    evidence: r.evidence,
    ideas: r.ideas,
  }));
  return JSON.stringify(payload, null, 2);
}

export function renderMarkdown(reports: readonly NarrativeReport[], ctx: ReportContext): string {
  const md: string[] = [];
  md.push(`# 🔮 ${REPORT_TITLE} Report`);
  md.push('');
  md.push(`**Generated:** ${formatTimestamp(ctx.generatedAt)}`);
  md.push(`**Analysis Period:** Past ${ctx.lookbackDays} days`);
  md.push(`**Total Signals Analyzed:** ${ctx.signalCount}`);
  md.push('**Data Sources:** GitHub API, Helius On-Chain Data, Ecosystem Research');
  md.push('');
  md.push('---');
  md.push('');

  md.push('## 📊 Executive Summary');
  md.push('');
  if (reports.length === 0) {
    md.push('No narratives had supporting signals in this run.');
  }
  for (const [i, r] of reports.entries()) {
    md.push(`${i + 1}. **${r.name}** [${strengthBar(r.strength)}] ${r.strength}/100 ${MOMENTUM_ICON[r.momentum]}`);
    md.push(`   - Confidence: ${r.confidence}% | Signals: ${r.evidence.length}`);
  }
  md.push('');
  md.push('---');

  for (const r of reports) {
    md.push('');
    md.push(`## ${r.emoji} ${r.name}`);
    md.push('');
    md.push(
      `**Strength Score:** ${r.strength}/100 | **Confidence:** ${r.confidence}% | **Momentum:** ${titleCase(r.momentum)} | **Signals:** ${r.evidence.length}`,
    );
    md.push('');
    md.push('### 🎯 Why This Narrative is Emerging');
    md.push('');
    if (r.summary) md.push(r.summary, '');
    md.push(`${r.why}.`);

    if (r.drivers.length > 0) {
      md.push('');
      md.push('**Key Drivers:**');
      for (const d of r.drivers) md.push(`- ${d}`);
    }

    const validation = onchainValidation(r.keyMetrics);
    if (validation) {
      md.push('');
      md.push(`**On-Chain Validation:** ${validation}`);
    }

    if (r.highlights.length > 0) {
      md.push('');
      md.push('### 🔍 Key Evidence');
      for (const h of r.highlights.slice(0, 6)) md.push(`- ${h}`);
    }

    if (r.ideas.length > 0) {
      md.push('');
      md.push('### 💡 Build Ideas');
      for (const idea of r.ideas.slice(0, 3)) {
        md.push('');
        md.push(`#### ${idea.name}`);
        md.push('');
        md.push(idea.description);
        md.push('');
        md.push(`- **Tech Stack:** ${idea.tech_stack.join(', ')}`);
        md.push(`- **Difficulty:** ${titleCase(idea.difficulty)}`);
        md.push(`- **Time to Build:** ${idea.timeline_estimate}`);
        md.push(`- **Revenue Model:** ${idea.revenue_model}`);
        md.push(`- **Why Now:** ${idea.why_now}`);
      }
    }

    md.push('');
    md.push('### 📡 Top Signals');
    for (const s of r.evidence.slice(0, 5)) {
      md.push(s.url ? `- ${SOURCE_ICON[s.source]} [${s.title}](${s.url})` : `- ${SOURCE_ICON[s.source]} ${s.title}`);
    }
    md.push('');
    md.push('---');
  }

  md.push('');
  md.push('## 🚀 Recommended Action Plan');
  md.push('');
  const [top, second, third] = reports;
  if (top) {
    md.push(`1. **Highest Priority:** ${top.name}`);
    md.push(`   - Strength ${top.strength}/100 with ${top.confidence}% confidence`);
    const first = top.ideas[0];
    if (first) md.push(`   - Start with: **${first.name}**`);
  }
  if (second) {
    md.push(`2. **Secondary Focus:** ${second.name}`);
    md.push(`   - ${titleCase(second.momentum)} momentum`);
  }
  if (third) {
    md.push(`3. **Emerging Opportunity:** ${third.name}`);
  }

  return `${md.join('\n')}\n`;
}

function htmlNarrativeCard(r: NarrativeReport): string {
  const e = escapeHtml;
  const parts: string[] = [];
  parts.push('<article class="narrative-card">');
  parts.push(
    `<header><span class="emoji">${e(r.emoji)}</span><h3>${e(r.name)}</h3><span class="score">${r.strength}</span></header>`,
  );
  parts.push(
    `<div class="metrics">Confidence: <b>${r.confidence}%</b> · Signals: <b>${r.evidence.length}</b> · <span class="momentum momentum-${r.momentum}">${MOMENTUM_ICON[r.momentum]} ${titleCase(r.momentum)}</span></div>`,
  );
  parts.push(`<div class="bar"><div class="fill" style="width: ${r.strength}%"></div></div>`);
  parts.push('<h4>🎯 Why This Narrative is Emerging</h4>');
  if (r.summary) parts.push(`<p>${e(r.summary)}</p>`);
  parts.push(`<p class="why">${e(r.why)}.</p>`);

  if (r.drivers.length > 0) {
    parts.push('<p><b>Key Drivers:</b></p><ul class="drivers">');
    for (const d of r.drivers) parts.push(`<li>${e(d)}</li>`);
    parts.push('</ul>');
  }

  const validation = onchainValidation(r.keyMetrics);
  if (validation) parts.push(`<p class="validation"><b>On-Chain Validation:</b> ${e(validation)}</p>`);

  if (r.highlights.length > 0) {
    parts.push('<div class="pills">');
    for (const h of r.highlights.slice(0, 6)) parts.push(`<span class="pill">${e(h)}</span>`);
    parts.push('</div>');
  }

  if (r.ideas.length > 0) {
    parts.push('<h4>💡 Build Ideas</h4>');
    for (const idea of r.ideas.slice(0, 3)) {
      parts.push(
        `<div class="idea"><b>${e(idea.name)}</b><p>${e(idea.description)}</p><small>${e(titleCase(idea.difficulty))} · ${e(idea.timeline_estimate)} · ${e(idea.revenue_model)}</small></div>`,
      );
    }
  }

  parts.push('<h4>📡 Top Signals</h4><ul class="signals">');
  for (const s of r.evidence.slice(0, 5)) {
    parts.push(`<li>${SOURCE_ICON[s.source]} <a href="${e(s.url)}" target="_blank" rel="noopener">${e(s.title)}</a></li>`);
  }
  parts.push('</ul>');
  parts.push('</article>');
  return parts.join('\n');
}

const HTML_STYLE = `
  :root { --purple: #9945FF; --green: #14F195; --bg: #0a0a0f; --card: #12121a; --text: #fff; --muted: #8888a0; --border: #2a2a3a; }
  body { margin: 0; padding: 2rem; background: var(--bg); color: var(--text); font-family: system-ui, sans-serif; }
  header.page { margin-bottom: 2rem; }
  .grid { display: grid; grid-template-columns: repeat(auto-fill, minmax(360px, 1fr)); gap: 1.5rem; }
  .narrative-card { background: var(--card); border: 1px solid var(--border); border-radius: 12px; padding: 1.25rem; }
  .narrative-card header { display: flex; align-items: center; gap: .5rem; }
  .narrative-card h3 { flex: 1; margin: 0; }
  .score { font-size: 1.5rem; font-weight: 700; color: var(--green); }
  .metrics, small { color: var(--muted); }
  .bar { height: 6px; background: var(--border); border-radius: 3px; margin: .75rem 0; }
  .fill { height: 100%; background: linear-gradient(90deg, var(--purple), var(--green)); border-radius: 3px; }
  .pill { display: inline-block; margin: 2px; padding: 2px 8px; border-radius: 10px; background: var(--border); font-size: .8rem; }
  .idea { margin: .5rem 0; }
  a { color: var(--green); }
  .momentum-rising { color: var(--green); }
  .momentum-declining { color: #FF6B6B; }
`;

export function renderHtml(reports: readonly NarrativeReport[], ctx: ReportContext): string {
  const cards = reports.map(htmlNarrativeCard).join('\n');
  const plan = reports
    .slice(0, 3)
    .map((r, i) => `<li><b>${['Highest Priority', 'Secondary Focus', 'Emerging Opportunity'][i]}:</b> ${escapeHtml(r.name)} (${r.strength}/100)</li>`)
    .join('\n');

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${REPORT_TITLE} | Dashboard</title>
<style>${HTML_STYLE}</style>
</head>
<body>
<header class="page">
<h1>🔮 ${REPORT_TITLE}</h1>
<p>Generated ${formatTimestamp(ctx.generatedAt)} · ${ctx.signalCount} signals · past ${ctx.lookbackDays} days</p>
</header>
<h2>📊 Emerging Narratives</h2>
<section class="grid">
${cards || '<p>No narratives had supporting signals in this run.</p>'}
</section>
<h2>🚀 Recommended Action Plan</h2>
<ol>
${plan}
</ol>
</body>
</html>
`;
}

export function renderRss(reports: readonly NarrativeReport[], ctx: ReportContext): string {
  const feed = new Feed({
    title: REPORT_TITLE,
    description: REPORT_DESCRIPTION,
    id: SITE_URL,
    link: SITE_URL,
    language: 'en',
    updated: ctx.generatedAt,
    generator: 'narrative-radar',
    copyright: '',
    feedLinks: {
      rss: `${SITE_URL}/${REPORT_FILES.rss}`,
    },
  });

  for (const r of reports) {
    feed.addItem({
      title: `${r.name} (${r.strength}/100, ${r.momentum})`,
      id: `${SITE_URL}/narratives/${r.category}`,
      link: r.evidence[0]?.url || `${SITE_URL}/${REPORT_FILES.html}`,
      description: `${r.why}. Confidence ${r.confidence}%.`,
      date: ctx.generatedAt,
      category: [{ name: r.category }],
    });
  }

  return feed.rss2();
}

export function renderReport(
  reports: readonly NarrativeReport[],
  format: ReportFormat,
  ctx: ReportContext,
): string {
  switch (format) {
    case 'html':
      return renderHtml(reports, ctx);
    case 'markdown':
      return renderMarkdown(reports, ctx);
    case 'json':
      return renderJson(reports);
    case 'rss':
      return renderRss(reports, ctx);
  }
}

/** Renders every requested format and writes each file once. Returns the written paths. */
export async function publishReports(
  reports: readonly NarrativeReport[],
  outputDir: string,
  formats: readonly ReportFormat[],
  ctx: ReportContext,
): Promise<string[]> {
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (err) {
    throw new OutputWriteError(outputDir, err);
  }

  const files: string[] = [];
  for (const format of new Set(formats)) {
    const path = join(outputDir, REPORT_FILES[format]);
    const content = renderReport(reports, format, ctx);
    try {
      await writeFile(path, content, 'utf-8');
    } catch (err) {
      throw new OutputWriteError(path, err);
    }
    files.push(path);
  }
  return files;
}
