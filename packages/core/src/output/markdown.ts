/**
 * Markdown report formatter.
 *
 * Produces a forensic memo with:
 * - YAML frontmatter (ticker, company, date, confidence, citation stats)
 * - Claims annotated with footnote citations into the evidence bundle
 * - Counterfactual, recommendation and model breakdown tables
 * - Evidence snippets as footnotes
 */

import type { EvidenceBundle } from '../evidence/types.js';
import type { CompanyProfile } from '../providers/types.js';
import { BREAKDOWN_KEYS, type CouncilOutput } from '../council/types.js';

export interface MarkdownFormatOptions {
  company: CompanyProfile;
  /** Bundle the claims cite. Footnotes are omitted without it. */
  evidence?: EvidenceBundle;
  failureYear?: number | null;
  /** Report date; defaults to now. */
  date?: Date;
}

const BREAKDOWN_LABELS = {
  primary: 'Primary (draft)',
  secondary: 'Secondary (critique)',
  local: 'Local model (sanity check)',
} as const;

export function formatCouncilMarkdown(output: CouncilOutput, options: MarkdownFormatOptions): string {
  const { company } = options;
  const date = isoDate(options.date ?? new Date());
  const lines: string[] = [];

  lines.push(buildFrontmatter(output, options, date));
  lines.push(`# Forensic Council Report: ${company.name} (${company.ticker})`);
  lines.push('');
  lines.push('## Executive Summary');
  lines.push('');
  lines.push(output.executive_summary);
  lines.push('');

  lines.push('## Failure Drivers');
  lines.push('');
  output.failure_drivers.forEach((claim, index) => {
    lines.push(`${index + 1}. ${claim.driver}${citations(claim.evidence_ids)} _(confidence ${percent(claim.confidence)})_`);
  });
  lines.push('');

  lines.push('## Survivor Strategies');
  lines.push('');
  output.survivor_strategies.forEach((claim, index) => {
    lines.push(`${index + 1}. ${claim.strategy}${citations(claim.evidence_ids)} _(confidence ${percent(claim.confidence)})_`);
  });
  lines.push('');

  const impact = output.counterfactual_impact;
  lines.push('## Counterfactual Impact');
  lines.push('');
  lines.push('| Risk Score Before | Risk Score After | Improvement |');
  lines.push('|-------------------|------------------|-------------|');
  lines.push(`| ${impact.before_score.toFixed(2)} | ${impact.after_score.toFixed(2)} | ${impact.improvement_pct.toFixed(2)}% |`);
  lines.push('');

  if (output.disagreements.length > 0) {
    lines.push('## Disagreements');
    lines.push('');
    lines.push('| Topic | Primary View | Secondary View | Local View |');
    lines.push('|-------|--------------|----------------|------------|');
    for (const row of output.disagreements) {
      lines.push(`| ${cell(row.topic)} | ${cell(row.groq_view)} | ${cell(row.watsonx_view)} | ${cell(row.local_view)} |`);
    }
    lines.push('');
  }

  lines.push('## Recommendations');
  lines.push('');
  lines.push('| Action | Expected Effect | Confidence |');
  lines.push('|--------|-----------------|------------|');
  for (const row of output.final_recommendations) {
    lines.push(`| ${cell(row.action)} | ${cell(row.expected_effect)} | ${percent(row.confidence)} |`);
  }
  lines.push('');

  lines.push(buildBreakdownSection(output, date));

  const footnotes = buildFootnotes(output, options.evidence);
  if (footnotes) {
    lines.push('');
    lines.push(footnotes);
  }

  return lines.join('\n');
}

function buildFrontmatter(output: CouncilOutput, options: MarkdownFormatOptions, date: string): string {
  const claims = [...output.failure_drivers, ...output.survivor_strategies];
  const cited = claims.filter(claim => claim.evidence_ids.length > 0).length;

  const fields: string[] = [];
  fields.push('---');
  fields.push(`ticker: ${JSON.stringify(options.company.ticker)}`);
  fields.push(`company: ${JSON.stringify(options.company.name)}`);
  if (options.company.industry) fields.push(`industry: ${JSON.stringify(options.company.industry)}`);
  if (options.failureYear) fields.push(`failure_year: ${options.failureYear}`);
  fields.push(`date: ${date}`);
  fields.push(`overall_confidence: ${output.overall_confidence}`);
  fields.push(`cited_claims: ${cited}/${claims.length}`);
  fields.push('---');
  fields.push('');

  return fields.join('\n');
}

function buildBreakdownSection(output: CouncilOutput, date: string): string {
  const lines: string[] = [];

  lines.push('---');
  lines.push('');
  lines.push('## Model Breakdown');
  lines.push('');
  lines.push('| Provider | Latency | Status |');
  lines.push('|----------|---------|--------|');
  for (const key of BREAKDOWN_KEYS) {
    const entry = output.model_breakdown[key];
    lines.push(`| ${BREAKDOWN_LABELS[key]} | ${formatDuration(entry.latency_ms)} | ${entry.errors ? cell(entry.errors) : 'ok'} |`);
  }
  lines.push('');

  const signals = output.signal_summary;
  const channels = signals.channels.length > 0 ? signals.channels.join(', ') : 'none';
  lines.push(`Evidence: ${signals.snippet_count} snippets from ${signals.source_count} sources (channels: ${channels}).`);
  lines.push(`Overall confidence: **${percent(output.overall_confidence)}**`);
  lines.push('');
  lines.push(`*Generated by autopsy on ${date}*`);

  return lines.join('\n');
}

/** One footnote per cited id that exists in the bundle, in id order. */
function buildFootnotes(output: CouncilOutput, evidence: EvidenceBundle | undefined): string {
  if (!evidence) return '';

  const cited = new Set<number>();
  for (const claim of [...output.failure_drivers, ...output.survivor_strategies]) {
    for (const id of claim.evidence_ids) cited.add(id);
  }

  const lines: string[] = [];
  for (const item of evidence.snippets) {
    if (!cited.has(item.id)) continue;
    const source = item.source ? ` <${item.source}>` : '';
    lines.push(`[^${item.id}]: (${item.label}) ${item.text}${source}`);
  }
  return lines.join('\n');
}

function citations(ids: readonly number[]): string {
  return ids.map(id => ` [^${id}]`).join('');
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

/** Table cells cannot hold pipes or newlines. */
function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\s*\n\s*/g, ' ');
}

function isoDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}
