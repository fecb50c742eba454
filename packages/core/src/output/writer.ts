import { writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import type { EvidenceBundle } from '../evidence/types.js';
import type { CompanyProfile } from '../providers/types.js';
import type { CouncilOutput } from '../council/types.js';
import { formatCouncilMarkdown } from './markdown.js';
import { formatCouncilJson } from './json.js';

export type OutputFormat = 'markdown' | 'json';

export interface WriteReportOptions {
  output: CouncilOutput;
  company: CompanyProfile;
  outputDir: string;
  format?: OutputFormat;
  evidence?: EvidenceBundle;
  failureYear?: number | null;
  durationMs?: number;
  date?: Date;
}

export interface WriteReportResult {
  path: string;
  format: OutputFormat;
}

/** `<ticker>-<yyyy-mm-dd>`, with anything unsafe in a file name replaced. */
export function resolveFilename(ticker: string, date: Date = new Date()): string {
  const safeTicker = ticker.trim().replace(/[^A-Za-z0-9._-]+/g, '_') || 'report';
  return `${safeTicker}-${date.toISOString().split('T')[0]}`;
}

function getExtension(format: OutputFormat): string {
  switch (format) {
    case 'json': return '.json';
    case 'markdown': return '.md';
  }
}

export function renderCouncilReport(options: Omit<WriteReportOptions, 'outputDir'>): string {
  const format = options.format ?? 'markdown';
  const shared = { company: options.company, failureYear: options.failureYear, date: options.date };
  return format === 'json'
    ? formatCouncilJson(options.output, { ...shared, durationMs: options.durationMs })
    : formatCouncilMarkdown(options.output, { ...shared, evidence: options.evidence });
}

export function writeCouncilReport(options: WriteReportOptions): WriteReportResult {
  const format = options.format ?? 'markdown';

  if (!existsSync(options.outputDir)) {
    mkdirSync(options.outputDir, { recursive: true });
  }

  const path = join(options.outputDir, `${resolveFilename(options.company.ticker, options.date)}${getExtension(format)}`);
  writeFileSync(path, renderCouncilReport({ ...options, format }), 'utf-8');
  return { path, format };
}
