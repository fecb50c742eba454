/**
 * Machine-readable JSON report.
 *
 * The document wraps the normalized council output with run metadata.
 * `parseCouncilReport` reads a saved document back and checks it against
 * the strict output schema before it is handed to follow-up questions.
 */

import { z } from 'zod';
import { CouncilOutputSchema } from '../council/schema.js';
import { COUNCIL_SCHEMA_VERSION } from '../council/cache.js';
import type { CouncilOutput } from '../council/types.js';
import type { CompanyProfile } from '../providers/types.js';
import { formatDuration } from './markdown.js';

export interface JsonFormatOptions {
  company: CompanyProfile;
  failureYear?: number | null;
  /** Wall time of the council run. */
  durationMs?: number;
  /** Report date; defaults to now. */
  date?: Date;
}

export interface JsonOutputMetadata {
  company: string;
  ticker: string;
  industry?: string;
  failureYear?: number;
  date: string;
  schemaVersion: string;
  durationMs?: number;
  durationFormatted?: string;
}

export interface JsonOutput {
  metadata: JsonOutputMetadata;
  report: CouncilOutput;
}

const JsonOutputMetadataSchema = z.object({
  company: z.string(),
  ticker: z.string(),
  industry: z.string().optional(),
  failureYear: z.number().int().optional(),
  date: z.string(),
  schemaVersion: z.string(),
  durationMs: z.number().nonnegative().optional(),
  durationFormatted: z.string().optional(),
});

const JsonOutputSchema = z.object({
  metadata: JsonOutputMetadataSchema,
  report: CouncilOutputSchema,
});

export function formatCouncilJson(output: CouncilOutput, options: JsonFormatOptions): string {
  const metadata: JsonOutputMetadata = {
    company: options.company.name,
    ticker: options.company.ticker,
    date: (options.date ?? new Date()).toISOString(),
    schemaVersion: COUNCIL_SCHEMA_VERSION,
  };
  if (options.company.industry) metadata.industry = options.company.industry;
  if (options.failureYear) metadata.failureYear = options.failureYear;
  if (options.durationMs !== undefined) {
    metadata.durationMs = options.durationMs;
    metadata.durationFormatted = formatDuration(options.durationMs);
  }

  const result: JsonOutput = { metadata, report: output };
  return JSON.stringify(result, null, 2);
}

/** Parse a document written by `formatCouncilJson`. Throws on anything else. */
export function parseCouncilReport(text: string): JsonOutput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Report is not valid JSON: ${message}`);
  }

  const result = JsonOutputSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Report does not match the council output schema: ${issues}`);
  }
  return result.data;
}
