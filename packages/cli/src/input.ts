/**
 * Council input file read by `autopsy run`.
 *
 * The file carries everything upstream analysis produced for one company:
 * metrics, peer comparison, counterfactual simulation, recommendations and
 * (optionally) pre-gathered evidence notes per channel.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  buildEvidenceBundle,
  type CouncilInput,
  type CouncilProviders,
  type EvidenceChannels,
} from '@autopsy/core';

const metricMapSchema = z.record(z.number().nullable());

const channelNotesSchema = z.object({
  notes: z.array(z.string()),
  sources: z.array(z.string()).optional(),
}).strict();

const evidenceChannelsSchema = z.object({
  macro: channelNotesSchema.optional(),
  micro: channelNotesSchema.optional(),
  industry: channelNotesSchema.optional(),
  news: channelNotesSchema.optional(),
  qualitative: channelNotesSchema.optional(),
  strategy: channelNotesSchema.optional(),
  failure_check: channelNotesSchema.optional(),
}).strict();

export const CouncilInputFileSchema = z.object({
  company: z.object({
    name: z.string().min(1),
    ticker: z.string().min(1),
    industry: z.string().optional(),
    country: z.string().optional(),
  }).strict(),
  metrics: metricMapSchema.default({}),
  peer_summary: z.object({
    survivor_tickers: z.array(z.string()).optional(),
    metric_gaps: z.record(z.union([z.number(), z.string(), z.null()])).optional(),
  }).passthrough().default({}),
  simulation: z.object({
    adjusted_score: z.number().optional(),
    improvement_percentage: z.number().optional(),
    adjusted_metrics: metricMapSchema.optional(),
  }).strict().default({}),
  recommendations: z.array(z.string()).default([]),
  failing_risk_score: z.number().min(0).max(100),
  macro_stress_score: z.number().min(0).max(100).optional(),
  qualitative_intensity: z.number().min(0).max(6).optional(),
  failure_year: z.number().int().nullable().optional(),
  evidence: evidenceChannelsSchema.optional(),
});

export type CouncilInputFile = z.infer<typeof CouncilInputFileSchema>;

export class InputFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputFileError';
  }
}

export function parseCouncilInputFile(text: string, label = 'input'): CouncilInputFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InputFileError(`${label} is not valid JSON: ${message}`);
  }

  const result = CouncilInputFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join(', ');
    throw new InputFileError(`Invalid council input in ${label}: ${issues}`);
  }
  return result.data;
}

export function readCouncilInputFile(path: string): CouncilInputFile {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch {
    throw new InputFileError(`Failed to read input file: ${path}`);
  }
  return parseCouncilInputFile(text, path);
}

/** Channels from the file, with any channel the search produced taking its place. */
export function mergeChannels(fromFile: EvidenceChannels | undefined, gathered: EvidenceChannels | undefined): EvidenceChannels {
  return { ...fromFile, ...gathered };
}

export interface CouncilInputOverrides {
  providers: CouncilProviders;
  channels?: EvidenceChannels;
  macroStressScore?: number;
  synthesisProvider?: string;
}

export function toCouncilInput(file: CouncilInputFile, overrides: CouncilInputOverrides): CouncilInput {
  return {
    companyProfile: file.company,
    metrics: file.metrics,
    peerSummary: file.peer_summary,
    evidenceBundle: buildEvidenceBundle(overrides.channels ?? file.evidence ?? {}),
    simulation: file.simulation,
    recommendations: file.recommendations,
    failingRiskScore: file.failing_risk_score,
    macroStressScore: file.macro_stress_score ?? overrides.macroStressScore,
    qualitativeIntensity: file.qualitative_intensity,
    failureYear: file.failure_year,
    providers: overrides.providers,
    synthesisProvider: overrides.synthesisProvider,
  };
}
