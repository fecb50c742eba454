/**
 * Channel queries that feed the evidence bundle.
 *
 * One web query per channel, run concurrently. A channel whose search
 * degraded to an empty result contributes no notes, so the bundle simply
 * has fewer items.
 */

import {
  compactText,
  DEFAULT_MACRO_STRESS,
  type ChannelNotes,
  type CompanyProfile,
  type EvidenceChannel,
  type EvidenceChannels,
  type FailureStatusRequest,
} from '@autopsy/core';
import type { EvidenceSearch, SearchDepth, SearchResult } from './client.js';

export const MAX_SNIPPET_LENGTH = 320;
/** Qualitative snippets shorter than this are navigation chrome, not evidence. */
export const MIN_QUALITATIVE_LENGTH = 40;
export const MAX_QUALITATIVE_SNIPPETS = 8;

/** Baseline macro stress when the search ran; keyword hits add to it. */
export const MACRO_STRESS_BASELINE = 32;

export const MACRO_STRESS_KEYWORDS: Readonly<Record<string, number>> = {
  'recession': 16,
  'credit tightening': 11,
  'high interest': 9,
  'rate hike': 9,
  'default': 12,
  'demand slowdown': 8,
  'inflation': 5,
  'uncertainty': 6,
};

interface ChannelQuery {
  channel: EvidenceChannel;
  query: string;
  maxResults: number;
  /** Put the engine's direct answer ahead of the snippets. */
  leadWithAnswer: boolean;
}

export interface GatherOptions {
  searchDepth?: SearchDepth;
  /** Upper bound on results per channel. */
  maxResults?: number;
  signal?: AbortSignal;
}

export interface FailureCheckEvidence {
  answer: string;
  snippets: string[];
  sources: string[];
}

export interface GatheredEvidence {
  channels: EvidenceChannels;
  failureCheck: FailureCheckEvidence;
  macroStressScore: number;
  /** Every distinct source URL, first-seen order. */
  sources: string[];
}

export function channelQueries(profile: CompanyProfile, failureYear?: number | null): ChannelQuery[] {
  const subject = `${profile.name} ${profile.ticker}`.trim();
  const industry = profile.industry?.trim() || 'listed';
  const year = failureYear ? ` ${failureYear}` : '';

  return [
    { channel: 'macro', query: `Macro stress for ${industry} with rates, credit, demand and default pressure`, maxResults: 4, leadWithAnswer: true },
    { channel: 'micro', query: `${subject} revenue decline margin pressure cash burn debt load${year}`, maxResults: 4, leadWithAnswer: false },
    { channel: 'industry', query: `${industry} industry competitive pressure disruption consolidation`, maxResults: 4, leadWithAnswer: false },
    { channel: 'news', query: `${subject} news${year}`, maxResults: 5, leadWithAnswer: false },
    { channel: 'qualitative', query: `${subject} liquidity risk covenant breach restructuring distress signals`, maxResults: 5, leadWithAnswer: false },
    { channel: 'strategy', query: `Survivor strategies for stressed ${industry} companies that avoided collapse`, maxResults: 4, leadWithAnswer: true },
    { channel: 'failure_check', query: `Did ${subject} fail: chapter 11 bankruptcy liquidation insolvency collapse${year}`, maxResults: 5, leadWithAnswer: false },
  ];
}

/** Keyword score over the macro answer and snippets, clamped to [0, 100]. */
export function scoreMacroStress(result: SearchResult): number {
  const text = [result.answer, ...result.snippets].join(' ').toLowerCase();
  let score = MACRO_STRESS_BASELINE;
  for (const [phrase, impact] of Object.entries(MACRO_STRESS_KEYWORDS)) {
    if (text.includes(phrase)) score += impact;
  }
  return Math.max(0, Math.min(100, score));
}

function toChannelNotes(query: ChannelQuery, result: SearchResult): ChannelNotes {
  const notes: string[] = [];
  const sources: string[] = [];

  if (query.leadWithAnswer && result.answer) {
    notes.push(compactText(result.answer, MAX_SNIPPET_LENGTH));
    sources.push('');
  }

  result.snippets.forEach((snippet, index) => {
    const text = compactText(snippet, MAX_SNIPPET_LENGTH).trim();
    if (!text) return;
    if (query.channel === 'qualitative' && text.length < MIN_QUALITATIVE_LENGTH) return;
    notes.push(text);
    sources.push(result.sources[index] ?? '');
  });

  if (query.channel === 'qualitative') {
    return { notes: notes.slice(0, MAX_QUALITATIVE_SNIPPETS), sources: sources.slice(0, MAX_QUALITATIVE_SNIPPETS) };
  }
  return { notes, sources };
}

export async function gatherEvidence(
  client: EvidenceSearch,
  profile: CompanyProfile,
  failureYear?: number | null,
  options: GatherOptions = {},
): Promise<GatheredEvidence> {
  const queries = channelQueries(profile, failureYear);
  const results = await Promise.all(queries.map(query => client.search(query.query, {
    maxResults: options.maxResults ? Math.min(options.maxResults, query.maxResults) : query.maxResults,
    searchDepth: options.searchDepth,
    signal: options.signal,
  })));

  const channels: EvidenceChannels = {};
  const sources = new Set<string>();
  let macroStressScore = DEFAULT_MACRO_STRESS;
  let failureCheck: FailureCheckEvidence = { answer: '', snippets: [], sources: [] };

  queries.forEach((query, index) => {
    const result = results[index];
    if (!result) return;

    const notes = toChannelNotes(query, result);
    if (notes.notes.length > 0) channels[query.channel] = notes;
    for (const url of result.sources) {
      if (url) sources.add(url);
    }

    if (query.channel === 'macro' && client.enabled) {
      macroStressScore = scoreMacroStress(result);
    }
    if (query.channel === 'failure_check') {
      failureCheck = { answer: result.answer, snippets: [...result.snippets], sources: [...result.sources] };
    }
  });

  return { channels, failureCheck, macroStressScore, sources: [...sources] };
}

/** Shape the failure-check channel for `verifyFailureStatus`. */
export function failureStatusRequest(
  companyInput: string,
  profile: CompanyProfile,
  evidence: FailureCheckEvidence,
): FailureStatusRequest {
  return {
    companyInput,
    resolvedName: profile.name,
    ticker: profile.ticker,
    answer: evidence.answer,
    snippets: evidence.snippets,
  };
}
