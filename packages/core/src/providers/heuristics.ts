/**
 * Deterministic answers used when no reasoning model is configured, and the
 * keyword guardrail applied on top of model verdicts.
 */

import { compactText } from '../evidence/bundle.js';
import { isRecord, asArray, coerceText, coerceFloat } from '../council/coerce.js';
import type { FailureStatus, FailureStatusRequest, QuestionAnswer } from './types.js';

const FAILURE_PATTERNS = [
  /\bfiled for chapter 11\b/,
  /\bfiled chapter 11\b/,
  /\bfiled for bankruptcy\b/,
  /\bbankrupt(?:cy)?\b/,
  /\bentered liquidation\b/,
  /\binsolven(?:cy|t)\b/,
  /\bceased operations\b/,
  /\bshut down\b/,
];

const NEGATING_PATTERNS = [
  /\bno bankruptcy\b/,
  /\bno chapter 11\b/,
  /\bdid not file\b/,
  /\bnot bankrupt\b/,
  /\bremains operational\b/,
  /\bstill operating\b/,
];

export const HEURISTIC_STATUS_CONFIDENCE = 0.55;
export const GUARDRAIL_MIN_CONFIDENCE = 0.75;

export interface FailureEvidence {
  /** Up to two compacted snippets. */
  curated: string[];
  /** Search answer plus curated snippets, one per line. */
  combined: string;
  failureHits: number;
  negatingHits: number;
}

export function scanFailureEvidence(request: Pick<FailureStatusRequest, 'answer' | 'snippets'>): FailureEvidence {
  const curated = request.snippets
    .filter(snippet => String(snippet).trim())
    .map(snippet => compactText(snippet, 120))
    .slice(0, 2);
  const combined = [compactText(request.answer, 160), ...curated].join('\n');
  const lower = combined.toLowerCase();

  return {
    curated,
    combined,
    failureHits: FAILURE_PATTERNS.filter(pattern => pattern.test(lower)).length,
    negatingHits: NEGATING_PATTERNS.filter(pattern => pattern.test(lower)).length,
  };
}

/**
 * Strong bankruptcy language with nothing contradicting it overrides a
 * "not failed" verdict.
 */
export function applyFailureGuardrail(status: FailureStatus, evidence: FailureEvidence): FailureStatus {
  if (evidence.failureHits < 2 || evidence.negatingHits > 0 || status.is_failed) {
    return status;
  }
  return {
    ...status,
    is_failed: true,
    status_label: 'failed',
    confidence: Math.max(status.confidence, GUARDRAIL_MIN_CONFIDENCE),
    reason: 'Search evidence carries repeated bankruptcy or liquidation language.',
  };
}

export function heuristicFailureStatus(request: FailureStatusRequest): FailureStatus {
  const evidence = scanFailureEvidence(request);
  const failed = evidence.failureHits > 0;
  return {
    is_failed: failed,
    status_label: failed ? 'failed' : 'not_failed',
    confidence: HEURISTIC_STATUS_CONFIDENCE,
    reason: 'Keyword classification; no reasoning model was available.',
    evidence: evidence.curated.slice(0, 3),
    model_used: 'fallback',
  };
}

/**
 * Pick an answer from a saved council report without a model: the first
 * recommendation for "what first / how to improve" questions, the first
 * failure driver for "why" questions.
 */
export function heuristicAnswer(question: string, report: unknown): QuestionAnswer {
  const actions = texts(isRecord(report) ? report.final_recommendations : undefined, 'action');
  const drivers = texts(isRecord(report) ? report.failure_drivers : undefined, 'driver');
  const impact: Record<string, unknown> =
    isRecord(report) && isRecord(report.counterfactual_impact) ? report.counterfactual_impact : {};
  const q = question.toLowerCase().trim();

  let answer: string;
  if (/\b(first|single|highest)\b/.test(q) && actions.length) {
    answer = actions[0];
  } else if (/\b(why|driver|drivers|failed)\b/.test(q) && drivers.length) {
    answer = drivers[0];
  } else if (q.includes('improve') && actions.length) {
    answer = actions[0];
  } else {
    answer = actions[0] ?? 'Prioritize liquidity and deleveraging in the first 90 days.';
  }

  const baseline = formatNumber(impact.before_score);
  const improvement = formatNumber(impact.improvement_pct);

  return {
    answer,
    rationale: `Baseline risk is ${baseline} and the simulated improvement is ${improvement}%, so near-term liquidity and capital-structure actions dominate.`,
    caveat: 'Heuristic answer drawn from the saved report; no reasoning model was consulted.',
    confidence: '0.62',
  };
}

function texts(rows: unknown, key: string): string[] {
  const out: string[] = [];
  for (const row of asArray(rows)) {
    const text = isRecord(row) ? coerceText(row[key]) : coerceText(row);
    if (text) out.push(text);
  }
  return out;
}

function formatNumber(value: unknown): string {
  const parsed = coerceFloat(value, Number.NaN);
  return Number.isNaN(parsed) ? 'N/A' : String(parsed);
}
