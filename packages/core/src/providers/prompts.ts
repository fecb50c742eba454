/**
 * Prompt builders for the council stages and the follow-up operations.
 *
 * Every system prompt asks for a bare JSON object; the user prompt carries
 * the context as JSON so the model can cite evidence ids verbatim.
 */

import type { ProviderPayload } from '../council/types.js';
import type { CouncilContext, FailureStatusRequest, ReasoningContext, SynthesisInputs } from './types.js';

const CITATION_RULES =
  'Cite only ids that appear in evidence_bundle.snippets. Never invent a citation. ' +
  "Where nothing supports a claim, write 'Evidence unavailable' and lower its confidence.";

const COUNCIL_SCHEMA =
  'Keys: executive_summary (string); failure_drivers (array of {driver, evidence_ids, confidence}); ' +
  'survivor_strategies (array of {strategy, evidence_ids, confidence}); ' +
  'counterfactual_impact ({before_score, after_score, improvement_pct}); ' +
  'disagreements (array of {topic, groq_view, watsonx_view, local_view}); ' +
  'final_recommendations (array of {action, expected_effect, confidence}); overall_confidence (0-1).';

export const DRAFT_SYSTEM_PROMPT =
  'You draft the first pass of a forensic council on why a company failed. ' +
  `Reply with one JSON object and nothing else. ${CITATION_RULES} ${COUNCIL_SCHEMA}`;

export const CRITIQUE_SYSTEM_PROMPT =
  'You review a draft forensic analysis for evidence grounding. ' +
  'Reply with one JSON object with keys supported_claims, unsupported_claims, missing_factors, rewrite_suggestions. ' +
  CITATION_RULES;

export const SYNTHESIS_SYSTEM_PROMPT =
  'You write the final consensus of a forensic council from a draft, a critique and a local quantitative check. ' +
  'Keep claims that at least two inputs support; drop or downgrade the rest. ' +
  'Record every conflict between inputs under disagreements. ' +
  `Reply with one JSON object and nothing else. ${CITATION_RULES} ${COUNCIL_SCHEMA}`;

export const ANSWER_SYSTEM_PROMPT =
  'You are a restructuring analyst answering follow-up questions about a forensic report. ' +
  'Use the report context and any web evidence. ' +
  'Reply with one JSON object with keys answer, rationale, caveat, confidence. Keep the answer short and actionable.';

export const VERIFY_SYSTEM_PROMPT =
  'Classify whether a company has failed. Reply with one JSON object with keys ' +
  'is_failed (boolean), status_label (failed|not_failed|unclear), confidence (0-1), ' +
  'reason (at most 20 words), evidence (at most 3 short bullets).';

export const REASONING_SYSTEM_PROMPT =
  'You explain why a distressed company failed and what its surviving peers did differently. ' +
  'Reply with one JSON object with keys plain_english_explainer (string, plain language), executive_summary (string), ' +
  'failure_drivers, survivor_differences, prevention_measures, technical_notes (each an array of 3 short strings).';

function contextJson(context: CouncilContext, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    company_profile: context.companyProfile,
    metrics: context.metrics,
    peer_summary: context.peerSummary,
    evidence_bundle: context.evidenceBundle,
    ...extra,
  });
}

export function buildDraftPrompt(context: CouncilContext): string {
  return `Draft the council analysis.\nContext JSON:\n${contextJson(context)}`;
}

export function buildCritiquePrompt(context: CouncilContext, draft: ProviderPayload): string {
  return `Check the draft against the same metrics and evidence.\nContext JSON:\n${contextJson(context, { draft })}`;
}

export function buildSynthesisPrompt(context: CouncilContext, inputs: SynthesisInputs): string {
  return `Merge the inputs into one consensus.\nContext JSON:\n${contextJson(context, {
    draft: inputs.draft,
    critique: inputs.critique,
    local_sanity_check: inputs.sanityCheck,
  })}`;
}

export function buildAnswerPrompt(
  question: string,
  reportContext: ProviderPayload,
  webEvidence: readonly ProviderPayload[],
): string {
  return `Question: ${question}\nReport context JSON:\n${JSON.stringify(reportContext)}\nWeb evidence JSON:\n${JSON.stringify(webEvidence)}`;
}

export function buildVerifyPrompt(request: FailureStatusRequest, combinedEvidence: string): string {
  return [
    'Has this company failed (bankruptcy, liquidation, insolvency or a comparable collapse)?',
    `Company input: ${request.companyInput}`,
    `Resolved name: ${request.resolvedName}`,
    `Ticker: ${request.ticker}`,
    `Web evidence:\n${combinedEvidence}`,
  ].join('\n');
}

export function buildReasoningPrompt(context: ReasoningContext): string {
  const payload = {
    company: context.companyName,
    ticker: context.ticker,
    industry: context.industry,
    failing_risk_score: context.failingRiskScore,
    survivor_tickers: context.survivorTickers,
    layer_signals: context.layerSignals,
    metric_gaps: context.metricGaps,
    simulation: context.simulation,
    recommendations: context.recommendations,
    search_notes: context.searchNotes.slice(0, 5),
  };
  return `Compare the failed company with its surviving peers and name concrete prevention steps.\nContext JSON:\n${JSON.stringify(payload)}`;
}
