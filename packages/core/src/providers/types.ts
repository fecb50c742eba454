/**
 * Reasoning provider contracts.
 *
 * A council run takes up to three providers: a primary LLM that drafts, a
 * secondary LLM that critiques, and a local statistical model for the
 * network-free sanity check. Each variant carries a `kind` tag and the
 * orchestrator dispatches on it.
 */

import type { EvidenceBundle } from '../evidence/types.js';
import type { ProviderPayload } from '../council/types.js';

/** Flat metric map from the metrics provider. Missing values are allowed. */
export type MetricMap = Readonly<Record<string, number | null | undefined>>;

export interface CompanyProfile {
  readonly name: string;
  readonly ticker: string;
  readonly industry?: string;
  readonly country?: string;
}

export interface PeerSummary {
  readonly survivor_tickers?: readonly string[];
  /** Metric name → gap versus survivors. Insertion order is ranking order. */
  readonly metric_gaps?: Readonly<Record<string, number | string | null>>;
  readonly [key: string]: unknown;
}

export interface SimulationResult {
  readonly adjusted_score?: number;
  readonly improvement_percentage?: number;
  /** Counterfactual metric map. */
  readonly adjusted_metrics?: MetricMap;
}

/** What every LLM stage sees. */
export interface CouncilContext {
  readonly companyProfile: CompanyProfile;
  readonly metrics: MetricMap;
  readonly peerSummary: PeerSummary;
  readonly evidenceBundle: EvidenceBundle;
}

export interface SynthesisInputs {
  readonly draft: ProviderPayload;
  readonly critique: ProviderPayload;
  readonly sanityCheck: ProviderPayload;
}

export interface QuestionAnswer {
  answer: string;
  rationale: string;
  caveat: string;
  confidence: string;
}

export interface FailureStatusRequest {
  readonly companyInput: string;
  readonly resolvedName: string;
  readonly ticker: string;
  /** Search engine's direct answer, if any. */
  readonly answer: string;
  readonly snippets: readonly string[];
}

export type FailureStatusLabel = 'failed' | 'not_failed' | 'unclear';

export interface FailureStatus {
  is_failed: boolean;
  status_label: FailureStatusLabel;
  confidence: number;
  reason: string;
  evidence: string[];
  model_used: string;
}

/** Context for the single-provider narrative. */
export interface ReasoningContext {
  readonly companyName: string;
  readonly ticker: string;
  readonly industry: string;
  readonly failingRiskScore: number;
  readonly survivorTickers: readonly string[];
  readonly layerSignals: Readonly<Record<string, readonly string[]>>;
  readonly metricGaps: Readonly<Record<string, number | string | null>>;
  readonly simulation: SimulationResult;
  readonly recommendations: readonly string[];
  readonly searchNotes: readonly string[];
}

export interface ReasoningNarrative {
  plain_english_explainer: string;
  executive_summary: string;
  failure_drivers: string[];
  survivor_differences: string[];
  prevention_measures: string[];
  technical_notes: string[];
  model_used: string;
}

/** Operations shared by both LLM variants. Every call resolves to an object or rejects. */
export interface ReasoningLLM {
  readonly name: string;
  generateDraft(context: CouncilContext): Promise<ProviderPayload>;
  generateCritique(context: CouncilContext, draft: ProviderPayload): Promise<ProviderPayload>;
  synthesize(context: CouncilContext, inputs: SynthesisInputs): Promise<ProviderPayload>;
  answerQuestion(question: string, reportContext: ProviderPayload, webEvidence: readonly ProviderPayload[]): Promise<QuestionAnswer>;
  verifyFailureStatus(request: FailureStatusRequest): Promise<FailureStatus>;
  generateReasoning(context: ReasoningContext): Promise<ReasoningNarrative>;
}

export interface PrimaryLLM extends ReasoningLLM {
  readonly kind: 'primary';
}

export interface SecondaryLLM extends ReasoningLLM {
  readonly kind: 'secondary';
}

export interface LocalPrediction {
  risk_probability: number;
  label: 'High Distress' | 'Moderate Distress' | 'Lower Distress';
  top_drivers: string[];
  feature_values: Record<string, number>;
}

export interface LocalModel {
  readonly kind: 'local';
  readonly name: string;
  predict(metrics: MetricMap, macroStress: number, qualitativeIntensity: number): LocalPrediction;
}

export type CouncilProvider = PrimaryLLM | SecondaryLLM | LocalModel;

export type Capability = 'draft' | 'critique' | 'synthesize' | 'ask' | 'sanity-check';

const LLM_CAPABILITIES: readonly Capability[] = ['draft', 'critique', 'synthesize', 'ask'];
const LOCAL_CAPABILITIES: readonly Capability[] = ['sanity-check'];

export function capabilitiesOf(provider: CouncilProvider): ReadonlySet<Capability> {
  switch (provider.kind) {
    case 'primary':
    case 'secondary':
      return new Set(LLM_CAPABILITIES);
    case 'local':
      return new Set(LOCAL_CAPABILITIES);
  }
}
