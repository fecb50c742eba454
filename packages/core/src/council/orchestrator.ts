/**
 * Collaborative reasoning council.
 *
 * One run walks DRAFTING → CRITIQUING_AND_SANITY → SYNTHESIZING →
 * SYNTHESIS_FAILOVER (conditional) → NORMALIZING. Provider failures are
 * recorded per breakdown slot and never escape `run()`: the caller always
 * receives a complete, normalized CouncilOutput.
 */

import { EventEmitter } from 'eventemitter3';
import { evidenceIds, summarizeSignals } from '../evidence/bundle.js';
import type { SignalSummary } from '../evidence/types.js';
import { summarizeProviderError, isQuotaError } from '../providers/errors.js';
import {
  capabilitiesOf,
  type Capability,
  type CouncilContext,
  type CouncilProvider,
  type LocalModel,
  type PrimaryLLM,
  type ReasoningLLM,
  type SecondaryLLM,
  type SimulationResult,
} from '../providers/types.js';
import { ProviderNotConfiguredError, withTimeout } from '../router/retry.js';
import { defaultCouncilCache, councilCacheKey, deepFreeze, type CouncilCache } from './cache.js';
import { citationCoverage, repairClaims } from './citations.js';
import { asArray, isRecord } from './coerce.js';
import { runConcurrentPair } from './concurrency.js';
import { agreementConfidence, AGREEMENT_WEIGHTS, type AgreementWeights } from './confidence.js';
import { runFailoverChain, type FailoverCandidate } from './failover.js';
import { consensusFallback, fallbackDraft, CONSENSUS_FALLBACK_CONFIDENCE } from './fallback.js';
import { normalizeCouncilOutput } from './normalizer.js';
import { runSanityCheck, type SanityReport } from './sanity.js';
import type { BreakdownKey, CouncilOutput, ModelBreakdownEntry, ProviderPayload } from './types.js';

export const DEFAULT_STAGE_TIMEOUT_MS = 60_000;
export const DEFAULT_MACRO_STRESS = 50;

export type SynthesisRole = 'primary' | 'secondary';

export interface CouncilProviders {
  primary?: PrimaryLLM;
  secondary?: SecondaryLLM;
  local?: LocalModel;
}

export interface CouncilInput extends CouncilContext {
  simulation: SimulationResult;
  /** Prior recommendations from the scenario engine, best first. */
  recommendations: readonly string[];
  /** Externally computed 0-100 risk score. */
  failingRiskScore: number;
  macroStressScore?: number;
  qualitativeIntensity?: number;
  failureYear?: number | null;
  providers: CouncilProviders;
  /** Preferred synthesis provider. Defaults to 'secondary'. */
  synthesisProvider?: string;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type CouncilStage = 'draft' | 'critique' | 'sanity' | 'synthesis';

export interface CouncilStartEvent {
  key: string;
  company: string;
  ticker: string;
}

export interface CouncilCacheHitEvent {
  key: string;
  output: CouncilOutput;
}

export interface CouncilStageStartEvent {
  stage: CouncilStage;
  provider: BreakdownKey;
}

export interface CouncilStageCompleteEvent {
  stage: CouncilStage;
  provider: BreakdownKey;
  latencyMs: number;
}

export interface CouncilStageErrorEvent {
  stage: CouncilStage;
  provider: BreakdownKey;
  error: string;
  latencyMs: number;
}

export interface SynthesisFailoverEvent {
  /** The requested provider, as given. */
  from: string;
  to: SynthesisRole;
  reason: string;
}

export interface CouncilCompleteEvent {
  key: string;
  output: CouncilOutput;
  durationMs: number;
  /** True when synthesis failed everywhere and the consensus fallback was used. */
  usedFallback: boolean;
}

export interface CouncilEvents {
  'council:start': (event: CouncilStartEvent) => void;
  'council:cache-hit': (event: CouncilCacheHitEvent) => void;
  'stage:start': (event: CouncilStageStartEvent) => void;
  'stage:complete': (event: CouncilStageCompleteEvent) => void;
  'stage:error': (event: CouncilStageErrorEvent) => void;
  'synthesis:failover': (event: SynthesisFailoverEvent) => void;
  'council:complete': (event: CouncilCompleteEvent) => void;
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export interface CouncilOrchestratorOptions {
  cache?: CouncilCache;
  /** Wait bound for each provider call. */
  stageTimeoutMs?: number;
  /** Millisecond clock, injectable for tests. */
  clock?: () => number;
  weights?: Readonly<AgreementWeights>;
}

interface Slot {
  raw: ProviderPayload;
  latencyMs: number;
  error?: string;
}

type Slots = Record<BreakdownKey, Slot>;

interface SynthesisRoute {
  role: SynthesisRole;
  provider: PrimaryLLM | SecondaryLLM;
  /** Set when the route differs from what was asked for. */
  reason?: string;
}

export class CouncilOrchestrator extends EventEmitter<CouncilEvents> {
  private readonly cache: CouncilCache;
  private readonly stageTimeoutMs: number;
  private readonly clock: () => number;
  private readonly weights: Readonly<AgreementWeights>;

  constructor(options: CouncilOrchestratorOptions = {}) {
    super();
    this.cache = options.cache ?? defaultCouncilCache;
    this.stageTimeoutMs = options.stageTimeoutMs ?? DEFAULT_STAGE_TIMEOUT_MS;
    this.clock = options.clock ?? Date.now;
    this.weights = options.weights ?? AGREEMENT_WEIGHTS;
  }

  /** Never rejects. */
  async run(input: CouncilInput): Promise<CouncilOutput> {
    try {
      return await this.execute(input);
    } catch (err) {
      return this.abortedOutput(input, summarizeProviderError(err) ?? 'council run failed');
    }
  }

  private async execute(input: CouncilInput): Promise<CouncilOutput> {
    const key = councilCacheKey({
      companyName: input.companyProfile.name,
      ticker: input.companyProfile.ticker,
      failureYear: input.failureYear,
    });

    const cached = await this.cache.get(key);
    if (cached) {
      this.emit('council:cache-hit', { key, output: cached });
      return cached;
    }

    const started = this.clock();
    this.emit('council:start', { key, company: input.companyProfile.name, ticker: input.companyProfile.ticker });

    const context: CouncilContext = {
      companyProfile: input.companyProfile,
      metrics: input.metrics,
      peerSummary: input.peerSummary,
      evidenceBundle: input.evidenceBundle,
    };
    const available = evidenceIds(input.evidenceBundle);
    const slots: Slots = {
      primary: { raw: {}, latencyMs: 0 },
      secondary: { raw: {}, latencyMs: 0 },
      local: { raw: {}, latencyMs: 0 },
    };

    const draft = await this.runDraft(input, context, slots.primary);
    await this.runCritiqueAndSanity(input, context, draft, slots);
    const synthesized = await this.runSynthesis(input, context, draft, slots);

    const usedFallback = synthesized === undefined;
    const final = synthesized ?? consensusFallback({
      draft,
      peerSummary: input.peerSummary,
      recommendations: input.recommendations,
      simulation: input.simulation,
      failingRiskScore: input.failingRiskScore,
    });

    const failureDrivers = repairClaims(final.failure_drivers, available, 'driver');
    const survivorStrategies = repairClaims(final.survivor_strategies, available, 'strategy');

    const overallConfidence = usedFallback
      ? CONSENSUS_FALLBACK_CONFIDENCE
      : agreementConfidence({
        primaryOk: slots.primary.error === undefined,
        secondaryOk: slots.secondary.error === undefined,
        localOk: slots.local.error === undefined,
        evidenceCoverage: citationCoverage(failureDrivers, survivorStrategies),
        disagreementCount: asArray(final.disagreements).length,
      }, this.weights);

    const signalSummary = summarizeSignals(input.evidenceBundle);
    const output = deepFreeze(normalizeCouncilOutput({
      ...final,
      failure_drivers: failureDrivers,
      survivor_strategies: survivorStrategies,
      overall_confidence: overallConfidence,
      model_breakdown: breakdown(slots, signalSummary),
      signal_summary: signalSummary,
    }));

    // A concurrent run for the same key may have stored first; its entry wins
    const stored = await this.cache.set(key, output);
    this.emit('council:complete', {
      key,
      output: stored,
      durationMs: elapsed(started, this.clock),
      usedFallback,
    });
    return stored;
  }

  private async runDraft(input: CouncilInput, context: CouncilContext, slot: Slot): Promise<ProviderPayload> {
    const primary = capable(input.providers.primary, 'draft');
    const fallback = () => fallbackDraft({
      peerSummary: input.peerSummary,
      recommendations: input.recommendations,
      simulation: input.simulation,
    });

    if (!primary) {
      slot.error = notConfigured('primary');
      slot.raw = fallback();
      this.emit('stage:error', { stage: 'draft', provider: 'primary', error: slot.error, latencyMs: 0 });
      return slot.raw;
    }

    this.emit('stage:start', { stage: 'draft', provider: 'primary' });
    const started = this.clock();
    try {
      slot.raw = await withTimeout(primary.generateDraft(context), this.stageTimeoutMs);
      slot.latencyMs = elapsed(started, this.clock);
      this.emit('stage:complete', { stage: 'draft', provider: 'primary', latencyMs: slot.latencyMs });
    } catch (err) {
      slot.latencyMs = elapsed(started, this.clock);
      slot.error = summarizeProviderError(err) ?? 'primary draft failed';
      slot.raw = fallback();
      this.emit('stage:error', { stage: 'draft', provider: 'primary', error: slot.error, latencyMs: slot.latencyMs });
    }
    return slot.raw;
  }

  private async runCritiqueAndSanity(
    input: CouncilInput,
    context: CouncilContext,
    draft: ProviderPayload,
    slots: Slots,
  ): Promise<void> {
    const secondary = capable(input.providers.secondary, 'critique');
    if (secondary) this.emit('stage:start', { stage: 'critique', provider: 'secondary' });
    this.emit('stage:start', { stage: 'sanity', provider: 'local' });

    const [critique, sanity] = await runConcurrentPair(
      async () => {
        if (!secondary) throw new ProviderNotConfiguredError(notConfigured('secondary'));
        return secondary.generateCritique(context, draft);
      },
      async () => runSanityCheck(capable(input.providers.local, 'sanity-check'), {
        metrics: input.metrics,
        macroStressScore: input.macroStressScore ?? DEFAULT_MACRO_STRESS,
        qualitativeIntensity: input.qualitativeIntensity ?? 0,
        failingRiskScore: input.failingRiskScore,
        simulation: input.simulation,
      }),
      { timeoutMs: this.stageTimeoutMs, now: this.clock },
    );

    const critiqueSlot = slots.secondary;
    critiqueSlot.latencyMs = critique.latencyMs;
    if (critique.ok) {
      critiqueSlot.raw = critique.value;
    } else {
      critiqueSlot.error = summarizeProviderError(critique.error) ?? 'secondary critique failed';
    }
    this.reportStage('critique', 'secondary', critiqueSlot);

    const localSlot = slots.local;
    localSlot.latencyMs = sanity.latencyMs;
    if (sanity.ok && sanity.value.error === undefined) {
      localSlot.raw = sanityPayload(sanity.value.report);
    } else {
      localSlot.error = sanity.ok
        ? sanity.value.error
        : summarizeProviderError(sanity.error) ?? 'local sanity check failed';
    }
    this.reportStage('sanity', 'local', localSlot);
  }

  /** Resolves to undefined when no provider produced a usable synthesis. */
  private async runSynthesis(
    input: CouncilInput,
    context: CouncilContext,
    draft: ProviderPayload,
    slots: Slots,
  ): Promise<ProviderPayload | undefined> {
    const requested = input.synthesisProvider ?? 'secondary';
    const route = resolveSynthesisRoute(requested, input.providers);
    if (!route) return undefined;

    if (route.reason) {
      this.emit('synthesis:failover', { from: requested, to: route.role, reason: route.reason });
    }

    const synthesisInputs = {
      draft,
      critique: slots.secondary.raw,
      sanityCheck: slots.local.raw,
    };
    const candidate = (role: SynthesisRole, provider: ReasoningLLM): FailoverCandidate<ProviderPayload> => ({
      name: role,
      invoke: () => {
        this.emit('stage:start', { stage: 'synthesis', provider: role });
        return withTimeout(provider.synthesize(context, synthesisInputs), this.stageTimeoutMs);
      },
    });

    const candidates = [candidate(route.role, route.provider)];
    const primary = capable(input.providers.primary, 'synthesize');
    const canFailOver = route.role === 'secondary' && primary !== undefined;
    if (canFailOver) {
      candidates.push({
        name: 'primary',
        invoke: () => {
          this.emit('synthesis:failover', {
            from: 'secondary',
            to: 'primary',
            reason: 'secondary synthesis failed',
          });
          return candidate('primary', primary).invoke();
        },
      });
    }

    const result = await runFailoverChain({
      candidates,
      validate: value => isRecord(value) && Object.keys(value).length > 0 ? true : 'synthesis returned an empty object',
      now: this.clock,
    });

    for (const [index, attempt] of result.attempts.entries()) {
      const role: SynthesisRole = index === 0 ? route.role : 'primary';
      const slot = slots[role];
      slot.latencyMs = Math.max(slot.latencyMs, attempt.latencyMs);
      if (attempt.ok) {
        this.emit('stage:complete', { stage: 'synthesis', provider: role, latencyMs: attempt.latencyMs });
        continue;
      }
      const error = attempt.error ?? `${role} synthesis failed`;
      // The first synthesis failure replaces the provider's earlier error; a retry failure is appended
      if (index === 0) {
        slot.error = error;
      } else {
        slot.error = slot.error ? `${slot.error} | ${error}` : error;
      }
      this.emit('stage:error', { stage: 'synthesis', provider: role, error, latencyMs: attempt.latencyMs });
    }

    if (canFailOver && result.source === 'primary') {
      slots.secondary.error = failoverNote(slots.secondary.error);
    }
    return result.value;
  }

  private reportStage(stage: CouncilStage, provider: BreakdownKey, slot: Slot): void {
    if (slot.error === undefined) {
      this.emit('stage:complete', { stage, provider, latencyMs: slot.latencyMs });
    } else {
      this.emit('stage:error', { stage, provider, error: slot.error, latencyMs: slot.latencyMs });
    }
  }

  /** Output for a run that failed outside any provider call, such as a cache or listener error. */
  private abortedOutput(input: CouncilInput, error: string): CouncilOutput {
    const available = evidenceIds(input.evidenceBundle);
    const draft = fallbackDraft({
      peerSummary: input.peerSummary,
      recommendations: input.recommendations,
      simulation: input.simulation,
    });
    const final = consensusFallback({
      draft,
      peerSummary: input.peerSummary,
      recommendations: input.recommendations,
      simulation: input.simulation,
      failingRiskScore: input.failingRiskScore,
    });
    const slot = (): Slot => ({ raw: {}, latencyMs: 0, error });
    const signalSummary = summarizeSignals(input.evidenceBundle);
    return deepFreeze(normalizeCouncilOutput({
      ...final,
      failure_drivers: repairClaims(final.failure_drivers, available, 'driver'),
      survivor_strategies: repairClaims(final.survivor_strategies, available, 'strategy'),
      model_breakdown: breakdown({ primary: slot(), secondary: slot(), local: slot() }, signalSummary),
      signal_summary: signalSummary,
    }));
  }
}

/** One-shot helper: build an orchestrator and run it. */
export function runCouncil(input: CouncilInput, options: CouncilOrchestratorOptions = {}): Promise<CouncilOutput> {
  return new CouncilOrchestrator(options).run(input);
}

/**
 * Pick the synthesis provider. A recognized preference with a configured
 * provider is used as is; anything else falls back to whichever provider
 * exists, secondary first.
 */
export function resolveSynthesisRoute(requested: string, providers: CouncilProviders): SynthesisRoute | undefined {
  const primary = capable(providers.primary, 'synthesize');
  const secondary = capable(providers.secondary, 'synthesize');
  if (requested === 'secondary' && secondary) {
    return { role: 'secondary', provider: secondary };
  }
  if (requested === 'primary' && primary) {
    return { role: 'primary', provider: primary };
  }

  const recognized = requested === 'primary' || requested === 'secondary';
  const reason = recognized
    ? `${requested} provider not configured`
    : `unrecognized synthesis provider "${requested}"`;
  if (secondary) return { role: 'secondary', provider: secondary, reason };
  if (primary) return { role: 'primary', provider: primary, reason };
  return undefined;
}

/** The provider, when it is present and declares `capability`. */
function capable<P extends CouncilProvider>(provider: P | undefined, capability: Capability): P | undefined {
  return provider && capabilitiesOf(provider).has(capability) ? provider : undefined;
}

function failoverNote(secondaryError: string | undefined): string {
  if (!secondaryError) {
    return 'secondary synthesis unavailable; synthesis automatically failed over to the primary provider.';
  }
  const note = isQuotaError(secondaryError)
    ? 'secondary quota/permission blocked; synthesis automatically failed over to the primary provider.'
    : 'secondary synthesis failed; synthesis automatically failed over to the primary provider.';
  return `${secondaryError} | ${note}`;
}

function breakdown(slots: Slots, signalSummary: SignalSummary): Record<BreakdownKey, ModelBreakdownEntry> {
  const entry = (slot: Slot): ModelBreakdownEntry => ({
    raw: slot.raw,
    latency_ms: slot.latencyMs,
    ...(slot.error ? { errors: slot.error } : {}),
    signal_summary: signalSummary,
  });
  return { primary: entry(slots.primary), secondary: entry(slots.secondary), local: entry(slots.local) };
}

function sanityPayload(report: SanityReport): ProviderPayload {
  return {
    failure_probability: report.failure_probability,
    counterfactual_probability: report.counterfactual_probability,
    top_numeric_drivers: [...report.top_numeric_drivers],
    narrative_alignment_flags: [...report.narrative_alignment_flags],
    feature_values: { ...report.feature_values },
  };
}

function notConfigured(role: BreakdownKey): string {
  return `${role} provider not configured`;
}

function elapsed(started: number, clock: () => number): number {
  return Math.max(0, Math.round(clock() - started));
}
