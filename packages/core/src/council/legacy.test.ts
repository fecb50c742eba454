import { describe, it, expect } from 'vitest';
import type { PrimaryLLM, ReasoningContext, ReasoningNarrative, SecondaryLLM } from '../providers/types.js';
import { FALLBACK_NARRATIVE, fallbackNarrative, generateLegacyReasoning, strengthenNarrative } from './legacy.js';

const context: ReasoningContext = {
  companyName: 'Acme Retail',
  ticker: 'ACME',
  industry: 'Retail',
  failingRiskScore: 71,
  survivorTickers: ['SRVA'],
  layerSignals: {
    macro: ['Rates rose sharply'],
    financial_health: ['Current ratio below 1'],
    operational: ['Inventory turns slowed'],
  },
  metricGaps: { debt_to_equity: 2.4, current_ratio: null, interest_coverage: -3.1, gross_margin: -0.05 },
  simulation: { adjusted_score: 48, improvement_percentage: 22.5 },
  recommendations: ['Refinance near-term maturities', 'Cut store count', 'Extend supplier terms', 'Sell real estate', 'Hedge rates'],
  searchNotes: [],
};

function narrative(overrides: Partial<ReasoningNarrative> = {}): ReasoningNarrative {
  return {
    plain_english_explainer: 'Debt grew faster than cash.',
    executive_summary: 'Leverage drove the failure.',
    failure_drivers: ['Leverage', 'Weak margins', 'Slow inventory'],
    survivor_differences: ['Survivors refinanced early'],
    prevention_measures: ['Refinance near-term maturities', 'Cut store count', 'Extend supplier terms', 'Sell real estate'],
    technical_notes: [],
    model_used: 'groq:llama-3.3-70b-versatile',
    ...overrides,
  };
}

function reasoner<K extends 'primary' | 'secondary'>(kind: K, generateReasoning: () => Promise<ReasoningNarrative>) {
  const unused = () => Promise.reject(new Error('not expected'));
  return {
    kind,
    name: kind,
    generateDraft: unused,
    generateCritique: unused,
    synthesize: unused,
    answerQuestion: unused,
    verifyFailureStatus: unused,
    generateReasoning,
  };
}

describe('generateLegacyReasoning', () => {
  it('returns the primary narrative', async () => {
    const primary: PrimaryLLM = reasoner('primary', async () => narrative());

    const result = await generateLegacyReasoning(context, { primary });

    expect(result.source).toBe('primary');
    expect(result.errors).toEqual({});
    expect(result.narrative.executive_summary).toBe('Leverage drove the failure.');
  });

  it('moves on to the secondary when the primary fails', async () => {
    const primary: PrimaryLLM = reasoner('primary', () => Promise.reject(new Error('HTTP 429 Too Many Requests')));
    const secondary: SecondaryLLM = reasoner('secondary', async () => narrative({ model_used: 'watsonx:granite' }));

    const result = await generateLegacyReasoning(context, { primary, secondary });

    expect(result.source).toBe('secondary');
    expect(result.errors).toEqual({ primary: 'HTTP 429 Too Many Requests' });
    expect(result.narrative.model_used).toBe('watsonx:granite');
  });

  it('rejects a narrative without a summary', async () => {
    const primary: PrimaryLLM = reasoner('primary', async () => narrative({ executive_summary: '  ' }));

    const result = await generateLegacyReasoning(context, { primary });

    expect(result.source).toBe('fallback');
    expect(result.errors).toEqual({ primary: 'narrative has no executive summary' });
  });

  it('falls back deterministically without providers', async () => {
    const result = await generateLegacyReasoning(context, {});

    expect(result.source).toBe('fallback');
    expect(result.narrative.model_used).toBe('fallback');
    expect(result.narrative.executive_summary).toBe(FALLBACK_NARRATIVE.summary);
    expect(result.narrative.failure_drivers).toEqual([
      'debt_to_equity: 2.4',
      'interest_coverage: -3.1',
      'gross_margin: -0.05',
    ]);
    expect(result.narrative.prevention_measures).toEqual([
      'Refinance near-term maturities',
      'Cut store count',
      'Extend supplier terms',
      'Sell real estate',
    ]);
  });
});

describe('fallbackNarrative', () => {
  it('uses placeholders with no gaps or recommendations', () => {
    const result = fallbackNarrative({ metricGaps: {}, recommendations: [] });

    expect(result.failure_drivers).toEqual([FALLBACK_NARRATIVE.noDrivers]);
    expect(result.prevention_measures).toEqual([FALLBACK_NARRATIVE.defaultMeasure]);
    expect(result.technical_notes).toEqual([FALLBACK_NARRATIVE.technicalNote]);
  });
});

describe('strengthenNarrative', () => {
  it('backfills drivers from layer signals in priority order', () => {
    const result = strengthenNarrative(narrative({ failure_drivers: ['Leverage'] }), context);

    expect(result.failure_drivers).toEqual(['Leverage', 'Current ratio below 1', 'Inventory turns slowed']);
  });

  it('tops up measures from recommendations without duplicates', () => {
    const result = strengthenNarrative(narrative({ prevention_measures: ['Cut store count'] }), context);

    expect(result.prevention_measures).toEqual([
      'Cut store count',
      'Refinance near-term maturities',
      'Extend supplier terms',
      'Sell real estate',
    ]);
  });

  it('fills a blank explainer', () => {
    const result = strengthenNarrative(narrative({ plain_english_explainer: '' }), context);

    expect(result.plain_english_explainer).toMatch(/^This company failed because debt and cash pressure/);
  });
});
