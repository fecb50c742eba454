import { describe, it, expect } from 'vitest';
import {
  applyFailureGuardrail,
  heuristicAnswer,
  heuristicFailureStatus,
  scanFailureEvidence,
} from './heuristics.js';
import type { FailureStatus } from './types.js';

const bankruptcyRequest = {
  companyInput: 'acme retail',
  resolvedName: 'Acme Retail Inc.',
  ticker: 'ACME',
  answer: 'Acme Retail filed for Chapter 11 in 2023.',
  snippets: ['The retailer entered liquidation after the bankruptcy court approved the sale.', '   ', 'Third snippet'],
};

describe('scanFailureEvidence', () => {
  it('curates at most two non-blank snippets and counts pattern hits', () => {
    const evidence = scanFailureEvidence(bankruptcyRequest);
    expect(evidence.curated).toEqual([
      'The retailer entered liquidation after the bankruptcy court approved the sale.',
      'Third snippet',
    ]);
    expect(evidence.combined).toBe(
      'Acme Retail filed for Chapter 11 in 2023.\n' +
      'The retailer entered liquidation after the bankruptcy court approved the sale.\n' +
      'Third snippet',
    );
    // filed for chapter 11, bankruptcy, entered liquidation
    expect(evidence.failureHits).toBe(3);
    expect(evidence.negatingHits).toBe(0);
  });

  it('counts negating language', () => {
    const evidence = scanFailureEvidence({ answer: 'The company did not file and remains operational.', snippets: [] });
    expect(evidence.negatingHits).toBe(2);
  });
});

describe('applyFailureGuardrail', () => {
  const notFailed: FailureStatus = {
    is_failed: false,
    status_label: 'not_failed',
    confidence: 0.4,
    reason: 'Operating normally.',
    evidence: [],
    model_used: 'groq:llama-3.3-70b-versatile',
  };

  it('forces a failed verdict on strong bankruptcy language', () => {
    const result = applyFailureGuardrail(notFailed, scanFailureEvidence(bankruptcyRequest));
    expect(result.is_failed).toBe(true);
    expect(result.status_label).toBe('failed');
    expect(result.confidence).toBe(0.75);
    expect(result.model_used).toBe('groq:llama-3.3-70b-versatile');
  });

  it('leaves the verdict alone when negating language is present', () => {
    const evidence = scanFailureEvidence({
      answer: 'Reports of bankruptcy and insolvency were denied; no chapter 11 was filed.',
      snippets: [],
    });
    expect(applyFailureGuardrail(notFailed, evidence)).toBe(notFailed);
  });

  it('leaves the verdict alone on a single hit', () => {
    const evidence = scanFailureEvidence({ answer: 'Stores shut down in two states.', snippets: [] });
    expect(applyFailureGuardrail(notFailed, evidence)).toBe(notFailed);
  });
});

describe('heuristicFailureStatus', () => {
  it('flags any failure language at 0.55 confidence', () => {
    expect(heuristicFailureStatus(bankruptcyRequest)).toEqual({
      is_failed: true,
      status_label: 'failed',
      confidence: 0.55,
      reason: 'Keyword classification; no reasoning model was available.',
      evidence: [
        'The retailer entered liquidation after the bankruptcy court approved the sale.',
        'Third snippet',
      ],
      model_used: 'fallback',
    });
  });

  it('reports not_failed without failure language', () => {
    const result = heuristicFailureStatus({ ...bankruptcyRequest, answer: 'Quarterly sales rose.', snippets: [] });
    expect(result.is_failed).toBe(false);
    expect(result.status_label).toBe('not_failed');
  });
});

describe('heuristicAnswer', () => {
  const report = {
    failure_drivers: [{ driver: 'Debt load outpaced cash generation', evidence_ids: [1], confidence: 0.7 }],
    final_recommendations: [{ action: 'Refinance the 2025 notes', expected_effect: 'Lower interest', confidence: 0.6 }],
    counterfactual_impact: { before_score: 78.5, after_score: 60, improvement_pct: 23.6 },
  };

  it('answers "first step" questions with the top recommendation', () => {
    const result = heuristicAnswer('What should they have done first?', report);
    expect(result.answer).toBe('Refinance the 2025 notes');
    expect(result.rationale).toBe(
      'Baseline risk is 78.5 and the simulated improvement is 23.6%, so near-term liquidity and capital-structure actions dominate.',
    );
    expect(result.confidence).toBe('0.62');
  });

  it('answers "why" questions with the top driver', () => {
    expect(heuristicAnswer('Why did it fail?', report).answer).toBe('Debt load outpaced cash generation');
  });

  it('falls back to a generic action for an empty report', () => {
    const result = heuristicAnswer('Anything else?', {});
    expect(result.answer).toBe('Prioritize liquidity and deleveraging in the first 90 days.');
    expect(result.rationale).toContain('Baseline risk is N/A');
  });
});
