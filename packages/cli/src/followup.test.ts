import { describe, it, expect, vi } from 'vitest';
import {
  formatCouncilJson,
  normalizeCouncilOutput,
  parseCouncilReport,
  type FailureStatus,
  type ReasoningLLM,
} from '@autopsy/core';
import { emptySearchResult, type EvidenceSearch, type SearchOptions, type SearchResult } from '@autopsy/tools';
import { askReport, reportContext, verifyCompany } from './followup.js';

const profile = { name: 'Acme Corp', ticker: 'ACME', industry: 'Retail' };

const document = parseCouncilReport(formatCouncilJson(
  normalizeCouncilOutput({
    executive_summary: 'Acme ran out of liquidity.',
    failure_drivers: [{ driver: 'Debt overhang', evidence_ids: [], confidence: 0.6 }],
    final_recommendations: [{ action: 'Cut leverage', expected_effect: 'Lower interest burden', confidence: 0.5 }],
    counterfactual_impact: { before_score: 80, after_score: 60, improvement_pct: 25 },
    overall_confidence: 0.7,
  }),
  { company: profile, date: new Date('2024-01-02T00:00:00Z') },
));

class FakeSearch implements EvidenceSearch {
  readonly calls: Array<{ query: string; options?: SearchOptions }> = [];

  constructor(private readonly result: Partial<SearchResult>, readonly enabled = true) {}

  async search(query: string, options?: SearchOptions): Promise<SearchResult> {
    this.calls.push({ query, options });
    return { ...emptySearchResult(query), ...this.result };
  }
}

function fakeLLM(overrides: Partial<ReasoningLLM> = {}): ReasoningLLM {
  const unused = () => Promise.reject(new Error('not used'));
  return {
    name: 'fake',
    generateDraft: unused,
    generateCritique: unused,
    synthesize: unused,
    answerQuestion: unused,
    verifyFailureStatus: unused,
    generateReasoning: unused,
    ...overrides,
  };
}

describe('reportContext', () => {
  it('carries the company and the report sections', () => {
    const context = reportContext(document);
    expect(context.company).toEqual({ name: 'Acme Corp', ticker: 'ACME', industry: 'Retail' });
    expect(context.executive_summary).toBe('Acme ran out of liquidity.');
    expect(context.overall_confidence).toBe(0.7);
  });
});

describe('askReport', () => {
  it('answers from the report when no model is configured', async () => {
    const result = await askReport({ document, question: 'Why did it fail?' });

    expect(result.source).toBe('heuristic');
    expect(result.answer.answer).toBe('Debt overhang');
    expect(result.answer.rationale).toBe(
      'Baseline risk is 80 and the simulated improvement is 25%, so near-term liquidity and capital-structure actions dominate.',
    );
    expect(result.error).toBe('no reasoning provider configured');
    expect(result.webEvidence).toEqual([]);
  });

  it('passes web evidence and the report context to the model', async () => {
    const search = new FakeSearch({ snippets: ['first snippet', 'second snippet'], sources: ['https://a.test'] });
    const answerQuestion = vi.fn(async () => ({
      answer: 'Sell the loss-making stores.',
      rationale: 'They burn cash.',
      caveat: '',
      confidence: '0.7',
    }));

    const result = await askReport({
      document,
      question: 'What first?',
      answerer: fakeLLM({ answerQuestion }),
      search,
    });

    expect(result.source).toBe('model');
    expect(result.answer.answer).toBe('Sell the loss-making stores.');
    expect(search.calls.map(call => call.query)).toEqual([
      'Acme Corp ACME What first?',
      'Retail distressed company survivor strategies What first?',
    ]);
    expect(search.calls[0].options).toEqual({ maxResults: 4 });
    expect(result.webEvidence).toEqual([
      { snippet: 'first snippet', source: 'https://a.test' },
      { snippet: 'second snippet', source: '' },
      { snippet: 'first snippet', source: 'https://a.test' },
      { snippet: 'second snippet', source: '' },
    ]);
    expect(answerQuestion).toHaveBeenCalledWith('What first?', reportContext(document), result.webEvidence);
  });

  it('falls back to the heuristic when the model fails', async () => {
    const result = await askReport({
      document,
      question: 'What should they do first?',
      answerer: fakeLLM({ answerQuestion: () => Promise.reject(new Error('HTTP 429  Too Many Requests')) }),
    });

    expect(result.source).toBe('heuristic');
    expect(result.answer.answer).toBe('Cut leverage');
    expect(result.error).toBe('HTTP 429 Too Many Requests');
  });

  it('skips the web search when it is disabled', async () => {
    const search = new FakeSearch({ snippets: ['unused'] }, false);
    const result = await askReport({ document, question: 'Why?', search });

    expect(search.calls).toEqual([]);
    expect(result.webEvidence).toEqual([]);
  });
});

describe('verifyCompany', () => {
  const failureEvidence = {
    answer: 'Acme filed for Chapter 11 in 2020.',
    snippets: ['Acme Corp filed for bankruptcy protection.'],
    sources: ['https://failure.test'],
  };

  it('classifies by keywords when no model is configured', async () => {
    const search = new FakeSearch(failureEvidence);
    const result = await verifyCompany({ companyInput: 'acme', profile, search });

    expect(search.calls).toEqual([{
      query: 'Did Acme Corp ACME fail: chapter 11 bankruptcy liquidation insolvency collapse',
      options: { maxResults: 5 },
    }]);
    expect(result.status).toEqual({
      is_failed: true,
      status_label: 'failed',
      confidence: 0.55,
      reason: 'Keyword classification; no reasoning model was available.',
      evidence: ['Acme Corp filed for bankruptcy protection.'],
      model_used: 'fallback',
    });
    expect(result.sources).toEqual(['https://failure.test']);
    expect(result.error).toBe('no reasoning provider configured');
  });

  it('asks the model with the failure-check evidence', async () => {
    const verdict: FailureStatus = {
      is_failed: true,
      status_label: 'failed',
      confidence: 0.9,
      reason: 'Chapter 11 filing in 2020.',
      evidence: ['Acme filed for Chapter 11 in 2020.'],
      model_used: 'llama-3.3-70b-versatile',
    };
    const verifyFailureStatus = vi.fn(async () => verdict);

    const result = await verifyCompany({
      companyInput: 'acme',
      profile,
      search: new FakeSearch(failureEvidence),
      verifier: fakeLLM({ verifyFailureStatus }),
    });

    expect(result.status).toBe(verdict);
    expect(result.error).toBeUndefined();
    expect(verifyFailureStatus).toHaveBeenCalledWith({
      companyInput: 'acme',
      resolvedName: 'Acme Corp',
      ticker: 'ACME',
      answer: 'Acme filed for Chapter 11 in 2020.',
      snippets: ['Acme Corp filed for bankruptcy protection.'],
    });
  });

  it('falls back to keywords when the model fails', async () => {
    const result = await verifyCompany({
      companyInput: 'acme',
      profile,
      search: new FakeSearch(failureEvidence),
      verifier: fakeLLM({ verifyFailureStatus: () => Promise.reject(new Error('quota exceeded')) }),
    });

    expect(result.status.model_used).toBe('fallback');
    expect(result.status.is_failed).toBe(true);
    expect(result.error).toBe('quota exceeded');
  });

  it('reports not failed when there is no evidence at all', async () => {
    const result = await verifyCompany({ companyInput: 'acme', profile });

    expect(result.status.status_label).toBe('not_failed');
    expect(result.status.evidence).toEqual([]);
    expect(result.sources).toEqual([]);
  });
});
