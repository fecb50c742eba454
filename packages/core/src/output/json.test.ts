import { describe, it, expect } from 'vitest';
import { normalizeCouncilOutput } from '../council/normalizer.js';
import { formatCouncilJson, parseCouncilReport } from './json.js';

const company = { name: 'Acme Retail', ticker: 'ACME' };
const date = new Date('2026-03-01T12:00:00Z');

const output = normalizeCouncilOutput({
  executive_summary: 'Leverage outran cash flow.',
  failure_drivers: [{ driver: 'Debt load', evidence_ids: [1], confidence: 0.8 }],
  overall_confidence: 0.6,
});

describe('formatCouncilJson', () => {
  it('wraps the report with metadata', () => {
    const parsed = JSON.parse(formatCouncilJson(output, { company, date, failureYear: 2023, durationMs: 4200 }));

    expect(parsed.metadata).toEqual({
      company: 'Acme Retail',
      ticker: 'ACME',
      failureYear: 2023,
      date: '2026-03-01T12:00:00.000Z',
      schemaVersion: 'v2',
      durationMs: 4200,
      durationFormatted: '4.2s',
    });
    expect(parsed.report.failure_drivers).toEqual([{ driver: 'Debt load', evidence_ids: [1], confidence: 0.8 }]);
  });

  it('leaves out optional metadata', () => {
    const parsed = JSON.parse(formatCouncilJson(output, { company, date }));

    expect(Object.keys(parsed.metadata)).toEqual(['company', 'ticker', 'date', 'schemaVersion']);
  });
});

describe('parseCouncilReport', () => {
  it('reads back a formatted report', () => {
    const document = parseCouncilReport(formatCouncilJson(output, { company, date }));

    expect(document.report).toEqual(output);
    expect(document.metadata.ticker).toBe('ACME');
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseCouncilReport('not json')).toThrow(/^Report is not valid JSON/);
  });

  it('rejects a document that breaks the schema', () => {
    const broken = JSON.parse(formatCouncilJson(output, { company, date }));
    broken.report.overall_confidence = 2;

    expect(() => parseCouncilReport(JSON.stringify(broken))).toThrow(
      'Report does not match the council output schema: report.overall_confidence: Number must be less than or equal to 1',
    );
  });
});
