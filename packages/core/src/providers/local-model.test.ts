import { describe, it, expect } from 'vitest';
import { LocalAnalystModel, vectorize, METRIC_DEFAULTS } from './local-model.js';

const DRIVER_PATTERN =
  /^(Leverage pressure|Liquidity cushion|Cash burn intensity|Revenue momentum|Macro pressure|Distress language intensity) is (increasing|reducing) risk\.$/;

const distressed = {
  debt_to_equity: 5,
  current_ratio: 0.4,
  cash_burn: 500_000_000,
  revenue: 1_000_000_000,
  revenue_growth: -0.4,
};

const healthy = {
  debt_to_equity: 0.3,
  current_ratio: 2.8,
  cash_burn: 0,
  revenue: 2_000_000_000,
  revenue_growth: 0.3,
};

describe('vectorize', () => {
  it('uses neutral defaults for missing metrics', () => {
    expect(vectorize({}, 40, 2)).toEqual([
      METRIC_DEFAULTS.debt_to_equity,
      METRIC_DEFAULTS.current_ratio,
      0,
      0,
      40,
      2,
    ]);
  });

  it('treats null and non-finite values as missing', () => {
    const x = vectorize({ debt_to_equity: null, current_ratio: Number.NaN }, 50, 0);
    expect(x[0]).toBe(1.6);
    expect(x[1]).toBe(1.1);
  });

  it('derives burn ratio from cash burn over absolute revenue, clamped to [0, 1]', () => {
    expect(vectorize({ cash_burn: 250, revenue: -1000 }, 50, 0)[2]).toBe(0.25);
    expect(vectorize({ cash_burn: 5000, revenue: 1000 }, 50, 0)[2]).toBe(1);
    expect(vectorize({ cash_burn: 10, revenue: 0 }, 50, 0)[2]).toBe(0.5);
  });
});

describe('LocalAnalystModel', () => {
  const model = new LocalAnalystModel();

  it('trains lazily on first predict', () => {
    const fresh = new LocalAnalystModel({ samples: 200, iterations: 20 });
    expect(fresh.isTrained).toBe(false);
    fresh.predict({}, 50, 0);
    expect(fresh.isTrained).toBe(true);
  });

  it('rates a distressed profile as high distress', () => {
    const result = model.predict(distressed, 80, 5);
    expect(result.risk_probability).toBeGreaterThan(0.6);
    expect(result.label).toBe('High Distress');
  });

  it('rates a healthy profile as lower distress', () => {
    const result = model.predict(healthy, 20, 0);
    expect(result.risk_probability).toBeLessThan(0.4);
    expect(result.label).toBe('Lower Distress');
  });

  it('ranks three phrased drivers', () => {
    const result = model.predict(distressed, 80, 5);
    expect(result.top_drivers).toHaveLength(3);
    for (const driver of result.top_drivers) {
      expect(driver).toMatch(DRIVER_PATTERN);
    }
  });

  it('reports the feature values it scored', () => {
    const result = model.predict(distressed, 80, 5);
    expect(result.feature_values).toEqual({
      debt_to_equity: 5,
      current_ratio: 0.4,
      burn_ratio: 0.5,
      revenue_growth: -0.4,
      macro_stress: 80,
      qualitative_intensity: 5,
    });
  });

  it('is deterministic for a given seed', () => {
    const a = new LocalAnalystModel({ seed: 7, samples: 500, iterations: 50 });
    const b = new LocalAnalystModel({ seed: 7, samples: 500, iterations: 50 });
    expect(a.predict(distressed, 60, 3).risk_probability).toBe(b.predict(distressed, 60, 3).risk_probability);
  });

  it('keeps probabilities inside [0, 1] for extreme inputs', () => {
    const result = model.predict({ debt_to_equity: 1e6, current_ratio: -1e6 }, 1e6, 1e6);
    expect(result.risk_probability).toBeGreaterThanOrEqual(0);
    expect(result.risk_probability).toBeLessThanOrEqual(1);
  });
});
