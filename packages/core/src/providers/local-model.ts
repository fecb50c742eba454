/**
 * Local analyst model.
 *
 * A logistic regression over six distress features, trained on a seeded
 * synthetic sample of distressed-vs-survivor outcomes. No network, no
 * native dependencies; the same seed always yields the same model.
 */

import { clamp } from '../council/coerce.js';
import type { LocalModel, LocalPrediction, MetricMap } from './types.js';

export const LOCAL_FEATURES = [
  'debt_to_equity',
  'current_ratio',
  'burn_ratio',
  'revenue_growth',
  'macro_stress',
  'qualitative_intensity',
] as const;

export type LocalFeature = typeof LOCAL_FEATURES[number];

const DRIVER_NAMES: Record<LocalFeature, string> = {
  debt_to_equity: 'Leverage pressure',
  current_ratio: 'Liquidity cushion',
  burn_ratio: 'Cash burn intensity',
  revenue_growth: 'Revenue momentum',
  macro_stress: 'Macro pressure',
  qualitative_intensity: 'Distress language intensity',
};

/** Neutral values for metrics the provider could not compute. */
export const METRIC_DEFAULTS = {
  debt_to_equity: 1.6,
  current_ratio: 1.1,
  cash_burn: 0,
  revenue: 1_000_000_000,
  revenue_growth: 0,
} as const;

export interface LocalAnalystModelOptions {
  seed?: number;
  samples?: number;
  iterations?: number;
  learningRate?: number;
}

interface FittedModel {
  means: number[];
  scales: number[];
  weights: number[];
  bias: number;
}

export class LocalAnalystModel implements LocalModel {
  readonly kind = 'local' as const;
  readonly name = 'local';
  private readonly seed: number;
  private readonly samples: number;
  private readonly iterations: number;
  private readonly learningRate: number;
  private fitted: FittedModel | null = null;

  constructor(options: LocalAnalystModelOptions = {}) {
    this.seed = options.seed ?? 42;
    this.samples = options.samples ?? 6000;
    this.iterations = options.iterations ?? 400;
    this.learningRate = options.learningRate ?? 0.5;
  }

  get isTrained(): boolean {
    return this.fitted !== null;
  }

  /** Fit on a fresh synthetic sample. Called lazily by `predict`. */
  train(): void {
    const { rows, labels } = syntheticSample(this.samples, this.seed);
    this.fitted = fitLogistic(rows, labels, this.iterations, this.learningRate);
  }

  predict(metrics: MetricMap, macroStress: number, qualitativeIntensity: number): LocalPrediction {
    if (!this.fitted) this.train();
    const model = this.fitted;
    if (!model) throw new Error('Local model failed to train');

    const x = vectorize(metrics, macroStress, qualitativeIntensity);
    const z = x.map((value, i) => (value - model.means[i]) / model.scales[i]);
    const contributions = z.map((value, i) => value * model.weights[i]);
    const probability = sigmoid(contributions.reduce((sum, c) => sum + c, model.bias));

    const ranked = contributions
      .map((contribution, index) => ({ contribution, feature: LOCAL_FEATURES[index] }))
      .sort((a, b) => Math.abs(b.contribution) - Math.abs(a.contribution))
      .slice(0, 3);

    const featureValues: Record<string, number> = {};
    LOCAL_FEATURES.forEach((feature, i) => {
      featureValues[feature] = x[i];
    });

    return {
      risk_probability: probability,
      label: probability >= 0.6 ? 'High Distress' : probability >= 0.4 ? 'Moderate Distress' : 'Lower Distress',
      top_drivers: ranked.map(({ feature, contribution }) =>
        `${DRIVER_NAMES[feature]} is ${contribution > 0 ? 'increasing' : 'reducing'} risk.`),
      feature_values: featureValues,
    };
  }
}

/** Feature vector in `LOCAL_FEATURES` order. */
export function vectorize(metrics: MetricMap, macroStress: number, qualitativeIntensity: number): number[] {
  const metric = (key: keyof typeof METRIC_DEFAULTS): number => {
    const value = metrics[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : METRIC_DEFAULTS[key];
  };

  const revenue = Math.abs(metric('revenue'));
  const burnRatio = revenue > 0 ? clamp(metric('cash_burn') / revenue) : 0.5;

  return [
    metric('debt_to_equity'),
    metric('current_ratio'),
    burnRatio,
    metric('revenue_growth'),
    Number.isFinite(macroStress) ? macroStress : 50,
    Number.isFinite(qualitativeIntensity) ? qualitativeIntensity : 0,
  ];
}

function syntheticSample(n: number, seed: number): { rows: number[][]; labels: number[] } {
  const random = mulberry32(seed);
  const uniform = (low: number, high: number) => low + (high - low) * random();
  const normal = (sd: number) => {
    // Box-Muller
    const u = Math.max(random(), Number.EPSILON);
    const v = random();
    return sd * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  };

  const rows: number[][] = [];
  const labels: number[] = [];
  for (let i = 0; i < n; i++) {
    const de = uniform(0, 6);
    const cr = uniform(0.3, 3);
    const br = uniform(0, 0.9);
    const rg = uniform(-0.6, 0.4);
    const ms = uniform(15, 100);
    const qi = Math.floor(uniform(0, 7));
    const latent = 1.25 * de - 1.1 * cr + 1.45 * br - 2.0 * rg + 0.022 * ms + 0.35 * qi - 2.4;
    rows.push([de, cr, br, rg, ms, qi]);
    labels.push(latent + normal(0.65) > 0 ? 1 : 0);
  }
  return { rows, labels };
}

function fitLogistic(rows: number[][], labels: number[], iterations: number, learningRate: number): FittedModel {
  const n = rows.length;
  const d = LOCAL_FEATURES.length;

  const means = new Array<number>(d).fill(0);
  const scales = new Array<number>(d).fill(0);
  for (const row of rows) row.forEach((v, j) => { means[j] += v / n; });
  for (const row of rows) row.forEach((v, j) => { scales[j] += (v - means[j]) ** 2 / n; });
  for (let j = 0; j < d; j++) scales[j] = Math.sqrt(scales[j]) || 1;

  const z = rows.map(row => row.map((v, j) => (v - means[j]) / scales[j]));
  const weights = new Array<number>(d).fill(0);
  let bias = 0;
  // L2 penalty
  const l2 = 1 / n;

  for (let iter = 0; iter < iterations; iter++) {
    const gradW = new Array<number>(d).fill(0);
    let gradB = 0;
    for (let i = 0; i < n; i++) {
      let logit = bias;
      for (let j = 0; j < d; j++) logit += weights[j] * z[i][j];
      const error = sigmoid(logit) - labels[i];
      for (let j = 0; j < d; j++) gradW[j] += error * z[i][j];
      gradB += error;
    }
    for (let j = 0; j < d; j++) {
      weights[j] -= learningRate * (gradW[j] / n + l2 * weights[j]);
    }
    bias -= learningRate * (gradB / n);
  }

  return { means, scales, weights, bias };
}

function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

/** Small seeded PRNG returning floats in [0, 1). */
function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
