import type { StrategyPrediction, StrategyPredictionInput } from '@/types/strategy';

type StrategyKind = 'undercut' | 'overcut';

const UNDERCUT_FACTORS: StrategyPrediction['factors'] = {
  tireDelta: 0.35,
  paceDropoff: 0.25,
  trackGap: 0.2,
  tireDegCurve: 0.15,
  rivalPitWindow: 0.05,
};

const OVERCUT_FACTORS: StrategyPrediction['factors'] = {
  tireDelta: 0.3,
  paceDropoff: 0.3,
  trackGap: 0.15,
  tireDegCurve: 0.2,
  rivalPitWindow: 0.05,
};

const MIN_PROBABILITY = 0.05;
const MAX_PROBABILITY = 0.95;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function confidenceFor(probability: number): number {
  if (probability > 0.9 || probability < 0.1) return 0.95;
  if (probability > 0.75 || probability < 0.25) return 0.8;
  if (probability > 0.6 || probability < 0.4) return 0.65;
  return 0.5;
}

export function recommendedActionFor(probability: number, kind: StrategyKind): string {
  if (kind === 'undercut') {
    if (probability > 0.7) return 'Pit now for undercut attempt - high chance of success';
    if (probability > 0.5) return 'Consider undercut - moderate chance of success';
    return 'Stay out - undercut unlikely to succeed';
  }

  if (probability > 0.7) return 'Stay out for overcut attempt - high chance of success';
  if (probability > 0.5) return 'Consider overcut - moderate chance of success';
  return 'Pit now - overcut unlikely to succeed';
}

function tireAdvantage(input: StrategyPredictionInput): number {
  return Math.min(1, input.tireDelta / 10);
}

function gapFactor(input: StrategyPredictionInput): number {
  return Math.min(1, input.trackGap / 3);
}

function buildPrediction(
  probability: number,
  kind: StrategyKind,
  factors: StrategyPrediction['factors']
): StrategyPrediction {
  const successProbability = clamp(probability, MIN_PROBABILITY, MAX_PROBABILITY);

  return {
    successProbability,
    confidenceScore: confidenceFor(successProbability),
    recommendedAction: recommendedActionFor(successProbability, kind),
    factors: { ...factors },
  };
}

/** Fresher tires and a small gap favour the undercut. */
export function predictUndercut(input: StrategyPredictionInput): StrategyPrediction {
  const probability = 0.5 + 0.3 * tireAdvantage(input) - 0.2 * gapFactor(input);
  return buildPrediction(probability, 'undercut', UNDERCUT_FACTORS);
}

/** Longer tire life, a bigger gap and a steep degradation curve favour the overcut. */
export function predictOvercut(input: StrategyPredictionInput): StrategyPrediction {
  const degFactor = Math.min(1, input.tireDegCurve / 2);
  const probability =
    0.5 - 0.2 * tireAdvantage(input) + 0.2 * gapFactor(input) + 0.1 * degFactor;
  return buildPrediction(probability, 'overcut', OVERCUT_FACTORS);
}
