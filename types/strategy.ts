export type TireCompound = 'soft' | 'medium' | 'hard' | 'intermediate' | 'wet';

export type WeatherCondition = 'dry' | 'mixed' | 'wet';

export interface CompoundProfile {
  basePace: number;
  degradationRate: number;
  optimalWindow: [number, number]; // inclusive tire-age range, informational only
}

export interface RaceState {
  currentLap: number;
  totalLaps: number;
  currentPosition: number;
  gapAhead: number;
  gapBehind: number;
  currentTireAge: number;
  currentCompound: TireCompound;
  weatherCondition: WeatherCondition;
}

export interface WeatherChange {
  lap: number;
  condition: WeatherCondition;
}

export interface PitScenario {
  name?: string;
  pitLap?: number;
  newCompound?: TireCompound;
  weatherChange?: WeatherChange;
  safetyCarProbability?: number;
}

export interface ScenarioResult {
  name?: string;
  pitLap: number;
  newCompound: TireCompound;
  weatherChange?: WeatherChange;
  safetyCarProbability: number;
  totalRaceTime: number;
  positionDelta: number;
  lapTimes: number[];
  finalPosition: number;
  safetyCarAppeared: boolean;
  safetyCarLap?: number;
  pitStopTime: number;
  safetyCarSaving: number;
}

export interface StintResult {
  totalTime: number;
  lapTimes: number[];
}

export interface RankingResult {
  results: ScenarioResult[];
  best: ScenarioResult;
  positionDelta: number;
  timeDelta: number;
}

export interface SimulationResult {
  scenarios: ScenarioResult[];
  bestScenario: ScenarioResult;
  racePositionDelta: number;
  timeDelta: number;
}

export interface StrategyAdvice {
  recommendedStrategy: string;
  successProbability: number;
  keyFactors: Record<string, number>;
}

export interface StrategyPredictionInput {
  tireDelta: number;
  paceDropoff: number;
  trackGap: number;
  tireDegCurve: number;
  rivalPitWindow: number;
}

export interface StrategyPrediction {
  successProbability: number;
  confidenceScore: number;
  recommendedAction: string;
  factors: Record<keyof StrategyPredictionInput, number>;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}
