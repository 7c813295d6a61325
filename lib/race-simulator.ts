import type {
  CompoundProfile,
  PitScenario,
  RaceState,
  RankingResult,
  ScenarioResult,
  SimulationResult,
  StintResult,
  TireCompound,
  WeatherCondition,
} from '@/types/strategy';
import { ComputationError } from '@/lib/errors';
import { createRandomSource, randomInt, uniform, type RandomSource } from '@/lib/random';

export const TIRE_COMPOUNDS: Record<TireCompound, CompoundProfile> = {
  soft: { basePace: 0.0, degradationRate: 0.05, optimalWindow: [1, 15] },
  medium: { basePace: 0.5, degradationRate: 0.03, optimalWindow: [10, 35] },
  hard: { basePace: 1.0, degradationRate: 0.02, optimalWindow: [25, 50] },
  intermediate: { basePace: 3.0, degradationRate: 0.04, optimalWindow: [1, 30] },
  wet: { basePace: 6.0, degradationRate: 0.01, optimalWindow: [1, 40] },
};

export const BASE_LAP_TIME = 90.0;
export const PIT_STOP_TIME = 22.0;
export const SAFETY_CAR_PIT_SAVING = 5.0;
export const LAP_TIME_NOISE = 0.3;
export const DEFAULT_NEW_COMPOUND: TireCompound = 'medium';

export interface SimulationOptions {
  random?: RandomSource;
  /** Half-width of the uniform per-lap noise; 0 disables it. */
  noise?: number;
}

interface ResolvedOptions {
  random: RandomSource;
  noise: number;
}

function resolveOptions(options: SimulationOptions = {}): ResolvedOptions {
  return {
    random: options.random ?? createRandomSource(),
    noise: options.noise ?? LAP_TIME_NOISE,
  };
}

function isWetCompound(compound: TireCompound): boolean {
  return compound === 'intermediate' || compound === 'wet';
}

function weatherPenalty(compound: TireCompound, weather: WeatherCondition): number {
  if (weather === 'wet' && !isWetCompound(compound)) {
    return 5.0;
  }

  if (weather === 'mixed') {
    if (compound === 'intermediate') return 1.0;
    if (compound === 'wet') return 2.0;
    return 3.0;
  }

  if (weather === 'dry' && isWetCompound(compound)) {
    return 4.0;
  }

  return 0;
}

export function lapTime(
  compound: TireCompound,
  tireAge: number,
  weather: WeatherCondition,
  options: SimulationOptions = {}
): number {
  const { random, noise } = resolveOptions(options);
  const profile = TIRE_COMPOUNDS[compound];

  let time = BASE_LAP_TIME + profile.basePace;
  time += tireAge * profile.degradationRate;
  time += weatherPenalty(compound, weather);

  if (noise > 0) {
    time += uniform(random, -noise, noise);
  }

  return time;
}

export function simulateStint(
  startLap: number,
  endLap: number,
  compound: TireCompound,
  startTireAge: number,
  weather: WeatherCondition,
  options: SimulationOptions = {}
): StintResult {
  const resolved = resolveOptions(options);
  const lapTimes: number[] = [];
  let totalTime = 0;
  let tireAge = startTireAge;

  for (let lap = startLap; lap <= endLap; lap++) {
    const time = lapTime(compound, tireAge, weather, resolved);
    totalTime += time;
    lapTimes.push(time);
    tireAge++;
  }

  return { totalTime, lapTimes };
}

// Element-wise: a stint can be longer than the engine allows as call arguments.
function appendLapTimes(target: number[], laps: number[]) {
  for (const time of laps) {
    target.push(time);
  }
}

function runScenario(
  scenario: PitScenario,
  state: RaceState,
  options: ResolvedOptions,
  allowSafetyCarRedirect: boolean
): ScenarioResult {
  const pitLap = scenario.pitLap ?? state.currentLap;
  const newCompound = scenario.newCompound ?? DEFAULT_NEW_COMPOUND;
  const safetyCarProbability = scenario.safetyCarProbability ?? 0;

  const result: ScenarioResult = {
    ...scenario,
    pitLap,
    newCompound,
    safetyCarProbability,
    totalRaceTime: 0,
    positionDelta: 0,
    lapTimes: [],
    finalPosition: state.currentPosition,
    safetyCarAppeared: false,
    pitStopTime: 0,
    safetyCarSaving: 0,
  };

  // First stint on the current tires, up to the lap before the stop
  if (pitLap > state.currentLap) {
    const firstStint = simulateStint(
      state.currentLap,
      pitLap - 1,
      state.currentCompound,
      state.currentTireAge,
      state.weatherCondition,
      options
    );
    result.totalRaceTime += firstStint.totalTime;
    appendLapTimes(result.lapTimes, firstStint.lapTimes);
  }

  // Pit stop and second stint on fresh tires
  if (pitLap <= state.totalLaps) {
    result.pitStopTime = PIT_STOP_TIME;
    result.totalRaceTime += PIT_STOP_TIME;

    const change = scenario.weatherChange;
    const secondStintWeather =
      change && change.lap >= pitLap ? change.condition : state.weatherCondition;

    const secondStint = simulateStint(
      pitLap,
      state.totalLaps,
      newCompound,
      0,
      secondStintWeather,
      options
    );
    result.totalRaceTime += secondStint.totalTime;
    appendLapTimes(result.lapTimes, secondStint.lapTimes);
  }

  // Safety car draw
  if (
    allowSafetyCarRedirect &&
    safetyCarProbability > 0 &&
    state.currentLap < state.totalLaps &&
    options.random.next() < safetyCarProbability
  ) {
    const safetyCarLap = randomInt(options.random, state.currentLap + 1, state.totalLaps);

    if (safetyCarLap < pitLap) {
      // Pit under the safety car instead; the redirected run never redirects again.
      const adjusted = runScenario({ ...scenario, pitLap: safetyCarLap }, state, options, false);
      adjusted.safetyCarAppeared = true;
      adjusted.safetyCarLap = safetyCarLap;
      adjusted.safetyCarSaving = SAFETY_CAR_PIT_SAVING;
      adjusted.totalRaceTime -= SAFETY_CAR_PIT_SAVING;
      return adjusted;
    }

    result.safetyCarAppeared = true;
    result.safetyCarLap = safetyCarLap;
  }

  // Static gaps only: the rivals' own pace is not modelled.
  const timeDeltaAhead = result.totalRaceTime - state.gapAhead;
  const timeDeltaBehind = state.gapBehind - result.totalRaceTime;

  if (timeDeltaAhead > 0) {
    result.positionDelta += 1;
  }
  if (timeDeltaBehind < 0) {
    result.positionDelta -= 1;
  }

  result.finalPosition = state.currentPosition - result.positionDelta;

  return result;
}

export function evaluateScenario(
  scenario: PitScenario,
  state: RaceState,
  options: SimulationOptions = {}
): ScenarioResult {
  return runScenario(scenario, state, resolveOptions(options), true);
}

export function defaultScenarios(state: RaceState): PitScenario[] {
  return [
    { name: 'Stay out', pitLap: state.totalLaps + 1 },
    { name: 'Pit now', pitLap: state.currentLap, newCompound: 'hard' },
    { name: 'Pit in 3 laps', pitLap: state.currentLap + 3, newCompound: 'hard' },
    { name: 'Pit in 5 laps', pitLap: state.currentLap + 5, newCompound: 'hard' },
  ];
}

export function rankScenarios(
  state: RaceState,
  scenarios: PitScenario[],
  options: SimulationOptions = {}
): RankingResult {
  const resolved = resolveOptions(options);
  const candidates = scenarios.length > 0 ? scenarios : defaultScenarios(state);

  const results = candidates.map((scenario) => runScenario(scenario, state, resolved, true));

  if (results.length === 0) {
    throw new ComputationError('No scenarios were evaluated');
  }

  const best = results.reduce((min, r) => (r.totalRaceTime < min.totalRaceTime ? r : min));
  const worst = results.reduce((max, r) => (r.totalRaceTime > max.totalRaceTime ? r : max));

  return {
    results,
    best,
    positionDelta: best.positionDelta,
    timeDelta: worst.totalRaceTime - best.totalRaceTime,
  };
}

export function simulateScenarios(
  state: RaceState,
  scenarios: PitScenario[],
  options: SimulationOptions = {}
): SimulationResult {
  const ranking = rankScenarios(state, scenarios, options);

  return {
    scenarios: ranking.results,
    bestScenario: ranking.best,
    racePositionDelta: ranking.positionDelta,
    timeDelta: ranking.timeDelta,
  };
}

export function formatLapTime(timeInSeconds: number): string {
  const minutes = Math.floor(timeInSeconds / 60);
  const seconds = Math.floor(timeInSeconds % 60);
  const milliseconds = Math.floor((timeInSeconds % 1) * 1000);

  return `${minutes}:${seconds.toString().padStart(2, '0')}.${milliseconds.toString().padStart(3, '0')}`;
}
