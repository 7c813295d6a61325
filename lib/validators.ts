import { z } from 'zod';
import { ValidationError, type ValidationIssue } from '@/lib/errors';
import type {
  PitScenario,
  RaceState,
  StrategyPredictionInput,
  TireCompound,
  WeatherCondition,
} from '@/types/strategy';

export const TIRE_COMPOUND_NAMES = ['soft', 'medium', 'hard', 'intermediate', 'wet'] as const satisfies readonly TireCompound[];
export const WEATHER_CONDITIONS = ['dry', 'mixed', 'wet'] as const satisfies readonly WeatherCondition[];

const lapNumber = z.number().int();

export const tireCompoundSchema = z.enum(TIRE_COMPOUND_NAMES);
export const weatherConditionSchema = z.enum(WEATHER_CONDITIONS);

const raceStateFields = z.object({
  currentLap: lapNumber.min(1, 'currentLap must be at least 1'),
  totalLaps: lapNumber.min(1, 'totalLaps must be at least 1'),
  currentPosition: z.number().int().min(1, 'currentPosition must be at least 1'),
  gapAhead: z.number().finite(),
  gapBehind: z.number().finite(),
  currentTireAge: z.number().int().min(0, 'currentTireAge cannot be negative'),
  currentCompound: tireCompoundSchema,
  weatherCondition: weatherConditionSchema,
});

export const pitScenarioSchema = z.object({
  name: z.string().trim().min(1).optional(),
  pitLap: lapNumber.optional(),
  newCompound: tireCompoundSchema.optional(),
  weatherChange: z
    .object({
      lap: lapNumber,
      condition: weatherConditionSchema,
    })
    .optional(),
  safetyCarProbability: z.number().min(0).max(1).optional(),
});

function checkLapOrder(
  state: { currentLap: number; totalLaps: number },
  ctx: z.RefinementCtx,
  path: (string | number)[]
) {
  if (state.totalLaps < state.currentLap) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'totalLaps must be greater than or equal to currentLap',
      path: [...path, 'totalLaps'],
    });
  }
}

function checkPitLap(
  scenario: PitScenario,
  currentLap: number,
  ctx: z.RefinementCtx,
  path: (string | number)[]
) {
  if (scenario.pitLap !== undefined && scenario.pitLap < currentLap) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `pitLap must be at least the current lap (${currentLap})`,
      path: [...path, 'pitLap'],
    });
  }
}

export const raceStateSchema = raceStateFields.superRefine((state, ctx) => {
  checkLapOrder(state, ctx, []);
});

export const simulationRequestSchema = raceStateFields
  .extend({
    pitScenarios: z.array(pitScenarioSchema).default([]),
    seed: z.number().int().optional(),
  })
  .superRefine((request, ctx) => {
    checkLapOrder(request, ctx, []);
    request.pitScenarios.forEach((scenario, index) => {
      checkPitLap(scenario, request.currentLap, ctx, ['pitScenarios', index]);
    });
  });

export const whatIfRequestSchema = z
  .object({
    raceState: raceStateSchema,
    actual: pitScenarioSchema,
    alternate: pitScenarioSchema,
    seed: z.number().int().optional(),
  })
  .superRefine((request, ctx) => {
    checkPitLap(request.actual, request.raceState.currentLap, ctx, ['actual']);
    checkPitLap(request.alternate, request.raceState.currentLap, ctx, ['alternate']);
  });

export const predictionRequestSchema = z.object({
  tireDelta: z.number().finite(),
  paceDropoff: z.number().finite(),
  trackGap: z.number().finite(),
  tireDegCurve: z.number().finite(),
  rivalPitWindow: z.number().int(),
});

export const chatRequestSchema = z.object({
  question: z.string().trim().min(1, 'question is required'),
  raceState: raceStateSchema.optional(),
  history: z
    .array(
      z.object({
        role: z.enum(['user', 'assistant']),
        content: z.string(),
      })
    )
    .default([]),
});

export interface SimulationRequest {
  raceState: RaceState;
  scenarios: PitScenario[];
  seed?: number;
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

export function parseWith<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  message: string
): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(message, toValidationIssues(parsed.error));
  }
  return parsed.data;
}

function labelScenarios(scenarios: PitScenario[]): PitScenario[] {
  return scenarios.map((scenario, index) => ({
    ...scenario,
    name: scenario.name ?? `Scenario ${index + 1}`,
  }));
}

export function parseSimulationRequest(body: unknown): SimulationRequest {
  const { pitScenarios, seed, ...raceState } = parseWith(
    simulationRequestSchema,
    body,
    'Invalid simulation request'
  );

  return {
    raceState,
    scenarios: labelScenarios(pitScenarios),
    seed,
  };
}

export function parsePredictionRequest(body: unknown): StrategyPredictionInput {
  return parseWith(predictionRequestSchema, body, 'Invalid prediction request');
}
