import { NextRequest, NextResponse } from 'next/server';
import { getAdvisorConfig } from '@/lib/config';
import { errorMessage } from '@/lib/errors';
import { errorResponse, readJson } from '@/lib/http';
import { createRandomSource } from '@/lib/random';
import { simulateScenarios } from '@/lib/race-simulator';
import { getStrategyAdvice } from '@/lib/strategy-advisor';
import { parseSimulationRequest } from '@/lib/validators';
import type { StrategyAdvice } from '@/types/strategy';

export async function POST(request: NextRequest) {
  try {
    const { raceState, scenarios, seed } = parseSimulationRequest(await readJson(request));

    const simulation = simulateScenarios(raceState, scenarios, {
      random: createRandomSource(seed),
    });

    console.log(
      `Simulated ${simulation.scenarios.length} scenarios from lap ${raceState.currentLap}/${raceState.totalLaps}; best: ${simulation.bestScenario.name ?? 'unnamed'}`
    );

    let strategyAdvice: StrategyAdvice | null = null;
    let adviceError: string | undefined;

    const advisorConfig = getAdvisorConfig();
    if (advisorConfig) {
      try {
        strategyAdvice = await getStrategyAdvice({ raceState, scenarios }, advisorConfig);
      } catch (error) {
        console.error('Strategy advice error:', error);
        adviceError = errorMessage(error, 'Strategy advice unavailable');
      }
    }

    return NextResponse.json({
      ...simulation,
      strategyAdvice,
      ...(adviceError ? { adviceError } : {}),
    });
  } catch (error) {
    return errorResponse(error, 'Simulation error', 'Failed to simulate scenarios');
  }
}
