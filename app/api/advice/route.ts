import { NextRequest, NextResponse } from 'next/server';
import { getAdvisorConfig } from '@/lib/config';
import { advisorUnavailable, errorResponse, readJson } from '@/lib/http';
import { getStrategyAdvice } from '@/lib/strategy-advisor';
import { parseSimulationRequest } from '@/lib/validators';

export async function POST(request: NextRequest) {
  try {
    const { raceState, scenarios } = parseSimulationRequest(await readJson(request));

    const advisorConfig = getAdvisorConfig();
    if (!advisorConfig) {
      return advisorUnavailable();
    }

    const advice = await getStrategyAdvice({ raceState, scenarios }, advisorConfig);
    return NextResponse.json(advice);
  } catch (error) {
    return errorResponse(error, 'Advice error', 'Failed to get strategy advice');
  }
}
