import { NextRequest, NextResponse } from 'next/server';
import { getAdvisorConfig } from '@/lib/config';
import { errorResponse, readJson } from '@/lib/http';
import { createRandomSource } from '@/lib/random';
import { evaluateScenario } from '@/lib/race-simulator';
import { describeAlternateTimeline } from '@/lib/strategy-advisor';
import { parseWith, whatIfRequestSchema } from '@/lib/validators';

export async function POST(request: NextRequest) {
  try {
    const { raceState, actual, alternate, seed } = parseWith(
      whatIfRequestSchema,
      await readJson(request),
      'Invalid what-if request'
    );

    const random = createRandomSource(seed);
    const actualResult = evaluateScenario(
      { ...actual, name: actual.name ?? 'Actual' },
      raceState,
      { random }
    );
    const alternateResult = evaluateScenario(
      { ...alternate, name: alternate.name ?? 'Alternate' },
      raceState,
      { random }
    );

    const advisorConfig = getAdvisorConfig();
    const narrative = advisorConfig
      ? await describeAlternateTimeline(raceState, actualResult, alternateResult, advisorConfig)
      : null;

    return NextResponse.json({
      actual: actualResult,
      alternate: alternateResult,
      timeDelta: alternateResult.totalRaceTime - actualResult.totalRaceTime,
      // Positive when the alternate finishes ahead of the actual plan
      positionDelta: actualResult.finalPosition - alternateResult.finalPosition,
      narrative,
    });
  } catch (error) {
    return errorResponse(error, 'What-if error', 'Failed to compare strategies');
  }
}
