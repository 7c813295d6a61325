import { NextRequest, NextResponse } from 'next/server';
import { errorResponse, readJson } from '@/lib/http';
import { predictUndercut } from '@/lib/strategy-predictor';
import { parsePredictionRequest } from '@/lib/validators';

export async function POST(request: NextRequest) {
  try {
    const input = parsePredictionRequest(await readJson(request));
    return NextResponse.json(predictUndercut(input));
  } catch (error) {
    return errorResponse(error, 'Undercut prediction error', 'Failed to predict undercut');
  }
}
