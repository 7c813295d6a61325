import { NextRequest, NextResponse } from 'next/server';
import { errorResponse, readJson } from '@/lib/http';
import { predictOvercut } from '@/lib/strategy-predictor';
import { parsePredictionRequest } from '@/lib/validators';

export async function POST(request: NextRequest) {
  try {
    const input = parsePredictionRequest(await readJson(request));
    return NextResponse.json(predictOvercut(input));
  } catch (error) {
    return errorResponse(error, 'Overcut prediction error', 'Failed to predict overcut');
  }
}
