import { NextRequest, NextResponse } from 'next/server';
import { AdvisorError, ValidationError, errorMessage } from '@/lib/errors';

export async function readJson(request: NextRequest): Promise<unknown> {
  try {
    const body: unknown = await request.json();
    return body;
  } catch (error) {
    throw new ValidationError('Request body must be valid JSON', [
      { path: 'body', message: errorMessage(error, 'Unparseable JSON') },
    ]);
  }
}

export function advisorUnavailable() {
  return NextResponse.json({ error: 'OpenAI API key not configured' }, { status: 503 });
}

export function errorResponse(error: unknown, label: string, fallback: string) {
  if (error instanceof ValidationError) {
    return NextResponse.json({ error: error.message, issues: error.issues }, { status: 400 });
  }

  console.error(`${label}:`, error);

  if (error instanceof AdvisorError) {
    return NextResponse.json({ error: error.message }, { status: 502 });
  }

  return NextResponse.json({ error: errorMessage(error, fallback) }, { status: 500 });
}
