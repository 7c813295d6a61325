import { NextRequest } from 'next/server';
import { getAdvisorConfig } from '@/lib/config';
import { advisorUnavailable, errorResponse, readJson } from '@/lib/http';
import { streamStrategyAnswer } from '@/lib/strategy-advisor';
import { chatRequestSchema, parseWith } from '@/lib/validators';

export async function POST(request: NextRequest) {
  try {
    const { question, raceState, history } = parseWith(
      chatRequestSchema,
      await readJson(request),
      'Invalid chat request'
    );

    const advisorConfig = getAdvisorConfig();
    if (!advisorConfig) {
      return advisorUnavailable();
    }

    const stream = await streamStrategyAnswer(question, raceState, history, advisorConfig);

    return new Response(stream, {
      headers: {
        'Content-Type': 'text/plain; charset=utf-8',
        'Transfer-Encoding': 'chunked',
      },
    });
  } catch (error) {
    return errorResponse(error, 'Chat error', 'Failed to process chat message');
  }
}
