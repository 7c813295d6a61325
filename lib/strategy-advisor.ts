import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { AdvisorConfig } from '@/lib/config';
import { AdvisorError } from '@/lib/errors';
import { formatLapTime } from '@/lib/race-simulator';
import type {
  ChatMessage,
  PitScenario,
  RaceState,
  ScenarioResult,
  StrategyAdvice,
} from '@/types/strategy';

export interface AdviceContext {
  raceState: RaceState;
  scenarios: PitScenario[];
}

type AdviceSection = 'strategy' | 'probability' | 'factors';

interface ParsedFactor {
  name: string;
  weight: number;
}

const STRATEGIST_SYSTEM_PROMPT = `You are an expert Formula 1 race engineer and strategist. You analyze race situations and give the pit wall clear, data-backed strategy calls.

## DATA YOU RECEIVE
- Current lap, total laps and track position
- Gaps to the cars ahead and behind in seconds
- Tire compound, tire age and weather
- Candidate pit-stop plans, sometimes with simulated race times

## RESPONSE STYLE
- Reference the numbers you were given
- Prefer one clear recommendation over a list of options
- Be honest about uncertainty, especially with weather and safety cars
- Keep responses concise`;

const ADVICE_FORMAT_INSTRUCTIONS = `Answer with exactly three numbered lines:
1. Recommended strategy: <one sentence>
2. Probability of success: <percentage>
3. Key factors: <factor (weight%), factor (weight%), ...>`;

function createClient(config: AdvisorConfig): OpenAI {
  return new OpenAI({ apiKey: config.apiKey });
}

export function stripEmphasis(text: string): string {
  return text.replace(/\*\*/g, '').replace(/\*/g, '');
}

export function formatRaceState(state: RaceState): string {
  return [
    `Current Lap: ${state.currentLap} of ${state.totalLaps}`,
    `Position: P${state.currentPosition}`,
    `Gap to car ahead: ${state.gapAhead.toFixed(1)}s`,
    `Gap to car behind: ${state.gapBehind.toFixed(1)}s`,
    `Current tire age: ${state.currentTireAge} laps`,
    `Current compound: ${state.currentCompound}`,
    `Weather: ${state.weatherCondition}`,
  ].join('\n');
}

export function formatScenario(scenario: PitScenario, index: number, totalLaps: number): string {
  const label = scenario.name ?? `Scenario ${index + 1}`;
  const pitLap = scenario.pitLap;
  const stop =
    pitLap === undefined
      ? `pit now for ${scenario.newCompound ?? 'medium'}`
      : pitLap > totalLaps
        ? 'no pit stop'
        : `pit on lap ${pitLap} for ${scenario.newCompound ?? 'medium'}`;

  const extras: string[] = [];
  if (scenario.weatherChange) {
    extras.push(`weather turns ${scenario.weatherChange.condition} on lap ${scenario.weatherChange.lap}`);
  }
  if (scenario.safetyCarProbability) {
    extras.push(`safety car chance ${Math.round(scenario.safetyCarProbability * 100)}%`);
  }

  return `- ${label}: ${stop}${extras.length > 0 ? ` (${extras.join(', ')})` : ''}`;
}

function formatResult(result: ScenarioResult): string {
  const stop = result.pitStopTime > 0 ? `pit lap ${result.pitLap} on ${result.newCompound}` : 'no stop';
  const safetyCar = result.safetyCarAppeared ? `, safety car on lap ${result.safetyCarLap}` : '';
  return `${stop}, race time ${formatLapTime(result.totalRaceTime)}, finishing P${result.finalPosition}${safetyCar}`;
}

export function buildAdvicePrompt(context: AdviceContext): string {
  const { raceState, scenarios } = context;
  const plans =
    scenarios.length > 0
      ? scenarios.map((s, i) => formatScenario(s, i, raceState.totalLaps)).join('\n')
      : '- No specific plans supplied; consider staying out or pitting within the next five laps';

  return `
Analyze the following race situation and provide strategy advice.

${formatRaceState(raceState)}

Candidate pit plans:
${plans}

${ADVICE_FORMAT_INSTRUCTIONS}
  `.trim();
}

function detectSection(line: string): AdviceSection | null {
  const numbered = line.match(/^([123])\./);
  if (numbered) {
    return numbered[1] === '1' ? 'strategy' : numbered[1] === '2' ? 'probability' : 'factors';
  }

  if (/recommended/i.test(line)) return 'strategy';
  if (/probability/i.test(line)) return 'probability';
  if (/factors/i.test(line)) return 'factors';
  return null;
}

function contentAfterLabel(line: string): string {
  const body = line.replace(/^\d+\.\s*/, '');
  const colon = body.indexOf(':');
  return colon >= 0 ? body.slice(colon + 1).trim() : body.trim();
}

function parseProbability(text: string): number | null {
  const match = text.match(/(\d+(?:\.\d+)?)\s*(%)?/);
  if (!match) {
    return null;
  }

  const value = parseFloat(match[1]);
  const scaled = match[2] || value > 1 ? value / 100 : value;
  return Math.max(0, Math.min(1, scaled));
}

function parseFactors(text: string): ParsedFactor[] {
  const items = text
    .split(/[,;•]/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  return items
    .map((item) => {
      const weightMatch = item.match(/\(?\s*(\d+(?:\.\d+)?)\s*%?\s*\)?\s*$/);
      if (!weightMatch || weightMatch.index === undefined) {
        return { name: item.replace(/[:\-\s]+$/, ''), weight: 1 / items.length };
      }

      const name = item.slice(0, weightMatch.index).replace(/[:\-\s]+$/, '').trim();
      return { name, weight: parseFloat(weightMatch[1]) / 100 };
    })
    .filter((factor) => factor.name.length > 0);
}

function normalize(factors: ParsedFactor[]): Record<string, number> {
  const keyFactors: Record<string, number> = {};
  for (const factor of factors) {
    keyFactors[factor.name] = (keyFactors[factor.name] ?? 0) + factor.weight;
  }

  const total = Object.values(keyFactors).reduce((sum, weight) => sum + weight, 0);
  if (total <= 0) {
    return keyFactors;
  }

  for (const name of Object.keys(keyFactors)) {
    keyFactors[name] = keyFactors[name] / total;
  }
  return keyFactors;
}

/**
 * Reads the numbered reply requested by {@link buildAdvicePrompt}. Lines under a
 * heading with no inline value (for example a bulleted factor list) belong to
 * that heading.
 */
export function parseStrategyAdvice(text: string): StrategyAdvice {
  let recommendedStrategy = '';
  let successProbability: number | null = null;
  const factors: ParsedFactor[] = [];
  let section: AdviceSection | null = null;

  const lines = stripEmphasis(text)
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  for (const line of lines) {
    const detected = detectSection(line);
    let content: string;

    if (detected) {
      section = detected;
      content = contentAfterLabel(line);
    } else {
      content = line.replace(/^[-•]\s*/, '');
    }

    if (!section || !content) {
      continue;
    }

    if (section === 'strategy') {
      if (!recommendedStrategy) {
        recommendedStrategy = content;
      }
    } else if (section === 'probability') {
      if (successProbability === null) {
        successProbability = parseProbability(content);
      }
    } else {
      factors.push(...parseFactors(content));
    }
  }

  return {
    recommendedStrategy,
    successProbability: successProbability ?? 0,
    keyFactors: normalize(factors),
  };
}

async function complete(
  config: AdvisorConfig,
  messages: ChatCompletionMessageParam[],
  maxTokens: number
): Promise<string> {
  const openai = createClient(config);

  let content: string | null | undefined;
  try {
    const completion = await openai.chat.completions.create({
      model: config.model,
      messages,
      temperature: 0.7,
      max_tokens: maxTokens,
    });
    content = completion.choices[0]?.message?.content;
  } catch (error) {
    throw new AdvisorError('Strategy advisor request failed', { cause: error });
  }

  if (!content) {
    throw new AdvisorError('Strategy advisor returned an empty response');
  }

  return stripEmphasis(content);
}

export async function getStrategyAdvice(
  context: AdviceContext,
  config: AdvisorConfig
): Promise<StrategyAdvice> {
  const reply = await complete(
    config,
    [
      { role: 'system', content: STRATEGIST_SYSTEM_PROMPT },
      { role: 'user', content: buildAdvicePrompt(context) },
    ],
    500
  );

  return parseStrategyAdvice(reply);
}

export async function describeAlternateTimeline(
  raceState: RaceState,
  actual: ScenarioResult,
  alternate: ScenarioResult,
  config: AdvisorConfig
): Promise<string> {
  const prompt = `
Compare two pit strategies from the same race situation and describe how the race might have unfolded with the alternate plan.

${formatRaceState(raceState)}

ACTUAL (${actual.name ?? 'actual plan'}): ${formatResult(actual)}
ALTERNATE (${alternate.name ?? 'alternate plan'}): ${formatResult(alternate)}

Cover potential position changes, tire performance differences and the key moments where the outcome could change. Keep it under 200 words.
  `.trim();

  return complete(
    config,
    [
      { role: 'system', content: STRATEGIST_SYSTEM_PROMPT },
      { role: 'user', content: prompt },
    ],
    600
  );
}

export function buildChatMessages(
  question: string,
  raceState: RaceState | undefined,
  history: ChatMessage[]
): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [
    { role: 'system', content: STRATEGIST_SYSTEM_PROMPT },
    {
      role: 'user',
      content: raceState
        ? `Race context for the questions that follow:\n\n${formatRaceState(raceState)}`
        : 'No specific race context provided.',
    },
  ];

  for (const message of history.slice(-6)) {
    messages.push(
      message.role === 'user'
        ? { role: 'user', content: message.content }
        : { role: 'assistant', content: message.content }
    );
  }

  messages.push({ role: 'user', content: question });
  return messages;
}

export async function streamStrategyAnswer(
  question: string,
  raceState: RaceState | undefined,
  history: ChatMessage[],
  config: AdvisorConfig
): Promise<ReadableStream<Uint8Array>> {
  const openai = createClient(config);

  const stream = await openai.chat.completions
    .create({
      model: config.model,
      messages: buildChatMessages(question, raceState, history),
      temperature: 0.7,
      max_tokens: 300,
      stream: true,
    })
    .catch((error: unknown) => {
      throw new AdvisorError('Strategy advisor request failed', { cause: error });
    });

  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    async start(controller) {
      try {
        for await (const chunk of stream) {
          const text = chunk.choices[0]?.delta?.content || '';
          if (text) {
            controller.enqueue(encoder.encode(stripEmphasis(text)));
          }
        }
        controller.close();
      } catch (error) {
        console.error('Strategy chat stream error:', error);
        controller.error(error);
      }
    },
  });
}
