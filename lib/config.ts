export const DEFAULT_OPENAI_MODEL = 'gpt-4o';

export interface AdvisorConfig {
  apiKey: string;
  model: string;
}

/** Returns null when no OpenAI key is configured; advice features are then disabled. */
export function getAdvisorConfig(env: NodeJS.ProcessEnv = process.env): AdvisorConfig | null {
  const apiKey = env.OPENAI_API_KEY?.trim();
  if (!apiKey) {
    return null;
  }

  return {
    apiKey,
    model: env.OPENAI_MODEL?.trim() || DEFAULT_OPENAI_MODEL,
  };
}
