import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NextRequest } from 'next/server';
import { POST as advice } from '@/app/api/advice/route';
import { POST as chat } from '@/app/api/chat/route';
import { GET as health } from '@/app/api/health/route';
import { POST as predictOvercut } from '@/app/api/predict/overcut/route';
import { POST as predictUndercut } from '@/app/api/predict/undercut/route';
import { POST as uploadScenarios } from '@/app/api/scenarios/upload/route';
import { POST as simulate } from '@/app/api/simulate/route';
import { POST as whatIf } from '@/app/api/what-if/route';
import type { ScenarioResult } from '@/types/strategy';
import { midRaceState } from './helpers';

function jsonRequest(path: string, body: unknown): NextRequest {
  return new NextRequest(`http://localhost${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

function uploadRequest(fileName: string, content: string): NextRequest {
  const form = new FormData();
  form.append('file', new File([content], fileName, { type: 'text/csv' }));
  return new NextRequest('http://localhost/api/scenarios/upload', { method: 'POST', body: form });
}

beforeEach(() => {
  vi.stubEnv('OPENAI_API_KEY', '');
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('GET /api/health', () => {
  it('reports ok', async () => {
    const response = await health();
    expect(await response.json()).toEqual({ status: 'ok', message: 'Pit strategy API is running' });
  });
});

describe('POST /api/simulate', () => {
  it('ranks the default plans without advice when no key is configured', async () => {
    const response = await simulate(jsonRequest('/api/simulate', { ...midRaceState, seed: 7 }));
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.scenarios.map((s: ScenarioResult) => s.name)).toEqual([
      'Stay out',
      'Pit now',
      'Pit in 3 laps',
      'Pit in 5 laps',
    ]);
    expect(body.bestScenario.totalRaceTime).toBe(
      Math.min(...body.scenarios.map((s: ScenarioResult) => s.totalRaceTime))
    );
    expect(body.racePositionDelta).toBe(body.bestScenario.positionDelta);
    expect(body.strategyAdvice).toBeNull();
    expect(body.adviceError).toBeUndefined();
  });

  it('is reproducible with a seed', async () => {
    const payload = {
      ...midRaceState,
      pitScenarios: [{ name: 'SC gamble', pitLap: 35, newCompound: 'hard', safetyCarProbability: 0.6 }],
      seed: 2024,
    };

    const first = await (await simulate(jsonRequest('/api/simulate', payload))).json();
    const second = await (await simulate(jsonRequest('/api/simulate', payload))).json();

    expect(first).toEqual(second);
  });

  it('answers 400 with the validation issues', async () => {
    const response = await simulate(
      jsonRequest('/api/simulate', { ...midRaceState, currentCompound: 'slick' })
    );
    const body = await response.json();

    expect(response.status).toBe(400);
    expect(body.error).toBe('Invalid simulation request');
    expect(body.issues.map((issue: { path: string }) => issue.path)).toEqual(['currentCompound']);
  });

  it('answers 400 for a malformed body', async () => {
    const request = new NextRequest('http://localhost/api/simulate', {
      method: 'POST',
      body: '{ not json',
    });

    const response = await simulate(request);

    expect(response.status).toBe(400);
    expect((await response.json()).error).toBe('Request body must be valid JSON');
  });
});

describe('POST /api/predict', () => {
  const input = { tireDelta: 10, paceDropoff: 0.3, trackGap: 0, tireDegCurve: 0, rivalPitWindow: 2 };

  it('predicts an undercut', async () => {
    const body = await (await predictUndercut(jsonRequest('/api/predict/undercut', input))).json();
    expect(body.successProbability).toBeCloseTo(0.8);
    expect(body.recommendedAction).toBe('Pit now for undercut attempt - high chance of success');
  });

  it('predicts an overcut', async () => {
    const body = await (await predictOvercut(jsonRequest('/api/predict/overcut', input))).json();
    expect(body.successProbability).toBeCloseTo(0.3);
    expect(body.recommendedAction).toBe('Pit now - overcut unlikely to succeed');
  });

  it('rejects incomplete input', async () => {
    const response = await predictUndercut(jsonRequest('/api/predict/undercut', { tireDelta: 1 }));
    expect(response.status).toBe(400);
  });
});

describe('advisor routes without a key', () => {
  it('answers 503 for advice', async () => {
    const response = await advice(jsonRequest('/api/advice', midRaceState));
    expect(response.status).toBe(503);
  });

  it('answers 503 for chat', async () => {
    const response = await chat(jsonRequest('/api/chat', { question: 'Box this lap?' }));
    expect(response.status).toBe(503);
  });

  it('still validates the chat question first', async () => {
    const response = await chat(jsonRequest('/api/chat', { question: '   ' }));
    expect(response.status).toBe(400);
  });
});

describe('POST /api/what-if', () => {
  it('compares two plans from the same race state', async () => {
    const response = await whatIf(
      jsonRequest('/api/what-if', {
        raceState: midRaceState,
        actual: { pitLap: 20, newCompound: 'hard' },
        alternate: { name: 'Stay out', pitLap: 51 },
        seed: 3,
      })
    );
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.actual.name).toBe('Actual');
    expect(body.alternate.name).toBe('Stay out');
    expect(body.timeDelta).toBeCloseTo(body.alternate.totalRaceTime - body.actual.totalRaceTime);
    expect(body.positionDelta).toBe(body.actual.finalPosition - body.alternate.finalPosition);
    expect(body.narrative).toBeNull();
  });

  it('reports the finishing-position difference from the alternate plan', async () => {
    const body = await (
      await whatIf(
        jsonRequest('/api/what-if', {
          raceState: { ...midRaceState, gapAhead: 2900, gapBehind: 0 },
          actual: { pitLap: 20, newCompound: 'wet' },
          alternate: { pitLap: 51 },
          seed: 5,
        })
      )
    ).json();

    expect(body.actual.finalPosition).toBe(5);
    expect(body.alternate.finalPosition).toBe(6);
    expect(body.positionDelta).toBe(-1);
  });

  it('rejects a plan that pits before the current lap', async () => {
    const response = await whatIf(
      jsonRequest('/api/what-if', {
        raceState: midRaceState,
        actual: { pitLap: 10 },
        alternate: {},
      })
    );
    const body = await response.json();

    expect(response.status).toBe(400);
    expect(body.issues).toEqual([
      { path: 'actual.pitLap', message: 'pitLap must be at least the current lap (20)' },
    ]);
  });
});

describe('POST /api/scenarios/upload', () => {
  it('imports scenarios from a CSV file', async () => {
    const response = await uploadScenarios(
      uploadRequest('plans.csv', 'name,pit_lap,compound\nEarly,22,hard\nLate,30,medium\n')
    );
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.fileName).toBe('plans.csv');
    expect(body.scenarios).toEqual([
      { name: 'Early', pitLap: 22, newCompound: 'hard' },
      { name: 'Late', pitLap: 30, newCompound: 'medium' },
    ]);
  });

  it('rejects files that are not CSV', async () => {
    const response = await uploadScenarios(uploadRequest('plans.txt', 'pit_lap\n22'));

    expect(response.status).toBe(400);
    expect((await response.json()).error).toBe('File must be a CSV');
  });

  it('rejects a CSV without scenarios', async () => {
    const response = await uploadScenarios(uploadRequest('plans.csv', 'pit_lap,compound\n'));

    expect(response.status).toBe(400);
    expect((await response.json()).error).toBe('No scenarios found in CSV');
  });
});
