import type { RandomSource } from '@/lib/random';
import type { RaceState } from '@/types/strategy';

export const midRaceState: RaceState = {
  currentLap: 20,
  totalLaps: 50,
  currentPosition: 5,
  gapAhead: 2.5,
  gapBehind: 1.5,
  currentTireAge: 15,
  currentCompound: 'medium',
  weatherCondition: 'dry',
};

/** Replays the given draws in order, then repeats the last one. */
export function scriptedRandom(...values: number[]): RandomSource {
  let index = 0;
  return {
    next: () => {
      const value = values[Math.min(index, values.length - 1)];
      index++;
      return value;
    },
  };
}

export const sum = (values: number[]): number => values.reduce((a, b) => a + b, 0);
