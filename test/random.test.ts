import { describe, expect, it } from 'vitest';
import { createRandomSource, randomInt, uniform } from '@/lib/random';

describe('random source', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createRandomSource(42);
    const b = createRandomSource(42);

    const first = [a.next(), a.next(), a.next()];
    const second = [b.next(), b.next(), b.next()];

    expect(first).toEqual(second);
  });

  it('produces different sequences for different seeds', () => {
    expect(createRandomSource(1).next()).not.toBe(createRandomSource(2).next());
  });

  it('stays within [0, 1)', () => {
    const random = createRandomSource(7);
    for (let i = 0; i < 1000; i++) {
      const value = random.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('maps draws onto inclusive integer ranges', () => {
    expect(randomInt({ next: () => 0 }, 21, 50)).toBe(21);
    expect(randomInt({ next: () => 0.9999 }, 21, 50)).toBe(50);
    expect(randomInt({ next: () => 0.5 }, 1, 4)).toBe(3);
  });

  it('maps draws onto continuous ranges', () => {
    expect(uniform({ next: () => 0 }, -0.3, 0.3)).toBeCloseTo(-0.3);
    expect(uniform({ next: () => 0.5 }, -0.3, 0.3)).toBeCloseTo(0);
  });
});
