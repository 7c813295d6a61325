export interface RandomSource {
  /** Returns a value in [0, 1). */
  next(): number;
}

// mulberry32
function seededGenerator(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandomSource(seed?: number): RandomSource {
  if (seed === undefined) {
    return { next: () => Math.random() };
  }

  const generate = seededGenerator(seed);
  return { next: generate };
}

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random.next() * (max - min);
}

/** Inclusive on both ends. */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random.next() * (max - min + 1));
}
