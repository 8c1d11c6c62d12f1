// Seedable random source for reproducible shuffles

import type { Rng } from '../types';

export class XorShift32 {
  private state: number;

  constructor(seed: number) {
    // xorshift never leaves zero, so a zero seed gets a fixed substitute
    this.state = (seed | 0) || 0x6d2b79f5;
  }

  nextU32(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x | 0;
    return this.state >>> 0;
  }

  // Uniform in [0, 1)
  next01(): number {
    return this.nextU32() / 0x100000000;
  }
}

export function createSeededRng(seed: number): Rng {
  const gen = new XorShift32(seed);
  return () => gen.next01();
}

// Fisher-Yates, in place
export function shuffleInPlace<T>(items: T[], rng: Rng): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}
