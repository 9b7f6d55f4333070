export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

export const defaultRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Deterministic seeded PRNG (Mulberry32)
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number | string) {
    this.state = SeededRandom.seedToUint32(seed);
  }

  static seedToUint32(seed: number | string): number {
    if (typeof seed === "number") {
      return seed >>> 0 || 1;
    }

    // FNV-1a 32-bit hash for strings
    let h = 0x811c9dc5;
    for (let i = 0; i < seed.length; i++) {
      h ^= seed.charCodeAt(i);
      h = Math.imul(h, 0x01000193);
    }
    return h >>> 0 || 1;
  }

  next(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

export function pickRandom<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(items.length - 1, Math.floor(random.next() * items.length));
  return items[index];
}
