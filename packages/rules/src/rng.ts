// packages/rules/src/rng.ts

export interface RNG {
  /** Returns a number in [0, 1) */
  next(): number;
}

export class DefaultRNG implements RNG {
  next(): number {
    return Math.random();
  }
}

// mulberry32: small, fast and reproducible from a 32-bit seed
export class SeededRNG implements RNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

const defaultRng = new DefaultRNG();

// One d6
export function rollD6(rng: RNG = defaultRng): number {
  return 1 + Math.floor(rng.next() * 6);
}

// n separate d6, in roll order
export function rollDice(rng: RNG, count: number): number[] {
  const rolls: number[] = [];
  for (let i = 0; i < count; i += 1) {
    rolls.push(rollD6(rng));
  }
  return rolls;
}

export function countAtLeast(dice: number[], threshold: number): number {
  return dice.filter((d) => d >= threshold).length;
}
