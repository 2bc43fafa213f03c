import { randomInt as cryptoRandomInt } from 'node:crypto';

export type RNG = (maxExclusive: number) => number;

export const cryptoRNG: RNG = (maxExclusive: number) => {
  if (maxExclusive <= 0) throw new Error('maxExclusive must be > 0');
  return cryptoRandomInt(0, maxExclusive);
};

// Deterministic PRNG for tests and replayable sessions
export function mulberry32(seed: number): RNG {
  let t = seed >>> 0;
  return (maxExclusive: number) => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    r = ((r ^ (r >>> 14)) >>> 0) / 4294967296; // 0..1
    return Math.floor(r * maxExclusive);
  };
}

export function seededRNG(seed: number): RNG {
  return mulberry32(seed);
}

// Replays a fixed list of draws, cycling when exhausted.
export function scriptedRNG(draws: readonly number[]): RNG {
  if (draws.length === 0) throw new Error('scriptedRNG needs at least one draw');
  let i = 0;
  return (maxExclusive: number) => {
    const v = draws[i % draws.length];
    i++;
    if (!Number.isInteger(v) || v < 0 || v >= maxExclusive) {
      throw new Error(`scripted draw ${v} outside [0, ${maxExclusive})`);
    }
    return v;
  };
}
