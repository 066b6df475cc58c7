import { choice, probability, range } from "./rng";

// xoshiro128++ over four 32-bit words, state filled by SplitMix32.
// See https://prng.di.unimi.it/xoshiro128plusplus.c

function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/** Raw generator words, as saved and restored by {@link SeededRandom} */
export type RngState = [number, number, number, number];

const WARM_UP_ROUNDS = 8;

/**
 * The only randomness generation steps may use.
 *
 * Two generators built from the same seed agree on every draw, so a
 * pipeline run is fully reproduced by its seed. Seeds are reduced to
 * uint32.
 */
export class SeededRandom {
  private s: RngState;

  constructor(seed: number) {
    const mix = splitmix32(seed >>> 0);
    this.s = [mix(), mix(), mix(), mix()];

    // an all-zero state would only ever produce zeros
    if ((this.s[0] | this.s[1] | this.s[2] | this.s[3]) === 0) {
      this.s[0] = 1;
    }

    for (let i = 0; i < WARM_UP_ROUNDS; i++) {
      this.next32();
    }
  }

  private next32(): number {
    const s = this.s;
    const result = (rotl((s[0] + s[3]) >>> 0, 7) + s[0]) >>> 0;

    const t = (s[1] << 9) >>> 0;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];

    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result;
  }

  /** Float in [0, 1) */
  next(): number {
    return this.next32() / 0x100000000;
  }

  /** Integer in [min, max], both ends included */
  range(min: number, max: number): number {
    return range(() => this.next(), min, max);
  }

  choice<T>(array: readonly [T, ...T[]]): T;
  choice<T>(array: readonly T[]): T | undefined;
  choice<T>(array: readonly T[]): T | undefined {
    return choice(() => this.next(), array);
  }

  probability(chance: number): boolean {
    return probability(() => this.next(), chance);
  }

  /**
   * Independent generator seeded from this one's next draw.
   *
   * Gives a sub-task (a linked room, say) its own stream: whatever the
   * child consumes, the parent has advanced by exactly one value.
   */
  fork(): SeededRandom {
    return new SeededRandom(this.next32());
  }

  getState(): RngState {
    return [this.s[0], this.s[1], this.s[2], this.s[3]];
  }

  /** Resume from a state taken with {@link getState} */
  setState(state: RngState): void {
    this.s = [state[0] >>> 0, state[1] >>> 0, state[2] >>> 0, state[3] >>> 0];
  }
}
