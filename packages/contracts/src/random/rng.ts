/**
 * Helpers shared by every random source. `rng` returns a float in [0, 1).
 */

/**
 * Random integer between min and max (inclusive)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Random element of an array, `undefined` when it is empty
 */
export function choice<T>(rng: () => number, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[range(rng, 0, array.length - 1)];
}

/**
 * True with the given probability (0 to 1)
 */
export function probability(rng: () => number, chance: number): boolean {
  return rng() < chance;
}
