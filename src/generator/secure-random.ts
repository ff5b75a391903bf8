import { randomInt } from "node:crypto";

/**
 * Returns a uniformly distributed integer in `[0, maxExclusive)`.
 * Every draw in the generators goes through one of these so tests can
 * substitute a deterministic sequence.
 */
export type RandomIndex = (maxExclusive: number) => number;

/**
 * CSPRNG-backed index draw. `randomInt` rejection-samples, so there is no modulo bias.
 */
export const secureRandomIndex: RandomIndex = (maxExclusive) => {
  if (!Number.isInteger(maxExclusive) || maxExclusive < 1) {
    throw new RangeError(`maxExclusive must be a positive integer, got ${maxExclusive}`);
  }
  if (maxExclusive === 1) {
    return 0;
  }
  return randomInt(maxExclusive);
};

/**
 * Picks one code point, so astral characters are never split into surrogates.
 */
export function pickChar(alphabet: string, random: RandomIndex = secureRandomIndex): string {
  if (alphabet.length === 0) {
    throw new RangeError("cannot pick from an empty alphabet");
  }
  return pickItem([...alphabet], random);
}

export function pickItem<T>(items: readonly T[], random: RandomIndex = secureRandomIndex): T {
  if (items.length === 0) {
    throw new RangeError("cannot pick from an empty list");
  }
  const index = random(items.length);
  const item = items[index];
  if (item === undefined) {
    throw new RangeError(`random index ${index} out of range for ${items.length} items`);
  }
  return item;
}

/**
 * Fisher–Yates shuffle. Mutates and returns `items`.
 */
export function shuffleInPlace<T>(items: T[], random: RandomIndex = secureRandomIndex): T[] {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = random(i + 1);
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}
