import { describe, expect, it } from "vitest";
import { pickChar, pickItem, secureRandomIndex, shuffleInPlace } from "./secure-random.js";

describe("secureRandomIndex", () => {
  it("returns 0 for a bound of 1", () => {
    expect(secureRandomIndex(1)).toBe(0);
  });

  it("stays within [0, max)", () => {
    for (let i = 0; i < 200; i += 1) {
      const value = secureRandomIndex(7);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(7);
    }
  });

  it("rejects bounds that are not positive integers", () => {
    expect(() => secureRandomIndex(0)).toThrow(RangeError);
    expect(() => secureRandomIndex(2.5)).toThrow(RangeError);
  });
});

describe("pickChar", () => {
  it("returns the character at the drawn index", () => {
    expect(pickChar("xyz", () => 2)).toBe("z");
  });

  it("indexes by code point", () => {
    expect(pickChar("a😀b", () => 1)).toBe("😀");
    expect(pickChar("a😀b", () => 2)).toBe("b");
  });

  it("throws on an empty alphabet", () => {
    expect(() => pickChar("")).toThrow("cannot pick from an empty alphabet");
  });
});

describe("pickItem", () => {
  it("returns the item at the drawn index", () => {
    expect(pickItem(["a", "b", "c"], () => 1)).toBe("b");
  });

  it("throws when the random source is out of range", () => {
    expect(() => pickItem(["a"], () => 3)).toThrow(RangeError);
  });
});

describe("shuffleInPlace", () => {
  it("is the identity when every draw picks the current position", () => {
    expect(shuffleInPlace([1, 2, 3, 4], (max) => max - 1)).toEqual([1, 2, 3, 4]);
  });

  it("rotates left when every draw picks the first position", () => {
    expect(shuffleInPlace([1, 2, 3, 4], () => 0)).toEqual([2, 3, 4, 1]);
  });

  it("keeps the same elements", () => {
    const items = Array.from({ length: 50 }, (_, i) => i);
    const shuffled = shuffleInPlace([...items]);
    expect([...shuffled].sort((a, b) => a - b)).toEqual(items);
  });
});
