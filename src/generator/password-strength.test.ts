import { describe, expect, it } from "vitest";
import { analyzePasswordStrength, strengthLabel } from "./password-strength.js";

describe("analyzePasswordStrength", () => {
  it("scores a password passing every check above 100 because the total is not clamped", () => {
    const result = analyzePasswordStrength("Ab3!Fg7&Kp9Q");
    expect(result).toEqual({
      score: 105,
      strength: "Very Strong",
      feedback: [],
      length: 12,
      hasLowercase: true,
      hasUppercase: true,
      hasDigits: true,
      hasSymbols: true,
    });
  });

  it("penalises repeated characters and missing classes", () => {
    const result = analyzePasswordStrength("aaaa1111");
    expect(result.score).toBe(55);
    expect(result.strength).toBe("Moderate");
    expect(result.feedback).toEqual([
      "Consider using at least 12 characters",
      "Add uppercase letters",
      "Add special characters",
      "Avoid repeating characters",
    ]);
  });

  it("flags sequential digits", () => {
    const result = analyzePasswordStrength("abc123");
    expect(result.score).toBe(45);
    expect(result.strength).toBe("Weak");
    expect(result.feedback).toEqual([
      "Password is too short - use at least 8 characters",
      "Add uppercase letters",
      "Add special characters",
      "Avoid sequential numbers",
    ]);
  });

  it("treats 890 as a sequential run", () => {
    const result = analyzePasswordStrength("Xy!890Zq#kLm");
    expect(result.feedback).toEqual(["Avoid sequential numbers"]);
    expect(result.score).toBe(95);
  });

  it("does not count descending digits as sequential", () => {
    expect(analyzePasswordStrength("Xy!321Zq#kLm").feedback).toEqual([]);
  });

  it("reports every missing class for an empty string", () => {
    const result = analyzePasswordStrength("");
    expect(result.score).toBe(25);
    expect(result.strength).toBe("Very Weak");
    expect(result.length).toBe(0);
    expect(result.feedback).toEqual([
      "Password is too short - use at least 8 characters",
      "Add lowercase letters",
      "Add uppercase letters",
      "Add numbers",
      "Add special characters",
    ]);
  });

  it("gives the middle length bonus for 8 to 11 characters", () => {
    const result = analyzePasswordStrength("abcdefgh1!");
    expect(result.score).toBe(80);
    expect(result.strength).toBe("Strong");
  });

  it("only counts symbols from the generator's symbol set", () => {
    const result = analyzePasswordStrength("Abcdefghij~");
    expect(result.hasSymbols).toBe(false);
    expect(result.score).toBe(65);
    expect(result.feedback).toEqual([
      "Consider using at least 12 characters",
      "Add numbers",
      "Add special characters",
    ]);
  });

  it("counts length in code points", () => {
    const result = analyzePasswordStrength("😀😀😀");
    expect(result.length).toBe(3);
    expect(result.feedback).toContain("Avoid repeating characters");
    expect(result.score).toBe(15);
  });

  it("counts non-ASCII decimal digits as numbers", () => {
    const result = analyzePasswordStrength("\u0661\u0662\u0663");
    expect(result.hasDigits).toBe(true);
    expect(result.score).toBe(40);
    expect(result.strength).toBe("Weak");
  });

  it("treats carriage returns and line separators as repeatable characters", () => {
    expect(analyzePasswordStrength("\r\r\r").feedback).toContain("Avoid repeating characters");
    expect(analyzePasswordStrength("a\u2028\u2028\u2028").feedback).toContain(
      "Avoid repeating characters",
    );
  });

  it("does not treat a run of newlines as repeated characters", () => {
    expect(analyzePasswordStrength("\n\n\n").feedback).toEqual([
      "Password is too short - use at least 8 characters",
      "Add lowercase letters",
      "Add uppercase letters",
      "Add numbers",
      "Add special characters",
    ]);
  });

  it("allows a run of two identical characters", () => {
    expect(analyzePasswordStrength("Passw0rd!Xyz").feedback).toEqual([]);
  });
});

describe("strengthLabel", () => {
  it("maps scores to labels at each threshold", () => {
    expect(strengthLabel(105)).toBe("Very Strong");
    expect(strengthLabel(85)).toBe("Very Strong");
    expect(strengthLabel(84)).toBe("Strong");
    expect(strengthLabel(70)).toBe("Strong");
    expect(strengthLabel(69)).toBe("Moderate");
    expect(strengthLabel(50)).toBe("Moderate");
    expect(strengthLabel(49)).toBe("Weak");
    expect(strengthLabel(30)).toBe("Weak");
    expect(strengthLabel(29)).toBe("Very Weak");
    expect(strengthLabel(0)).toBe("Very Weak");
  });
});
