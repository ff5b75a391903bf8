export const CHARACTER_CLASSES = ["lowercase", "uppercase", "digits", "symbols"] as const;
export type CharacterClass = (typeof CHARACTER_CLASSES)[number];

export const CLASS_ALPHABETS: Readonly<Record<CharacterClass, string>> = Object.freeze({
  lowercase: "abcdefghijklmnopqrstuvwxyz",
  uppercase: "ABCDEFGHIJKLMNOPQRSTUVWXYZ",
  digits: "0123456789",
  symbols: "!@#$%^&*()_+-=[]{}|;:,.<>?",
});

// Visually confusable characters dropped by excludeAmbiguous
export const AMBIGUOUS_CHARS = "il1Lo0O";

export const MIN_PASSWORD_LENGTH = 4;
export const DEFAULT_PASSWORD_LENGTH = 12;
export const MAX_PASSWORD_LENGTH = 4096;
export const DEFAULT_CLASS_MINIMUM = 1;
export const MAX_BATCH_COUNT = 10_000;

export const DEFAULT_PASSPHRASE_WORD_COUNT = 4;
export const MAX_PASSPHRASE_WORD_COUNT = 1000;
export const DEFAULT_PASSPHRASE_SEPARATOR = "-";
export const PASSPHRASE_SUFFIX_BOUND = 1000; // trailing number is in [0, 1000)

export const PASSPHRASE_WORDS: readonly string[] = Object.freeze([
  "apple", "brave", "cloud", "dance", "eagle", "flame", "grace", "happy",
  "imagine", "jungle", "knight", "light", "magic", "nature", "ocean", "peace",
  "quiet", "river", "storm", "tiger", "unity", "village", "wisdom", "xenial",
  "yellow", "zebra", "anchor", "bridge", "castle", "dragon", "earth", "forest",
  "galaxy", "harbor", "island", "journey", "kingdom", "legend", "mountain", "noble",
]);

export const DEFAULT_LENGTH_ENV = "PASSGEN_DEFAULT_LENGTH";

/**
 * Default password length, overridable through `PASSGEN_DEFAULT_LENGTH`.
 * Values that are not integers of at least {@link MIN_PASSWORD_LENGTH} are ignored.
 */
export const getDefaultPasswordLength = (env: NodeJS.ProcessEnv = process.env): number => {
  const raw = env[DEFAULT_LENGTH_ENV];
  if (raw && raw.trim()) {
    const parsed = Number(raw);
    if (Number.isInteger(parsed) && parsed >= MIN_PASSWORD_LENGTH) {
      return parsed;
    }
  }
  return DEFAULT_PASSWORD_LENGTH;
};
