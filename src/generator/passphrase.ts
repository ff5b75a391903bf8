import { assertBatchCount, ConfigError } from "./errors.js";
import {
  DEFAULT_PASSPHRASE_SEPARATOR,
  DEFAULT_PASSPHRASE_WORD_COUNT,
  MAX_PASSPHRASE_WORD_COUNT,
  PASSPHRASE_SUFFIX_BOUND,
  PASSPHRASE_WORDS,
} from "./generator-constants.js";
import { pickItem, secureRandomIndex, type RandomIndex } from "./secure-random.js";

export type PassphraseOptions = {
  wordCount?: number;
  separator?: string;
  capitalize?: boolean;
};

function capitalizeWord(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Joins `wordCount` words drawn with replacement, then appends the separator
 * and a random number below 1000, e.g. `Ocean-Tiger-Noble-Magic-417`.
 */
export function generatePassphrase(
  options: PassphraseOptions = {},
  random: RandomIndex = secureRandomIndex,
  words: readonly string[] = PASSPHRASE_WORDS,
): string {
  const wordCount = options.wordCount ?? DEFAULT_PASSPHRASE_WORD_COUNT;
  const separator = options.separator ?? DEFAULT_PASSPHRASE_SEPARATOR;
  const capitalize = options.capitalize ?? true;

  if (!Number.isInteger(wordCount) || wordCount < 1) {
    throw new ConfigError(
      "INVALID_WORD_COUNT",
      `Passphrase word count must be a positive integer (got ${wordCount})`,
    );
  }
  if (wordCount > MAX_PASSPHRASE_WORD_COUNT) {
    throw new ConfigError(
      "INVALID_WORD_COUNT",
      `Passphrase word count must be at most ${MAX_PASSPHRASE_WORD_COUNT} (got ${wordCount})`,
    );
  }

  const picked = Array.from({ length: wordCount }, () => {
    const word = pickItem(words, random);
    return capitalize ? capitalizeWord(word) : word;
  });
  const suffix = random(PASSPHRASE_SUFFIX_BOUND);

  return `${picked.join(separator)}${separator}${suffix}`;
}

export function generatePassphrases(
  count: number,
  options: PassphraseOptions = {},
  random: RandomIndex = secureRandomIndex,
): string[] {
  assertBatchCount(count);
  return Array.from({ length: count }, () => generatePassphrase(options, random));
}
