import { assertBatchCount, ConfigError } from "./errors.js";
import {
  AMBIGUOUS_CHARS,
  CHARACTER_CLASSES,
  CLASS_ALPHABETS,
  DEFAULT_CLASS_MINIMUM,
  DEFAULT_PASSWORD_LENGTH,
  MAX_PASSWORD_LENGTH,
  MIN_PASSWORD_LENGTH,
  type CharacterClass,
} from "./generator-constants.js";
import { pickItem, secureRandomIndex, shuffleInPlace, type RandomIndex } from "./secure-random.js";

export type GenerationConfig = {
  length: number;
  include: Record<CharacterClass, boolean>;
  /** Minimums of classes that are not included are ignored. */
  minimums: Record<CharacterClass, number>;
  excludeAmbiguous: boolean;
  /** Replaces the built-in alphabet of a class, e.g. a restricted symbol set. */
  alphabets?: Partial<Record<CharacterClass, string>>;
};

export type GenerationOverrides = {
  length?: number;
  include?: Partial<Record<CharacterClass, boolean>>;
  minimums?: Partial<Record<CharacterClass, number>>;
  excludeAmbiguous?: boolean;
  alphabets?: Partial<Record<CharacterClass, string>>;
};

type DefaultGenerationConfig = {
  readonly length: number;
  readonly include: Readonly<Record<CharacterClass, boolean>>;
  readonly minimums: Readonly<Record<CharacterClass, number>>;
  readonly excludeAmbiguous: boolean;
};

export const DEFAULT_GENERATION_CONFIG: DefaultGenerationConfig = Object.freeze({
  length: DEFAULT_PASSWORD_LENGTH,
  include: Object.freeze({ lowercase: true, uppercase: true, digits: true, symbols: true }),
  minimums: Object.freeze({
    lowercase: DEFAULT_CLASS_MINIMUM,
    uppercase: DEFAULT_CLASS_MINIMUM,
    digits: DEFAULT_CLASS_MINIMUM,
    symbols: DEFAULT_CLASS_MINIMUM,
  }),
  excludeAmbiguous: false,
});

export function createGenerationConfig(overrides: GenerationOverrides = {}): GenerationConfig {
  return {
    length: overrides.length ?? DEFAULT_GENERATION_CONFIG.length,
    include: { ...DEFAULT_GENERATION_CONFIG.include, ...overrides.include },
    minimums: { ...DEFAULT_GENERATION_CONFIG.minimums, ...overrides.minimums },
    excludeAmbiguous: overrides.excludeAmbiguous ?? DEFAULT_GENERATION_CONFIG.excludeAmbiguous,
    ...(overrides.alphabets ? { alphabets: { ...overrides.alphabets } } : {}),
  };
}

export function stripAmbiguous(alphabet: string): string {
  return [...alphabet].filter((ch) => !AMBIGUOUS_CHARS.includes(ch)).join("");
}

type ClassPlan = {
  name: CharacterClass;
  /** One entry per code point, so astral characters are never split. */
  alphabet: string[];
  minimum: number;
};

function planClasses(config: GenerationConfig): ClassPlan[] {
  const plans: ClassPlan[] = [];
  for (const name of CHARACTER_CLASSES) {
    if (!config.include[name]) {
      continue;
    }
    const base = config.alphabets?.[name] ?? CLASS_ALPHABETS[name];
    plans.push({
      name,
      alphabet: [...(config.excludeAmbiguous ? stripAmbiguous(base) : base)],
      minimum: config.minimums[name],
    });
  }
  return plans;
}

function validate(config: GenerationConfig): ClassPlan[] {
  if (!Number.isInteger(config.length) || config.length < MIN_PASSWORD_LENGTH) {
    throw new ConfigError(
      "INVALID_LENGTH",
      `Password length must be at least ${MIN_PASSWORD_LENGTH} characters (got ${config.length})`,
    );
  }
  if (config.length > MAX_PASSWORD_LENGTH) {
    throw new ConfigError(
      "INVALID_LENGTH",
      `Password length must be at most ${MAX_PASSWORD_LENGTH} characters (got ${config.length})`,
    );
  }

  for (const name of CHARACTER_CLASSES) {
    const minimum = config.minimums[name];
    if (config.include[name] && (!Number.isInteger(minimum) || minimum < 0)) {
      throw new ConfigError(
        "INVALID_MINIMUM",
        `Minimum ${name} count must be a non-negative integer (got ${minimum})`,
      );
    }
  }

  const plans = planClasses(config);
  if (plans.length === 0) {
    throw new ConfigError("NO_CHARACTER_CLASS", "At least one character type must be selected");
  }

  for (const plan of plans) {
    if (plan.minimum > 0 && plan.alphabet.length === 0) {
      throw new ConfigError(
        "EMPTY_CLASS_ALPHABET",
        `No ${plan.name} characters remain to satisfy a minimum of ${plan.minimum}`,
      );
    }
  }

  if (plans.every((plan) => plan.alphabet.length === 0)) {
    throw new ConfigError("EMPTY_POOL", "The selected character types contain no characters");
  }

  const required = plans.reduce((sum, plan) => sum + plan.minimum, 0);
  if (required > config.length) {
    throw new ConfigError(
      "MINIMUMS_EXCEED_LENGTH",
      `Required minimum characters (${required}) exceed password length (${config.length})`,
    );
  }

  return plans;
}

/**
 * Generates a password that satisfies every per-class minimum of `config`.
 *
 * Required characters are drawn from their own class, the rest uniformly from
 * the union of the included alphabets, and the result is shuffled so the
 * required characters do not sit at predictable positions.
 */
export function generatePassword(
  config: GenerationConfig,
  random: RandomIndex = secureRandomIndex,
): string {
  const plans = validate(config);
  const pool = plans.flatMap((plan) => plan.alphabet);

  const chars: string[] = [];
  for (const plan of plans) {
    for (let i = 0; i < plan.minimum; i += 1) {
      chars.push(pickItem(plan.alphabet, random));
    }
  }
  while (chars.length < config.length) {
    chars.push(pickItem(pool, random));
  }

  return shuffleInPlace(chars, random).join("");
}

/**
 * Generates `count` passwords independently; duplicates are possible.
 */
export function generateMany(
  count: number,
  config: GenerationConfig,
  random: RandomIndex = secureRandomIndex,
): string[] {
  assertBatchCount(count);
  return Array.from({ length: count }, () => generatePassword(config, random));
}
