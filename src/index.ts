export {
  AMBIGUOUS_CHARS,
  CHARACTER_CLASSES,
  CLASS_ALPHABETS,
  DEFAULT_PASSWORD_LENGTH,
  MAX_BATCH_COUNT,
  MAX_PASSPHRASE_WORD_COUNT,
  MAX_PASSWORD_LENGTH,
  MIN_PASSWORD_LENGTH,
  PASSPHRASE_WORDS,
  getDefaultPasswordLength,
  type CharacterClass,
} from "./generator/generator-constants.js";
export { ConfigError, isConfigError, type ConfigErrorCode } from "./generator/errors.js";
export {
  DEFAULT_GENERATION_CONFIG,
  createGenerationConfig,
  generateMany,
  generatePassword,
  stripAmbiguous,
  type GenerationConfig,
  type GenerationOverrides,
} from "./generator/password-generator.js";
export {
  generatePassphrase,
  generatePassphrases,
  type PassphraseOptions,
} from "./generator/passphrase.js";
export {
  analyzePasswordStrength,
  strengthLabel,
  type StrengthLabel,
  type StrengthReport,
} from "./generator/password-strength.js";
export {
  pickChar,
  pickItem,
  secureRandomIndex,
  shuffleInPlace,
  type RandomIndex,
} from "./generator/secure-random.js";
export { handleInterrupt, runCli, type CliIo, type RunCliOptions } from "./cli/run.js";
