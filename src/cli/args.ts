import { parseArgs } from "node:util";
import { getDefaultPasswordLength, type CharacterClass } from "../generator/generator-constants.js";
import { createGenerationConfig, type GenerationConfig } from "../generator/password-generator.js";
import type { PassphraseOptions } from "../generator/passphrase.js";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type CliCommand =
  | { kind: "help" }
  | { kind: "analyze"; password: string; json: boolean }
  | { kind: "passphrase"; count: number; options: PassphraseOptions; json: boolean }
  | { kind: "password"; count: number; config: GenerationConfig; json: boolean };

const OPTIONS = {
  length: { type: "string", short: "l" },
  count: { type: "string", short: "c" },
  "no-uppercase": { type: "boolean" },
  "no-lowercase": { type: "boolean" },
  "no-digits": { type: "boolean" },
  "no-symbols": { type: "boolean" },
  "exclude-ambiguous": { type: "boolean" },
  "min-lowercase": { type: "string" },
  "min-uppercase": { type: "string" },
  "min-digits": { type: "string" },
  "min-symbols": { type: "string" },
  passphrase: { type: "boolean", short: "p" },
  words: { type: "string", short: "w" },
  separator: { type: "string", short: "s" },
  "no-capitalize": { type: "boolean" },
  analyze: { type: "string", short: "a" },
  json: { type: "boolean" },
  help: { type: "boolean", short: "h" },
} as const;

export const USAGE = [
  "Usage: passgen [options]",
  "",
  "Options:",
  "  -l, --length <n>          Password length (default: 12)",
  "  -c, --count <n>           Number of passwords or passphrases (default: 1)",
  "      --no-uppercase        Exclude uppercase letters",
  "      --no-lowercase        Exclude lowercase letters",
  "      --no-digits           Exclude digits",
  "      --no-symbols          Exclude symbols",
  "      --exclude-ambiguous   Exclude ambiguous characters (il1Lo0O)",
  "      --min-lowercase <n>   Minimum lowercase letters (default: 1)",
  "      --min-uppercase <n>   Minimum uppercase letters (default: 1)",
  "      --min-digits <n>      Minimum digits (default: 1)",
  "      --min-symbols <n>     Minimum symbols (default: 1)",
  "  -p, --passphrase          Generate passphrases instead",
  "  -w, --words <n>           Words per passphrase (default: 4)",
  "  -s, --separator <s>       Passphrase separator (default: -)",
  "      --no-capitalize       Keep passphrase words lowercase",
  "  -a, --analyze <password>  Analyze the strength of a password",
  "      --json                Print JSON instead of text",
  "  -h, --help                Show this help",
].join("\n");

function parseInteger(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new UsageError(`--${flag} expects an integer, got "${raw}"`);
  }
  return Number(trimmed);
}

function isParseArgsError(err: unknown): err is Error & { code: string } {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string" &&
    err.code.startsWith("ERR_PARSE_ARGS")
  );
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (err) {
    if (isParseArgsError(err)) {
      throw new UsageError(err.message);
    }
    throw err;
  }
}

export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliCommand {
  const values = readFlags(argv);

  if (values.help) {
    return { kind: "help" };
  }

  const json = values.json ?? false;

  if (values.analyze !== undefined) {
    return { kind: "analyze", password: values.analyze, json };
  }

  const count = parseInteger("count", values.count) ?? 1;

  if (values.passphrase) {
    return {
      kind: "passphrase",
      count,
      options: {
        wordCount: parseInteger("words", values.words),
        separator: values.separator,
        capitalize: !values["no-capitalize"],
      },
      json,
    };
  }

  const minimums: Partial<Record<CharacterClass, number>> = {};
  const minLowercase = parseInteger("min-lowercase", values["min-lowercase"]);
  const minUppercase = parseInteger("min-uppercase", values["min-uppercase"]);
  const minDigits = parseInteger("min-digits", values["min-digits"]);
  const minSymbols = parseInteger("min-symbols", values["min-symbols"]);
  if (minLowercase !== undefined) minimums.lowercase = minLowercase;
  if (minUppercase !== undefined) minimums.uppercase = minUppercase;
  if (minDigits !== undefined) minimums.digits = minDigits;
  if (minSymbols !== undefined) minimums.symbols = minSymbols;

  return {
    kind: "password",
    count,
    config: createGenerationConfig({
      length: parseInteger("length", values.length) ?? getDefaultPasswordLength(env),
      include: {
        lowercase: !values["no-lowercase"],
        uppercase: !values["no-uppercase"],
        digits: !values["no-digits"],
        symbols: !values["no-symbols"],
      },
      minimums,
      excludeAmbiguous: values["exclude-ambiguous"] ?? false,
    }),
    json,
  };
}
