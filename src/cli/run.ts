import { isConfigError } from "../generator/errors.js";
import { generatePassphrases } from "../generator/passphrase.js";
import { generateMany } from "../generator/password-generator.js";
import { analyzePasswordStrength } from "../generator/password-strength.js";
import { secureRandomIndex, type RandomIndex } from "../generator/secure-random.js";
import { parseCliArgs, USAGE, UsageError, type CliCommand } from "./args.js";
import { formatAnalysis, formatNumbered, formatStrengthLine } from "./format.js";

export const EXIT_OK = 0;
export const EXIT_CONFIG_ERROR = 1;
export const EXIT_USAGE_ERROR = 2;

export type CliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

export const processIo: CliIo = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

export type RunCliOptions = {
  io?: CliIo;
  env?: NodeJS.ProcessEnv;
  random?: RandomIndex;
};

function execute(command: CliCommand, io: CliIo, random: RandomIndex): void {
  switch (command.kind) {
    case "help":
      io.stdout(USAGE);
      return;

    case "analyze": {
      const report = analyzePasswordStrength(command.password);
      if (command.json) {
        io.stdout(JSON.stringify(report));
        return;
      }
      for (const line of formatAnalysis(report)) {
        io.stdout(line);
      }
      return;
    }

    case "passphrase": {
      const passphrases = generatePassphrases(command.count, command.options, random);
      if (command.json) {
        io.stdout(JSON.stringify({ passphrases }));
        return;
      }
      for (const line of formatNumbered("Passphrase", passphrases)) {
        io.stdout(line);
      }
      return;
    }

    case "password": {
      const passwords = generateMany(command.count, command.config, random);
      // strength is only reported when a single password is requested
      const single = passwords.length === 1 ? analyzePasswordStrength(passwords[0]) : null;
      if (command.json) {
        const payload = single
          ? { passwords, strength: { label: single.strength, score: single.score } }
          : { passwords };
        io.stdout(JSON.stringify(payload));
        return;
      }
      for (const line of formatNumbered("Password", passwords)) {
        io.stdout(line);
      }
      if (single) {
        io.stdout(formatStrengthLine(single));
      }
      return;
    }
  }
}

/**
 * Runs the CLI against `argv` (without the node and script entries) and
 * returns the process exit code. Errors other than configuration and usage
 * errors propagate.
 */
export function runCli(argv: string[], opts: RunCliOptions = {}): number {
  const io = opts.io ?? processIo;
  try {
    const command = parseCliArgs(argv, opts.env ?? process.env);
    execute(command, io, opts.random ?? secureRandomIndex);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`Error: ${err.message}`);
      io.stderr("Run with --help for usage.");
      return EXIT_USAGE_ERROR;
    }
    if (isConfigError(err)) {
      io.stderr(`Error: ${err.message}`);
      return EXIT_CONFIG_ERROR;
    }
    throw err;
  }
}

/**
 * SIGINT handler for the binary: reports the cancellation on stderr and exits 1.
 */
export function handleInterrupt(io: CliIo, exit: (code: number) => void): void {
  io.stderr("\nOperation cancelled by user.");
  exit(EXIT_CONFIG_ERROR);
}
