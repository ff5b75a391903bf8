import type { StrengthReport } from "../generator/password-strength.js";

const CHECK = "✓";
const CROSS = "✗";

function mark(present: boolean): string {
  return present ? CHECK : CROSS;
}

/**
 * Text block for `--analyze`. The password itself is never printed, only one `*` per character.
 */
export function formatAnalysis(report: StrengthReport): string[] {
  const lines = [
    "",
    `Password Analysis for: ${"*".repeat(report.length)}`,
    `Length: ${report.length}`,
    `Strength: ${report.strength}`,
    `Score: ${report.score}/100`,
  ];

  if (report.feedback.length > 0) {
    lines.push("", "Suggestions for improvement:");
    for (const suggestion of report.feedback) {
      lines.push(`  • ${suggestion}`);
    }
  }

  lines.push(
    "",
    "Character types present:",
    `  • Lowercase: ${mark(report.hasLowercase)}`,
    `  • Uppercase: ${mark(report.hasUppercase)}`,
    `  • Digits: ${mark(report.hasDigits)}`,
    `  • Symbols: ${mark(report.hasSymbols)}`,
  );
  return lines;
}

export function formatNumbered(label: "Password" | "Passphrase", values: string[]): string[] {
  return values.map((value, i) => `${label} ${i + 1}: ${value}`);
}

export function formatStrengthLine(report: StrengthReport): string {
  return `Strength: ${report.strength} (${report.score}/100)`;
}
