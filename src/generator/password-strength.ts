export type StrengthLabel = "Very Strong" | "Strong" | "Moderate" | "Weak" | "Very Weak";

export type StrengthReport = {
  /** Raw additive score. Not clamped, so a password passing every check scores 105. */
  score: number;
  strength: StrengthLabel;
  feedback: string[];
  length: number;
  hasLowercase: boolean;
  hasUppercase: boolean;
  hasDigits: boolean;
  hasSymbols: boolean;
};

const MIN_LENGTH = 8;
const RECOMMENDED_LENGTH = 12;

const LENGTH_SCORE_RECOMMENDED = 25;
const LENGTH_SCORE_MIN = 15;
const LENGTH_SCORE_SHORT = 5;
const CLASS_SCORE = 15;
const PATTERN_SCORE = 10;

const SYMBOL_RE = /[!@#$%^&*()_+\-=[\]{}|;:,.<>?]/;
// any code point except a newline, so "\r\r\r" counts as a run
const REPEAT_RE = /([^\n])\1{2,}/u;
const DIGIT_RE = /\p{Nd}/u;
const SEQUENTIAL_DIGITS_RE = /012|123|234|345|456|567|678|789|890/;

const LABEL_THRESHOLDS: ReadonlyArray<readonly [number, StrengthLabel]> = [
  [85, "Very Strong"],
  [70, "Strong"],
  [50, "Moderate"],
  [30, "Weak"],
];

export function strengthLabel(score: number): StrengthLabel {
  for (const [min, label] of LABEL_THRESHOLDS) {
    if (score >= min) {
      return label;
    }
  }
  return "Very Weak";
}

export function analyzePasswordStrength(password: string): StrengthReport {
  const feedback: string[] = [];
  let score = 0;

  // code points, so an emoji counts once
  const length = [...password].length;
  if (length >= RECOMMENDED_LENGTH) {
    score += LENGTH_SCORE_RECOMMENDED;
  } else if (length >= MIN_LENGTH) {
    score += LENGTH_SCORE_MIN;
    feedback.push(`Consider using at least ${RECOMMENDED_LENGTH} characters`);
  } else {
    score += LENGTH_SCORE_SHORT;
    feedback.push(`Password is too short - use at least ${MIN_LENGTH} characters`);
  }

  const hasLowercase = /[a-z]/.test(password);
  const hasUppercase = /[A-Z]/.test(password);
  const hasDigits = DIGIT_RE.test(password);
  const hasSymbols = SYMBOL_RE.test(password);

  const classChecks: Array<[boolean, string]> = [
    [hasLowercase, "Add lowercase letters"],
    [hasUppercase, "Add uppercase letters"],
    [hasDigits, "Add numbers"],
    [hasSymbols, "Add special characters"],
  ];
  for (const [present, hint] of classChecks) {
    if (present) {
      score += CLASS_SCORE;
    } else {
      feedback.push(hint);
    }
  }

  if (REPEAT_RE.test(password)) {
    feedback.push("Avoid repeating characters");
  } else {
    score += PATTERN_SCORE;
  }

  if (SEQUENTIAL_DIGITS_RE.test(password)) {
    feedback.push("Avoid sequential numbers");
  } else {
    score += PATTERN_SCORE;
  }

  return {
    score,
    strength: strengthLabel(score),
    feedback,
    length,
    hasLowercase,
    hasUppercase,
    hasDigits,
    hasSymbols,
  };
}
