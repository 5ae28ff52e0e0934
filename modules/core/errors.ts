export type RecordIssueReason = "missing" | "empty" | "out_of_range" | "odd" | "invalid";

export type RecordIssue = {
  /** Dotted path of the offending attribute, e.g. `rearWheel.diameter`. */
  attribute: string;
  reason: RecordIssueReason;
  detail?: string;
};

const REASON_TEXT: Record<RecordIssueReason, string> = {
  missing: "is missing",
  empty: "must not be empty",
  out_of_range: "is out of range",
  odd: "must be even",
  invalid: "is invalid",
};

export const describeIssue = (issue: RecordIssue): string => {
  const base = `${issue.attribute} ${REASON_TEXT[issue.reason]}`;
  return issue.detail ? `${base} (${issue.detail})` : base;
};

export type ErrorContext = Record<string, string | number | boolean | null>;

/**
 * A required measurement is absent, empty or outside the values the
 * calculation accepts. Raised before any arithmetic runs.
 */
export class InvalidInputError extends Error {
  readonly code = "invalid_input" as const;
  issues: RecordIssue[];
  label: string | null;

  constructor(issues: RecordIssue[], label: string | null = null) {
    const summary = issues.map(describeIssue).join("; ");
    super(label ? `${label}: ${summary}` : summary);
    this.issues = issues;
    this.label = label;
    this.name = "InvalidInputError";
  }

  get attribute(): string {
    return this.issues[0]?.attribute ?? "";
  }
}

/**
 * The inputs are individually well formed but the formula is undefined for
 * them (sin α = 0 for trail, a spoke that cannot reach the rim, ...).
 */
export class CalculationDomainError extends Error {
  readonly code = "domain_error" as const;
  quantity: string;
  context: ErrorContext;

  constructor(quantity: string, message: string, context: ErrorContext = {}) {
    super(`${quantity}: ${message}`);
    this.quantity = quantity;
    this.context = context;
    this.name = "CalculationDomainError";
  }
}

export type CalculatorError = InvalidInputError | CalculationDomainError;

export const isCalculatorError = (error: unknown): error is CalculatorError =>
  error instanceof InvalidInputError || error instanceof CalculationDomainError;

export const invalidInput = (
  attribute: string,
  reason: RecordIssueReason,
  detail?: string,
): InvalidInputError => new InvalidInputError([{ attribute, reason, ...(detail ? { detail } : {}) }]);
