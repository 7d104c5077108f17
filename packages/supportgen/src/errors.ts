export type IntegrityErrorCode =
  | "UNKNOWN_TICKET_OWNER"
  | "UNKNOWN_TICKET_CUSTOMER"
  | "UNKNOWN_HANDLER"
  | "UNKNOWN_INTERACTION_CUSTOMER"
  | "UNKNOWN_TICKET_REFERENCE"
  | "FCR_INTERACTION_COUNT"
  | "CLOSURE_BEFORE_CREATION"
  | "UNKNOWN_QA_INTERACTION"
  | "UNKNOWN_WFM_USER";

export type FailureReport = {
  stage_failed: string;
  reason: string;
  violations: string[];
  next_action: string;
};

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** A lookup the generators rely on is missing from the configuration. */
export class GenerationError extends Error {
  readonly stage_name: string;

  constructor(stageName: string, message: string) {
    super(message);
    this.name = "GenerationError";
    this.stage_name = stageName;
  }
}

export class IntegrityError extends Error {
  readonly code: IntegrityErrorCode;
  readonly violations: string[];
  readonly next_action: string;

  constructor(params: {
    code: IntegrityErrorCode;
    reason: string;
    violations?: string[];
    next_action?: string;
  }) {
    super(params.reason);
    this.name = "IntegrityError";
    this.code = params.code;
    this.violations = params.violations ?? [];
    this.next_action =
      params.next_action ?? "Inspect the listed rows and the generator feeding that table, then regenerate.";
  }

  toFailureReport(): FailureReport {
    return {
      stage_failed: "integrity",
      reason: this.message,
      violations: this.violations,
      next_action: this.next_action,
    };
  }
}

export function toFailureReport(error: unknown, stageName: string): FailureReport {
  if (error instanceof IntegrityError) {
    return error.toFailureReport();
  }
  if (error instanceof ConfigError) {
    return {
      stage_failed: stageName,
      reason: error.message,
      violations: error.issues,
      next_action: "Fix the configuration file and rerun.",
    };
  }

  const reason = error instanceof Error ? error.message : String(error);
  return {
    stage_failed: error instanceof GenerationError ? error.stage_name : stageName,
    reason,
    violations: [],
    next_action: "Review the log output for the failing stage and rerun.",
  };
}
