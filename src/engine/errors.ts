// src/engine/errors.ts
import type { ZodError } from "zod";

export interface ParameterIssue {
  parameter: string;
  constraint: string;
}

function describe(issues: ParameterIssue[]) {
  return issues.map(i => `${i.parameter}: ${i.constraint}`).join("; ");
}

/** Out-of-range, wrongly signed or inconsistent input. Raised before any joint exists. */
export class InvalidParameterError extends Error {
  readonly issues: ParameterIssue[];

  constructor(issues: ParameterIssue[], message?: string) {
    super(message ?? `Invalid parameters: ${describe(issues)}`);
    this.name = "InvalidParameterError";
    this.issues = issues;
  }

  static fromZod(error: ZodError): InvalidParameterError {
    const issues = error.issues.map(issue => ({
      parameter: issue.path.length ? issue.path.join(".") : "(params)",
      constraint: issue.message
    }));
    return new InvalidParameterError(issues);
  }
}

/** Individually valid parameters whose combination leaves nothing to build. */
export class InfeasibleTopologyError extends InvalidParameterError {
  constructor(issues: ParameterIssue[]) {
    super(issues, `Infeasible topology: ${describe(issues)}`);
    this.name = "InfeasibleTopologyError";
  }
}

/** A generated result broke a structural invariant. Always a generator bug. */
export class InvariantViolationError extends Error {
  readonly violations: string[];

  constructor(violations: string[]) {
    super(`Generator invariant violated: ${violations.join("; ")}`);
    this.name = "InvariantViolationError";
    this.violations = violations;
  }
}
