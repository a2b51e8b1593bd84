import type { Phase } from '@tagfield/shared';
import type { z } from 'zod';

/**
 * Issue reported by input validation, in the shape returned to HTTP callers.
 */
export interface InputIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Error thrown when a device poll payload lacks a field or carries a malformed one.
 */
export class InvalidPollError extends Error {
  readonly issues: readonly InputIssue[];

  constructor(message: string, issues: readonly InputIssue[] = []) {
    super(message);
    this.name = 'InvalidPollError';
    this.issues = issues;
  }
}

/**
 * Error thrown when operator settings are not well-formed integers within range.
 */
export class InvalidSettingsError extends Error {
  readonly issues: readonly InputIssue[];

  constructor(issues: readonly InputIssue[]) {
    super(`Invalid game settings: ${issues.map((issue) => `${issue.path} ${issue.message}`).join('; ')}`);
    this.name = 'InvalidSettingsError';
    this.issues = issues;
  }
}

/**
 * Error thrown when an operator asks for a phase that cannot follow the current one.
 */
export class PhaseTransitionError extends Error {
  readonly from: Phase;
  readonly to: Phase;

  constructor(from: Phase, to: Phase) {
    super(`Cannot move from ${from} to ${to}; reset the activity first`);
    this.name = 'PhaseTransitionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * Flatten zod issues into the path/message pairs returned to callers.
 */
export function toInputIssues(issues: readonly z.ZodIssue[]): InputIssue[] {
  return issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}
