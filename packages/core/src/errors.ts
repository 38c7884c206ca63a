import type { ResegmentationIssue } from "./types.js";

export type ApparatusErrorCode =
  | "STRUCTURAL_VIOLATION"
  | "RESEGMENTATION_MISMATCH"
  | "UNKNOWN_WITNESS_MEMBERSHIP"
  | "CONFIGURATION_CONFLICT";

export class ApparatusError extends Error {
  constructor(
    public readonly code: ApparatusErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ApparatusError";
  }
}

export class ResegmentationError extends ApparatusError {
  constructor(public readonly issues: ResegmentationIssue[]) {
    super(
      "RESEGMENTATION_MISMATCH",
      `Resegmentation is not valid: ${issues.length} reading(s) disagree with their lemma.`,
      { issueCount: issues.length },
    );
    this.name = "ResegmentationError";
  }
}

export function structuralViolation(message: string, details?: Record<string, unknown>): ApparatusError {
  return new ApparatusError("STRUCTURAL_VIOLATION", message, details);
}
