/**
 * Error taxonomy for orchestration runs
 */

/**
 * Standard error codes
 */
export enum VteamErrorCode {
  STRUCTURAL = "STRUCTURAL",
  PRECONDITION = "PRECONDITION",
  EVIDENCE_VIOLATION = "EVIDENCE_VIOLATION",
  REVIEW_LIMIT = "REVIEW_LIMIT",
  CONCURRENT_UPDATE = "CONCURRENT_UPDATE",
  CONFIG_INVALID = "CONFIG_INVALID",
  SCENARIO_INVALID = "SCENARIO_INVALID",
  CANCELLED = "CANCELLED",
}

/** Codes that end the run immediately and are never retried */
const FATAL_CODES: ReadonlySet<VteamErrorCode> = new Set([
  VteamErrorCode.STRUCTURAL,
  VteamErrorCode.PRECONDITION,
  VteamErrorCode.EVIDENCE_VIOLATION,
  VteamErrorCode.REVIEW_LIMIT,
  VteamErrorCode.SCENARIO_INVALID,
]);

export class VteamError extends Error {
  readonly code: VteamErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: VteamErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "VteamError";
    this.code = code;
    this.details = details;
  }
}

/**
 * Plan is missing fields a stage requires
 */
export class StructuralError extends VteamError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(VteamErrorCode.STRUCTURAL, message, details);
    this.name = "StructuralError";
  }
}

/**
 * Stage invoked before the state it depends on exists
 */
export class PreconditionError extends VteamError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(VteamErrorCode.PRECONDITION, message, details);
    this.name = "PreconditionError";
  }
}

/**
 * Output claims completion without a backing evidence ledger
 */
export class EvidenceViolation extends VteamError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(VteamErrorCode.EVIDENCE_VIOLATION, message, details);
    this.name = "EvidenceViolation";
  }
}

export function isVteamError(error: unknown): error is VteamError {
  return error instanceof VteamError;
}

export function isFatalError(error: unknown): boolean {
  return isVteamError(error) && FATAL_CODES.has(error.code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
