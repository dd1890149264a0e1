import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from "@nestjs/common";

export enum RewardsErrorCode {
  TOKEN_EXPIRED = "TOKEN_EXPIRED",
  AUTH_FAILED = "AUTH_FAILED",
  FORBIDDEN_ROLE = "FORBIDDEN_ROLE",
  IDEMPOTENCY_KEY_MISSING = "IDEMPOTENCY_KEY_MISSING",
  IDEMPOTENCY_IN_PROGRESS = "IDEMPOTENCY_IN_PROGRESS",
  LEDGER_UNAVAILABLE = "LEDGER_UNAVAILABLE",
}

export type FailureKind = "ValidationFailure" | "PolicyDenied" | "Conflict" | "NotFound" | "Expired" | "AlreadyRedeemed";

export type DenialReason =
  | "PROXIMITY"
  | "COOLDOWN"
  | "VELOCITY"
  | "IMPOSSIBLE_TRAVEL"
  | "DUPLICATE_CHECK_IN"
  | "LOCATION_INACTIVE"
  | "IDENTITY_INACTIVE"
  | "CAMPAIGN_INACTIVE"
  | "SPIN_LIMIT"
  | "DAILY_EARN_LIMIT"
  | "WEEKLY_EARN_LIMIT"
  | "LOCATION_EARN_LIMIT"
  | "MAX_BALANCE"
  | "DAILY_SPEND_LIMIT"
  | "INSUFFICIENT_CREDITS"
  | "STAFF_NOT_AUTHORIZED";

export interface Failure {
  kind: FailureKind;
  reason: string;
  message: string;
  details?: Record<string, unknown>;
}

export type Result<T> = { ok: true; value: T } | { ok: false; failure: Failure };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: FailureKind, reason: string, message: string, details?: Record<string, unknown>): Result<T> {
  return { ok: false, failure: { kind, reason, message, details } };
}

export function denied<T = never>(reason: DenialReason, message: string, details?: Record<string, unknown>): Result<T> {
  return fail("PolicyDenied", reason, message, details);
}

/**
 * Raised inside a ledger transaction when a concurrent writer won a race
 * (stock already exhausted, lock held elsewhere, serialization failure).
 * Orchestrators catch it, roll back and retry a bounded number of times.
 */
export class ConflictError extends Error {
  constructor(message: string, public readonly resource?: string) {
    super(message);
    this.name = "ConflictError";
  }
}

/**
 * The ledger store could not be reached. Never a successful no-op: the caller
 * may retry the whole request.
 */
export class LedgerUnavailableError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "LedgerUnavailableError";
  }
}

export interface RewardsErrorPayload {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

export function rewardsErrorPayload(code: string, message: string, details?: Record<string, unknown>): RewardsErrorPayload {
  return { error: code, message, details };
}

const STATUS_BY_KIND: Record<FailureKind, HttpStatus> = {
  ValidationFailure: HttpStatus.BAD_REQUEST,
  PolicyDenied: HttpStatus.FORBIDDEN,
  Conflict: HttpStatus.CONFLICT,
  NotFound: HttpStatus.NOT_FOUND,
  Expired: HttpStatus.GONE,
  AlreadyRedeemed: HttpStatus.CONFLICT,
};

export function httpStatusForFailure(failure: Failure): HttpStatus {
  if (failure.kind === "PolicyDenied" && failure.reason === "VELOCITY") {
    return HttpStatus.TOO_MANY_REQUESTS;
  }
  return STATUS_BY_KIND[failure.kind];
}

export function failureToHttpException(failure: Failure): HttpException {
  return new HttpException(
    rewardsErrorPayload(failure.reason, failure.message, { kind: failure.kind, ...failure.details }),
    httpStatusForFailure(failure),
  );
}

export function unwrapOrThrow<T>(result: Result<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw failureToHttpException(result.failure);
}

/** Turns an unreachable ledger into 503 instead of a generic 500. */
@Catch(LedgerUnavailableError)
export class LedgerUnavailableFilter implements ExceptionFilter {
  catch(exception: LedgerUnavailableError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<{ status(code: number): { json(body: unknown): void } }>();
    response
      .status(HttpStatus.SERVICE_UNAVAILABLE)
      .json(rewardsErrorPayload(RewardsErrorCode.LEDGER_UNAVAILABLE, "The ledger is temporarily unavailable; retry the request"));
  }
}
