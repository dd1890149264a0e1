import { createHash, randomUUID } from "crypto";
import type { CheckInResult, CheckInSession, GeoPoint, LocationRecord } from "@spin-rewards/core-types";
import type { IDbClient } from "@spin-rewards/core-db";
import type { IClock } from "@spin-rewards/core-clock";
import type { ILocationDirectory } from "@spin-rewards/core-directory";
import type { ICreditLimiter } from "@spin-rewards/core-limits";
import type { AccountSession, ICreditAccountService } from "@spin-rewards/core-wallet";
import type { ILogger } from "@spin-rewards/core-logging";
import type { IMetrics } from "@spin-rewards/core-metrics";
import type { IAntiFraudGate } from "@spin-rewards/core-antifraud";
import { CheckInSessionRepository } from "@spin-rewards/core-inventory";
import { isValidCoordinate } from "@spin-rewards/core-antifraud";
import { ConflictError, Result, denied, fail, ok } from "@spin-rewards/core-errors";
import { logFields } from "@spin-rewards/core-logging";
import { RewardsMetric } from "@spin-rewards/core-metrics";

export interface CheckInRequest {
  identityId: string;
  locationId: string;
  coordinate: GeoPoint;
  /** Client retry key. A repeat with the same key returns the first outcome. */
  attemptKey?: string;
}

export interface CheckInPolicy {
  creditsPerCheckIn: number;
  sessionBucketSeconds: number;
  maxAttempts: number;
}

export interface CheckInServiceDeps {
  db: IDbClient;
  accounts: ICreditAccountService;
  gate: IAntiFraudGate;
  limiter: ICreditLimiter;
  locations: ILocationDirectory;
  clock: IClock;
  logger: ILogger;
  metrics: IMetrics;
  policy: CheckInPolicy;
}

export const CHECK_IN_SERVICE = Symbol("CHECK_IN_SERVICE");

/** sha256 over identity, location and the coarse time bucket `at` falls in. */
export function checkInSessionHash(identityId: string, locationId: string, at: Date, bucketSeconds: number): string {
  const bucket = Math.floor(at.getTime() / (bucketSeconds * 1000));
  return createHash("sha256").update(`${identityId}:${locationId}:${bucket}`).digest("hex");
}

function replayOf(session: CheckInSession): CheckInResult {
  return { sessionId: session.id, creditsEarned: session.creditsAwarded, newBalance: session.balanceAfter, replayed: true };
}

export class CheckInService {
  constructor(private readonly deps: CheckInServiceDeps) {}

  async checkIn(request: CheckInRequest): Promise<Result<CheckInResult>> {
    const { logger, metrics } = this.deps;
    const context = { identityId: request.identityId, locationId: request.locationId, attemptKey: request.attemptKey };

    if (!isValidCoordinate(request.coordinate)) {
      return fail("ValidationFailure", "INVALID_COORDINATE", "Latitude must be within ±90 and longitude within ±180");
    }

    if (request.attemptKey) {
      const previous = await new CheckInSessionRepository(this.deps.db).findByAttemptKey(request.identityId, request.attemptKey);
      if (previous) {
        logger.info("checkin.replayed", logFields({ ...context, sessionId: previous.id }));
        metrics.increment(RewardsMetric.CHECK_INS, { status: "replayed" });
        return ok(replayOf(previous));
      }
    }

    const location = await this.deps.locations.getLocation(request.locationId);
    if (!location) {
      return fail("NotFound", "LOCATION_NOT_FOUND", `Location ${request.locationId} does not exist`);
    }
    if (!location.active) {
      return denied("LOCATION_INACTIVE", "This location is not accepting check-ins");
    }

    const at = this.deps.clock.now();
    const requestId = request.attemptKey ?? randomUUID();

    for (let attempt = 1; attempt <= this.deps.policy.maxAttempts; attempt += 1) {
      try {
        const result = await this.deps.accounts.withAccount(request.identityId, (session) =>
          this.attempt(session, request, location, at, requestId)
        );
        if (result.ok) {
          logger.info("checkin.completed", logFields({ ...context, ...result.value, attempt }));
          metrics.increment(RewardsMetric.CHECK_INS, { status: result.value.replayed ? "replayed" : "success" });
        } else {
          logger.info("checkin.rejected", logFields({ ...context, reason: result.failure.reason }));
          metrics.increment(RewardsMetric.CHECK_INS, { status: "rejected", reason: result.failure.reason });
        }
        return result;
      } catch (err) {
        if (!(err instanceof ConflictError)) {
          throw err;
        }
        metrics.increment(RewardsMetric.LEDGER_CONFLICTS, { operation: "checkin" });
        logger.warn("checkin.conflict", logFields({ ...context, attempt, resource: err.resource }));
      }
    }

    return fail("Conflict", "CONCURRENT_UPDATE", "Check-in could not be completed because of concurrent activity; retry");
  }

  private async attempt(
    session: AccountSession,
    request: CheckInRequest,
    location: LocationRecord,
    at: Date,
    requestId: string
  ): Promise<Result<CheckInResult>> {
    const { gate, limiter, policy } = this.deps;
    const locationId = location.id;
    const sessions = new CheckInSessionRepository(session.tx);

    if (!session.account.active) {
      return denied("IDENTITY_INACTIVE", "This account cannot earn credits");
    }

    // A duplicate that committed while this one waited for the lock
    if (request.attemptKey) {
      const previous = await sessions.findByAttemptKey(request.identityId, request.attemptKey);
      if (previous) return ok(replayOf(previous));
    }

    const admission = await gate.admit(
      { identityId: request.identityId, location, claimed: request.coordinate, at, requestId },
      session.tx
    );
    if (!admission.ok) return admission;

    const capacity = await limiter.remainingEarnCapacity({ identityId: request.identityId, at, locationId }, session.tx);
    const award = Math.min(policy.creditsPerCheckIn, capacity);
    const verdict = await limiter.validate(
      { identityId: request.identityId, amount: award > 0 ? award : policy.creditsPerCheckIn, direction: "earn", at, locationId },
      session.tx
    );
    if (!verdict.ok) return verdict;
    if (award <= 0) {
      return denied("DAILY_EARN_LIMIT", "No earning capacity left");
    }

    const sessionHash = checkInSessionHash(request.identityId, locationId, at, policy.sessionBucketSeconds);
    if (await sessions.findByHash(sessionHash)) {
      return denied("DUPLICATE_CHECK_IN", "This check-in was already recorded");
    }

    const entry = await session.post({ amount: award, kind: "EARNED", reason: "check-in", locationId, at });
    const record: CheckInSession = {
      id: randomUUID(),
      identityId: request.identityId,
      locationId,
      coordinate: request.coordinate,
      creditsAwarded: award,
      sessionHash,
      attemptKey: request.attemptKey ?? null,
      balanceAfter: entry.balanceAfter,
      createdAt: at,
    };
    await sessions.insert(record);

    return ok({ sessionId: record.id, creditsEarned: award, newBalance: entry.balanceAfter, replayed: false });
  }
}
