import type { GeoPoint, LocationRecord } from "@spin-rewards/core-types";
import type { IDbClient } from "@spin-rewards/core-db";
import type { ISlidingWindowCounter } from "@spin-rewards/core-redis";
import { CheckInSessionRepository } from "@spin-rewards/core-inventory";
import { Result, denied, ok } from "@spin-rewards/core-errors";

const EARTH_RADIUS_METERS = 6_371_000;

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

export function haversineMeters(a: GeoPoint, b: GeoPoint): number {
  const dLat = toRadians(b.lat - a.lat);
  const dLng = toRadians(b.lng - a.lng);
  const h = Math.sin(dLat / 2) ** 2 + Math.cos(toRadians(a.lat)) * Math.cos(toRadians(b.lat)) * Math.sin(dLng / 2) ** 2;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}

export function isValidCoordinate(point: GeoPoint): boolean {
  return (
    Number.isFinite(point.lat) && Number.isFinite(point.lng) && point.lat >= -90 && point.lat <= 90 && point.lng >= -180 && point.lng <= 180
  );
}

export interface GatePolicy {
  proximityToleranceMeters: number;
  cooldownMinutes: number;
  velocityMaxRequests: number;
  velocityWindowSeconds: number;
  maxTravelSpeedKmh: number;
}

export interface AdmissionRequest {
  identityId: string;
  location: LocationRecord;
  claimed: GeoPoint;
  at: Date;
  /** Counted once by the velocity window however often the request is retried. */
  requestId: string;
}

export interface Admission {
  distanceMeters: number;
}

export interface IAntiFraudGate {
  admit(request: AdmissionRequest, tx?: IDbClient): Promise<Result<Admission>>;
}

export const ANTI_FRAUD_GATE = Symbol("ANTI_FRAUD_GATE");

const VELOCITY_KEY = (identityId: string) => `velocity:checkin:${identityId}`;

/**
 * Decides whether a check-in claim may earn credits. Has no effect on the
 * ledger; the only state it writes is the velocity window.
 */
export class AntiFraudGate implements IAntiFraudGate {
  constructor(
    private readonly db: IDbClient,
    private readonly counter: ISlidingWindowCounter,
    private readonly policy: GatePolicy
  ) {}

  async admit(request: AdmissionRequest, tx?: IDbClient): Promise<Result<Admission>> {
    const distanceMeters = haversineMeters(request.claimed, request.location.coordinate);
    if (distanceMeters > this.policy.proximityToleranceMeters) {
      return denied("PROXIMITY", "You are too far from this location", {
        distanceMeters: Math.round(distanceMeters),
        toleranceMeters: this.policy.proximityToleranceMeters,
      });
    }

    const velocity = await this.checkVelocity(request);
    if (!velocity.ok) return velocity;

    const sessions = new CheckInSessionRepository(tx ?? this.db);

    const lastHere = await sessions.latest(request.identityId, request.location.id);
    if (lastHere) {
      const cooldownMs = this.policy.cooldownMinutes * 60_000;
      const readyAt = lastHere.createdAt.getTime() + cooldownMs;
      if (readyAt > request.at.getTime()) {
        return denied("COOLDOWN", "Please wait before checking in here again", {
          retryAfterSeconds: Math.ceil((readyAt - request.at.getTime()) / 1000),
        });
      }
    }

    const lastAnywhere = await sessions.latest(request.identityId);
    if (lastAnywhere && lastAnywhere.locationId !== request.location.id) {
      const travelled = haversineMeters(lastAnywhere.coordinate, request.claimed);
      if (travelled > this.policy.proximityToleranceMeters) {
        const elapsedHours = (request.at.getTime() - lastAnywhere.createdAt.getTime()) / 3_600_000;
        const speedKmh = elapsedHours > 0 ? travelled / 1000 / elapsedHours : Number.POSITIVE_INFINITY;
        if (speedKmh > this.policy.maxTravelSpeedKmh) {
          return denied("IMPOSSIBLE_TRAVEL", "Travel between check-ins is implausibly fast", {
            distanceMeters: Math.round(travelled),
            speedKmh: Number.isFinite(speedKmh) ? Math.round(speedKmh) : null,
          });
        }
      }
    }

    return ok({ distanceMeters });
  }

  private async checkVelocity(request: AdmissionRequest): Promise<Result<Admission>> {
    const windowMs = this.policy.velocityWindowSeconds * 1000;
    const seen = await this.counter.hit(VELOCITY_KEY(request.identityId), request.requestId, windowMs, request.at.getTime());
    if (seen > this.policy.velocityMaxRequests) {
      return denied("VELOCITY", "Too many check-in attempts", {
        limit: this.policy.velocityMaxRequests,
        windowSeconds: this.policy.velocityWindowSeconds,
        retryAfterSeconds: this.policy.velocityWindowSeconds,
      });
    }
    return ok({ distanceMeters: 0 });
  }
}
