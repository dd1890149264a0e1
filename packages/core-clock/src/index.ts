export interface IClock {
  now(): Date;
}

export const CLOCK = Symbol("CLOCK");

export class SystemClock implements IClock {
  now(): Date {
    return new Date();
  }
}

/** Test clock. Time only moves when told to. */
export class ManualClock implements IClock {
  private current: Date;

  constructor(start: Date | string = "2024-06-05T12:00:00.000Z") {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current);
  }

  set(at: Date | string): void {
    this.current = new Date(at);
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }

  advanceMinutes(minutes: number): void {
    this.advance(minutes * 60_000);
  }
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function startOfUtcDay(at: Date): Date {
  return new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate()));
}

/** Weeks start on Monday 00:00 UTC. */
export function startOfUtcWeek(at: Date): Date {
  const day = startOfUtcDay(at);
  const sinceMonday = (day.getUTCDay() + 6) % 7;
  return new Date(day.getTime() - sinceMonday * DAY_MS);
}

export function addDays(at: Date, days: number): Date {
  return new Date(at.getTime() + days * DAY_MS);
}
