import "reflect-metadata";
import { INestApplication } from "@nestjs/common";
import { APP_FILTER } from "@nestjs/core";
import request from "supertest";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { LedgerUnavailableFilter } from "@spin-rewards/core-errors";
import { REWARDS_CONTROLLERS } from "../src/app.module";
import { RewardsService } from "../src/rewards.service";
import { createRewardsTestHarness } from "../../test-utils/rewards-test-harness";
import { seedCampaign, seedIdentity, seedLocation, seedStaff } from "../../test-utils/test-helpers";
import { playerToken, staffToken } from "../../test-utils/auth-helpers";

const CAFE = { latitude: 40.7128, longitude: -74.006 };

describe("Rewards API e2e", () => {
  let app: INestApplication;
  let redemptionCode = "";

  beforeAll(async () => {
    const harness = await createRewardsTestHarness({
      controllers: REWARDS_CONTROLLERS,
      providers: [RewardsService, { provide: APP_FILTER, useClass: LedgerUnavailableFilter }],
      rolls: [0.1],
    });
    app = harness.app;

    await seedLocation(harness.db, { id: "loc-cafe", lat: CAFE.latitude, lng: CAFE.longitude });
    await seedCampaign(harness.db, {
      id: "camp-summer",
      locationId: "loc-cafe",
      prizes: [{ id: "prize-coffee", name: "Free coffee", total: 3, probability: 0.5 }],
    });
    await seedStaff(harness.db, { id: "staff-cafe", locationId: "loc-cafe" });
    await seedIdentity(harness.db, { id: "player-spin", balance: 50 });
  });

  afterAll(async () => {
    if (app) {
      await app.close();
    }
  });

  it("serves health without a token", async () => {
    const res = await request(app.getHttpServer()).get("/health").expect(200);
    expect(res.body).toEqual({ status: "ok" });
  });

  it("rejects unauthenticated check-ins", async () => {
    const res = await request(app.getHttpServer()).post("/check-ins").send({ locationId: "loc-cafe", ...CAFE }).expect(401);
    expect(res.body.error).toBe("AUTH_FAILED");
  });

  it("requires an idempotency key", async () => {
    const res = await request(app.getHttpServer())
      .post("/check-ins")
      .set("Authorization", `Bearer ${playerToken("player-checkin")}`)
      .send({ locationId: "loc-cafe", ...CAFE })
      .expect(400);
    expect(res.body.error).toBe("IDEMPOTENCY_KEY_MISSING");
  });

  it("validates the check-in body", async () => {
    await request(app.getHttpServer())
      .post("/check-ins")
      .set("Authorization", `Bearer ${playerToken("player-checkin")}`)
      .set("x-idempotency-key", "checkin-bad-body")
      .send({ locationId: "loc-cafe", latitude: 200, longitude: 0 })
      .expect(400);
  });

  it("checks in and replays a retried request", async () => {
    const send = () =>
      request(app.getHttpServer())
        .post("/check-ins")
        .set("Authorization", `Bearer ${playerToken("player-checkin")}`)
        .set("x-idempotency-key", "checkin-1")
        .send({ locationId: "loc-cafe", ...CAFE });

    const first = await send().expect(201);
    expect(first.body.creditsEarned).toBe(10);
    expect(first.body.newBalance).toBe(10);

    const retry = await send().expect(201);
    expect(retry.body.sessionId).toBe(first.body.sessionId);
    expect(retry.body.newBalance).toBe(10);
  });

  it("answers a denied check-in with the policy reason", async () => {
    const res = await request(app.getHttpServer())
      .post("/check-ins")
      .set("Authorization", `Bearer ${playerToken("player-checkin")}`)
      .set("x-idempotency-key", "checkin-2")
      .send({ locationId: "loc-cafe", ...CAFE })
      .expect(403);
    expect(res.body.error).toBe("COOLDOWN");
    expect(res.body.details).toEqual({ kind: "PolicyDenied", retryAfterSeconds: 1800 });
  });

  it("spins and issues a voucher", async () => {
    const res = await request(app.getHttpServer())
      .post("/campaigns/camp-summer/spins")
      .set("Authorization", `Bearer ${playerToken("player-spin")}`)
      .set("x-idempotency-key", "spin-1")
      .expect(201);

    expect(res.body.success).toBe(true);
    expect(res.body.prizeId).toBe("prize-coffee");
    expect(res.body.creditsSpent).toBe(10);
    expect(res.body.newBalance).toBe(40);
    expect(res.body.redemptionCode).toMatch(/^[A-HJ-NP-Z2-9]{8}$/);
    redemptionCode = res.body.redemptionCode;
  });

  it("reports remaining spins, balance and history", async () => {
    const auth = `Bearer ${playerToken("player-spin")}`;

    const remaining = await request(app.getHttpServer()).get("/campaigns/camp-summer/spins/remaining").set("Authorization", auth).expect(200);
    expect(remaining.body).toEqual({ campaignId: "camp-summer", maxSpinsPerDay: 5, spinsToday: 1, remaining: 4 });

    const balance = await request(app.getHttpServer()).get("/wallet/balance").set("Authorization", auth).expect(200);
    expect(balance.body).toEqual({ identityId: "player-spin", balance: 40 });

    const history = await request(app.getHttpServer()).get("/wallet/transactions").query({ limit: 1 }).set("Authorization", auth).expect(200);
    expect(history.body.total).toBe(2);
    expect(history.body.items).toHaveLength(1);
    expect(history.body.items[0].kind).toBe("SPENT");
    expect(history.body.items[0].amount).toBe(-10);

    const prizes = await request(app.getHttpServer()).get("/prizes").set("Authorization", auth).expect(200);
    expect(prizes.body).toHaveLength(1);
    expect(prizes.body[0].prizeName).toBe("Free coffee");
  });

  it("returns 404 for an unknown campaign", async () => {
    const res = await request(app.getHttpServer())
      .post("/campaigns/camp-missing/spins")
      .set("Authorization", `Bearer ${playerToken("player-spin")}`)
      .set("x-idempotency-key", "spin-missing")
      .expect(404);
    expect(res.body.error).toBe("CAMPAIGN_NOT_FOUND");
  });

  it("keeps redemption endpoints for staff", async () => {
    const res = await request(app.getHttpServer())
      .post("/redemptions/verify")
      .set("Authorization", `Bearer ${playerToken("player-spin")}`)
      .send({ code: redemptionCode })
      .expect(403);
    expect(res.body.error).toBe("FORBIDDEN_ROLE");
  });

  it("verifies and completes a redemption exactly once", async () => {
    const auth = `Bearer ${staffToken("staff-cafe")}`;

    const verify = await request(app.getHttpServer()).post("/redemptions/verify").set("Authorization", auth).send({ code: redemptionCode }).expect(200);
    expect(verify.body.isValid).toBe(true);
    expect(verify.body.canRedeem).toBe(true);

    const complete = await request(app.getHttpServer()).post("/redemptions/complete").set("Authorization", auth).send({ code: redemptionCode }).expect(200);
    expect(complete.body.staffId).toBe("staff-cafe");
    expect(complete.body.identityId).toBe("player-spin");

    const again = await request(app.getHttpServer()).post("/redemptions/complete").set("Authorization", auth).send({ code: redemptionCode }).expect(409);
    expect(again.body.error).toBe("ALREADY_REDEEMED");
  });
});
