import { describe, expect, it } from "vitest";
import { Registry } from "prom-client";
import { SpinOrchestrator } from "@spin-rewards/core-spin";
import type { PrizeInventory } from "@spin-rewards/core-spin";
import { IssuedPrizeRepository, PrizeInventoryRepository } from "@spin-rewards/core-inventory";
import { SequenceRngService } from "@spin-rewards/core-rng";
import { PrometheusMetricsService, RewardsMetric, UNSET_LABEL } from "@spin-rewards/core-metrics";
import { createRewardsEngine } from "@spin-rewards/rewards-core";
import type { IDbClient } from "@spin-rewards/core-db";
import { createTestEngine } from "../../../apps/test-utils/rewards-test-harness";
import type { TestEngineOptions } from "../../../apps/test-utils/rewards-test-harness";
import { seedCampaign, seedIdentity, seedLocation } from "../../../apps/test-utils/test-helpers";
import type { SeedCampaign } from "../../../apps/test-utils/test-helpers";

const CODE_FORMAT = /^[A-HJ-NP-Z2-9]{8}$/;

async function setup(options: TestEngineOptions & { campaign?: Partial<SeedCampaign>; balance?: number } = {}) {
  const harness = await createTestEngine(options);
  await seedLocation(harness.db, { id: "loc-cafe", lat: 40.7128, lng: -74.006 });
  await seedCampaign(harness.db, {
    id: "camp-summer",
    locationId: "loc-cafe",
    prizes: [
      { id: "prize-a", total: 2, probability: 0.3 },
      { id: "prize-b", total: 5, probability: 0.2 },
    ],
    ...options.campaign,
  });
  await seedIdentity(harness.db, { id: "player-1", balance: options.balance ?? 100 });
  return harness;
}

async function stock(db: IDbClient): Promise<Record<string, number>> {
  const rows = await new PrizeInventoryRepository(db).snapshot("camp-summer");
  return Object.fromEntries(rows.map((row) => [row.prizeId, row.remainingQuantity]));
}

describe("SpinOrchestrator", () => {
  it("debits, awards the drawn prize and issues a voucher", async () => {
    const { engine, db } = await setup({ rolls: [0.1] });

    const result = await engine.spins.spin({ identityId: "player-1", campaignId: "camp-summer" });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.prizeId).toBe("prize-a");
    expect(result.value.creditsSpent).toBe(10);
    expect(result.value.newBalance).toBe(90);
    expect(result.value.redemptionCode).toMatch(CODE_FORMAT);
    expect(result.value.expiresAt).toBe("2024-07-05T12:00:00.000Z");
    expect(await stock(db)).toEqual({ "prize-a": 1, "prize-b": 5 });

    const spins = await db.query<{ id: string; prize_id: string; balance_after: number }>(`SELECT * FROM spin_records`);
    expect(spins).toHaveLength(1);
    expect(spins[0].id).toBe(result.value.spinId);
    expect(spins[0].prize_id).toBe("prize-a");
  });

  it("records a no-win without touching stock", async () => {
    const { engine, db } = await setup({ rolls: [0.9] });

    const result = await engine.spins.spin({ identityId: "player-1", campaignId: "camp-summer" });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.prizeId).toBeNull();
    expect(result.value.redemptionCode).toBeNull();
    expect(result.value.expiresAt).toBeNull();
    expect(result.value.newBalance).toBe(90);
    expect(await stock(db)).toEqual({ "prize-a": 2, "prize-b": 5 });
    expect(await db.query(`SELECT * FROM issued_prizes`)).toHaveLength(0);
  });

  it("uses the campaign's redemption window when it has one", async () => {
    const { engine } = await setup({ rolls: [0.1], campaign: { redemptionWindowDays: 7 } });

    const result = await engine.spins.spin({ identityId: "player-1", campaignId: "camp-summer" });

    expect(result.ok && result.value.expiresAt).toBe("2024-06-12T12:00:00.000Z");
  });

  it("keeps issued prizes and remaining stock in step", async () => {
    const { engine, db } = await setup({ rolls: [0.1, 0.35, 0.9, 0.05], campaign: { maxSpinsPerDay: 8 }, balance: 200 });

    for (let i = 0; i < 8; i += 1) {
      const result = await engine.spins.spin({ identityId: "player-1", campaignId: "camp-summer" });
      expect(result.ok).toBe(true);
    }

    const issued = new IssuedPrizeRepository(db);
    const remaining = await stock(db);
    expect(remaining["prize-a"]).toBe(2 - (await issued.countForPrize("prize-a")));
    expect(remaining["prize-b"]).toBe(5 - (await issued.countForPrize("prize-b")));
    expect(remaining["prize-a"]).toBe(0);
    const integrity = await engine.accounts.verifyIntegrity("player-1");
    expect(integrity).toEqual({ identityId: "player-1", balance: 120, ledgerSum: 120, consistent: true });
  });

  it("never draws a prize whose stock is gone", async () => {
    const { engine, db } = await setup({
      rolls: [0.5],
      campaign: { prizes: [{ id: "prize-a", total: 1, probability: 1 }] },
    });
    await seedIdentity(db, { id: "player-2", balance: 100 });

    const first = await engine.spins.spin({ identityId: "player-1", campaignId: "camp-summer" });
    const second = await engine.spins.spin({ identityId: "player-2", campaignId: "camp-summer" });

    expect(first.ok && first.value.prizeId).toBe("prize-a");
    expect(second.ok && second.value.prizeId).toBeNull();
    expect(await stock(db)).toEqual({ "prize-a": 0 });
  });

  it("fails closed on insufficient credits", async () => {
    const { engine, db } = await setup({ rolls: [0.1], balance: 5 });

    const result = await engine.spins.spin({ identityId: "player-1", campaignId: "camp-summer" });

    expect(!result.ok && result.failure.reason).toBe("INSUFFICIENT_CREDITS");
    expect(await engine.accounts.getBalance("player-1")).toBe(5);
    expect(await stock(db)).toEqual({ "prize-a": 2, "prize-b": 5 });
    expect(await db.query(`SELECT * FROM spin_records`)).toHaveLength(0);
  });

  it("enforces the daily spin cap per campaign", async () => {
    const { engine } = await setup({ rolls: [0.9], campaign: { maxSpinsPerDay: 2 } });

    await engine.spins.spin({ identityId: "player-1", campaignId: "camp-summer" });
    await engine.spins.spin({ identityId: "player-1", campaignId: "camp-summer" });
    const third = await engine.spins.spin({ identityId: "player-1", campaignId: "camp-summer" });

    expect(!third.ok && third.failure.reason).toBe("SPIN_LIMIT");
    expect(!third.ok && third.failure.details).toEqual({ limit: 2, used: 2 });
    expect(await engine.accounts.getBalance("player-1")).toBe(80);
  });

  it("resets the spin cap at midnight UTC", async () => {
    const { engine, clock } = await setup({ rolls: [0.9], campaign: { maxSpinsPerDay: 1 } });

    await engine.spins.spin({ identityId: "player-1", campaignId: "camp-summer" });
    clock.set("2024-06-06T00:00:00.000Z");
    const nextDay = await engine.spins.spin({ identityId: "player-1", campaignId: "camp-summer" });

    expect(nextDay.ok).toBe(true);
  });

  it("rejects closed and unknown campaigns", async () => {
    const { engine, db } = await setup();
    await seedCampaign(db, { id: "camp-paused", locationId: "loc-cafe", active: false });
    await seedCampaign(db, { id: "camp-over", locationId: "loc-cafe", endsAt: "2024-06-01T00:00:00.000Z" });

    const paused = await engine.spins.spin({ identityId: "player-1", campaignId: "camp-paused" });
    const over = await engine.spins.spin({ identityId: "player-1", campaignId: "camp-over" });
    const missing = await engine.spins.spin({ identityId: "player-1", campaignId: "camp-nope" });

    expect(!paused.ok && paused.failure.reason).toBe("CAMPAIGN_INACTIVE");
    expect(!over.ok && over.failure.reason).toBe("CAMPAIGN_INACTIVE");
    expect(!missing.ok && missing.failure.kind).toBe("NotFound");
  });

  it("replays a retried attempt with the original voucher", async () => {
    const { engine, db } = await setup({ rolls: [0.1] });
    const request = { identityId: "player-1", campaignId: "camp-summer", attemptKey: "spin-attempt-1" };

    const first = await engine.spins.spin(request);
    const retry = await engine.spins.spin(request);

    expect(first.ok && retry.ok).toBe(true);
    if (!first.ok || !retry.ok) return;
    expect(retry.value).toEqual({ ...first.value, replayed: true });
    expect(await engine.accounts.getBalance("player-1")).toBe(90);
    expect(await db.query(`SELECT * FROM spin_records`)).toHaveLength(1);
  });

  it("reports remaining spins for today", async () => {
    const { engine } = await setup({ rolls: [0.9] });
    await engine.spins.spin({ identityId: "player-1", campaignId: "camp-summer" });

    const remaining = await engine.spins.remainingSpins("player-1", "camp-summer");

    expect(remaining.ok && remaining.value).toEqual({ campaignId: "camp-summer", maxSpinsPerDay: 5, spinsToday: 1, remaining: 4 });
  });

  it("refuses an attempt key already used on another campaign", async () => {
    const { engine, db } = await setup({ rolls: [0.9] });
    await seedCampaign(db, { id: "camp-winter", locationId: "loc-cafe" });

    const first = await engine.spins.spin({ identityId: "player-1", campaignId: "camp-summer", attemptKey: "spin-attempt-2" });
    const reused = await engine.spins.spin({ identityId: "player-1", campaignId: "camp-winter", attemptKey: "spin-attempt-2" });

    expect(first.ok).toBe(true);
    expect(reused.ok).toBe(false);
    if (reused.ok) return;
    expect(reused.failure.kind).toBe("Conflict");
    expect(reused.failure.reason).toBe("ATTEMPT_KEY_REUSED");
    expect(reused.failure.details).toEqual({ campaignId: "camp-summer" });
    expect(await engine.accounts.getBalance("player-1")).toBe(90);
    expect(await db.query(`SELECT * FROM spin_records`)).toHaveLength(1);
  });

  it("reports wins and rejections to Prometheus without failing the spin", async () => {
    const harness = await setup({ campaign: { maxSpinsPerDay: 1 } });
    const registry = new Registry();
    const { db, kv, lock, counter, clock, logger, settings } = harness;
    const engine = createRewardsEngine(
      { db, kv, lock, counter, clock, logger, rng: new SequenceRngService([0.1]), metrics: new PrometheusMetricsService(registry) },
      settings
    );

    const win = await engine.spins.spin({ identityId: "player-1", campaignId: "camp-summer" });
    const capped = await engine.spins.spin({ identityId: "player-1", campaignId: "camp-summer" });

    expect(win.ok && win.value.prizeId).toBe("prize-a");
    expect(!capped.ok && capped.failure.reason).toBe("SPIN_LIMIT");
    const spins = registry.getSingleMetric(RewardsMetric.SPINS);
    const values = spins ? (await spins.get()).values : [];
    expect(values.map((sample) => ({ labels: sample.labels, value: sample.value }))).toEqual([
      { labels: { status: "win", reason: UNSET_LABEL }, value: 1 },
      { labels: { status: "rejected", reason: "SPIN_LIMIT" }, value: 1 },
    ]);
  });

  it("awards the last unit once when several players spin at the same time", async () => {
    const { engine, db } = await setup({
      rolls: [0.5],
      campaign: { prizes: [{ id: "prize-a", total: 1, probability: 1 }] },
    });
    const players = ["player-1", "player-2", "player-3", "player-4"];
    for (const id of players.slice(1)) {
      await seedIdentity(db, { id, balance: 100 });
    }

    const results = await Promise.all(players.map((identityId) => engine.spins.spin({ identityId, campaignId: "camp-summer" })));

    expect(results.every((result) => result.ok)).toBe(true);
    expect(results.filter((result) => result.ok && result.value.prizeId === "prize-a")).toHaveLength(1);
    expect(await db.query(`SELECT * FROM issued_prizes`)).toHaveLength(1);
    expect(await stock(db)).toEqual({ "prize-a": 0 });
    for (const id of players) {
      expect(await engine.accounts.verifyIntegrity(id)).toEqual({ identityId: id, balance: 90, ledgerSum: 90, consistent: true });
    }
  });

  describe("stock races", () => {
    function orchestratorWith(harness: Awaited<ReturnType<typeof setup>>, inventory: (real: PrizeInventoryRepository) => PrizeInventory) {
      const { db, engine, clock, logger, metrics } = harness;
      return new SpinOrchestrator({
        db,
        accounts: engine.accounts,
        limiter: engine.limiter,
        campaigns: engine.campaigns,
        rng: new SequenceRngService([0.1]),
        clock,
        logger,
        metrics,
        policy: { maxAttempts: 3, prizeExpiryDays: 30, redemptionCodeLength: 8 },
        inventoryFor: (tx) => inventory(new PrizeInventoryRepository(tx)),
      });
    }

    it("retries the whole spin after losing a stock race", async () => {
      const harness = await setup();
      let calls = 0;
      const orchestrator = orchestratorWith(harness, (real) => ({
        snapshot: (campaignId) => real.snapshot(campaignId),
        decrementOne: (prizeId) => {
          calls += 1;
          return calls === 1 ? Promise.resolve(false) : real.decrementOne(prizeId);
        },
      }));

      const result = await orchestrator.spin({ identityId: "player-1", campaignId: "camp-summer" });

      expect(result.ok && result.value.prizeId).toBe("prize-a");
      expect(result.ok && result.value.newBalance).toBe(90);
      expect(await harness.db.query(`SELECT * FROM ledger_entries WHERE kind = 'SPENT'`)).toHaveLength(1);
      expect(harness.metrics.increments.filter((entry) => entry.name === RewardsMetric.LEDGER_CONFLICTS)).toHaveLength(1);
    });

    it("surfaces a conflict once retries run out, leaving nothing charged", async () => {
      const harness = await setup();
      const orchestrator = orchestratorWith(harness, (real) => ({
        snapshot: (campaignId) => real.snapshot(campaignId),
        decrementOne: () => Promise.resolve(false),
      }));

      const result = await orchestrator.spin({ identityId: "player-1", campaignId: "camp-summer" });

      expect(!result.ok && result.failure.kind).toBe("Conflict");
      expect(await harness.engine.accounts.getBalance("player-1")).toBe(100);
      expect(await harness.db.query(`SELECT * FROM spin_records`)).toHaveLength(0);
      expect(await stock(harness.db)).toEqual({ "prize-a": 2, "prize-b": 5 });
    });

    it("lets the stock update decide when the snapshot is stale", async () => {
      const harness = await setup({ campaign: { prizes: [{ id: "prize-a", total: 1, remaining: 0, probability: 1 }] } });
      let stale = true;
      const orchestrator = orchestratorWith(harness, (real) => ({
        snapshot: async (campaignId) => {
          const rows = await real.snapshot(campaignId);
          if (!stale) return rows;
          stale = false;
          return rows.map((row) => ({ ...row, remainingQuantity: 1 }));
        },
        decrementOne: (prizeId) => real.decrementOne(prizeId),
      }));

      const result = await orchestrator.spin({ identityId: "player-1", campaignId: "camp-summer" });

      expect(result.ok && result.value.prizeId).toBeNull();
      expect(result.ok && result.value.newBalance).toBe(90);
      expect(await harness.db.query(`SELECT * FROM issued_prizes`)).toHaveLength(0);
      expect(await stock(harness.db)).toEqual({ "prize-a": 0 });
      expect(harness.metrics.increments.filter((entry) => entry.name === RewardsMetric.LEDGER_CONFLICTS)).toHaveLength(1);
    });
  });
});
