import { beforeEach, describe, expect, it } from "vitest";
import type { IDbClient } from "@spin-rewards/core-db";
import { DbCampaignDirectory, DbLocationDirectory, DbStaffDirectory, isCampaignOpen } from "../src";
import { InMemoryStore, createDbClient, seedCampaign, seedLocation, seedStaff } from "../../../apps/test-utils/test-helpers";

describe("directories", () => {
  let db: IDbClient;
  let cache: InMemoryStore;

  beforeEach(async () => {
    db = await createDbClient();
    cache = new InMemoryStore();
    await seedLocation(db, { id: "loc-1", name: "Harbor Cafe", lat: 51.5, lng: -0.12 });
    await seedCampaign(db, {
      id: "camp-1",
      locationId: "loc-1",
      spinCost: 20,
      maxSpinsPerDay: 3,
      startsAt: "2024-06-01T00:00:00.000Z",
      endsAt: "2024-06-30T00:00:00.000Z",
      redemptionWindowDays: 7,
      prizes: [{ id: "prize-1", total: 4, probability: 0.25 }],
    });
    await seedStaff(db, { id: "staff-1", locationId: "loc-1" });
    await seedStaff(db, { id: "staff-2", locationId: "loc-1", active: false });
  });

  it("loads a campaign with its prize table and serves repeats from cache", async () => {
    const directory = new DbCampaignDirectory(db, cache, 30);
    const campaign = await directory.getCampaign("camp-1");
    expect(campaign).toMatchObject({ id: "camp-1", locationId: "loc-1", spinCost: 20, maxSpinsPerDay: 3, redemptionWindowDays: 7 });
    expect(campaign?.prizes).toEqual([{ id: "prize-1", campaignId: "camp-1", name: "prize-1", totalQuantity: 4, probability: 0.25 }]);

    await db.query(`UPDATE campaigns SET spin_cost = 99 WHERE id = $1`, ["camp-1"]);
    const again = await directory.getCampaign("camp-1");
    expect(again?.spinCost).toBe(20);
    expect(again?.startsAt.toISOString()).toBe("2024-06-01T00:00:00.000Z");
  });

  it("returns null for unknown campaigns and locations", async () => {
    expect(await new DbCampaignDirectory(db, cache).getCampaign("nope")).toBeNull();
    expect(await new DbLocationDirectory(db, cache).getLocation("nope")).toBeNull();
  });

  it("reads location coordinates", async () => {
    const location = await new DbLocationDirectory(db, cache, 0).getLocation("loc-1");
    expect(location).toEqual({ id: "loc-1", name: "Harbor Cafe", coordinate: { lat: 51.5, lng: -0.12 }, active: true });
  });

  it("resolves only active staff", async () => {
    const staff = new DbStaffDirectory(db);
    expect(await staff.getStaffLocation("staff-1")).toBe("loc-1");
    expect(await staff.getStaffLocation("staff-2")).toBeNull();
  });

  it("treats the campaign window as inclusive", async () => {
    const campaign = await new DbCampaignDirectory(db, cache, 0).getCampaign("camp-1");
    if (!campaign) throw new Error("campaign missing");
    expect(isCampaignOpen(campaign, new Date("2024-06-30T00:00:00.000Z"))).toBe(true);
    expect(isCampaignOpen(campaign, new Date("2024-06-30T00:00:00.001Z"))).toBe(false);
    expect(isCampaignOpen(campaign, new Date("2024-05-31T23:59:59.999Z"))).toBe(false);
  });
});
