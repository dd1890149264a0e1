import "reflect-metadata";
import { HttpException } from "@nestjs/common";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { denied, ok } from "@spin-rewards/core-errors";
import { AdminController } from "../src/controllers/admin.controller";
import { AdminService } from "../src/services/admin.service";

describe("AdminController", () => {
  const serviceMock = {
    cleanupExpiredPrizes: vi.fn().mockResolvedValue({ archived: 0 }),
    listLedger: vi.fn().mockResolvedValue({ items: [], total: 0, limit: 100, offset: 0 }),
    adjust: vi.fn(),
    integrity: vi.fn(),
  };
  let controller: AdminController;

  beforeEach(() => {
    controller = new AdminController(serviceMock as unknown as AdminService);
    serviceMock.listLedger.mockClear();
    serviceMock.adjust.mockReset();
  });

  it("turns ledger query strings into a filter", async () => {
    await controller.listLedger({ identityId: "player-1", from: "2024-06-01T00:00:00.000Z", limit: 10 });

    expect(serviceMock.listLedger).toHaveBeenCalledWith({
      identityId: "player-1",
      kind: undefined,
      from: new Date("2024-06-01T00:00:00.000Z"),
      to: undefined,
      limit: 10,
      offset: undefined,
    });
  });

  it("returns the posted entry for an accepted adjustment", async () => {
    const entry = { id: "entry-1", identityId: "player-1", amount: 5, kind: "REFUND", reason: "admin:fix", locationId: null, balanceAfter: 5, occurredAt: "2024-06-05T12:00:00.000Z" };
    serviceMock.adjust.mockResolvedValue(ok(entry));

    await expect(controller.adjust("player-1", { kind: "REFUND", amount: 5, reason: "fix" })).resolves.toEqual(entry);
    expect(serviceMock.adjust).toHaveBeenCalledWith("player-1", { kind: "REFUND", amount: 5, reason: "fix" });
  });

  it("maps a denied adjustment to 403", async () => {
    serviceMock.adjust.mockResolvedValue(denied("MAX_BALANCE", "Balance would exceed the maximum"));

    const error = await controller.adjust("player-1", { kind: "BONUS", amount: 5, reason: "fix" }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HttpException);
    expect(error instanceof HttpException && error.getStatus()).toBe(403);
  });
});
