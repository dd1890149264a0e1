import { UnauthorizedException } from "@nestjs/common";
import * as jwt from "jsonwebtoken";
import { describe, expect, it } from "vitest";
import { JwtAuthPort, createTestToken } from "@spin-rewards/core-auth";

const SECRET = "test-jwt-secret";

async function errorCode(promise: Promise<unknown>): Promise<unknown> {
  const error = await promise.catch((err: unknown) => err);
  expect(error).toBeInstanceOf(UnauthorizedException);
  if (!(error instanceof UnauthorizedException)) return undefined;
  const body = error.getResponse();
  return typeof body === "object" && "error" in body ? body.error : undefined;
}

describe("JwtAuthPort", () => {
  const port = new JwtAuthPort({ algorithm: "HS256", secret: SECRET, issuer: "spin-rewards" });

  it("maps claims onto the auth context", async () => {
    const token = createTestToken(SECRET, { subjectId: "staff-7", role: "staff", issuer: "spin-rewards", metadata: { locationId: "loc-cafe" } });

    await expect(port.verifyToken(`Bearer ${token}`)).resolves.toEqual({
      subjectId: "staff-7",
      role: "staff",
      metadata: { locationId: "loc-cafe" },
    });
  });

  it("treats a token without a role as a player", async () => {
    const token = jwt.sign({ sub: "player-1" }, SECRET, { algorithm: "HS256", issuer: "spin-rewards" });
    await expect(port.verifyToken(token)).resolves.toEqual({ subjectId: "player-1", role: "player", metadata: undefined });
  });

  it("rejects unknown roles", async () => {
    const token = jwt.sign({ sub: "player-1", role: "owner" }, SECRET, { algorithm: "HS256", issuer: "spin-rewards" });
    expect(await errorCode(port.verifyToken(token))).toBe("AUTH_FAILED");
  });

  it("reports expired tokens separately", async () => {
    const token = createTestToken(SECRET, { subjectId: "player-1", issuer: "spin-rewards", expiresInSeconds: -60 });
    expect(await errorCode(port.verifyToken(token))).toBe("TOKEN_EXPIRED");
  });

  it("rejects a foreign signature or issuer", async () => {
    const forged = createTestToken("other-secret", { subjectId: "player-1", issuer: "spin-rewards" });
    const elsewhere = createTestToken(SECRET, { subjectId: "player-1", issuer: "someone-else" });

    expect(await errorCode(port.verifyToken(forged))).toBe("AUTH_FAILED");
    expect(await errorCode(port.verifyToken(elsewhere))).toBe("AUTH_FAILED");
  });

  it("needs a key for the chosen algorithm", () => {
    expect(() => new JwtAuthPort({ algorithm: "HS256" })).toThrow("Secret is required for HS256 algorithm");
  });
});
