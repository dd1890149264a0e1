/**
 * Bearer tokens for e2e requests, signed with the secret vitest.setup.ts installs.
 */

import type { PrincipalRole } from "@spin-rewards/core-types";
import { createTestToken, TEST_JWT_SECRET } from "../../packages/core-auth/src/test-utils";

export function createTestAuthToken(options: { subjectId?: string; role?: PrincipalRole; expiresInSeconds?: number } = {}): string {
  const secret = process.env.AUTH_JWT_SECRET || TEST_JWT_SECRET;
  return createTestToken(secret, options);
}

export function playerToken(subjectId: string): string {
  return createTestAuthToken({ subjectId, role: "player" });
}

export function staffToken(subjectId: string): string {
  return createTestAuthToken({ subjectId, role: "staff" });
}
