import * as jwt from "jsonwebtoken";
import type { PrincipalRole } from "@spin-rewards/core-types";

export interface TestTokenOptions {
  subjectId?: string;
  role?: PrincipalRole;
  expiresInSeconds?: number;
  issuer?: string;
  audience?: string;
  metadata?: Record<string, unknown>;
}

export function createTestToken(secret: string, options: TestTokenOptions = {}): string {
  if (!secret) {
    throw new Error("JWT secret is required to generate test tokens");
  }

  const payload: jwt.JwtPayload = {
    sub: options.subjectId ?? "test-player",
    role: options.role ?? "player",
    ...options.metadata,
  };

  const signOptions: jwt.SignOptions = {
    algorithm: "HS256",
    expiresIn: options.expiresInSeconds ?? 3600,
  };

  if (options.issuer) {
    signOptions.issuer = options.issuer;
  }

  if (options.audience) {
    signOptions.audience = options.audience;
  }

  return jwt.sign(payload, secret, signOptions);
}

export const TEST_JWT_SECRET = "test-jwt-secret";
