/**
 * JWT authentication for the rewards surfaces.
 *
 * Players and staff both authenticate with a bearer JWT. The `role` claim
 * decides which routes a principal may call; staff-only routes add
 * `StaffGuard` after `AuthGuard`.
 *
 * @module @spin-rewards/core-auth
 */

import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Global,
  Inject,
  Injectable,
  Logger,
  Module,
  UnauthorizedException,
  createParamDecorator,
} from "@nestjs/common";
import type { Request } from "express";
import type { PrincipalRole } from "@spin-rewards/core-types";
import { RewardsErrorCode, rewardsErrorPayload } from "@spin-rewards/core-errors";
import * as jwt from "jsonwebtoken";

/**
 * Authenticated principal attached to every guarded request.
 */
export interface AuthContext {
  subjectId: string;
  role: PrincipalRole;
  metadata?: Record<string, unknown>;
}

export interface IAuthPort {
  verifyToken(token: string): Promise<AuthContext>;
}

export interface JwtAuthPortOptions {
  algorithm: "HS256" | "RS256";
  secret?: string; // For HS256
  publicKey?: string; // For RS256
  issuer?: string;
  audience?: string;
}

export const AUTH_PORT = Symbol("AUTH_PORT");
export const AUTH_CONTEXT_REQUEST_KEY = "authContext";

type AuthenticatedRequest = Request & { [AUTH_CONTEXT_REQUEST_KEY]?: AuthContext };

const STANDARD_CLAIMS = ["sub", "role", "iat", "exp", "nbf", "iss", "aud", "jti"];

function readKey(value: string): string {
  // Accept PEM or base64-encoded PEM
  return value.includes("-----BEGIN") ? value : Buffer.from(value, "base64").toString("utf-8");
}

function isRole(value: unknown): value is PrincipalRole {
  return value === "player" || value === "staff";
}

/**
 * JWT verification port.
 *
 * Environment variables:
 * - AUTH_JWT_ALGO: "HS256" | "RS256" (default: "HS256")
 * - AUTH_JWT_SECRET: secret for HS256
 * - AUTH_JWT_PUBLIC_KEY: public key for RS256
 * - AUTH_JWT_ISSUER / AUTH_JWT_AUDIENCE: optional claim checks
 *
 * Claims: `sub` becomes subjectId, `role` must be "player" or "staff"
 * (defaults to "player" when absent), everything else lands in metadata.
 */
export class JwtAuthPort implements IAuthPort {
  private readonly logger = new Logger(JwtAuthPort.name);
  private readonly algorithm: "HS256" | "RS256";
  private readonly secretOrPublicKey: string;
  private readonly issuer?: string;
  private readonly audience?: string;

  constructor(options?: JwtAuthPortOptions) {
    if (options) {
      this.algorithm = options.algorithm;
      const key = this.algorithm === "HS256" ? options.secret : options.publicKey;
      if (!key) {
        throw new Error(`${this.algorithm === "HS256" ? "Secret" : "Public key"} is required for ${this.algorithm} algorithm`);
      }
      this.secretOrPublicKey = this.algorithm === "HS256" ? key : readKey(key);
      this.issuer = options.issuer;
      this.audience = options.audience;
    } else {
      const algo = (process.env.AUTH_JWT_ALGO ?? "HS256").toUpperCase();
      if (algo !== "HS256" && algo !== "RS256") {
        throw new Error(`Unsupported JWT algorithm: ${algo}. Supported: HS256, RS256`);
      }
      this.algorithm = algo;

      if (this.algorithm === "HS256") {
        const secret = process.env.AUTH_JWT_SECRET;
        if (!secret) {
          throw new Error("AUTH_JWT_SECRET is required for HS256 algorithm. Set it in your environment variables.");
        }
        this.secretOrPublicKey = secret;
      } else {
        const publicKey = process.env.AUTH_JWT_PUBLIC_KEY;
        if (!publicKey) {
          throw new Error("AUTH_JWT_PUBLIC_KEY is required for RS256 algorithm. Set it in your environment variables.");
        }
        this.secretOrPublicKey = readKey(publicKey);
      }

      this.issuer = process.env.AUTH_JWT_ISSUER;
      this.audience = process.env.AUTH_JWT_AUDIENCE;
    }
  }

  async verifyToken(token: string): Promise<AuthContext> {
    if (!token) {
      throw new UnauthorizedException(rewardsErrorPayload(RewardsErrorCode.AUTH_FAILED, "Missing authorization token"));
    }

    const cleanToken = token.replace(/^Bearer\s+/i, "");

    try {
      const verifyOptions: jwt.VerifyOptions & { complete?: false } = { algorithms: [this.algorithm] };
      if (this.issuer) {
        verifyOptions.issuer = this.issuer;
      }
      if (this.audience) {
        verifyOptions.audience = this.audience;
      }

      const decoded = jwt.verify(cleanToken, this.secretOrPublicKey, verifyOptions);
      if (typeof decoded === "string") {
        throw new UnauthorizedException(rewardsErrorPayload(RewardsErrorCode.AUTH_FAILED, "JWT payload must be an object"));
      }

      if (!decoded.sub) {
        throw new UnauthorizedException(rewardsErrorPayload(RewardsErrorCode.AUTH_FAILED, "JWT missing required claim: sub"));
      }
      const role: unknown = decoded.role ?? "player";
      if (!isRole(role)) {
        throw new UnauthorizedException(
          rewardsErrorPayload(RewardsErrorCode.AUTH_FAILED, 'JWT claim role must be "player" or "staff"'),
        );
      }

      const metadata: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(decoded)) {
        if (!STANDARD_CLAIMS.includes(key)) {
          metadata[key] = value;
        }
      }

      return {
        subjectId: String(decoded.sub),
        role,
        metadata: Object.keys(metadata).length > 0 ? metadata : undefined,
      };
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new UnauthorizedException(rewardsErrorPayload(RewardsErrorCode.TOKEN_EXPIRED, "Token has expired"));
      }
      if (error instanceof jwt.NotBeforeError) {
        throw new UnauthorizedException(rewardsErrorPayload(RewardsErrorCode.AUTH_FAILED, `Token not yet valid: ${error.message}`));
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw new UnauthorizedException(rewardsErrorPayload(RewardsErrorCode.AUTH_FAILED, `Invalid token: ${error.message}`));
      }
      if (error instanceof UnauthorizedException) {
        throw error;
      }
      this.logger.error("JWT verification error", error);
      throw new UnauthorizedException(rewardsErrorPayload(RewardsErrorCode.AUTH_FAILED, "Token verification failed"));
    }
  }
}

/**
 * Validates the bearer token and attaches AuthContext to the request.
 * `GET /health` and `GET /metrics` bypass authentication.
 */
@Injectable()
export class AuthGuard implements CanActivate {
  private readonly logger = new Logger(AuthGuard.name);
  private static readonly PUBLIC_ROUTES = [
    { method: "GET", path: /^\/health$/ },
    { method: "GET", path: /^\/metrics$/ },
  ];

  constructor(@Inject(AUTH_PORT) private readonly authPort: IAuthPort) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    if (this.isPublicRoute(request)) {
      return true;
    }

    const token = this.extractToken(request);
    if (!token) {
      throw new UnauthorizedException(
        rewardsErrorPayload(RewardsErrorCode.AUTH_FAILED, "Missing authorization token. Provide Authorization: Bearer <token> header."),
      );
    }

    try {
      request[AUTH_CONTEXT_REQUEST_KEY] = await this.authPort.verifyToken(token);
      return true;
    } catch (error) {
      if (error instanceof UnauthorizedException) {
        throw error;
      }
      this.logger.error("Authentication error", error);
      throw new UnauthorizedException(rewardsErrorPayload(RewardsErrorCode.AUTH_FAILED, "Invalid or missing authentication token"));
    }
  }

  private isPublicRoute(request: Request): boolean {
    return AuthGuard.PUBLIC_ROUTES.some((route) => route.method === request.method && route.path.test(request.path));
  }

  private extractToken(request: Request): string | null {
    const authHeader = request.headers["authorization"];
    if (!authHeader) return null;
    const headerValue = Array.isArray(authHeader) ? authHeader[0] : authHeader;
    return headerValue || null;
  }
}

/** Must run after AuthGuard. */
@Injectable()
export class StaffGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const authContext = request[AUTH_CONTEXT_REQUEST_KEY];
    if (authContext?.role !== "staff") {
      throw new ForbiddenException(rewardsErrorPayload(RewardsErrorCode.FORBIDDEN_ROLE, "Staff role required"));
    }
    return true;
  }
}

/**
 * Parameter decorator returning the AuthContext set by AuthGuard.
 *
 * ```typescript
 * @Post("check-ins")
 * checkIn(@Auth() ctx: AuthContext) {}
 * ```
 */
export const Auth = createParamDecorator((_data: unknown, ctx: ExecutionContext): AuthContext => {
  const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
  const authContext = request[AUTH_CONTEXT_REQUEST_KEY];
  if (!authContext) {
    throw new UnauthorizedException(
      rewardsErrorPayload(RewardsErrorCode.AUTH_FAILED, "Auth context missing in request. Ensure AuthGuard is applied to this route."),
    );
  }
  return authContext;
});

/**
 * Global authentication module. Startup fails when the AUTH_JWT_* variables
 * needed by the chosen algorithm are missing. Apps may override AUTH_PORT.
 */
@Global()
@Module({
  providers: [
    {
      provide: AUTH_PORT,
      useFactory: (): IAuthPort => {
        const logger = new Logger("AuthModule");
        try {
          return new JwtAuthPort();
        } catch (error: unknown) {
          logger.error("Failed to initialize JwtAuthPort. Check AUTH_JWT_* environment variables.", error);
          throw error;
        }
      },
    },
    AuthGuard,
    StaffGuard,
  ],
  exports: [AUTH_PORT, AuthGuard, StaffGuard],
})
export class AuthModule {}

export * from "./test-utils";
