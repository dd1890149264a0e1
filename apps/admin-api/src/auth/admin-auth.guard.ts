import { CanActivate, ExecutionContext, Inject, Injectable, UnauthorizedException } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { RewardsErrorCode, rewardsErrorPayload } from "@spin-rewards/core-errors";

export const ADMIN_TOKEN_HEADER = "x-admin-token";

@Injectable()
export class AdminAuthGuard implements CanActivate {
  constructor(@Inject(ConfigService) private readonly config: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<{ headers: Record<string, string | string[] | undefined> }>();
    const token = this.config.get<string>("ADMIN_API_TOKEN");
    if (!token) {
      throw new UnauthorizedException(rewardsErrorPayload(RewardsErrorCode.AUTH_FAILED, "Admin token not configured"));
    }
    const provided = this.extractHeader(request.headers[ADMIN_TOKEN_HEADER]);
    if (!provided || provided !== token) {
      throw new UnauthorizedException(rewardsErrorPayload(RewardsErrorCode.AUTH_FAILED, "Invalid admin token"));
    }
    return true;
  }

  private extractHeader(value: string | string[] | undefined): string | undefined {
    if (!value) {
      return undefined;
    }
    return Array.isArray(value) ? value[0] : value;
  }
}
