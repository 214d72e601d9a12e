import {
  All,
  Controller,
  Get,
  Req,
  Res,
  ServiceUnavailableException,
  UnauthorizedException,
} from "@nestjs/common";
import { toNodeHandler } from "better-auth/node";
import type { Request, Response } from "express";
import { AuthService } from "./auth.service";
import { type AuthSession, resolveAuthSession } from "./guards/session.guard";

@Controller("auth")
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * Routes every /auth/api/* request (sign-up, sign-in, sign-out, password
   * reset, email verification) to better-auth, which writes the response and
   * its cookies itself.
   */
  @All("api/*path")
  async handleAuthRequest(@Req() req: Request, @Res() res: Response): Promise<void> {
    this.ensureAuthInitialized();

    const handler = toNodeHandler(this.authService.auth);
    await handler(req, res);
  }

  @Get("session")
  async getSession(@Req() req: Request): Promise<AuthSession> {
    this.ensureAuthInitialized();

    const authSession = await resolveAuthSession(this.authService, req);
    if (!authSession) {
      throw new UnauthorizedException("Not authenticated");
    }

    return authSession;
  }

  private ensureAuthInitialized(): void {
    if (!this.authService.isInitialized) {
      throw new ServiceUnavailableException(
        "Authentication service is not configured. Contact support.",
      );
    }
  }
}
