import { Global, Module } from "@nestjs/common";
import { NotificationModule } from "../notification/notification.module";
import { AuthController } from "./auth.controller";
import { AuthService } from "./auth.service";
import { AuthEmailService } from "./auth-email.service";
import { OptionalSessionGuard } from "./guards/optional-session.guard";
import { RoleGuard } from "./guards/role.guard";
import { SessionGuard } from "./guards/session.guard";

@Global()
@Module({
  imports: [NotificationModule],
  controllers: [AuthController],
  providers: [AuthService, AuthEmailService, SessionGuard, OptionalSessionGuard, RoleGuard],
  exports: [AuthService, SessionGuard, OptionalSessionGuard, RoleGuard],
})
export class AuthModule {}
