import { Controller, Get, HttpCode, HttpStatus, Post, UseGuards } from "@nestjs/common";
import { ZodBody, ZodIdParam } from "../../common/decorators/zod-validation.decorator";
import { CUSTOMER, MANAGER, STAFF } from "../auth/auth.types";
import { CurrentUser } from "../auth/decorators/current-user.decorator";
import { Roles } from "../auth/decorators/roles.decorator";
import { RoleGuard } from "../auth/guards/role.guard";
import { type AuthSession, SessionGuard } from "../auth/guards/session.guard";
import {
  type CreatePaymentDto,
  createPaymentSchema,
  type UpdatePaymentStatusDto,
  updatePaymentStatusSchema,
} from "./dto/payment.dto";
import { PaymentService } from "./payment.service";

@Controller("api/payments")
@UseGuards(SessionGuard)
export class PaymentController {
  constructor(private readonly paymentService: PaymentService) {}

  @Get()
  @UseGuards(RoleGuard)
  @Roles(CUSTOMER)
  async getMyPayments(@CurrentUser() user: AuthSession["user"]) {
    return this.paymentService.getMyPayments(user.id);
  }

  @Post()
  @UseGuards(RoleGuard)
  @Roles(CUSTOMER)
  async createPayment(
    @ZodBody(createPaymentSchema) body: CreatePaymentDto,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.paymentService.createPayment(body, user.id);
  }

  @Get(":id")
  async getPaymentDetails(
    @ZodIdParam() id: number,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.paymentService.getPaymentDetails(id, user);
  }

  @Post(":id/status")
  @HttpCode(HttpStatus.OK)
  @UseGuards(RoleGuard)
  @Roles(STAFF, MANAGER)
  async updatePaymentStatus(
    @ZodIdParam() id: number,
    @ZodBody(updatePaymentStatusSchema) body: UpdatePaymentStatusDto,
  ) {
    return this.paymentService.updatePaymentStatus(id, body.status);
  }
}
