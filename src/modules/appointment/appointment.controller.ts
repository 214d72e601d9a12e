import { UTCDate } from "@date-fns/utc";
import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Put,
  UseGuards,
} from "@nestjs/common";
import { Throttle } from "@nestjs/throttler";
import { addDays, startOfDay } from "date-fns";
import { ZodBody, ZodIdParam, ZodQuery } from "../../common/decorators/zod-validation.decorator";
import { SkipGlobalThrottle } from "../../common/throttling/global-throttler.guard";
import { SLOT_WINDOW_DAYS } from "../../config/constants";
import { toMoney } from "../../shared/helper";
import { CUSTOMER, MANAGER, STAFF } from "../auth/auth.types";
import { CurrentUser } from "../auth/decorators/current-user.decorator";
import { Roles } from "../auth/decorators/roles.decorator";
import { RoleGuard } from "../auth/guards/role.guard";
import { type AuthSession, SessionGuard } from "../auth/guards/session.guard";
import { type ValidatePromotionDto, validatePromotionSchema } from "../promotion/dto/promotion.dto";
import { PromotionService } from "../promotion/promotion.service";
import { formatSlot } from "./appointment-availability.helper";
import { AppointmentBookingService } from "./appointment-booking.service";
import { APPOINTMENT_THROTTLE, AppointmentThrottlerGuard } from "./appointment-throttler.guard";
import { AppointmentNotFoundException, CarNotFoundException } from "./appointment.error";
import type { FormattedSlot, PriceQuote } from "./appointment.interface";
import { AppointmentService } from "./appointment.service";
import {
  type AppointmentBodyDto,
  type AvailableSlotsQueryDto,
  type CalculatePriceQueryDto,
  type CreateBookingDto,
  type DateRangeQueryDto,
  type MyAppointmentsQueryDto,
  appointmentBodySchema,
  availableSlotsQuerySchema,
  calculatePriceQuerySchema,
  createBookingSchema,
  dateRangeQuerySchema,
  myAppointmentsQuerySchema,
} from "./dto/appointment.dto";

@Controller("api/appointments")
export class AppointmentController {
  private readonly logger = new Logger(AppointmentController.name);

  constructor(
    private readonly appointmentService: AppointmentService,
    private readonly bookingService: AppointmentBookingService,
    private readonly promotionService: PromotionService,
  ) {}

  /**
   * Free slots for a car. Defaults to today (UTC midnight) plus 30 days; an
   * unknown car or a failed lookup yields an empty list.
   */
  @Get("slots")
  async getAvailableSlots(
    @ZodQuery(availableSlotsQuerySchema) query: AvailableSlotsQueryDto,
  ): Promise<FormattedSlot[]> {
    if (query.carId <= 0) {
      return [];
    }

    const windowStart = query.startDate ?? startOfDay(new UTCDate());
    const windowEnd = query.endDate ?? addDays(windowStart, SLOT_WINDOW_DAYS);

    try {
      const slots = await this.appointmentService.getAvailableTimeSlots(
        query.carId,
        windowStart,
        windowEnd,
      );
      return slots.map(formatSlot);
    } catch (error) {
      this.logger.error("Failed to load available slots", {
        carId: query.carId,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  @Post("validate-promotion")
  @HttpCode(HttpStatus.OK)
  async validatePromotion(@ZodBody(validatePromotionSchema) body: ValidatePromotionDto) {
    return this.promotionService.validatePromotionCode(body.code, body.carId);
  }

  @Get("calculate-price")
  async calculatePrice(
    @ZodQuery(calculatePriceQuerySchema) query: CalculatePriceQueryDto,
  ): Promise<PriceQuote> {
    const breakdown = await this.appointmentService.quotePrice(query);
    if (!breakdown) {
      throw new CarNotFoundException();
    }

    return {
      carId: query.carId,
      days: breakdown.days,
      basePrice: toMoney(breakdown.basePrice),
      subscriptionDiscount: toMoney(breakdown.subscriptionDiscount),
      promotionDiscount: toMoney(breakdown.promotionDiscount),
      discountAmount: toMoney(breakdown.discountAmount),
      totalPrice: toMoney(breakdown.totalPrice),
    };
  }

  // Customer bookings

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @UseGuards(SessionGuard, RoleGuard, AppointmentThrottlerGuard)
  @Roles(CUSTOMER)
  @Throttle(APPOINTMENT_THROTTLE)
  @SkipGlobalThrottle()
  async createBooking(
    @ZodBody(createBookingSchema) body: CreateBookingDto,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.bookingService.create(body, user);
  }

  @Get("mine")
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(CUSTOMER)
  async getMyAppointments(
    @ZodQuery(myAppointmentsQuerySchema) query: MyAppointmentsQueryDto,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.bookingService.getMyAppointments(user.id, query.view);
  }

  @Get("mine/:id")
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(CUSTOMER)
  async getMyAppointment(
    @ZodIdParam() id: number,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.bookingService.getDetails(id, user.id);
  }

  @Post("mine/:id/cancel")
  @HttpCode(HttpStatus.OK)
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(CUSTOMER)
  async cancelMyAppointment(
    @ZodIdParam() id: number,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.bookingService.cancel(id, user.id);
  }

  @Get("mine/:id/rebook")
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(CUSTOMER)
  async rebook(
    @ZodIdParam() id: number,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.bookingService.rebook(id, user.id);
  }

  // Back office

  @Get()
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async getAllAppointments() {
    return this.appointmentService.getAllAppointments();
  }

  @Get("range")
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async getAppointmentsByDateRange(@ZodQuery(dateRangeQuerySchema) query: DateRangeQueryDto) {
    return this.appointmentService.getAppointmentsByDateRange(query.startDate, query.endDate);
  }

  @Get(":id")
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async getAppointment(@ZodIdParam() id: number) {
    const appointment = await this.appointmentService.getAppointmentById(id);
    if (!appointment) {
      throw new AppointmentNotFoundException();
    }
    return appointment;
  }

  @Post("manage")
  @HttpCode(HttpStatus.CREATED)
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async scheduleAppointment(@ZodBody(appointmentBodySchema) body: AppointmentBodyDto) {
    return this.appointmentService.scheduleAppointment(body);
  }

  @Put(":id")
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(STAFF, MANAGER)
  async updateAppointment(
    @ZodIdParam() id: number,
    @ZodBody(appointmentBodySchema) body: AppointmentBodyDto,
  ) {
    return this.appointmentService.rescheduleAppointment(id, body);
  }

  @Delete(":id")
  @UseGuards(SessionGuard, RoleGuard)
  @Roles(MANAGER)
  async deleteAppointment(@ZodIdParam() id: number) {
    if (!(await this.appointmentService.deleteAppointment(id))) {
      throw new AppointmentNotFoundException();
    }
    return { success: true, message: "Appointment deleted successfully!" };
  }
}
