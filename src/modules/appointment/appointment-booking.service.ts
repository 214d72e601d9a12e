import { Injectable, Logger } from "@nestjs/common";
import { and, desc, eq, inArray, ne } from "drizzle-orm";
import type { FieldError } from "../../common/errors/problem-details.interface";
import { getCarDisplayName } from "../../shared/helper";
import type { AuthSession } from "../auth/guards/session.guard";
import { DatabaseService } from "../database/database.service";
import { AppointmentStatus, NotificationType, PaymentStatus } from "../database/enums";
import { type Car, appointments, cars, payments, users } from "../database/schema";
import { NotificationService } from "../notification/notification.service";
import { isPromotionValidForCar } from "../promotion/promotion.helper";
import { PromotionService } from "../promotion/promotion.service";
import { SubscriptionService } from "../subscription/subscription.service";
import {
  AppointmentAccessDeniedException,
  AppointmentAlreadyCancelledException,
  AppointmentAlreadyCompletedException,
  AppointmentException,
  AppointmentFetchFailedException,
  AppointmentNotFoundException,
  BookingConflictException,
  BookingValidationException,
  InvalidPromotionCodeException,
} from "./appointment.error";
import {
  buildConflictMessage,
  isFreeCancellation,
  refundStatusFor,
  validateBookingDates,
} from "./appointment.helper";
import type {
  AppointmentWithPayment,
  BookingCancelledResponse,
  BookingCreatedResponse,
  MyAppointmentsView,
} from "./appointment.interface";
import { AppointmentService } from "./appointment.service";
import type { CreateBookingDto } from "./dto/appointment.dto";

type SessionUser = AuthSession["user"];

/**
 * Customer side of booking: create, list, view, cancel and rebook.
 */
@Injectable()
export class AppointmentBookingService {
  private readonly logger = new Logger(AppointmentBookingService.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly appointmentService: AppointmentService,
    private readonly promotionService: PromotionService,
    private readonly subscriptionService: SubscriptionService,
    private readonly notificationService: NotificationService,
  ) {}

  /**
   * @throws BookingValidationException with one field error per failed form rule
   * @throws BookingConflictException when another booking holds the car
   * @throws InvalidPromotionCodeException for a code that cannot be redeemed on this car
   */
  async create(body: CreateBookingDto, sessionUser: SessionUser): Promise<BookingCreatedResponse> {
    try {
      const selection = await this.validateCarSelection(body);
      const dateErrors = validateBookingDates(body.startDate, body.endDate);
      const { startDate, endDate } = body;

      if (!selection.ok || dateErrors.length > 0 || !startDate || !endDate) {
        throw new BookingValidationException([
          ...(selection.ok ? [] : selection.errors),
          ...dateErrors,
        ]);
      }

      const { car } = selection;
      const carName = getCarDisplayName(car);
      if (!(await this.appointmentService.isCarAvailable(car.id, startDate, endDate))) {
        const [conflict] = await this.appointmentService.findConflicts(
          car.id,
          startDate,
          endDate,
        );
        throw new BookingConflictException(buildConflictMessage(carName, conflict), conflict);
      }

      const user = await this.databaseService.db.query.users.findFirst({
        where: eq(users.id, sessionUser.id),
      });
      if (!user) {
        throw new BookingValidationException([
          { field: "_root", message: "User not found. Please login again." },
        ]);
      }

      const subscriptionId = await this.resolveSubscriptionId(body.subscriptionId);
      const promotionId = await this.resolvePromotionId(body, car);

      const appointment = await this.databaseService.db.transaction(async (tx) => {
        const created = await this.appointmentService.createAppointment(
          {
            carId: car.id,
            userId: user.id,
            customerName: `${user.firstName ?? ""} ${user.lastName ?? ""}`,
            customerEmail: user.email,
            customerPhone: user.phoneNumber ?? "",
            startDate,
            endDate,
            specialRequests: body.specialRequests ?? null,
            status: AppointmentStatus.PENDING,
            promotionId,
            subscriptionId,
          },
          tx,
        );

        if (promotionId !== null) {
          await this.promotionService.incrementUsage(promotionId, tx);
        }

        await this.notificationService.createNotification(
          {
            userId: user.id,
            title: "Booking Created",
            message: `Your booking for ${carName} has been created successfully. Please proceed with payment to confirm your booking.`,
            type: NotificationType.SUCCESS,
          },
          tx,
        );

        return created;
      });

      this.logger.log("Booking created", {
        appointmentId: appointment.id,
        userId: user.id,
        carId: appointment.carId,
      });

      return {
        appointment,
        message: "Booking created successfully! Please proceed with payment to confirm your booking.",
      };
    } catch (error) {
      if (error instanceof AppointmentException) {
        throw error;
      }
      this.logger.error("Failed to create booking", {
        userId: sessionUser.id,
        carId: body.carId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new AppointmentFetchFailedException();
    }
  }

  async getMyAppointments(
    userId: string,
    view: MyAppointmentsView = "Active",
  ): Promise<AppointmentWithPayment[]> {
    try {
      return await this.databaseService.db.query.appointments.findMany({
        where: and(eq(appointments.userId, userId), this.viewCondition(view)),
        with: {
          car: { with: { category: true } },
          promotion: true,
          subscription: true,
          payment: true,
        },
        orderBy: [desc(appointments.createdAt)],
      });
    } catch (error) {
      this.logger.error("Failed to load appointments", {
        userId,
        view,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new AppointmentFetchFailedException();
    }
  }

  async getDetails(id: number, userId: string): Promise<AppointmentWithPayment> {
    const appointment = await this.databaseService.db.query.appointments.findFirst({
      where: eq(appointments.id, id),
      with: { car: true, promotion: true, subscription: true, payment: true },
    });

    if (!appointment) {
      throw new AppointmentNotFoundException();
    }
    if (appointment.userId !== userId) {
      throw new AppointmentAccessDeniedException("view");
    }

    return appointment;
  }

  /**
   * Cancels the customer's booking. A completed payment is refunded in full
   * when pickup is at least 48 hours away, partially otherwise.
   */
  async cancel(id: number, userId: string): Promise<BookingCancelledResponse> {
    try {
      const appointment = await this.databaseService.db.query.appointments.findFirst({
        where: eq(appointments.id, id),
        with: { car: true },
      });

      if (!appointment) {
        throw new AppointmentNotFoundException();
      }
      if (appointment.userId !== userId) {
        throw new AppointmentAccessDeniedException("cancel");
      }
      if (appointment.status === AppointmentStatus.CANCELLED) {
        throw new AppointmentAlreadyCancelledException();
      }
      if (appointment.status === AppointmentStatus.COMPLETED) {
        throw new AppointmentAlreadyCompletedException();
      }

      const freeCancellation = isFreeCancellation(appointment.startDate);
      const carName = getCarDisplayName(appointment.car);

      const cancelled = await this.databaseService.db.transaction(async (tx) => {
        const now = new Date();
        const [updated] = await tx
          .update(appointments)
          .set({ status: AppointmentStatus.CANCELLED, updatedAt: now })
          .where(eq(appointments.id, id))
          .returning();

        await tx
          .update(payments)
          .set({ status: refundStatusFor(freeCancellation), updatedAt: now })
          .where(
            and(eq(payments.appointmentId, id), eq(payments.status, PaymentStatus.COMPLETED)),
          );

        await this.notificationService.createNotification(
          {
            userId,
            title: "Booking Cancelled",
            message: freeCancellation
              ? `Your booking for ${carName} has been cancelled. A full refund will be processed if payment was made.`
              : `Your booking for ${carName} has been cancelled. Please check refund policy for details.`,
            type: NotificationType.INFO,
          },
          tx,
        );

        return updated;
      });

      this.logger.log("Booking cancelled", { appointmentId: id, userId, freeCancellation });

      return {
        appointment: cancelled,
        freeCancellation,
        message: freeCancellation
          ? "Booking cancelled successfully. A full refund will be processed if payment was made."
          : "Booking cancelled successfully. Please check cancellation policy for refund details.",
      };
    } catch (error) {
      if (error instanceof AppointmentException) {
        throw error;
      }
      this.logger.error("Failed to cancel booking", {
        appointmentId: id,
        userId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new AppointmentFetchFailedException();
    }
  }

  /** Car of one of the customer's earlier bookings, to prefill a new one. */
  async rebook(id: number, userId: string): Promise<{ carId: number }> {
    const appointment = await this.databaseService.db.query.appointments.findFirst({
      where: and(eq(appointments.id, id), eq(appointments.userId, userId)),
      columns: { carId: true },
    });

    if (!appointment) {
      throw new AppointmentNotFoundException();
    }

    return { carId: appointment.carId };
  }

  private async validateCarSelection(
    body: CreateBookingDto,
  ): Promise<{ ok: true; car: Car } | { ok: false; errors: FieldError[] }> {
    if (!body.carId || body.carId <= 0) {
      return {
        ok: false,
        errors: [
          { field: "carId", message: "Please select a vehicle to continue with your booking." },
        ],
      };
    }

    const car = await this.databaseService.db.query.cars.findFirst({
      where: eq(cars.id, body.carId),
    });

    if (!car) {
      return {
        ok: false,
        errors: [
          {
            field: "carId",
            message: "The selected vehicle does not exist. Please select another vehicle.",
          },
        ],
      };
    }

    if (!car.isAvailable) {
      return {
        ok: false,
        errors: [
          {
            field: "carId",
            message: `The vehicle '${getCarDisplayName(car)}' is currently unavailable. Please select another vehicle.`,
          },
        ],
      };
    }

    return { ok: true, car };
  }

  /** Inactive or unknown plans are dropped rather than rejected. */
  private async resolveSubscriptionId(subscriptionId: number | undefined): Promise<number | null> {
    if (!subscriptionId) {
      return null;
    }
    const subscription = await this.subscriptionService.getById(subscriptionId);
    return subscription?.isActive ? subscription.id : null;
  }

  /**
   * A typed code must be redeemable on this car or the booking fails; a
   * preselected promotion id that no longer applies is silently dropped.
   */
  private async resolvePromotionId(body: CreateBookingDto, car: Car): Promise<number | null> {
    const code = body.promotionCode?.trim();
    if (code) {
      const promotion = await this.promotionService.getByCode(code);
      if (!promotion || !isPromotionValidForCar(promotion, car.isElectric)) {
        throw new InvalidPromotionCodeException(code);
      }
      return promotion.id;
    }

    if (body.promotionId) {
      const promotion = await this.promotionService.getById(body.promotionId);
      if (promotion && isPromotionValidForCar(promotion, car.isElectric)) {
        return promotion.id;
      }
    }

    return null;
  }

  private viewCondition(view: MyAppointmentsView) {
    switch (view) {
      case "Active":
        return ne(appointments.status, AppointmentStatus.CANCELLED);
      case "History":
        return inArray(appointments.status, [
          AppointmentStatus.COMPLETED,
          AppointmentStatus.CANCELLED,
        ]);
      default:
        return undefined;
    }
  }
}
