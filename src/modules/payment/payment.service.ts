import { randomUUID } from "node:crypto";
import { Injectable, Logger } from "@nestjs/common";
import { and, desc, eq, inArray, ne } from "drizzle-orm";
import { CURRENCY_LABEL } from "../../config/constants";
import { formatAmount, getCarDisplayName } from "../../shared/helper";
import { isBackOfficeRole } from "../auth/auth.types";
import type { AuthSession } from "../auth/guards/session.guard";
import { DatabaseService } from "../database/database.service";
import { AppointmentStatus, NotificationType, PaymentStatus } from "../database/enums";
import { appointments, type Payment, payments } from "../database/schema";
import { NotificationService } from "../notification/notification.service";
import type { CreatePaymentDto } from "./dto/payment.dto";
import { INSTANT_PAYMENT_METHODS } from "./payment.const";
import {
  PaymentAccessDeniedException,
  PaymentAlreadyCompletedException,
  PaymentAppointmentNotFoundException,
  PaymentException,
  PaymentFetchFailedException,
  PaymentNotFoundException,
} from "./payment.error";
import { resolveBookingTransition } from "./payment.helper";
import type { PaymentActionResult, PaymentWithAppointment } from "./payment.interface";

/**
 * Simulated payments. Nothing reaches a gateway: a card payment or one that
 * carries a transaction reference settles immediately, anything else stays
 * pending until staff update it.
 */
@Injectable()
export class PaymentService {
  private readonly logger = new Logger(PaymentService.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly notificationService: NotificationService,
  ) {}

  async getMyPayments(userId: string): Promise<PaymentWithAppointment[]> {
    try {
      const db = this.databaseService.db;
      return await db.query.payments.findMany({
        where: inArray(
          payments.appointmentId,
          db.select({ id: appointments.id }).from(appointments).where(eq(appointments.userId, userId)),
        ),
        with: { appointment: { with: { car: true } } },
        orderBy: [desc(payments.paymentDate)],
      });
    } catch (error) {
      this.logger.error("Failed to load payments", {
        userId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new PaymentFetchFailedException();
    }
  }

  /**
   * Pays for one of the caller's bookings. The amount is always the booking
   * total; an earlier unsettled attempt is overwritten rather than duplicated.
   */
  async createPayment(body: CreatePaymentDto, userId: string): Promise<PaymentActionResult> {
    const appointment = await this.databaseService.db.query.appointments.findFirst({
      where: eq(appointments.id, body.appointmentId),
      with: { car: true, payment: true },
    });

    if (!appointment) {
      throw new PaymentAppointmentNotFoundException();
    }
    if (appointment.userId !== userId) {
      throw new PaymentAccessDeniedException();
    }
    if (appointment.payment?.status === PaymentStatus.COMPLETED) {
      throw new PaymentAlreadyCompletedException(appointment.payment.id);
    }

    const settles =
      body.transactionId !== undefined || INSTANT_PAYMENT_METHODS.includes(body.paymentMethod);
    const now = new Date();
    const values = {
      appointmentId: appointment.id,
      paymentMethod: body.paymentMethod,
      amount: appointment.totalPrice,
      status: settles ? PaymentStatus.COMPLETED : PaymentStatus.PENDING,
      transactionId: settles ? (body.transactionId ?? randomUUID()) : null,
      paymentDate: now,
      updatedAt: settles ? now : null,
    };
    const carName = getCarDisplayName(appointment.car);
    const existingPayment = appointment.payment;

    const payment = await this.databaseService.db.transaction(async (tx) => {
      const [saved] = existingPayment
        ? await tx.update(payments).set(values).where(eq(payments.id, existingPayment.id)).returning()
        : await tx.insert(payments).values(values).returning();

      if (settles && appointment.status === AppointmentStatus.PENDING) {
        await tx
          .update(appointments)
          .set({ status: AppointmentStatus.CONFIRMED, updatedAt: now })
          .where(eq(appointments.id, appointment.id));
      }

      await this.notificationService.createNotification(
        {
          userId,
          title: "Payment Received",
          message: `Your payment of ${CURRENCY_LABEL} ${formatAmount(values.amount)} for booking ${carName} has been processed successfully.`,
          type: NotificationType.SUCCESS,
        },
        tx,
      );

      return saved;
    });

    this.logger.log("Payment recorded", {
      paymentId: payment.id,
      appointmentId: appointment.id,
      status: payment.status,
    });

    return { payment, message: "Payment processed successfully!" };
  }

  async getPaymentDetails(id: number, user: AuthSession["user"]): Promise<PaymentWithAppointment> {
    const payment = await this.databaseService.db.query.payments.findFirst({
      where: eq(payments.id, id),
      with: { appointment: { with: { car: true } } },
    });

    if (!payment) {
      throw new PaymentNotFoundException();
    }
    if (!isBackOfficeRole(user.role) && payment.appointment.userId !== user.id) {
      throw new PaymentAccessDeniedException();
    }

    return payment;
  }

  /** Staff override of a payment's status; see resolveBookingTransition for the booking side. */
  async updatePaymentStatus(id: number, status: PaymentStatus): Promise<PaymentActionResult> {
    try {
      const existing = await this.databaseService.db.query.payments.findFirst({
        where: eq(payments.id, id),
        with: { appointment: { with: { car: true } } },
      });
      if (!existing) {
        throw new PaymentNotFoundException();
      }

      const { appointment } = existing;
      const customerId = appointment.userId;
      const transition = resolveBookingTransition(
        status,
        appointment,
        getCarDisplayName(appointment.car),
      );

      const payment = await this.databaseService.db.transaction(async (tx): Promise<Payment> => {
        const now = new Date();
        const [updated] = await tx
          .update(payments)
          .set({ status, updatedAt: now })
          .where(eq(payments.id, id))
          .returning();

        if (transition) {
          await tx
            .update(appointments)
            .set({ status: transition.status, updatedAt: now })
            .where(
              and(eq(appointments.id, appointment.id), ne(appointments.status, transition.status)),
            );
          if (customerId) {
            await this.notificationService.createNotification(
              { userId: customerId, ...transition.notification },
              tx,
            );
          }
        }

        return updated;
      });

      this.logger.log("Payment status updated", {
        paymentId: id,
        status,
        bookingStatus: transition?.status ?? appointment.status,
      });

      return { payment, message: `Payment status updated to ${status} successfully!` };
    } catch (error) {
      if (error instanceof PaymentException) {
        throw error;
      }
      this.logger.error("Failed to update payment status", {
        paymentId: id,
        status,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new PaymentFetchFailedException();
    }
  }
}
