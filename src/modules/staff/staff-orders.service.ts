import { Injectable, Logger } from "@nestjs/common";
import { and, desc, eq, gte, ilike, inArray, lte, ne, notInArray, or, type SQL } from "drizzle-orm";
import { CURRENCY_LABEL } from "../../config/constants";
import { formatAmount, getCarDisplayName, toContainsPattern } from "../../shared/helper";
import { DatabaseService, type Transaction } from "../database/database.service";
import { AppointmentStatus, NotificationType, PaymentStatus } from "../database/enums";
import { type Appointment, appointments, cars, type Payment, payments } from "../database/schema";
import type { AppointmentWithCar } from "../appointment/appointment.interface";
import { NotificationService } from "../notification/notification.service";
import type { OrderListQueryDto } from "./dto/staff.dto";
import {
  NoOrdersSelectedException,
  OrderNotFoundException,
  StaffException,
  StaffFetchFailedException,
} from "./staff.error";
import { orderStatusNotification } from "./staff.helper";
import type {
  BatchOrderStatusResult,
  OrderDetails,
  OrderList,
  OrderStatusFilter,
  OrderStatusResult,
} from "./staff.interface";

@Injectable()
export class StaffOrdersService {
  private readonly logger = new Logger(StaffOrdersService.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly notificationService: NotificationService,
  ) {}

  /** "All" hides cancelled orders; pick the Cancelled filter to see them. */
  async listOrders(query: OrderListQueryDto): Promise<OrderList> {
    try {
      const orders = await this.databaseService.db.query.appointments.findMany({
        where: and(this.buildStatusFilter(query.status), this.buildSearchFilter(query.searchTerm)),
        with: { car: true, user: true, promotion: true, payment: true },
        orderBy: [desc(appointments.createdAt)],
      });

      const paymentsByOrder: Record<number, Payment> = {};
      for (const order of orders) {
        if (order.payment) {
          paymentsByOrder[order.id] = order.payment;
        }
      }

      return {
        orders,
        payments: paymentsByOrder,
        status: query.status,
        searchTerm: query.searchTerm,
      };
    } catch (error) {
      this.logger.error("Failed to load orders", {
        status: query.status,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StaffFetchFailedException("Unable to load orders. Please try again later.");
    }
  }

  async getOrderDetails(id: number): Promise<OrderDetails> {
    const order = await this.databaseService.db.query.appointments.findFirst({
      where: eq(appointments.id, id),
      with: { car: true, user: true, promotion: true, subscription: true, payment: true },
    });

    if (!order) {
      throw new OrderNotFoundException(id);
    }

    return { ...order, isPaymentCompleted: order.payment?.status === PaymentStatus.COMPLETED };
  }

  async updateOrderStatus(id: number, status: AppointmentStatus): Promise<OrderStatusResult> {
    try {
      const order = await this.databaseService.db.query.appointments.findFirst({
        where: eq(appointments.id, id),
        with: { car: true },
      });
      if (!order) {
        throw new OrderNotFoundException(id);
      }

      const updated = await this.databaseService.db.transaction((tx) =>
        this.applyStatusChange(tx, order, status, new Date()),
      );

      this.logger.log("Order status updated", { orderId: id, from: order.status, to: status });

      return { order: updated, message: `Order #${id} status updated to ${status} successfully!` };
    } catch (error) {
      if (error instanceof StaffException) {
        throw error;
      }
      this.logger.error("Failed to update order status", {
        orderId: id,
        status,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StaffFetchFailedException("Unable to update the order. Please try again later.");
    }
  }

  /** Unknown ids are skipped; the result counts the orders actually changed. */
  async batchUpdateOrderStatus(
    orderIds: number[],
    status: AppointmentStatus,
  ): Promise<BatchOrderStatusResult> {
    if (orderIds.length === 0) {
      throw new NoOrdersSelectedException();
    }

    try {
      const orders = await this.databaseService.db.query.appointments.findMany({
        where: inArray(appointments.id, orderIds),
        with: { car: true },
      });

      const now = new Date();
      await this.databaseService.db.transaction(async (tx) => {
        for (const order of orders) {
          await this.applyStatusChange(tx, order, status, now);
        }
      });

      this.logger.log("Batch order status update", {
        requested: orderIds.length,
        updated: orders.length,
        status,
      });

      return {
        updatedCount: orders.length,
        message: `${orders.length} order(s) updated to ${status} successfully!`,
      };
    } catch (error) {
      this.logger.error("Failed to batch update orders", {
        orderIds,
        status,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StaffFetchFailedException("Unable to update the orders. Please try again later.");
    }
  }

  /**
   * Moving an order into Cancelled also frees the car (when nothing else
   * holds it over the same dates) and refunds a completed payment. The
   * customer hears about every change.
   */
  private async applyStatusChange(
    tx: Transaction,
    order: AppointmentWithCar,
    status: AppointmentStatus,
    now: Date,
  ): Promise<Appointment> {
    const [updated] = await tx
      .update(appointments)
      .set({ status, updatedAt: now })
      .where(eq(appointments.id, order.id))
      .returning();

    if (status === AppointmentStatus.CANCELLED && order.status !== AppointmentStatus.CANCELLED) {
      await this.releaseCar(tx, order, now);
      await this.refundCompletedPayment(tx, order, now);
    }

    if (order.userId) {
      await this.notificationService.createNotification(
        { userId: order.userId, ...orderStatusNotification(status, getCarDisplayName(order.car)) },
        tx,
      );
    }

    return updated;
  }

  private async releaseCar(tx: Transaction, order: AppointmentWithCar, now: Date): Promise<void> {
    if (order.car.isAvailable) {
      return;
    }

    const overlapping = await tx.$count(
      appointments,
      and(
        eq(appointments.carId, order.carId),
        ne(appointments.id, order.id),
        notInArray(appointments.status, [AppointmentStatus.CANCELLED, AppointmentStatus.COMPLETED]),
        lte(appointments.startDate, order.endDate),
        gte(appointments.endDate, order.startDate),
      ),
    );

    if (overlapping === 0) {
      await tx
        .update(cars)
        .set({ isAvailable: true, updatedAt: now })
        .where(eq(cars.id, order.carId));
    }
  }

  private async refundCompletedPayment(
    tx: Transaction,
    order: AppointmentWithCar,
    now: Date,
  ): Promise<void> {
    const [refunded] = await tx
      .update(payments)
      .set({ status: PaymentStatus.REFUNDED, updatedAt: now })
      .where(and(eq(payments.appointmentId, order.id), eq(payments.status, PaymentStatus.COMPLETED)))
      .returning();

    if (refunded && order.userId) {
      await this.notificationService.createNotification(
        {
          userId: order.userId,
          title: "Refund Processed",
          message: `A refund of ${CURRENCY_LABEL} ${formatAmount(refunded.amount)} has been processed for your cancelled booking.`,
          type: NotificationType.SUCCESS,
        },
        tx,
      );
    }
  }

  private buildStatusFilter(status: OrderStatusFilter): SQL {
    return status === "All"
      ? ne(appointments.status, AppointmentStatus.CANCELLED)
      : eq(appointments.status, status);
  }

  private buildSearchFilter(term: string): SQL | undefined {
    if (!term) {
      return undefined;
    }

    const pattern = toContainsPattern(term);
    return or(
      ilike(appointments.customerName, pattern),
      ilike(appointments.customerEmail, pattern),
      inArray(
        appointments.carId,
        this.databaseService.db
          .select({ id: cars.id })
          .from(cars)
          .where(or(ilike(cars.make, pattern), ilike(cars.model, pattern))),
      ),
    );
  }
}
