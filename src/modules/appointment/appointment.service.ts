import { Injectable, Logger } from "@nestjs/common";
import { and, asc, desc, eq, gte, lte, ne } from "drizzle-orm";
import { Decimal } from "decimal.js";
import { getCarDisplayName, toMoney } from "../../shared/helper";
import { DatabaseService, type Transaction } from "../database/database.service";
import { AppointmentStatus } from "../database/enums";
import { type Appointment, appointments, cars, promotions, subscriptions } from "../database/schema";
import {
  blockingAppointmentCondition,
  computeAvailableSlots,
  type TimeSlot,
} from "./appointment-availability.helper";
import { calculatePriceBreakdown, type PriceBreakdown } from "./appointment-pricing.helper";
import {
  AppointmentNotFoundException,
  BookingConflictException,
  CarNotFoundException,
  CarUnavailableException,
} from "./appointment.error";
import { buildConflictMessage } from "./appointment.helper";
import type {
  AppointmentInput,
  AppointmentWithCar,
  AppointmentWithRelations,
} from "./appointment.interface";

interface PricingRequest {
  carId: number;
  startDate: Date;
  endDate: Date;
  subscriptionId?: number | null;
  promotionId?: number | null;
}

/**
 * Pricing and availability engine behind every booking path.
 *
 * Overlap is half-open: a booking ending at 10:00 does not block one starting
 * at 10:00. Cancelled bookings never block a car.
 */
@Injectable()
export class AppointmentService {
  private readonly logger = new Logger(AppointmentService.name);

  constructor(private readonly databaseService: DatabaseService) {}

  /** Null when the car does not exist. */
  async quotePrice(request: PricingRequest, tx?: Transaction): Promise<PriceBreakdown | null> {
    const executor = tx ?? this.databaseService.db;
    const car = await executor.query.cars.findFirst({
      where: eq(cars.id, request.carId),
      columns: { dailyRate: true, isElectric: true },
    });
    if (!car) {
      return null;
    }

    const subscription = request.subscriptionId
      ? await executor.query.subscriptions.findFirst({
          where: eq(subscriptions.id, request.subscriptionId),
        })
      : undefined;
    const promotion = request.promotionId
      ? await executor.query.promotions.findFirst({
          where: eq(promotions.id, request.promotionId),
        })
      : undefined;

    return calculatePriceBreakdown({
      dailyRate: car.dailyRate,
      isElectric: car.isElectric,
      startDate: request.startDate,
      endDate: request.endDate,
      subscription,
      promotion,
    });
  }

  /** Total after discounts; zero when the car does not exist. */
  async calculatePrice(
    carId: number,
    startDate: Date,
    endDate: Date,
    subscriptionId?: number,
    promotionId?: number,
  ): Promise<Decimal> {
    const breakdown = await this.quotePrice({
      carId,
      startDate,
      endDate,
      subscriptionId,
      promotionId,
    });
    return breakdown?.totalPrice ?? new Decimal(0);
  }

  async createAppointment(input: AppointmentInput, tx?: Transaction): Promise<Appointment> {
    const executor = tx ?? this.databaseService.db;
    const pricing = await this.priceOrThrow(input, tx);

    const [appointment] = await executor
      .insert(appointments)
      .values({
        carId: input.carId,
        userId: input.userId ?? null,
        customerName: input.customerName ?? null,
        customerEmail: input.customerEmail ?? null,
        customerPhone: input.customerPhone ?? null,
        startDate: input.startDate,
        endDate: input.endDate,
        specialRequests: input.specialRequests ?? null,
        status: input.status ?? AppointmentStatus.PENDING,
        promotionId: input.promotionId ?? null,
        subscriptionId: input.subscriptionId ?? null,
        ...pricing,
      })
      .returning();

    this.logger.log("Appointment created", {
      appointmentId: appointment.id,
      carId: appointment.carId,
      totalPrice: appointment.totalPrice,
    });

    return appointment;
  }

  async updateAppointment(id: number, input: AppointmentInput): Promise<Appointment> {
    const pricing = await this.priceOrThrow(input);

    const [appointment] = await this.databaseService.db
      .update(appointments)
      .set({
        carId: input.carId,
        userId: input.userId ?? null,
        customerName: input.customerName ?? null,
        customerEmail: input.customerEmail ?? null,
        customerPhone: input.customerPhone ?? null,
        startDate: input.startDate,
        endDate: input.endDate,
        specialRequests: input.specialRequests ?? null,
        status: input.status ?? AppointmentStatus.PENDING,
        promotionId: input.promotionId ?? null,
        subscriptionId: input.subscriptionId ?? null,
        ...pricing,
        updatedAt: new Date(),
      })
      .where(eq(appointments.id, id))
      .returning();

    if (!appointment) {
      throw new AppointmentNotFoundException();
    }

    return appointment;
  }

  /** Back-office create; rejects dates the car is already booked for. */
  async scheduleAppointment(input: AppointmentInput): Promise<Appointment> {
    await this.assertBookable(input);
    return this.createAppointment(input);
  }

  /** Back-office edit; the appointment itself never counts as a conflict. */
  async rescheduleAppointment(id: number, input: AppointmentInput): Promise<Appointment> {
    await this.assertBookable(input, id);
    return this.updateAppointment(id, input);
  }

  async getAppointmentById(id: number): Promise<AppointmentWithRelations | null> {
    const appointment = await this.databaseService.db.query.appointments.findFirst({
      where: eq(appointments.id, id),
      with: { car: true, promotion: true, subscription: true },
    });
    return appointment ?? null;
  }

  async getAllAppointments(): Promise<AppointmentWithRelations[]> {
    return this.databaseService.db.query.appointments.findMany({
      with: { car: true, promotion: true, subscription: true },
      orderBy: [desc(appointments.createdAt)],
    });
  }

  async deleteAppointment(id: number): Promise<boolean> {
    const deleted = await this.databaseService.db
      .delete(appointments)
      .where(eq(appointments.id, id))
      .returning({ id: appointments.id });
    return deleted.length > 0;
  }

  async isCarAvailable(
    carId: number,
    startDate: Date,
    endDate: Date,
    excludeAppointmentId?: number,
  ): Promise<boolean> {
    const car = await this.databaseService.db.query.cars.findFirst({
      where: eq(cars.id, carId),
      columns: { isAvailable: true },
    });
    if (!car?.isAvailable) {
      return false;
    }

    const conflicts = await this.databaseService.db.$count(
      appointments,
      blockingAppointmentCondition(carId, startDate, endDate, excludeAppointmentId),
    );
    return conflicts === 0;
  }

  /** Non-cancelled bookings of the car overlapping the range, earliest first. */
  async findConflicts(
    carId: number,
    startDate: Date,
    endDate: Date,
    excludeAppointmentId?: number,
  ): Promise<Appointment[]> {
    return this.databaseService.db.query.appointments.findMany({
      where: blockingAppointmentCondition(carId, startDate, endDate, excludeAppointmentId),
      orderBy: [asc(appointments.startDate)],
    });
  }

  async getAvailableTimeSlots(carId: number, startDate: Date, endDate: Date): Promise<TimeSlot[]> {
    const car = await this.databaseService.db.query.cars.findFirst({
      where: eq(cars.id, carId),
      columns: { isAvailable: true },
    });
    if (!car?.isAvailable) {
      return [];
    }

    const booked = await this.findConflicts(carId, startDate, endDate);
    return computeAvailableSlots(startDate, endDate, booked);
  }

  /** Non-cancelled bookings touching the range (inclusive), by start. */
  async getAppointmentsByDateRange(startDate: Date, endDate: Date): Promise<AppointmentWithCar[]> {
    return this.databaseService.db.query.appointments.findMany({
      where: and(
        lte(appointments.startDate, endDate),
        gte(appointments.endDate, startDate),
        ne(appointments.status, AppointmentStatus.CANCELLED),
      ),
      with: { car: true },
      orderBy: [asc(appointments.startDate)],
    });
  }

  private async assertBookable(input: AppointmentInput, excludeAppointmentId?: number) {
    if (input.status === AppointmentStatus.CANCELLED) {
      return;
    }
    if (
      await this.isCarAvailable(input.carId, input.startDate, input.endDate, excludeAppointmentId)
    ) {
      return;
    }

    const car = await this.databaseService.db.query.cars.findFirst({
      where: eq(cars.id, input.carId),
    });
    if (!car) {
      throw new CarNotFoundException();
    }
    if (!car.isAvailable) {
      throw new CarUnavailableException(getCarDisplayName(car));
    }

    const [conflict] = await this.findConflicts(
      input.carId,
      input.startDate,
      input.endDate,
      excludeAppointmentId,
    );
    throw new BookingConflictException(
      buildConflictMessage(getCarDisplayName(car), conflict),
      conflict,
    );
  }

  private async priceOrThrow(
    input: AppointmentInput,
    tx?: Transaction,
  ): Promise<{ totalPrice: string; discountAmount: string | null }> {
    const breakdown = await this.quotePrice(input, tx);
    if (!breakdown) {
      throw new CarNotFoundException();
    }

    return {
      totalPrice: toMoney(breakdown.totalPrice),
      discountAmount: breakdown.discountAmount.greaterThan(0)
        ? toMoney(breakdown.discountAmount)
        : null,
    };
  }
}
