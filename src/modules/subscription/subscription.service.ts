import { Injectable, Logger } from "@nestjs/common";
import { asc, eq } from "drizzle-orm";
import { toMoney } from "../../shared/helper";
import { DatabaseService } from "../database/database.service";
import { type NewSubscription, type Subscription, subscriptions } from "../database/schema";
import type { SubscriptionBodyDto } from "./dto/subscription.dto";
import {
  SubscriptionFetchFailedException,
  SubscriptionNotFoundException,
} from "./subscription.error";
import type { SubscriptionDetails } from "./subscription.interface";

@Injectable()
export class SubscriptionService {
  private readonly logger = new Logger(SubscriptionService.name);

  constructor(private readonly databaseService: DatabaseService) {}

  async getById(id: number): Promise<Subscription | null> {
    const subscription = await this.databaseService.db.query.subscriptions.findFirst({
      where: eq(subscriptions.id, id),
    });
    return subscription ?? null;
  }

  async getByIdOrThrow(id: number): Promise<Subscription> {
    const subscription = await this.getById(id);
    if (!subscription) {
      throw new SubscriptionNotFoundException();
    }
    return subscription;
  }

  async getAll(): Promise<Subscription[]> {
    return this.databaseService.db.query.subscriptions.findMany({
      orderBy: [asc(subscriptions.monthlyPrice)],
    });
  }

  async getActive(): Promise<Subscription[]> {
    try {
      return await this.databaseService.db.query.subscriptions.findMany({
        where: eq(subscriptions.isActive, true),
        orderBy: [asc(subscriptions.monthlyPrice)],
      });
    } catch (error) {
      this.logger.error("Failed to fetch active subscription plans", {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new SubscriptionFetchFailedException();
    }
  }

  async create(body: SubscriptionBodyDto): Promise<Subscription> {
    const [subscription] = await this.databaseService.db
      .insert(subscriptions)
      .values(this.toRow(body))
      .returning();
    this.logger.log("Subscription plan created", { subscriptionId: subscription.id });
    return subscription;
  }

  async update(id: number, body: SubscriptionBodyDto): Promise<Subscription> {
    await this.getByIdOrThrow(id);
    const [subscription] = await this.databaseService.db
      .update(subscriptions)
      .set({ ...this.toRow(body), updatedAt: new Date() })
      .where(eq(subscriptions.id, id))
      .returning();
    return subscription;
  }

  async delete(id: number): Promise<boolean> {
    const deleted = await this.databaseService.db
      .delete(subscriptions)
      .where(eq(subscriptions.id, id))
      .returning({ id: subscriptions.id });
    return deleted.length > 0;
  }

  async toggleStatus(id: number): Promise<Subscription> {
    const existing = await this.getByIdOrThrow(id);
    const [subscription] = await this.databaseService.db
      .update(subscriptions)
      .set({ isActive: !existing.isActive, updatedAt: new Date() })
      .where(eq(subscriptions.id, id))
      .returning();
    return subscription;
  }

  /** Compact plan summary for the booking form; an error object when missing. */
  async getDetails(id: number): Promise<SubscriptionDetails> {
    const subscription = await this.getById(id);
    if (!subscription) {
      return { error: "Subscription not found" };
    }

    return {
      id: subscription.id,
      name: subscription.name,
      discountPercentage: Number(subscription.discountPercentage),
      monthlyPrice: Number(subscription.monthlyPrice),
      isActive: subscription.isActive,
    };
  }

  private toRow(body: SubscriptionBodyDto): NewSubscription {
    return {
      name: body.name,
      description: body.description ?? null,
      monthlyPrice: toMoney(body.monthlyPrice),
      discountPercentage: toMoney(body.discountPercentage),
      maxRentalsPerMonth: body.maxRentalsPerMonth,
      maxDaysPerRental: body.maxDaysPerRental,
      includesEVPriority: body.includesEVPriority,
      isActive: body.isActive,
    };
  }
}
