import { Decimal } from "decimal.js";
import type { Promotion, Subscription } from "../database/schema";
import { isPromotionValidForCar } from "../promotion/promotion.helper";

const MS_PER_HOUR = 60 * 60 * 1000;

export type PricingSubscription = Pick<Subscription, "isActive" | "discountPercentage">;
export type PricingPromotion = Pick<
  Promotion,
  | "isActive"
  | "isEVOnly"
  | "startDate"
  | "endDate"
  | "maxUses"
  | "currentUses"
  | "discountPercentage"
  | "maxDiscountAmount"
>;

export interface PriceInput {
  dailyRate: Decimal.Value;
  isElectric: boolean;
  startDate: Date;
  endDate: Date;
  subscription?: PricingSubscription | null;
  promotion?: PricingPromotion | null;
  now?: Date;
}

export interface PriceBreakdown {
  days: number;
  basePrice: Decimal;
  subscriptionDiscount: Decimal;
  promotionDiscount: Decimal;
  discountAmount: Decimal;
  totalPrice: Decimal;
}

/**
 * Whole rental days, rounded up. Zero or negative durations count as one day.
 */
export function calculateRentalDays(startDate: Date, endDate: Date): number {
  const hours = hoursBetween(startDate, endDate);
  return hours <= 0 ? 1 : Math.ceil(hours / 24);
}

export function hoursBetween(startDate: Date, endDate: Date): number {
  return (endDate.getTime() - startDate.getTime()) / MS_PER_HOUR;
}

/**
 * Both discounts are taken from the base price. The promotion discount is
 * capped at maxDiscountAmount and only counts while the promotion is
 * redeemable at `now` and, when EV-only, the car is electric. The
 * subscription discount only counts while the plan is active.
 */
export function calculatePriceBreakdown(input: PriceInput): PriceBreakdown {
  const days = calculateRentalDays(input.startDate, input.endDate);
  const basePrice = new Decimal(input.dailyRate).times(days);

  let subscriptionDiscount = new Decimal(0);
  if (input.subscription?.isActive) {
    subscriptionDiscount = basePrice.times(input.subscription.discountPercentage).dividedBy(100);
  }

  let promotionDiscount = new Decimal(0);
  const promotion = input.promotion;
  if (promotion && isPromotionValidForCar(promotion, input.isElectric, input.now ?? new Date())) {
    promotionDiscount = basePrice.times(promotion.discountPercentage).dividedBy(100);
    if (promotion.maxDiscountAmount !== null) {
      promotionDiscount = Decimal.min(promotionDiscount, promotion.maxDiscountAmount);
    }
  }

  const discountAmount = subscriptionDiscount.plus(promotionDiscount);

  return {
    days,
    basePrice,
    subscriptionDiscount,
    promotionDiscount,
    discountAmount,
    totalPrice: basePrice.minus(discountAmount),
  };
}
