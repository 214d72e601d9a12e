import type { Promotion } from "../database/schema";

type RedeemableFields = Pick<
  Promotion,
  "isActive" | "startDate" | "endDate" | "maxUses" | "currentUses"
>;

/**
 * Active, inside its date window (inclusive) and under its usage cap.
 */
export function isPromotionRedeemable(promotion: RedeemableFields, now = new Date()): boolean {
  if (!promotion.isActive) return false;
  if (promotion.startDate > now || promotion.endDate < now) return false;
  return promotion.maxUses === null || promotion.currentUses < promotion.maxUses;
}

/**
 * Redeemable and, for EV-only promotions, applied to an electric car.
 */
export function isPromotionValidForCar(
  promotion: RedeemableFields & Pick<Promotion, "isEVOnly">,
  isElectric: boolean,
  now = new Date(),
): boolean {
  if (promotion.isEVOnly && !isElectric) return false;
  return isPromotionRedeemable(promotion, now);
}

export function normalizePromotionCode(code: string): string {
  return code.trim().toUpperCase();
}
