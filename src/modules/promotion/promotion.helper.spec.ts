import { describe, expect, it } from "vitest";
import { createPromotion } from "../../shared/helper.fixtures";
import {
  isPromotionRedeemable,
  isPromotionValidForCar,
  normalizePromotionCode,
} from "./promotion.helper";

describe("promotion helpers", () => {
  const now = new Date("2025-06-01T00:00:00Z");

  describe("isPromotionRedeemable", () => {
    it("accepts an active promotion inside its window", () => {
      expect(isPromotionRedeemable(createPromotion(), now)).toBe(true);
    });

    it("treats the window edges as inclusive", () => {
      expect(isPromotionRedeemable(createPromotion({ startDate: now }), now)).toBe(true);
      expect(isPromotionRedeemable(createPromotion({ endDate: now }), now)).toBe(true);
    });

    it("rejects inactive, not started and expired promotions", () => {
      expect(isPromotionRedeemable(createPromotion({ isActive: false }), now)).toBe(false);
      expect(
        isPromotionRedeemable(createPromotion({ startDate: new Date("2025-06-02T00:00:00Z") }), now),
      ).toBe(false);
      expect(
        isPromotionRedeemable(createPromotion({ endDate: new Date("2025-05-31T23:59:59Z") }), now),
      ).toBe(false);
    });

    it("rejects promotions at their usage cap and ignores a missing cap", () => {
      expect(isPromotionRedeemable(createPromotion({ maxUses: 5, currentUses: 5 }), now)).toBe(
        false,
      );
      expect(isPromotionRedeemable(createPromotion({ maxUses: null, currentUses: 900 }), now)).toBe(
        true,
      );
    });
  });

  describe("isPromotionValidForCar", () => {
    it("restricts EV-only promotions to electric cars", () => {
      const promotion = createPromotion({ isEVOnly: true });

      expect(isPromotionValidForCar(promotion, true, now)).toBe(true);
      expect(isPromotionValidForCar(promotion, false, now)).toBe(false);
    });
  });

  it("normalizes codes to trimmed upper case", () => {
    expect(normalizePromotionCode("  summer20 ")).toBe("SUMMER20");
  });
});
