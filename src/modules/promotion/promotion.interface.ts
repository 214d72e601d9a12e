export interface PromotionValidationResult {
  valid: boolean;
  message: string;
  discount?: number;
  promotionId?: number;
}
