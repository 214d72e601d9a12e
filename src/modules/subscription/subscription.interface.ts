export type SubscriptionDetails =
  | {
      id: number;
      name: string;
      discountPercentage: number;
      monthlyPrice: number;
      isActive: boolean;
    }
  | { error: string };
