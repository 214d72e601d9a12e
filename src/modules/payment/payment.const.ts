export const PAYMENT_METHODS = ["Credit Card", "Debit Card", "PayPal"] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

/** Methods that settle immediately without a gateway reference. */
export const INSTANT_PAYMENT_METHODS: readonly PaymentMethod[] = ["Credit Card"];
