import { vi } from "vitest";
import type {
  Appointment,
  Car,
  Category,
  Favorite,
  Notification,
  Payment,
  Promotion,
  Review,
  Subscription,
  User,
} from "../modules/database/schema";
import type { AuthSession } from "../modules/auth/guards/session.guard";
import type { RoleName } from "../modules/database/enums";

/**
 * Mock objects for testing purposes
 */

export function createUser(overrides: Partial<User> = {}): User {
  return {
    id: "user-123",
    name: "Aisha Rahman",
    email: "aisha@example.com",
    emailVerified: true,
    image: null,
    firstName: "Aisha",
    lastName: "Rahman",
    phoneNumber: "0123456789",
    dateOfBirth: null,
    address: "12 Jalan Ampang",
    city: "Kuala Lumpur",
    state: "Kuala Lumpur",
    zipCode: "50450",
    licenseNumber: "D1234567",
    profilePictureUrl: null,
    isActive: true,
    role: "Customer",
    createdAt: new Date("2025-01-01T00:00:00Z"),
    updatedAt: new Date("2025-01-01T00:00:00Z"),
    ...overrides,
  };
}

export function createCategory(overrides: Partial<Category> = {}): Category {
  return {
    id: 2,
    name: "Sedan",
    description: "Comfortable four-door cars",
    iconUrl: null,
    isActive: true,
    createdAt: new Date("2025-01-01T00:00:00Z"),
    ...overrides,
  };
}

export function createCar(overrides: Partial<Car> = {}): Car {
  return {
    id: 1,
    make: "Tesla",
    model: "Model 3",
    year: 2023,
    licensePlate: "EV-001",
    color: "White",
    dailyRate: "89.99",
    fuelType: "Electric",
    description: "Long range electric sedan",
    imageUrl: null,
    isElectric: true,
    isAvailable: true,
    state: "Kuala Lumpur",
    city: "Kuala Lumpur",
    locationAddress: null,
    categoryId: 2,
    batteryCapacity: 75,
    range: 358,
    chargingTime: 30,
    createdAt: new Date("2025-01-01T00:00:00Z"),
    updatedAt: null,
    ...overrides,
  };
}

export function createPromotion(overrides: Partial<Promotion> = {}): Promotion {
  return {
    id: 1,
    name: "Summer Sale",
    description: "20% off all rentals",
    code: "SUMMER20",
    discountPercentage: "20.00",
    maxDiscountAmount: "100.00",
    startDate: new Date("2025-01-01T00:00:00Z"),
    endDate: new Date("2099-12-31T00:00:00Z"),
    isActive: true,
    isEVOnly: false,
    maxUses: 1000,
    currentUses: 0,
    createdAt: new Date("2025-01-01T00:00:00Z"),
    updatedAt: null,
    ...overrides,
  };
}

export function createSubscription(overrides: Partial<Subscription> = {}): Subscription {
  return {
    id: 1,
    name: "Basic",
    description: "Perfect for occasional renters",
    monthlyPrice: "29.99",
    discountPercentage: "5.00",
    maxRentalsPerMonth: 2,
    maxDaysPerRental: 7,
    includesEVPriority: false,
    isActive: true,
    createdAt: new Date("2025-01-01T00:00:00Z"),
    updatedAt: null,
    ...overrides,
  };
}

export function createAppointment(overrides: Partial<Appointment> = {}): Appointment {
  return {
    id: 10,
    carId: 1,
    userId: "user-123",
    customerName: "Aisha Rahman",
    customerEmail: "aisha@example.com",
    customerPhone: "0123456789",
    startDate: new Date("2025-06-01T10:00:00Z"),
    endDate: new Date("2025-06-03T10:00:00Z"),
    specialRequests: null,
    status: "Pending",
    totalPrice: "179.98",
    discountAmount: null,
    promotionId: null,
    subscriptionId: null,
    createdAt: new Date("2025-05-20T08:00:00Z"),
    updatedAt: null,
    ...overrides,
  };
}

export function createPayment(overrides: Partial<Payment> = {}): Payment {
  return {
    id: 5,
    appointmentId: 10,
    paymentMethod: "Credit Card",
    amount: "179.98",
    status: "Completed",
    transactionId: "txn-1",
    paymentDate: new Date("2025-05-20T09:00:00Z"),
    updatedAt: null,
    ...overrides,
  };
}

export function createReview(overrides: Partial<Review> = {}): Review {
  return {
    id: 3,
    carId: 1,
    userId: "user-123",
    rating: 5,
    comment: "Smooth ride",
    isApproved: true,
    createdAt: new Date("2025-06-05T00:00:00Z"),
    updatedAt: null,
    ...overrides,
  };
}

export function createFavorite(overrides: Partial<Favorite> = {}): Favorite {
  return {
    id: 4,
    userId: "user-123",
    carId: 1,
    createdAt: new Date("2025-05-01T00:00:00Z"),
    ...overrides,
  };
}

export function createNotification(overrides: Partial<Notification> = {}): Notification {
  return {
    id: 8,
    userId: "user-123",
    title: "Booking Created",
    message: "Your booking has been created.",
    type: "Success",
    isRead: false,
    createdAt: new Date("2025-05-20T08:00:00Z"),
    ...overrides,
  };
}

export function createAuthSession(
  role: RoleName = "Customer",
  userOverrides: Partial<AuthSession["user"]> = {},
): AuthSession {
  return {
    user: {
      id: "user-123",
      email: "aisha@example.com",
      name: "Aisha Rahman",
      emailVerified: true,
      image: null,
      createdAt: new Date("2025-01-01T00:00:00Z"),
      updatedAt: new Date("2025-01-01T00:00:00Z"),
      role,
      isActive: true,
      ...userOverrides,
    },
    session: {
      id: "session-123",
      userId: "user-123",
      expiresAt: new Date("2099-01-01T00:00:00Z"),
      token: "test-token",
      createdAt: new Date("2025-01-01T00:00:00Z"),
      updatedAt: new Date("2025-01-01T00:00:00Z"),
      ipAddress: "127.0.0.1",
      userAgent: "test-agent",
    },
  };
}

const relationalTable = () => ({
  findFirst: vi.fn(),
  findMany: vi.fn().mockResolvedValue([]),
});

/**
 * Test double for DatabaseService["db"].
 *
 * Relational queries (`db.query.<table>.findFirst/findMany`) are plain mocks.
 * insert/update/delete/select/selectDistinct return one shared chainable builder; every awaited
 * chain resolves to the next value passed to `queueResult` (an empty array once
 * the queue is drained).
 */
export function createMockDatabase() {
  const results: unknown[] = [];

  const builder = {
    values: vi.fn(),
    set: vi.fn(),
    where: vi.fn(),
    returning: vi.fn(),
    onConflictDoNothing: vi.fn(),
    from: vi.fn(),
    orderBy: vi.fn(),
    limit: vi.fn(),
    offset: vi.fn(),
    groupBy: vi.fn(),
    innerJoin: vi.fn(),
    leftJoin: vi.fn(),
    then<TResult1 = unknown, TResult2 = never>(
      onFulfilled?: ((value: unknown) => TResult1 | PromiseLike<TResult1>) | null,
      onRejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
    ): Promise<TResult1 | TResult2> {
      const next = results.length > 0 ? results.shift() : [];
      return Promise.resolve(next).then(onFulfilled, onRejected);
    },
  };

  for (const method of [
    builder.values,
    builder.set,
    builder.where,
    builder.returning,
    builder.onConflictDoNothing,
    builder.from,
    builder.orderBy,
    builder.limit,
    builder.offset,
    builder.groupBy,
    builder.innerJoin,
    builder.leftJoin,
  ]) {
    method.mockReturnValue(builder);
  }

  const db = {
    query: {
      users: relationalTable(),
      categories: relationalTable(),
      cars: relationalTable(),
      promotions: relationalTable(),
      subscriptions: relationalTable(),
      appointments: relationalTable(),
      payments: relationalTable(),
      reviews: relationalTable(),
      favorites: relationalTable(),
      notifications: relationalTable(),
    },
    insert: vi.fn().mockReturnValue(builder),
    update: vi.fn().mockReturnValue(builder),
    delete: vi.fn().mockReturnValue(builder),
    select: vi.fn().mockReturnValue(builder),
    selectDistinct: vi.fn().mockReturnValue(builder),
    execute: vi.fn().mockResolvedValue({ rows: [] }),
    $count: vi.fn().mockResolvedValue(0),
    transaction: vi.fn(),
    builder,
    queueResult(...values: unknown[]) {
      results.push(...values);
    },
  };

  db.transaction.mockImplementation(async (callback: (tx: typeof db) => unknown) => callback(db));

  return db;
}

export type MockDatabase = ReturnType<typeof createMockDatabase>;
