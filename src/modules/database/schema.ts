import { relations } from "drizzle-orm";
import {
  boolean,
  integer,
  numeric,
  pgEnum,
  pgTable,
  serial,
  text,
  timestamp,
  uniqueIndex,
  varchar,
} from "drizzle-orm/pg-core";
import {
  APPOINTMENT_STATUSES,
  NOTIFICATION_TYPES,
  PAYMENT_STATUSES,
  type RoleName,
} from "./enums";

const createdAt = () => timestamp("created_at", { withTimezone: true }).notNull().defaultNow();
const updatedAt = () => timestamp("updated_at", { withTimezone: true });
const money = (name: string) => numeric(name, { precision: 10, scale: 2 });
const percentage = (name: string) => numeric(name, { precision: 5, scale: 2 });

export const appointmentStatusEnum = pgEnum("appointment_status", APPOINTMENT_STATUSES);
export const paymentStatusEnum = pgEnum("payment_status", PAYMENT_STATUSES);
export const notificationTypeEnum = pgEnum("notification_type", NOTIFICATION_TYPES);

// ---------------------------------------------------------------------------
// Auth tables (managed by better-auth through the drizzle adapter)
// ---------------------------------------------------------------------------

export const users = pgTable("users", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  email: text("email").notNull().unique(),
  emailVerified: boolean("email_verified").notNull().default(false),
  image: text("image"),
  firstName: varchar("first_name", { length: 100 }),
  lastName: varchar("last_name", { length: 100 }),
  phoneNumber: varchar("phone_number", { length: 20 }),
  dateOfBirth: timestamp("date_of_birth", { withTimezone: true }),
  address: text("address"),
  city: varchar("city", { length: 100 }),
  state: varchar("state", { length: 50 }),
  zipCode: varchar("zip_code", { length: 20 }),
  licenseNumber: varchar("license_number", { length: 50 }),
  profilePictureUrl: text("profile_picture_url"),
  isActive: boolean("is_active").notNull().default(true),
  role: text("role").$type<RoleName>().notNull().default("Customer"),
  createdAt: createdAt(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export const sessions = pgTable("sessions", {
  id: text("id").primaryKey(),
  expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
  token: text("token").notNull().unique(),
  ipAddress: text("ip_address"),
  userAgent: text("user_agent"),
  userId: text("user_id")
    .notNull()
    .references(() => users.id, { onDelete: "cascade" }),
  createdAt: createdAt(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export const accounts = pgTable("accounts", {
  id: text("id").primaryKey(),
  accountId: text("account_id").notNull(),
  providerId: text("provider_id").notNull(),
  userId: text("user_id")
    .notNull()
    .references(() => users.id, { onDelete: "cascade" }),
  accessToken: text("access_token"),
  refreshToken: text("refresh_token"),
  idToken: text("id_token"),
  accessTokenExpiresAt: timestamp("access_token_expires_at", { withTimezone: true }),
  refreshTokenExpiresAt: timestamp("refresh_token_expires_at", { withTimezone: true }),
  scope: text("scope"),
  password: text("password"),
  createdAt: createdAt(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export const verifications = pgTable("verifications", {
  id: text("id").primaryKey(),
  identifier: text("identifier").notNull(),
  value: text("value").notNull(),
  expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
  createdAt: createdAt(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export const categories = pgTable(
  "categories",
  {
    id: serial("id").primaryKey(),
    name: varchar("name", { length: 50 }).notNull(),
    description: varchar("description", { length: 200 }),
    iconUrl: varchar("icon_url", { length: 200 }),
    isActive: boolean("is_active").notNull().default(true),
    createdAt: createdAt(),
  },
  (table) => [uniqueIndex("categories_name_key").on(table.name)],
);

export const cars = pgTable(
  "cars",
  {
    id: serial("id").primaryKey(),
    make: varchar("make", { length: 100 }).notNull(),
    model: varchar("model", { length: 100 }).notNull(),
    year: integer("year").notNull(),
    licensePlate: varchar("license_plate", { length: 20 }).notNull(),
    color: varchar("color", { length: 50 }).notNull(),
    dailyRate: money("daily_rate").notNull(),
    fuelType: varchar("fuel_type", { length: 50 }).notNull(),
    description: varchar("description", { length: 500 }),
    imageUrl: varchar("image_url", { length: 200 }),
    isElectric: boolean("is_electric").notNull().default(false),
    isAvailable: boolean("is_available").notNull().default(true),
    state: varchar("state", { length: 50 }).notNull().default("Kuala Lumpur"),
    city: varchar("city", { length: 100 }),
    locationAddress: varchar("location_address", { length: 200 }),
    categoryId: integer("category_id").references(() => categories.id, { onDelete: "set null" }),
    batteryCapacity: integer("battery_capacity"),
    range: integer("range"),
    chargingTime: integer("charging_time"),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => [uniqueIndex("cars_license_plate_key").on(table.licensePlate)],
);

export const promotions = pgTable(
  "promotions",
  {
    id: serial("id").primaryKey(),
    name: varchar("name", { length: 100 }).notNull(),
    description: varchar("description", { length: 500 }),
    code: varchar("code", { length: 50 }).notNull(),
    discountPercentage: percentage("discount_percentage").notNull(),
    maxDiscountAmount: money("max_discount_amount"),
    startDate: timestamp("start_date", { withTimezone: true }).notNull(),
    endDate: timestamp("end_date", { withTimezone: true }).notNull(),
    isActive: boolean("is_active").notNull().default(true),
    isEVOnly: boolean("is_ev_only").notNull().default(false),
    maxUses: integer("max_uses"),
    currentUses: integer("current_uses").notNull().default(0),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (table) => [uniqueIndex("promotions_code_key").on(table.code)],
);

export const subscriptions = pgTable("subscriptions", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: 100 }).notNull(),
  description: varchar("description", { length: 500 }),
  monthlyPrice: money("monthly_price").notNull(),
  discountPercentage: percentage("discount_percentage").notNull(),
  maxRentalsPerMonth: integer("max_rentals_per_month").notNull(),
  maxDaysPerRental: integer("max_days_per_rental").notNull(),
  includesEVPriority: boolean("includes_ev_priority").notNull().default(false),
  isActive: boolean("is_active").notNull().default(true),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

// ---------------------------------------------------------------------------
// Bookings
// ---------------------------------------------------------------------------

export const appointments = pgTable("appointments", {
  id: serial("id").primaryKey(),
  carId: integer("car_id")
    .notNull()
    .references(() => cars.id, { onDelete: "restrict" }),
  userId: text("user_id").references(() => users.id, { onDelete: "set null" }),
  customerName: varchar("customer_name", { length: 100 }),
  customerEmail: varchar("customer_email", { length: 100 }),
  customerPhone: varchar("customer_phone", { length: 20 }),
  startDate: timestamp("start_date", { withTimezone: true }).notNull(),
  endDate: timestamp("end_date", { withTimezone: true }).notNull(),
  specialRequests: varchar("special_requests", { length: 500 }),
  status: appointmentStatusEnum("status").notNull().default("Pending"),
  totalPrice: money("total_price").notNull(),
  discountAmount: money("discount_amount"),
  promotionId: integer("promotion_id").references(() => promotions.id, { onDelete: "set null" }),
  subscriptionId: integer("subscription_id").references(() => subscriptions.id, {
    onDelete: "set null",
  }),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const payments = pgTable("payments", {
  id: serial("id").primaryKey(),
  appointmentId: integer("appointment_id")
    .notNull()
    .references(() => appointments.id, { onDelete: "cascade" }),
  paymentMethod: varchar("payment_method", { length: 50 }).notNull(),
  amount: money("amount").notNull(),
  status: paymentStatusEnum("status").notNull().default("Pending"),
  transactionId: varchar("transaction_id", { length: 100 }),
  paymentDate: timestamp("payment_date", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: updatedAt(),
});

// ---------------------------------------------------------------------------
// Engagement
// ---------------------------------------------------------------------------

export const reviews = pgTable("reviews", {
  id: serial("id").primaryKey(),
  carId: integer("car_id")
    .notNull()
    .references(() => cars.id, { onDelete: "cascade" }),
  userId: text("user_id")
    .notNull()
    .references(() => users.id, { onDelete: "cascade" }),
  rating: integer("rating").notNull(),
  comment: varchar("comment", { length: 1000 }),
  isApproved: boolean("is_approved").notNull().default(false),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const favorites = pgTable(
  "favorites",
  {
    id: serial("id").primaryKey(),
    userId: text("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    carId: integer("car_id")
      .notNull()
      .references(() => cars.id, { onDelete: "cascade" }),
    createdAt: createdAt(),
  },
  (table) => [uniqueIndex("favorites_user_id_car_id_key").on(table.userId, table.carId)],
);

export const notifications = pgTable("notifications", {
  id: serial("id").primaryKey(),
  userId: text("user_id")
    .notNull()
    .references(() => users.id, { onDelete: "cascade" }),
  title: varchar("title", { length: 200 }).notNull(),
  message: varchar("message", { length: 1000 }),
  type: notificationTypeEnum("type").notNull().default("Info"),
  isRead: boolean("is_read").notNull().default(false),
  createdAt: createdAt(),
});

// ---------------------------------------------------------------------------
// Relations
// ---------------------------------------------------------------------------

export const usersRelations = relations(users, ({ many }) => ({
  appointments: many(appointments),
  reviews: many(reviews),
  favorites: many(favorites),
  notifications: many(notifications),
}));

export const categoriesRelations = relations(categories, ({ many }) => ({
  cars: many(cars),
}));

export const carsRelations = relations(cars, ({ one, many }) => ({
  category: one(categories, { fields: [cars.categoryId], references: [categories.id] }),
  appointments: many(appointments),
  reviews: many(reviews),
  favorites: many(favorites),
}));

export const promotionsRelations = relations(promotions, ({ many }) => ({
  appointments: many(appointments),
}));

export const subscriptionsRelations = relations(subscriptions, ({ many }) => ({
  appointments: many(appointments),
}));

export const appointmentsRelations = relations(appointments, ({ one }) => ({
  car: one(cars, { fields: [appointments.carId], references: [cars.id] }),
  user: one(users, { fields: [appointments.userId], references: [users.id] }),
  promotion: one(promotions, {
    fields: [appointments.promotionId],
    references: [promotions.id],
  }),
  subscription: one(subscriptions, {
    fields: [appointments.subscriptionId],
    references: [subscriptions.id],
  }),
  payment: one(payments),
}));

export const paymentsRelations = relations(payments, ({ one }) => ({
  appointment: one(appointments, {
    fields: [payments.appointmentId],
    references: [appointments.id],
  }),
}));

export const reviewsRelations = relations(reviews, ({ one }) => ({
  car: one(cars, { fields: [reviews.carId], references: [cars.id] }),
  user: one(users, { fields: [reviews.userId], references: [users.id] }),
}));

export const favoritesRelations = relations(favorites, ({ one }) => ({
  car: one(cars, { fields: [favorites.carId], references: [cars.id] }),
  user: one(users, { fields: [favorites.userId], references: [users.id] }),
}));

export const notificationsRelations = relations(notifications, ({ one }) => ({
  user: one(users, { fields: [notifications.userId], references: [users.id] }),
}));

// ---------------------------------------------------------------------------
// Row types
// ---------------------------------------------------------------------------

export type User = typeof users.$inferSelect;
export type Category = typeof categories.$inferSelect;
export type Car = typeof cars.$inferSelect;
export type NewCar = typeof cars.$inferInsert;
export type Promotion = typeof promotions.$inferSelect;
export type NewPromotion = typeof promotions.$inferInsert;
export type Subscription = typeof subscriptions.$inferSelect;
export type NewSubscription = typeof subscriptions.$inferInsert;
export type Appointment = typeof appointments.$inferSelect;
export type NewAppointment = typeof appointments.$inferInsert;
export type Payment = typeof payments.$inferSelect;
export type Review = typeof reviews.$inferSelect;
export type Favorite = typeof favorites.$inferSelect;
export type Notification = typeof notifications.$inferSelect;
