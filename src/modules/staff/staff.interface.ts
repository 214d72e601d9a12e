import type { AppointmentStatus } from "../database/enums";
import type {
  Appointment,
  Car,
  Payment,
  Promotion,
  Review,
  Subscription,
  User,
} from "../database/schema";
import type { AppointmentWithCar } from "../appointment/appointment.interface";
import type { ORDER_STATUS_FILTERS } from "./staff.const";

export type OrderStatusFilter = (typeof ORDER_STATUS_FILTERS)[number];

export interface StaffDashboard {
  totalAppointments: number;
  todayAppointments: number;
  pendingAppointments: number;
  confirmedAppointments: number;
  completedAppointments: number;
  cancelledAppointments: number;
  totalRevenue: string;
  thisMonthRevenue: string;
  availableCars: number;
  totalCars: number;
  totalCustomers: number;
  recentBookings: AppointmentWithCar[];
}

export type OrderListItem = Appointment & {
  car: Car;
  user: User | null;
  promotion: Promotion | null;
};

export interface OrderList {
  orders: OrderListItem[];
  payments: Record<number, Payment>;
  status: OrderStatusFilter;
  searchTerm: string;
}

export type OrderDetails = OrderListItem & {
  subscription: Subscription | null;
  payment: Payment | null;
  isPaymentCompleted: boolean;
};

export interface OrderStatusResult {
  order: Appointment;
  message: string;
}

export interface BatchOrderStatusResult {
  updatedCount: number;
  message: string;
}

export interface StaffReport {
  startDate: Date;
  endDate: Date;
  totalBookings: number;
  totalRevenue: string;
  revenueByStatus: { status: AppointmentStatus; revenue: string }[];
  topCars: { car: string; count: number }[];
  bookingsByDay: { date: string; count: number }[];
}

export interface CalendarEvent {
  id: number;
  title: string;
  start: string;
  end: string;
  status: AppointmentStatus;
  color: string;
}

export interface UserStats {
  appointmentCount: number;
  totalSpent: string;
  lastBookingDate: Date | null;
}

export type UserWithStats = User & { stats: UserStats };

export interface UserToggleResult {
  user: User;
  message: string;
}

export interface UserDetails {
  user: User;
  appointments: (AppointmentWithCar & { promotion: Promotion | null })[];
  payments: (Payment & { appointment: AppointmentWithCar })[];
  reviews: (Review & { car: Car })[];
  totalSpent: string;
  totalBookings: number;
  completedBookings: number;
  pendingBookings: number;
  cancelledBookings: number;
  averageRating: number;
}
