export interface AnalyticsPeriods {
  today: Date;
  tomorrow: Date;
  monthStart: Date;
  lastMonthStart: Date;
}

export interface PeriodTotals<T> {
  today: T;
  thisMonth: T;
  lastMonth: T;
}

export interface TopCar {
  car: string;
  count: number;
  revenue: string;
}

export interface DailyRevenue {
  date: string;
  revenue: string;
  bookings: number;
}

export interface AnalyticsDashboard {
  revenue: PeriodTotals<string>;
  bookings: PeriodTotals<number>;
  topCars: TopCar[];
  revenueByDay: DailyRevenue[];
}

export interface DateRange {
  start: Date;
  end?: Date;
}
