import type { FormattedSlot } from "../appointment/appointment.interface";
import type { Car, Category, Promotion } from "../database/schema";
import type { ReviewWithAuthor } from "../reviews/reviews.interface";

export type CarWithCategory = Car & { category: Category | null };

export interface PriceRange {
  min: number;
  max: number;
}

export interface CatalogResult {
  cars: CarWithCategory[];
  averageRatings: Record<number, number>;
  categories: Category[];
  states: string[];
  priceRange: PriceRange;
  favoritedCarIds: number[];
}

export interface HomePageResult {
  featuredCars: CarWithCategory[];
  electricCars: CarWithCategory[];
  promotions: Promotion[];
  categories: Category[];
  states: string[];
}

export interface CarDetailsResult {
  car: CarWithCategory;
  displayName: string;
  reviews: ReviewWithAuthor[];
  averageRating: number;
  totalReviews: number;
  canReview: boolean;
  isFavorited: boolean;
  availableSlots: FormattedSlot[];
  slotWindow: { start: string; end: string };
}

export interface CarSummary {
  id: number;
  make: string;
  model: string;
  year: number;
  dailyRate: number;
  isElectric: boolean;
  range: number | null;
  batteryCapacity: number | null;
  city: string | null;
  state: string;
  imageUrl: string | null;
  displayName: string;
}

export interface CarRecommendation {
  id: number;
  displayName: string;
  categoryName: string;
  dailyRate: number;
  city: string | null;
  state: string;
  imageUrl: string | null;
  isElectric: boolean;
  categoryId: number | null;
  recommendationScore: number;
}

export interface VehicleStats {
  totalVehicles: number;
  availableVehicles: number;
  unavailableVehicles: number;
  electricVehicles: number;
  gasVehicles: number;
}

export interface VehicleManagementResult {
  vehicles: CarWithCategory[];
  stats: VehicleStats;
  states: string[];
  categories: Category[];
}
