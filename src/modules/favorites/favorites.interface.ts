import type { Car, Category, Favorite } from "../database/schema";

export type FavoriteWithCar = Favorite & {
  car: Car & { category: Category | null };
};

export interface FavoriteActionResult {
  success: boolean;
  message: string;
}
