import { Injectable, Logger } from "@nestjs/common";
import { and, desc, eq, inArray } from "drizzle-orm";
import { DatabaseService } from "../database/database.service";
import { cars, favorites } from "../database/schema";
import {
  FavoriteCarNotFoundException,
  FavoriteException,
  FavoriteFetchFailedException,
} from "./favorites.error";
import type { FavoriteActionResult, FavoriteWithCar } from "./favorites.interface";

@Injectable()
export class FavoritesService {
  private readonly logger = new Logger(FavoritesService.name);

  constructor(private readonly databaseService: DatabaseService) {}

  async getFavorites(userId: string): Promise<FavoriteWithCar[]> {
    try {
      return await this.databaseService.db.query.favorites.findMany({
        where: eq(favorites.userId, userId),
        with: { car: { with: { category: true } } },
        orderBy: [desc(favorites.createdAt)],
      });
    } catch (error) {
      this.logger.error("Failed to fetch favorites", {
        userId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new FavoriteFetchFailedException();
    }
  }

  async addFavorite(userId: string, carId: number): Promise<FavoriteActionResult> {
    try {
      const car = await this.databaseService.db.query.cars.findFirst({
        where: eq(cars.id, carId),
        columns: { id: true },
      });
      if (!car) {
        throw new FavoriteCarNotFoundException();
      }

      const inserted = await this.databaseService.db
        .insert(favorites)
        .values({ userId, carId })
        .onConflictDoNothing()
        .returning({ id: favorites.id });

      if (inserted.length === 0) {
        return { success: false, message: "Already in favorites" };
      }

      this.logger.log("Favorite added", { userId, carId });
      return { success: true, message: "Added to favorites" };
    } catch (error) {
      if (error instanceof FavoriteException) {
        throw error;
      }
      this.logger.error("Failed to add favorite", {
        userId,
        carId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new FavoriteFetchFailedException();
    }
  }

  async removeFavorite(userId: string, carId: number): Promise<FavoriteActionResult> {
    const removed = await this.databaseService.db
      .delete(favorites)
      .where(and(eq(favorites.userId, userId), eq(favorites.carId, carId)))
      .returning({ id: favorites.id });

    if (removed.length === 0) {
      return { success: false, message: "Favorite not found" };
    }
    return { success: true, message: "Removed from favorites" };
  }

  async isFavorited(userId: string, carId: number): Promise<boolean> {
    const count = await this.databaseService.db.$count(
      favorites,
      and(eq(favorites.userId, userId), eq(favorites.carId, carId)),
    );
    return count > 0;
  }

  /** The subset of `carIds` the user has favorited. */
  async getFavoritedCarIds(userId: string, carIds: number[]): Promise<number[]> {
    if (carIds.length === 0) {
      return [];
    }

    const rows = await this.databaseService.db
      .select({ carId: favorites.carId })
      .from(favorites)
      .where(and(eq(favorites.userId, userId), inArray(favorites.carId, carIds)));
    return rows.map((row) => row.carId);
  }
}
