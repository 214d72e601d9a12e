import { Injectable, Logger } from "@nestjs/common";
import {
  and,
  asc,
  desc,
  eq,
  gte,
  ilike,
  lte,
  max,
  min,
  or,
  type SQL,
  sql,
} from "drizzle-orm";
import { toContainsPattern, toMoney } from "../../shared/helper";
import { blockingAppointmentCondition } from "../appointment/appointment-availability.helper";
import { DatabaseService } from "../database/database.service";
import { appointments, cars, categories, type Promotion } from "../database/schema";
import { FavoritesService } from "../favorites/favorites.service";
import { PromotionService } from "../promotion/promotion.service";
import { ReviewsReadService } from "../reviews/reviews-read.service";
import {
  type CarSortOption,
  ELECTRIC_SHOWCASE_LIMIT,
  EMPTY_PRICE_RANGE,
  FEATURED_CAR_LIMIT,
  type FuelFilter,
} from "./car.const";
import { CarException, CarFetchFailedException } from "./car.error";
import { sortByRating, toAvailabilityWindow, withCategory } from "./car.helper";
import type { CatalogResult, HomePageResult, PriceRange } from "./car.interface";
import { CarCategoriesService } from "./car-categories.service";
import type { CatalogQueryDto, HomeQueryDto } from "./dto/car.dto";

interface CatalogFilters {
  searchQuery?: string;
  fuelType?: FuelFilter;
  state?: string;
  categoryId?: number;
  minPrice?: number;
  maxPrice?: number;
  startDate?: Date;
  endDate?: Date;
}

/**
 * Public catalog queries. Only cars flagged available are listed; a valid
 * date range additionally hides cars with a non-cancelled booking in it.
 */
@Injectable()
export class CarSearchService {
  private readonly logger = new Logger(CarSearchService.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly carCategoriesService: CarCategoriesService,
    private readonly reviewsReadService: ReviewsReadService,
    private readonly favoritesService: FavoritesService,
    private readonly promotionService: PromotionService,
  ) {}

  async searchCatalog(query: CatalogQueryDto, userId?: string): Promise<CatalogResult> {
    const startTime = Date.now();

    try {
      const rows = await this.databaseService.db
        .select()
        .from(cars)
        .leftJoin(categories, eq(cars.categoryId, categories.id))
        .where(this.buildCatalogWhere(query))
        .orderBy(...this.catalogOrderBy(query.sortBy));

      const matched = rows.map(withCategory);
      const carIds = matched.map((car) => car.id);

      const [averages, activeCategories, states, priceRange, favoritedCarIds] = await Promise.all([
        this.reviewsReadService.getAverageRatings(carIds),
        this.carCategoriesService.getActiveCategories(),
        this.getAvailableStates(),
        this.getPriceRange(),
        userId ? this.favoritesService.getFavoritedCarIds(userId, carIds) : Promise.resolve([]),
      ]);

      const sorted = query.sortBy === "rating_desc" ? sortByRating(matched, averages) : matched;

      this.logger.log(`Catalog search completed in ${Date.now() - startTime}ms`, {
        returnedCount: sorted.length,
        sortBy: query.sortBy,
      });

      return {
        cars: sorted,
        averageRatings: Object.fromEntries(averages),
        categories: activeCategories,
        states,
        priceRange,
        favoritedCarIds,
      };
    } catch (error) {
      if (error instanceof CarException) {
        throw error;
      }
      this.logger.error("Catalog search failed", {
        error: error instanceof Error ? error.message : String(error),
        query,
      });
      throw new CarFetchFailedException();
    }
  }

  async getHomePage(query: HomeQueryDto): Promise<HomePageResult> {
    try {
      const featuredRows = await this.databaseService.db
        .select()
        .from(cars)
        .leftJoin(categories, eq(cars.categoryId, categories.id))
        .where(this.buildCatalogWhere(query))
        .orderBy(asc(cars.id))
        .limit(FEATURED_CAR_LIMIT);

      const [electricCars, promotions, activeCategories, states] = await Promise.all([
        this.databaseService.db.query.cars.findMany({
          where: and(eq(cars.isElectric, true), eq(cars.isAvailable, true)),
          with: { category: true },
          orderBy: [asc(cars.id)],
          limit: ELECTRIC_SHOWCASE_LIMIT,
        }),
        this.getActivePromotions(),
        this.carCategoriesService.getActiveCategories(),
        this.getAvailableStates(),
      ]);

      return {
        featuredCars: featuredRows.map(withCategory),
        electricCars,
        promotions,
        categories: activeCategories,
        states,
      };
    } catch (error) {
      this.logger.error("Failed to load home page", {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new CarFetchFailedException();
    }
  }

  /** Distinct states of listed cars, alphabetical. */
  async getAvailableStates(): Promise<string[]> {
    const rows = await this.databaseService.db
      .selectDistinct({ state: cars.state })
      .from(cars)
      .where(eq(cars.isAvailable, true))
      .orderBy(asc(cars.state));
    return rows.map((row) => row.state);
  }

  /** Daily-rate bounds of listed cars; 0..1000 when nothing is listed. */
  async getPriceRange(): Promise<PriceRange> {
    const [row] = await this.databaseService.db
      .select({ min: min(cars.dailyRate), max: max(cars.dailyRate) })
      .from(cars)
      .where(eq(cars.isAvailable, true));

    if (!row || row.min === null || row.max === null) {
      return { ...EMPTY_PRICE_RANGE };
    }
    return { min: Number(row.min), max: Number(row.max) };
  }

  private async getActivePromotions(): Promise<Promotion[]> {
    try {
      return await this.promotionService.getActive();
    } catch (error) {
      this.logger.warn("Active promotions unavailable", {
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  private buildCatalogWhere(filters: CatalogFilters): SQL | undefined {
    const conditions: (SQL | undefined)[] = [eq(cars.isAvailable, true)];

    if (filters.searchQuery) {
      conditions.push(this.searchCondition(filters.searchQuery));
    }

    if (filters.fuelType === "Electric") {
      conditions.push(eq(cars.isElectric, true));
    } else if (filters.fuelType === "Gas") {
      conditions.push(eq(cars.isElectric, false));
    }

    if (filters.state) {
      conditions.push(eq(cars.state, filters.state));
    }

    if (filters.categoryId !== undefined) {
      conditions.push(eq(cars.categoryId, filters.categoryId));
    }

    if (filters.minPrice !== undefined) {
      conditions.push(gte(cars.dailyRate, toMoney(filters.minPrice)));
    }

    if (filters.maxPrice !== undefined) {
      conditions.push(lte(cars.dailyRate, toMoney(filters.maxPrice)));
    }

    const window = toAvailabilityWindow(filters.startDate, filters.endDate);
    if (window) {
      conditions.push(sql`not exists (
        select 1 from ${appointments}
        where ${blockingAppointmentCondition(cars.id, window.startDate, window.endDate)}
      )`);
    }

    return and(...conditions);
  }

  /** Case-insensitive contains over the listing's text fields; the year matches as typed. */
  private searchCondition(searchQuery: string): SQL | undefined {
    const term = searchQuery.trim();
    const pattern = toContainsPattern(term.toLowerCase());

    return or(
      ilike(cars.make, pattern),
      ilike(cars.model, pattern),
      ilike(cars.description, pattern),
      sql`concat_ws(' ', ${cars.year}, ${cars.make}, ${cars.model}, '-', ${cars.licensePlate}) ilike ${pattern}`,
      ilike(cars.city, pattern),
      ilike(cars.state, pattern),
      ilike(cars.fuelType, pattern),
      ilike(categories.name, pattern),
      sql`cast(${cars.year} as text) like ${toContainsPattern(term)}`,
    );
  }

  private catalogOrderBy(sortBy: CarSortOption): SQL[] {
    switch (sortBy) {
      case "price_desc":
        return [desc(cars.dailyRate)];
      case "name_asc":
        return [asc(cars.make), asc(cars.model)];
      case "name_desc":
        return [desc(cars.make), desc(cars.model)];
      case "year_desc":
        return [desc(cars.year)];
      case "rating_desc":
        // Re-sorted by average rating once ratings are loaded.
        return [desc(cars.id)];
      default:
        return [asc(cars.dailyRate)];
    }
  }
}
