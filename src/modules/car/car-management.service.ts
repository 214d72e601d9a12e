import { Injectable, Logger } from "@nestjs/common";
import { and, asc, desc, eq, ilike, ne, or, type SQL, sql } from "drizzle-orm";
import { getCarDisplayName, toContainsPattern, toMoney } from "../../shared/helper";
import { DatabaseService } from "../database/database.service";
import { type Car, cars, type NewCar } from "../database/schema";
import { buildVehicleImageKey, type UploadedImage } from "../storage/image-upload.pipe";
import { StorageService } from "../storage/storage.service";
import {
  CarCreateFailedException,
  CarException,
  CarNotFoundException,
  CarUpdateFailedException,
  LicensePlateAlreadyExistsException,
} from "./car.error";
import type { VehicleManagementResult, VehicleStats } from "./car.interface";
import { CarCategoriesService } from "./car-categories.service";
import type { VehicleBodyDto, VehicleListQueryDto } from "./dto/car-management.dto";

export interface VehicleActionResult {
  vehicle: Car;
  message: string;
}

type VehicleValues = Omit<NewCar, "id" | "createdAt" | "updatedAt" | "isAvailable">;

/** Back-office fleet management: listing, availability toggles and edits. */
@Injectable()
export class CarManagementService {
  private readonly logger = new Logger(CarManagementService.name);

  constructor(
    private readonly databaseService: DatabaseService,
    private readonly carCategoriesService: CarCategoriesService,
    private readonly storageService: StorageService,
  ) {}

  async listVehicles(query: VehicleListQueryDto): Promise<VehicleManagementResult> {
    const conditions: (SQL | undefined)[] = [];

    if (query.searchTerm) {
      const pattern = toContainsPattern(query.searchTerm);
      conditions.push(
        or(
          ilike(cars.make, pattern),
          ilike(cars.model, pattern),
          ilike(cars.licensePlate, pattern),
        ),
      );
    }
    if (query.status === "Available") {
      conditions.push(eq(cars.isAvailable, true));
    } else if (query.status === "Unavailable") {
      conditions.push(eq(cars.isAvailable, false));
    }
    if (query.state) {
      conditions.push(eq(cars.state, query.state));
    }

    const db = this.databaseService.db;
    const [vehicles, stats, stateRows, activeCategories] = await Promise.all([
      db.query.cars.findMany({
        where: and(...conditions),
        with: { category: true },
        orderBy: [desc(cars.createdAt)],
      }),
      this.getVehicleStats(),
      db.selectDistinct({ state: cars.state }).from(cars).orderBy(asc(cars.state)),
      this.carCategoriesService.getActiveCategories(),
    ]);

    return {
      vehicles,
      stats,
      states: stateRows.map((row) => row.state),
      categories: activeCategories,
    };
  }

  async getVehicle(carId: number): Promise<Car> {
    const vehicle = await this.databaseService.db.query.cars.findFirst({
      where: eq(cars.id, carId),
    });
    if (!vehicle) {
      throw new CarNotFoundException();
    }
    return vehicle;
  }

  async toggleAvailability(carId: number): Promise<VehicleActionResult> {
    const [vehicle] = await this.databaseService.db
      .update(cars)
      .set({ isAvailable: sql`not ${cars.isAvailable}`, updatedAt: new Date() })
      .where(eq(cars.id, carId))
      .returning();

    if (!vehicle) {
      throw new CarNotFoundException();
    }

    const change = vehicle.isAvailable ? "made available" : "made unavailable";
    this.logger.log("Vehicle availability toggled", { carId, isAvailable: vehicle.isAvailable });
    return {
      vehicle,
      message: `Vehicle ${getCarDisplayName(vehicle)} has been ${change}.`,
    };
  }

  /**
   * New vehicles start available. The image, when given, is uploaded once the
   * row has an id; a failed upload rolls the insert back.
   */
  async createVehicle(body: VehicleBodyDto, image?: UploadedImage): Promise<VehicleActionResult> {
    await this.assertVehicleRefs(body);

    try {
      const vehicle = await this.databaseService.db.transaction(async (tx) => {
        const [created] = await tx
          .insert(cars)
          .values({ ...this.toVehicleValues(body), isAvailable: true })
          .returning();
        if (!created) {
          throw new CarCreateFailedException();
        }
        if (!image) {
          return created;
        }

        const imageUrl = await this.storageService.uploadBuffer(
          image.buffer,
          buildVehicleImageKey(created.id, image.extension),
          image.mimetype,
        );
        const [withImage] = await tx
          .update(cars)
          .set({ imageUrl })
          .where(eq(cars.id, created.id))
          .returning();
        return withImage ?? { ...created, imageUrl };
      });

      this.logger.log("Vehicle created", { carId: vehicle.id, hasImage: Boolean(image) });
      return {
        vehicle,
        message: `Vehicle ${getCarDisplayName(vehicle)} has been added successfully!`,
      };
    } catch (error) {
      if (error instanceof CarException) {
        throw error;
      }
      this.logger.error("Failed to create vehicle", {
        licensePlate: body.licensePlate,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new CarCreateFailedException(
        image && error instanceof Error ? `Failed to upload image: ${error.message}` : undefined,
      );
    }
  }

  async updateVehicle(carId: number, body: VehicleBodyDto): Promise<VehicleActionResult> {
    await this.getVehicle(carId);
    await this.assertVehicleRefs(body, carId);

    try {
      const [vehicle] = await this.databaseService.db
        .update(cars)
        .set({ ...this.toVehicleValues(body), updatedAt: new Date() })
        .where(eq(cars.id, carId))
        .returning();
      if (!vehicle) {
        throw new CarNotFoundException();
      }

      this.logger.log("Vehicle updated", { carId });
      return {
        vehicle,
        message: `Vehicle ${getCarDisplayName(vehicle)} has been updated successfully!`,
      };
    } catch (error) {
      if (error instanceof CarException) {
        throw error;
      }
      this.logger.error("Failed to update vehicle", {
        carId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new CarUpdateFailedException();
    }
  }

  async getVehicleStats(): Promise<VehicleStats> {
    const db = this.databaseService.db;
    const [totalVehicles, availableVehicles, electricVehicles] = await Promise.all([
      db.$count(cars),
      db.$count(cars, eq(cars.isAvailable, true)),
      db.$count(cars, eq(cars.isElectric, true)),
    ]);

    return {
      totalVehicles,
      availableVehicles,
      unavailableVehicles: totalVehicles - availableVehicles,
      electricVehicles,
      gasVehicles: totalVehicles - electricVehicles,
    };
  }

  private async assertVehicleRefs(body: VehicleBodyDto, excludeCarId?: number): Promise<void> {
    const duplicate = await this.databaseService.db.query.cars.findFirst({
      where: and(
        eq(cars.licensePlate, body.licensePlate),
        excludeCarId === undefined ? undefined : ne(cars.id, excludeCarId),
      ),
      columns: { id: true },
    });
    if (duplicate) {
      throw new LicensePlateAlreadyExistsException(body.licensePlate);
    }

    if (body.categoryId !== undefined) {
      await this.carCategoriesService.assertCategoryExists(body.categoryId);
    }
  }

  private toVehicleValues(body: VehicleBodyDto): VehicleValues {
    return {
      make: body.make,
      model: body.model,
      year: body.year,
      licensePlate: body.licensePlate,
      color: body.color,
      dailyRate: toMoney(body.dailyRate),
      fuelType: body.fuelType,
      description: body.description ?? null,
      imageUrl: body.imageUrl ?? null,
      isElectric: body.isElectric ?? body.fuelType === "Electric",
      state: body.state,
      city: body.city ?? null,
      locationAddress: body.locationAddress ?? null,
      categoryId: body.categoryId ?? null,
      batteryCapacity: body.batteryCapacity ?? null,
      range: body.range ?? null,
      chargingTime: body.chargingTime ?? null,
    };
  }
}
