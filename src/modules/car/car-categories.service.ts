import { Injectable } from "@nestjs/common";
import { asc, eq } from "drizzle-orm";
import { DatabaseService } from "../database/database.service";
import { type Category, categories } from "../database/schema";
import { CategoryNotFoundException } from "./car.error";

@Injectable()
export class CarCategoriesService {
  constructor(private readonly databaseService: DatabaseService) {}

  async getActiveCategories(): Promise<Category[]> {
    return this.databaseService.db.query.categories.findMany({
      where: eq(categories.isActive, true),
      orderBy: [asc(categories.name)],
    });
  }

  async assertCategoryExists(categoryId: number): Promise<void> {
    const category = await this.databaseService.db.query.categories.findFirst({
      where: eq(categories.id, categoryId),
      columns: { id: true },
    });
    if (!category) {
      throw new CategoryNotFoundException();
    }
  }
}
