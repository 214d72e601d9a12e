import { Controller, Delete, Get, HttpCode, HttpStatus, Post, UseGuards } from "@nestjs/common";
import { ZodIdParam } from "../../common/decorators/zod-validation.decorator";
import { CurrentUser } from "../auth/decorators/current-user.decorator";
import { OptionalSessionGuard } from "../auth/guards/optional-session.guard";
import { type AuthSession, SessionGuard } from "../auth/guards/session.guard";
import { FavoritesService } from "./favorites.service";

@Controller("api/favorites")
export class FavoritesController {
  constructor(private readonly favoritesService: FavoritesService) {}

  @Get()
  @UseGuards(SessionGuard)
  async getFavorites(@CurrentUser() user: AuthSession["user"]) {
    return this.favoritesService.getFavorites(user.id);
  }

  /** Guests are never favorited. */
  @Get(":carId/status")
  @UseGuards(OptionalSessionGuard)
  async isFavorited(
    @ZodIdParam("carId") carId: number,
    @CurrentUser() user: AuthSession["user"] | null,
  ) {
    if (!user) {
      return { favorited: false };
    }
    return { favorited: await this.favoritesService.isFavorited(user.id, carId) };
  }

  @Post(":carId")
  @HttpCode(HttpStatus.OK)
  @UseGuards(SessionGuard)
  async addFavorite(
    @ZodIdParam("carId") carId: number,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.favoritesService.addFavorite(user.id, carId);
  }

  @Delete(":carId")
  @UseGuards(SessionGuard)
  async removeFavorite(
    @ZodIdParam("carId") carId: number,
    @CurrentUser() user: AuthSession["user"],
  ) {
    return this.favoritesService.removeFavorite(user.id, carId);
  }
}
