import { Reflector } from "@nestjs/core";
import { Test, type TestingModule } from "@nestjs/testing";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ValidationFailedException, ZodValidationPipe } from "../../common/pipes/zod-validation.pipe";
import { createAuthSession } from "../../shared/helper.fixtures";
import { AuthService } from "../auth/auth.service";
import { AccountController } from "./account.controller";
import { AccountService } from "./account.service";
import { nameAvailabilityQuerySchema, updateProfileSchema } from "./dto/account.dto";

describe("AccountController", () => {
  let controller: AccountController;
  let accountService: AccountService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AccountController],
      providers: [
        {
          provide: AccountService,
          useValue: {
            checkEmail: vi.fn(),
            checkPhone: vi.fn(),
            checkName: vi.fn(),
            getProfile: vi.fn(),
            updateProfile: vi.fn(),
          },
        },
        {
          provide: AuthService,
          useValue: {
            isInitialized: true,
            auth: { api: { getSession: vi.fn().mockResolvedValue(null) } },
            getUserAccess: vi.fn(),
          },
        },
        Reflector,
      ],
    }).compile();

    controller = module.get<AccountController>(AccountController);
    accountService = module.get<AccountService>(AccountService);
  });

  it("defaults missing name parts to blanks", async () => {
    const query = new ZodValidationPipe(nameAvailabilityQuerySchema).transform({
      firstName: " Aisha ",
    });

    await controller.checkName(query);

    expect(accountService.checkName).toHaveBeenCalledWith({ firstName: "Aisha", lastName: "" });
  });

  it("lists the selectable states", () => {
    expect(controller.getStates()).toContain("Kuala Lumpur");
  });

  it("requires a first name on profile update", () => {
    const pipe = new ZodValidationPipe(updateProfileSchema);

    expect(() => pipe.transform({ firstName: " ", lastName: "Rahman" })).toThrow(
      ValidationFailedException,
    );
  });

  it("parses the date of birth from form data", async () => {
    const user = createAuthSession().user;
    const body = new ZodValidationPipe(updateProfileSchema).transform({
      firstName: "Aisha",
      lastName: "Rahman",
      dateOfBirth: "1995-04-12",
    });

    await controller.updateProfile(user, body, undefined);

    expect(accountService.updateProfile).toHaveBeenCalledWith(
      user,
      expect.objectContaining({ dateOfBirth: new Date("1995-04-12") }),
      undefined,
    );
  });
});
