import { Reflector } from "@nestjs/core";
import { Test, type TestingModule } from "@nestjs/testing";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ValidationFailedException, ZodValidationPipe } from "../../common/pipes/zod-validation.pipe";
import { createAuthSession } from "../../shared/helper.fixtures";
import { AuthService } from "../auth/auth.service";
import { StaffUsersService } from "../staff/staff-users.service";
import { createStaffSchema } from "./dto/manager.dto";
import { ManagerController } from "./manager.controller";
import { ManagerService } from "./manager.service";

describe("ManagerController", () => {
  let controller: ManagerController;
  let managerService: ManagerService;

  const manager = createAuthSession("Manager", { id: "manager-1" }).user;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [ManagerController],
      providers: [
        {
          provide: ManagerService,
          useValue: {
            createStaff: vi.fn(),
            toggleUserStatus: vi.fn(),
            deleteUser: vi.fn(),
          },
        },
        { provide: StaffUsersService, useValue: { listUsers: vi.fn() } },
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

    controller = module.get<ManagerController>(ManagerController);
    managerService = module.get<ManagerService>(ManagerService);
  });

  it("trims the staff form and drops a blank phone number", async () => {
    const body = new ZodValidationPipe(createStaffSchema).transform({
      email: "nadia@example.com",
      password: "Test-secret1",
      firstName: " Nadia ",
      lastName: "Hassan",
      phoneNumber: " ",
    });

    await controller.createStaff(body);

    expect(managerService.createStaff).toHaveBeenCalledWith({
      email: "nadia@example.com",
      password: "Test-secret1",
      firstName: "Nadia",
      lastName: "Hassan",
      phoneNumber: undefined,
    });
  });

  it("rejects a short password", () => {
    const pipe = new ZodValidationPipe(createStaffSchema);

    expect(() =>
      pipe.transform({
        email: "nadia@example.com",
        password: "abc",
        firstName: "Nadia",
        lastName: "Hassan",
      }),
    ).toThrow(ValidationFailedException);
  });

  it("passes the caller's id when deleting a user", async () => {
    await controller.deleteUser("user-456", manager);

    expect(managerService.deleteUser).toHaveBeenCalledWith("user-456", "manager-1");
  });

  it("passes the caller's id when toggling a user", async () => {
    await controller.toggleUserStatus("user-456", manager);

    expect(managerService.toggleUserStatus).toHaveBeenCalledWith("user-456", "manager-1");
  });
});
