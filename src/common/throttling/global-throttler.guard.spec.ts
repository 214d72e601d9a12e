import type { ExecutionContext } from "@nestjs/common";
import { Reflector } from "@nestjs/core";
import { Test, type TestingModule } from "@nestjs/testing";
import { ThrottlerStorage } from "@nestjs/throttler";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { GlobalThrottlerGuard, SkipGlobalThrottle } from "./global-throttler.guard";

class TestableGlobalThrottlerGuard extends GlobalThrottlerGuard {
  async callShouldSkip(context: ExecutionContext): Promise<boolean> {
    return this.shouldSkip(context);
  }
}

class SampleController {
  open() {
    return "ok";
  }

  @SkipGlobalThrottle()
  ownThrottle() {
    return "ok";
  }
}

function createContext(handler: () => string): ExecutionContext {
  return {
    getHandler: () => handler,
    getClass: () => SampleController,
  } as unknown as ExecutionContext;
}

describe("GlobalThrottlerGuard", () => {
  let guard: TestableGlobalThrottlerGuard;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        { provide: TestableGlobalThrottlerGuard, useClass: TestableGlobalThrottlerGuard },
        { provide: "THROTTLER:MODULE_OPTIONS", useValue: [{ ttl: 60_000, limit: 120 }] },
        { provide: ThrottlerStorage, useValue: { increment: vi.fn(), get: vi.fn() } },
        Reflector,
      ],
    }).compile();

    guard = module.get<TestableGlobalThrottlerGuard>(TestableGlobalThrottlerGuard);
  });

  it("applies to ordinary routes", async () => {
    await expect(guard.callShouldSkip(createContext(SampleController.prototype.open))).resolves.toBe(
      false,
    );
  });

  it("skips routes marked as having their own throttler", async () => {
    await expect(
      guard.callShouldSkip(createContext(SampleController.prototype.ownThrottle)),
    ).resolves.toBe(true);
  });
});
