import { Controller, Get } from "@nestjs/common";
import { HealthCheck, type HealthCheckResult } from "@nestjs/terminus";
import { SkipGlobalThrottle } from "../../common/throttling/global-throttler.guard";
import { HealthService } from "./health.service";

/** Liveness probe for load balancers; exempt from the per-IP request budget. */
@Controller("health")
@SkipGlobalThrottle()
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    return this.healthService.checkHealth();
  }
}
