import { Injectable } from "@nestjs/common";
import { HealthCheckResult, HealthCheckService } from "@nestjs/terminus";
import { DatabaseHealthIndicator } from "./indicators/database.health";

@Injectable()
export class HealthService {
  constructor(
    private readonly healthCheckService: HealthCheckService,
    private readonly databaseHealth: DatabaseHealthIndicator,
  ) {}

  async checkHealth(): Promise<HealthCheckResult> {
    return this.healthCheckService.check([() => this.databaseHealth.isHealthy()]);
  }
}
