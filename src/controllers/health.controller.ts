import { Controller, Get } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { SourceAdapterRegistry } from "@/adapters/base/source-adapter.registry";
import { BaseController } from "@/common/base/base.controller";
import { RateLimiterService } from "@/common/rate-limiting/rate-limiter.service";
import type { SourceHealth } from "@/common/types/adapters";
import type { RateLimiterStats } from "@/common/types/rate-limiting";
import type { ServiceHealth } from "@/common/types/services";
import { HealthResponseDto } from "@/dto/health.dto";
import { PipelineCoordinatorService, type PipelineStats } from "@/pipeline/pipeline-coordinator.service";

export interface HealthResponse {
  status: ServiceHealth;
  timestamp: number;
  uptime: number;
  sources: SourceHealth[];
  stats: PipelineStats;
  rateLimits: RateLimiterStats[];
}

/**
 * Overall status from the active sources: unhealthy with none usable, degraded while any is failing
 */
export function overallStatus(sources: SourceHealth[]): ServiceHealth {
  const active = sources.filter(source => source.active);
  if (active.length === 0 || active.every(source => source.status === "unhealthy")) {
    return "unhealthy";
  }
  return active.some(source => source.status !== "healthy") ? "degraded" : "healthy";
}

@ApiTags("System Health")
@Controller("health")
// Note: health is not rate limited; orchestrators poll it
export class HealthController extends BaseController {
  constructor(
    private readonly registry: SourceAdapterRegistry,
    private readonly coordinator: PipelineCoordinatorService,
    private readonly rateLimiter: RateLimiterService
  ) {
    super();
  }

  @Get()
  @ApiOperation({
    summary: "Health check endpoint",
    description: "Source health, pipeline totals and rate limiter state",
  })
  @ApiResponse({ status: 200, description: "Current health", type: HealthResponseDto })
  getHealth(): HealthResponse {
    const sources = this.registry.getHealth();
    return {
      status: overallStatus(sources),
      timestamp: Date.now(),
      uptime: this.getUptime(),
      sources,
      stats: this.coordinator.getStats(),
      rateLimits: this.rateLimiter.getStats(),
    };
  }
}
