import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { SOURCE_KINDS, type SourceKind } from "@/common/types/core";
import type { ServiceHealth } from "@/common/types/services";

const HEALTH_STATES: ServiceHealth[] = ["healthy", "degraded", "unhealthy"];

export class SourceHealthDto {
  @ApiProperty()
  sourceId!: string;

  @ApiProperty({ enum: [...SOURCE_KINDS] })
  kind!: SourceKind;

  @ApiProperty()
  active!: boolean;

  @ApiProperty({ enum: HEALTH_STATES })
  status!: ServiceHealth;

  @ApiPropertyOptional()
  lastSuccessAt?: number;

  @ApiPropertyOptional()
  lastFailureAt?: number;

  @ApiProperty()
  consecutiveFailures!: number;
}

export class PipelineStatsDto {
  @ApiProperty()
  submitted!: number;

  @ApiProperty()
  inFlight!: number;

  @ApiProperty()
  accepted!: number;

  @ApiProperty()
  rejected!: number;

  @ApiProperty()
  retryExhausted!: number;

  @ApiProperty()
  failed!: number;

  @ApiProperty()
  sinkFailures!: number;
}

export class HealthResponseDto {
  @ApiProperty({ enum: HEALTH_STATES })
  status!: ServiceHealth;

  @ApiProperty()
  timestamp!: number;

  @ApiProperty({ description: "Milliseconds since the controller started" })
  uptime!: number;

  @ApiProperty({ type: [SourceHealthDto] })
  sources!: SourceHealthDto[];

  @ApiProperty({ type: PipelineStatsDto })
  stats!: PipelineStatsDto;

  @ApiProperty({ type: "array", items: { type: "object" }, description: "Token bucket state per source in use" })
  rateLimits!: Record<string, unknown>[];
}
