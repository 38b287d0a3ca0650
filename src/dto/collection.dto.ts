import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { Type } from "class-transformer";
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from "class-validator";
import { PIPELINE_DECISIONS, REQUEST_STATES, type PipelineDecision, type RequestState } from "@/common/types/core";
import { ErrorCode } from "@/common/types/error-handling";

export const MAX_BATCH_SIZE = 50;

export class CollectRequestDto {
  @ApiPropertyOptional({ description: "Caller-chosen id; generated when omitted" })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  requestId?: string;

  @ApiProperty({ example: "quotes-api" })
  @IsString()
  @IsNotEmpty()
  sourceId!: string;

  @ApiProperty({ example: "AAPL" })
  @IsString()
  @IsNotEmpty()
  target!: string;

  @ApiPropertyOptional({
    description: "Template values for the source; strings, numbers, booleans or null",
    type: "object",
    additionalProperties: true,
  })
  @IsOptional()
  @IsObject()
  parameters?: Record<string, unknown>;

  @ApiPropertyOptional({ minimum: 1, maximum: 20 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(20)
  maxAttempts?: number;

  @ApiPropertyOptional({ description: "Per-attempt timeout in milliseconds", minimum: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  timeoutMs?: number;

  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  fallbackSourceIds?: string[];

  @ApiPropertyOptional({ example: "market-quote" })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  schemaName?: string;

  @ApiPropertyOptional({ description: "Known-good value the reference field is compared against" })
  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  referenceValue?: number;
}

export class CollectBatchRequestDto {
  @ApiProperty({ type: [CollectRequestDto], minItems: 1, maxItems: MAX_BATCH_SIZE })
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(MAX_BATCH_SIZE)
  @ValidateNested({ each: true })
  @Type(() => CollectRequestDto)
  requests!: CollectRequestDto[];
}

export class PipelineErrorDto {
  @ApiProperty({ enum: ErrorCode })
  code!: ErrorCode;

  @ApiProperty({ example: "NormalizationError" })
  kind!: string;

  @ApiProperty()
  message!: string;
}

export class PipelineResultDto {
  @ApiProperty()
  requestId!: string;

  @ApiProperty()
  symbol!: string;

  @ApiProperty({ description: "Source that produced the record, or the requested one on failure" })
  sourceId!: string;

  @ApiProperty({ enum: [...PIPELINE_DECISIONS] })
  decision!: PipelineDecision;

  @ApiPropertyOptional({ type: "object", additionalProperties: true })
  record?: Record<string, unknown>;

  @ApiPropertyOptional({ type: "object", additionalProperties: true })
  quality?: Record<string, unknown>;

  @ApiProperty({ type: [String], example: ["completeness_low"] })
  reasons!: string[];

  @ApiPropertyOptional({ type: PipelineErrorDto })
  error?: PipelineErrorDto;

  @ApiProperty()
  attempts!: number;

  @ApiProperty()
  completedAt!: number;
}

export class BatchItemResponseDto {
  @ApiProperty({ description: "Status the request would have answered with on its own", example: 200 })
  status!: number;

  @ApiProperty({ type: PipelineResultDto })
  result!: PipelineResultDto;
}

export class CancelResponseDto {
  @ApiProperty()
  cancelled!: boolean;
}

export class RequestStateResponseDto {
  @ApiProperty()
  requestId!: string;

  @ApiProperty({ enum: [...REQUEST_STATES] })
  state!: RequestState;
}
