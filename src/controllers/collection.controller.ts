import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, Post, Res } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import type { Response } from "express";
import { BaseController } from "@/common/base/base.controller";
import type { CollectionRequest, PipelineResult, Primitive } from "@/common/types/core";
import { ErrorCode } from "@/common/types/error-handling";
import { createCollectionRequest } from "@/collector/collection-request.factory";
import { ConfigService } from "@/config/config.service";
import {
  BatchItemResponseDto,
  CancelResponseDto,
  CollectBatchRequestDto,
  CollectRequestDto,
  MAX_BATCH_SIZE,
  PipelineResultDto,
  RequestStateResponseDto,
} from "@/dto/collection.dto";
import { httpStatusForResult } from "@/error-handling/http-status";
import { ConfigurationError } from "@/error-handling/pipeline.errors";
import { PipelineCoordinatorService } from "@/pipeline/pipeline-coordinator.service";

export interface BatchItemResponse {
  status: number;
  result: PipelineResult;
}

function isPrimitive(value: unknown): value is Primitive {
  return value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}

@ApiTags("Collection")
@Controller("collect")
export class CollectionController extends BaseController {
  constructor(
    private readonly coordinator: PipelineCoordinatorService,
    private readonly configService: ConfigService
  ) {
    super();
  }

  @Post()
  @HttpCode(200)
  @ApiOperation({
    summary: "Collect and score one record",
    description: "Fetches from the source (and its fallbacks), normalizes, validates and decides",
  })
  @ApiResponse({ status: 200, description: "Record accepted or rejected", type: PipelineResultDto })
  @ApiResponse({ status: 400, description: "Invalid request body" })
  @ApiResponse({ status: 404, description: "Unknown source", type: PipelineResultDto })
  @ApiResponse({ status: 409, description: "Request cancelled or id already used", type: PipelineResultDto })
  @ApiResponse({ status: 422, description: "Payload, schema or source rejected the record", type: PipelineResultDto })
  @ApiResponse({ status: 503, description: "Every attempt failed", type: PipelineResultDto })
  async collect(@Body() body: CollectRequestDto, @Res({ passthrough: true }) res: Response): Promise<PipelineResult> {
    return this.handleControllerOperation(
      async () => {
        const request = this.toCollectionRequest(body);
        const result = await this.submit(request);
        res.status(httpStatusForResult(result));
        return result;
      },
      "collect",
      "POST",
      "/collect",
      { requestId: body.requestId, body }
    );
  }

  @Post("batch")
  @HttpCode(200)
  @ApiOperation({
    summary: "Collect several records",
    description: `Runs up to ${MAX_BATCH_SIZE} requests with bounded concurrency; each item carries the status it would have had alone`,
  })
  @ApiResponse({ status: 200, description: "One entry per request, in request order", type: [BatchItemResponseDto] })
  @ApiResponse({ status: 400, description: "Invalid batch" })
  async collectBatch(@Body() body: CollectBatchRequestDto): Promise<BatchItemResponse[]> {
    return this.handleControllerOperation(
      async () => {
        const requests = body.requests.map(item => this.toCollectionRequest(item));

        const seen = new Set<string>();
        for (const { requestId } of requests) {
          if (seen.has(requestId)) {
            this.throwHttpException(HttpStatus.BAD_REQUEST, ErrorCode.INVALID_REQUEST, `Duplicate requestId ${requestId} in batch`);
          }
          if (this.coordinator.getRequestState(requestId) !== undefined) {
            this.throwHttpException(HttpStatus.CONFLICT, ErrorCode.INVALID_REQUEST, `Request ${requestId} has already been submitted`);
          }
          seen.add(requestId);
        }

        const results = await this.coordinator.submitBatch(requests);
        return results.map(result => ({ status: httpStatusForResult(result), result }));
      },
      "collectBatch",
      "POST",
      "/collect/batch",
      { body: { size: body.requests.length } }
    );
  }

  @Delete(":requestId")
  @ApiOperation({ summary: "Cancel an in-flight request" })
  @ApiResponse({ status: 200, description: "Whether a cancellation was issued", type: CancelResponseDto })
  cancel(@Param("requestId") requestId: string): CancelResponseDto {
    return { cancelled: this.coordinator.cancel(requestId) };
  }

  @Get(":requestId/state")
  @ApiOperation({ summary: "Current state of a request" })
  @ApiResponse({ status: 200, type: RequestStateResponseDto })
  @ApiResponse({ status: 404, description: "Unknown or forgotten request" })
  getState(@Param("requestId") requestId: string): RequestStateResponseDto {
    const state = this.coordinator.getRequestState(requestId);
    if (!state) {
      this.throwHttpException(HttpStatus.NOT_FOUND, ErrorCode.REQUEST_NOT_FOUND, `Unknown request ${requestId}`, requestId);
    }
    return { requestId, state };
  }

  private toCollectionRequest(body: CollectRequestDto): CollectionRequest {
    const parameters: Record<string, Primitive> = {};
    for (const [key, value] of Object.entries(body.parameters ?? {})) {
      if (!isPrimitive(value)) {
        this.throwHttpException(
          HttpStatus.BAD_REQUEST,
          ErrorCode.INVALID_REQUEST,
          `parameters.${key} must be a string, number, boolean or null`,
          body.requestId
        );
      }
      parameters[key] = value;
    }

    try {
      return createCollectionRequest(
        {
          requestId: body.requestId,
          sourceId: body.sourceId,
          target: body.target,
          parameters,
          retryPolicy: body.maxAttempts === undefined ? undefined : { maxAttempts: body.maxAttempts },
          timeoutMs: body.timeoutMs,
          fallbackSourceIds: body.fallbackSourceIds,
          schemaName: body.schemaName,
          referenceValue: body.referenceValue,
        },
        this.configService.getPipelineConfig().retryPolicy
      );
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.throwHttpException(HttpStatus.BAD_REQUEST, ErrorCode.INVALID_REQUEST, error.message, body.requestId);
      }
      throw error;
    }
  }

  private async submit(request: CollectionRequest): Promise<PipelineResult> {
    try {
      return await this.coordinator.submit(request);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.throwHttpException(HttpStatus.CONFLICT, ErrorCode.INVALID_REQUEST, error.message, request.requestId);
      }
      throw error;
    }
  }
}
