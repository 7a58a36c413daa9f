/**
 * Retrieval HTTP Controller
 *
 * - POST /query            run the pipeline for one question
 * - GET  /query/health     index and reranker availability
 * - GET  /query/audit      most recent query audit summaries (?limit=10)
 * - GET  /query/audit/:id  one full query audit record
 *
 * Failed runs still return the full result body; only the status code changes.
 */

import {
  Body,
  Controller,
  DefaultValuePipe,
  Get,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  ParseIntPipe,
  Post,
  Query,
  Res,
  ValidationPipe,
} from '@nestjs/common';
import type { Response } from 'express';
import type { PipelineErrorKind } from '../common/errors';
import type { AuditSummary, StoredAuditRecord } from './audit/audit.types';
import { QueryRequestDto } from './dto/query-request.dto';
import {
  PipelineWorkflowService,
  type PipelineHealth,
  type PipelineResult,
} from './workflow/pipeline-workflow.service';

const STATUS_BY_ERROR: Record<PipelineErrorKind, HttpStatus> = {
  InputError: HttpStatus.BAD_REQUEST,
  IndexUnavailable: HttpStatus.SERVICE_UNAVAILABLE,
  GenerationError: HttpStatus.SERVICE_UNAVAILABLE,
  FormatError: HttpStatus.BAD_GATEWAY,
  RerankFailure: HttpStatus.OK,
};

export function statusForResult(result: PipelineResult): HttpStatus {
  return result.error ? STATUS_BY_ERROR[result.error.kind] : HttpStatus.OK;
}

@Controller('query')
export class RetrievalController {
  private readonly logger = new Logger(RetrievalController.name);

  constructor(private readonly workflowService: PipelineWorkflowService) {}

  /**
   * Request:
   * {
   *   "query": "How do investigators distinguish staging from an organized scene?",
   *   "k": 5,                      // optional, clamped to configured bounds
   *   "useReranker": true,         // optional
   *   "filters": { "crimeType": ["homicide", "arson"] },  // optional
   *   "diversityLambda": 0.5       // optional, 0..1
   * }
   */
  @Post()
  async query(
    @Body(ValidationPipe) body: QueryRequestDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<PipelineResult> {
    this.logger.log(`Query request: "${body.query.slice(0, 80)}"`);

    const { query, ...options } = body;
    const result = await this.workflowService.run(query, options);

    const status = statusForResult(result);
    res.status(status);

    this.logger.log(
      `Query completed: status=${status} stage=${result.stage} sources=${result.sources?.length ?? 0}`,
    );

    return result;
  }

  @Get('health')
  async health(): Promise<PipelineHealth> {
    return this.workflowService.healthCheck();
  }

  @Get('audit')
  async recentAudits(
    @Query('limit', new DefaultValuePipe(10), ParseIntPipe) limit: number,
  ): Promise<AuditSummary[]> {
    return this.workflowService.listRecentAudits(limit);
  }

  @Get('audit/:id')
  async audit(@Param('id') id: string): Promise<StoredAuditRecord> {
    const record = await this.workflowService.getAuditRecord(id);
    if (!record) {
      throw new NotFoundException(`No audit record ${id}`);
    }
    return record;
  }
}
