/**
 * Retrieval HTTP Controller
 *
 * POST /query
 * {
 *   "query": "What is the refund policy?",
 *   "topK": 5,                    // optional
 *   "policy": "reflective",       // optional: reflective | single-expansion
 *   "history": [{ "role": "user", "content": "..." }]  // optional
 * }
 */

import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Res,
  ValidationPipe,
} from '@nestjs/common';
import { QueryRequestDto } from './dto/query-request.dto';
import type {
  HealthResultDto,
  RetrievalResultDto,
} from './dto/retrieval-result.dto';
import { RetrievalOrchestratorService } from './workflow/retrieval-orchestrator.service';
import { InvalidQueryError } from './errors/retrieval-errors';

/**
 * The part of the HTTP response the controller watches for disconnects
 */
export interface ClosableResponse {
  readonly writableEnded: boolean;
  on(event: 'close', listener: () => void): unknown;
  off(event: 'close', listener: () => void): unknown;
}

@Controller('query')
export class RetrievalController {
  private readonly logger = new Logger(RetrievalController.name);

  constructor(private readonly orchestrator: RetrievalOrchestratorService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async query(
    @Body(new ValidationPipe({ transform: true, whitelist: true }))
    body: QueryRequestDto,
    @Res({ passthrough: true }) res: ClosableResponse,
  ): Promise<RetrievalResultDto> {
    // Client went away before we answered: stop spending on this request
    const controller = new AbortController();
    const onClose = (): void => {
      if (!res.writableEnded) {
        controller.abort();
      }
    };
    res.on('close', onClose);

    try {
      return await this.orchestrator.execute(body.query, body.topK, {
        signal: controller.signal,
        policy: body.policy,
        history: body.history,
      });
    } catch (error) {
      if (error instanceof InvalidQueryError) {
        this.logger.warn(
          `Rejected query: field=${error.field} reason=${error.message}`,
        );
        throw new BadRequestException({
          message: error.message,
          code: error.code,
          field: error.field,
        });
      }
      throw error;
    } finally {
      res.off('close', onClose);
    }
  }

  @Get('health')
  async health(): Promise<HealthResultDto> {
    const health = await this.orchestrator.healthCheck();
    return {
      status: health.qdrant ? 'ok' : 'degraded',
      ...health,
    };
  }
}
