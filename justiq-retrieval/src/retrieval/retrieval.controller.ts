/**
 * Retrieval HTTP Controller
 *
 * POST /query
 * {
 *   "question": "What is the presumption of innocence?",
 *   "nResults": 5,              // optional, 1..50
 *   "filterType": "statute"     // optional category
 * }
 */

import {
  BadGatewayException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import { QueryRequestDto } from './dto/query-request.dto';
import type { QueryResultDto } from './dto/query-result.dto';
import { AnswerService } from './services/answer.service';
import { DEFAULT_N_RESULTS } from './retrieval.constants';
import { CompletionError, VectorSearchError } from './errors';

@Controller('query')
export class RetrievalController {
  private readonly logger = new Logger(RetrievalController.name);

  constructor(private readonly answerService: AnswerService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async query(@Body() body: QueryRequestDto): Promise<QueryResultDto> {
    this.logger.log(
      `Query request (nResults=${body.nResults ?? DEFAULT_N_RESULTS}, filterType=${body.filterType ?? 'none'}): "${body.question}"`,
    );

    try {
      return await this.answerService.query(
        body.question,
        body.nResults ?? DEFAULT_N_RESULTS,
        body.filterType ?? null,
      );
    } catch (error) {
      if (
        error instanceof VectorSearchError ||
        error instanceof CompletionError
      ) {
        this.logger.error(`Query failed [${error.code}]: ${error.message}`);
        throw new BadGatewayException({
          statusCode: HttpStatus.BAD_GATEWAY,
          code: error.code,
          message: error.message,
        });
      }
      throw error;
    }
  }
}
