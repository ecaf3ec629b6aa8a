/**
 * Answer Service
 * Retrieval-augmented answering: one vector search, then one completion over
 * the retrieved context.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { DocumentCategory } from '../../common/constants/document-categories';
import {
  COMPLETION_CLIENT,
  DEFAULT_N_RESULTS,
  VECTOR_STORE,
} from '../retrieval.constants';
import type { CompletionClient, SearchResult, VectorStore } from '../types';
import type { QueryResultDto } from '../dto/query-result.dto';
import {
  ANSWER_SYSTEM_PROMPT,
  NO_RELEVANT_DOCUMENTS_ANSWER,
  buildAnswerUserMessage,
} from '../prompts/answer.prompts';
import { ContextFormatterService } from './context-formatter.service';
import {
  CompletionError,
  InvalidConfigurationError,
  RetrievalError,
  VectorSearchError,
} from '../errors';

/**
 * Sampling temperature in (0, 2]
 * @throws InvalidConfigurationError
 */
function readTemperature(raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value) || value <= 0 || value > 2) {
    throw new InvalidConfigurationError(
      'LLM_TEMPERATURE',
      raw,
      'a number greater than 0 and at most 2',
    );
  }
  return value;
}

/**
 * @throws InvalidConfigurationError
 */
function readMaxTokens(raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isInteger(value) || value < 1) {
    throw new InvalidConfigurationError(
      'LLM_MAX_TOKENS',
      raw,
      'a positive integer',
    );
  }
  return value;
}

@Injectable()
export class AnswerService {
  private readonly logger = new Logger(AnswerService.name);
  private readonly temperature: number;
  private readonly maxOutputTokens: number;

  constructor(
    @Inject(VECTOR_STORE) private readonly vectorStore: VectorStore,
    @Inject(COMPLETION_CLIENT)
    private readonly completionClient: CompletionClient,
    private readonly contextFormatter: ContextFormatterService,
    configService: ConfigService,
  ) {
    this.temperature = readTemperature(
      configService.get<string>('LLM_TEMPERATURE', '0.7'),
    );
    this.maxOutputTokens = readMaxTokens(
      configService.get<string>('LLM_MAX_TOKENS', '2000'),
    );
  }

  /**
   * Answer a question from the indexed corpus
   * @param filterType - Only search chunks of this category
   * @throws VectorSearchError
   * @throws CompletionError
   */
  async query(
    question: string,
    nResults = DEFAULT_N_RESULTS,
    filterType: DocumentCategory | null = null,
  ): Promise<QueryResultDto> {
    const startTime = Date.now();

    const results = await this.search(question, nResults, filterType);
    if (results.length === 0) {
      this.logger.log('No relevant documents found, skipping completion');
      return { answer: NO_RELEVANT_DOCUMENTS_ANSWER, sources: [], question };
    }

    const context = this.contextFormatter.formatContext(results);
    const answer = await this.complete(
      buildAnswerUserMessage(context, question),
    );

    this.logger.log(
      `Answered from ${results.length} chunk(s) in ${Date.now() - startTime}ms`,
    );

    return {
      answer,
      sources: this.contextFormatter.toSources(results),
      question,
    };
  }

  private async search(
    question: string,
    nResults: number,
    filterType: DocumentCategory | null,
  ): Promise<SearchResult[]> {
    try {
      return await this.vectorStore.search(question, nResults, filterType);
    } catch (error) {
      throw error instanceof RetrievalError
        ? error
        : new VectorSearchError(
            error instanceof Error ? error.message : String(error),
            error instanceof Error ? error : undefined,
          );
    }
  }

  private async complete(userMessage: string): Promise<string> {
    try {
      return await this.completionClient.complete(
        ANSWER_SYSTEM_PROMPT,
        userMessage,
        this.temperature,
        this.maxOutputTokens,
      );
    } catch (error) {
      throw error instanceof RetrievalError
        ? error
        : new CompletionError(
            error instanceof Error ? error.message : String(error),
            error instanceof Error ? error : undefined,
          );
    }
  }
}
