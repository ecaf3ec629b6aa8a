/**
 * Completion Service
 * Single-turn chat completion through the configured LangChain chat model
 */

import { Injectable, Logger } from '@nestjs/common';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import type { CompletionClient } from '../types';
import { CompletionError } from '../errors';

@Injectable()
export class CompletionService implements CompletionClient {
  private readonly logger = new Logger(CompletionService.name);
  // Keyed by `${temperature}:${maxOutputTokens}`
  private readonly models = new Map<string, BaseChatModel>();

  constructor(private readonly llmFactory: LLMProviderFactory) {}

  async complete(
    systemMessage: string,
    userMessage: string,
    temperature: number,
    maxOutputTokens: number,
  ): Promise<string> {
    const chat = this.getModel(temperature, maxOutputTokens);
    const chain = chat.pipe(new StringOutputParser());

    let answer: string;
    try {
      answer = await chain.invoke([
        new SystemMessage(systemMessage),
        new HumanMessage(userMessage),
      ]);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Completion via ${this.llmFactory.getProvider()} failed: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new CompletionError(
        message,
        error instanceof Error ? error : undefined,
      );
    }

    if (answer.trim().length === 0) {
      throw new CompletionError('model returned an empty response');
    }

    return answer;
  }

  private getModel(temperature: number, maxOutputTokens: number): BaseChatModel {
    const key = `${temperature}:${maxOutputTokens}`;
    const cached = this.models.get(key);
    if (cached) {
      return cached;
    }

    const model = this.llmFactory.createChatModel({
      temperature,
      maxTokens: maxOutputTokens,
    });
    this.models.set(key, model);
    return model;
  }
}
