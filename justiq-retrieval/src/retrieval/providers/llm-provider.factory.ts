/**
 * LLM Provider Factory
 * Creates chat models from multiple providers (OpenRouter, OpenAI, Google,
 * Anthropic, Ollama). Clients never retry: a failed call surfaces at once.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { CredentialResolver } from './credential-resolver';
import { LLM_PROVIDERS, type ChatModelOptions, type LLMProvider } from './types';

const API_KEY_NAMES: Record<Exclude<LLMProvider, 'ollama'>, string> = {
  openrouter: 'OPENROUTER_API_KEY',
  openai: 'OPENAI_API_KEY',
  google: 'GOOGLE_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);
  private readonly provider: LLMProvider;
  private readonly apiKey: string | undefined;

  /**
   * @throws MissingCredentialError when the configured provider has no API key
   */
  constructor(
    private readonly configService: ConfigService,
    credentialResolver: CredentialResolver,
  ) {
    this.provider = this.resolveProvider();
    this.apiKey =
      this.provider === 'ollama'
        ? undefined
        : credentialResolver.require(
            API_KEY_NAMES[this.provider],
            this.provider,
          );
  }

  getProvider(): LLMProvider {
    return this.provider;
  }

  /**
   * Create chat model for the configured provider
   */
  createChatModel(options: ChatModelOptions): BaseChatModel {
    this.logger.log(
      `Creating chat model for provider: ${this.provider} (temperature=${options.temperature}, maxTokens=${options.maxTokens})`,
    );

    // Provider classes are too deeply generic to check against BaseChatModel (TS2589)
    switch (this.provider) {
      case 'openrouter':
        return this.createOpenRouterModel(options) as unknown as BaseChatModel;
      case 'openai':
        return this.createOpenAIModel(options) as unknown as BaseChatModel;
      case 'google':
        return this.createGoogleModel(options) as unknown as BaseChatModel;
      case 'anthropic':
        return this.createAnthropicModel(options) as unknown as BaseChatModel;
      case 'ollama':
        return this.createOllamaModel(options) as unknown as BaseChatModel;
    }
  }

  private resolveProvider(): LLMProvider {
    const configured = this.configService.get<string>(
      'LLM_PROVIDER',
      'openrouter',
    );
    const provider = LLM_PROVIDERS.find((name) => name === configured);

    if (provider === undefined) {
      this.logger.warn(
        `Invalid LLM provider: ${configured}, defaulting to openrouter`,
      );
      return 'openrouter';
    }

    return provider;
  }

  private requireApiKey(): string {
    if (this.apiKey === undefined) {
      throw new Error(`No API key resolved for provider ${this.provider}`);
    }
    return this.apiKey;
  }

  /**
   * OpenRouter speaks the OpenAI chat completions protocol
   */
  private createOpenRouterModel(options: ChatModelOptions): ChatOpenAI {
    return new ChatOpenAI({
      model: this.configService.get<string>(
        'OPENROUTER_CHAT_MODEL',
        'meta-llama/llama-3.3-70b-instruct:free',
      ),
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      maxRetries: 0,
      apiKey: this.requireApiKey(),
      configuration: {
        baseURL: this.configService.get<string>(
          'OPENROUTER_BASE_URL',
          'https://openrouter.ai/api/v1',
        ),
      },
    });
  }

  private createOpenAIModel(options: ChatModelOptions): ChatOpenAI {
    return new ChatOpenAI({
      model: this.configService.get<string>('OPENAI_CHAT_MODEL', 'gpt-4o'),
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      maxRetries: 0,
      apiKey: this.requireApiKey(),
      configuration: {
        baseURL: this.configService.get<string>(
          'OPENAI_BASE_URL',
          'https://api.openai.com/v1',
        ),
      },
    });
  }

  private createGoogleModel(options: ChatModelOptions): ChatGoogleGenerativeAI {
    return new ChatGoogleGenerativeAI({
      model: this.configService.get<string>(
        'GOOGLE_CHAT_MODEL',
        'gemini-2.5-flash-lite',
      ),
      temperature: options.temperature,
      maxOutputTokens: options.maxTokens,
      maxRetries: 0,
      apiKey: this.requireApiKey(),
    });
  }

  private createAnthropicModel(options: ChatModelOptions): ChatAnthropic {
    return new ChatAnthropic({
      model: this.configService.get<string>(
        'ANTHROPIC_CHAT_MODEL',
        'claude-sonnet-4-5-20250929',
      ),
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      maxRetries: 0,
      apiKey: this.requireApiKey(),
    });
  }

  private createOllamaModel(options: ChatModelOptions): ChatOllama {
    return new ChatOllama({
      model: this.configService.get<string>('OLLAMA_CHAT_MODEL', 'gemma3:1b'),
      temperature: options.temperature,
      numPredict: options.maxTokens,
      maxRetries: 0,
      baseUrl: this.configService.get<string>(
        'OLLAMA_BASE_URL',
        'http://localhost:11434',
      ),
    });
  }
}
