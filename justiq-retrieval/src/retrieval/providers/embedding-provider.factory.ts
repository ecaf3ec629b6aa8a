/**
 * Embedding Provider Factory
 * Query-side twin of the indexing service factory; provider and model must
 * match the ones the collection was built with.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import type { EmbeddingProvider } from './types';

const DEFAULT_MODELS: Record<EmbeddingProvider, string> = {
  ollama: 'bge-m3',
  openai: 'text-embedding-3-small',
  google: 'text-embedding-004',
};

const MODEL_ENV_VARS: Record<EmbeddingProvider, string> = {
  ollama: 'OLLAMA_EMBEDDING_MODEL',
  openai: 'OPENAI_EMBEDDING_MODEL',
  google: 'GOOGLE_EMBEDDING_MODEL',
};

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  createEmbeddingModel(): Embeddings {
    const provider = this.getProvider();
    const model = this.configService.get<string>(
      MODEL_ENV_VARS[provider],
      DEFAULT_MODELS[provider],
    );

    this.logger.log(`Creating embedding model: ${provider}/${model}`);

    switch (provider) {
      case 'ollama':
        return new OllamaEmbeddings({
          model,
          baseUrl: this.configService.get<string>(
            'OLLAMA_BASE_URL',
            'http://localhost:11434',
          ),
          maxRetries: 0,
        });
      case 'openai':
        return new OpenAIEmbeddings({
          model,
          apiKey: this.requireKey('OPENAI_API_KEY', provider),
          maxRetries: 0,
        });
      case 'google':
        return new GoogleGenerativeAIEmbeddings({
          model,
          apiKey: this.requireKey('GOOGLE_API_KEY', provider),
          maxRetries: 0,
        });
    }
  }

  private getProvider(): EmbeddingProvider {
    const provider = this.configService.get<string>(
      'EMBEDDING_PROVIDER',
      'ollama',
    );

    if (
      provider !== 'ollama' &&
      provider !== 'openai' &&
      provider !== 'google'
    ) {
      this.logger.warn(
        `Invalid embedding provider: ${provider}, defaulting to ollama`,
      );
      return 'ollama';
    }

    return provider;
  }

  private requireKey(key: string, provider: EmbeddingProvider): string {
    const value = this.configService.get<string>(key);
    if (!value) {
      throw new Error(`${key} is required for ${provider} embeddings`);
    }
    return value;
  }
}
