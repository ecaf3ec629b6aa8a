/**
 * Embedding Provider Factory
 * Multi-provider support: Ollama, OpenAI, Google.
 * The retrieval service embeds queries with the same settings; the two must
 * agree or query vectors will not match the indexed ones.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import type { EmbeddingProvider, EmbeddingProviderConfig } from './types';

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

// Vector sizes of known models; EMBEDDING_DIMENSIONS overrides
const MODEL_DIMENSIONS: Record<string, number> = {
  'bge-m3': 1024,
  'bge-m3:567m': 1024,
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
  'text-embedding-004': 768,
};

const FALLBACK_DIMENSIONS = 1024;

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  createEmbeddingModel(): Embeddings {
    const { provider, model, dimensions } = this.getProviderConfig();

    this.logger.log(
      `Creating embedding model: ${provider}/${model} (${dimensions}D)`,
    );

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

  /**
   * Vector size of the collection
   */
  getEmbeddingDimensions(): number {
    const configured = Number(
      this.configService.get<string>('EMBEDDING_DIMENSIONS'),
    );
    if (Number.isInteger(configured) && configured > 0) {
      return configured;
    }

    const model = this.getModel(this.getProvider());
    return MODEL_DIMENSIONS[model] ?? FALLBACK_DIMENSIONS;
  }

  getProviderConfig(): EmbeddingProviderConfig {
    const provider = this.getProvider();
    return {
      provider,
      model: this.getModel(provider),
      dimensions: this.getEmbeddingDimensions(),
    };
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

  private getModel(provider: EmbeddingProvider): string {
    return this.configService.get<string>(
      MODEL_ENV_VARS[provider],
      DEFAULT_MODELS[provider],
    );
  }

  private requireKey(key: string, provider: EmbeddingProvider): string {
    const value = this.configService.get<string>(key);
    if (!value) {
      throw new Error(`${key} is required for ${provider} embeddings`);
    }
    return value;
  }
}
