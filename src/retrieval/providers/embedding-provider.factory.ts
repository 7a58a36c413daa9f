/**
 * Embedding Provider Factory
 * Query and chunk embeddings from Ollama, OpenAI or Google.
 * Must match the model used when the collections were indexed.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import { isEmbeddingProvider, type EmbeddingProvider } from './types';

const DEFAULT_EMBEDDING_MODELS: Record<EmbeddingProvider, string> = {
  ollama: 'bge-m3:567m',
  openai: 'text-embedding-3-small',
  google: 'text-embedding-004',
};

const EMBEDDING_MODEL_ENV: Record<EmbeddingProvider, string> = {
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
      EMBEDDING_MODEL_ENV[provider],
      DEFAULT_EMBEDDING_MODELS[provider],
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
        });
      case 'openai':
        return new OpenAIEmbeddings({
          model,
          openAIApiKey: this.requireApiKey('OPENAI_API_KEY'),
        });
      case 'google':
        return new GoogleGenerativeAIEmbeddings({
          model,
          apiKey: this.requireApiKey('GOOGLE_API_KEY'),
        });
    }
  }

  private getProvider(): EmbeddingProvider {
    const provider = this.configService.get<string>('EMBEDDING_PROVIDER', 'ollama');

    if (!isEmbeddingProvider(provider)) {
      this.logger.warn(`Invalid embedding provider: ${provider}, defaulting to ollama`);
      return 'ollama';
    }

    return provider;
  }

  private requireApiKey(name: string): string {
    const apiKey = this.configService.get<string>(name);
    if (!apiKey) {
      throw new Error(`${name} is required for the configured embedding provider`);
    }
    return apiKey;
  }
}
