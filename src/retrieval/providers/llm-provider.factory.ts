/**
 * LLM Provider Factory
 * Chat models for the analyst answer: OpenAI, Google, Anthropic or a local Ollama.
 * LLM_PROVIDER picks the provider; `<PROVIDER>_CHAT_MODEL` overrides its model.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { isLLMProvider, type ChatModelOptions, type LLMProvider } from './types';

const DEFAULT_CHAT_MODELS: Record<LLMProvider, string> = {
  openai: 'gpt-4o',
  google: 'gemini-2.5-flash-lite',
  anthropic: 'claude-sonnet-4-5-20250929',
  ollama: 'llama3.1:8b',
};

const CHAT_MODEL_ENV: Record<LLMProvider, string> = {
  openai: 'OPENAI_CHAT_MODEL',
  google: 'GOOGLE_CHAT_MODEL',
  anthropic: 'ANTHROPIC_CHAT_MODEL',
  ollama: 'OLLAMA_CHAT_MODEL',
};

interface ChatModelSettings {
  model: string;
  temperature: number;
  maxTokens: number;
  maxRetries: number;
}

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  createChatModel(
    provider?: LLMProvider,
    options: ChatModelOptions = {},
  ): BaseChatModel {
    const selected = provider ?? this.getProvider();
    const settings: ChatModelSettings = {
      model:
        options.model ||
        this.configService.get<string>(CHAT_MODEL_ENV[selected]) ||
        DEFAULT_CHAT_MODELS[selected],
      temperature: options.temperature ?? 0.3,
      maxTokens: options.maxTokens ?? 1200,
      maxRetries: options.maxRetries ?? 2,
    };

    this.logger.log(
      `Creating chat model: provider=${selected} model=${settings.model} maxTokens=${settings.maxTokens}`,
    );

    switch (selected) {
      case 'openai':
        return new ChatOpenAI({
          model: settings.model,
          temperature: settings.temperature,
          maxTokens: settings.maxTokens,
          maxRetries: settings.maxRetries,
          configuration: {
            baseURL:
              this.configService.get<string>('OPENAI_BASE_URL') ||
              'https://api.openai.com/v1',
            apiKey: this.requireApiKey('OPENAI_API_KEY'),
          },
        });
      case 'google':
        return new ChatGoogleGenerativeAI({
          model: settings.model,
          temperature: settings.temperature,
          maxOutputTokens: settings.maxTokens,
          maxRetries: settings.maxRetries,
          apiKey: this.requireApiKey('GOOGLE_API_KEY'),
        });
      case 'anthropic':
        return new ChatAnthropic({
          model: settings.model,
          temperature: settings.temperature,
          maxTokens: settings.maxTokens,
          maxRetries: settings.maxRetries,
          apiKey: this.requireApiKey('ANTHROPIC_API_KEY'),
        });
      case 'ollama':
        return new ChatOllama({
          model: settings.model,
          temperature: settings.temperature,
          numPredict: settings.maxTokens,
          maxRetries: settings.maxRetries,
          baseUrl:
            this.configService.get<string>('OLLAMA_BASE_URL') ||
            'http://localhost:11434',
        });
    }
  }

  private getProvider(): LLMProvider {
    const provider = this.configService.get<string>('LLM_PROVIDER', 'ollama');

    if (!isLLMProvider(provider)) {
      this.logger.warn(`Invalid LLM provider: ${provider}, defaulting to ollama`);
      return 'ollama';
    }

    return provider;
  }

  private requireApiKey(name: string): string {
    const apiKey = this.configService.get<string>(name);
    if (!apiKey) {
      throw new Error(`${name} is required for the configured LLM provider`);
    }
    return apiKey;
  }
}
