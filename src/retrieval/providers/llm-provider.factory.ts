/**
 * LLM Provider Factory
 * Creates chat models from multiple providers (OpenAI, Google, Anthropic, Ollama)
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { isLLMProvider, type ChatModelOptions, type LLMProvider } from './types';

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Provider from LLM_PROVIDER, ollama when unset or unknown
   */
  getDefaultProvider(): LLMProvider {
    const value = this.configService.get<string>('LLM_PROVIDER');
    if (value && isLLMProvider(value)) {
      return value;
    }
    if (value) {
      this.logger.warn(`Invalid LLM provider: ${value}, defaulting to ollama`);
    }
    return 'ollama';
  }

  /**
   * Model configured for a provider, or its built-in default
   */
  getDefaultModel(provider: LLMProvider): string {
    const defaults: Record<LLMProvider, string> = {
      google: 'gemini-2.5-flash-lite',
      openai: 'gpt-4o-mini',
      anthropic: 'claude-3-5-haiku-20241022',
      ollama: 'gemma3:1b',
    };
    return (
      this.configService.get<string>(`${provider.toUpperCase()}_CHAT_MODEL`) ||
      defaults[provider]
    );
  }

  /**
   * Create chat model based on provider
   * @param provider - Provider name, LLM_PROVIDER when omitted
   * @param options - Optional override options (model, temperature, maxTokens, maxRetries)
   */
  createChatModel(
    provider?: LLMProvider,
    options?: ChatModelOptions,
  ): BaseChatModel {
    const selectedProvider = provider ?? this.getDefaultProvider();

    this.logger.log(`Creating chat model for provider: ${selectedProvider}`);

    switch (selectedProvider) {
      case 'openai':
        return this.createOpenAIModel(options);
      case 'google':
        return this.createGoogleModel(options);
      case 'anthropic':
        return this.createAnthropicModel(options);
      case 'ollama':
        return this.createOllamaModel(options);
    }
  }

  private createOpenAIModel(options?: ChatModelOptions): ChatOpenAI {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is required for OpenAI provider');
    }

    return new ChatOpenAI({
      model: options?.model || this.getDefaultModel('openai'),
      temperature: options?.temperature ?? 0,
      maxTokens: options?.maxTokens ?? 1000,
      maxRetries: options?.maxRetries ?? 0,
      configuration: {
        baseURL:
          this.configService.get<string>('OPENAI_BASE_URL') ||
          'https://api.openai.com/v1',
        apiKey,
      },
    });
  }

  private createGoogleModel(
    options?: ChatModelOptions,
  ): ChatGoogleGenerativeAI {
    const apiKey = this.configService.get<string>('GOOGLE_API_KEY');
    if (!apiKey) {
      throw new Error('GOOGLE_API_KEY is required for Google provider');
    }

    return new ChatGoogleGenerativeAI({
      model: options?.model || this.getDefaultModel('google'),
      temperature: options?.temperature ?? 0,
      maxOutputTokens: options?.maxTokens ?? 1000,
      maxRetries: options?.maxRetries ?? 0,
      apiKey,
    });
  }

  private createAnthropicModel(options?: ChatModelOptions): ChatAnthropic {
    const apiKey = this.configService.get<string>('ANTHROPIC_API_KEY');
    if (!apiKey) {
      throw new Error('ANTHROPIC_API_KEY is required for Anthropic provider');
    }

    return new ChatAnthropic({
      model: options?.model || this.getDefaultModel('anthropic'),
      temperature: options?.temperature ?? 0,
      maxTokens: options?.maxTokens ?? 1000,
      maxRetries: options?.maxRetries ?? 0,
      apiKey,
    });
  }

  /**
   * Create Ollama chat model (local)
   */
  private createOllamaModel(options?: ChatModelOptions): ChatOllama {
    return new ChatOllama({
      model: options?.model || this.getDefaultModel('ollama'),
      temperature: options?.temperature ?? 0,
      numPredict: options?.maxTokens ?? 1000,
      format: 'json',
      baseUrl:
        this.configService.get<string>('OLLAMA_BASE_URL') ||
        'http://localhost:11434',
    });
  }
}
