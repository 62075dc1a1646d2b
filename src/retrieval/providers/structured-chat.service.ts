/**
 * Structured Chat Service
 * One entry point for every LLM call in the pipeline: the caller supplies the
 * prompt and a zod schema, and receives a validated object back.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatPromptTemplate } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { z } from 'zod';
import { LLMProviderFactory } from './llm-provider.factory';
import { isLLMProvider, type ChatPurposeConfig, type LLMProvider } from './types';
import type {
  ChatPurpose,
  StructuredChat,
  StructuredChatRequest,
} from '../types/collaborators';
import {
  MalformedResponseError,
  StageAbortedError,
  describeError,
} from '../errors/retrieval-errors';
import { abortableDelay } from '../../shared/utils/deadline';

const PURPOSE_PREFIX: Record<ChatPurpose, string> = {
  planner: 'PLANNER',
  expansion: 'EXPANSION',
  quality: 'QUALITY',
  rerank: 'RERANK',
};

const PURPOSE_DEFAULTS: Record<
  ChatPurpose,
  { temperature: number; maxTokens: number }
> = {
  planner: { temperature: 0, maxTokens: 300 },
  expansion: { temperature: 0.5, maxTokens: 400 },
  quality: { temperature: 0, maxTokens: 300 },
  rerank: { temperature: 0, maxTokens: 1000 },
};

/**
 * Pull the JSON object out of a model reply, tolerating code fences and
 * surrounding prose.
 */
export function extractJsonObject(raw: string): string | null {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(raw);
  const body = (fenced ? fenced[1] : raw).trim();
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }
  return body.slice(start, end + 1);
}

export function parseStructuredReply<T>(
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  purpose: ChatPurpose,
): T {
  const json = extractJsonObject(raw);
  if (json === null) {
    throw new MalformedResponseError(
      `${purpose} reply contained no JSON object`,
      purpose,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new MalformedResponseError(
      `${purpose} reply is not valid JSON: ${describeError(error)}`,
      purpose,
    );
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MalformedResponseError(
      `${purpose} reply failed validation: ${issues}`,
      purpose,
    );
  }
  return result.data;
}

@Injectable()
export class StructuredChatService implements StructuredChat {
  private readonly logger = new Logger(StructuredChatService.name);
  private readonly prompt = ChatPromptTemplate.fromMessages([
    ['system', '{system}'],
    ['user', '{user}'],
  ]);

  constructor(
    private readonly configService: ConfigService,
    private readonly llmFactory: LLMProviderFactory,
  ) {}

  /**
   * Helper: Validate and convert string to LLMProvider type
   */
  private toProvider(value: string | undefined, fallback: LLMProvider): LLMProvider {
    if (value && isLLMProvider(value)) {
      return value;
    }
    return fallback;
  }

  private readNumber(key: string, fallback: number): number {
    const raw = this.configService.get<string | number>(key);
    if (raw === undefined || raw === '') return fallback;
    const value = Number(raw);
    return Number.isFinite(value) ? value : fallback;
  }

  /**
   * Helper: Get chat configuration for one purpose from environment variables
   * e.g. RERANK_PROVIDER, RERANK_MODEL, RERANK_TEMPERATURE, RERANK_MAX_RETRIES
   */
  getPurposeConfig(purpose: ChatPurpose): ChatPurposeConfig {
    const prefix = PURPOSE_PREFIX[purpose];
    const defaults = PURPOSE_DEFAULTS[purpose];

    const provider = this.toProvider(
      this.configService.get<string>(`${prefix}_PROVIDER`),
      this.llmFactory.getDefaultProvider(),
    );
    const fallbackProvider = this.toProvider(
      this.configService.get<string>(`${prefix}_FALLBACK_PROVIDER`),
      'ollama',
    );

    return {
      provider,
      model:
        this.configService.get<string>(`${prefix}_MODEL`) ||
        this.llmFactory.getDefaultModel(provider),
      temperature: this.readNumber(
        `${prefix}_TEMPERATURE`,
        defaults.temperature,
      ),
      maxTokens: this.readNumber(`${prefix}_MAX_TOKENS`, defaults.maxTokens),
      maxRetries: Math.max(1, this.readNumber(`${prefix}_MAX_RETRIES`, 1)),
      fallbackEnabled:
        this.configService.get<string>(`${prefix}_FALLBACK_ENABLED`) === 'true',
      fallbackProvider,
      fallbackModel:
        this.configService.get<string>(`${prefix}_FALLBACK_MODEL`) ||
        this.llmFactory.getDefaultModel(fallbackProvider),
    };
  }

  async complete<T>(request: StructuredChatRequest<T>): Promise<T> {
    const config = this.getPurposeConfig(request.purpose);
    const startTime = Date.now();

    const executeFn = async (
      provider: LLMProvider,
      model: string,
    ): Promise<T> => {
      const chat = this.llmFactory.createChatModel(provider, {
        model,
        temperature: config.temperature,
        maxTokens: config.maxTokens,
        maxRetries: 0,
      });

      const chain = this.prompt.pipe(chat).pipe(new StringOutputParser());
      const raw = await chain.invoke(
        { system: request.system, user: request.user },
        { signal: request.signal },
      );
      return parseStructuredReply(raw, request.schema, request.purpose);
    };

    const result = await this.executeWithRetryAndFallback(
      request.purpose,
      executeFn,
      config,
      request.signal,
    );

    this.logger.debug(
      `[StructuredChat] purpose=${request.purpose} provider=${config.provider} model=${config.model} status=success duration=${Date.now() - startTime}ms`,
    );
    return result;
  }

  /**
   * Helper: Execute with retry (exponential backoff) and optional fallback
   * provider. Aborts are never retried.
   */
  private async executeWithRetryAndFallback<T>(
    purpose: ChatPurpose,
    executeFn: (provider: LLMProvider, model: string) => Promise<T>,
    config: ChatPurposeConfig,
    signal?: AbortSignal,
  ): Promise<T> {
    const backoffBaseMs = this.readNumber(
      `${PURPOSE_PREFIX[purpose]}_RETRY_BACKOFF_MS`,
      1000,
    );
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= config.maxRetries; attempt++) {
      try {
        return await executeFn(config.provider, config.model);
      } catch (error) {
        lastError = error;
        if (signal?.aborted || error instanceof StageAbortedError) {
          throw new StageAbortedError(purpose);
        }

        if (attempt < config.maxRetries) {
          const backoffMs = backoffBaseMs * Math.pow(2, attempt - 1);
          this.logger.warn(
            `[StructuredChat] purpose=${purpose} provider=${config.provider} model=${config.model} attempt=${attempt}/${config.maxRetries} status=retry backoff=${backoffMs}ms error=${describeError(error)}`,
          );
          await abortableDelay(backoffMs, signal, purpose);
        } else {
          this.logger.warn(
            `[StructuredChat] purpose=${purpose} provider=${config.provider} model=${config.model} attempt=${attempt}/${config.maxRetries} status=max_retries_reached error=${describeError(error)}`,
          );
        }
      }
    }

    if (config.fallbackEnabled) {
      this.logger.log(
        `[StructuredChat] purpose=${purpose} fallback=triggered fallback_provider=${config.fallbackProvider} fallback_model=${config.fallbackModel}`,
      );
      try {
        return await executeFn(config.fallbackProvider, config.fallbackModel);
      } catch (fallbackError) {
        this.logger.error(
          `[StructuredChat] purpose=${purpose} fallback=failed error=${describeError(fallbackError)}`,
        );
        lastError = fallbackError;
      }
    }

    throw lastError instanceof Error
      ? lastError
      : new Error(`${purpose} failed after ${config.maxRetries} attempts`);
  }
}
