import { generateText, type LanguageModel, type LanguageModelUsage } from 'ai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import type { ModelProfile } from './model-profile.js';
import { CompletionError, errorMessage } from './errors.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_OUTPUT_TOKENS = 2000;

/**
 * Anything that turns a prompt into text. The code generator, the task runner
 * and the repository insights hold one of these by reference.
 */
export interface CompletionSource {
  send(prompt: string): Promise<string>;
}

/**
 * Configuration options for CompletionClient.
 */
export type CompletionClientSettings = {
  /**
   * The language model to use.
   */
  model: LanguageModel;

  /**
   * Model id used in usage reports.
   */
  modelId: string;

  /**
   * Abort the request after this many milliseconds.
   *
   * @default 30000
   */
  timeoutMs?: number;

  /**
   * @default 2000
   */
  maxOutputTokens?: number;
};

export type CompletionClientOptions = Omit<CompletionClientSettings, 'model' | 'modelId'>;

/**
 * Remove a leading ``` fence (with or without a language tag) and a trailing
 * ``` fence from model output.
 */
export function stripCodeFences(text: string): string {
  let cleaned = text.trim();
  const opening = cleaned.match(/^```[\w+#.-]*/);
  if (opening) {
    cleaned = cleaned.slice(opening[0].length);
  }
  if (cleaned.endsWith('```')) {
    cleaned = cleaned.slice(0, -3);
  }
  return cleaned.trim();
}

/**
 * Base URL for an OpenAI-compatible provider. Profiles usually hold the full
 * chat-completions endpoint; the provider appends that path itself.
 */
export function toBaseUrl(apiUrl: string): string {
  return apiUrl.replace(/\/+$/, '').replace(/\/chat\/completions$/, '');
}

function sumTokens(a: number | undefined, b: number | undefined): number | undefined {
  return a === undefined && b === undefined ? undefined : (a ?? 0) + (b ?? 0);
}

/**
 * Usage with every counter unknown.
 */
export function emptyUsage(): LanguageModelUsage {
  return addUsage({}, {});
}

/**
 * Per-counter sum of two usage reports. A counter stays undefined only when
 * both sides leave it undefined.
 */
export function addUsage(
  total: Partial<LanguageModelUsage>,
  next: Partial<LanguageModelUsage>,
): LanguageModelUsage {
  const input = [total.inputTokenDetails, next.inputTokenDetails] as const;
  const output = [total.outputTokenDetails, next.outputTokenDetails] as const;
  return {
    inputTokens: sumTokens(total.inputTokens, next.inputTokens),
    inputTokenDetails: {
      noCacheTokens: sumTokens(input[0]?.noCacheTokens, input[1]?.noCacheTokens),
      cacheReadTokens: sumTokens(input[0]?.cacheReadTokens, input[1]?.cacheReadTokens),
      cacheWriteTokens: sumTokens(input[0]?.cacheWriteTokens, input[1]?.cacheWriteTokens),
    },
    outputTokens: sumTokens(total.outputTokens, next.outputTokens),
    outputTokenDetails: {
      textTokens: sumTokens(output[0]?.textTokens, output[1]?.textTokens),
      reasoningTokens: sumTokens(output[0]?.reasoningTokens, output[1]?.reasoningTokens),
    },
    totalTokens: sumTokens(total.totalTokens, next.totalTokens),
  };
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Sends single-message prompts to a chat-completion model.
 */
export class CompletionClient implements CompletionSource {
  private readonly settings: CompletionClientSettings;
  private usage: LanguageModelUsage = emptyUsage();

  constructor(settings: CompletionClientSettings) {
    this.settings = settings;
  }

  /**
   * Build a client for an OpenAI-compatible endpoint described by a profile.
   */
  static fromProfile(profile: ModelProfile, options: CompletionClientOptions = {}): CompletionClient {
    const provider = createOpenAICompatible({
      name: profile.name,
      baseURL: toBaseUrl(profile.apiUrl),
      apiKey: profile.apiKey,
    });
    return new CompletionClient({
      ...options,
      model: provider.chatModel(profile.modelName),
      modelId: profile.modelName,
    });
  }

  get modelId(): string {
    return this.settings.modelId;
  }

  /**
   * Token usage summed over every successful request.
   */
  get totalUsage(): LanguageModelUsage {
    return this.usage;
  }

  /**
   * Send one user message and return the fence-stripped reply.
   * No retries: every failure surfaces as a CompletionError.
   */
  async send(prompt: string): Promise<string> {
    const timeoutMs = this.settings.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

    let text: string;
    try {
      const result = await generateText({
        model: this.settings.model,
        messages: [{ role: 'user', content: prompt }],
        maxOutputTokens: this.settings.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(timeoutMs),
      });
      this.usage = addUsage(this.usage, result.usage);
      text = result.text;
    } catch (error) {
      if (isTimeout(error)) {
        throw new CompletionError(
          `Error calling LLM API: request timed out after ${timeoutMs / 1000} seconds`,
          true,
          { cause: error },
        );
      }
      throw new CompletionError(`Error calling LLM API: ${errorMessage(error)}`, false, {
        cause: error,
      });
    }

    if (!text.trim()) {
      throw new CompletionError('Unexpected API response format: empty completion');
    }

    return stripCodeFences(text);
  }
}
