import { createOpenAI, OpenAIProvider } from '@ai-sdk/openai';
import { APICallError, generateText, LanguageModel } from 'ai';
import { GenerationRequest, GenerativeModel } from '../types';
import { ModelConfig } from './ConfigManager';
import { ModelUnavailableError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('OpenAIClient');

export function createOpenAIProvider(config: ModelConfig): OpenAIProvider {
  // A baseURL points the provider at any OpenAI-compatible endpoint
  if (config.baseURL) {
    return createOpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
    });
  }

  return createOpenAI({
    apiKey: config.apiKey,
  });
}

export function getModelFromProvider(provider: OpenAIProvider, modelName: string): LanguageModel {
  return provider(modelName);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * GenerativeModel backed by the `ai` SDK. Retries are left to the caller,
 * which owns the timeout for each attempt.
 */
export class OpenAIChatModel implements GenerativeModel {
  private model: LanguageModel;

  constructor(private config: ModelConfig) {
    this.model = getModelFromProvider(createOpenAIProvider(config), config.model);
  }

  async generate(request: GenerationRequest): Promise<string> {
    try {
      const result = await generateText({
        model: this.model,
        system: request.system,
        prompt: request.prompt,
        temperature: request.temperature ?? this.config.temperature,
        maxTokens: request.maxTokens,
        stopSequences: request.stopSequences,
        abortSignal: request.abortSignal,
        maxRetries: 0,
      });
      logger.debug(`${this.config.model} answered`, { finishReason: result.finishReason, usage: result.usage });
      return result.text;
    } catch (error) {
      if (isAbortError(error)) throw error;
      if (APICallError.isInstance(error)) {
        throw new ModelUnavailableError(
          `Model endpoint returned ${error.statusCode ?? 'no status'}: ${error.message}`,
          error,
        );
      }
      throw new ModelUnavailableError(
        `Model call failed: ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    }
  }
}
