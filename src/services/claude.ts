/**
 * Claude API client used as the pipeline's LLM sampler
 */

import Anthropic from '@anthropic-ai/sdk';
import { LlmResponse, LlmSampler, SampleRequest } from '../types';
import { LlmSettings } from './config';
import { ErrorCode, SnapshotError, errorMessage, errorType } from './errors';
import { withRetry } from './retry';

const RETRY_DELAY_MS = 1000;
const RETRY_BACKOFF = 2;

export function classifyLlmError(err: unknown): ErrorCode {
  if (err instanceof Anthropic.AuthenticationError || err instanceof Anthropic.PermissionDeniedError) {
    return 'API_ERROR';
  }
  if (err instanceof Anthropic.RateLimitError) {
    return 'RATE_LIMIT';
  }
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return 'TIMEOUT';
  }

  const message = errorMessage(err).toLowerCase();
  if (message.includes('api_key') || message.includes('authentication')) return 'API_ERROR';
  if (message.includes('rate') || message.includes('limit')) return 'RATE_LIMIT';
  if (message.includes('timeout')) return 'TIMEOUT';
  return 'INTERNAL_ERROR';
}

export interface MessageRequest {
  model: string;
  max_tokens: number;
  temperature: number;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
}

/** The parts of an Anthropic message the sampler reads. */
export interface MessageReply {
  content: Array<{ type: string; text?: string }>;
  usage: { input_tokens: number; output_tokens: number };
  stop_reason: string | null;
}

export type CreateMessage = (request: MessageRequest) => Promise<MessageReply>;

export class ClaudeSampler implements LlmSampler {
  private readonly createMessage: CreateMessage;

  constructor(
    private readonly settings: LlmSettings,
    createMessage?: CreateMessage
  ) {
    if (createMessage) {
      this.createMessage = createMessage;
    } else {
      if (!settings.anthropicApiKey) {
        throw new Error('Missing ANTHROPIC_API_KEY environment variable');
      }
      // Retries are ours, not the SDK's
      const client = new Anthropic({
        apiKey: settings.anthropicApiKey,
        timeout: settings.timeoutSeconds * 1000,
        maxRetries: 0,
      });
      this.createMessage = (request) => client.messages.create(request);
    }
  }

  async sample(request: SampleRequest): Promise<LlmResponse> {
    const model = request.model ?? this.settings.model;
    const temperature = request.temperature ?? this.settings.temperature;
    const maxTokens = request.maxTokens ?? this.settings.maxTokensAnalysis;

    try {
      return await withRetry(() => this.send(request, model, temperature, maxTokens), {
        maxRetries: this.settings.maxRetries,
        delayMs: RETRY_DELAY_MS,
        backoff: RETRY_BACKOFF,
        label: 'Claude sampling',
      });
    } catch (err) {
      console.error(`[Claude] Sampling failed (${errorType(err)}):`, errorMessage(err));
      throw new SnapshotError(
        classifyLlmError(err),
        `LLM sampling failed: ${errorMessage(err)}`,
        { error: errorMessage(err) },
        { cause: err }
      );
    }
  }

  private async send(
    request: SampleRequest,
    model: string,
    temperature: number,
    maxTokens: number
  ): Promise<LlmResponse> {
    const response = await this.createMessage({
      model,
      max_tokens: maxTokens,
      temperature,
      system: request.systemPrompt,
      messages: [
        {
          role: 'user',
          content: request.prompt,
        },
      ],
    });

    const textBlock = response.content.find((block) => block.type === 'text');
    const content = textBlock?.text ?? '';

    console.log(
      `[Claude] ${model}: ${response.usage.input_tokens} in / ${response.usage.output_tokens} out, ${content.length} chars`
    );

    return {
      content,
      metadata: {
        model,
        tokens_used: {
          input: response.usage.input_tokens,
          output: response.usage.output_tokens,
        },
        finish_reason: response.stop_reason,
      },
    };
  }
}
