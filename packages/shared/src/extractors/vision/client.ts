/**
 * Vision Model Client
 *
 * Sends rendered page images plus the instruction prompt to a vision-capable
 * chat model and returns the raw text answer. One attempt per call: the
 * OpenAI SDK's automatic retries are disabled, and a timeout is a failure.
 */

import OpenAI from 'openai';
import type { ChatCompletionContentPart } from 'openai/resources/chat/completions';
import { config } from '../../config';
import { logger } from '../../logger';
import { visionRequestDurationHistogram, visionRequestsCounter } from '../../metrics';

export interface VisionRequest {
  /** PNG page images, in page order */
  images: Buffer[];
  systemPrompt: string;
  userPrompt: string;
}

export interface VisionResponse {
  /** Free text; expected, not guaranteed, to hold one JSON object */
  text: string;
  requestId: string;
  model: string;
}

export interface VisionModelClient {
  readonly model: string;
  /** False when no credential is available; callers then skip the request */
  isConfigured(): boolean;
  /**
   * @throws Error when the request fails or times out
   */
  complete(request: VisionRequest): Promise<VisionResponse>;
}

export interface OpenAIVisionClientOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  maxTokens?: number;
}

export class OpenAIVisionClient implements VisionModelClient {
  readonly model: string;
  private readonly maxTokens: number;
  private readonly client: OpenAI | null;

  constructor(options: OpenAIVisionClientOptions = {}) {
    const apiKey = options.apiKey ?? config.openaiApiKey;
    this.model = options.model ?? config.llmModelVision;
    this.maxTokens = options.maxTokens ?? config.llmMaxTokens;
    this.client = apiKey
      ? new OpenAI({
          apiKey,
          timeout: options.timeoutMs ?? config.llmRequestTimeoutMs,
          maxRetries: 0,
        })
      : null;
  }

  isConfigured(): boolean {
    return this.client !== null;
  }

  async complete(request: VisionRequest): Promise<VisionResponse> {
    if (!this.client) {
      throw new Error('Vision model client is not configured (OPENAI_API_KEY is empty)');
    }

    const content: ChatCompletionContentPart[] = [
      { type: 'text', text: request.userPrompt },
      ...request.images.map(
        (png): ChatCompletionContentPart => ({
          type: 'image_url',
          image_url: { url: `data:image/png;base64,${png.toString('base64')}`, detail: 'high' },
        })
      ),
    ];

    logger.info('Sending vision request', {
      model: this.model,
      image_count: request.images.length,
    });

    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        temperature: 0,
        max_tokens: this.maxTokens,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content },
        ],
      });

      const duration = (Date.now() - startTime) / 1000;
      visionRequestDurationHistogram.observe({ model: this.model }, duration);
      visionRequestsCounter.inc({ model: this.model, status: 'success' });

      const choice = response.choices[0];
      logger.info('Vision response received', {
        model: this.model,
        request_id: response.id,
        finish_reason: choice?.finish_reason,
        duration_seconds: duration,
      });

      return {
        text: choice?.message?.content ?? '',
        requestId: response.id,
        model: this.model,
      };
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      visionRequestDurationHistogram.observe({ model: this.model }, duration);
      visionRequestsCounter.inc({ model: this.model, status: 'error' });

      logger.error('Vision request failed', error, { model: this.model });
      throw error;
    }
  }
}
