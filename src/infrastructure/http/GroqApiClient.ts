import fetch, { Response } from 'node-fetch';
import { z } from 'zod';
import { ILlmClient, ILlmClientFactory } from '../../core/interfaces/ILlmClient.js';
import { CompletionResult, ModelId } from '../../core/entities/Model.js';
import { ChatMessage } from '../../core/templates/types.js';
import { ModelInvocationError } from '../../core/errors.js';

export const DEFAULT_GROQ_API_URL = 'https://api.groq.com/openai/v1';
export const DEFAULT_REQUEST_TIMEOUT_MS = 60000;

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      })
    )
    .min(1),
});

/**
 * Groq chat-completion client (OpenAI-compatible /chat/completions endpoint)
 */
export class GroqApiClient implements ILlmClient {
  constructor(
    private apiUrl: string,
    private apiKey: string,
    private model: ModelId,
    private temperature: number,
    private timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS
  ) {}

  async invoke(messages: ChatMessage[]): Promise<CompletionResult> {
    const res = await this.post(messages);
    const body = await res.text();

    if (!res.ok) {
      throw new ModelInvocationError(
        `HTTP error! status: ${res.status} ${body.substring(0, 200)}`.trim(),
        this.model,
        res.status
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      throw new ModelInvocationError(
        `Malformed response from ${this.model}: ${body.substring(0, 200)}`,
        this.model,
        res.status
      );
    }

    const parsed = CompletionSchema.safeParse(data);
    if (parsed.success) {
      return { type: 'content', content: parsed.data.choices[0].message.content };
    }

    return { type: 'raw', raw: JSON.stringify(data) };
  }

  private async post(messages: ChatMessage[]): Promise<Response> {
    try {
      return await fetch(`${this.apiUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          temperature: this.temperature,
          stream: false,
        }),
        timeout: this.timeoutMs,
      });
    } catch (error) {
      throw new ModelInvocationError(
        `Request to ${this.model} failed: ${error instanceof Error ? error.message : String(error)}`,
        this.model
      );
    }
  }
}

/**
 * Creates Groq clients that share one endpoint and timeout
 */
export class GroqClientFactory implements ILlmClientFactory {
  constructor(
    private apiUrl: string = DEFAULT_GROQ_API_URL,
    private timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS
  ) {}

  create(model: ModelId, apiKey: string, temperature: number): GroqApiClient {
    return new GroqApiClient(this.apiUrl, apiKey, model, temperature, this.timeoutMs);
  }
}
