import { CompletionResult, ModelId } from '../entities/Model.js';
import { ChatMessage } from '../templates/types.js';

/**
 * Chat-completion client bound to one model and temperature
 */
export interface ILlmClient {
  /**
   * Send an ordered message list and return the model's reply.
   * Rejects on network, auth, quota or malformed-response failures.
   */
  invoke(messages: ChatMessage[]): Promise<CompletionResult>;
}

/**
 * Interface for creating bound completion clients
 */
export interface ILlmClientFactory {
  create(model: ModelId, apiKey: string, temperature: number): ILlmClient;
}
