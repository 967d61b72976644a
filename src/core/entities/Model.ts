/**
 * Model-related domain entities
 */
export const MODEL_CHOICES = [
  'llama-3.3-70b-versatile',
  'llama-3.1-8b-instant',
  'mixtral-8x7b-32768',
] as const;

export type ModelId = (typeof MODEL_CHOICES)[number];

export const DEFAULT_MODEL: ModelId = 'llama-3.1-8b-instant';

/**
 * Sampling temperature used for every humanizer request
 */
export const HUMANIZER_TEMPERATURE = 0.7;

export function isModelId(value: string): value is ModelId {
  return (MODEL_CHOICES as readonly string[]).includes(value);
}

/**
 * What a chat-completion call produced.
 * `raw` holds the serialized response when it carried no message content.
 */
export type CompletionResult =
  | {
      type: 'content';
      content: string;
    }
  | {
      type: 'raw';
      raw: string;
    };

export function completionText(result: CompletionResult): string {
  return result.type === 'content' ? result.content : result.raw;
}
