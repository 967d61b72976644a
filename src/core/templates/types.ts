/**
 * Chat message format sent to the completion endpoint
 */
export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

/**
 * The two prompt parts of a single humanizer request
 */
export interface AssembledPrompt {
  system: string;
  user: string;
}

/**
 * Abstract interface for prompt templates
 */
export interface PromptTemplate {
  /**
   * Build the system and user prompt for one request
   * @param text - Text to rewrite, appended unmodified
   * @param instructions - Optional extra instructions; ignored when blank
   */
  assemble(text: string, instructions?: string): AssembledPrompt;

  /**
   * Order an assembled prompt as the message list the client sends
   */
  toMessages(prompt: AssembledPrompt): ChatMessage[];
}
