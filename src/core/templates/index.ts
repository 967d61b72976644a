/**
 * Prompt templates for humanizer requests
 */
export type { PromptTemplate, AssembledPrompt, ChatMessage } from './types.js';
export { HumanizerTemplate, HUMANIZER_PERSONA, HUMANIZER_BASE_PROMPT } from './HumanizerTemplate.js';
