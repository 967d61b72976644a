import { AssembledPrompt, ChatMessage, PromptTemplate } from './types.js';

export const HUMANIZER_PERSONA =
  'You are a skilled editor. You polish articles to sound professional and human-like.';

export const HUMANIZER_BASE_PROMPT =
  'Your job is to act as a **professional humanizer and Grammarly-like editor**. ' +
  'Always fix grammar, spelling, and awkward phrasing. ' +
  'Make the text smooth, natural, and engaging while keeping the meaning unchanged. ' +
  'Do not add new facts.\n\n';

/**
 * Humanizer prompt template
 *
 * Format of the user message:
 * <base instructions>
 *
 * ⚡ Extra instructions: <instructions>      (only when non-blank)
 *
 * <text>
 */
export class HumanizerTemplate implements PromptTemplate {
  assemble(text: string, instructions: string = ''): AssembledPrompt {
    let prompt = HUMANIZER_BASE_PROMPT;

    const extra = instructions.trim();
    if (extra) {
      prompt += `⚡ Extra instructions: ${extra}\n\n`;
    }

    return {
      system: HUMANIZER_PERSONA,
      user: prompt + text,
    };
  }

  toMessages(prompt: AssembledPrompt): ChatMessage[] {
    return [
      { role: 'system', content: prompt.system },
      { role: 'user', content: prompt.user },
    ];
  }
}
