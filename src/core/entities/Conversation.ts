/**
 * Conversation domain entity
 */
export type MessageRole = 'user' | 'assistant';

export type TurnMode = 'initial' | 'refinement';

export interface ConversationMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly model?: string;
  readonly createdAt: Date;
}

/**
 * Transient value built for a single turn, never stored
 */
export interface TurnRequest {
  sourceText: string;
  instructions: string;
}

/**
 * Result of one turn: either refused before anything was sent,
 * or completed with the recorded assistant reply
 */
export type TurnOutcome =
  | {
      status: 'rejected';
      mode: TurnMode;
      warning: string;
    }
  | {
      status: 'completed';
      mode: TurnMode;
      request: TurnRequest;
      reply: ConversationMessage;
      rawFallback: boolean;
    };

export function createMessage(role: MessageRole, content: string, model?: string): ConversationMessage {
  return Object.freeze({
    role,
    content,
    ...(model !== undefined ? { model } : {}),
    createdAt: new Date(),
  });
}

/**
 * Append-only transcript of one session.
 * Alternation between user and assistant entries is not enforced.
 */
export class Conversation {
  private entries: ConversationMessage[] = [];

  append(message: ConversationMessage): void {
    this.entries.push(message);
  }

  /**
   * Assistant entries in append order, produced lazily
   */
  *assistantMessages(): Generator<ConversationMessage> {
    for (const message of this.entries) {
      if (message.role === 'assistant') {
        yield message;
      }
    }
  }

  latestAssistantMessage(): ConversationMessage | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i].role === 'assistant') {
        return this.entries[i];
      }
    }
    return undefined;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  get length(): number {
    return this.entries.length;
  }

  messages(): readonly ConversationMessage[] {
    return [...this.entries];
  }
}
