import { Conversation, ConversationMessage, TurnMode } from './Conversation.js';
import { ModelId } from './Model.js';

/**
 * One user's working session: its transcript and current model choice
 */
export interface HumanizerSession {
  sessionId: string;
  conversation: Conversation;
  model: ModelId;
  createdAt: Date;
  lastAccessed: Date;
  turnInFlight: boolean;
}

export type SessionMode = TurnMode;

export interface SessionView {
  sessionId: string;
  model: ModelId;
  mode: SessionMode;
  messages: Array<{
    role: ConversationMessage['role'];
    content: string;
    model?: string;
    createdAt: string;
  }>;
}

export interface SessionSummary {
  sessionId: string;
  model: ModelId;
  messageCount: number;
  lastAccessed: string;
}

export function sessionMode(session: HumanizerSession): SessionMode {
  return session.conversation.isEmpty() ? 'initial' : 'refinement';
}

export function toSessionView(session: HumanizerSession): SessionView {
  return {
    sessionId: session.sessionId,
    model: session.model,
    mode: sessionMode(session),
    messages: session.conversation.messages().map((msg) => ({
      role: msg.role,
      content: msg.content,
      ...(msg.model !== undefined ? { model: msg.model } : {}),
      createdAt: msg.createdAt.toISOString(),
    })),
  };
}
