import { ILlmClientFactory } from '../../core/interfaces/ILlmClient.js';
import {
  ConversationMessage,
  TurnOutcome,
  TurnRequest,
  createMessage,
} from '../../core/entities/Conversation.js';
import { CompletionResult, HUMANIZER_TEMPERATURE, ModelId, completionText } from '../../core/entities/Model.js';
import { HumanizerSession } from '../../core/entities/Session.js';
import { TurnInProgressError } from '../../core/errors.js';
import { HumanizerTemplate } from '../../core/templates/HumanizerTemplate.js';
import { PromptTemplate } from '../../core/templates/types.js';

export const EMPTY_ARTICLE_WARNING = 'Please paste your article before running.';
export const EMPTY_INSTRUCTIONS_WARNING = 'Please enter refinement instructions.';

/**
 * Runs humanizer turns against a session's conversation.
 *
 * An empty conversation takes the pasted article (initial mode); afterwards
 * every input is a follow-up instruction applied to the latest reply
 * (refinement mode). Model failures are logged and rethrown to the caller.
 */
export class HumanizerService {
  constructor(
    private clientFactory: ILlmClientFactory,
    private apiKey: string,
    private template: PromptTemplate = new HumanizerTemplate(),
    private debugLog: (message: string) => void = () => {}
  ) {}

  /**
   * Run one turn in whichever mode the session is in
   */
  async submit(session: HumanizerSession, input: string): Promise<TurnOutcome> {
    return session.conversation.isEmpty()
      ? this.submitArticle(session, input)
      : this.refine(session, input);
  }

  /**
   * Initial mode: humanize a pasted article.
   * Both messages are appended only once the model has replied.
   */
  async submitArticle(session: HumanizerSession, article: string): Promise<TurnOutcome> {
    if (!article.trim()) {
      return { status: 'rejected', mode: 'initial', warning: EMPTY_ARTICLE_WARNING };
    }

    return this.runExclusive(session, async () => {
      const model = session.model;
      const request: TurnRequest = { sourceText: article, instructions: '' };
      const result = await this.complete(session.sessionId, model, request);

      session.conversation.append(createMessage('user', article));
      const reply = this.recordReply(session, result, model);

      return { status: 'completed', mode: 'initial', request, reply, rawFallback: result.type === 'raw' };
    });
  }

  /**
   * Refinement mode: rewrite the latest reply following new instructions.
   * The follow-up is appended before the call, so a failed call leaves it
   * in the transcript without an answer.
   */
  async refine(session: HumanizerSession, followUp: string): Promise<TurnOutcome> {
    if (!followUp.trim()) {
      return { status: 'rejected', mode: 'refinement', warning: EMPTY_INSTRUCTIONS_WARNING };
    }

    return this.runExclusive(session, async () => {
      const model = session.model;
      session.conversation.append(createMessage('user', followUp));

      const latest = session.conversation.latestAssistantMessage();
      const request: TurnRequest = {
        sourceText: latest ? latest.content : followUp,
        instructions: followUp,
      };
      const result = await this.complete(session.sessionId, model, request);
      const reply = this.recordReply(session, result, model);

      return { status: 'completed', mode: 'refinement', request, reply, rawFallback: result.type === 'raw' };
    });
  }

  private async runExclusive(
    session: HumanizerSession,
    turn: () => Promise<TurnOutcome>
  ): Promise<TurnOutcome> {
    if (session.turnInFlight) {
      throw new TurnInProgressError(session.sessionId);
    }

    session.turnInFlight = true;
    try {
      return await turn();
    } finally {
      session.turnInFlight = false;
      session.lastAccessed = new Date();
    }
  }

  private async complete(
    sessionId: string,
    model: ModelId,
    request: TurnRequest
  ): Promise<CompletionResult> {
    const client = this.clientFactory.create(model, this.apiKey, HUMANIZER_TEMPERATURE);
    const prompt = this.template.assemble(request.sourceText, request.instructions);

    this.debugLog(
      `[Humanizer] Session ${sessionId}: sending ${request.sourceText.length} chars to ${model}` +
        (request.instructions ? ` with instructions "${request.instructions.substring(0, 50)}"` : '')
    );

    try {
      const result = await client.invoke(this.template.toMessages(prompt));
      if (result.type === 'raw') {
        console.error(`⚠️ ${model} returned no message content; showing the raw response`);
      }
      return result;
    } catch (error) {
      console.error(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          session: sessionId,
          model,
          error: error instanceof Error ? error.message : String(error),
          severity: 'HIGH',
        })
      );
      throw error;
    }
  }

  private recordReply(
    session: HumanizerSession,
    result: CompletionResult,
    model: ModelId
  ): ConversationMessage {
    const reply = createMessage('assistant', completionText(result), model);
    session.conversation.append(reply);
    return reply;
  }
}
