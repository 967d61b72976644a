import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { MODEL_CHOICES } from '../../core/entities/Model.js';
import { SessionService } from '../../application/services/SessionService.js';
import { HumanizerService } from '../../application/services/HumanizerService.js';

/**
 * Register the humanize-article tool
 */
export function registerHumanizeArticleTool(
  server: McpServer,
  sessionService: SessionService,
  humanizerService: HumanizerService,
  debugLog: (message: string) => void,
  notifyConversationUpdate?: (sessionId: string) => void
) {
  server.tool(
    'humanize-article',
    'Polish an article: fix grammar, spelling and awkward phrasing and make it read naturally without changing its meaning. Starts a session that refine-article can continue.',
    {
      article: z.string().describe('The full article text to polish'),
      session_id: z
        .string()
        .optional()
        .describe('Optional ID for the new session. Must not already have history'),
      model: z
        .enum(MODEL_CHOICES)
        .optional()
        .describe('Groq model to use for this session'),
    },
    async ({ article, session_id, model }) => {
      try {
        if (session_id && sessionService.hasSession(session_id)) {
          const existing = sessionService.getSession(session_id);
          if (!existing.conversation.isEmpty()) {
            return {
              isError: true,
              content: [
                {
                  type: 'text',
                  text: `Session ${session_id} already has history. Use refine-article to continue it.`,
                },
              ],
            };
          }
        }

        const session = sessionService.getOrCreateSession(session_id, model);
        const outcome = await humanizerService.submitArticle(session, article);

        if (outcome.status === 'rejected') {
          return {
            isError: true,
            content: [
              {
                type: 'text',
                text: `⚠️ ${outcome.warning}\n\n**Session ID**: \`${session.sessionId}\``,
              },
            ],
          };
        }

        debugLog(`[HumanizeArticle] Session ${session.sessionId} polished with ${session.model}`);
        notifyConversationUpdate?.(session.sessionId);

        return {
          content: [
            {
              type: 'text',
              text: `# ✨ Polished Article

**Session ID**: \`${session.sessionId}\`
**Model**: ${outcome.reply.model ?? session.model}
(Use this session ID with refine-article to keep refining)

${outcome.reply.content}`,
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error polishing article: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );
}
