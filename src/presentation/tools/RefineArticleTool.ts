import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SessionService } from '../../application/services/SessionService.js';
import { HumanizerService } from '../../application/services/HumanizerService.js';

/**
 * Register the refine-article tool
 */
export function registerRefineArticleTool(
  server: McpServer,
  sessionService: SessionService,
  humanizerService: HumanizerService,
  notifyConversationUpdate?: (sessionId: string) => void
) {
  server.tool(
    'refine-article',
    'Rewrite the latest polished version of a session following new instructions (e.g. "make it shorter", "more formal")',
    {
      session_id: z.string().describe('Session ID returned by humanize-article'),
      instructions: z.string().describe('Follow-up instructions for the next revision'),
    },
    async ({ session_id, instructions }) => {
      try {
        const session = sessionService.getSession(session_id);

        // The follow-up stays in the transcript even when the model call fails
        const outcome = await humanizerService
          .refine(session, instructions)
          .finally(() => notifyConversationUpdate?.(session_id));

        if (outcome.status === 'rejected') {
          return {
            isError: true,
            content: [{ type: 'text', text: `⚠️ ${outcome.warning}` }],
          };
        }

        return {
          content: [
            {
              type: 'text',
              text: `# 🔁 Refined Article\n\n**Session ID**: \`${session_id}\`\n**Instructions**: ${instructions.trim()}\n\n${outcome.reply.content}`,
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error refining article: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );
}
