import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { MODEL_CHOICES } from '../../core/entities/Model.js';
import { SessionService } from '../../application/services/SessionService.js';

/**
 * Register the manage-session tool
 */
export function registerManageSessionTool(server: McpServer, sessionService: SessionService) {
  server.tool(
    'manage-session',
    'Manage humanizer sessions - view a transcript, list sessions, or change the model used for later turns',
    {
      action: z
        .enum(['view', 'list', 'set-model'])
        .describe(
          "Action to perform: 'view' to see a transcript, 'list' to see all sessions, 'set-model' to switch models"
        ),
      session_id: z.string().optional().describe('Session ID (required for view and set-model)'),
      model: z
        .enum(MODEL_CHOICES)
        .optional()
        .describe('Model to use for later turns (set-model only)'),
    },
    async ({ action, session_id, model }) => {
      try {
        if (action === 'list') {
          const sessionList = sessionService
            .listSessions()
            .map((s) => `- **${s.sessionId}**: ${s.messageCount} messages (${s.model})`)
            .join('\n');

          return {
            content: [
              {
                type: 'text',
                text:
                  sessionList.length > 0
                    ? `# Humanizer Sessions\n\n${sessionList}`
                    : 'No humanizer sessions found.',
              },
            ],
          };
        }

        if (!session_id) {
          return {
            isError: true,
            content: [{ type: 'text', text: `session_id is required for '${action}'` }],
          };
        }

        if (action === 'set-model') {
          if (!model) {
            return {
              isError: true,
              content: [{ type: 'text', text: `model is required for 'set-model'` }],
            };
          }
          sessionService.selectModel(session_id, model);
          return {
            content: [{ type: 'text', text: `✓ Session ${session_id} now uses ${model}` }],
          };
        }

        const session = sessionService.getSession(session_id);
        const messages = session.conversation.messages();
        if (messages.length === 0) {
          return {
            content: [
              {
                type: 'text',
                text: `No messages yet in session ${session_id} (model: ${session.model})`,
              },
            ],
          };
        }

        const historyText = messages
          .map((msg, idx) => {
            const role = msg.role === 'user' ? '👤 User' : `🤖 Assistant (${msg.model ?? session.model})`;
            return `${idx + 1}. **${role}**\n${msg.content}\n`;
          })
          .join('\n---\n\n');

        return {
          content: [
            {
              type: 'text',
              text: `# Transcript for ${session_id}\n\n${historyText}`,
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Error managing session: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
        };
      }
    }
  );
}
