import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { ILlmClientFactory } from '../core/interfaces/ILlmClient.js';
import { GroqClientFactory } from '../infrastructure/http/GroqApiClient.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { SessionService } from '../application/services/SessionService.js';
import { HumanizerService } from '../application/services/HumanizerService.js';
import { HumanizerTemplate } from '../core/templates/HumanizerTemplate.js';
import { registerHumanizeArticleTool } from './tools/HumanizeArticleTool.js';
import { registerRefineArticleTool } from './tools/RefineArticleTool.js';
import { registerManageSessionTool } from './tools/ManageSessionTool.js';

/**
 * Main server class that wires the humanizer services to the web UI
 * and the MCP stdio transport
 */
export class McpServer {
  private server: BaseMcpServer | null = null;
  private sessionService: SessionService;
  private humanizerService: HumanizerService;
  private webServer: WebServer | null = null;
  private debugLog: (message: string) => void;

  constructor(
    private config: Config,
    clientFactory: ILlmClientFactory = new GroqClientFactory(config.groq.apiUrl, config.groq.timeoutMs)
  ) {
    // Initialize debug logger
    this.debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    // Initialize services
    this.sessionService = new SessionService(config.groq.defaultModel, config.server.sessionTimeoutMinutes);
    this.humanizerService = new HumanizerService(
      clientFactory,
      config.groq.apiKey,
      new HumanizerTemplate(),
      this.debugLog
    );

    // Initialize Web Server if enabled
    if (config.webUI.enabled) {
      this.webServer = new WebServer(
        this.sessionService,
        this.humanizerService,
        config.webUI.backendPort
      );
    }

    if (config.mcp.transport === 'stdio') {
      this.server = this.createServer();
    }
  }

  /**
   * Create an MCP server instance with every humanizer tool registered
   */
  createServer(): BaseMcpServer {
    const server = new BaseMcpServer({
      name: this.config.server.name,
      version: this.config.server.version,
    });

    const notifyConversationUpdate = (sessionId: string) => {
      this.notifyConversationUpdate(sessionId);
    };

    registerHumanizeArticleTool(
      server,
      this.sessionService,
      this.humanizerService,
      this.debugLog,
      notifyConversationUpdate
    );
    registerRefineArticleTool(server, this.sessionService, this.humanizerService, notifyConversationUpdate);
    registerManageSessionTool(server, this.sessionService);

    return server;
  }

  getSessionService(): SessionService {
    return this.sessionService;
  }

  /**
   * Start the web UI and the MCP transport
   */
  async start() {
    this.sessionService.startCleanup();

    if (this.webServer) {
      await this.webServer.start();
    }

    if (this.server) {
      const transport = new StdioServerTransport();

      // Add stdio error handling to prevent unexpected disconnections
      process.stdin.on('error', (error) => {
        console.error('⚠️ stdin error (non-fatal):', error.message);
      });

      process.stdout.on('error', (error) => {
        console.error('⚠️ stdout error (non-fatal):', error.message);
      });

      await this.server.connect(transport);
      console.error(`\n✅ Article Humanizer MCP server running on stdio`);
      this.debugLog('stdio transport connected successfully');
    }
  }

  /**
   * Graceful shutdown
   */
  async shutdown() {
    console.error('\n👋 Shutting down gracefully...');
    this.sessionService.stopCleanup();

    if (this.webServer) {
      await this.webServer.stop();
    }

    if (this.server) {
      await this.server.close();
    }
  }

  /**
   * Notify web UI of conversation updates
   */
  notifyConversationUpdate(sessionId: string) {
    if (this.webServer) {
      this.webServer.notifyConversationUpdate(sessionId);
    }
  }
}
