import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import path from 'path';
import { z } from 'zod';
import { MODEL_CHOICES } from '../../core/entities/Model.js';
import { toSessionView } from '../../core/entities/Session.js';
import { ModelInvocationError, SessionNotFoundError, TurnInProgressError } from '../../core/errors.js';
import type { SessionService } from '../../application/services/SessionService.js';
import type { HumanizerService } from '../../application/services/HumanizerService.js';

const CreateSessionBody = z.object({
  model: z.enum(MODEL_CHOICES).optional(),
});

const SelectModelBody = z.object({
  model: z.enum(MODEL_CHOICES),
});

const TurnBody = z.object({
  input: z.string(),
});

export type WebServerEvent =
  | { type: 'connected'; timestamp: string }
  | { type: 'conversation_updated'; sessionId: string; timestamp: string };

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();

  constructor(
    private sessionService: SessionService,
    private humanizerService: HumanizerService,
    private backendPort: number = 3001,
    private publicDir: string = path.join(__dirname, '../../../public')
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: '1mb' }));
    this.app.use(express.static(this.publicDir));
  }

  private setupRoutes(): void {
    // Serve main page
    this.app.get('/', (req: Request, res: Response) => {
      res.sendFile(path.join(this.publicDir, 'index.html'));
    });

    // API: Available models
    this.app.get('/api/models', (req: Request, res: Response) => {
      res.json({
        success: true,
        data: { models: MODEL_CHOICES, defaultModel: this.sessionService.getDefaultModel() },
      });
    });

    // API: Create a session
    this.app.post('/api/sessions', (req: Request, res: Response) => {
      const body = CreateSessionBody.safeParse(req.body ?? {});
      if (!body.success) {
        res.status(400).json({ success: false, error: this.describeIssues(body.error) });
        return;
      }
      const session = this.sessionService.createSession(body.data.model);
      res.status(201).json({ success: true, data: toSessionView(session) });
    });

    // API: List sessions
    this.app.get('/api/sessions', (req: Request, res: Response) => {
      res.json({ success: true, data: this.sessionService.listSessions() });
    });

    // API: Get one session transcript
    this.app.get('/api/sessions/:sessionId', (req: Request, res: Response) => {
      try {
        const session = this.sessionService.getSession(req.params.sessionId);
        res.json({ success: true, data: toSessionView(session) });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Change the model used for later turns
    this.app.put('/api/sessions/:sessionId/model', (req: Request, res: Response) => {
      const body = SelectModelBody.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ success: false, error: this.describeIssues(body.error) });
        return;
      }
      try {
        const session = this.sessionService.selectModel(req.params.sessionId, body.data.model);
        res.json({ success: true, data: toSessionView(session) });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: Run one turn (article first, refinements afterwards)
    this.app.post('/api/sessions/:sessionId/turns', async (req: Request, res: Response) => {
      const body = TurnBody.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ success: false, error: this.describeIssues(body.error) });
        return;
      }

      const { sessionId } = req.params;
      try {
        const session = this.sessionService.getSession(sessionId);
        const pending = this.humanizerService.submit(session, body.data.input);
        // Refinements record the follow-up before the model answers
        if (!session.conversation.isEmpty()) {
          this.notifyConversationUpdate(sessionId);
        }
        const outcome = await pending;

        if (outcome.status === 'rejected') {
          res.status(422).json({ success: false, warning: outcome.warning, data: toSessionView(session) });
          return;
        }

        this.notifyConversationUpdate(sessionId);
        res.json({
          success: true,
          data: {
            mode: outcome.mode,
            rawFallback: outcome.rawFallback,
            session: toSessionView(session),
          },
        });
      } catch (error) {
        if (error instanceof ModelInvocationError) {
          this.notifyConversationUpdate(sessionId);
        }
        this.sendError(res, error);
      }
    });
  }

  /**
   * Body-parser failures (malformed JSON, oversized bodies) answer in the same
   * JSON shape as the routes
   */
  private setupErrorHandling(): void {
    this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }

      const status =
        typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
          ? error.status
          : 500;

      if (status === 400) {
        res.status(400).json({ success: false, error: 'Invalid JSON body' });
      } else if (status === 413) {
        res.status(413).json({ success: false, error: 'Request body too large' });
      } else if (status > 400 && status < 500) {
        res.status(status).json({ success: false, error: error instanceof Error ? error.message : 'Bad request' });
      } else {
        this.sendError(res, error);
      }
    });
  }

  private describeIssues(error: z.ZodError): string {
    return error.errors.map((err) => `${err.path.join('.') || 'body'}: ${err.message}`).join('; ');
  }

  private sendError(res: Response, error: unknown): void {
    if (error instanceof SessionNotFoundError) {
      res.status(404).json({ success: false, error: error.message });
    } else if (error instanceof TurnInProgressError) {
      res.status(409).json({ success: false, error: error.message });
    } else if (error instanceof ModelInvocationError) {
      res.status(502).json({ success: false, error: 'Model request failed' });
    } else {
      console.error('[WebServer] Unexpected error:', error);
      res.status(500).json({
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      this.clients.add(ws);

      ws.on('close', () => {
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        console.error('[WebServer] WebSocket error:', error);
        this.clients.delete(ws);
      });

      // Send initial connection confirmation
      this.send(ws, { type: 'connected', timestamp: new Date().toISOString() });
    });
  }

  private send(ws: WebSocket, event: WebServerEvent): void {
    ws.send(JSON.stringify(event));
  }

  public broadcast(event: WebServerEvent): void {
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        this.send(client, event);
      }
    });
  }

  public notifyConversationUpdate(sessionId: string): void {
    this.broadcast({
      type: 'conversation_updated',
      sessionId,
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Port actually bound, which differs from the configured one when it is 0
   */
  public getPort(): number | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  public isRunning(): boolean {
    return this.httpServer !== null;
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.backendPort, () => {
        console.error(`[WebServer] Humanizer UI available at http://localhost:${this.getPort()}`);
        this.setupWebSocket();
        resolve();
      });

      server.on('error', (error) => {
        console.error('[WebServer] Server error:', error);
        reject(error);
      });

      this.httpServer = server;
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      // Close all WebSocket connections
      this.clients.forEach((client) => {
        client.close();
      });
      this.clients.clear();

      if (this.wss) {
        this.wss.close();
        this.wss = null;
      }

      if (this.httpServer) {
        this.httpServer.close(() => {
          this.httpServer = null;
          resolve();
        });
      } else {
        resolve();
      }
    });
  }
}
