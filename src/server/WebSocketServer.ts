import { WebSocket, WebSocketServer as WSServer } from 'ws';
import { IncomingMessage, Server } from 'http';
import { randomUUID } from 'crypto';
import { MessageHandler, parseClientMessage } from './MessageHandler.js';
import { AuthService } from '../services/AuthService.js';
import { extractTicket } from '../middleware/auth.js';
import { WebSocketConfig } from '../config/index.js';

interface ClientState {
  clientId: string;
  isAlive: boolean;
}

export class WebSocketServerManager {
  private wss: WSServer | null = null;
  private pingInterval: NodeJS.Timeout | null = null;
  private clients: Map<WebSocket, ClientState> = new Map();

  constructor(
    private readonly handler: MessageHandler,
    private readonly auth: AuthService,
    private readonly config: WebSocketConfig
  ) {}

  initialize(server: Server): void {
    this.wss = new WSServer({ server, path: this.config.path });

    this.wss.on('connection', (ws: WebSocket, req: IncomingMessage) => {
      if (!this.isAuthorized(req)) {
        ws.close(4401, 'Unauthorized');
        return;
      }

      const state: ClientState = { clientId: randomUUID(), isAlive: true };
      this.clients.set(ws, state);

      console.log(`[WebSocket] Client connected: ${state.clientId}`);

      this.handler.handleConnection(ws, state.clientId);

      ws.on('pong', () => {
        state.isAlive = true;
      });

      ws.on('message', (data) => {
        const message = parseClientMessage(data.toString());
        if (!message) {
          ws.send(JSON.stringify({ type: 'error', message: 'Invalid message format' }));
          return;
        }
        this.handler.handleMessage(ws, message).catch((err) => {
          console.error(`[WebSocket] Failed to handle message from ${state.clientId}:`, err);
        });
      });

      ws.on('close', () => {
        console.log(`[WebSocket] Client disconnected: ${state.clientId}`);
        this.clients.delete(ws);
        this.handler.handleDisconnection(ws);
      });

      ws.on('error', (err) => {
        console.error(`[WebSocket] Error for ${state.clientId}:`, err);
      });
    });

    // Heartbeat to detect dead connections
    this.pingInterval = setInterval(() => {
      for (const [ws, state] of this.clients) {
        if (!state.isAlive) {
          ws.terminate();
          continue;
        }
        state.isAlive = false;
        ws.ping();
      }
    }, this.config.heartbeatInterval);

    this.wss.on('close', () => {
      if (this.pingInterval) {
        clearInterval(this.pingInterval);
        this.pingInterval = null;
      }
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.wss) {
        resolve();
        return;
      }
      for (const ws of this.clients.keys()) {
        ws.terminate();
      }
      this.wss.close((err) => (err ? reject(err) : resolve()));
      this.wss = null;
    });
  }

  getConnectionCount(): number {
    return this.clients.size;
  }

  private isAuthorized(req: IncomingMessage): boolean {
    if (!this.auth.isEnabled()) return true;

    // Connections present a socket ticket from POST /api/auth/ticket
    const ticket = extractTicket(req.url ?? '');
    if (!ticket) return false;

    try {
      this.auth.verify(ticket, 'socket');
      return true;
    } catch {
      return false;
    }
  }
}
