import { ClientMessage, ServerMessage } from '../types/Protocol.js';
import { DeviceDiscoveryService } from '../services/DeviceDiscoveryService.js';
import { MirrorSessionManager } from '../services/MirrorSessionManager.js';
import { isOrchestratorError } from '../utils/errors.js';
import { parseMirrorOptions } from '../utils/scrcpy.js';

/** The part of a ws socket the handler writes to */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
}

const OPEN = 1;

export interface MessageHandlerServices {
  discovery: DeviceDiscoveryService;
  mirror: MirrorSessionManager;
}

export class MessageHandler {
  private clients: Map<ClientSocket, string> = new Map();
  private readonly unsubscribers: Array<() => void> = [];

  constructor(private readonly services: MessageHandlerServices) {
    this.unsubscribers.push(
      services.discovery.onDevicesChange((devices) => {
        this.broadcastToAll({ type: 'devices', devices, error: null });
      }),
      services.mirror.onStateChange((session, exit) => {
        this.broadcastToAll({ type: 'mirror-session', session, exit });
      })
    );
  }

  handleConnection(ws: ClientSocket, clientId: string): void {
    this.clients.set(ws, clientId);

    this.sendDevices(ws);
    this.send(ws, { type: 'mirror-session', session: this.services.mirror.getStatus() });
  }

  handleDisconnection(ws: ClientSocket): void {
    this.clients.delete(ws);
  }

  async handleMessage(ws: ClientSocket, message: ClientMessage): Promise<void> {
    try {
      switch (message.type) {
        case 'list-devices':
          await this.services.discovery.refresh();
          this.sendDevices(ws);
          break;

        case 'mirror-status':
          this.send(ws, { type: 'mirror-session', session: this.services.mirror.getStatus() });
          break;

        case 'start-mirror':
          // State listeners broadcast the new session to every client
          await this.services.mirror.start(message.deviceId ?? '', message.options ?? {});
          break;

        case 'stop-mirror':
          await this.services.mirror.stop();
          break;
      }
    } catch (err) {
      if (isOrchestratorError(err)) {
        this.send(ws, { type: 'error', message: err.message, code: err.kind, error: err.toJSON() });
      } else {
        this.send(ws, { type: 'error', message: err instanceof Error ? err.message : String(err) });
      }
    }
  }

  getClientCount(): number {
    return this.clients.size;
  }

  dispose(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
    this.clients.clear();
  }

  private sendDevices(ws: ClientSocket): void {
    this.send(ws, {
      type: 'devices',
      devices: this.services.discovery.getDevices(),
      error: this.services.discovery.getLastError(),
    });
  }

  private send(ws: ClientSocket, message: ServerMessage): void {
    if (ws.readyState === OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  broadcastToAll(message: ServerMessage): void {
    for (const ws of this.clients.keys()) {
      this.send(ws, message);
    }
  }
}

/** Validates a raw frame from a client; null for anything unknown */
export function parseClientMessage(data: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed)) return null;

  switch (parsed.type) {
    case 'list-devices':
      return { type: 'list-devices' };
    case 'mirror-status':
      return { type: 'mirror-status' };
    case 'stop-mirror':
      return { type: 'stop-mirror' };
    case 'start-mirror': {
      const deviceId = 'deviceId' in parsed && typeof parsed.deviceId === 'string' ? parsed.deviceId : undefined;
      const options = 'options' in parsed ? parseMirrorOptions(parsed.options) : undefined;
      return { type: 'start-mirror', deviceId, options };
    }
    default:
      return null;
  }
}
