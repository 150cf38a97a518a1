import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { createServer, Server } from 'http';
import { WebSocketServerManager } from './WebSocketServer.js';
import { MessageHandler } from './MessageHandler.js';
import { AdbClient, adbClient } from '../services/AdbClient.js';
import { DeviceDiscoveryService, deviceDiscoveryService } from '../services/DeviceDiscoveryService.js';
import { MirrorSessionManager, mirrorSessionManager } from '../services/MirrorSessionManager.js';
import { AuthService, authService } from '../services/AuthService.js';
import { deviceRoutes } from '../api/devices.js';
import { mirrorRoutes } from '../api/mirror.js';
import { authRoutes, ticketRoutes } from '../api/auth.js';
import { createControlGuard } from '../middleware/auth.js';
import { getConfig } from '../config/index.js';
import { ErrorKind, isOrchestratorError } from '../utils/errors.js';

export interface AppServices {
  adb: AdbClient;
  discovery: DeviceDiscoveryService;
  mirror: MirrorSessionManager;
  auth: AuthService;
}

export interface CreateAppOptions {
  logger?: boolean;
  services?: Partial<AppServices>;
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  invalid_input: 400,
  not_running: 409,
  timeout: 504,
  command_failed: 502,
  parse: 502,
};

export function httpStatusFor(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export function resolveServices(overrides: Partial<AppServices> = {}): AppServices {
  return {
    adb: overrides.adb ?? adbClient,
    discovery: overrides.discovery ?? deviceDiscoveryService,
    mirror: overrides.mirror ?? mirrorSessionManager,
    auth: overrides.auth ?? authService,
  };
}

export async function createApp(options: CreateAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? true });
  const services = resolveServices(options.services);

  await app.register(cors, {
    origin: [
      'http://localhost:5173',
      'http://127.0.0.1:5173',
    ],
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true,
  });

  // Registered before any plugin scope so the scopes inherit it
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (isOrchestratorError(error)) {
      request.log.warn({ kind: error.kind, command: error.command }, error.message);
      reply.status(httpStatusFor(error.kind)).send({
        error: error.message,
        code: error.kind,
        command: error.command,
        stdout: error.stdout,
        stderr: error.stderr,
        exitCode: error.exitCode,
      });
      return;
    }

    if (error.validation) {
      reply.status(400).send({ error: error.message, code: 'invalid_input' });
      return;
    }

    app.log.error(error);
    reply.status(error.statusCode || 500).send({
      error: error.message || 'Internal Server Error',
      code: error.code || 'INTERNAL_ERROR',
    });
  });

  // Root endpoint
  app.get('/', async () => ({
    name: 'mirror-control',
    version: '1.0.0',
    endpoints: {
      health: '/health',
      devices: '/api/devices',
      mirror: '/api/mirror',
      auth: '/api/auth',
      websocket: getConfig().websocket.path,
    },
  }));

  // Health check endpoint
  app.get('/health', async () => ({ status: 'ok' }));

  await authRoutes(app, services.auth);

  // Everything that drives adb or scrcpy needs a control token when auth is on
  await app.register(async (scope) => {
    scope.addHook('preHandler', createControlGuard(services.auth));
    await ticketRoutes(scope, services.auth);
    await deviceRoutes(scope, services);
    await mirrorRoutes(scope, services.mirror);
  });

  return app;
}

export interface RunningServer {
  httpServer: Server;
  close(): Promise<void>;
}

export async function startServer(port: number = getConfig().server.port): Promise<RunningServer> {
  const config = getConfig();
  const services = resolveServices();
  const app = await createApp({ services });

  await app.ready();
  const httpServer = createServer((req, res) => {
    app.routing(req, res);
  });

  // Initialize WebSocket server
  const messageHandler = new MessageHandler(services);
  const webSocketServer = new WebSocketServerManager(messageHandler, services.auth, config.websocket);
  webSocketServer.initialize(httpServer);

  // Poll adb so connected clients see devices come and go
  if (config.discovery.enabled) {
    services.discovery.startPolling(config.discovery.pollInterval);
  }

  const close = async (): Promise<void> => {
    services.discovery.stopPolling();
    await services.mirror.shutdown();
    messageHandler.dispose();
    await webSocketServer.close();
    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()));
    });
    await app.close();
  };

  return new Promise<RunningServer>((resolve, reject) => {
    httpServer.on('error', reject);
    httpServer.listen(port, config.server.host, () => {
      console.log(`Server running on http://${config.server.host}:${port}`);
      console.log(`WebSocket server running on ws://${config.server.host}:${port}${config.websocket.path}`);
      resolve({ httpServer, close });
    });
  });
}
