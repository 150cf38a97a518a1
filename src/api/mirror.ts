import { FastifyInstance } from 'fastify';
import { StartMirrorRequest } from '../types/Mirror.js';
import { MirrorSessionManager } from '../services/MirrorSessionManager.js';

const startMirrorSchema = {
  body: {
    type: 'object',
    properties: {
      deviceId: { type: 'string' },
      options: {
        type: 'object',
        properties: {
          bitRate: { type: 'string' },
          maxSize: { type: 'integer', minimum: 0 },
          maxFps: { type: 'integer', minimum: 0 },
          turnScreenOff: { type: 'boolean' },
          fullscreen: { type: 'boolean' },
          stayAwake: { type: 'boolean' },
          record: { type: 'string' },
          windowTitle: { type: 'string' },
          extraArgs: { type: 'array', items: { type: 'string' } },
        },
      },
    },
  },
};

export async function mirrorRoutes(app: FastifyInstance, mirror: MirrorSessionManager) {
  // Current session, plus how the previous one ended
  app.get('/api/mirror', async () => ({
    session: mirror.getStatus(),
    lastExit: mirror.getLastExit(),
  }));

  app.post<{ Body: StartMirrorRequest | undefined }>('/api/mirror', { schema: startMirrorSchema }, async (request, reply) => {
    const session = await mirror.start(request.body?.deviceId ?? '', request.body?.options ?? {});
    reply.status(201);
    return { session };
  });

  app.delete('/api/mirror', async (request, reply) => {
    await mirror.stop();
    return reply.status(204).send();
  });
}
