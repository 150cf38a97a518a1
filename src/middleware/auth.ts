import { FastifyReply, FastifyRequest } from 'fastify';
import { AuthService } from '../services/AuthService.js';

const BEARER = /^Bearer\s+(\S+)$/i;

export function readBearerToken(request: FastifyRequest): string | null {
  return BEARER.exec(request.headers.authorization ?? '')?.[1] ?? null;
}

function deny(reply: FastifyReply, error: string): FastifyReply {
  return reply.status(401).send({ error, code: 'UNAUTHORIZED' });
}

/**
 * preHandler for the routes that drive devices and sessions. Registered
 * inside their plugin scope, so public routes never see it.
 */
export function createControlGuard(service: AuthService) {
  return async function controlGuard(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
    if (!service.isEnabled()) return;

    const token = readBearerToken(request);
    if (!token) {
      return deny(reply, 'Missing or invalid authorization header');
    }

    try {
      service.verify(token, 'control');
    } catch {
      return deny(reply, 'Invalid or expired token');
    }
  };
}

/** The `ticket` query parameter of a WebSocket upgrade URL */
export function extractTicket(url: string): string | null {
  try {
    return new URL(url, 'http://localhost').searchParams.get('ticket');
  } catch {
    return null;
  }
}
