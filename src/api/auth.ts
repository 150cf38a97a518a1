import { FastifyInstance } from 'fastify';
import { AuthService } from '../services/AuthService.js';
import { readBearerToken } from '../middleware/auth.js';

interface SessionBody {
  password: string;
}

/** Routes reachable without a token */
export async function authRoutes(app: FastifyInstance, authService: AuthService) {
  // Exchange the operator password for a control token
  app.post<{ Body: SessionBody }>('/api/auth/session', {
    schema: {
      body: {
        type: 'object',
        required: ['password'],
        properties: {
          password: { type: 'string', minLength: 1 },
        },
      },
    },
  }, async (request, reply) => {
    if (!authService.isEnabled()) {
      reply.status(400);
      return { error: 'Authentication is disabled', code: 'AUTH_DISABLED' };
    }

    const issued = await authService.login(request.body.password);
    if (!issued) {
      reply.status(401);
      return { error: 'Invalid password', code: 'UNAUTHORIZED' };
    }

    reply.status(201);
    return issued;
  });

  // Lets the front end decide whether to show the password prompt
  app.get('/api/auth/status', async (request) => {
    if (!authService.isEnabled()) {
      return { enabled: false, authenticated: true };
    }
    const token = readBearerToken(request);
    let authenticated = false;
    if (token) {
      try {
        authService.verify(token, 'control');
        authenticated = true;
      } catch {
        authenticated = false;
      }
    }
    return { enabled: true, authenticated };
  });
}

/** Registered behind the control guard: a control token buys a short-lived socket ticket */
export async function ticketRoutes(app: FastifyInstance, authService: AuthService) {
  app.post('/api/auth/ticket', async (_request, reply) => {
    reply.status(201);
    return authService.issue('socket');
  });
}
