/**
 * Callback sink HTTP server
 *
 * Endpoints:
 * - POST / and PUT /   record a request (transcripts arrive here)
 * - GET /              list recorded requests, newest first
 * - GET /transcripts   latest transcript per job
 * - GET /transcripts/:jobId
 * - GET /health
 *
 * With an auth token configured, every endpoint except /health requires
 * `Authorization: Bearer <token>`.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import type { QueryArgs, RequestStore } from './store.js';

export interface SinkServerOptions {
  authToken?: string;
  logger?: boolean;
  now?: () => Date;
}

export function parseBearerToken(headerValue: string | undefined): string | null {
  if (!headerValue) return null;

  const [scheme, token] = headerValue.split(/\s+/);
  if (!token || scheme?.toLowerCase() !== 'bearer') {
    return null;
  }

  return token.trim();
}

/**
 * Repeated query arguments arrive as arrays; single ones are unwrapped
 */
function flattenArgs(query: QueryArgs): QueryArgs {
  return Object.fromEntries(
    Object.entries(query).map(([name, value]) => [name, Array.isArray(value) && value.length === 1 ? value[0] : value])
  );
}

export function buildSinkServer(store: RequestStore, options: SinkServerOptions = {}): FastifyInstance {
  const server = Fastify({ logger: options.logger ?? true });
  const now = options.now ?? (() => new Date());

  // Bodies are recorded verbatim, whatever their content type
  server.removeAllContentTypeParsers();
  server.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  const { authToken } = options;
  if (authToken) {
    server.addHook('onRequest', async (request, reply) => {
      if (request.routeOptions.url === '/health') return;

      if (parseBearerToken(request.headers.authorization) !== authToken) {
        reply.code(403).type('text/plain').send('Not authorized');
        return reply;
      }
    });
  }

  server.get('/health', async () => {
    return { status: 'healthy' };
  });

  server.get('/', async () => {
    return store.listRequests();
  });

  server.get('/transcripts', async () => {
    return store.listTranscripts();
  });

  server.get<{ Params: { jobId: string } }>('/transcripts/:jobId', async (request, reply) => {
    const transcript = store.getTranscript(request.params.jobId);
    if (!transcript) {
      return reply.code(404).send({ error: `No transcript for job ${request.params.jobId}` });
    }
    return transcript;
  });

  server.route<{ Querystring: QueryArgs }>({
    method: ['POST', 'PUT'],
    url: '/',
    handler: async (request, reply) => {
      store.record({
        text: typeof request.body === 'string' ? request.body : '',
        args: flattenArgs(request.query),
        headers: request.headers,
        method: request.method,
        time: Math.floor(now().getTime() / 1000),
        remote_addr: request.ip,
      });

      return reply.type('text/plain').send('ok');
    },
  });

  return server;
}
