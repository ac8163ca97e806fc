import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';

const ALLOW_METHODS = 'GET, POST, PUT, DELETE, PATCH, OPTIONS';
const ALLOW_HEADERS = 'Content-Type, Authorization, X-Requested-With, Accept, Origin';

// Runs before routing and body parsing so error replies carry the headers too.
export const corsPlugin: FastifyPluginAsync = fp(
  async (app) => {
    app.addHook('onRequest', async (req, reply) => {
      reply
        .header('Access-Control-Allow-Origin', req.headers.origin ?? '*')
        .header('Access-Control-Allow-Methods', ALLOW_METHODS)
        .header('Access-Control-Allow-Headers', ALLOW_HEADERS)
        .header('Access-Control-Allow-Credentials', 'true')
        .header('Access-Control-Max-Age', '3600')
        .header('Access-Control-Expose-Headers', 'Content-Length, Content-Range, Retry-After')
        .header('Vary', 'Origin');

      if (req.method === 'OPTIONS') return reply.code(200).send();
    });
  },
  { name: 'cors' }
);
