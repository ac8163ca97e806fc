import fp from 'fastify-plugin';
import type {
  FastifyBaseLogger,
  FastifyPluginAsync,
  FastifyTypeProviderDefault,
  RawServerDefault
} from 'fastify';
import { z } from 'zod';
import type { Services } from './app.js';
import { AppError } from './errors.js';
import { identityOf } from './identity.js';
import { parseInput, sendSuccess } from './respond.js';

const ProfileParams = z.object({ id: z.string().uuid('Profile id must be a UUID') });

export const profilesPlugin: FastifyPluginAsync<{ services: Services }> = fp<{ services: Services }, RawServerDefault, FastifyTypeProviderDefault, FastifyBaseLogger, FastifyPluginAsync<{ services: Services }>>(
  async (app, { services }) => {
    const { guard, profiles } = services;

    app.get(
      '/api/v1/me',
      guard.protect(async (req, reply) => {
        const who = identityOf(req);
        return sendSuccess(reply, 'Authenticated', { id: who.subjectId(), email: who.email(), role: who.role() });
      })
    );

    // Own profile, or any profile for admins.
    app.get(
      '/api/v1/profile/:id',
      guard.protect(async (req, reply, identity) => {
        const { id } = parseInput(ProfileParams, req.params);
        if (identity.role !== 'admin' && identity.subjectId !== id) {
          throw new AppError('Forbidden', 'You can only view your own profile');
        }
        const profile = await profiles.findById(id);
        if (!profile) throw new AppError('NotFound', 'Profile not found');
        return sendSuccess(reply, 'Profile retrieved', profile);
      })
    );
  },
  { name: 'profiles' }
);
