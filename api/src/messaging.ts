import fp from 'fastify-plugin';
import type {
  FastifyBaseLogger,
  FastifyPluginAsync,
  FastifyTypeProviderDefault,
  RawServerDefault
} from 'fastify';
import { z } from 'zod';
import type { Services } from './app.js';
import { parseInput, sendSuccess } from './respond.js';

const MailBody = z.object({
  to: z.string().trim().email('Recipient must be an email address'),
  subject: z.string().trim().min(1, 'Subject is required'),
  html: z.string().min(1, 'HTML body is required'),
  text: z.string().default('')
});

const WhatsAppBody = z.object({
  to: z.string().trim().regex(/^\+?\d{7,15}$/, 'Recipient must be a phone number'),
  body: z.string().min(1, 'Message body is required').max(4096, 'Message body is too long')
});

// Operator endpoints for sending ad-hoc notifications. Admin only.
export const messagingPlugin: FastifyPluginAsync<{ services: Services }> = fp<{ services: Services }, RawServerDefault, FastifyTypeProviderDefault, FastifyBaseLogger, FastifyPluginAsync<{ services: Services }>>(
  async (app, { services }) => {
    const { guard, mailer, messenger, audit } = services;

    app.post(
      '/api/v1/mailer/send',
      guard.protect(
        async (req, reply, identity) => {
          const body = parseInput(MailBody, req.body);
          await mailer.deliver(body.to, body.subject, body.html, body.text);
          await audit.record('mail_sent', { by: identity.subjectId });
          return sendSuccess(reply, 'Email sent');
        },
        { roles: ['admin'] }
      )
    );

    app.post(
      '/api/v1/whatsapp/send',
      guard.protect(
        async (req, reply, identity) => {
          const body = parseInput(WhatsAppBody, req.body);
          await messenger.sendMessage(body.to, body.body);
          await audit.record('whatsapp_sent', { by: identity.subjectId });
          return sendSuccess(reply, 'Message sent');
        },
        { roles: ['admin'] }
      )
    );
  },
  { name: 'messaging' }
);
