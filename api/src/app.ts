import Fastify, { type FastifyServerOptions } from 'fastify';
import { AdmissionTracker } from './admission.js';
import { authPlugin } from './auth.js';
import { corsPlugin } from './cors.js';
import type { AppConfig } from './config.js';
import { createGuard, type Guard } from './guard.js';
import { requestLine } from './logger.js';
import type { Mailer } from './mailer.js';
import { messagingPlugin } from './messaging.js';
import { OtpIssuer } from './otp.js';
import type { AuditLog, ProfileRepository } from './profileRepo.js';
import { profilesPlugin } from './profiles.js';
import { responsePlugin, sendSuccess } from './respond.js';
import type { MessageSender } from './whatsapp.js';

export type AppDeps = {
  config: AppConfig;
  profiles: ProfileRepository;
  audit: AuditLog;
  mailer: Mailer;
  messenger: MessageSender;
  admission?: AdmissionTracker;
  otp?: OtpIssuer;
  now?: () => number;
};

export type Services = Required<Omit<AppDeps, 'now'>> & {
  guard: Guard;
  now: () => number;
};

export function buildServices(deps: AppDeps): Services {
  const now = deps.now ?? Date.now;
  const admission = deps.admission ?? new AdmissionTracker({ now });
  const otp =
    deps.otp ??
    new OtpIssuer({
      mailer: deps.mailer,
      expiryMinutes: deps.config.otpExpiryMinutes,
      deliveryTimeoutMs: deps.config.deliveryTimeoutMs,
      now
    });
  const guard = createGuard({
    admission,
    rateLimitPerMinute: deps.config.rateLimitPerMinute,
    jwtSecret: deps.config.jwtSecret,
    now
  });

  return {
    config: deps.config,
    profiles: deps.profiles,
    audit: deps.audit,
    mailer: deps.mailer,
    messenger: deps.messenger,
    admission,
    otp,
    guard,
    now
  };
}

export async function buildApp(deps: AppDeps, logger: FastifyServerOptions['logger'] = false) {
  const services = buildServices(deps);
  const startedAt = services.now();

  const app = Fastify({
    disableRequestLogging: true,
    logger,
    trustProxy: deps.config.trustProxy,
  });

  app.decorateRequest('identity', null);

  app.addHook('onResponse', async (req, reply) => {
    if (req.url !== '/health') req.log.info(requestLine(req.method, req.url, reply.statusCode, reply.elapsedTime));
  });

  await app.register(corsPlugin);
  await app.register(responsePlugin);

  app.get('/health', async (_req, reply) =>
    sendSuccess(reply, 'Service is healthy', {
      status: 'ok',
      version: '1.0.0',
      uptimeSeconds: Math.floor((services.now() - startedAt) / 1000),
    })
  );

  await app.register(authPlugin, { services });
  await app.register(profilesPlugin, { services });
  await app.register(messagingPlugin, { services });

  return { app, services };
}
