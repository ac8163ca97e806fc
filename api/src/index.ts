import { buildApp } from './app.js';
import { config } from './config.js';
import { closeDb, initDb } from './db.js';
import logger from './logger.js';
import { SmtpMailer } from './mailer.js';
import { PgAuditLog, PgProfileRepository } from './profileRepo.js';
import { WhatsAppSender } from './whatsapp.js';

const PRUNE_INTERVAL_MS = 5 * 60_000;

const pool = await initDb(config.databaseUrl);
logger.success('db', 'Database storage initialized');

const mailer = new SmtpMailer({ ...config.smtp, timeoutMs: config.deliveryTimeoutMs });
const messenger = new WhatsAppSender({ ...config.whatsapp, timeoutMs: config.deliveryTimeoutMs });
if (!messenger.enabled) logger.warn('whatsapp', 'WhatsApp credentials missing; messages will fail');

// Use pino-pretty for human-readable logs
const { app, services } = await buildApp(
  {
    config,
    profiles: new PgProfileRepository(pool),
    audit: new PgAuditLog(pool),
    mailer,
    messenger,
  },
  {
    level: process.env.LOG_LEVEL ?? 'info',
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        singleLine: true,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  }
);

const pruneTimer = setInterval(() => {
  services.admission
    .prune()
    .then((removed) => {
      if (removed > 0) logger.debug('admission', `Pruned ${removed} idle client buckets`);
    })
    .catch((err: unknown) => logger.error('admission', 'Prune failed', { error: err instanceof Error ? err.message : String(err) }));
}, PRUNE_INTERVAL_MS);
pruneTimer.unref();

async function shutdown(signal: string) {
  logger.info('api', `Shutdown signal received (${signal})`);
  clearInterval(pruneTimer);
  try {
    await app.close();
    mailer.close();
    await closeDb();
    logger.success('api', 'Server exited cleanly');
    process.exit(0);
  } catch (err) {
    logger.error('api', 'Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  }
}

process.once('SIGINT', () => void shutdown('SIGINT'));
process.once('SIGTERM', () => void shutdown('SIGTERM'));

await app.listen({ port: config.port, host: config.host });
logger.success('api', `Server listening on ${config.host}:${config.port}`);
