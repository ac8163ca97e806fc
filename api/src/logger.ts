// Colored console logger for module-level messages. Request logs go through Fastify's pino logger.

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

type Level = 'debug' | 'info' | 'warn' | 'error';

const rank: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };
const thresholds = new Map<string, number>([...Object.entries(rank), ['silent', 100]]);

function threshold(): number {
  return thresholds.get((process.env.LOG_LEVEL ?? 'info').toLowerCase()) ?? rank.info;
}

const SENSITIVE_KEYS = new Set(['email', 'to', 'recipient', 'code', 'token', 'password', 'phone']);
const emailLike = /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/i;

export function redact(meta: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      out[key] = '[redacted]';
    } else if (typeof value === 'string' && emailLike.test(value)) {
      out[key] = '[redacted]';
    } else if (value instanceof Error) {
      out[key] = value.message;
    } else {
      out[key] = value;
    }
  }
  return out;
}

function timestamp() {
  return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

function formatMessage(label: string, color: string, prefix: string, msg: string, meta?: Record<string, unknown>) {
  const ts = `${colors.gray}${timestamp()}${colors.reset}`;
  const lvl = `${color}${label.padEnd(5)}${colors.reset}`;
  const pfx = `${colors.cyan}[${prefix}]${colors.reset}`;
  const metaStr = meta ? ` ${colors.dim}${JSON.stringify(redact(meta))}${colors.reset}` : '';
  return `${ts} ${lvl} ${pfx} ${msg}${metaStr}`;
}

function emit(level: Level, label: string, color: string, prefix: string, msg: string, meta?: Record<string, unknown>) {
  if (rank[level] < threshold()) return;
  const line = formatMessage(label, color, prefix, msg, meta);
  if (level === 'error') console.error(line);
  else console.log(line);
}

// One line per finished request, status tinted by class: `POST /v1/otp/verify -> 401 3.2ms`.
export function requestLine(method: string, url: string, status: number, elapsedMs: number) {
  const tint = status >= 500 ? colors.red : status >= 400 ? colors.yellow : colors.green;
  return `${colors.cyan}${method}${colors.reset} ${url} -> ${tint}${status}${colors.reset} ${colors.dim}${elapsedMs.toFixed(1)}ms${colors.reset}`;
}

export const logger = {
  info: (prefix: string, msg: string, meta?: Record<string, unknown>) => emit('info', 'INFO', colors.green, prefix, msg, meta),
  warn: (prefix: string, msg: string, meta?: Record<string, unknown>) => emit('warn', 'WARN', colors.yellow, prefix, msg, meta),
  error: (prefix: string, msg: string, meta?: Record<string, unknown>) => emit('error', 'ERROR', colors.red, prefix, msg, meta),
  debug: (prefix: string, msg: string, meta?: Record<string, unknown>) => emit('debug', 'DEBUG', colors.gray, prefix, msg, meta),
  success: (prefix: string, msg: string, meta?: Record<string, unknown>) =>
    emit('info', '✓', colors.green + colors.bright, prefix, msg, meta),
};

export default logger;
