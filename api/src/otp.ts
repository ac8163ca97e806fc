import { AppError } from './errors.js';
import { KeyedMutex } from './keyedMutex.js';
import logger from './logger.js';
import type { Mailer } from './mailer.js';
import { assertTemplate, defaultTemplate, renderMessage } from './otpTemplates.js';
import { generateNumericCode, normalizeEmail, safeEqual } from './security.js';
import {
  MemoryOtpStore,
  type OtpPurpose,
  type OtpRecord,
  type OtpStore,
  type OtpTemplate
} from './store.js';

const MINUTE_MS = 60_000;

export type VerificationResult = 'Valid' | 'Expired' | 'Invalid' | 'NotFound';

export type DeliveryOutcome = { status: 'sent' } | { status: 'failed'; error: AppError };

export type IssueResult = {
  code: string;
  record: OtpRecord;
  delivery: DeliveryOutcome;
};

export type OtpIssuerOptions = {
  mailer: Mailer;
  expiryMinutes: Record<OtpPurpose, number>;
  deliveryTimeoutMs: number;
  store?: OtpStore;
  now?: () => number;
  generateCode?: () => string;
};

function recordKey(email: string, purpose: OtpPurpose) {
  return `${purpose}:${email}`;
}

function withTimeout<T>(work: Promise<T>, ms: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new AppError('DeliveryFailed', message)), ms);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Issues and checks one-time codes scoped to an (email, purpose) pair.
 *
 * At most one record is active per pair: issuing again replaces the previous record, so an
 * older code can never verify. Records are kept in process memory only.
 */
export class OtpIssuer {
  private readonly store: OtpStore;
  private readonly now: () => number;
  private readonly generateCode: () => string;
  private readonly locks = new KeyedMutex();

  constructor(private readonly opts: OtpIssuerOptions) {
    this.store = opts.store ?? new MemoryOtpStore();
    this.now = opts.now ?? Date.now;
    this.generateCode = opts.generateCode ?? (() => generateNumericCode(6));
  }

  expiryMs(purpose: OtpPurpose) {
    return this.opts.expiryMinutes[purpose] * MINUTE_MS;
  }

  issue(email: string, purpose: OtpPurpose): Promise<IssueResult> {
    return this.issueRecord(email, purpose, defaultTemplate(purpose));
  }

  async issueWithTemplate(
    email: string,
    purpose: OtpPurpose,
    subject: string,
    htmlTemplate: string,
    textTemplate: string
  ): Promise<IssueResult> {
    const template = { subject, html: htmlTemplate, text: textTemplate };
    assertTemplate(template);
    return this.issueRecord(email, purpose, template);
  }

  /**
   * Re-delivers an already issued code without generating a new one. The record keeps its
   * original expiry. When `code` is given it must match the active record.
   */
  async resend(email: string, purpose: OtpPurpose, code?: string): Promise<OtpRecord> {
    const normalized = normalizeEmail(email);
    const record = await this.locks.run(recordKey(normalized, purpose), () => {
      const current = this.store.get(recordKey(normalized, purpose));
      if (!current || this.now() > current.expiresAt) return undefined;
      if (code !== undefined && !safeEqual(current.code, code)) return undefined;
      return current;
    });

    if (!record) {
      throw new AppError('NoActiveRecord', 'No active verification code for this email');
    }

    await this.deliver(record);
    logger.info('otp', 'Code re-sent', { purpose, email: normalized });
    return record;
  }

  async verify(email: string, purpose: OtpPurpose, presentedCode: string): Promise<VerificationResult> {
    const normalized = normalizeEmail(email);
    const key = recordKey(normalized, purpose);

    const result = await this.locks.run(key, (): VerificationResult => {
      const record = this.store.get(key);
      if (!record) return 'NotFound';

      if (this.now() > record.expiresAt) {
        this.store.delete(key);
        return 'Expired';
      }
      if (!safeEqual(record.code, presentedCode.trim())) return 'Invalid';

      this.store.delete(key);
      return 'Valid';
    });

    if (result !== 'Valid') logger.warn('otp', `Verification ${result.toLowerCase()}`, { purpose, email: normalized });
    return result;
  }

  private async issueRecord(email: string, purpose: OtpPurpose, template: OtpTemplate): Promise<IssueResult> {
    const normalized = normalizeEmail(email);
    if (!normalized) throw new AppError('InvalidRequest', 'Email is required');

    const key = recordKey(normalized, purpose);
    const record = await this.locks.run(key, () => {
      const previous = this.store.get(key);
      let code = this.generateCode();
      // A replacement must never repeat the code it supersedes.
      while (previous && code === previous.code) code = this.generateCode();

      const issuedAt = this.now();
      const created: OtpRecord = {
        email: normalized,
        purpose,
        code,
        issuedAt,
        expiresAt: issuedAt + this.expiryMs(purpose),
        template
      };
      this.store.put(key, created);
      return created;
    });

    try {
      await this.deliver(record);
    } catch (err) {
      const error = err instanceof AppError ? err : new AppError('DeliveryFailed', 'Failed to deliver verification code', { cause: err });
      logger.warn('otp', 'Code stored but delivery failed', { purpose, email: normalized, error: error.message });
      return { code: record.code, record, delivery: { status: 'failed', error } };
    }

    logger.info('otp', 'Code issued', { purpose, email: normalized, expiresAt: new Date(record.expiresAt).toISOString() });
    return { code: record.code, record, delivery: { status: 'sent' } };
  }

  private deliver(record: OtpRecord) {
    const message = renderMessage(record.template, record.code, record.purpose);
    return withTimeout(
      this.opts.mailer.deliver(record.email, message.subject, message.html, message.text),
      this.opts.deliveryTimeoutMs,
      'Email delivery timed out'
    );
  }
}
