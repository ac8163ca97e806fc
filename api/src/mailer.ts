import nodemailer, { type Transporter } from 'nodemailer';
import { AppError } from './errors.js';
import logger from './logger.js';

export interface Mailer {
  deliver(recipient: string, subject: string, htmlBody: string, textBody: string): Promise<void>;
}

export type SmtpSettings = {
  host: string;
  port: number;
  username: string;
  password: string;
  from: string;
  timeoutMs: number;
};

export class SmtpMailer implements Mailer {
  private readonly transport: Transporter;

  constructor(private readonly settings: SmtpSettings) {
    this.transport = nodemailer.createTransport({
      host: settings.host,
      port: settings.port,
      secure: settings.port === 465,
      connectionTimeout: settings.timeoutMs,
      greetingTimeout: settings.timeoutMs,
      socketTimeout: settings.timeoutMs,
      auth: settings.username ? { user: settings.username, pass: settings.password } : undefined
    });
  }

  async deliver(recipient: string, subject: string, htmlBody: string, textBody: string) {
    try {
      await this.transport.sendMail({
        from: this.settings.from || this.settings.username,
        to: recipient,
        subject,
        html: htmlBody,
        text: textBody
      });
    } catch (err) {
      logger.error('mailer', 'SMTP delivery failed', { to: recipient, error: err instanceof Error ? err.message : String(err) });
      throw new AppError('DeliveryFailed', 'Failed to send email', { cause: err });
    }
  }

  close() {
    this.transport.close();
  }
}
