import { AppError } from './errors.js';
import logger from './logger.js';

export interface MessageSender {
  sendMessage(recipient: string, body: string): Promise<void>;
}

export type WhatsAppSettings = {
  apiUrl: string;
  token: string;
  phoneNumberId: string;
  timeoutMs: number;
};

// WhatsApp Cloud API text message sender.
export class WhatsAppSender implements MessageSender {
  constructor(private readonly settings: WhatsAppSettings) {}

  get enabled() {
    return Boolean(this.settings.token && this.settings.phoneNumberId);
  }

  async sendMessage(recipient: string, body: string) {
    if (!this.enabled) {
      throw new AppError('DeliveryFailed', 'WhatsApp messaging is not configured');
    }

    let res: Response;
    try {
      res = await fetch(`${this.settings.apiUrl}/${this.settings.phoneNumberId}/messages`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.settings.token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          messaging_product: 'whatsapp',
          to: recipient.replace(/[^\d]/g, ''),
          type: 'text',
          text: { body },
        }),
        signal: AbortSignal.timeout(this.settings.timeoutMs),
      });
    } catch (err) {
      logger.error('whatsapp', 'Request failed', { to: recipient, error: err instanceof Error ? err.message : String(err) });
      throw new AppError('DeliveryFailed', 'Failed to send WhatsApp message', { cause: err });
    }

    if (!res.ok) {
      logger.error('whatsapp', `API responded ${res.status}`, { to: recipient });
      throw new AppError('DeliveryFailed', 'Failed to send WhatsApp message');
    }
  }
}
