/**
 * Email channel via Resend
 */

import { Resend } from 'resend';
import { ChannelDeliveryError, ConfigError, errorMessage } from '../../errors.js';
import type { AlertMessage } from '../message.js';
import type { Subscriber } from '../../types.js';
import type { ChannelSender } from './types.js';

/**
 * The part of the Resend client we use
 */
export interface EmailClient {
  emails: Pick<Resend['emails'], 'send'>;
}

export interface EmailChannelOptions {
  apiKey?: string;
  from: string;
  /** Injected client, for tests */
  client?: EmailClient;
}

export class EmailChannel implements ChannelSender {
  readonly channel = 'EMAIL';
  private client: EmailClient | null;

  constructor(private readonly options: EmailChannelOptions) {
    this.client = options.client ?? null;
  }

  private getClient(): EmailClient {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new ConfigError('RESEND_API_KEY environment variable is not set');
      }
      this.client = new Resend(this.options.apiKey);
    }
    return this.client;
  }

  recipientFor(subscriber: Subscriber): string | undefined {
    return subscriber.email;
  }

  async send(recipient: string, message: AlertMessage): Promise<void> {
    let result: Awaited<ReturnType<EmailClient['emails']['send']>>;
    try {
      result = await this.getClient().emails.send({
        from: this.options.from,
        to: recipient,
        subject: message.subject,
        html: message.html,
        text: message.text,
      });
    } catch (error) {
      throw new ChannelDeliveryError('EMAIL', `Email to ${recipient} failed: ${errorMessage(error)}`, { cause: error });
    }

    if (result.error) {
      throw new ChannelDeliveryError('EMAIL', `Email to ${recipient} failed: ${result.error.message}`);
    }
    console.log(`[email] Sent to ${recipient}: ${result.data?.id ?? 'no id'}`);
  }
}
