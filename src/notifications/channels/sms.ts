/**
 * SMS channel via the Twilio Messages REST API
 */

import { ChannelDeliveryError, ConfigError, errorMessage } from '../../errors.js';
import { DEFAULT_TIMEOUT_MS, postForm } from '../../utils/http.js';
import type { AlertMessage } from '../message.js';
import type { Subscriber } from '../../types.js';
import type { ChannelSender } from './types.js';

const TWILIO_API_BASE = 'https://api.twilio.com/2010-04-01';

/** Longest body we send; Twilio splits anything longer into segments */
const MAX_SMS_LENGTH = 320;

interface TwilioMessageResponse {
  sid?: string;
  status?: string;
}

export interface SmsChannelOptions {
  accountSid?: string;
  authToken?: string;
  fromNumber?: string;
  timeoutMs?: number;
}

export class SmsChannel implements ChannelSender {
  readonly channel = 'SMS';

  constructor(private readonly options: SmsChannelOptions) {}

  recipientFor(subscriber: Subscriber): string | undefined {
    return subscriber.phone;
  }

  async send(recipient: string, message: AlertMessage): Promise<void> {
    const { accountSid, authToken, fromNumber } = this.options;
    if (!accountSid || !authToken || !fromNumber) {
      throw new ConfigError('TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN and TWILIO_FROM_NUMBER must be set');
    }

    const auth = Buffer.from(`${accountSid}:${authToken}`).toString('base64');
    try {
      const response = await postForm<TwilioMessageResponse>(
        `${TWILIO_API_BASE}/Accounts/${encodeURIComponent(accountSid)}/Messages.json`,
        {
          To: recipient,
          From: fromNumber,
          Body: message.text.slice(0, MAX_SMS_LENGTH),
        },
        {
          headers: { Authorization: `Basic ${auth}` },
          timeoutMs: this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        }
      );
      console.log(`[sms] Sent to ${recipient}: ${response.sid ?? 'no sid'}`);
    } catch (error) {
      throw new ChannelDeliveryError('SMS', `SMS to ${recipient} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
