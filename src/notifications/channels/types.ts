import type { AlertMessage } from '../message.js';
import type { NotificationChannel, Subscriber } from '../../types.js';

/**
 * A delivery provider for one channel. `send` throws ChannelDeliveryError on failure.
 */
export interface ChannelSender {
  readonly channel: NotificationChannel;
  /** Address of the subscriber on this channel, if it has one */
  recipientFor(subscriber: Subscriber): string | undefined;
  send(recipient: string, message: AlertMessage): Promise<void>;
}
