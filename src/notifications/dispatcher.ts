import { randomUUID } from 'crypto';
import { errorMessage } from '../errors.js';
import { buildAlertMessage, type AlertMessage } from './message.js';
import type { ChannelSender } from './channels/types.js';
import type { StateStore } from '../store/state-store.js';
import type {
  ChannelDelivery,
  Decision,
  DispatchResult,
  NotificationRecord,
  PriceObservation,
  TrackedProduct,
} from '../types.js';

export type NotifyDecision = Extract<Decision, { kind: 'notify' }>;

export interface NotificationDispatcherOptions {
  store: StateStore;
  /** Configured channels; subscribers without an address on a channel are skipped for it */
  channels: ChannelSender[];
  now?: () => Date;
}

interface DeliveryTask {
  sender: ChannelSender;
  recipient: string;
}

/**
 * Sends price drop alerts at most once per notification id.
 *
 * Claim, send, finalize: the id is claimed with a PENDING record through the
 * store's insert-if-absent, every channel/recipient is attempted on its own,
 * and the record is finalized SENT if anything got through, FAILED otherwise.
 * A FAILED record can be claimed again by a later run.
 */
export class NotificationDispatcher {
  private readonly now: () => Date;

  constructor(private readonly options: NotificationDispatcherOptions) {
    this.now = options.now ?? (() => new Date());
  }

  private tasksFor(product: TrackedProduct): DeliveryTask[] {
    const tasks: DeliveryTask[] = [];
    const seen = new Set<string>();
    for (const subscriber of product.subscribers) {
      for (const sender of this.options.channels) {
        const recipient = sender.recipientFor(subscriber)?.trim();
        const key = `${sender.channel}:${recipient}`;
        if (recipient && !seen.has(key)) {
          seen.add(key);
          tasks.push({ sender, recipient });
        }
      }
    }
    return tasks;
  }

  private async deliver(product: TrackedProduct, message: AlertMessage): Promise<ChannelDelivery[]> {
    const tasks = this.tasksFor(product);
    if (tasks.length === 0) {
      console.warn(`[dispatcher] ${product.productId} has no subscriber reachable on a configured channel`);
    }

    const settled = await Promise.allSettled(tasks.map(task => task.sender.send(task.recipient, message)));
    return settled.map((result, i): ChannelDelivery => {
      const { sender, recipient } = tasks[i];
      if (result.status === 'fulfilled') {
        return { channel: sender.channel, recipient, status: 'SENT' };
      }
      console.error(`[dispatcher] ${sender.channel} to ${recipient} failed: ${errorMessage(result.reason)}`);
      return { channel: sender.channel, recipient, status: 'FAILED', error: errorMessage(result.reason) };
    });
  }

  async dispatch(
    product: TrackedProduct,
    decision: NotifyDecision,
    observation?: PriceObservation
  ): Promise<DispatchResult> {
    // Built before claiming: a message that cannot be rendered must not leave a claim behind
    const message = buildAlertMessage({
      productName: product.name,
      oldPrice: decision.oldPrice,
      newPrice: decision.newPrice,
      currency: observation?.currency ?? product.currency,
      url: observation?.sourceUrl ?? product.url,
    });

    const claim: NotificationRecord = {
      notificationId: decision.notificationId,
      productId: product.productId,
      oldPrice: decision.oldPrice,
      newPrice: decision.newPrice,
      status: 'PENDING',
      claimToken: randomUUID(),
      claimedAt: this.now().toISOString(),
      deliveries: [],
    };

    const { store } = this.options;
    const claimed = await store.recordNotification(claim);
    if (claimed === 'AlreadyExists') {
      const existing = await store.getNotification(decision.notificationId);
      const existingStatus = existing?.status ?? null;
      console.log(`[dispatcher] ${decision.notificationId} already claimed (${existingStatus ?? 'gone'}), not sending`);
      return { kind: 'suppressed', reason: 'AlreadyExists', existingStatus };
    }

    let deliveries: ChannelDelivery[];
    try {
      deliveries = await this.deliver(product, message);
    } catch (error) {
      // Release the id for a later run instead of leaving it PENDING
      await store.finalizeNotification(claim.notificationId, claim.claimToken, { status: 'FAILED', deliveries: [] });
      throw error;
    }

    const delivered = deliveries.filter(d => d.status === 'SENT').length;
    const record = await store.finalizeNotification(claim.notificationId, claim.claimToken, {
      status: delivered > 0 ? 'SENT' : 'FAILED',
      deliveries,
      sentAt: delivered > 0 ? this.now().toISOString() : undefined,
    });

    if (delivered === 0) {
      return { kind: 'failed', record };
    }
    if (delivered < deliveries.length) {
      return { kind: 'partially-failed', record };
    }
    return { kind: 'sent', record };
  }
}
