import { notificationIdFor, type NotificationKeyPolicy } from './notification-id.js';
import type { StateStore } from '../store/state-store.js';
import type { Decision, PriceObservation, TrackedProduct } from '../types.js';

export interface ChangeDetectorOptions extends NotificationKeyPolicy {
  /** Relative move above which a LOW confidence price is not trusted */
  volatilityThreshold: number;
}

/**
 * Decides whether an observation is a notify-worthy drop.
 *
 * Rules, first match wins:
 *   0. a price in another currency than the product's: suppress, not comparable
 *   1. LOW confidence and a move beyond the volatility threshold: suppress
 *   2. no drop and no target crossed: no-change
 *   3. a drop that stays above the target price: suppress
 *   4. an alert with this id was already sent: suppress as duplicate
 *   5. notify
 *
 * The duplicate lookup is the only I/O, and it is delegated to the store.
 */
export class ChangeDetector {
  constructor(
    private readonly store: Pick<StateStore, 'hasNotification'>,
    private readonly options: ChangeDetectorOptions
  ) {}

  async decide(product: TrackedProduct, observation: PriceObservation): Promise<Decision> {
    const last = product.lastKnownPrice;
    const observed = observation.observedPrice;
    const target = product.targetPrice;

    if (observation.currency.toUpperCase() !== product.currency.toUpperCase()) {
      return { kind: 'suppress', reason: 'CURRENCY_MISMATCH' };
    }

    if (observation.confidence === 'LOW' && last !== null && last > 0) {
      const move = Math.abs(observed - last) / last;
      if (move > this.options.volatilityThreshold) {
        return { kind: 'suppress', reason: 'LOW_CONFIDENCE' };
      }
    }

    const isDrop = last !== null && observed < last;
    const crossesTarget = target !== undefined && observed <= target && (last === null || last > target);

    if (!isDrop && !crossesTarget) {
      return { kind: 'no-change' };
    }
    if (target !== undefined && observed > target) {
      return { kind: 'suppress', reason: 'ABOVE_TARGET' };
    }

    const notificationId = notificationIdFor(product.productId, observed, new Date(observation.observedAt), this.options);
    if (await this.store.hasNotification(notificationId)) {
      return { kind: 'suppress', reason: 'DUPLICATE' };
    }

    return {
      kind: 'notify',
      oldPrice: last ?? target ?? observed,
      newPrice: observed,
      notificationId,
    };
  }
}
