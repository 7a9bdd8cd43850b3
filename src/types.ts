/**
 * A contact that wants to hear about price drops for a product.
 * At least one of email or phone is set.
 */
export interface Subscriber {
  email?: string;
  phone?: string;
}

/**
 * A product registered for price tracking
 */
export interface TrackedProduct {
  /** Stable unique identifier */
  productId: string;
  /** Display name used in alerts */
  name: string;
  /** Product page, if known */
  url?: string;
  /** Free-text query used to find the current price */
  searchQuery?: string;
  /** Drops are only notify-worthy at or below this price (if set) */
  targetPrice?: number;
  /** ISO 4217 currency code of the prices below */
  currency: string;
  /** Last price the monitor observed, null before the first check */
  lastKnownPrice: number | null;
  /** ISO timestamp of the last successful check */
  lastCheckedAt: string | null;
  /** Who to notify */
  subscribers: Subscriber[];
  /** ISO timestamp of registration */
  createdAt?: string;
}

/**
 * How much the extractor trusts an observed price
 */
export type Confidence = 'HIGH' | 'LOW' | 'UNKNOWN';

/**
 * A price read for one product during one run. Never persisted on its own.
 */
export interface PriceObservation {
  productId: string;
  observedPrice: number;
  currency: string;
  confidence: Confidence;
  observedAt: string;
  /** Page the price was read from */
  sourceUrl?: string;
}

export type NotificationChannel = 'EMAIL' | 'SMS';

export type NotificationStatus = 'PENDING' | 'SENT' | 'FAILED';

/**
 * Result of one send over one channel to one recipient
 */
export interface ChannelDelivery {
  channel: NotificationChannel;
  recipient: string;
  status: 'SENT' | 'FAILED';
  error?: string;
}

/**
 * A price drop alert. The id is derived from the product, the price bucket and
 * the dedup window, so repeated identical drops in one window share it.
 */
export interface NotificationRecord {
  notificationId: string;
  productId: string;
  oldPrice: number;
  newPrice: number;
  status: NotificationStatus;
  /** Owner of the current claim */
  claimToken: string;
  claimedAt: string;
  sentAt?: string;
  deliveries: ChannelDelivery[];
}

/**
 * Spend for one API in one budget period
 */
export interface SpendLedgerEntry {
  /** YYYY-MM-DD for daily budgets, YYYY-MM for monthly */
  dateBucket: string;
  apiName: string;
  amountSpent: number;
  calls: number;
}

export type BudgetPeriod = 'day' | 'month';

/**
 * Outcome of the price extractor for one product
 */
export type ExtractionResult =
  | { kind: 'observation'; observation: PriceObservation }
  | { kind: 'extraction-failed'; reason: string }
  | { kind: 'budget-exceeded'; apiName: string };

export type SuppressReason = 'CURRENCY_MISMATCH' | 'LOW_CONFIDENCE' | 'DUPLICATE' | 'ABOVE_TARGET';

/**
 * What the change detector decided to do with an observation
 */
export type Decision =
  | { kind: 'notify'; oldPrice: number; newPrice: number; notificationId: string }
  | { kind: 'suppress'; reason: SuppressReason }
  | { kind: 'no-change' };

/**
 * Outcome of the notification dispatcher
 */
export type DispatchResult =
  | { kind: 'sent'; record: NotificationRecord }
  | { kind: 'partially-failed'; record: NotificationRecord }
  | { kind: 'failed'; record: NotificationRecord }
  | {
      kind: 'suppressed';
      reason: 'AlreadyExists';
      /** Status of the record holding the id, null if it vanished meanwhile */
      existingStatus: NotificationStatus | null;
    };

export type ProductOutcomeKind =
  | 'notified'
  | 'partially-notified'
  | 'suppressed'
  | 'no-change'
  | 'extraction-failed'
  | 'budget-skipped'
  | 'dispatch-failed'
  | 'persistence-failed'
  | 'cancelled';

/**
 * What happened to one product during a run
 */
export interface ProductOutcome {
  productId: string;
  outcome: ProductOutcomeKind;
  /** Error class for non-success outcomes */
  errorKind?: string;
  /** Human-readable detail */
  reason?: string;
  oldPrice?: number | null;
  newPrice?: number;
  confidence?: Confidence;
  notificationId?: string;
}

/**
 * Run summary returned to the trigger. JSON-serializable.
 */
export interface RunSummary {
  status: 'success' | 'failure';
  startedAt: string;
  finishedAt: string;
  total: number;
  counts: {
    notified: number;
    suppressed: number;
    noChange: number;
    extractionFailed: number;
    budgetSkipped: number;
    failed: number;
    cancelled: number;
  };
  /** Spend committed during this run, in USD */
  totalSpend: number;
  outcomes: ProductOutcome[];
  /** Set when the run could not start (status is failure) */
  error?: string;
}
