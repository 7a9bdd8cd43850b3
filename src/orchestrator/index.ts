import { errorKindOf, errorMessage, type ErrorKind } from '../errors.js';
import { mapWithConcurrency } from '../utils/pool.js';
import type { CostTracker } from '../cost/tracker.js';
import type { ChangeDetector } from '../detector/index.js';
import type { PriceExtractor } from '../extractor/index.js';
import type { NotificationDispatcher } from '../notifications/dispatcher.js';
import type { StateStore } from '../store/state-store.js';
import type { ProductOutcome, ProductOutcomeKind, RunSummary, TrackedProduct } from '../types.js';

export interface RunDeps {
  store: StateStore;
  extractor: Pick<PriceExtractor, 'extract'>;
  detector: Pick<ChangeDetector, 'decide'>;
  dispatcher: Pick<NotificationDispatcher, 'dispatch'>;
  costs: Pick<CostTracker, 'committedThisRun'>;
}

export interface RunOptions {
  /** Products processed at the same time */
  concurrency: number;
  /** Cancels the run; unfinished products are recorded as cancelled */
  signal?: AbortSignal;
  now?: () => Date;
}

type Stage = 'extract' | 'decide' | 'dispatch' | 'persist';

/** Outcome and error kind for an unexpected throw at each stage */
const STAGE_FAILURES: Record<Stage, { outcome: ProductOutcomeKind; kind: ErrorKind }> = {
  extract: { outcome: 'extraction-failed', kind: 'ExtractionFailed' },
  decide: { outcome: 'persistence-failed', kind: 'PersistenceError' },
  dispatch: { outcome: 'dispatch-failed', kind: 'ChannelDeliveryError' },
  persist: { outcome: 'persistence-failed', kind: 'PersistenceError' },
};

function isAbort(error: unknown, signal?: AbortSignal): boolean {
  return signal?.aborted === true || (error instanceof Error && error.name === 'AbortError');
}

/**
 * Check one product: EXTRACT -> DECIDE -> [DISPATCH] -> PERSIST.
 * Never throws; every failure becomes this product's outcome.
 */
export async function processProduct(
  product: TrackedProduct,
  deps: RunDeps,
  signal?: AbortSignal
): Promise<ProductOutcome> {
  const base = { productId: product.productId, oldPrice: product.lastKnownPrice };
  let stage: Stage = 'extract';

  try {
    if (signal?.aborted) {
      return { ...base, outcome: 'cancelled', reason: 'run cancelled before this product started' };
    }

    const extracted = await deps.extractor.extract(product, signal);
    if (extracted.kind === 'budget-exceeded') {
      return { ...base, outcome: 'budget-skipped', errorKind: 'BudgetExceeded', reason: `budget exhausted at ${extracted.apiName}` };
    }
    if (extracted.kind === 'extraction-failed') {
      return { ...base, outcome: 'extraction-failed', errorKind: 'ExtractionFailed', reason: extracted.reason };
    }

    const observation = extracted.observation;
    const observed = {
      ...base,
      newPrice: observation.observedPrice,
      confidence: observation.confidence,
    };

    stage = 'decide';
    const decision = await deps.detector.decide(product, observation);

    // An untrusted or incomparable price never replaces the last known one
    if (decision.kind === 'suppress' && (decision.reason === 'LOW_CONFIDENCE' || decision.reason === 'CURRENCY_MISMATCH')) {
      return { ...observed, outcome: 'suppressed', reason: decision.reason };
    }

    let outcome: ProductOutcome;
    if (decision.kind === 'notify') {
      signal?.throwIfAborted();
      stage = 'dispatch';
      const dispatched = await deps.dispatcher.dispatch(product, decision, observation);
      const notified = { ...observed, oldPrice: decision.oldPrice, notificationId: decision.notificationId };

      switch (dispatched.kind) {
        case 'failed':
          // Price stays as it was so the next run sees the drop again
          return {
            ...notified,
            outcome: 'dispatch-failed',
            errorKind: 'ChannelDeliveryError',
            reason: dispatched.record.deliveries.map(d => `${d.channel}: ${d.error}`).join('; ') || 'no reachable subscriber',
          };
        case 'suppressed':
          if (dispatched.existingStatus !== 'SENT') {
            // Nobody has sent this drop yet; keep the old price so a later run retries it
            return { ...notified, outcome: 'suppressed', reason: 'IN_FLIGHT' };
          }
          outcome = { ...notified, outcome: 'suppressed', reason: 'DUPLICATE' };
          break;
        case 'partially-failed':
          outcome = {
            ...notified,
            outcome: 'partially-notified',
            errorKind: 'ChannelDeliveryError',
            reason: dispatched.record.deliveries
              .filter(d => d.status === 'FAILED')
              .map(d => `${d.channel}: ${d.error}`)
              .join('; '),
          };
          break;
        case 'sent':
          outcome = { ...notified, outcome: 'notified' };
          break;
      }
    } else if (decision.kind === 'suppress') {
      outcome = { ...observed, outcome: 'suppressed', reason: decision.reason };
    } else {
      outcome = { ...observed, outcome: 'no-change' };
    }

    stage = 'persist';
    await deps.store.updatePrice(product.productId, observation.observedPrice, observation.observedAt);
    return outcome;
  } catch (error) {
    if (isAbort(error, signal)) {
      return { ...base, outcome: 'cancelled', reason: `cancelled during ${stage}` };
    }
    const failure = STAGE_FAILURES[stage];
    console.error(`[run] ${product.productId} failed during ${stage}: ${errorMessage(error)}`);
    return {
      ...base,
      outcome: failure.outcome,
      errorKind: errorKindOf(error, failure.kind),
      reason: errorMessage(error),
    };
  }
}

function countOutcomes(outcomes: ProductOutcome[]): RunSummary['counts'] {
  const counts: RunSummary['counts'] = {
    notified: 0,
    suppressed: 0,
    noChange: 0,
    extractionFailed: 0,
    budgetSkipped: 0,
    failed: 0,
    cancelled: 0,
  };
  for (const { outcome } of outcomes) {
    switch (outcome) {
      case 'notified':
      case 'partially-notified':
        counts.notified++;
        break;
      case 'suppressed':
        counts.suppressed++;
        break;
      case 'no-change':
        counts.noChange++;
        break;
      case 'extraction-failed':
        counts.extractionFailed++;
        break;
      case 'budget-skipped':
        counts.budgetSkipped++;
        break;
      case 'dispatch-failed':
      case 'persistence-failed':
        counts.failed++;
        break;
      case 'cancelled':
        counts.cancelled++;
        break;
    }
  }
  return counts;
}

function logOutcome(outcome: ProductOutcome): void {
  const prices =
    outcome.newPrice !== undefined ? ` ${outcome.oldPrice ?? '-'} -> ${outcome.newPrice}` : '';
  const detail = outcome.reason ? ` (${outcome.reason})` : '';
  console.log(`[run]   ${outcome.productId}: ${outcome.outcome}${prices}${detail}`);
}

/**
 * Check every tracked product once and summarise the run.
 * Only failing to list the products fails the run as a whole.
 */
export async function runPriceCheck(deps: RunDeps, options: RunOptions): Promise<RunSummary> {
  const now = options.now ?? (() => new Date());
  const startedAt = now().toISOString();
  const spendBefore = deps.costs.committedThisRun;
  console.log(`[run] Starting price check at ${startedAt}`);

  let products: TrackedProduct[];
  try {
    products = await deps.store.listTrackedProducts();
  } catch (error) {
    console.error(`[run] Could not list tracked products: ${errorMessage(error)}`);
    return {
      status: 'failure',
      startedAt,
      finishedAt: now().toISOString(),
      total: 0,
      counts: countOutcomes([]),
      totalSpend: 0,
      outcomes: [],
      error: errorMessage(error),
    };
  }

  console.log(`[run] Found ${products.length} products to check`);
  const outcomes = await mapWithConcurrency(products, options.concurrency, product =>
    processProduct(product, deps, options.signal)
  );

  const summary: RunSummary = {
    status: 'success',
    startedAt,
    finishedAt: now().toISOString(),
    total: products.length,
    counts: countOutcomes(outcomes),
    totalSpend: Math.round((deps.costs.committedThisRun - spendBefore) * 1_000_000) / 1_000_000,
    outcomes,
  };

  outcomes.forEach(logOutcome);
  const { counts } = summary;
  console.log(
    `[run] Done: ${counts.notified} notified, ${counts.suppressed} suppressed, ${counts.noChange} unchanged, ` +
      `${counts.extractionFailed} extraction failed, ${counts.budgetSkipped} over budget, ${counts.failed} failed, ` +
      `${counts.cancelled} cancelled; spent $${summary.totalSpend.toFixed(4)}`
  );
  return summary;
}
