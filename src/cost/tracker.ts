import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { readJsonFile, writeJsonAtomic } from '../store/state-store.js';
import type { BudgetPeriod, SpendLedgerEntry } from '../types.js';

/**
 * A hold on part of the budget, taken before a chargeable call
 */
export type Reservation =
  | { granted: true; id: string; apiName: string; amount: number; dateBucket: string }
  | { granted: false; apiName: string; reason: string };

export type GrantedReservation = Extract<Reservation, { granted: true }>;

/**
 * Where the ledger lives between runs
 */
export interface LedgerStore {
  load(): Promise<SpendLedgerEntry[]>;
  save(entries: SpendLedgerEntry[]): Promise<void>;
}

/**
 * Ledger in <dataDir>/spend.json
 */
export class FileLedgerStore implements LedgerStore {
  private readonly filePath: string;

  constructor(private readonly dataDir: string) {
    this.filePath = path.join(dataDir, 'spend.json');
  }

  async load(): Promise<SpendLedgerEntry[]> {
    return (await readJsonFile<SpendLedgerEntry[]>(this.filePath)) ?? [];
  }

  async save(entries: SpendLedgerEntry[]): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
    await writeJsonAtomic(this.filePath, entries);
  }
}

export interface CostTrackerOptions {
  /** Spend ceiling per period, in USD */
  ceiling: number;
  period: BudgetPeriod;
  store?: LedgerStore;
  now?: () => Date;
}

/**
 * Period key for a date: YYYY-MM-DD for daily budgets, YYYY-MM for monthly (UTC)
 */
export function dateBucketFor(date: Date, period: BudgetPeriod): string {
  const iso = date.toISOString();
  return period === 'day' ? iso.slice(0, 10) : iso.slice(0, 7);
}

// Sub-cent arithmetic drifts in floating point; compare in micro-dollars.
const toMicros = (usd: number): number => Math.round(usd * 1_000_000);
const fromMicros = (micros: number): number => micros / 1_000_000;

/**
 * Running ledger of external API spend against a ceiling.
 *
 * Every mutation happens synchronously inside this object, so concurrent
 * workers sharing one tracker are serialised by the event loop and no update
 * is lost. `reserve` holds the estimate until `commit` replaces it with the
 * actual cost, so the ceiling is enforced before a call is made, not after.
 */
export class CostTracker {
  private readonly ceilingMicros: number;
  private readonly period: BudgetPeriod;
  private readonly store?: LedgerStore;
  private readonly now: () => Date;

  /** `${dateBucket}:${apiName}` -> entry, spend kept in micro-dollars */
  private readonly entries = new Map<string, { dateBucket: string; apiName: string; micros: number; calls: number }>();
  private readonly holds = new Map<string, { dateBucket: string; micros: number }>();
  private committedThisRunMicros = 0;
  private saving: Promise<void> = Promise.resolve();

  constructor(options: CostTrackerOptions) {
    this.ceilingMicros = toMicros(options.ceiling);
    this.period = options.period;
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load previous spend from the ledger store, if any
   */
  async load(): Promise<void> {
    if (!this.store) {
      return;
    }
    for (const entry of await this.store.load()) {
      this.entries.set(`${entry.dateBucket}:${entry.apiName}`, {
        dateBucket: entry.dateBucket,
        apiName: entry.apiName,
        micros: toMicros(entry.amountSpent),
        calls: entry.calls,
      });
    }
  }

  private currentBucket(): string {
    return dateBucketFor(this.now(), this.period);
  }

  private committedMicros(dateBucket: string): number {
    let total = 0;
    for (const entry of this.entries.values()) {
      if (entry.dateBucket === dateBucket) {
        total += entry.micros;
      }
    }
    return total;
  }

  private heldMicros(dateBucket: string): number {
    let total = 0;
    for (const hold of this.holds.values()) {
      if (hold.dateBucket === dateBucket) {
        total += hold.micros;
      }
    }
    return total;
  }

  /**
   * Hold `estimatedCost` for a call to `apiName`. Denied when the hold would
   * take committed spend plus outstanding holds over the ceiling.
   */
  reserve(apiName: string, estimatedCost: number): Reservation {
    const dateBucket = this.currentBucket();
    const amount = toMicros(Math.max(0, estimatedCost));
    const used = this.committedMicros(dateBucket) + this.heldMicros(dateBucket);

    if (used + amount > this.ceilingMicros) {
      const remaining = fromMicros(Math.max(0, this.ceilingMicros - used));
      return {
        granted: false,
        apiName,
        reason: `needs $${fromMicros(amount).toFixed(4)}, $${remaining.toFixed(4)} left of $${fromMicros(this.ceilingMicros).toFixed(2)}`,
      };
    }

    const id = randomUUID();
    this.holds.set(id, { dateBucket, micros: amount });
    return { granted: true, id, apiName, amount: fromMicros(amount), dateBucket };
  }

  /**
   * Replace a hold with the actual cost of the call
   */
  commit(reservation: GrantedReservation, actualCost: number): void {
    if (!this.holds.delete(reservation.id)) {
      throw new Error(`Reservation ${reservation.id} is not outstanding`);
    }

    const micros = toMicros(Math.max(0, actualCost));
    if (micros > toMicros(reservation.amount)) {
      console.warn(
        `[cost] ${reservation.apiName} cost $${actualCost.toFixed(4)} above its estimate of $${reservation.amount.toFixed(4)}`
      );
    }

    const key = `${reservation.dateBucket}:${reservation.apiName}`;
    const entry = this.entries.get(key) ?? {
      dateBucket: reservation.dateBucket,
      apiName: reservation.apiName,
      micros: 0,
      calls: 0,
    };
    entry.micros += micros;
    entry.calls += 1;
    this.entries.set(key, entry);
    this.committedThisRunMicros += micros;

    this.scheduleSave();
  }

  /**
   * Drop a hold for a call that was never made
   */
  release(reservation: GrantedReservation): void {
    this.holds.delete(reservation.id);
  }

  /**
   * Budget left in the given period (the current one by default)
   */
  remainingBudget(dateBucket: string = this.currentBucket()): number {
    const used = this.committedMicros(dateBucket) + this.heldMicros(dateBucket);
    return fromMicros(Math.max(0, this.ceilingMicros - used));
  }

  /**
   * Total committed spend in the given period
   */
  spent(dateBucket: string = this.currentBucket()): number {
    return fromMicros(this.committedMicros(dateBucket));
  }

  /**
   * Spend committed through this tracker since it was created
   */
  get committedThisRun(): number {
    return fromMicros(this.committedThisRunMicros);
  }

  /**
   * Ledger entries for the given period, sorted by API
   */
  summary(dateBucket: string = this.currentBucket()): SpendLedgerEntry[] {
    return [...this.entries.values()]
      .filter(entry => entry.dateBucket === dateBucket)
      .sort((a, b) => a.apiName.localeCompare(b.apiName))
      .map(entry => ({
        dateBucket: entry.dateBucket,
        apiName: entry.apiName,
        amountSpent: fromMicros(entry.micros),
        calls: entry.calls,
      }));
  }

  /**
   * Log a per-API breakdown of the current period
   */
  logSummary(): void {
    const bucket = this.currentBucket();
    console.log(`[cost] Spend for ${bucket}:`);
    for (const entry of this.summary(bucket)) {
      console.log(`[cost]   ${entry.apiName}: $${entry.amountSpent.toFixed(4)} (${entry.calls} calls)`);
    }
    console.log(
      `[cost]   total: $${this.spent(bucket).toFixed(4)} of $${fromMicros(this.ceilingMicros).toFixed(2)}, this run $${this.committedThisRun.toFixed(4)}`
    );
  }

  private snapshot(): SpendLedgerEntry[] {
    return [...this.entries.values()].map(entry => ({
      dateBucket: entry.dateBucket,
      apiName: entry.apiName,
      amountSpent: fromMicros(entry.micros),
      calls: entry.calls,
    }));
  }

  private scheduleSave(): void {
    const store = this.store;
    if (!store) {
      return;
    }
    // Each save writes the full snapshot taken when it runs, so the last one wins with everything.
    this.saving = this.saving
      .then(() => store.save(this.snapshot()))
      .catch(error => {
        console.error(`[cost] Could not save ledger: ${error instanceof Error ? error.message : error}`);
      });
  }

  /**
   * Wait for pending ledger writes
   */
  async flush(): Promise<void> {
    await this.saving;
  }
}
