import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { PersistenceError, errorMessage } from '../errors.js';
import { KeyedMutex } from '../utils/mutex.js';
import type { ChannelDelivery, NotificationRecord, TrackedProduct } from '../types.js';

export type RecordResult = 'success' | 'AlreadyExists';

export interface NotificationFinalization {
  status: 'SENT' | 'FAILED';
  deliveries: ChannelDelivery[];
  sentAt?: string;
}

/**
 * Persistent products, prices and notification history.
 * Writes are atomic per product and per notification; there is no
 * cross-product transaction.
 */
export interface StateStore {
  listTrackedProducts(): Promise<TrackedProduct[]>;
  updatePrice(productId: string, price: number, checkedAt: string): Promise<void>;
  /** True when a SENT notification with this id exists */
  hasNotification(notificationId: string): Promise<boolean>;
  /**
   * Insert-if-absent. A FAILED record, or a PENDING one whose claim has gone
   * stale, is replaced by the new claim; anything else reports AlreadyExists.
   */
  recordNotification(record: NotificationRecord): Promise<RecordResult>;
  /** Move a claimed notification to its terminal status; the claim must still be ours */
  finalizeNotification(
    notificationId: string,
    claimToken: string,
    update: NotificationFinalization
  ): Promise<NotificationRecord>;
  getNotification(notificationId: string): Promise<NotificationRecord | null>;
}

export interface FileStateStoreOptions {
  /** Age after which a PENDING claim may be taken over */
  pendingClaimTimeoutMs?: number;
  now?: () => Date;
}

const DEFAULT_PENDING_CLAIM_TIMEOUT_MS = 30 * 60 * 1000;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Write JSON through a temp file and rename, so readers never see a partial file
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const tmp = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
  await fs.writeFile(tmp, JSON.stringify(data, null, 2));
  await fs.rename(tmp, filePath);
}

/**
 * Read JSON, returning null when the file does not exist
 */
export async function readJsonFile<T>(filePath: string): Promise<T | null> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return JSON.parse(content) as T;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * State store on the local filesystem:
 *
 *   <dataDir>/products.json               tracked products
 *   <dataDir>/notifications/<id>.json     one file per notification
 *
 * Notification claims are hard-linked into place, which the OS makes atomic
 * across processes, so two overlapping runs cannot both own an id.
 */
export class FileStateStore implements StateStore {
  private readonly productsFile: string;
  private readonly notificationsDir: string;
  private readonly pendingClaimTimeoutMs: number;
  private readonly now: () => Date;
  private readonly locks = new KeyedMutex();

  constructor(private readonly dataDir: string, options: FileStateStoreOptions = {}) {
    this.productsFile = path.join(dataDir, 'products.json');
    this.notificationsDir = path.join(dataDir, 'notifications');
    this.pendingClaimTimeoutMs = options.pendingClaimTimeoutMs ?? DEFAULT_PENDING_CLAIM_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Ensure data directories exist
   */
  async ensureDataDirs(): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
    await fs.mkdir(this.notificationsDir, { recursive: true });
  }

  async listTrackedProducts(): Promise<TrackedProduct[]> {
    try {
      return (await readJsonFile<TrackedProduct[]>(this.productsFile)) ?? [];
    } catch (error) {
      throw new PersistenceError(`Could not read ${this.productsFile}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Replace the product list. Used by the registration surface and by tests.
   */
  async saveTrackedProducts(products: TrackedProduct[]): Promise<void> {
    await this.locks.run('products', async () => {
      await this.ensureDataDirs();
      await writeJsonAtomic(this.productsFile, products);
    });
  }

  async updatePrice(productId: string, price: number, checkedAt: string): Promise<void> {
    await this.locks.run('products', async () => {
      const products = await this.listTrackedProducts();
      const product = products.find(p => p.productId === productId);
      if (!product) {
        throw new PersistenceError(`Unknown product ${productId}`);
      }

      product.lastKnownPrice = price;
      product.lastCheckedAt = checkedAt;

      try {
        await writeJsonAtomic(this.productsFile, products);
      } catch (error) {
        throw new PersistenceError(`Could not update price for ${productId}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    });
  }

  private notificationPath(notificationId: string): string {
    if (!/^[A-Za-z0-9_-]+$/.test(notificationId)) {
      throw new PersistenceError(`Invalid notification id: ${notificationId}`);
    }
    return path.join(this.notificationsDir, `${notificationId}.json`);
  }

  async getNotification(notificationId: string): Promise<NotificationRecord | null> {
    const filePath = this.notificationPath(notificationId);
    try {
      return await readJsonFile<NotificationRecord>(filePath);
    } catch (error) {
      throw new PersistenceError(`Could not read notification ${notificationId}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async hasNotification(notificationId: string): Promise<boolean> {
    const record = await this.getNotification(notificationId);
    return record?.status === 'SENT';
  }

  /**
   * All notifications, optionally for one product, oldest claim first
   */
  async listNotifications(productId?: string): Promise<NotificationRecord[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.notificationsDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw new PersistenceError(`Could not list notifications: ${errorMessage(error)}`, { cause: error });
    }

    const records: NotificationRecord[] = [];
    for (const file of files.filter(f => f.endsWith('.json'))) {
      const record = await readJsonFile<NotificationRecord>(path.join(this.notificationsDir, file));
      if (record && (productId === undefined || record.productId === productId)) {
        records.push(record);
      }
    }
    return records.sort((a, b) => a.claimedAt.localeCompare(b.claimedAt));
  }

  private isReclaimable(existing: NotificationRecord): boolean {
    if (existing.status === 'FAILED') {
      return true;
    }
    if (existing.status === 'PENDING') {
      const age = this.now().getTime() - new Date(existing.claimedAt).getTime();
      return age >= this.pendingClaimTimeoutMs;
    }
    return false;
  }

  async recordNotification(record: NotificationRecord): Promise<RecordResult> {
    const filePath = this.notificationPath(record.notificationId);

    return this.locks.run(record.notificationId, async () => {
      if (await this.createExclusive(filePath, record)) {
        return 'success';
      }
      return this.reclaim(filePath, record);
    });
  }

  /**
   * Write the record to a temp file, then hard-link it into place. The link
   * fails with EEXIST when the id is taken, and a reader never sees a partly
   * written claim.
   */
  private async createExclusive(filePath: string, record: NotificationRecord): Promise<boolean> {
    const tmp = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await this.ensureDataDirs();
      await fs.writeFile(tmp, JSON.stringify(record, null, 2));
      await fs.link(tmp, filePath);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        return false;
      }
      throw new PersistenceError(`Could not claim notification ${record.notificationId}: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      await fs.rm(tmp, { force: true });
    }
  }

  /**
   * Age of a lock file by its mtime, null when it is gone
   */
  private async lockAge(lockPath: string): Promise<number | null> {
    try {
      const stat = await fs.stat(lockPath);
      return this.now().getTime() - stat.mtimeMs;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  /**
   * Create the .reclaim lock. A lock older than the pending claim timeout was
   * left by a process that died mid-reclaim and is removed.
   */
  private async acquireReclaimLock(lockPath: string, record: NotificationRecord): Promise<boolean> {
    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        await fs.writeFile(lockPath, record.claimToken, { flag: 'wx' });
        return true;
      } catch (error) {
        if (!(isErrnoException(error) && error.code === 'EEXIST')) {
          throw new PersistenceError(`Could not lock notification ${record.notificationId}: ${errorMessage(error)}`, {
            cause: error,
          });
        }
      }

      const age = await this.lockAge(lockPath);
      if (age !== null && age < this.pendingClaimTimeoutMs) {
        return false;
      }
      if (age !== null) {
        console.warn(`[store] Removing stale reclaim lock for ${record.notificationId}`);
        await fs.rm(lockPath, { force: true });
      }
    }
    return false;
  }

  /**
   * Take over a FAILED or stale PENDING record. Another process doing the same
   * holds the .reclaim lock file, which makes us back off.
   */
  private async reclaim(filePath: string, record: NotificationRecord): Promise<RecordResult> {
    const lockPath = `${filePath}.reclaim`;
    if (!(await this.acquireReclaimLock(lockPath, record))) {
      return 'AlreadyExists';
    }

    try {
      const existing = await readJsonFile<NotificationRecord>(filePath);
      if (existing && !this.isReclaimable(existing)) {
        return 'AlreadyExists';
      }
      if (existing) {
        console.log(
          `[store] Reclaiming ${existing.status} notification ${record.notificationId} (claimed ${existing.claimedAt})`
        );
      }
      await writeJsonAtomic(filePath, record);
      return 'success';
    } catch (error) {
      throw new PersistenceError(`Could not reclaim notification ${record.notificationId}: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      await fs.rm(lockPath, { force: true });
    }
  }

  async finalizeNotification(
    notificationId: string,
    claimToken: string,
    update: NotificationFinalization
  ): Promise<NotificationRecord> {
    const filePath = this.notificationPath(notificationId);

    return this.locks.run(notificationId, async () => {
      const existing = await this.getNotification(notificationId);
      if (!existing) {
        throw new PersistenceError(`Notification ${notificationId} was never claimed`);
      }
      if (existing.claimToken !== claimToken) {
        throw new PersistenceError(`Notification ${notificationId} is claimed by another run`);
      }

      const finalized: NotificationRecord = {
        ...existing,
        status: update.status,
        deliveries: update.deliveries,
        sentAt: update.sentAt,
      };

      try {
        await writeJsonAtomic(filePath, finalized);
      } catch (error) {
        throw new PersistenceError(`Could not finalize notification ${notificationId}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
      return finalized;
    });
  }
}
