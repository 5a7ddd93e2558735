/**
 * Fingerprint Ledger - bounded, append-ordered set of fingerprints already covered
 */

import { StorageTool } from './storage';
import { LedgerWriteError } from '../errors';
import { Logger, errorMessage } from '../utils';

export const DEFAULT_LEDGER_PATH = 'state/seen_hashes.json';

export class FingerprintLedger {
  // Oldest first. `members` mirrors `order` for O(1) lookups.
  private order: string[] = [];
  private members = new Set<string>();

  static fromArray(values: unknown): FingerprintLedger {
    const ledger = new FingerprintLedger();
    if (Array.isArray(values)) {
      for (const value of values) {
        if (typeof value === 'string' && value) {
          ledger.add(value);
        }
      }
    }
    return ledger;
  }

  get size(): number {
    return this.order.length;
  }

  has(fingerprint: string): boolean {
    return this.members.has(fingerprint);
  }

  /**
   * Returns false when the fingerprint was already present.
   */
  add(fingerprint: string): boolean {
    if (this.members.has(fingerprint)) {
      return false;
    }
    this.members.add(fingerprint);
    this.order.push(fingerprint);
    return true;
  }

  /**
   * Keep only the `cap` most recently added entries.
   */
  trim(cap: number): number {
    const limit = Math.max(0, Math.floor(cap));
    const excess = this.order.length - limit;
    if (excess <= 0) {
      return 0;
    }
    const removed = this.order.splice(0, excess);
    for (const fingerprint of removed) {
      this.members.delete(fingerprint);
    }
    return removed.length;
  }

  toArray(): string[] {
    return [...this.order];
  }
}

/**
 * Loads and saves the ledger as a JSON array of fingerprints
 */
export class LedgerStore {
  constructor(
    private storage: StorageTool,
    readonly path: string = DEFAULT_LEDGER_PATH
  ) {}

  /**
   * A missing or unreadable ledger is not fatal: the run starts from an empty one.
   */
  async load(): Promise<FingerprintLedger> {
    try {
      if (!(await this.storage.exists(this.path))) {
        Logger.info('No fingerprint ledger found, starting fresh', { path: this.path });
        return new FingerprintLedger();
      }

      const data = await this.storage.get(this.path);
      const parsed: unknown = JSON.parse(data.toString('utf-8'));
      if (!Array.isArray(parsed)) {
        Logger.warn('Fingerprint ledger is not a JSON array, starting fresh', { path: this.path });
        return new FingerprintLedger();
      }

      const ledger = FingerprintLedger.fromArray(parsed);
      Logger.info('Loaded fingerprint ledger', { path: this.path, size: ledger.size });
      return ledger;
    } catch (error) {
      Logger.warn('Failed to load fingerprint ledger, starting fresh', {
        path: this.path,
        error: errorMessage(error),
      });
      return new FingerprintLedger();
    }
  }

  /**
   * Trims to `retentionCap`, then replaces the stored ledger.
   * @throws LedgerWriteError when the write location is unusable
   */
  async save(ledger: FingerprintLedger, retentionCap: number): Promise<void> {
    const trimmed = ledger.trim(retentionCap);

    try {
      await this.storage.put(this.path, JSON.stringify(ledger.toArray(), null, 2), 'application/json');
    } catch (error) {
      Logger.error('Failed to save fingerprint ledger', {
        path: this.path,
        error: errorMessage(error),
      });
      throw new LedgerWriteError(this.path, error);
    }

    Logger.info('Saved fingerprint ledger', { path: this.path, size: ledger.size, trimmed });
  }
}
