import type { Logger } from "../logger.js";
import type { Listing } from "../types.js";
import type { ListingSource } from "./sheets.js";
import { errorMessage } from "../retry.js";

export type ListingStoreInfo = {
  rows: number;
  ageSec: number | undefined;
  lastError: string | undefined;
};

/**
 * Latest snapshot of the listing sheet. The snapshot array is replaced whole on
 * every successful fetch and must be treated as read-only by callers.
 */
export class ListingStore {
  private snapshot: Listing[] | undefined;
  private fetchedAt = 0;
  private inflight: Promise<Listing[]> | undefined;
  private lastError: string | undefined;

  constructor(
    private readonly source: ListingSource,
    private readonly ttlMs: number,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now
  ) {}

  async get(force = false): Promise<Listing[]> {
    if (!force && this.snapshot && this.now() - this.fetchedAt < this.ttlMs) {
      return this.snapshot;
    }
    this.inflight ??= this.refresh().finally(() => {
      this.inflight = undefined;
    });
    return this.inflight;
  }

  info(): ListingStoreInfo {
    return {
      rows: this.snapshot?.length ?? 0,
      ageSec: this.snapshot ? Math.floor((this.now() - this.fetchedAt) / 1000) : undefined,
      lastError: this.lastError
    };
  }

  private async refresh(): Promise<Listing[]> {
    try {
      const listings = await this.source.fetchListings();
      this.snapshot = listings;
      this.fetchedAt = this.now();
      this.lastError = undefined;
      this.logger.info({ rows: listings.length }, "listing cache updated");
      return listings;
    } catch (err) {
      this.lastError = errorMessage(err);
      this.logger.error({ err_message: this.lastError }, "failed to load listings, serving previous snapshot");
      return this.snapshot ?? [];
    }
  }
}
