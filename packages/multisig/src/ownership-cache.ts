/**
 * Ownership cache.
 *
 * Memoizes subnet ownership lookups across coordinators. Concurrent
 * lookups of the same subnet share one resolver call. Failed lookups are
 * not kept, so the next `get` asks the resolver again. Entries stay until
 * `invalidate` or `clear`.
 */

import type { Ownership, SubnetId } from "@subnetkit/types";
import { isOwnership } from "@subnetkit/types";
import { MultisigError } from "./errors.js";
import { componentLogger, type Logger } from "./logger.js";
import type { OwnershipResolver } from "./types.js";

export class OwnershipCache {
  private readonly entries = new Map<SubnetId, Promise<Ownership>>();
  private readonly resolver: OwnershipResolver;
  private readonly log: Logger;

  constructor(resolver: OwnershipResolver, logger?: Logger) {
    this.resolver = resolver;
    this.log = componentLogger(logger, "ownership-cache");
  }

  /**
   * @throws MultisigError OWNERSHIP_UNAVAILABLE when the resolver fails or
   *   returns a malformed ownership
   */
  get(subnetId: SubnetId): Promise<Ownership> {
    const cached = this.entries.get(subnetId);
    if (cached !== undefined) {
      return cached;
    }

    this.log.debug({ subnetId }, "resolving subnet ownership");
    const pending: Promise<Ownership> = this.fetch(subnetId).catch((err: unknown) => {
      // Only drop the entry if it was not replaced meanwhile
      if (this.entries.get(subnetId) === pending) {
        this.entries.delete(subnetId);
      }
      throw err;
    });
    this.entries.set(subnetId, pending);
    return pending;
  }

  has(subnetId: SubnetId): boolean {
    return this.entries.has(subnetId);
  }

  invalidate(subnetId: SubnetId): boolean {
    return this.entries.delete(subnetId);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private async fetch(subnetId: SubnetId): Promise<Ownership> {
    let ownership: unknown;
    try {
      ownership = await this.resolver.resolve(subnetId);
    } catch (err: unknown) {
      this.log.warn({ subnetId, err }, "ownership lookup failed");
      const reason = err instanceof Error ? err.message : String(err);
      throw new MultisigError(
        "OWNERSHIP_UNAVAILABLE",
        `Cannot resolve ownership of subnet ${subnetId}: ${reason}`,
        { cause: err },
      );
    }

    if (!isOwnership(ownership)) {
      throw new MultisigError(
        "OWNERSHIP_UNAVAILABLE",
        `Resolver returned malformed ownership for subnet ${subnetId}`,
      );
    }
    return ownership;
  }
}
