/**
 * Map-backed ownership resolver for tests and offline tooling.
 */

import type { Ownership, SubnetId } from "@subnetkit/types";
import type { OwnershipResolver } from "./types.js";

export class InMemoryOwnershipResolver implements OwnershipResolver {
  private readonly owners = new Map<SubnetId, Ownership>();
  private lookups = 0;

  constructor(entries: Iterable<readonly [SubnetId, Ownership]> = []) {
    for (const [subnetId, ownership] of entries) {
      this.owners.set(subnetId, ownership);
    }
  }

  set(subnetId: SubnetId, ownership: Ownership): void {
    this.owners.set(subnetId, ownership);
  }

  delete(subnetId: SubnetId): boolean {
    return this.owners.delete(subnetId);
  }

  /** Number of `resolve` calls served so far. */
  get lookupCount(): number {
    return this.lookups;
  }

  async resolve(subnetId: SubnetId): Promise<Ownership> {
    this.lookups++;
    const ownership = this.owners.get(subnetId);
    if (ownership === undefined) {
      throw new Error(`Subnet not found: ${subnetId}`);
    }
    return ownership;
  }
}
