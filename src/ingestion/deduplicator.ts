/**
 * Posting deduplicator
 *
 * Keeps two id sets: the persisted ids loaded once at the start of a run,
 * and the ids marked during the run. The run set is checked first.
 */

import type { KnownIdsSource, PostingDeduplicator } from "@/types";
import { StateLoadError, errorMessage } from "@/utils/errors";

export class Deduplicator implements PostingDeduplicator {
  private readonly persisted: ReadonlySet<string>;
  private readonly batch = new Set<string>();

  constructor(persisted: Iterable<string> = []) {
    this.persisted = new Set(persisted);
  }

  /**
   * Reads the already-seen ids once.
   *
   * @throws {StateLoadError} If the source fails; the run must abort
   */
  static load(source: KnownIdsSource): Deduplicator {
    try {
      return new Deduplicator(source.loadKnownIds());
    } catch (err) {
      throw new StateLoadError(
        `cannot load known posting ids: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  isNew(externalId: string): boolean {
    return !this.batch.has(externalId) && !this.persisted.has(externalId);
  }

  markSeen(externalId: string): void {
    this.batch.add(externalId);
  }

  /**
   * Check-then-mark: true the first time an unseen id is claimed, false after
   */
  claim(externalId: string): boolean {
    if (!this.isNew(externalId)) {
      return false;
    }
    this.markSeen(externalId);
    return true;
  }

  /**
   * Ids marked since load, in marking order
   */
  markedThisRun(): string[] {
    return [...this.batch];
  }

  get knownCount(): number {
    return this.persisted.size;
  }
}
