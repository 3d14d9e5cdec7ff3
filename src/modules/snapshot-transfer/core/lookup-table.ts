/**
 * Source-org id -> destination-org id mapping built during one import.
 */

import { err, ok, type Result } from 'neverthrow';

import { createDuplicateLookupEntryError, type DuplicateLookupEntryError } from './errors.js';

import type { EntityId, TemplateName } from './types.js';

export interface LookupEntry {
  readonly templateName: TemplateName;
  readonly sourceId: EntityId;
  readonly destinationId: EntityId;
}

const keyOf = (templateName: TemplateName, sourceId: EntityId): string =>
  `${templateName}\u0000${sourceId}`;

/**
 * Append-only: an entry is never replaced once recorded.
 */
export class LookupTable {
  private readonly entriesByKey = new Map<string, LookupEntry>();

  record(
    templateName: TemplateName,
    sourceId: EntityId,
    destinationId: EntityId
  ): Result<LookupEntry, DuplicateLookupEntryError> {
    const key = keyOf(templateName, sourceId);
    if (this.entriesByKey.has(key)) {
      return err(createDuplicateLookupEntryError(templateName, sourceId));
    }

    const entry: LookupEntry = { templateName, sourceId, destinationId };
    this.entriesByKey.set(key, entry);
    return ok(entry);
  }

  resolve(templateName: TemplateName, sourceId: EntityId): EntityId | undefined {
    return this.entriesByKey.get(keyOf(templateName, sourceId))?.destinationId;
  }

  has(templateName: TemplateName, sourceId: EntityId): boolean {
    return this.entriesByKey.has(keyOf(templateName, sourceId));
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  /** Entries in insertion (posting) order */
  entries(): LookupEntry[] {
    return [...this.entriesByKey.values()];
  }

  destinationIds(): ReadonlySet<EntityId> {
    return new Set(this.entries().map((entry) => entry.destinationId));
  }

  toJSON(): LookupEntry[] {
    return this.entries();
  }
}
