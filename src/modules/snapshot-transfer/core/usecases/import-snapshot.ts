/**
 * Import Snapshot Use Case
 *
 * Posts a report into a target organization in dependency order and rewrites
 * references to the new ids.
 *
 * Flow:
 * 1. Devices first, then generic-entity templates in post order
 * 2. Per entity: rewrite resolved references, strip non-portable fields,
 *    create, record (template, source id) -> new id
 * 3. References that could not be resolved at post time become pending patches
 * 4. After every post: patch pending references from the lookup table; what is
 *    still unresolved keeps its source id and is reported as a warning
 *
 * Nothing is rolled back. A failed post stops the import and returns a
 * PartialImportError carrying the lookup table built so far and the patches
 * that were never applied; their unresolved ids are reported as warnings.
 */

import { ok, err, type Result } from 'neverthrow';

import { orderFor } from '../dependency-order.js';
import {
  createDuplicateLookupEntryError,
  createPartialImportError,
  createUnresolvedReferenceWarning,
  createUpstreamPatchError,
  createUpstreamPostError,
  type DuplicateLookupEntryError,
  type PartialImportError,
  type TransferWarning,
  type UpstreamPatchError,
  type UpstreamPostError,
} from '../errors.js';
import { LookupTable } from '../lookup-table.js';
import {
  readReferenceIds,
  referenceFieldsOf,
  referenceTargetOf,
  rewriteReferenceIds,
} from '../reference-graph.js';
import { DEFAULT_IMPORT_CONCURRENCY } from '../types.js';

import type { EntityStore } from '../ports.js';
import type {
  Entity,
  EntityId,
  JsonObject,
  OrgId,
  PendingField,
  PendingPatch,
  Report,
  TemplateName,
  TransferConfig,
} from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ImportSnapshotDeps {
  entityStore: EntityStore;
  config: TransferConfig;
  logger: Logger;
}

export interface ImportSnapshotInput {
  report: Report;
  targetOrg: OrgId;
  /**
   * Posts in flight at once within one template. Values above 1 let entities
   * of the same template that follow a failed one be posted too.
   */
  concurrency?: number;
  /** Checked between posts; an aborted import returns what it created so far */
  signal?: AbortSignal;
}

export interface ImportResult {
  readonly lookupTable: LookupTable;
  readonly warnings: TransferWarning[];
  /** True when the signal aborted the import before it finished */
  readonly cancelled: boolean;
  /** Entities updated in the patch pass */
  readonly patchedCount: number;
  /** Patches not applied because the import was cancelled */
  readonly pendingPatches: readonly PendingPatch[];
}

type ImportFailure = UpstreamPostError | UpstreamPatchError | DuplicateLookupEntryError;

interface Batch {
  readonly label: string;
  readonly entities: readonly Entity[];
}

export interface PreparedEntity {
  readonly entity: Entity;
  /** Body to post: portable fields with resolvable references rewritten */
  readonly data: JsonObject;
  readonly pending: Record<string, PendingField>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

const nonPortableFieldsOf = (
  config: TransferConfig,
  templateName: TemplateName
): ReadonlySet<string> =>
  new Set([
    ...(config.nonPortableFields['*'] ?? []),
    ...(config.nonPortableFields[templateName] ?? []),
  ]);

/**
 * Rewrites resolvable references of an entity and strips its non-portable
 * fields. Reference fields with ids not yet in the lookup table keep those ids
 * and are returned as pending.
 */
export const prepareEntity = (
  config: TransferConfig,
  lookupTable: LookupTable,
  entity: Entity
): PreparedEntity => {
  const stripped = nonPortableFieldsOf(config, entity.templateName);
  const referenceFields = referenceFieldsOf(config, entity.templateName);
  const data: JsonObject = {};
  const pending: Record<string, PendingField> = {};

  for (const [field, value] of Object.entries(entity.data)) {
    if (stripped.has(field)) {
      continue;
    }

    const targetTemplate = referenceFields.has(field)
      ? referenceTargetOf(config, entity.templateName, field)
      : undefined;
    if (targetTemplate === undefined) {
      data[field] = value;
      continue;
    }

    const resolve = (id: EntityId): EntityId | undefined => lookupTable.resolve(targetTemplate, id);
    data[field] = rewriteReferenceIds(value, resolve);

    const unresolvedIds = readReferenceIds(value).filter((id) => resolve(id) === undefined);
    if (unresolvedIds.length > 0) {
      pending[field] = { original: value, unresolvedIds };
    }
  }

  return { entity, data, pending };
};

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Imports a report into `targetOrg`.
 *
 * @returns The completed lookup table with warnings, or a PartialImportError
 *          carrying the lookup table accumulated before the failure and the
 *          reference patches left unapplied
 */
export const importSnapshot = async (
  deps: ImportSnapshotDeps,
  input: ImportSnapshotInput
): Promise<Result<ImportResult, PartialImportError>> => {
  const { entityStore, config } = deps;
  const { report, targetOrg, signal } = input;
  const concurrency = Math.max(1, Math.floor(input.concurrency ?? DEFAULT_IMPORT_CONCURRENCY));
  const log = deps.logger.child({ usecase: 'importSnapshot', report: report.name, targetOrg });

  const lookupTable = new LookupTable();
  const pendingPatches: PendingPatch[] = [];
  const postOrder = orderFor(config, report);
  const warnings: TransferWarning[] = [...postOrder.warnings];

  for (const warning of postOrder.warnings) {
    log.warn({ templateName: warning.templateName }, warning.message);
  }

  const batches: Batch[] = [];
  if (report.devices !== undefined && report.devices.length > 0) {
    batches.push({ label: 'devices', entities: report.devices });
  }
  for (const templateName of postOrder.order) {
    batches.push({ label: templateName, entities: report.entitiesByTemplate[templateName] ?? [] });
  }

  const unresolvedIdsOf = (patch: PendingPatch, field: string): EntityId[] => {
    const pendingField = patch.fields[field];
    const targetTemplate = referenceTargetOf(config, patch.templateName, field);
    if (pendingField === undefined || targetTemplate === undefined) {
      return [];
    }
    return pendingField.unresolvedIds.filter(
      (id) => lookupTable.resolve(targetTemplate, id) === undefined
    );
  };

  const warnUnresolved = (patch: PendingPatch, field: string, ids: readonly EntityId[]): void => {
    for (const id of ids) {
      const warning = createUnresolvedReferenceWarning(patch.templateName, patch.sourceId, field, id);
      warnings.push(warning);
      log.warn({ templateName: patch.templateName, field, referenceId: id }, warning.message);
    }
  };

  const cancelledResult = (pending: readonly PendingPatch[]): ImportResult => {
    log.warn({ created: lookupTable.size }, 'Import cancelled');
    return { lookupTable, warnings, cancelled: true, patchedCount: 0, pendingPatches: pending };
  };

  // ── Pass 1: post in dependency order ──────────────────────────────────────

  for (const batch of batches) {
    const failures: ImportFailure[] = [];
    const inFlight = new Set<string>();

    for (const group of chunk(batch.entities, concurrency)) {
      if (signal?.aborted === true) {
        return ok(cancelledResult(pendingPatches));
      }

      const prepared: PreparedEntity[] = [];
      for (const entity of group) {
        const key = `${entity.templateName}\u0000${entity.id}`;
        if (lookupTable.has(entity.templateName, entity.id) || inFlight.has(key)) {
          failures.push(createDuplicateLookupEntryError(entity.templateName, entity.id));
          break;
        }
        inFlight.add(key);
        prepared.push(prepareEntity(config, lookupTable, entity));
      }

      const results = await Promise.all(
        prepared.map(async (item) => ({
          item,
          created: await entityStore.create({
            kind: item.entity.kind,
            templateName: item.entity.templateName,
            ownerOrganizationId: targetOrg,
            name: item.entity.name,
            templateId: item.entity.templateId,
            sourceId: item.entity.id,
            data: item.data,
          }),
        }))
      );

      for (const { item, created } of results) {
        const { entity } = item;
        if (created.isErr()) {
          failures.push(createUpstreamPostError(entity.templateName, entity.id, created.error));
          continue;
        }

        const recorded = lookupTable.record(entity.templateName, entity.id, created.value);
        if (recorded.isErr()) {
          failures.push(recorded.error);
          continue;
        }

        if (Object.keys(item.pending).length > 0) {
          pendingPatches.push({
            templateName: entity.templateName,
            kind: entity.kind,
            sourceId: entity.id,
            destinationId: created.value,
            fields: item.pending,
          });
        }
      }

      if (failures.length > 0) {
        log.error(
          { batch: batch.label, failures: failures.map((failure) => failure.message) },
          'Import stopped'
        );
        for (const patch of pendingPatches) {
          for (const field of Object.keys(patch.fields)) {
            warnUnresolved(patch, field, unresolvedIdsOf(patch, field));
          }
        }
        return err(createPartialImportError(lookupTable, failures, warnings, pendingPatches));
      }
    }

    log.info({ batch: batch.label, count: batch.entities.length }, 'Posted batch');
  }

  // ── Pass 2: patch forward references ──────────────────────────────────────

  const patchFailures: ImportFailure[] = [];
  const unappliedPatches: PendingPatch[] = [];
  let patchedCount = 0;

  for (const [index, patch] of pendingPatches.entries()) {
    if (signal?.aborted === true) {
      return ok(cancelledResult(pendingPatches.slice(index)));
    }

    const update: JsonObject = {};
    for (const [field, { original, unresolvedIds }] of Object.entries(patch.fields)) {
      const targetTemplate = referenceTargetOf(config, patch.templateName, field);
      if (targetTemplate === undefined) {
        continue;
      }

      const stillUnresolved = unresolvedIdsOf(patch, field);
      warnUnresolved(patch, field, stillUnresolved);

      if (stillUnresolved.length < unresolvedIds.length) {
        update[field] = rewriteReferenceIds(original, (id) =>
          lookupTable.resolve(targetTemplate, id)
        );
      }
    }

    if (Object.keys(update).length === 0) {
      continue;
    }

    const updated = await entityStore.update({
      kind: patch.kind,
      templateName: patch.templateName,
      id: patch.destinationId,
      data: update,
    });
    if (updated.isErr()) {
      const { templateName, sourceId, destinationId } = patch;
      patchFailures.push(
        createUpstreamPatchError(templateName, sourceId, destinationId, updated.error)
      );
      unappliedPatches.push(patch);
      continue;
    }
    patchedCount += 1;
  }

  if (patchFailures.length > 0) {
    log.error({ failures: patchFailures.length }, 'Reference patching incomplete');
    return err(createPartialImportError(lookupTable, patchFailures, warnings, unappliedPatches));
  }

  log.info(
    { created: lookupTable.size, patched: patchedCount, warnings: warnings.length },
    'Import completed'
  );

  return ok({ lookupTable, warnings, cancelled: false, patchedCount, pendingPatches: [] });
};
