/**
 * Snapshot Transfer Module - Domain Errors and Warnings
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 * Warnings share the same shape but never abort an operation.
 */

import type { LookupTable } from './lookup-table.js';
import type { EntityId, EntityKind, PendingPatch, TemplateName } from './types.js';
import type { UpstreamError } from '../../../common/types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Upstream Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Export-time read failure. Aborts the export.
 */
export interface UpstreamFetchError {
  readonly type: 'UpstreamFetchError';
  readonly message: string;
  readonly templateName: TemplateName;
  readonly kind: EntityKind;
  readonly statusCode: number;
  readonly body: unknown;
  readonly cause?: unknown;
}

/**
 * Import-time create failure. Aborts the current template batch.
 */
export interface UpstreamPostError {
  readonly type: 'UpstreamPostError';
  readonly message: string;
  readonly templateName: TemplateName;
  readonly sourceId: EntityId;
  readonly statusCode: number;
  readonly body: unknown;
}

/**
 * Failure to patch a forward reference after all posts completed.
 */
export interface UpstreamPatchError {
  readonly type: 'UpstreamPatchError';
  readonly message: string;
  readonly templateName: TemplateName;
  readonly sourceId: EntityId;
  readonly destinationId: EntityId;
  readonly statusCode: number;
  readonly body: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Import Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The same (template, source id) pair was recorded twice in one import.
 */
export interface DuplicateLookupEntryError {
  readonly type: 'DuplicateLookupEntryError';
  readonly message: string;
  readonly templateName: TemplateName;
  readonly sourceId: EntityId;
}

/**
 * Import stopped before completion. Entities already posted are not rolled back;
 * `lookupTable` holds everything that was created.
 */
export interface PartialImportError {
  readonly type: 'PartialImportError';
  readonly message: string;
  readonly lookupTable: LookupTable;
  readonly failures: readonly (UpstreamPostError | UpstreamPatchError | DuplicateLookupEntryError)[];
  readonly warnings: readonly TransferWarning[];
  /** Reference patches not applied; source ids are still in place on these entities */
  readonly pendingPatches: readonly PendingPatch[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Report and Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

export interface InvalidReportError {
  readonly type: 'InvalidReportError';
  readonly message: string;
  readonly details: string[];
}

export interface ReportNotFoundError {
  readonly type: 'ReportNotFoundError';
  readonly message: string;
  readonly name: string;
}

export interface AmbiguousReportError {
  readonly type: 'AmbiguousReportError';
  readonly message: string;
  readonly name: string;
  readonly count: number;
}

export interface ReportStorageError {
  readonly type: 'ReportStorageError';
  readonly message: string;
  readonly cause?: unknown;
}

export interface InvalidTransferConfigError {
  readonly type: 'InvalidTransferConfigError';
  readonly message: string;
  readonly details: string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Warnings
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A reference could not be resolved; the field keeps the source-org id.
 * `field` is '<root>' for a requested root id that is missing from the report.
 */
export interface UnresolvedReferenceWarning {
  readonly type: 'UnresolvedReferenceWarning';
  readonly message: string;
  readonly templateName: TemplateName;
  readonly entityId: EntityId;
  readonly field: string;
  readonly referenceId: EntityId;
}

/**
 * Template present in a report but absent from the post order; posted last.
 */
export interface UnknownTemplateOrderWarning {
  readonly type: 'UnknownTemplateOrderWarning';
  readonly message: string;
  readonly templateName: TemplateName;
}

/**
 * Entities or devices left out of a cross-organization transfer.
 */
export interface OwnershipExcludedWarning {
  readonly type: 'OwnershipExcludedWarning';
  readonly message: string;
  readonly templateName: TemplateName;
  readonly count: number;
}

export type TransferWarning =
  | UnresolvedReferenceWarning
  | UnknownTemplateOrderWarning
  | OwnershipExcludedWarning;

// ─────────────────────────────────────────────────────────────────────────────
// Error Union
// ─────────────────────────────────────────────────────────────────────────────

export type SnapshotError =
  | UpstreamError
  | UpstreamFetchError
  | PartialImportError
  | InvalidReportError
  | ReportNotFoundError
  | AmbiguousReportError
  | ReportStorageError
  | InvalidTransferConfigError;

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createUpstreamFetchError = (
  templateName: TemplateName,
  kind: EntityKind,
  upstream: UpstreamError
): UpstreamFetchError => ({
  type: 'UpstreamFetchError',
  message: `Failed to fetch ${kind} entities of template '${templateName}': ${upstream.message}`,
  templateName,
  kind,
  statusCode: upstream.statusCode,
  body: upstream.body,
  cause: upstream,
});

export const createUpstreamPostError = (
  templateName: TemplateName,
  sourceId: EntityId,
  upstream: UpstreamError
): UpstreamPostError => ({
  type: 'UpstreamPostError',
  message: `Failed to create '${templateName}' entity ${sourceId}: ${upstream.message}`,
  templateName,
  sourceId,
  statusCode: upstream.statusCode,
  body: upstream.body,
});

export const createUpstreamPatchError = (
  templateName: TemplateName,
  sourceId: EntityId,
  destinationId: EntityId,
  upstream: UpstreamError
): UpstreamPatchError => ({
  type: 'UpstreamPatchError',
  message: `Failed to patch references of '${templateName}' entity ${destinationId}: ${upstream.message}`,
  templateName,
  sourceId,
  destinationId,
  statusCode: upstream.statusCode,
  body: upstream.body,
});

export const createDuplicateLookupEntryError = (
  templateName: TemplateName,
  sourceId: EntityId
): DuplicateLookupEntryError => ({
  type: 'DuplicateLookupEntryError',
  message: `Entity ${sourceId} of template '${templateName}' was already imported`,
  templateName,
  sourceId,
});

export const createPartialImportError = (
  lookupTable: LookupTable,
  failures: PartialImportError['failures'],
  warnings: readonly TransferWarning[],
  pendingPatches: readonly PendingPatch[] = []
): PartialImportError => ({
  type: 'PartialImportError',
  message: `Import stopped after creating ${String(lookupTable.size)} entities (${String(failures.length)} failure(s))`,
  lookupTable,
  failures,
  warnings,
  pendingPatches,
});

export const createInvalidReportError = (message: string, details: string[] = []): InvalidReportError => ({
  type: 'InvalidReportError',
  message,
  details,
});

export const createReportNotFoundError = (name: string): ReportNotFoundError => ({
  type: 'ReportNotFoundError',
  message: `Report '${name}' not found`,
  name,
});

export const createAmbiguousReportError = (name: string, count: number): AmbiguousReportError => ({
  type: 'AmbiguousReportError',
  message: `More than one report is named '${name}' (${String(count)} found)`,
  name,
  count,
});

export const createReportStorageError = (message: string, cause?: unknown): ReportStorageError => ({
  type: 'ReportStorageError',
  message,
  ...(cause !== undefined && { cause }),
});

export const createInvalidTransferConfigError = (details: string[]): InvalidTransferConfigError => ({
  type: 'InvalidTransferConfigError',
  message: `Invalid transfer configuration: ${details.join('; ')}`,
  details,
});

export const createUnresolvedReferenceWarning = (
  templateName: TemplateName,
  entityId: EntityId,
  field: string,
  referenceId: EntityId
): UnresolvedReferenceWarning => ({
  type: 'UnresolvedReferenceWarning',
  message: `Reference ${field}=${referenceId} of '${templateName}' entity ${entityId} could not be resolved`,
  templateName,
  entityId,
  field,
  referenceId,
});

export const createUnknownTemplateOrderWarning = (
  templateName: TemplateName
): UnknownTemplateOrderWarning => ({
  type: 'UnknownTemplateOrderWarning',
  message: `Template '${templateName}' has no declared post order position; posting it last`,
  templateName,
});

export const createOwnershipExcludedWarning = (
  templateName: TemplateName,
  count: number,
  reason: string
): OwnershipExcludedWarning => ({
  type: 'OwnershipExcludedWarning',
  message: `Excluded ${String(count)} '${templateName}' record(s): ${reason}`,
  templateName,
  count,
});
