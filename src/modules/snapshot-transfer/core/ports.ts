/**
 * Snapshot Transfer Module - Port Interfaces
 *
 * Contracts the shell layer must implement.
 */

import type { AmbiguousReportError, InvalidReportError, ReportStorageError } from './errors.js';
import type { Entity, EntityId, EntityKind, JsonObject, OrgId, Report, TemplateName } from './types.js';
import type { UpstreamError } from '../../../common/types/errors.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Entity Store
// ─────────────────────────────────────────────────────────────────────────────

export interface FetchEntitiesQuery {
  readonly kind: EntityKind;
  readonly templateName: TemplateName;
  /** Inclusive creation time lower bound (ISO 8601) */
  readonly since: string;
  /** Inclusive creation time upper bound (ISO 8601) */
  readonly until: string;
}

export interface CreateEntityInput {
  readonly kind: EntityKind;
  readonly templateName: TemplateName;
  readonly ownerOrganizationId: OrgId;
  readonly name?: string | undefined;
  readonly templateId?: string | undefined;
  /** Devices keep their source id; generic entities get a new one */
  readonly sourceId: EntityId;
  readonly data: JsonObject;
}

export interface UpdateEntityInput {
  readonly kind: EntityKind;
  readonly templateName: TemplateName;
  readonly id: EntityId;
  readonly data: JsonObject;
}

/**
 * Remote store of generic entities and devices.
 */
export interface EntityStore {
  /** All entities of a template created within the given window. */
  fetch(query: FetchEntitiesQuery): Promise<Result<Entity[], UpstreamError>>;

  /** Creates an entity and returns its id in the owner organization. */
  create(input: CreateEntityInput): Promise<Result<EntityId, UpstreamError>>;

  /** Applies a partial update to an existing entity. */
  update(input: UpdateEntityInput): Promise<Result<void, UpstreamError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Report Persistence
// ─────────────────────────────────────────────────────────────────────────────

export type ReportReadError =
  | UpstreamError
  | InvalidReportError
  | AmbiguousReportError
  | ReportStorageError;

/**
 * Read access to stored reports.
 */
export interface ReportSource {
  /** @returns The report if found, null if no report has that name */
  findByName(name: string): Promise<Result<Report | null, ReportReadError>>;
}

/**
 * Read/write access to stored reports.
 */
export interface ReportStore extends ReportSource {
  /** Persists a report and returns its id. Saving under an existing name replaces it. */
  save(report: Report): Promise<Result<string, ReportStorageError>>;
}
