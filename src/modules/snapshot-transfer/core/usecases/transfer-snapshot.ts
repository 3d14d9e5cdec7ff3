/**
 * Transfer Snapshot Use Case
 *
 * Copies the configuration of one organization into another from a stored
 * report: ownership is reassigned, the report is optionally reduced to a set
 * of roots, then imported.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createReportNotFoundError,
  type PartialImportError,
  type ReportNotFoundError,
} from '../errors.js';
import { filterForCopy } from './filter-for-copy.js';
import { importSnapshot, type ImportResult } from './import-snapshot.js';
import { reassignOwnership } from './reassign-ownership.js';

import type { EntityStore, ReportReadError, ReportSource } from '../ports.js';
import type { OrgId, Report, RootIds, TransferConfig } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface TransferSnapshotDeps {
  entityStore: EntityStore;
  config: TransferConfig;
  logger: Logger;
}

export interface TransferSnapshotInput {
  srcOrg: OrgId;
  dstOrg: OrgId;
  report: Report;
  /** Copy only these entities and what travels with them */
  rootIds?: RootIds;
  concurrency?: number;
  signal?: AbortSignal;
}

export interface TransferOrgConfigurationDeps extends TransferSnapshotDeps {
  reportSource: ReportSource;
}

export interface TransferOrgConfigurationInput {
  srcOrg: OrgId;
  dstOrg: OrgId;
  reportName: string;
  rootIds?: RootIds;
  concurrency?: number;
  signal?: AbortSignal;
}

export type TransferOrgConfigurationError =
  | ReportReadError
  | ReportNotFoundError
  | PartialImportError;

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Imports the part of `report` owned by `srcOrg` into `dstOrg`.
 *
 * Warnings of the ownership and filter steps come first in the result.
 */
export const transferSnapshot = async (
  deps: TransferSnapshotDeps,
  input: TransferSnapshotInput
): Promise<Result<ImportResult, PartialImportError>> => {
  const { srcOrg, dstOrg } = input;
  const log = deps.logger.child({ usecase: 'transferSnapshot', srcOrg, dstOrg });

  const reassigned = reassignOwnership(input.report, srcOrg, dstOrg);
  for (const warning of reassigned.warnings) {
    log.info({ templateName: warning.templateName, count: warning.count }, warning.message);
  }

  const filtered =
    input.rootIds !== undefined
      ? filterForCopy(deps.config, reassigned.report, input.rootIds)
      : { report: reassigned.report, warnings: [] };
  for (const warning of filtered.warnings) {
    log.warn({ templateName: warning.templateName, field: warning.field }, warning.message);
  }

  const prior = [...reassigned.warnings, ...filtered.warnings];

  const imported = await importSnapshot(deps, {
    report: filtered.report,
    targetOrg: dstOrg,
    ...(input.concurrency !== undefined && { concurrency: input.concurrency }),
    ...(input.signal !== undefined && { signal: input.signal }),
  });

  if (imported.isErr()) {
    return err({ ...imported.error, warnings: [...prior, ...imported.error.warnings] });
  }

  return ok({ ...imported.value, warnings: [...prior, ...imported.value.warnings] });
};

/**
 * Loads a stored report by name and transfers it between organizations.
 */
export const transferOrgConfiguration = async (
  deps: TransferOrgConfigurationDeps,
  input: TransferOrgConfigurationInput
): Promise<Result<ImportResult, TransferOrgConfigurationError>> => {
  const found = await deps.reportSource.findByName(input.reportName);
  if (found.isErr()) {
    return err(found.error);
  }
  if (found.value === null) {
    return err(createReportNotFoundError(input.reportName));
  }

  return transferSnapshot(deps, {
    srcOrg: input.srcOrg,
    dstOrg: input.dstOrg,
    report: found.value,
    ...(input.rootIds !== undefined && { rootIds: input.rootIds }),
    ...(input.concurrency !== undefined && { concurrency: input.concurrency }),
    ...(input.signal !== undefined && { signal: input.signal }),
  });
};
