/**
 * Export Snapshot Use Case
 *
 * Reads every entity of the requested templates created since a lower bound
 * and assembles them into a Report. All-or-nothing: a single failed fetch
 * discards everything read so far.
 */

import { ok, err, type Result } from 'neverthrow';

import { createUpstreamError } from '../../../../common/types/errors.js';
import { createUpstreamFetchError, type UpstreamFetchError } from '../errors.js';

import type { EntityStore } from '../ports.js';
import type { Entity, EntityKind, Report, TemplateName, TransferConfig } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ExportSnapshotDeps {
  entityStore: EntityStore;
  config: TransferConfig;
  logger: Logger;
  /** Clock used for the report timestamp and the default upper bound */
  now?: () => Date;
}

export interface ExportSnapshotInput {
  name: string;
  templateNames: readonly TemplateName[];
  /** Inclusive creation time lower bound (ISO 8601) */
  since: string;
  /** Inclusive creation time upper bound; defaults to now */
  until?: string;
  includeDevices?: boolean;
}

export interface ExportFullConfigurationInput {
  name: string;
  since: string;
  until?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const fetchTemplate = async (
  deps: ExportSnapshotDeps,
  kind: EntityKind,
  templateName: TemplateName,
  since: string,
  until: string
): Promise<Result<Entity[], UpstreamFetchError>> => {
  const result = await deps.entityStore.fetch({ kind, templateName, since, until });
  if (result.isErr()) {
    return err(createUpstreamFetchError(templateName, kind, result.error));
  }

  const foreign = result.value.find(
    (entity) => entity.templateName !== templateName || entity.kind !== kind
  );
  if (foreign !== undefined) {
    return err(
      createUpstreamFetchError(
        templateName,
        kind,
        createUpstreamError(`fetch:${templateName}`, 200, {
          reason: 'Store returned an entity of another template',
          entityId: foreign.id,
          templateName: foreign.templateName,
        })
      )
    );
  }

  return ok(result.value);
};

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Exports a snapshot of the given templates.
 *
 * Template names are treated as a set; fetches run one after another in the
 * order given.
 */
export const exportSnapshot = async (
  deps: ExportSnapshotDeps,
  input: ExportSnapshotInput
): Promise<Result<Report, UpstreamFetchError>> => {
  const now = (deps.now ?? (() => new Date()))();
  const until = input.until ?? now.toISOString();
  const templateNames = [...new Set(input.templateNames)];
  const log = deps.logger.child({ usecase: 'exportSnapshot', report: input.name });

  log.info({ templateNames, since: input.since, until }, 'Exporting snapshot');

  const entitiesByTemplate: Record<TemplateName, Entity[]> = {};
  for (const templateName of templateNames) {
    const fetched = await fetchTemplate(deps, 'generic-entity', templateName, input.since, until);
    if (fetched.isErr()) {
      log.error({ error: fetched.error }, 'Export aborted');
      return err(fetched.error);
    }
    entitiesByTemplate[templateName] = fetched.value;
    log.debug({ templateName, count: fetched.value.length }, 'Fetched template');
  }

  let devices: Entity[] | undefined;
  if (input.includeDevices === true) {
    const fetched = await fetchTemplate(
      deps,
      'device',
      deps.config.deviceTemplateName,
      input.since,
      until
    );
    if (fetched.isErr()) {
      log.error({ error: fetched.error }, 'Export aborted');
      return err(fetched.error);
    }
    devices = fetched.value;
  }

  const report: Report = {
    name: input.name,
    createdAt: now.toISOString(),
    entitiesByTemplate,
    ...(devices !== undefined && { devices }),
  };

  log.info(
    {
      templates: templateNames.length,
      entities: Object.values(entitiesByTemplate).reduce((sum, list) => sum + list.length, 0),
      devices: devices?.length ?? 0,
    },
    'Snapshot exported'
  );

  return ok(report);
};

/**
 * Exports every configuration template, devices included.
 */
export const exportFullConfiguration = async (
  deps: ExportSnapshotDeps,
  input: ExportFullConfigurationInput
): Promise<Result<Report, UpstreamFetchError>> =>
  exportSnapshot(deps, {
    name: input.name,
    templateNames: deps.config.configurationTemplateNames,
    since: input.since,
    ...(input.until !== undefined && { until: input.until }),
    includeDevices: true,
  });
