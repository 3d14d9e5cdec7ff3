/**
 * Snapshot Service
 *
 * Facade over the snapshot use cases, bound to an entity store, a report
 * store and a transfer configuration.
 */

import { err, ok, type Result } from 'neverthrow';

import { createConfig, parseEnv, type AppConfig } from '../../../../infra/config/env.js';
import { makeBiotHttpClient, type FetchFn } from '../../../../infra/http/biot-client.js';
import { createLogger } from '../../../../infra/logger/index.js';
import { DEFAULT_TRANSFER_CONFIG } from '../../core/config.js';
import {
  createReportNotFoundError,
  type PartialImportError,
  type ReportNotFoundError,
  type ReportStorageError,
  type UpstreamFetchError,
} from '../../core/errors.js';
import { exportFullConfiguration, exportSnapshot } from '../../core/usecases/export-snapshot.js';
import { importSnapshot, type ImportResult } from '../../core/usecases/import-snapshot.js';
import {
  transferOrgConfiguration,
  type TransferOrgConfigurationError,
} from '../../core/usecases/transfer-snapshot.js';
import { makeBiotEntityStore } from '../repo/biot-entity-store.js';
import { makeBiotReportReader } from '../repo/biot-report-reader.js';
import { makeFsReportStore } from '../repo/fs-report-store.js';

import type { EntityStore, ReportReadError, ReportSource, ReportStore } from '../../core/ports.js';
import type { OrgId, Report, RootIds, TemplateName, TransferConfig } from '../../core/types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface SnapshotServiceDeps {
  entityStore: EntityStore;
  /** Where exported reports are saved */
  reportStore: ReportStore;
  /** Where reports are looked up by name; defaults to `reportStore` */
  reportSource?: ReportSource;
  config?: TransferConfig;
  logger: Logger;
  /** Default creation time lower bound for exports */
  since: string;
  importConcurrency?: number;
  now?: () => Date;
}

export interface ExportOptions {
  since?: string;
  until?: string;
}

export interface RunOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

export type ExportError = UpstreamFetchError | ReportStorageError;

export interface SnapshotService {
  /** Exports the given templates and saves the report. Resolves to the report id. */
  exportSnapshotByTemplates(
    name: string,
    templateNames: readonly TemplateName[],
    options?: ExportOptions & { includeDevices?: boolean }
  ): Promise<Result<string, ExportError>>;

  /** Exports every configuration template and device, and saves the report. */
  exportFullConfigurationSnapshot(
    name: string,
    options?: ExportOptions
  ): Promise<Result<string, ExportError>>;

  getReportFileByName(name: string): Promise<Result<Report, ReportReadError | ReportNotFoundError>>;

  importConfigurationSnapshot(
    report: Report,
    targetOrg: OrgId,
    options?: RunOptions
  ): Promise<Result<ImportResult, PartialImportError>>;

  transferOrgConfiguration(
    srcOrg: OrgId,
    dstOrg: OrgId,
    reportName: string,
    rootIds?: RootIds,
    options?: RunOptions
  ): Promise<Result<ImportResult, TransferOrgConfigurationError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Report Sources
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Looks a report up in each source in turn; the first one that has it wins.
 * An error from any source stops the lookup.
 */
export const makeFallbackReportSource = (sources: readonly ReportSource[]): ReportSource => ({
  async findByName(name: string): Promise<Result<Report | null, ReportReadError>> {
    for (const source of sources) {
      const found = await source.findByName(name);
      if (found.isErr() || found.value !== null) {
        return found;
      }
    }
    return ok(null);
  },
});

// ─────────────────────────────────────────────────────────────────────────────
// Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeSnapshotService = (deps: SnapshotServiceDeps): SnapshotService => {
  const config = deps.config ?? DEFAULT_TRANSFER_CONFIG;
  const reportSource = deps.reportSource ?? deps.reportStore;
  const exportDeps = {
    entityStore: deps.entityStore,
    config,
    logger: deps.logger,
    ...(deps.now !== undefined && { now: deps.now }),
  };
  const concurrencyOf = (options: RunOptions | undefined): number | undefined =>
    options?.concurrency ?? deps.importConcurrency;

  const save = async (
    exported: Result<Report, UpstreamFetchError>
  ): Promise<Result<string, ExportError>> => {
    if (exported.isErr()) {
      return err(exported.error);
    }
    return deps.reportStore.save(exported.value);
  };

  return {
    async exportSnapshotByTemplates(name, templateNames, options) {
      return save(
        await exportSnapshot(exportDeps, {
          name,
          templateNames,
          since: options?.since ?? deps.since,
          ...(options?.until !== undefined && { until: options.until }),
          ...(options?.includeDevices !== undefined && { includeDevices: options.includeDevices }),
        })
      );
    },

    async exportFullConfigurationSnapshot(name, options) {
      return save(
        await exportFullConfiguration(exportDeps, {
          name,
          since: options?.since ?? deps.since,
          ...(options?.until !== undefined && { until: options.until }),
        })
      );
    },

    async getReportFileByName(name) {
      const found = await reportSource.findByName(name);
      if (found.isErr()) {
        return err(found.error);
      }
      if (found.value === null) {
        return err(createReportNotFoundError(name));
      }
      return ok(found.value);
    },

    async importConfigurationSnapshot(report, targetOrg, options) {
      const concurrency = concurrencyOf(options);
      return importSnapshot(
        { entityStore: deps.entityStore, config, logger: deps.logger },
        {
          report,
          targetOrg,
          ...(concurrency !== undefined && { concurrency }),
          ...(options?.signal !== undefined && { signal: options.signal }),
        }
      );
    },

    async transferOrgConfiguration(srcOrg, dstOrg, reportName, rootIds, options) {
      const concurrency = concurrencyOf(options);
      return transferOrgConfiguration(
        { entityStore: deps.entityStore, reportSource, config, logger: deps.logger },
        {
          srcOrg,
          dstOrg,
          reportName,
          ...(rootIds !== undefined && { rootIds }),
          ...(concurrency !== undefined && { concurrency }),
          ...(options?.signal !== undefined && { signal: options.signal }),
        }
      );
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Composition
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_REPORTS_DIR = 'reports';

export interface SnapshotServiceContext {
  service: SnapshotService;
  config: AppConfig;
  logger: Logger;
}

/**
 * Builds a SnapshotService from environment variables.
 *
 * Reports are saved as JSON files under SNAPSHOT_REPORTS_DIR; lookups by name
 * try those files first, then Bio-T data reports.
 */
export const createSnapshotServiceFromEnv = (
  env: NodeJS.ProcessEnv = process.env,
  overrides: { fetch?: FetchFn } = {}
): SnapshotServiceContext => {
  const config = createConfig(parseEnv(env));
  const logger = createLogger(config.logger);

  const client = makeBiotHttpClient({
    ...config.biot,
    logger,
    ...(overrides.fetch !== undefined && { fetch: overrides.fetch }),
  });
  const reportStore = makeFsReportStore({
    rootDir: config.snapshot.reportsDir ?? DEFAULT_REPORTS_DIR,
    logger,
  });
  const reportReader = makeBiotReportReader({
    client,
    logger,
    ...(overrides.fetch !== undefined && { fetch: overrides.fetch }),
  });

  const service = makeSnapshotService({
    entityStore: makeBiotEntityStore({ client, logger }),
    reportStore,
    reportSource: makeFallbackReportSource([reportStore, reportReader]),
    logger,
    since: config.snapshot.since,
    importConcurrency: config.snapshot.importConcurrency,
  });

  return { service, config, logger };
};
