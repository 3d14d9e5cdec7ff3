// Configuration
export {
  BIOT_TRANSFER_CONFIG_INPUT,
  DEFAULT_TRANSFER_CONFIG,
  createTransferConfig,
  type CreateTransferConfigOptions,
} from './core/config.js';

// Graph and ordering
export { orderFor, validateDependencyOrder } from './core/dependency-order.js';
export type { PostOrder, OrderViolation } from './core/dependency-order.js';
export {
  carriedByOf,
  copyClosureOf,
  isReferenceObject,
  readReferenceIds,
  referenceFieldsOf,
  referenceTargetOf,
  referencesOf,
  rewriteReferenceIds,
  type EntityReference,
} from './core/reference-graph.js';
export { LookupTable, type LookupEntry } from './core/lookup-table.js';

// Report documents
export {
  DEVICE_BUILTIN_FIELDS,
  EntityRecordSchema,
  ReportDocumentSchema,
  parseBiotReportFiles,
  parseReportDocument,
  toReportDocument,
  type EntityRecord,
  type ReportDocument,
} from './core/report-document.js';

// Use cases
export {
  exportSnapshot,
  exportFullConfiguration,
  type ExportSnapshotDeps,
  type ExportSnapshotInput,
  type ExportFullConfigurationInput,
} from './core/usecases/export-snapshot.js';
export {
  filterForCopy,
  ROOT_FIELD,
  type FilterForCopyResult,
} from './core/usecases/filter-for-copy.js';
export {
  reassignOwnership,
  type ReassignOwnershipResult,
} from './core/usecases/reassign-ownership.js';
export {
  importSnapshot,
  prepareEntity,
  type ImportSnapshotDeps,
  type ImportSnapshotInput,
  type ImportResult,
  type PreparedEntity,
} from './core/usecases/import-snapshot.js';
export {
  transferSnapshot,
  transferOrgConfiguration,
  type TransferSnapshotDeps,
  type TransferSnapshotInput,
  type TransferOrgConfigurationDeps,
  type TransferOrgConfigurationInput,
  type TransferOrgConfigurationError,
} from './core/usecases/transfer-snapshot.js';

// Repositories
export {
  makeBiotEntityStore,
  GENERIC_ENTITIES_ENDPOINT,
  DEVICES_ENDPOINT,
  type BiotEntityStoreOptions,
} from './shell/repo/biot-entity-store.js';
export {
  makeBiotReportReader,
  DATA_REPORTS_ENDPOINT,
  type BiotReportReaderOptions,
  type FetchFileFn,
} from './shell/repo/biot-report-reader.js';
export { makeFsReportStore, reportSlug, type FsReportStoreOptions } from './shell/repo/fs-report-store.js';
export type {
  EntityStore,
  FetchEntitiesQuery,
  CreateEntityInput,
  UpdateEntityInput,
  ReportSource,
  ReportStore,
  ReportReadError,
} from './core/ports.js';

// Service
export {
  makeSnapshotService,
  makeFallbackReportSource,
  createSnapshotServiceFromEnv,
  DEFAULT_REPORTS_DIR,
  type SnapshotService,
  type SnapshotServiceDeps,
  type SnapshotServiceContext,
  type ExportOptions,
  type RunOptions,
  type ExportError,
} from './shell/service/snapshot-service.js';

// Types
export {
  toOrgId,
  DEVICES_KEY,
  DEFAULT_IMPORT_CONCURRENCY,
} from './core/types.js';
export type {
  OrgId,
  PendingField,
  PendingPatch,
  TemplateName,
  EntityId,
  EntityKind,
  Entity,
  Report,
  RootIds,
  JsonValue,
  JsonObject,
  ReferenceValue,
  ReferenceObject,
  TemplateReferenceSpec,
  TransferConfig,
} from './core/types.js';

// Errors
export * from './core/errors.js';
