/**
 * Report Document
 *
 * The portable form of a Report exchanged between export and import, and the
 * conversion from Bio-T data-report output files.
 */

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { createInvalidReportError, type InvalidReportError } from './errors.js';
import { DEVICES_KEY, type Entity, type JsonObject, type JsonValue, type Report } from './types.js';

import type { ValueError } from '@sinclair/typebox/errors';

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const EntityRecordSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  templateName: Type.String({ minLength: 1 }),
  kind: Type.Union([Type.Literal('generic-entity'), Type.Literal('device')]),
  name: Type.Optional(Type.String()),
  templateId: Type.Optional(Type.String()),
  ownerOrganizationId: Type.Optional(Type.String()),
  createdAt: Type.Optional(Type.String()),
  data: Type.Record(Type.String(), Type.Unknown()),
});

export const ReportDocumentSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  createdAt: Type.String(),
  entities: Type.Record(Type.String(), Type.Array(EntityRecordSchema)),
  [DEVICES_KEY]: Type.Optional(Type.Array(EntityRecordSchema)),
});

export type EntityRecord = Static<typeof EntityRecordSchema>;
export type ReportDocument = Static<typeof ReportDocumentSchema>;

/**
 * One record of a Bio-T data-report output file. Built-in attributes start
 * with an underscore; every other key is a template field.
 */
const BiotRecordSchema = Type.Object({
  _id: Type.String({ minLength: 1 }),
  _name: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  _template: Type.Object({
    id: Type.Optional(Type.String()),
    name: Type.String({ minLength: 1 }),
  }),
  _ownerOrganization: Type.Optional(
    Type.Union([Type.Object({ id: Type.String() }), Type.Null()])
  ),
  _creationTime: Type.Optional(Type.String()),
});

const BiotReportFilesSchema = Type.Object({
  'generic-entity': Type.Optional(Type.Array(BiotRecordSchema)),
  device: Type.Optional(Type.Array(BiotRecordSchema)),
});

const documentValidator = TypeCompiler.Compile(ReportDocumentSchema);
const biotFilesValidator = TypeCompiler.Compile(BiotReportFilesSchema);

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

// ─────────────────────────────────────────────────────────────────────────────
// JSON helpers
// ─────────────────────────────────────────────────────────────────────────────

const isJsonValue = (value: unknown): value is JsonValue => {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (value === null) {
        return true;
      }
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
};

const toJsonObject = (
  fields: Record<string, unknown>,
  path: string,
  details: string[]
): JsonObject => {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (isJsonValue(value)) {
      result[key] = value;
    } else {
      details.push(`${path}/${key}: value is not JSON`);
    }
  }
  return result;
};

// ─────────────────────────────────────────────────────────────────────────────
// Report <-> Document
// ─────────────────────────────────────────────────────────────────────────────

const toEntityRecord = (entity: Entity): EntityRecord => ({
  id: entity.id,
  templateName: entity.templateName,
  kind: entity.kind,
  ...(entity.name !== undefined && { name: entity.name }),
  ...(entity.templateId !== undefined && { templateId: entity.templateId }),
  ...(entity.ownerOrganizationId !== undefined && {
    ownerOrganizationId: entity.ownerOrganizationId,
  }),
  ...(entity.createdAt !== undefined && { createdAt: entity.createdAt }),
  data: structuredClone(entity.data),
});

/**
 * Converts a report to its portable document form.
 */
export const toReportDocument = (report: Report): ReportDocument => {
  const entities: Record<string, EntityRecord[]> = {};
  for (const [templateName, list] of Object.entries(report.entitiesByTemplate)) {
    entities[templateName] = list.map(toEntityRecord);
  }

  return {
    name: report.name,
    createdAt: report.createdAt,
    entities,
    ...(report.devices !== undefined && { [DEVICES_KEY]: report.devices.map(toEntityRecord) }),
  };
};

const fromEntityRecord = (record: EntityRecord, path: string, details: string[]): Entity => ({
  id: record.id,
  templateName: record.templateName,
  kind: record.kind,
  ...(record.name !== undefined && { name: record.name }),
  ...(record.templateId !== undefined && { templateId: record.templateId }),
  ...(record.ownerOrganizationId !== undefined && {
    ownerOrganizationId: record.ownerOrganizationId,
  }),
  ...(record.createdAt !== undefined && { createdAt: record.createdAt }),
  data: toJsonObject(record.data, `${path}/data`, details),
});

/**
 * Validates a parsed document and converts it back into a Report.
 */
export const parseReportDocument = (value: unknown): Result<Report, InvalidReportError> => {
  if (!documentValidator.Check(value)) {
    return err(
      createInvalidReportError(
        'Report document does not match the expected schema',
        formatSchemaErrors(documentValidator.Errors(value))
      )
    );
  }

  const details: string[] = [];
  const entitiesByTemplate: Record<string, Entity[]> = {};

  for (const [templateName, records] of Object.entries(value.entities)) {
    const seen = new Set<string>();
    entitiesByTemplate[templateName] = records.map((record, index) => {
      const path = `/entities/${templateName}/${String(index)}`;
      if (record.templateName !== templateName) {
        details.push(`${path}/templateName: expected '${templateName}'`);
      }
      if (record.kind !== 'generic-entity') {
        details.push(`${path}/kind: devices belong under '${DEVICES_KEY}'`);
      }
      if (seen.has(record.id)) {
        details.push(`${path}/id: duplicate id '${record.id}'`);
      }
      seen.add(record.id);
      return fromEntityRecord(record, path, details);
    });
  }

  const devices = value[DEVICES_KEY]?.map((record, index) => {
    const path = `/${DEVICES_KEY}/${String(index)}`;
    if (record.kind !== 'device') {
      details.push(`${path}/kind: expected 'device'`);
    }
    return fromEntityRecord(record, path, details);
  });

  if (details.length > 0) {
    return err(createInvalidReportError('Report document is inconsistent', details));
  }

  return ok({
    name: value.name,
    createdAt: value.createdAt,
    entitiesByTemplate,
    ...(devices !== undefined && { devices }),
  });
};

// ─────────────────────────────────────────────────────────────────────────────
// Bio-T data-report output
// ─────────────────────────────────────────────────────────────────────────────

type BiotRecord = Static<typeof BiotRecordSchema>;

/** Built-in device attributes that must be sent back when a device is created */
export const DEVICE_BUILTIN_FIELDS: readonly string[] = ['_configuration', '_timezone'];

const isPortableKey = (key: string, kind: Entity['kind']): boolean =>
  !key.startsWith('_') || (kind === 'device' && DEVICE_BUILTIN_FIELDS.includes(key));

const fromBiotRecord = (
  record: BiotRecord,
  kind: Entity['kind'],
  path: string,
  details: string[]
): Entity => {
  const customFields = Object.fromEntries(
    Object.entries(record).filter(([key]) => isPortableKey(key, kind))
  );

  return {
    id: record._id,
    templateName: record._template.name,
    kind,
    ...(typeof record._name === 'string' && { name: record._name }),
    ...(record._template.id !== undefined && { templateId: record._template.id }),
    ...(record._ownerOrganization != null && {
      ownerOrganizationId: record._ownerOrganization.id,
    }),
    ...(record._creationTime !== undefined && { createdAt: record._creationTime }),
    data: toJsonObject(customFields, path, details),
  };
};

/**
 * Builds a Report from the JSON files of a Bio-T data report, keyed by data
 * type ('generic-entity', 'device').
 */
export const parseBiotReportFiles = (
  name: string,
  files: unknown,
  createdAt: string = new Date().toISOString()
): Result<Report, InvalidReportError> => {
  if (!biotFilesValidator.Check(files)) {
    return err(
      createInvalidReportError(
        `Data report '${name}' has an unexpected format`,
        formatSchemaErrors(biotFilesValidator.Errors(files))
      )
    );
  }

  const details: string[] = [];
  const entitiesByTemplate: Record<string, Entity[]> = {};

  (files['generic-entity'] ?? []).forEach((record, index) => {
    const path = `/generic-entity/${String(index)}`;
    const entity = fromBiotRecord(record, 'generic-entity', path, details);
    const list = entitiesByTemplate[entity.templateName] ?? [];
    list.push(entity);
    entitiesByTemplate[entity.templateName] = list;
  });

  const devices = files.device?.map((record, index) =>
    fromBiotRecord(record, 'device', `/device/${String(index)}`, details)
  );

  if (details.length > 0) {
    return err(createInvalidReportError(`Data report '${name}' contains non-JSON values`, details));
  }

  return ok({
    name,
    createdAt,
    entitiesByTemplate,
    ...(devices !== undefined && { devices }),
  });
};
