/**
 * Reference Graph
 *
 * Lookups over the static reference declarations of a TransferConfig, plus the
 * helpers that read and rewrite reference values in every shape they take.
 */

import type {
  Entity,
  EntityId,
  JsonValue,
  ReferenceObject,
  TemplateName,
  TransferConfig,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Graph Lookups
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Fields of a template whose values are entity-id references.
 */
export const referenceFieldsOf = (
  config: TransferConfig,
  templateName: TemplateName
): ReadonlySet<string> => new Set(Object.keys(config.referenceGraph[templateName]?.references ?? {}));

/**
 * Template of the entities a reference field points at.
 */
export const referenceTargetOf = (
  config: TransferConfig,
  templateName: TemplateName,
  field: string
): TemplateName | undefined => config.referenceGraph[templateName]?.references?.[field];

/**
 * Referenced templates that must accompany a copied entity of this template.
 */
export const copyClosureOf = (
  config: TransferConfig,
  templateName: TemplateName
): ReadonlySet<TemplateName> => new Set(config.referenceGraph[templateName]?.copyClosure ?? []);

/**
 * Reference fields through which entities of this template follow their target.
 */
export const carriedByOf = (
  config: TransferConfig,
  templateName: TemplateName
): ReadonlySet<string> => new Set(config.referenceGraph[templateName]?.carriedBy ?? []);

// ─────────────────────────────────────────────────────────────────────────────
// Reference Values
// ─────────────────────────────────────────────────────────────────────────────

export const isReferenceObject = (value: JsonValue | undefined): value is ReferenceObject =>
  typeof value === 'object' &&
  value !== null &&
  !Array.isArray(value) &&
  typeof value['id'] === 'string';

/**
 * Reads the ids held by a reference field value.
 * Accepts an id, a `{ id }` object, an array of either, or null.
 */
export const readReferenceIds = (value: JsonValue | undefined): EntityId[] => {
  if (typeof value === 'string') {
    return value === '' ? [] : [value];
  }
  if (Array.isArray(value)) {
    return value.flatMap((item) => (Array.isArray(item) ? [] : readReferenceIds(item)));
  }
  if (isReferenceObject(value)) {
    return value.id === '' ? [] : [value.id];
  }
  return [];
};

/**
 * Returns a copy of a reference field value with every id passed through
 * `replace`. Ids for which `replace` returns undefined are kept as they are.
 */
export const rewriteReferenceIds = (
  value: JsonValue,
  replace: (id: EntityId) => EntityId | undefined
): JsonValue => {
  if (typeof value === 'string') {
    return value === '' ? value : (replace(value) ?? value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => rewriteReferenceIds(item, replace));
  }
  if (isReferenceObject(value)) {
    return { ...value, id: replace(value.id) ?? value.id };
  }
  return value;
};

/**
 * A reference held by an entity, with the template it points at.
 */
export interface EntityReference {
  readonly field: string;
  readonly targetTemplate: TemplateName;
  readonly ids: readonly EntityId[];
}

/**
 * Lists the declared, non-empty references of an entity.
 */
export const referencesOf = (config: TransferConfig, entity: Entity): EntityReference[] => {
  const references = config.referenceGraph[entity.templateName]?.references ?? {};
  const result: EntityReference[] = [];

  for (const [field, targetTemplate] of Object.entries(references)) {
    const ids = readReferenceIds(entity.data[field]);
    if (ids.length > 0) {
      result.push({ field, targetTemplate, ids });
    }
  }

  return result;
};
