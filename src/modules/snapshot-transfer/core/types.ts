/**
 * Snapshot Transfer Module - Domain Types
 *
 * Entities are tagged values (template name + field map). Template-specific
 * behaviour lives in TransferConfig lookups, never in per-template types.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Branded Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Branded type for organization identifiers.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- __brand is the standard pattern for branded types in TypeScript
export type OrgId = string & { readonly __brand: unique symbol };

/**
 * Type-safe constructor for OrgId.
 */
export const toOrgId = (id: string): OrgId => id as OrgId;

export type TemplateName = string;
export type EntityId = string;

// ─────────────────────────────────────────────────────────────────────────────
// Values
// ─────────────────────────────────────────────────────────────────────────────

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * A pointer to another entity: either the bare id or an object carrying it
 * (the API embeds `{ id, name, templateName }` in reference fields).
 */
export type ReferenceValue = EntityId | ReferenceObject;

export interface ReferenceObject {
  readonly id: EntityId;
  readonly [key: string]: JsonValue;
}

// ─────────────────────────────────────────────────────────────────────────────
// Entities and Reports
// ─────────────────────────────────────────────────────────────────────────────

export type EntityKind = 'generic-entity' | 'device';

/**
 * A typed record. `id` is only meaningful inside its owner organization.
 */
export interface Entity {
  readonly id: EntityId;
  readonly templateName: TemplateName;
  readonly kind: EntityKind;
  /** Display name (`_name`) */
  readonly name?: string | undefined;
  /** Source template id, needed to post devices */
  readonly templateId?: string | undefined;
  readonly ownerOrganizationId?: string | undefined;
  /** ISO 8601 creation time in the source organization */
  readonly createdAt?: string | undefined;
  /** Custom (non built-in) fields */
  readonly data: JsonObject;
}

/**
 * A named snapshot of interrelated entities.
 */
export interface Report {
  readonly name: string;
  /** ISO 8601 */
  readonly createdAt: string;
  readonly entitiesByTemplate: Readonly<Record<TemplateName, readonly Entity[]>>;
  readonly devices?: readonly Entity[] | undefined;
}

/**
 * Root entity ids per template, used to select a subset of a report.
 */
export type RootIds = Readonly<Record<TemplateName, readonly EntityId[]>>;

/**
 * A reference field posted with ids that were not yet in the lookup table.
 */
export interface PendingField {
  /** Source-org value of the field */
  readonly original: JsonValue;
  readonly unresolvedIds: readonly EntityId[];
}

/**
 * An entity that was posted with at least one unresolved reference.
 * State: posted -> reference-pending -> resolved (or reported unresolved).
 */
export interface PendingPatch {
  readonly templateName: TemplateName;
  readonly kind: EntityKind;
  readonly sourceId: EntityId;
  readonly destinationId: EntityId;
  readonly fields: Readonly<Record<string, PendingField>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Transfer Configuration
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Per-template reference declarations.
 */
export interface TemplateReferenceSpec {
  /** Reference field name -> template of the referenced entities */
  readonly references?: Readonly<Record<string, TemplateName>>;
  /** Referenced templates that must accompany an entity of this template when copied */
  readonly copyClosure?: readonly TemplateName[];
  /**
   * Reference fields through which this template is carried along: an entity is
   * retained when the entity one of these fields points at is retained.
   */
  readonly carriedBy?: readonly string[];
}

/**
 * Immutable configuration shared by the filter and importer.
 */
export interface TransferConfig {
  /** Safe creation order of generic-entity templates */
  readonly postOrder: readonly TemplateName[];
  readonly referenceGraph: Readonly<Record<TemplateName, TemplateReferenceSpec>>;
  /** Fields stripped before posting; key '*' applies to every template */
  readonly nonPortableFields: Readonly<Record<TemplateName | '*', readonly string[]>>;
  /** Templates exported by a full configuration snapshot */
  readonly configurationTemplateNames: readonly TemplateName[];
  readonly deviceTemplateName: TemplateName;
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Reserved key under which devices are stored in a report document */
export const DEVICES_KEY = 'devices';

/** Default number of concurrent posts within one template */
export const DEFAULT_IMPORT_CONCURRENCY = 1;
