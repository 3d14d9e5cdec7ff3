/**
 * Filter For Copy Use Case
 *
 * Reduces a report to a set of root entities plus everything that has to travel
 * with them, expanding to a fixed point.
 */

import { createUnresolvedReferenceWarning, type UnresolvedReferenceWarning } from '../errors.js';
import {
  carriedByOf,
  copyClosureOf,
  readReferenceIds,
  referenceTargetOf,
  referencesOf,
} from '../reference-graph.js';

import type {
  Entity,
  EntityId,
  Report,
  RootIds,
  TemplateName,
  TransferConfig,
} from '../types.js';

export interface FilterForCopyResult {
  readonly report: Report;
  readonly warnings: UnresolvedReferenceWarning[];
}

/** Field name used in warnings for requested roots missing from the report */
export const ROOT_FIELD = '<root>';

const keyOf = (templateName: TemplateName, id: EntityId): string => `${templateName}\u0000${id}`;

/**
 * Entities of a report, addressable by (template, id). Devices are indexed
 * under the device template so they can be reference targets.
 */
const indexReport = (config: TransferConfig, report: Report): Map<string, Entity> => {
  const index = new Map<string, Entity>();
  for (const entities of Object.values(report.entitiesByTemplate)) {
    for (const entity of entities) {
      index.set(keyOf(entity.templateName, entity.id), entity);
    }
  }
  for (const device of report.devices ?? []) {
    index.set(keyOf(config.deviceTemplateName, device.id), device);
  }
  return index;
};

/**
 * Reverse links for `carriedBy`: target key -> entities that follow it.
 */
const indexCarriers = (
  config: TransferConfig,
  index: ReadonlyMap<string, Entity>
): Map<string, Entity[]> => {
  const carriers = new Map<string, Entity[]>();

  for (const entity of index.values()) {
    for (const field of carriedByOf(config, entity.templateName)) {
      const targetTemplate = referenceTargetOf(config, entity.templateName, field);
      if (targetTemplate === undefined) {
        continue;
      }
      for (const id of readReferenceIds(entity.data[field])) {
        const key = keyOf(targetTemplate, id);
        const list = carriers.get(key) ?? [];
        list.push(entity);
        carriers.set(key, list);
      }
    }
  }

  return carriers;
};

/**
 * Keeps the root entities and, transitively:
 * - entities they reference through fields whose target template is in their copy closure
 * - entities carried by a retained entity (see TemplateReferenceSpec.carriedBy)
 *
 * Referenced entities missing from the report are reported, not fatal.
 * Applying the filter to its own output with the same roots is a no-op.
 */
export const filterForCopy = (
  config: TransferConfig,
  report: Report,
  rootIds: RootIds
): FilterForCopyResult => {
  const index = indexReport(config, report);
  const carriers = indexCarriers(config, index);

  const retained = new Set<string>();
  const worklist: Entity[] = [];
  const warnings: UnresolvedReferenceWarning[] = [];
  const warned = new Set<string>();

  const retain = (templateName: TemplateName, entity: Entity): void => {
    const key = keyOf(templateName, entity.id);
    if (!retained.has(key)) {
      retained.add(key);
      worklist.push(entity);
    }
  };

  const warn = (warning: UnresolvedReferenceWarning): void => {
    const key = [warning.templateName, warning.entityId, warning.field, warning.referenceId].join(
      '\u0000'
    );
    if (!warned.has(key)) {
      warned.add(key);
      warnings.push(warning);
    }
  };

  for (const [templateName, ids] of Object.entries(rootIds)) {
    for (const id of ids) {
      const entity = index.get(keyOf(templateName, id));
      if (entity === undefined) {
        warn(createUnresolvedReferenceWarning(templateName, id, ROOT_FIELD, id));
      } else {
        retain(templateName, entity);
      }
    }
  }

  let entity = worklist.pop();
  while (entity !== undefined) {
    const current = entity;
    const ownTemplate =
      current.kind === 'device' ? config.deviceTemplateName : current.templateName;
    const closure = copyClosureOf(config, current.templateName);

    for (const reference of referencesOf(config, current)) {
      if (!closure.has(reference.targetTemplate)) {
        continue;
      }
      for (const id of reference.ids) {
        const target = index.get(keyOf(reference.targetTemplate, id));
        if (target === undefined) {
          warn(
            createUnresolvedReferenceWarning(current.templateName, current.id, reference.field, id)
          );
        } else {
          retain(reference.targetTemplate, target);
        }
      }
    }

    for (const carried of carriers.get(keyOf(ownTemplate, current.id)) ?? []) {
      retain(carried.templateName, carried);
    }

    entity = worklist.pop();
  }

  const entitiesByTemplate: Record<TemplateName, Entity[]> = {};
  for (const [templateName, entities] of Object.entries(report.entitiesByTemplate)) {
    const kept = entities.filter((candidate) => retained.has(keyOf(templateName, candidate.id)));
    if (kept.length > 0) {
      entitiesByTemplate[templateName] = kept;
    }
  }

  const devices = report.devices?.filter((device) =>
    retained.has(keyOf(config.deviceTemplateName, device.id))
  );

  return {
    report: {
      name: report.name,
      createdAt: report.createdAt,
      entitiesByTemplate,
      ...(devices !== undefined && { devices }),
    },
    warnings,
  };
};
