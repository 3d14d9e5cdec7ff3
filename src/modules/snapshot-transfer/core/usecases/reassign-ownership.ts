/**
 * Reassign Ownership Use Case
 *
 * Prepares a report exported from one organization for import into another.
 */

import { createOwnershipExcludedWarning, type OwnershipExcludedWarning } from '../errors.js';

import type { Entity, OrgId, Report, TemplateName } from '../types.js';

export interface ReassignOwnershipResult {
  readonly report: Report;
  readonly warnings: OwnershipExcludedWarning[];
}

/**
 * Keeps entities owned by `srcOrg` (or with no recorded owner) and moves them
 * to `dstOrg`. Devices are dropped: their ids are global serial numbers and
 * cannot be duplicated in another organization.
 */
export const reassignOwnership = (
  report: Report,
  srcOrg: OrgId,
  dstOrg: OrgId
): ReassignOwnershipResult => {
  const warnings: OwnershipExcludedWarning[] = [];
  const entitiesByTemplate: Record<TemplateName, Entity[]> = {};

  for (const [templateName, entities] of Object.entries(report.entitiesByTemplate)) {
    const owned = entities.filter(
      (entity) => entity.ownerOrganizationId === undefined || entity.ownerOrganizationId === srcOrg
    );

    const excluded = entities.length - owned.length;
    if (excluded > 0) {
      warnings.push(
        createOwnershipExcludedWarning(templateName, excluded, `not owned by organization ${srcOrg}`)
      );
    }

    entitiesByTemplate[templateName] = owned.map((entity) => ({
      ...entity,
      ownerOrganizationId: dstOrg,
    }));
  }

  const devices = report.devices ?? [];
  if (devices.length > 0) {
    const templateName = devices[0]?.templateName ?? 'device';
    warnings.push(
      createOwnershipExcludedWarning(
        templateName,
        devices.length,
        'devices are not copied between organizations'
      )
    );
  }

  return {
    report: {
      name: report.name,
      createdAt: report.createdAt,
      entitiesByTemplate,
    },
    warnings,
  };
};
