/**
 * Dependency Order
 *
 * Posting order of templates. The order is declared in TransferConfig, not
 * derived from the reference graph; `validateDependencyOrder` reports where the
 * two disagree.
 */

import { createUnknownTemplateOrderWarning, type UnknownTemplateOrderWarning } from './errors.js';

import type { Report, TemplateName, TransferConfig } from './types.js';

export interface PostOrder {
  readonly order: TemplateName[];
  readonly warnings: UnknownTemplateOrderWarning[];
}

/**
 * A reference whose target template is posted after (or together with) the
 * template holding it.
 */
export interface OrderViolation {
  readonly templateName: TemplateName;
  readonly field: string;
  readonly targetTemplate: TemplateName;
}

/**
 * Templates of a report in safe creation order.
 *
 * Declared templates keep their relative order; templates without a declared
 * position follow in report order, each with a warning.
 */
export const orderFor = (config: TransferConfig, report: Report): PostOrder => {
  const present = Object.entries(report.entitiesByTemplate)
    .filter(([, entities]) => entities.length > 0)
    .map(([templateName]) => templateName);
  const presentSet = new Set(present);
  const declared = new Set(config.postOrder);

  const order = config.postOrder.filter((templateName) => presentSet.has(templateName));
  const warnings: UnknownTemplateOrderWarning[] = [];

  for (const templateName of present) {
    if (!declared.has(templateName)) {
      order.push(templateName);
      warnings.push(createUnknownTemplateOrderWarning(templateName));
    }
  }

  return { order, warnings };
};

/**
 * Checks that every declared reference between two ordered templates points
 * backwards in the post order. Self references are violations too: both ends
 * are posted in the same batch.
 */
export const validateDependencyOrder = (config: TransferConfig): OrderViolation[] => {
  const position = new Map(config.postOrder.map((templateName, index) => [templateName, index]));
  const violations: OrderViolation[] = [];

  for (const [templateName, spec] of Object.entries(config.referenceGraph)) {
    const own = position.get(templateName);
    if (own === undefined) {
      continue;
    }

    for (const [field, targetTemplate] of Object.entries(spec.references ?? {})) {
      const target = position.get(targetTemplate);
      if (target !== undefined && target >= own) {
        violations.push({ templateName, field, targetTemplate });
      }
    }
  }

  return violations;
};
