/**
 * Transfer Configuration
 *
 * Builds the immutable TransferConfig consumed by the filter and importer.
 */

import { err, ok, type Result } from 'neverthrow';

import { validateDependencyOrder } from './dependency-order.js';
import { createInvalidTransferConfigError, type InvalidTransferConfigError } from './errors.js';

import type { TransferConfig } from './types.js';

/**
 * Bio-T montage configuration set: sensors, patches, montages and the channels
 * and calibration steps attached to each montage.
 */
export const BIOT_TRANSFER_CONFIG_INPUT: TransferConfig = {
  postOrder: ['sensor', 'patch', 'montage_configuration', 'calibration_step', 'channel'],
  referenceGraph: {
    montage_configuration: {
      references: { patch: 'patch' },
      copyClosure: ['patch'],
    },
    channel: {
      references: { montage_configuration: 'montage_configuration' },
      copyClosure: ['montage_configuration'],
      carriedBy: ['montage_configuration'],
    },
    calibration_step: {
      // field name as defined in the template
      references: { montage_calibraterd: 'montage_configuration' },
      copyClosure: ['montage_configuration'],
      carriedBy: ['montage_calibraterd'],
    },
  },
  nonPortableFields: {
    '*': ['full_patch_json'],
    montage_configuration: ['montage_image'],
    sensor: ['device'],
  },
  configurationTemplateNames: [
    'sensor',
    'patch',
    'montage_configuration',
    'channel',
    'calibration_step',
  ],
  deviceTemplateName: 'androidgateway',
};

export interface CreateTransferConfigOptions {
  /** Reject configurations whose post order contradicts the reference graph */
  strictOrder?: boolean;
}

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
};

const findDuplicates = (values: readonly string[]): string[] =>
  values.filter((value, index) => values.indexOf(value) !== index);

/**
 * Validates a configuration and returns a deep-frozen copy of it.
 */
export const createTransferConfig = (
  input: TransferConfig,
  options: CreateTransferConfigOptions = {}
): Result<TransferConfig, InvalidTransferConfigError> => {
  const details: string[] = [];

  for (const duplicate of findDuplicates(input.postOrder)) {
    details.push(`postOrder lists '${duplicate}' more than once`);
  }

  if (input.deviceTemplateName.trim() === '') {
    details.push('deviceTemplateName must not be empty');
  }

  for (const [templateName, spec] of Object.entries(input.referenceGraph)) {
    const references = spec.references ?? {};
    const targets = new Set(Object.values(references));

    for (const companion of spec.copyClosure ?? []) {
      if (!targets.has(companion)) {
        details.push(
          `${templateName}.copyClosure names '${companion}' but no reference field points at it`
        );
      }
    }

    for (const field of spec.carriedBy ?? []) {
      if (references[field] === undefined) {
        details.push(`${templateName}.carriedBy names '${field}' which is not a reference field`);
      }
    }
  }

  if (options.strictOrder === true) {
    for (const violation of validateDependencyOrder(input)) {
      details.push(
        `${violation.templateName}.${violation.field} references '${violation.targetTemplate}' which is not posted earlier`
      );
    }
  }

  if (details.length > 0) {
    return err(createInvalidTransferConfigError(details));
  }

  return ok(deepFreeze(structuredClone(input)));
};

const defaultConfigResult = createTransferConfig(BIOT_TRANSFER_CONFIG_INPUT, { strictOrder: true });
if (defaultConfigResult.isErr()) {
  throw new Error(defaultConfigResult.error.message);
}

/**
 * Validated, frozen default configuration.
 */
export const DEFAULT_TRANSFER_CONFIG: TransferConfig = defaultConfigResult.value;
