import { describe, expect, it } from 'vitest';

import { createUpstreamError } from '@/common/types/errors.js';
import { DEFAULT_TRANSFER_CONFIG } from '@/modules/snapshot-transfer/core/config.js';
import { LookupTable } from '@/modules/snapshot-transfer/core/lookup-table.js';
import { toOrgId, type TransferConfig } from '@/modules/snapshot-transfer/core/types.js';
import {
  importSnapshot,
  prepareEntity,
} from '@/modules/snapshot-transfer/core/usecases/import-snapshot.js';

import {
  makeDevice,
  makeEntity,
  makeReport,
  makeSensorDeviceConfig,
  makeTestLogger,
} from '../../fixtures/builders.js';
import { makeFakeEntityStore, type FakeEntityStoreOptions } from '../../fixtures/fakes.js';

const TARGET = toOrgId('org-dst');

const setup = (config: TransferConfig = makeSensorDeviceConfig(), options: FakeEntityStoreOptions = {}) => {
  const entityStore = makeFakeEntityStore(options);
  const deps = { entityStore, config, logger: makeTestLogger() };
  return { deps, entityStore };
};

const postFailure = createUpstreamError('/generic-entity/v1/generic-entities/templates/Device', 500, {
  code: 'boom',
});

describe('importSnapshot', () => {
  it('rewrites references to the ids created in the target organization', async () => {
    const { deps, entityStore } = setup();
    const report = makeReport([
      makeEntity('Sensor', 'A1'),
      makeEntity('Device', 'A2', { ownerRef: 'A1' }),
    ]);

    const result = await importSnapshot(deps, { report, targetOrg: TARGET });

    const value = result._unsafeUnwrap();
    expect(value.lookupTable.resolve('Sensor', 'A1')).toBe('new-A1');
    expect(value.lookupTable.resolve('Device', 'A2')).toBe('new-A2');
    expect(entityStore.findCreated('Device', 'A2')?.data).toEqual({ ownerRef: 'new-A1' });
    expect(value.warnings).toEqual([]);
    expect(value.cancelled).toBe(false);
    expect(value.patchedCount).toBe(0);
    expect(entityStore.updates).toEqual([]);
  });

  it('posts in dependency order regardless of report order', async () => {
    const { deps, entityStore } = setup();
    const report = makeReport([
      makeEntity('Device', 'A2', { ownerRef: 'A1' }),
      makeEntity('Sensor', 'A1'),
    ]);

    await importSnapshot(deps, { report, targetOrg: TARGET });

    expect(entityStore.created.map((entry) => entry.input.sourceId)).toEqual(['A1', 'A2']);
  });

  it('sends the target owner, name and source id with each create', async () => {
    const { deps, entityStore } = setup();
    const report = makeReport([makeEntity('Sensor', 'A1', { gain: 2 }, { name: 'Left sensor' })]);

    await importSnapshot(deps, { report, targetOrg: TARGET });

    expect(entityStore.created[0]?.input).toEqual({
      kind: 'generic-entity',
      templateName: 'Sensor',
      ownerOrganizationId: 'org-dst',
      name: 'Left sensor',
      templateId: undefined,
      sourceId: 'A1',
      data: { gain: 2 },
    });
  });

  it('strips non-portable fields and rewrites embedded reference objects', async () => {
    const { deps, entityStore } = setup(DEFAULT_TRANSFER_CONFIG);
    const report = makeReport([
      makeEntity('sensor', 's1', { device: 'GW-1', full_patch_json: '{}', label: 'chest' }),
      makeEntity('patch', 'p1', { size: 'L' }),
      makeEntity('montage_configuration', 'm1', {
        patch: { id: 'p1', name: 'Patch L', templateName: 'patch' },
        montage_image: 'file-1',
      }),
    ]);

    await importSnapshot(deps, { report, targetOrg: TARGET });

    expect(entityStore.findCreated('sensor', 's1')?.data).toEqual({ label: 'chest' });
    expect(entityStore.findCreated('montage_configuration', 'm1')?.data).toEqual({
      patch: { id: 'new-p1', name: 'Patch L', templateName: 'patch' },
    });
  });

  it('posts devices first and keeps their ids', async () => {
    const { deps, entityStore } = setup();
    const report = makeReport([makeEntity('Sensor', 'A1')], { devices: [makeDevice('GW-1')] });

    const result = await importSnapshot(deps, { report, targetOrg: TARGET });

    expect(entityStore.created.map((entry) => entry.id)).toEqual(['GW-1', 'new-A1']);
    expect(result._unsafeUnwrap().lookupTable.resolve('androidgateway', 'GW-1')).toBe('GW-1');
  });

  it('keeps unresolvable references and reports them', async () => {
    const { deps, entityStore } = setup();
    const report = makeReport([makeEntity('Device', 'A2', { ownerRef: ['A9'] })]);

    const result = await importSnapshot(deps, { report, targetOrg: TARGET });

    expect(entityStore.findCreated('Device', 'A2')?.data).toEqual({ ownerRef: ['A9'] });
    expect(entityStore.updates).toEqual([]);
    expect(result._unsafeUnwrap().warnings).toEqual([
      {
        type: 'UnresolvedReferenceWarning',
        message: "Reference ownerRef=A9 of 'Device' entity A2 could not be resolved",
        templateName: 'Device',
        entityId: 'A2',
        field: 'ownerRef',
        referenceId: 'A9',
      },
    ]);
  });

  it('patches references to entities posted later', async () => {
    const { deps, entityStore } = setup(makeSensorDeviceConfig({ postOrder: ['Device', 'Sensor'] }));
    const report = makeReport([
      makeEntity('Sensor', 'A1'),
      makeEntity('Device', 'A2', { ownerRef: 'A1', label: 'gw' }),
    ]);

    const result = await importSnapshot(deps, { report, targetOrg: TARGET });

    const value = result._unsafeUnwrap();
    expect(entityStore.updates).toEqual([
      { kind: 'generic-entity', templateName: 'Device', id: 'new-A2', data: { ownerRef: 'new-A1' } },
    ]);
    expect(entityStore.findCreated('Device', 'A2')?.data).toEqual({ ownerRef: 'new-A1', label: 'gw' });
    expect(value.patchedCount).toBe(1);
    expect(value.warnings).toEqual([]);
  });

  it('only patches fields that gained a resolution', async () => {
    const { deps, entityStore } = setup();
    const report = makeReport([
      makeEntity('Sensor', 'A1'),
      makeEntity('Device', 'A2', { ownerRef: ['A1', 'A9'] }),
    ]);

    const result = await importSnapshot(deps, { report, targetOrg: TARGET });

    expect(entityStore.findCreated('Device', 'A2')?.data).toEqual({ ownerRef: ['new-A1', 'A9'] });
    expect(entityStore.updates).toEqual([]);
    expect(result._unsafeUnwrap().warnings.map((warning) => warning.type)).toEqual([
      'UnresolvedReferenceWarning',
    ]);
  });

  it('stops at the first failed post and returns what was created', async () => {
    const { deps, entityStore } = setup(makeSensorDeviceConfig(), {
      failCreate: (input) => (input.sourceId === 'A2' ? postFailure : undefined),
    });
    const report = makeReport([
      makeEntity('Sensor', 'A1'),
      makeEntity('Device', 'A2', { ownerRef: 'A1' }),
      makeEntity('Device', 'A3', { ownerRef: 'A1' }),
    ]);

    const result = await importSnapshot(deps, { report, targetOrg: TARGET });

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('PartialImportError');
    expect(error.message).toBe('Import stopped after creating 1 entities (1 failure(s))');
    expect(error.lookupTable.entries()).toEqual([
      { templateName: 'Sensor', sourceId: 'A1', destinationId: 'new-A1' },
    ]);
    expect(error.failures).toEqual([
      {
        type: 'UpstreamPostError',
        message:
          "Failed to create 'Device' entity A2: Request to /generic-entity/v1/generic-entities/templates/Device failed with status 500",
        templateName: 'Device',
        sourceId: 'A2',
        statusCode: 500,
        body: { code: 'boom' },
      },
    ]);
    expect(entityStore.findCreated('Device', 'A3')).toBeUndefined();
  });

  it('reports references left dangling by a failed post', async () => {
    const { deps, entityStore } = setup(makeSensorDeviceConfig({ postOrder: ['Device', 'Sensor'] }), {
      failCreate: (input) => (input.sourceId === 'A1' ? postFailure : undefined),
    });
    const report = makeReport([
      makeEntity('Sensor', 'A1'),
      makeEntity('Device', 'A2', { ownerRef: 'A1' }),
    ]);

    const result = await importSnapshot(deps, { report, targetOrg: TARGET });

    const error = result._unsafeUnwrapErr();
    expect(entityStore.findCreated('Device', 'A2')?.data).toEqual({ ownerRef: 'A1' });
    expect(error.warnings).toEqual([
      {
        type: 'UnresolvedReferenceWarning',
        message: "Reference ownerRef=A1 of 'Device' entity A2 could not be resolved",
        templateName: 'Device',
        entityId: 'A2',
        field: 'ownerRef',
        referenceId: 'A1',
      },
    ]);
    expect(error.pendingPatches).toEqual([
      {
        templateName: 'Device',
        kind: 'generic-entity',
        sourceId: 'A2',
        destinationId: 'new-A2',
        fields: { ownerRef: { original: 'A1', unresolvedIds: ['A1'] } },
      },
    ]);
    expect(entityStore.updates).toEqual([]);
  });

  it('refuses duplicate source ids within a template', async () => {
    const { deps, entityStore } = setup();
    const report = makeReport([makeEntity('Sensor', 'A1'), makeEntity('Sensor', 'A1')]);

    const result = await importSnapshot(deps, { report, targetOrg: TARGET, concurrency: 2 });

    const error = result._unsafeUnwrapErr();
    expect(error.failures.map((failure) => failure.type)).toEqual(['DuplicateLookupEntryError']);
    expect(entityStore.created).toHaveLength(1);
  });

  it('runs up to `concurrency` posts at once', async () => {
    const { deps, entityStore } = setup();
    const report = makeReport(['S1', 'S2', 'S3', 'S4', 'S5'].map((id) => makeEntity('Sensor', id)));

    const result = await importSnapshot(deps, { report, targetOrg: TARGET, concurrency: 2 });

    expect(result._unsafeUnwrap().lookupTable.size).toBe(5);
    expect(entityStore.maxInFlight()).toBe(2);
    expect(entityStore.created.map((entry) => entry.input.sourceId)).toEqual([
      'S1',
      'S2',
      'S3',
      'S4',
      'S5',
    ]);
  });

  it('posts one entity at a time by default', async () => {
    const { deps, entityStore } = setup();
    const report = makeReport(['S1', 'S2', 'S3'].map((id) => makeEntity('Sensor', id)));

    await importSnapshot(deps, { report, targetOrg: TARGET });

    expect(entityStore.maxInFlight()).toBe(1);
  });

  it('returns early with what was created when cancelled', async () => {
    const controller = new AbortController();
    const { deps, entityStore } = setup(makeSensorDeviceConfig(), {
      onCreate: (input) => {
        if (input.sourceId === 'A1') {
          controller.abort();
        }
      },
    });
    const report = makeReport([
      makeEntity('Sensor', 'A1'),
      makeEntity('Device', 'A2', { ownerRef: 'A1' }),
    ]);

    const result = await importSnapshot(deps, {
      report,
      targetOrg: TARGET,
      signal: controller.signal,
    });

    const value = result._unsafeUnwrap();
    expect(value.cancelled).toBe(true);
    expect(value.lookupTable.size).toBe(1);
    expect(value.pendingPatches).toEqual([]);
    expect(entityStore.created).toHaveLength(1);
  });

  it('hands back unapplied patches when cancelled', async () => {
    const controller = new AbortController();
    const { deps, entityStore } = setup(makeSensorDeviceConfig({ postOrder: ['Device', 'Sensor'] }), {
      onCreate: (input) => {
        if (input.sourceId === 'A2') {
          controller.abort();
        }
      },
    });
    const report = makeReport([
      makeEntity('Sensor', 'A1'),
      makeEntity('Device', 'A2', { ownerRef: 'A1' }),
    ]);

    const result = await importSnapshot(deps, {
      report,
      targetOrg: TARGET,
      signal: controller.signal,
    });

    expect(result._unsafeUnwrap().pendingPatches).toEqual([
      {
        templateName: 'Device',
        kind: 'generic-entity',
        sourceId: 'A2',
        destinationId: 'new-A2',
        fields: { ownerRef: { original: 'A1', unresolvedIds: ['A1'] } },
      },
    ]);
    expect(entityStore.updates).toEqual([]);
  });

  it('reports failed patches as a partial import', async () => {
    const { deps } = setup(makeSensorDeviceConfig({ postOrder: ['Device', 'Sensor'] }), {
      failUpdate: () => createUpstreamError('/generic-entity/v1/generic-entities/new-A2', 409, null),
    });
    const report = makeReport([
      makeEntity('Sensor', 'A1'),
      makeEntity('Device', 'A2', { ownerRef: 'A1' }),
    ]);

    const result = await importSnapshot(deps, { report, targetOrg: TARGET });

    const error = result._unsafeUnwrapErr();
    expect(error.lookupTable.size).toBe(2);
    expect(error.failures).toMatchObject([
      { type: 'UpstreamPatchError', sourceId: 'A2', destinationId: 'new-A2', statusCode: 409 },
    ]);
    expect(error.pendingPatches.map((patch) => patch.sourceId)).toEqual(['A2']);
  });

  it('warns about templates without a post order position and posts them last', async () => {
    const { deps, entityStore } = setup();
    const report = makeReport([makeEntity('Notes', 'N1'), makeEntity('Sensor', 'A1')]);

    const result = await importSnapshot(deps, { report, targetOrg: TARGET });

    expect(entityStore.created.map((entry) => entry.input.templateName)).toEqual(['Sensor', 'Notes']);
    expect(result._unsafeUnwrap().warnings).toMatchObject([
      { type: 'UnknownTemplateOrderWarning', templateName: 'Notes' },
    ]);
  });
});

describe('prepareEntity', () => {
  it('does not modify the source entity', () => {
    const lookupTable = new LookupTable();
    lookupTable.record('Sensor', 'A1', 'B1');
    const entity = makeEntity('Device', 'A2', { ownerRef: { id: 'A1' }, scratch: 1 });

    const prepared = prepareEntity(
      makeSensorDeviceConfig({ nonPortableFields: { Device: ['scratch'] } }),
      lookupTable,
      entity
    );

    expect(prepared.data).toEqual({ ownerRef: { id: 'B1' } });
    expect(prepared.pending).toEqual({});
    expect(entity.data).toEqual({ ownerRef: { id: 'A1' }, scratch: 1 });
  });
});
