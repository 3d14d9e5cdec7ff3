import { mkdir, mkdtemp, readdir, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { makeFsReportStore, reportSlug } from '@/modules/snapshot-transfer/shell/repo/fs-report-store.js';

import { makeDevice, makeEntity, makeReport, makeTestLogger } from '../../fixtures/builders.js';

const makeTempDir = async (): Promise<string> => {
  return mkdtemp(path.join(tmpdir(), 'snapshot-reports-'));
};

describe('reportSlug', () => {
  it('derives a file-safe name', () => {
    expect(reportSlug('Montage Set v1')).toBe('montage-set-v1');
    expect(reportSlug('Ünïcode Report!')).toBe('unicode-report');
    expect(reportSlug('***')).toBe('report');
  });
});

describe('fs report store', () => {
  it('saves a report and reads it back by name', async () => {
    const dir = await makeTempDir();
    const store = makeFsReportStore({ rootDir: dir, logger: makeTestLogger() });
    const report = makeReport([makeEntity('Sensor', 'A1', { gain: 2 })], {
      name: 'Montage Set v1',
      devices: [makeDevice('GW-1')],
    });

    const saved = await store.save(report);
    const found = await store.findByName('Montage Set v1');

    expect(saved._unsafeUnwrap()).toBe('montage-set-v1');
    expect(found._unsafeUnwrap()).toEqual(report);

    const onDisk: unknown = JSON.parse(await readFile(path.join(dir, 'montage-set-v1.json'), 'utf8'));
    expect(onDisk).toMatchObject({ name: 'Montage Set v1', devices: [{ id: 'GW-1' }] });
  });

  it('returns null for an unknown report', async () => {
    const store = makeFsReportStore({
      rootDir: path.join(await makeTempDir(), 'missing'),
      logger: makeTestLogger(),
    });

    const found = await store.findByName('nothing');

    expect(found._unsafeUnwrap()).toBeNull();
  });

  it('returns null when another name shares the file', async () => {
    const dir = await makeTempDir();
    const store = makeFsReportStore({ rootDir: dir, logger: makeTestLogger() });
    await store.save(makeReport([], { name: 'Set A' }));

    const found = await store.findByName('set-a');

    expect(found._unsafeUnwrap()).toBeNull();
  });

  it('refuses to overwrite another report that shares the file', async () => {
    const dir = await makeTempDir();
    const store = makeFsReportStore({ rootDir: dir, logger: makeTestLogger() });
    const first = makeReport([makeEntity('Sensor', 'A1')], { name: 'Set A' });
    await store.save(first);

    const error = (await store.save(makeReport([], { name: 'set-a' })))._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'ReportStorageError',
      message: `Report file at ${path.join(dir, 'set-a.json')} already holds report 'Set A'`,
    });
    expect((await store.findByName('Set A'))._unsafeUnwrap()).toEqual(first);
  });

  it('replaces a report saved under the same name', async () => {
    const dir = await makeTempDir();
    const store = makeFsReportStore({ rootDir: dir, logger: makeTestLogger() });
    await store.save(makeReport([makeEntity('Sensor', 'A1')], { name: 'cfg' }));
    await store.save(makeReport([makeEntity('Sensor', 'A2')], { name: 'cfg' }));

    const found = (await store.findByName('cfg'))._unsafeUnwrap();

    expect(found?.entitiesByTemplate['Sensor']?.map((entity) => entity.id)).toEqual(['A2']);
  });

  it('fails on a file that is not JSON', async () => {
    const dir = await makeTempDir();
    await writeFile(path.join(dir, 'cfg.json'), '{ not json', 'utf8');
    const store = makeFsReportStore({ rootDir: dir, logger: makeTestLogger() });

    const error = (await store.findByName('cfg'))._unsafeUnwrapErr();

    expect(error.type).toBe('InvalidReportError');
    expect(error.message).toBe(`Failed to parse JSON at ${path.join(dir, 'cfg.json')}`);
  });

  it('fails on a document that does not match the schema', async () => {
    const dir = await makeTempDir();
    await writeFile(path.join(dir, 'cfg.json'), JSON.stringify({ name: 'cfg' }), 'utf8');
    const store = makeFsReportStore({ rootDir: dir, logger: makeTestLogger() });

    const error = (await store.findByName('cfg'))._unsafeUnwrapErr();

    expect(error.message).toBe('Report document does not match the expected schema');
  });

  it('reports write failures as storage errors', async () => {
    const dir = await makeTempDir();
    const blocker = path.join(dir, 'blocker');
    await writeFile(blocker, 'file', 'utf8');
    const store = makeFsReportStore({ rootDir: path.join(blocker, 'reports'), logger: makeTestLogger() });

    const error = (await store.save(makeReport([], { name: 'cfg' })))._unsafeUnwrapErr();

    expect(error.type).toBe('ReportStorageError');
    expect(error.message).toContain('Failed to write report file at');
  });

  it('removes the temporary file when the write fails', async () => {
    const dir = await makeTempDir();
    await mkdir(path.join(dir, 'cfg.json'));
    const store = makeFsReportStore({ rootDir: dir, logger: makeTestLogger() });

    const error = (await store.save(makeReport([], { name: 'cfg' })))._unsafeUnwrapErr();

    expect(error.type).toBe('ReportStorageError');
    expect(await readdir(dir)).toEqual(['cfg.json']);
  });
});
