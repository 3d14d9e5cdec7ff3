import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { getErrorMessage } from '../../../../common/types/errors.js';
import {
  createInvalidReportError,
  createReportStorageError,
  type ReportStorageError,
} from '../../core/errors.js';
import { parseReportDocument, toReportDocument } from '../../core/report-document.js';

import type { ReportReadError, ReportStore } from '../../core/ports.js';
import type { Report } from '../../core/types.js';
import type { Logger } from 'pino';

export interface FsReportStoreOptions {
  rootDir: string;
  logger: Logger;
}

/**
 * File name stem for a report name. Distinct names may share a slug; the
 * stored document name is checked on read and before a save replaces a file.
 */
export const reportSlug = (name: string): string => {
  const slug = name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug === '' ? 'report' : slug;
};

const isNotFound = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

/**
 * Report store keeping one JSON document per report under `rootDir`.
 */
export const makeFsReportStore = (options: FsReportStoreOptions): ReportStore => {
  const log = options.logger.child({ repo: 'FsReportStore', rootDir: options.rootDir });
  const filePathFor = (name: string): string =>
    path.join(options.rootDir, `${reportSlug(name)}.json`);

  const readStored = async (filePath: string): Promise<Result<Report | null, ReportReadError>> => {
    let contents: string;

    try {
      contents = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return ok(null);
      }
      return err(
        createReportStorageError(
          `Failed to read report file at ${filePath}: ${getErrorMessage(error)}`,
          error
        )
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch (error) {
      return err(
        createInvalidReportError(`Failed to parse JSON at ${filePath}`, [getErrorMessage(error)])
      );
    }

    return parseReportDocument(parsed);
  };

  return {
    async findByName(name: string): Promise<Result<Report | null, ReportReadError>> {
      const stored = await readStored(filePathFor(name));
      if (stored.isErr()) {
        return err(stored.error);
      }

      // Another name with the same slug
      if (stored.value !== null && stored.value.name !== name) {
        return ok(null);
      }

      return ok(stored.value);
    },

    async save(report: Report): Promise<Result<string, ReportStorageError>> {
      const filePath = filePathFor(report.name);
      const tmpPath = `${filePath}.${String(process.pid)}.tmp`;

      // Unreadable files are replaced; a readable one may only be replaced by its own name
      const existing = await readStored(filePath);
      if (existing.isOk() && existing.value !== null && existing.value.name !== report.name) {
        return err(
          createReportStorageError(
            `Report file at ${filePath} already holds report '${existing.value.name}'`
          )
        );
      }

      try {
        await fs.mkdir(options.rootDir, { recursive: true });
        await fs.writeFile(tmpPath, `${JSON.stringify(toReportDocument(report), null, 2)}\n`, 'utf8');
        await fs.rename(tmpPath, filePath);
      } catch (error) {
        await fs.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
          log.warn(
            { tmpPath, error: getErrorMessage(cleanupError) },
            'Failed to remove temporary report file'
          );
        });
        return err(
          createReportStorageError(
            `Failed to write report file at ${filePath}: ${getErrorMessage(error)}`,
            error
          )
        );
      }

      log.info({ report: report.name, filePath }, 'Report saved');
      return ok(reportSlug(report.name));
    },
  };
};
