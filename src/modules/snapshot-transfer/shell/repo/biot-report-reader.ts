/**
 * Bio-T Report Reader
 *
 * ReportSource over the data-export service: finds a data report by name and
 * downloads its output files through their signed URLs.
 */

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { createUpstreamError, type UpstreamError } from '../../../../common/types/errors.js';
import { createAmbiguousReportError, createInvalidReportError } from '../../core/errors.js';
import { formatSchemaErrors, parseBiotReportFiles } from '../../core/report-document.js';

import type { BiotHttpClient, FetchFn } from '../../../../infra/http/biot-client.js';
import type { ReportReadError, ReportSource } from '../../core/ports.js';
import type { Report } from '../../core/types.js';
import type { Logger } from 'pino';

export const DATA_REPORTS_ENDPOINT = '/dataexport/v1/reports';

const DataReportSchema = Type.Object({
  name: Type.String(),
  creationTime: Type.Optional(Type.String()),
  fileOutput: Type.Object({
    filesLocation: Type.Record(
      Type.String(),
      Type.Object({ paths: Type.Array(Type.String()) })
    ),
  }),
});

const DataReportSearchResponseSchema = Type.Object({
  data: Type.Array(DataReportSchema),
});

type DataReport = Static<typeof DataReportSchema>;

const searchResponseValidator = TypeCompiler.Compile(DataReportSearchResponseSchema);

/**
 * Downloads one output file and returns its parsed JSON content.
 */
export type FetchFileFn = (url: string) => Promise<Result<unknown, UpstreamError>>;

export interface BiotReportReaderOptions {
  client: BiotHttpClient;
  logger: Logger;
  /** Defaults to an unauthenticated GET through `fetch` */
  fetchFile?: FetchFileFn;
  fetch?: FetchFn;
}

export const makeFetchFile =
  (fetchFn: FetchFn): FetchFileFn =>
  async (url) => {
    let response: Response;
    try {
      response = await fetchFn(url, { method: 'GET' });
    } catch (error) {
      return err(createUpstreamError(url, 0, null, error));
    }
    if (!response.ok) {
      return err(createUpstreamError(url, response.status, await response.text()));
    }
    try {
      const body: unknown = await response.json();
      return ok(body);
    } catch (error) {
      return err(createUpstreamError(url, response.status, null, error));
    }
  };

export const buildReportSearchRequest = (name: string): string =>
  encodeURIComponent(JSON.stringify({ filter: { name: { eq: name } } }));

/**
 * Creates a ReportSource backed by Bio-T data reports.
 */
export const makeBiotReportReader = (options: BiotReportReaderOptions): ReportSource => {
  const { client } = options;
  const fetchFile =
    options.fetchFile ?? makeFetchFile(options.fetch ?? ((input, init) => fetch(input, init)));
  const log = options.logger.child({ repo: 'BiotReportReader' });

  const downloadFiles = async (
    report: DataReport
  ): Promise<Result<Record<string, unknown[]>, ReportReadError>> => {
    const files: Record<string, unknown[]> = {};

    for (const [dataType, location] of Object.entries(report.fileOutput.filesLocation)) {
      const records: unknown[] = [];
      for (const url of location.paths) {
        const downloaded = await fetchFile(url);
        if (downloaded.isErr()) {
          return err(downloaded.error);
        }
        if (!Array.isArray(downloaded.value)) {
          return err(
            createInvalidReportError(`Data report '${report.name}' file is not a JSON array`, [
              `${dataType}: ${url}`,
            ])
          );
        }
        records.push(...downloaded.value);
      }
      files[dataType] = records;
    }

    return ok(files);
  };

  return {
    async findByName(name: string): Promise<Result<Report | null, ReportReadError>> {
      const response = await client.request(
        `${DATA_REPORTS_ENDPOINT}?searchRequest=${buildReportSearchRequest(name)}`
      );
      if (response.isErr()) {
        return err(response.error);
      }

      if (!searchResponseValidator.Check(response.value)) {
        return err(
          createInvalidReportError(
            'Data report search response has an unexpected format',
            formatSchemaErrors(searchResponseValidator.Errors(response.value))
          )
        );
      }

      const matches = response.value.data;
      if (matches.length > 1) {
        return err(createAmbiguousReportError(name, matches.length));
      }
      const [report] = matches;
      if (report === undefined) {
        return ok(null);
      }

      const files = await downloadFiles(report);
      if (files.isErr()) {
        return err(files.error);
      }

      const parsed = parseBiotReportFiles(name, files.value, report.creationTime);
      if (parsed.isErr()) {
        return err(parsed.error);
      }

      log.info({ report: name, files: Object.keys(files.value) }, 'Downloaded data report');
      return ok(parsed.value);
    },
  };
};
