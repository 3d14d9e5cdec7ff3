/**
 * Test fakes and mocks
 */

import { ok, err, type Result } from 'neverthrow';

import { createUpstreamError, type UpstreamError } from '@/common/types/errors.js';

import type { BiotHttpClient, FetchFn, HttpMethod } from '@/infra/http/biot-client.js';
import type { ReportStorageError } from '@/modules/snapshot-transfer/core/errors.js';
import type {
  CreateEntityInput,
  EntityStore,
  FetchEntitiesQuery,
  ReportReadError,
  ReportStore,
  UpdateEntityInput,
} from '@/modules/snapshot-transfer/core/ports.js';
import type { Entity, EntityId, JsonObject, Report } from '@/modules/snapshot-transfer/core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Entity Store
// ─────────────────────────────────────────────────────────────────────────────

export interface CreatedEntity {
  readonly id: EntityId;
  readonly input: CreateEntityInput;
  data: JsonObject;
}

export interface FakeEntityStoreOptions {
  /** Entities returned by fetch, filtered by kind and template */
  seed?: Entity[];
  /** Returns an error to fail a create */
  failCreate?: (input: CreateEntityInput) => UpstreamError | undefined;
  failUpdate?: (input: UpdateEntityInput) => UpstreamError | undefined;
  failFetch?: (query: FetchEntitiesQuery) => UpstreamError | undefined;
  /** Runs before each create resolves; lets tests abort mid-import */
  onCreate?: (input: CreateEntityInput) => void;
}

export interface FakeEntityStore extends EntityStore {
  readonly created: CreatedEntity[];
  readonly updates: UpdateEntityInput[];
  readonly queries: FetchEntitiesQuery[];
  /** Highest number of creates awaiting at once */
  readonly maxInFlight: () => number;
  readonly findCreated: (templateName: string, sourceId: EntityId) => CreatedEntity | undefined;
}

/**
 * In-memory EntityStore. New ids are `new-<sourceId>`; devices keep theirs.
 */
export const makeFakeEntityStore = (options: FakeEntityStoreOptions = {}): FakeEntityStore => {
  const created: CreatedEntity[] = [];
  const updates: UpdateEntityInput[] = [];
  const queries: FetchEntitiesQuery[] = [];
  let inFlight = 0;
  let peak = 0;

  return {
    created,
    updates,
    queries,
    maxInFlight: () => peak,
    findCreated: (templateName, sourceId) =>
      created.find(
        (entry) => entry.input.templateName === templateName && entry.input.sourceId === sourceId
      ),

    async fetch(query: FetchEntitiesQuery): Promise<Result<Entity[], UpstreamError>> {
      queries.push(query);
      const failure = options.failFetch?.(query);
      if (failure !== undefined) {
        return err(failure);
      }
      return ok(
        (options.seed ?? []).filter(
          (entity) => entity.kind === query.kind && entity.templateName === query.templateName
        )
      );
    },

    async create(input: CreateEntityInput): Promise<Result<EntityId, UpstreamError>> {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await Promise.resolve();
      inFlight -= 1;

      options.onCreate?.(input);
      const failure = options.failCreate?.(input);
      if (failure !== undefined) {
        return err(failure);
      }

      const id = input.kind === 'device' ? input.sourceId : `new-${input.sourceId}`;
      created.push({ id, input, data: { ...input.data } });
      return ok(id);
    },

    async update(input: UpdateEntityInput): Promise<Result<void, UpstreamError>> {
      updates.push(input);
      const failure = options.failUpdate?.(input);
      if (failure !== undefined) {
        return err(failure);
      }
      const target = created.find((entry) => entry.id === input.id);
      if (target === undefined) {
        return err(createUpstreamError(`/entities/${input.id}`, 404, null));
      }
      target.data = { ...target.data, ...input.data };
      return ok(undefined);
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Report Store
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeReportStore extends ReportStore {
  readonly reports: Map<string, Report>;
}

export const makeFakeReportStore = (
  initial: Report[] = [],
  options: { readError?: ReportReadError; saveError?: ReportStorageError } = {}
): FakeReportStore => {
  const reports = new Map(initial.map((report) => [report.name, report]));

  return {
    reports,

    async findByName(name: string): Promise<Result<Report | null, ReportReadError>> {
      if (options.readError !== undefined) {
        return err(options.readError);
      }
      return ok(reports.get(name) ?? null);
    },

    async save(report: Report): Promise<Result<string, ReportStorageError>> {
      if (options.saveError !== undefined) {
        return err(options.saveError);
      }
      reports.set(report.name, report);
      return ok(report.name);
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// HTTP
// ─────────────────────────────────────────────────────────────────────────────

export interface RecordedRequest {
  readonly url: string;
  readonly method: string;
  readonly headers: Record<string, string>;
  readonly body: unknown;
}

export type FakeRoute = (request: RecordedRequest) => Response | undefined;

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(body === null ? null : JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });

const readHeaders = (headers: RequestInit['headers']): Record<string, string> => {
  const result: Record<string, string> = {};
  new Headers(headers).forEach((value, key) => {
    result[key] = value;
  });
  return result;
};

const readRequestBody = (body: RequestInit['body']): unknown => {
  if (typeof body !== 'string') {
    return body ?? undefined;
  }
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    return body;
  }
};

/**
 * Fetch stand-in: every request is recorded and answered by the first route
 * returning a response; unmatched requests get a 404.
 */
export const makeFakeFetch = (
  routes: FakeRoute[]
): { fetch: FetchFn; requests: RecordedRequest[] } => {
  const requests: RecordedRequest[] = [];

  const fetchFn: FetchFn = async (input, init) => {
    const request: RecordedRequest = {
      url: input,
      method: init?.method ?? 'GET',
      headers: readHeaders(init?.headers),
      body: readRequestBody(init?.body),
    };
    requests.push(request);

    for (const route of routes) {
      const response = route(request);
      if (response !== undefined) {
        return response;
      }
    }
    return jsonResponse({ message: 'not found' }, 404);
  };

  return { fetch: fetchFn, requests };
};

/** Answers every Bio-T health check with 200 */
export const healthyRoute: FakeRoute = (request) =>
  request.url.endsWith('/system/healthCheck') ? jsonResponse({}) : undefined;

export interface ClientCall {
  readonly endpoint: string;
  readonly method: HttpMethod;
  readonly body: unknown;
}

/**
 * BiotHttpClient stand-in answering every request through `handler`.
 */
export const makeStubBiotClient = (
  handler: (call: ClientCall) => Result<unknown, UpstreamError>
): { client: BiotHttpClient; calls: ClientCall[] } => {
  const calls: ClientCall[] = [];

  const client: BiotHttpClient = {
    login: async () => ok('test-token'),
    isHealthy: async () => true,
    request: async (endpoint, method = 'GET', body) => {
      const call: ClientCall = { endpoint, method, body };
      calls.push(call);
      return handler(call);
    },
    uploadFile: async () => ok({ id: 'file-1', signedUrl: 'https://storage.test.example/file-1' }),
  };

  return { client, calls };
};
