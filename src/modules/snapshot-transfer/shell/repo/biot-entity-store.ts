/**
 * Bio-T Entity Store
 *
 * EntityStore over the generic-entity and device services of the Bio-T API.
 */

import { err, ok, type Result } from 'neverthrow';

import { createUpstreamError, type UpstreamError } from '../../../../common/types/errors.js';
import { isReferenceObject } from '../../core/reference-graph.js';
import { parseBiotReportFiles } from '../../core/report-document.js';

import type { BiotHttpClient } from '../../../../infra/http/biot-client.js';
import type {
  CreateEntityInput,
  EntityStore,
  FetchEntitiesQuery,
  UpdateEntityInput,
} from '../../core/ports.js';
import type { Entity, EntityId, EntityKind, JsonObject, JsonValue } from '../../core/types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Endpoints
// ─────────────────────────────────────────────────────────────────────────────

export const GENERIC_ENTITIES_ENDPOINT = '/generic-entity/v1/generic-entities';
export const DEVICES_ENDPOINT = '/device/v1/devices';

const collectionEndpointFor = (kind: EntityKind): string =>
  kind === 'device' ? DEVICES_ENDPOINT : GENERIC_ENTITIES_ENDPOINT;

const DEFAULT_PAGE_SIZE = 100;

export interface BiotEntityStoreOptions {
  client: BiotHttpClient;
  logger: Logger;
  /** Results requested per search page */
  pageSize?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Builds the `searchRequest` query parameter for one page of a template.
 */
export const buildSearchRequest = (
  query: FetchEntitiesQuery,
  page: number,
  limit: number
): string =>
  encodeURIComponent(
    JSON.stringify({
      filter: {
        _templateName: { eq: query.templateName },
        _creationTime: { from: query.since, to: query.until },
      },
      page,
      limit,
    })
  );

/**
 * Reduces embedded reference objects to `{ id }`; the API rejects the
 * read-only attributes it adds to them.
 */
export const toWritableFields = (data: JsonObject): JsonObject => {
  const reduce = (value: JsonValue): JsonValue => {
    if (isReferenceObject(value)) {
      return { id: value.id };
    }
    if (Array.isArray(value)) {
      return value.map(reduce);
    }
    return value;
  };

  return Object.fromEntries(Object.entries(data).map(([key, value]) => [key, reduce(value)]));
};

const readPageData = (body: unknown): unknown[] | null => {
  if (typeof body !== 'object' || body === null || !('data' in body)) {
    return null;
  }
  return Array.isArray(body.data) ? body.data : null;
};

const readCreatedId = (body: unknown): EntityId | null => {
  if (typeof body !== 'object' || body === null || !('_id' in body)) {
    return null;
  }
  return typeof body._id === 'string' && body._id !== '' ? body._id : null;
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

export const makeBiotEntityStore = (options: BiotEntityStoreOptions): EntityStore => {
  const { client } = options;
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  const log = options.logger.child({ repo: 'BiotEntityStore' });

  return {
    async fetch(query: FetchEntitiesQuery): Promise<Result<Entity[], UpstreamError>> {
      const endpoint = collectionEndpointFor(query.kind);
      const entities: Entity[] = [];

      for (let page = 0; ; page += 1) {
        const pageEndpoint = `${endpoint}?searchRequest=${buildSearchRequest(query, page, pageSize)}`;
        const response = await client.request(pageEndpoint);
        if (response.isErr()) {
          return err(response.error);
        }

        const records = readPageData(response.value);
        if (records === null) {
          return err(
            createUpstreamError(endpoint, 200, { reason: 'Search response has no data array' })
          );
        }

        const parsed = parseBiotReportFiles(query.templateName, { [query.kind]: records });
        if (parsed.isErr()) {
          return err(
            createUpstreamError(endpoint, 200, {
              reason: parsed.error.message,
              details: parsed.error.details,
            })
          );
        }

        const report = parsed.value;
        entities.push(
          ...(query.kind === 'device'
            ? (report.devices ?? [])
            : (report.entitiesByTemplate[query.templateName] ?? []))
        );

        if (records.length < pageSize) {
          break;
        }
      }

      log.debug(
        { templateName: query.templateName, kind: query.kind, count: entities.length },
        'Fetched entities'
      );
      return ok(entities);
    },

    async create(input: CreateEntityInput): Promise<Result<EntityId, UpstreamError>> {
      const fields = toWritableFields(input.data);
      const owner = { id: input.ownerOrganizationId };

      const endpoint =
        input.kind === 'device'
          ? DEVICES_ENDPOINT
          : `${GENERIC_ENTITIES_ENDPOINT}/templates/${encodeURIComponent(input.templateName)}`;
      const body: JsonObject =
        input.kind === 'device'
          ? {
              ...fields,
              _id: input.sourceId,
              _ownerOrganization: owner,
              ...(input.templateId !== undefined && { _templateId: input.templateId }),
            }
          : {
              ...fields,
              _ownerOrganization: owner,
              ...(input.name !== undefined && { _name: input.name }),
            };

      const response = await client.request(endpoint, 'POST', body);
      if (response.isErr()) {
        return err(response.error);
      }

      // Devices are addressed by their serial, which the API echoes back
      const id = readCreatedId(response.value);
      if (id === null) {
        return err(createUpstreamError(endpoint, 200, response.value));
      }

      log.debug({ templateName: input.templateName, sourceId: input.sourceId, id }, 'Created entity');
      return ok(id);
    },

    async update(input: UpdateEntityInput): Promise<Result<void, UpstreamError>> {
      const endpoint = `${collectionEndpointFor(input.kind)}/${encodeURIComponent(input.id)}`;
      const response = await client.request(endpoint, 'PATCH', toWritableFields(input.data));
      if (response.isErr()) {
        return err(response.error);
      }
      return ok(undefined);
    },
  };
};
