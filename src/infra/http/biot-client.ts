/**
 * Bio-T HTTP Client
 *
 * Thin authenticated JSON client for the Bio-T Open API.
 * This is the only file that knows about HTTP transport.
 */

import { ok, err, type Result } from 'neverthrow';

import { createUpstreamError, getErrorMessage, type UpstreamError } from '../../common/types/errors.js';

import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

/**
 * Subset of the global fetch signature, injectable for tests.
 */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * File created through the file service.
 */
export interface UploadedFile {
  readonly id: string;
  readonly signedUrl: string;
}

export interface BiotHttpClient {
  /** Exchanges username/password for an access token and keeps it for later requests. */
  login(): Promise<Result<string, UpstreamError>>;

  /** True when the given health check endpoint answers 200. */
  isHealthy(healthCheckEndpoint: string): Promise<boolean>;

  /**
   * Authenticated JSON request against a service endpoint.
   * Resolves to the parsed body, or null for an empty response.
   */
  request(endpoint: string, method?: HttpMethod, body?: unknown): Promise<Result<unknown, UpstreamError>>;

  /** Uploads raw bytes through a signed URL and returns the new file id. */
  uploadFile(
    bytes: Uint8Array,
    fileName: string,
    mimeType?: string
  ): Promise<Result<UploadedFile, UpstreamError>>;
}

export interface BiotHttpClientOptions {
  baseUrl: string;
  username?: string | undefined;
  password?: string | undefined;
  token?: string | undefined;
  /** DELETE requests are refused unless enabled */
  allowDelete?: boolean;
  fetch?: FetchFn;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const LOGIN_ENDPOINT = '/ums/v2/users/login';
export const FILE_UPLOAD_ENDPOINT = '/file/v1/files/upload';

/** Services a request may target, keyed by the first path segment. */
export const HEALTH_CHECK_ENDPOINTS: Readonly<Record<string, string>> = {
  device: '/device/system/healthCheck',
  'generic-entity': '/generic-entity/system/healthCheck',
  file: '/file/system/healthCheck',
  dataexport: '/dataexport/system/healthCheck',
};

/**
 * Finds the health check endpoint for the service an endpoint belongs to.
 */
export const healthCheckEndpointFor = (endpoint: string): string | null => {
  const service = endpoint.replace(/^\/+/, '').split(/[/?]/)[0] ?? '';
  return HEALTH_CHECK_ENDPOINTS[service] ?? null;
};

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const readBody = async (response: Response): Promise<unknown> => {
  const text = await response.text();
  if (text === '') {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
};

const readToken = (body: unknown): string | null => {
  if (typeof body !== 'object' || body === null || !('accessJwt' in body)) {
    return null;
  }
  const { accessJwt } = body;
  if (typeof accessJwt !== 'object' || accessJwt === null || !('token' in accessJwt)) {
    return null;
  }
  return typeof accessJwt.token === 'string' && accessJwt.token !== '' ? accessJwt.token : null;
};

const readUploadedFile = (body: unknown): UploadedFile | null => {
  if (typeof body !== 'object' || body === null) {
    return null;
  }
  const id = 'id' in body ? body.id : undefined;
  const signedUrl = 'signedUrl' in body ? body.signedUrl : undefined;
  if (typeof id !== 'string' || typeof signedUrl !== 'string') {
    return null;
  }
  return { id, signedUrl };
};

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a Bio-T HTTP client.
 *
 * @example
 * const client = makeBiotHttpClient({
 *   baseUrl: 'https://api.example.biot-med.com',
 *   username: 'operator@example.com',
 *   password: 'test-password',
 *   logger,
 * });
 */
export const makeBiotHttpClient = (options: BiotHttpClientOptions): BiotHttpClient => {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const fetchFn: FetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  const allowDelete = options.allowDelete ?? false;
  const log = options.logger.child({ component: 'BiotHttpClient' });
  let token: string | null = options.token ?? null;

  const send = async (
    endpoint: string,
    init: RequestInit
  ): Promise<Result<unknown, UpstreamError>> => {
    let response: Response;
    try {
      response = await fetchFn(`${baseUrl}${endpoint}`, init);
    } catch (error) {
      log.warn({ endpoint, error: getErrorMessage(error) }, 'Bio-T request failed');
      return err(createUpstreamError(endpoint, 0, null, error));
    }

    const body = await readBody(response);
    if (!response.ok) {
      log.warn({ endpoint, status: response.status }, 'Bio-T request rejected');
      return err(createUpstreamError(endpoint, response.status, body));
    }
    return ok(body);
  };

  const login = async (): Promise<Result<string, UpstreamError>> => {
    if (options.username === undefined || options.password === undefined) {
      return err(
        createUpstreamError(LOGIN_ENDPOINT, 0, { reason: 'Username and password are required for login' })
      );
    }

    const result = await send(LOGIN_ENDPOINT, {
      method: 'POST',
      headers: { accept: 'application/json', 'content-type': 'application/json' },
      body: JSON.stringify({ username: options.username, password: options.password }),
    });
    if (result.isErr()) {
      return err(result.error);
    }

    const accessToken = readToken(result.value);
    if (accessToken === null) {
      return err(createUpstreamError(LOGIN_ENDPOINT, 200, result.value));
    }

    token = accessToken;
    log.debug('Logged in to Bio-T');
    return ok(accessToken);
  };

  const isHealthy = async (healthCheckEndpoint: string): Promise<boolean> => {
    const result = await send(healthCheckEndpoint, {
      method: 'GET',
      headers: { accept: 'application/json' },
    });
    return result.isOk();
  };

  const request = async (
    endpoint: string,
    method: HttpMethod = 'GET',
    body?: unknown
  ): Promise<Result<unknown, UpstreamError>> => {
    if (method === 'DELETE' && !allowDelete) {
      return err(
        createUpstreamError(endpoint, 0, { reason: 'DELETE requests are disabled for this client' })
      );
    }

    const healthCheckEndpoint = healthCheckEndpointFor(endpoint);
    if (healthCheckEndpoint === null) {
      return err(createUpstreamError(endpoint, 0, { reason: 'Unknown service for endpoint' }));
    }
    if (!(await isHealthy(healthCheckEndpoint))) {
      return err(createUpstreamError(endpoint, 503, { reason: `${healthCheckEndpoint} is offline` }));
    }

    if (token === null) {
      const loginResult = await login();
      if (loginResult.isErr()) {
        return err(loginResult.error);
      }
    }

    const headers: Record<string, string> = {
      accept: 'application/json',
      authorization: `Bearer ${token ?? ''}`,
    };
    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      headers['content-type'] = 'application/json';
      init.body = JSON.stringify(body);
    }

    return send(endpoint, init);
  };

  const uploadFile = async (
    bytes: Uint8Array,
    fileName: string,
    mimeType = 'application/octet-stream'
  ): Promise<Result<UploadedFile, UpstreamError>> => {
    const created = await request(FILE_UPLOAD_ENDPOINT, 'POST', { name: fileName, mimeType });
    if (created.isErr()) {
      return err(created.error);
    }

    const file = readUploadedFile(created.value);
    if (file === null) {
      return err(createUpstreamError(FILE_UPLOAD_ENDPOINT, 200, created.value));
    }

    let response: Response;
    try {
      response = await fetchFn(file.signedUrl, { method: 'PUT', body: bytes });
    } catch (error) {
      return err(createUpstreamError(file.signedUrl, 0, null, error));
    }
    if (!response.ok) {
      return err(createUpstreamError(file.signedUrl, response.status, await readBody(response)));
    }

    return ok(file);
  };

  return { login, isHealthy, request, uploadFile };
};
