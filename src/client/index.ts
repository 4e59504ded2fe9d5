/**
 * Registry Client - Client
 */

import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse, Method } from 'axios';
import https from 'https';
import { Readable } from 'stream';
import type { Logger } from 'pino';
import {
  BlobDescriptor,
  CatalogResponse,
  ClientOptions,
  Digest,
  Manifest,
  PageOptions,
  Reference,
  RegistryResponse,
  TagsResponse,
  VersionResponse,
} from '../types';
import {
  NotFoundError,
  RegistryClientError,
  TransportError,
  ValidationError,
  createHTTPError,
} from '../errors';
import {
  MANIFEST_ACCEPT_HEADER,
  descriptorFromHeaders,
  isLegacyManifest,
  parseCatalog,
  parseManifest,
  parseResponseHeaders,
  parseTags,
  serializeManifest,
  tryParseErrorResponse,
} from '../models';
import { buildAuthHeaders, validateClientOptions } from '../config';
import { createLogger } from '../logger';
import { DecodedBody, decodeBody, decodeJSON, toBuffer } from '../utils/body';
import { assertDigest, assertPageSize, assertReference, assertRepositoryName } from '../utils/validation';

function pageParams(options: PageOptions): Record<string, string | number> {
  return {
    ...(options.pageSize !== undefined ? { n: options.pageSize } : {}),
    ...(options.last !== undefined ? { last: options.last } : {}),
  };
}

function manifestPath(repository: string, reference: Reference): string {
  assertRepositoryName(repository);
  assertReference(reference);
  return `/v2/${repository}/manifests/${reference}`;
}

function blobPath(repository: string, digest: Digest): string {
  assertRepositoryName(repository);
  assertDigest(digest);
  return `/v2/${repository}/blobs/${digest}`;
}

/**
 * Docker Registry HTTP API V2 client
 */
export class RegistryClient {
  /** Underlying axios instance, for interceptors and test adapters */
  readonly http: AxiosInstance;
  readonly baseURL: string;
  private readonly log: Logger;

  /**
   * Create a new registry client
   *
   * @throws ConfigurationError when the options are invalid
   */
  constructor(options: ClientOptions) {
    const config = validateClientOptions(options);
    this.baseURL = config.baseURL;
    this.log = options.logger ?? createLogger('registry-client');

    const httpsAgent = config.insecure && config.baseURL.startsWith('https://')
      ? new https.Agent({ rejectUnauthorized: false })
      : undefined;

    this.http = axios.create({
      baseURL: config.baseURL,
      timeout: config.timeout,
      headers: buildAuthHeaders(config),
      httpsAgent,
    });
  }

  // ==================== Base ====================

  /**
   * Check that the endpoint speaks the V2 API (and that credentials work)
   */
  async checkVersion(): Promise<VersionResponse> {
    const response = await this.send('GET', '/v2/');
    const headers = parseResponseHeaders(response.headers);
    return headers.dockerDistributionApiVersion !== undefined
      ? { apiVersion: headers.dockerDistributionApiVersion }
      : {};
  }

  // ==================== Catalog & Tags ====================

  /**
   * List repositories, one page at a time
   */
  async listCatalog(options: PageOptions = {}): Promise<CatalogResponse> {
    assertPageSize(options.pageSize);
    const response = await this.send('GET', '/v2/_catalog', { params: pageParams(options) });
    const headers = parseResponseHeaders(response.headers);
    return parseCatalog(decodeJSON(response.data).value, headers.link);
  }

  /**
   * List the tags of a repository, one page at a time
   */
  async listTags(repository: string, options: PageOptions = {}): Promise<TagsResponse> {
    assertRepositoryName(repository);
    assertPageSize(options.pageSize);
    const response = await this.send('GET', `/v2/${repository}/tags/list`, { params: pageParams(options) });
    const headers = parseResponseHeaders(response.headers);
    return parseTags(decodeJSON(response.data).value, headers.link);
  }

  /**
   * Yield every repository, following `Link` pagination
   */
  async *iterateCatalog(pageSize?: number): AsyncGenerator<string, void, undefined> {
    let last: string | undefined;
    for (;;) {
      const page = await this.listCatalog({ pageSize, last });
      yield* page.repositories;
      if (!page.next?.last || page.next.last === last) {
        return;
      }
      last = page.next.last;
    }
  }

  /**
   * Yield every tag of a repository, following `Link` pagination
   */
  async *iterateTags(repository: string, pageSize?: number): AsyncGenerator<string, void, undefined> {
    let last: string | undefined;
    for (;;) {
      const page = await this.listTags(repository, { pageSize, last });
      yield* page.tags;
      if (!page.next?.last || page.next.last === last) {
        return;
      }
      last = page.next.last;
    }
  }

  // ==================== Manifests ====================

  /**
   * Fetch a manifest with its status and headers
   */
  async fetchManifest(repository: string, reference: Reference): Promise<RegistryResponse<Manifest>> {
    const response = await this.send('GET', manifestPath(repository, reference), {
      headers: { Accept: MANIFEST_ACCEPT_HEADER },
    });
    const headers = parseResponseHeaders(response.headers);
    const manifest = parseManifest(decodeJSON(response.data).value, headers.contentType);

    if (isLegacyManifest(manifest)) {
      this.log.warn(
        { repository, reference },
        'schema 1 manifests are deprecated and only supported for backward compatibility'
      );
    }

    return { status: response.status, headers, body: manifest };
  }

  /**
   * Fetch and validate a manifest
   */
  async getManifest(repository: string, reference: Reference): Promise<Manifest> {
    const response = await this.fetchManifest(repository, reference);
    return response.body;
  }

  /**
   * Describe a manifest without downloading it
   */
  async headManifest(repository: string, reference: Reference): Promise<BlobDescriptor> {
    const response = await this.send('HEAD', manifestPath(repository, reference), {
      headers: { Accept: MANIFEST_ACCEPT_HEADER },
    });
    return descriptorFromHeaders(parseResponseHeaders(response.headers), reference);
  }

  /**
   * Check if a manifest exists
   */
  async manifestExists(repository: string, reference: Reference): Promise<boolean> {
    return this.exists(manifestPath(repository, reference), { headers: { Accept: MANIFEST_ACCEPT_HEADER } });
  }

  /**
   * Upload a manifest
   *
   * @returns The digest the registry stored it under
   */
  async putManifest(repository: string, reference: Reference, manifest: Manifest): Promise<Digest> {
    const path = manifestPath(repository, reference);
    const payload = serializeManifest(manifest);
    parseManifest(payload, manifest.mediaType);

    const response = await this.send('PUT', path, {
      data: JSON.stringify(payload),
      headers: { 'Content-Type': manifest.mediaType },
    });

    const digest = parseResponseHeaders(response.headers).dockerContentDigest;
    if (!digest) {
      throw new ValidationError('registry response has no valid Docker-Content-Digest header');
    }
    return digest;
  }

  /**
   * Delete a manifest
   */
  async deleteManifest(repository: string, reference: Reference): Promise<true> {
    await this.send('DELETE', manifestPath(repository, reference));
    return true;
  }

  // ==================== Blobs ====================

  /**
   * Download a blob into memory
   */
  async getBlob(repository: string, digest: Digest): Promise<Buffer> {
    const response = await this.send('GET', blobPath(repository, digest), { responseType: 'arraybuffer' });
    return toBuffer(response.data);
  }

  /**
   * Download a blob as a stream
   */
  async getBlobStream(repository: string, digest: Digest): Promise<Readable> {
    const response = await this.send('GET', blobPath(repository, digest), { responseType: 'stream' });
    return response.data instanceof Readable ? response.data : Readable.from([toBuffer(response.data)]);
  }

  /**
   * Describe a blob without downloading it
   */
  async headBlob(repository: string, digest: Digest): Promise<BlobDescriptor> {
    const response = await this.send('HEAD', blobPath(repository, digest));
    return descriptorFromHeaders(parseResponseHeaders(response.headers), digest);
  }

  /**
   * Check if a blob exists
   */
  async blobExists(repository: string, digest: Digest): Promise<boolean> {
    return this.exists(blobPath(repository, digest));
  }

  /**
   * Delete a blob
   */
  async deleteBlob(repository: string, digest: Digest): Promise<true> {
    await this.send('DELETE', blobPath(repository, digest));
    return true;
  }

  // ==================== Transport ====================

  /**
   * HEAD a path; any 2xx means present, 404 means absent
   */
  private async exists(path: string, config: AxiosRequestConfig = {}): Promise<boolean> {
    try {
      await this.send('HEAD', path, config);
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return false;
      }
      throw error;
    }
  }

  private async send(method: Method, path: string, config: AxiosRequestConfig = {}): Promise<AxiosResponse<unknown>> {
    const started = Date.now();
    try {
      const response = await this.http.request<unknown>({ ...config, method, url: path });
      this.log.debug({ method, path, status: response.status, durationMs: Date.now() - started }, 'registry request');
      return response;
    } catch (error) {
      const mapped = await this.handleError(error, method, path);
      this.log.debug({ method, path, durationMs: Date.now() - started, err: mapped }, 'registry request failed');
      throw mapped;
    }
  }

  /**
   * Map an axios failure onto the client's error taxonomy
   */
  private async handleError(error: unknown, method: string, path: string): Promise<RegistryClientError> {
    if (error instanceof RegistryClientError) {
      return error;
    }

    const url = `${this.baseURL}${path}`;
    if (!axios.isAxiosError(error)) {
      return new TransportError(`${method} ${url}: ${error instanceof Error ? error.message : 'unknown error'}`, {
        cause: error,
      });
    }
    if (!error.response) {
      return new TransportError(`${method} ${url}: ${error.message}`, { code: error.code, cause: error });
    }

    const { status } = error.response;
    const headers = parseResponseHeaders(error.response.headers);
    let decoded: DecodedBody;
    try {
      decoded = await decodeBody(error.response.data);
    } catch (readError) {
      this.log.debug({ method, path, status, err: readError }, 'could not read registry error body');
      return createHTTPError({ status, method, url, headers });
    }
    const parsed = tryParseErrorResponse(decoded.value);

    return createHTTPError({
      status,
      method,
      url,
      headers,
      ...(parsed ? { errors: parsed.errors } : { body: decoded.text }),
    });
  }
}

export default RegistryClient;
