/**
 * Registry Client - Types
 */

import type { Logger } from 'pino';

/**
 * Manifest media types understood by the client.
 */
export const ManifestMediaTypes = {
  OCI_MANIFEST: 'application/vnd.oci.image.manifest.v1+json',
  OCI_INDEX: 'application/vnd.oci.image.index.v1+json',
  DOCKER_MANIFEST_V2: 'application/vnd.docker.distribution.manifest.v2+json',
  DOCKER_MANIFEST_LIST: 'application/vnd.docker.distribution.manifest.list.v2+json',
  DOCKER_MANIFEST_V1: 'application/vnd.docker.distribution.manifest.v1+json',
  DOCKER_MANIFEST_V1_SIGNED: 'application/vnd.docker.distribution.manifest.v1+prettyjws',
} as const;

export type ManifestMediaType = (typeof ManifestMediaTypes)[keyof typeof ManifestMediaTypes];

/**
 * Common config and layer media types.
 */
export const BlobMediaTypes = {
  DOCKER_CONFIG: 'application/vnd.docker.container.image.v1+json',
  DOCKER_LAYER: 'application/vnd.docker.image.rootfs.diff.tar.gzip',
  OCI_CONFIG: 'application/vnd.oci.image.config.v1+json',
  OCI_LAYER: 'application/vnd.oci.image.layer.v1.tar+gzip',
  OCI_LAYER_ZSTD: 'application/vnd.oci.image.layer.v1.tar+zstd',
  OCI_EMPTY: 'application/vnd.oci.empty.v1+json',
} as const;

/**
 * Registry error codes, from the distribution spec and the Docker registry.
 */
export const ErrorCodes = {
  BLOB_UNKNOWN: 'BLOB_UNKNOWN',
  BLOB_UPLOAD_INVALID: 'BLOB_UPLOAD_INVALID',
  BLOB_UPLOAD_UNKNOWN: 'BLOB_UPLOAD_UNKNOWN',
  DIGEST_INVALID: 'DIGEST_INVALID',
  MANIFEST_BLOB_UNKNOWN: 'MANIFEST_BLOB_UNKNOWN',
  MANIFEST_INVALID: 'MANIFEST_INVALID',
  MANIFEST_UNKNOWN: 'MANIFEST_UNKNOWN',
  MANIFEST_UNVERIFIED: 'MANIFEST_UNVERIFIED',
  MANIFEST_UNACCEPTABLE: 'MANIFEST_UNACCEPTABLE',
  NAME_INVALID: 'NAME_INVALID',
  NAME_UNKNOWN: 'NAME_UNKNOWN',
  PAGINATION_NUMBER_INVALID: 'PAGINATION_NUMBER_INVALID',
  RANGE_INVALID: 'RANGE_INVALID',
  SIZE_INVALID: 'SIZE_INVALID',
  TAG_INVALID: 'TAG_INVALID',
  UNAUTHORIZED: 'UNAUTHORIZED',
  DENIED: 'DENIED',
  UNSUPPORTED: 'UNSUPPORTED',
  TOOMANYREQUESTS: 'TOOMANYREQUESTS',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  UNKNOWN: 'UNKNOWN',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Content digest, `<algorithm>:<hex>`
 */
export type Digest = string;

/**
 * Tag or digest addressing a manifest
 */
export type Reference = string;

/**
 * Platform a manifest list entry targets
 */
export interface Platform {
  architecture: string;
  os: string;
  'os.version'?: string;
  'os.features'?: string[];
  variant?: string;
  features?: string[];
}

/**
 * BlobDescriptor describes a piece of content by media type, digest and size
 */
export interface BlobDescriptor {
  mediaType: string;
  digest: Digest;
  size: number;
  urls?: string[];
  annotations?: Record<string, string>;
  artifactType?: string;
  platform?: Platform;
}

/**
 * Descriptor of a child manifest inside a Docker manifest list
 */
export interface PlatformDescriptor extends BlobDescriptor {
  platform: Platform;
}

/**
 * DockerManifestV2 is an image manifest in Docker schema 2
 */
export interface DockerManifestV2 {
  schemaVersion: 2;
  mediaType: typeof ManifestMediaTypes.DOCKER_MANIFEST_V2;
  config: BlobDescriptor;
  layers: BlobDescriptor[];
}

/**
 * OCIManifest is an OCI image manifest
 */
export interface OCIManifest {
  schemaVersion: 2;
  mediaType: typeof ManifestMediaTypes.OCI_MANIFEST;
  artifactType?: string;
  config: BlobDescriptor;
  layers: BlobDescriptor[];
  subject?: BlobDescriptor;
  annotations?: Record<string, string>;
}

/**
 * DockerManifestList points at one manifest per platform
 */
export interface DockerManifestList {
  schemaVersion: 2;
  mediaType: typeof ManifestMediaTypes.DOCKER_MANIFEST_LIST;
  manifests: PlatformDescriptor[];
}

/**
 * OCIManifestIndex points at a set of manifests, usually one per platform
 */
export interface OCIManifestIndex {
  schemaVersion: 2;
  mediaType: typeof ManifestMediaTypes.OCI_INDEX;
  artifactType?: string;
  manifests: BlobDescriptor[];
  subject?: BlobDescriptor;
  annotations?: Record<string, string>;
}

/**
 * FsLayer of a schema 1 manifest
 */
export interface FsLayer {
  blobSum: Digest;
}

/**
 * JSON Web Key used to sign a schema 1 manifest
 */
export interface Jwk {
  crv?: string;
  kid?: string;
  kty?: string;
  x?: string;
  y?: string;
}

/**
 * Signature of a schema 1 manifest
 */
export interface ManifestSignature {
  header: {
    jwk?: Jwk;
    alg?: string;
  };
  signature: string;
  protected: string;
}

/**
 * DockerManifestV1 is the legacy schema 1 manifest.
 *
 * The wire format has no `mediaType` field; the parser records the media type
 * it was recognized as and serialization drops it again.
 */
export interface DockerManifestV1 {
  schemaVersion: 1;
  mediaType:
    | typeof ManifestMediaTypes.DOCKER_MANIFEST_V1
    | typeof ManifestMediaTypes.DOCKER_MANIFEST_V1_SIGNED;
  name: string;
  tag: string;
  architecture: string;
  fsLayers: FsLayer[];
  history: { v1Compatibility: string }[];
  signatures?: ManifestSignature[];
}

/**
 * Manifest is any manifest the client can parse, keyed on mediaType
 */
export type Manifest =
  | DockerManifestV2
  | OCIManifest
  | DockerManifestList
  | OCIManifestIndex
  | DockerManifestV1;

export type ImageManifest = DockerManifestV2 | OCIManifest;

export type ManifestIndex = DockerManifestList | OCIManifestIndex;

/**
 * PageLink is the next page advertised in a `Link` header
 */
export interface PageLink {
  url: string;
  n?: number;
  last?: string;
}

/**
 * PageOptions controls catalog and tag pagination
 */
export interface PageOptions {
  /** Maximum number of entries (`n`) */
  pageSize?: number;
  /** Last entry of the previous page (`last`) */
  last?: string;
}

/**
 * CatalogResponse lists repositories in server order
 */
export interface CatalogResponse {
  repositories: string[];
  next?: PageLink;
}

/**
 * TagsResponse lists the tags of a repository in server order
 */
export interface TagsResponse {
  name: string;
  tags: string[];
  next?: PageLink;
}

/**
 * RegistryErrorEntry is one entry of a registry error body
 */
export interface RegistryErrorEntry {
  code: ErrorCode;
  message: string;
  detail?: unknown;
}

/**
 * ErrorResponse is the registry error envelope
 */
export interface ErrorResponse {
  errors: RegistryErrorEntry[];
}

/**
 * AuthChallenge is a parsed `WWW-Authenticate` header
 */
export interface AuthChallenge {
  scheme: string;
  params: Record<string, string>;
}

/**
 * ByteRange is an inclusive byte interval from `Range` or `Content-Range`
 */
export interface ByteRange {
  unit: 'bytes';
  start: number;
  end: number;
}

/**
 * ResponseHeaders holds the registry headers the client understands
 */
export interface ResponseHeaders {
  contentType?: string;
  contentLength?: number;
  dockerContentDigest?: Digest;
  dockerDistributionApiVersion?: string;
  dockerUploadUuid?: string;
  etag?: string;
  date?: Date;
  location?: string;
  range?: ByteRange;
  contentRange?: ByteRange;
  acceptRanges?: string;
  link?: PageLink;
  wwwAuthenticate?: AuthChallenge;
}

/**
 * RegistryResponse wraps a parsed body with its status and headers
 */
export interface RegistryResponse<T> {
  status: number;
  headers: ResponseHeaders;
  body: T;
}

/**
 * VersionResponse is the result of the `/v2/` base endpoint check
 */
export interface VersionResponse {
  apiVersion?: string;
}

/**
 * ClientOptions represents client configuration options
 */
export interface ClientOptions {
  /** Registry root, e.g. `https://registry.example.com` */
  baseURL: string;
  /** Basic auth user */
  username?: string;
  /** Basic auth password */
  password?: string;
  /** Bearer token, exclusive with basic auth */
  token?: string;
  /** Per-request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Skip TLS certificate verification */
  insecure?: boolean;
  /** Logger for request tracing */
  logger?: Logger;
}
