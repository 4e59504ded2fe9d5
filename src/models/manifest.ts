/**
 * Manifest parsing and serialization.
 *
 * Manifests are a tagged union keyed on `mediaType`. The body's own
 * `mediaType` wins; the response Content-Type is the fallback, and a body with
 * neither but `schemaVersion: 1` is taken as a signed schema 1 manifest.
 */

import { z } from 'zod';
import { UnsupportedManifestTypeError, ValidationError } from '../errors';
import {
  DockerManifestV1,
  ImageManifest,
  Manifest,
  ManifestIndex,
  ManifestMediaType,
  ManifestMediaTypes,
} from '../types';
import { blobDescriptorSchema, digestSchema, platformSchema } from './blob';
import { baseMediaType } from './headers';
import { isRecord, parseWith } from './parse';

/**
 * Accept header for manifest requests, newest formats first
 */
export const MANIFEST_ACCEPT_HEADER = [
  ManifestMediaTypes.OCI_INDEX,
  ManifestMediaTypes.OCI_MANIFEST,
  ManifestMediaTypes.DOCKER_MANIFEST_LIST,
  ManifestMediaTypes.DOCKER_MANIFEST_V2,
  ManifestMediaTypes.DOCKER_MANIFEST_V1_SIGNED,
  ManifestMediaTypes.DOCKER_MANIFEST_V1,
].join(', ');

const annotationsSchema = z.record(z.string()).optional();

const dockerManifestV2Schema = z
  .object({
    schemaVersion: z.literal(2),
    mediaType: z.literal(ManifestMediaTypes.DOCKER_MANIFEST_V2),
    config: blobDescriptorSchema,
    layers: z.array(blobDescriptorSchema),
  })
  .passthrough();

const ociManifestSchema = z
  .object({
    schemaVersion: z.literal(2),
    mediaType: z.literal(ManifestMediaTypes.OCI_MANIFEST),
    artifactType: z.string().optional(),
    config: blobDescriptorSchema,
    layers: z.array(blobDescriptorSchema),
    subject: blobDescriptorSchema.optional(),
    annotations: annotationsSchema,
  })
  .passthrough();

const dockerManifestListSchema = z
  .object({
    schemaVersion: z.literal(2),
    mediaType: z.literal(ManifestMediaTypes.DOCKER_MANIFEST_LIST),
    manifests: z.array(blobDescriptorSchema.extend({ platform: platformSchema })),
  })
  .passthrough();

const ociIndexSchema = z
  .object({
    schemaVersion: z.literal(2),
    mediaType: z.literal(ManifestMediaTypes.OCI_INDEX),
    artifactType: z.string().optional(),
    manifests: z.array(blobDescriptorSchema),
    subject: blobDescriptorSchema.optional(),
    annotations: annotationsSchema,
  })
  .passthrough();

const signatureSchema = z
  .object({
    header: z
      .object({
        jwk: z
          .object({
            crv: z.string().optional(),
            kid: z.string().optional(),
            kty: z.string().optional(),
            x: z.string().optional(),
            y: z.string().optional(),
          })
          .passthrough()
          .optional(),
        alg: z.string().optional(),
      })
      .passthrough(),
    signature: z.string(),
    protected: z.string(),
  })
  .passthrough();

const dockerManifestV1Schema = z
  .object({
    schemaVersion: z.literal(1),
    mediaType: z.union([
      z.literal(ManifestMediaTypes.DOCKER_MANIFEST_V1),
      z.literal(ManifestMediaTypes.DOCKER_MANIFEST_V1_SIGNED),
    ]),
    name: z.string(),
    tag: z.string(),
    architecture: z.string(),
    fsLayers: z.array(z.object({ blobSum: digestSchema }).passthrough()),
    history: z.array(z.object({ v1Compatibility: z.string() }).passthrough()),
    signatures: z.array(signatureSchema).optional(),
  })
  .passthrough();

const KNOWN_MEDIA_TYPES: ReadonlySet<string> = new Set(Object.values(ManifestMediaTypes));

function isManifestMediaType(value: string | undefined): value is ManifestMediaType {
  return value !== undefined && KNOWN_MEDIA_TYPES.has(value);
}

function resolveMediaType(raw: Record<string, unknown>, contentType?: string): string | undefined {
  if (raw.mediaType !== undefined) {
    return typeof raw.mediaType === 'string' ? raw.mediaType : String(raw.mediaType);
  }
  const fromHeader = baseMediaType(contentType);
  if (isManifestMediaType(fromHeader)) {
    return fromHeader;
  }
  if (raw.schemaVersion === 1) {
    return ManifestMediaTypes.DOCKER_MANIFEST_V1_SIGNED;
  }
  return fromHeader;
}

// Manifests whose mediaType was inferred rather than read from the body
const inferredMediaType = new WeakSet<Manifest>();

function parseVariant(mediaType: ManifestMediaType, body: Record<string, unknown>): Manifest {
  switch (mediaType) {
    case ManifestMediaTypes.DOCKER_MANIFEST_V2:
      return parseWith(dockerManifestV2Schema, body, 'invalid Docker image manifest');
    case ManifestMediaTypes.OCI_MANIFEST:
      return parseWith(ociManifestSchema, body, 'invalid OCI image manifest');
    case ManifestMediaTypes.DOCKER_MANIFEST_LIST:
      return parseWith(dockerManifestListSchema, body, 'invalid Docker manifest list');
    case ManifestMediaTypes.OCI_INDEX:
      return parseWith(ociIndexSchema, body, 'invalid OCI image index');
    case ManifestMediaTypes.DOCKER_MANIFEST_V1:
    case ManifestMediaTypes.DOCKER_MANIFEST_V1_SIGNED:
      return parseWith(dockerManifestV1Schema, body, 'invalid schema 1 manifest');
  }
}

/**
 * Validate a decoded manifest body.
 *
 * @param raw Decoded JSON body
 * @param contentType Response Content-Type, used when the body has no mediaType
 */
export function parseManifest(raw: unknown, contentType?: string): Manifest {
  if (!isRecord(raw)) {
    throw new ValidationError('manifest must be a JSON object');
  }

  const mediaType = resolveMediaType(raw, contentType);
  if (!isManifestMediaType(mediaType)) {
    throw new UnsupportedManifestTypeError(mediaType);
  }

  const manifest = parseVariant(mediaType, { ...raw, mediaType });
  if (raw.mediaType === undefined) {
    inferredMediaType.add(manifest);
  }
  return manifest;
}

/**
 * JSON object to send for a manifest. The recorded mediaType is dropped when
 * the parsed body had none, and always for schema 1, whose wire format lacks it.
 */
export function serializeManifest(manifest: Manifest): Record<string, unknown> {
  if (isLegacyManifest(manifest) || inferredMediaType.has(manifest)) {
    const { mediaType: _mediaType, ...wire } = manifest;
    return wire;
  }
  return { ...manifest };
}

export type ManifestKind = 'image' | 'index' | 'legacy';

export function manifestKind(manifest: Manifest): ManifestKind {
  switch (manifest.mediaType) {
    case ManifestMediaTypes.DOCKER_MANIFEST_V2:
    case ManifestMediaTypes.OCI_MANIFEST:
      return 'image';
    case ManifestMediaTypes.DOCKER_MANIFEST_LIST:
    case ManifestMediaTypes.OCI_INDEX:
      return 'index';
    case ManifestMediaTypes.DOCKER_MANIFEST_V1:
    case ManifestMediaTypes.DOCKER_MANIFEST_V1_SIGNED:
      return 'legacy';
  }
}

export function isImageManifest(manifest: Manifest): manifest is ImageManifest {
  return manifestKind(manifest) === 'image';
}

export function isManifestIndex(manifest: Manifest): manifest is ManifestIndex {
  return manifestKind(manifest) === 'index';
}

export function isLegacyManifest(manifest: Manifest): manifest is DockerManifestV1 {
  return manifestKind(manifest) === 'legacy';
}

/**
 * Digests a manifest points at, in document order: config then layers for
 * image manifests, child manifests for indexes, fsLayers for schema 1
 */
export function referencedDigests(manifest: Manifest): string[] {
  switch (manifest.mediaType) {
    case ManifestMediaTypes.DOCKER_MANIFEST_V2:
    case ManifestMediaTypes.OCI_MANIFEST:
      return [manifest.config.digest, ...manifest.layers.map((layer) => layer.digest)];
    case ManifestMediaTypes.DOCKER_MANIFEST_LIST:
    case ManifestMediaTypes.OCI_INDEX:
      return manifest.manifests.map((entry) => entry.digest);
    case ManifestMediaTypes.DOCKER_MANIFEST_V1:
    case ManifestMediaTypes.DOCKER_MANIFEST_V1_SIGNED:
      return manifest.fsLayers.map((layer) => layer.blobSum);
  }
}

/**
 * Total size in bytes of the layers of an image manifest
 */
export function totalLayerSize(manifest: ImageManifest): number {
  return manifest.layers.reduce((total, layer) => total + layer.size, 0);
}
