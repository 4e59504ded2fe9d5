/**
 * Blob descriptors: the `{mediaType, digest, size}` triple shared by manifest
 * configs, layers and index entries.
 */

import { z } from 'zod';
import { BlobDescriptor, Digest, ResponseHeaders } from '../types';
import { DIGEST_PATTERN, isValidDigest } from '../utils/validation';
import { baseMediaType } from './headers';
import { parseWith } from './parse';

const DEFAULT_BLOB_MEDIA_TYPE = 'application/octet-stream';

export const digestSchema = z.string().regex(DIGEST_PATTERN, 'digest must match <algorithm>:<hex>');

export const platformSchema = z
  .object({
    architecture: z.string(),
    os: z.string(),
    'os.version': z.string().optional(),
    'os.features': z.array(z.string()).optional(),
    variant: z.string().optional(),
    features: z.array(z.string()).optional(),
  })
  .passthrough();

export const blobDescriptorSchema = z
  .object({
    mediaType: z.string().min(1),
    digest: digestSchema,
    size: z.number().int().nonnegative(),
    urls: z.array(z.string()).optional(),
    annotations: z.record(z.string()).optional(),
    artifactType: z.string().optional(),
    platform: platformSchema.optional(),
  })
  .passthrough();

export function parseBlobDescriptor(raw: unknown): BlobDescriptor {
  return parseWith(blobDescriptorSchema, raw, 'invalid blob descriptor');
}

/**
 * Build a descriptor from the headers of a HEAD response. When the registry
 * omits `Docker-Content-Digest` the requested digest is used instead.
 */
export function descriptorFromHeaders(headers: ResponseHeaders, requested?: Digest): BlobDescriptor {
  const fallback = requested !== undefined && isValidDigest(requested) ? requested : undefined;
  return parseBlobDescriptor({
    mediaType: baseMediaType(headers.contentType) ?? DEFAULT_BLOB_MEDIA_TYPE,
    digest: headers.dockerContentDigest ?? fallback,
    size: headers.contentLength,
  });
}
