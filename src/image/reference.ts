import { ValidationError } from '../errors';
import { assertDigest, assertRepositoryName, isValidTag } from '../utils/validation';

export const DEFAULT_REGISTRY = 'docker.io';
export const DEFAULT_TAG = 'latest';

const DOCKER_HUB_ENDPOINT = 'https://registry-1.docker.io';

export interface ImageReference {
  registry: string;
  repository: string;
  tag?: string;
  digest?: string;
  /** Manifest reference to request: the digest when pinned, else the tag */
  reference: string;
  fullName: string;
}

export class ImageParser {
  /**
   * Parse `[registry/]repository[:tag][@digest]`
   */
  parse(imageName: string): ImageReference {
    let registry = DEFAULT_REGISTRY;
    let repository = imageName.trim();
    let tag: string | undefined;
    let digest: string | undefined;

    const digestIndex = repository.indexOf('@');
    if (digestIndex !== -1) {
      digest = repository.substring(digestIndex + 1);
      repository = repository.substring(0, digestIndex);
    }

    // Check for tag
    const tagIndex = repository.lastIndexOf(':');
    if (tagIndex !== -1) {
      const potentialTag = repository.substring(tagIndex + 1);
      // Not a tag when it is the port of a registry host
      if (!potentialTag.includes('/')) {
        tag = potentialTag;
        repository = repository.substring(0, tagIndex);
      }
    }

    // Check for registry (contains /)
    if (repository.includes('/')) {
      const parts = repository.split('/');
      const potentialRegistry = parts[0];
      if (potentialRegistry.includes('.') || potentialRegistry === 'localhost' || potentialRegistry.includes(':')) {
        registry = potentialRegistry;
        repository = parts.slice(1).join('/');
      }
    }

    // Official Docker Hub images live under library/
    if (registry === DEFAULT_REGISTRY && !repository.includes('/')) {
      repository = `library/${repository}`;
    }

    if (tag === undefined && digest === undefined) {
      tag = DEFAULT_TAG;
    }

    assertRepositoryName(repository);
    if (tag !== undefined && !isValidTag(tag)) {
      throw new ValidationError(`invalid tag "${tag}" in image "${imageName}"`);
    }
    if (digest !== undefined) {
      assertDigest(digest);
    }

    const fullName = `${registry}/${repository}${tag !== undefined ? `:${tag}` : ''}${digest !== undefined ? `@${digest}` : ''}`;

    return {
      registry,
      repository,
      ...(tag !== undefined ? { tag } : {}),
      ...(digest !== undefined ? { digest } : {}),
      reference: digest ?? tag ?? DEFAULT_TAG,
      fullName,
    };
  }
}

/**
 * Base URL of the V2 API for a registry host
 */
export function registryBaseURL(registry: string): string {
  if (registry === DEFAULT_REGISTRY || registry === 'index.docker.io') {
    return DOCKER_HUB_ENDPOINT;
  }
  const host = registry.split(':')[0];
  const local = host === 'localhost' || host === '127.0.0.1';
  return `${local ? 'http' : 'https'}://${registry}`;
}

export function parseImageReference(imageName: string): ImageReference {
  return new ImageParser().parse(imageName);
}
