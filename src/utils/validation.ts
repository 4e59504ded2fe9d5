/**
 * Name, tag and digest validation for request arguments.
 */

import { ValidationError } from '../errors';

/**
 * Each path component of a repository name.
 */
const REPOSITORY_COMPONENT_PATTERN = /^[a-z0-9]+((\.|_|__|-+)[a-z0-9]+)*$/;

const TAG_PATTERN = /^[a-zA-Z0-9_][a-zA-Z0-9._-]{0,127}$/;

/**
 * Content digest, `<algorithm>:<hex>`.
 */
export const DIGEST_PATTERN = /^[a-z0-9+._-]+:[a-f0-9]+$/;

export const REPOSITORY_NAME_ERROR_MESSAGE =
  'repository name must match [a-z0-9]+((.|_|__|-+)[a-z0-9]+)*(/[a-z0-9]+((.|_|__|-+)[a-z0-9]+)*)*';

export function isValidRepositoryName(name: string): boolean {
  if (!name || name.length > 255) {
    return false;
  }
  return name.split('/').every((component) => REPOSITORY_COMPONENT_PATTERN.test(component));
}

export function isValidTag(tag: string): boolean {
  return TAG_PATTERN.test(tag);
}

export function isValidDigest(digest: string): boolean {
  return DIGEST_PATTERN.test(digest);
}

/**
 * A reference is either a tag or a digest
 */
export function isValidReference(reference: string): boolean {
  return reference.includes(':') ? isValidDigest(reference) : isValidTag(reference);
}

export function assertRepositoryName(name: string): void {
  if (!isValidRepositoryName(name)) {
    throw new ValidationError(`invalid repository name "${name}"`, [
      { path: 'repository', message: REPOSITORY_NAME_ERROR_MESSAGE },
    ]);
  }
}

export function assertReference(reference: string): void {
  if (!isValidReference(reference)) {
    throw new ValidationError(`invalid reference "${reference}"`, [
      { path: 'reference', message: 'must be a tag or an <algorithm>:<hex> digest' },
    ]);
  }
}

export function assertDigest(digest: string): void {
  if (!isValidDigest(digest)) {
    throw new ValidationError(`invalid digest "${digest}"`, [
      { path: 'digest', message: 'must match <algorithm>:<hex>' },
    ]);
  }
}

export function assertPageSize(pageSize: number | undefined): void {
  if (pageSize !== undefined && (!Number.isInteger(pageSize) || pageSize <= 0)) {
    throw new ValidationError(`invalid page size ${pageSize}`, [
      { path: 'pageSize', message: 'must be a positive integer' },
    ]);
  }
}
