/**
 * Registry Client
 * Typed client for the Docker Registry HTTP API V2
 */

// Types
export * from './types';

// Errors
export * from './errors';

// Models
export * from './models';

// Client
export { RegistryClient } from './client';

// Configuration
export { DEFAULT_TIMEOUT, ResolvedClientOptions, loadClientOptions, normalizeBaseURL, validateClientOptions } from './config';

// Image references
export { DEFAULT_REGISTRY, DEFAULT_TAG, ImageParser, ImageReference, parseImageReference, registryBaseURL } from './image/reference';

// Validation
export { isValidDigest, isValidReference, isValidRepositoryName, isValidTag } from './utils/validation';

// Logging
export { createLogger, logger } from './logger';

// Version
export const VERSION = '0.1.0';
