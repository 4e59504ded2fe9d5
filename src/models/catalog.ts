import { z } from 'zod';
import { CatalogResponse, PageLink } from '../types';
import { parseWith } from './parse';

const catalogSchema = z.object({
  repositories: z
    .array(z.string())
    .nullish()
    .transform((repositories) => repositories ?? []),
});

export function parseCatalog(raw: unknown, next?: PageLink): CatalogResponse {
  const { repositories } = parseWith(catalogSchema, raw, 'invalid catalog response');
  return next ? { repositories, next } : { repositories };
}
