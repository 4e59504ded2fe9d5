import { z } from 'zod';
import { PageLink, TagsResponse } from '../types';
import { parseWith } from './parse';

// Some registries answer `"tags": null` for a repository with no tags
const tagsSchema = z.object({
  name: z.string(),
  tags: z
    .array(z.string())
    .nullish()
    .transform((tags) => tags ?? []),
});

export function parseTags(raw: unknown, next?: PageLink): TagsResponse {
  const { name, tags } = parseWith(tagsSchema, raw, 'invalid tags response');
  return next ? { name, tags, next } : { name, tags };
}
