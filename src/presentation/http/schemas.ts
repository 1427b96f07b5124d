/**
 * Request body schemas for the torrent API
 */

import { z } from 'zod';
import { nameFilter, PredicateFilter, statusFilter } from '../../domain/filters/PredicateFilter';
import { STATUS_ORDER } from '../../domain/value-objects/Status';

export const zStatus = z.enum(STATUS_ORDER);

/** { status, name } narrows the selection; both given means both must match */
const zFilter = z.object({
  status: zStatus.optional(),
  name: z.string().min(1).optional()
}).strict();

export type FilterBody = z.infer<typeof zFilter>;

/** Omitted or null selects every torrent */
export const zSelector = z.union([z.array(z.number().int().nonnegative()), zFilter]).nullish();

export function toFilter(body: FilterBody): PredicateFilter | null {
  const parts: PredicateFilter[] = [];
  if (body.status !== undefined) {
    parts.push(statusFilter(body.status));
  }
  if (body.name !== undefined) {
    parts.push(nameFilter(body.name));
  }
  return parts.reduce<PredicateFilter | null>((all, part) => (all ? all.and(part) : part), null);
}

export const zSelection = z.object({ torrents: zSelector });

export const zAddTorrent = z.object({
  torrent: z.string().min(1),
  stopped: z.boolean().optional(),
  path: z.string().min(1).optional()
});

export const zStart = zSelection.extend({ force: z.boolean().optional() });

export const zRemove = zSelection.extend({ deleteFiles: z.boolean().optional() });

export const zMove = zSelection.extend({ path: z.string().min(1) });

export const zFilePriority = zSelection.extend({
  priority: z.enum(['low', 'normal', 'high', 'shun']),
  files: z.union([
    z.array(z.object({ torrentId: z.number().int(), fileId: z.number().int() })),
    z.object({ name: z.string().min(1) })
  ]).nullish()
});

export const zRateLimit = zSelection.extend({
  direction: z.enum(['up', 'down']),
  rate: z.string().min(1).nullable()
});

export const zTrackers = zSelection.extend({
  urls: z.array(z.string().min(1)).min(1),
  partialMatch: z.boolean().optional()
});
