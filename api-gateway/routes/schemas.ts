import { z } from 'zod';

/**
 * Request shapes for /images. These only check transport-level types; the
 * record rules (sizes, tag limits, owner format) live in the engine
 * validators.
 */

const attributes = z.record(z.unknown());

const tagList = z
  .union([z.string(), z.array(z.string())])
  .transform(value => (Array.isArray(value) ? value : value.split(',')))
  .transform(tags => tags.filter(tag => tag.trim() !== ''));

const booleanFlag = z.enum(['true', 'false']).transform(value => value === 'true');

export const initiateUploadBody = z
  .object({
    filename: z.string().min(1),
    contentType: z.string().min(1),
    tags: z.array(z.string()).optional(),
    description: z.string().nullable().optional(),
    customAttributes: attributes.optional(),
    ttlSeconds: z.number().optional(),
  })
  .strict();

export const confirmUploadBody = z
  .object({
    status: z.enum(['active', 'error']),
    sizeBytes: z.number().optional(),
    width: z.number().optional(),
    height: z.number().optional(),
  })
  .strict();

// Identity fields and status are not patchable, so strict() turns them away.
export const updateMetadataBody = z
  .object({
    tags: z.array(z.string()).optional(),
    description: z.string().nullable().optional(),
    customAttributes: attributes.optional(),
  })
  .strict();

export const readAccessQuery = z.object({
  ttlSeconds: z.coerce.number().optional(),
});

export const deleteQuery = z.object({
  hard: booleanFlag.optional(),
});

export const listQuery = z.object({
  mine: booleanFlag.optional(),
  tags: tagList.optional(),
  contentType: z.string().optional(),
  startTime: z.string().datetime({ offset: true }).transform(value => new Date(value)).optional(),
  endTime: z.string().datetime({ offset: true }).transform(value => new Date(value)).optional(),
  minSize: z.coerce.number().optional(),
  maxSize: z.coerce.number().optional(),
  status: z.string().optional(),
  limit: z.coerce.number().optional(),
  cursor: z.string().optional(),
});

export type ListQuery = z.infer<typeof listQuery>;
