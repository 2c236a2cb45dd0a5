import { z } from 'zod';
import { WorkItemPriority, WorkItemStatus } from '../types/index.js';

export const TITLE_MAX_LENGTH = 200;
export const DESCRIPTION_MAX_LENGTH = 2000;
export const MAX_PAGE_SIZE = 100;

/**
 * Accepts enum values in any letter case (`todo`, `TODO`, `Todo`).
 */
function caseInsensitive(values: Record<string, string>) {
  return (input: unknown) => {
    if (typeof input !== 'string') return input;
    const match = Object.values(values).find(
      (value) => value.toLowerCase() === input.toLowerCase()
    );
    return match ?? input;
  };
}

const StatusSchema = z.preprocess(
  caseInsensitive(WorkItemStatus),
  z.nativeEnum(WorkItemStatus)
);

const PrioritySchema = z.preprocess(
  caseInsensitive(WorkItemPriority),
  z.nativeEnum(WorkItemPriority)
);

export const WorkItemIdParamsSchema = z.object({
  id: z.string().uuid('Invalid work item ID'),
});

export const CreateWorkItemSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(TITLE_MAX_LENGTH),
  description: z.string().max(DESCRIPTION_MAX_LENGTH).optional().nullable(),
  priority: PrioritySchema.optional(),
});

export type CreateWorkItemInput = z.infer<typeof CreateWorkItemSchema>;

export const UpdateWorkItemSchema = z.object({
  title: z.string().trim().min(1, 'Title cannot be empty').max(TITLE_MAX_LENGTH).optional(),
  description: z.string().max(DESCRIPTION_MAX_LENGTH).optional().nullable(),
  status: StatusSchema.optional(),
  priority: PrioritySchema.optional(),
});

export type UpdateWorkItemInput = z.infer<typeof UpdateWorkItemSchema>;

export const WorkItemFiltersSchema = z.object({
  status: StatusSchema.optional(),
  priority: PrioritySchema.optional(),
  sortBy: z.enum(['title', 'createdAt']).optional(),
  sortDir: z.enum(['asc', 'desc']).optional(),
  page: z.coerce.number().int().positive().safe().optional().default(1),
  pageSize: z.coerce.number().int().positive().max(MAX_PAGE_SIZE).optional().default(10),
});

export type WorkItemFiltersInput = z.infer<typeof WorkItemFiltersSchema>;
